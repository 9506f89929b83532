/**
 * Line-level markdown scanning shared by the document parsers.
 *
 * Only ATX headings are structure. Fenced code blocks are opaque, so a
 * `### Requirement:` inside a code sample is plain text.
 */

export interface MarkdownLine {
  text: string;
  /** 1-based */
  line: number;
  inFence: boolean;
}

export interface Heading {
  level: number;
  title: string;
}

/**
 * A run of lines under one heading of level <= 2 (or the preamble before
 * the first such heading, with `heading` null).
 */
export interface MarkdownSection {
  heading: string | null;
  line: number;
  lines: MarkdownLine[];
}

const FENCE_PATTERN = /^\s{0,3}(```|~~~)/;
// A closing run of #s only counts when whitespace precedes it
const HEADING_PATTERN = /^(#{1,6})\s+(.*?)(?:\s+#+)?\s*$/;

/**
 * Split text into lines, tracking fenced code blocks
 */
export function scanLines(text: string): MarkdownLine[] {
  const raw = text.replace(/\r\n?/g, '\n').split('\n');
  const lines: MarkdownLine[] = [];
  let fence: string | null = null;

  raw.forEach((lineText, i) => {
    const fenceMatch = lineText.match(FENCE_PATTERN);
    if (fenceMatch) {
      const marker = fenceMatch[1];
      if (fence === null) {
        fence = marker;
      } else if (fence === marker) {
        fence = null;
      }
      lines.push({ text: lineText, line: i + 1, inFence: true });
      return;
    }
    lines.push({ text: lineText, line: i + 1, inFence: fence !== null });
  });

  return lines;
}

/**
 * Heading level and title, or null for anything that is not a heading
 */
export function headingOf(line: MarkdownLine): Heading | null {
  if (line.inFence) return null;
  const match = line.text.match(HEADING_PATTERN);
  if (!match) return null;
  return { level: match[1].length, title: match[2] };
}

/**
 * Group lines under their level-1/level-2 headings
 */
export function splitSections(lines: MarkdownLine[]): MarkdownSection[] {
  const sections: MarkdownSection[] = [{ heading: null, line: 1, lines: [] }];

  for (const line of lines) {
    const heading = headingOf(line);
    if (heading && heading.level <= 2) {
      // Level-1 titles close the previous section but carry no name of interest
      sections.push({
        heading: heading.level === 2 ? heading.title : null,
        line: line.line,
        lines: [],
      });
      continue;
    }
    sections[sections.length - 1].lines.push(line);
  }

  return sections;
}

/**
 * Collapse internal whitespace so titles compare reliably
 */
export function normalizeTitle(title: string): string {
  return title.trim().replace(/\s+/g, ' ');
}

/**
 * Join body lines, dropping leading and trailing blank lines
 */
export function joinBody(lines: string[]): string {
  const trimmed = lines.map((l) => l.trimEnd());
  let start = 0;
  let end = trimmed.length;
  while (start < end && trimmed[start] === '') start++;
  while (end > start && trimmed[end - 1] === '') end--;
  return trimmed.slice(start, end).join('\n');
}

/**
 * Remove HTML comments (scaffold placeholders) from text
 */
export function stripComments(text: string): string {
  return text.replace(/<!--[\s\S]*?-->/g, '');
}
