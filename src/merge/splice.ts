/**
 * Text-level edits of a canonical spec.
 *
 * Requirement blocks are located by their headings and removed, replaced or
 * appended as whole line ranges. Every other line is kept as written:
 * sections the parser does not model, prose inside scenarios, code fences.
 */

import { headingOf, normalizeTitle, scanLines } from "../parser/markdown.js";
import { REQUIREMENT_HEADING, renderRequirement } from "../parser/requirements.js";
import type { Requirement, SpecDelta } from "../parser/types.js";

export interface RequirementSpan {
  title: string;
  /** Index of the `### Requirement:` line */
  start: number;
  /** Index after the block's last non-blank line */
  end: number;
}

export interface SectionSpan {
  /** Index of the `## ...` heading line */
  heading: number;
  /** Index after the section's last line */
  end: number;
  requirements: RequirementSpan[];
}

/**
 * Source lines of each ADDED and MODIFIED block in a delta, by title
 */
export interface DeltaBlocks {
  added: Map<string, string[]>;
  modified: Map<string, string[]>;
}

const LINE_BREAK = /\r\n|\r|\n/;

function isBlank(line: string | undefined): boolean {
  return line !== undefined && line.trim() === "";
}

/**
 * Index after the last non-blank line in (floor, end)
 */
function contentEnd(lines: string[], floor: number, end: number): number {
  let at = end;
  while (at > floor + 1 && isBlank(lines[at - 1])) at--;
  return at;
}

/**
 * Find the first `## <name>` section and the requirement blocks in it
 */
export function locateSection(lines: string[], name: string): SectionSpan | null {
  let section: SectionSpan | null = null;
  let current: RequirementSpan | null = null;

  for (const line of scanLines(lines.join("\n"))) {
    const index = line.line - 1;
    const heading = headingOf(line);
    if (!heading) continue;

    if (heading.level <= 2) {
      if (section) {
        if (current) {
          current.end = contentEnd(lines, current.start, index);
          section.requirements.push(current);
        }
        section.end = index;
        return section;
      }
      if (heading.level === 2 && heading.title === name) {
        section = { heading: index, end: lines.length, requirements: [] };
      }
      continue;
    }

    if (section && heading.level === 3) {
      if (current) {
        current.end = contentEnd(lines, current.start, index);
        section.requirements.push(current);
      }
      const match = heading.title.match(REQUIREMENT_HEADING);
      current = match ? { title: normalizeTitle(match[1]), start: index, end: index + 1 } : null;
    }
  }

  if (section && current) {
    current.end = contentEnd(lines, current.start, lines.length);
    section.requirements.push(current);
  }
  return section;
}

/**
 * Collect the ADDED and MODIFIED blocks of a delta as written
 */
export function deltaBlocks(text: string): DeltaBlocks {
  const lines = text.split(LINE_BREAK);
  const collect = (name: string): Map<string, string[]> => {
    const blocks = new Map<string, string[]>();
    const section = locateSection(lines, name);
    for (const span of section?.requirements ?? []) {
      blocks.set(span.title, lines.slice(span.start, span.end));
    }
    return blocks;
  };
  return { added: collect("ADDED Requirements"), modified: collect("MODIFIED Requirements") };
}

/**
 * Apply a delta to canonical spec text: REMOVED, then MODIFIED, then ADDED.
 * Titles the text does not hold are skipped; the model merge reports them.
 */
export function spliceRequirements(text: string, delta: SpecDelta, blocks?: DeltaBlocks): string {
  const eol = text.includes("\r\n") ? "\r\n" : text.includes("\r") ? "\r" : "\n";
  const lines = text.split(LINE_BREAK);
  const find = (title: string): RequirementSpan | undefined =>
    locateSection(lines, "Requirements")?.requirements.find((r) => r.title === title);
  const source = (requirement: Requirement, written: Map<string, string[]> | undefined): string[] =>
    written?.get(requirement.title) ?? renderRequirement(requirement);

  for (const entry of delta.removed) {
    const span = find(entry.title);
    if (!span) continue;
    lines.splice(span.start, span.end - span.start);
    // Keep a single blank line where the block was
    if (isBlank(lines[span.start - 1]) && isBlank(lines[span.start])) {
      lines.splice(span.start, 1);
    }
  }

  for (const entry of delta.modified) {
    const span = find(entry.title);
    if (!span) continue;
    lines.splice(span.start, span.end - span.start, ...source(entry, blocks?.modified));
  }

  for (const entry of delta.added) {
    const section = locateSection(lines, "Requirements");
    const block = source(entry, blocks?.added);
    if (section) {
      lines.splice(contentEnd(lines, section.heading, section.end), 0, "", ...block);
    } else {
      lines.splice(contentEnd(lines, -1, lines.length), 0, "", "## Requirements", "", ...block);
    }
  }

  return lines.join(eol);
}
