/**
 * proposal.md parsing: `##` sections and `Related:` capability references.
 */

import { headingOf, joinBody, scanLines, stripComments } from './markdown.js';

export type ProposalSectionName =
  | 'Executive Summary'
  | 'Background'
  | 'Goals'
  | 'Scope'
  | 'Approach'
  | 'Risks'
  | 'Validation'
  | 'Open Questions';

export interface ProposalSectionRule {
  name: ProposalSectionName;
  /** Heading shown in new proposals */
  heading: string;
  aliases: string[];
  required: boolean;
}

/**
 * Proposal sections in the order they must appear
 */
export const PROPOSAL_SECTIONS: readonly ProposalSectionRule[] = [
  {
    name: 'Executive Summary',
    heading: 'Executive Summary',
    aliases: ['executive summary', 'summary'],
    required: true,
  },
  {
    name: 'Background',
    heading: 'Background/Why',
    aliases: ['background', 'why', 'background/why', 'motivation'],
    required: true,
  },
  { name: 'Goals', heading: 'Goals', aliases: ['goals'], required: true },
  {
    name: 'Scope',
    heading: 'Scope/Non-Goals',
    aliases: ['scope', 'scope/non-goals', 'non-goals', 'scope and non-goals'],
    required: true,
  },
  {
    name: 'Approach',
    heading: 'Approach',
    aliases: ['approach', 'what changes'],
    required: true,
  },
  {
    name: 'Risks',
    heading: 'Risks',
    aliases: ['risks', 'risks and mitigations'],
    required: false,
  },
  { name: 'Validation', heading: 'Validation', aliases: ['validation'], required: false },
  {
    name: 'Open Questions',
    heading: 'Open Questions',
    aliases: ['open questions'],
    required: false,
  },
];

export interface ProposalSection {
  heading: string;
  /** Canonical name, or null for headings outside the convention */
  canonical: ProposalSectionName | null;
  line: number;
  body: string;
}

export interface RelatedReference {
  capability: string;
  line: number;
}

export interface ParsedProposal {
  title: string | null;
  sections: ProposalSection[];
  related: RelatedReference[];
}

const RELATED_PATTERN =
  /^\s*(?:[-*]\s+)?\**\s*Related(?:\s+capabilities)?\s*\**\s*:\s*\**\s*(.*)$/i;

/**
 * Map a heading to its canonical section name.
 * "2. Background / Why:" and "background/why" both map to Background.
 */
export function canonicalSection(heading: string): ProposalSectionName | null {
  const key = heading
    .toLowerCase()
    .replace(/^\d+[.)]\s*/, '')
    .replace(/:$/, '')
    .replace(/\s*\/\s*/g, '/')
    .replace(/\s+/g, ' ')
    .trim();
  const rule = PROPOSAL_SECTIONS.find((r) => r.aliases.includes(key));
  return rule ? rule.name : null;
}

export function parseProposal(text: string): ParsedProposal {
  const lines = scanLines(text);
  const sections: ProposalSection[] = [];
  const related: RelatedReference[] = [];
  let title: string | null = null;
  let current: { heading: string; line: number; body: string[] } | null = null;

  const close = (): void => {
    if (!current) return;
    sections.push({
      heading: current.heading,
      canonical: canonicalSection(current.heading),
      line: current.line,
      body: joinBody(current.body),
    });
    current = null;
  };

  for (const line of lines) {
    const heading = headingOf(line);
    if (heading?.level === 1) {
      close();
      title ??= heading.title;
      continue;
    }
    if (heading?.level === 2) {
      close();
      current = { heading: heading.title, line: line.line, body: [] };
      continue;
    }

    if (!line.inFence) {
      const match = line.text.match(RELATED_PATTERN);
      if (match) {
        for (const capability of splitReferences(match[1])) {
          related.push({ capability, line: line.line });
        }
      }
    }

    current?.body.push(line.text);
  }
  close();

  return { title, sections, related };
}

function splitReferences(list: string): string[] {
  return list
    .split(',')
    .map((item) => item.replace(/[`*@]/g, '').trim())
    .filter((item) => item.length > 0 && item.toLowerCase() !== 'none');
}

/**
 * Whether a section has content beyond scaffold placeholders
 */
export function isSectionEmpty(section: ProposalSection): boolean {
  return stripComments(section.body).trim().length === 0;
}
