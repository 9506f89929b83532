/**
 * Spec delta parsing and rendering.
 *
 * A delta file lives at `changes/<id>/specs/<capability>/spec.md` and holds
 * up to three sections: `## ADDED Requirements`, `## MODIFIED Requirements`
 * and `## REMOVED Requirements`.
 */

import { headingOf, scanLines, splitSections } from './markdown.js';
import {
  parseRequirementSection,
  renderRequirement,
  sortErrors,
  toRequirement,
} from './requirements.js';
import {
  SECTION_ORDER,
  type DeltaOperation,
  type ParseError,
  type ParseResult,
  type SpecDelta,
} from './types.js';

const SECTION_HEADING = /^(ADDED|MODIFIED|REMOVED) Requirements$/;

export function sectionHeading(operation: DeltaOperation): string {
  return `## ${operation} Requirements`;
}

function asOperation(heading: string | null): DeltaOperation | null {
  if (heading === null) return null;
  const match = heading.match(SECTION_HEADING);
  if (!match) return null;
  switch (match[1]) {
    case 'ADDED':
      return 'ADDED';
    case 'MODIFIED':
      return 'MODIFIED';
    case 'REMOVED':
      return 'REMOVED';
    default:
      return null;
  }
}

/**
 * Parse a spec delta. Pure: the same text always yields the same delta or
 * the same errors, sorted by line.
 */
export function parseSpecDelta(text: string, capability: string): ParseResult<SpecDelta> {
  const delta: SpecDelta = { capability, added: [], modified: [], removed: [] };
  const errors: ParseError[] = [];
  const seenSections = new Set<DeltaOperation>();

  for (const section of splitSections(scanLines(text))) {
    const operation = asOperation(section.heading);

    if (operation === null) {
      // Requirements are only meaningful under an operation heading
      for (const line of section.lines) {
        const heading = headingOf(line);
        if (heading?.level === 3 && heading.title.startsWith('Requirement:')) {
          errors.push({
            kind: 'MissingSectionHeader',
            line: line.line,
            message: `"### ${heading.title}" must sit under "## ADDED Requirements", "## MODIFIED Requirements" or "## REMOVED Requirements"`,
          });
        }
      }
      continue;
    }

    if (seenSections.has(operation)) {
      errors.push({
        kind: 'MissingSectionHeader',
        line: section.line,
        message: `"${sectionHeading(operation)}" appears more than once`,
      });
    }
    seenSections.add(operation);

    const parsed = parseRequirementSection(section.lines, {
      requireScenarios: operation !== 'REMOVED',
      section: operation,
    });
    errors.push(...parsed.errors);

    switch (operation) {
      case 'ADDED':
        delta.added.push(...parsed.requirements.map(toRequirement));
        break;
      case 'MODIFIED':
        delta.modified.push(...parsed.requirements.map(toRequirement));
        break;
      case 'REMOVED':
        delta.removed.push(
          ...parsed.requirements.map((r) => ({ title: r.title, body: r.body }))
        );
        break;
    }
  }

  if (errors.length > 0) {
    return { ok: false, errors: sortErrors(errors) };
  }
  return { ok: true, value: delta };
}

/**
 * Render a delta in canonical form. Empty sections are omitted.
 */
export function renderSpecDelta(delta: SpecDelta): string {
  const blocks: string[] = [];

  for (const operation of SECTION_ORDER) {
    const lines: string[] = [sectionHeading(operation)];

    if (operation === 'REMOVED') {
      if (delta.removed.length === 0) continue;
      for (const entry of delta.removed) {
        lines.push('', `### Requirement: ${entry.title}`);
        if (entry.body) lines.push(...entry.body.split('\n'));
      }
    } else {
      const requirements = operation === 'ADDED' ? delta.added : delta.modified;
      if (requirements.length === 0) continue;
      for (const requirement of requirements) {
        lines.push('', ...renderRequirement(requirement));
      }
    }

    blocks.push(lines.join('\n'));
  }

  return blocks.length > 0 ? `${blocks.join('\n\n')}\n` : '';
}

/**
 * Total number of requirement entries across all sections
 */
export function countDeltaEntries(delta: SpecDelta): number {
  return delta.added.length + delta.modified.length + delta.removed.length;
}
