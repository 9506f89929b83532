/**
 * Canonical capability specs: `specs/<capability>/spec.md`.
 *
 *   # <capability> Specification
 *
 *   ## Purpose
 *   <purpose>
 *
 *   ## Requirements
 *   ### Requirement: ...
 */

import { headingOf, joinBody, scanLines, splitSections } from './markdown.js';
import {
  parseRequirementSection,
  renderRequirement,
  sortErrors,
  toRequirement,
} from './requirements.js';
import type { CapabilitySpec, ParseError, ParseResult } from './types.js';

export function parseCapabilitySpec(text: string, name: string): ParseResult<CapabilitySpec> {
  const spec: CapabilitySpec = { name, purpose: '', requirements: [] };
  const errors: ParseError[] = [];

  for (const section of splitSections(scanLines(text))) {
    if (section.heading === 'Purpose') {
      spec.purpose = joinBody(section.lines.map((l) => l.text));
      continue;
    }

    if (section.heading === 'Requirements') {
      const parsed = parseRequirementSection(section.lines, {
        requireScenarios: true,
        section: 'Requirements',
      });
      errors.push(...parsed.errors);
      spec.requirements.push(...parsed.requirements.map(toRequirement));
      continue;
    }

    for (const line of section.lines) {
      const heading = headingOf(line);
      if (heading?.level === 3 && heading.title.startsWith('Requirement:')) {
        errors.push({
          kind: 'MissingSectionHeader',
          line: line.line,
          message: `"### ${heading.title}" must sit under "## Requirements"`,
        });
      }
    }
  }

  if (errors.length > 0) {
    return { ok: false, errors: sortErrors(errors) };
  }
  return { ok: true, value: spec };
}

export function renderCapabilitySpec(spec: CapabilitySpec): string {
  const lines = [`# ${spec.name} Specification`, '', '## Purpose'];
  if (spec.purpose) {
    lines.push(...spec.purpose.split('\n'));
  }
  lines.push('', '## Requirements');
  for (const requirement of spec.requirements) {
    lines.push('', ...renderRequirement(requirement));
  }
  return `${lines.join('\n')}\n`;
}
