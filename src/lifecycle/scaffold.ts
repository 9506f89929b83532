/**
 * Templates written by `propose`.
 *
 * Placeholders are HTML comments, so an untouched section reads as empty to
 * the validator.
 */

import { PROPOSAL_SECTIONS } from '../parser/proposal.js';

const SECTION_HINTS: Record<string, string> = {
  'Executive Summary': 'One paragraph: what changes and what it enables.',
  Background: 'Why this change is needed now; link issues or incidents.',
  Goals: 'Bullet the outcomes this change must achieve.',
  Scope: 'What is in scope, and what is explicitly not.',
  Approach: 'How the change is made; name the affected capabilities.',
  Risks: 'What could go wrong and how it is mitigated.',
  Validation: 'How the result is verified (tests, metrics, reviews).',
  'Open Questions': 'Decisions still pending, with owners.',
};

export function proposalTemplate(title: string): string {
  const lines = [`# ${title}`];
  for (const rule of PROPOSAL_SECTIONS) {
    lines.push('', `## ${rule.heading}`, `<!-- ${SECTION_HINTS[rule.name]} -->`);
  }
  return `${lines.join('\n')}\n`;
}

export function tasksTemplate(id: string): string {
  return `# Tasks

## 1. Implementation
- [ ] 1.1 Write tests for the new behaviour
- [ ] 1.2 Implement the change
- [ ] 1.3 Update documentation

## 2. Verification
- [ ] 2.1 Run \`speclane validate ${id} --strict\`
`;
}

export function deltaTemplate(capability: string): string {
  return `## ADDED Requirements

### Requirement: ${capability} behaviour
The system SHALL <describe the behaviour>.

#### Scenario: Main success path
- **Given** <a precondition>
- **When** <an action>
- **Then** <an observable outcome>
`;
}
