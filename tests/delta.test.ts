import { describe, it, expect } from 'vitest';
import { countDeltaEntries, parseSpecDelta, renderSpecDelta } from '../src/parser/delta.js';
import type { SpecDelta } from '../src/parser/types.js';

const CANONICAL_DELTA = `## ADDED Requirements

### Requirement: Password reset
Users SHALL reset passwords by email.

#### Scenario: Reset link sent
- **Given** a registered email
- **When** the user asks for a reset
- **Then** a reset link is emailed
- **And** the link expires in one hour

## MODIFIED Requirements

### Requirement: Login
Users SHALL log in with email or username.

#### Scenario: Username login
- **Given** a registered username
- **When** the user submits it with the password
- **Then** they see the dashboard

## REMOVED Requirements

### Requirement: Legacy login
Replaced by email login.
`;

function parseOk(text: string, capability = 'auth'): SpecDelta {
  const result = parseSpecDelta(text, capability);
  if (!result.ok) {
    throw new Error(`expected delta to parse: ${result.errors.map((e) => e.message).join('; ')}`);
  }
  return result.value;
}

describe('parseSpecDelta', () => {
  it('should parse all three sections', () => {
    const delta = parseOk(CANONICAL_DELTA);

    expect(delta.capability).toBe('auth');
    expect(delta.added).toEqual([
      {
        title: 'Password reset',
        body: 'Users SHALL reset passwords by email.',
        scenarios: [
          {
            title: 'Reset link sent',
            steps: [
              { keyword: 'Given', kind: 'given', text: 'a registered email' },
              { keyword: 'When', kind: 'when', text: 'the user asks for a reset' },
              { keyword: 'Then', kind: 'then', text: 'a reset link is emailed' },
              { keyword: 'And', kind: 'then', text: 'the link expires in one hour' },
            ],
          },
        ],
      },
    ]);
    expect(delta.modified.map((r) => r.title)).toEqual(['Login']);
    expect(delta.removed).toEqual([{ title: 'Legacy login', body: 'Replaced by email login.' }]);
    expect(countDeltaEntries(delta)).toBe(3);
  });

  it('should report a scenario without a When step', () => {
    const text = `## ADDED Requirements

### Requirement: Login
Users SHALL log in.

#### Scenario: Valid credentials
- **Given** a registered user
- **Then** they see the dashboard
`;
    const result = parseSpecDelta(text, 'auth');

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.errors).toEqual([
      {
        kind: 'ScenarioMissingStep',
        line: 6,
        message: 'Scenario "Valid credentials" has no When step',
        requirement: 'Login',
        scenario: 'Valid credentials',
        step: 'when',
      },
    ]);
  });

  it('should report a requirement without scenarios', () => {
    const result = parseSpecDelta('## ADDED Requirements\n\n### Requirement: Login\nUsers SHALL log in.\n', 'auth');

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.errors).toHaveLength(1);
    expect(result.errors[0].kind).toBe('RequirementWithoutScenario');
    expect(result.errors[0].line).toBe(3);
    expect(result.errors[0].message).toBe('Requirement "Login" must have at least one scenario');
  });

  it('should report steps out of order', () => {
    const text = `## ADDED Requirements

### Requirement: Login
Body.

#### Scenario: Backwards
- **When** the user submits
- **Given** a registered user
- **Then** done
`;
    const result = parseSpecDelta(text, 'auth');

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.errors).toHaveLength(1);
    expect(result.errors[0]).toMatchObject({
      kind: 'StepsOutOfOrder',
      line: 8,
      message: 'Scenario "Backwards" has Given after When',
    });
  });

  it('should reject a scenario that starts with And', () => {
    const text = `## ADDED Requirements

### Requirement: Login
Body.

#### Scenario: Dangling
- **And** something
- **Given** a user
- **When** they act
- **Then** it works
`;
    const result = parseSpecDelta(text, 'auth');

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.errors.map((e) => [e.kind, e.line])).toEqual([['StepsOutOfOrder', 7]]);
  });

  it('should reject a requirement outside an operation section', () => {
    const result = parseSpecDelta('# auth delta\n\n### Requirement: Orphan\nBody.\n', 'auth');

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.errors.map((e) => [e.kind, e.line])).toEqual([['MissingSectionHeader', 3]]);
  });

  it('should reject a duplicate title within a section', () => {
    const block = `### Requirement: Login
Body.

#### Scenario: One
- **Given** a
- **When** b
- **Then** c
`;
    const result = parseSpecDelta(`## ADDED Requirements\n\n${block}\n${block}`, 'auth');

    expect(result.ok).toBe(false);
    if (result.ok) return;
    // Second block starts after: header, blank, 7 block lines, blank
    expect(result.errors.map((e) => [e.kind, e.line])).toEqual([['DuplicateRequirementTitle', 11]]);
  });

  it('should return every error sorted by line', () => {
    const text = `## ADDED Requirements

### Requirement: First
No scenario here.

### Requirement: Second
Body.

#### Scenario: Incomplete
- **Given** only a precondition
`;
    const result = parseSpecDelta(text, 'auth');

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.errors.map((e) => [e.kind, e.line])).toEqual([
      ['RequirementWithoutScenario', 3],
      ['ScenarioMissingStep', 9],
      ['ScenarioMissingStep', 9],
    ]);
    expect(result.errors.slice(1).map((e) => e.step)).toEqual(['when', 'then']);
  });

  it('should accept REMOVED entries without scenarios', () => {
    const delta = parseOk('## REMOVED Requirements\n\n### Requirement: Old\nGone.\n');

    expect(delta.removed).toEqual([{ title: 'Old', body: 'Gone.' }]);
    expect(delta.added).toEqual([]);
  });

  it('should normalize whitespace in titles', () => {
    const delta = parseOk(
      '## REMOVED Requirements\n\n### Requirement:   Token   Refresh  \n'
    );

    expect(delta.removed[0].title).toBe('Token Refresh');
  });

  it('should keep a trailing # that is part of a title', () => {
    const delta = parseOk(
      '## REMOVED Requirements ##\n\n### Requirement: Support C#\n\n### Requirement: Support F# ###\n'
    );

    expect(delta.removed.map((r) => r.title)).toEqual(['Support C#', 'Support F#']);
  });

  it('should join wrapped step lines', () => {
    const text = `## ADDED Requirements

### Requirement: Login
Body.

#### Scenario: Wrapped
- **Given** a user
  with an account
- **When** they act
- **Then** it works
`;
    const delta = parseOk(text);

    expect(delta.added[0].scenarios[0].steps[0].text).toBe('a user with an account');
  });

  it('should not fold prose or fences after a step into it', () => {
    const text = `## ADDED Requirements

### Requirement: Login
Body.

#### Scenario: Works
- **Given** a user
- **When** they act
- **Then** a session exists

The payload:

\`\`\`json
{ "user": "test-user" }
\`\`\`
`;
    const delta = parseOk(text);

    expect(delta.added[0].scenarios[0].steps.map((s) => s.text)).toEqual([
      'a user',
      'they act',
      'a session exists',
    ]);
  });

  it('should treat headings inside code fences as body text', () => {
    const text = `## ADDED Requirements

### Requirement: Config format
Example:

\`\`\`md
### Requirement: Not a heading
\`\`\`

#### Scenario: Loads
- **Given** a config
- **When** it loads
- **Then** it parses
`;
    const delta = parseOk(text);

    expect(delta.added).toHaveLength(1);
    expect(delta.added[0].body).toBe('Example:\n\n```md\n### Requirement: Not a heading\n```');
  });

  it('should accept CRLF line endings', () => {
    const delta = parseOk(CANONICAL_DELTA.replace(/\n/g, '\r\n'));

    expect(countDeltaEntries(delta)).toBe(3);
  });
});

describe('renderSpecDelta', () => {
  it('should reproduce canonical text exactly', () => {
    expect(renderSpecDelta(parseOk(CANONICAL_DELTA))).toBe(CANONICAL_DELTA);
  });

  it('should round-trip a delta through render and parse', () => {
    const messy = `Intro prose is dropped.

## REMOVED Requirements
### Requirement: Legacy login

## ADDED Requirements
### Requirement:  Password  reset
Users SHALL reset passwords by email.
#### Scenario: Reset link sent
* **given**: a registered email
* **WHEN** the user asks
  for a reset
* **Then** a reset link is emailed
`;
    const delta = parseOk(messy);
    const reparsed = parseOk(renderSpecDelta(delta));

    expect(reparsed).toEqual(delta);
    expect(reparsed.added[0].scenarios[0].steps.map((s) => s.text)).toEqual([
      'a registered email',
      'the user asks for a reset',
      'a reset link is emailed',
    ]);
  });

  it('should render sections in ADDED, MODIFIED, REMOVED order', () => {
    const delta: SpecDelta = {
      capability: 'auth',
      added: [],
      modified: [],
      removed: [{ title: 'Old', body: '' }],
    };

    expect(renderSpecDelta(delta)).toBe('## REMOVED Requirements\n\n### Requirement: Old\n');
  });

  it('should render an empty delta as empty text', () => {
    expect(renderSpecDelta({ capability: 'auth', added: [], modified: [], removed: [] })).toBe('');
  });
});
