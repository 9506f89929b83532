import { describe, expect, it } from 'vitest';
import { InputError, StateError } from '../src/errors.js';
import { checkChangeId, defaultCapability, defaultTitle } from '../src/lifecycle/change-id.js';
import { deltaTemplate, proposalTemplate, tasksTemplate } from '../src/lifecycle/scaffold.js';
import { assertTransition, canTransition, statusRank } from '../src/lifecycle/states.js';
import { parseSpecDelta } from '../src/parser/delta.js';
import { parseTasks } from '../src/parser/tasks.js';
import { checkProposal } from '../src/validation/validator.js';

describe('checkChangeId', () => {
  it('should accept verb-led kebab-case ids', () => {
    expect(() => checkChangeId('add-user-auth')).not.toThrow();
    expect(() => checkChangeId('migrate-v2-api')).not.toThrow();
  });

  it.each(['Add-user-auth', 'add_user_auth', 'add--auth', '-add-auth', 'add-auth-', '2fa-enable'])(
    'should reject malformed id %s',
    (id) => {
      expect(() => checkChangeId(id)).toThrow(
        `Invalid change id "${id}": use lowercase kebab-case, e.g. add-user-auth`
      );
    }
  );

  it('should require something after the verb', () => {
    expect(() => checkChangeId('add')).toThrow(
      'Invalid change id "add": name what changes after the verb, e.g. add-something'
    );
  });

  it('should require a known verb and list the verbs', () => {
    let failure: unknown;
    try {
      checkChangeId('user-auth', ['tune']);
    } catch (err) {
      failure = err;
    }

    expect(failure).toBeInstanceOf(InputError);
    expect(failure).toMatchObject({
      code: 'INVALID_ID',
      message: 'Invalid change id "user-auth": must start with a verb ("user" is not one)',
    });
    expect(failure).toHaveProperty('suggestion', expect.stringContaining('tune, update, upgrade'));
  });

  it('should accept configured verbs', () => {
    expect(() => checkChangeId('tune-cache-size', ['tune'])).not.toThrow();
  });
});

describe('change id defaults', () => {
  it('should derive the capability from the words after the verb', () => {
    expect(defaultCapability('add-user-auth')).toBe('user-auth');
  });

  it('should derive a sentence-case title', () => {
    expect(defaultTitle('add-user-auth')).toBe('Add user auth');
  });
});

describe('status transitions', () => {
  it('should only move forward', () => {
    expect(canTransition('draft', 'validated')).toBe(true);
    expect(canTransition('validated', 'applied')).toBe(true);
    expect(canTransition('applied', 'archived')).toBe(true);
    expect(canTransition('draft', 'applied')).toBe(false);
    expect(canTransition('applied', 'validated')).toBe(false);
    expect(canTransition('archived', 'draft')).toBe(false);
  });

  it('should allow revalidating a validated change', () => {
    expect(canTransition('validated', 'validated')).toBe(true);
  });

  it('should rank statuses in lifecycle order', () => {
    expect(statusRank('draft')).toBe(0);
    expect(statusRank('archived')).toBe(3);
  });

  it('should throw INVALID_TRANSITION for a step not in the table', () => {
    expect(() => assertTransition('draft', 'archived', 'not yet', 'apply first')).toThrow(StateError);
    expect(() => assertTransition('draft', 'archived', 'not yet')).toThrow('not yet');
    expect(() => assertTransition('applied', 'archived', 'fine')).not.toThrow();
  });
});

describe('scaffold templates', () => {
  it('should produce a proposal that only warns about empty sections', () => {
    const found = checkProposal(proposalTemplate('Add user auth'));

    expect(found).toHaveLength(1);
    expect(found[0]).toMatchObject({ severity: 'warning', rule: 'EmptyProposalSection', line: 3 });
  });

  it('should start the proposal with its title', () => {
    expect(proposalTemplate('Add user auth').split('\n').slice(0, 4)).toEqual([
      '# Add user auth',
      '',
      '## Executive Summary',
      '<!-- One paragraph: what changes and what it enables. -->',
    ]);
  });

  it('should produce a task list of pending checkboxes', () => {
    const list = parseTasks(tasksTemplate('add-user-auth'));

    expect(list.malformed).toEqual([]);
    expect(list.phases).toEqual(['1. Implementation', '2. Verification']);
    expect(list.tasks.map((t) => t.done)).toEqual([false, false, false, false]);
    expect(list.tasks[3].text).toBe('2.1 Run `speclane validate add-user-auth --strict`');
  });

  it('should produce a delta that parses', () => {
    const result = parseSpecDelta(deltaTemplate('user-auth'), 'user-auth');

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.value.added.map((r) => r.title)).toEqual(['user-auth behaviour']);
    expect(result.value.added[0].scenarios).toHaveLength(1);
  });
});
