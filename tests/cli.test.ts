import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { ProposalLifecycle } from '../src/lifecycle/lifecycle.js';
import { speclane } from './helpers/cli.js';
import {
  addedDelta,
  cleanupTempDir,
  createTempDir,
  proposalFixture,
  setupWorkspace,
  steppingClock,
  tasksFixture,
  writeChange,
  type ChangeFixture,
  type TestWorkspace,
} from './helpers/workspace.js';

describe('speclane CLI', () => {
  let ws: TestWorkspace;
  let lifecycle: ProposalLifecycle;

  beforeEach(async () => {
    ws = await setupWorkspace();
    lifecycle = new ProposalLifecycle(ws.store, { now: steppingClock() });
  });

  afterEach(async () => {
    await cleanupTempDir(ws.root);
  });

  async function proposeReady(id: string, fixture: ChangeFixture = {}): Promise<void> {
    await lifecycle.create(id, { author: 'test-author', capability: 'auth' });
    await writeChange(ws.store, id, {
      proposal: proposalFixture(),
      tasks: tasksFixture(2),
      deltas: { auth: addedDelta('Login') },
      ...fixture,
    });
  }

  async function readyToArchive(id: string, fixture: ChangeFixture = {}): Promise<void> {
    await proposeReady(id, fixture);
    await lifecycle.validate(id);
    await lifecycle.apply(id, { all: true });
  }

  describe('init', () => {
    it('should create a workspace', async () => {
      const dir = await createTempDir();
      try {
        const result = speclane(['--json', 'init'], dir);

        expect(result.exitCode).toBe(0);
        expect(JSON.parse(result.stdout)).toMatchObject({
          success: true,
          workspace: path.join(dir, 'openspec'),
        });
        const entries = await fs.readdir(path.join(dir, 'openspec'));
        expect(entries.sort()).toEqual(['archive', 'changes', 'config.yaml', 'specs']);
      } finally {
        await cleanupTempDir(dir);
      }
    });

    it('should exit 5 when a workspace already exists', () => {
      const result = speclane(['--json', 'init'], ws.root);

      expect(result.exitCode).toBe(5);
      expect(JSON.parse(result.stderr)).toMatchObject({
        success: false,
        error: 'Failed to initialize workspace',
        code: 'ALREADY_INITIALIZED',
      });
    });
  });

  describe('propose', () => {
    it('should scaffold a draft change', async () => {
      const result = speclane(['--json', 'propose', 'add-login'], ws.root);

      expect(result.exitCode).toBe(0);
      expect(JSON.parse(result.stdout)).toMatchObject({ success: true, id: 'add-login', status: 'draft' });
      const change = await lifecycle.get('add-login');
      expect(change.metadata).toMatchObject({ status: 'draft', author: 'test-author', capabilities: ['login'] });
    });

    it('should exit 2 on an id without a verb', () => {
      const result = speclane(['--json', 'propose', 'user-auth'], ws.root);

      expect(result.exitCode).toBe(2);
      expect(JSON.parse(result.stderr)).toMatchObject({
        success: false,
        error: 'Failed to create change',
        code: 'INVALID_ID',
      });
    });

    it('should exit 2 on a duplicate id', async () => {
      await lifecycle.create('add-login', { author: 'test-author' });

      const result = speclane(['--json', 'propose', 'add-login'], ws.root);

      expect(result.exitCode).toBe(2);
      expect(JSON.parse(result.stderr)).toMatchObject({ code: 'DUPLICATE_ID' });
    });

    it('should exit 3 outside a workspace', async () => {
      const dir = await createTempDir();
      try {
        const result = speclane(['--json', 'propose', 'add-login'], dir);

        expect(result.exitCode).toBe(3);
        expect(JSON.parse(result.stderr)).toMatchObject({ code: 'NO_WORKSPACE' });
      } finally {
        await cleanupTempDir(dir);
      }
    });
  });

  describe('validate', () => {
    it('should exit 1 and print the report when validation fails', async () => {
      await lifecycle.create('add-user-auth', { author: 'test-author' });
      await writeChange(ws.store, 'add-user-auth', {
        proposal: proposalFixture(),
        deltas: { 'user-auth': '## ADDED Requirements\n\n### Requirement: Login\nUsers SHALL log in.\n' },
      });

      const result = speclane(['--json', 'validate', 'add-user-auth'], ws.root);

      expect(result.exitCode).toBe(1);
      expect(JSON.parse(result.stdout)).toMatchObject({
        valid: false,
        status: 'draft',
        previous_status: 'draft',
      });
      expect((await lifecycle.get('add-user-auth')).metadata.status).toBe('draft');
    });

    it('should move a passing change to validated', async () => {
      await proposeReady('add-login');

      const result = speclane(['--json', 'validate', 'add-login'], ws.root);

      expect(result.exitCode).toBe(0);
      expect(JSON.parse(result.stdout)).toMatchObject({
        valid: true,
        status: 'validated',
        previous_status: 'draft',
      });
    });

    it('should exit 3 for an unknown change', () => {
      const result = speclane(['--json', 'validate', 'add-nothing'], ws.root);

      expect(result.exitCode).toBe(3);
      expect(JSON.parse(result.stderr)).toMatchObject({ code: 'NOT_FOUND' });
    });
  });

  describe('apply', () => {
    it('should exit 1 while tasks are open', async () => {
      await proposeReady('add-login');
      await lifecycle.validate('add-login');

      const result = speclane(['--json', 'apply', 'add-login'], ws.root);

      expect(result.exitCode).toBe(1);
      expect(JSON.parse(result.stderr)).toMatchObject({
        error: 'Failed to apply change',
        code: 'INCOMPLETE_TASKS',
        details: '2 tasks not done',
      });
      expect((await lifecycle.get('add-login')).metadata.status).toBe('validated');
    });

    it('should tick the confirmed tasks', async () => {
      await proposeReady('add-login');
      await lifecycle.validate('add-login');

      const result = speclane(['--json', 'apply', 'add-login', '--complete', '1', '2'], ws.root);

      expect(result.exitCode).toBe(0);
      expect(JSON.parse(result.stdout)).toMatchObject({
        success: true,
        id: 'add-login',
        status: 'applied',
        marked: [1, 2],
      });
    });

    it('should exit 1 on a draft change', async () => {
      await proposeReady('add-login');

      const result = speclane(['--json', 'apply', 'add-login', '--all'], ws.root);

      expect(result.exitCode).toBe(1);
      expect(JSON.parse(result.stderr)).toMatchObject({ code: 'INVALID_TRANSITION' });
    });
  });

  describe('archive', () => {
    it('should merge and archive with --yes', async () => {
      await readyToArchive('add-login');

      const result = speclane(['--json', 'archive', 'add-login', '--yes'], ws.root);

      expect(result.exitCode).toBe(0);
      const body = JSON.parse(result.stdout);
      expect(body).toMatchObject({ success: true, id: 'add-login', status: 'archived', specs_skipped: false });
      expect(body.archive_path).toMatch(/^archive\/\d{4}-\d{2}-\d{2}-add-login$/);
      expect(body.merged).toMatchObject([{ capability: 'auth', created: true, added: 1, modified: 0, removed: 0 }]);
      expect(await ws.store.exists(ws.store.capabilitySpecPath('auth'))).toBe(true);
    });

    it('should leave the specs tree alone with --skip-specs', async () => {
      await readyToArchive('add-login');

      const result = speclane(['--json', 'archive', 'add-login', '--yes', '--skip-specs'], ws.root);

      expect(result.exitCode).toBe(0);
      expect(JSON.parse(result.stdout)).toMatchObject({ status: 'archived', specs_skipped: true, merged: [] });
      expect(await ws.store.exists(ws.store.capabilitySpecPath('auth'))).toBe(false);
      expect(await ws.store.exists(ws.store.changeDir('add-login'))).toBe(false);
    });

    it('should exit 1 when the merge fails and keep the change in place', async () => {
      await readyToArchive('add-token-refresh', { deltas: { auth: addedDelta('Token Refresh') } });
      await readyToArchive('add-token-rotation', { deltas: { auth: addedDelta('Token Refresh') } });
      await lifecycle.archive('add-token-refresh');
      const specBefore = await fs.readFile(ws.store.capabilitySpecPath('auth'), 'utf-8');

      const result = speclane(['--json', 'archive', 'add-token-rotation', '--yes'], ws.root);

      expect(result.exitCode).toBe(1);
      expect(JSON.parse(result.stderr)).toMatchObject({
        error: 'Failed to archive change',
        code: 'REQUIREMENT_ALREADY_EXISTS',
      });
      expect(await fs.readFile(ws.store.capabilitySpecPath('auth'), 'utf-8')).toBe(specBefore);
      expect((await lifecycle.get('add-token-rotation')).metadata.status).toBe('applied');
    });
  });

  describe('list and show', () => {
    it('should list active changes as JSON', async () => {
      await proposeReady('add-login');

      const result = speclane(['--json', 'list'], ws.root);

      expect(result.exitCode).toBe(0);
      expect(JSON.parse(result.stdout)).toEqual([
        {
          id: 'add-login',
          status: 'draft',
          author: 'test-author',
          created_at: '2025-03-14T09:00:00.000Z',
          archived: false,
          tasks: { done: 0, total: 2 },
        },
      ]);
    });

    it('should show a change with its deltas and tasks as JSON', async () => {
      await proposeReady('add-login');
      await lifecycle.validate('add-login');

      const result = speclane(['--json', 'show', 'add-login'], ws.root);

      expect(result.exitCode).toBe(0);
      const body = JSON.parse(result.stdout);
      expect(body).toMatchObject({
        id: 'add-login',
        archived: false,
        metadata: { status: 'validated', author: 'test-author' },
        deltas: [{ capability: 'auth', added: 1, modified: 0, removed: 0 }],
        stale_files: [],
      });
      expect(body.tasks.map((t: { text: string }) => t.text)).toEqual(['Pending task 1', 'Pending task 2']);
    });
  });

  it('should suggest the closest command for a typo', () => {
    const result = speclane(['lisst'], ws.root);

    expect(result.exitCode).toBe(2);
    expect(result.stderr).toBe("error: unknown command 'lisst'\nDid you mean: speclane list?");
  });
});
