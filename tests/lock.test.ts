import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import * as YAML from 'yaml';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { StateError } from '../src/errors.js';
import { ChangeLock, LOCK_FILE, isProcessRunning, withChangeLock } from '../src/store/lock.js';
import { cleanupTempDir, createTempDir } from './helpers/workspace.js';

// Above the largest pid_max Linux allows, so never a live process
const DEAD_PID = 4194305;

describe('isProcessRunning', () => {
  it('should see the current process', () => {
    expect(isProcessRunning(process.pid)).toBe(true);
  });

  it('should not see a pid that cannot exist', () => {
    expect(isProcessRunning(DEAD_PID)).toBe(false);
  });
});

describe('ChangeLock', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await createTempDir();
  });

  afterEach(async () => {
    await cleanupTempDir(dir);
  });

  async function readLock(): Promise<{ pid: number; operation: string; token: string }> {
    return YAML.parse(await fs.readFile(path.join(dir, LOCK_FILE), 'utf-8'));
  }

  it('should write the holder into the lock file', async () => {
    const lock = await ChangeLock.acquire(dir, 'add-login', 'validate');

    expect(lock.path).toBe(path.join(dir, LOCK_FILE));
    expect(await readLock()).toMatchObject({ pid: process.pid, operation: 'validate' });

    await lock.release();
    await expect(fs.access(lock.path)).rejects.toThrow();
  });

  it('should refuse a second holder', async () => {
    const lock = await ChangeLock.acquire(dir, 'add-login', 'apply');

    const failure = await ChangeLock.acquire(dir, 'add-login', 'archive').catch((e: unknown) => e);

    expect(failure).toBeInstanceOf(StateError);
    expect(failure).toMatchObject({
      code: 'CHANGE_LOCKED',
      message: `Change "add-login" is locked by another apply (pid ${process.pid})`,
    });
    await lock.release();
  });

  it('should reclaim a lock left by a dead process', async () => {
    await fs.writeFile(
      path.join(dir, LOCK_FILE),
      YAML.stringify({ pid: DEAD_PID, token: 'old', operation: 'archive', acquired_at: '2025-01-01T00:00:00.000Z' })
    );

    const lock = await ChangeLock.acquire(dir, 'add-login', 'validate');

    expect(await readLock()).toMatchObject({ pid: process.pid, operation: 'validate' });
    expect(await fs.readdir(dir)).toEqual([LOCK_FILE]);
    await lock.release();
  });

  it('should let exactly one of two racing invocations reclaim a dead lock', async () => {
    await fs.writeFile(
      path.join(dir, LOCK_FILE),
      YAML.stringify({ pid: DEAD_PID, token: 'old', operation: 'archive', acquired_at: '2025-01-01T00:00:00.000Z' })
    );

    const results = await Promise.allSettled([
      ChangeLock.acquire(dir, 'add-login', 'apply'),
      ChangeLock.acquire(dir, 'add-login', 'archive'),
    ]);

    const held = results.flatMap((r) => (r.status === 'fulfilled' ? [r.value] : []));
    const refused = results.flatMap((r) => (r.status === 'rejected' ? [r.reason] : []));
    expect(held).toHaveLength(1);
    expect(refused).toHaveLength(1);
    expect(refused[0]).toMatchObject({ code: 'CHANGE_LOCKED' });
    expect(await fs.readdir(dir)).toEqual([LOCK_FILE]);

    await held[0].release();
    expect(await fs.readdir(dir)).toEqual([]);
  });

  it('should treat an unreadable lock as held', async () => {
    await fs.writeFile(path.join(dir, LOCK_FILE), 'not: [valid');

    await expect(ChangeLock.acquire(dir, 'add-login', 'apply')).rejects.toMatchObject({
      code: 'CHANGE_LOCKED',
      message: 'Change "add-login" is locked by another invocation',
    });
  });

  it('should not remove a lock it no longer owns', async () => {
    const lock = await ChangeLock.acquire(dir, 'add-login', 'apply');
    const other = { pid: process.pid, token: 'someone-else', operation: 'apply', acquired_at: '2025-01-01T00:00:00.000Z' };
    await fs.writeFile(lock.path, YAML.stringify(other));

    await lock.release();

    expect(await readLock()).toMatchObject({ token: 'someone-else' });
  });

  it('should follow a moved change directory', async () => {
    const lock = await ChangeLock.acquire(dir, 'add-login', 'archive');
    const moved = `${dir}-moved`;
    await fs.rename(dir, moved);

    lock.relocate(moved);
    await lock.release();

    expect(await fs.readdir(moved)).toEqual([]);
    await fs.rename(moved, dir);
  });
});

describe('withChangeLock', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await createTempDir();
  });

  afterEach(async () => {
    await cleanupTempDir(dir);
  });

  it('should release the lock when the operation throws', async () => {
    await expect(
      withChangeLock(dir, 'add-login', 'apply', async () => {
        throw new Error('boom');
      })
    ).rejects.toThrow('boom');

    expect(await fs.readdir(dir)).toEqual([]);
  });

  it('should return the result of the operation', async () => {
    const result = await withChangeLock(dir, 'add-login', 'apply', async (lock) => lock.changeId);

    expect(result).toBe('add-login');
  });
});
