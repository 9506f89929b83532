/**
 * Per-change advisory lock.
 *
 * validate, apply and archive hold `changes/<id>/.lock` for their whole run.
 * A second invocation on the same change fails at once with CHANGE_LOCKED
 * instead of waiting. A lock left behind by a process that is no longer
 * running is reclaimed by renaming it aside and checking that the file
 * moved is still the one that was read.
 */

import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import { ulid } from 'ulid';
import * as YAML from 'yaml';
import { z } from 'zod';
import { FileSystemError, StateError, isErrnoException } from '../errors.js';
import { errors } from '../strings/index.js';

export const LOCK_FILE = '.lock';

const LockFileSchema = z.object({
  pid: z.number().int().positive(),
  token: z.string(),
  operation: z.string(),
  acquired_at: z.string(),
});

type LockFile = z.infer<typeof LockFileSchema>;

/**
 * Checks if a process with given PID is running
 */
export function isProcessRunning(pid: number): boolean {
  try {
    // Signal 0 checks for existence without delivering anything
    process.kill(pid, 0);
    return true;
  } catch (err) {
    // EPERM: the process exists but belongs to someone else
    return isErrnoException(err) && err.code === 'EPERM';
  }
}

export class ChangeLock {
  private constructor(
    private dir: string,
    readonly changeId: string,
    private readonly token: string
  ) {}

  get path(): string {
    return path.join(this.dir, LOCK_FILE);
  }

  /**
   * Take the lock on a change directory, or throw CHANGE_LOCKED.
   */
  static async acquire(changeDir: string, changeId: string, operation: string): Promise<ChangeLock> {
    const lock = new ChangeLock(changeDir, changeId, ulid());
    const content: LockFile = {
      pid: process.pid,
      token: lock.token,
      operation,
      acquired_at: new Date().toISOString(),
    };

    if (await lock.tryCreate(content)) {
      return lock;
    }

    let holder = await lock.readHolder();
    if (holder && !isProcessRunning(holder.pid)) {
      if (await lock.reclaim(holder, content)) {
        return lock;
      }
      holder = (await lock.readHolder()) ?? holder;
    }

    throw new StateError(
      errors.state.changeLocked(changeId, holder?.operation, holder?.pid),
      'CHANGE_LOCKED',
      errors.state.changeLockedHint(lock.path)
    );
  }

  /**
   * The change directory was moved (archive); follow it.
   */
  relocate(newDir: string): void {
    this.dir = newDir;
  }

  /**
   * Remove the lock file if it is still ours
   */
  async release(): Promise<void> {
    const holder = await this.readHolder();
    if (holder?.token !== this.token) return;
    try {
      await fs.rm(this.path, { force: true });
    } catch (err) {
      throw new FileSystemError('remove', this.path, err);
    }
  }

  private async tryCreate(content: LockFile): Promise<boolean> {
    try {
      await fs.writeFile(this.path, YAML.stringify(content), { encoding: 'utf-8', flag: 'wx' });
      return true;
    } catch (err) {
      if (isErrnoException(err) && err.code === 'EEXIST') return false;
      throw new FileSystemError('create lock', this.path, err);
    }
  }

  /**
   * Replace a dead holder's lock. Only the invocation whose rename moved the
   * dead holder's own file creates a new one. A lock that changed hands since
   * it was read is put back.
   */
  private async reclaim(stale: LockFile, content: LockFile): Promise<boolean> {
    const aside = `${this.path}.${ulid()}.stale`;
    try {
      await fs.rename(this.path, aside);
    } catch (err) {
      if (isErrnoException(err) && err.code === 'ENOENT') return this.tryCreate(content);
      throw new FileSystemError('reclaim lock', this.path, err);
    }

    const moved = await readLockFile(aside);
    if (moved?.token !== stale.token) {
      await restoreLock(aside, this.path);
      return false;
    }

    await fs.rm(aside, { force: true });
    return this.tryCreate(content);
  }

  private readHolder(): Promise<LockFile | null> {
    return readLockFile(this.path);
  }
}

async function readLockFile(file: string): Promise<LockFile | null> {
  let content: string;
  try {
    content = await fs.readFile(file, 'utf-8');
  } catch (err) {
    if (isErrnoException(err) && err.code === 'ENOENT') return null;
    throw new FileSystemError('read lock', file, err);
  }
  // An unreadable lock is treated as held: only its owner may clear it
  const result = LockFileSchema.safeParse(safeYaml(content));
  return result.success ? result.data : null;
}

/**
 * Move a lock file back into place unless a new lock was created meanwhile
 */
async function restoreLock(aside: string, target: string): Promise<void> {
  try {
    await fs.link(aside, target);
  } catch (err) {
    if (!isErrnoException(err) || err.code !== 'EEXIST') {
      throw new FileSystemError('restore lock', target, err);
    }
  } finally {
    await fs.rm(aside, { force: true });
  }
}

function safeYaml(content: string): unknown {
  try {
    return YAML.parse(content);
  } catch {
    return null;
  }
}

/**
 * Run an operation while holding a change's lock
 */
export async function withChangeLock<T>(
  changeDir: string,
  changeId: string,
  operation: string,
  fn: (lock: ChangeLock) => Promise<T>
): Promise<T> {
  const lock = await ChangeLock.acquire(changeDir, changeId, operation);
  try {
    return await fn(lock);
  } finally {
    await lock.release();
  }
}
