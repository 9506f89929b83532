/**
 * File access for a workspace.
 *
 * Layout under the workspace directory (`openspec/`):
 *   changes/<id>/{proposal.md,tasks.md,design.md,specs/<capability>/spec.md,.change.yaml}
 *   specs/<capability>/spec.md
 *   archive/<date>-<id>/
 *
 * Every write goes to a temp file first and is renamed into place, so a
 * reader never sees a half-written document.
 */

import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import { ulid } from 'ulid';
import * as YAML from 'yaml';
import { FileSystemError, isErrnoException } from '../errors.js';
import { withoutTaskState } from '../parser/tasks.js';
import { ChangeMetadataSchema, type ChangeMetadata } from '../schema/index.js';
import { hashContent } from '../utils/hash.js';

export const CHANGES_DIR = 'changes';
export const SPECS_DIR = 'specs';
export const ARCHIVE_DIR = 'archive';
export const METADATA_FILE = '.change.yaml';
export const SPEC_FILE = 'spec.md';

export const PROPOSAL_FILE = 'proposal.md';
export const TASKS_FILE = 'tasks.md';
export const DESIGN_FILE = 'design.md';

/**
 * A delta file found in a change
 */
export interface DeltaFile {
  capability: string;
  /** Absolute path */
  file: string;
  /** Path relative to the change directory, `/`-separated */
  relative: string;
}

export interface PendingWrite {
  path: string;
  content: string;
}

export class DocumentStore {
  constructor(readonly root: string) {}

  get changesDir(): string {
    return path.join(this.root, CHANGES_DIR);
  }

  get specsDir(): string {
    return path.join(this.root, SPECS_DIR);
  }

  get archiveDir(): string {
    return path.join(this.root, ARCHIVE_DIR);
  }

  changeDir(id: string): string {
    return path.join(this.changesDir, id);
  }

  capabilitySpecPath(capability: string): string {
    return path.join(this.specsDir, capability, SPEC_FILE);
  }

  /**
   * Read a text file, or null if it does not exist
   */
  async readText(file: string): Promise<string | null> {
    try {
      return await fs.readFile(file, 'utf-8');
    } catch (err) {
      if (isErrnoException(err) && err.code === 'ENOENT') return null;
      throw new FileSystemError('read', file, err);
    }
  }

  async exists(file: string): Promise<boolean> {
    try {
      await fs.access(file);
      return true;
    } catch (err) {
      if (isErrnoException(err) && err.code === 'ENOENT') return false;
      throw new FileSystemError('access', file, err);
    }
  }

  /**
   * Write a file through a temp file + rename
   */
  async writeText(file: string, content: string): Promise<void> {
    const temp = await this.stage(file, content);
    try {
      await fs.rename(temp, file);
    } catch (err) {
      await fs.rm(temp, { force: true });
      throw new FileSystemError('write', file, err);
    }
  }

  /**
   * Write several files so that either all of them are replaced or none.
   *
   * Every file is staged before any rename. If a rename fails, files already
   * replaced get their previous content back, files that did not exist are
   * removed, and directories created for them are removed too.
   */
  async writeAll(writes: PendingWrite[]): Promise<void> {
    const staged: Array<{ target: string; temp: string; previous: string | null; createdDir?: string }> = [];

    try {
      for (const write of writes) {
        const previous = await this.readText(write.path);
        const createdDir = await this.ensureDir(path.dirname(write.path));
        const temp = await this.stage(write.path, write.content);
        staged.push({ target: write.path, temp, previous, createdDir });
      }
    } catch (err) {
      await this.discard(staged);
      throw err;
    }

    const committed: typeof staged = [];
    for (const entry of staged) {
      try {
        await fs.rename(entry.temp, entry.target);
        committed.push(entry);
      } catch (err) {
        for (const done of committed.reverse()) {
          if (done.previous === null) {
            await fs.rm(done.target, { force: true });
          } else {
            await this.writeText(done.target, done.previous);
          }
        }
        await this.discard(staged);
        throw new FileSystemError('write', entry.target, err);
      }
    }
  }

  /**
   * Immediate subdirectory names, sorted. Missing directory yields [].
   */
  async listDirs(dir: string): Promise<string[]> {
    try {
      const entries = await fs.readdir(dir, { withFileTypes: true });
      return entries
        .filter((e) => e.isDirectory() && !e.name.startsWith('.'))
        .map((e) => e.name)
        .sort();
    } catch (err) {
      if (isErrnoException(err) && err.code === 'ENOENT') return [];
      throw new FileSystemError('list', dir, err);
    }
  }

  /**
   * `specs/<capability>/spec.md` files under a change directory
   */
  async listDeltaFiles(changeDir: string): Promise<DeltaFile[]> {
    const specsDir = path.join(changeDir, SPECS_DIR);
    const deltas: DeltaFile[] = [];
    for (const capability of await this.listDirs(specsDir)) {
      const file = path.join(specsDir, capability, SPEC_FILE);
      if (await this.exists(file)) {
        deltas.push({ capability, file, relative: `${SPECS_DIR}/${capability}/${SPEC_FILE}` });
      }
    }
    return deltas;
  }

  /**
   * Capabilities with a canonical spec
   */
  async listCapabilities(): Promise<string[]> {
    const names: string[] = [];
    for (const capability of await this.listDirs(this.specsDir)) {
      if (await this.exists(this.capabilitySpecPath(capability))) {
        names.push(capability);
      }
    }
    return names;
  }

  /**
   * Move a directory. The destination must not exist.
   */
  async move(from: string, to: string): Promise<void> {
    if (await this.exists(to)) {
      throw new FileSystemError('move to', to, new Error('destination already exists'));
    }
    await this.ensureDir(path.dirname(to));
    try {
      await fs.rename(from, to);
    } catch (err) {
      if (!(isErrnoException(err) && err.code === 'EXDEV')) {
        throw new FileSystemError('move', from, err);
      }
      // Different filesystem: copy, then remove the source
      try {
        await fs.cp(from, to, { recursive: true, errorOnExist: true, force: false });
        await fs.rm(from, { recursive: true });
      } catch (copyErr) {
        throw new FileSystemError('move', from, copyErr);
      }
    }
  }

  /**
   * Content hashes of the files validation looks at, keyed by path relative
   * to the change directory. tasks.md is hashed without checkbox state.
   */
  async hashTrackedFiles(changeDir: string): Promise<Record<string, string>> {
    const hashes: Record<string, string> = {};

    for (const name of [PROPOSAL_FILE, TASKS_FILE, DESIGN_FILE]) {
      const content = await this.readText(path.join(changeDir, name));
      if (content === null) continue;
      hashes[name] = hashContent(name === TASKS_FILE ? withoutTaskState(content) : content);
    }

    for (const delta of await this.listDeltaFiles(changeDir)) {
      const content = await this.readText(delta.file);
      if (content !== null) {
        hashes[delta.relative] = hashContent(content);
      }
    }

    return hashes;
  }

  async readMetadata(changeDir: string): Promise<ChangeMetadata | null> {
    const file = path.join(changeDir, METADATA_FILE);
    const content = await this.readText(file);
    if (content === null) return null;

    let raw: unknown;
    try {
      raw = YAML.parse(content);
    } catch (err) {
      throw new FileSystemError('parse', file, err);
    }
    const result = ChangeMetadataSchema.safeParse(raw);
    if (!result.success) {
      const issues = result.error.issues
        .map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`)
        .join('; ');
      throw new FileSystemError('parse', file, new Error(issues));
    }
    return result.data;
  }

  async writeMetadata(changeDir: string, metadata: ChangeMetadata): Promise<void> {
    const validated = ChangeMetadataSchema.parse(metadata);
    const content = YAML.stringify(validated, { indent: 2, lineWidth: 100 });
    await this.writeText(path.join(changeDir, METADATA_FILE), content);
  }

  /**
   * Create a directory (and parents). Returns the first directory created,
   * if any.
   */
  private async ensureDir(dir: string): Promise<string | undefined> {
    try {
      return await fs.mkdir(dir, { recursive: true });
    } catch (err) {
      throw new FileSystemError('create directory', dir, err);
    }
  }

  private async stage(file: string, content: string): Promise<string> {
    await this.ensureDir(path.dirname(file));
    const temp = `${file}.${ulid()}.tmp`;
    try {
      await fs.writeFile(temp, content, { encoding: 'utf-8', flag: 'wx' });
    } catch (err) {
      await fs.rm(temp, { force: true });
      throw new FileSystemError('write', temp, err);
    }
    return temp;
  }

  private async discard(
    staged: Array<{ temp: string; createdDir?: string }>
  ): Promise<void> {
    for (const entry of staged) {
      await fs.rm(entry.temp, { force: true });
    }
    for (const entry of [...staged].reverse()) {
      if (entry.createdDir) {
        await fs.rm(entry.createdDir, { recursive: true, force: true });
      }
    }
  }
}
