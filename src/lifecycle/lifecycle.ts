/**
 * Proposal lifecycle: propose, validate, apply, archive.
 *
 * Status lives in each change's `.change.yaml`. Every operation that moves a
 * change holds the change's lock for its whole run, so two invocations on
 * the same change never interleave.
 */

import * as path from 'node:path';
import {
  IncompleteTasksError,
  InputError,
  StateError,
  StructuralError,
  ValidationFailedError,
} from '../errors.js';
import { mergeChange } from '../merge/merger.js';
import type { CapabilityMergeSummary, DeltaDocument } from '../merge/types.js';
import { parseSpecDelta } from '../parser/delta.js';
import { markTasksDone, parseTasks, type TaskList } from '../parser/tasks.js';
import { capabilityPattern, type ChangeMetadata, type ChangeStatus } from '../schema/index.js';
import {
  PROPOSAL_FILE,
  SPECS_DIR,
  SPEC_FILE,
  TASKS_FILE,
  METADATA_FILE,
  type DocumentStore,
} from '../store/document-store.js';
import { withChangeLock } from '../store/lock.js';
import { errors } from '../strings/index.js';
import { archiveDate } from '../utils/time.js';
import { validateChange } from '../validation/validator.js';
import type { ValidationReport } from '../validation/types.js';
import { checkChangeId, defaultCapability, defaultTitle } from './change-id.js';
import { deltaTemplate, proposalTemplate, tasksTemplate } from './scaffold.js';
import { assertTransition } from './states.js';

const ARCHIVED_DIR_PATTERN = /^(\d{4}-\d{2}-\d{2})-(.+)$/;

export interface LifecycleOptions {
  /** Extra verbs accepted as the first word of a change id */
  verbs?: readonly string[];
  /** Validate in strict mode unless told otherwise */
  strict?: boolean;
  /** Clock; tests pin it */
  now?: () => Date;
}

/**
 * A change as found on disk
 */
export interface ChangeRecord {
  id: string;
  /** Absolute path of the change directory */
  dir: string;
  metadata: ChangeMetadata;
  archived: boolean;
}

export interface ProposeInput {
  author: string;
  /** Capability the stub delta targets (default: the id without its verb) */
  capability?: string;
  title?: string;
}

export interface ValidateResult {
  change: ChangeRecord;
  report: ValidationReport;
  /** Status before validate ran */
  previousStatus: ChangeStatus;
  /** Set when the report does not pass; no transition happened */
  error?: ValidationFailedError;
}

export interface ApplyOptions {
  /** 1-based task numbers to mark done */
  complete?: number[];
  /** Mark every task done */
  all?: boolean;
}

export interface ApplyResult {
  change: ChangeRecord;
  /** Tasks ticked by this call */
  marked: number[];
  alreadyApplied: boolean;
}

export interface ArchiveOptions {
  /** Move the change without merging its deltas */
  skipSpecs?: boolean;
}

export interface ArchiveResult {
  change: ChangeRecord;
  alreadyArchived: boolean;
  /** Capabilities written by this call */
  merged: CapabilityMergeSummary[];
  /** Path of the archived change, relative to the workspace */
  archivePath: string;
}

export class ProposalLifecycle {
  private readonly now: () => Date;

  constructor(
    readonly store: DocumentStore,
    private readonly options: LifecycleOptions = {}
  ) {
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Scaffold a new change in Draft
   */
  async create(id: string, input: ProposeInput): Promise<ChangeRecord> {
    checkChangeId(id, this.options.verbs);

    const existing = await this.find(id);
    if (existing) {
      throw new InputError(
        existing.archived
          ? errors.input.duplicateArchivedId(id, this.relative(existing.dir))
          : errors.input.duplicateId(id),
        'DUPLICATE_ID'
      );
    }

    const capability = input.capability ?? defaultCapability(id);
    if (!capabilityPattern.test(capability)) {
      throw new InputError(errors.input.invalidCapability(capability), 'INVALID_ID');
    }

    const dir = this.store.changeDir(id);
    const metadata: ChangeMetadata = {
      id,
      status: 'draft',
      author: input.author,
      created_at: this.timestamp(),
      capabilities: [capability],
    };

    await this.store.writeAll([
      { path: path.join(dir, PROPOSAL_FILE), content: proposalTemplate(input.title ?? defaultTitle(id)) },
      { path: path.join(dir, TASKS_FILE), content: tasksTemplate(id) },
      { path: path.join(dir, SPECS_DIR, capability, SPEC_FILE), content: deltaTemplate(capability) },
    ]);
    await this.store.writeMetadata(dir, metadata);

    return { id, dir, metadata, archived: false };
  }

  /**
   * Find a change by id, active or archived
   */
  async find(id: string): Promise<ChangeRecord | null> {
    const dir = this.store.changeDir(id);
    if (await this.store.exists(dir)) {
      const metadata = (await this.store.readMetadata(dir)) ?? this.implicitDraft(id);
      return { id, dir, metadata, archived: false };
    }

    for (const name of await this.store.listDirs(this.store.archiveDir)) {
      const match = ARCHIVED_DIR_PATTERN.exec(name);
      if (match && match[2] === id) {
        return this.archivedRecord(id, path.join(this.store.archiveDir, name));
      }
    }
    return null;
  }

  /**
   * Like find, but throw NOT_FOUND when there is no such change
   */
  async get(id: string): Promise<ChangeRecord> {
    const change = await this.find(id);
    if (!change) {
      throw new InputError(errors.input.changeNotFound(id), 'NOT_FOUND');
    }
    return change;
  }

  /**
   * Active changes, sorted by id; archived ones appended when asked
   */
  async list(includeArchived = false): Promise<ChangeRecord[]> {
    const records: ChangeRecord[] = [];
    for (const id of await this.store.listDirs(this.store.changesDir)) {
      const dir = this.store.changeDir(id);
      const metadata = (await this.store.readMetadata(dir)) ?? this.implicitDraft(id);
      records.push({ id, dir, metadata, archived: false });
    }

    if (includeArchived) {
      for (const name of await this.store.listDirs(this.store.archiveDir)) {
        const match = ARCHIVED_DIR_PATTERN.exec(name);
        if (!match) continue;
        records.push(await this.archivedRecord(match[2], path.join(this.store.archiveDir, name)));
      }
    }
    return records;
  }

  /**
   * Run every check on a change. A passing report moves Draft (or a
   * re-validated Validated) change to Validated and records content hashes;
   * a failing one leaves the status alone and sets `error`.
   *
   * Status is read again once the lock is held, so a concurrent transition
   * is never overwritten.
   */
  async validate(id: string, opts: { strict?: boolean } = {}): Promise<ValidateResult> {
    const strict = opts.strict ?? this.options.strict ?? false;
    const located = await this.get(id);

    if (located.archived) {
      const report = await validateChange(this.store, located.dir, id, { strict });
      return { change: located, report, previousStatus: located.metadata.status };
    }

    return withChangeLock(located.dir, id, 'validate', async (): Promise<ValidateResult> => {
      const change = await this.get(id);
      const previousStatus = change.metadata.status;
      const report = await validateChange(this.store, change.dir, id, { strict });

      // Applied and archived changes are only reported on
      if (change.archived || previousStatus === 'applied' || previousStatus === 'archived') {
        return { change, report, previousStatus };
      }

      if (!report.valid) {
        const { errors: errorCount, warnings } = report.stats;
        return {
          change,
          report,
          previousStatus,
          error: new ValidationFailedError(
            errors.state.validationFailed(id, errorCount, warnings, strict),
            report
          ),
        };
      }

      const metadata: ChangeMetadata = {
        ...change.metadata,
        status: 'validated',
        validated_at: this.timestamp(),
        validated_hashes: await this.store.hashTrackedFiles(change.dir),
        strict,
        capabilities: (await this.store.listDeltaFiles(change.dir)).map((d) => d.capability),
      };
      await this.store.writeMetadata(change.dir, metadata);
      return { change: { ...change, metadata }, report, previousStatus };
    });
  }

  /**
   * Move a Validated change to Applied.
   *
   * Refuses when any tracked file changed since validation, or when tasks
   * would remain open after the confirmed ones are ticked. Nothing is written
   * on refusal.
   */
  async apply(id: string, opts: ApplyOptions = {}): Promise<ApplyResult> {
    const located = await this.get(id);
    if (located.archived) {
      throw new StateError(errors.state.cannotApplyArchived(id), 'INVALID_TRANSITION');
    }

    return withChangeLock(located.dir, id, 'apply', async (): Promise<ApplyResult> => {
      const change = await this.get(id);
      const status = change.metadata.status;

      if (change.archived || status === 'archived') {
        throw new StateError(errors.state.cannotApplyArchived(id), 'INVALID_TRANSITION');
      }
      if (status === 'applied') {
        return { change, marked: [], alreadyApplied: true };
      }
      assertTransition(
        status,
        'applied',
        errors.state.notValidated(id, status),
        errors.state.validateHint(id)
      );

      const stale = await this.staleFiles(change);
      if (stale.length > 0) {
        throw new StateError(
          errors.state.staleValidation(id, stale),
          'STALE_VALIDATION',
          errors.state.validateHint(id)
        );
      }

      const tasksPath = path.join(change.dir, TASKS_FILE);
      const tasksText = (await this.store.readText(tasksPath)) ?? '';
      const list = parseTasks(tasksText);
      const confirmed = this.confirmedTasks(list, opts);

      const remaining = list.tasks.filter((t) => !t.done && !confirmed.has(t.index)).length;
      if (remaining > 0) {
        throw new IncompleteTasksError(errors.state.incompleteTasks(remaining), remaining);
      }

      const marked = list.tasks.filter((t) => !t.done && confirmed.has(t.index)).map((t) => t.index);
      if (marked.length > 0) {
        await this.store.writeText(tasksPath, markTasksDone(tasksText, list, marked));
      }

      const metadata: ChangeMetadata = {
        ...change.metadata,
        status: 'applied',
        applied_at: this.timestamp(),
      };
      await this.store.writeMetadata(change.dir, metadata);
      return { change: { ...change, metadata }, marked, alreadyApplied: false };
    });
  }

  /**
   * Merge an Applied change's deltas into the specs tree and move it to
   * `archive/<date>-<id>/`.
   *
   * The merge is all-or-nothing. It is recorded before the move, so an
   * archive interrupted after merging resumes without merging twice.
   */
  async archive(id: string, opts: ArchiveOptions = {}): Promise<ArchiveResult> {
    const located = await this.get(id);
    if (located.archived) {
      return this.archivedResult(located);
    }

    return withChangeLock(located.dir, id, 'archive', async (lock): Promise<ArchiveResult> => {
      const change = await this.get(id);
      if (change.archived) {
        return this.archivedResult(change);
      }

      const status = change.metadata.status;
      assertTransition(status, 'archived', errors.state.notApplied(id, status));

      let metadata = change.metadata;
      let merged: CapabilityMergeSummary[] = [];

      if (opts.skipSpecs) {
        metadata = { ...metadata, specs_skipped: true };
      } else if (!metadata.merged_at) {
        const deltas = await this.readDeltas(change.dir);
        merged = await mergeChange(this.store, deltas, id);
        metadata = { ...metadata, merged_at: this.timestamp() };
        await this.store.writeMetadata(change.dir, metadata);
      }

      const destination = path.join(this.store.archiveDir, `${archiveDate(this.now())}-${id}`);
      await this.store.move(change.dir, destination);
      lock.relocate(destination);

      metadata = {
        ...metadata,
        status: 'archived',
        archived_at: this.timestamp(),
        archive_path: this.relative(destination),
      };
      await this.store.writeMetadata(destination, metadata);

      return {
        change: { id, dir: destination, metadata, archived: true },
        alreadyArchived: false,
        merged,
        archivePath: this.relative(destination),
      };
    });
  }

  /**
   * Tracked files whose content differs from what validate recorded
   */
  async staleFiles(change: ChangeRecord): Promise<string[]> {
    const recorded = change.metadata.validated_hashes ?? {};
    const current = await this.store.hashTrackedFiles(change.dir);
    const names = new Set([...Object.keys(recorded), ...Object.keys(current)]);
    return [...names].filter((name) => recorded[name] !== current[name]).sort();
  }

  private confirmedTasks(list: TaskList, opts: ApplyOptions): Set<number> {
    if (opts.all) {
      return new Set(list.tasks.map((t) => t.index));
    }
    const confirmed = new Set<number>();
    for (const index of opts.complete ?? []) {
      if (!list.tasks.some((t) => t.index === index)) {
        throw new InputError(errors.state.unknownTask(index, list.tasks.length), 'UNKNOWN_TASK');
      }
      confirmed.add(index);
    }
    return confirmed;
  }

  private async readDeltas(changeDir: string): Promise<DeltaDocument[]> {
    const deltas: DeltaDocument[] = [];
    for (const file of await this.store.listDeltaFiles(changeDir)) {
      const text = (await this.store.readText(file.file)) ?? '';
      const result = parseSpecDelta(text, file.capability);
      if (!result.ok) {
        const first = result.errors[0];
        throw new StructuralError(first.message, file.file, first.line);
      }
      deltas.push({ delta: result.value, text });
    }
    return deltas;
  }

  private async archivedResult(change: ChangeRecord): Promise<ArchiveResult> {
    return {
      change: await this.settleArchived(change),
      alreadyArchived: true,
      merged: [],
      archivePath: this.relative(change.dir),
    };
  }

  private async archivedRecord(id: string, dir: string): Promise<ChangeRecord> {
    const metadata: ChangeMetadata = (await this.store.readMetadata(dir)) ?? {
      ...this.implicitDraft(id),
      status: 'archived',
    };
    return { id, dir, metadata, archived: true };
  }

  /**
   * An archive interrupted between the move and the final metadata write
   * leaves a non-archived status in the archive; finish it.
   */
  private async settleArchived(change: ChangeRecord): Promise<ChangeRecord> {
    if (change.metadata.status === 'archived') return change;
    if (!(await this.store.exists(path.join(change.dir, METADATA_FILE)))) return change;

    const metadata: ChangeMetadata = {
      ...change.metadata,
      status: 'archived',
      archived_at: change.metadata.archived_at ?? this.timestamp(),
      archive_path: this.relative(change.dir),
    };
    await this.store.writeMetadata(change.dir, metadata);
    return { ...change, metadata };
  }

  /**
   * Metadata for a change directory written by hand, without `.change.yaml`
   */
  private implicitDraft(id: string): ChangeMetadata {
    return {
      id,
      status: 'draft',
      author: 'unknown',
      created_at: this.timestamp(),
      capabilities: [],
    };
  }

  private relative(dir: string): string {
    return path.relative(this.store.root, dir).split(path.sep).join('/');
  }

  private timestamp(): string {
    return this.now().toISOString();
  }
}
