/**
 * Applies spec deltas to canonical capability specs.
 *
 * Operations run REMOVED, then MODIFIED, then ADDED, so a delta can rename a
 * requirement by removing the old title and adding the new one (or re-add
 * the same title with new content). MODIFIED replaces a requirement's body
 * and scenarios wholesale.
 */

import { MergeError, StructuralError, type MergeIssue } from "../errors.js";
import { parseCapabilitySpec, renderCapabilitySpec } from "../parser/capability.js";
import type {
  CapabilitySpec,
  DeltaOperation,
  Requirement,
  SpecDelta,
} from "../parser/types.js";
import type { DocumentStore, PendingWrite } from "../store/document-store.js";
import { errors } from "../strings/index.js";
import { deltaBlocks, spliceRequirements } from "./splice.js";
import type {
  CapabilityMergeSummary,
  DeltaDocument,
  MergeOutcome,
  TitleOperation,
} from "./types.js";

/**
 * Purpose written into a capability spec created by a merge
 */
export function placeholderPurpose(changeId: string): string {
  return `TBD - created by archiving change ${changeId}. Update Purpose after archive.`;
}

/**
 * Merge one delta into a capability spec (null when the capability has no
 * spec yet). Pure: all problems are collected and nothing is returned
 * half-merged.
 */
export function mergeDelta(
  current: CapabilitySpec | null,
  delta: SpecDelta,
  purpose = "",
): MergeOutcome {
  const issues: MergeIssue[] = [];
  const capability = delta.capability;
  const requirements: Requirement[] = current ? [...current.requirements] : [];
  const indexOf = (title: string): number =>
    requirements.findIndex((r) => r.title === title);

  const notFound = (operation: DeltaOperation, title: string): void => {
    issues.push({
      code: "REQUIREMENT_NOT_FOUND",
      capability,
      requirement: title,
      message: errors.merge.requirementNotFound(capability, title, operation),
    });
  };

  for (const entry of delta.removed) {
    const index = indexOf(entry.title);
    if (index === -1) {
      notFound("REMOVED", entry.title);
      continue;
    }
    requirements.splice(index, 1);
  }

  for (const entry of delta.modified) {
    const index = indexOf(entry.title);
    if (index === -1) {
      notFound("MODIFIED", entry.title);
      continue;
    }
    requirements[index] = {
      title: requirements[index].title,
      body: entry.body,
      scenarios: entry.scenarios,
    };
  }

  for (const entry of delta.added) {
    if (indexOf(entry.title) !== -1) {
      issues.push({
        code: "REQUIREMENT_ALREADY_EXISTS",
        capability,
        requirement: entry.title,
        message: errors.merge.requirementAlreadyExists(capability, entry.title),
      });
      continue;
    }
    requirements.push(entry);
  }

  if (issues.length > 0) {
    return { ok: false, issues };
  }

  return {
    ok: true,
    created: current === null,
    spec: {
      name: current?.name ?? capability,
      purpose: current?.purpose ?? purpose,
      requirements,
    },
    counts: {
      added: delta.added.length,
      modified: delta.modified.length,
      removed: delta.removed.length,
    },
  };
}

/**
 * Find requirement titles that deltas touch in contradictory ways.
 *
 * A title may appear once per capability, except that one delta may both
 * REMOVE and ADD it (a rename or replacement). Anything else, such as
 * MODIFIED together with REMOVED, or ADDED by two different deltas, is a
 * conflict.
 */
export function findMergeConflicts(deltas: SpecDelta[]): MergeIssue[] {
  const byTitle = new Map<string, { capability: string; title: string; ops: TitleOperation[] }>();

  deltas.forEach((delta, source) => {
    const record = (operation: DeltaOperation, title: string): void => {
      const key = `${delta.capability}\u0000${title}`;
      const entry = byTitle.get(key) ?? { capability: delta.capability, title, ops: [] };
      entry.ops.push({ operation, source });
      byTitle.set(key, entry);
    };
    for (const r of delta.removed) record("REMOVED", r.title);
    for (const r of delta.modified) record("MODIFIED", r.title);
    for (const r of delta.added) record("ADDED", r.title);
  });

  const issues: MergeIssue[] = [];
  for (const { capability, title, ops } of byTitle.values()) {
    if (ops.length < 2) continue;
    if (isReplacement(ops)) continue;
    issues.push({
      code: "MERGE_CONFLICT",
      capability,
      requirement: title,
      message: errors.merge.conflict(
        capability,
        title,
        ops.map((o) => o.operation),
      ),
    });
  }
  return issues;
}

function isReplacement(ops: TitleOperation[]): boolean {
  if (ops.length !== 2) return false;
  const [first, second] = ops;
  return (
    first.source === second.source &&
    first.operation === "REMOVED" &&
    second.operation === "ADDED"
  );
}

/**
 * Merge every delta of a change into the specs tree.
 *
 * All capabilities are merged in memory first. Only when every one of them
 * succeeds are the files written, together, through DocumentStore.writeAll;
 * on any failure the specs tree is left byte-for-byte as it was.
 *
 * An existing spec is edited in place: only the requirement blocks a delta
 * names change, everything else in the file is kept as written.
 */
export async function mergeChange(
  store: DocumentStore,
  documents: DeltaDocument[],
  changeId: string,
): Promise<CapabilityMergeSummary[]> {
  const conflicts = findMergeConflicts(documents.map((d) => d.delta));
  if (conflicts.length > 0) {
    throw new MergeError(
      errors.merge.conflictSummary(conflicts.length),
      "MERGE_CONFLICT",
      conflicts,
    );
  }

  const merged = new Map<
    string,
    { spec: CapabilitySpec; content: string; summary: CapabilityMergeSummary }
  >();
  const issues: MergeIssue[] = [];

  for (const { delta, text } of documents) {
    const path = store.capabilitySpecPath(delta.capability);
    const previous = merged.get(delta.capability);
    const current = previous ?? (await loadCapability(store, delta.capability));

    const outcome = mergeDelta(current?.spec ?? null, delta, placeholderPurpose(changeId));
    if (!outcome.ok) {
      issues.push(...outcome.issues);
      continue;
    }

    const base = current?.content ?? renderCapabilitySpec({ ...outcome.spec, requirements: [] });
    const content = spliceRequirements(
      base,
      delta,
      text === undefined ? undefined : deltaBlocks(text),
    );

    const summary: CapabilityMergeSummary = previous
      ? {
          ...previous.summary,
          added: previous.summary.added + outcome.counts.added,
          modified: previous.summary.modified + outcome.counts.modified,
          removed: previous.summary.removed + outcome.counts.removed,
        }
      : { capability: delta.capability, created: outcome.created, path, ...outcome.counts };
    merged.set(delta.capability, { spec: outcome.spec, content, summary });
  }

  if (issues.length > 0) {
    throw new MergeError(errors.merge.failed(issues.length), issues[0].code, issues);
  }

  const writes: PendingWrite[] = [...merged.values()].map(({ content, summary }) => ({
    path: summary.path,
    content,
  }));
  await store.writeAll(writes);

  return [...merged.values()].map(({ summary }) => summary);
}

/**
 * Load a canonical spec with its text, or null when the capability has none
 * yet
 */
async function loadCapability(
  store: DocumentStore,
  capability: string,
): Promise<{ spec: CapabilitySpec; content: string } | null> {
  const file = store.capabilitySpecPath(capability);
  const content = await store.readText(file);
  if (content === null) return null;

  const parsed = parseCapabilitySpec(content, capability);
  if (!parsed.ok) {
    const first = parsed.errors[0];
    throw new StructuralError(
      `${errors.merge.malformedSpec}: ${first.message}`,
      file,
      first.line,
    );
  }
  return { spec: parsed.value, content };
}

/**
 * Load a canonical spec, or null when the capability has none yet
 */
export async function readCapability(
  store: DocumentStore,
  capability: string,
): Promise<CapabilitySpec | null> {
  const loaded = await loadCapability(store, capability);
  return loaded ? loaded.spec : null;
}
