/**
 * Types for merging spec deltas into canonical capability specs.
 */

import type { MergeIssue } from "../errors.js";
import type { CapabilitySpec, DeltaOperation, SpecDelta } from "../parser/types.js";

/**
 * Result of merging one delta into one capability
 */
export type MergeOutcome =
  | {
      ok: true;
      /** The merged spec; the input spec is left untouched */
      spec: CapabilitySpec;
      /** Whether the capability had no spec before this merge */
      created: boolean;
      counts: MergeCounts;
    }
  | { ok: false; issues: MergeIssue[] };

export interface MergeCounts {
  added: number;
  modified: number;
  removed: number;
}

/**
 * Per-capability outcome of an archive's merge
 */
export interface CapabilityMergeSummary extends MergeCounts {
  capability: string;
  created: boolean;
  /** Path of the canonical spec that was written */
  path: string;
}

/**
 * One operation on a requirement title, and the delta it came from
 */
export interface TitleOperation {
  operation: DeltaOperation;
  /** Index of the delta in the list being checked */
  source: number;
}

/**
 * A parsed delta and, when it came from a file, the text it was parsed from
 */
export interface DeltaDocument {
  delta: SpecDelta;
  /** ADDED and MODIFIED blocks are copied from this text as written */
  text?: string;
}
