/**
 * Merging spec deltas into the canonical specs tree.
 */

export type {
  CapabilityMergeSummary,
  DeltaDocument,
  MergeCounts,
  MergeOutcome,
  TitleOperation,
} from "./types.js";

export {
  findMergeConflicts,
  mergeChange,
  mergeDelta,
  placeholderPurpose,
  readCapability,
} from "./merger.js";

export {
  deltaBlocks,
  locateSection,
  spliceRequirements,
  type DeltaBlocks,
  type RequirementSpan,
  type SectionSpan,
} from "./splice.js";
