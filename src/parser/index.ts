// Re-export document parsers

export * from './types.js';
export {
  headingOf,
  joinBody,
  normalizeTitle,
  scanLines,
  splitSections,
  stripComments,
  type Heading,
  type MarkdownLine,
  type MarkdownSection,
} from './markdown.js';
export {
  parseRequirementSection,
  renderRequirement,
  type RequirementBlock,
} from './requirements.js';
export { countDeltaEntries, parseSpecDelta, renderSpecDelta, sectionHeading } from './delta.js';
export { parseCapabilitySpec, renderCapabilitySpec } from './capability.js';
export {
  PROPOSAL_SECTIONS,
  canonicalSection,
  isSectionEmpty,
  parseProposal,
  type ParsedProposal,
  type ProposalSection,
  type ProposalSectionName,
  type ProposalSectionRule,
  type RelatedReference,
} from './proposal.js';
export {
  markTasksDone,
  parseTasks,
  remainingTasks,
  withoutTaskState,
  type MalformedTaskLine,
  type TaskEntry,
  type TaskList,
} from './tasks.js';
