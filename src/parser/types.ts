/**
 * Document model for spec deltas and canonical capability specs.
 *
 * Line numbers are kept out of the model (only errors carry them) so that
 * a document parsed from its own rendering compares equal to the original.
 */

/**
 * The three kinds a scenario step resolves to
 */
export type StepKind = 'given' | 'when' | 'then';

/**
 * Keyword as written; `And` takes the kind of the step before it
 */
export type StepKeyword = 'Given' | 'When' | 'Then' | 'And';

export interface ScenarioStep {
  keyword: StepKeyword;
  kind: StepKind;
  text: string;
}

export interface Scenario {
  title: string;
  steps: ScenarioStep[];
}

export interface Requirement {
  title: string;
  body: string;
  scenarios: Scenario[];
}

/**
 * A REMOVED entry names the requirement to delete; the body holds the
 * reason or migration note and there are no scenarios.
 */
export interface RemovedRequirement {
  title: string;
  body: string;
}

export type DeltaOperation = 'ADDED' | 'MODIFIED' | 'REMOVED';

/**
 * Order the merger applies operations in, so a title can be removed and
 * re-added by one delta.
 */
export const MERGE_ORDER: readonly DeltaOperation[] = ['REMOVED', 'MODIFIED', 'ADDED'];

/**
 * Order sections are rendered in
 */
export const SECTION_ORDER: readonly DeltaOperation[] = ['ADDED', 'MODIFIED', 'REMOVED'];

export interface SpecDelta {
  capability: string;
  added: Requirement[];
  modified: Requirement[];
  removed: RemovedRequirement[];
}

export interface CapabilitySpec {
  name: string;
  purpose: string;
  requirements: Requirement[];
}

export type ParseErrorKind =
  | 'MissingSectionHeader'
  | 'RequirementWithoutScenario'
  | 'ScenarioMissingStep'
  | 'DuplicateRequirementTitle'
  | 'StepsOutOfOrder';

export interface ParseError {
  kind: ParseErrorKind;
  /** 1-based line the problem was found on */
  line: number;
  message: string;
  requirement?: string;
  scenario?: string;
  /** Missing kind, for ScenarioMissingStep */
  step?: StepKind;
}

export type ParseResult<T> =
  | { ok: true; value: T }
  | { ok: false; errors: ParseError[] };
