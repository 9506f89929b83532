/**
 * Requirement / scenario grammar shared by deltas and canonical specs.
 *
 *   ### Requirement: <title>
 *   <body>
 *   #### Scenario: <title>
 *   - **Given** ...
 *   - **When** ...
 *   - **Then** ...
 */

import { headingOf, joinBody, normalizeTitle, type MarkdownLine } from './markdown.js';
import type {
  ParseError,
  Requirement,
  Scenario,
  ScenarioStep,
  StepKeyword,
  StepKind,
} from './types.js';

export const REQUIREMENT_HEADING = /^Requirement:\s*(\S.*)$/;
const SCENARIO_HEADING = /^Scenario:\s*(\S.*)$/;
const STEP_PATTERN = /^\s*(?:[-*+]\s+)?\*\*(given|when|then|and)\*\*:?\s*(.*)$/i;

const KIND_RANK: Record<StepKind, number> = { given: 0, when: 1, then: 2 };
const STEP_KINDS: StepKind[] = ['given', 'when', 'then'];

/**
 * A requirement as parsed, with the line its heading sits on
 */
export interface RequirementBlock extends Requirement {
  line: number;
}

export interface SectionParseOptions {
  /** Whether each requirement must own at least one scenario */
  requireScenarios: boolean;
  /** Label used in error messages, e.g. "ADDED" */
  section: string;
}

export interface SectionParseResult {
  requirements: RequirementBlock[];
  errors: ParseError[];
}

interface ScenarioBuilder {
  title: string;
  line: number;
  steps: ScenarioStep[];
  maxRank: number;
  /** The next plain line continues the last step */
  wrapping: boolean;
}

interface RequirementBuilder {
  title: string;
  line: number;
  bodyLines: string[];
  scenarios: ScenarioBuilder[];
}

function toKeyword(raw: string): StepKeyword {
  switch (raw.toLowerCase()) {
    case 'given':
      return 'Given';
    case 'when':
      return 'When';
    case 'then':
      return 'Then';
    default:
      return 'And';
  }
}

function keywordKind(keyword: Exclude<StepKeyword, 'And'>): StepKind {
  switch (keyword) {
    case 'Given':
      return 'given';
    case 'When':
      return 'when';
    case 'Then':
      return 'then';
  }
}

/**
 * Parse the lines of one `## ... Requirements` section.
 */
export function parseRequirementSection(
  lines: MarkdownLine[],
  options: SectionParseOptions
): SectionParseResult {
  const errors: ParseError[] = [];
  const requirements: RequirementBlock[] = [];
  const seen = new Set<string>();

  let requirement: RequirementBuilder | null = null;
  let scenario: ScenarioBuilder | null = null;

  const closeScenario = (): void => {
    if (!requirement || !scenario) return;
    const present = new Set(scenario.steps.map((s) => s.kind));
    for (const kind of STEP_KINDS) {
      if (options.requireScenarios && !present.has(kind)) {
        errors.push({
          kind: 'ScenarioMissingStep',
          line: scenario.line,
          message: `Scenario "${scenario.title}" has no ${toKeyword(kind)} step`,
          requirement: requirement.title,
          scenario: scenario.title,
          step: kind,
        });
      }
    }
    requirement.scenarios.push(scenario);
    scenario = null;
  };

  const closeRequirement = (): void => {
    closeScenario();
    if (!requirement) return;
    if (options.requireScenarios && requirement.scenarios.length === 0) {
      errors.push({
        kind: 'RequirementWithoutScenario',
        line: requirement.line,
        message: `Requirement "${requirement.title}" must have at least one scenario`,
        requirement: requirement.title,
      });
    }
    requirements.push({
      title: requirement.title,
      body: joinBody(requirement.bodyLines),
      scenarios: options.requireScenarios
        ? requirement.scenarios.map(
            (s): Scenario => ({ title: s.title, steps: s.steps })
          )
        : [],
      line: requirement.line,
    });
    requirement = null;
  };

  for (const line of lines) {
    const heading = headingOf(line);

    if (heading?.level === 3) {
      closeRequirement();
      const match = heading.title.match(REQUIREMENT_HEADING);
      if (!match) {
        errors.push({
          kind: 'MissingSectionHeader',
          line: line.line,
          message: `Expected "### Requirement: <title>" in ${options.section} section, found "${heading.title}"`,
        });
        continue;
      }
      const title = normalizeTitle(match[1]);
      if (seen.has(title)) {
        errors.push({
          kind: 'DuplicateRequirementTitle',
          line: line.line,
          message: `Requirement "${title}" appears more than once in ${options.section} section`,
          requirement: title,
        });
      }
      seen.add(title);
      requirement = { title, line: line.line, bodyLines: [], scenarios: [] };
      continue;
    }

    if (heading?.level === 4) {
      const match = heading.title.match(SCENARIO_HEADING);
      if (match) {
        if (!requirement) {
          errors.push({
            kind: 'MissingSectionHeader',
            line: line.line,
            message: `Scenario "${normalizeTitle(match[1])}" is not under a "### Requirement:" heading`,
          });
          continue;
        }
        closeScenario();
        scenario = {
          title: normalizeTitle(match[1]),
          line: line.line,
          steps: [],
          maxRank: -1,
          wrapping: false,
        };
        continue;
      }
    }

    if (scenario && requirement) {
      // REMOVED entries keep no scenarios, so their steps are not checked
      if (options.requireScenarios) {
        addScenarioLine(scenario, requirement.title, line, errors);
      }
    } else if (requirement) {
      requirement.bodyLines.push(line.text);
    }
    // Prose between the section heading and the first requirement is ignored
  }

  closeRequirement();
  return { requirements, errors };
}

function addScenarioLine(
  scenario: ScenarioBuilder,
  requirementTitle: string,
  line: MarkdownLine,
  errors: ParseError[]
): void {
  const match = line.inFence ? null : line.text.match(STEP_PATTERN);

  if (!match) {
    const text = line.text.trim();
    const last = scenario.steps[scenario.steps.length - 1];
    if (!text || line.inFence) {
      // Prose and code after a blank line or fence are not part of a step
      scenario.wrapping = false;
    } else if (last && scenario.wrapping) {
      last.text = last.text ? `${last.text} ${text}` : text;
    }
    return;
  }

  const keyword = toKeyword(match[1]);
  const text = match[2].trim();

  let kind: StepKind;
  if (keyword === 'And') {
    const previous = scenario.steps[scenario.steps.length - 1];
    if (!previous) {
      errors.push({
        kind: 'StepsOutOfOrder',
        line: line.line,
        message: `Scenario "${scenario.title}" starts with And; it must follow a Given, When or Then`,
        requirement: requirementTitle,
        scenario: scenario.title,
      });
      return;
    }
    kind = previous.kind;
  } else {
    kind = keywordKind(keyword);
  }

  const rank = KIND_RANK[kind];
  if (rank < scenario.maxRank) {
    const after = STEP_KINDS[scenario.maxRank];
    errors.push({
      kind: 'StepsOutOfOrder',
      line: line.line,
      message: `Scenario "${scenario.title}" has ${toKeyword(kind)} after ${toKeyword(after)}`,
      requirement: requirementTitle,
      scenario: scenario.title,
    });
  }
  scenario.maxRank = Math.max(scenario.maxRank, rank);
  scenario.steps.push({ keyword, kind, text });
  scenario.wrapping = true;
}

/**
 * Render a requirement block in canonical form
 */
export function renderRequirement(requirement: Requirement): string[] {
  const lines = [`### Requirement: ${requirement.title}`];
  if (requirement.body) {
    lines.push(...requirement.body.split('\n'));
  }
  for (const scenario of requirement.scenarios) {
    lines.push('', `#### Scenario: ${scenario.title}`);
    for (const step of scenario.steps) {
      lines.push(`- **${step.keyword}** ${step.text}`.trimEnd());
    }
  }
  return lines;
}

/**
 * Sort parse errors by line, keeping discovery order within a line
 */
export function sortErrors(errors: ParseError[]): ParseError[] {
  return errors
    .map((error, index) => ({ error, index }))
    .sort((a, b) => a.error.line - b.error.line || a.index - b.index)
    .map(({ error }) => error);
}

/**
 * Drop the source line from a parsed block
 */
export function toRequirement(block: RequirementBlock): Requirement {
  return { title: block.title, body: block.body, scenarios: block.scenarios };
}
