/**
 * Change validation.
 *
 * Every check runs and every finding is collected; nothing here throws for
 * a content problem. Checks, in report order:
 *   1. required files and at least one spec delta
 *   2. proposal sections: presence, order, empty placeholders
 *   3. each delta parses (includes the requirement-must-have-scenario rule)
 *   4. `Related:` capabilities exist or are introduced by this change
 *   5. tasks.md uses checkbox syntax
 *   6. deltas agree with each other and with the current specs tree
 */

import * as path from 'node:path';
import { StructuralError } from '../errors.js';
import { readCapability, findMergeConflicts } from '../merge/merger.js';
import { countDeltaEntries, parseSpecDelta } from '../parser/delta.js';
import {
  PROPOSAL_SECTIONS,
  isSectionEmpty,
  parseProposal,
  type ProposalSectionName,
} from '../parser/proposal.js';
import { parseTasks } from '../parser/tasks.js';
import type { SpecDelta } from '../parser/types.js';
import { capabilityPattern } from '../schema/index.js';
import {
  PROPOSAL_FILE,
  TASKS_FILE,
  type DeltaFile,
  type DocumentStore,
} from '../store/document-store.js';
import { diagnostics as messages } from '../strings/index.js';
import type { Diagnostic, ValidateOptions, ValidationReport } from './types.js';

interface ParsedDelta {
  file: DeltaFile;
  delta: SpecDelta;
}

/**
 * Check the proposal's sections: required ones present, all in canonical
 * order, and none left as an empty placeholder.
 */
export function checkProposal(text: string): Diagnostic[] {
  const found: Diagnostic[] = [];
  const proposal = parseProposal(text);
  const rank = (name: ProposalSectionName): number =>
    PROPOSAL_SECTIONS.findIndex((rule) => rule.name === name);

  const seen = new Set<ProposalSectionName>();
  const present = proposal.sections.filter((section) => {
    if (section.canonical === null || seen.has(section.canonical)) return false;
    seen.add(section.canonical);
    return true;
  });

  for (const rule of PROPOSAL_SECTIONS) {
    if (rule.required && !seen.has(rule.name)) {
      found.push({
        severity: 'error',
        file: PROPOSAL_FILE,
        rule: 'MissingProposalSection',
        message: messages.missingSection(rule.heading),
      });
    }
  }

  let latest: { name: ProposalSectionName; rank: number } | null = null;
  for (const section of present) {
    const name = section.canonical;
    if (name === null) continue;
    const sectionRank = rank(name);
    if (latest && sectionRank < latest.rank) {
      found.push({
        severity: 'error',
        file: PROPOSAL_FILE,
        line: section.line,
        rule: 'SectionOutOfOrder',
        message: messages.sectionOutOfOrder(section.heading, latest.name),
      });
      continue;
    }
    latest = { name, rank: sectionRank };
  }

  const empty = present.filter(isSectionEmpty);
  if (empty.length > 0) {
    found.push({
      severity: 'warning',
      file: PROPOSAL_FILE,
      line: empty[0].line,
      rule: 'EmptyProposalSection',
      message: messages.emptySections(empty.map((s) => s.heading)),
    });
  }

  return found;
}

/**
 * Check that every list item in tasks.md is a checkbox
 */
export function checkTasks(text: string): Diagnostic[] {
  const list = parseTasks(text);
  const found = list.malformed.map((entry): Diagnostic => ({
    severity: 'error',
    file: TASKS_FILE,
    line: entry.line,
    rule: 'TaskWithoutCheckbox',
    message: messages.bareBullet(entry.text),
  }));

  if (list.tasks.length === 0) {
    found.push({
      severity: 'warning',
      file: TASKS_FILE,
      rule: 'NoTasks',
      message: messages.noTasks,
    });
  }
  return found;
}

/**
 * Compare deltas with the canonical specs they will be merged into
 */
async function checkMergeTargets(
  store: DocumentStore,
  deltas: ParsedDelta[]
): Promise<Diagnostic[]> {
  const found: Diagnostic[] = [];

  for (const { file, delta } of deltas) {
    let titles: Set<string>;
    try {
      const spec = await readCapability(store, delta.capability);
      titles = new Set(spec ? spec.requirements.map((r) => r.title) : []);
    } catch (err) {
      if (!(err instanceof StructuralError)) throw err;
      found.push({
        severity: 'warning',
        file: file.relative,
        rule: 'MergeTargetMismatch',
        message: `${messages.canonicalUnreadable(delta.capability)} (${err.message})`,
      });
      continue;
    }

    const removed = new Set(delta.removed.map((r) => r.title));
    const warn = (message: string): void => {
      found.push({ severity: 'warning', file: file.relative, rule: 'MergeTargetMismatch', message });
    };

    for (const entry of delta.removed) {
      if (!titles.has(entry.title)) {
        warn(messages.targetMissing('REMOVED', entry.title, delta.capability));
      }
    }
    for (const entry of delta.modified) {
      if (!titles.has(entry.title)) {
        warn(messages.targetMissing('MODIFIED', entry.title, delta.capability));
      }
    }
    for (const entry of delta.added) {
      if (titles.has(entry.title) && !removed.has(entry.title)) {
        warn(messages.addedExists(entry.title, delta.capability));
      }
    }
  }

  return found;
}

/**
 * Validate the change in `changeDir`
 */
export async function validateChange(
  store: DocumentStore,
  changeDir: string,
  changeId: string,
  options: ValidateOptions = {}
): Promise<ValidationReport> {
  const strict = options.strict ?? false;
  const found: Diagnostic[] = [];

  // 1. Files
  const proposalText = await store.readText(path.join(changeDir, PROPOSAL_FILE));
  const tasksText = await store.readText(path.join(changeDir, TASKS_FILE));
  for (const [name, text] of [
    [PROPOSAL_FILE, proposalText],
    [TASKS_FILE, tasksText],
  ] as const) {
    if (text === null) {
      found.push({ severity: 'error', file: name, rule: 'MissingFile', message: messages.missingFile(name) });
    }
  }

  const deltaFiles = await store.listDeltaFiles(changeDir);
  if (deltaFiles.length === 0) {
    found.push({ severity: 'error', file: 'specs/', rule: 'NoDeltas', message: messages.noDeltas });
  }
  for (const file of deltaFiles) {
    if (!capabilityPattern.test(file.capability)) {
      found.push({
        severity: 'error',
        file: file.relative,
        rule: 'InvalidCapabilityName',
        message: messages.invalidCapabilityDir(file.capability),
      });
    }
  }

  // 2. Proposal sections
  if (proposalText !== null) {
    found.push(...checkProposal(proposalText));
  }

  // 3. Deltas
  const parsed: ParsedDelta[] = [];
  const unparsed = new Set<string>();
  for (const file of deltaFiles) {
    const text = (await store.readText(file.file)) ?? '';
    const result = parseSpecDelta(text, file.capability);
    if (!result.ok) {
      unparsed.add(file.capability);
      for (const error of result.errors) {
        found.push({
          severity: 'error',
          file: file.relative,
          line: error.line,
          rule: error.kind,
          message: error.message,
        });
      }
      continue;
    }
    if (countDeltaEntries(result.value) === 0) {
      found.push({ severity: 'error', file: file.relative, rule: 'EmptyDelta', message: messages.emptyDelta });
    }
    parsed.push({ file, delta: result.value });
  }

  // 4. Related capabilities
  if (proposalText !== null) {
    const existing = new Set(await store.listCapabilities());
    const introduced = new Set(
      parsed.filter(({ delta }) => delta.added.length > 0).map(({ delta }) => delta.capability)
    );
    for (const ref of parseProposal(proposalText).related) {
      // A delta that failed to parse is already reported; don't pile on
      if (existing.has(ref.capability) || introduced.has(ref.capability) || unparsed.has(ref.capability)) {
        continue;
      }
      found.push({
        severity: 'error',
        file: PROPOSAL_FILE,
        line: ref.line,
        rule: 'UnknownRelatedCapability',
        message: messages.unknownRelated(ref.capability),
      });
    }
  }

  // 5. Tasks
  let taskCount = 0;
  if (tasksText !== null) {
    found.push(...checkTasks(tasksText));
    taskCount = parseTasks(tasksText).tasks.length;
  }

  // 6. Delta consistency
  const deltas = parsed.map((p) => p.delta);
  for (const conflict of findMergeConflicts(deltas)) {
    const source = parsed.find((p) => p.delta.capability === conflict.capability);
    found.push({
      severity: 'error',
      file: source ? source.file.relative : 'specs/',
      rule: 'MergeConflict',
      message: conflict.message,
    });
  }
  found.push(...(await checkMergeTargets(store, parsed)));

  const errorCount = found.filter((d) => d.severity === 'error').length;
  const warningCount = found.length - errorCount;

  return {
    changeId,
    strict,
    valid: errorCount === 0 && (!strict || warningCount === 0),
    diagnostics: found,
    stats: {
      errors: errorCount,
      warnings: warningCount,
      deltas: deltaFiles.length,
      requirements: deltas.reduce((sum, d) => sum + countDeltaEntries(d), 0),
      tasks: taskCount,
    },
  };
}
