/**
 * tasks.md parsing.
 *
 * Tasks are checklist lines, `- [ ]` (pending) or `- [x]` (done), optionally
 * grouped under `##` phase headings. Any other list item is malformed.
 */

import { headingOf, scanLines } from './markdown.js';

export interface TaskEntry {
  /** 1-based position in the file, the number `apply --complete` takes */
  index: number;
  text: string;
  done: boolean;
  line: number;
  phase?: string;
}

export interface MalformedTaskLine {
  line: number;
  text: string;
}

export interface TaskList {
  tasks: TaskEntry[];
  phases: string[];
  malformed: MalformedTaskLine[];
}

const CHECKBOX_PATTERN = /^(\s*)- \[( |x)\] (.*)$/;
const BULLET_PATTERN = /^\s*(?:[-*+]|\d+[.)])(?:\s|$)/;

export function parseTasks(text: string): TaskList {
  const tasks: TaskEntry[] = [];
  const phases: string[] = [];
  const malformed: MalformedTaskLine[] = [];
  let phase: string | undefined;

  for (const line of scanLines(text)) {
    if (line.inFence) continue;

    const heading = headingOf(line);
    if (heading) {
      if (heading.level >= 2) {
        phase = heading.title;
        phases.push(phase);
      }
      continue;
    }

    const match = line.text.match(CHECKBOX_PATTERN);
    if (match) {
      tasks.push({
        index: tasks.length + 1,
        text: match[3].trim(),
        done: match[2] === 'x',
        line: line.line,
        phase,
      });
      continue;
    }

    if (BULLET_PATTERN.test(line.text)) {
      malformed.push({ line: line.line, text: line.text.trim() });
    }
  }

  return { tasks, phases, malformed };
}

/**
 * Number of tasks not yet done
 */
export function remainingTasks(list: TaskList): number {
  return list.tasks.filter((t) => !t.done).length;
}

/**
 * Tick the given tasks (by index). Only the checkbox of each named line
 * changes; order and every other byte are kept.
 */
export function markTasksDone(text: string, list: TaskList, indices: Iterable<number>): string {
  const targetLines = new Set<number>();
  for (const index of indices) {
    const task = list.tasks.find((t) => t.index === index);
    if (task) targetLines.add(task.line);
  }

  // Line breaks are captured at odd indices, so each one is written back as found
  const parts = text.split(/(\r\n|\r|\n)/);
  for (const lineNumber of targetLines) {
    const i = (lineNumber - 1) * 2;
    const line = parts[i];
    if (line === undefined) continue;
    parts[i] = line.replace(/^(\s*)- \[ \] /, '$1- [x] ');
  }
  return parts.join('');
}

/**
 * tasks.md with every checkbox cleared. Progress is not content, so this is
 * what gets hashed to decide whether a validation is stale.
 */
export function withoutTaskState(text: string): string {
  return text.replace(/^(\s*)- \[x\] /gm, '$1- [ ] ');
}
