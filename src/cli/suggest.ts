/**
 * Command suggestion utilities using fuzzy matching
 */

import type { Command } from 'commander';

/**
 * Edit distance between two strings, one row at a time
 */
function editDistance(a: string, b: string): number {
  let previous = Array.from({ length: a.length + 1 }, (_, j) => j);

  for (let i = 1; i <= b.length; i++) {
    const row = [i];
    for (let j = 1; j <= a.length; j++) {
      const cost = b.charAt(i - 1) === a.charAt(j - 1) ? 0 : 1;
      row[j] = Math.min(previous[j - 1] + cost, row[j - 1] + 1, previous[j] + 1);
    }
    previous = row;
  }

  return previous[a.length];
}

/**
 * Find the closest match to a given command
 */
export function findClosestCommand(
  input: string,
  validCommands: string[],
  threshold: number = 3
): string | null {
  let closestMatch: string | null = null;
  let closestDistance = Infinity;

  for (const cmd of validCommands) {
    const distance = editDistance(input.toLowerCase(), cmd.toLowerCase());

    if (distance <= threshold && distance < closestDistance) {
      closestDistance = distance;
      closestMatch = cmd;
    }
  }

  return closestMatch;
}

/**
 * Names people reach for that map onto an existing command
 */
export const COMMAND_ALIASES: Record<string, string> = {
  new: 'propose',
  create: 'propose',
  check: 'validate',
  lint: 'validate',
  done: 'apply',
  complete: 'apply',
  close: 'archive',
  ls: 'list',
  status: 'show',
};

/**
 * Get all available command names from a Commander program
 */
export function getAllCommands(program: Command): string[] {
  const commands: string[] = [];

  for (const cmd of program.commands) {
    commands.push(cmd.name());

    for (const subcmd of cmd.commands) {
      commands.push(`${cmd.name()} ${subcmd.name()}`);
    }
  }

  return commands;
}
