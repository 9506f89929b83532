/**
 * Lifecycle states and the transitions between them.
 *
 *   draft -> validated -> applied -> archived
 *
 * Transitions only move forward. A validated change may be validated again
 * (refreshing its hashes); archived is terminal.
 */

import { StateError } from '../errors.js';
import { ChangeStatusSchema, type ChangeStatus } from '../schema/index.js';

export const STATUS_ORDER: readonly ChangeStatus[] = ChangeStatusSchema.options;

export const TRANSITIONS: Readonly<Record<ChangeStatus, readonly ChangeStatus[]>> = {
  draft: ['validated'],
  validated: ['validated', 'applied'],
  applied: ['archived'],
  archived: [],
};

export function statusRank(status: ChangeStatus): number {
  return STATUS_ORDER.indexOf(status);
}

export function canTransition(from: ChangeStatus, to: ChangeStatus): boolean {
  return TRANSITIONS[from].includes(to);
}

/**
 * Throw INVALID_TRANSITION unless `from -> to` is in the table
 */
export function assertTransition(
  from: ChangeStatus,
  to: ChangeStatus,
  message: string,
  suggestion?: string,
): void {
  if (!canTransition(from, to)) {
    throw new StateError(message, 'INVALID_TRANSITION', suggestion);
  }
}
