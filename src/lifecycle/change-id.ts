/**
 * Change id rules: lowercase kebab-case, at least two words, the first a
 * verb saying what the change does (add-user-auth, remove-legacy-export).
 */

import { InputError } from '../errors.js';
import { changeIdPattern } from '../schema/index.js';
import { errors } from '../strings/index.js';

export const DEFAULT_VERBS: readonly string[] = [
  'add',
  'allow',
  'change',
  'create',
  'delete',
  'deprecate',
  'disable',
  'document',
  'drop',
  'enable',
  'extend',
  'fix',
  'harden',
  'implement',
  'improve',
  'integrate',
  'introduce',
  'migrate',
  'move',
  'optimize',
  'refactor',
  'remove',
  'rename',
  'replace',
  'restructure',
  'simplify',
  'split',
  'support',
  'update',
  'upgrade',
];

/**
 * Throw INVALID_ID unless `id` is a well-formed, verb-led change id
 */
export function checkChangeId(id: string, extraVerbs: readonly string[] = []): void {
  if (!changeIdPattern.test(id)) {
    throw new InputError(errors.input.invalidIdFormat(id), 'INVALID_ID');
  }

  const [verb, ...rest] = id.split('-');
  if (rest.length === 0) {
    throw new InputError(errors.input.invalidIdTooShort(id), 'INVALID_ID');
  }

  const verbs = [...DEFAULT_VERBS, ...extraVerbs];
  if (!verbs.includes(verb)) {
    throw new InputError(
      errors.input.invalidIdVerb(id, verb),
      'INVALID_ID',
      errors.input.verbHint([...verbs].sort()),
    );
  }
}

/**
 * Default capability for a change: the id without its verb
 * (add-user-auth -> user-auth)
 */
export function defaultCapability(id: string): string {
  return id.split('-').slice(1).join('-');
}

/**
 * Default title for a change: add-user-auth -> 'Add user auth'
 */
export function defaultTitle(id: string): string {
  const words = id.split('-').join(' ');
  return words.charAt(0).toUpperCase() + words.slice(1);
}
