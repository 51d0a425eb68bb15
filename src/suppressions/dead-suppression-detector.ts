/**
 * Dead Suppression Detector
 *
 * Detects suppression keys that no longer match any property, e.g. after a
 * struct was fixed or a property renamed.
 */

import type { DeadSuppression, SuppressionKeyForm } from './types.js';

/**
 * True for template-style comment entries such as "# Example suppressions:"
 */
export function isCommentEntry(key: string): boolean {
  return key.trimStart().startsWith('#');
}

/**
 * Guess which candidate form a key was written as
 */
export function inferKeyForm(key: string): SuppressionKeyForm {
  if (key.startsWith('*::')) {
    return 'any-struct-property';
  }

  const separator = key.lastIndexOf('::');
  if (separator < 0) {
    return 'file';
  }

  // "path:Struct::Prop" has a single colon before the struct name
  const head = key.substring(0, separator);
  return head.includes(':') ? 'file-struct-property' : 'struct-property';
}

/**
 * Detect dead suppressions
 *
 * @param suppressions - Keys loaded for the run, in file order
 * @param matchedKeys - Keys that suppressed at least one property
 * @returns Unmatched, non-comment keys in file order
 */
export function detectDeadSuppressions(
  suppressions: ReadonlySet<string>,
  matchedKeys: ReadonlySet<string>
): DeadSuppression[] {
  const dead: DeadSuppression[] = [];

  for (const key of suppressions) {
    if (isCommentEntry(key) || matchedKeys.has(key)) {
      continue;
    }
    dead.push({ key, form: inferKeyForm(key) });
  }

  return dead;
}

/**
 * Format dead suppression for display
 */
export function formatDeadSuppression(dead: DeadSuppression): string {
  return `${dead.key} (${dead.form})`;
}
