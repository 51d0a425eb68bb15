/**
 * Suppression Matcher
 *
 * Derives the candidate keys for a property and checks them against the
 * loaded suppression set
 */

import type { SuppressionCandidate } from './types.js';

/**
 * Build the candidate keys for a property, most specific first
 *
 * @param file - File path as reported by the analyzer
 * @param structName - Resolved struct name
 * @param propertyName - Property name
 */
export function suppressionCandidates(
  file: string,
  structName: string,
  propertyName: string
): SuppressionCandidate[] {
  return [
    { key: `${file}:${structName}::${propertyName}`, form: 'file-struct-property' },
    { key: `${structName}::${propertyName}`, form: 'struct-property' },
    { key: `*::${propertyName}`, form: 'any-struct-property' },
    { key: file, form: 'file' },
  ];
}

/**
 * Find the first candidate key present in the suppression set
 *
 * @returns The matching key, or undefined if the property is not suppressed
 */
export function findSuppression(
  suppressions: ReadonlySet<string>,
  file: string,
  structName: string,
  propertyName: string
): string | undefined {
  return suppressionCandidates(file, structName, propertyName).find(candidate =>
    suppressions.has(candidate.key)
  )?.key;
}

/**
 * Check if a property is suppressed
 */
export function isSuppressed(
  suppressions: ReadonlySet<string>,
  file: string,
  structName: string,
  propertyName: string
): boolean {
  return findSuppression(suppressions, file, structName, propertyName) !== undefined;
}
