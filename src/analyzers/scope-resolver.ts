/**
 * Scope Resolver
 * Attributes a declaration to the nearest struct header above it
 *
 * Braces are not tracked: a property that follows a nested or sibling
 * struct's header is attributed to that header even after the nested
 * struct has closed.
 */

import { STRUCT_HEADER_PATTERN, UNKNOWN_STRUCT } from '../rules.js';

/**
 * Finds the struct name for the line at `declarationIndex` (0-indexed)
 *
 * @param lines - File content split into lines
 * @param declarationIndex - Index of the declaration line
 * @returns Name from the nearest preceding struct header, or UnknownStruct
 */
export function resolveStructName(lines: readonly string[], declarationIndex: number): string {
  for (let i = Math.min(declarationIndex, lines.length) - 1; i >= 0; i--) {
    const match = STRUCT_HEADER_PATTERN.exec(lines[i]);
    if (match) {
      return match[1];
    }
  }

  return UNKNOWN_STRUCT;
}
