/**
 * Suppression System
 *
 * Public API for loading suppression keys, matching them against properties
 * and detecting dead suppressions.
 */

// Types
export * from './types.js';

// Suppression file loading
export { loadSuppressions, readSuppressionFile } from './loader.js';

// Template creation
export { DEFAULT_SUPPRESSION_FILE, createDefaultSuppressionFile } from './template.js';

// Key matching
export { suppressionCandidates, findSuppression, isSuppressed } from './matcher.js';

// Dead suppression detection
export {
  detectDeadSuppressions,
  formatDeadSuppression,
  inferKeyForm,
  isCommentEntry
} from './dead-suppression-detector.js';
