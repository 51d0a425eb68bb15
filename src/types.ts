/**
 * Core type definitions for FGuid initialization validation
 */

/**
 * Initializer found on a declaration line. `initializer` is the trimmed
 * expression text between `=` and `;`.
 */
export type InitializerState =
  | { hasInitializer: true; initializer: string }
  | { hasInitializer: false };

/**
 * An annotated FGuid declaration found by the property scanner,
 * before its enclosing struct is known
 */
export type DetectedProperty = InitializerState & {
  /** Line number of the declaration (1-indexed) */
  line: number;
  propertyName: string;
  /** Annotation line, trimmed */
  annotationLine: string;
  /** Declaration line, trimmed */
  declarationLine: string;
};

/**
 * A fully resolved UPROPERTY FGuid member
 */
export type GuidProperty = DetectedProperty & {
  file: string;
  /** Nearest preceding struct name, or UnknownStruct */
  structName: string;
};

export type InvalidReason = 'missing-initializer' | 'invalid-initializer';

/**
 * Outcome of classifying one property. Suppression wins over validity.
 */
export type PropertyClassification =
  | { category: 'suppressed'; matchedKey: string }
  | { category: 'valid' }
  | { category: 'invalid'; reason: InvalidReason };

export type PropertyCategory = PropertyClassification['category'];

/**
 * A property paired with the classification that placed it in its bucket
 */
export interface ClassifiedProperty<C extends PropertyClassification = PropertyClassification> {
  property: GuidProperty;
  classification: C;
}

/**
 * Results of validating a single header file.
 * `valid`, `invalid` and `suppressed` partition `found`.
 */
export interface FileValidationResult {
  file: string;
  found: GuidProperty[];
  valid: ClassifiedProperty<Extract<PropertyClassification, { category: 'valid' }>>[];
  invalid: ClassifiedProperty<Extract<PropertyClassification, { category: 'invalid' }>>[];
  suppressed: ClassifiedProperty<Extract<PropertyClassification, { category: 'suppressed' }>>[];
}

/**
 * Totals across every file with at least one property
 */
export interface ValidationSummary {
  files: number;
  found: number;
  valid: number;
  invalid: number;
  suppressed: number;
  passed: boolean;
}

/**
 * Configuration options for the analyzer
 */
export interface AnalyzerConfig {
  /** Directory to scan */
  rootDir: string;
  /** Descend into subdirectories (default: true) */
  recursive?: boolean;
  /** Suppression keys loaded once for the run */
  suppressions?: ReadonlySet<string>;
}

/**
 * File counters collected during a walk
 */
export interface AnalyzerStats {
  filesScanned: number;
  filesSkipped: number;
  filesWithProperties: number;
}
