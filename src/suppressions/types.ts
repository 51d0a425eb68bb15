/**
 * Suppression System Types
 *
 * Suppressions are literal keys compared by exact equality against the
 * candidate keys derived for each property.
 */

/**
 * Suppression file structure
 */
export interface SuppressionFile {
  /** Keys in file order. Entries starting with "#" are comments. */
  suppressions: string[];
}

/**
 * The four key shapes derived for a property, in lookup order
 */
export type SuppressionKeyForm =
  | 'file-struct-property'
  | 'struct-property'
  | 'any-struct-property'
  | 'file';

/**
 * A candidate key for one property
 */
export interface SuppressionCandidate {
  key: string;
  form: SuppressionKeyForm;
}

/**
 * A suppression key that no property matched during the run
 */
export interface DeadSuppression {
  key: string;
  /** Shape the key appears to have, judged from its separators */
  form: SuppressionKeyForm;
}
