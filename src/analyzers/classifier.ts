/**
 * Classifier
 * Sorts properties into suppressed, valid and invalid buckets
 *
 * Priority is suppressed > valid > invalid: a suppressed property with a
 * canonical initializer is still reported as suppressed.
 */

import { CANONICAL_INITIALIZERS } from '../rules.js';
import { findSuppression } from '../suppressions/matcher.js';
import type {
  FileValidationResult,
  GuidProperty,
  PropertyClassification,
} from '../types.js';

/**
 * Check if a property has a canonical initializer. The trimmed text must
 * equal an allowed expression exactly.
 */
export function hasCanonicalInitializer(property: GuidProperty): boolean {
  return property.hasInitializer && CANONICAL_INITIALIZERS.includes(property.initializer);
}

/**
 * Classifies a single property
 */
export function classifyProperty(
  property: GuidProperty,
  suppressions: ReadonlySet<string>
): PropertyClassification {
  const matchedKey = findSuppression(
    suppressions,
    property.file,
    property.structName,
    property.propertyName
  );
  if (matchedKey !== undefined) {
    return { category: 'suppressed', matchedKey };
  }

  if (hasCanonicalInitializer(property)) {
    return { category: 'valid' };
  }

  return {
    category: 'invalid',
    reason: property.hasInitializer ? 'invalid-initializer' : 'missing-initializer',
  };
}

/**
 * Classifies every property of one file, keeping declaration order
 * within each bucket
 */
export function classifyProperties(
  file: string,
  properties: GuidProperty[],
  suppressions: ReadonlySet<string>
): FileValidationResult {
  const result: FileValidationResult = {
    file,
    found: properties,
    valid: [],
    invalid: [],
    suppressed: [],
  };

  for (const property of properties) {
    const classification = classifyProperty(property, suppressions);

    switch (classification.category) {
      case 'suppressed':
        result.suppressed.push({ property, classification });
        break;
      case 'valid':
        result.valid.push({ property, classification });
        break;
      case 'invalid':
        result.invalid.push({ property, classification });
        break;
    }
  }

  return result;
}
