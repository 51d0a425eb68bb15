/**
 * Property Scanner
 * Detects UPROPERTY-annotated FGuid declarations in header text
 *
 * For each annotation line, the next LOOKAHEAD_WINDOW lines are searched for
 * a declaration. Only the first declaration in a window is recorded, and the
 * scan continues from the line after the annotation, so windows may overlap.
 */

import {
  ANNOTATION_PATTERN,
  DECLARATION_PATTERN,
  LOOKAHEAD_WINDOW,
  splitLines,
} from '../rules.js';
import type { DetectedProperty } from '../types.js';

export class PropertyScanner {
  readonly lines: string[];

  constructor(content: string) {
    this.lines = splitLines(content);
  }

  /**
   * Finds every annotation+declaration pair in declaration order
   */
  scan(): DetectedProperty[] {
    const properties: DetectedProperty[] = [];

    for (let i = 0; i < this.lines.length; i++) {
      if (!ANNOTATION_PATTERN.test(this.lines[i])) {
        continue;
      }

      const property = this.findDeclaration(i);
      if (property) {
        properties.push(property);
      }
    }

    return properties;
  }

  /**
   * Searches the lookahead window after an annotation line
   */
  private findDeclaration(annotationIndex: number): DetectedProperty | undefined {
    const end = Math.min(annotationIndex + LOOKAHEAD_WINDOW, this.lines.length - 1);

    for (let j = annotationIndex + 1; j <= end; j++) {
      const match = DECLARATION_PATTERN.exec(this.lines[j]);
      if (!match) {
        continue;
      }

      const base = {
        line: j + 1,
        propertyName: match[1],
        annotationLine: this.lines[annotationIndex].trim(),
        declarationLine: this.lines[j].trim(),
      };
      const initializer: string | undefined = match[2];
      if (initializer === undefined) {
        return { ...base, hasInitializer: false };
      }
      return { ...base, hasInitializer: true, initializer: initializer.trim() };
    }

    return undefined;
  }
}

/**
 * Scans header text for annotated FGuid declarations
 */
export function scanProperties(content: string): DetectedProperty[] {
  return new PropertyScanner(content).scan();
}
