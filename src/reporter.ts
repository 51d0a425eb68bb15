/**
 * Reporter - builds the validation report from per-file results
 *
 * Output depends only on the results passed in: no timestamps, no git data,
 * no colour codes.
 */

import * as fs from 'fs';
import * as path from 'path';
import { CANONICAL_INITIALIZERS, TRACKED_TYPE, ANNOTATION_KEYWORD } from './rules.js';
import { formatDeadSuppression } from './suppressions/dead-suppression-detector.js';
import type { DeadSuppression } from './suppressions/types.js';
import type { FileValidationResult, GuidProperty, ValidationSummary } from './types.js';

export const TOOL_NAME = 'uproperty-guid-lint';
export const TOOL_VERSION = '0.1.0'; // Should match package.json

const SUBJECT = `${ANNOTATION_KEYWORD} ${TRACKED_TYPE}`;
const BANNER_WIDTH = 80;

export type ReportFormat = 'text' | 'json';

export interface ReportOptions {
  /** Include the unused suppression listing */
  deadSuppressions?: DeadSuppression[];
}

export interface BuiltReport {
  report: string;
  /** True iff no property is invalid */
  allValid: boolean;
}

/**
 * JSON form of the report
 */
export interface JsonReport {
  tool: string;
  tool_version: string;
  summary: ValidationSummary;
  invalid: Array<{
    file: string;
    line: number;
    struct: string;
    property: string;
    declaration: string;
    initializer: string | null;
    reason: string;
  }>;
  suppressed: Array<{
    file: string;
    line: number;
    struct: string;
    property: string;
    matched_key: string;
  }>;
  valid: Array<{
    file: string;
    line: number;
    struct: string;
    property: string;
    initializer: string;
  }>;
  unused_suppressions?: DeadSuppression[];
}

/**
 * Generates summary statistics
 */
export function summarize(results: FileValidationResult[]): ValidationSummary {
  const count = (select: (result: FileValidationResult) => unknown[]) =>
    results.reduce((sum, result) => sum + select(result).length, 0);

  const invalid = count(r => r.invalid);

  return {
    files: results.length,
    found: count(r => r.found),
    valid: count(r => r.valid),
    invalid,
    suppressed: count(r => r.suppressed),
    passed: invalid === 0,
  };
}

/**
 * Text shown after "Expected:" for invalid properties
 */
function expectedForms(): string {
  return CANONICAL_INITIALIZERS.join(' or ');
}

function location(property: GuidProperty): string {
  return `${property.file}:${property.line}`;
}

function qualifiedName(property: GuidProperty): string {
  return `${property.structName}::${property.propertyName}`;
}

/**
 * Builds the plain-text report
 */
export function buildReport(
  results: FileValidationResult[],
  options: ReportOptions = {}
): BuiltReport {
  const summary = summarize(results);
  const lines: string[] = [];

  lines.push('='.repeat(BANNER_WIDTH));
  lines.push(`${SUBJECT} Initialization Validation Report`);
  lines.push('='.repeat(BANNER_WIDTH));
  lines.push('');
  lines.push(`Files with ${SUBJECT} properties: ${summary.files}`);
  lines.push(`Total ${SUBJECT} properties found: ${summary.found}`);
  lines.push(`Valid properties: ${summary.valid}`);
  lines.push(`Invalid properties: ${summary.invalid}`);
  lines.push(`Suppressed properties: ${summary.suppressed}`);
  lines.push('');

  if (summary.invalid > 0) {
    lines.push('❌ VALIDATION FAILED');
    lines.push('');
    lines.push('Invalid Properties (require fixes):');
    lines.push('-'.repeat(40));

    for (const result of results) {
      for (const { property } of result.invalid) {
        lines.push(`File: ${location(property)}`);
        lines.push(`Struct: ${property.structName}`);
        lines.push(`Property: ${property.propertyName}`);
        lines.push(`Declaration: ${property.declarationLine}`);
        if (property.hasInitializer) {
          lines.push(`Current initializer: ${property.initializer}`);
          lines.push('Issue: Invalid initializer pattern');
        } else {
          lines.push('Issue: Missing in-class initializer');
        }
        lines.push(`Expected: ${expectedForms()}`);
        lines.push('');
      }
    }
  } else {
    lines.push('✅ VALIDATION PASSED');
    lines.push('');
  }

  if (summary.suppressed > 0) {
    lines.push('Suppressed Properties:');
    lines.push('-'.repeat(20));
    for (const result of results) {
      for (const { property } of result.suppressed) {
        lines.push(`${location(property)} - ${qualifiedName(property)}`);
      }
    }
    lines.push('');
  }

  if (summary.valid > 0) {
    lines.push('Valid Properties:');
    lines.push('-'.repeat(15));
    for (const result of results) {
      for (const { property } of result.valid) {
        const initializer = property.hasInitializer ? property.initializer : '';
        lines.push(`✅ ${location(property)} - ${qualifiedName(property)} = ${initializer}`);
      }
    }
    lines.push('');
  }

  if (options.deadSuppressions) {
    lines.push(...buildUnusedSuppressionsSection(options.deadSuppressions));
  }

  return { report: lines.join('\n'), allValid: summary.passed };
}

/**
 * Lines listing suppression keys that matched nothing
 */
export function buildUnusedSuppressionsSection(deadSuppressions: DeadSuppression[]): string[] {
  const lines = ['Unused Suppressions:', '-'.repeat(20)];

  if (deadSuppressions.length === 0) {
    lines.push('(none)');
  } else {
    lines.push(...deadSuppressions.map(formatDeadSuppression));
  }
  lines.push('');

  return lines;
}

/**
 * Builds the JSON report
 */
export function buildJsonReport(
  results: FileValidationResult[],
  options: ReportOptions = {}
): BuiltReport {
  const summary = summarize(results);

  const record: JsonReport = {
    tool: TOOL_NAME,
    tool_version: TOOL_VERSION,
    summary,
    invalid: results.flatMap(result =>
      result.invalid.map(({ property, classification }) => ({
        file: property.file,
        line: property.line,
        struct: property.structName,
        property: property.propertyName,
        declaration: property.declarationLine,
        initializer: property.hasInitializer ? property.initializer : null,
        reason: classification.reason,
      }))
    ),
    suppressed: results.flatMap(result =>
      result.suppressed.map(({ property, classification }) => ({
        file: property.file,
        line: property.line,
        struct: property.structName,
        property: property.propertyName,
        matched_key: classification.matchedKey,
      }))
    ),
    valid: results.flatMap(result =>
      result.valid.map(({ property }) => ({
        file: property.file,
        line: property.line,
        struct: property.structName,
        property: property.propertyName,
        initializer: property.hasInitializer ? property.initializer : '',
      }))
    ),
  };

  if (options.deadSuppressions) {
    record.unused_suppressions = options.deadSuppressions;
  }

  return { report: JSON.stringify(record, null, 2), allValid: summary.passed };
}

/**
 * Builds the report in the requested format
 */
export function renderReport(
  results: FileValidationResult[],
  format: ReportFormat,
  options: ReportOptions = {}
): BuiltReport {
  return format === 'json' ? buildJsonReport(results, options) : buildReport(results, options);
}

/**
 * Writes a report to disk, creating the parent directory
 */
export function writeReport(outputPath: string, report: string): void {
  fs.mkdirSync(path.dirname(path.resolve(outputPath)), { recursive: true });
  fs.writeFileSync(outputPath, report, 'utf-8');
}
