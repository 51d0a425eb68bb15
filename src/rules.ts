/**
 * Detection rules for reflected FGuid properties
 *
 * Everything the scanner and classifier treat as fixed vocabulary lives here:
 * the annotation keyword, the tracked type, the accepted initializers and the
 * line patterns built from them.
 */

/** Macro that marks a member as reflected */
export const ANNOTATION_KEYWORD = 'UPROPERTY';

/** Member type subject to validation */
export const TRACKED_TYPE = 'FGuid';

/** Initializers accepted as an explicit, canonical in-class initialization */
export const CANONICAL_INITIALIZERS: readonly string[] = [
  `${TRACKED_TYPE}()`,
  `${TRACKED_TYPE}::NewGuid()`,
];

/** Number of lines after an annotation searched for the declaration */
export const LOOKAHEAD_WINDOW = 4;

/** Extension of the files walked by the analyzer */
export const HEADER_EXTENSION = '.h';

/** Struct name reported when no struct header precedes a declaration */
export const UNKNOWN_STRUCT = 'UnknownStruct';

/**
 * `UPROPERTY(...)` alone on its line. The argument list may hold one level of
 * nested parentheses, e.g. `UPROPERTY(EditAnywhere, meta = (ClampMin = "0"))`.
 */
export const ANNOTATION_PATTERN = new RegExp(
  `^\\s*${ANNOTATION_KEYWORD}\\s*\\((?:[^()]|\\([^()]*\\))*\\)\\s*$`
);

/**
 * `FGuid Name;` or `FGuid Name = <expr>;`, optionally followed by a line comment.
 * Group 1 is the property name, group 2 the raw initializer.
 */
export const DECLARATION_PATTERN = new RegExp(
  `^\\s*${TRACKED_TYPE}\\s+(\\w+)(?:\\s*=\\s*([^;]+))?\\s*;\\s*(?://.*)?$`
);

/**
 * `struct FName`, optionally preceded by `USTRUCT(...)` on the same line and
 * with an `XXX_API` export macro before the name. Group 1 is the struct name.
 */
export const STRUCT_HEADER_PATTERN =
  /^\s*(?:USTRUCT\s*\([^)]*\)\s*)?struct\s+(?:[A-Z0-9_]+_API\s+)?(\w+)/;

/**
 * Splits file content into lines, accepting both LF and CRLF endings
 */
export function splitLines(content: string): string[] {
  return content.split(/\r?\n/);
}
