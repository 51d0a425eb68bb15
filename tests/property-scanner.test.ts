/**
 * Property Scanner Tests
 * Detection of UPROPERTY + FGuid declaration pairs within the lookahead window
 */

import { describe, it, expect } from 'vitest';
import { PropertyScanner, scanProperties } from '../src/analyzers/property-scanner.js';

describe('Property Scanner', () => {
  it('should detect a declaration directly after the annotation', () => {
    const properties = scanProperties('struct FItem\n{\n    UPROPERTY()\n    FGuid ItemId;\n};\n');

    expect(properties).toEqual([
      {
        line: 4,
        propertyName: 'ItemId',
        annotationLine: 'UPROPERTY()',
        declarationLine: 'FGuid ItemId;',
        hasInitializer: false,
      },
    ]);
  });

  it('should capture the trimmed initializer and ignore a trailing comment', () => {
    const [property] = scanProperties('UPROPERTY(SaveGame)\n  FGuid Id =   FGuid::NewGuid()  ; // keep\n');

    expect(property).toEqual({
      line: 2,
      propertyName: 'Id',
      annotationLine: 'UPROPERTY(SaveGame)',
      declarationLine: 'FGuid Id =   FGuid::NewGuid()  ; // keep',
      hasInitializer: true,
      initializer: 'FGuid::NewGuid()',
    });
  });

  it('should record an empty initializer as present', () => {
    const [property] = scanProperties('UPROPERTY()\nFGuid Id = ;\n');

    expect(property.hasInitializer).toBe(true);
    expect(property.hasInitializer && property.initializer).toBe('');
  });

  describe('lookahead window', () => {
    it('should detect a declaration on the 4th line after the annotation', () => {
      const content = ['UPROPERTY()', '// one', '// two', '// three', 'FGuid Fourth;'].join('\n');

      const properties = scanProperties(content);

      expect(properties).toHaveLength(1);
      expect(properties[0].propertyName).toBe('Fourth');
      expect(properties[0].line).toBe(5);
    });

    it('should not detect a declaration on the 5th line after the annotation', () => {
      const content = ['UPROPERTY()', '// one', '// two', '// three', '// four', 'FGuid Fifth;'].join('\n');

      expect(scanProperties(content)).toEqual([]);
    });

    it('should stop at the end of the file', () => {
      expect(scanProperties('UPROPERTY()')).toEqual([]);
      expect(scanProperties('UPROPERTY()\n')).toEqual([]);
    });
  });

  describe('first match wins', () => {
    it('should record only the first of two declarations in one window', () => {
      const content = ['UPROPERTY()', 'FGuid First;', 'FGuid Second = FGuid();'].join('\n');

      const properties = scanProperties(content);

      expect(properties).toHaveLength(1);
      expect(properties[0].propertyName).toBe('First');
    });

    it('should record a shared declaration once per annotation when windows overlap', () => {
      const content = ['UPROPERTY()', 'UPROPERTY(SaveGame)', 'FGuid Shared;'].join('\n');

      const properties = scanProperties(content);

      expect(properties.map(p => [p.line, p.annotationLine])).toEqual([
        [3, 'UPROPERTY()'],
        [3, 'UPROPERTY(SaveGame)'],
      ]);
    });
  });

  describe('annotation lines', () => {
    it('should accept nested parentheses in the argument list', () => {
      const content = 'UPROPERTY(EditAnywhere, meta = (ClampMin = "0"))\nFGuid Id;';

      expect(scanProperties(content)).toHaveLength(1);
    });

    it('should ignore an annotation followed by code on the same line', () => {
      expect(scanProperties('UPROPERTY() FGuid Inline;\nFGuid Next;')).toEqual([]);
    });

    it('should handle CRLF line endings', () => {
      const [property] = scanProperties('UPROPERTY()\r\nFGuid Id = FGuid(); // note\r\n');

      expect(property.declarationLine).toBe('FGuid Id = FGuid(); // note');
      expect(property.hasInitializer && property.initializer).toBe('FGuid()');
    });
  });

  describe('declaration lines', () => {
    it('should ignore other member types', () => {
      expect(scanProperties('UPROPERTY()\nint32 Count = 0;')).toEqual([]);
    });

    it('should ignore brace initialization', () => {
      expect(scanProperties('UPROPERTY()\nFGuid Id{};')).toEqual([]);
    });

    it('should ignore FGuid declarations without an annotation', () => {
      expect(scanProperties('struct FItem\n{\n    FGuid ItemId;\n};')).toEqual([]);
    });
  });

  it('should expose the split lines for scope resolution', () => {
    const scanner = new PropertyScanner('a\r\nb\nc');

    expect(scanner.lines).toEqual(['a', 'b', 'c']);
  });
});
