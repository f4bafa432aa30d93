/**
 * Unit Tests: `mas list` parser
 */

import { describe, it, expect } from 'vitest';
import { parseMasListLine, parseMasList } from '../../src/reconcilers/mas/parse.js';
import { ParseFailedError } from '../../src/errors.js';

describe('parseMasListLine', () => {
  it('parses a simple record', () => {
    expect(parseMasListLine('937984704   Amphetamine  (5.3.2)')).toEqual({
      id: '937984704',
      name: 'Amphetamine',
      version: '5.3.2',
    });
  });

  it('keeps parentheses that belong to the name', () => {
    expect(parseMasListLine('1352211125  Tide Alert (NOAA) - Tide Chart  (3.2)')).toEqual({
      id: '1352211125',
      name: 'Tide Alert (NOAA) - Tide Chart',
      version: '3.2',
    });
  });

  it('keeps non-ASCII symbols in the name', () => {
    expect(parseMasListLine('1058383223  Tetris®  (1.0.4)')).toEqual({
      id: '1058383223',
      name: 'Tetris®',
      version: '1.0.4',
    });
    expect(parseMasListLine('1183431430  Flashlight Ⓞ  (2.1)').name).toBe('Flashlight Ⓞ');
  });

  it('accepts leading whitespace and trailing spaces', () => {
    expect(parseMasListLine('  497799835  Xcode  (15.0)  ')).toEqual({
      id: '497799835',
      name: 'Xcode',
      version: '15.0',
    });
  });

  it('rejects a line without a numeric id', () => {
    expect(() => parseMasListLine('Amphetamine  (5.3.2)')).toThrow(ParseFailedError);
  });

  it('rejects a line without a trailing version', () => {
    expect(() => parseMasListLine('937984704  Amphetamine')).toThrow(ParseFailedError);
  });

  it('includes the offending line in the error', () => {
    expect(() => parseMasListLine('garbage')).toThrow('Unrecognized mas list record: "garbage"');
  });
});

describe('parseMasList', () => {
  it('parses every line and skips blank ones', () => {
    const output = '937984704   Amphetamine  (5.3.2)\n\n497799835  Xcode  (15.0)\n';
    expect(parseMasList(output).map((r) => r.id)).toEqual(['937984704', '497799835']);
  });

  it('returns an empty list for empty output', () => {
    expect(parseMasList('')).toEqual([]);
  });

  it('fails the whole listing on one malformed line', () => {
    expect(() => parseMasList('937984704  Amphetamine  (5.3.2)\nnot a record\n')).toThrow(ParseFailedError);
  });
});
