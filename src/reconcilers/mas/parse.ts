/**
 * Parser for `mas list` output
 *
 * Each line has the shape
 *
 *     <digits><whitespace><free-text name><whitespace>(<version>)
 *
 * The name may itself contain spaces, parentheses and non-ASCII symbols, so
 * the line is anchored at both ends: the id is the leading digit run, the
 * version is the last parenthesized token before end of line, and whatever
 * sits between them is the name.
 *
 * @example
 * parseMasListLine('1352211125  Tide Alert (NOAA) - Tide Chart  (3.2)')
 * // { id: '1352211125', name: 'Tide Alert (NOAA) - Tide Chart', version: '3.2' }
 */

import { ParseFailedError } from '../../errors.js';

/**
 * One installed App Store app
 */
export interface MasListRecord {
  /** Numeric App Store id, kept as text */
  id: string;
  name: string;
  version: string;
}

// id, then a lazy name that stops at the first point where only
// "<space>(<version>)" remains
const MAS_LIST_LINE = /^\s*(\d+)\s+(.+?)\s+\(([^()]+)\)\s*$/u;

/**
 * Parse a single `mas list` line
 *
 * @throws ParseFailedError if the line lacks a numeric id or a trailing
 *   parenthesized version
 */
export function parseMasListLine(line: string): MasListRecord {
  const match = MAS_LIST_LINE.exec(line);
  if (!match) {
    throw new ParseFailedError('Unrecognized mas list record', line);
  }

  const [, id, name, version] = match;
  return { id, name: name.trim(), version: version.trim() };
}

/**
 * Parse full `mas list` output, skipping blank lines
 *
 * A single malformed line fails the whole listing.
 */
export function parseMasList(output: string): MasListRecord[] {
  return output
    .split(/\r?\n/)
    .filter((line) => line.trim().length > 0)
    .map(parseMasListLine);
}
