/**
 * Built-in preference type tags
 */

import { ParseFailedError } from '../../errors.js';
import type { DefaultsType } from './types.js';

/**
 * Booleans: `defaults` prints 0/1 for values written with -bool, but plists
 * edited by apps may hold "true"/"false". Both are accepted, case-insensitive.
 */
export const booleanType: DefaultsType<boolean> = {
  name: 'boolean',
  typeFlag: '-bool',
  parse(text: string): boolean {
    switch (text.trim().toLowerCase()) {
      case '1':
      case 'true':
        return true;
      case '0':
      case 'false':
        return false;
      default:
        throw new ParseFailedError('Unable to parse value as boolean', text);
    }
  },
  serialize(value: boolean): string {
    return value ? 'true' : 'false';
  },
  isValue(value: unknown): value is boolean {
    return typeof value === 'boolean';
  },
};

export const integerType: DefaultsType<number> = {
  name: 'integer',
  typeFlag: '-int',
  parse(text: string): number {
    const trimmed = text.trim();
    const value = Number.parseInt(trimmed, 10);
    if (!/^[-+]?\d+$/.test(trimmed) || !Number.isSafeInteger(value)) {
      throw new ParseFailedError('Unable to parse value as integer', text);
    }
    return value;
  },
  serialize(value: number): string {
    return String(value);
  },
  isValue(value: unknown): value is number {
    return typeof value === 'number' && Number.isSafeInteger(value);
  },
};

/**
 * A string restricted to a closed vocabulary
 *
 * @example
 * const orientation = enumType('dock orientation', ['left', 'bottom', 'right'] as const);
 */
export function enumType<V extends string>(
  name: string,
  values: readonly V[]
): DefaultsType<V> {
  const isMember = (value: unknown): value is V =>
    typeof value === 'string' && values.some((v) => v === value);

  return {
    name,
    typeFlag: '-string',
    parse(text: string): V {
      const trimmed = text.trim();
      if (!isMember(trimmed)) {
        throw new ParseFailedError(`Expected one of ${values.join(', ')}`, text);
      }
      return trimmed;
    },
    serialize(value: V): string {
      return value;
    },
    isValue: isMember,
  };
}
