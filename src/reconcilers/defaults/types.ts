/**
 * Types for idempotent `defaults` preference writes
 */

/**
 * Values a preference can hold
 */
export type ScalarValue = boolean | number | string;

/**
 * Type flag passed to `defaults write`
 */
export type DefaultsTypeFlag = '-bool' | '-int' | '-string';

/**
 * A preference type tag
 *
 * Owns the parse rule for `defaults read` output and the serialize rule for
 * `defaults write`. Adding a new kind of preference means adding a tag, not
 * touching the writer.
 */
export interface DefaultsType<T extends ScalarValue> {
  /** Name used in messages and config validation */
  readonly name: string;
  readonly typeFlag: DefaultsTypeFlag;
  /** Parse trimmed `defaults read` output; throws ParseFailedError */
  parse(text: string): T;
  /** Serialize for `defaults write` */
  serialize(value: T): string;
  /** Whether a configuration value belongs to this type */
  isValue(value: unknown): value is T;
}

/**
 * One desired preference value
 */
export interface ScalarSetting<T extends ScalarValue = ScalarValue> {
  domain: string;
  key: string;
  type: DefaultsType<T>;
  value: T;
}

/**
 * Outcome of reading a preference
 *
 * `unset` means the domain/key pair has never been written.
 */
export type ScalarRead<T extends ScalarValue> =
  | { state: 'set'; value: T }
  | { state: 'unset' };

/**
 * Read-compare result for one setting
 */
export interface ScalarPlan<T extends ScalarValue = ScalarValue> {
  setting: ScalarSetting<T>;
  actual: ScalarRead<T>;
  /** True when actual differs from desired or is unset */
  needsWrite: boolean;
}

/**
 * Outcome of a conditional write
 */
export interface ScalarWriteOutcome {
  /** True if `defaults write` ran */
  changed: boolean;
}
