/**
 * Types for set-difference reconciliation
 *
 * Packages, casks, App Store apps and editor extensions all reduce to the
 * same shape: a desired list, an installed set, and one install action per
 * missing item.
 */

/**
 * Capabilities a resource kind provides to the generic reconciler
 *
 * @typeParam TDesired - Desired record as declared in configuration
 * @typeParam TKey - Stable identity used for membership tests
 */
export interface SetReconcilerSpec<TDesired, TKey> {
  /** Resource kind name used in messages and diff paths (e.g. `brew.formulae`) */
  kind: string;
  /** Identity of a desired record, comparable with the actual set */
  identify(item: TDesired): TKey;
  /** Query the live system for installed identities */
  queryActual(): ReadonlySet<TKey>;
  /** Install one desired record; throws on failure */
  install(item: TDesired): void;
  /** Display label for a record (defaults to String(identity)) */
  describe?(item: TDesired): string;
}

/**
 * Result of comparing desired records against the installed set
 */
export interface SetPlan<TDesired> {
  kind: string;
  /** Desired records absent from the live system, in desired order */
  missing: TDesired[];
  /** Desired records already installed */
  present: TDesired[];
}

/**
 * Result of applying a SetPlan
 */
export interface SetApplyResult<TDesired> {
  kind: string;
  /** Records installed, in install order */
  installed: TDesired[];
  /** True if at least one install ran */
  changed: boolean;
}
