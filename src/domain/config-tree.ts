/** Leaf value of a captured configuration. */
export type ConfigScalar = string | number | boolean | null;

export type ConfigValue = ConfigScalar | ConfigList | ConfigTree;

/** Lists are compared as whole values, never element by element. */
export type ConfigList = readonly ConfigValue[];

/** One revision's deployed values, keyed by configuration key. */
export interface ConfigTree {
  readonly [key: string]: ConfigValue;
}

export type ChangeKind = 'added' | 'removed' | 'changed';

/**
 * One difference between two revisions.
 *
 * `path` is dot-delimited from the root, e.g. `resources.limits.memory`.
 */
export type ChangeRecord =
  | { readonly path: string; readonly kind: 'added'; readonly newValue: ConfigValue }
  | { readonly path: string; readonly kind: 'removed'; readonly oldValue: ConfigValue }
  | {
    readonly path: string;
    readonly kind: 'changed';
    readonly oldValue: ConfigValue;
    readonly newValue: ConfigValue;
  };

export function isConfigTree(value: unknown): value is ConfigTree {
  if (value === null || typeof value !== 'object' || Array.isArray(value)) return false;
  return Object.values(value).every(isConfigValue);
}

export function isConfigValue(value: unknown): value is ConfigValue {
  if (value === null) return true;
  switch (typeof value) {
    case 'string':
    case 'boolean':
      return true;
    case 'number':
      return Number.isFinite(value);
    case 'object':
      return Array.isArray(value) ? value.every(isConfigValue) : isConfigTree(value);
    default:
      return false;
  }
}
