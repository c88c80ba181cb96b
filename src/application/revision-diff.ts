import type { ChangeRecord, ConfigTree, ConfigValue } from '../domain/index.js';
import { DiffInputError, isConfigTree } from '../domain/index.js';

function isTree(value: ConfigValue): value is ConfigTree {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

function childPath(prefix: string, key: string): string {
  return prefix === '' ? key : `${prefix}.${key}`;
}

function sortedKeys(tree: ConfigTree): string[] {
  return Object.keys(tree).sort();
}

function hasKey(tree: ConfigTree, key: string): boolean {
  return Object.prototype.hasOwnProperty.call(tree, key);
}

/**
 * Structural equality over configuration values.
 *
 * Lists compare as whole values: same length and pairwise-equal elements.
 */
export function valuesEqual(a: ConfigValue, b: ConfigValue): boolean {
  if (a === b) return true;
  if (a === null || b === null || typeof a !== 'object' || typeof b !== 'object') return false;

  if (Array.isArray(a) || Array.isArray(b)) {
    if (!Array.isArray(a) || !Array.isArray(b) || a.length !== b.length) return false;
    return a.every((item: ConfigValue, i: number) => {
      const other: ConfigValue | undefined = b[i];
      return other !== undefined && valuesEqual(item, other);
    });
  }

  if (!isTree(a) || !isTree(b)) return false;
  const keys = Object.keys(a);
  if (keys.length !== Object.keys(b).length) return false;
  return keys.every((key) => {
    const left = a[key];
    const right = b[key];
    return left !== undefined && right !== undefined && hasKey(b, key) && valuesEqual(left, right);
  });
}

/** Pass 1: keys of `next`, emitting added and changed records. */
function collectAddedAndChanged(
  prev: ConfigTree,
  next: ConfigTree,
  prefix: string,
  out: ChangeRecord[],
): void {
  for (const key of sortedKeys(next)) {
    const path = childPath(prefix, key);
    const newValue = next[key];
    if (newValue === undefined) continue;

    const oldValue = hasKey(prev, key) ? prev[key] : undefined;
    if (oldValue === undefined) {
      out.push({ path, kind: 'added', newValue });
      continue;
    }

    if (isTree(oldValue) && isTree(newValue)) {
      collectAddedAndChanged(oldValue, newValue, path, out);
      continue;
    }

    // Scalars, lists, and tree-vs-non-tree mismatches: no partial comparison.
    if (!valuesEqual(oldValue, newValue)) {
      out.push({ path, kind: 'changed', oldValue, newValue });
    }
  }
}

/** Pass 2: keys of `prev`, emitting removed records. */
function collectRemoved(
  prev: ConfigTree,
  next: ConfigTree,
  prefix: string,
  out: ChangeRecord[],
): void {
  for (const key of sortedKeys(prev)) {
    const path = childPath(prefix, key);
    const oldValue = prev[key];
    if (oldValue === undefined) continue;

    const newValue = hasKey(next, key) ? next[key] : undefined;
    if (newValue === undefined) {
      out.push({ path, kind: 'removed', oldValue });
      continue;
    }

    if (isTree(oldValue) && isTree(newValue)) {
      collectRemoved(oldValue, newValue, path, out);
    }
  }
}

/**
 * Computes the ordered differences between two revisions' values.
 *
 * Keys are visited in lexicographic order at every level, so the output
 * depends only on the two trees, not on their key insertion order. All
 * added/changed records (depth-first) come before all removed records.
 *
 * `diff(t, t)` is empty, and `diff(a, b)` mirrors `diff(b, a)`: added and
 * removed swap, changed values swap.
 *
 * Pure; holds no state between calls.
 *
 * @throws DiffInputError when either root is not a configuration tree.
 */
export function diffRevisions(prev: unknown, next: unknown): ChangeRecord[] {
  if (!isConfigTree(prev)) throw new DiffInputError('old');
  if (!isConfigTree(next)) throw new DiffInputError('new');

  const changes: ChangeRecord[] = [];
  collectAddedAndChanged(prev, next, '', changes);
  collectRemoved(prev, next, '', changes);
  return changes;
}
