import type { SyntaxPath, SyntaxPathSegment } from '../types';

import { isArray, isPlainObject } from '../guards';

/**
 * Keys excluded from structural comparison. Annotations are markers for
 * downstream passes and say nothing about what a node means.
 */
const KEYS_TO_SKIP: ReadonlySet<string> = new Set(['annotations']);

/**
 * Lists the keys of a node that take part in comparison.
 *
 * Keys holding `undefined` are treated as absent, so `{ type: undefined }`
 * and `{}` describe the same recursive pattern.
 */
function comparableKeys(container: Record<PropertyKey, unknown>): string[] {
  return Object.keys(container)
    .filter(key => !KEYS_TO_SKIP.has(key) && container[key] !== undefined)
    .sort();
}

/**
 * The central recursive comparison.
 *
 * Logic:
 * 1. Arrays:
 *    Must have the same length; elements are compared index by index.
 * 2. Plain objects (syntax nodes):
 *    Must have the same comparable keys; values are compared key by key.
 * 3. Leaves:
 *    Compared with `Object.is` (so `NaN` literals are equal to themselves).
 *
 * Trees are acyclic by construction, so no cycle tracking is needed.
 *
 * @returns The path of the first difference, or `undefined` when equivalent.
 */
function compare(
  left: unknown,
  right: unknown,
  path: SyntaxPathSegment[]
): SyntaxPath | undefined {
  if (left === right) return undefined;

  // 1. Arrays
  if (isArray(left) || isArray(right)) {
    if (!isArray(left) || !isArray(right)) return path;
    if (left.length !== right.length) return path;

    for (let index = 0; index < left.length; index++) {
      const difference = compare(left[index], right[index], [...path, index]);
      if (difference) return difference;
    }
    return undefined;
  }

  // 2. Plain objects
  if (isPlainObject(left) || isPlainObject(right)) {
    if (!isPlainObject(left) || !isPlainObject(right)) return path;

    const leftKeys = comparableKeys(left);
    const rightKeys = comparableKeys(right);
    if (leftKeys.length !== rightKeys.length) return path;

    for (let index = 0; index < leftKeys.length; index++) {
      const key = leftKeys[index];
      if (key !== rightKeys[index]) return path;

      const difference = compare(left[key], right[key], [...path, key]);
      if (difference) return difference;
    }
    return undefined;
  }

  // 3. Leaves
  return Object.is(left, right) ? undefined : path;
}

/**
 * Finds the first place where two trees differ structurally.
 *
 * @returns The path (relative to both roots) of the first mismatching node
 *          or value; `undefined` if the trees are equivalent.
 */
export function findFirstDifference(
  left: unknown,
  right: unknown
): SyntaxPath | undefined {
  return compare(left, right, []);
}

/**
 * Structural equivalence over expression, pattern and designation trees.
 *
 * Two trees are equivalent when they have the same shape, kinds, names and
 * literal values, ignoring annotations. Node identity plays no role.
 */
export function areEquivalent(left: unknown, right: unknown): boolean {
  return findFirstDifference(left, right) === undefined;
}
