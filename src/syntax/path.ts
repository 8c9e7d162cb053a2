import type { SyntaxNode, SyntaxPath, SyntaxPathSegment } from '../types';
import type { PathAddressedReplacement } from '../architecture';

import { isArray, isPlainObject, isSyntaxNode } from '../guards';
import { assertInvariant } from '../report';

export const TRAVERSE_MISSING = Symbol('recursive-patterns.traverse.missing');

/**
 * Produces the canonical key for a path, used in logs and error messages.
 *
 * Segments are strings and finite integer indices only, so plain
 * `JSON.stringify` is lossless here.
 */
export function stringifySyntaxPath(path: SyntaxPath): string {
  return JSON.stringify(path);
}

/**
 * Performs a single, guarded traversal step into a container value.
 *
 * Traversal rules:
 * 1. Arrays: the segment must be a numeric index that exists on the array.
 * 2. Objects: the segment must be an own property key.
 * 3. Everything else: not traversable.
 *
 * @returns The value at `current[key]`, or `TRAVERSE_MISSING` if the step is invalid.
 */
export function traverseStep(
  current: unknown,
  key: SyntaxPathSegment
): unknown {
  // 1. Arrays
  if (isArray(current)) {
    if (typeof key !== 'number' || !Object.hasOwn(current, key)) {
      return TRAVERSE_MISSING;
    }
    return current[key];
  }

  // 2. Objects
  if (isPlainObject(current)) {
    if (typeof key !== 'string' || !Object.hasOwn(current, key)) {
      return TRAVERSE_MISSING;
    }
    return current[key];
  }

  // 3. Not traversable
  return TRAVERSE_MISSING;
}

/**
 * Resolves the node a path points at.
 *
 * @returns The node, or `undefined` when a segment is missing or the path
 *          ends on something that is not a syntax node (e.g. an operator
 *          string or a `labels` array).
 */
export function getNodeAtPath(
  root: SyntaxNode,
  path: SyntaxPath
): SyntaxNode | undefined {
  let current: unknown = root;

  for (const key of path) {
    current = traverseStep(current, key);
    if (current === TRAVERSE_MISSING) return undefined;
  }

  return isSyntaxNode(current) ? current : undefined;
}

/**
 * Copy-on-write update of one slot. Containers on the way are shallow-copied;
 * everything off the path is shared with the input tree.
 */
function setIn(
  current: unknown,
  path: SyntaxPath,
  index: number,
  replacement: SyntaxNode
): unknown {
  if (index === path.length) return replacement;

  const key = path[index];
  const child = traverseStep(current, key);
  assertInvariant(
    child !== TRAVERSE_MISSING,
    `Cannot replace node at ${stringifySyntaxPath(path)}: segment ${JSON.stringify(key)} is missing.`
  );

  const updated = setIn(child, path, index + 1, replacement);

  if (isArray(current)) {
    const copy = [...current];
    copy[Number(key)] = updated;
    return copy;
  }

  return { ...(isPlainObject(current) ? current : {}), [key]: updated };
}

/**
 * Returns a new tree in which the node at `path` is `replacement`.
 *
 * The input tree is left untouched. An empty path replaces the root.
 * See {@link PathAddressedReplacement}.
 *
 * @throws {RewriteInvariantError} When the path does not resolve in `root`.
 */
export function replaceAtPath(
  root: SyntaxNode,
  path: SyntaxPath,
  replacement: SyntaxNode
): SyntaxNode {
  const next = setIn(root, path, 0, replacement);
  assertInvariant(
    isSyntaxNode(next),
    `Replacing ${stringifySyntaxPath(path)} did not produce a syntax node.`
  );
  return next;
}

/**
 * The path of the parent node. For a path ending in an array index the
 * parent is the node owning the array, not the array itself.
 */
export function parentPath(path: SyntaxPath): SyntaxPath {
  return typeof path.at(-1) === 'number' ? path.slice(0, -2) : path.slice(0, -1);
}
