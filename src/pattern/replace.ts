import type { Pattern, Subpattern } from '../types';

import { assertInvariant } from '../report';

type Replacement = {
  target: Pattern;
  replacement: Pattern;
  found: boolean;
};

function replaceIn(pattern: Pattern, state: Replacement): Pattern {
  if (pattern === state.target) {
    state.found = true;
    return state.replacement;
  }

  switch (pattern.kind) {
    case 'recursivePattern': {
      const positional = pattern.positional?.map(entry => replaceIn(entry, state));
      const properties = pattern.properties?.map(
        (entry): Subpattern => {
          const inner = replaceIn(entry.pattern, state);
          return inner === entry.pattern ? entry : { ...entry, pattern: inner };
        }
      );
      const unchanged =
        (positional ?? []).every((entry, i) => entry === pattern.positional?.[i]) &&
        (properties ?? []).every((entry, i) => entry === pattern.properties?.[i]);
      return unchanged ? pattern : { ...pattern, positional, properties };
    }
    case 'notPattern':
    case 'parenthesizedPattern': {
      const inner = replaceIn(pattern.pattern, state);
      return inner === pattern.pattern ? pattern : { ...pattern, pattern: inner };
    }
    case 'andPattern': {
      const left = replaceIn(pattern.left, state);
      const right = replaceIn(pattern.right, state);
      return left === pattern.left && right === pattern.right
        ? pattern
        : { ...pattern, left, right };
    }
    case 'varPattern':
    case 'declarationPattern':
    case 'constantPattern':
    case 'relationalPattern':
    case 'typePattern':
    case 'discardPattern':
      return pattern;
  }
}

/**
 * Returns `root` with the node `target` (matched by identity) swapped for
 * `replacement`. Untouched branches are shared with the input.
 *
 * @throws {RewriteInvariantError} When `target` is not inside `root`
 */
export function replacePattern(
  root: Pattern,
  target: Pattern,
  replacement: Pattern
): Pattern {
  const state: Replacement = { target, replacement, found: false };
  const result = replaceIn(root, state);
  assertInvariant(state.found, 'Pattern to replace is not part of the tree.');
  return result;
}
