import type { Pattern } from '../types';
import type { SemanticSession } from '../semantic/session';
import type { NullSafeChainConcept } from '../architecture';

/**
 * Whether `pattern` matches a `null` input.
 *
 * - `var x`, `_`: yes
 * - constant: only the `null` constant
 * - type, declaration, relational and recursive patterns: no
 * - `not P`: the opposite of `P`
 *
 * @returns `undefined` when that depends on a constant without a known value
 */
export function matchesNull(
  pattern: Pattern,
  session: SemanticSession
): boolean | undefined {
  switch (pattern.kind) {
    case 'varPattern':
      // `var (x, y)` deconstructs and fails on null.
      return pattern.designation.kind !== 'parenthesizedDesignation';
    case 'discardPattern':
      return true;
    case 'constantPattern': {
      const constant = session.getConstantValue(pattern.expression);
      return constant.success ? constant.value === null : undefined;
    }
    case 'declarationPattern':
    case 'recursivePattern':
    case 'relationalPattern':
    case 'typePattern':
      return false;
    case 'notPattern': {
      const inner = matchesNull(pattern.pattern, session);
      return inner === undefined ? undefined : !inner;
    }
    case 'andPattern': {
      const left = matchesNull(pattern.left, session);
      const right = matchesNull(pattern.right, session);
      if (left === false || right === false) return false;
      return left && right ? true : undefined;
    }
    case 'parenthesizedPattern':
      return matchesNull(pattern.pattern, session);
  }
}

/**
 * A test read through `?.` may only move into a property pattern when its
 * pattern rejects `null`; see {@link NullSafeChainConcept}.
 */
export function canFoldNullSafeTest(
  pattern: Pattern,
  nullSafe: boolean,
  session: SemanticSession
): boolean {
  return !nullSafe || matchesNull(pattern, session) === false;
}
