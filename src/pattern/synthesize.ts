import type {
  ComparisonOperator,
  Expression,
  Pattern,
  RelationalOperator,
  Subpattern
} from '../types';
import type { Target } from '../receiver/classify';

import { assertInvariant } from '../report';
import {
  constantPattern,
  notPattern,
  recursivePattern,
  relationalPattern,
  subpattern,
  typePattern
} from '../syntax/factory';

const FLIPPED_OPERATORS: Readonly<Record<RelationalOperator, RelationalOperator>> = {
  '<': '>',
  '<=': '>=',
  '>': '<',
  '>=': '<='
};

function createConstantPattern(
  operator: ComparisonOperator,
  value: Expression,
  flipped: boolean
): Pattern {
  switch (operator) {
    case '==':
      return constantPattern(value);
    case '!=':
      return notPattern(constantPattern(value));
    default:
      return relationalPattern(
        flipped ? FLIPPED_OPERATORS[operator] : operator,
        value
      );
  }
}

/**
 * Builds the pattern a classified target stands for.
 *
 * - constant: `== c` → `c`, `!= c` → `not c`, `< c` → `< c` (inverted when
 *   the constant was on the left: `5 < x` is `x > 5`)
 * - type: `T`
 * - pattern: unchanged
 */
export function createPattern(target: Target, flipped: boolean): Pattern {
  switch (target.kind) {
    case 'constant':
      return createConstantPattern(target.operator, target.value, flipped);
    case 'type':
      return typePattern(target.type);
    case 'pattern':
      return target.pattern;
  }
}

/**
 * Nests `pattern` under root-to-leaf `names`: `['a', 'b']` over `P` is the
 * subpattern `a: { b: P }`.
 */
export function createSubpattern(
  names: readonly string[],
  pattern: Pattern
): Subpattern {
  assertInvariant(names.length > 0, 'Cannot create a subpattern without a name.');

  let current = subpattern(names[names.length - 1], pattern);
  for (let index = names.length - 2; index >= 0; index--) {
    current = subpattern(
      names[index],
      recursivePattern({ properties: [current] })
    );
  }
  return current;
}

/**
 * The fragment to merge at a receiver position: `{ a: { b: P } }` for
 * `['a', 'b']`, or `P` itself when there are no names.
 */
export function wrapInSubpatterns(
  names: readonly string[],
  pattern: Pattern
): Pattern {
  if (names.length === 0) return pattern;
  return recursivePattern({ properties: [createSubpattern(names, pattern)] });
}
