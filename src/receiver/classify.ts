import type {
  BinaryExpression,
  ComparisonOperator,
  ConstantPattern,
  Expression,
  IsPatternExpression,
  Pattern,
  TypeName
} from '../types';
import type { SemanticSession } from '../semantic/session';

import { isComparisonOperator } from '../guards';
import { constantPattern, falseLiteral, trueLiteral } from '../syntax/factory';

/**
 * Process-wide `true` / `false` constant patterns. Bare boolean operands are
 * compared against these. Frozen; never mutated.
 */
export const TRUE_CONSTANT_PATTERN: ConstantPattern = Object.freeze(
  constantPattern(trueLiteral())
);
export const FALSE_CONSTANT_PATTERN: ConstantPattern = Object.freeze(
  constantPattern(falseLiteral())
);

/** The constant operand of a comparison. */
export type ConstantTarget = {
  kind: 'constant';
  operator: ComparisonOperator;
  value: Expression;
};

/** The type of an `e is T` test. */
export type TypeTarget = {
  kind: 'type';
  type: TypeName;
};

/**
 * An existing pattern: the pattern of an `e is <pattern>` test (with its
 * source expression) or one of the boolean constant patterns.
 */
export type PatternTarget = {
  kind: 'pattern';
  pattern: Pattern;
  source?: IsPatternExpression;
};

export type Target = ConstantTarget | TypeTarget | PatternTarget;

/**
 * One boolean test, split into what it is about and what it checks.
 */
export type ClassifiedTerm = {
  /** The operand that was consumed (the comparison, `is` test or bare boolean). */
  term: Expression;
  receiver: Expression;
  target: Target;

  /**
   * The constant was the left operand, so a relational operator must be
   * inverted once the receiver moves to the left of the pattern.
   */
  flipped: boolean;
};

/**
 * Which `&&` operand is the near side:
 * - `logicalAnd`: the right operand. `&&` is left-associative, so with the
 *   cursor on the second operator of `x && a && b` the left operand is
 *   `x && a` and its right operand `a` is the one that appears on the left.
 * - `whenClause`: the left-most operand, read left to right.
 */
export type ClassifyMode = 'logicalAnd' | 'whenClause';

function classifyComparison(
  node: BinaryExpression,
  operator: ComparisonOperator,
  session: SemanticSession
): ClassifiedTerm | undefined {
  const leftIsConstant = session.hasConstantValue(node.left);
  const rightIsConstant = session.hasConstantValue(node.right);

  // Exactly one side must be constant.
  if (leftIsConstant === rightIsConstant) return undefined;

  return leftIsConstant
    ? {
        term: node,
        receiver: node.right,
        target: { kind: 'constant', operator, value: node.left },
        flipped: true
      }
    : {
        term: node,
        receiver: node.left,
        target: { kind: 'constant', operator, value: node.right },
        flipped: false
      };
}

/**
 * Classifies one side of a boolean test as `(receiver, target, flipped)`.
 *
 * Rules, in priority order:
 * 1. Comparisons: the constant operand is the target, the other the receiver.
 * 2. `&&`: recurse into the near operand (see {@link ClassifyMode}).
 *    Parenthesized operands are not entered.
 * 3. `e is T` / `e is <pattern>`: `e` against the type or pattern.
 * 4. `!e`: `e` against `false`.
 * 5. Anything else: the expression against `true`.
 *
 * @returns The classification, or `undefined` when a comparison has no
 *          (or two) constant operands.
 */
export function classifyTerm(
  node: Expression,
  session: SemanticSession,
  mode: ClassifyMode = 'logicalAnd'
): ClassifiedTerm | undefined {
  switch (node.kind) {
    case 'binary': {
      if (isComparisonOperator(node.operator)) {
        return classifyComparison(node, node.operator, session);
      }
      if (node.operator === '&&') {
        return classifyTerm(
          mode === 'whenClause' ? node.left : node.right,
          session,
          mode
        );
      }
      break;
    }
    case 'isType':
      return {
        term: node,
        receiver: node.expression,
        target: { kind: 'type', type: node.type },
        flipped: false
      };
    case 'isPattern':
      return {
        term: node,
        receiver: node.expression,
        target: { kind: 'pattern', pattern: node.pattern, source: node },
        flipped: false
      };
    case 'logicalNot':
      return {
        term: node,
        receiver: node.operand,
        target: { kind: 'pattern', pattern: FALSE_CONSTANT_PATTERN },
        flipped: false
      };
  }

  return {
    term: node,
    receiver: node,
    target: { kind: 'pattern', pattern: TRUE_CONSTANT_PATTERN },
    flipped: false
  };
}
