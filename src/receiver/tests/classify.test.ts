import { describe, expect, test } from 'vitest';

import type { TestScenario } from '../../tests/types';
import type { ClassifyMode } from '../classify';
import { expr } from '../../tests/estree-utils';
import {
  declarationPattern,
  isPatternExpression,
  logicalAnd,
  parenthesized,
  singleDesignation,
  typeName
} from '../../syntax/factory';
import { printExpression, printPattern } from '../../syntax/print';
import { createSemanticSession } from '../../semantic/session';
import { createSymbolTableModel, memberSymbol } from '../../semantic/symbol-table-model';
import { FALSE_CONSTANT_PATTERN, TRUE_CONSTANT_PATTERN, classifyTerm } from '../classify';

/**
 * A classification flattened to printed text so scenarios stay readable.
 */
type PrintedTerm = {
  term: string;
  receiver: string;
  target: string;
  flipped: boolean;
} | undefined;

/**
 * Test suite: term classification.
 *
 * Coverage:
 * - Constant side detection and flip correctness.
 * - `&&` recursion in both modes.
 * - Type tests, negation and bare boolean operands.
 */
describe('Term classifier', () => {
  const model = createSymbolTableModel({
    members: { Y: memberSymbol('property'), b: memberSymbol('property') },
    constants: { Max: 10 }
  });

  const classify = (code: string, mode?: ClassifyMode): PrintedTerm => {
    const result = classifyTerm(expr(code), createSemanticSession(model), mode);
    if (!result) return undefined;

    const { target } = result;
    return {
      term: printExpression(result.term),
      receiver: printExpression(result.receiver),
      target:
        target.kind === 'constant'
          ? `${target.operator} ${printExpression(target.value)}`
          : target.kind === 'type'
            ? `type ${target.type.name}`
            : `pattern ${printPattern(target.pattern)}`,
      flipped: result.flipped
    };
  };

  describe('Comparisons', () => {
    const scenarios: TestScenario<PrintedTerm>[] = [
      {
        id: 'Constant Right',
        description: 'Literal on the right is the target',
        code: 'x.Y == 5',
        expected: { term: 'x.Y == 5', receiver: 'x.Y', target: '== 5', flipped: false }
      },
      {
        id: 'Constant Left',
        description: 'Literal on the left is the target and flips',
        code: '5 == x.Y',
        expected: { term: '5 == x.Y', receiver: 'x.Y', target: '== 5', flipped: true }
      },
      {
        id: 'Named Constant',
        description: 'A named constant counts as constant',
        code: 'x.Y < Max',
        expected: { term: 'x.Y < Max', receiver: 'x.Y', target: '< Max', flipped: false }
      },
      {
        id: 'Relational Flipped',
        description: 'Relational comparison with the constant first',
        code: '0 <= x.Y',
        expected: { term: '0 <= x.Y', receiver: 'x.Y', target: '<= 0', flipped: true }
      },
      {
        id: 'No Constant',
        description: 'Neither operand is constant',
        code: 'x.Y == z',
        expected: undefined
      },
      {
        id: 'Both Constant',
        description: 'Both operands are constant',
        code: '1 == 2',
        expected: undefined
      }
    ];

    test.for(scenarios)('[$id] $description', ({ code, expected }) => {
      expect(classify(code)).toEqual(expected);
    });
  });

  describe('Other tests', () => {
    const scenarios: TestScenario<PrintedTerm>[] = [
      {
        id: 'Type Test',
        description: 'A type test targets its type',
        code: 'e instanceof C',
        expected: { term: 'e is C', receiver: 'e', target: 'type C', flipped: false }
      },
      {
        id: 'Negation',
        description: 'A negated operand is compared with false',
        code: '!x.b',
        expected: { term: '!x.b', receiver: 'x.b', target: 'pattern false', flipped: false }
      },
      {
        id: 'Bare Boolean',
        description: 'Any other operand is compared with true',
        code: 'x.b',
        expected: { term: 'x.b', receiver: 'x.b', target: 'pattern true', flipped: false }
      },
      {
        id: 'Or',
        description: '|| is an opaque boolean operand',
        code: 'p || q',
        expected: { term: 'p || q', receiver: 'p || q', target: 'pattern true', flipped: false }
      }
    ];

    test.for(scenarios)('[$id] $description', ({ code, expected }) => {
      expect(classify(code)).toEqual(expected);
    });
  });

  describe('Logical and', () => {
    const scenarios: TestScenario<PrintedTerm>[] = [
      {
        id: 'Right Operand',
        description: 'Plain mode reads the right operand',
        code: 'p && x.Y == 1',
        expected: { term: 'x.Y == 1', receiver: 'x.Y', target: '== 1', flipped: false }
      },
      {
        id: 'Nested Right Operand',
        description: 'Plain mode follows the right spine',
        code: 'p && q && 2 > x.Y',
        expected: { term: '2 > x.Y', receiver: 'x.Y', target: '> 2', flipped: true }
      }
    ];

    test.for(scenarios)('[$id] $description', ({ code, expected }) => {
      expect(classify(code)).toEqual(expected);
    });

    test('when-clause mode reads the left-most operand', () => {
      expect(classify('x.Y != null && p && q', 'whenClause')).toEqual({
        term: 'x.Y != null',
        receiver: 'x.Y',
        target: '!= null',
        flipped: false
      });
    });

    test('parenthesized operands are not entered', () => {
      const node = logicalAnd(expr('p'), parenthesized(expr('q && x.Y == 1')));
      const result = classifyTerm(node, createSemanticSession(model));

      expect(result?.receiver).toBe(node.right);
      expect(result?.target).toEqual({ kind: 'pattern', pattern: TRUE_CONSTANT_PATTERN });
    });
  });

  test('keeps the source of an is-pattern test', () => {
    const node = isPatternExpression(
      expr('e'),
      declarationPattern(typeName('C'), singleDesignation('c'))
    );
    const result = classifyTerm(node, createSemanticSession(model));

    expect(result?.target).toEqual({ kind: 'pattern', pattern: node.pattern, source: node });
    expect(result?.receiver).toBe(node.expression);
  });

  test('shares frozen boolean constant patterns', () => {
    expect(Object.isFrozen(TRUE_CONSTANT_PATTERN)).toBe(true);
    expect(Object.isFrozen(FALSE_CONSTANT_PATTERN)).toBe(true);
    expect(classifyTerm(expr('!a'), createSemanticSession(model))?.target).toEqual({
      kind: 'pattern',
      pattern: FALSE_CONSTANT_PATTERN
    });
  });
});
