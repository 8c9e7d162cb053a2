import { describe, expect, test } from 'vitest';

import type { Pattern } from '../../types';
import {
  andPattern,
  constantPattern,
  declarationPattern,
  discardPattern,
  identifier,
  literal,
  notPattern,
  parenthesizedDesignation,
  parenthesizedPattern,
  recursivePattern,
  relationalPattern,
  singleDesignation,
  typeName,
  typePattern,
  varPattern
} from '../../syntax/factory';
import { createSemanticSession } from '../../semantic/session';
import { createSymbolTableModel } from '../../semantic/symbol-table-model';
import { canFoldNullSafeTest, matchesNull } from '../null-match';

/**
 * Test suite: which patterns match `null`.
 *
 * Coverage:
 * - Each pattern kind, named constants and constants without a value.
 * - Negation and conjunction.
 * - The fold decision for null-safe tests.
 */
describe('Null matching', () => {
  const model = createSymbolTableModel({ constants: { None: null, Max: 10 } });
  const session = () => createSemanticSession(model);

  const one = constantPattern(literal(1));
  const unknown = constantPattern(identifier('Other'));

  const scenarios: Array<{ id: string; pattern: Pattern; expected: boolean | undefined }> = [
    { id: 'Var', pattern: varPattern(singleDesignation('x')), expected: true },
    {
      id: 'Deconstruction',
      pattern: varPattern(parenthesizedDesignation([singleDesignation('x'), singleDesignation('y')])),
      expected: false
    },
    { id: 'Discard', pattern: discardPattern(), expected: true },
    { id: 'Null Literal', pattern: constantPattern(literal(null)), expected: true },
    { id: 'Named Null', pattern: constantPattern(identifier('None')), expected: true },
    { id: 'Named Value', pattern: constantPattern(identifier('Max')), expected: false },
    { id: 'Unknown Constant', pattern: unknown, expected: undefined },
    { id: 'Value', pattern: one, expected: false },
    { id: 'Relational', pattern: relationalPattern('>', literal(0)), expected: false },
    { id: 'Type', pattern: typePattern(typeName('C')), expected: false },
    { id: 'Declaration', pattern: declarationPattern(typeName('C'), singleDesignation('c')), expected: false },
    { id: 'Empty Property Clause', pattern: recursivePattern({}), expected: false },
    { id: 'Not Value', pattern: notPattern(one), expected: true },
    { id: 'Not Null', pattern: notPattern(constantPattern(literal(null))), expected: false },
    { id: 'Not Unknown', pattern: notPattern(unknown), expected: undefined },
    { id: 'And Rejecting', pattern: andPattern(notPattern(one), one), expected: false },
    { id: 'And Unknown', pattern: andPattern(discardPattern(), unknown), expected: undefined },
    { id: 'Parenthesized', pattern: parenthesizedPattern(notPattern(one)), expected: true }
  ];

  test.for(scenarios)('[$id] gives $expected', ({ pattern, expected }) => {
    expect(matchesNull(pattern, session())).toBe(expected);
  });

  describe('canFoldNullSafeTest', () => {
    test('any pattern folds without null-safe access', () => {
      expect(canFoldNullSafeTest(notPattern(one), false, session())).toBe(true);
    });

    test.for([
      { id: 'Rejects Null', pattern: one, expected: true },
      { id: 'Matches Null', pattern: notPattern(one), expected: false },
      { id: 'Unknown', pattern: unknown, expected: false }
    ])('[$id] under null-safe access gives $expected', ({ pattern, expected }) => {
      expect(canFoldNullSafeTest(pattern, true, session())).toBe(expected);
    });
  });
});
