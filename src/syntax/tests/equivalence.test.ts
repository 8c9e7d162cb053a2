import { describe, expect, test } from 'vitest';

import type { RecursivePattern } from '../../types';
import type { TestScenario } from '../../tests/types';
import { expr } from '../../tests/estree-utils';
import { areEquivalent, findFirstDifference } from '../equivalence';
import { recursivePattern, typeName, withAnnotations } from '../factory';

/**
 * Test suite: structural equivalence.
 *
 * Coverage:
 * - Equal and differing fragments.
 * - Annotation and undefined-key neutrality.
 * - First-difference paths.
 */
describe('Structural equivalence', () => {
  describe('Fragments', () => {
    const scenarios: TestScenario<{ other: string; equivalent: boolean }>[] = [
      {
        id: 'Same',
        description: 'Identical member chains are equivalent',
        code: 'a.b.c',
        expected: { other: 'a.b.c', equivalent: true }
      },
      {
        id: 'Operator Spelling',
        description: '=== and == lower to the same operator',
        code: 'a === 1',
        expected: { other: 'a == 1', equivalent: true }
      },
      {
        id: 'Name',
        description: 'Different member names differ',
        code: 'a.b',
        expected: { other: 'a.c', equivalent: false }
      },
      {
        id: 'Null Safety',
        description: 'Null-safe and plain access differ',
        code: 'a?.b',
        expected: { other: 'a.b', equivalent: false }
      },
      {
        id: 'Literal Type',
        description: 'The number 1 and the string "1" differ',
        code: "x == '1'",
        expected: { other: 'x == 1', equivalent: false }
      }
    ];

    test.for(scenarios)('[$id] $description', ({ code, expected }) => {
      expect(areEquivalent(expr(code), expr(expected.other))).toBe(expected.equivalent);
    });
  });

  test('ignores annotations', () => {
    const plain = expr('a.b == 1');
    const tagged = withAnnotations(expr('a.b == 1'), 'format');

    expect(tagged.annotations).toEqual(['format']);
    expect(areEquivalent(plain, tagged)).toBe(true);
  });

  test('treats undefined-valued keys as absent', () => {
    const withUndefined: RecursivePattern = {
      kind: 'recursivePattern',
      type: undefined,
      properties: []
    };

    expect(areEquivalent(withUndefined, recursivePattern({ properties: [] }))).toBe(true);
    expect(areEquivalent(withUndefined, recursivePattern({ type: typeName('C'), properties: [] }))).toBe(false);
  });

  test('reports the path of the first difference', () => {
    expect(findFirstDifference(expr('a.b == 1'), expr('a.c == 1'))).toEqual(['left', 'name']);
    expect(findFirstDifference(expr('f(1, 2)'), expr('f(1, 3)'))).toEqual(['arguments', 1, 'value']);
    expect(findFirstDifference(expr('a.b'), expr('a.b'))).toBeUndefined();
  });
});
