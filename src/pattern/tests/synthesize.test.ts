import { describe, expect, test } from 'vitest';

import type { Target } from '../../receiver/classify';
import { TRUE_CONSTANT_PATTERN } from '../../receiver/classify';
import { RewriteInvariantError } from '../../report';
import { literal, typeName } from '../../syntax/factory';
import { printPattern } from '../../syntax/print';
import { createPattern, createSubpattern, wrapInSubpatterns } from '../synthesize';

/**
 * Test suite: pattern synthesis.
 *
 * Coverage:
 * - Constant, relational, type and pattern targets.
 * - Relational inversion for flipped comparisons.
 * - Nesting of name sequences.
 */
describe('Pattern synthesizer', () => {
  describe('createPattern', () => {
    const five = literal(5);

    const scenarios: Array<{ id: string; target: Target; flipped: boolean; expected: string }> = [
      { id: 'Equal', target: { kind: 'constant', operator: '==', value: five }, flipped: false, expected: '5' },
      { id: 'Equal Flipped', target: { kind: 'constant', operator: '==', value: five }, flipped: true, expected: '5' },
      { id: 'Not Equal', target: { kind: 'constant', operator: '!=', value: five }, flipped: true, expected: 'not 5' },
      { id: 'Less', target: { kind: 'constant', operator: '<', value: five }, flipped: false, expected: '< 5' },
      { id: 'Less Flipped', target: { kind: 'constant', operator: '<', value: five }, flipped: true, expected: '> 5' },
      { id: 'At Most Flipped', target: { kind: 'constant', operator: '<=', value: five }, flipped: true, expected: '>= 5' },
      { id: 'Greater Flipped', target: { kind: 'constant', operator: '>', value: five }, flipped: true, expected: '< 5' },
      { id: 'At Least Flipped', target: { kind: 'constant', operator: '>=', value: five }, flipped: true, expected: '<= 5' },
      { id: 'Type', target: { kind: 'type', type: typeName('C') }, flipped: false, expected: 'C' },
      { id: 'Pattern', target: { kind: 'pattern', pattern: TRUE_CONSTANT_PATTERN }, flipped: false, expected: 'true' }
    ];

    test.for(scenarios)('[$id] gives $expected', ({ target, flipped, expected }) => {
      expect(printPattern(createPattern(target, flipped))).toBe(expected);
    });

    test('returns a pattern target unchanged', () => {
      expect(createPattern({ kind: 'pattern', pattern: TRUE_CONSTANT_PATTERN }, false)).toBe(
        TRUE_CONSTANT_PATTERN
      );
    });
  });

  describe('Subpatterns', () => {
    const one = createPattern({ kind: 'constant', operator: '==', value: literal(1) }, false);

    test('nests root-to-leaf names', () => {
      expect(printPattern(wrapInSubpatterns(['a', 'b', 'c'], one))).toBe('{ a: { b: { c: 1 } } }');
      expect(createSubpattern(['a', 'b'], one).name).toBe('a');
    });

    test('a single name is a single entry', () => {
      expect(printPattern(wrapInSubpatterns(['P'], one))).toBe('{ P: 1 }');
    });

    test('no names leave the pattern as it is', () => {
      expect(wrapInSubpatterns([], one)).toBe(one);
    });

    test('a subpattern needs a name', () => {
      expect(() => createSubpattern([], one)).toThrow(RewriteInvariantError);
    });
  });
});
