import { describe, expect, test } from 'vitest';

import type { Pattern } from '../../types';
import { expr } from '../../tests/estree-utils';
import {
  andPattern,
  constantPattern,
  declarationPattern,
  discardDesignation,
  literal,
  parenthesizedDesignation,
  parenthesizedPattern,
  recursivePattern,
  singleDesignation,
  subpattern,
  typeName,
  varPattern
} from '../../syntax/factory';
import { createSemanticSession } from '../../semantic/session';
import { createSymbolTableModel, memberSymbol } from '../../semantic/symbol-table-model';
import { collectDesignationNames, findVariableDesignation } from '../designation';

/**
 * Test suite: binding lookup inside patterns.
 *
 * Coverage:
 * - Source-order walk over every pattern form.
 * - Lookup through var, declaration and recursive owners.
 * - Receivers that are not bindings.
 */
describe('Designation search', () => {
  const model = createSymbolTableModel({
    members: {
      P: memberSymbol('property'),
      Q: memberSymbol('property')
    }
  });

  const varV = varPattern(singleDesignation('v'));
  const declC = declarationPattern(typeName('C'), singleDesignation('c'));
  const tree = recursivePattern({
    type: typeName('T'),
    properties: [subpattern('P', varV), subpattern('Q', declC)],
    designation: singleDesignation('r')
  });

  test('walks designations in source order', () => {
    const pattern: Pattern = recursivePattern({
      type: typeName('C'),
      positional: [varPattern(singleDesignation('a'))],
      properties: [
        subpattern('P', varPattern(parenthesizedDesignation([singleDesignation('b'), discardDesignation()]))),
        subpattern(
          'Q',
          andPattern(
            parenthesizedPattern(varPattern(singleDesignation('c'))),
            parenthesizedPattern(constantPattern(literal(1)))
          )
        )
      ],
      designation: singleDesignation('d')
    });

    expect(collectDesignationNames(pattern)).toEqual(['a', 'b', 'c', 'd']);
  });

  describe('findVariableDesignation', () => {
    const find = (code: string, pattern: Pattern = tree) =>
      findVariableDesignation(pattern, expr(code), createSemanticSession(model));

    test('finds a var binding and the names read through it', () => {
      const match = find('v.Q');
      expect(match?.containing).toBe(varV);
      expect(match?.names).toEqual(['Q']);
    });

    test('finds a declaration binding', () => {
      const match = find('c.P.Q');
      expect(match?.containing).toBe(declC);
      expect(match?.designation.name).toBe('c');
      expect(match?.names).toEqual(['P', 'Q']);
    });

    test('finds the designation of the recursive pattern itself', () => {
      const match = find('r.P');
      expect(match?.containing).toBe(tree);
      expect(match?.names).toEqual(['P']);
    });

    test('a bare binding reads no names', () => {
      expect(find('c')?.names).toEqual([]);
    });

    test.for([
      ['w.P', 'an unknown local'],
      ['this.P', 'an explicit this receiver'],
      ['P', 'an implicit self receiver'],
      ['f(c).P', 'a call receiver']
    ])('no match for %s (%s)', ([code]) => {
      expect(find(code)).toBeUndefined();
    });

    test('a binding inside a parenthesized designation is not usable', () => {
      const pattern = varPattern(parenthesizedDesignation([singleDesignation('x'), singleDesignation('y')]));
      expect(find('y.P', pattern)).toBeUndefined();
    });
  });
});
