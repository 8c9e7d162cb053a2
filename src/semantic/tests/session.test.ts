import { describe, expect, test, vi } from 'vitest';

import type { NameReference, SemanticModel, SymbolInfo } from '../../types';
import type { TestScenario } from '../../tests/types';
import { RewriteInvariantError } from '../../report';
import { expr } from '../../tests/estree-utils';
import { identifier, literal, memberAccess, memberBinding } from '../../syntax/factory';
import { UNRESOLVED, resolved } from '../constants';
import { createSemanticSession } from '../session';
import { createSymbolTableModel, memberSymbol } from '../symbol-table-model';

/**
 * Test suite: semantic session and symbol table model.
 *
 * Coverage:
 * - Constant evaluation of literals, negations and named constants.
 * - Subpattern convertibility by symbol kind.
 * - Memoization by node identity.
 * - Rejection of contradictory symbol answers.
 */
describe('Semantic session', () => {
  const model = createSymbolTableModel({
    members: {
      Field: memberSymbol('field'),
      Prop: memberSymbol('property'),
      Shared: memberSymbol('property', { isStatic: true }),
      Value: memberSymbol('property', { containingTypeIsNullableWrapper: true }),
      Run: { kind: 'method', isStatic: false, containingTypeIsNullableWrapper: false },
      local: { kind: 'local', isStatic: false, containingTypeIsNullableWrapper: false }
    },
    constants: { 'Limits.Max': 10 }
  });

  describe('Constant values', () => {
    const scenarios: TestScenario<unknown>[] = [
      { id: 'Number', description: 'Numeric literal', code: '42', expected: resolved(42) },
      { id: 'Null', description: 'null literal', code: 'null', expected: resolved(null) },
      { id: 'Negation', description: '! over a boolean literal', code: '!true', expected: resolved(false) },
      { id: 'Named', description: 'Listed named constant', code: 'Limits.Max', expected: resolved(10) },
      { id: 'Unlisted', description: 'Unlisted member access', code: 'a.b', expected: UNRESOLVED },
      { id: 'Negated Name', description: '! over a non-constant', code: '!a', expected: UNRESOLVED }
    ];

    test.for(scenarios)('[$id] $description', ({ code, expected }) => {
      const session = createSemanticSession(model);
      expect(session.getConstantValue(expr(code))).toEqual(expected);
    });
  });

  describe('Subpattern convertibility', () => {
    const scenarios: Array<{ id: string; name: NameReference; expected: boolean }> = [
      { id: 'Field', name: identifier('Field'), expected: true },
      { id: 'Property Access', name: memberAccess(identifier('a'), 'Prop'), expected: true },
      { id: 'Property Binding', name: memberBinding('Prop'), expected: true },
      { id: 'Static', name: identifier('Shared'), expected: false },
      { id: 'Nullable Wrapper', name: memberAccess(identifier('n'), 'Value'), expected: false },
      { id: 'Method', name: identifier('Run'), expected: false },
      { id: 'Local', name: identifier('local'), expected: false },
      { id: 'Unknown', name: identifier('missing'), expected: false }
    ];

    test.for(scenarios)('[$id] converts: $expected', ({ name, expected }) => {
      const session = createSemanticSession(model);
      expect(session.canConvertToSubpattern(name)).toBe(expected);
    });
  });

  test('asks the model once per node', () => {
    const getConstantValue = vi.fn<SemanticModel['getConstantValue']>(() => UNRESOLVED);
    const getSymbolInfo = vi.fn<SemanticModel['getSymbolInfo']>(() => undefined);
    const session = createSemanticSession({ getConstantValue, getSymbolInfo });

    const node = identifier('x');
    session.hasConstantValue(node);
    session.getConstantValue(node);
    session.canConvertToSubpattern(node);
    session.getSymbolInfo(node);

    expect(getConstantValue).toHaveBeenCalledTimes(1);
    expect(getSymbolInfo).toHaveBeenCalledTimes(1);

    // A structurally equal but distinct node is a new question.
    session.getConstantValue(identifier('x'));
    expect(getConstantValue).toHaveBeenCalledTimes(2);
  });

  describe('Contradictory answers', () => {
    const scenarios: Array<{ id: string; info: SymbolInfo; message: string }> = [
      {
        id: 'Static Local',
        info: { kind: 'local', isStatic: true, containingTypeIsNullableWrapper: false },
        message: '[recursive-patterns] Semantic model reported local `x` as static.'
      },
      {
        id: 'Static Parameter',
        info: { kind: 'parameter', isStatic: true, containingTypeIsNullableWrapper: false },
        message: '[recursive-patterns] Semantic model reported parameter `x` as static.'
      },
      {
        id: 'Wrapped Type',
        info: { kind: 'type', isStatic: false, containingTypeIsNullableWrapper: true },
        message: '[recursive-patterns] Semantic model reported type `x` as declared on a nullable wrapper.'
      }
    ];

    test.for(scenarios)('[$id] is rejected', ({ info, message }) => {
      const session = createSemanticSession({
        getConstantValue: () => UNRESOLVED,
        getSymbolInfo: () => info
      });

      expect(() => session.canConvertToSubpattern(identifier('x'))).toThrow(RewriteInvariantError);
      expect(() => createSemanticSession({
        getConstantValue: () => UNRESOLVED,
        getSymbolInfo: () => info
      }).getSymbolInfo(identifier('x'))).toThrow(message);
    });
  });

  test('treats the literal in a comparison as the only constant', () => {
    const session = createSemanticSession(model);
    const comparison = expr('a.Prop == 1');
    if (comparison.kind !== 'binary') throw new Error('Expected a binary expression.');

    expect(session.hasConstantValue(comparison.left)).toBe(false);
    expect(session.hasConstantValue(comparison.right)).toBe(true);
    expect(session.getConstantValue(literal(1))).toEqual(resolved(1));
  });
});
