import type {
  ConstantResult,
  Expression,
  LiteralValue,
  NameReference,
  SemanticModel,
  SymbolInfo
} from '../types';

import { printExpression } from '../syntax/print';
import { UNRESOLVED, resolved } from './constants';

export type SymbolTable = {
  /**
   * Symbols by name. A member access, member binding or identifier resolves
   * to the entry of its (last) name; names missing here have no symbol, which
   * is how locals and unknown names behave.
   */
  members?: Readonly<Record<string, SymbolInfo>>;

  /**
   * Named constants by their printed source form, e.g.
   * `{ 'Limits.Max': 10, Zero: 0 }`.
   */
  constants?: Readonly<Record<string, LiteralValue>>;
};

/** Shorthand for an instance field or property symbol. */
export function memberSymbol(
  kind: 'field' | 'property',
  overrides: Partial<Omit<SymbolInfo, 'kind'>> = {}
): SymbolInfo {
  return {
    kind,
    isStatic: false,
    containingTypeIsNullableWrapper: false,
    ...overrides
  };
}

/**
 * Evaluates an expression against the literal rules and the constant table.
 *
 * Supported forms:
 * 1. Literals: `1`, `"a"`, `true`, `null`.
 * 2. Parentheses around a constant.
 * 3. `!` over a boolean constant.
 * 4. Any expression whose printed form is listed in `constants`.
 */
function evaluate(
  expression: Expression,
  constants: Readonly<Record<string, LiteralValue>>
): ConstantResult {
  switch (expression.kind) {
    case 'literal':
      return resolved(expression.value);
    case 'parenthesized':
      return evaluate(expression.expression, constants);
    case 'logicalNot': {
      const operand = evaluate(expression.operand, constants);
      if (operand.success && typeof operand.value === 'boolean') {
        return resolved(!operand.value);
      }
      return UNRESOLVED;
    }
    default: {
      const key = printExpression(expression);
      return Object.hasOwn(constants, key) ? resolved(constants[key]) : UNRESOLVED;
    }
  }
}

/**
 * An in-memory {@link SemanticModel} backed by a symbol table.
 *
 * Suitable for hosts that already know their member and constant names, and
 * for tests. Lookups are by name only; the receiver type is not considered.
 */
export function createSymbolTableModel(table: SymbolTable = {}): SemanticModel {
  const members = table.members ?? {};
  const constants = table.constants ?? {};

  return {
    getConstantValue: expression => evaluate(expression, constants),
    getSymbolInfo: (name: NameReference) =>
      Object.hasOwn(members, name.name) ? members[name.name] : undefined
  };
}
