import type {
  ConstantResult,
  Expression,
  NameReference,
  SemanticModel,
  SymbolInfo
} from '../types';

import { assertInvariant } from '../report';
import { printExpression } from '../syntax/print';

/**
 * Request-scoped view of the host's semantic model.
 *
 * One session lives for one rewrite call. It memoizes every answer by node
 * identity so the rewrite sees a stable answer for a node within the call,
 * and it rejects symbol answers that contradict themselves.
 */
export type SemanticSession = {
  getConstantValue(expression: Expression): ConstantResult;
  hasConstantValue(expression: Expression): boolean;
  getSymbolInfo(name: NameReference): SymbolInfo | undefined;

  /**
   * Whether a name can become a property subpattern: it must bind a
   * non-static field or property whose containing type is not a
   * wrapper-of-nullable type.
   */
  canConvertToSubpattern(name: NameReference): boolean;
};

const MEMBER_KINDS: ReadonlySet<SymbolInfo['kind']> = new Set([
  'field',
  'property',
  'method',
  'event'
]);

/**
 * Rejects contradictory symbol answers.
 *
 * - Locals and parameters are never static.
 * - Only members have a containing type, so only members can be declared on
 *   a wrapper-of-nullable type.
 */
function assertConsistentSymbol(name: NameReference, info: SymbolInfo): void {
  const where = `\`${printExpression(name)}\``;

  assertInvariant(
    !(info.isStatic && (info.kind === 'local' || info.kind === 'parameter')),
    `Semantic model reported ${info.kind} ${where} as static.`
  );
  assertInvariant(
    !(info.containingTypeIsNullableWrapper && !MEMBER_KINDS.has(info.kind)),
    `Semantic model reported ${info.kind} ${where} as declared on a nullable wrapper.`
  );
}

export function createSemanticSession(model: SemanticModel): SemanticSession {
  const constants = new WeakMap<Expression, ConstantResult>();
  const symbols = new WeakMap<NameReference, SymbolInfo | null>();

  const getConstantValue = (expression: Expression): ConstantResult => {
    const cached = constants.get(expression);
    if (cached) return cached;

    const result = model.getConstantValue(expression);
    constants.set(expression, result);
    return result;
  };

  const getSymbolInfo = (name: NameReference): SymbolInfo | undefined => {
    const cached = symbols.get(name);
    if (cached !== undefined) return cached ?? undefined;

    const info = model.getSymbolInfo(name);
    if (info) assertConsistentSymbol(name, info);

    // `null` records "asked, no symbol" so the model is asked once per node.
    symbols.set(name, info ?? null);
    return info;
  };

  return {
    getConstantValue,
    hasConstantValue: expression => getConstantValue(expression).success,
    getSymbolInfo,
    canConvertToSubpattern: name => {
      const info = getSymbolInfo(name);
      return (
        info !== undefined &&
        !info.isStatic &&
        (info.kind === 'field' || info.kind === 'property') &&
        !info.containingTypeIsNullableWrapper
      );
    }
  };
}
