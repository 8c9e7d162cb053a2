import type {
  Expression,
  IdentifierName,
  LiteralValue,
  MemberAccessExpression,
  MemberBindingExpression
} from './syntax';

/**
 * Represents a successful constant evaluation.
 *
 * Note:
 * `value` may legitimately be `null` (the `null` literal is a constant);
 * this is distinct from failure (`success: false`).
 */
export type ConstantSuccess<T = LiteralValue> = {
  success: true;
  value: T;
};

/**
 * Represents a failed constant evaluation: the expression has no value known
 * at compile time. Failure carries no payload.
 */
export type ConstantFailure = {
  success: false;
};

export type ConstantResult<T = LiteralValue> =
  | ConstantSuccess<T>
  | ConstantFailure;

export type SymbolKind =
  | 'field'
  | 'property'
  | 'method'
  | 'event'
  | 'local'
  | 'parameter'
  | 'type'
  | 'namespace';

/**
 * What the semantic model knows about the symbol a name binds to.
 */
export type SymbolInfo = {
  kind: SymbolKind;
  isStatic: boolean;

  /**
   * `true` when the symbol is declared on a wrapper-of-nullable type
   * (e.g. `HasValue` / `Value` of a nullable value type). Such members never
   * become subpatterns since the pattern would test the underlying value.
   */
  containingTypeIsNullableWrapper: boolean;
};

/** Expression nodes that carry a member or local name. */
export type NameReference =
  | IdentifierName
  | MemberAccessExpression
  | MemberBindingExpression;

/**
 * The semantic oracle supplied by the host.
 *
 * Contract:
 * - Answers must be stable for the same node; the rewrite memoizes them per
 *   call through a semantic session.
 * - Both queries must be pure and may be called concurrently.
 */
export interface SemanticModel {
  getConstantValue(expression: Expression): ConstantResult;
  getSymbolInfo(name: NameReference): SymbolInfo | undefined;
}
