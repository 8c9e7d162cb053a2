import type {
  BinaryExpression,
  CasePatternSwitchLabel,
  ComparisonOperator,
  Pattern,
  PatternOfKind,
  SwitchExpressionArm,
  SyntaxKind,
  SyntaxNode,
  WhenClause
} from './types';

/**
 * Every node kind of the syntax model.
 *
 * `satisfies` keeps the table exhaustive: adding a variant to
 * {@link SyntaxNode} fails compilation until it is listed here.
 */
const SYNTAX_KINDS = {
  identifier: true,
  this: true,
  literal: true,
  memberAccess: true,
  memberBinding: true,
  conditionalAccess: true,
  invocation: true,
  parenthesized: true,
  logicalNot: true,
  binary: true,
  isType: true,
  isPattern: true,
  switchExpression: true,
  opaque: true,
  varPattern: true,
  declarationPattern: true,
  recursivePattern: true,
  constantPattern: true,
  relationalPattern: true,
  typePattern: true,
  notPattern: true,
  andPattern: true,
  parenthesizedPattern: true,
  discardPattern: true,
  subpattern: true,
  singleDesignation: true,
  discardDesignation: true,
  parenthesizedDesignation: true,
  typeName: true,
  whenClause: true,
  casePatternLabel: true,
  defaultLabel: true,
  switchArm: true,
  switchSection: true,
  switchStatement: true,
  ifStatement: true,
  returnStatement: true,
  expressionStatement: true,
  block: true
} as const satisfies Record<SyntaxKind, true>;

const PATTERN_KINDS = new Set<string>([
  'varPattern',
  'declarationPattern',
  'recursivePattern',
  'constantPattern',
  'relationalPattern',
  'typePattern',
  'notPattern',
  'andPattern',
  'parenthesizedPattern',
  'discardPattern'
] satisfies Pattern['kind'][]);

const COMPARISON_OPERATORS = new Set<string>([
  '==',
  '!=',
  '<',
  '<=',
  '>',
  '>='
] satisfies ComparisonOperator[]);

/**
 * Checks whether a value is an array.
 *
 * Wrapper around `Array.isArray` that acts as a TypeScript **type guard**
 * (`value is T[]`). Note: `T` is not validated at runtime.
 */
export function isArray<T = unknown>(value: unknown): value is T[] {
  return Array.isArray(value);
}

/**
 * Narrowing helper for "object-like" values.
 *
 * Many type guards start from `unknown`. This helper provides a safe first step:
 * it checks that the value is a non-null object so properties can be read without
 * runtime errors and without type assertions.
 */
export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

/**
 * Determines whether a value is a "plain object" (a simple POJO / dictionary
 * object): non-null, `typeof "object"`, and a prototype of either
 * `Object.prototype` or `null`.
 *
 * Syntax nodes are always plain objects, which is what lets path traversal
 * and equivalence walk them generically.
 */
export function isPlainObject<T = unknown>(
  value: unknown
): value is Record<PropertyKey, T> {
  if (typeof value !== 'object' || value === null) return false;

  const proto = Object.getPrototypeOf(value);
  return proto === null || proto === Object.prototype;
}

/**
 * Checks whether a runtime value is “node-like” enough to be treated as a
 * syntax node: a plain object whose `kind` discriminator is a known kind.
 *
 * This is a shallow bridge guard; the children are not validated.
 */
export function isSyntaxNode(value: unknown): value is SyntaxNode {
  return (
    isPlainObject(value) &&
    typeof value.kind === 'string' &&
    Object.hasOwn(SYNTAX_KINDS, value.kind)
  );
}

export function isPattern(node: SyntaxNode): node is Pattern {
  return PATTERN_KINDS.has(node.kind);
}

/**
 * Narrows a pattern to the variant of the given `kind`.
 */
export function isPatternKind<K extends Pattern['kind']>(
  pattern: Pattern,
  kind: K
): pattern is PatternOfKind<K> {
  return pattern.kind === kind;
}

export function isComparisonOperator(
  operator: string
): operator is ComparisonOperator {
  return COMPARISON_OPERATORS.has(operator);
}

export function isLogicalAnd(
  node: SyntaxNode
): node is BinaryExpression & { operator: '&&' } {
  return node.kind === 'binary' && node.operator === '&&';
}

/**
 * Nodes that own a pattern and an optional when clause: the two guard
 * locations the rewrite understands.
 */
export function isGuardOwner(
  node: SyntaxNode
): node is CasePatternSwitchLabel | SwitchExpressionArm {
  return node.kind === 'casePatternLabel' || node.kind === 'switchArm';
}

export function hasWhenClause<T extends { whenClause?: WhenClause }>(
  node: T
): node is T & { whenClause: WhenClause } {
  return node.whenClause !== undefined;
}
