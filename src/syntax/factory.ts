import type {
  AndPattern,
  Annotation,
  BinaryExpression,
  BinaryOperator,
  Block,
  CasePatternSwitchLabel,
  ConditionalAccessExpression,
  ConstantPattern,
  DeclarationPattern,
  DefaultSwitchLabel,
  DiscardDesignation,
  DiscardPattern,
  Expression,
  ExpressionStatement,
  IdentifierName,
  IfStatement,
  InvocationExpression,
  IsPatternExpression,
  IsTypeExpression,
  LiteralExpression,
  LiteralValue,
  LogicalNotExpression,
  MemberAccessExpression,
  MemberBindingExpression,
  NotPattern,
  OpaqueExpression,
  ParenthesizedExpression,
  ParenthesizedPattern,
  ParenthesizedVariableDesignation,
  Pattern,
  RecursivePattern,
  RelationalOperator,
  RelationalPattern,
  ReturnStatement,
  SingleVariableDesignation,
  Statement,
  Subpattern,
  SwitchExpression,
  SwitchExpressionArm,
  SwitchLabel,
  SwitchSection,
  SwitchStatement,
  ThisExpression,
  TypeName,
  TypePattern,
  VarPattern,
  VariableDesignation,
  WhenClause
} from '../types';

/**
 * Node constructors.
 *
 * Optional parts are omitted from the created object rather than set to
 * `undefined`, so a created node and an equivalent hand-written literal have
 * the same own keys.
 */

export const identifier = (name: string): IdentifierName => ({
  kind: 'identifier',
  name
});

export const thisExpression = (): ThisExpression => ({ kind: 'this' });

export const literal = (value: LiteralValue): LiteralExpression => ({
  kind: 'literal',
  value
});

export const trueLiteral = (): LiteralExpression => literal(true);

export const falseLiteral = (): LiteralExpression => literal(false);

export const memberAccess = (
  expression: Expression,
  name: string
): MemberAccessExpression => ({ kind: 'memberAccess', expression, name });

export const memberBinding = (name: string): MemberBindingExpression => ({
  kind: 'memberBinding',
  name
});

export const conditionalAccess = (
  expression: Expression,
  whenNotNull: Expression
): ConditionalAccessExpression => ({
  kind: 'conditionalAccess',
  expression,
  whenNotNull
});

export const invocation = (
  expression: Expression,
  args: readonly Expression[] = []
): InvocationExpression => ({ kind: 'invocation', expression, arguments: args });

export const parenthesized = (
  expression: Expression
): ParenthesizedExpression => ({ kind: 'parenthesized', expression });

export const logicalNot = (operand: Expression): LogicalNotExpression => ({
  kind: 'logicalNot',
  operand
});

export const binary = (
  operator: BinaryOperator,
  left: Expression,
  right: Expression
): BinaryExpression => ({ kind: 'binary', operator, left, right });

export const logicalAnd = (
  left: Expression,
  right: Expression
): BinaryExpression => binary('&&', left, right);

export const isType = (
  expression: Expression,
  type: TypeName
): IsTypeExpression => ({ kind: 'isType', expression, type });

export const isPatternExpression = (
  expression: Expression,
  pattern: Pattern
): IsPatternExpression => ({ kind: 'isPattern', expression, pattern });

export const switchExpression = (
  governing: Expression,
  arms: readonly SwitchExpressionArm[]
): SwitchExpression => ({ kind: 'switchExpression', governing, arms });

export const opaque = (text: string): OpaqueExpression => ({
  kind: 'opaque',
  text
});

export const typeName = (name: string): TypeName => ({
  kind: 'typeName',
  name
});

export const singleDesignation = (name: string): SingleVariableDesignation => ({
  kind: 'singleDesignation',
  name
});

export const discardDesignation = (): DiscardDesignation => ({
  kind: 'discardDesignation'
});

export const parenthesizedDesignation = (
  variables: readonly VariableDesignation[]
): ParenthesizedVariableDesignation => ({
  kind: 'parenthesizedDesignation',
  variables
});

export const varPattern = (designation: VariableDesignation): VarPattern => ({
  kind: 'varPattern',
  designation
});

export const declarationPattern = (
  type: TypeName,
  designation: SingleVariableDesignation | DiscardDesignation
): DeclarationPattern => ({ kind: 'declarationPattern', type, designation });

export const subpattern = (name: string, pattern: Pattern): Subpattern => ({
  kind: 'subpattern',
  name,
  pattern
});

export type RecursivePatternParts = {
  type?: TypeName;
  positional?: readonly Pattern[];
  properties?: readonly Subpattern[];
  designation?: SingleVariableDesignation | DiscardDesignation;
};

export function recursivePattern(
  parts: RecursivePatternParts
): RecursivePattern {
  return {
    kind: 'recursivePattern',
    ...(parts.type && { type: parts.type }),
    ...(parts.positional && { positional: parts.positional }),
    ...(parts.properties && { properties: parts.properties }),
    ...(parts.designation && { designation: parts.designation })
  };
}

export const constantPattern = (expression: Expression): ConstantPattern => ({
  kind: 'constantPattern',
  expression
});

export const relationalPattern = (
  operator: RelationalOperator,
  expression: Expression
): RelationalPattern => ({ kind: 'relationalPattern', operator, expression });

export const typePattern = (type: TypeName): TypePattern => ({
  kind: 'typePattern',
  type
});

export const notPattern = (pattern: Pattern): NotPattern => ({
  kind: 'notPattern',
  pattern
});

export const andPattern = (left: Pattern, right: Pattern): AndPattern => ({
  kind: 'andPattern',
  left,
  right
});

export const parenthesizedPattern = (
  pattern: Pattern
): ParenthesizedPattern => ({ kind: 'parenthesizedPattern', pattern });

export const discardPattern = (): DiscardPattern => ({
  kind: 'discardPattern'
});

export const whenClause = (condition: Expression): WhenClause => ({
  kind: 'whenClause',
  condition
});

export function casePatternLabel(
  pattern: Pattern,
  when?: WhenClause
): CasePatternSwitchLabel {
  return when
    ? { kind: 'casePatternLabel', pattern, whenClause: when }
    : { kind: 'casePatternLabel', pattern };
}

export const defaultLabel = (): DefaultSwitchLabel => ({ kind: 'defaultLabel' });

export function switchArm(
  pattern: Pattern,
  when: WhenClause | undefined,
  expression: Expression
): SwitchExpressionArm {
  return when
    ? { kind: 'switchArm', pattern, whenClause: when, expression }
    : { kind: 'switchArm', pattern, expression };
}

export const switchSection = (
  labels: readonly SwitchLabel[],
  statements: readonly Statement[]
): SwitchSection => ({ kind: 'switchSection', labels, statements });

export const switchStatement = (
  expression: Expression,
  sections: readonly SwitchSection[]
): SwitchStatement => ({ kind: 'switchStatement', expression, sections });

export const ifStatement = (
  condition: Expression,
  statement: Statement
): IfStatement => ({ kind: 'ifStatement', condition, statement });

export function returnStatement(expression?: Expression): ReturnStatement {
  return expression
    ? { kind: 'returnStatement', expression }
    : { kind: 'returnStatement' };
}

export const expressionStatement = (
  expression: Expression
): ExpressionStatement => ({ kind: 'expressionStatement', expression });

export const block = (statements: readonly Statement[]): Block => ({
  kind: 'block',
  statements
});

/**
 * Returns a copy of `node` carrying the given annotations in addition to the
 * ones it already has. Duplicates are dropped.
 */
export function withAnnotations<T extends { annotations?: readonly Annotation[] }>(
  node: T,
  ...annotations: Annotation[]
): T {
  const merged = new Set<Annotation>([
    ...(node.annotations ?? []),
    ...annotations
  ]);
  return { ...node, annotations: [...merged] };
}
