/**
 * Markers consumed by downstream passes.
 *
 * - `format`:   the subtree may be re-indented.
 * - `simplify`: the subtree may have redundant parentheses and unused
 *               designations removed.
 *
 * Annotations never take part in structural equivalence.
 */
export type Annotation = 'format' | 'simplify';

type NodeBase = {
  readonly annotations?: readonly Annotation[];
};

export type ComparisonOperator = '==' | '!=' | '<' | '<=' | '>' | '>=';

export type RelationalOperator = '<' | '<=' | '>' | '>=';

export type BinaryOperator = ComparisonOperator | '&&' | '||';

export type LiteralValue = string | number | boolean | null;

// ---------------------------------------------------------------------------
// Types and designations
// ---------------------------------------------------------------------------

export type TypeName = NodeBase & {
  readonly kind: 'typeName';
  readonly name: string;
};

export type SingleVariableDesignation = NodeBase & {
  readonly kind: 'singleDesignation';
  readonly name: string;
};

export type DiscardDesignation = NodeBase & {
  readonly kind: 'discardDesignation';
};

/**
 * `var (x, y)`: the nested designations are not owned by a pattern node,
 * which is why the merger refuses to rewrite them.
 */
export type ParenthesizedVariableDesignation = NodeBase & {
  readonly kind: 'parenthesizedDesignation';
  readonly variables: readonly VariableDesignation[];
};

export type VariableDesignation =
  | SingleVariableDesignation
  | DiscardDesignation
  | ParenthesizedVariableDesignation;

// ---------------------------------------------------------------------------
// Expressions
// ---------------------------------------------------------------------------

export type IdentifierName = NodeBase & {
  readonly kind: 'identifier';
  readonly name: string;
};

export type ThisExpression = NodeBase & {
  readonly kind: 'this';
};

export type LiteralExpression = NodeBase & {
  readonly kind: 'literal';
  readonly value: LiteralValue;
};

/** `expression.name` */
export type MemberAccessExpression = NodeBase & {
  readonly kind: 'memberAccess';
  readonly expression: Expression;
  readonly name: string;
};

/**
 * `.name` as the first segment of the `whenNotNull` side of a
 * {@link ConditionalAccessExpression}.
 */
export type MemberBindingExpression = NodeBase & {
  readonly kind: 'memberBinding';
  readonly name: string;
};

/**
 * Null-safe access. `a?.b.c` is `conditionalAccess(a, memberAccess(memberBinding(b), c))`
 * and `a?.b?.c` nests a second conditional access in `whenNotNull`.
 */
export type ConditionalAccessExpression = NodeBase & {
  readonly kind: 'conditionalAccess';
  readonly expression: Expression;
  readonly whenNotNull: Expression;
};

export type InvocationExpression = NodeBase & {
  readonly kind: 'invocation';
  readonly expression: Expression;
  readonly arguments: readonly Expression[];
};

export type ParenthesizedExpression = NodeBase & {
  readonly kind: 'parenthesized';
  readonly expression: Expression;
};

export type LogicalNotExpression = NodeBase & {
  readonly kind: 'logicalNot';
  readonly operand: Expression;
};

export type BinaryExpression = NodeBase & {
  readonly kind: 'binary';
  readonly operator: BinaryOperator;
  readonly left: Expression;
  readonly right: Expression;
};

/** `expression is Type` */
export type IsTypeExpression = NodeBase & {
  readonly kind: 'isType';
  readonly expression: Expression;
  readonly type: TypeName;
};

/** `expression is pattern` */
export type IsPatternExpression = NodeBase & {
  readonly kind: 'isPattern';
  readonly expression: Expression;
  readonly pattern: Pattern;
};

export type SwitchExpression = NodeBase & {
  readonly kind: 'switchExpression';
  readonly governing: Expression;
  readonly arms: readonly SwitchExpressionArm[];
};

/**
 * Any expression the rewrite does not look into. Used as a boolean operand it
 * is an implicit truthiness test.
 */
export type OpaqueExpression = NodeBase & {
  readonly kind: 'opaque';
  readonly text: string;
};

export type Expression =
  | IdentifierName
  | ThisExpression
  | LiteralExpression
  | MemberAccessExpression
  | MemberBindingExpression
  | ConditionalAccessExpression
  | InvocationExpression
  | ParenthesizedExpression
  | LogicalNotExpression
  | BinaryExpression
  | IsTypeExpression
  | IsPatternExpression
  | SwitchExpression
  | OpaqueExpression;

// ---------------------------------------------------------------------------
// Patterns
// ---------------------------------------------------------------------------

export type VarPattern = NodeBase & {
  readonly kind: 'varPattern';
  readonly designation: VariableDesignation;
};

/** `Type designation` */
export type DeclarationPattern = NodeBase & {
  readonly kind: 'declarationPattern';
  readonly type: TypeName;
  readonly designation: SingleVariableDesignation | DiscardDesignation;
};

/** `name: pattern` inside a property pattern clause. */
export type Subpattern = NodeBase & {
  readonly kind: 'subpattern';
  readonly name: string;
  readonly pattern: Pattern;
};

/**
 * `Type (positional) { properties } designation`, every part optional.
 *
 * Property subpattern names are unique within one recursive pattern.
 */
export type RecursivePattern = NodeBase & {
  readonly kind: 'recursivePattern';
  readonly type?: TypeName;
  readonly positional?: readonly Pattern[];
  readonly properties?: readonly Subpattern[];
  readonly designation?: SingleVariableDesignation | DiscardDesignation;
};

export type ConstantPattern = NodeBase & {
  readonly kind: 'constantPattern';
  readonly expression: Expression;
};

export type RelationalPattern = NodeBase & {
  readonly kind: 'relationalPattern';
  readonly operator: RelationalOperator;
  readonly expression: Expression;
};

export type TypePattern = NodeBase & {
  readonly kind: 'typePattern';
  readonly type: TypeName;
};

export type NotPattern = NodeBase & {
  readonly kind: 'notPattern';
  readonly pattern: Pattern;
};

/** Only produced as the merge fallback. */
export type AndPattern = NodeBase & {
  readonly kind: 'andPattern';
  readonly left: Pattern;
  readonly right: Pattern;
};

export type ParenthesizedPattern = NodeBase & {
  readonly kind: 'parenthesizedPattern';
  readonly pattern: Pattern;
};

export type DiscardPattern = NodeBase & {
  readonly kind: 'discardPattern';
};

export type Pattern =
  | VarPattern
  | DeclarationPattern
  | RecursivePattern
  | ConstantPattern
  | RelationalPattern
  | TypePattern
  | NotPattern
  | AndPattern
  | ParenthesizedPattern
  | DiscardPattern;

/** Extracts the pattern variant for a given `kind`. */
export type PatternOfKind<K extends Pattern['kind']> = Extract<
  Pattern,
  { kind: K }
>;

// ---------------------------------------------------------------------------
// Switch constructs and statements
// ---------------------------------------------------------------------------

export type WhenClause = NodeBase & {
  readonly kind: 'whenClause';
  readonly condition: Expression;
};

/** `case pattern when condition:` */
export type CasePatternSwitchLabel = NodeBase & {
  readonly kind: 'casePatternLabel';
  readonly pattern: Pattern;
  readonly whenClause?: WhenClause;
};

export type DefaultSwitchLabel = NodeBase & {
  readonly kind: 'defaultLabel';
};

export type SwitchLabel = CasePatternSwitchLabel | DefaultSwitchLabel;

/** `pattern when condition => expression` */
export type SwitchExpressionArm = NodeBase & {
  readonly kind: 'switchArm';
  readonly pattern: Pattern;
  readonly whenClause?: WhenClause;
  readonly expression: Expression;
};

export type SwitchSection = NodeBase & {
  readonly kind: 'switchSection';
  readonly labels: readonly SwitchLabel[];
  readonly statements: readonly Statement[];
};

export type SwitchStatement = NodeBase & {
  readonly kind: 'switchStatement';
  readonly expression: Expression;
  readonly sections: readonly SwitchSection[];
};

export type IfStatement = NodeBase & {
  readonly kind: 'ifStatement';
  readonly condition: Expression;
  readonly statement: Statement;
};

export type ReturnStatement = NodeBase & {
  readonly kind: 'returnStatement';
  readonly expression?: Expression;
};

export type ExpressionStatement = NodeBase & {
  readonly kind: 'expressionStatement';
  readonly expression: Expression;
};

export type Block = NodeBase & {
  readonly kind: 'block';
  readonly statements: readonly Statement[];
};

export type Statement =
  | Block
  | IfStatement
  | ReturnStatement
  | ExpressionStatement
  | SwitchStatement;

/** Every node a {@link SyntaxPath} may address. */
export type SyntaxNode =
  | Expression
  | Pattern
  | Subpattern
  | VariableDesignation
  | TypeName
  | WhenClause
  | SwitchLabel
  | SwitchExpressionArm
  | SwitchSection
  | Statement;

export type SyntaxKind = SyntaxNode['kind'];

/**
 * Path segments address a node from a root:
 * - `string` segments are property keys (e.g. `"whenClause"`),
 * - `number` segments are array indices (e.g. `0`).
 *
 * Example: `['sections', 0, 'labels', 1]`.
 */
export type SyntaxPathSegment = string | number;

export type SyntaxPath = readonly SyntaxPathSegment[];
