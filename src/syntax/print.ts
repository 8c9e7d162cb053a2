import type {
  BinaryOperator,
  Expression,
  LiteralValue,
  Pattern,
  Statement,
  Subpattern,
  SwitchExpressionArm,
  SwitchLabel,
  SyntaxNode,
  VariableDesignation,
  WhenClause
} from '../types';

/**
 * Single-line source rendering of syntax trees.
 *
 * This is a display printer for diagnostics and tests; layout is fixed and
 * the output is not meant to round-trip through a parser. Formatting proper
 * belongs to the host.
 */

function printLiteral(value: LiteralValue): string {
  if (typeof value === 'string') return JSON.stringify(value);
  return String(value);
}

export function printDesignation(designation: VariableDesignation): string {
  switch (designation.kind) {
    case 'singleDesignation':
      return designation.name;
    case 'discardDesignation':
      return '_';
    case 'parenthesizedDesignation':
      return `(${designation.variables.map(printDesignation).join(', ')})`;
  }
}

function printSubpattern(node: Subpattern): string {
  return `${node.name}: ${printPattern(node.pattern)}`;
}

export function printPattern(pattern: Pattern): string {
  switch (pattern.kind) {
    case 'varPattern':
      return `var ${printDesignation(pattern.designation)}`;
    case 'declarationPattern':
      return `${pattern.type.name} ${printDesignation(pattern.designation)}`;
    case 'recursivePattern': {
      const parts: string[] = [];
      const positional = pattern.positional
        ? `(${pattern.positional.map(printPattern).join(', ')})`
        : '';
      const head = `${pattern.type?.name ?? ''}${positional}`;
      if (head) parts.push(head);
      // A pattern with neither positional nor property part still prints
      // an (empty) property clause: `{ }` is the non-null test.
      if (pattern.properties || !pattern.positional) {
        const properties = pattern.properties ?? [];
        parts.push(
          properties.length === 0
            ? '{ }'
            : `{ ${properties.map(printSubpattern).join(', ')} }`
        );
      }
      if (pattern.designation) {
        parts.push(printDesignation(pattern.designation));
      }
      return parts.join(' ');
    }
    case 'constantPattern':
      return printExpression(pattern.expression);
    case 'relationalPattern':
      return `${pattern.operator} ${printExpression(pattern.expression)}`;
    case 'typePattern':
      return pattern.type.name;
    case 'notPattern':
      return `not ${printPattern(pattern.pattern)}`;
    case 'andPattern':
      return `${printPattern(pattern.left)} and ${printPattern(pattern.right)}`;
    case 'parenthesizedPattern':
      return `(${printPattern(pattern.pattern)})`;
    case 'discardPattern':
      return '_';
  }
}

function printWhenClause(node: WhenClause): string {
  return `when ${printExpression(node.condition)}`;
}

function printArm(arm: SwitchExpressionArm): string {
  const when = arm.whenClause ? ` ${printWhenClause(arm.whenClause)}` : '';
  return `${printPattern(arm.pattern)}${when} => ${printExpression(arm.expression)}`;
}

function printLabel(label: SwitchLabel): string {
  switch (label.kind) {
    case 'casePatternLabel': {
      const when = label.whenClause
        ? ` ${printWhenClause(label.whenClause)}`
        : '';
      return `case ${printPattern(label.pattern)}${when}:`;
    }
    case 'defaultLabel':
      return 'default:';
  }
}

// Binding strength, loosest first.
const RELATIONAL = 4;
const SWITCH = 5;
const UNARY = 6;
const PRIMARY = 7;

const BINARY_PRECEDENCE: Readonly<Record<BinaryOperator, number>> = {
  '||': 1,
  '&&': 2,
  '==': 3,
  '!=': 3,
  '<': RELATIONAL,
  '<=': RELATIONAL,
  '>': RELATIONAL,
  '>=': RELATIONAL
};

function precedence(expression: Expression): number {
  switch (expression.kind) {
    case 'binary':
      return BINARY_PRECEDENCE[expression.operator];
    case 'isType':
    case 'isPattern':
      return RELATIONAL;
    case 'switchExpression':
      return SWITCH;
    case 'logicalNot':
      return UNARY;
    default:
      return PRIMARY;
  }
}

/**
 * Prints an operand, parenthesized when it binds more loosely than its
 * position takes: `(p || q) && r`, `!(a && b)`.
 */
function printOperand(expression: Expression, minimum: number): string {
  const text = printExpression(expression);
  return precedence(expression) < minimum ? `(${text})` : text;
}

export function printExpression(expression: Expression): string {
  switch (expression.kind) {
    case 'identifier':
      return expression.name;
    case 'this':
      return 'this';
    case 'literal':
      return printLiteral(expression.value);
    case 'memberAccess':
      return `${printOperand(expression.expression, PRIMARY)}.${expression.name}`;
    case 'memberBinding':
      return `.${expression.name}`;
    case 'conditionalAccess':
      // `whenNotNull` starts with a member binding (`.b`), giving `a?.b`.
      return `${printOperand(expression.expression, PRIMARY)}?${printExpression(expression.whenNotNull)}`;
    case 'invocation':
      return `${printOperand(expression.expression, PRIMARY)}(${expression.arguments
        .map(printExpression)
        .join(', ')})`;
    case 'parenthesized':
      return `(${printExpression(expression.expression)})`;
    case 'logicalNot':
      return `!${printOperand(expression.operand, UNARY)}`;
    case 'binary': {
      // Left-associative: only the right operand needs parentheses at the
      // same strength.
      const strength = BINARY_PRECEDENCE[expression.operator];
      return `${printOperand(expression.left, strength)} ${expression.operator} ${printOperand(expression.right, strength + 1)}`;
    }
    case 'isType':
      return `${printOperand(expression.expression, RELATIONAL)} is ${expression.type.name}`;
    case 'isPattern':
      return `${printOperand(expression.expression, RELATIONAL)} is ${printPattern(expression.pattern)}`;
    case 'switchExpression':
      return `${printOperand(expression.governing, UNARY)} switch { ${expression.arms
        .map(printArm)
        .join(', ')} }`;
    case 'opaque':
      return expression.text;
  }
}

export function printStatement(statement: Statement): string {
  switch (statement.kind) {
    case 'block':
      return statement.statements.length === 0
        ? '{ }'
        : `{ ${statement.statements.map(printStatement).join(' ')} }`;
    case 'ifStatement':
      return `if (${printExpression(statement.condition)}) ${printStatement(statement.statement)}`;
    case 'returnStatement':
      return statement.expression
        ? `return ${printExpression(statement.expression)};`
        : 'return;';
    case 'expressionStatement':
      return `${printExpression(statement.expression)};`;
    case 'switchStatement': {
      const sections = statement.sections.map(section =>
        [
          ...section.labels.map(printLabel),
          ...section.statements.map(printStatement)
        ].join(' ')
      );
      return `switch (${printExpression(statement.expression)}) { ${sections.join(' ')} }`;
    }
  }
}

/**
 * Prints any node of the syntax model.
 */
export function printNode(node: SyntaxNode): string {
  switch (node.kind) {
    case 'subpattern':
      return printSubpattern(node);
    case 'singleDesignation':
    case 'discardDesignation':
    case 'parenthesizedDesignation':
      return printDesignation(node);
    case 'typeName':
      return node.name;
    case 'whenClause':
      return printWhenClause(node);
    case 'casePatternLabel':
    case 'defaultLabel':
      return printLabel(node);
    case 'switchArm':
      return printArm(node);
    case 'switchSection':
      return [
        ...node.labels.map(printLabel),
        ...node.statements.map(printStatement)
      ].join(' ');
    case 'block':
    case 'ifStatement':
    case 'returnStatement':
    case 'expressionStatement':
    case 'switchStatement':
      return printStatement(node);
    case 'varPattern':
    case 'declarationPattern':
    case 'recursivePattern':
    case 'constantPattern':
    case 'relationalPattern':
    case 'typePattern':
    case 'notPattern':
    case 'andPattern':
    case 'parenthesizedPattern':
    case 'discardPattern':
      return printPattern(node);
    default:
      return printExpression(node);
  }
}
