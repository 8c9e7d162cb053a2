import type {
  BinaryExpression,
  CasePatternSwitchLabel,
  Expression,
  SwitchExpressionArm,
  SyntaxNode,
  SyntaxPath,
  WhenClause
} from './types';
import type { ShortCircuitEquivalence } from './architecture';
import type { Logger } from './logger';
import type { RewriteOptions } from './options';
import type { ClassifiedTerm } from './receiver/classify';
import type { SemanticSession } from './semantic/session';

import { hasWhenClause, isGuardOwner, isLogicalAnd } from './guards';
import { normalizeOptions } from './options';
import { findVariableDesignation } from './pattern/designation';
import { rewriteContainingPattern } from './pattern/merge';
import { canFoldNullSafeTest } from './pattern/null-match';
import { replacePattern } from './pattern/replace';
import { createPattern, createSubpattern } from './pattern/synthesize';
import { classifyTerm } from './receiver/classify';
import { resolveCommonReceiver } from './receiver/common-receiver';
import { unexpectedValue } from './report';
import { createSemanticSession } from './semantic/session';
import {
  casePatternLabel,
  isPatternExpression,
  logicalAnd,
  recursivePattern,
  switchArm,
  thisExpression,
  whenClause,
  withAnnotations
} from './syntax/factory';
import { getNodeAtPath, parentPath, replaceAtPath, stringifySyntaxPath } from './syntax/path';
import { printNode } from './syntax/print';

export const USE_RECURSIVE_PATTERNS_TITLE = 'Use recursive patterns';

/** Where to look: a tree and the path of the node under the cursor. */
export type RewriteRequest = {
  root: SyntaxNode;
  path: SyntaxPath;
};

/** Substitutes the rewritten node into a tree at the request location. */
export type ReplacementFunc = (root: SyntaxNode) => SyntaxNode;

export type Refactoring = {
  title: string;
  apply: ReplacementFunc;
};

type LogicalAndExpression = BinaryExpression & { operator: '&&' };

type GuardOwner = (CasePatternSwitchLabel | SwitchExpressionArm) & {
  whenClause: WhenClause;
};

type Location =
  | { kind: 'logicalAnd'; node: LogicalAndExpression; path: SyntaxPath }
  | { kind: 'guard'; owner: GuardOwner; path: SyntaxPath };

type RewriteContext = {
  session: SemanticSession;
  logger: Logger;
  pathKey: string;
};

function skip(context: RewriteContext, reason: string): undefined {
  context.logger.debug(`No rewrite: ${reason}`, { path: context.pathKey });
  return undefined;
}

/**
 * Maps the node under the cursor to one of the shapes the rewrite handles.
 *
 * 1. `a && b`
 * 2. A case label or switch arm with a when clause
 * 3. A when clause, resolved to the label or arm that owns it
 */
function locate(
  root: SyntaxNode,
  path: SyntaxPath,
  node: SyntaxNode
): Location | undefined {
  // 1. Logical and
  if (isLogicalAnd(node)) return { kind: 'logicalAnd', node, path };

  // 2. Guard owner
  if (isGuardOwner(node)) {
    return hasWhenClause(node) ? { kind: 'guard', owner: node, path } : undefined;
  }

  // 3. When clause
  if (node.kind === 'whenClause') {
    const ownerPath = parentPath(path);
    const owner = getNodeAtPath(root, ownerPath);
    if (owner && isGuardOwner(owner) && hasWhenClause(owner) && owner.whenClause === node) {
      return { kind: 'guard', owner, path: ownerPath };
    }
  }

  return undefined;
}

/**
 * Puts `replacement` where `term` was, walking down the right spine of an
 * `&&` chain: `x && a` with `a` replaced by `r` is `x && r`.
 */
function replaceRightmostOperand(
  expression: Expression,
  term: Expression,
  replacement: Expression
): Expression {
  if (expression === term) return replacement;
  if (isLogicalAnd(expression)) {
    return logicalAnd(
      expression.left,
      replaceRightmostOperand(expression.right, term, replacement)
    );
  }
  return unexpectedValue(term, 'replacing a combined operand');
}

/**
 * Drops `term` from the left spine of an `&&` chain.
 *
 * @returns The remaining condition, or `undefined` when `term` was all of it
 */
function removeLeftmostOperand(
  expression: Expression,
  term: Expression
): Expression | undefined {
  if (expression === term) return undefined;
  if (isLogicalAnd(expression)) {
    const rest = removeLeftmostOperand(expression.left, term);
    return rest ? logicalAnd(rest, expression.right) : expression.right;
  }
  return unexpectedValue(term, 'removing a consumed guard operand');
}

/**
 * `e is C c && c.P == 1` → `e is C { P: 1 } c`
 */
function mergeIntoIsPattern(
  left: ClassifiedTerm,
  right: ClassifiedTerm,
  context: RewriteContext
): Expression | undefined {
  const { target } = left;
  if (target.kind !== 'pattern' || !target.source) return undefined;

  const match = findVariableDesignation(target.pattern, right.receiver, context.session);
  if (!match) return undefined;

  const fragment = createPattern(right.target, right.flipped);
  if (!canFoldNullSafeTest(fragment, match.nullSafe, context.session)) {
    return skip(context, 'the null-safe test also holds for null');
  }

  const merged = rewriteContainingPattern(match.containing, fragment, match.names);
  if (!merged) return skip(context, 'the pattern already tests that member');

  return isPatternExpression(
    target.source.expression,
    replacePattern(target.pattern, match.containing, merged)
  );
}

/**
 * `a.b == 1 && a.c == 2` → `a is { b: 1, c: 2 }`
 */
function combineOnCommonReceiver(
  left: ClassifiedTerm,
  right: ClassifiedTerm,
  context: RewriteContext
): Expression | undefined {
  const common = resolveCommonReceiver(left.receiver, right.receiver, context.session);
  if (!common) return skip(context, 'the operands do not share a receiver');

  const leftPattern = createPattern(left.target, left.flipped);
  const rightPattern = createPattern(right.target, right.flipped);
  if (
    !canFoldNullSafeTest(leftPattern, common.leftNullSafe, context.session) ||
    !canFoldNullSafeTest(rightPattern, common.rightNullSafe, context.session)
  ) {
    return skip(context, 'a null-safe operand also holds for null');
  }

  const leftEntry = createSubpattern(common.leftNames, leftPattern);
  const rightEntry = createSubpattern(common.rightNames, rightPattern);
  if (leftEntry.name === rightEntry.name) {
    return skip(context, `both operands test "${leftEntry.name}"`);
  }

  return isPatternExpression(
    common.receiver ?? thisExpression(),
    recursivePattern({ properties: [leftEntry, rightEntry] })
  );
}

function rewriteLogicalAnd(
  node: LogicalAndExpression,
  context: RewriteContext
): Expression | undefined {
  const left = classifyTerm(node.left, context.session);
  if (!left) return skip(context, 'the left operand is not a single test');
  const right = classifyTerm(node.right, context.session);
  if (!right) return skip(context, 'the right operand is not a single test');

  const combined =
    mergeIntoIsPattern(left, right, context) ??
    combineOnCommonReceiver(left, right, context);
  if (!combined) return undefined;

  // `x && a.b == 1 && a.c == 2` keeps `x`
  return withAnnotations(replaceRightmostOperand(node.left, left.term, combined), 'format');
}

/**
 * `case { P: var v } when v.Q == 1 && rest` → `case { P: { Q: 1 } v } when rest`
 */
function rewriteGuard(
  owner: GuardOwner,
  context: RewriteContext
): CasePatternSwitchLabel | SwitchExpressionArm | undefined {
  const condition = owner.whenClause.condition;
  const term = classifyTerm(condition, context.session, 'whenClause');
  if (!term) return skip(context, 'the guard does not start with a single test');

  const match = findVariableDesignation(owner.pattern, term.receiver, context.session);
  if (!match) return skip(context, 'the guard does not read a binding of the pattern');

  const fragment = createPattern(term.target, term.flipped);
  if (!canFoldNullSafeTest(fragment, match.nullSafe, context.session)) {
    return skip(context, 'the null-safe test also holds for null');
  }

  const merged = rewriteContainingPattern(match.containing, fragment, match.names);
  if (!merged) return skip(context, 'the pattern already tests that member');

  const pattern = replacePattern(owner.pattern, match.containing, merged);
  const remaining = removeLeftmostOperand(condition, term.term);
  const when = remaining ? whenClause(remaining) : undefined;

  switch (owner.kind) {
    case 'casePatternLabel':
      return casePatternLabel(pattern, when);
    case 'switchArm':
      return switchArm(pattern, when, owner.expression);
  }
}

/**
 * Tries to turn the boolean logic at `request.path` into a recursive pattern.
 *
 * Handles `&&` expressions and when clauses of case labels and switch arms.
 * Evaluation order is kept (see {@link ShortCircuitEquivalence}).
 * The rewritten node is computed here; the returned function only splices it
 * into a tree.
 *
 * @returns A function applying the rewrite, or `undefined` when the location
 *          has none. Each reason is logged at `debug`.
 * @throws {Error} When options are invalid
 * @throws {RewriteInvariantError} When the tree or the semantic model
 *         contradicts itself
 */
export function tryBuildRewrite(
  request: RewriteRequest,
  options: RewriteOptions
): ReplacementFunc | undefined {
  const { semanticModel, logger, signal } = normalizeOptions(options);
  signal?.throwIfAborted();

  const context: RewriteContext = {
    session: createSemanticSession(semanticModel),
    logger,
    pathKey: stringifySyntaxPath(request.path)
  };

  const node = getNodeAtPath(request.root, request.path);
  if (!node) return skip(context, 'the path does not resolve to a node');

  const location = locate(request.root, request.path, node);
  if (!location) return skip(context, `unsupported location (${node.kind})`);

  const replacement = logger.withContext({ phase: location.kind }, () =>
    location.kind === 'logicalAnd'
      ? rewriteLogicalAnd(location.node, context)
      : rewriteGuard(location.owner, context)
  );
  if (!replacement) return undefined;

  logger.info('Built recursive pattern rewrite', {
    path: stringifySyntaxPath(location.path),
    replacement: printNode(replacement)
  });

  const targetPath = location.path;
  return root => replaceAtPath(root, targetPath, replacement);
}

/**
 * Offers the rewrite as a titled refactoring, or `undefined` when there is
 * none at the location.
 */
export function getRefactoring(
  request: RewriteRequest,
  options: RewriteOptions
): Refactoring | undefined {
  const apply = tryBuildRewrite(request, options);
  return apply && { title: USE_RECURSIVE_PATTERNS_TITLE, apply };
}
