import type {
  DeclarationPattern,
  Expression,
  ParenthesizedVariableDesignation,
  Pattern,
  RecursivePattern,
  SingleVariableDesignation,
  VarPattern,
  VariableDesignation
} from '../types';
import type { SemanticSession } from '../semantic/session';

import { decomposeChain } from '../receiver/decompose';

/** Patterns that can own a designation the merger knows how to rewrite. */
export type ContainingPattern = VarPattern | DeclarationPattern | RecursivePattern;

type DesignationOwner = ContainingPattern | ParenthesizedVariableDesignation;

type FoundDesignation = {
  designation: SingleVariableDesignation;
  owner: DesignationOwner;
};

export type DesignationMatch = {
  /** The pattern that introduces the binding. */
  containing: ContainingPattern;
  designation: SingleVariableDesignation;

  /** Member names the other side reads through the binding, root to leaf. */
  names: readonly string[];

  /** The other side reads those names through a null-safe access. */
  nullSafe: boolean;
};

function* walkVariableDesignation(
  designation: VariableDesignation,
  owner: DesignationOwner
): Generator<FoundDesignation> {
  switch (designation.kind) {
    case 'singleDesignation':
      yield { designation, owner };
      return;
    case 'discardDesignation':
      return;
    case 'parenthesizedDesignation':
      for (const variable of designation.variables) {
        yield* walkVariableDesignation(variable, designation);
      }
      return;
  }
}

/**
 * Yields every single designation of a pattern tree in source order,
 * together with the node that owns it.
 */
function* walkDesignations(pattern: Pattern): Generator<FoundDesignation> {
  switch (pattern.kind) {
    case 'varPattern':
      yield* walkVariableDesignation(pattern.designation, pattern);
      return;
    case 'declarationPattern':
      yield* walkVariableDesignation(pattern.designation, pattern);
      return;
    case 'recursivePattern':
      for (const positional of pattern.positional ?? []) {
        yield* walkDesignations(positional);
      }
      for (const property of pattern.properties ?? []) {
        yield* walkDesignations(property.pattern);
      }
      if (pattern.designation) {
        yield* walkVariableDesignation(pattern.designation, pattern);
      }
      return;
    case 'notPattern':
    case 'parenthesizedPattern':
      yield* walkDesignations(pattern.pattern);
      return;
    case 'andPattern':
      yield* walkDesignations(pattern.left);
      yield* walkDesignations(pattern.right);
      return;
    case 'constantPattern':
    case 'relationalPattern':
    case 'typePattern':
    case 'discardPattern':
      return;
  }
}

/**
 * Lists the names of all single designations in a pattern, in source order.
 */
export function collectDesignationNames(pattern: Pattern): string[] {
  return [...walkDesignations(pattern)].map(found => found.designation.name);
}

/**
 * Finds the binding the other side of a test reads from.
 *
 * Steps:
 * 1. Decompose `receiver`; its innermost receiver must be a plain identifier
 *    (a local introduced by the pattern), e.g. `c` in `c.P.Q`.
 * 2. Take the first designation of that name in `pattern`.
 * 3. Only a var, declaration or recursive pattern may own it. A designation
 *    nested in `var (x, y)` would need the whole designation rewritten and is
 *    not supported.
 *
 * @returns The containing pattern and the names read through the binding,
 *          or `undefined` when there is no usable binding.
 */
export function findVariableDesignation(
  pattern: Pattern,
  receiver: Expression,
  session: SemanticSession
): DesignationMatch | undefined {
  // 1. Innermost receiver
  const chain = decomposeChain(receiver, session);
  const local = chain.receiver;
  if (!local || local.kind !== 'identifier') return undefined;

  // 2. First designation with that name
  let found: FoundDesignation | undefined;
  for (const candidate of walkDesignations(pattern)) {
    if (candidate.designation.name === local.name) {
      found = candidate;
      break;
    }
  }
  if (!found) return undefined;

  // 3. Supported owners only
  const { owner, designation } = found;
  if (owner.kind === 'parenthesizedDesignation') return undefined;

  return {
    containing: owner,
    designation,
    names: chain.names.map(entry => entry.name),
    nullSafe: chain.nullSafe
  };
}
