import type { Expression, NameReference } from '../types';
import type { SemanticSession } from '../semantic/session';
import type { NullSafeChainConcept } from '../architecture';

import { conditionalAccess, identifier, memberAccess } from '../syntax/factory';

/** One member name of a chain together with the node that carries it. */
export type ChainName = {
  name: string;
  node: NameReference;
};

export type ChainDecomposition = {
  /**
   * Where the member path starts. `undefined` means the first name is an
   * implicit self reference (a bare field or property name).
   */
  receiver: Expression | undefined;

  /** Member names, root to leaf. May be empty. */
  names: readonly ChainName[];

  /**
   * The chain goes through a null-safe access, so a null on the way makes
   * it evaluate to `null` instead of failing.
   */
  nullSafe: boolean;
};

type WalkState = {
  names: ChainName[];
  nullSafe: boolean;
};

/**
 * Walks a member-access / null-safe-access chain downward, collecting
 * convertible names leaf to root.
 *
 * Walk rules:
 * 1. Identifier (convertible): record, stop with no receiver (implicit self).
 * 2. Member binding (convertible): record, stop with no receiver; everything
 *    on the right of the enclosing conditional access was consumed.
 * 3. Member access (convertible): record, continue into its expression.
 * 4. Conditional access: mark the chain null-safe, walk `whenNotNull` first.
 *    - If that leaves a receiver of its own (as in `a?.M().b`), the receiver
 *      is the conditional access over that receiver (`a?.M()`).
 *    - Otherwise continue into the conditional's expression.
 * 5. Anything else: stop; the node is the receiver.
 *
 * See {@link NullSafeChainConcept}.
 */
function walk(
  node: Expression,
  state: WalkState,
  session: SemanticSession
): Expression | undefined {
  switch (node.kind) {
    case 'identifier':
      if (!session.canConvertToSubpattern(node)) return node;
      state.names.push({ name: node.name, node });
      return undefined;

    case 'memberBinding':
      if (!session.canConvertToSubpattern(node)) return node;
      state.names.push({ name: node.name, node });
      return undefined;

    case 'memberAccess':
      if (!session.canConvertToSubpattern(node)) return node;
      state.names.push({ name: node.name, node });
      return walk(node.expression, state, session);

    case 'conditionalAccess': {
      state.nullSafe = true;
      const right = walk(node.whenNotNull, state, session);
      if (right) {
        return right === node.whenNotNull
          ? node
          : conditionalAccess(node.expression, right);
      }
      return walk(node.expression, state, session);
    }

    default:
      return node;
  }
}

/**
 * Decomposes a chain into its innermost receiver and the ordered member
 * names leading from it.
 *
 * Example: `a.b.c` with `b` and `c` instance members and `a` a local gives
 * receiver `a` and names `[b, c]`; `a?.b` gives receiver `a` and names `[b]`.
 */
export function decomposeChain(
  node: Expression,
  session: SemanticSession
): ChainDecomposition {
  const state: WalkState = { names: [], nullSafe: false };
  const receiver = walk(node, state, session);
  return { receiver, names: state.names.reverse(), nullSafe: state.nullSafe };
}

/**
 * Rebuilds a plain member chain from a receiver and root-to-leaf names:
 * `composeChain(a, ['b', 'c'])` is `a.b.c`; without a receiver the first
 * name becomes an identifier.
 */
export function composeChain(
  receiver: Expression | undefined,
  names: readonly string[]
): Expression | undefined {
  let current = receiver;
  for (const name of names) {
    current = current ? memberAccess(current, name) : identifier(name);
  }
  return current;
}
