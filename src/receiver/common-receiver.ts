import type { Expression, NameReference } from '../types';
import type { SemanticSession } from '../semantic/session';

import { unexpectedValue } from '../report';
import { areEquivalent } from '../syntax/equivalence';
import { conditionalAccess } from '../syntax/factory';
import { decomposeChain } from './decompose';

export type CommonReceiver = {
  /** The shared receiver; `undefined` is an implicit self reference. */
  receiver: Expression | undefined;

  /** Left names below the shared receiver, root to leaf. Never empty. */
  leftNames: readonly string[];

  /** Right names below the shared receiver, root to leaf. Never empty. */
  rightNames: readonly string[];

  /** Whether each side reads its members through a null-safe access. */
  leftNullSafe: boolean;
  rightNullSafe: boolean;
};

/**
 * Identity search: whether `target` is `node` or one of its chain parts.
 */
function containsNode(node: Expression, target: Expression): boolean {
  if (node === target) return true;

  switch (node.kind) {
    case 'memberAccess':
      return containsNode(node.expression, target);
    case 'conditionalAccess':
      return (
        containsNode(node.expression, target) ||
        containsNode(node.whenNotNull, target)
      );
    case 'invocation':
      return containsNode(node.expression, target);
    default:
      return false;
  }
}

/**
 * Cuts a chain right after the segment carried by `last`, keeping every
 * null-safe operator on the way.
 *
 * Examples (cut after `c`):
 * - `a.b.c.d`   → `a.b.c`
 * - `a?.b.c.d`  → `a?.b.c`
 * - `a?.b?.c.d` → `a?.b?.c`
 *
 * @throws {RewriteInvariantError} When `last` is not part of `chain`; the
 *         name was collected from this very chain, so that is a defect.
 */
function truncateChainAfter(chain: Expression, last: NameReference): Expression {
  if (chain === last) return chain;

  switch (chain.kind) {
    case 'memberAccess':
    case 'invocation':
      if (containsNode(chain.expression, last)) {
        return truncateChainAfter(chain.expression, last);
      }
      break;
    case 'conditionalAccess':
      if (containsNode(chain.whenNotNull, last)) {
        return conditionalAccess(
          chain.expression,
          truncateChainAfter(chain.whenNotNull, last)
        );
      }
      if (containsNode(chain.expression, last)) {
        return truncateChainAfter(chain.expression, last);
      }
      break;
  }

  return unexpectedValue(chain, 'truncating a member chain');
}

/**
 * Finds the outermost receiver two boolean tests share.
 *
 * Steps:
 * 1. Decompose both sides. Both need at least one name, and the innermost
 *    receivers must be equivalent (two implicit self references are).
 * 2. Skip the names both paths share from the root side, always keeping the
 *    leaf name on each side: in `a.b.c && a.b.d`, `b` is shared.
 * 3. With a shared prefix, the receiver is the left chain cut after the last
 *    shared name, so `a.b.c && a.b.d` becomes `a.b is { c: true, d: true }`
 *    and `a?.b.c.d && a?.b.c.e` becomes `a?.b.c is { d: …, e: … }`.
 *
 * @returns The shared receiver and both remaining name sequences, or
 *          `undefined` when the tests are not about the same receiver.
 */
export function resolveCommonReceiver(
  left: Expression,
  right: Expression,
  session: SemanticSession
): CommonReceiver | undefined {
  // 1. Decompose and align
  const leftChain = decomposeChain(left, session);
  const rightChain = decomposeChain(right, session);

  if (leftChain.names.length === 0 || rightChain.names.length === 0) {
    return undefined;
  }
  if (!areEquivalent(leftChain.receiver, rightChain.receiver)) {
    return undefined;
  }

  // 2. Shared root-side prefix
  let shared = 0;
  while (
    shared < leftChain.names.length - 1 &&
    shared < rightChain.names.length - 1 &&
    leftChain.names[shared].name === rightChain.names[shared].name
  ) {
    shared++;
  }

  const sides = {
    leftNames: leftChain.names.slice(shared).map(entry => entry.name),
    rightNames: rightChain.names.slice(shared).map(entry => entry.name),
    leftNullSafe: leftChain.nullSafe,
    rightNullSafe: rightChain.nullSafe
  };

  if (shared === 0) {
    return { receiver: leftChain.receiver, ...sides };
  }

  // 3. Push the receiver down the shared path
  const lastShared = leftChain.names[shared - 1].node;
  return { receiver: truncateChainAfter(left, lastShared), ...sides };
}
