import type { BindingPreservationInvariant } from './architecture';

import { isSyntaxNode } from './guards';
import { printNode } from './syntax/print';

/**
 * Failure classes
 * ---------------
 * The rewrite knows three outcomes besides success:
 *
 * - No rewrite: a classifier, resolver or merger precondition does not hold.
 *   This is the expected answer for most cursor positions; it is reported as
 *   `undefined` by the orchestrator and never reaches this module.
 *
 * - Unreachable shape: a tree violates a structural contract the rewrite
 *   relies on (for instance a consumed guard operand that is no longer part of
 *   the guard, or a merge that lost a binding, see
 *   {@link BindingPreservationInvariant}).
 *
 * - Oracle inconsistency: the semantic model answered contradictory facts
 *   about one symbol.
 *
 * The last two are defects, not conditions to recover from. They are thrown
 * as {@link RewriteInvariantError} and stop the refactoring.
 */

const MESSAGE_PREFIX = '[recursive-patterns]';

/**
 * Raised when the rewrite meets a tree or a semantic answer that its own
 * dispatch should have ruled out.
 */
export class RewriteInvariantError extends Error {
  override readonly name = 'RewriteInvariantError';
}

/**
 * Formats a value for an error message: syntax nodes are printed in source
 * form together with their kind, everything else is stringified.
 */
function describeValue(value: unknown): string {
  if (isSyntaxNode(value)) {
    return `${value.kind} \`${printNode(value)}\``;
  }
  if (typeof value === 'string') return `"${value}"`;
  return String(value);
}

/**
 * Report (and throw) a value the current dispatch cannot handle.
 *
 * @param value - The offending value (usually a node)
 * @param context - What was being done when the value was met
 * @throws Always throws {@link RewriteInvariantError}
 */
export function unexpectedValue(value: unknown, context: string): never {
  throw new RewriteInvariantError(
    `${MESSAGE_PREFIX} Unexpected value while ${context}: ${describeValue(value)}`
  );
}

/**
 * Throws {@link RewriteInvariantError} unless `condition` holds.
 */
export function assertInvariant(
  condition: boolean,
  message: string
): asserts condition {
  if (!condition) {
    throw new RewriteInvariantError(`${MESSAGE_PREFIX} ${message}`);
  }
}

/**
 * Report (and throw) an invalid configuration value.
 *
 * Configuration errors are caller mistakes rather than rewrite defects, so a
 * plain `Error` is raised.
 */
export function reportInvalidOption(option: string, reason: string): never {
  throw new Error(`${MESSAGE_PREFIX} Invalid option "${option}": ${reason}`);
}
