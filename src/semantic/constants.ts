import type { ConstantFailure, ConstantSuccess } from '../types';

/**
 * Canonical failure sentinel for "no compile-time value".
 *
 * Frozen and shared by every model; compare results on `success`, not by
 * identity.
 */
export const UNRESOLVED: ConstantFailure = Object.freeze({
  success: false
} as const);

/**
 * Constructs a successful constant evaluation result.
 *
 * @param value
 *   The value the expression evaluates to at compile time.
 * @returns
 *   A {@link ConstantSuccess} wrapper containing `value`.
 */
export function resolved<T>(value: T): ConstantSuccess<T> {
  return { success: true, value };
}
