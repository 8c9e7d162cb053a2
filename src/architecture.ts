import type { resolveCommonReceiver } from './receiver/common-receiver';
import type { rewriteContainingPattern } from './pattern/merge';
import type { canFoldNullSafeTest } from './pattern/null-match';

/**
 * ARCHITECTURE INDEX (GROUPED)
 *
 * RATIONALE
 * 1. Short-Circuit Equivalence
 *
 * DEFINITION
 * 2. Receivers and Name Sequences
 *
 * CONCEPT
 * 3. Null-Safe Chains
 *
 * POLICY
 * 4. Binding Preservation
 * 5. Unique Subpattern Names
 *
 * STRATEGY
 * 6. Path-Addressed Replacement
 *
 * Recommended reading flow:
 * RATIONALE -> DEFINITION -> CONCEPT -> POLICY -> STRATEGY
 */

/**
 * HEADER TAXONOMY
 *
 * - POLICY:
 *   Non-negotiable rule (`must` / `must not`) and enforcement semantics.
 *
 * - STRATEGY:
 *   Chosen implementation approach used to satisfy policies.
 *
 * - DEFINITION:
 *   Formal meaning and scope of a term or boundary.
 *
 * - RATIONALE:
 *   Why a policy or strategy exists.
 *
 * - CONCEPT:
 *   Mental model framing the problem space.
 */

/**
 * ARCHITECTURAL RATIONALE (1)
 * Short-Circuit Equivalence
 *
 * ---
 *
 * A rewrite replaces boolean logic with a pattern test. It is only correct if
 * the pattern evaluates to the same result for every input, including the
 * inputs on which the replaced `&&` chain short-circuits.
 *
 * 1. `&&` chains
 *    `a.b == 1 && a.c == 2` reads `a.c` only when `a.b == 1`. The property
 *    pattern `a is { b: 1, c: 2 }` tests its entries in order and stops at the
 *    first failing one, so the observable reads are the same.
 *
 * 2. Null receivers
 *    A property pattern never matches `null`. `a?.b == 1 && a?.c == 2` is
 *    `false` for a null `a`, and so is `a is { b: 1, c: 2 }`.
 *    `a.b == 1` on a null `a` would fail at run time instead; the pattern
 *    turns that into `false`, which only removes a failure.
 *    `a?.b != 1` is `true` for a null `a`, which no property pattern can
 *    reproduce (see {@link NullSafeChainConcept}).
 *
 * 3. Guards
 *    A when clause runs after its pattern matched. Folding the left-most test
 *    of the guard into the pattern keeps that order: the moved test still runs
 *    after the rest of the pattern and before the remaining guard.
 */
export type ShortCircuitEquivalence = never;

/**
 * ARCHITECTURAL DEFINITION (2)
 * Receivers and Name Sequences
 *
 * ---
 *
 * - **Receiver**: the expression a boolean test is about. For `a.b.c == 1`
 *   it is `a`; for `e is C` it is `e`. An absent receiver is an implicit
 *   self reference (`P == 1` where `P` is a property of the enclosing type).
 *
 * - **Name sequence**: the member names read from the receiver, root to leaf:
 *   `[b, c]` for `a.b.c`. Only names that can appear in a property pattern
 *   qualify (non-static fields and properties, not declared on a nullable
 *   wrapper); the first name that does not qualify ends the sequence and its
 *   expression becomes the receiver.
 *
 * Two tests can be combined when their receivers are equivalent. Their shared
 * root-side names move into the receiver (see {@link resolveCommonReceiver}).
 */
export type ReceiverDefinition = never;

/**
 * ARCHITECTURAL CONCEPT (3)
 * Null-Safe Chains
 *
 * ---
 *
 * `a?.b.c` is a conditional access over `a` whose `whenNotNull` part is
 * `.b.c`, a chain rooted at a member binding. Decomposition reads the
 * `whenNotNull` part first and then continues into `a`, so the null-safe
 * operator disappears from the name sequence: a property pattern already
 * includes the null check.
 *
 * When the `whenNotNull` part stops early (`a?.M().b` stops at the call), the
 * receiver keeps the conditional: `a?.M()`.
 *
 * Dropping `?.` is only sound when the test is `false` for `null`. A test
 * read through `?.` whose pattern matches `null` (`!= c`, `== null`,
 * `is not …`, `is var x`) stays as written, wherever the `?.` sits in its
 * chain: the receiver of `a?.b.c != 1 && a?.b.d != 2` would be `a?.b`,
 * which is just as null as `a`. Enforced by {@link canFoldNullSafeTest}.
 */
export type NullSafeChainConcept = never;

/**
 * ARCHITECTURAL POLICY (4)
 * Binding Preservation
 *
 * ---
 *
 * Every variable a pattern declares before a merge must still be declared,
 * with the same name, after it. Code after the pattern may read it.
 *
 * Enforcement
 * -----------
 * {@link rewriteContainingPattern} checks the merged pattern and throws a
 * `RewriteInvariantError` when a binding went missing. Bindings that become
 * unused are kept and the pattern is tagged `simplify`; removing them is the
 * job of a later pass.
 */
export type BindingPreservationInvariant = never;

/**
 * ARCHITECTURAL POLICY (5)
 * Unique Subpattern Names
 *
 * ---
 *
 * One property clause must not name the same member twice. A rewrite that
 * would produce `{ b: 1, b: 2 }`, or add `b` to a clause that already tests
 * it, is not offered.
 */
export type UniqueSubpatternNames = never;

/**
 * ARCHITECTURAL STRATEGY (6)
 * Path-Addressed Replacement
 *
 * ---
 *
 * Trees are immutable. A location is a `SyntaxPath` of property keys and
 * array indices from the root. The rewrite computes the replacement node up
 * front and hands out a function that copies the containers along the path
 * and shares everything else with the input tree.
 *
 * Guards are rewritten by rebuilding their owner (the case label or switch
 * arm), so the pattern edit and the guard edit land as one replacement.
 */
export type PathAddressedReplacement = never;
