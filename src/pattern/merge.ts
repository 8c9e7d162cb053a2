import type {
  DiscardDesignation,
  Pattern,
  PatternOfKind,
  SingleVariableDesignation,
  VarPattern
} from '../types';
import type { ContainingPattern } from './designation';
import type { BindingPreservationInvariant, UniqueSubpatternNames } from '../architecture';

import { isPatternKind } from '../guards';
import { assertInvariant, unexpectedValue } from '../report';
import {
  andPattern,
  declarationPattern,
  parenthesizedPattern,
  recursivePattern,
  withAnnotations
} from '../syntax/factory';
import { collectDesignationNames } from './designation';
import { createSubpattern, wrapInSubpatterns } from './synthesize';

type ShapeRule = (containing: ContainingPattern, fragment: Pattern) => Pattern | undefined;

/**
 * Declares one row of the shape table. The merge callback only runs when both
 * kinds match, and may still decline by returning `undefined`.
 */
function rule<C extends ContainingPattern['kind'], F extends Pattern['kind']>(
  containingKind: C,
  fragmentKind: F,
  merge: (containing: PatternOfKind<C>, fragment: PatternOfKind<F>) => Pattern | undefined
): ShapeRule {
  return (containing, fragment) =>
    isPatternKind(containing, containingKind) && isPatternKind(fragment, fragmentKind)
      ? merge(containing, fragment)
      : undefined;
}

function bindingOf(pattern: VarPattern): SingleVariableDesignation | DiscardDesignation {
  const { designation } = pattern;
  if (designation.kind === 'parenthesizedDesignation') {
    return unexpectedValue(pattern, 'merging into a var pattern');
  }
  return designation;
}

/**
 * Shape merges without member names, first match wins.
 */
const SHAPE_RULES: readonly ShapeRule[] = [
  // `var x` + `{ … }` → `{ … } x`
  rule('varPattern', 'recursivePattern', (containing, fragment) =>
    fragment.designation
      ? undefined
      : recursivePattern({
          type: fragment.type,
          positional: fragment.positional,
          properties: fragment.properties,
          designation: bindingOf(containing)
        })
  ),

  // `var x` + `T` → `T x`
  rule('varPattern', 'typePattern', (containing, fragment) =>
    declarationPattern(fragment.type, bindingOf(containing))
  ),

  // `T x` + `{ … }` → `T { … } x`
  rule('declarationPattern', 'recursivePattern', (containing, fragment) =>
    fragment.type || fragment.designation
      ? undefined
      : recursivePattern({
          type: containing.type,
          positional: fragment.positional,
          properties: fragment.properties,
          designation: containing.designation
        })
  ),

  // `{ … } x` + `T` → `T { … } x`
  rule('recursivePattern', 'typePattern', (containing, fragment) =>
    containing.type
      ? undefined
      : recursivePattern({
          type: fragment.type,
          positional: containing.positional,
          properties: containing.properties,
          designation: containing.designation
        })
  )
];

function mergeShape(containing: ContainingPattern, fragment: Pattern): Pattern {
  for (const shapeRule of SHAPE_RULES) {
    const merged = shapeRule(containing, fragment);
    if (merged) return merged;
  }
  return andPattern(parenthesizedPattern(containing), parenthesizedPattern(fragment));
}

function mergeProperty(
  containing: ContainingPattern,
  fragment: Pattern,
  names: readonly string[]
): Pattern | undefined {
  switch (containing.kind) {
    // `var x` / `T x` take `{ names: fragment }` by shape.
    case 'varPattern':
    case 'declarationPattern':
      return mergeShape(containing, wrapInSubpatterns(names, fragment));
    case 'recursivePattern': {
      const entry = createSubpattern(names, fragment);
      const properties = containing.properties ?? [];
      if (properties.some(existing => existing.name === entry.name)) {
        return undefined;
      }
      return recursivePattern({
        type: containing.type,
        positional: containing.positional,
        properties: [...properties, entry],
        designation: containing.designation
      });
    }
  }
}

/**
 * Merges a synthesized fragment into the pattern that introduced a binding.
 *
 * Without `names` the fragment constrains the bound value itself and is
 * folded in by shape (see {@link SHAPE_RULES}), falling back to
 * `(containing) and (fragment)`. With `names` it constrains a member of the
 * bound value and becomes a property subpattern: `T x` with `['P']` over `1`
 * is `T { P: 1 } x`.
 *
 * Every binding of `containing` survives in the result
 * ({@link BindingPreservationInvariant}), and a member already in the
 * property clause is not added again ({@link UniqueSubpatternNames}).
 *
 * @returns The merged pattern tagged for formatting and simplification, or
 *          `undefined` when the property clause already has that name.
 * @throws {RewriteInvariantError} When a binding would be lost
 */
export function rewriteContainingPattern(
  containing: ContainingPattern,
  fragment: Pattern,
  names: readonly string[]
): Pattern | undefined {
  const merged =
    names.length === 0
      ? mergeShape(containing, fragment)
      : mergeProperty(containing, fragment, names);
  if (!merged) return undefined;

  const kept = new Set(collectDesignationNames(merged));
  for (const name of collectDesignationNames(containing)) {
    assertInvariant(kept.has(name), `Merging would drop the binding "${name}".`);
  }

  return withAnnotations(merged, 'format', 'simplify');
}
