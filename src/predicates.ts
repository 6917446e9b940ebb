import type { LookupFn, LookupRegistry } from './lookups';
import type { Lookups, Predicate, PredicateGroup } from './types';
import { resolvePath } from './utils/field-path';

const LOOKUP_SEPARATOR = '__';

// Construction
// ==============================

/**
 * Split a lookup key into field path and operator.
 *
 * The segment after the last `__` is the operator; a key without `__` is
 * an `exact` test. Nothing is validated here, so chaining never throws.
 */
export function parseLookupKey(key: string): { path: string; operator: string } {
  const separatorAt = key.lastIndexOf(LOOKUP_SEPARATOR);
  if (separatorAt === -1) {
    return { path: key, operator: 'exact' };
  }
  return {
    path: key.slice(0, separatorAt),
    operator: key.slice(separatorAt + LOOKUP_SEPARATOR.length),
  };
}

export function createPredicates(lookupSets: readonly Lookups[]): Predicate[] {
  const predicates: Predicate[] = [];
  for (const lookups of lookupSets) {
    for (const [key, operand] of Object.entries(lookups)) {
      predicates.push(Object.freeze({ ...parseLookupKey(key), operand }));
    }
  }
  return predicates;
}

export function createGroup(predicates: readonly Predicate[], negated = false): PredicateGroup {
  return Object.freeze({ predicates: Object.freeze([...predicates]), negated });
}

/**
 * Append predicates to an AND group, keeping its negation.
 */
export function extendGroup(group: PredicateGroup, predicates: readonly Predicate[]): PredicateGroup {
  if (predicates.length === 0) return group;
  return createGroup([...group.predicates, ...predicates], group.negated);
}

// Evaluation
// ==============================

interface CompiledPredicate {
  path: string;
  test: LookupFn;
  operand: unknown;
}

/**
 * Predicate group with every operator resolved against a registry.
 * @internal
 */
export interface CompiledGroup {
  predicates: CompiledPredicate[];
  negated: boolean;
}

/**
 * Resolve every operator once, before any record is tested.
 *
 * @throws {UnknownLookupError} for an unregistered operator
 */
export function compileGroup(group: PredicateGroup, registry: LookupRegistry): CompiledGroup {
  return {
    negated: group.negated,
    predicates: group.predicates.map((predicate) => ({
      path: predicate.path,
      test: registry.resolve(predicate.operator),
      operand: predicate.operand,
    })),
  };
}

/**
 * True when the record passes the group: every predicate holds for a
 * positive group, at least one fails for a negated one. Stops at the
 * first failing predicate.
 */
export function matchesGroup(record: unknown, group: CompiledGroup): boolean {
  let allHold = true;
  for (const predicate of group.predicates) {
    if (!predicate.test(resolvePath(record, predicate.path), predicate.operand)) {
      allHold = false;
      break;
    }
  }
  return group.negated ? !allHold : allHold;
}
