import { InvalidOperandError, UnknownLookupError } from './errors';
import {
  canonicalString,
  compareOrdered,
  isIterableObject,
  isNullish,
  valuesEqual,
} from './utils/comparison';

// Types
// ==============================

/**
 * Pure test of a resolved field value against a lookup operand.
 */
export type LookupFn = (fieldValue: unknown, operand: unknown) => boolean;

/**
 * Operator tags every registry understands.
 */
export const LOOKUP_NAMES = [
  'exact',
  'contains',
  'icontains',
  'in',
  'gt',
  'gte',
  'lt',
  'lte',
  'isnull',
  'startswith',
  'istartswith',
  'endswith',
  'iendswith',
] as const;

export type LookupName = (typeof LOOKUP_NAMES)[number];

// Implementation
// ==============================

function stringOperand(lookup: string, operand: unknown): string {
  if (isNullish(operand)) {
    throw new InvalidOperandError(lookup, operand, `"${lookup}" needs a non-null operand`);
  }
  return canonicalString(operand);
}

/**
 * Build a string lookup. A null field never matches.
 */
function stringLookup(
  lookup: string,
  test: (field: string, operand: string) => boolean,
  caseInsensitive = false,
): LookupFn {
  return (fieldValue, operand) => {
    const needle = stringOperand(lookup, operand);
    if (isNullish(fieldValue)) return false;

    const haystack = canonicalString(fieldValue);
    return caseInsensitive
      ? test(haystack.toLowerCase(), needle.toLowerCase())
      : test(haystack, needle);
  };
}

/**
 * Build an ordering lookup. A null field never matches, and neither does
 * `NaN` or an invalid date on either side; mismatched types throw.
 */
function orderingLookup(lookup: string, accept: (comparison: number) => boolean): LookupFn {
  return (fieldValue, operand) => {
    if (isNullish(operand)) {
      throw new InvalidOperandError(lookup, operand, `"${lookup}" needs a non-null operand`);
    }
    if (isNullish(fieldValue)) return false;
    return accept(compareOrdered(lookup, fieldValue, operand));
  };
}

/**
 * Membership in any iterable object. A `Map` is searched by key. Strings
 * are rejected although they are iterable, so `'abc'` is never read as a
 * set of characters.
 */
function membershipLookup(fieldValue: unknown, operand: unknown): boolean {
  if (!isIterableObject(operand)) {
    throw new InvalidOperandError('in', operand, '"in" needs an iterable operand (array, Set, ...)');
  }

  const members: Iterable<unknown> = operand instanceof Map ? operand.keys() : operand;
  for (const member of members) {
    if (valuesEqual(fieldValue, member)) return true;
  }
  return false;
}

function isNullLookup(fieldValue: unknown, operand: unknown): boolean {
  if (typeof operand !== 'boolean') {
    throw new InvalidOperandError('isnull', operand, '"isnull" needs a boolean operand');
  }
  return isNullish(fieldValue) === operand;
}

/**
 * Default predicate for every operator tag.
 */
export const defaultLookups: Readonly<Record<LookupName, LookupFn>> = Object.freeze({
  exact: (fieldValue: unknown, operand: unknown) => valuesEqual(fieldValue, operand),
  contains: stringLookup('contains', (field, needle) => field.includes(needle)),
  icontains: stringLookup('icontains', (field, needle) => field.includes(needle), true),
  in: membershipLookup,
  gt: orderingLookup('gt', (comparison) => comparison > 0),
  gte: orderingLookup('gte', (comparison) => comparison >= 0),
  lt: orderingLookup('lt', (comparison) => comparison < 0),
  lte: orderingLookup('lte', (comparison) => comparison <= 0),
  isnull: isNullLookup,
  startswith: stringLookup('startswith', (field, prefix) => field.startsWith(prefix)),
  istartswith: stringLookup('istartswith', (field, prefix) => field.startsWith(prefix), true),
  endswith: stringLookup('endswith', (field, suffix) => field.endsWith(suffix)),
  iendswith: stringLookup('iendswith', (field, suffix) => field.endsWith(suffix), true),
});

/**
 * Immutable mapping from operator tag to predicate.
 *
 * `extend` returns a new registry; the default registry never changes.
 *
 * @example
 * ```ts
 * const registry = defaultRegistry.extend('regex', (value, pattern) =>
 *   typeof value === 'string' && new RegExp(String(pattern)).test(value),
 * );
 * const people = new Manager(loadPeople, { registry });
 * ```
 */
export class LookupRegistry {
  private readonly lookups: ReadonlyMap<string, LookupFn>;

  constructor(lookups: Readonly<Record<string, LookupFn>> = defaultLookups) {
    for (const name of Object.keys(lookups)) {
      validateLookupName(name);
    }
    this.lookups = new Map(Object.entries(lookups));
  }

  /**
   * @throws {UnknownLookupError} if `name` is not registered
   */
  resolve(name: string): LookupFn {
    const lookup = this.lookups.get(name);
    if (!lookup) {
      throw new UnknownLookupError(name, this.names());
    }
    return lookup;
  }

  has(name: string): boolean {
    return this.lookups.has(name);
  }

  names(): string[] {
    return Array.from(this.lookups.keys());
  }

  extend(name: string, lookup: LookupFn): LookupRegistry {
    return new LookupRegistry({ ...Object.fromEntries(this.lookups), [name]: lookup });
  }
}

function validateLookupName(name: string): void {
  if (name.length === 0 || name.includes('__') || name.includes('.')) {
    throw new Error(`Invalid lookup name "${name}": must be non-empty without "__" or "."`);
  }
}

export const defaultRegistry = new LookupRegistry();
