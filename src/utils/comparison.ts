import { TypeMismatchError } from '../errors';

// Guards
// ==============================

export function isNullish(value: unknown): value is null | undefined {
  return value === null || value === undefined;
}

/**
 * True for iterable objects. Strings are iterable but are not collections here.
 */
export function isIterableObject(value: unknown): value is Iterable<unknown> {
  return (
    value !== null &&
    typeof value === 'object' &&
    typeof Reflect.get(value, Symbol.iterator) === 'function'
  );
}

// Equality
// ==============================

/**
 * Structural, type-sensitive equality used by `exact`, `in` and `distinct`.
 *
 * - `null` and `undefined` are the same value
 * - numbers never equal strings (`1` vs `'1'`)
 * - dates compare by timestamp
 * - arrays, maps and plain objects compare element-wise
 */
export function valuesEqual(left: unknown, right: unknown): boolean {
  if (left === right) return true;
  if (isNullish(left) || isNullish(right)) return isNullish(left) && isNullish(right);

  if (typeof left === 'number' && typeof right === 'number') {
    return Number.isNaN(left) && Number.isNaN(right);
  }

  if (left instanceof Date || right instanceof Date) {
    return left instanceof Date && right instanceof Date && Object.is(left.getTime(), right.getTime());
  }

  if (Array.isArray(left) || Array.isArray(right)) {
    if (!Array.isArray(left) || !Array.isArray(right)) return false;
    if (left.length !== right.length) return false;
    return left.every((item, index) => valuesEqual(item, right[index]));
  }

  if (left instanceof Map || right instanceof Map) {
    if (!(left instanceof Map) || !(right instanceof Map)) return false;
    if (left.size !== right.size) return false;
    for (const [key, value] of left) {
      if (!right.has(key) || !valuesEqual(value, right.get(key))) return false;
    }
    return true;
  }

  if (typeof left === 'object' && typeof right === 'object') {
    const leftEntries = Object.entries(left);
    const rightKeys = new Set(Object.keys(right));
    if (leftEntries.length !== rightKeys.size) return false;
    return leftEntries.every(
      ([key, value]) => rightKeys.has(key) && valuesEqual(value, Reflect.get(right, key)),
    );
  }

  return false;
}

// Ordering
// ==============================

function isNumeric(value: unknown): value is number | bigint {
  return typeof value === 'number' || typeof value === 'bigint';
}

/**
 * True for `NaN` and invalid dates, which have no place in any ordering.
 */
export function isUnordered(value: unknown): boolean {
  if (typeof value === 'number') return Number.isNaN(value);
  if (value instanceof Date) return Number.isNaN(value.getTime());
  return false;
}

function sign(left: number | bigint | string, right: number | bigint | string): number {
  if (left < right) return -1;
  if (left > right) return 1;
  return Number.isNaN(left) || Number.isNaN(right) ? Number.NaN : 0;
}

/**
 * Compare two non-null values that must be mutually ordered.
 * Numbers and bigints order together; strings order by code unit.
 *
 * The result is `NaN` when either side is `NaN` or an invalid date, so
 * every `< 0`, `<= 0`, `>= 0` or `> 0` test on it is false.
 *
 * @throws {TypeMismatchError} when the values are not mutually ordered
 */
export function compareOrdered(lookup: string, left: unknown, right: unknown): number {
  if (isNumeric(left) && isNumeric(right)) return sign(left, right);
  if (typeof left === 'string' && typeof right === 'string') return sign(left, right);
  if (left instanceof Date && right instanceof Date) return sign(left.getTime(), right.getTime());
  if (typeof left === 'boolean' && typeof right === 'boolean') return Number(left) - Number(right);

  throw new TypeMismatchError(lookup, left, right);
}

/**
 * Sort comparator over field values. Null sorts before every other value;
 * `NaN` and invalid dates sort with null.
 */
export function compareForSort(left: unknown, right: unknown): number {
  const leftIsNull = isNullish(left) || isUnordered(left);
  const rightIsNull = isNullish(right) || isUnordered(right);

  if (leftIsNull && rightIsNull) return 0;
  if (leftIsNull) return -1;
  if (rightIsNull) return 1;

  return compareOrdered('orderBy', left, right);
}

// Canonical Forms
// ==============================

/**
 * Canonical string form used by every string lookup.
 *
 * - strings: unchanged
 * - numbers, bigints, booleans: `String(value)` (`42`, `true`)
 * - dates: ISO 8601 (`toISOString()`), `Invalid Date` when invalid
 * - arrays and objects: `JSON.stringify`, bigints rendered as digits
 */
export function canonicalString(value: unknown): string {
  if (typeof value === 'string') return value;
  if (value instanceof Date) {
    return Number.isNaN(value.getTime()) ? 'Invalid Date' : value.toISOString();
  }
  if (value !== null && typeof value === 'object') {
    return JSON.stringify(value, (_key, nested: unknown) =>
      typeof nested === 'bigint' ? nested.toString() : nested,
    );
  }
  return String(value);
}

/**
 * Type-tagged key such that `stableKey(a) === stableKey(b)` iff
 * `valuesEqual(a, b)` for plain data. Object keys are sorted.
 */
export function stableKey(value: unknown): string {
  if (isNullish(value)) return 'null';

  switch (typeof value) {
    case 'string':
      return `s:${JSON.stringify(value)}`;
    case 'number':
      return `n:${String(value)}`;
    case 'bigint':
      return `b:${value.toString()}`;
    case 'boolean':
      return `B:${String(value)}`;
    default:
      break;
  }

  if (value instanceof Date) return `d:${value.getTime()}`;

  if (Array.isArray(value)) {
    return `[${value.map((item) => stableKey(item)).join(',')}]`;
  }

  if (value instanceof Map) {
    const parts = Array.from(value, ([key, item]) => `${stableKey(key)}=${stableKey(item)}`);
    return `M{${parts.sort().join(',')}}`;
  }

  if (typeof value === 'object') {
    const parts = Object.keys(value)
      .sort()
      .map((key) => `${JSON.stringify(key)}:${stableKey(Reflect.get(value, key))}`);
    return `{${parts.join(',')}}`;
  }

  return `${typeof value}:${String(value)}`;
}
