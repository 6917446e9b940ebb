import { describe, it, expect } from 'vitest';
import {
  InvalidOperandError,
  LookupRegistry,
  LOOKUP_NAMES,
  TypeMismatchError,
  UnknownLookupError,
  defaultLookups,
  defaultRegistry,
  parseLookupKey,
} from '../src';


describe('Lookup keys', () => {
  it('treats a bare path as exact', () => {
    expect(parseLookupKey('name')).toEqual({ path: 'name', operator: 'exact' });
  });


  it('takes the operator from the last separator', () => {
    expect(parseLookupKey('age__gte')).toEqual({ path: 'age', operator: 'gte' });
    expect(parseLookupKey('address.city__icontains')).toEqual({
      path: 'address.city',
      operator: 'icontains',
    });
    expect(parseLookupKey('odd__name__exact')).toEqual({ path: 'odd__name', operator: 'exact' });
  });
});


describe('Default lookups', () => {
  const { exact, contains, icontains, gt, gte, lt, lte, isnull } = defaultLookups;


  it('registers every operator tag', () => {
    expect(defaultRegistry.names().sort()).toEqual([...LOOKUP_NAMES].sort());
  });


  it('exact is type-sensitive and structural', () => {
    expect(exact(1, 1)).toBe(true);
    expect(exact(1, '1')).toBe(false);
    expect(exact(null, null)).toBe(true);
    expect(exact(undefined, null)).toBe(true);
    expect(exact('x', null)).toBe(false);
    expect(exact(new Date('2025-01-01T00:00:00Z'), new Date('2025-01-01T00:00:00Z'))).toBe(true);
    expect(exact(['a', 1], ['a', 1])).toBe(true);
    expect(exact({ a: 1, b: [2] }, { b: [2], a: 1 })).toBe(true);
    expect(exact({ a: 1 }, { a: 1, b: 2 })).toBe(false);
  });


  it('contains matches substrings of the canonical string', () => {
    expect(contains('Lisbon', 'isb')).toBe(true);
    expect(contains('Lisbon', 'ISB')).toBe(false);
    expect(contains(4200, 42)).toBe(true);
    expect(contains(true, 'ru')).toBe(true);
    expect(contains(null, 'a')).toBe(false);
  });


  it('icontains ignores case', () => {
    expect(icontains('Lisbon', 'ISB')).toBe(true);
    expect(icontains('Lisbon', 'porto')).toBe(false);
  });


  it('prefix and suffix lookups', () => {
    expect(defaultLookups.startswith('Alice', 'Al')).toBe(true);
    expect(defaultLookups.startswith('Alice', 'al')).toBe(false);
    expect(defaultLookups.istartswith('Alice', 'al')).toBe(true);
    expect(defaultLookups.endswith('report.pdf', '.pdf')).toBe(true);
    expect(defaultLookups.iendswith('REPORT.PDF', '.pdf')).toBe(true);
    expect(defaultLookups.endswith(null, '.pdf')).toBe(false);
  });


  it('canonical string of a date is ISO 8601', () => {
    const date = new Date('2025-03-04T05:06:07.000Z');
    expect(defaultLookups.startswith(date, '2025-03-04T')).toBe(true);
  });


  it('string lookups reject a null operand', () => {
    expect(() => contains('abc', null)).toThrow(InvalidOperandError);
    expect(() => defaultLookups.iendswith('abc', undefined)).toThrow(InvalidOperandError);
  });


  it('in tests membership of any iterable', () => {
    expect(defaultLookups.in('b', ['a', 'b'])).toBe(true);
    expect(defaultLookups.in(2, new Set([1, 2]))).toBe(true);
    expect(defaultLookups.in(2, ['2'])).toBe(false);
    expect(defaultLookups.in(null, [null])).toBe(true);
    expect(defaultLookups.in('a', [])).toBe(false);
  });


  it('in searches a map by key', () => {
    const owners = new Map([['ops', 'rui'], ['web', 'ana']]);

    expect(defaultLookups.in('ops', owners)).toBe(true);
    expect(defaultLookups.in('rui', owners)).toBe(false);
    expect(defaultLookups.in(['ops', 'rui'], owners)).toBe(false);
  });


  it('in rejects strings and non-iterables', () => {
    expect(() => defaultLookups.in('a', 'abc')).toThrow(InvalidOperandError);
    expect(() => defaultLookups.in(1, 1)).toThrow(InvalidOperandError);
    expect(() => defaultLookups.in(1, null)).toThrow(InvalidOperandError);
  });


  it('ordering lookups compare mutually ordered values', () => {
    expect(gt(3, 2)).toBe(true);
    expect(gt(2, 2)).toBe(false);
    expect(gte(2, 2)).toBe(true);
    expect(lt(1n, 2)).toBe(true);
    expect(lte('apple', 'banana')).toBe(true);
    expect(gt(new Date('2025-02-01'), new Date('2025-01-01'))).toBe(true);
    expect(gt(true, false)).toBe(true);
  });


  it('ordering lookups never match a null field', () => {
    expect(gt(null, 1)).toBe(false);
    expect(lte(undefined, 1)).toBe(false);
  });


  it('ordering lookups never match NaN or an invalid date', () => {
    const invalid = new Date('not a date');

    for (const lookup of [gt, gte, lt, lte]) {
      expect(lookup(Number.NaN, 5)).toBe(false);
      expect(lookup(5, Number.NaN)).toBe(false);
      expect(lookup(Number.NaN, Number.NaN)).toBe(false);
      expect(lookup(10n, Number.NaN)).toBe(false);
      expect(lookup(invalid, new Date('2025-01-01'))).toBe(false);
    }
    expect(() => gt(Number.NaN, 'a')).toThrow(TypeMismatchError);
  });


  it('ordering lookups reject mismatched types and null operands', () => {
    expect(() => gt('10', 5)).toThrow(TypeMismatchError);
    expect(() => lt(new Date(), 5)).toThrow(TypeMismatchError);
    expect(() => gt(1, null)).toThrow(InvalidOperandError);
  });


  it('type mismatch errors carry both sides', () => {
    try {
      gte('10', 5);
      expect.unreachable();
    }
    catch (error) {
      expect(error).toBeInstanceOf(TypeMismatchError);
      if (error instanceof TypeMismatchError) {
        expect(error.lookup).toBe('gte');
        expect(error.left).toBe('10');
        expect(error.right).toBe(5);
        expect(error.message).toBe('Cannot compare string "10" with number 5 using "gte"');
      }
    }
  });


  it('isnull needs a boolean', () => {
    expect(isnull(null, true)).toBe(true);
    expect(isnull(undefined, true)).toBe(true);
    expect(isnull(0, true)).toBe(false);
    expect(isnull('', false)).toBe(true);
    expect(() => isnull(null, 'yes')).toThrow(InvalidOperandError);
  });
});


describe('LookupRegistry', () => {
  it('resolve throws for unknown names', () => {
    expect(() => defaultRegistry.resolve('regex')).toThrow(UnknownLookupError);
    expect(() => defaultRegistry.resolve('regex')).toThrow(/^Unknown lookup "regex"\. Must be one of: exact, /);
  });


  it('extend returns a new registry and leaves the original alone', () => {
    const extended = defaultRegistry.extend('even', (value) => typeof value === 'number' && value % 2 === 0);

    expect(extended.has('even')).toBe(true);
    expect(extended.has('exact')).toBe(true);
    expect(defaultRegistry.has('even')).toBe(false);
    expect(extended.resolve('even')(4, undefined)).toBe(true);
  });


  it('extend can replace an operator', () => {
    const extended = defaultRegistry.extend('exact', () => true);
    expect(extended.resolve('exact')(1, 2)).toBe(true);
    expect(defaultRegistry.resolve('exact')(1, 2)).toBe(false);
  });


  it('rejects invalid operator names', () => {
    expect(() => defaultRegistry.extend('not__allowed', () => true)).toThrow(/Invalid lookup name/);
    expect(() => defaultRegistry.extend('a.b', () => true)).toThrow(/Invalid lookup name/);
    expect(() => new LookupRegistry({ '': () => true })).toThrow(/Invalid lookup name ""/);
  });
});
