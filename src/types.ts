import type { LookupRegistry } from './lookups';

/**
 * Lookups passed to `filter`, `exclude` and `get`.
 *
 * Keys are `path` or `path__operator`; a bare path means `exact`.
 * Paths are dotted (`address.city`) and resolve fail-soft to `null`.
 *
 * @example
 * ```ts
 * people.filter({ age__gte: 25, 'address.city__icontains': 'lis' });
 * ```
 */
export type Lookups = Readonly<Record<string, unknown>>;

/**
 * A single field test: `path` `operator` `operand`.
 */
export interface Predicate {
  readonly path: string;
  readonly operator: string;
  readonly operand: unknown;
}

/**
 * Conjunction of predicates. A negated group removes the records that
 * satisfy every one of its predicates.
 */
export interface PredicateGroup {
  readonly predicates: readonly Predicate[];
  readonly negated: boolean;
}

export type SortDirection = 'asc' | 'desc';

/**
 * One term of an ordering. `position` orders by materialization order.
 */
export type OrderTerm =
  | { readonly kind: 'field'; readonly path: string; readonly direction: SortDirection }
  | { readonly kind: 'position'; readonly direction: SortDirection };

/**
 * Half-open window over the ordered result. `end` is exclusive;
 * `null` means unbounded. Negative bounds count from the end.
 */
export interface SliceBounds {
  readonly start: number;
  readonly end: number | null;
}

export type Projection =
  | { readonly kind: 'records' }
  | { readonly kind: 'values'; readonly fields: readonly string[] }
  | { readonly kind: 'valuesList'; readonly fields: readonly string[] }
  | { readonly kind: 'flat'; readonly field: string };

/**
 * Everything a query describes, without its source.
 * Frozen; shared freely between chained queries.
 */
export interface QueryState {
  readonly filters: PredicateGroup;
  readonly exclusions: readonly PredicateGroup[];
  readonly ordering: readonly OrderTerm[];
  /** Windows applied in order after sorting. */
  readonly slices: readonly SliceBounds[];
  readonly distinct: boolean;
  readonly projection: Projection;
  readonly empty: boolean;
  /** Human-readable name of the records, used in error messages. */
  readonly label: string;
  readonly registry: LookupRegistry;
}

/**
 * How a lookup against a cache was answered.
 * - `fresh`: cached and within its TTL
 * - `fetched`: fetched by this call
 * - `stale`: expired value served while another fetch is in flight
 * - `fallback`: expired value served because this fetch failed
 */
export type CacheStatus = 'fresh' | 'fetched' | 'stale' | 'fallback';

/**
 * Result of `CacheLayer.getOrFetch`.
 */
export interface CacheLookup<V> {
  value: V;
  status: CacheStatus;
  /** True only when the value was served after a failed fetch. */
  degraded: boolean;
  /** Epoch ms at which the served value was stored. */
  storedAt: number;
}

/**
 * Records produced by a source, plus what is known about their freshness.
 */
export interface Materialization<R> {
  records: readonly R[];
  /** `direct` for uncached sources. */
  status: CacheStatus | 'direct';
  degraded: boolean;
  fetchedAt: number;
}

/**
 * Metadata about the materialization a query result was computed from.
 */
export interface QuerySnapshotInfo {
  label: string;
  /** `none` when the query never read its source. */
  status: Materialization<unknown>['status'] | 'none';
  degraded: boolean;
  /** ISO timestamp of the records, `null` with status `none`. */
  fetchedAt: string | null;
}

/**
 * Structured result of executing a query.
 */
export interface QueryResult<Row> {
  items: Row[];
  /** Records matching the filters, before slicing, projection and distinct. */
  total: number;
  snapshot: QuerySnapshotInfo;
}
