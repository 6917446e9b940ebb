import { DEFAULT_TTL_MS } from './cache';
import { defaultRegistry, type LookupRegistry } from './lookups';
import { Query } from './query';
import {
  CachedSource,
  fromJson,
  fromMapping,
  toSourceAdapter,
  type CachedSourceOptions,
  type JsonSourceOptions,
  type RecordSource,
  type SourceAdapter,
  type SourceInput,
} from './sources';
import type { Lookups, QueryResult } from './types';

// Types
// ==============================

export interface ManagerOptions {
  /** Name of the records, used in error messages. Defaults to `Record`. */
  name?: string;
  registry?: LookupRegistry;
}

export type CachedManagerOptions<R> = ManagerOptions & Omit<CachedSourceOptions<R>, 'name'>;

/** TTL of `Manager.fromFetch`, for sources behind a remote API. */
export const FETCH_TTL_MS = 5 * 60 * 1000;

// Implementation
// ==============================

/**
 * Owns a source and hands out queries over it.
 *
 * Every query method is a shortcut for the same call on `all()`.
 *
 * @example
 * ```ts
 * const repos = Manager.fromFetch(() => api.listRepos(), { name: 'Repo' });
 * const popular = await repos.filter({ stars__gte: 100 }).orderBy('-stars').toArray();
 * ```
 */
export class Manager<R> {
  readonly source: SourceAdapter<R>;
  readonly name: string;
  readonly registry: LookupRegistry;

  constructor(source: SourceInput<R>, options: ManagerOptions = {}) {
    this.source = toSourceAdapter(source, options.name);
    this.name = options.name ?? 'Record';
    this.registry = options.registry ?? defaultRegistry;
  }

  /**
   * Manager over a fetch function cached for an hour by default.
   */
  static cached<TRecord>(
    fetchFn: RecordSource<TRecord>,
    options: CachedManagerOptions<TRecord> = {},
  ): Manager<TRecord> {
    const source = new CachedSource(fetchFn, {
      ...options,
      ttlMs: options.ttlMs ?? DEFAULT_TTL_MS,
    });
    return new Manager(source, options);
  }

  /**
   * Manager over a remote fetch, cached for five minutes by default.
   */
  static fromFetch<TRecord>(
    fetchFn: RecordSource<TRecord>,
    options: CachedManagerOptions<TRecord> = {},
  ): Manager<TRecord> {
    return Manager.cached(fetchFn, { ...options, ttlMs: options.ttlMs ?? FETCH_TTL_MS });
  }

  static fromMapping(value: unknown, options: ManagerOptions = {}): Manager<unknown> {
    return new Manager(fromMapping(value, options.name), options);
  }

  static fromJson(document: unknown, options: ManagerOptions & JsonSourceOptions = {}): Manager<unknown> {
    return new Manager(fromJson(document, options), options);
  }

  // Queries
  // ==============================

  all(): Query<R> {
    return Query.from(this.source, { label: this.name, registry: this.registry });
  }

  filter(...lookups: Lookups[]): Query<R> {
    return this.all().filter(...lookups);
  }

  exclude(...lookups: Lookups[]): Query<R> {
    return this.all().exclude(...lookups);
  }

  orderBy(...fields: string[]): Query<R> {
    return this.all().orderBy(...fields);
  }

  reverse(): Query<R> {
    return this.all().reverse();
  }

  distinct(): Query<R> {
    return this.all().distinct();
  }

  none(): Query<R> {
    return this.all().none();
  }

  slice(start: number, end?: number): Query<R> {
    return this.all().slice(start, end);
  }

  values(...fields: string[]): Query<R, Record<string, unknown>> {
    return this.all().values(...fields);
  }

  valuesList(...fields: string[]): Query<R, unknown[]> {
    return this.all().valuesList(...fields);
  }

  valuesFlat(field: string): Query<R, unknown> {
    return this.all().valuesFlat(field);
  }

  get(...lookups: Lookups[]): Promise<R> {
    return this.all().get(...lookups);
  }

  count(): Promise<number> {
    return this.all().count();
  }

  exists(): Promise<boolean> {
    return this.all().exists();
  }

  first(): Promise<R | null> {
    return this.all().first();
  }

  last(): Promise<R | null> {
    return this.all().last();
  }

  toArray(): Promise<R[]> {
    return this.all().toArray();
  }

  execute(): Promise<QueryResult<R>> {
    return this.all().execute();
  }

  // Cache Control
  // ==============================

  /**
   * Drop the cached records. False when nothing was cached or the source
   * is not cached at all.
   */
  invalidate(): boolean {
    return this.source.invalidate?.() ?? false;
  }

  /**
   * Fetch the records now. A cached source stores them; failures propagate.
   */
  async refresh(): Promise<readonly R[]> {
    if (this.source.refresh) {
      return this.source.refresh();
    }
    const { records } = await this.source.materialize();
    return records;
  }
}
