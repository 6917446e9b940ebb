import { CacheLayer, DEFAULT_TTL_MS } from './cache';
import { SourceFetchError } from './errors';
import type { Logger } from './logger';
import type { Materialization } from './types';
import { deriveCacheKey } from './utils/cache-key';
import { isIterableObject, isNullish } from './utils/comparison';
import { resolvePath } from './utils/field-path';

// Types
// ==============================

/**
 * Zero-argument callable producing records. May be called many times.
 */
export type RecordSource<R> = () => SourceResult<R> | Promise<SourceResult<R>>;

/**
 * What a record source may return. `null` means no records; a value that
 * is not a collection is a single record.
 */
export type SourceResult<R> = Iterable<R> | R | null | undefined;

/**
 * Normalized source: everything a query reads from.
 */
export interface SourceAdapter<R> {
  readonly name: string;
  materialize(): Promise<Materialization<R>>;
  /** Drop cached records, for sources that cache. */
  invalidate?(): boolean;
  /** Fetch now and store the records, for sources that cache. */
  refresh?(): Promise<readonly R[]>;
}

/**
 * Anything a query or manager accepts as a source.
 */
export type SourceInput<R> = SourceAdapter<R> | RecordSource<R> | Iterable<R>;

export interface CachedSourceOptions<R> {
  /** Shared cache; a private one is created when omitted. */
  cache?: CacheLayer<readonly R[]>;
  /** Explicit key; derived from the fetch function when omitted. */
  key?: string;
  ttlMs?: number;
  /** Namespace of the derived key and name of the source. */
  name?: string;
  /** Disambiguating values folded into the derived key. */
  args?: readonly unknown[];
  /** Derive a key that survives restarts. */
  stable?: boolean;
  /** Logger of the private cache. */
  logger?: Logger;
}

export interface JsonSourceOptions {
  /** Dotted path to the records inside the document (`results.items`). */
  path?: string;
  name?: string;
}

// Implementation
// ==============================

/**
 * Collect a source result into an array. A value that is not a collection
 * (a string included) becomes a single record.
 */
function collectRecords<R>(result: Iterable<R> | R | null | undefined): R[] {
  if (isNullish(result)) return [];
  if (isRecordCollection(result)) return Array.from(result);
  return [result];
}

function isRecordCollection<R>(result: Iterable<R> | R): result is Iterable<R> {
  return typeof result !== 'string' && isIterableObject(result);
}

function isSourceAdapter<R>(input: SourceInput<R>): input is SourceAdapter<R> {
  return typeof input === 'object' && input !== null && 'materialize' in input
    && typeof input.materialize === 'function';
}

/**
 * Wraps a record source; every materialization calls it again.
 */
export class FunctionSource<R> implements SourceAdapter<R> {
  constructor(
    private readonly source: RecordSource<R>,
    readonly name: string = source.name || 'source',
  ) {}

  async materialize(): Promise<Materialization<R>> {
    let result: SourceResult<R>;
    try {
      result = await this.source();
    }
    catch (error) {
      throw error instanceof SourceFetchError ? error : new SourceFetchError(this.name, error);
    }

    return {
      records: collectRecords<R>(result),
      status: 'direct',
      degraded: false,
      fetchedAt: Date.now(),
    };
  }
}

/**
 * Materializes a fetch function through a `CacheLayer`.
 */
export class CachedSource<R> implements SourceAdapter<R> {
  readonly name: string;
  readonly key: string;
  readonly cache: CacheLayer<readonly R[]>;
  private readonly ttlMs: number;

  constructor(
    private readonly fetchFn: RecordSource<R>,
    options: CachedSourceOptions<R> = {},
  ) {
    this.key = options.key ?? deriveCacheKey(fetchFn, {
      namespace: options.name,
      args: options.args,
      stable: options.stable,
    });
    this.name = options.name ?? this.key;
    this.cache = options.cache ?? new CacheLayer<readonly R[]>({ logger: options.logger });
    this.ttlMs = options.ttlMs ?? DEFAULT_TTL_MS;
  }

  async materialize(): Promise<Materialization<R>> {
    const lookup = await this.cache.getOrFetch(this.key, () => this.load(), this.ttlMs);
    return {
      records: lookup.value,
      status: lookup.status,
      degraded: lookup.degraded,
      fetchedAt: lookup.storedAt,
    };
  }

  /**
   * Fetch now and overwrite the cached records; failures propagate.
   */
  refresh(): Promise<readonly R[]> {
    return this.cache.refresh(this.key, () => this.load(), this.ttlMs);
  }

  invalidate(): boolean {
    return this.cache.invalidate(this.key);
  }

  private async load(): Promise<readonly R[]> {
    return collectRecords<R>(await this.fetchFn());
  }
}

/**
 * Normalize any accepted source input into a `SourceAdapter`.
 */
export function toSourceAdapter<R>(input: SourceInput<R>, name?: string): SourceAdapter<R> {
  if (typeof input === 'function') {
    return new FunctionSource<R>(input, name);
  }
  if (isSourceAdapter(input)) {
    return input;
  }
  return fromRecords(input, name);
}

/**
 * A fixed list of records. The iterable is copied once, up front.
 */
export function fromRecords<R>(records: Iterable<R>, name = 'records'): SourceAdapter<R> {
  const snapshot = Array.from(records);
  return new FunctionSource<R>(() => snapshot, name);
}

/**
 * Records from a configuration-style value, or a function reading one.
 *
 * - arrays: one record per item
 * - plain objects: one `{ key, value }` record per entry
 * - `null`/`undefined`: no records
 * - anything else: a single record
 */
export function fromMapping(read: unknown, name = 'mapping'): SourceAdapter<unknown> {
  return new FunctionSource<unknown>(() => mappingRecords(isReader(read) ? read() : read), name);
}

function isReader(value: unknown): value is () => unknown {
  return typeof value === 'function';
}

function mappingRecords(value: unknown): unknown[] {
  if (isNullish(value)) return [];
  if (Array.isArray(value)) return [...value];
  if (isPlainObject(value)) {
    return Object.entries(value).map(([key, entryValue]) => ({ key, value: entryValue }));
  }
  return [value];
}

/**
 * Records from a JSON document: text, or an already-parsed value.
 *
 * `path` narrows the document before records are taken from it. A list
 * yields its items, an object yields itself, anything else nothing.
 * Malformed text rejects with `SourceFetchError` on materialization.
 *
 * @example
 * ```ts
 * fromJson('{"results":{"items":[{"sku":"A-1"}]}}', { path: 'results.items' });
 * ```
 */
export function fromJson(document: unknown, options: JsonSourceOptions = {}): SourceAdapter<unknown> {
  const name = options.name ?? 'json';
  return new FunctionSource<unknown>(() => {
    const parsed: unknown = typeof document === 'string' ? JSON.parse(document) : document;
    const target = options.path ? resolvePath(parsed, options.path) : parsed;

    if (Array.isArray(target)) return target;
    if (target !== null && typeof target === 'object') return [target];
    return [];
  }, name);
}

/**
 * A fetch function materialized through a cache.
 */
export function cachedSource<R>(
  fetchFn: RecordSource<R>,
  options: CachedSourceOptions<R> = {},
): CachedSource<R> {
  return new CachedSource(fetchFn, options);
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (value === null || typeof value !== 'object') return false;
  const prototype: unknown = Object.getPrototypeOf(value);
  return prototype === Object.prototype || prototype === null;
}
