import { createHash } from 'node:crypto';
import { stableKey } from './comparison';

export interface CacheKeyOptions {
  /** Prefix of the key. Defaults to the function name, or `anonymous`. */
  namespace?: string;
  /** Values that tell apart registrations of the same function. */
  args?: readonly unknown[];
  /**
   * Derive the function part from its source text instead of its identity.
   * Such keys survive restarts; two functions with the same source share them.
   */
  stable?: boolean;
}

const HASH_LENGTH = 16;

const identities = new WeakMap<object, number>();
let nextIdentity = 1;

function identityOf(fn: object): number {
  let identity = identities.get(fn);
  if (identity === undefined) {
    identity = nextIdentity++;
    identities.set(fn, identity);
  }
  return identity;
}

function shortHash(text: string): string {
  return createHash('sha256').update(text).digest('hex').slice(0, HASH_LENGTH);
}

/**
 * Derive a cache key from a fetch function and optional disambiguating args.
 *
 * Without `stable`, the same function object always maps to the same key
 * for the lifetime of the process.
 *
 * @example
 * ```ts
 * deriveCacheKey(fetchRepos, { args: ['acme'] }); // 'fetchRepos#3:9c1d...'
 * deriveCacheKey(fetchRepos, { stable: true });   // 'fetchRepos@5e0a...'
 * ```
 */
export function deriveCacheKey(
  fetchFn: (...args: never[]) => unknown,
  options: CacheKeyOptions = {},
): string {
  const namespace = options.namespace ?? (fetchFn.name || 'anonymous');
  const identity = options.stable
    ? `@${shortHash(fetchFn.toString())}`
    : `#${identityOf(fetchFn)}`;
  const args = options.args && options.args.length > 0
    ? `:${shortHash(stableKey(options.args))}`
    : '';

  return `${namespace}${identity}${args}`;
}
