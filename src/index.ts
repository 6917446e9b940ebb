export { Query, type QueryOptions } from './query';
export {
  Manager,
  FETCH_TTL_MS,
  type CachedManagerOptions,
  type ManagerOptions,
} from './manager';
export { evaluate, evaluatePlan, type Evaluation, type EvaluationPlan } from './evaluator';

// Lookups
// ==============================
export {
  LookupRegistry,
  LOOKUP_NAMES,
  defaultLookups,
  defaultRegistry,
  type LookupFn,
  type LookupName,
} from './lookups';
export { parseLookupKey } from './predicates';

// Sources and Caching
// ==============================
export {
  CachedSource,
  FunctionSource,
  cachedSource,
  fromJson,
  fromMapping,
  fromRecords,
  toSourceAdapter,
  type CachedSourceOptions,
  type JsonSourceOptions,
  type RecordSource,
  type SourceAdapter,
  type SourceInput,
  type SourceResult,
} from './sources';
export {
  CacheLayer,
  DEFAULT_TTL_MS,
  type CacheEntryInfo,
  type CacheLayerOptions,
  type CacheStats,
  type FetchFn,
} from './cache';
export { deriveCacheKey, type CacheKeyOptions } from './utils/cache-key';

// Errors
// ==============================
export {
  QuarryError,
  UnknownLookupError,
  InvalidOperandError,
  TypeMismatchError,
  DoesNotExistError,
  MultipleObjectsReturnedError,
  SourceFetchError,
} from './errors';

// Logging
// ==============================
export {
  consoleLogger,
  createConsoleLogger,
  getLogger,
  noopLogger,
  setLogger,
  type Logger,
  type LogLevel,
} from './logger';

// Types
// ==============================
export type {
  CacheLookup,
  CacheStatus,
  Lookups,
  Materialization,
  OrderTerm,
  Predicate,
  PredicateGroup,
  Projection,
  QueryResult,
  QuerySnapshotInfo,
  QueryState,
  SliceBounds,
  SortDirection,
} from './types';
