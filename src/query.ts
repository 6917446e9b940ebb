import { DoesNotExistError, MultipleObjectsReturnedError } from './errors';
import { evaluatePlan, projectFlat, projectValues, projectValuesList, type Evaluation } from './evaluator';
import { defaultRegistry, type LookupRegistry } from './lookups';
import { createGroup, createPredicates, extendGroup } from './predicates';
import { toSourceAdapter, type SourceAdapter, type SourceInput } from './sources';
import type {
  Lookups,
  OrderTerm,
  Projection,
  QueryResult,
  QuerySnapshotInfo,
  QueryState,
  SliceBounds,
} from './types';

export interface QueryOptions {
  /** Name of the records in error messages. Defaults to `Record`. */
  label?: string;
  registry?: LookupRegistry;
}

interface RunResult<Row> extends Evaluation<Row> {
  snapshot: QuerySnapshotInfo;
}

// Helpers
// ==============================

function parseOrderField(field: string): OrderTerm {
  return field.startsWith('-')
    ? { kind: 'field', path: field.slice(1), direction: 'desc' }
    : { kind: 'field', path: field, direction: 'asc' };
}

function normalizeBound(bound: number): number {
  return Number.isNaN(bound) ? 0 : Math.trunc(bound);
}

function isForward(bounds: SliceBounds): boolean {
  return bounds.start >= 0 && (bounds.end === null || bounds.end >= 0);
}

/**
 * Intersect a relative window with the current one. Both must be forward;
 * bounds are offsets from the current start.
 */
function narrowSlice(current: SliceBounds, next: SliceBounds): SliceBounds {
  const nextStart = current.start + next.start;
  let nextEnd = next.end === null ? current.end : current.start + next.end;

  if (nextEnd !== null && current.end !== null) {
    nextEnd = Math.min(nextEnd, current.end);
  }
  if (nextEnd !== null && nextEnd < nextStart) {
    nextEnd = nextStart;
  }
  return { start: nextStart, end: nextEnd };
}

/**
 * Add a window on top of the current ones. Forward windows fold into the
 * last one; a window counting from the end is kept as is and resolved
 * against the length it sees at evaluation.
 */
function appendSlice(
  current: readonly SliceBounds[],
  start: number,
  end: number | null,
): readonly SliceBounds[] {
  const next: SliceBounds = {
    start: normalizeBound(start),
    end: end === null ? null : normalizeBound(end),
  };
  const last = current.at(-1);

  if (last === undefined || !isForward(last) || !isForward(next)) {
    return Object.freeze([...current, Object.freeze(next)]);
  }
  return Object.freeze([...current.slice(0, -1), Object.freeze(narrowSlice(last, next))]);
}

const wholeRecords: Projection = { kind: 'records' };
const positionDesc: OrderTerm = { kind: 'position', direction: 'desc' };

const NO_SLICES: readonly SliceBounds[] = Object.freeze([]);
const WHOLE_RECORDS = Object.freeze(wholeRecords);
const POSITION_DESC = Object.freeze([Object.freeze(positionDesc)]);

function initialState(options: QueryOptions): QueryState {
  return Object.freeze({
    filters: createGroup([]),
    exclusions: [],
    ordering: [],
    slices: NO_SLICES,
    distinct: false,
    projection: WHOLE_RECORDS,
    empty: false,
    label: options.label ?? 'Record',
    registry: options.registry ?? defaultRegistry,
  });
}

// Query
// ==============================

/**
 * Lazy, immutable query over the records of a source.
 *
 * Chaining methods return a new query and never throw or touch the
 * source. Terminal methods (`toArray`, `count`, `exists`, `first`, `last`,
 * `get`, `execute` and `for await`) materialize the source and evaluate.
 *
 * @example
 * ```ts
 * const names = await Query.from(people)
 *   .filter({ age__gte: 25 })
 *   .exclude({ 'address.city': 'Porto' })
 *   .orderBy('-age', 'name')
 *   .valuesFlat('name')
 *   .toArray();
 * ```
 */
export class Query<R, Row = R> implements AsyncIterable<Row> {
  private constructor(
    private readonly source: SourceAdapter<R>,
    private readonly state: QueryState,
    private readonly project: (record: R) => Row,
  ) {}

  static from<TRecord>(source: SourceInput<TRecord>, options: QueryOptions = {}): Query<TRecord> {
    return new Query<TRecord, TRecord>(
      toSourceAdapter(source),
      initialState(options),
      (record) => record,
    );
  }

  private derive(changes: Partial<QueryState>): Query<R, Row> {
    return new Query(this.source, Object.freeze({ ...this.state, ...changes }), this.project);
  }

  private reproject<Next>(projection: Projection, project: (record: R) => Next): Query<R, Next> {
    return new Query(
      this.source,
      Object.freeze({ ...this.state, projection: Object.freeze(projection) }),
      project,
    );
  }

  // Chaining
  // ==============================

  /**
   * Keep records matching every lookup, in addition to earlier filters.
   */
  filter(...lookups: Lookups[]): Query<R, Row> {
    return this.derive({ filters: extendGroup(this.state.filters, createPredicates(lookups)) });
  }

  /**
   * Drop records matching every lookup of this call. Each call adds an
   * independent exclusion.
   */
  exclude(...lookups: Lookups[]): Query<R, Row> {
    if (lookups.length === 0) return this.all();
    const group = createGroup(createPredicates(lookups), true);
    return this.derive({ exclusions: Object.freeze([...this.state.exclusions, group]) });
  }

  /**
   * Replace the ordering. `-field` sorts descending; no fields clears it.
   */
  orderBy(...fields: string[]): Query<R, Row> {
    return this.derive({ ordering: Object.freeze(fields.map(parseOrderField)) });
  }

  /**
   * Invert the ordering. Without one, reverses materialization order.
   */
  reverse(): Query<R, Row> {
    if (this.state.ordering.length === 0) {
      return this.derive({ ordering: POSITION_DESC });
    }

    const ordering = this.state.ordering.map((term): OrderTerm => ({
      ...term,
      direction: term.direction === 'asc' ? 'desc' : 'asc',
    }));
    return this.derive({ ordering: Object.freeze(ordering) });
  }

  distinct(): Query<R, Row> {
    return this.derive({ distinct: true });
  }

  /**
   * Query that yields nothing and never reads its source.
   */
  none(): Query<R, Row> {
    return this.derive({ empty: true });
  }

  all(): Query<R, Row> {
    return this.derive({});
  }

  /**
   * Narrow to `[start, end)` of the current window, with `Array.slice`
   * semantics: negative bounds count from the end and fractions truncate.
   * Successive slices compose.
   */
  slice(start: number, end?: number): Query<R, Row> {
    return this.derive({ slices: appendSlice(this.state.slices, start, end ?? null) });
  }

  /**
   * One plain object per record, keyed by field path.
   */
  values(...fields: string[]): Query<R, Record<string, unknown>> {
    const selected = Object.freeze([...fields]);
    return this.reproject({ kind: 'values', fields: selected }, (record) =>
      projectValues(record, selected),
    );
  }

  /**
   * One array per record, in field order.
   */
  valuesList(...fields: string[]): Query<R, unknown[]> {
    const selected = Object.freeze([...fields]);
    return this.reproject({ kind: 'valuesList', fields: selected }, (record) =>
      projectValuesList(record, selected),
    );
  }

  /**
   * The bare value of one field per record.
   */
  valuesFlat(field: string): Query<R, unknown> {
    return this.reproject({ kind: 'flat', field }, (record) => projectFlat(record, field));
  }

  /**
   * The same query over another source.
   */
  withSource(source: SourceInput<R>): Query<R, Row> {
    return new Query(toSourceAdapter(source), this.state, this.project);
  }

  describe(): QueryState {
    return this.state;
  }

  // Terminals
  // ==============================

  async execute(): Promise<QueryResult<Row>> {
    const { rows, total, snapshot } = await this.run();
    return { items: rows, total, snapshot };
  }

  async toArray(): Promise<Row[]> {
    const { rows } = await this.run();
    return rows;
  }

  async count(): Promise<number> {
    const { rows } = await this.run();
    return rows.length;
  }

  async exists(): Promise<boolean> {
    const { rows } = await this.slice(0, 1).run();
    return rows.length > 0;
  }

  /**
   * First row under the current ordering, or `null` when there is none.
   */
  async first(): Promise<Row | null> {
    const { rows } = await this.slice(0, 1).run();
    return rows.length > 0 ? rows[0] : null;
  }

  /**
   * Last row under the current ordering, or `null` when there is none.
   */
  async last(): Promise<Row | null> {
    const { rows } = await this.run();
    return rows.length > 0 ? rows[rows.length - 1] : null;
  }

  /**
   * The single row matching the lookups on top of this query.
   *
   * @throws {DoesNotExistError} when nothing matches
   * @throws {MultipleObjectsReturnedError} when more than one row matches
   */
  async get(...lookups: Lookups[]): Promise<Row> {
    const { rows } = await this.filter(...lookups).run();
    if (rows.length === 0) {
      throw new DoesNotExistError(this.state.label);
    }
    if (rows.length > 1) {
      throw new MultipleObjectsReturnedError(this.state.label, rows.length);
    }
    return rows[0];
  }

  async *[Symbol.asyncIterator](): AsyncIterator<Row> {
    yield* await this.toArray();
  }

  private async run(): Promise<RunResult<Row>> {
    const plan = { state: this.state, project: this.project };

    if (this.state.empty) {
      return {
        ...evaluatePlan(plan, []),
        snapshot: { label: this.state.label, status: 'none', degraded: false, fetchedAt: null },
      };
    }

    const materialized = await this.source.materialize();
    return {
      ...evaluatePlan(plan, materialized.records),
      snapshot: {
        label: this.state.label,
        status: materialized.status,
        degraded: materialized.degraded,
        fetchedAt: new Date(materialized.fetchedAt).toISOString(),
      },
    };
  }
}
