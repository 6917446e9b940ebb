import { compileGroup, matchesGroup, type CompiledGroup } from './predicates';
import type { OrderTerm, Projection, QueryState, SliceBounds } from './types';
import { compareForSort, stableKey } from './utils/comparison';
import { ownFields, resolvePath } from './utils/field-path';

// Types
// ==============================

/**
 * Query state plus the function turning a record into an output row.
 */
export interface EvaluationPlan<R, Row> {
  state: QueryState;
  project: (record: R) => Row;
}

export interface Evaluation<Row> {
  rows: Row[];
  /** Records that passed the filters, before slicing. */
  total: number;
}

// Projections
// ==============================

export function projectValues(record: unknown, fields: readonly string[]): Record<string, unknown> {
  if (fields.length === 0) {
    return Object.fromEntries(ownFields(record));
  }

  const row: Record<string, unknown> = {};
  for (const field of fields) {
    row[field] = resolvePath(record, field);
  }
  return row;
}

export function projectValuesList(record: unknown, fields: readonly string[]): unknown[] {
  if (fields.length === 0) {
    return ownFields(record).map(([, value]) => value);
  }
  return fields.map((field) => resolvePath(record, field));
}

export function projectFlat(record: unknown, field: string): unknown {
  return resolvePath(record, field);
}

/**
 * Row builder for a projection. Whole records pass through untouched.
 */
export function projector(projection: Projection): (record: unknown) => unknown {
  switch (projection.kind) {
    case 'values':
      return (record) => projectValues(record, projection.fields);
    case 'valuesList':
      return (record) => projectValuesList(record, projection.fields);
    case 'flat':
      return (record) => projectFlat(record, projection.field);
    case 'records':
      return (record) => record;
  }
}

// Stages
// ==============================

function applyFilters<R>(records: readonly R[], groups: CompiledGroup[]): R[] {
  if (groups.length === 0) return [...records];
  return records.filter((record) => groups.every((group) => matchesGroup(record, group)));
}

interface SortEntry<R> {
  record: R;
  position: number;
  keys: unknown[];
}

/**
 * Stable lexicographic sort. Keys are resolved once per record; ties fall
 * back to the position in the filtered input.
 */
function applyOrdering<R>(records: R[], ordering: readonly OrderTerm[]): R[] {
  if (ordering.length === 0) return records;

  const entries: SortEntry<R>[] = records.map((record, position) => ({
    record,
    position,
    keys: ordering.map((term) => (term.kind === 'field' ? resolvePath(record, term.path) : position)),
  }));

  entries.sort((left, right) => {
    for (let index = 0; index < ordering.length; index++) {
      const term = ordering[index];
      const comparison = compareForSort(left.keys[index], right.keys[index]);
      if (comparison !== 0) {
        return term.direction === 'desc' ? -comparison : comparison;
      }
    }
    return left.position - right.position;
  });

  return entries.map((entry) => entry.record);
}

/**
 * Apply each window to the output of the previous one. Negative bounds
 * resolve against the length of the window they apply to.
 */
function applySlices<R>(records: R[], slices: readonly SliceBounds[]): R[] {
  return slices.reduce(
    (window, bounds) => window.slice(bounds.start, bounds.end ?? undefined),
    records,
  );
}

function applyDistinct<Row>(rows: Row[]): Row[] {
  const seen = new Set<string>();
  const unique: Row[] = [];
  for (const row of rows) {
    const key = stableKey(row);
    if (!seen.has(key)) {
      seen.add(key);
      unique.push(row);
    }
  }
  return unique;
}

// Evaluation
// ==============================

/**
 * Run a plan over materialized records: filter, order, slice, project,
 * then dedupe. Synchronous and side-effect free.
 *
 * Every operator is resolved before the first record is tested, so an
 * unknown lookup throws even when there are no records.
 *
 * @throws {UnknownLookupError | InvalidOperandError | TypeMismatchError}
 */
export function evaluatePlan<R, Row>(plan: EvaluationPlan<R, Row>, records: readonly R[]): Evaluation<Row> {
  const { state } = plan;
  const groups = [state.filters, ...state.exclusions].map((group) =>
    compileGroup(group, state.registry),
  );

  if (state.empty) {
    return { rows: [], total: 0 };
  }

  const matched = applyFilters(records, groups);
  const ordered = applyOrdering(matched, state.ordering);
  const window = applySlices(ordered, state.slices);
  const rows = window.map(plan.project);

  return {
    rows: state.distinct ? applyDistinct(rows) : rows,
    total: matched.length,
  };
}

/**
 * Evaluate a query state over records the caller already holds, using the
 * state's own projection.
 *
 * @example
 * ```ts
 * const names = evaluate(people.filter({ age__gte: 25 }).valuesFlat('name').describe(), rows);
 * ```
 */
export function evaluate(state: QueryState, records: readonly unknown[]): unknown[] {
  return evaluatePlan({ state, project: projector(state.projection) }, records).rows;
}
