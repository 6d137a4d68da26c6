/**
 * Small query language shared by every DocumentStore implementation.
 *
 * A filter is a conjunction of per-field conditions on scalar fields:
 *
 *   { isActive: true, lastAnalyzedDate: { $lt: '2026-03-02' }, priorityWeight: { $gte: 10 } }
 *
 * `null` equality matches a null or missing field. Range operators only match
 * values of the same JSON type as the operand. Sorting puts null/missing
 * values last in both directions.
 */

export type JsonScalar = string | number | boolean | null;

export interface FieldOperators<V> {
  $ne?: V | null;
  $lt?: V;
  $lte?: V;
  $gt?: V;
  $gte?: V;
  $in?: ReadonlyArray<V | null>;
}

export type ScalarFieldKeys<T> = {
  [K in keyof T]-?: T[K] extends JsonScalar ? K : never;
}[keyof T] &
  string;

export type DocumentFilter<T> = {
  [K in ScalarFieldKeys<T>]?: T[K] | FieldOperators<NonNullable<T[K]>>;
};

export interface SortSpec<T> {
  field: ScalarFieldKeys<T>;
  direction: 'asc' | 'desc';
}

export interface QueryOptions<T> {
  sort?: ReadonlyArray<SortSpec<T>>;
  limit?: number;
}

export type RangeOp = 'lt' | 'lte' | 'gt' | 'gte';

export type FilterClause =
  | { field: string; op: 'eq' | 'ne'; value: JsonScalar }
  | { field: string; op: RangeOp; value: string | number | boolean }
  | { field: string; op: 'in'; values: JsonScalar[] };

// Field names are interpolated into SQL as literals, so keep them to plain identifiers.
const FIELD_NAME_PATTERN = /^[A-Za-z_][A-Za-z0-9_]*$/;

const RANGE_OPERATORS: Record<string, RangeOp> = {
  $lt: 'lt',
  $lte: 'lte',
  $gt: 'gt',
  $gte: 'gte',
};

export function isJsonScalar(value: unknown): value is JsonScalar {
  return (
    value === null ||
    typeof value === 'string' ||
    typeof value === 'boolean' ||
    (typeof value === 'number' && Number.isFinite(value))
  );
}

/** Flattens a typed filter into clauses; throws on operators or values it does not support. */
export function compileFilter(filter: object): FilterClause[] {
  const clauses: FilterClause[] = [];
  const entries: Array<[string, unknown]> = Object.entries(filter);
  for (const [field, condition] of entries) {
    if (condition === undefined) continue;
    if (!FIELD_NAME_PATTERN.test(field)) {
      throw new TypeError(`Unsupported filter field "${field}"`);
    }
    if (isJsonScalar(condition)) {
      clauses.push({ field, op: 'eq', value: condition });
      continue;
    }
    if (typeof condition !== 'object' || Array.isArray(condition)) {
      throw new TypeError(`Unsupported filter condition for "${field}"`);
    }
    const operators: Array<[string, unknown]> = Object.entries(condition);
    for (const [operator, operand] of operators) {
      if (operand === undefined) continue;
      if (operator === '$ne') {
        if (!isJsonScalar(operand)) throw new TypeError(`$ne on "${field}" needs a scalar operand`);
        clauses.push({ field, op: 'ne', value: operand });
      } else if (operator === '$in') {
        if (!Array.isArray(operand) || !operand.every(isJsonScalar)) {
          throw new TypeError(`$in on "${field}" needs an array of scalars`);
        }
        clauses.push({ field, op: 'in', values: [...operand] });
      } else if (operator in RANGE_OPERATORS) {
        if (operand === null || !isJsonScalar(operand)) {
          throw new TypeError(`${operator} on "${field}" needs a non-null scalar operand`);
        }
        clauses.push({ field, op: RANGE_OPERATORS[operator], value: operand });
      } else {
        throw new TypeError(`Unsupported filter operator ${operator} on "${field}"`);
      }
    }
  }
  return clauses;
}

export function isFieldName(field: string): boolean {
  return FIELD_NAME_PATTERN.test(field);
}

export function readField(doc: unknown, field: string): unknown {
  if (!doc || typeof doc !== 'object' || !Object.prototype.hasOwnProperty.call(doc, field)) {
    return undefined;
  }
  const value: unknown = Reflect.get(doc, field);
  return value;
}

function equalsScalar(actual: unknown, expected: JsonScalar): boolean {
  if (expected === null) return actual === null || actual === undefined;
  return actual === expected;
}

// Mirrors jsonb ordering for scalars of different types: string < number < boolean.
function typeRank(value: string | number | boolean): number {
  if (typeof value === 'string') return 0;
  if (typeof value === 'number') return 1;
  return 2;
}

function compareScalars(a: string | number | boolean, b: string | number | boolean): number {
  if (typeof a === 'string' && typeof b === 'string') return a === b ? 0 : a < b ? -1 : 1;
  if (typeof a === 'number' && typeof b === 'number') return a === b ? 0 : a < b ? -1 : 1;
  if (typeof a === 'boolean' && typeof b === 'boolean') return Number(a) - Number(b);
  return typeRank(a) - typeRank(b);
}

export function matchesClause(doc: unknown, clause: FilterClause): boolean {
  const actual = readField(doc, clause.field);
  switch (clause.op) {
    case 'eq':
      return equalsScalar(actual, clause.value);
    case 'ne':
      return !equalsScalar(actual, clause.value);
    case 'in':
      return clause.values.some((value) => equalsScalar(actual, value));
    default: {
      if (actual === null || typeof actual !== typeof clause.value) return false;
      if (typeof actual !== 'string' && typeof actual !== 'number' && typeof actual !== 'boolean') return false;
      const cmp = compareScalars(actual, clause.value);
      if (clause.op === 'lt') return cmp < 0;
      if (clause.op === 'lte') return cmp <= 0;
      if (clause.op === 'gt') return cmp > 0;
      return cmp >= 0;
    }
  }
}

export function matchesFilter(doc: unknown, clauses: ReadonlyArray<FilterClause>): boolean {
  return clauses.every((clause) => matchesClause(doc, clause));
}

function asSortable(value: unknown): string | number | boolean | null {
  if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') return value;
  return null;
}

export function compareDocuments<T>(a: unknown, b: unknown, sort: ReadonlyArray<SortSpec<T>>): number {
  for (const { field, direction } of sort) {
    const left = asSortable(readField(a, field));
    const right = asSortable(readField(b, field));
    if (left === null && right === null) continue;
    if (left === null) return 1;
    if (right === null) return -1;
    const cmp = compareScalars(left, right);
    if (cmp !== 0) return direction === 'desc' ? -cmp : cmp;
  }
  return 0;
}
