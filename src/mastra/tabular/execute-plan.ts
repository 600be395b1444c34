import { err, ok, type Result } from '../lib/result';
import type { AggregateOp, CellValue, FilterOp, QueryPlan, Table } from '../schemas';

export type PlanOutcome =
  | { kind: 'aggregate'; op: AggregateOp; column?: string; value: number | null; rowCount: number }
  | {
      kind: 'groups';
      groupBy: string;
      op: AggregateOp;
      column?: string;
      groups: Array<{ key: CellValue; value: number | null; rowCount: number }>;
    }
  | { kind: 'rows'; columns: string[]; rows: CellValue[][]; total: number };

export function toNumber(value: CellValue | string | number | boolean): number | undefined {
  if (typeof value === 'number') return Number.isFinite(value) ? value : undefined;
  if (typeof value === 'string' && value.trim() !== '') {
    const parsed = Number(value.trim().replace(/,/g, ''));
    return Number.isFinite(parsed) ? parsed : undefined;
  }
  return undefined;
}

const normalize = (value: CellValue | string | number | boolean) => String(value).trim().toLowerCase();

export function matches(cell: CellValue, op: FilterOp, value: string | number | boolean): boolean {
  if (cell === null) return op === 'neq';

  const a = toNumber(cell);
  const b = toNumber(value);
  const numeric = a !== undefined && b !== undefined;

  switch (op) {
    case 'eq':
      return numeric ? a === b : normalize(cell) === normalize(value);
    case 'neq':
      return numeric ? a !== b : normalize(cell) !== normalize(value);
    case 'contains':
      return normalize(cell).includes(normalize(value));
    case 'gt':
      return numeric ? a > b : String(cell) > String(value);
    case 'gte':
      return numeric ? a >= b : String(cell) >= String(value);
    case 'lt':
      return numeric ? a < b : String(cell) < String(value);
    case 'lte':
      return numeric ? a <= b : String(cell) <= String(value);
  }
}

function compareCells(a: CellValue, b: CellValue): number {
  if (a === null || b === null) return a === b ? 0 : a === null ? 1 : -1;
  const x = toNumber(a);
  const y = toNumber(b);
  if (x !== undefined && y !== undefined) return x - y;
  return String(a).localeCompare(String(b));
}

export function aggregate(op: AggregateOp, values: CellValue[]): number | null {
  if (op === 'count') return values.filter((value) => value !== null).length;

  const numbers = values.map(toNumber).filter((n): n is number => n !== undefined);
  if (numbers.length === 0) return null;

  switch (op) {
    case 'sum':
      return numbers.reduce((total, n) => total + n, 0);
    case 'avg':
      return numbers.reduce((total, n) => total + n, 0) / numbers.length;
    case 'min':
      return numbers.reduce((min, n) => (n < min ? n : min));
    case 'max':
      return numbers.reduce((max, n) => (n > max ? n : max));
  }
}

/**
 * Runs a query plan against an in-memory table. Pure: the table is never modified.
 * Errors are plain sentences suitable for returning to the caller as the tool's answer.
 */
export function executePlan(table: Table, plan: QueryPlan): Result<PlanOutcome, string> {
  const columnIndex = (name: string): number | undefined => {
    const exact = table.columns.indexOf(name);
    if (exact >= 0) return exact;
    const loose = table.columns.findIndex((column) => column.toLowerCase() === name.trim().toLowerCase());
    return loose >= 0 ? loose : undefined;
  };

  const referenced = [
    ...plan.filters.map((filter) => filter.column),
    ...(plan.groupBy ? [plan.groupBy] : []),
    ...(plan.aggregate?.column ? [plan.aggregate.column] : []),
    ...(plan.sort ? [plan.sort.column] : []),
    ...(plan.select ?? []),
  ];
  const unknown = referenced.filter((name) => columnIndex(name) === undefined);
  if (unknown.length > 0) {
    return err(
      `Unknown column${unknown.length > 1 ? 's' : ''} ${unknown.map((name) => `"${name}"`).join(', ')}. ` +
        `Available columns: ${table.columns.join(', ')}`,
    );
  }
  const at = (name: string) => columnIndex(name) ?? -1;

  if (plan.aggregate && plan.aggregate.op !== 'count' && !plan.aggregate.column) {
    return err(`Aggregate "${plan.aggregate.op}" needs a column`);
  }

  const filtered = table.rows.filter((row) =>
    plan.filters.every((filter) => matches(row[at(filter.column)] ?? null, filter.op, filter.value)),
  );

  const columnValues = (rows: CellValue[][], column?: string): CellValue[] =>
    column ? rows.map((row) => row[at(column)] ?? null) : rows.map(() => 1);

  if (plan.groupBy) {
    const op = plan.aggregate?.op ?? 'count';
    const column = plan.aggregate?.column;
    const buckets = new Map<string, { key: CellValue; rows: CellValue[][] }>();
    for (const row of filtered) {
      const key = row[at(plan.groupBy)] ?? null;
      const id = key === null ? '' : normalize(key);
      const bucket = buckets.get(id) ?? { key, rows: [] };
      bucket.rows.push(row);
      buckets.set(id, bucket);
    }

    let groups = Array.from(buckets.values(), (bucket) => ({
      key: bucket.key,
      value: aggregate(op, columnValues(bucket.rows, column)),
      rowCount: bucket.rows.length,
    }));

    if (plan.sort) {
      const byKey = at(plan.sort.column) === at(plan.groupBy);
      const direction = plan.sort.direction === 'desc' ? -1 : 1;
      groups = [...groups].sort((a, b) => direction * (byKey ? compareCells(a.key, b.key) : compareCells(a.value, b.value)));
    }
    if (plan.limit) groups = groups.slice(0, plan.limit);

    return ok({ kind: 'groups', groupBy: table.columns[at(plan.groupBy)], op, column: column && table.columns[at(column)], groups });
  }

  if (plan.aggregate) {
    const { op, column } = plan.aggregate;
    return ok({
      kind: 'aggregate',
      op,
      column: column && table.columns[at(column)],
      value: aggregate(op, columnValues(filtered, column)),
      rowCount: filtered.length,
    });
  }

  let rows = filtered;
  if (plan.sort) {
    const index = at(plan.sort.column);
    const direction = plan.sort.direction === 'desc' ? -1 : 1;
    rows = [...rows].sort((a, b) => direction * compareCells(a[index] ?? null, b[index] ?? null));
  }
  if (plan.limit) rows = rows.slice(0, plan.limit);

  const selected = plan.select && plan.select.length > 0 ? plan.select.map(at) : table.columns.map((_, i) => i);
  return ok({
    kind: 'rows',
    columns: selected.map((i) => table.columns[i]),
    rows: rows.map((row) => selected.map((i) => row[i] ?? null)),
    total: filtered.length,
  });
}

export function formatValue(value: CellValue): string {
  if (value === null) return '';
  if (typeof value === 'number' && !Number.isInteger(value)) return String(Number(value.toFixed(4)));
  return String(value);
}

const plural = (n: number, word: string) => `${n} ${word}${n === 1 ? '' : 's'}`;

export function describeResult(outcome: PlanOutcome, maxRows: number): string {
  switch (outcome.kind) {
    case 'aggregate': {
      const label = outcome.column ? `${outcome.op} of ${outcome.column}` : outcome.op;
      const value = outcome.value === null ? 'n/a (no numeric values)' : formatValue(outcome.value);
      return `${label} = ${value} (over ${plural(outcome.rowCount, 'row')})`;
    }
    case 'groups': {
      if (outcome.groups.length === 0) return 'No rows match.';
      const label = outcome.column ? `${outcome.op} of ${outcome.column}` : outcome.op;
      const lines = outcome.groups.map(
        (group) =>
          `- ${formatValue(group.key) || '(blank)'}: ${group.value === null ? 'n/a' : formatValue(group.value)} ` +
          `(${plural(group.rowCount, 'row')})`,
      );
      return [`${label} by ${outcome.groupBy}:`, ...lines].join('\n');
    }
    case 'rows': {
      if (outcome.total === 0) return 'No rows match.';
      const shown = outcome.rows.slice(0, maxRows);
      const heading =
        `${plural(outcome.total, 'matching row')}` + (shown.length < outcome.total ? `, showing ${shown.length}` : '') + ':';
      return [heading, outcome.columns.join(' | '), ...shown.map((row) => row.map(formatValue).join(' | '))].join('\n');
    }
  }
}
