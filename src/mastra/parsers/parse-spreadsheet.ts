import * as XLSX from 'xlsx';
import type { CellValue, Table } from '../schemas';

function toCellValue(value: unknown): CellValue {
  if (value === null || value === undefined) return null;
  if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') return value;
  if (value instanceof Date) return value.toISOString().slice(0, 10);
  return String(value);
}

const isBlank = (value: CellValue) => value === null || (typeof value === 'string' && value.trim() === '');

/** Header names: blanks become column_<n>, repeats get a _<n> suffix. */
export function normalizeColumns(header: CellValue[], width: number): string[] {
  const seen = new Map<string, number>();
  const columns: string[] = [];
  for (let i = 0; i < width; i++) {
    const cell = header[i] ?? null;
    const base = isBlank(cell) ? `column_${i + 1}` : String(cell).trim();
    const count = (seen.get(base) ?? 0) + 1;
    seen.set(base, count);
    columns.push(count === 1 ? base : `${base}_${count}`);
  }
  return columns;
}

/** Builds a Table from raw rows: the first non-blank row is the header, blank rows are dropped. */
export function tableFromRows(name: string, raw: unknown[][]): Table | undefined {
  const rows = raw.map((row) => row.map(toCellValue)).filter((row) => !row.every(isBlank));
  if (rows.length === 0) return undefined;

  const [header, ...data] = rows;
  const width = rows.reduce((max, row) => Math.max(max, row.length), 0);
  const columns = normalizeColumns(header, width);

  return {
    name,
    columns,
    rows: data.map((row) => columns.map((_, i) => row[i] ?? null)),
  };
}

export interface SpreadsheetOptions {
  /** CSV and other delimited text: decoded as UTF-8 before SheetJS sees it. */
  text?: boolean;
}

/**
 * Reads the first sheet that has any content. Handles XLSX, XLS, ODS and CSV;
 * SheetJS sniffs the binary formats from the bytes.
 */
export function parseSpreadsheet(bytes: Uint8Array, options: SpreadsheetOptions = {}): Table {
  const workbook = options.text
    ? XLSX.read(new TextDecoder('utf-8').decode(bytes).replace(/^\uFEFF/, ''), { type: 'string', cellDates: true })
    : XLSX.read(bytes, { type: 'array', cellDates: true });

  for (const sheetName of workbook.SheetNames) {
    const worksheet = workbook.Sheets[sheetName];
    if (!worksheet) continue;

    const raw = XLSX.utils.sheet_to_json<unknown[]>(worksheet, { header: 1, defval: null, blankrows: false });
    const table = tableFromRows(sheetName, raw);
    if (table) return table;
  }

  throw new Error('workbook contains no data');
}
