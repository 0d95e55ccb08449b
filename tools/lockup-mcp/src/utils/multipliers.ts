/**
 * Day-indexed multiplier table: CSV parsing, memoized loading and lookup.
 *
 * Source files carry three unlabeled columns, `day,int_col,multiplier`.
 * Whether the first line is a header is a property of the source and must
 * be passed in explicitly.
 */
import { readFileSync } from "node:fs";
import { DataLoadError, RowNotFoundError } from "./errors.js";

export interface MultiplierRow {
  day: number;
  /** Second source column (`int_col`); carried but unused by the calculator. */
  intCol: number;
  multiplier: number;
}

export interface MultiplierTable {
  source: string;
  rows: readonly MultiplierRow[];
}

export interface DayRange {
  min: number;
  max: number;
}

export const COLUMN_COUNT = 3;
export const PREFERRED_DEFAULT_DAY = 113;

const INTEGER_RE = /^[+-]?\d+$/;
const DECIMAL_RE = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;

function parseInteger(cell: string): number | undefined {
  return INTEGER_RE.test(cell) ? Number(cell) : undefined;
}

function parseFloatCell(cell: string): number | undefined {
  if (!DECIMAL_RE.test(cell)) return undefined;
  const value = Number(cell);
  return Number.isFinite(value) ? value : undefined;
}

/** Parse CSV text into a frozen table. Throws `DataLoadError` on malformed input. */
export function parseMultiplierCsv(
  text: string,
  source: string,
  hasHeader: boolean,
): MultiplierTable {
  const lines = text.split(/\r?\n/);
  const rows: MultiplierRow[] = [];
  let headerPending = hasHeader;

  for (let i = 0; i < lines.length; i++) {
    const line = lines[i].trim();
    if (line === "") continue;
    if (headerPending) {
      headerPending = false;
      continue;
    }

    const lineNo = i + 1;
    const cells = line.split(",").map((c) => c.trim());
    if (cells.length !== COLUMN_COUNT) {
      throw new DataLoadError(
        source,
        `line ${lineNo}: expected ${COLUMN_COUNT} columns, found ${cells.length}`,
      );
    }

    const [dayCell, intCell, multiplierCell] = cells;
    const day = parseInteger(dayCell);
    const intCol = parseInteger(intCell);
    const multiplier = parseFloatCell(multiplierCell);
    if (day === undefined || intCol === undefined || multiplier === undefined) {
      throw new DataLoadError(source, `line ${lineNo}: cannot parse "${line}"`);
    }

    rows.push(Object.freeze({ day, intCol, multiplier }));
  }

  if (rows.length === 0) {
    throw new DataLoadError(source, "no data rows");
  }

  return Object.freeze({ source, rows: Object.freeze(rows) });
}

export type SourceReader = (source: string) => string;

export const readSourceFile: SourceReader = (source) => readFileSync(source, "utf-8");

export interface TableLoaderOptions {
  hasHeader: boolean;
  read?: SourceReader;
}

export interface TableLoader {
  /** Load a table, reusing the memoized copy for a source already read. */
  load(source: string): MultiplierTable;
  /** Drop one memoized source, or every source when called without one. */
  invalidate(source?: string): void;
  /** Re-read a source regardless of what is memoized; keeps the old table on failure. */
  reload(source: string): MultiplierTable;
  isCached(source: string): boolean;
}

export function createTableLoader(options: TableLoaderOptions): TableLoader {
  const read = options.read ?? readSourceFile;
  const cache = new Map<string, MultiplierTable>();

  function readTable(source: string): MultiplierTable {
    let text: string;
    try {
      text = read(source);
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err);
      throw new DataLoadError(source, reason, { cause: err });
    }

    return parseMultiplierCsv(text, source, options.hasHeader);
  }

  function load(source: string): MultiplierTable {
    const hit = cache.get(source);
    if (hit) return hit;

    const table = readTable(source);
    cache.set(source, table);
    return table;
  }

  function invalidate(source?: string): void {
    if (source === undefined) {
      cache.clear();
    } else {
      cache.delete(source);
    }
  }

  return {
    load,
    invalidate,
    reload(source) {
      // The memoized table stays in place when the new read fails.
      const table = readTable(source);
      cache.set(source, table);
      return table;
    },
    isCached: (source) => cache.has(source),
  };
}

/** First row whose day equals `day` exactly. */
export function findRow(table: MultiplierTable, day: number): MultiplierRow | undefined {
  return table.rows.find((row) => row.day === day);
}

export function requireRow(table: MultiplierTable, day: number): MultiplierRow {
  const row = findRow(table, day);
  if (!row) throw new RowNotFoundError(day, table.source);
  return row;
}

export function dayRange(table: MultiplierTable): DayRange {
  let min = table.rows[0].day;
  let max = min;
  for (const { day } of table.rows) {
    if (day < min) min = day;
    if (day > max) max = day;
  }
  return { min, max };
}

/** The preferred day when the table covers it, else the midpoint of the range. */
export function defaultDay(range: DayRange, preferred = PREFERRED_DEFAULT_DAY): number {
  if (preferred >= range.min && preferred <= range.max) return preferred;
  return Math.floor((range.min + range.max) / 2);
}
