import { parse } from 'csv-parse/sync';
import * as XLSX from 'xlsx';
import { TabularFormat } from '@carelytics/shared/constants/ingestion.constants.js';
import { UnsupportedFormatError } from '../../../lib/errors.js';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export type RawCell = string | number | boolean | null;

/** One input record: column name → raw value, exactly as parsed. */
export type RawRow = Record<string, RawCell>;

export interface TabularData {
  format: TabularFormat;
  /** Header names in file order. */
  columns: string[];
  /** Data rows in file order. */
  rows: RawRow[];
}

// ---------------------------------------------------------------------------
// Format detection
// ---------------------------------------------------------------------------

export function detectTabularFormat(fileName: string): TabularFormat {
  const dot = fileName.lastIndexOf('.');
  const ext = dot >= 0 ? fileName.slice(dot + 1).toLowerCase() : '';

  switch (ext) {
    case TabularFormat.CSV:
      return TabularFormat.CSV;
    case TabularFormat.XLSX:
      return TabularFormat.XLSX;
    case TabularFormat.XLS:
      return TabularFormat.XLS;
    default:
      throw new UnsupportedFormatError(fileName);
  }
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function pad2(n: number): string {
  return String(n).padStart(2, '0');
}

/**
 * Date cells become yyyy-mm-dd whatever their display format. SheetJS
 * builds them at local midnight, so the local calendar fields are the
 * cell's date.
 */
function formatDateCell(value: Date): string {
  return `${value.getFullYear()}-${pad2(value.getMonth() + 1)}-${pad2(value.getDate())}`;
}

function toRawCell(value: unknown): RawCell {
  if (value == null) return null;
  if (value instanceof Date) {
    return Number.isNaN(value.getTime()) ? '' : formatDateCell(value);
  }
  if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
    return value;
  }
  return String(value);
}

/**
 * First row is the header; every later row is keyed by it. Short rows are
 * padded with empty strings, cells beyond the header are dropped.
 */
function toTable(format: TabularFormat, grid: unknown[][]): TabularData {
  if (grid.length === 0) {
    return { format, columns: [], rows: [] };
  }

  const columns = grid[0].map((cell) => String(cell ?? '').trim());
  const rows = grid.slice(1).map((cells) => {
    const row: RawRow = {};
    columns.forEach((column, index) => {
      if (column === '') return;
      row[column] = index < cells.length ? toRawCell(cells[index]) : '';
    });
    return row;
  });

  return { format, columns: columns.filter((c) => c !== ''), rows };
}

function isBlankRow(cells: unknown[]): boolean {
  return cells.every((cell) => cell == null || String(cell).trim() === '');
}

// ---------------------------------------------------------------------------
// Parsers
// ---------------------------------------------------------------------------

function readCsv(content: Buffer): unknown[][] {
  const records: string[][] = parse(content, {
    bom: true,
    skip_empty_lines: true,
    relax_column_count: true,
  });
  return records.filter((cells) => !isBlankRow(cells));
}

/**
 * First sheet only. Cells come back as their stored values: numbers stay
 * numbers and date cells arrive as Date objects, so a cell's display
 * format never changes what is read.
 */
function readSpreadsheet(content: Buffer): unknown[][] {
  const workbook = XLSX.read(content, { type: 'buffer', cellDates: true });
  const sheetName = workbook.SheetNames[0];
  if (sheetName === undefined) {
    return [];
  }

  const grid = XLSX.utils.sheet_to_json<unknown[]>(workbook.Sheets[sheetName], {
    header: 1,
    raw: true,
    defval: '',
    blankrows: false,
  });
  return grid.filter((cells) => !isBlankRow(cells));
}

// ---------------------------------------------------------------------------
// Reader
// ---------------------------------------------------------------------------

/**
 * Parse an uploaded file into ordered rows keyed by header name. The file
 * extension selects the parser; values are not coerced.
 */
export function readTabularFile(content: Buffer, fileName: string): TabularData {
  const format = detectTabularFormat(fileName);
  const grid = format === TabularFormat.CSV ? readCsv(content) : readSpreadsheet(content);
  return toTable(format, grid);
}
