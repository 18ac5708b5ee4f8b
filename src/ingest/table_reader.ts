import { readFileSync } from 'fs';
import { basename, extname } from 'path';
import Papa from 'papaparse';
import * as XLSX from 'xlsx';
import { CellValue, RawTable, TabularSource } from '../domain/types';
import { SourceReadError, errorMessage } from '../utils/errors';
import { logger } from '../utils/logger';

const SPREADSHEET_EXTENSIONS = new Set(['.xlsx', '.xlsm', '.xls', '.ods']);

export function sourceName(source: TabularSource): string {
  return source.kind === 'file' ? basename(source.path) : source.name;
}

export function readTable(source: TabularSource): RawTable {
  switch (source.kind) {
    case 'file':
      return readFile(source.path, source.sheetName);
    case 'delimited':
      return parseDelimited(source.name, source.text, source.delimiter);
    case 'workbook':
      return parseWorkbook(source.name, source.data, source.sheetName);
    case 'records':
      return fromRecords(source.name, source.records);
  }
}

function readFile(path: string, sheetName?: string): RawTable {
  const name = basename(path);
  let data: Buffer;
  try {
    data = readFileSync(path);
  } catch (error) {
    throw new SourceReadError(
      `Failed to read ${name}: ${errorMessage(error)}`,
      name,
      error instanceof Error ? error : undefined
    );
  }

  const extension = extname(path).toLowerCase();
  if (SPREADSHEET_EXTENSIONS.has(extension)) {
    return parseWorkbook(name, data, sheetName);
  }
  // anything that is not .csv is read as tab-separated text
  return parseDelimited(name, data.toString('utf8'), extension === '.csv' ? undefined : '\t');
}

export function parseDelimited(name: string, text: string, delimiter?: string): RawTable {
  const body = text.replace(/^\uFEFF/, '');
  // blank lines are parsed so record indexes match source rows; detection skips them
  const detected = delimiter ?? Papa.parse<string[]>(body, { preview: 20, skipEmptyLines: 'greedy' }).meta.delimiter;
  const result = Papa.parse<string[]>(body, { delimiter: detected });

  const problems = result.errors.filter((error) => error.type !== 'Delimiter');
  if (problems.length > 0) {
    logger.warn(`Malformed rows in ${name}`, {
      count: problems.length,
      first: problems.slice(0, 5).map((error) => ({ row: error.row, message: error.message })),
    });
  }

  return withoutBlankRows(name, result.data, 1, (header) => header.trim());
}

export function parseWorkbook(name: string, data: Uint8Array, sheetName?: string): RawTable {
  let workbook: XLSX.WorkBook;
  try {
    workbook = XLSX.read(data, { type: 'array' });
  } catch (error) {
    throw new SourceReadError(
      `Failed to parse workbook ${name}: ${errorMessage(error)}`,
      name,
      error instanceof Error ? error : undefined
    );
  }

  const selected = sheetName ?? workbook.SheetNames[0];
  const sheet = selected === undefined ? undefined : workbook.Sheets[selected];
  if (!sheet) {
    throw new SourceReadError(`${name}: sheet "${selected ?? ''}" not found`, name);
  }

  const ref = sheet['!ref'];
  if (ref === undefined) {
    return { name, headers: [], rows: [], rowNumbers: [] };
  }

  // dates stay serial numbers; parseCalendarDate reads them in UTC
  const matrix = XLSX.utils.sheet_to_json<CellValue[]>(sheet, {
    header: 1,
    raw: true,
    defval: null,
    blankrows: true,
  });

  return withoutBlankRows(name, matrix, XLSX.utils.decode_range(ref).s.r + 1, headerText);
}

const isBlank = (row: readonly CellValue[]): boolean =>
  row.every((cell) => cell === null || (typeof cell === 'string' && cell.trim() === ''));

/**
 * The first non-blank row is the header. Blank rows are dropped, and every
 * kept row remembers its source row number.
 */
function withoutBlankRows<T extends CellValue>(
  name: string,
  matrix: readonly T[][],
  firstRowNumber: number,
  toHeader: (cell: T) => string
): RawTable {
  const headerIndex = matrix.findIndex((row) => !isBlank(row));
  if (headerIndex === -1) {
    return { name, headers: [], rows: [], rowNumbers: [] };
  }

  const rows: CellValue[][] = [];
  const rowNumbers: number[] = [];
  for (let i = headerIndex + 1; i < matrix.length; i++) {
    if (isBlank(matrix[i])) continue;
    rows.push(matrix[i]);
    rowNumbers.push(firstRowNumber + i);
  }
  return { name, headers: matrix[headerIndex].map(toHeader), rows, rowNumbers };
}

function fromRecords(name: string, records: ReadonlyArray<Record<string, unknown>>): RawTable {
  const headers: string[] = [];
  const seen = new Set<string>();
  for (const record of records) {
    for (const key of Object.keys(record)) {
      if (!seen.has(key)) {
        seen.add(key);
        headers.push(key);
      }
    }
  }
  return {
    name,
    headers,
    rows: records.map((record) => headers.map((header) => toCellValue(record[header]))),
    rowNumbers: records.map((_, index) => index + 2),
  };
}

function headerText(value: CellValue): string {
  return value === null ? '' : String(value).trim();
}

function toCellValue(value: unknown): CellValue {
  if (value === null || value === undefined) return null;
  if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean' || value instanceof Date) {
    return value;
  }
  return String(value);
}
