import path from 'path';
import * as XLSX from 'xlsx';
import { parseDelimited, parseWorkbook, readTable, sourceName } from '../../src/ingest/table_reader';
import { SourceReadError } from '../../src/utils/errors';

const fixture = (name: string) => path.join(__dirname, '..', 'fixtures', name);

function workbookBytes(rows: unknown[][], sheetName = 'Usage'): Uint8Array {
  const book = XLSX.utils.book_new();
  XLSX.utils.book_append_sheet(book, XLSX.utils.aoa_to_sheet(rows), sheetName);
  const bytes: Uint8Array = XLSX.write(book, { type: 'buffer', bookType: 'xlsx' });
  return bytes;
}

test('parses quoted CSV, drops the BOM and skips blank lines', () => {
  const table = parseDelimited('usage.csv', '\uFEFFItem Number,Part Name,Qty\n"P-1","Bolt, M8",3\n\nP-2,Nut,4\n', ',');
  expect(table.headers).toEqual(['Item Number', 'Part Name', 'Qty']);
  expect(table.rows).toEqual([
    ['P-1', 'Bolt, M8', '3'],
    ['P-2', 'Nut', '4'],
  ]);
  expect(table.rowNumbers).toEqual([2, 4]);
});

test('numbers delimited rows by their line, skipping blank and leading empty lines', () => {
  const table = parseDelimited('usage.csv', '\nItem Number,Qty\nP-1,2\n , \nP-2,5\n', ',');
  expect(table.headers).toEqual(['Item Number', 'Qty']);
  expect(table.rows).toEqual([
    ['P-1', '2'],
    ['P-2', '5'],
  ]);
  expect(table.rowNumbers).toEqual([3, 5]);
});

test('detects the delimiter when none is given', () => {
  const table = parseDelimited('usage.csv', 'Item Number;Qty\nP-1;2\nP-2;5\n');
  expect(table.headers).toEqual(['Item Number', 'Qty']);
  expect(table.rows).toEqual([
    ['P-1', '2'],
    ['P-2', '5'],
  ]);
});

test('an empty text gives an empty table', () => {
  expect(parseDelimited('empty.csv', '')).toEqual({ name: 'empty.csv', headers: [], rows: [], rowNumbers: [] });
});

test('reads the first sheet of a workbook with raw cell values', () => {
  const data = workbookBytes([
    ['Item Number', 'Date', 'Qty', 'Remarks'],
    ['P-1', 45356, 3, 'EM'],
    ['P-2', '2024-03-06', 1, null],
  ]);
  const table = parseWorkbook('usage.xlsx', data);
  expect(table.headers).toEqual(['Item Number', 'Date', 'Qty', 'Remarks']);
  expect(table.rows).toEqual([
    ['P-1', 45356, 3, 'EM'],
    ['P-2', '2024-03-06', 1, null],
  ]);
});

test('numbers workbook rows by their sheet row across blank rows', () => {
  const data = workbookBytes([['Item Number', 'Qty'], ['P-1', 2], [], ['P-2', 5]]);
  const table = parseWorkbook('usage.xlsx', data);
  expect(table.rows).toEqual([
    ['P-1', 2],
    ['P-2', 5],
  ]);
  expect(table.rowNumbers).toEqual([2, 4]);
});

test('reads a named sheet and rejects an unknown one', () => {
  const data = workbookBytes([['Process', 'Item Number'], ['Press', 'P-1']], 'Processes');
  expect(parseWorkbook('map.xlsx', data, 'Processes').rows).toEqual([['Press', 'P-1']]);
  expect(() => parseWorkbook('map.xlsx', data, 'Missing')).toThrow(SourceReadError);
});

test('reads tab-separated files by extension', () => {
  const table = readTable({ kind: 'file', path: fixture('usage_tab.txt') });
  expect(table.name).toBe('usage_tab.txt');
  expect(table.headers).toEqual(['Item Number', 'Requested Date', 'Req Qty', 'Remarks']);
  expect(table.rows[1]).toEqual(['P-11', '2024-01-03', '5', 'em']);
  expect(table.rowNumbers).toEqual([2, 3]);
});

test('collects headers of in-memory records in first-seen order', () => {
  const day = new Date(Date.UTC(2024, 0, 2));
  const table = readTable({
    kind: 'records',
    name: 'inline',
    records: [{ 'Item Number': 'P-1', Qty: 2 }, { 'Item Number': 'P-2', Date: day }],
  });
  expect(table.headers).toEqual(['Item Number', 'Qty', 'Date']);
  expect(table.rows).toEqual([
    ['P-1', 2, null],
    ['P-2', null, day],
  ]);
  expect(table.rowNumbers).toEqual([2, 3]);
});

test('a missing file raises a SourceReadError', () => {
  expect(() => readTable({ kind: 'file', path: fixture('does_not_exist.csv') })).toThrow(SourceReadError);
  expect(sourceName({ kind: 'file', path: fixture('does_not_exist.csv') })).toBe('does_not_exist.csv');
});
