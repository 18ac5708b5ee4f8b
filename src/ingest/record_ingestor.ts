import { CellValue, RawProcessRow, RawTable, RawUsageRow, TabularSource } from '../domain/types';
import { PROCESS_MAPPING_SCHEMA, USAGE_SCHEMA, resolveColumns } from './column_resolver';
import { readTable } from './table_reader';
import { parseCalendarDate } from '../utils/dates';
import { parseNumeric } from '../utils/numbers';
import { logger } from '../utils/logger';

export interface UsageIngestion {
  source: string;
  rows: RawUsageRow[];
  hasRemarksColumn: boolean;
}

export const cellText = (value: CellValue): string => {
  if (value === null) return '';
  if (value instanceof Date) return Number.isNaN(value.getTime()) ? '' : value.toISOString();
  return String(value).trim();
};

const rawQuantity = (value: CellValue): string | number | null => {
  if (typeof value === 'number') return value;
  const text = cellText(value);
  return text === '' ? null : text;
};

const isBlankRow = (row: readonly CellValue[]): boolean => row.every((cell) => cellText(cell) === '');

export function ingestUsageTable(table: RawTable): UsageIngestion {
  const columns = resolveColumns(table.headers, USAGE_SCHEMA, table.name);
  const hasRemarksColumn = columns.has('remarks');

  const rows = table.rows.map((row, index): RawUsageRow => {
    const dateCell = columns.cell(row, 'date');
    const dateText = cellText(dateCell);
    const date = parseCalendarDate(dateCell);
    return {
      source: table.name,
      rowNumber: table.rowNumbers[index],
      itemNumber: cellText(columns.cell(row, 'item_number')),
      date,
      dateText,
      dateUnparseable: dateText !== '' && date === null,
      quantity: rawQuantity(columns.cell(row, 'quantity')),
      partName: cellText(columns.cell(row, 'part_name')),
      description2: cellText(columns.cell(row, 'description2')),
      currentStock: parseNumeric(columns.cell(row, 'current_stock')),
      remarks: cellText(columns.cell(row, 'remarks')),
      hasRemarksColumn,
      blank: isBlankRow(row),
    };
  });

  logger.debug(`Ingested ${rows.length} usage rows`, {
    source: table.name,
    columns: {
      itemNumber: columns.headerFor('item_number'),
      date: columns.headerFor('date'),
      quantity: columns.headerFor('quantity'),
      remarks: columns.headerFor('remarks'),
      currentStock: columns.headerFor('current_stock'),
    },
  });

  return { source: table.name, rows, hasRemarksColumn };
}

export function ingestUsage(source: TabularSource): UsageIngestion {
  return ingestUsageTable(readTable(source));
}

export function ingestProcessMappingTable(table: RawTable): RawProcessRow[] {
  const columns = resolveColumns(table.headers, PROCESS_MAPPING_SCHEMA, table.name);
  return table.rows.map((row, index) => ({
    source: table.name,
    rowNumber: table.rowNumbers[index],
    process: cellText(columns.cell(row, 'process')),
    itemNumber: cellText(columns.cell(row, 'item_number')),
    partName: cellText(columns.cell(row, 'part_name')),
  }));
}

export function ingestProcessMapping(source: TabularSource): RawProcessRow[] {
  return ingestProcessMappingTable(readTable(source));
}
