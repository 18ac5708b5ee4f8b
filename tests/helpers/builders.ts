import { DiagnosticsSummary, PartStatistics, RawProcessRow, RawUsageRow, UsageEvent } from '../../src/domain/types';

export const day = (month: number, date: number): Date => new Date(Date.UTC(2024, month - 1, date));

export function usageRow(overrides: Partial<RawUsageRow> = {}): RawUsageRow {
  return {
    source: 'usage.csv',
    rowNumber: 2,
    itemNumber: 'P-1',
    date: day(1, 2),
    dateText: '2024-01-02',
    dateUnparseable: false,
    quantity: '3',
    partName: 'Hex bolt',
    description2: '',
    currentStock: null,
    remarks: 'EM',
    hasRemarksColumn: true,
    blank: false,
    ...overrides,
  };
}

export function usageEvent(itemNumber: string, date: Date, quantity: number, overrides: Partial<UsageEvent> = {}): UsageEvent {
  return {
    itemNumber,
    date,
    quantity,
    partName: '',
    description2: '',
    remark: 'EM',
    source: 'usage.csv',
    rowNumber: 2,
    ...overrides,
  };
}

export function partStats(itemNumber: string, overrides: Partial<PartStatistics> = {}): PartStatistics {
  return {
    itemNumber,
    partName: '',
    description2: '',
    currentStock: 0,
    currentStockMissing: false,
    dMeanPerDay: 0,
    dStdPerDay: 0,
    observationSpanDays: 1,
    observationDays: 1,
    totalQuantity: 0,
    usageCount: 1,
    averageQuantityPerRequest: 0,
    firstDate: '2024-01-01',
    lastDate: '2024-01-01',
    ...overrides,
  };
}

export function processRow(rowNumber: number, process: string, itemNumber: string, partName = ''): RawProcessRow {
  return { source: 'processes.csv', rowNumber, process, itemNumber, partName };
}

export function emptyDiagnostics(): DiagnosticsSummary {
  return {
    rowsRead: 0,
    rowsRetained: 0,
    rowsDiscarded: 0,
    discardCounts: {},
    mappingRowsRead: 0,
    mappingRowsDiscarded: 0,
    partsWithoutStock: [],
    issues: [],
  };
}
