import { EXPORT_COLUMNS, toExportRecords, toProcessBreakdownRecords } from '../../src/analysis/export_records';
import { assembleResult } from '../../src/analysis/result_assembler';
import { buildProcessMapping } from '../../src/analysis/process_mapper';
import { classifyAll } from '../../src/analysis/criticality_classifier';
import { DEFAULT_ANALYSIS_CONFIG } from '../../src/config/environment';
import { emptyDiagnostics, partStats, processRow } from '../helpers/builders';

const statistics = [
  partStats('P-1', {
    partName: 'Hex bolt',
    description2: 'M8',
    dMeanPerDay: 4,
    currentStock: 8,
    totalQuantity: 40,
    usageCount: 8,
    averageQuantityPerRequest: 5,
    observationSpanDays: 10,
    lastDate: '2024-01-11',
  }),
  partStats('P-2', { partName: 'Washer', currentStock: 3, currentStockMissing: false }),
];
const { mapping } = buildProcessMapping([
  processRow(2, 'Weld', 'P-1'),
  processRow(3, 'Press', 'P-1'),
  processRow(4, 'Press', 'P-9', 'Spare pin'),
]);
const result = assembleResult({
  statistics,
  criticality: classifyAll(statistics, DEFAULT_ANALYSIS_CONFIG),
  mapping,
  processFilter: null,
  diagnostics: emptyDiagnostics(),
});

test('flattens analysis rows into labeled export records', () => {
  const [bolt, washer] = toExportRecords(result);

  expect(bolt).toEqual({
    'Item Number': 'P-1',
    'Part Name': 'Hex bolt',
    'Description 2': 'M8',
    Processes: 'Weld; Press',
    'Total Usage': 40,
    'Usage Count': 8,
    'Avg Usage per Request': 5,
    'First Date': '2024-01-01',
    'Last Date': '2024-01-11',
    'Span Days': 10,
    D_Mean_per_Day: 4,
    D_Std_per_Day: 0,
    'Current Stock': 8,
    'Stock Reported': true,
    'Days of Cover': 2,
    'Coefficient of Variation': 0,
    'Variability Buffer': 0,
    'Safety Stock': 28,
    Shortfall: 20,
    Criticality: 'CRITICAL',
    Recommendation:
      'Reorder immediately: stock covers 2.0 days. Order at least 20 units to reach the recommended level.',
  });
  expect(washer['Days of Cover']).toBeNull();
  expect(washer['Coefficient of Variation']).toBeNull();
  expect(washer.Processes).toBe('');
});

test('export columns match the record keys in order', () => {
  expect(Object.keys(toExportRecords(result)[0])).toEqual([...EXPORT_COLUMNS]);
});

test('process breakdown records spell out parts without usage', () => {
  expect(toProcessBreakdownRecords(result).map((record) => [record.Process, record['Item Number'], record.Criticality])).toEqual([
    ['Press', 'P-1', 'CRITICAL'],
    ['Press', 'P-9', 'NO DATA'],
    ['Weld', 'P-1', 'CRITICAL'],
  ]);
});
