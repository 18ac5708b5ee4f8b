import { assembleResult, compareRows, filterByProcess, joinRows } from '../../src/analysis/result_assembler';
import { buildProcessMapping } from '../../src/analysis/process_mapper';
import { classifyAll } from '../../src/analysis/criticality_classifier';
import { DEFAULT_ANALYSIS_CONFIG } from '../../src/config/environment';
import { ComputationError, ConfigurationError } from '../../src/utils/errors';
import { emptyDiagnostics, partStats, processRow } from '../helpers/builders';

const statistics = [
  partStats('A-2', { dMeanPerDay: 4, currentStock: 8, totalQuantity: 40 }),
  partStats('A-1', { dMeanPerDay: 2, currentStock: 20, totalQuantity: 20, firstDate: '2024-01-03' }),
  partStats('B-1', { currentStock: 5 }),
  partStats('C-1', { dMeanPerDay: 4, totalQuantity: 12, lastDate: '2024-02-10' }),
];
const criticality = classifyAll(statistics, DEFAULT_ANALYSIS_CONFIG);
const { mapping } = buildProcessMapping([
  processRow(2, 'Press', 'A-2'),
  processRow(3, 'Weld', 'A-1'),
  processRow(4, 'Press', 'B-1'),
]);

const assemble = (processFilter: string | null = null) =>
  assembleResult({ statistics, criticality, mapping, processFilter, diagnostics: emptyDiagnostics() });

test('orders rows by severity, then item number', () => {
  const result = assemble();
  expect(result.rows.map((row) => `${row.tier} ${row.itemNumber}`)).toEqual([
    'CRITICAL A-2',
    'CRITICAL C-1',
    'HIGH A-1',
    'LOW B-1',
  ]);
  expect(compareRows({ tier: 'LOW', itemNumber: 'A' }, { tier: 'MEDIUM', itemNumber: 'B' })).toBeGreaterThan(0);
});

test('joins statistics, criticality and processes per part', () => {
  const row = assemble().rows[0];
  expect(row).toMatchObject({
    itemNumber: 'A-2',
    totalQuantity: 40,
    daysOfCover: 2,
    recommendedSafetyStock: 28,
    processes: ['Press'],
  });
});

test('summarizes tiers, totals and the date range', () => {
  expect(assemble().summary).toEqual({
    partsAnalyzed: 4,
    eventsRetained: 4,
    totalQuantity: 72,
    tierCounts: { CRITICAL: 2, HIGH: 1, MEDIUM: 0, LOW: 1 },
    dateRange: { from: '2024-01-01', to: '2024-02-10' },
  });
});

test('a process filter keeps only the parts of that process', () => {
  const result = assemble('Press');
  expect(result.processFilter).toBe('Press');
  expect(result.processes).toEqual(['Press', 'Weld']);
  expect(result.rows.map((row) => row.itemNumber)).toEqual(['A-2', 'B-1']);
  expect(result.processBreakdown?.map((row) => row.itemNumber)).toEqual(['A-2', 'B-1']);
  expect(result.summary.partsAnalyzed).toBe(2);
});

test('filtering a snapshot leaves the input snapshot untouched', () => {
  const result = assemble();
  const weld = filterByProcess(result, 'Weld');

  expect(weld.rows.map((row) => row.itemNumber)).toEqual(['A-1']);
  expect(result.rows).toHaveLength(4);
  expect(filterByProcess(result, null)).toBe(result);
  expect(filterByProcess(weld, 'Weld')).toBe(weld);
});

test('a filtered snapshot cannot be switched to another process or back to all rows', () => {
  const press = assemble('Press');

  expect(() => filterByProcess(press, 'Weld')).toThrow(ConfigurationError);
  expect(() => filterByProcess(press, null)).toThrow(
    'Result is already filtered to process "Press"; filter the unfiltered result instead'
  );
  expect(filterByProcess(assemble(), 'Weld').rows.map((row) => row.itemNumber)).toEqual(['A-1']);
});

test('results are frozen all the way down', () => {
  const result = assemble();
  expect(Object.isFrozen(result)).toBe(true);
  expect(Object.isFrozen(result.rows)).toBe(true);
  expect(Object.isFrozen(result.rows[0])).toBe(true);
  expect(Object.isFrozen(result.rows[0].processes)).toBe(true);
  expect(Object.isFrozen(result.summary.tierCounts)).toBe(true);
});

test('an empty analysis has no date range', () => {
  const result = assembleResult({
    statistics: [],
    criticality: [],
    mapping: null,
    processFilter: null,
    diagnostics: emptyDiagnostics(),
  });
  expect(result.rows).toEqual([]);
  expect(result.processBreakdown).toBeNull();
  expect(result.summary.dateRange).toBeNull();
});

test('every part needs a criticality result', () => {
  expect(() => joinRows(statistics, criticality.slice(1), null)).toThrow(ComputationError);
});
