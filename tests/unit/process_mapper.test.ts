import { buildProcessBreakdown, buildProcessMapping, processesFor } from '../../src/analysis/process_mapper';
import { classifyAll } from '../../src/analysis/criticality_classifier';
import { DEFAULT_ANALYSIS_CONFIG } from '../../src/config/environment';
import { partStats, processRow } from '../helpers/builders';

const rows = [
  processRow(2, 'Press', 'P-1', 'Bolt'),
  processRow(3, 'Press', 'P-2'),
  processRow(4, 'Weld', 'P-1'),
  processRow(5, 'Press', 'P-1'),
  processRow(6, '', 'P-3'),
  processRow(7, 'Weld', ''),
  processRow(8, 'Press', 'P-4', 'Washer'),
];

test('maps parts to every process they are listed under', () => {
  const { mapping, rowsRead, issues } = buildProcessMapping(rows);

  expect(rowsRead).toBe(7);
  expect(mapping.processes).toEqual(['Press', 'Weld']);
  expect(mapping.processesByItem.get('P-1')).toEqual(['Press', 'Weld']);
  expect(mapping.entries.map((entry) => `${entry.process}/${entry.itemNumber}`)).toEqual([
    'Press/P-1',
    'Press/P-2',
    'Weld/P-1',
    'Press/P-4',
  ]);
  expect(processesFor(mapping, 'P-4')).toEqual(['Press']);
  expect(processesFor(mapping, 'P-3')).toEqual([]);
  expect(processesFor(null, 'P-1')).toEqual([]);
  expect(issues).toEqual([
    { source: 'processes.csv', rowNumber: 6, reason: 'MISSING_PROCESS', message: 'Process is missing', itemNumber: 'P-3' },
    { source: 'processes.csv', rowNumber: 7, reason: 'MISSING_ITEM_NUMBER', message: 'Item number is missing' },
  ]);
});

test('breaks usage down by process, listing mapped parts without usage as NO_DATA', () => {
  const { mapping } = buildProcessMapping(rows);
  const statistics = [
    partStats('P-1', { partName: 'Hex bolt', totalQuantity: 10, dMeanPerDay: 1, currentStock: 100 }),
    partStats('P-4', { partName: 'Flat washer', totalQuantity: 30 }),
  ];
  const breakdown = buildProcessBreakdown(mapping, statistics, classifyAll(statistics, DEFAULT_ANALYSIS_CONFIG));

  expect(breakdown.map((row) => [row.process, row.itemNumber, row.partName, row.tier])).toEqual([
    ['Press', 'P-4', 'Washer', 'LOW'],
    ['Press', 'P-1', 'Bolt', 'LOW'],
    ['Press', 'P-2', '', 'NO_DATA'],
    ['Weld', 'P-1', 'Hex bolt', 'LOW'],
  ]);
  expect(breakdown[1]).toMatchObject({ totalQuantity: 10, currentStock: 100, dMeanPerDay: 1, recommendedSafetyStock: 7 });
  expect(breakdown[2]).toMatchObject({ totalQuantity: 0, usageCount: 0, recommendedSafetyStock: 0 });
});
