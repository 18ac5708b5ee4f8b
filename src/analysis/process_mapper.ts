import {
  CriticalityResult,
  ItemNumber,
  PartStatistics,
  ProcessBreakdownRow,
  ProcessMapping,
  ProcessMappingEntry,
  RawProcessRow,
  RowValidationIssue,
} from '../domain/types';
import { compareCodeUnits } from '../utils/compare';

export interface ProcessMappingBuild {
  mapping: ProcessMapping;
  rowsRead: number;
  issues: RowValidationIssue[];
}

/**
 * A part listed under several processes keeps every one of them; repeated
 * (process, part) pairs collapse to the first occurrence.
 */
export function buildProcessMapping(rows: readonly RawProcessRow[]): ProcessMappingBuild {
  const entries: ProcessMappingEntry[] = [];
  const processesByItem = new Map<ItemNumber, string[]>();
  const issues: RowValidationIssue[] = [];

  for (const row of rows) {
    if (row.itemNumber === '') {
      issues.push({
        source: row.source,
        rowNumber: row.rowNumber,
        reason: 'MISSING_ITEM_NUMBER',
        message: 'Item number is missing',
      });
      continue;
    }
    if (row.process === '') {
      issues.push({
        source: row.source,
        rowNumber: row.rowNumber,
        reason: 'MISSING_PROCESS',
        message: 'Process is missing',
        itemNumber: row.itemNumber,
      });
      continue;
    }

    const processes = processesByItem.get(row.itemNumber) ?? [];
    if (processes.includes(row.process)) continue;
    processes.push(row.process);
    processesByItem.set(row.itemNumber, processes);
    entries.push({ process: row.process, itemNumber: row.itemNumber, partName: row.partName });
  }

  const processes = [...new Set(entries.map((entry) => entry.process))].sort(compareCodeUnits);

  return {
    mapping: { processesByItem, entries, processes },
    rowsRead: rows.length,
    issues,
  };
}

export function processesFor(mapping: ProcessMapping | null, itemNumber: ItemNumber): readonly string[] {
  return mapping?.processesByItem.get(itemNumber) ?? [];
}

/**
 * One row per (process, part) pair of the mapping file. Mapped parts
 * without usage show up as NO_DATA with zero figures.
 */
export function buildProcessBreakdown(
  mapping: ProcessMapping,
  statistics: readonly PartStatistics[],
  criticality: readonly CriticalityResult[]
): ProcessBreakdownRow[] {
  const statsByItem = new Map(statistics.map((stats) => [stats.itemNumber, stats]));
  const tierByItem = new Map(criticality.map((result) => [result.itemNumber, result]));

  const rows = mapping.entries.map((entry): ProcessBreakdownRow => {
    const stats = statsByItem.get(entry.itemNumber);
    const result = tierByItem.get(entry.itemNumber);
    if (!stats || !result) {
      return {
        process: entry.process,
        itemNumber: entry.itemNumber,
        partName: entry.partName,
        tier: 'NO_DATA',
        totalQuantity: 0,
        usageCount: 0,
        averageQuantityPerRequest: 0,
        currentStock: 0,
        dMeanPerDay: 0,
        dStdPerDay: 0,
        recommendedSafetyStock: 0,
      };
    }
    return {
      process: entry.process,
      itemNumber: entry.itemNumber,
      partName: entry.partName || stats.partName,
      tier: result.tier,
      totalQuantity: stats.totalQuantity,
      usageCount: stats.usageCount,
      averageQuantityPerRequest: stats.averageQuantityPerRequest,
      currentStock: stats.currentStock,
      dMeanPerDay: stats.dMeanPerDay,
      dStdPerDay: stats.dStdPerDay,
      recommendedSafetyStock: result.recommendedSafetyStock,
    };
  });

  return rows.sort(
    (a, b) =>
      compareCodeUnits(a.process, b.process) ||
      b.totalQuantity - a.totalQuantity ||
      compareCodeUnits(a.itemNumber, b.itemNumber)
  );
}
