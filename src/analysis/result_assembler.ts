import {
  AnalysisResult,
  AnalysisRow,
  AnalysisSummary,
  CriticalityResult,
  CriticalityTier,
  DiagnosticsSummary,
  PartStatistics,
  ProcessBreakdownRow,
  ProcessMapping,
  TIER_SEVERITY,
} from '../domain/types';
import { buildProcessBreakdown, processesFor } from './process_mapper';
import { ComputationError, ConfigurationError } from '../utils/errors';
import { compareCodeUnits } from '../utils/compare';
import { sum } from '../utils/numbers';

export interface AssemblyInput {
  statistics: readonly PartStatistics[];
  criticality: readonly CriticalityResult[];
  mapping: ProcessMapping | null;
  processFilter: string | null;
  diagnostics: DiagnosticsSummary;
}

/**
 * Most severe tier first, then item number in code-unit order.
 */
export function compareRows(a: Pick<AnalysisRow, 'tier' | 'itemNumber'>, b: Pick<AnalysisRow, 'tier' | 'itemNumber'>): number {
  return TIER_SEVERITY[b.tier] - TIER_SEVERITY[a.tier] || compareCodeUnits(a.itemNumber, b.itemNumber);
}

export function joinRows(
  statistics: readonly PartStatistics[],
  criticality: readonly CriticalityResult[],
  mapping: ProcessMapping | null
): AnalysisRow[] {
  const byItem = new Map(criticality.map((result) => [result.itemNumber, result]));
  return statistics.map((stats) => {
    const result = byItem.get(stats.itemNumber);
    if (!result) {
      throw new ComputationError(`No criticality result for ${stats.itemNumber}`, stats.itemNumber);
    }
    return { ...stats, ...result, processes: [...processesFor(mapping, stats.itemNumber)] };
  });
}

export function summarize(rows: readonly AnalysisRow[]): AnalysisSummary {
  const tierCounts: Record<CriticalityTier, number> = { CRITICAL: 0, HIGH: 0, MEDIUM: 0, LOW: 0 };
  rows.forEach((row) => {
    tierCounts[row.tier] += 1;
  });

  // YYYY-MM-DD strings sort chronologically
  const firstDates = rows.map((row) => row.firstDate).sort();
  const lastDates = rows.map((row) => row.lastDate).sort();
  const from = firstDates[0];
  const to = lastDates[lastDates.length - 1];

  return {
    partsAnalyzed: rows.length,
    eventsRetained: sum(rows.map((row) => row.usageCount)),
    totalQuantity: sum(rows.map((row) => row.totalQuantity)),
    tierCounts,
    dateRange: from !== undefined && to !== undefined ? { from, to } : null,
  };
}

function deepFreeze<T>(value: T): T {
  if (typeof value === 'object' && value !== null && !Object.isFrozen(value)) {
    Object.freeze(value);
    Object.values(value).forEach((child) => deepFreeze(child));
  }
  return value;
}

function snapshot(
  rows: readonly AnalysisRow[],
  breakdown: readonly ProcessBreakdownRow[] | null,
  processes: readonly string[],
  processFilter: string | null,
  diagnostics: DiagnosticsSummary
): AnalysisResult {
  return deepFreeze({
    rows,
    processFilter,
    processes,
    processBreakdown: breakdown,
    summary: summarize(rows),
    diagnostics,
  });
}

export function assembleResult(input: AssemblyInput): AnalysisResult {
  const { mapping, processFilter } = input;
  const rows = joinRows(input.statistics, input.criticality, mapping).sort(compareRows);
  const breakdown = mapping ? buildProcessBreakdown(mapping, input.statistics, input.criticality) : null;
  const processes = mapping ? [...mapping.processes] : [];

  if (processFilter === null) {
    return snapshot(rows, breakdown, processes, null, input.diagnostics);
  }
  return snapshot(
    rows.filter((row) => row.processes.includes(processFilter)),
    breakdown ? breakdown.filter((row) => row.process === processFilter) : null,
    processes,
    processFilter,
    input.diagnostics
  );
}

/**
 * Narrows an unfiltered snapshot to one process without re-running the
 * analysis. The input snapshot is left untouched; rows keep their relative
 * order. A snapshot already filtered to another process no longer holds
 * the other rows, so asking it for a different view is an error.
 */
export function filterByProcess(result: AnalysisResult, processFilter: string | null): AnalysisResult {
  if (processFilter === result.processFilter) {
    return result;
  }
  if (processFilter === null || result.processFilter !== null) {
    throw new ConfigurationError(
      `Result is already filtered to process "${result.processFilter ?? ''}"; filter the unfiltered result instead`,
      'processFilter',
      processFilter
    );
  }
  return snapshot(
    result.rows.filter((row) => row.processes.includes(processFilter)),
    result.processBreakdown ? result.processBreakdown.filter((row) => row.process === processFilter) : null,
    result.processes,
    processFilter,
    result.diagnostics
  );
}
