import {
  AnalysisConfig,
  AnalysisOptions,
  AnalysisResult,
  AnalysisSources,
  DiagnosticsSummary,
  RawProcessRow,
} from '../domain/types';
import { readTable, sourceName } from '../ingest/table_reader';
import { ingestProcessMappingTable, ingestUsageTable } from '../ingest/record_ingestor';
import { cleanUsageRows } from '../ingest/usage_cleaner';
import { buildCurrentStockLookup } from '../analysis/current_stock_lookup';
import { computeStatistics, groupUsageSeries } from '../analysis/statistics_calculator';
import { classifyAll } from '../analysis/criticality_classifier';
import { buildProcessMapping } from '../analysis/process_mapper';
import { assembleResult } from '../analysis/result_assembler';
import { analysisConfigSchema, processFilterSchema, validateInput } from '../validation/config_validation';
import { ConfigurationError, EngineError, isEngineError } from '../utils/errors';
import { logger } from '../utils/logger';

export type AnalysisOutcome =
  | { status: 'COMPLETED'; result: AnalysisResult }
  | { status: 'FAILED'; error: EngineError };

/**
 * Runs the whole pipeline and returns the result snapshot, or throws an
 * engine error. Every call builds its own intermediate structures.
 */
export function analyze(config: AnalysisConfig, sources: AnalysisSources, options: AnalysisOptions = {}): AnalysisResult {
  const analysisConfig = validateInput(analysisConfigSchema, config);
  const processFilter = validateInput(processFilterSchema, options.processFilter ?? null);
  const usageSources = Array.isArray(sources.usage) ? sources.usage : [sources.usage];

  if (usageSources.length === 0) {
    throw new ConfigurationError('At least one usage source is required', 'usage');
  }
  if (processFilter !== null && !sources.processMapping) {
    throw new ConfigurationError('A process filter needs a process mapping source', 'processFilter', processFilter);
  }

  logger.info('Safety stock analysis started', {
    usageSources: usageSources.map(sourceName),
    processMapping: sources.processMapping ? sourceName(sources.processMapping) : null,
    processFilter,
  });

  // every header is resolved before any row is cleaned
  const ingestions = usageSources.map((source) => ingestUsageTable(readTable(source)));
  const processRows: RawProcessRow[] | null = sources.processMapping
    ? ingestProcessMappingTable(readTable(sources.processMapping))
    : null;

  const rawRows = ingestions.flatMap((ingestion) => ingestion.rows);
  const cleaned = cleanUsageRows(rawRows, { keepRemarkCode: analysisConfig.keepRemarkCode });
  const stockLookup = buildCurrentStockLookup(rawRows, analysisConfig.currentStockTieBreak);
  const statistics = computeStatistics(groupUsageSeries(cleaned.events), stockLookup);
  const criticality = classifyAll(statistics, analysisConfig);
  const mappingBuild = processRows ? buildProcessMapping(processRows) : null;

  if (processFilter !== null && mappingBuild && !mappingBuild.mapping.processes.includes(processFilter)) {
    logger.warn(`Process "${processFilter}" is not in the process mapping`, {
      processes: mappingBuild.mapping.processes,
    });
  }

  // the cleaner records one issue per discarded row
  const rowsDiscarded = cleaned.issues.length;
  const diagnostics: DiagnosticsSummary = {
    rowsRead: cleaned.rowsRead,
    rowsRetained: cleaned.events.length,
    rowsDiscarded,
    discardCounts: cleaned.discardCounts,
    mappingRowsRead: mappingBuild?.rowsRead ?? 0,
    mappingRowsDiscarded: mappingBuild?.issues.length ?? 0,
    partsWithoutStock: statistics.filter((stats) => stats.currentStockMissing).map((stats) => stats.itemNumber),
    issues: [...cleaned.issues, ...(mappingBuild?.issues ?? [])],
  };

  const result = assembleResult({
    statistics,
    criticality,
    mapping: mappingBuild?.mapping ?? null,
    processFilter,
    diagnostics,
  });

  logger.info('Safety stock analysis completed', {
    parts: result.summary.partsAnalyzed,
    rowsRead: diagnostics.rowsRead,
    rowsDiscarded,
    tierCounts: result.summary.tierCounts,
  });

  return result;
}

export function runAnalysis(
  config: AnalysisConfig,
  sources: AnalysisSources,
  options: AnalysisOptions = {}
): AnalysisOutcome {
  try {
    return { status: 'COMPLETED', result: analyze(config, sources, options) };
  } catch (error) {
    if (isEngineError(error)) {
      logger.error('Safety stock analysis failed', { error: error.message, type: error.name });
      return { status: 'FAILED', error };
    }
    throw error;
  }
}

export function describeOutcome(outcome: AnalysisOutcome): string {
  if (outcome.status === 'FAILED') {
    return `Failed: ${outcome.error.message}`;
  }
  const { summary, diagnostics } = outcome.result;
  return `Completed: ${summary.partsAnalyzed} parts analyzed, ${diagnostics.rowsDiscarded} rows discarded`;
}
