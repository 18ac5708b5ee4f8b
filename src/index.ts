export * from './domain/types';
export { analyze, runAnalysis, describeOutcome, AnalysisOutcome } from './engine/analysis_engine';
export {
  loadConfig,
  resolveAnalysisConfig,
  DEFAULT_ANALYSIS_CONFIG,
  AppConfig,
  AnalysisConfigOverrides,
} from './config/environment';
export { readTable, parseDelimited, parseWorkbook } from './ingest/table_reader';
export { resolveColumns, normalizeHeader, COLUMN_LABELS, USAGE_SCHEMA, PROCESS_MAPPING_SCHEMA } from './ingest/column_resolver';
export { ingestUsage, ingestProcessMapping } from './ingest/record_ingestor';
export { cleanUsageRows } from './ingest/usage_cleaner';
export { buildCurrentStockLookup } from './analysis/current_stock_lookup';
export { groupUsageSeries, computePartStatistics, computeStatistics } from './analysis/statistics_calculator';
export { classifyPart, classifyAll, daysOfCover, recommendedSafetyStock } from './analysis/criticality_classifier';
export { buildProcessMapping, buildProcessBreakdown } from './analysis/process_mapper';
export { assembleResult, filterByProcess, compareRows } from './analysis/result_assembler';
export {
  toExportRecords,
  toProcessBreakdownRecords,
  EXPORT_COLUMNS,
  ExportRecord,
  ProcessBreakdownRecord,
} from './analysis/export_records';
export { parseCalendarDate } from './utils/dates';
export {
  SchemaError,
  ComputationError,
  ConfigurationError,
  SourceReadError,
  EngineError,
  isEngineError,
} from './utils/errors';
export { logger, LogLevel } from './utils/logger';
