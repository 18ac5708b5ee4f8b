import { AnalysisConfig, CriticalityThresholds, CurrentStockTieBreak } from '../domain/types';
import { analysisConfigSchema, validateInput } from '../validation/config_validation';
import { LogLevel, logger, resolveLogLevel } from '../utils/logger';

export interface AppConfig {
  analysis: AnalysisConfig;
  logging: {
    level: LogLevel;
  };
}

export const DEFAULT_ANALYSIS_CONFIG: AnalysisConfig = {
  keepRemarkCode: 'em',
  leadTimeDays: 7,
  serviceLevelZ: 1.65, // ~95% service level
  criticalityThresholds: { critical: 7, high: 14, medium: 30 },
  highVariabilityCv: 1,
  currentStockTieBreak: 'latest-date',
};

export type AnalysisConfigOverrides = Partial<Omit<AnalysisConfig, 'criticalityThresholds'>> & {
  criticalityThresholds?: Partial<CriticalityThresholds>;
};

export function resolveAnalysisConfig(overrides: AnalysisConfigOverrides = {}): AnalysisConfig {
  const defaults = DEFAULT_ANALYSIS_CONFIG;
  const thresholds = overrides.criticalityThresholds;
  // undefined means "not set", so merge field by field
  const merged = {
    keepRemarkCode: overrides.keepRemarkCode ?? defaults.keepRemarkCode,
    leadTimeDays: overrides.leadTimeDays ?? defaults.leadTimeDays,
    serviceLevelZ: overrides.serviceLevelZ ?? defaults.serviceLevelZ,
    criticalityThresholds: {
      critical: thresholds?.critical ?? defaults.criticalityThresholds.critical,
      high: thresholds?.high ?? defaults.criticalityThresholds.high,
      medium: thresholds?.medium ?? defaults.criticalityThresholds.medium,
    },
    highVariabilityCv: overrides.highVariabilityCv ?? defaults.highVariabilityCv,
    currentStockTieBreak: overrides.currentStockTieBreak ?? defaults.currentStockTieBreak,
  };
  return validateInput(analysisConfigSchema, merged);
}

function parseNumberEnv(value: string | undefined): number | undefined {
  if (value === undefined || value.trim() === '') {
    return undefined;
  }
  return parseFloat(value);
}

function parseThresholdsEnv(value: string | undefined): Partial<CriticalityThresholds> | undefined {
  if (!value) {
    return undefined;
  }
  const [critical, high, medium] = value.split(',').map((part) => parseFloat(part));
  return { critical, high, medium };
}

const TIE_BREAKS: readonly CurrentStockTieBreak[] = ['latest-date', 'last-seen', 'first-seen'];

function parseTieBreakEnv(value: string | undefined): CurrentStockTieBreak | undefined {
  const trimmed = value?.trim();
  return TIE_BREAKS.find((tieBreak) => tieBreak === trimmed);
}

/**
 * Reads settings from the environment and applies the log level to the
 * shared logger.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const overrides: AnalysisConfigOverrides = {
    keepRemarkCode: env.KEEP_REMARK_CODE || undefined,
    leadTimeDays: parseNumberEnv(env.LEAD_TIME_DAYS),
    serviceLevelZ: parseNumberEnv(env.SERVICE_LEVEL_Z),
    criticalityThresholds: parseThresholdsEnv(env.CRITICALITY_THRESHOLDS),
    highVariabilityCv: parseNumberEnv(env.HIGH_VARIABILITY_CV),
    currentStockTieBreak: parseTieBreakEnv(env.CURRENT_STOCK_TIE_BREAK),
  };

  const config: AppConfig = {
    analysis: resolveAnalysisConfig(overrides),
    logging: {
      level: resolveLogLevel(env),
    },
  };
  logger.setLevel(config.logging.level);
  return config;
}
