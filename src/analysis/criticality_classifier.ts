import { AnalysisConfig, CriticalityResult, CriticalityThresholds, CriticalityTier, PartStatistics } from '../domain/types';
import { ComputationError } from '../utils/errors';

export type ClassifierConfig = Pick<
  AnalysisConfig,
  'leadTimeDays' | 'serviceLevelZ' | 'criticalityThresholds' | 'highVariabilityCv'
>;

const ACTIONS: Record<CriticalityTier, string> = {
  CRITICAL: 'Reorder immediately',
  HIGH: 'Reorder soon',
  MEDIUM: 'Monitor closely',
  LOW: 'Stock sufficient',
};

const ESCALATION: Record<CriticalityTier, CriticalityTier> = {
  LOW: 'MEDIUM',
  MEDIUM: 'HIGH',
  HIGH: 'CRITICAL',
  CRITICAL: 'CRITICAL',
};

export function daysOfCover(stats: Pick<PartStatistics, 'currentStock' | 'dMeanPerDay'>): number {
  return stats.dMeanPerDay === 0 ? Infinity : stats.currentStock / stats.dMeanPerDay;
}

export function tierForCover(cover: number, thresholds: CriticalityThresholds): CriticalityTier {
  if (cover < thresholds.critical) return 'CRITICAL';
  if (cover < thresholds.high) return 'HIGH';
  if (cover < thresholds.medium) return 'MEDIUM';
  return 'LOW';
}

/**
 * Statistical safety stock: mean demand over the lead time plus a buffer of
 * z standard deviations scaled to the lead time.
 */
export function recommendedSafetyStock(
  stats: Pick<PartStatistics, 'dMeanPerDay' | 'dStdPerDay'>,
  leadTimeDays: number,
  serviceLevelZ: number
): { recommended: number; buffer: number } {
  const buffer = serviceLevelZ * stats.dStdPerDay * Math.sqrt(leadTimeDays);
  return { recommended: stats.dMeanPerDay * leadTimeDays + buffer, buffer };
}

function buildNote(
  tier: CriticalityTier,
  cover: number,
  cv: number | null,
  escalated: boolean,
  stockMissing: boolean,
  shortfall: number
): string {
  const sentences = [
    Number.isFinite(cover)
      ? `${ACTIONS[tier]}: stock covers ${cover.toFixed(1)} days.`
      : 'No consumption recorded; no stockout risk.',
  ];
  if (escalated && cv !== null) {
    sentences.push(`Demand is highly variable (CV ${cv.toFixed(2)}).`);
  }
  if (stockMissing) {
    sentences.push('Current stock not reported; assumed 0.');
  }
  if (shortfall > 0) {
    sentences.push(`Order at least ${Math.ceil(shortfall)} units to reach the recommended level.`);
  }
  return sentences.join(' ');
}

export function classifyPart(stats: PartStatistics, config: ClassifierConfig): CriticalityResult {
  const cover = daysOfCover(stats);
  const cv = stats.dMeanPerDay === 0 ? null : stats.dStdPerDay / stats.dMeanPerDay;

  let tier: CriticalityTier = 'LOW';
  let variabilityEscalated = false;
  // no consumption means no stockout risk, whatever the thresholds say
  if (Number.isFinite(cover)) {
    tier = tierForCover(cover, config.criticalityThresholds);
    if (cv !== null && cv >= config.highVariabilityCv && tier !== 'CRITICAL') {
      tier = ESCALATION[tier];
      variabilityEscalated = true;
    }
  }

  const { recommended, buffer } = recommendedSafetyStock(stats, config.leadTimeDays, config.serviceLevelZ);
  if (!Number.isFinite(recommended)) {
    throw new ComputationError(`Safety stock for ${stats.itemNumber} is ${recommended}`, stats.itemNumber, {
      dMeanPerDay: stats.dMeanPerDay,
      dStdPerDay: stats.dStdPerDay,
    });
  }
  const shortfall = Math.max(0, recommended - stats.currentStock);

  return {
    itemNumber: stats.itemNumber,
    tier,
    daysOfCover: cover,
    coefficientOfVariation: cv,
    variabilityEscalated,
    recommendedSafetyStock: recommended,
    bufferStock: buffer,
    shortfall,
    recommendationNote: buildNote(tier, cover, cv, variabilityEscalated, stats.currentStockMissing, shortfall),
  };
}

export function classifyAll(statistics: readonly PartStatistics[], config: ClassifierConfig): CriticalityResult[] {
  return statistics.map((stats) => classifyPart(stats, config));
}
