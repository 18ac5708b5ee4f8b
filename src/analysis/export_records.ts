import { AnalysisResult, CriticalityTier } from '../domain/types';

export interface ExportRecord {
  'Item Number': string;
  'Part Name': string;
  'Description 2': string;
  Processes: string;
  'Total Usage': number;
  'Usage Count': number;
  'Avg Usage per Request': number;
  'First Date': string;
  'Last Date': string;
  'Span Days': number;
  D_Mean_per_Day: number;
  D_Std_per_Day: number;
  'Current Stock': number;
  'Stock Reported': boolean;
  'Days of Cover': number | null;
  'Coefficient of Variation': number | null;
  'Variability Buffer': number;
  'Safety Stock': number;
  Shortfall: number;
  Criticality: CriticalityTier;
  Recommendation: string;
}

export interface ProcessBreakdownRecord {
  Process: string;
  'Item Number': string;
  'Part Name': string;
  'Total Usage': number;
  'Usage Count': number;
  'Avg Usage per Request': number;
  'Current Stock': number;
  D_Mean_per_Day: number;
  D_Std_per_Day: number;
  'Safety Stock': number;
  Criticality: CriticalityTier | 'NO DATA';
}

export const EXPORT_COLUMNS: readonly (keyof ExportRecord)[] = [
  'Item Number',
  'Part Name',
  'Description 2',
  'Processes',
  'Total Usage',
  'Usage Count',
  'Avg Usage per Request',
  'First Date',
  'Last Date',
  'Span Days',
  'D_Mean_per_Day',
  'D_Std_per_Day',
  'Current Stock',
  'Stock Reported',
  'Days of Cover',
  'Coefficient of Variation',
  'Variability Buffer',
  'Safety Stock',
  'Shortfall',
  'Criticality',
  'Recommendation',
];

/**
 * Flat rows for tabular display and spreadsheet export, in result order.
 * Numbers are not rounded; infinite cover is exported as null.
 */
export function toExportRecords(result: AnalysisResult): ExportRecord[] {
  return result.rows.map((row) => ({
    'Item Number': row.itemNumber,
    'Part Name': row.partName,
    'Description 2': row.description2,
    Processes: row.processes.join('; '),
    'Total Usage': row.totalQuantity,
    'Usage Count': row.usageCount,
    'Avg Usage per Request': row.averageQuantityPerRequest,
    'First Date': row.firstDate,
    'Last Date': row.lastDate,
    'Span Days': row.observationSpanDays,
    D_Mean_per_Day: row.dMeanPerDay,
    D_Std_per_Day: row.dStdPerDay,
    'Current Stock': row.currentStock,
    'Stock Reported': !row.currentStockMissing,
    'Days of Cover': Number.isFinite(row.daysOfCover) ? row.daysOfCover : null,
    'Coefficient of Variation': row.coefficientOfVariation,
    'Variability Buffer': row.bufferStock,
    'Safety Stock': row.recommendedSafetyStock,
    Shortfall: row.shortfall,
    Criticality: row.tier,
    Recommendation: row.recommendationNote,
  }));
}

export function toProcessBreakdownRecords(result: AnalysisResult): ProcessBreakdownRecord[] {
  return (result.processBreakdown ?? []).map((row) => ({
    Process: row.process,
    'Item Number': row.itemNumber,
    'Part Name': row.partName,
    'Total Usage': row.totalQuantity,
    'Usage Count': row.usageCount,
    'Avg Usage per Request': row.averageQuantityPerRequest,
    'Current Stock': row.currentStock,
    D_Mean_per_Day: row.dMeanPerDay,
    D_Std_per_Day: row.dStdPerDay,
    'Safety Stock': row.recommendedSafetyStock,
    Criticality: row.tier === 'NO_DATA' ? 'NO DATA' : row.tier,
  }));
}
