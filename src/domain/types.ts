export type ItemNumber = string;

export type CriticalityTier = 'LOW' | 'MEDIUM' | 'HIGH' | 'CRITICAL';

// most severe first
export const TIER_SEVERITY: Record<CriticalityTier, number> = {
  CRITICAL: 3,
  HIGH: 2,
  MEDIUM: 1,
  LOW: 0,
};

export type CurrentStockTieBreak = 'latest-date' | 'last-seen' | 'first-seen';

export interface CriticalityThresholds {
  critical: number; // days of cover below this are CRITICAL
  high: number;
  medium: number;
}

export interface AnalysisConfig {
  keepRemarkCode: string;
  leadTimeDays: number;
  serviceLevelZ: number;
  criticalityThresholds: CriticalityThresholds;
  highVariabilityCv: number;
  currentStockTieBreak: CurrentStockTieBreak;
}

export type TabularSource =
  | { kind: 'file'; path: string; sheetName?: string }
  | { kind: 'delimited'; name: string; text: string; delimiter?: string }
  | { kind: 'workbook'; name: string; data: Uint8Array; sheetName?: string }
  | { kind: 'records'; name: string; records: ReadonlyArray<Record<string, unknown>> };

export interface AnalysisSources {
  usage: TabularSource | TabularSource[];
  processMapping?: TabularSource;
}

export interface AnalysisOptions {
  processFilter?: string | null;
}

export type CellValue = string | number | boolean | Date | null;

export interface RawTable {
  name: string;
  headers: string[];
  rows: CellValue[][];
  rowNumbers: number[]; // source row of each entry in rows, header is row 1
}

export interface RawUsageRow {
  source: string;
  rowNumber: number; // spreadsheet row, header is row 1
  itemNumber: string;
  date: Date | null;
  dateText: string;
  dateUnparseable: boolean;
  quantity: string | number | null;
  partName: string;
  description2: string;
  currentStock: number | null;
  remarks: string;
  hasRemarksColumn: boolean;
  blank: boolean;
}

export interface RawProcessRow {
  source: string;
  rowNumber: number;
  process: string;
  itemNumber: string;
  partName: string;
}

export interface UsageEvent {
  readonly itemNumber: ItemNumber;
  readonly date: Date; // UTC midnight of the calendar day
  readonly quantity: number;
  readonly partName: string;
  readonly description2: string;
  readonly remark: string;
  readonly source: string;
  readonly rowNumber: number;
}

export type PartUsageSeries = ReadonlyMap<ItemNumber, readonly UsageEvent[]>;

export interface CurrentStockEntry {
  value: number;
  date: Date | null;
  source: string;
  rowNumber: number;
}

export type CurrentStockLookup = ReadonlyMap<ItemNumber, CurrentStockEntry>;

export interface PartStatistics {
  readonly itemNumber: ItemNumber;
  readonly partName: string;
  readonly description2: string;
  readonly currentStock: number;
  readonly currentStockMissing: boolean;
  readonly dMeanPerDay: number;
  readonly dStdPerDay: number;
  readonly observationSpanDays: number;
  readonly observationDays: number;
  readonly totalQuantity: number;
  readonly usageCount: number;
  readonly averageQuantityPerRequest: number;
  readonly firstDate: string; // YYYY-MM-DD
  readonly lastDate: string;
}

export interface CriticalityResult {
  readonly itemNumber: ItemNumber;
  readonly tier: CriticalityTier;
  readonly daysOfCover: number; // Infinity when there is no consumption
  readonly coefficientOfVariation: number | null;
  readonly variabilityEscalated: boolean;
  readonly recommendedSafetyStock: number;
  readonly bufferStock: number;
  readonly shortfall: number;
  readonly recommendationNote: string;
}

export interface ProcessMappingEntry {
  readonly process: string;
  readonly itemNumber: ItemNumber;
  readonly partName: string;
}

export interface ProcessMapping {
  readonly processesByItem: ReadonlyMap<ItemNumber, readonly string[]>;
  readonly entries: readonly ProcessMappingEntry[];
  readonly processes: readonly string[];
}

export interface AnalysisRow extends PartStatistics, Omit<CriticalityResult, 'itemNumber'> {
  readonly processes: readonly string[];
}

export interface ProcessBreakdownRow {
  readonly process: string;
  readonly itemNumber: ItemNumber;
  readonly partName: string;
  readonly tier: CriticalityTier | 'NO_DATA';
  readonly totalQuantity: number;
  readonly usageCount: number;
  readonly averageQuantityPerRequest: number;
  readonly currentStock: number;
  readonly dMeanPerDay: number;
  readonly dStdPerDay: number;
  readonly recommendedSafetyStock: number;
}

export type DiscardReason =
  | 'BLANK_ROW'
  | 'MISSING_ITEM_NUMBER'
  | 'MISSING_DATE'
  | 'UNPARSEABLE_DATE'
  | 'INVALID_QUANTITY'
  | 'NEGATIVE_QUANTITY'
  | 'EXCLUDED_REMARK'
  | 'DUPLICATE'
  | 'MISSING_PROCESS';

export interface RowValidationIssue {
  readonly source: string;
  readonly rowNumber: number;
  readonly reason: DiscardReason;
  readonly message: string;
  readonly itemNumber?: ItemNumber;
}

export interface DiagnosticsSummary {
  readonly rowsRead: number;
  readonly rowsRetained: number;
  readonly rowsDiscarded: number;
  readonly discardCounts: Readonly<Partial<Record<DiscardReason, number>>>;
  readonly mappingRowsRead: number;
  readonly mappingRowsDiscarded: number;
  readonly partsWithoutStock: readonly ItemNumber[];
  readonly issues: readonly RowValidationIssue[];
}

export interface AnalysisSummary {
  readonly partsAnalyzed: number;
  readonly eventsRetained: number;
  readonly totalQuantity: number;
  readonly tierCounts: Readonly<Record<CriticalityTier, number>>;
  readonly dateRange: { readonly from: string; readonly to: string } | null;
}

export interface AnalysisResult {
  readonly rows: readonly AnalysisRow[];
  readonly processFilter: string | null;
  readonly processes: readonly string[];
  readonly processBreakdown: readonly ProcessBreakdownRow[] | null;
  readonly summary: AnalysisSummary;
  readonly diagnostics: DiagnosticsSummary;
}
