/**
 * DATASET — Types
 * ================
 *
 * Raw CSV rows in, one cleaned numeric (x, y) pair of columns out.
 */

// ═══════════════════════════════════════════════════════════════
// RAW INPUT
// ═══════════════════════════════════════════════════════════════

export type CsvRow = Record<string, string>;

export interface ParsedCsv {
  columns: string[];
  rows: CsvRow[];
}

// ═══════════════════════════════════════════════════════════════
// QUALITY REPORT (read-only analysis, nothing dropped)
// ═══════════════════════════════════════════════════════════════

export interface DataQualityReport {
  totalRows: number;
  xColumn: string;
  yColumn: string;
  duplicateRows: number;
  xMissing: number;
  yMissing: number;
  xNonNumeric: number;
  yNonNumeric: number;
  summary: string[];
}

// ═══════════════════════════════════════════════════════════════
// CLEANING
// ═══════════════════════════════════════════════════════════════

export type MissingValueStrategy = 'remove' | 'mean';

export interface CleaningOptions {
  removeDuplicates: boolean;
  removeOutliers: boolean;     // 1.5×IQR fences on x and y
  handleMissing: MissingValueStrategy;
  removeStrings: boolean;      // drop rows whose x or y is not numeric
}

export interface CleaningSummary {
  originalRows: number;
  cleanedRows: number;
  samplesRemoved: number;
  duplicatesRemoved: number;
  missingValuesRemoved: number;
  missingValuesFilled: number;
  nonNumericRemoved: number;
  outliersRemoved: number;
  optionsApplied: CleaningOptions;
}

export interface ColumnStatistics {
  xMean: number;
  yMean: number;
  xStd: number;   // sample std (n - 1)
  yStd: number;
}

export interface CleanedDataset {
  filename: string;
  xColumn: string;
  yColumn: string;
  columns: string[];
  x: number[];
  y: number[];
  summary: CleaningSummary;
  statistics: ColumnStatistics;
  createdAt: string;
}
