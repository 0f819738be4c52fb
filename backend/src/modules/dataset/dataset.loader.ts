/**
 * DATASET — CSV Loader
 * =====================
 *
 * Parses an uploaded CSV and turns two of its columns into a numeric
 * (x, y) dataset ready for training.
 *
 * Cleaning order:
 *   1. duplicate rows
 *   2. missing values (remove or fill with column mean)
 *   3. non-numeric values
 *   4. outliers (1.5×IQR)
 * The result must keep at least `minRows` rows.
 */

import { parse } from 'csv-parse/sync';
import { z } from 'zod';
import { ValidationError, errorMessage } from '../../common/errors.js';
import type {
  CleanedDataset,
  CleaningOptions,
  CleaningSummary,
  ColumnStatistics,
  CsvRow,
  DataQualityReport,
  ParsedCsv,
} from './dataset.types.js';

export const DEFAULT_CLEANING_OPTIONS: CleaningOptions = {
  removeDuplicates: true,
  removeOutliers: false,
  handleMissing: 'remove',
  removeStrings: true,
};

const MISSING_TOKENS = new Set(['', 'na', 'n/a', 'nan', 'null', 'none']);

const CsvRecordsSchema = z.array(z.record(z.string(), z.string()));

// ═══════════════════════════════════════════════════════════════
// PARSING HELPERS
// ═══════════════════════════════════════════════════════════════

export function parseCsv(content: string): ParsedCsv {
  let records: unknown;
  try {
    records = parse(content, {
      columns: true,
      skip_empty_lines: true,
      trim: true,
      bom: true,
    });
  } catch (err) {
    throw new ValidationError(`Failed to parse CSV: ${errorMessage(err)}`);
  }

  const rows = CsvRecordsSchema.parse(records);
  if (rows.length === 0) {
    throw new ValidationError('CSV contains no data rows');
  }
  return { columns: Object.keys(rows[0]), rows };
}

export function isMissing(raw: string | undefined): boolean {
  return raw === undefined || MISSING_TOKENS.has(raw.trim().toLowerCase());
}

/** Number for numeric-looking text, null otherwise (missing included). */
export function toNumber(raw: string | undefined): number | null {
  if (isMissing(raw)) return null;
  const value = Number(raw);
  return Number.isFinite(value) ? value : null;
}

/** Linear-interpolated quantile of an unsorted sample. */
export function quantile(values: number[], q: number): number {
  const sorted = [...values].sort((a, b) => a - b);
  const pos = (sorted.length - 1) * q;
  const lo = Math.floor(pos);
  const hi = Math.ceil(pos);
  return sorted[lo] + (sorted[hi] - sorted[lo]) * (pos - lo);
}

function sampleStats(values: number[]): { mean: number; std: number } {
  const n = values.length;
  const mean = values.reduce((s, v) => s + v, 0) / n;
  if (n < 2) return { mean, std: 0 };
  const variance = values.reduce((s, v) => s + (v - mean) ** 2, 0) / (n - 1);
  return { mean, std: Math.sqrt(variance) };
}

// ═══════════════════════════════════════════════════════════════
// LOADER
// ═══════════════════════════════════════════════════════════════

export class CsvDatasetLoader {
  constructor(
    private readonly xColumn: string,
    private readonly yColumn: string,
    private readonly minRows: number
  ) {}

  analyzeQuality(csv: ParsedCsv): DataQualityReport {
    this.assertColumns(csv);
    const { rows } = csv;

    const duplicateRows = rows.length - this.dedupe(rows).length;
    const xMissing = rows.filter((r) => isMissing(r[this.xColumn])).length;
    const yMissing = rows.filter((r) => isMissing(r[this.yColumn])).length;
    const xNonNumeric = rows.filter((r) => !isMissing(r[this.xColumn]) && toNumber(r[this.xColumn]) === null).length;
    const yNonNumeric = rows.filter((r) => !isMissing(r[this.yColumn]) && toNumber(r[this.yColumn]) === null).length;

    const summary: string[] = [];
    if (duplicateRows > 0) summary.push(`${duplicateRows} rows have duplicates`);
    if (xMissing > 0) summary.push(`${xMissing} rows have NaN in X column`);
    if (yMissing > 0) summary.push(`${yMissing} rows have NaN in Y column`);
    if (xNonNumeric > 0) {
      summary.push(xNonNumeric === rows.length ? 'X column is all string' : `${xNonNumeric} rows have string in X column`);
    }
    if (yNonNumeric > 0) {
      summary.push(yNonNumeric === rows.length ? 'Y column is all string' : `${yNonNumeric} rows have string in Y column`);
    }
    if (summary.length === 0) summary.push('Data looks clean!');

    return {
      totalRows: rows.length,
      xColumn: this.xColumn,
      yColumn: this.yColumn,
      duplicateRows,
      xMissing,
      yMissing,
      xNonNumeric,
      yNonNumeric,
      summary,
    };
  }

  clean(csv: ParsedCsv, filename: string, options: CleaningOptions = DEFAULT_CLEANING_OPTIONS): CleanedDataset {
    this.assertColumns(csv);
    const originalRows = csv.rows.length;

    let rows: CsvRow[] = csv.rows;
    let duplicatesRemoved = 0;
    let missingValuesRemoved = 0;
    let missingValuesFilled = 0;

    if (options.removeDuplicates) {
      const deduped = this.dedupe(rows);
      duplicatesRemoved = rows.length - deduped.length;
      rows = deduped;
    }

    if (options.handleMissing === 'remove') {
      const kept = rows.filter((r) => !isMissing(r[this.xColumn]) && !isMissing(r[this.yColumn]));
      missingValuesRemoved = rows.length - kept.length;
      rows = kept;
    } else {
      const filled = this.fillMissingWithMean(rows);
      missingValuesFilled = filled.count;
      rows = filled.rows;
    }

    // Coerce to numbers; rows left with non-numeric text either go or fail validation
    const pairs: Array<[number | null, number | null]> = rows.map((r) => [
      toNumber(r[this.xColumn]),
      toNumber(r[this.yColumn]),
    ]);
    let numeric: Array<[number, number]> = [];
    for (const [xv, yv] of pairs) {
      if (xv !== null && yv !== null) numeric.push([xv, yv]);
    }
    const nonNumericRemoved = pairs.length - numeric.length;
    if (nonNumericRemoved > 0 && !options.removeStrings) {
      throw new ValidationError(`${nonNumericRemoved} rows contain non-numeric or missing values in the selected columns`);
    }

    let outliersRemoved = 0;
    if (options.removeOutliers && numeric.length > 0) {
      const before = numeric.length;
      numeric = this.removeOutliers(numeric, 0);
      numeric = this.removeOutliers(numeric, 1);
      outliersRemoved = before - numeric.length;
    }

    if (numeric.length === 0) {
      throw new ValidationError('Cleaning resulted in empty dataset');
    }
    if (numeric.length < this.minRows) {
      throw new ValidationError(`Cleaned dataset too small (minimum ${this.minRows} samples required, got ${numeric.length})`);
    }

    const x = numeric.map(([xv]) => xv);
    const y = numeric.map(([, yv]) => yv);

    const summary: CleaningSummary = {
      originalRows,
      cleanedRows: numeric.length,
      samplesRemoved: originalRows - numeric.length,
      duplicatesRemoved,
      missingValuesRemoved,
      missingValuesFilled,
      nonNumericRemoved,
      outliersRemoved,
      optionsApplied: { ...options },
    };

    return {
      filename,
      xColumn: this.xColumn,
      yColumn: this.yColumn,
      columns: csv.columns,
      x,
      y,
      summary,
      statistics: this.statistics(x, y),
      createdAt: new Date().toISOString(),
    };
  }

  // ═══════════════════════════════════════════════════════════════
  // INTERNALS
  // ═══════════════════════════════════════════════════════════════

  private assertColumns(csv: ParsedCsv): void {
    for (const col of [this.xColumn, this.yColumn]) {
      if (!csv.columns.includes(col)) {
        throw new ValidationError(`Column "${col}" not found in CSV (available: ${csv.columns.join(', ')})`);
      }
    }
  }

  private dedupe(rows: CsvRow[]): CsvRow[] {
    const seen = new Set<string>();
    const out: CsvRow[] = [];
    for (const row of rows) {
      const key = JSON.stringify(Object.values(row));
      if (seen.has(key)) continue;
      seen.add(key);
      out.push(row);
    }
    return out;
  }

  private fillMissingWithMean(rows: CsvRow[]): { rows: CsvRow[]; count: number } {
    let count = 0;
    const means = new Map<string, string>();
    for (const col of [this.xColumn, this.yColumn]) {
      const values = rows.map((r) => toNumber(r[col])).filter((v): v is number => v !== null);
      if (values.length > 0) {
        means.set(col, String(values.reduce((s, v) => s + v, 0) / values.length));
      }
    }

    const filled = rows.map((row) => {
      const next: CsvRow = { ...row };
      for (const [col, fill] of means) {
        if (isMissing(next[col])) {
          next[col] = fill;
          count++;
        }
      }
      return next;
    });

    return { rows: filled, count };
  }

  private removeOutliers(pairs: Array<[number, number]>, axis: 0 | 1): Array<[number, number]> {
    const values = pairs.map((p) => p[axis]);
    const q1 = quantile(values, 0.25);
    const q3 = quantile(values, 0.75);
    const iqr = q3 - q1;
    const lower = q1 - 1.5 * iqr;
    const upper = q3 + 1.5 * iqr;
    return pairs.filter((p) => p[axis] >= lower && p[axis] <= upper);
  }

  private statistics(x: number[], y: number[]): ColumnStatistics {
    const xs = sampleStats(x);
    const ys = sampleStats(y);
    return { xMean: xs.mean, yMean: ys.mean, xStd: xs.std, yStd: ys.std };
  }
}
