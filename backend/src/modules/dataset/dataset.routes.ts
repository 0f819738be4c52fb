/**
 * DATASET — Routes
 * =================
 *
 * ENDPOINTS:
 *   POST /api/dataset/analyze   - Quality report, nothing stored
 *   POST /api/dataset/process   - Clean and store as the training dataset
 *   GET  /api/dataset           - Current dataset summary
 */

import type { FastifyInstance } from 'fastify';
import { z } from 'zod';
import { NotFoundError } from '../../common/errors.js';
import { parseInput } from '../../common/validation.js';
import { CsvDatasetLoader, DEFAULT_CLEANING_OPTIONS, parseCsv } from './dataset.loader.js';
import type { DatasetStore } from './dataset.store.js';

const ColumnsSchema = z.object({
  csv: z.string().min(1, 'csv content is required'),
  xColumn: z.string().min(1),
  yColumn: z.string().min(1),
});

const ProcessSchema = ColumnsSchema.extend({
  filename: z.string().default('upload.csv'),
  options: z
    .object({
      removeDuplicates: z.boolean().default(DEFAULT_CLEANING_OPTIONS.removeDuplicates),
      removeOutliers: z.boolean().default(DEFAULT_CLEANING_OPTIONS.removeOutliers),
      handleMissing: z.enum(['remove', 'mean']).default(DEFAULT_CLEANING_OPTIONS.handleMissing),
      removeStrings: z.boolean().default(DEFAULT_CLEANING_OPTIONS.removeStrings),
    })
    .default({}),
});

export interface DatasetRouteDeps {
  store: DatasetStore;
  minRows: number;
}

export async function registerDatasetRoutes(app: FastifyInstance, deps: DatasetRouteDeps): Promise<void> {
  const prefix = '/api/dataset';

  // ═══════════════════════════════════════════════════════════════
  // ANALYZE
  // ═══════════════════════════════════════════════════════════════

  app.post(`${prefix}/analyze`, async (request) => {
    const body = parseInput(ColumnsSchema, request.body);
    const loader = new CsvDatasetLoader(body.xColumn, body.yColumn, deps.minRows);
    const report = loader.analyzeQuality(parseCsv(body.csv));

    request.log.info({ xColumn: body.xColumn, yColumn: body.yColumn, rows: report.totalRows }, 'Data quality analysis complete');
    return { ok: true, data: report };
  });

  // ═══════════════════════════════════════════════════════════════
  // PROCESS
  // ═══════════════════════════════════════════════════════════════

  app.post(`${prefix}/process`, async (request) => {
    const body = parseInput(ProcessSchema, request.body);
    const loader = new CsvDatasetLoader(body.xColumn, body.yColumn, deps.minRows);
    const dataset = loader.clean(parseCsv(body.csv), body.filename, body.options);

    deps.store.set(dataset);
    request.log.info({ filename: dataset.filename, rows: dataset.x.length }, 'Stored processed dataset');

    return {
      ok: true,
      message: 'Data processed successfully!',
      data: {
        filename: dataset.filename,
        columns: { xColumn: dataset.xColumn, yColumn: dataset.yColumn, all: dataset.columns },
        cleaningSummary: dataset.summary,
        statistics: { ...dataset.statistics, x: dataset.x, y: dataset.y },
        readyForTraining: true,
      },
    };
  });

  // ═══════════════════════════════════════════════════════════════
  // CURRENT
  // ═══════════════════════════════════════════════════════════════

  app.get(prefix, async () => {
    const dataset = deps.store.get();
    if (!dataset) {
      throw new NotFoundError('No dataset has been processed yet');
    }
    return {
      ok: true,
      data: {
        filename: dataset.filename,
        xColumn: dataset.xColumn,
        yColumn: dataset.yColumn,
        rows: dataset.x.length,
        cleaningSummary: dataset.summary,
        statistics: dataset.statistics,
        createdAt: dataset.createdAt,
      },
    };
  });

  console.log('[Dataset] Routes registered');
}
