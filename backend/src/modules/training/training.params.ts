/**
 * TRAINING — Hyperparameter schema
 */

import { z } from 'zod';
import { parseInput } from '../../common/validation.js';
import { NAMED_SPEEDS, SPEED_NAMES } from './training.pacing.js';
import type { TrainingParams } from './training.types.js';

const TrainingSpeedSchema = z
  .union([
    z.number().gt(0).lte(1),
    z.enum(SPEED_NAMES).transform((name) => NAMED_SPEEDS[name]),
  ])
  .default(1.0);

export const TrainingParamsSchema = z.object({
  learningRate: z.number().gt(0, 'learningRate must be > 0').finite(),
  maxEpochs: z.number().int().min(1, 'maxEpochs must be >= 1'),
  tolerance: z.number().min(0, 'tolerance must be >= 0'),
  earlyStopping: z.boolean().default(true),
  trainSplit: z
    .number()
    .gt(0, 'trainSplit must be between 0 and 1 (exclusive)')
    .lt(1, 'trainSplit must be between 0 and 1 (exclusive)')
    .default(0.8),
  trainingSpeed: TrainingSpeedSchema,
});

export function parseTrainingParams(input: unknown): TrainingParams {
  return parseInput(TrainingParamsSchema, input);
}
