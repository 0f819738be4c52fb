/**
 * TRAINING — Pacing
 *
 * Coarse speed setting → delay between epochs, so a human can watch
 * the line move. Unknown speeds snap to the nearest table entry.
 */

import type { SpeedName } from './training.types.js';

const SPEED_DELAYS_MS: ReadonlyArray<[speed: number, delayMs: number]> = [
  [1.0, 100],
  [0.8, 300],
  [0.6, 600],
  [0.4, 1000],
  [0.2, 1500],
];

export const SPEED_NAMES = ['fastest', 'fast', 'normal', 'slow', 'slowest'] as const satisfies readonly SpeedName[];

export const NAMED_SPEEDS: Record<SpeedName, number> = {
  fastest: 1.0,
  fast: 0.8,
  normal: 0.6,
  slow: 0.4,
  slowest: 0.2,
};

export function resolveEpochDelay(speed: number): number {
  let best = SPEED_DELAYS_MS[0];
  for (const entry of SPEED_DELAYS_MS) {
    // strict <: ties go to the faster entry listed first
    if (Math.abs(entry[0] - speed) < Math.abs(best[0] - speed)) {
      best = entry;
    }
  }
  return best[1];
}
