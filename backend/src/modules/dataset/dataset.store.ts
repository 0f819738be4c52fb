/**
 * DATASET — Store
 * ================
 *
 * Holds the one cleaned dataset training reads from. In-memory only:
 * a restart drops it, the client uploads again. One store per app
 * instance (see buildApp).
 */

import type { CleanedDataset } from './dataset.types.js';

export class DatasetStore {
  private current: CleanedDataset | null = null;

  set(dataset: CleanedDataset): void {
    this.current = dataset;
  }

  get(): CleanedDataset | null {
    return this.current;
  }
}
