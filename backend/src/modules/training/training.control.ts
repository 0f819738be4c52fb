/**
 * TRAINING — Control
 *
 * The active/paused flag pair shared between the drive loop and
 * pause/resume/stop requests. Waiting while paused is signal based:
 * every flag change wakes the waiters, nothing polls.
 */

import type {
  ControlResult,
  SessionControlFlags,
  SessionState,
} from './training.types.js';

export class TrainingControl {
  private active = false;
  private paused = false;
  private started = false;
  private waiters: Array<() => void> = [];

  get flags(): SessionControlFlags {
    return { trainingActive: this.active, trainingPaused: this.paused };
  }

  get state(): SessionState {
    if (this.active) return this.paused ? 'paused' : 'active';
    return this.started ? 'inactive' : 'idle';
  }

  get isActive(): boolean {
    return this.active;
  }

  get isPaused(): boolean {
    return this.paused;
  }

  activate(): void {
    this.started = true;
    this.active = true;
    this.paused = false;
    this.notify();
  }

  pause(): ControlResult {
    if (this.paused) {
      return { status: 'ALREADY_PAUSED', message: 'Training already paused' };
    }
    if (!this.active) {
      return { status: 'NOT_ACTIVE', message: 'No active training to pause' };
    }
    this.paused = true;
    this.notify();
    return { status: 'PAUSED', message: 'Training paused' };
  }

  resume(): ControlResult {
    if (!this.active) {
      return { status: 'NOT_ACTIVE', message: 'No active training to resume' };
    }
    if (!this.paused) {
      return { status: 'NOT_PAUSED', message: 'Training not paused' };
    }
    this.paused = false;
    this.notify();
    return { status: 'RESUMED', message: 'Training resumed' };
  }

  stop(): ControlResult {
    if (!this.active) {
      return { status: 'NOT_ACTIVE', message: 'No active training to stop' };
    }
    this.active = false;
    this.paused = false;
    this.notify();
    return { status: 'STOP_REQUESTED', message: 'Training stop requested' };
  }

  /** Clears both flags. Called by the drive loop on every exit path. */
  reset(): void {
    this.active = false;
    this.paused = false;
    this.notify();
  }

  /** Resolves once training is resumed or no longer active. */
  async waitWhilePaused(): Promise<void> {
    while (this.paused && this.active) {
      await new Promise<void>((resolve) => this.waiters.push(resolve));
    }
  }

  private notify(): void {
    const waiters = this.waiters;
    this.waiters = [];
    for (const wake of waiters) wake();
  }
}
