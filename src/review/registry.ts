// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * Review Registry
 *
 * Owns every ReviewRun. Readers get deep-frozen snapshots; writers go
 * through update(), which applies a mutator to a copy and enforces
 * forward-only stage transitions before swapping the copy in.
 */

import { logger } from '../logger.js';
import { toReviewResult } from './report.js';
import { canTransition, isTerminalStage, type ReviewRun, type ReviewStage, type ReviewStatus } from './types.js';

/** Poll interval floor for stream() */
export const MIN_STREAM_INTERVAL_MS = 1000;

/** Default retention of finished runs (1 hour) */
export const DEFAULT_RETENTION_MS = 60 * 60 * 1000;

const STAGE_PROGRESS: Record<ReviewStage, number> = {
  pending: 0,
  preprocessing: 10,
  enriching: 25,
  producing: 40,
  consolidating: 95,
  complete: 100,
  failed: 0,
};

/** Share of the bar covered by the produce stage (40 -> 90) */
const PRODUCING_SPAN = 50;

export interface RegistryOptions {
  /** How long finished runs are kept (default: 1 hour) */
  retentionMs?: number;
  /** Clock, for tests */
  now?: () => number;
}

export interface StreamOptions {
  /** Poll interval, raised to at least one second */
  intervalMs?: number;
  /** Stops the stream early */
  signal?: AbortSignal;
}

interface Entry {
  run: ReviewRun;
  controller: AbortController;
  finishedAt?: number;
}

function deepFreeze<T>(value: T): T {
  if (typeof value === 'object' && value !== null && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
  }
  return value;
}

function sleep(ms: number, signal?: AbortSignal): Promise<boolean> {
  return new Promise((resolve) => {
    if (signal?.aborted) {
      resolve(false);
      return;
    }
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve(true);
    }, ms);
    const onAbort = (): void => {
      clearTimeout(timer);
      resolve(false);
    };
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

/**
 * Progress percentage for a run.
 */
export function progressOf(run: ReviewRun): number {
  if (run.stage === 'producing' && run.plannedPairs > 0) {
    const share = (run.pairOutcomes.length / run.plannedPairs) * PRODUCING_SPAN;
    return Math.min(STAGE_PROGRESS.producing + PRODUCING_SPAN, STAGE_PROGRESS.producing + Math.round(share));
  }
  return STAGE_PROGRESS[run.stage];
}

export class ReviewRegistry {
  private entries = new Map<string, Entry>();
  private sweeper: NodeJS.Timeout | null = null;
  private readonly retentionMs: number;
  private readonly now: () => number;

  constructor(options: RegistryOptions = {}) {
    this.retentionMs = options.retentionMs ?? DEFAULT_RETENTION_MS;
    this.now = options.now ?? Date.now;
  }

  /**
   * Register a new run. Ids are unique for the life of the registry entry.
   */
  create(run: ReviewRun): void {
    if (this.entries.has(run.reviewId)) {
      throw new Error(`Review ${run.reviewId} already exists`);
    }
    this.entries.set(run.reviewId, {
      run: deepFreeze(structuredClone(run)),
      controller: new AbortController(),
    });
    logger.stage(run.reviewId, run.stage);
  }

  /**
   * Apply mutator to a copy of the run and commit it. Returns false for
   * unknown ids and rejected updates; the stored run is left untouched.
   */
  update(reviewId: string, mutator: (draft: ReviewRun) => void): boolean {
    const entry = this.entries.get(reviewId);
    if (!entry) return false;

    const current = entry.run;
    if (isTerminalStage(current.stage)) {
      logger.warn(`Ignoring update to ${current.stage} review ${reviewId}`);
      return false;
    }

    // Units are frozen at creation; snapshots share them
    const { units, ...rest } = current;
    const draft: ReviewRun = { ...structuredClone(rest), units };
    mutator(draft);

    if (draft.reviewId !== reviewId) {
      logger.warn(`Ignoring update that renames review ${reviewId}`);
      return false;
    }
    if (draft.stage !== current.stage && !canTransition(current.stage, draft.stage)) {
      logger.warn(`Ignoring transition ${current.stage} -> ${draft.stage} for review ${reviewId}`);
      return false;
    }

    entry.run = deepFreeze(draft);
    if (draft.stage !== current.stage) {
      logger.stage(reviewId, draft.stage);
      if (isTerminalStage(draft.stage)) {
        entry.finishedAt = this.now();
      }
    }
    return true;
  }

  /**
   * Frozen snapshot of the run, or undefined.
   */
  get(reviewId: string): ReviewRun | undefined {
    return this.entries.get(reviewId)?.run;
  }

  has(reviewId: string): boolean {
    return this.entries.has(reviewId);
  }

  /**
   * Signal that aborts when the run is deleted or the registry closes.
   */
  signalFor(reviewId: string): AbortSignal | undefined {
    return this.entries.get(reviewId)?.controller.signal;
  }

  /**
   * Cancel a live run and forget it.
   */
  delete(reviewId: string): boolean {
    const entry = this.entries.get(reviewId);
    if (!entry) return false;

    entry.controller.abort(new Error('Review cancelled'));
    this.entries.delete(reviewId);
    logger.verbose(`Deleted review ${reviewId}`);
    return true;
  }

  status(reviewId: string): ReviewStatus | undefined {
    const run = this.get(reviewId);
    if (!run) return undefined;

    const status: ReviewStatus = {
      reviewId,
      stage: run.stage,
      progress: progressOf(run),
    };
    const result = toReviewResult(run);
    if (result) status.result = result;
    if (run.error) status.error = run.error;
    return status;
  }

  /**
   * Yield the status now and then once per interval until the run is
   * terminal or no longer registered.
   */
  async *stream(reviewId: string, options: StreamOptions = {}): AsyncGenerator<ReviewStatus> {
    const interval = Math.max(MIN_STREAM_INTERVAL_MS, options.intervalMs ?? MIN_STREAM_INTERVAL_MS);

    while (true) {
      const status = this.status(reviewId);
      if (!status) return;

      yield status;
      if (isTerminalStage(status.stage)) return;

      if (!(await sleep(interval, options.signal))) return;
    }
  }

  /**
   * Drop finished runs older than maxAgeMs. Returns the number removed.
   */
  sweep(maxAgeMs: number = this.retentionMs): number {
    const cutoff = this.now() - maxAgeMs;
    let removed = 0;
    for (const [reviewId, entry] of this.entries) {
      if (entry.finishedAt !== undefined && entry.finishedAt <= cutoff) {
        this.entries.delete(reviewId);
        removed++;
      }
    }
    if (removed > 0) {
      logger.debug(`Swept ${removed} finished reviews`);
    }
    return removed;
  }

  /**
   * Sweep periodically without keeping the process alive.
   */
  startSweeper(intervalMs: number = Math.min(this.retentionMs, 60_000)): void {
    if (this.sweeper) return;
    this.sweeper = setInterval(() => this.sweep(), intervalMs);
    this.sweeper.unref();
  }

  get size(): number {
    return this.entries.size;
  }

  /**
   * Stop the sweeper and cancel every live run.
   */
  close(): void {
    if (this.sweeper) {
      clearInterval(this.sweeper);
      this.sweeper = null;
    }
    for (const entry of this.entries.values()) {
      if (!isTerminalStage(entry.run.stage)) {
        entry.controller.abort(new Error('Review cancelled'));
      }
    }
  }
}
