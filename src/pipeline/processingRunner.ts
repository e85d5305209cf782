/**
 * Supervised single-slot runner for background drains.
 * HTTP triggers and the scheduler start drains here instead of detaching them,
 * so the current drain can be inspected, cancelled and awaited.
 */

import { Logger, errorMessage, logger as rootLogger } from '../utils/logger';
import { DrainCancelledError, type ArticleProcessor } from './articleProcessor';
import type { DrainStats } from './drainProgress';

export type RunnerState = 'idle' | 'running' | 'completed' | 'cancelled' | 'failed';

export interface RunnerSnapshot {
  state: RunnerState;
  batchSize: number | null;
  startedAt: string | null;
  finishedAt: string | null;
  progress: DrainStats | null;
  error: string | null;
}

export interface StartResult {
  // False when a drain was already running; the snapshot then describes that drain
  started: boolean;
  snapshot: RunnerSnapshot;
}

const IDLE: RunnerSnapshot = {
  state: 'idle',
  batchSize: null,
  startedAt: null,
  finishedAt: null,
  progress: null,
  error: null
};

export class ProcessingRunner {
  private current: RunnerSnapshot = { ...IDLE };
  private controller: AbortController | null = null;
  private task: Promise<void> | null = null;
  private readonly log: Logger;

  constructor(
    private readonly processor: Pick<ArticleProcessor, 'processPending'>,
    logger: Logger = rootLogger
  ) {
    this.log = logger.child('runner');
  }

  start(batchSize: number): StartResult {
    if (this.current.state === 'running') {
      return { started: false, snapshot: this.snapshot() };
    }

    const controller = new AbortController();
    this.controller = controller;
    this.current = {
      ...IDLE,
      state: 'running',
      batchSize,
      startedAt: new Date().toISOString()
    };

    this.task = this.processor
      .processPending(batchSize, {
        signal: controller.signal,
        onProgress: stats => {
          this.current = { ...this.current, progress: stats };
        }
      })
      .then(
        stats => this.settle('completed', stats, null),
        (error: unknown) => {
          if (error instanceof DrainCancelledError) {
            this.settle('cancelled', error.stats, null);
            return;
          }
          this.log.error('Processing run failed:', error);
          this.settle('failed', this.current.progress, errorMessage(error));
        }
      );

    return { started: true, snapshot: this.snapshot() };
  }

  /**
   * Request cancellation of the running drain. In-flight items still finish.
   * @returns false when nothing is running
   */
  cancel(): boolean {
    if (this.current.state !== 'running' || !this.controller) {
      return false;
    }
    this.controller.abort();
    return true;
  }

  /**
   * Resolves when the current drain (if any) has settled. Never rejects.
   */
  async wait(): Promise<RunnerSnapshot> {
    if (this.task) {
      await this.task;
    }
    return this.snapshot();
  }

  snapshot(): RunnerSnapshot {
    return { ...this.current };
  }

  private settle(state: RunnerState, progress: DrainStats | null, error: string | null): void {
    this.current = {
      ...this.current,
      state,
      progress,
      error,
      finishedAt: new Date().toISOString()
    };
    this.controller = null;
  }
}
