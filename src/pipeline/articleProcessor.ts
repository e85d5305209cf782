/**
 * Processing Pipeline
 * Drains pending articles through the filter and summary model calls with a
 * bounded worker pool.
 *
 * processPending loop:
 * 1. Count pending articles; nothing pending is a no-op
 * 2. Fetch a batch (most recent first), re-querying each time so rows inserted
 *    mid-drain are picked up
 * 3. Dispatch each row through the concurrency limiter, join the batch, repeat
 * 4. Stop when a fetch comes back empty or the signal is cancelled
 *
 * Cancellation is checked before each dispatch and when a queued row gets its
 * slot. A model call already in flight is not aborted; it runs until it settles
 * or the gateway deadline expires.
 */

import pLimit from 'p-limit';
import { DEFAULT_REJECT_MARKER } from '../config/defaults';
import type { ModelClient } from '../gateway/modelGateway';
import type { ContentStore } from '../store/types';
import { CONFIG_KEYS, type Article } from '../types/models';
import { Logger, logger as rootLogger } from '../utils/logger';
import { DrainProgress, type DrainStats, type ProgressListener } from './drainProgress';
import { decideFromReply } from './filterDecision';
import { completeArticle, type TerminalArticle, type TerminalOutcome } from './lifecycle';

export type ArticleOutcome = TerminalOutcome | 'superseded';

export interface ProcessorOptions {
  concurrency?: number;
  progressInterval?: number;
  now?: () => Date;
  logger?: Logger;
}

export interface DrainOptions {
  signal?: AbortSignal;
  onProgress?: ProgressListener;
}

export class DrainCancelledError extends Error {
  constructor(readonly stats: DrainStats) {
    super(`Processing cancelled after ${stats.processed} of ${stats.total} articles`);
    this.name = 'DrainCancelledError';
  }
}

export function modelInput(article: Pick<Article, 'title' | 'content'>): string {
  return `${article.title}\n\n${article.content}`;
}

export class ArticleProcessor {
  readonly concurrency: number;
  private readonly progressInterval: number;
  private readonly now: () => Date;
  private readonly log: Logger;

  constructor(
    private readonly store: ContentStore,
    private readonly model: ModelClient,
    options: ProcessorOptions = {}
  ) {
    this.concurrency = options.concurrency ?? 3;
    this.progressInterval = options.progressInterval ?? 10;
    this.now = options.now ?? (() => new Date());
    this.log = (options.logger ?? rootLogger).child('processor');
  }

  /**
   * Filter, then summarize when worth reading. The row is persisted once with its
   * terminal status; any error leaves it pending. 'superseded' means another drain
   * finished the row first and its result was kept.
   */
  async processArticle(article: Article): Promise<ArticleOutcome> {
    const input = modelInput(article);

    const reply = await this.model.classify(input);
    const marker = (await this.model.getSetting(CONFIG_KEYS.filterRejectMarker)) || DEFAULT_REJECT_MARKER;
    const decision = decideFromReply(reply, marker);

    if (!decision.structured) {
      this.log.debug(`Filter reply for "${article.title}" was not structured, used keyword fallback`, {
        worth: decision.worth
      });
    }

    if (!decision.worth) {
      return this.finalize(completeArticle(article, 'filtered', decision.reason, this.now()));
    }

    const summary = await this.model.summarize(input);
    return this.finalize(completeArticle(article, 'processed', summary, this.now()));
  }

  private async finalize(article: TerminalArticle): Promise<ArticleOutcome> {
    if (await this.store.finalizeArticle(article)) {
      return article.status;
    }
    this.log.warn(`Article ${article.id} [${article.title}] was no longer pending, result discarded`, {
      outcome: article.status
    });
    return 'superseded';
  }

  /**
   * Run until no pending rows remain or the signal is cancelled
   * @throws DrainCancelledError carrying the counts reached before cancellation
   */
  async processPending(batchSize: number, options: DrainOptions = {}): Promise<DrainStats> {
    const { signal, onProgress } = options;

    const total = await this.store.countArticles('pending');
    if (total === 0) {
      this.log.info('No pending articles');
      return { total: 0, processed: 0, succeeded: 0, failed: 0 };
    }

    this.log.info(`Processing ${total} pending articles`, { batchSize, concurrency: this.concurrency });

    const progress = new DrainProgress(
      total,
      this.progressInterval,
      stats => {
        this.log.info(`Progress: ${stats.processed}/${stats.total} (succeeded: ${stats.succeeded}, failed: ${stats.failed})`);
      },
      onProgress
    );
    const limit = pLimit(this.concurrency);
    // Rows that failed in this drain stay pending; skip them so they are not retried in a loop
    const failedIds = new Set<number>();

    while (!signal?.aborted) {
      const batch = await this.nextBatch(batchSize, failedIds);
      if (batch.length === 0) break;

      const inFlight: Promise<void>[] = [];
      for (const article of batch) {
        if (signal?.aborted) break;
        inFlight.push(limit(() => this.runWorker(article, progress, failedIds, signal)));
      }

      // Join the whole batch before fetching the next one
      await Promise.all(inFlight);
    }

    if (signal?.aborted) {
      const stats = progress.snapshot();
      this.log.warn(`Processing interrupted: succeeded ${stats.succeeded}, failed ${stats.failed}`);
      throw new DrainCancelledError(stats);
    }

    const stats = progress.finish();
    this.log.info(`Processing complete: ${stats.total} pending at start, ${stats.succeeded} succeeded, ${stats.failed} failed`);
    return stats;
  }

  private async nextBatch(batchSize: number, failedIds: ReadonlySet<number>): Promise<Article[]> {
    const rows = await this.store.listArticles({
      status: 'pending',
      offset: 0,
      limit: batchSize + failedIds.size
    });
    return rows.filter(row => !failedIds.has(row.id)).slice(0, batchSize);
  }

  private async runWorker(
    article: Article,
    progress: DrainProgress,
    failedIds: Set<number>,
    signal: AbortSignal | undefined
  ): Promise<void> {
    // Queued behind the limiter when cancellation arrived: never started
    if (signal?.aborted) return;

    try {
      await this.processArticle(article);
      progress.record(true);
    } catch (error) {
      this.log.error(`Failed to process article [${article.title}]:`, error);
      failedIds.add(article.id);
      progress.record(false);
    }
  }
}
