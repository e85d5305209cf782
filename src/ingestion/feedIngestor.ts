/**
 * Ingestion Engine
 * Fetches feeds, dedups items by link against the store and inserts new ones as pending.
 *
 * Workflow per source:
 * 1. Download the feed (retried, bounded by the caller's signal and a timeout)
 * 2. Parse items into FeedEntry records
 * 3. findOrCreate each entry keyed by link; only created rows are counted
 */

import type { ContentStore } from '../store/types';
import type { Source } from '../types/models';
import { downloadFeed, parseFeed } from './feedReader';
import { Logger, errorMessage, logger as rootLogger } from '../utils/logger';

export type IngestResult =
  | { success: true; newItems: number }
  | { success: false; error: string };

export interface SourceIngestReport {
  sourceId: number;
  name: string;
  result: IngestResult;
}

export interface IngestSummary {
  sourcesProcessed: number;
  newItems: number;
  failures: number;
  reports: SourceIngestReport[];
  startTime: number;
  endTime: number;
}

export interface IngestorOptions {
  timeoutMs?: number;
  retries?: number;
  fetch?: typeof fetch;
  now?: () => Date;
  logger?: Logger;
}

export interface IngestCallOptions {
  signal?: AbortSignal;
}

export class SourceNotFoundError extends Error {
  constructor(readonly sourceId: number) {
    super(`Source ${sourceId} not found`);
    this.name = 'SourceNotFoundError';
  }
}

export class IngestError extends Error {
  constructor(readonly sourceId: number, message: string) {
    super(message);
    this.name = 'IngestError';
  }
}

export class FeedIngestor {
  private readonly timeoutMs: number;
  private readonly retries: number;
  private readonly fetchImpl: typeof fetch;
  private readonly now: () => Date;
  private readonly log: Logger;

  constructor(private readonly store: ContentStore, options: IngestorOptions = {}) {
    this.timeoutMs = options.timeoutMs ?? 15000;
    this.retries = options.retries ?? 2;
    this.fetchImpl = options.fetch ?? ((input: string | URL | Request, init?: RequestInit) => fetch(input, init));
    this.now = options.now ?? (() => new Date());
    this.log = (options.logger ?? rootLogger).child('ingest');
  }

  /**
   * Fetch one source and store its new items. Never throws: failures come back as
   * { success: false } so a caller iterating sources can carry on.
   */
  async fetchSource(source: Source, options: IngestCallOptions = {}): Promise<IngestResult> {
    try {
      const xml = await downloadFeed(source.url, {
        signal: options.signal,
        timeoutMs: this.timeoutMs,
        retries: this.retries,
        fetch: this.fetchImpl
      });

      const entries = await parseFeed(xml, this.now());

      let newItems = 0;
      for (const entry of entries) {
        const { created } = await this.store.findOrCreateArticle({
          source_id: source.id,
          title: entry.title,
          link: entry.link,
          content: entry.content,
          pub_date: entry.pub_date
        });
        if (created) newItems++;
      }

      this.log.info(`Fetched ${source.name}: ${entries.length} items, ${newItems} new`);
      return { success: true, newItems };
    } catch (error) {
      this.log.error(`Error fetching source ${source.name} (${source.url}):`, error);
      return { success: false, error: errorMessage(error) };
    }
  }

  /**
   * Best-effort fan-out over enabled sources, one at a time. A failing source is
   * recorded and skipped; cancellation stops before the next source.
   */
  async fetchAllEnabled(options: IngestCallOptions = {}): Promise<IngestSummary> {
    const summary: IngestSummary = {
      sourcesProcessed: 0,
      newItems: 0,
      failures: 0,
      reports: [],
      startTime: Date.now(),
      endTime: 0
    };

    const sources = await this.store.listSources({ enabledOnly: true });
    if (sources.length === 0) {
      this.log.warn('No enabled sources found');
    }

    for (const source of sources) {
      if (options.signal?.aborted) {
        this.log.warn(`Ingestion cancelled after ${summary.sourcesProcessed} of ${sources.length} sources`);
        break;
      }

      const result = await this.fetchSource(source, options);
      summary.sourcesProcessed++;
      summary.reports.push({ sourceId: source.id, name: source.name, result });
      if (result.success) {
        summary.newItems += result.newItems;
      } else {
        summary.failures++;
      }
    }

    summary.endTime = Date.now();
    this.log.info('Ingestion run completed', {
      sourcesProcessed: summary.sourcesProcessed,
      newItems: summary.newItems,
      failures: summary.failures,
      duration: `${summary.endTime - summary.startTime}ms`
    });
    return summary;
  }

  /**
   * Upward entry point: one source by id, or every enabled source
   * @returns number of newly stored articles
   */
  async ingest(target: number | 'all', options: IngestCallOptions = {}): Promise<number> {
    if (target === 'all') {
      const summary = await this.fetchAllEnabled(options);
      return summary.newItems;
    }

    const source = await this.store.getSource(target);
    if (!source) {
      throw new SourceNotFoundError(target);
    }

    const result = await this.fetchSource(source, options);
    if (!result.success) {
      throw new IngestError(source.id, result.error);
    }
    return result.newItems;
  }
}
