import type { EnvironmentConfig } from '../config/environment';
import type { RunnerSnapshot } from '../pipeline/processingRunner';
import { nextRunTime } from '../scheduler/cron';
import type { ContentStore } from '../store/types';

export interface SystemStatus {
  total_articles: number;
  pending_articles: number;
  processed_articles: number;
  filtered_articles: number;
  total_feeds: number;
  enabled_feeds: number;
  processing: RunnerSnapshot | null;
  // null while the scheduler is disabled
  next_fetch_time: string | null;
  next_process_time: string | null;
}

export interface StatusOptions {
  runner?: { snapshot(): RunnerSnapshot };
  cron?: Pick<EnvironmentConfig['cron'], 'enabled' | 'fetchSchedule' | 'processSchedule'>;
  now?: () => Date;
}

/**
 * Read-only counts for the dashboard, plus the scheduler's upcoming runs
 */
export class StatusService {
  private readonly now: () => Date;

  constructor(
    private readonly store: ContentStore,
    private readonly options: StatusOptions = {}
  ) {
    this.now = options.now ?? (() => new Date());
  }

  async getSystemStatus(): Promise<SystemStatus> {
    const [total, pending, processed, filtered, totalFeeds, enabledFeeds] = await Promise.all([
      this.store.countArticles(),
      this.store.countArticles('pending'),
      this.store.countArticles('processed'),
      this.store.countArticles('filtered'),
      this.store.countSources(),
      this.store.countSources({ enabledOnly: true })
    ]);

    return {
      total_articles: total,
      pending_articles: pending,
      processed_articles: processed,
      filtered_articles: filtered,
      total_feeds: totalFeeds,
      enabled_feeds: enabledFeeds,
      processing: this.options.runner?.snapshot() ?? null,
      next_fetch_time: this.nextRun(this.options.cron?.fetchSchedule),
      next_process_time: this.nextRun(this.options.cron?.processSchedule)
    };
  }

  private nextRun(expression: string | undefined): string | null {
    if (!this.options.cron?.enabled || expression === undefined) return null;
    return nextRunTime(expression, this.now())?.toISOString() ?? null;
  }
}
