/**
 * Cron scheduler for ingestion and processing
 * Controlled via env vars: CRON_ENABLED (kill switch), CRON_FETCH, CRON_PROCESS.
 * Returns a handle with stop() for graceful shutdown.
 */

import cronParser from 'cron-parser';
import cron, { type ScheduledTask } from 'node-cron';
import type { EnvironmentConfig } from '../config/environment';
import type { FeedIngestor } from '../ingestion/feedIngestor';
import type { ProcessingRunner } from '../pipeline/processingRunner';
import { Logger, errorMessage, logger as rootLogger } from '../utils/logger';

export interface SchedulerHandle {
  stop(): void;
}

export interface SchedulerDependencies {
  config: EnvironmentConfig['cron'];
  ingestor: Pick<FeedIngestor, 'fetchAllEnabled'>;
  runner: Pick<ProcessingRunner, 'start'>;
  logger?: Logger;
}

/**
 * Next time an expression fires after `from`, in the process time zone (node-cron's default)
 * @returns null when the expression cannot be parsed
 */
export function nextRunTime(expression: string, from: Date = new Date()): Date | null {
  try {
    return cronParser.parseExpression(expression, { currentDate: from }).next().toDate();
  } catch (err) {
    rootLogger.warn(`Cannot compute next run for "${expression}"`, errorMessage(err));
    return null;
  }
}

export function startScheduler(deps: SchedulerDependencies): SchedulerHandle {
  const { config, ingestor, runner } = deps;
  const log = (deps.logger ?? rootLogger).child('cron');
  const tasks: ScheduledTask[] = [];

  if (!config.enabled) {
    log.info('Cron scheduler disabled (CRON_ENABLED=false)');
    return { stop() {} };
  }

  for (const [name, expression] of [
    ['fetch_feeds', config.fetchSchedule],
    ['process_articles', config.processSchedule]
  ]) {
    if (!cron.validate(expression)) {
      throw new Error(`Invalid cron expression for ${name}: "${expression}"`);
    }
  }

  // Helper to wrap each job with logging and error handling
  function scheduleJob(name: string, schedule: string, job: () => Promise<unknown>): void {
    const task = cron.schedule(schedule, async () => {
      const start = performance.now();
      log.info(`Cron job starting: ${name}`);
      try {
        const result = await job();
        const durationMs = Math.round(performance.now() - start);
        log.info(`Cron job completed: ${name}`, { durationMs, result });
      } catch (err) {
        const durationMs = Math.round(performance.now() - start);
        log.error(`Cron job failed: ${name}`, errorMessage(err), { durationMs });
      }
    });
    tasks.push(task);
  }

  scheduleJob('fetch_feeds', config.fetchSchedule, async () => {
    const summary = await ingestor.fetchAllEnabled();
    return { newItems: summary.newItems, failures: summary.failures };
  });

  // The runner owns the drain; an overlapping tick leaves the running drain alone
  scheduleJob('process_articles', config.processSchedule, async () => {
    const { started } = runner.start(config.processBatchSize);
    return { started };
  });

  log.info('Cron scheduler started', {
    fetch_feeds: config.fetchSchedule,
    process_articles: config.processSchedule
  });

  return {
    stop() {
      for (const task of tasks) {
        task.stop();
      }
      log.info('Cron scheduler stopped');
    }
  };
}
