/**
 * Application wiring shared by route handlers and scripts.
 * Services are built lazily on first use and provider defaults are seeded once.
 */

import { DEFAULT_PROVIDER_SETTINGS } from '../config/defaults';
import { loadEnvironmentConfig, type EnvironmentConfig } from '../config/environment';
import { ModelGateway } from '../gateway/modelGateway';
import { FeedIngestor } from '../ingestion/feedIngestor';
import { ArticleProcessor } from '../pipeline/articleProcessor';
import { ProcessingRunner } from '../pipeline/processingRunner';
import { StatusService } from '../status/statusService';
import { createContentStore, type ContentStore } from '../store';
import { Logger } from '../utils/logger';

export interface AppServices {
  config: EnvironmentConfig;
  logger: Logger;
  store: ContentStore;
  gateway: ModelGateway;
  ingestor: FeedIngestor;
  processor: ArticleProcessor;
  runner: ProcessingRunner;
  status: StatusService;
}

export interface ServiceOverrides {
  store?: ContentStore;
  gateway?: ModelGateway;
  fetch?: typeof fetch;
}

export function createServices(config: EnvironmentConfig, overrides: ServiceOverrides = {}): AppServices {
  const logger = new Logger(config.logging.level);
  const store = overrides.store ?? createContentStore(config.store);
  const gateway = overrides.gateway ?? new ModelGateway(store, {
    timeoutMs: config.llm.timeoutMs,
    fetch: overrides.fetch,
    logger
  });
  const ingestor = new FeedIngestor(store, {
    timeoutMs: config.feeds.timeoutMs,
    retries: config.feeds.retries,
    fetch: overrides.fetch,
    logger
  });
  const processor = new ArticleProcessor(store, gateway, {
    concurrency: config.processor.concurrency,
    progressInterval: config.processor.progressInterval,
    logger
  });
  const runner = new ProcessingRunner(processor, logger);
  const status = new StatusService(store, { runner, cron: config.cron });

  return { config, logger, store, gateway, ingestor, processor, runner, status };
}

let servicesPromise: Promise<AppServices> | null = null;

async function initialize(services: AppServices): Promise<AppServices> {
  await services.store.ensureConfigDefaults(DEFAULT_PROVIDER_SETTINGS);
  return services;
}

export function getServices(): Promise<AppServices> {
  if (!servicesPromise) {
    servicesPromise = initialize(createServices(loadEnvironmentConfig())).catch((error: unknown) => {
      // Let the next request retry initialization
      servicesPromise = null;
      throw error;
    });
  }
  return servicesPromise;
}

/**
 * Replace the shared services (tests, scripts with custom wiring). Pass null to reset.
 */
export function setServices(services: AppServices | null): void {
  servicesPromise = services ? initialize(services) : null;
}
