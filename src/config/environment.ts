/**
 * Environment configuration for the feed pipeline
 * Loads and validates required environment variables
 */

export type StoreDriver = 'supabase' | 'memory';

export interface EnvironmentConfig {
  store: {
    driver: StoreDriver;
    supabaseUrl: string;
    supabaseKey: string;
    sourcesTable: string;
    articlesTable: string;
    settingsTable: string;
  };
  processor: {
    concurrency: number;
    batchSize: number;
    progressInterval: number;
  };
  feeds: {
    timeoutMs: number;
    retries: number;
  };
  llm: {
    timeoutMs: number;
  };
  cron: {
    enabled: boolean;
    fetchSchedule: string;
    processSchedule: string;
    processBatchSize: number;
  };
  api: {
    cronSecret: string | null;
  };
  logging: {
    level: string;
  };
}

type Env = Record<string, string | undefined>;

function readInt(env: Env, name: string, fallback: number, min = 0): number {
  const raw = env[name];
  if (raw === undefined || raw.trim() === '') {
    return fallback;
  }
  const value = Number(raw);
  if (!Number.isInteger(value) || value < min) {
    throw new Error(`Invalid value for ${name}: expected an integer >= ${min}, got "${raw}"`);
  }
  return value;
}

function readDriver(env: Env): StoreDriver {
  const raw = env.STORE_DRIVER || 'supabase';
  if (raw !== 'supabase' && raw !== 'memory') {
    throw new Error(`Invalid value for STORE_DRIVER: expected "supabase" or "memory", got "${raw}"`);
  }
  return raw;
}

/**
 * Load and validate environment configuration
 * @throws Error if required environment variables are missing or malformed
 */
export function loadEnvironmentConfig(env: Env = process.env): EnvironmentConfig {
  const driver = readDriver(env);

  // Server-side jobs write to every table, so prefer the service role key
  const supabaseUrl = env.SUPABASE_URL || env.NEXT_PUBLIC_SUPABASE_URL || '';
  const supabaseKey = env.SUPABASE_KEY || env.SUPABASE_SERVICE_ROLE_KEY || '';

  if (driver === 'supabase') {
    const requiredVars = [
      { name: 'SUPABASE_URL (or NEXT_PUBLIC_SUPABASE_URL)', value: supabaseUrl },
      { name: 'SUPABASE_KEY (or SUPABASE_SERVICE_ROLE_KEY)', value: supabaseKey }
    ];

    const missing = requiredVars.filter(varObj => !varObj.value);
    if (missing.length > 0) {
      throw new Error(`Missing required environment variables: ${missing.map(v => v.name).join(', ')}`);
    }
  }

  return {
    store: {
      driver,
      supabaseUrl,
      supabaseKey,
      sourcesTable: env.SOURCES_TABLE || 'sources',
      articlesTable: env.ARTICLES_TABLE || 'articles',
      settingsTable: env.SETTINGS_TABLE || 'settings'
    },
    processor: {
      concurrency: readInt(env, 'PROCESSOR_CONCURRENCY', 3, 1),
      batchSize: readInt(env, 'PROCESSOR_BATCH_SIZE', 10, 1),
      progressInterval: readInt(env, 'PROCESSOR_PROGRESS_INTERVAL', 10, 1)
    },
    feeds: {
      timeoutMs: readInt(env, 'FEED_TIMEOUT_MS', 15000, 1),
      retries: readInt(env, 'FEED_RETRIES', 2)
    },
    llm: {
      timeoutMs: readInt(env, 'LLM_TIMEOUT_MS', 120000, 1)
    },
    cron: {
      enabled: env.CRON_ENABLED !== 'false', // Default to enabled
      fetchSchedule: env.CRON_FETCH || '*/30 * * * *',
      processSchedule: env.CRON_PROCESS || '*/10 * * * *',
      processBatchSize: readInt(env, 'CRON_PROCESS_BATCH', 5, 1)
    },
    api: {
      cronSecret: env.CRON_SECRET || null
    },
    logging: {
      level: env.LOG_LEVEL || 'info'
    }
  };
}
