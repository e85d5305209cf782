import type { EnvironmentConfig } from '../config/environment';
import { InMemoryContentStore } from './memoryStore';
import { SupabaseContentStore } from './supabaseStore';
import type { ContentStore } from './types';

export * from './types';
export { InMemoryContentStore } from './memoryStore';
export { SupabaseContentStore } from './supabaseStore';

export function createContentStore(config: EnvironmentConfig['store']): ContentStore {
  if (config.driver === 'memory') {
    return new InMemoryContentStore();
  }
  return new SupabaseContentStore({
    url: config.supabaseUrl,
    key: config.supabaseKey,
    sourcesTable: config.sourcesTable,
    articlesTable: config.articlesTable,
    settingsTable: config.settingsTable
  });
}
