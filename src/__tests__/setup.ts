/**
 * Vitest setup file for global test configuration
 * Runs before each test file
 */

import type { InMemoryContentStore } from '../store/memoryStore';
import type { Article, ArticleDraft } from '../types/models';

// Mock environment variables for testing
Object.assign(process.env, {
  NODE_ENV: 'test',
  STORE_DRIVER: 'memory',
  CRON_ENABLED: 'false',
  LOG_LEVEL: 'error' // Reduce log noise in tests
});

beforeEach(() => {
  // Silence console output from the logger
  vi.spyOn(console, 'debug').mockImplementation(() => {});
  vi.spyOn(console, 'info').mockImplementation(() => {});
  vi.spyOn(console, 'warn').mockImplementation(() => {});
  vi.spyOn(console, 'error').mockImplementation(() => {});
});

afterEach(() => {
  vi.restoreAllMocks();
});

// Utility function to create a JSON response the way fetch would
export const createJsonResponse = (data: unknown, status = 200): Response =>
  new Response(JSON.stringify(data), {
    status,
    headers: { 'content-type': 'application/json' }
  });

// Utility function to seed pending articles, newest first by pub_date
export async function seedPendingArticles(
  store: InMemoryContentStore,
  count: number,
  overrides: Partial<ArticleDraft> = {}
): Promise<Article[]> {
  const articles: Article[] = [];
  for (let i = 0; i < count; i++) {
    const { article } = await store.findOrCreateArticle({
      source_id: 1,
      title: `Article ${i + 1}`,
      link: `https://example.com/articles/${i + 1}`,
      content: `Body of article ${i + 1}`,
      pub_date: new Date(Date.UTC(2024, 0, 1, 0, i)).toISOString(),
      ...overrides
    });
    articles.push(article);
  }
  return articles;
}
