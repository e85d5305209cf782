import type {
  Article,
  ArticleDraft,
  ArticleStatus,
  ConfigMap,
  Source,
  SourceInput
} from '../types/models';
import {
  DuplicateSourceError,
  type ArticleQuery,
  type ContentStore,
  type FindOrCreateResult
} from './types';

/**
 * In-process ContentStore. Each method completes its read-modify-write
 * without yielding, which gives the same single-row atomicity as the
 * database's unique constraints. Records are copied on the way in and out.
 */
export class InMemoryContentStore implements ContentStore {
  private readonly articles = new Map<number, Article>();
  private readonly articleIdsByLink = new Map<string, number>();
  private readonly sources = new Map<number, Source>();
  private readonly settings = new Map<string, string>();
  private nextArticleId = 1;
  private nextSourceId = 1;

  constructor(private readonly now: () => Date = () => new Date()) {}

  async findOrCreateArticle(draft: ArticleDraft): Promise<FindOrCreateResult> {
    const existingId = this.articleIdsByLink.get(draft.link);
    const existing = existingId === undefined ? undefined : this.articles.get(existingId);
    if (existing) {
      return { article: { ...existing }, created: false };
    }

    const article: Article = {
      ...draft,
      id: this.nextArticleId++,
      status: 'pending',
      summary: '',
      processed_at: null,
      created_at: this.now().toISOString()
    };
    this.articles.set(article.id, article);
    this.articleIdsByLink.set(article.link, article.id);
    return { article: { ...article }, created: true };
  }

  async listArticles({ status, offset = 0, limit }: ArticleQuery): Promise<Article[]> {
    return [...this.articles.values()]
      .filter(article => status === undefined || article.status === status)
      .sort((a, b) => Date.parse(b.pub_date) - Date.parse(a.pub_date) || b.id - a.id)
      .slice(offset, offset + limit)
      .map(article => ({ ...article }));
  }

  async countArticles(status?: ArticleStatus): Promise<number> {
    let count = 0;
    for (const article of this.articles.values()) {
      if (status === undefined || article.status === status) count++;
    }
    return count;
  }

  async saveArticle(article: Article): Promise<void> {
    const previous = this.articles.get(article.id);
    if (previous && previous.link !== article.link) {
      this.articleIdsByLink.delete(previous.link);
    }
    this.articles.set(article.id, { ...article });
    this.articleIdsByLink.set(article.link, article.id);
  }

  async finalizeArticle(article: Article): Promise<boolean> {
    const stored = this.articles.get(article.id);
    if (!stored || stored.status !== 'pending') {
      return false;
    }
    this.articles.set(article.id, {
      ...stored,
      status: article.status,
      summary: article.summary,
      processed_at: article.processed_at
    });
    return true;
  }

  async deleteArticle(id: number): Promise<void> {
    const article = this.articles.get(id);
    if (article) {
      this.articles.delete(id);
      this.articleIdsByLink.delete(article.link);
    }
  }

  async listSources(options: { enabledOnly?: boolean } = {}): Promise<Source[]> {
    return [...this.sources.values()]
      .filter(source => !options.enabledOnly || source.enabled)
      .map(source => ({ ...source }));
  }

  async getSource(id: number): Promise<Source | null> {
    const source = this.sources.get(id);
    return source ? { ...source } : null;
  }

  async createSource(input: SourceInput): Promise<Source> {
    for (const source of this.sources.values()) {
      if (source.url === input.url) throw new DuplicateSourceError(input.url);
    }
    const timestamp = this.now().toISOString();
    const source: Source = {
      id: this.nextSourceId++,
      name: input.name,
      url: input.url,
      enabled: input.enabled ?? true,
      created_at: timestamp,
      updated_at: timestamp
    };
    this.sources.set(source.id, source);
    return { ...source };
  }

  async deleteSource(id: number): Promise<void> {
    this.sources.delete(id);
  }

  async countSources(options: { enabledOnly?: boolean } = {}): Promise<number> {
    return (await this.listSources(options)).length;
  }

  async getConfigMap(): Promise<ConfigMap> {
    return Object.fromEntries(this.settings);
  }

  async setConfigValues(values: ConfigMap): Promise<void> {
    for (const [key, value] of Object.entries(values)) {
      this.settings.set(key, value);
    }
  }

  async ensureConfigDefaults(values: ConfigMap): Promise<void> {
    for (const [key, value] of Object.entries(values)) {
      if (!this.settings.has(key)) this.settings.set(key, value);
    }
  }
}
