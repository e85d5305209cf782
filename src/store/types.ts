import type {
  Article,
  ArticleDraft,
  ArticleStatus,
  ConfigMap,
  Source,
  SourceInput
} from '../types/models';

export interface ArticleQuery {
  status?: ArticleStatus;
  offset?: number;
  limit: number;
}

export interface FindOrCreateResult {
  article: Article;
  // False when a row with the same link already existed
  created: boolean;
}

/**
 * Content Store contract. Every operation is atomic at single-row granularity;
 * article links and setting keys are unique.
 */
export interface ContentStore {
  findOrCreateArticle(draft: ArticleDraft): Promise<FindOrCreateResult>;
  /** Ordered by pub_date, most recent first */
  listArticles(query: ArticleQuery): Promise<Article[]>;
  countArticles(status?: ArticleStatus): Promise<number>;
  /** Upsert by id */
  saveArticle(article: Article): Promise<void>;
  /**
   * Write status, summary and processed_at only while the stored row is still pending.
   * @returns false when the row is gone or already terminal; nothing is written then
   */
  finalizeArticle(article: Article): Promise<boolean>;
  deleteArticle(id: number): Promise<void>;

  listSources(options?: { enabledOnly?: boolean }): Promise<Source[]>;
  getSource(id: number): Promise<Source | null>;
  createSource(input: SourceInput): Promise<Source>;
  deleteSource(id: number): Promise<void>;
  countSources(options?: { enabledOnly?: boolean }): Promise<number>;

  getConfigMap(): Promise<ConfigMap>;
  setConfigValues(values: ConfigMap): Promise<void>;
  /** Inserts keys that are absent, leaves existing values untouched */
  ensureConfigDefaults(values: ConfigMap): Promise<void>;
}

export type ConfigReader = Pick<ContentStore, 'getConfigMap'>;

export class StoreError extends Error {
  constructor(readonly operation: string, message: string) {
    super(`${operation} failed: ${message}`);
    this.name = 'StoreError';
  }
}

export class DuplicateSourceError extends Error {
  constructor(readonly url: string) {
    super(`A source with url ${url} already exists`);
    this.name = 'DuplicateSourceError';
  }
}
