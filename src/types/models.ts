/**
 * Domain records shared by the store, the ingestion engine and the pipeline.
 * Field names follow the table columns.
 */

export const ARTICLE_STATUSES = ['pending', 'processed', 'filtered'] as const;

export type ArticleStatus = (typeof ARTICLE_STATUSES)[number];

export const TERMINAL_STATUSES: ReadonlySet<ArticleStatus> = new Set(['processed', 'filtered']);

export interface Source {
  id: number;
  name: string;
  url: string;
  enabled: boolean;
  created_at: string;
  updated_at: string;
}

export interface SourceInput {
  name: string;
  url: string;
  enabled?: boolean;
}

export interface Article {
  id: number;
  source_id: number;
  title: string;
  link: string;
  content: string;
  pub_date: string;
  status: ArticleStatus;
  // Model summary when processed, rejection reason when filtered
  summary: string;
  // Null iff status is pending
  processed_at: string | null;
  created_at: string;
}

export type ArticleDraft = Pick<Article, 'source_id' | 'title' | 'link' | 'content' | 'pub_date'>;

export const CONFIG_KEYS = {
  provider: 'llm_provider',
  apiUrl: 'llm_api_url',
  apiKey: 'llm_api_key',
  model: 'llm_model',
  promptFilter: 'prompt_filter',
  promptSummary: 'prompt_summary',
  filterRejectMarker: 'filter_reject_marker',
} as const;

export type ConfigKey = (typeof CONFIG_KEYS)[keyof typeof CONFIG_KEYS];

export type ConfigMap = Record<string, string>;
