/**
 * ContentStore backed by Supabase (Postgres).
 * Dedup relies on the unique index on articles.link: inserts use
 * ON CONFLICT DO NOTHING and read the surviving row back.
 */

import { createClient, type SupabaseClient } from '@supabase/supabase-js';
import { z } from 'zod';
import {
  ARTICLE_STATUSES,
  type Article,
  type ArticleDraft,
  type ArticleStatus,
  type ConfigMap,
  type Source,
  type SourceInput
} from '../types/models';
import {
  DuplicateSourceError,
  StoreError,
  type ArticleQuery,
  type ContentStore,
  type FindOrCreateResult
} from './types';

const UNIQUE_VIOLATION = '23505';

const articleRowSchema = z.object({
  id: z.number(),
  source_id: z.number(),
  title: z.string(),
  link: z.string(),
  content: z.string().nullable().transform(value => value ?? ''),
  pub_date: z.string(),
  status: z.enum(ARTICLE_STATUSES),
  summary: z.string().nullable().transform(value => value ?? ''),
  processed_at: z.string().nullable(),
  created_at: z.string()
});

const idRowSchema = z.object({ id: z.number() });

const sourceRowSchema = z.object({
  id: z.number(),
  name: z.string(),
  url: z.string(),
  enabled: z.boolean(),
  created_at: z.string(),
  updated_at: z.string()
});

const settingRowSchema = z.object({
  key: z.string(),
  value: z.string().nullable()
});

export interface SupabaseStoreOptions {
  url: string;
  key: string;
  sourcesTable: string;
  articlesTable: string;
  settingsTable: string;
}

interface PostgrestErrorLike {
  message: string;
  code?: string;
}

function fail(operation: string, error: PostgrestErrorLike): never {
  throw new StoreError(operation, error.code ? `${error.message} (${error.code})` : error.message);
}

function parseRows<T>(operation: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>, data: unknown): T[] {
  const result = z.array(schema).safeParse(data ?? []);
  if (!result.success) {
    throw new StoreError(operation, `unexpected row shape: ${result.error.message}`);
  }
  return result.data;
}

export class SupabaseContentStore implements ContentStore {
  private readonly client: SupabaseClient;

  constructor(private readonly options: SupabaseStoreOptions) {
    this.client = createClient(options.url, options.key, {
      auth: { persistSession: false }
    });
  }

  async findOrCreateArticle(draft: ArticleDraft): Promise<FindOrCreateResult> {
    const row = { ...draft, status: 'pending', summary: '', processed_at: null };

    const { data, error } = await this.client
      .from(this.options.articlesTable)
      .upsert(row, { onConflict: 'link', ignoreDuplicates: true })
      .select();

    if (error) fail('findOrCreateArticle', error);

    const [inserted] = parseRows('findOrCreateArticle', articleRowSchema, data);
    if (inserted) {
      return { article: inserted, created: true };
    }

    // Conflict: another writer (or an earlier run) owns this link
    const existing = await this.client
      .from(this.options.articlesTable)
      .select('*')
      .eq('link', draft.link)
      .limit(1);

    if (existing.error) fail('findOrCreateArticle', existing.error);

    const [article] = parseRows('findOrCreateArticle', articleRowSchema, existing.data);
    if (!article) {
      throw new StoreError('findOrCreateArticle', `row for ${draft.link} vanished after conflict`);
    }
    return { article, created: false };
  }

  async listArticles({ status, offset = 0, limit }: ArticleQuery): Promise<Article[]> {
    let query = this.client.from(this.options.articlesTable).select('*');
    if (status) {
      query = query.eq('status', status);
    }

    const { data, error } = await query
      .order('pub_date', { ascending: false })
      .order('id', { ascending: false })
      .range(offset, offset + limit - 1);

    if (error) fail('listArticles', error);
    return parseRows('listArticles', articleRowSchema, data);
  }

  async countArticles(status?: ArticleStatus): Promise<number> {
    let query = this.client
      .from(this.options.articlesTable)
      .select('id', { count: 'exact', head: true });
    if (status) {
      query = query.eq('status', status);
    }

    const { count, error } = await query;
    if (error) fail('countArticles', error);
    return count ?? 0;
  }

  async saveArticle(article: Article): Promise<void> {
    const { error } = await this.client
      .from(this.options.articlesTable)
      .upsert(article, { onConflict: 'id' });

    if (error) fail('saveArticle', error);
  }

  async finalizeArticle(article: Article): Promise<boolean> {
    // Conditional on status so a concurrent drain cannot overwrite a terminal row
    const { data, error } = await this.client
      .from(this.options.articlesTable)
      .update({
        status: article.status,
        summary: article.summary,
        processed_at: article.processed_at
      })
      .eq('id', article.id)
      .eq('status', 'pending')
      .select('id');

    if (error) fail('finalizeArticle', error);
    return parseRows('finalizeArticle', idRowSchema, data).length > 0;
  }

  async deleteArticle(id: number): Promise<void> {
    const { error } = await this.client
      .from(this.options.articlesTable)
      .delete()
      .eq('id', id);

    if (error) fail('deleteArticle', error);
  }

  async listSources(options: { enabledOnly?: boolean } = {}): Promise<Source[]> {
    let query = this.client.from(this.options.sourcesTable).select('*');
    if (options.enabledOnly) {
      query = query.eq('enabled', true);
    }

    const { data, error } = await query.order('id', { ascending: true });
    if (error) fail('listSources', error);
    return parseRows('listSources', sourceRowSchema, data);
  }

  async getSource(id: number): Promise<Source | null> {
    const { data, error } = await this.client
      .from(this.options.sourcesTable)
      .select('*')
      .eq('id', id)
      .limit(1);

    if (error) fail('getSource', error);
    const [source] = parseRows('getSource', sourceRowSchema, data);
    return source ?? null;
  }

  async createSource(input: SourceInput): Promise<Source> {
    const { data, error } = await this.client
      .from(this.options.sourcesTable)
      .insert({ name: input.name, url: input.url, enabled: input.enabled ?? true })
      .select();

    if (error) {
      if (error.code === UNIQUE_VIOLATION) throw new DuplicateSourceError(input.url);
      fail('createSource', error);
    }

    const [source] = parseRows('createSource', sourceRowSchema, data);
    if (!source) {
      throw new StoreError('createSource', 'insert returned no row');
    }
    return source;
  }

  async deleteSource(id: number): Promise<void> {
    const { error } = await this.client
      .from(this.options.sourcesTable)
      .delete()
      .eq('id', id);

    if (error) fail('deleteSource', error);
  }

  async countSources(options: { enabledOnly?: boolean } = {}): Promise<number> {
    let query = this.client
      .from(this.options.sourcesTable)
      .select('id', { count: 'exact', head: true });
    if (options.enabledOnly) {
      query = query.eq('enabled', true);
    }

    const { count, error } = await query;
    if (error) fail('countSources', error);
    return count ?? 0;
  }

  async getConfigMap(): Promise<ConfigMap> {
    const { data, error } = await this.client
      .from(this.options.settingsTable)
      .select('key, value');

    if (error) fail('getConfigMap', error);

    const config: ConfigMap = {};
    for (const row of parseRows('getConfigMap', settingRowSchema, data)) {
      config[row.key] = row.value ?? '';
    }
    return config;
  }

  async setConfigValues(values: ConfigMap): Promise<void> {
    const rows = this.toSettingRows(values);
    if (rows.length === 0) return;

    const { error } = await this.client
      .from(this.options.settingsTable)
      .upsert(rows, { onConflict: 'key' });

    if (error) fail('setConfigValues', error);
  }

  async ensureConfigDefaults(values: ConfigMap): Promise<void> {
    const rows = this.toSettingRows(values);
    if (rows.length === 0) return;

    const { error } = await this.client
      .from(this.options.settingsTable)
      .upsert(rows, { onConflict: 'key', ignoreDuplicates: true });

    if (error) fail('ensureConfigDefaults', error);
  }

  private toSettingRows(values: ConfigMap) {
    const updatedAt = new Date().toISOString();
    return Object.entries(values).map(([key, value]) => ({ key, value, updated_at: updatedAt }));
  }
}
