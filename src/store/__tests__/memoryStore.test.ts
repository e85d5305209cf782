import { InMemoryContentStore } from '../memoryStore';
import { DuplicateSourceError } from '../types';
import { seedPendingArticles } from '../../__tests__/setup';

const FIXED_NOW = new Date('2024-03-01T12:00:00.000Z');

describe('InMemoryContentStore', () => {
  let store: InMemoryContentStore;

  beforeEach(() => {
    store = new InMemoryContentStore(() => FIXED_NOW);
  });

  describe('findOrCreateArticle', () => {
    const draft = {
      source_id: 1,
      title: 'First',
      link: 'https://example.com/a',
      content: 'body',
      pub_date: '2024-01-01T00:00:00.000Z'
    };

    it('creates a pending article with empty summary and no processed_at', async () => {
      const { article, created } = await store.findOrCreateArticle(draft);

      expect(created).toBe(true);
      expect(article).toEqual({
        ...draft,
        id: 1,
        status: 'pending',
        summary: '',
        processed_at: null,
        created_at: '2024-03-01T12:00:00.000Z'
      });
    });

    it('returns the existing row for a known link', async () => {
      await store.findOrCreateArticle(draft);
      const second = await store.findOrCreateArticle({ ...draft, title: 'Changed' });

      expect(second.created).toBe(false);
      expect(second.article.id).toBe(1);
      expect(second.article.title).toBe('First');
      expect(await store.countArticles()).toBe(1);
    });

    it('creates exactly one row when the same link races', async () => {
      const results = await Promise.all(
        Array.from({ length: 5 }, () => store.findOrCreateArticle(draft))
      );

      expect(results.filter(result => result.created)).toHaveLength(1);
      expect(await store.countArticles()).toBe(1);
    });
  });

  describe('listArticles', () => {
    it('orders by pub_date descending and pages with offset and limit', async () => {
      await seedPendingArticles(store, 5);

      const firstPage = await store.listArticles({ offset: 0, limit: 2 });
      const secondPage = await store.listArticles({ offset: 2, limit: 2 });

      expect(firstPage.map(article => article.title)).toEqual(['Article 5', 'Article 4']);
      expect(secondPage.map(article => article.title)).toEqual(['Article 3', 'Article 2']);
    });

    it('filters by status', async () => {
      const [first] = await seedPendingArticles(store, 3);
      await store.saveArticle({ ...first, status: 'filtered', processed_at: FIXED_NOW.toISOString() });

      expect(await store.countArticles('pending')).toBe(2);
      expect(await store.countArticles('filtered')).toBe(1);
      const filtered = await store.listArticles({ status: 'filtered', limit: 10 });
      expect(filtered.map(article => article.id)).toEqual([first.id]);
    });

    it('returns copies that do not alias stored rows', async () => {
      await seedPendingArticles(store, 1);
      const [article] = await store.listArticles({ limit: 1 });
      article.title = 'mutated';

      const [again] = await store.listArticles({ limit: 1 });
      expect(again.title).toBe('Article 1');
    });
  });

  describe('finalizeArticle', () => {
    it('writes the terminal fields of a pending row', async () => {
      const [article] = await seedPendingArticles(store, 1);

      const written = await store.finalizeArticle({
        ...article,
        title: 'ignored',
        status: 'processed',
        summary: 'done',
        processed_at: FIXED_NOW.toISOString()
      });

      expect(written).toBe(true);
      const [saved] = await store.listArticles({ limit: 1 });
      expect(saved).toMatchObject({
        title: 'Article 1',
        status: 'processed',
        summary: 'done',
        processed_at: '2024-03-01T12:00:00.000Z'
      });
    });

    it('leaves a terminal row untouched', async () => {
      const [article] = await seedPendingArticles(store, 1);
      await store.finalizeArticle({ ...article, status: 'processed', summary: 'first', processed_at: FIXED_NOW.toISOString() });

      const written = await store.finalizeArticle({
        ...article,
        status: 'filtered',
        summary: 'second',
        processed_at: '2024-03-02T00:00:00.000Z'
      });

      expect(written).toBe(false);
      const [saved] = await store.listArticles({ limit: 1 });
      expect(saved).toMatchObject({ status: 'processed', summary: 'first', processed_at: '2024-03-01T12:00:00.000Z' });
    });

    it('returns false for a deleted row', async () => {
      const [article] = await seedPendingArticles(store, 1);
      await store.deleteArticle(article.id);

      expect(await store.finalizeArticle({ ...article, status: 'filtered', summary: 'x', processed_at: FIXED_NOW.toISOString() })).toBe(false);
      expect(await store.countArticles()).toBe(0);
    });
  });

  describe('deleteArticle', () => {
    it('frees the link for a new row', async () => {
      const [article] = await seedPendingArticles(store, 1);
      await store.deleteArticle(article.id);

      const { created, article: recreated } = await store.findOrCreateArticle({
        source_id: 1,
        title: 'Again',
        link: article.link,
        content: '',
        pub_date: article.pub_date
      });
      expect(created).toBe(true);
      expect(recreated.id).toBe(2);
    });
  });

  describe('sources', () => {
    it('creates sources enabled by default and counts enabled ones', async () => {
      const blog = await store.createSource({ name: 'Blog', url: 'https://blog.example.com/rss' });
      await store.createSource({ name: 'Quiet', url: 'https://quiet.example.com/rss', enabled: false });

      expect(blog).toEqual({
        id: 1,
        name: 'Blog',
        url: 'https://blog.example.com/rss',
        enabled: true,
        created_at: '2024-03-01T12:00:00.000Z',
        updated_at: '2024-03-01T12:00:00.000Z'
      });
      expect(await store.countSources()).toBe(2);
      expect(await store.countSources({ enabledOnly: true })).toBe(1);
      expect((await store.listSources({ enabledOnly: true })).map(source => source.name)).toEqual(['Blog']);
    });

    it('rejects a duplicate url', async () => {
      await store.createSource({ name: 'Blog', url: 'https://blog.example.com/rss' });

      await expect(
        store.createSource({ name: 'Copy', url: 'https://blog.example.com/rss' })
      ).rejects.toBeInstanceOf(DuplicateSourceError);
    });

    it('returns null for an unknown id and deletes by id', async () => {
      const source = await store.createSource({ name: 'Blog', url: 'https://blog.example.com/rss' });
      expect(await store.getSource(99)).toBeNull();

      await store.deleteSource(source.id);
      expect(await store.getSource(source.id)).toBeNull();
    });
  });

  describe('settings', () => {
    it('ensureConfigDefaults only fills absent keys', async () => {
      await store.setConfigValues({ llm_model: 'custom-model' });
      await store.ensureConfigDefaults({ llm_model: 'gpt-4o-mini', llm_provider: 'openai' });

      expect(await store.getConfigMap()).toEqual({
        llm_model: 'custom-model',
        llm_provider: 'openai'
      });
    });

    it('setConfigValues overwrites existing keys', async () => {
      await store.setConfigValues({ llm_model: 'a' });
      await store.setConfigValues({ llm_model: 'b' });

      expect(await store.getConfigMap()).toEqual({ llm_model: 'b' });
    });
  });
});
