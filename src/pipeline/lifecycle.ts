import { TERMINAL_STATUSES, type Article } from '../types/models';

export type TerminalOutcome = 'processed' | 'filtered';

export type TerminalArticle = Article & { status: TerminalOutcome; processed_at: string };

export class ArticleStateError extends Error {
  constructor(readonly articleId: number, readonly status: string) {
    super(`Article ${articleId} is already ${status}; terminal articles cannot transition`);
    this.name = 'ArticleStateError';
  }
}

/**
 * pending -> processed | filtered. processed_at is stamped here and nowhere else.
 */
export function completeArticle(
  article: Article,
  outcome: TerminalOutcome,
  summary: string,
  now: Date
): TerminalArticle {
  if (TERMINAL_STATUSES.has(article.status)) {
    throw new ArticleStateError(article.id, article.status);
  }
  return {
    ...article,
    status: outcome,
    summary,
    processed_at: now.toISOString()
  };
}
