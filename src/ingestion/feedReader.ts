/**
 * Feed download and parsing
 * Turns a feed URL into FeedEntry records ready for dedup
 */

import Parser from 'rss-parser';
import pRetry, { AbortError } from 'p-retry';
import TurndownService from 'turndown';
import type { FeedEntry } from '../types/feed';
import { withDeadline } from '../utils/deadline';
import { logger } from '../utils/logger';

const USER_AGENT = 'Mozilla/5.0 (compatible; FeedDigest/1.0)';

const log = logger.child('feeds');

export interface DownloadOptions {
  signal?: AbortSignal;
  timeoutMs: number;
  retries: number;
  fetch: typeof fetch;
}

const parser = new Parser();

const turndownService = new TurndownService({
  headingStyle: 'atx',
  codeBlockStyle: 'fenced'
});
turndownService.remove(['script', 'style']);

function looksLikeHtml(text: string): boolean {
  return /<\/?[a-z][^>]*>/i.test(text);
}

function firstText(...candidates: unknown[]): string {
  for (const candidate of candidates) {
    if (typeof candidate === 'string' && candidate.trim() !== '') {
      return candidate.trim();
    }
  }
  return '';
}

function parseDate(value: unknown): string | null {
  if (typeof value !== 'string' || value.trim() === '') return null;
  const time = Date.parse(value.trim());
  return Number.isNaN(time) ? null : new Date(time).toISOString();
}

export function normalizeContent(raw: string): string {
  if (!looksLikeHtml(raw)) {
    return raw.trim();
  }
  return turndownService.turndown(raw).trim();
}

/**
 * Fetch the raw feed document. Network errors and 5xx responses are retried;
 * 4xx responses are not.
 */
export async function downloadFeed(url: string, options: DownloadOptions): Promise<string> {
  return pRetry(
    async () => {
      const deadline = withDeadline(options.signal, options.timeoutMs);
      try {
        const response = await options.fetch(url, {
          signal: deadline.signal,
          headers: {
            'User-Agent': USER_AGENT,
            Accept: 'application/rss+xml, application/atom+xml, application/xml;q=0.9, */*;q=0.8'
          }
        });

        if (!response.ok) {
          const message = `HTTP error! status: ${response.status}`;
          if (response.status < 500) {
            throw new AbortError(message);
          }
          throw new Error(message);
        }

        return await response.text();
      } finally {
        deadline.clear();
      }
    },
    {
      retries: options.retries,
      factor: 2,
      minTimeout: 500,
      maxTimeout: 5000,
      signal: options.signal,
      onFailedAttempt: error => {
        if (error.retriesLeft > 0) {
          log.warn(`Fetching ${url} failed (attempt ${error.attemptNumber}), retrying`, { error: error.message });
        }
      }
    }
  );
}

/**
 * Parse an RSS/Atom document. Items without a link are dropped; items without
 * a parseable date get the ingestion time.
 */
export async function parseFeed(xml: string, now: Date): Promise<FeedEntry[]> {
  const feed = await parser.parseString(xml);
  const entries: FeedEntry[] = [];

  for (const item of feed.items) {
    const link = firstText(item.link);
    if (!link) {
      log.warn('Skipping feed item without a link', { title: item.title });
      continue;
    }

    // rss-parser exposes RSS <description> as `content` and Atom <summary> as `summary`
    const body = firstText(item.content, item.summary, item['content:encoded']);

    entries.push({
      title: firstText(item.title),
      link,
      content: normalizeContent(body),
      pub_date: parseDate(item.isoDate) ?? parseDate(item.pubDate) ?? now.toISOString()
    });
  }

  return entries;
}
