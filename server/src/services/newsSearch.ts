import type { MarketProvider, NewsArticle } from '../providers/provider.interface.js';
import { logger } from '../utils/logger.js';

export interface NewsItem {
  title: string;
  publisher: string;
  link: string;
  published_at: string;
}

export function toNewsItem(a: NewsArticle): NewsItem {
  return { title: a.title, publisher: a.publisher, link: a.link, published_at: a.publishedAt.toISOString() };
}

/**
 * Runs one search per query, one at a time. A failed query is logged and
 * yields no articles; it throws only when every query failed.
 */
export async function searchEach(provider: MarketProvider, queries: string[], perQuery: number): Promise<Map<string, NewsArticle[]>> {
  const out = new Map<string, NewsArticle[]>();
  let failures = 0;
  let lastErr: unknown = null;
  for (const q of queries) {
    try {
      out.set(q, await provider.news(q, perQuery));
    } catch (err) {
      failures++;
      lastErr = err;
      logger.warn({ err, query: q }, 'news_search_failed');
      out.set(q, []);
    }
  }
  if (queries.length && failures === queries.length) {
    throw lastErr instanceof Error ? lastErr : new Error('news search failed');
  }
  return out;
}

export function dedupeByLink(articles: NewsArticle[]): NewsArticle[] {
  const seen = new Set<string>();
  const out: NewsArticle[] = [];
  for (const a of articles) {
    const key = a.link || a.title;
    if (seen.has(key)) continue;
    seen.add(key);
    out.push(a);
  }
  return out;
}
