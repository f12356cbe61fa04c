// News Analyst Node
// Selects recent articles and asks the model for a sentiment summary

import { z } from 'zod';
import type { NodeFunction } from '../../workflow-engine';
import { requireField } from '../../workflow-engine';
import type { RawNewsItem } from '../../market-data/types';
import logger from '../../shared/logger';
import { newsAnalysisPrompt } from '../prompts';
import type { ResolvedServices } from '../services';
import type { AnalysisState } from '../state';

const DAY_MS = 24 * 60 * 60 * 1000;

export interface NewsArticle {
  title: string;
  publisher: string | null;
  /** YYYY-MM-DD (UTC) */
  publishDate: string;
  publishedAtMs: number;
  summary: string;
}

export interface NewsSelectionOptions {
  lookbackDays: number;
  limit: number;
}

export interface NewsSelection {
  articles: NewsArticle[];
  skipped: number;
}

// v1 search results
const SearchNewsItemSchema = z.object({
  title: z.string().min(1),
  providerPublishTime: z.number().int().nonnegative(),
  publisher: z.string().optional(),
  summary: z.string().optional(),
});

// Newer feeds nest everything under `content`
const ContentNewsItemSchema = z.object({
  content: z.object({
    title: z.string().optional(),
    pubDate: z.string().datetime({ offset: true }),
    summary: z.string().optional(),
    provider: z.object({ displayName: z.string().optional() }).optional(),
  }),
});

function toArticle(title: string, publishedAtMs: number, publisher: string | undefined, summary: string | undefined): NewsArticle {
  return {
    title,
    publisher: publisher ?? null,
    publishDate: new Date(publishedAtMs).toISOString().slice(0, 10),
    publishedAtMs,
    summary: summary ?? '',
  };
}

export function normalizeNewsItem(item: RawNewsItem): NewsArticle | null {
  const search = SearchNewsItemSchema.safeParse(item);
  if (search.success) {
    const { title, providerPublishTime, publisher, summary } = search.data;
    return toArticle(title, providerPublishTime * 1000, publisher, summary);
  }

  const nested = ContentNewsItemSchema.safeParse(item);
  if (nested.success) {
    const { title, pubDate, summary, provider } = nested.data.content;
    return toArticle(title ?? 'No Title', Date.parse(pubDate), provider?.displayName, summary);
  }

  return null;
}

/**
 * Articles published after `now - lookbackDays`, newest first, at most `limit`.
 * Items that match neither feed shape are counted in `skipped`.
 */
export function selectRecentNews(
  items: readonly RawNewsItem[],
  now: Date,
  options: NewsSelectionOptions
): NewsSelection {
  const cutoff = now.getTime() - options.lookbackDays * DAY_MS;
  const articles: NewsArticle[] = [];
  let skipped = 0;

  items.forEach((item, index) => {
    const article = normalizeNewsItem(item);
    if (!article) {
      skipped++;
      logger.warn(`[NewsAnalystNode] Skipping malformed news item #${index}`);
      return;
    }
    if (article.publishedAtMs > cutoff) {
      articles.push(article);
    }
  });

  articles.sort((a, b) => b.publishedAtMs - a.publishedAtMs);
  return { articles: articles.slice(0, Math.max(0, options.limit)), skipped };
}

export function createNewsAnalystNode(services: ResolvedServices): NodeFunction<AnalysisState> {
  return async (state, { signal }) => {
    const symbol = requireField(state, 'stockSymbol');
    const news = requireField(state, 'news');

    const { articles, skipped } = selectRecentNews(news, services.now(), {
      lookbackDays: services.settings.newsLookbackDays,
      limit: services.settings.maxNewsArticles,
    });
    logger.info(`[NewsAnalystNode] ${symbol}: ${articles.length} recent articles (${skipped} skipped)`);

    const newsAnalysis = await services.llm.chat(newsAnalysisPrompt(symbol, articles), signal);
    return { newsAnalysis };
  };
}
