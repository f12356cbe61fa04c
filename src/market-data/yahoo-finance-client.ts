/**
 * Yahoo Finance Client
 * Public chart, fundamentals and news endpoints used by the data collector node.
 */

import axios, { AxiosInstance } from 'axios';
import { z } from 'zod';
import configManager from '../shared/config';
import { safeErrorMessage } from '../shared/http-errors';
import logger from '../shared/logger';
import {
  HistoricalData,
  IncomeStatement,
  MarketDataProvider,
  RawNewsItem,
  RawNewsItemSchema,
} from './types';

export class MarketDataError extends Error {
  public readonly symbol: string;
  constructor(symbol: string, message: string, options?: ErrorOptions) {
    super(`[${symbol}] ${message}`, options);
    this.name = 'MarketDataError';
    this.symbol = symbol;
  }
}

const nullableSeries = z.array(z.number().nullable()).optional();

const ChartResponseSchema = z.object({
  chart: z.object({
    result: z.array(z.object({
      timestamp: z.array(z.number()).optional(),
      indicators: z.object({
        quote: z.array(z.object({
          open: nullableSeries,
          high: nullableSeries,
          low: nullableSeries,
          close: nullableSeries,
          volume: nullableSeries,
        })),
      }),
    })).nullable(),
    error: z.object({ description: z.string() }).nullable().optional(),
  }),
});

const QuoteSummarySchema = z.object({
  quoteSummary: z.object({
    result: z.array(z.object({
      incomeStatementHistory: z.object({
        incomeStatementHistory: z.array(z.record(z.string(), z.unknown())),
      }).optional(),
    })).nullable(),
  }),
});

const FormattedValueSchema = z.object({
  raw: z.number(),
  fmt: z.string().optional(),
});

const SearchResponseSchema = z.object({
  news: z.array(RawNewsItemSchema).optional(),
});

const NON_METRIC_KEYS = new Set(['endDate', 'maxAge']);

function toDateKey(epochSeconds: number): string {
  return new Date(epochSeconds * 1000).toISOString().slice(0, 10);
}

/**
 * Daily bars from a v8 chart response. Bars without a close are dropped;
 * missing open/high/low fall back to the close and missing volume to 0.
 */
export function parseChartResponse(symbol: string, data: unknown): HistoricalData {
  const parsed = ChartResponseSchema.safeParse(data);
  if (!parsed.success) {
    throw new MarketDataError(symbol, `Unexpected chart response: ${parsed.error.message}`);
  }

  const result = parsed.data.chart.result?.[0];
  const quote = result?.indicators.quote[0];
  if (!result || !quote) {
    const reason = parsed.data.chart.error?.description ?? 'empty result';
    throw new MarketDataError(symbol, `No price history: ${reason}`);
  }

  const history: HistoricalData = { dates: [], open: [], high: [], low: [], close: [], volume: [] };
  const timestamps = result.timestamp ?? [];

  timestamps.forEach((timestamp, i) => {
    const close = quote.close?.[i];
    if (close === null || close === undefined) return;

    history.dates.push(toDateKey(timestamp));
    history.open.push(quote.open?.[i] ?? close);
    history.high.push(quote.high?.[i] ?? close);
    history.low.push(quote.low?.[i] ?? close);
    history.close.push(close);
    history.volume.push(quote.volume?.[i] ?? 0);
  });

  return history;
}

/**
 * Annual income statements from a quoteSummary response, newest first as delivered.
 * Every `{ raw: number }` entry becomes a metric.
 */
export function parseIncomeStatements(data: unknown): IncomeStatement[] {
  const parsed = QuoteSummarySchema.safeParse(data);
  if (!parsed.success) return [];

  const statements = parsed.data.quoteSummary.result?.[0]?.incomeStatementHistory?.incomeStatementHistory ?? [];
  const result: IncomeStatement[] = [];

  for (const statement of statements) {
    const endDate = FormattedValueSchema.safeParse(statement.endDate);
    if (!endDate.success) continue;

    const metrics: Record<string, number> = {};
    for (const [key, value] of Object.entries(statement)) {
      if (NON_METRIC_KEYS.has(key)) continue;
      const metric = FormattedValueSchema.safeParse(value);
      if (metric.success) {
        metrics[key] = metric.data.raw;
      }
    }

    result.push({ endDate: endDate.data.fmt ?? toDateKey(endDate.data.raw), metrics });
  }

  return result;
}

export function parseNewsResponse(data: unknown): RawNewsItem[] {
  const parsed = SearchResponseSchema.safeParse(data);
  return parsed.success ? parsed.data.news ?? [] : [];
}

export class YahooFinanceClient implements MarketDataProvider {
  private readonly client: AxiosInstance;
  private readonly range: string;
  private readonly interval: string;
  private readonly newsCount: number;

  constructor(options = configManager.getSection('marketData'), client?: AxiosInstance) {
    this.range = options.historyRange;
    this.interval = options.historyInterval;
    this.newsCount = options.newsCount;
    this.client = client ?? axios.create({
      baseURL: options.baseUrl,
      timeout: options.timeout,
      headers: { 'User-Agent': 'Mozilla/5.0 (compatible; stock-analyst-graph/1.0)' },
    });
  }

  async getPriceHistory(symbol: string, signal?: AbortSignal): Promise<HistoricalData> {
    try {
      const response = await this.client.get(`/v8/finance/chart/${encodeURIComponent(symbol)}`, {
        params: { range: this.range, interval: this.interval },
        signal,
      });
      const history = parseChartResponse(symbol, response.data);
      logger.debug(`[YahooFinance] ${symbol}: ${history.close.length} bars (${this.range}/${this.interval})`);
      return history;
    } catch (error) {
      if (error instanceof MarketDataError) throw error;
      throw new MarketDataError(symbol, `Price history request failed: ${safeErrorMessage(error)}`, { cause: error });
    }
  }

  async getIncomeStatements(symbol: string, signal?: AbortSignal): Promise<IncomeStatement[]> {
    try {
      const response = await this.client.get(`/v10/finance/quoteSummary/${encodeURIComponent(symbol)}`, {
        params: { modules: 'incomeStatementHistory' },
        signal,
      });
      return parseIncomeStatements(response.data);
    } catch (error) {
      throw new MarketDataError(symbol, `Income statement request failed: ${safeErrorMessage(error)}`, { cause: error });
    }
  }

  async getNews(symbol: string, signal?: AbortSignal): Promise<RawNewsItem[]> {
    try {
      const response = await this.client.get('/v1/finance/search', {
        params: { q: symbol, quotesCount: 0, newsCount: this.newsCount },
        signal,
      });
      return parseNewsResponse(response.data);
    } catch (error) {
      throw new MarketDataError(symbol, `News request failed: ${safeErrorMessage(error)}`, { cause: error });
    }
  }
}

const yahooFinanceClient = new YahooFinanceClient();
export default yahooFinanceClient;
