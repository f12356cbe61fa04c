// Market Data Types
// Shapes handed from the market data provider to the analysis workflow

import { z } from 'zod';

export const HistoricalDataSchema = z.object({
  dates: z.array(z.string()),      // YYYY-MM-DD, oldest first
  open: z.array(z.number()),
  high: z.array(z.number()),
  low: z.array(z.number()),
  close: z.array(z.number()),
  volume: z.array(z.number()),
});

export const IncomeStatementSchema = z.object({
  endDate: z.string(),
  metrics: z.record(z.string(), z.number()),
});

// News items are kept as delivered; the news analyst decides what is usable
export const RawNewsItemSchema = z.record(z.string(), z.unknown());

export type HistoricalData = z.infer<typeof HistoricalDataSchema>;
export type IncomeStatement = z.infer<typeof IncomeStatementSchema>;
export type RawNewsItem = z.infer<typeof RawNewsItemSchema>;

export interface MarketDataProvider {
  getPriceHistory(symbol: string, signal?: AbortSignal): Promise<HistoricalData>;
  getIncomeStatements(symbol: string, signal?: AbortSignal): Promise<IncomeStatement[]>;
  getNews(symbol: string, signal?: AbortSignal): Promise<RawNewsItem[]>;
}
