// Stock Analyzer - Workflow State
// Fields shared by the data collector, the three analysts and the report generator

import { z } from 'zod';
import {
  HistoricalDataSchema,
  IncomeStatementSchema,
  RawNewsItemSchema,
} from '../market-data/types';
import type { StateSchema } from '../workflow-engine';

export const TechnicalIndicatorsSchema = z.object({
  latestClose: z.number().nullable(),
  movingAverages: z.record(z.string(), z.number().nullable()),   // SMA10 .. SMA200
  rsi14: z.number().nullable(),
  macd: z.object({
    macd: z.number(),
    signal: z.number(),
    histogram: z.number(),
  }).nullable(),
});

export const AnalysisStateSchema = z.object({
  // Input
  stockSymbol: z.string().trim().min(1).toUpperCase(),

  // Data collector
  historicalData: HistoricalDataSchema,
  financials: z.array(IncomeStatementSchema),
  news: z.array(RawNewsItemSchema),

  // Analysts
  technicalIndicators: TechnicalIndicatorsSchema,
  technicalAnalysis: z.string(),
  financialAnalysis: z.string(),
  newsAnalysis: z.string(),

  // Report generator
  report: z.string(),
});

export type AnalysisState = z.infer<typeof AnalysisStateSchema>;
export type TechnicalIndicators = z.infer<typeof TechnicalIndicatorsSchema>;

const AnalysisDeltaSchema = AnalysisStateSchema.partial().strict();

/**
 * Rejects unknown fields and mistyped values in seeds and node outputs
 */
export const analysisStateSchema: StateSchema<AnalysisState> = {
  parse: fields => AnalysisDeltaSchema.parse(fields),
};

export function createInitialState(stockSymbol: string): Partial<AnalysisState> {
  return { stockSymbol };
}
