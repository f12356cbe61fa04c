// Technical Analyst Node
// Computes moving averages, RSI and MACD, then asks the model to interpret them

import * as technicalIndicators from 'technicalindicators';
import type { NodeFunction } from '../../workflow-engine';
import { requireField } from '../../workflow-engine';
import type { HistoricalData } from '../../market-data/types';
import logger from '../../shared/logger';
import { technicalAnalysisPrompt } from '../prompts';
import type { ResolvedServices } from '../services';
import type { AnalysisState, TechnicalIndicators } from '../state';

export const SMA_PERIODS = [10, 30, 50, 100, 200] as const;
const RSI_PERIOD = 14;

function last(values: readonly number[]): number | null {
  return values.length > 0 ? values[values.length - 1] : null;
}

/**
 * Latest value of each indicator, or null where the history is too short
 */
export function computeTechnicalIndicators(history: HistoricalData): TechnicalIndicators {
  const closes = history.close;

  const movingAverages: Record<string, number | null> = {};
  for (const period of SMA_PERIODS) {
    movingAverages[`sma${period}`] = closes.length >= period
      ? last(technicalIndicators.SMA.calculate({ period, values: closes }))
      : null;
  }

  const rsi14 = closes.length > RSI_PERIOD
    ? last(technicalIndicators.RSI.calculate({ period: RSI_PERIOD, values: closes }))
    : null;

  const macdSeries = technicalIndicators.MACD.calculate({
    values: closes,
    fastPeriod: 12,
    slowPeriod: 26,
    signalPeriod: 9,
    SimpleMAOscillator: false,
    SimpleMASignal: false,
  });
  const latest = macdSeries.length > 0 ? macdSeries[macdSeries.length - 1] : undefined;
  let macd: TechnicalIndicators['macd'] = null;
  if (latest) {
    const { MACD: line, signal, histogram } = latest;
    // signal and histogram stay undefined until signalPeriod MACD values exist
    if (line !== undefined && signal !== undefined && histogram !== undefined) {
      macd = { macd: line, signal, histogram };
    }
  }

  return { latestClose: last(closes), movingAverages, rsi14, macd };
}

export function createTechnicalAnalystNode(services: ResolvedServices): NodeFunction<AnalysisState> {
  return async (state, { signal }) => {
    const history = requireField(state, 'historicalData');
    const indicators = computeTechnicalIndicators(history);
    logger.info(
      `[TechnicalAnalystNode] ${history.close.length} bars, RSI14=${indicators.rsi14?.toFixed(2) ?? 'n/a'}`
    );

    const technicalAnalysis = await services.llm.chat(technicalAnalysisPrompt(history, indicators), signal);
    return { technicalIndicators: indicators, technicalAnalysis };
  };
}
