// Data Collector Node
// Fetches price history, income statements and news for the requested symbol

import type { NodeFunction } from '../../workflow-engine';
import { describeError, requireField } from '../../workflow-engine';
import logger from '../../shared/logger';
import type { ResolvedServices } from '../services';
import type { AnalysisState } from '../state';

async function orEmpty<T>(label: string, request: Promise<T[]>): Promise<T[]> {
  try {
    return await request;
  } catch (error) {
    logger.warn(`[DataCollectorNode] ${label} unavailable, continuing without: ${describeError(error)}`);
    return [];
  }
}

/**
 * Price history is required; fundamentals and news are best effort
 */
export function createDataCollectorNode(services: ResolvedServices): NodeFunction<AnalysisState> {
  return async (state, { signal }) => {
    const symbol = requireField(state, 'stockSymbol');
    logger.info(`[DataCollectorNode] Collecting data for ${symbol}`);

    const [historicalData, financials, news] = await Promise.all([
      services.marketData.getPriceHistory(symbol, signal),
      orEmpty('Income statements', services.marketData.getIncomeStatements(symbol, signal)),
      orEmpty('News', services.marketData.getNews(symbol, signal)),
    ]);

    logger.info(
      `[DataCollectorNode] ${symbol}: ${historicalData.close.length} bars, ` +
      `${financials.length} statements, ${news.length} news items`
    );

    return { historicalData, financials, news };
  };
}
