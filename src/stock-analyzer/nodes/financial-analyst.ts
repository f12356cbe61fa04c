// Financial Analyst Node
// Fundamental analysis of the collected income statements

import type { NodeFunction } from '../../workflow-engine';
import { requireField } from '../../workflow-engine';
import logger from '../../shared/logger';
import { financialAnalysisPrompt } from '../prompts';
import type { ResolvedServices } from '../services';
import type { AnalysisState } from '../state';

export function createFinancialAnalystNode(services: ResolvedServices): NodeFunction<AnalysisState> {
  return async (state, { signal }) => {
    const symbol = requireField(state, 'stockSymbol');
    const financials = requireField(state, 'financials');
    logger.info(`[FinancialAnalystNode] Analysing ${financials.length} statements for ${symbol}`);

    const financialAnalysis = await services.llm.chat(financialAnalysisPrompt(symbol, financials), signal);
    return { financialAnalysis };
  };
}
