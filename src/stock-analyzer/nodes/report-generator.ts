// Report Generator Node
// Combines the three analyses into the final investment report

import type { NodeFunction } from '../../workflow-engine';
import { requireField } from '../../workflow-engine';
import logger from '../../shared/logger';
import { reportPrompt } from '../prompts';
import type { ResolvedServices } from '../services';
import type { AnalysisState } from '../state';

export function createReportGeneratorNode(services: ResolvedServices): NodeFunction<AnalysisState> {
  return async (state, { signal }) => {
    const symbol = requireField(state, 'stockSymbol');
    logger.info(`[ReportGeneratorNode] Writing report for ${symbol}`);

    const report = await services.llm.chat(reportPrompt({
      symbol,
      financialAnalysis: requireField(state, 'financialAnalysis'),
      newsAnalysis: requireField(state, 'newsAnalysis'),
      technicalAnalysis: requireField(state, 'technicalAnalysis'),
      history: requireField(state, 'historicalData'),
      historyPoints: services.settings.reportHistoryPoints,
    }), signal);

    return { report };
  };
}
