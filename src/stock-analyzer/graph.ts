// Stock Analyzer - Workflow Graph
// data_collector fans out to three analysts, which fan back in to report_generator

import { CompiledWorkflow, END, NodeRegistry, RunOptions, RunResult, requireField } from '../workflow-engine';
import yahooFinanceClient from '../market-data/yahoo-finance-client';
import configManager from '../shared/config';
import logger from '../shared/logger';
import ollamaService from '../shared/ollama-service';
import {
  createDataCollectorNode,
  createFinancialAnalystNode,
  createNewsAnalystNode,
  createReportGeneratorNode,
  createTechnicalAnalystNode,
} from './nodes';
import type { ResolvedServices, StockAnalyzerServices } from './services';
import { AnalysisState, analysisStateSchema, createInitialState } from './state';

export const NODE_NAMES = {
  dataCollector: 'data_collector',
  financialAnalyst: 'financial_analyst',
  newsAnalyst: 'news_analyst',
  technicalAnalyst: 'technical_analyst',
  reportGenerator: 'report_generator',
} as const;

function resolveServices(services: StockAnalyzerServices): ResolvedServices {
  const marketData = configManager.getSection('marketData');
  return {
    marketData: services.marketData,
    llm: services.llm,
    now: services.now ?? (() => new Date()),
    settings: {
      newsLookbackDays: services.settings?.newsLookbackDays ?? marketData.newsLookbackDays,
      maxNewsArticles: services.settings?.maxNewsArticles ?? marketData.maxNewsArticles,
      reportHistoryPoints: services.settings?.reportHistoryPoints ?? marketData.reportHistoryPoints,
    },
  };
}

export function buildStockAnalysisGraph(
  services: StockAnalyzerServices = { marketData: yahooFinanceClient, llm: ollamaService }
): CompiledWorkflow<AnalysisState> {
  const resolved = resolveServices(services);
  const { dataCollector, financialAnalyst, newsAnalyst, technicalAnalyst, reportGenerator } = NODE_NAMES;

  const registry = new NodeRegistry<AnalysisState>({ schema: analysisStateSchema });

  registry
    .register(dataCollector, createDataCollectorNode(resolved), [], {
      reads: ['stockSymbol'],
      writes: ['historicalData', 'financials', 'news'],
    })
    .register(financialAnalyst, createFinancialAnalystNode(resolved), [], {
      reads: ['stockSymbol', 'financials'],
      writes: ['financialAnalysis'],
    })
    .register(newsAnalyst, createNewsAnalystNode(resolved), [], {
      reads: ['stockSymbol', 'news'],
      writes: ['newsAnalysis'],
    })
    .register(technicalAnalyst, createTechnicalAnalystNode(resolved), [], {
      reads: ['historicalData'],
      writes: ['technicalIndicators', 'technicalAnalysis'],
    })
    .register(
      reportGenerator,
      createReportGeneratorNode(resolved),
      [financialAnalyst, newsAnalyst, technicalAnalyst],
      {
        reads: ['stockSymbol', 'historicalData', 'financialAnalysis', 'newsAnalysis', 'technicalAnalysis'],
        writes: ['report'],
      }
    );

  registry.setEntry(dataCollector);
  registry.addEdge(dataCollector, financialAnalyst);
  registry.addEdge(dataCollector, newsAnalyst);
  registry.addEdge(dataCollector, technicalAnalyst);
  registry.addEdge(reportGenerator, END);

  return registry.compile();
}

function workflowRunOptions(overrides: RunOptions): RunOptions {
  const { maxConcurrency, timeoutMs } = configManager.getSection('workflow');
  return {
    maxConcurrency: maxConcurrency > 0 ? maxConcurrency : undefined,
    timeoutMs: timeoutMs > 0 ? timeoutMs : undefined,
    ...overrides,
  };
}

export async function runStockAnalysis(
  symbol: string,
  services?: StockAnalyzerServices,
  runOptions: RunOptions = {}
): Promise<RunResult<AnalysisState>> {
  const workflow = buildStockAnalysisGraph(services);
  const result = await workflow.run(createInitialState(symbol), workflowRunOptions(runOptions));

  if (result.ok) {
    logger.info(`[StockAnalyzer] Run ${result.runId} finished for ${result.state.stockSymbol}`);
  } else {
    logger.error(`[StockAnalyzer] Run ${result.runId} failed: ${result.error.message}`);
  }
  return result;
}

/**
 * Run the whole pipeline and return the report text.
 * Rejects with the WorkflowError or WorkflowCancelledError of a failed run.
 */
export async function analyzeStock(
  symbol: string,
  services?: StockAnalyzerServices,
  runOptions: RunOptions = {}
): Promise<string> {
  const result = await runStockAnalysis(symbol, services, runOptions);
  if (!result.ok) {
    throw result.error;
  }
  return requireField(result.state, 'report');
}
