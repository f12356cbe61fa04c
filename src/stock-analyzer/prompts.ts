// Stock Analyzer - Prompt Builders
// System roles and user prompts for the language-model nodes

import type { HistoricalData, IncomeStatement } from '../market-data/types';
import type { ChatMessage } from '../shared/types';
import type { NewsArticle } from './nodes/news-analyst';
import type { TechnicalIndicators } from './state';

export const AGENT_ROLES = {
  dataCollector: 'Expert in collecting financial data and historical prices',
  financialAnalyst: 'CFA-certified financial analyst specialised in fundamental analysis',
  newsAnalyst: 'Financial news analyst specialised in market sentiment and NLP',
  technicalAnalyst:
    'Expert technical analyst specialised in chart patterns, moving averages and technical indicators',
  reportGenerator: 'Senior investment analyst and report writer',
} as const;

function conversation(system: string, user: string): ChatMessage[] {
  return [
    { role: 'system', content: system },
    { role: 'user', content: user },
  ];
}

export function financialAnalysisPrompt(symbol: string, financials: IncomeStatement[]): ChatMessage[] {
  const data = financials.length > 0 ? JSON.stringify(financials) : 'No income statements available.';
  return conversation(
    AGENT_ROLES.financialAnalyst,
    `Analyse the following financial data for ${symbol}. ` +
      'Evaluate profitability, liquidity and solvency, and point out significant trends or red flags.\n' +
      `Data: ${data}`
  );
}

export function newsAnalysisPrompt(symbol: string, articles: NewsArticle[]): ChatMessage[] {
  const list = articles.map(({ title, publishDate, summary }) => ({ title, publishDate, summary }));
  return conversation(
    AGENT_ROLES.newsAnalyst,
    `Analyse the following news articles about ${symbol}. ` +
      "Summarise the prevailing market sentiment, the key themes and their likely impact on the stock's performance.\n" +
      `News articles: ${list.length > 0 ? JSON.stringify(list) : 'No recent articles.'}`
  );
}

export function technicalAnalysisPrompt(history: HistoricalData, indicators: TechnicalIndicators): ChatMessage[] {
  const sample = history.dates.map((date, i) => ({ date, close: history.close[i] }));
  return conversation(
    AGENT_ROLES.technicalAnalyst,
    [
      'Using the historical prices (date and closing price) and the computed indicators below, ' +
        'write a detailed technical analysis covering:',
      '1. Short-term trends and patterns.',
      '2. The 10, 30, 50, 100 and 200-day moving averages and their crossovers.',
      '3. Likely support and resistance levels.',
      '4. RSI and MACD readings where relevant.',
      '',
      `Indicators: ${JSON.stringify(indicators)}`,
      `Data sample: ${JSON.stringify(sample)}`,
    ].join('\n')
  );
}

export interface ReportInputs {
  symbol: string;
  financialAnalysis: string;
  newsAnalysis: string;
  technicalAnalysis: string;
  history: HistoricalData;
  historyPoints: number;
}

export function recentCloses(history: HistoricalData, points: number): Array<[string, number]> {
  const pairs = history.dates.map((date, i): [string, number] => [date, history.close[i]]);
  return points > 0 ? pairs.slice(-points) : [];
}

export function reportPrompt(inputs: ReportInputs): ChatMessage[] {
  const closes = recentCloses(inputs.history, inputs.historyPoints);
  return conversation(
    AGENT_ROLES.reportGenerator,
    [
      `Stock: ${inputs.symbol}`,
      '',
      'Financial Analysis Summary:',
      inputs.financialAnalysis,
      '',
      'News Analysis Summary:',
      inputs.newsAnalysis,
      '',
      'Technical Analysis Summary:',
      inputs.technicalAnalysis,
      '',
      `Historical Price Data Snapshot (last ${closes.length} records):`,
      JSON.stringify(closes),
      '',
      'Based on the above, write a comprehensive investment report that includes:',
      "1. An overview of the company's financial health and performance trends.",
      '2. Key takeaways from recent news and market sentiment.',
      '3. A technical view of price trends, including support/resistance levels and patterns.',
      '4. A risk assessment covering market-wide and company-specific risks.',
      '5. A clear investment recommendation backed by the analysis.',
      '',
      'Keep the report structured and concise, with actionable insights.',
    ].join('\n')
  );
}
