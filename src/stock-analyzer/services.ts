// Stock Analyzer - Collaborators
// Everything the nodes talk to outside the workflow state

import type { MarketDataProvider } from '../market-data/types';
import type { ChatModel } from '../shared/types';

export interface StockAnalyzerSettings {
  newsLookbackDays: number;
  maxNewsArticles: number;
  reportHistoryPoints: number;
}

export interface StockAnalyzerServices {
  marketData: MarketDataProvider;
  llm: ChatModel;
  /** Clock used for the news window */
  now?: () => Date;
  settings?: Partial<StockAnalyzerSettings>;
}

export interface ResolvedServices {
  marketData: MarketDataProvider;
  llm: ChatModel;
  now: () => Date;
  settings: StockAnalyzerSettings;
}
