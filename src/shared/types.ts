export type LogLevel = 'error' | 'warn' | 'info' | 'http' | 'verbose' | 'debug' | 'trace';

export type Environment = 'development' | 'production' | 'test';

export interface Config {
  app: {
    name: string;
    version: string;
    environment: Environment;
    logLevel: LogLevel;
  };
  ollama: {
    baseUrl: string;
    model: string;
    timeout: number;
    temperature: number;
  };
  marketData: {
    baseUrl: string;
    timeout: number;
    historyRange: string;
    historyInterval: string;
    newsCount: number;
    newsLookbackDays: number;
    maxNewsArticles: number;
    reportHistoryPoints: number;
  };
  workflow: {
    maxConcurrency: number;   // 0 = unlimited
    timeoutMs: number;        // 0 = no timeout
  };
}

export interface ChatMessage {
  role: 'system' | 'user' | 'assistant';
  content: string;
}

/**
 * Anything that turns a conversation into a single text reply
 */
export interface ChatModel {
  chat(messages: ChatMessage[], signal?: AbortSignal): Promise<string>;
}
