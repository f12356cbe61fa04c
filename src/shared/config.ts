import 'dotenv/config';
import fs from 'fs';
import path from 'path';
import { z } from 'zod';
import { Config, Environment, LogLevel } from './types';

const LOG_LEVELS = ['error', 'warn', 'info', 'http', 'verbose', 'debug', 'trace'] as const;
const ENVIRONMENTS = ['development', 'production', 'test'] as const;

// config/config.json may override any subset of each section
const ConfigFileSchema = z.object({
  app: z.object({
    name: z.string(),
    version: z.string(),
    environment: z.enum(ENVIRONMENTS),
    logLevel: z.enum(LOG_LEVELS),
  }).partial().optional(),
  ollama: z.object({
    baseUrl: z.string().url(),
    model: z.string().min(1),
    timeout: z.number().int().positive(),
    temperature: z.number().min(0),
  }).partial().optional(),
  marketData: z.object({
    baseUrl: z.string().url(),
    timeout: z.number().int().positive(),
    historyRange: z.string().min(1),
    historyInterval: z.string().min(1),
    newsCount: z.number().int().nonnegative(),
    newsLookbackDays: z.number().positive(),
    maxNewsArticles: z.number().int().positive(),
    reportHistoryPoints: z.number().int().positive(),
  }).partial().optional(),
  workflow: z.object({
    maxConcurrency: z.number().int().nonnegative(),
    timeoutMs: z.number().int().nonnegative(),
  }).partial().optional(),
});

function parseEnvironment(value: string | undefined): Environment {
  return ENVIRONMENTS.find(env => env === value) ?? 'development';
}

function parseLogLevel(value: string | undefined, environment: Environment): LogLevel {
  return LOG_LEVELS.find(level => level === value) ?? (environment === 'development' ? 'debug' : 'info');
}

class ConfigManager {
  private config: Config;
  private configPath: string;

  constructor(configPath?: string) {
    this.configPath = configPath || process.env.CONFIG_PATH || path.join(__dirname, '../../config/config.json');
    this.config = this.loadConfig();
  }

  private loadConfig(): Config {
    const environment = parseEnvironment(process.env.NODE_ENV);

    const defaultConfig: Config = {
      app: {
        name: 'Stock Analyst Graph',
        version: '1.0.0',
        environment,
        logLevel: parseLogLevel(process.env.LOG_LEVEL, environment),
      },
      ollama: {
        baseUrl: process.env.OLLAMA_BASE_URL || 'http://localhost:11434',
        model: process.env.OLLAMA_MODEL || 'llama3.2',
        timeout: parseInt(process.env.OLLAMA_TIMEOUT || '300000'),
        temperature: parseFloat(process.env.OLLAMA_TEMPERATURE || '0.7'),
      },
      marketData: {
        baseUrl: process.env.YAHOO_FINANCE_BASE_URL || 'https://query2.finance.yahoo.com',
        timeout: parseInt(process.env.YAHOO_FINANCE_TIMEOUT || '30000'),
        historyRange: process.env.HISTORY_RANGE || '1y',
        historyInterval: process.env.HISTORY_INTERVAL || '1d',
        newsCount: parseInt(process.env.NEWS_COUNT || '50'),
        newsLookbackDays: parseFloat(process.env.NEWS_LOOKBACK_DAYS || '15'),
        maxNewsArticles: parseInt(process.env.MAX_NEWS_ARTICLES || '25'),
        reportHistoryPoints: parseInt(process.env.REPORT_HISTORY_POINTS || '90'),
      },
      workflow: {
        maxConcurrency: parseInt(process.env.WORKFLOW_MAX_CONCURRENCY || '0'),
        timeoutMs: parseInt(process.env.WORKFLOW_TIMEOUT_MS || '0'),
      },
    };

    try {
      if (fs.existsSync(this.configPath)) {
        const configData = fs.readFileSync(this.configPath, 'utf8');
        const parsed = ConfigFileSchema.parse(JSON.parse(configData));

        return {
          app: { ...defaultConfig.app, ...parsed.app },
          ollama: { ...defaultConfig.ollama, ...parsed.ollama },
          marketData: { ...defaultConfig.marketData, ...parsed.marketData },
          workflow: { ...defaultConfig.workflow, ...parsed.workflow },
        };
      }
    } catch (error) {
      // The logger reads its level from here, so this path cannot use it
      console.warn(`Could not load config file ${this.configPath}, using defaults:`, error);
    }

    return defaultConfig;
  }

  public get(): Config {
    return this.config;
  }

  public getSection<K extends keyof Config>(section: K): Config[K] {
    return this.config[section];
  }

  public isProduction(): boolean {
    return this.config.app.environment === 'production';
  }

  public isTest(): boolean {
    return this.config.app.environment === 'test';
  }
}

const configManager = new ConfigManager();
export default configManager;
export { ConfigManager };
