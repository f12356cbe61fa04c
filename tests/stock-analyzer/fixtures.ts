/**
 * Fake collaborators for the stock analysis workflow
 */

import type { HistoricalData, IncomeStatement, MarketDataProvider, RawNewsItem } from '../../src/market-data/types';
import type { ChatMessage, ChatModel } from '../../src/shared/types';
import { AGENT_ROLES } from '../../src/stock-analyzer/prompts';

export const NOW = new Date('2024-06-20T00:00:00Z');

export function linearHistory(length: number, start = '2024-01-01'): HistoricalData {
    const first = Date.parse(`${start}T00:00:00Z`);
    const dates = Array.from({ length }, (_, i) => new Date(first + i * 86_400_000).toISOString().slice(0, 10));
    const close = Array.from({ length }, (_, i) => i + 1);
    return {
        dates,
        open: [...close],
        high: close.map(value => value + 0.5),
        low: close.map(value => value - 0.5),
        close,
        volume: close.map(() => 1000),
    };
}

export const STATEMENTS: IncomeStatement[] = [
    { endDate: '2023-12-31', metrics: { totalRevenue: 1000, netIncome: 100 } },
];

export const NEWS: RawNewsItem[] = [
    { title: 'Quarterly results beat estimates', providerPublishTime: Date.parse('2024-06-19T12:00:00Z') / 1000 },
    { title: 'Old story', providerPublishTime: Date.parse('2024-01-02T12:00:00Z') / 1000 },
];

const REPLIES: Record<string, string> = {
    [AGENT_ROLES.financialAnalyst]: 'FINANCIAL',
    [AGENT_ROLES.newsAnalyst]: 'NEWS',
    [AGENT_ROLES.technicalAnalyst]: 'TECHNICAL',
    [AGENT_ROLES.reportGenerator]: 'REPORT',
};

/** Answers by the system role of the conversation */
export class FakeChatModel implements ChatModel {
    public readonly conversations: ChatMessage[][] = [];

    async chat(messages: ChatMessage[]): Promise<string> {
        this.conversations.push(messages);
        return REPLIES[messages[0]?.content ?? ''] ?? 'UNKNOWN';
    }

    promptFor(role: string): string {
        const conversation = this.conversations.find(messages => messages[0]?.content === role);
        return conversation?.[1]?.content ?? '';
    }
}

export class FakeMarketData implements MarketDataProvider {
    public readonly symbols: string[] = [];

    constructor(
        private readonly history: HistoricalData = linearHistory(120),
        private readonly failures: { history?: Error; statements?: Error; news?: Error } = {}
    ) {}

    async getPriceHistory(symbol: string): Promise<HistoricalData> {
        this.symbols.push(symbol);
        if (this.failures.history) throw this.failures.history;
        return this.history;
    }

    async getIncomeStatements(): Promise<IncomeStatement[]> {
        if (this.failures.statements) throw this.failures.statements;
        return STATEMENTS;
    }

    async getNews(): Promise<RawNewsItem[]> {
        if (this.failures.news) throw this.failures.news;
        return NEWS;
    }
}
