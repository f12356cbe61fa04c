/**
 * News Selection Unit Tests
 */

import { normalizeNewsItem, selectRecentNews } from '../../src/stock-analyzer/nodes/news-analyst';
import type { RawNewsItem } from '../../src/market-data/types';
import { NOW } from './fixtures';

const seconds = (iso: string) => Date.parse(iso) / 1000;

describe('normalizeNewsItem', () => {

    it('should read search results', () => {
        expect(normalizeNewsItem({
            title: 'Fresh',
            providerPublishTime: seconds('2024-06-19T12:00:00Z'),
            publisher: 'Wire',
        })).toEqual({
            title: 'Fresh',
            publisher: 'Wire',
            publishDate: '2024-06-19',
            publishedAtMs: Date.parse('2024-06-19T12:00:00Z'),
            summary: '',
        });
    });

    it('should read items nested under content', () => {
        expect(normalizeNewsItem({
            content: {
                pubDate: '2024-06-18T08:00:00+02:00',
                summary: 'Guidance raised',
                provider: { displayName: 'Daily' },
            },
        })).toEqual({
            title: 'No Title',
            publisher: 'Daily',
            publishDate: '2024-06-18',
            publishedAtMs: Date.parse('2024-06-18T06:00:00Z'),
            summary: 'Guidance raised',
        });
    });

    it('should return null for malformed items', () => {
        expect(normalizeNewsItem({ foo: 'bar' })).toBeNull();
        expect(normalizeNewsItem({ content: { pubDate: 'yesterday' } })).toBeNull();
        expect(normalizeNewsItem({ title: 'No time' })).toBeNull();
    });
});

describe('selectRecentNews', () => {

    it('should filter by age, skip malformed items and sort newest first', () => {
        const items: RawNewsItem[] = [
            { title: 'Older', providerPublishTime: seconds('2024-06-10T00:00:00Z') },
            { foo: 'bar' },
            { title: 'Stale', providerPublishTime: seconds('2024-05-01T00:00:00Z') },
            { content: { title: 'Newest', pubDate: '2024-06-19T23:00:00Z' } },
            { content: { pubDate: 'not a date' } },
        ];

        const { articles, skipped } = selectRecentNews(items, NOW, { lookbackDays: 15, limit: 25 });

        expect(articles.map(article => article.title)).toEqual(['Newest', 'Older']);
        expect(skipped).toBe(2);
    });

    it('should exclude articles exactly at the cut-off', () => {
        const items: RawNewsItem[] = [
            { title: 'Boundary', providerPublishTime: seconds('2024-06-05T00:00:00Z') },
            { title: 'Inside', providerPublishTime: seconds('2024-06-05T00:00:01Z') },
        ];

        const { articles } = selectRecentNews(items, NOW, { lookbackDays: 15, limit: 25 });

        expect(articles.map(article => article.title)).toEqual(['Inside']);
    });

    it('should cap the number of articles', () => {
        const items: RawNewsItem[] = Array.from({ length: 30 }, (_, i) => ({
            title: `Story ${i}`,
            providerPublishTime: seconds('2024-06-19T00:00:00Z') - i * 3600,
        }));

        const { articles } = selectRecentNews(items, NOW, { lookbackDays: 15, limit: 25 });

        expect(articles).toHaveLength(25);
        expect(articles[0].title).toBe('Story 0');
        expect(articles[24].title).toBe('Story 24');
    });
});
