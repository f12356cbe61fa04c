// Node index - exports all stock analysis nodes

export { createDataCollectorNode } from './data-collector';
export { createFinancialAnalystNode } from './financial-analyst';
export { createNewsAnalystNode, selectRecentNews, normalizeNewsItem } from './news-analyst';
export type { NewsArticle, NewsSelection, NewsSelectionOptions } from './news-analyst';
export { createTechnicalAnalystNode, computeTechnicalIndicators, SMA_PERIODS } from './technical-analyst';
export { createReportGeneratorNode } from './report-generator';
