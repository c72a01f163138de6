export { crawlWebsite, crawlPages, pollCrawlJob, waitForCrawlJob, iterateCrawlResults, submitCrawl, toCrawledPage } from './crawl.js';
export type { CrawledPage, WebsiteCrawlMessage, PollOptions, DatasourceCredentials } from './crawl.js';
export { parseCrawlRequest } from './params.js';
export type { CrawlRequest, DatasourceParameters, SpiderOptions, PageOptions } from './params.js';
export { validateCredentials } from './provider.js';
export * from './errors.js';
export type { CrawlJob, CrawlJobStatus, WatercrawlConnection } from './watercrawl.js';
