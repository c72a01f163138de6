import { parseCrawlRequest } from './params.js';
import type { CrawlRequest } from './params.js';
import {
  createCrawlRequest,
  downloadResult,
  getCrawlRequest,
  getCrawlResults,
  normalizeStatus,
} from './watercrawl.js';
import type { CrawlJob, CrawlResultItem, PageResult, WatercrawlConnection } from './watercrawl.js';
import {
  AuthenticationError,
  CrawlFailedError,
  CrawlJobFailedError,
  CrawlTimeoutError,
} from './errors.js';

export const DEFAULT_POLL_INTERVAL_MS = 5000;
export const DEFAULT_MAX_POLL_ATTEMPTS = 120; // 10 minutes at 5s intervals

export interface CrawledPage {
  source_url: string;
  title: string;
  description: string;
  content: string;
}

export interface WebsiteCrawlMessage {
  status: 'processing' | 'completed';
  total: number;
  completed: number;
  web_info_list: CrawledPage[];
}

export interface PollOptions {
  pollIntervalMs?: number;
  maxPollAttempts?: number;
}

export interface DatasourceCredentials {
  api_key?: string | null;
  base_url?: string | null;
}

function text(value: unknown): string {
  return typeof value === 'string' ? value : '';
}

export function toCrawledPage(url: string, result: PageResult | null): CrawledPage {
  const metadata = result?.metadata ?? {};
  return {
    source_url: url,
    title: text(metadata.title) || text(metadata['og:title']),
    description: text(metadata.description) || text(metadata['og:description']),
    content: result?.markdown || '',
  };
}

async function resolveResult(item: CrawlResultItem): Promise<PageResult | null> {
  if (typeof item.result === 'string') return downloadResult(item.result);
  return item.result;
}

/**
 * Checks the job's status every `pollIntervalMs` and yields each snapshot that
 * is still pending or running. Returns once the job completes; throws when it
 * fails or the attempt bound runs out.
 */
export async function* pollCrawlJob(
  connection: WatercrawlConnection,
  uuid: string,
  { pollIntervalMs = DEFAULT_POLL_INTERVAL_MS, maxPollAttempts = DEFAULT_MAX_POLL_ATTEMPTS }: PollOptions = {},
): AsyncGenerator<CrawlJob, CrawlJob> {
  for (let attempt = 0; attempt < maxPollAttempts; attempt++) {
    if (pollIntervalMs > 0) {
      await new Promise(r => setTimeout(r, pollIntervalMs));
    }

    const job = await getCrawlRequest(connection, uuid);
    const status = normalizeStatus(job.status);

    if (status === 'failed') throw new CrawlJobFailedError(uuid, job.status);
    if (status === 'completed') return job;
    yield job;
  }

  throw new CrawlTimeoutError(uuid, maxPollAttempts);
}

export async function waitForCrawlJob(
  connection: WatercrawlConnection,
  uuid: string,
  options: PollOptions = {},
): Promise<CrawlJob> {
  const poll = pollCrawlJob(connection, uuid, options);
  for (;;) {
    const step = await poll.next();
    if (step.done) return step.value;
  }
}

/** Yields a finished job's pages in service order, fetching one results page at a time. */
export async function* iterateCrawlResults(
  connection: WatercrawlConnection,
  uuid: string,
): AsyncGenerator<CrawledPage> {
  for (let page = 1; ; page++) {
    const batch = await getCrawlResults(connection, uuid, page);
    for (const item of batch.results) {
      yield toCrawledPage(item.url, await resolveResult(item));
    }
    if (!batch.next || batch.results.length === 0) return;
  }
}

export async function submitCrawl(connection: WatercrawlConnection, request: CrawlRequest): Promise<CrawlJob> {
  return createCrawlRequest(
    connection,
    request.url,
    { ...request.spiderOptions },
    { ...request.pageOptions },
  );
}

/**
 * Runs one crawl job end to end: submit, poll until terminal, then stream
 * the pages. The sequence is tied to that job and cannot be restarted.
 */
export async function* crawlPages(
  connection: WatercrawlConnection,
  request: CrawlRequest,
  options: PollOptions = {},
): AsyncGenerator<CrawledPage> {
  const job = await submitCrawl(connection, request);
  await waitForCrawlJob(connection, job.uuid, options);
  yield* iterateCrawlResults(connection, job.uuid);
}

export function connectionFromCredentials(credentials: DatasourceCredentials): WatercrawlConnection {
  if (!credentials.api_key) throw new AuthenticationError('api key is required');
  return { apiKey: credentials.api_key, baseUrl: credentials.base_url || undefined };
}

async function* runWebsiteCrawl(
  parameters: Record<string, unknown>,
  credentials: DatasourceCredentials,
  options: PollOptions,
): AsyncGenerator<WebsiteCrawlMessage> {
  const request = parseCrawlRequest(parameters);
  const connection = connectionFromCredentials(credentials);

  const job = await submitCrawl(connection, request);
  const progress: WebsiteCrawlMessage = {
    status: 'processing',
    total: job.options?.spider_options?.page_limit ?? request.spiderOptions.page_limit,
    completed: 0,
    web_info_list: [],
  };
  yield { ...progress };

  for await (const current of pollCrawlJob(connection, job.uuid, options)) {
    progress.completed = current.number_of_documents ?? 0;
    yield { ...progress };
  }

  const pages: CrawledPage[] = [];
  for await (const page of iterateCrawlResults(connection, job.uuid)) {
    pages.push(page);
  }

  yield { status: 'completed', total: progress.total, completed: pages.length, web_info_list: pages };
}

/**
 * Host entry point. Yields a `processing` message after submission and after
 * every status check, then a single `completed` message carrying every page.
 * Any failure surfaces as a {@link CrawlFailedError} with the typed error as `cause`.
 */
export async function* crawlWebsite(
  parameters: Record<string, unknown>,
  credentials: DatasourceCredentials,
  options: PollOptions = {},
): AsyncGenerator<WebsiteCrawlMessage> {
  try {
    yield* runWebsiteCrawl(parameters, credentials, options);
  } catch (err) {
    throw new CrawlFailedError(err);
  }
}
