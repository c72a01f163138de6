import { z } from 'zod';
import type { PageOptions, SpiderOptions } from './params.js';
import { AuthenticationError, TransportError, ValidationError } from './errors.js';

export const DEFAULT_BASE_URL = 'https://app.watercrawl.dev';
const CRAWL_REQUESTS_PATH = '/api/v1/core/crawl-requests/';
const REQUEST_TIMEOUT_MS = 30000;
export const RESULTS_PAGE_SIZE = 50;

export interface WatercrawlConnection {
  apiKey: string;
  baseUrl?: string;
}

const watercrawlStatusSchema = z.enum(['new', 'running', 'cancelling', 'canceled', 'finished', 'failed']);

export type WatercrawlStatus = z.infer<typeof watercrawlStatusSchema>;
export type CrawlJobStatus = 'pending' | 'running' | 'completed' | 'failed';

const crawlJobSchema = z.object({
  uuid: z.string().min(1),
  url: z.string().optional(),
  status: watercrawlStatusSchema,
  number_of_documents: z.number().nullish(),
  options: z.object({
    spider_options: z.object({ page_limit: z.number().optional() }).optional(),
  }).nullish(),
});

export type CrawlJob = z.infer<typeof crawlJobSchema>;

const pageResultSchema = z.object({
  markdown: z.string().nullish(),
  metadata: z.record(z.unknown()).nullish(),
});

export type PageResult = z.infer<typeof pageResultSchema>;

const crawlResultItemSchema = z.object({
  uuid: z.string().optional(),
  url: z.string(),
  // Inline when requested with prefetched=true, otherwise a download URL.
  result: z.union([z.string(), pageResultSchema]).nullable(),
});

export type CrawlResultItem = z.infer<typeof crawlResultItemSchema>;

const crawlResultsSchema = z.object({
  count: z.number().optional(),
  next: z.string().nullish(),
  previous: z.string().nullish(),
  results: z.array(crawlResultItemSchema),
});

export type CrawlResults = z.infer<typeof crawlResultsSchema>;

// `results` stays optional here: credential checks report its absence themselves.
const crawlRequestListSchema = z.object({
  count: z.number().optional(),
  results: z.array(z.unknown()).optional(),
});

export type CrawlRequestList = z.infer<typeof crawlRequestListSchema>;

export function normalizeStatus(status: WatercrawlStatus): CrawlJobStatus {
  switch (status) {
    case 'new': return 'pending';
    case 'running':
    case 'cancelling': return 'running';
    case 'finished': return 'completed';
    case 'failed':
    case 'canceled': return 'failed';
  }
}

function apiUrl(connection: WatercrawlConnection, path: string, query?: Record<string, string | number | boolean>): string {
  const base = (connection.baseUrl || DEFAULT_BASE_URL).replace(/\/+$/, '');
  const url = new URL(`${base}${path}`);
  for (const [key, value] of Object.entries(query ?? {})) {
    url.searchParams.set(key, String(value));
  }
  return url.toString();
}

async function errorDetail(res: Response): Promise<string> {
  const body = await res.text().catch(() => '');
  return body ? `: ${body}` : '';
}

async function send(url: string, init: RequestInit): Promise<Response> {
  let res: Response;
  try {
    res = await fetch(url, { ...init, signal: AbortSignal.timeout(REQUEST_TIMEOUT_MS) });
  } catch (err) {
    throw new TransportError(`Watercrawl request failed: ${(err as Error).message}`, { cause: err });
  }
  if (res.ok) return res;

  const detail = await errorDetail(res);
  if (res.status === 401 || res.status === 403) {
    throw new AuthenticationError(`Watercrawl rejected the API key (${res.status})${detail}`, { status: res.status });
  }
  if (res.status === 400 || res.status === 422) {
    throw new ValidationError(`Watercrawl rejected the request (${res.status})${detail}`, { status: res.status });
  }
  throw new TransportError(`Watercrawl error ${res.status}${detail}`, { status: res.status });
}

async function readReply<S extends z.ZodTypeAny>(res: Response, schema: S): Promise<z.infer<S>> {
  let body: unknown;
  try {
    body = await res.json();
  } catch (err) {
    throw new TransportError(`Watercrawl returned invalid JSON: ${(err as Error).message}`, { cause: err });
  }
  const parsed = schema.safeParse(body);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new TransportError(`Unexpected Watercrawl reply: ${issue.path.join('.') || '(root)'}: ${issue.message}`);
  }
  return parsed.data;
}

async function request<S extends z.ZodTypeAny>(
  connection: WatercrawlConnection,
  path: string,
  schema: S,
  init: { method?: string; body?: unknown; query?: Record<string, string | number | boolean> } = {},
): Promise<z.infer<S>> {
  const headers: Record<string, string> = {
    'X-API-Key': connection.apiKey,
    'Accept': 'application/json',
  };
  if (init.body !== undefined) headers['Content-Type'] = 'application/json';

  const res = await send(apiUrl(connection, path, init.query), {
    method: init.method ?? 'GET',
    headers,
    body: init.body === undefined ? undefined : JSON.stringify(init.body),
  });
  return readReply(res, schema);
}

export async function createCrawlRequest(
  connection: WatercrawlConnection,
  url: string,
  spiderOptions: SpiderOptions,
  pageOptions: PageOptions,
): Promise<CrawlJob> {
  return request(connection, CRAWL_REQUESTS_PATH, crawlJobSchema, {
    method: 'POST',
    body: {
      url,
      options: {
        spider_options: spiderOptions,
        page_options: pageOptions,
        plugin_options: {},
      },
    },
  });
}

export async function getCrawlRequest(connection: WatercrawlConnection, uuid: string): Promise<CrawlJob> {
  return request(connection, `${CRAWL_REQUESTS_PATH}${encodeURIComponent(uuid)}/`, crawlJobSchema);
}

export async function getCrawlResults(
  connection: WatercrawlConnection,
  uuid: string,
  page = 1,
  pageSize = RESULTS_PAGE_SIZE,
): Promise<CrawlResults> {
  return request(
    connection,
    `${CRAWL_REQUESTS_PATH}${encodeURIComponent(uuid)}/results/`,
    crawlResultsSchema,
    { query: { page, page_size: pageSize, prefetched: true } },
  );
}

/** Result links are pre-signed and take no API key. */
export async function downloadResult(resultUrl: string): Promise<PageResult> {
  const res = await send(resultUrl, { headers: { 'Accept': 'application/json' } });
  return readReply(res, pageResultSchema);
}

export async function listCrawlRequests(
  connection: WatercrawlConnection,
  page = 1,
  pageSize = 10,
): Promise<CrawlRequestList> {
  return request(connection, CRAWL_REQUESTS_PATH, crawlRequestListSchema, {
    query: { page, page_size: pageSize },
  });
}
