import { z } from 'zod';
import { ValidationError } from './errors.js';

export interface SpiderOptions {
  max_depth: number;
  page_limit: number;
  include_paths: string[];
  exclude_paths: string[];
  allowed_domains?: string[];
  proxy_server?: string;
}

export interface PageOptions {
  only_main_content: boolean;
  ignore_rendering: boolean;
  include_tags?: string[];
  exclude_tags?: string[];
  locale?: string;
  extra_headers?: Record<string, string>;
}

export interface CrawlRequest {
  readonly url: string;
  readonly spiderOptions: Readonly<SpiderOptions>;
  readonly pageOptions: Readonly<PageOptions>;
}

// Form fields arrive as strings, so flags accept "true"/"false" too.
const flag = z
  .union([z.boolean(), z.enum(['true', 'false']).transform(v => v === 'true')])
  .nullish();

const count = z.coerce.number().int().nonnegative().nullish();
const text = z.string().nullish();

const parametersSchema = z.object({
  url: text,
  max_depth: count,
  limit: count,
  ignore_rendering: flag,
  include_paths: text,
  exclude_paths: text,
  only_main_content: flag,
  proxy_server_slug: text,
  allowed_domains: text,
  include_tags: text,
  exclude_tags: text,
  locale: text,
  extra_headers: text,
});

export type DatasourceParameters = z.input<typeof parametersSchema>;

const headersSchema = z.record(z.string());

export function splitList(value: string | null | undefined): string[] {
  if (!value) return [];
  return value.split(',').map(s => s.trim()).filter(Boolean);
}

function parseExtraHeaders(raw: string): Record<string, string> {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (err) {
    throw new ValidationError('extra_headers must be valid JSON', { cause: err });
  }
  const result = headersSchema.safeParse(parsed);
  if (!result.success) {
    throw new ValidationError('extra_headers must be a JSON object of string values');
  }
  return result.data;
}

export function parseCrawlRequest(parameters: Record<string, unknown>): CrawlRequest {
  const parsed = parametersSchema.safeParse(parameters);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new ValidationError(`Invalid parameter ${issue.path.join('.')}: ${issue.message}`);
  }
  const p = parsed.data;

  const url = p.url?.trim();
  if (!url) throw new ValidationError('Url is required');

  const spiderOptions: SpiderOptions = {
    max_depth: p.max_depth || 1,
    page_limit: p.limit || 1,
    include_paths: splitList(p.include_paths),
    exclude_paths: splitList(p.exclude_paths),
  };
  const allowedDomains = splitList(p.allowed_domains);
  if (allowedDomains.length > 0) spiderOptions.allowed_domains = allowedDomains;
  if (p.proxy_server_slug) spiderOptions.proxy_server = p.proxy_server_slug;

  const pageOptions: PageOptions = {
    only_main_content: p.only_main_content ?? false,
    ignore_rendering: p.ignore_rendering ?? false,
  };
  const includeTags = splitList(p.include_tags);
  const excludeTags = splitList(p.exclude_tags);
  if (includeTags.length > 0) pageOptions.include_tags = includeTags;
  if (excludeTags.length > 0) pageOptions.exclude_tags = excludeTags;
  if (p.locale) pageOptions.locale = p.locale;
  if (p.extra_headers) {
    const headers = parseExtraHeaders(p.extra_headers);
    if (Object.keys(headers).length > 0) pageOptions.extra_headers = headers;
  }

  return Object.freeze({
    url,
    spiderOptions: Object.freeze(spiderOptions),
    pageOptions: Object.freeze(pageOptions),
  });
}
