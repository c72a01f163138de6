import { DEFAULT_BASE_URL, listCrawlRequests } from './watercrawl.js';
import type { DatasourceCredentials } from './crawl.js';
import { CredentialValidationError, WatercrawlError } from './errors.js';

export function isValidBaseUrl(baseUrl: string): boolean {
  try {
    const { protocol, host } = new URL(baseUrl);
    return (protocol === 'http:' || protocol === 'https:') && host !== '';
  } catch {
    return false;
  }
}

/**
 * Checks a key against the service by listing a single crawl request.
 * Resolves when the credentials work; rejects with a CredentialValidationError otherwise.
 */
export async function validateCredentials(credentials: DatasourceCredentials): Promise<void> {
  const baseUrl = credentials.base_url || DEFAULT_BASE_URL;
  if (!isValidBaseUrl(baseUrl)) throw new CredentialValidationError('Invalid base URL');
  if (!credentials.api_key) throw new CredentialValidationError('api key is required');

  let response: Awaited<ReturnType<typeof listCrawlRequests>>;
  try {
    response = await listCrawlRequests({ apiKey: credentials.api_key, baseUrl }, 1, 1);
  } catch (err) {
    if (err instanceof WatercrawlError && err.status === 401) {
      throw new CredentialValidationError('Invalid API key', { status: 401, cause: err });
    }
    if (err instanceof WatercrawlError && err.status === 404) {
      throw new CredentialValidationError('Invalid base URL', { status: 404, cause: err });
    }
    throw new CredentialValidationError(err instanceof Error ? err.message : String(err), { cause: err });
  }

  if (response.results === undefined) throw new CredentialValidationError('Invalid URL or API key');
}
