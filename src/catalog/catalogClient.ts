import { CatalogConfig } from '../config.js';
import { createCatalogError } from '../errors.js';
import { componentLogger } from '../logger.js';
import { describeIssue, pagesResponseSchema } from '../schemas.js';

export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

export interface UrlCatalog {
  getActiveUrls(pattern?: string): AsyncIterable<string>;
}

const PAGE_CHUNK_SIZE = 1000;

interface PagesResponse {
  next: string | null;
  urls: string[];
}

/** Read side of the web-monitoring-db pages API. */
export class CatalogClient implements UrlCatalog {
  constructor(
    private readonly config: CatalogConfig,
    private readonly fetchImpl: FetchLike = fetch,
  ) {}

  async *getActiveUrls(pattern?: string): AsyncGenerator<string, void, undefined> {
    const logger = componentLogger('catalog');
    const firstPage = new URL('/api/v0/pages', this.config.baseUrl);
    firstPage.searchParams.set('active', 'true');
    firstPage.searchParams.set('chunk_size', String(PAGE_CHUNK_SIZE));
    if (pattern) {
      firstPage.searchParams.set('url', pattern);
    }

    let next: string | null = firstPage.href;
    let pageCount = 0;

    while (next) {
      const page = await this.fetchPage(next);
      pageCount += 1;
      logger.debug({ page: pageCount, urls: page.urls.length }, 'fetched catalog page');

      yield* page.urls;
      next = page.next ? new URL(page.next, this.config.baseUrl).href : null;
    }
  }

  private async fetchPage(url: string): Promise<PagesResponse> {
    let response: Response;
    try {
      response = await this.fetchImpl(url, { headers: apiHeaders(this.config) });
    } catch (error) {
      throw createCatalogError('Unable to reach the URL catalog.', { url }, { cause: error });
    }

    if (!response.ok) {
      throw createCatalogError(`Catalog request failed with HTTP ${response.status}.`, {
        url,
        status: response.status,
      });
    }

    return parsePagesResponse(await response.json(), url);
  }
}

export function apiHeaders(config: CatalogConfig): Record<string, string> {
  const headers: Record<string, string> = { accept: 'application/json' };
  const { email, password } = config;
  if (email && password) {
    headers.authorization = `Basic ${Buffer.from(`${email}:${password}`).toString('base64')}`;
  }
  return headers;
}

export function parsePagesResponse(body: unknown, url: string): PagesResponse {
  const result = pagesResponseSchema.safeParse(body);
  if (!result.success) {
    const issue = describeIssue(result.error);
    throw createCatalogError(
      `Catalog response is invalid at "${issue.path}".`,
      { url, ...issue.details },
      { cause: result.error },
    );
  }

  const { data, links } = result.data;
  return { next: links?.next ?? null, urls: data.map((page) => page.url) };
}
