import { describe, expect, it } from 'vitest';

import { collect } from '../src/catalog/activeUrls.js';
import { CatalogClient, type FetchLike } from '../src/catalog/catalogClient.js';

interface RecordedRequest {
  url: string;
  authorization: string | null;
}

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'content-type': 'application/json' },
  });
}

function fakeFetch(
  pages: Record<string, unknown>,
  requests: RecordedRequest[],
): FetchLike {
  return async (input, init) => {
    const url = new URL(input);
    requests.push({ url: input, authorization: new Headers(init?.headers).get('authorization') });
    const body = pages[url.searchParams.get('offset') ?? '0'];
    return body === undefined ? jsonResponse({ error: 'nope' }, 500) : jsonResponse(body);
  };
}

describe('CatalogClient', () => {
  const baseUrl = 'https://catalog.test';

  it('follows pagination links and yields page URLs', async () => {
    const requests: RecordedRequest[] = [];
    const client = new CatalogClient(
      { baseUrl },
      fakeFetch(
        {
          '0': {
            links: { next: '/api/v0/pages?active=true&offset=2' },
            data: [{ url: 'https://a.gov/1' }, { url: 'https://a.gov/2' }],
          },
          '2': { links: { next: null }, data: [{ url: 'https://b.gov/1' }] },
        },
        requests,
      ),
    );

    const urls = await collect(client.getActiveUrls('*.gov*'));

    expect(urls).toEqual(['https://a.gov/1', 'https://a.gov/2', 'https://b.gov/1']);
    expect(requests.map((request) => request.url)).toEqual([
      'https://catalog.test/api/v0/pages?active=true&chunk_size=1000&url=*.gov*',
      'https://catalog.test/api/v0/pages?active=true&offset=2',
    ]);
  });

  it('omits the url filter without a pattern', async () => {
    const requests: RecordedRequest[] = [];
    const client = new CatalogClient(
      { baseUrl },
      fakeFetch({ '0': { links: {}, data: [] } }, requests),
    );

    await expect(collect(client.getActiveUrls())).resolves.toEqual([]);
    expect(requests[0]?.url).toBe('https://catalog.test/api/v0/pages?active=true&chunk_size=1000');
    expect(requests[0]?.authorization).toBeNull();
  });

  it('sends basic auth when credentials are configured', async () => {
    const requests: RecordedRequest[] = [];
    const client = new CatalogClient(
      { baseUrl, email: 'test@example.com', password: 'test-secret' },
      fakeFetch({ '0': { links: { next: null }, data: [] } }, requests),
    );

    await collect(client.getActiveUrls());

    const expected = `Basic ${Buffer.from('test@example.com:test-secret').toString('base64')}`;
    expect(requests[0]?.authorization).toBe(expected);
  });

  it('fails on error responses', async () => {
    const client = new CatalogClient({ baseUrl }, fakeFetch({}, []));

    await expect(collect(client.getActiveUrls())).rejects.toMatchObject({
      name: 'CatalogError',
      severity: 'fatal',
      message: 'Catalog request failed with HTTP 500.',
    });
  });

  it('fails on malformed pages', async () => {
    const client = new CatalogClient(
      { baseUrl },
      fakeFetch({ '0': { data: [{ href: 'https://a.gov/' }] } }, []),
    );

    await expect(collect(client.getActiveUrls())).rejects.toMatchObject({
      name: 'CatalogError',
      message: 'Catalog response is invalid at "data.0.url".',
    });
  });
});
