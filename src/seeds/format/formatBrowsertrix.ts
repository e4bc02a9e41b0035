import { stringify } from 'yaml';

import { BrowsertrixOptions } from '../../types.js';
import { ARCGIS_GROUP, groupUrls } from '../grouping/groupUrls.js';
import { interleave } from '../grouping/interleave.js';

export type BrowsertrixSeed = string | { url: string; scopeType: 'page-spa'; depth: 0 };

const ROLLOVER_SIZE_BYTES = 8_000_000_000;
// Browsertrix defaults to 90s; some CloudFront-backed sites need longer.
const DEFAULT_PAGE_LOAD_TIMEOUT_S = 120;

/**
 * Orders URLs for a browser crawl: arcgis viewers (heavy on browser memory) run
 * back to back up front, every other domain is interleaved so no single site
 * takes a burst of requests.
 */
export function orderForCrawl(urls: Iterable<string>): string[] {
  const groups = groupUrls(urls, 'domain');
  const arcgis = groups.get(ARCGIS_GROUP) ?? [];
  groups.delete(ARCGIS_GROUP);

  return [...arcgis, ...interleave(...groups.values())];
}

export function toBrowsertrixSeed(url: string): BrowsertrixSeed {
  if (url.includes('#')) {
    return { url, scopeType: 'page-spa', depth: 0 };
  }

  return url;
}

export function buildBrowsertrixConfig(
  urls: Iterable<string>,
  options: BrowsertrixOptions,
): Record<string, unknown> {
  const { workers, saveStateHistory = workers, pageLoadTimeout = DEFAULT_PAGE_LOAD_TIMEOUT_S } =
    options;
  const overrides = options.overrides ?? {};

  return {
    workers,
    saveStateHistory,
    scopeType: 'page',
    rolloverSize: ROLLOVER_SIZE_BYTES,
    pageLoadTimeout,
    ...overrides,
    warcinfo: {
      ...(options.operator ? { operator: options.operator } : {}),
      ...asRecord(overrides.warcinfo),
    },
    seeds: orderForCrawl(urls).map(toBrowsertrixSeed),
  };
}

export function formatBrowsertrix(urls: Iterable<string>, options: BrowsertrixOptions): string {
  return stringify(buildBrowsertrixConfig(urls, options), { sortMapEntries: true });
}

function asRecord(value: unknown): Record<string, unknown> {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    return {};
  }

  return Object.fromEntries(Object.entries(value));
}
