import { createInvalidHostnameError } from '../../errors.js';
import { GroupBy } from '../../types.js';

export const ARCGIS_GROUP = 'arcgis';

export function hostKey(url: string): string {
  let hostname: string;

  try {
    hostname = new URL(url).hostname;
  } catch (error) {
    throw createInvalidHostnameError(url, { cause: error });
  }

  if (!hostname) {
    throw createInvalidHostnameError(url);
  }

  return hostname;
}

/**
 * Approximates the registrable domain with the last two labels of the host.
 * ArcGIS viewers are expensive to crawl, so every arcgis host shares one group.
 */
export function domainKey(hostname: string): string {
  if (hostname.includes(ARCGIS_GROUP)) {
    return ARCGIS_GROUP;
  }

  return hostname.split('.').slice(-2).join('.');
}

export function groupKey(url: string, by: GroupBy): string {
  const hostname = hostKey(url);
  return by === 'host' ? hostname : domainKey(hostname);
}

export function groupUrls(urls: Iterable<string>, by: GroupBy = 'domain'): Map<string, string[]> {
  const groups = new Map<string, string[]>();

  for (const url of urls) {
    const key = groupKey(url, by);
    const members = groups.get(key);
    if (members) {
      members.push(url);
    } else {
      groups.set(key, [url]);
    }
  }

  return groups;
}
