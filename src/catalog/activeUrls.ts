import { readFile } from 'node:fs/promises';

import { createConfigurationError } from '../errors.js';
import { describeIssue, ignoreListSchema } from '../schemas.js';
import { UrlCatalog } from './catalogClient.js';
import { matchesAntiPattern, parseUrlPattern } from './pattern.js';

export interface ActiveUrlOptions {
  pattern?: string;
  ignore?: ReadonlySet<string>;
}

/** Active catalog URLs minus the ignore list and anything matching an anti-pattern. */
export async function* activeUrls(
  catalog: UrlCatalog,
  options: ActiveUrlOptions = {},
): AsyncGenerator<string, void, undefined> {
  const { query, exclude } = parseUrlPattern(options.pattern);
  const ignore = options.ignore ?? new Set<string>();

  for await (const url of catalog.getActiveUrls(query)) {
    if (ignore.has(url)) {
      continue;
    }
    if (exclude && matchesAntiPattern(url, exclude)) {
      continue;
    }
    yield url;
  }
}

export async function collect<T>(items: AsyncIterable<T>): Promise<T[]> {
  const collected: T[] = [];
  for await (const item of items) {
    collected.push(item);
  }
  return collected;
}

/**
 * Reads the ignore list: a JSON object whose values are lists of URLs, one list
 * per reason (e.g. dead servers, empty 404 pages).
 */
export async function loadIgnoreList(path: string): Promise<Set<string>> {
  let parsed: unknown;
  try {
    parsed = JSON.parse(await readFile(path, 'utf8'));
  } catch (error) {
    throw createConfigurationError(`Unable to load ignore list from "${path}".`, { path }, {
      cause: error,
    });
  }

  const result = ignoreListSchema.safeParse(parsed);
  if (!result.success) {
    const issue = describeIssue(result.error);
    throw createConfigurationError(
      `Ignore list "${path}" is invalid at "${issue.path}".`,
      { file: path, ...issue.details },
      { cause: result.error },
    );
  }

  return new Set(Object.values(result.data).flat());
}
