import { parse } from 'yaml';

import { createConfigurationError } from '../errors.js';

/**
 * Folds one `key=value` flag into the accumulated crawl options. Values are
 * read as YAML scalars, so `workers=3` is a number and `text=true` a boolean.
 * Dotted keys nest: `warcinfo.title=Weekly`.
 */
export function parseCrawlOption(
  raw: string,
  previous: Record<string, unknown> = {},
): Record<string, unknown> {
  const separator = raw.indexOf('=');
  if (separator <= 0) {
    throw createConfigurationError(`Crawl option must look like key=value: "${raw}"`, { raw });
  }

  const path = raw.slice(0, separator).trim().split('.');
  const value: unknown = parse(raw.slice(separator + 1));

  return setPath({ ...previous }, path, value);
}

function setPath(
  target: Record<string, unknown>,
  path: string[],
  value: unknown,
): Record<string, unknown> {
  const [head, ...rest] = path;
  if (rest.length === 0) {
    target[head] = value;
    return target;
  }

  const existing = target[head];
  const child: Record<string, unknown> =
    typeof existing === 'object' && existing !== null && !Array.isArray(existing)
      ? { ...existing }
      : {};
  target[head] = setPath(child, rest, value);
  return target;
}
