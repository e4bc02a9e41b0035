import { readFile } from 'node:fs/promises';

import { createConfigurationError } from '../errors.js';
import { domainKey, hostKey } from '../seeds/grouping/groupUrls.js';
import { describeIssue, precheckExemptionsSchema } from '../schemas.js';
import { PrecheckExemptions } from '../types.js';

export const NO_EXEMPTIONS: PrecheckExemptions = { scope: 'url', entries: [] };

/** Exempt URLs skip the precheck and are always kept; some hosts only answer real browsers. */
export function createExemptionMatcher(exemptions: PrecheckExemptions): (url: string) => boolean {
  const entries = new Set(exemptions.entries);
  if (entries.size === 0) {
    return () => false;
  }

  switch (exemptions.scope) {
    case 'url':
      return (url) => entries.has(url);
    case 'host':
      return (url) => entries.has(hostKey(url));
    case 'domain':
      return (url) => entries.has(domainKey(hostKey(url)));
  }
}

export function parsePrecheckExemptions(raw: unknown, source = 'exemptions'): PrecheckExemptions {
  const result = precheckExemptionsSchema.safeParse(raw);
  if (!result.success) {
    const issue = describeIssue(result.error);
    throw createConfigurationError(
      `${source} is invalid at "${issue.path}".`,
      { source, ...issue.details },
      { cause: result.error },
    );
  }

  return result.data;
}

export async function loadPrecheckExemptions(path: string): Promise<PrecheckExemptions> {
  let text: string;
  try {
    text = await readFile(path, 'utf8');
  } catch (error) {
    throw createConfigurationError(`Unable to read precheck exemptions from "${path}".`, { path }, {
      cause: error,
    });
  }

  try {
    return parsePrecheckExemptions(JSON.parse(text), path);
  } catch (error) {
    if (error instanceof SyntaxError) {
      throw createConfigurationError(`Invalid JSON in "${path}".`, { path }, { cause: error });
    }
    throw error;
  }
}
