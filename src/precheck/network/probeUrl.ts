import { fetch, type Dispatcher } from 'undici';

import { createProbeError } from '../../errors.js';
import { componentLogger } from '../../logger.js';
import { Verdict } from '../../types.js';
import { classifyProbeError, collectErrorCodes } from './classifyProbeError.js';

export interface ProbeOptions {
  retries: number;
  backoffMs: number;
  userAgent: string;
}

export const DEFAULT_PROBE_OPTIONS: ProbeOptions = {
  retries: 2,
  backoffMs: 500,
  userAgent: 'crawl-seeds/0.1 (reachability precheck)',
};

/**
 * Fetches `url` in full (some servers mishandle HEAD) and reports the network
 * error that made it unreachable, or null if the host answered at all. HTTP
 * error statuses count as answers and are never retried.
 */
export async function probeUrl(
  url: string,
  client: Dispatcher,
  options: ProbeOptions = DEFAULT_PROBE_OPTIONS,
): Promise<Verdict | null> {
  const logger = componentLogger('probe');

  for (let attempt = 0; attempt <= options.retries; attempt += 1) {
    try {
      const response = await fetch(url, {
        dispatcher: client,
        redirect: 'follow',
        headers: {
          'user-agent': options.userAgent,
          accept: 'text/html,application/xhtml+xml,*/*;q=0.9',
        },
      });
      await response.arrayBuffer();

      logger.debug({ url, status: response.status, attempt }, 'host answered');
      return null;
    } catch (error) {
      const verdict = classifyProbeError(error);

      if (verdict === null) {
        const probeError = createProbeError(
          'Unclassified probe failure; treating host as reachable',
          { url, attempt, codes: collectErrorCodes(error) },
          { cause: error },
        );
        logger.debug({ err: probeError, url }, probeError.message);
        return null;
      }

      if (attempt === options.retries) {
        logger.debug({ url, verdict, attempt }, 'network failure, no retries left');
        return verdict;
      }

      logger.debug({ url, verdict, attempt }, 'network failure, retrying');
      await delay(options.backoffMs * 2 ** attempt);
    }
  }

  return null;
}

async function delay(ms: number): Promise<void> {
  await new Promise((resolve) => {
    setTimeout(resolve, ms);
  });
}
