import pLimit from 'p-limit';
import type { Dispatcher } from 'undici';

import { componentLogger } from '../logger.js';
import { groupUrls } from '../seeds/grouping/groupUrls.js';
import { PrecheckExemptions, PrecheckLog, PrecheckResult, Verdict } from '../types.js';
import { reportSeedsError } from '../util/errorHandler.js';
import { NO_EXEMPTIONS, createExemptionMatcher } from './exemptions.js';
import { ProbeClientPool } from './network/clientPool.js';
import { DEFAULT_PROBE_OPTIONS, ProbeOptions, probeUrl } from './network/probeUrl.js';

export type ProbeFn = (url: string, client: Dispatcher) => Promise<Verdict | null>;

export interface PrecheckOptions {
  concurrency: number;
  connectTimeoutMs: number;
  readTimeoutMs: number;
  probe: ProbeOptions;
  exemptions: PrecheckExemptions;
  probeFn?: ProbeFn;
  onResult?(host: string, verdict: Verdict | null): void;
  now?(): Date;
}

export const DEFAULT_PRECHECK_OPTIONS: PrecheckOptions = {
  concurrency: 5,
  // Target servers are sometimes very slow to accept connections.
  connectTimeoutMs: 60_000,
  readTimeoutMs: 10_000,
  probe: DEFAULT_PROBE_OPTIONS,
  exemptions: NO_EXEMPTIONS,
};

interface HostCheck {
  host: string;
  checked: string[];
  exempt: string[];
}

interface HostOutcome {
  verdict: Verdict | null;
  timestamp: string;
}

/**
 * Probes one URL per host and drops every URL of a host that is unreachable.
 * Results are assembled by host after all probes finish, so neither the log
 * nor the reachable list depends on which probe completes first.
 */
class PrecheckRunner {
  private readonly pool: ProbeClientPool;
  private readonly limiter: ReturnType<typeof pLimit>;
  private readonly outcomes = new Map<string, HostOutcome>();
  private readonly probeFn: ProbeFn;
  private readonly now: () => Date;
  private readonly logger = componentLogger('precheck');

  constructor(private readonly options: PrecheckOptions) {
    this.pool = new ProbeClientPool(options.concurrency, {
      connectTimeoutMs: options.connectTimeoutMs,
      readTimeoutMs: options.readTimeoutMs,
    });
    this.limiter = pLimit(options.concurrency);
    this.probeFn = options.probeFn ?? ((url, client) => probeUrl(url, client, options.probe));
    this.now = options.now ?? (() => new Date());
  }

  async run(urls: string[]): Promise<PrecheckResult> {
    const isExempt = createExemptionMatcher(this.options.exemptions);
    const checks = this.planChecks(urls, isExempt);

    try {
      await Promise.all(checks.map((check) => this.limiter(() => this.checkHost(check))));
    } finally {
      await this.pool.close();
    }

    const unreachable = new Set<string>();
    const log: PrecheckLog = {};

    for (const check of checks) {
      const outcome = this.outcomes.get(check.host) ?? {
        verdict: null,
        timestamp: timestampOf(this.now()),
      };

      log[check.host] = {
        timestamp: outcome.timestamp,
        error: outcome.verdict,
        urls: outcome.verdict ? check.checked : [],
      };

      if (outcome.verdict) {
        for (const url of check.checked) {
          unreachable.add(url);
        }
      }
    }

    this.logger.info(
      { hosts: checks.length, unreachableUrls: unreachable.size },
      'precheck complete',
    );

    return {
      reachable: urls.filter((url) => !unreachable.has(url)),
      log,
    };
  }

  private planChecks(urls: string[], isExempt: (url: string) => boolean): HostCheck[] {
    return [...groupUrls(urls, 'host')].map(([host, hostUrls]) => ({
      host,
      checked: hostUrls.filter((url) => !isExempt(url)),
      exempt: hostUrls.filter((url) => isExempt(url)),
    }));
  }

  private async checkHost(check: HostCheck): Promise<void> {
    const [representative] = check.checked;
    let verdict: Verdict | null = null;

    if (representative === undefined) {
      this.logger.debug({ host: check.host, exempt: check.exempt.length }, 'host exempt from precheck');
    } else {
      verdict = await this.probe(check.host, representative);
    }

    this.outcomes.set(check.host, { verdict, timestamp: timestampOf(this.now()) });
    this.options.onResult?.(check.host, verdict);
  }

  private async probe(host: string, url: string): Promise<Verdict | null> {
    try {
      return await this.pool.use((client) => this.probeFn(url, client));
    } catch (error) {
      reportSeedsError(
        error,
        { stage: 'precheck', host, url },
        { defaultKind: 'probe', defaultSeverity: 'recoverable', throwOnFatal: false },
      );
      return null;
    }
  }
}

export async function precheckHosts(
  urls: Iterable<string>,
  options: Partial<PrecheckOptions> = {},
): Promise<PrecheckResult> {
  const runner = new PrecheckRunner({ ...DEFAULT_PRECHECK_OPTIONS, ...options });
  return runner.run([...urls]);
}

// Log consumers expect UTC with a `Z` suffix.
function timestampOf(date: Date): string {
  return date.toISOString();
}
