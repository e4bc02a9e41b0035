import { FetchLike, apiHeaders } from '../catalog/catalogClient.js';
import { CatalogConfig } from '../config.js';
import { createImportError } from '../errors.js';
import { componentLogger } from '../logger.js';
import { describeIssue, importJobResponseSchema } from '../schemas.js';
import { ImportJobResult, NetworkErrorRecord } from '../types.js';

export interface ImportOptions {
  batchSize?: number;
  pollIntervalMs?: number;
  maxPolls?: number;
}

const DEFAULT_BATCH_SIZE = 1000;
const DEFAULT_POLL_INTERVAL_MS = 1_000;
const DEFAULT_MAX_POLLS = 600;

const IN_PROGRESS_STATUSES: ReadonlySet<string> = new Set(['pending', 'processing']);

interface ImportJobStatus {
  id: number;
  status: string;
  errors: string[];
}

/** Write side of the web-monitoring-db API: bulk version imports. */
export class ImportClient {
  constructor(
    private readonly config: CatalogConfig,
    private readonly fetchImpl: FetchLike = fetch,
  ) {}

  async importRecords(
    records: NetworkErrorRecord[],
    options: ImportOptions = {},
  ): Promise<ImportJobResult[]> {
    const batchSize = options.batchSize ?? DEFAULT_BATCH_SIZE;
    const polling = {
      intervalMs: options.pollIntervalMs ?? DEFAULT_POLL_INTERVAL_MS,
      maxPolls: options.maxPolls ?? DEFAULT_MAX_POLLS,
    };
    const logger = componentLogger('import');
    const jobIds: number[] = [];

    for (let start = 0; start < records.length; start += batchSize) {
      const batch = records.slice(start, start + batchSize);
      const job = await this.startJob(batch);
      logger.debug({ jobId: job.id, records: batch.length }, 'started import job');
      jobIds.push(job.id);
    }

    const results: ImportJobResult[] = [];
    for (const jobId of jobIds) {
      const job = await this.waitForJob(jobId, polling);
      results.push({ jobId, errorCount: job.errors.length, errors: job.errors });
    }

    return results;
  }

  private async startJob(records: NetworkErrorRecord[]): Promise<ImportJobStatus> {
    const url = new URL('/api/v0/imports', this.config.baseUrl);
    url.searchParams.set('update', 'skip');

    const body = records.map((record) => JSON.stringify(record)).join('\n');
    return this.request(url.href, {
      method: 'POST',
      headers: { ...apiHeaders(this.config), 'content-type': 'application/x-json-stream' },
      body,
    });
  }

  private async waitForJob(
    jobId: number,
    polling: { intervalMs: number; maxPolls: number },
  ): Promise<ImportJobStatus> {
    const url = new URL(`/api/v0/imports/${jobId}`, this.config.baseUrl).href;

    for (let poll = 1; poll <= polling.maxPolls; poll += 1) {
      const job = await this.request(url, { headers: apiHeaders(this.config) });
      if (job.status === 'complete') {
        return job;
      }
      if (!IN_PROGRESS_STATUSES.has(job.status)) {
        throw createImportError(`Import job ${jobId} ended with status "${job.status}".`, {
          url,
          status: job.status,
          errors: job.errors,
        }, { severity: 'fatal' });
      }
      if (poll < polling.maxPolls) {
        await delay(polling.intervalMs);
      }
    }

    throw createImportError(
      `Import job ${jobId} did not complete after ${polling.maxPolls} status checks.`,
      { url },
      { severity: 'fatal' },
    );
  }

  private async request(url: string, init: RequestInit): Promise<ImportJobStatus> {
    let response: Response;
    try {
      response = await this.fetchImpl(url, init);
    } catch (error) {
      throw createImportError('Unable to reach the import API.', { url }, {
        severity: 'fatal',
        cause: error,
      });
    }

    if (!response.ok) {
      throw createImportError(`Import request failed with HTTP ${response.status}.`, {
        url,
        status: response.status,
      }, { severity: 'fatal' });
    }

    return parseImportJob(await response.json(), url);
  }
}

export function parseImportJob(body: unknown, url: string): ImportJobStatus {
  const result = importJobResponseSchema.safeParse(body);
  if (!result.success) {
    const issue = describeIssue(result.error);
    throw createImportError(
      `Import response is invalid at "${issue.path}".`,
      { url, ...issue.details },
      { severity: 'fatal', cause: result.error },
    );
  }

  const { id, status, processing_errors: processingErrors } = result.data.data;
  return { id, status, errors: (processingErrors ?? []).map((error) => String(error)) };
}

async function delay(ms: number): Promise<void> {
  await new Promise((resolve) => {
    setTimeout(resolve, ms);
  });
}
