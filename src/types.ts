import type { z } from 'zod';

import type {
  exemptionScopeSchema,
  precheckExemptionsSchema,
  precheckLogEntrySchema,
  precheckLogSchema,
  verdictSchema,
} from './schemas.js';

export type SeedFormat = 'text' | 'browsertrix';

export type GroupBy = 'host' | 'domain';

/** Network-level failures that mark a host as unreachable. */
export type Verdict = z.infer<typeof verdictSchema>;

export type PrecheckLogEntry = z.infer<typeof precheckLogEntrySchema>;

export type PrecheckLog = z.infer<typeof precheckLogSchema>;

export interface PrecheckResult {
  reachable: string[];
  log: PrecheckLog;
}

export type ExemptionScope = z.infer<typeof exemptionScopeSchema>;

export type PrecheckExemptions = z.infer<typeof precheckExemptionsSchema>;

export interface SeedBatch {
  name: string;
  urls: string[];
  // Oversized-group chunks already hold a single domain and crawl with one worker.
  isolated: boolean;
}

export interface PackOptions {
  targetSize: number;
  oversizedSplitSize?: number;
}

export interface BrowsertrixOptions {
  workers: number;
  saveStateHistory?: number;
  pageLoadTimeout?: number;
  operator?: string;
  overrides?: Record<string, unknown>;
}

export interface SeedsOptions {
  format: SeedFormat;
  pattern?: string;
  workers: number;
  precheckConnections: boolean;
  precheckLog?: string;
  crawlOptions: Record<string, unknown>;
}

export interface MultiSeedsOptions extends Omit<SeedsOptions, 'precheckLog'> {
  size: number;
  singleGroupSize?: number;
  output: string;
}

export interface ImportErrorsOptions {
  sourceType: string;
  dryRun: boolean;
  batchSize: number;
}

export interface NetworkErrorRecord {
  url: string;
  capture_time: string;
  network_error: string;
  source_type: string;
  source_metadata: Record<string, unknown>;
}

export interface ImportJobResult {
  jobId: number;
  errorCount: number;
  errors: string[];
}
