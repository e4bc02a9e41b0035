import { join } from 'node:path';

import { activeUrls, collect, loadIgnoreList } from './catalog/activeUrls.js';
import { CatalogClient, type FetchLike, type UrlCatalog } from './catalog/catalogClient.js';
import { loadConfig, type AppConfig } from './config.js';
import { createConfigurationError, createOutputError } from './errors.js';
import { buildNetworkErrorRecords } from './importer/records.js';
import { ImportClient } from './importer/importClient.js';
import { componentLogger } from './logger.js';
import { loadPrecheckExemptions } from './precheck/exemptions.js';
import { precheckHosts, type PrecheckOptions } from './precheck/precheck.js';
import { assertSeedFormat, formatSeeds, seedFileExtension } from './seeds/format/formatSeeds.js';
import { groupUrls } from './seeds/grouping/groupUrls.js';
import { packSeeds } from './seeds/packing/packSeeds.js';
import {
  PRECHECK_LOG_FILENAME,
  ensureOutputDir,
  readPrecheckLog,
  seedFileName,
  seedNameFromFile,
  writePrecheckLog,
  writeSeedFile,
} from './sink/seedFiles.js';
import {
  ImportErrorsOptions,
  ImportJobResult,
  MultiSeedsOptions,
  NetworkErrorRecord,
  PrecheckLog,
  SeedFormat,
  SeedsOptions,
} from './types.js';
import { logProgress, writeHostResult } from './util/output.js';

export interface SeedsConfig {
  format?: string;
  pattern?: string;
  workers?: number;
  precheckConnections?: boolean;
  precheckLog?: string;
  crawlOptions?: Record<string, unknown>;
}

export interface MultiSeedsConfig extends Omit<SeedsConfig, 'precheckLog'> {
  size?: number;
  singleGroupSize?: number;
  output?: string;
}

export interface ImportErrorsConfig {
  sourceType?: string;
  dryRun?: boolean;
  batchSize?: number;
}

/** Collaborators the commands talk to; tests swap in in-process stand-ins. */
export interface RuntimeDependencies {
  config?: AppConfig;
  catalog?: UrlCatalog;
  fetch?: FetchLike;
  precheck?: Partial<PrecheckOptions>;
}

const DEFAULT_SEEDS_OPTIONS: SeedsOptions = {
  format: 'text',
  workers: 4,
  precheckConnections: false,
  crawlOptions: {},
};

const DEFAULT_MULTI_SEEDS_OPTIONS: MultiSeedsOptions = {
  format: 'browsertrix',
  workers: 2,
  precheckConnections: false,
  crawlOptions: {},
  size: 1000,
  output: '.',
};

const DEFAULT_IMPORT_OPTIONS: ImportErrorsOptions = {
  sourceType: 'precheck',
  dryRun: false,
  batchSize: 1000,
};

/** Builds a single seed document covering every active URL. */
export async function generateSeeds(
  config: SeedsConfig = {},
  deps: RuntimeDependencies = {},
): Promise<string> {
  const options = resolveSeedsOptions(config);
  const appConfig = deps.config ?? loadConfig();

  logProgress(`Generating seeds as ${options.format}...`);
  let urls = await loadActiveUrls(options.pattern, appConfig, deps);

  if (options.precheckConnections) {
    const { reachable, log } = await runPrecheck(urls, appConfig, deps);
    urls = reachable;
    if (options.precheckLog) {
      await writePrecheckLog(options.precheckLog, log);
    }
  }

  return formatSeeds(options.format, urls, {
    workers: options.workers,
    operator: appConfig.operator,
    overrides: options.crawlOptions,
  });
}

/**
 * Writes size-bounded seed files into `output` and returns the batch names in
 * the order they were written.
 */
export async function generateMultiSeeds(
  config: MultiSeedsConfig = {},
  deps: RuntimeDependencies = {},
): Promise<string[]> {
  const options = resolveMultiSeedsOptions(config);
  const appConfig = deps.config ?? loadConfig();
  const extension = seedFileExtension(options.format);

  logProgress(`Writing seed files to "${options.output}/*"...`);
  await ensureOutputDir(options.output);

  let urls = await loadActiveUrls(options.pattern, appConfig, deps);
  if (options.precheckConnections) {
    const { reachable, log } = await runPrecheck(urls, appConfig, deps);
    urls = reachable;
    await writePrecheckLog(join(options.output, PRECHECK_LOG_FILENAME), log);
  }

  const batches = packSeeds(groupUrls(urls, 'domain'), {
    targetSize: options.size,
    oversizedSplitSize: options.singleGroupSize,
  });

  const names: string[] = [];
  const writtenBy = new Map<string, string>();
  for (const batch of batches) {
    const fileName = seedFileName(batch.name, extension);
    const previous = writtenBy.get(fileName);
    if (previous !== undefined) {
      throw createOutputError(
        `Seed batches "${previous}" and "${batch.name}" would both be written to "${fileName}".`,
        { fileName },
      );
    }
    writtenBy.set(fileName, batch.name);

    const content = formatSeeds(options.format, batch.urls, {
      workers: batch.isolated ? 1 : options.workers,
      operator: appConfig.operator,
      overrides: options.crawlOptions,
    });
    await writeSeedFile(options.output, batch.name, extension, content);
    logProgress(`Wrote "${fileName}"`);
    names.push(seedNameFromFile(fileName));
  }

  return names;
}

export interface ImportErrorsOutcome {
  records: NetworkErrorRecord[];
  jobs: ImportJobResult[];
}

/** Sends the network errors recorded in a precheck log to the import API. */
export async function importPrecheckErrors(
  logPath: string,
  config: ImportErrorsConfig = {},
  deps: RuntimeDependencies = {},
): Promise<ImportErrorsOutcome> {
  const options = resolveImportOptions(config);
  const appConfig = deps.config ?? loadConfig();
  const log: PrecheckLog = await readPrecheckLog(logPath);
  const records = buildNetworkErrorRecords(log, { sourceType: options.sourceType });

  logProgress(`Found ${records.length} network error record(s) in "${logPath}".`);
  if (options.dryRun || records.length === 0) {
    return { records, jobs: [] };
  }

  const client = new ImportClient(appConfig.catalog, deps.fetch);
  const jobs = await client.importRecords(records, { batchSize: options.batchSize });
  return { records, jobs };
}

async function loadActiveUrls(
  pattern: string | undefined,
  appConfig: AppConfig,
  deps: RuntimeDependencies,
): Promise<string[]> {
  const catalog = deps.catalog ?? new CatalogClient(appConfig.catalog, deps.fetch);
  const ignore = await loadIgnoreList(appConfig.ignoreFile);
  const urls = await collect(activeUrls(catalog, { pattern, ignore }));

  componentLogger('catalog').info({ urls: urls.length, pattern }, 'loaded active URLs');
  return urls;
}

async function runPrecheck(
  urls: string[],
  appConfig: AppConfig,
  deps: RuntimeDependencies,
): Promise<{ reachable: string[]; log: PrecheckLog }> {
  const exemptions =
    deps.precheck?.exemptions ?? (await loadPrecheckExemptions(appConfig.precheckExemptFile));
  const hostCount = groupUrls(urls, 'host').size;

  logProgress(`Pre-checking ${hostCount} hosts for connection failures...`);
  return precheckHosts(urls, {
    onResult: writeHostResult,
    ...deps.precheck,
    exemptions,
  });
}

export function resolveSeedsOptions(config: SeedsConfig): SeedsOptions {
  return {
    format: resolveFormat(config.format, DEFAULT_SEEDS_OPTIONS.format),
    pattern: config.pattern || undefined,
    workers: coercePositiveInteger(config.workers ?? DEFAULT_SEEDS_OPTIONS.workers, 'workers'),
    precheckConnections: config.precheckConnections ?? DEFAULT_SEEDS_OPTIONS.precheckConnections,
    precheckLog: config.precheckLog,
    crawlOptions: config.crawlOptions ?? DEFAULT_SEEDS_OPTIONS.crawlOptions,
  };
}

export function resolveMultiSeedsOptions(config: MultiSeedsConfig): MultiSeedsOptions {
  const defaults = DEFAULT_MULTI_SEEDS_OPTIONS;

  return {
    format: resolveFormat(config.format, defaults.format),
    pattern: config.pattern || undefined,
    workers: coercePositiveInteger(config.workers ?? defaults.workers, 'workers'),
    precheckConnections: config.precheckConnections ?? defaults.precheckConnections,
    crawlOptions: config.crawlOptions ?? defaults.crawlOptions,
    size: coercePositiveInteger(config.size ?? defaults.size, 'size'),
    // 0 means "same as size".
    singleGroupSize: config.singleGroupSize
      ? coercePositiveInteger(config.singleGroupSize, 'single-group-size')
      : undefined,
    output: config.output ?? defaults.output,
  };
}

export function resolveImportOptions(config: ImportErrorsConfig): ImportErrorsOptions {
  return {
    sourceType: config.sourceType || DEFAULT_IMPORT_OPTIONS.sourceType,
    dryRun: config.dryRun ?? DEFAULT_IMPORT_OPTIONS.dryRun,
    batchSize: coercePositiveInteger(
      config.batchSize ?? DEFAULT_IMPORT_OPTIONS.batchSize,
      'batch-size',
    ),
  };
}

function resolveFormat(value: string | undefined, fallback: SeedFormat): SeedFormat {
  return value === undefined ? fallback : assertSeedFormat(value.toLowerCase());
}

function coercePositiveInteger(value: number, field: string): number {
  const truncated = Math.trunc(value);
  if (!Number.isFinite(truncated) || truncated <= 0) {
    throw createConfigurationError(`${field} must be a positive integer.`, { value, field });
  }

  return truncated;
}

export { groupUrls } from './seeds/grouping/groupUrls.js';
export { interleave } from './seeds/grouping/interleave.js';
export { packSeeds } from './seeds/packing/packSeeds.js';
export { precheckHosts } from './precheck/precheck.js';
export type { ImportErrorsOptions, MultiSeedsOptions, SeedFormat, SeedsOptions };
