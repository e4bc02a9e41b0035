#!/usr/bin/env node
import { createRequire } from 'node:module';
import { Command } from 'commander';
import { z } from 'zod';

import {
  generateMultiSeeds,
  generateSeeds,
  importPrecheckErrors,
  type ImportErrorsConfig,
  type MultiSeedsConfig,
  type SeedsConfig,
} from './index.js';
import { createConfigurationError } from './errors.js';
import { configureLogger, isLogLevel } from './logger.js';
import { parseCrawlOption } from './util/crawlOptions.js';
import { reportSeedsError } from './util/errorHandler.js';
import { logError, renderImportSummary, setOutputConfig, writeResult } from './util/output.js';

const require = createRequire(import.meta.url);
const pkg = z.object({ version: z.string().optional() }).parse(require('../package.json'));

const crawlOptionsSchema = z.record(z.string(), z.unknown());

const program = new Command();

program
  .name('crawl-seeds')
  .description('Build crawler seed lists from the active URLs of a web-monitoring catalog.')
  .version(pkg.version ?? '0.0.0')
  .option('--log-level <level>', 'Log verbosity on stderr (pino levels: trace|debug|info|warn|error|fatal).')
  .option('--quiet', 'Suppress progress lines on stderr.')
  .hook('preAction', (command) => {
    applyGlobalOptions(command.opts());
  });

program
  .command('seeds')
  .description('Print a single seed list for every active URL.')
  .option('--format <format>', 'Output format: text or browsertrix. (default: text)')
  .option('--pattern <pattern>', 'Only list URLs matching this wildcard pattern; prefix with ! to exclude.')
  .option('--workers <number>', 'Crawler workers (browsertrix only). (default: 4)')
  .option('--precheck-connections', 'Drop hosts that are unreachable (DNS failures, timeouts, resets).')
  .option('--precheck-log <path>', 'Write the precheck log to this file.')
  .option('--crawl-option <key=value>', 'Extra Browsertrix config entry (repeatable).', parseCrawlOption, {})
  .action(async (options: Record<string, unknown>) => {
    try {
      const document = await generateSeeds(buildSeedsConfig(options));
      writeResult(document);
    } catch (error) {
      reportCliError(error);
    }
  });

program
  .command('multi-seeds')
  .description(
    'Write seed files of at most --size URLs to --output. URLs are grouped by primary domain ' +
      '(e.g. "epa.gov"); groups of --size or more are split into files of --single-group-size ' +
      'URLs, and the rest are packed together.',
  )
  .option('--format <format>', 'Output format: browsertrix or text. (default: browsertrix)')
  .option('--pattern <pattern>', 'Only list URLs matching this wildcard pattern; prefix with ! to exclude.')
  .option('--workers <number>', 'Crawler workers for packed seed files. (default: 2)')
  .option('--size <number>', 'Maximum URLs per seed file. (default: 1000)')
  .option('--single-group-size <number>', 'Chunk size for oversized groups; 0 uses --size. (default: 0)')
  .option('--output <dir>', 'Directory to write seed files to. (default: .)')
  .option('--precheck-connections', 'Drop hosts that are unreachable and write precheck.log.json.')
  .option('--crawl-option <key=value>', 'Extra Browsertrix config entry (repeatable).', parseCrawlOption, {})
  .action(async (options: Record<string, unknown>) => {
    try {
      const names = await generateMultiSeeds(buildMultiSeedsConfig(options));
      writeResult(JSON.stringify(names));
    } catch (error) {
      reportCliError(error);
    }
  });

program
  .command('import-errors')
  .description('Import the network errors recorded in a precheck log.')
  .argument('<log>', 'Path to a precheck.log.json file.')
  .option('--source-type <type>', 'source_type for imported records. (default: precheck)')
  .option('--batch-size <number>', 'Records per import job. (default: 1000)')
  .option('--dry-run', 'Report the records that would be imported without sending them.')
  .action(async (logPath: string, options: Record<string, unknown>) => {
    try {
      const { records, jobs } = await importPrecheckErrors(logPath, buildImportConfig(options));
      writeResult(
        options.dryRun === true
          ? `Dry run: ${records.length} record(s) not imported.`
          : renderImportSummary(jobs),
      );
    } catch (error) {
      reportCliError(error);
    }
  });

try {
  await program.parseAsync(process.argv);
} catch (error) {
  reportCliError(error);
}

function applyGlobalOptions(rawOptions: Record<string, unknown>): void {
  try {
    if (rawOptions.logLevel !== undefined) {
      const level = String(rawOptions.logLevel).toLowerCase();
      if (!isLogLevel(level)) {
        throw createConfigurationError(`Unsupported log level: ${level}`, { value: level });
      }
      configureLogger({ level });
    }

    setOutputConfig({ quiet: rawOptions.quiet === true });
  } catch (error) {
    reportCliError(error);
    process.exit();
  }
}

function buildSeedsConfig(rawOptions: Record<string, unknown>): SeedsConfig {
  const config: SeedsConfig = buildSharedConfig(rawOptions);

  if (rawOptions.precheckLog !== undefined) {
    config.precheckLog = String(rawOptions.precheckLog);
  }

  return config;
}

function buildMultiSeedsConfig(rawOptions: Record<string, unknown>): MultiSeedsConfig {
  const config: MultiSeedsConfig = buildSharedConfig(rawOptions);

  if (rawOptions.size !== undefined) {
    config.size = asNumber(rawOptions.size, 'size');
  }

  if (rawOptions.singleGroupSize !== undefined) {
    config.singleGroupSize = asNumber(rawOptions.singleGroupSize, 'single-group-size');
  }

  if (rawOptions.output !== undefined) {
    config.output = String(rawOptions.output);
  }

  return config;
}

function buildSharedConfig(rawOptions: Record<string, unknown>): MultiSeedsConfig {
  const config: MultiSeedsConfig = {};

  if (rawOptions.format !== undefined) {
    config.format = String(rawOptions.format);
  }

  if (rawOptions.pattern !== undefined) {
    config.pattern = String(rawOptions.pattern);
  }

  if (rawOptions.workers !== undefined) {
    config.workers = asNumber(rawOptions.workers, 'workers');
  }

  if (rawOptions.precheckConnections === true) {
    config.precheckConnections = true;
  }

  const crawlOptions = crawlOptionsSchema.safeParse(rawOptions.crawlOption);
  if (crawlOptions.success) {
    config.crawlOptions = crawlOptions.data;
  }

  return config;
}

function buildImportConfig(rawOptions: Record<string, unknown>): ImportErrorsConfig {
  const config: ImportErrorsConfig = {};

  if (rawOptions.sourceType !== undefined) {
    config.sourceType = String(rawOptions.sourceType);
  }

  if (rawOptions.batchSize !== undefined) {
    config.batchSize = asNumber(rawOptions.batchSize, 'batch-size');
  }

  if (rawOptions.dryRun === true) {
    config.dryRun = true;
  }

  return config;
}

function asNumber(value: unknown, label: string): number {
  const parsed = Number(value);
  if (!Number.isFinite(parsed)) {
    throw createConfigurationError(`${label} must be a finite number.`, { value });
  }

  return parsed;
}

function reportCliError(error: unknown): void {
  const seedsError = reportSeedsError(error, { stage: 'cli' }, {
    defaultKind: 'config',
    defaultSeverity: 'fatal',
    throwOnFatal: false,
  });
  logError(`Error: ${seedsError.message}`);
  process.exitCode = 1;
}
