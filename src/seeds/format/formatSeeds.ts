import { createConfigurationError } from '../../errors.js';
import { BrowsertrixOptions, SeedFormat } from '../../types.js';
import { formatBrowsertrix } from './formatBrowsertrix.js';
import { formatText } from './formatText.js';

const FILE_EXTENSIONS: Record<SeedFormat, string> = {
  text: 'txt',
  browsertrix: 'yaml',
};

export const SEED_FORMATS: readonly SeedFormat[] = ['text', 'browsertrix'];

export function isSeedFormat(value: string): value is SeedFormat {
  return (SEED_FORMATS as readonly string[]).includes(value);
}

export function assertSeedFormat(value: string): SeedFormat {
  if (!isSeedFormat(value)) {
    throw createConfigurationError(`Unknown format: "${value}"`, { format: value });
  }

  return value;
}

export function seedFileExtension(format: SeedFormat): string {
  return FILE_EXTENSIONS[format];
}

export function formatSeeds(
  format: SeedFormat,
  urls: Iterable<string>,
  options: BrowsertrixOptions,
): string {
  switch (format) {
    case 'text':
      return formatText(urls);
    case 'browsertrix':
      return formatBrowsertrix(urls, options);
  }
}
