import { createConfigurationError } from '../../errors.js';
import { componentLogger } from '../../logger.js';
import { PackOptions, SeedBatch } from '../../types.js';

export const PACKED_BATCH_PREFIX = 'other';

/**
 * Splits grouped URLs into seed batches of at most `targetSize` URLs.
 *
 * Groups with `targetSize` or more URLs are cut into chunks of
 * `oversizedSplitSize` and crawled on their own. Everything else is packed
 * first-fit, whole groups only, into `other-<n>` batches.
 */
export function packSeeds(groups: Map<string, string[]>, options: PackOptions): SeedBatch[] {
  const { targetSize, splitSize } = resolvePackSizes(options);
  const logger = componentLogger('pack');
  const remaining = new Map(groups);
  const batches: SeedBatch[] = [];

  for (const [key, urls] of groups) {
    if (urls.length < targetSize) {
      continue;
    }

    remaining.delete(key);
    const chunks = chunk(urls, splitSize);
    logger.debug({ group: key, urls: urls.length, chunks: chunks.length }, 'splitting oversized group');

    chunks.forEach((urlsInChunk, index) => {
      batches.push({ name: `${key}-${index + 1}`, urls: urlsInChunk, isolated: true });
    });
  }

  // A group keyed `other` already owns `other-<n>` names; packed batches skip those numbers.
  const taken = new Set(batches.map((batch) => batch.name));
  let packedNumber = 0;
  let packedCount = 0;
  while (remaining.size > 0) {
    const urls = fillBatch(remaining, targetSize);
    do {
      packedNumber += 1;
    } while (taken.has(`${PACKED_BATCH_PREFIX}-${packedNumber}`));

    packedCount += 1;
    batches.push({ name: `${PACKED_BATCH_PREFIX}-${packedNumber}`, urls, isolated: false });
  }

  logger.debug({ batches: batches.length, packed: packedCount }, 'packed seed batches');
  return batches;
}

// Takes whole groups from `remaining` in order while they fit. Every group left
// is smaller than the capacity, so at least one is always taken.
function fillBatch(remaining: Map<string, string[]>, capacity: number): string[] {
  const urls: string[] = [];
  let free = capacity;

  for (const [key, groupUrls] of [...remaining]) {
    if (groupUrls.length > free) {
      continue;
    }

    remaining.delete(key);
    urls.push(...groupUrls);
    free -= groupUrls.length;
    if (free === 0) {
      break;
    }
  }

  return urls;
}

function chunk<T>(items: T[], size: number): T[][] {
  const chunks: T[][] = [];
  for (let start = 0; start < items.length; start += size) {
    chunks.push(items.slice(start, start + size));
  }
  return chunks;
}

function resolvePackSizes(options: PackOptions): { targetSize: number; splitSize: number } {
  const targetSize = requirePositiveInteger(options.targetSize, 'size');
  const splitSize =
    options.oversizedSplitSize === undefined
      ? targetSize
      : requirePositiveInteger(options.oversizedSplitSize, 'single-group-size');

  return { targetSize, splitSize };
}

function requirePositiveInteger(value: number, field: string): number {
  if (!Number.isInteger(value) || value <= 0) {
    throw createConfigurationError(`${field} must be a positive integer.`, { value, field });
  }

  return value;
}
