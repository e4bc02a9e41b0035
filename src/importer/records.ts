import { NetworkErrorRecord, PrecheckLog, Verdict } from '../types.js';

export const DEFAULT_SOURCE_TYPE = 'precheck';

// The import API stores network errors as browser error names.
const NETWORK_ERROR_NAMES: Record<Verdict, string> = {
  'name-not-resolved': 'net::ERR_NAME_NOT_RESOLVED',
  timeout: 'net::ERR_CONNECTION_TIMED_OUT',
  'connection-reset': 'net::ERR_CONNECTION_RESET',
};

export function networkErrorName(verdict: Verdict): string {
  return NETWORK_ERROR_NAMES[verdict];
}

export function buildNetworkErrorRecords(
  log: PrecheckLog,
  options: { sourceType?: string } = {},
): NetworkErrorRecord[] {
  const sourceType = options.sourceType ?? DEFAULT_SOURCE_TYPE;
  const records: NetworkErrorRecord[] = [];

  for (const [host, entry] of Object.entries(log)) {
    if (!entry.error) {
      continue;
    }

    for (const url of entry.urls) {
      records.push({
        url,
        capture_time: entry.timestamp,
        network_error: networkErrorName(entry.error),
        source_type: sourceType,
        source_metadata: { host, precheck_error: entry.error },
      });
    }
  }

  return records;
}
