import { Verdict } from '../../types.js';

const DNS_ERROR_CODES = new Set(['ENOTFOUND', 'EAI_AGAIN', 'EAI_NONAME']);
const CONNECT_TIMEOUT_CODES = new Set(['UND_ERR_CONNECT_TIMEOUT', 'ETIMEDOUT']);
const RESET_ERROR_CODES = new Set(['ECONNRESET', 'UND_ERR_SOCKET', 'EPIPE']);

/**
 * Maps a failed probe to the network error it represents. Anything that is not
 * a DNS, connect-timeout, or reset failure (TLS trouble included) returns null:
 * a browser-based crawl may still reach the host.
 */
export function classifyProbeError(error: unknown): Verdict | null {
  for (const code of collectErrorCodes(error)) {
    if (DNS_ERROR_CODES.has(code)) {
      return 'name-not-resolved';
    }
    if (CONNECT_TIMEOUT_CODES.has(code)) {
      return 'timeout';
    }
    if (RESET_ERROR_CODES.has(code)) {
      return 'connection-reset';
    }
  }

  return null;
}

// undici wraps the socket-level error in `cause`, sometimes more than once.
export function collectErrorCodes(error: unknown): string[] {
  const codes: string[] = [];
  const seen = new Set<unknown>();
  let current: unknown = error;

  while (typeof current === 'object' && current !== null && !seen.has(current)) {
    seen.add(current);
    const code = readProperty(current, 'code');
    if (typeof code === 'string') {
      codes.push(code);
    }
    current = readProperty(current, 'cause');
  }

  return codes;
}

function readProperty(value: object, key: string): unknown {
  return key in value ? Reflect.get(value, key) : undefined;
}
