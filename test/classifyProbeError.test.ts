import { describe, expect, it } from 'vitest';

import { classifyProbeError, collectErrorCodes } from '../src/precheck/network/classifyProbeError.js';

function networkError(code: string, message = code): Error {
  return new TypeError('fetch failed', { cause: Object.assign(new Error(message), { code }) });
}

describe('classifyProbeError', () => {
  it('classifies DNS failures', () => {
    expect(classifyProbeError(networkError('ENOTFOUND', 'getaddrinfo ENOTFOUND dead.example'))).toBe(
      'name-not-resolved',
    );
    expect(classifyProbeError(networkError('EAI_AGAIN'))).toBe('name-not-resolved');
  });

  it('classifies connect timeouts', () => {
    expect(classifyProbeError(networkError('UND_ERR_CONNECT_TIMEOUT'))).toBe('timeout');
    expect(classifyProbeError(networkError('ETIMEDOUT'))).toBe('timeout');
  });

  it('classifies connections closed by the peer', () => {
    expect(classifyProbeError(networkError('ECONNRESET'))).toBe('connection-reset');
    expect(classifyProbeError(networkError('UND_ERR_SOCKET', 'other side closed'))).toBe('connection-reset');
  });

  it('leaves everything else unclassified', () => {
    expect(classifyProbeError(networkError('CERT_HAS_EXPIRED'))).toBeNull();
    expect(classifyProbeError(networkError('UND_ERR_BODY_TIMEOUT'))).toBeNull();
    expect(classifyProbeError(new Error('boom'))).toBeNull();
    expect(classifyProbeError('boom')).toBeNull();
  });
});

describe('collectErrorCodes', () => {
  it('walks nested causes', () => {
    const inner = Object.assign(new Error('inner'), { code: 'ECONNRESET' });
    const middle = Object.assign(new Error('middle', { cause: inner }), { code: 'UND_ERR_SOCKET' });
    const outer = new TypeError('fetch failed', { cause: middle });

    expect(collectErrorCodes(outer)).toEqual(['UND_ERR_SOCKET', 'ECONNRESET']);
  });
});
