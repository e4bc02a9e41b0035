import { describe, expect, it } from 'vitest';

import { loadConfig } from '../src/config.js';

describe('loadConfig', () => {
  it('falls back to the public API and bundled lists', () => {
    const config = loadConfig({});

    expect(config.catalog).toEqual({
      baseUrl: 'https://api.monitoring.envirodatagov.org',
      email: undefined,
      password: undefined,
    });
    expect(config.operator).toBeUndefined();
    expect(config.ignoreFile.endsWith('/config/ignore-urls.json')).toBe(true);
    expect(config.precheckExemptFile.endsWith('/config/precheck-exemptions.json')).toBe(true);
  });

  it('reads credentials and paths from the environment', () => {
    const config = loadConfig({
      WEB_MONITORING_DB_URL: 'https://catalog.test',
      WEB_MONITORING_DB_EMAIL: 'crawler@example.test',
      WEB_MONITORING_DB_PASSWORD: 'test-secret',
      CRAWL_OPERATOR: 'Test Operator',
      SEEDS_IGNORE_FILE: '/tmp/ignore.json',
      SEEDS_PRECHECK_EXEMPT_FILE: '/tmp/exempt.json',
    });

    expect(config).toEqual({
      catalog: {
        baseUrl: 'https://catalog.test',
        email: 'crawler@example.test',
        password: 'test-secret',
      },
      operator: 'Test Operator',
      ignoreFile: '/tmp/ignore.json',
      precheckExemptFile: '/tmp/exempt.json',
    });
  });
});
