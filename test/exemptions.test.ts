import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { loadPrecheckExemptions, parsePrecheckExemptions } from '../src/precheck/exemptions.js';

describe('parsePrecheckExemptions', () => {
  it('accepts a scope and a list of entries', () => {
    expect(parsePrecheckExemptions({ scope: 'domain', entries: ['epa.gov'] })).toEqual({
      scope: 'domain',
      entries: ['epa.gov'],
    });
  });

  it('rejects unknown scopes', () => {
    expect(() => parsePrecheckExemptions({ scope: 'path', entries: [] }, 'exempt.json')).toThrowError(
      'exempt.json is invalid at "scope".',
    );
  });

  it('rejects entries that are not strings', () => {
    expect(() => parsePrecheckExemptions({ scope: 'host', entries: ['a.gov', 3] })).toThrowError(
      'exemptions is invalid at "entries.1".',
    );
  });
});

describe('loadPrecheckExemptions', () => {
  let directory: string;

  beforeEach(async () => {
    directory = await mkdtemp(join(tmpdir(), 'crawl-seeds-exempt-'));
  });

  afterEach(async () => {
    await rm(directory, { recursive: true, force: true });
  });

  it('loads the bundled file', async () => {
    const path = new URL('../config/precheck-exemptions.json', import.meta.url).pathname;

    await expect(loadPrecheckExemptions(path)).resolves.toEqual({ scope: 'host', entries: [] });
  });

  it('reports files that are not JSON', async () => {
    const path = join(directory, 'exempt.json');
    await writeFile(path, 'scope: host');

    await expect(loadPrecheckExemptions(path)).rejects.toMatchObject({
      name: 'InvalidConfigurationError',
      message: `Invalid JSON in "${path}".`,
    });
  });
});
