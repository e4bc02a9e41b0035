import { describe, expect, it } from 'vitest';

import { packSeeds } from '../src/seeds/packing/packSeeds.js';

function urlsFor(domain: string, count: number): string[] {
  return Array.from({ length: count }, (_value, index) => `https://${domain}/${index + 1}`);
}

describe('packSeeds', () => {
  it('treats a group the size of the target as oversized', () => {
    const groups = new Map([
      ['a.gov', ['https://a.gov/1', 'https://a.gov/2']],
      ['b.gov', ['https://b.gov/1']],
    ]);

    expect(packSeeds(groups, { targetSize: 2 })).toEqual([
      { name: 'a.gov-1', urls: ['https://a.gov/1', 'https://a.gov/2'], isolated: true },
      { name: 'other-1', urls: ['https://b.gov/1'], isolated: false },
    ]);
  });

  it('keeps packed batch names clear of a group keyed "other"', () => {
    const groups = new Map([
      ['other', ['http://other/1', 'http://other/2']],
      ['a.gov', ['https://a.gov/1']],
    ]);

    expect(packSeeds(groups, { targetSize: 2 })).toEqual([
      { name: 'other-1', urls: ['http://other/1', 'http://other/2'], isolated: true },
      { name: 'other-2', urls: ['https://a.gov/1'], isolated: false },
    ]);
  });

  it('splits oversized groups into chunks of the split size', () => {
    const groups = new Map([['x.gov', urlsFor('x.gov', 7)]]);
    const batches = packSeeds(groups, { targetSize: 5, oversizedSplitSize: 3 });

    expect(batches.map((batch) => batch.name)).toEqual(['x.gov-1', 'x.gov-2', 'x.gov-3']);
    expect(batches.map((batch) => batch.urls)).toEqual([
      ['https://x.gov/1', 'https://x.gov/2', 'https://x.gov/3'],
      ['https://x.gov/4', 'https://x.gov/5', 'https://x.gov/6'],
      ['https://x.gov/7'],
    ]);
  });

  it('packs whole groups first-fit, skipping groups that would overflow', () => {
    const groups = new Map([
      ['g1.gov', urlsFor('g1.gov', 3)],
      ['g2.gov', urlsFor('g2.gov', 3)],
      ['g3.gov', urlsFor('g3.gov', 2)],
      ['g4.gov', urlsFor('g4.gov', 1)],
    ]);

    const batches = packSeeds(groups, { targetSize: 5 });

    expect(batches).toEqual([
      { name: 'other-1', urls: [...urlsFor('g1.gov', 3), ...urlsFor('g3.gov', 2)], isolated: false },
      { name: 'other-2', urls: [...urlsFor('g2.gov', 3), ...urlsFor('g4.gov', 1)], isolated: false },
    ]);
  });

  it('places every URL in exactly one batch within the size limits', () => {
    const groups = new Map([
      ['big.gov', urlsFor('big.gov', 12)],
      ['m1.gov', urlsFor('m1.gov', 4)],
      ['m2.gov', urlsFor('m2.gov', 2)],
      ['m3.gov', urlsFor('m3.gov', 3)],
      ['m4.gov', urlsFor('m4.gov', 1)],
      ['m5.gov', urlsFor('m5.gov', 4)],
    ]);
    const input = [...groups.values()].flat();

    const batches = packSeeds(groups, { targetSize: 5, oversizedSplitSize: 4 });
    const output = batches.flatMap((batch) => batch.urls);

    expect(output.slice().sort()).toEqual(input.slice().sort());
    expect(new Set(output).size).toBe(output.length);
    for (const batch of batches) {
      expect(batch.urls.length).toBeLessThanOrEqual(batch.isolated ? 4 : 5);
    }
  });

  it('does not modify the input groups', () => {
    const groups = new Map([
      ['a.gov', urlsFor('a.gov', 3)],
      ['b.gov', urlsFor('b.gov', 1)],
    ]);

    packSeeds(groups, { targetSize: 2 });

    expect([...groups.keys()]).toEqual(['a.gov', 'b.gov']);
    expect(groups.get('a.gov')).toHaveLength(3);
  });

  it('is deterministic', () => {
    const groups = new Map([
      ['a.gov', urlsFor('a.gov', 2)],
      ['b.gov', urlsFor('b.gov', 3)],
      ['c.gov', urlsFor('c.gov', 1)],
    ]);

    expect(packSeeds(groups, { targetSize: 4 })).toEqual(packSeeds(groups, { targetSize: 4 }));
  });

  it('rejects non-positive sizes', () => {
    const groups = new Map([['a.gov', urlsFor('a.gov', 2)]]);

    expect(() => packSeeds(groups, { targetSize: 2, oversizedSplitSize: 0 })).toThrowError(
      'single-group-size must be a positive integer.',
    );
    try {
      packSeeds(groups, { targetSize: 2, oversizedSplitSize: -3 });
      expect.unreachable();
    } catch (error) {
      expect(error).toMatchObject({ name: 'InvalidConfigurationError', kind: 'config' });
    }
    expect(() => packSeeds(groups, { targetSize: 0 })).toThrowError('size must be a positive integer.');
  });

  it('returns no batches for no groups', () => {
    expect(packSeeds(new Map(), { targetSize: 10 })).toEqual([]);
  });
});
