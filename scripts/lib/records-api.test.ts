import { describe, it, expect, vi } from 'vitest';
import { SourceUnreachableError } from './errors';
import { RequestPacer, type Clock } from './pacer';
import { buildRecordsUrl, downloadBuffer, fetchAllRecords } from './records-api';

const clock: Clock = { now: () => 0, sleep: async () => {} };
const BASE = 'https://records.test/api/v2/catalog/datasets';

function page(records: Record<string, unknown>[]): Response {
  return new Response(JSON.stringify({ total_count: 3, records: records.map((fields) => ({ record: { fields } })) }), {
    status: 200,
    headers: { 'content-type': 'application/json' },
  });
}

describe('buildRecordsUrl', () => {
  it('clamps the page size to 100', () => {
    const url = new URL(buildRecordsUrl(BASE, 'fr-en-annuaire-education', { limit: 500, where: "libelle_region='Pays de la Loire'" }, 200));
    expect(url.pathname).toBe('/api/v2/catalog/datasets/fr-en-annuaire-education/records');
    expect(url.searchParams.get('limit')).toBe('100');
    expect(url.searchParams.get('offset')).toBe('200');
    expect(url.searchParams.get('where')).toBe("libelle_region='Pays de la Loire'");
  });
});

describe('fetchAllRecords', () => {
  it('pages until an empty page and advances the offset by page length', async () => {
    const fetchImpl = vi
      .fn<[string, RequestInit?], Promise<Response>>()
      .mockResolvedValueOnce(page([{ uai: 'A' }, { uai: 'B' }]))
      .mockResolvedValueOnce(page([{ uai: 'C' }]))
      .mockResolvedValueOnce(page([]));
    const rows = await fetchAllRecords('ds', { limit: 2 }, { baseUrl: BASE, pacer: new RequestPacer(100, clock), fetchImpl });

    expect(rows).toEqual([{ uai: 'A' }, { uai: 'B' }, { uai: 'C' }]);
    const offsets = fetchImpl.mock.calls.map(([url]) => new URL(url).searchParams.get('offset'));
    expect(offsets).toEqual(['0', '2', '3']);
  });

  it('throws SourceUnreachableError on an HTTP error', async () => {
    const fetchImpl = vi.fn(async () => new Response('busy', { status: 429 }));
    await expect(
      fetchAllRecords('ds', {}, { baseUrl: BASE, pacer: new RequestPacer(100, clock), fetchImpl })
    ).rejects.toBeInstanceOf(SourceUnreachableError);
  });

  it('throws on a payload without records', async () => {
    const fetchImpl = vi.fn(async () => new Response(JSON.stringify({ error: 'nope' }), { status: 200 }));
    await expect(
      fetchAllRecords('ds', {}, { baseUrl: BASE, pacer: new RequestPacer(100, clock), fetchImpl })
    ).rejects.toThrow(/unexpected payload/);
  });
});

describe('downloadBuffer', () => {
  it('returns the raw bytes', async () => {
    const bytes = Buffer.from([0xef, 0xbb, 0xbf, 0x41]);
    const fetchImpl = vi.fn(async () => new Response(bytes, { status: 200 }));
    const buf = await downloadBuffer('mayors', 'https://files.test/rne.csv', { fetchImpl });
    expect([...buf]).toEqual([0xef, 0xbb, 0xbf, 0x41]);
  });

  it('wraps network failures', async () => {
    const fetchImpl = vi.fn(async () => {
      throw new Error('socket hang up');
    });
    await expect(downloadBuffer('mayors', 'https://files.test/rne.csv', { fetchImpl })).rejects.toThrow(
      'mayors: download failed: socket hang up (https://files.test/rne.csv)'
    );
  });
});
