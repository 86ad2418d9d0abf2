/**
 * Client for the paginated records API of data.education.gouv.fr and for the
 * bulk CSV downloads of data.gouv.fr. Every request waits for a pacer slot.
 */

import { z } from 'zod';
import { SourceUnreachableError } from './errors';
import type { RequestPacer } from './pacer';

export const MAX_PAGE_SIZE = 100;

export type Fields = Record<string, unknown>;

export type FetchFn = (url: string, init?: RequestInit) => Promise<Response>;

const pageSchema = z.object({
  total_count: z.number().optional(),
  records: z.array(
    z.object({
      record: z.object({
        id: z.string().optional(),
        fields: z.record(z.unknown()),
      }),
    })
  ),
});

export interface RecordsQuery {
  /** ODSQL filter expression */
  where?: string;
  /** Comma-separated field selection */
  select?: string;
  limit?: number;
}

export interface RecordsClientOptions {
  baseUrl: string;
  pacer: RequestPacer;
  fetchImpl?: FetchFn;
  timeoutMs?: number;
}

export function buildRecordsUrl(baseUrl: string, datasetId: string, query: RecordsQuery, offset: number): string {
  const url = new URL(`${baseUrl}/${datasetId}/records`);
  url.searchParams.set('limit', String(Math.min(query.limit ?? MAX_PAGE_SIZE, MAX_PAGE_SIZE)));
  url.searchParams.set('offset', String(offset));
  if (query.where) url.searchParams.set('where', query.where);
  if (query.select) url.searchParams.set('select', query.select);
  return url.toString();
}

/**
 * Fetches every record matching the query, page by page, until the API returns
 * an empty page. Any failed page aborts the whole fetch.
 */
export async function fetchAllRecords(
  datasetId: string,
  query: RecordsQuery,
  opts: RecordsClientOptions
): Promise<Fields[]> {
  const fetchImpl = opts.fetchImpl ?? fetch;
  const pageSize = Math.min(query.limit ?? MAX_PAGE_SIZE, MAX_PAGE_SIZE);
  const all: Fields[] = [];
  let offset = 0;

  for (;;) {
    const url = buildRecordsUrl(opts.baseUrl, datasetId, { ...query, limit: pageSize }, offset);
    await opts.pacer.acquire();
    let res: Response;
    try {
      res = await fetchImpl(url, { signal: AbortSignal.timeout(opts.timeoutMs ?? 30000) });
    } catch (e) {
      throw new SourceUnreachableError(datasetId, url, `request failed at offset ${offset}: ${e instanceof Error ? e.message : String(e)}`);
    }
    if (!res.ok) throw new SourceUnreachableError(datasetId, url, `HTTP ${res.status} at offset ${offset}`, res.status);

    const page = pageSchema.safeParse(await res.json());
    if (!page.success) {
      throw new SourceUnreachableError(datasetId, url, `unexpected payload at offset ${offset}: ${page.error.issues[0]?.message ?? ''}`);
    }
    const records = page.data.records;
    if (records.length === 0) break;

    for (const r of records) all.push(r.record.fields);
    offset += records.length;
  }

  return all;
}

export interface DownloadOptions {
  pacer?: RequestPacer;
  fetchImpl?: FetchFn;
  timeoutMs?: number;
}

/** Downloads a bulk file as raw bytes; decoding is left to the parser. */
export async function downloadBuffer(source: string, url: string, opts: DownloadOptions = {}): Promise<Buffer> {
  const fetchImpl = opts.fetchImpl ?? fetch;
  if (opts.pacer) await opts.pacer.acquire();
  let res: Response;
  try {
    res = await fetchImpl(url, { signal: AbortSignal.timeout(opts.timeoutMs ?? 300000) });
  } catch (e) {
    throw new SourceUnreachableError(source, url, `download failed: ${e instanceof Error ? e.message : String(e)}`);
  }
  if (!res.ok) throw new SourceUnreachableError(source, url, `HTTP ${res.status}`, res.status);
  return Buffer.from(await res.arrayBuffer());
}
