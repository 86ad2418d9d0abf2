/**
 * Postal code + city -> INSEE commune code, through geo.api.gouv.fr.
 *
 * A postal code can cover several communes; the city name then picks one.
 * Lookups are cached per postal code on disk so re-runs skip the network.
 */

import * as fs from 'fs';
import { z } from 'zod';
import { readJsonArtifact, sortKeys, writeJsonAtomic } from './cache';
import { ArtifactError, SourceUnreachableError } from './errors';
import { communeKey } from './normalize';
import type { RequestPacer } from './pacer';
import type { FetchFn } from './records-api';

const communeSchema = z.object({ nom: z.string(), code: z.string() });
const geoResponseSchema = z.array(communeSchema.passthrough());

export interface CommuneCandidate {
  insee_code: string;
  commune_name: string;
}

export const MAPPING_FILE = 'insee_mapping.json';

const mappingFileSchema = z.object({
  postal_codes: z.record(z.array(z.object({ insee_code: z.string(), commune_name: z.string() }))),
  mapping: z.record(z.object({ insee_code: z.string(), commune_name: z.string() })).optional(),
});

export type ResolvedCommune = CommuneCandidate;

export type Resolution =
  | { status: 'resolved'; commune: ResolvedCommune }
  | { status: 'ambiguous'; candidates: number }
  | { status: 'unknown_postal_code' };

export interface InseeMapperOptions {
  baseUrl: string;
  pacer: RequestPacer;
  /** insee_mapping.json; omitted means memory-only */
  cacheFile?: string;
  fetchImpl?: FetchFn;
  timeoutMs?: number;
}

export interface LookupStats {
  requested: number;
  fromCache: number;
  fetched: number;
  failed: number;
}

/** Stage failure summary, or null when every lookup went through. */
export function lookupFailureSummary(stats: LookupStats): string | null {
  if (stats.failed === 0) return null;
  return `${stats.failed} of ${stats.requested} postal code lookups failed; their schools have no commune code until the next run.`;
}

export function mappingKey(postalCode: string, city: string): string {
  return `${postalCode.trim()}|${city.trim()}`;
}

export class InseeMapper {
  private readonly byPostalCode = new Map<string, CommuneCandidate[]>();
  private readonly opts: InseeMapperOptions;
  private readonly resolved = new Map<string, ResolvedCommune>();
  readonly unresolved = new Map<string, Resolution['status']>();

  constructor(opts: InseeMapperOptions) {
    this.opts = opts;
    if (opts.cacheFile && fs.existsSync(opts.cacheFile)) {
      try {
        const cached = readJsonArtifact(opts.cacheFile, mappingFileSchema);
        for (const [code, list] of Object.entries(cached.postal_codes)) this.byPostalCode.set(code, list);
      } catch (e) {
        if (!(e instanceof ArtifactError)) throw e;
        console.warn(`  ⚠ ignoring unreadable mapping cache: ${e.message}`);
      }
    }
  }

  get cachedPostalCodes(): number {
    return this.byPostalCode.size;
  }

  private async fetchPostalCode(postalCode: string): Promise<CommuneCandidate[]> {
    const fetchImpl = this.opts.fetchImpl ?? fetch;
    const url = `${this.opts.baseUrl}/communes?codePostal=${encodeURIComponent(postalCode)}&fields=nom,code`;
    await this.opts.pacer.acquire();
    let res: Response;
    try {
      res = await fetchImpl(url, { signal: AbortSignal.timeout(this.opts.timeoutMs ?? 15000) });
    } catch (e) {
      throw new SourceUnreachableError('geo.api.gouv.fr', url, e instanceof Error ? e.message : String(e));
    }
    if (!res.ok) throw new SourceUnreachableError('geo.api.gouv.fr', url, `HTTP ${res.status}`, res.status);
    const body = geoResponseSchema.safeParse(await res.json());
    if (!body.success) throw new SourceUnreachableError('geo.api.gouv.fr', url, 'unexpected payload');
    return body.data.map((c) => ({ insee_code: c.code, commune_name: c.nom }));
  }

  /**
   * Fetches every postal code not already cached, concurrently through the
   * pacer. A failed lookup is counted and left uncached so the next run retries it.
   */
  async lookupPostalCodes(codes: Iterable<string>): Promise<LookupStats> {
    const distinct = [...new Set([...codes].map((c) => c.trim()).filter(Boolean))].sort();
    const missing = distinct.filter((c) => !this.byPostalCode.has(c));
    const stats: LookupStats = { requested: distinct.length, fromCache: distinct.length - missing.length, fetched: 0, failed: 0 };

    const results = await Promise.allSettled(missing.map(async (code) => ({ code, list: await this.fetchPostalCode(code) })));
    for (const r of results) {
      if (r.status === 'fulfilled') {
        this.byPostalCode.set(r.value.code, r.value.list);
        stats.fetched++;
      } else {
        stats.failed++;
        console.warn(`  ⚠ ${r.reason instanceof Error ? r.reason.message : String(r.reason)}`);
      }
    }
    if (stats.fetched > 0) this.save();
    return stats;
  }

  save(): void {
    if (!this.opts.cacheFile) return;
    const postal_codes: Record<string, CommuneCandidate[]> = {};
    for (const code of [...this.byPostalCode.keys()].sort()) postal_codes[code] = this.byPostalCode.get(code) ?? [];
    writeJsonAtomic(this.opts.cacheFile, { postal_codes, mapping: sortKeys(Object.fromEntries(this.resolved)) });
  }

  /** Never guesses: several candidates with no name match stay unresolved. */
  resolve(postalCode: string, city: string): Resolution {
    const candidates = this.byPostalCode.get(postalCode.trim());
    let resolution: Resolution;
    if (!candidates || candidates.length === 0) {
      resolution = { status: 'unknown_postal_code' };
    } else if (candidates.length === 1) {
      resolution = { status: 'resolved', commune: candidates[0] };
    } else {
      const key = communeKey(city);
      const matches = candidates.filter((c) => communeKey(c.commune_name) === key);
      resolution =
        matches.length === 1 ? { status: 'resolved', commune: matches[0] } : { status: 'ambiguous', candidates: candidates.length };
    }
    if (resolution.status === 'resolved') this.resolved.set(mappingKey(postalCode, city), resolution.commune);
    else this.unresolved.set(mappingKey(postalCode, city), resolution.status);
    return resolution;
  }

  /** INSEE code -> commune name across every cached postal code. */
  communeNames(): Record<string, string> {
    const names: Record<string, string> = {};
    for (const list of this.byPostalCode.values()) {
      for (const c of list) if (!names[c.insee_code]) names[c.insee_code] = c.commune_name;
    }
    return names;
  }
}
