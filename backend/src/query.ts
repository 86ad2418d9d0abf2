/**
 * Read-side helpers for the API: filtering, search, GeoJSON output and the
 * display caps applied to commune profiles.
 */

import Fuse from 'fuse.js';
import type { Feature, FeatureCollection, Point } from 'geojson';
import type { CandidateResult, CommuneProfile } from '../../scripts/lib/political/types';
import { schoolCategorySchema, sectorSchema, type SchoolCategory, type SchoolRecord, type Sector } from '../../scripts/lib/types';

/** Candidates shown per round */
export const DISPLAY_CAP = 4;

export interface SchoolFilter {
  categories?: SchoolCategory[];
  sectors?: Sector[];
  q?: string;
}

export interface SchoolFeatureProperties {
  uai: string;
  name: string;
  category: SchoolCategory;
  sector: Sector;
  city: string;
  insee_code: string | null;
  ips: number | null;
  students: number | null;
}

export type SchoolFeatureCollection = FeatureCollection<Point, SchoolFeatureProperties>;

function splitList(raw: string): string[] {
  return raw
    .split(',')
    .map((s) => s.trim().toLowerCase())
    .filter(Boolean);
}

/** Comma-separated query value -> known categories; unknown entries are dropped. */
export function parseCategories(raw: string): SchoolCategory[] {
  return splitList(raw).flatMap((s) => {
    const parsed = schoolCategorySchema.safeParse(s);
    return parsed.success ? [parsed.data] : [];
  });
}

export function parseSectors(raw: string): Sector[] {
  return splitList(raw).flatMap((s) => {
    const parsed = sectorSchema.safeParse(s);
    return parsed.success ? [parsed.data] : [];
  });
}

/**
 * An empty category or sector list matches nothing, so `?category=` with no
 * valid value returns an empty result rather than everything.
 */
export function filterSchools(schools: SchoolRecord[], filter: SchoolFilter): SchoolRecord[] {
  let out = schools;
  const { categories, sectors } = filter;
  if (categories) out = out.filter((s) => categories.includes(s.category));
  if (sectors) out = out.filter((s) => sectors.includes(s.sector));

  const q = filter.q?.trim();
  if (q) {
    const fuse = new Fuse(out, { keys: ['name', 'address.city'], threshold: 0.4 });
    out = fuse.search(q).map((r) => r.item);
  }
  return out;
}

function numericIps(s: SchoolRecord): number | null {
  const v = s.ips?.value;
  return v && v.kind === 'numeric' ? v.value : null;
}

export function toFeatureCollection(schools: SchoolRecord[]): SchoolFeatureCollection {
  const features: Feature<Point, SchoolFeatureProperties>[] = [];
  for (const s of schools) {
    if (!s.coordinates) continue;
    features.push({
      type: 'Feature',
      geometry: { type: 'Point', coordinates: [s.coordinates.longitude, s.coordinates.latitude] },
      properties: {
        uai: s.uai,
        name: s.name,
        category: s.category,
        sector: s.sector,
        city: s.address.city,
        insee_code: s.address.insee_code,
        ips: numericIps(s),
        students: s.student_count ?? null,
      },
    });
  }
  return { type: 'FeatureCollection', features };
}

interface Rounds {
  round_1?: CandidateResult[];
  round_2?: CandidateResult[];
}

function capRounds<T extends Rounds>(contest: T, limit: number): T {
  return {
    ...contest,
    ...(contest.round_1 && { round_1: contest.round_1.slice(0, limit) }),
    ...(contest.round_2 && { round_2: contest.round_2.slice(0, limit) }),
  };
}

/** Rounds are stored sorted by share; this keeps the leading `limit` candidates of each. */
export function applyDisplayCap(profile: CommuneProfile, limit = DISPLAY_CAP): CommuneProfile {
  const out: CommuneProfile = { ...profile };
  if (profile.municipal_2020) out.municipal_2020 = capRounds(profile.municipal_2020, limit);
  if (profile.presidential_2022) out.presidential_2022 = capRounds(profile.presidential_2022, limit);
  if (profile.legislative_2024) out.legislative_2024 = capRounds(profile.legislative_2024, limit);
  return out;
}
