/**
 * Region and pipeline configuration threaded through fetchers, parsers and filters.
 * Nothing below scripts/lib hardcodes a department list; it all comes from here.
 */

import * as path from 'path';
import { z } from 'zod';

export interface DepartmentConfig {
  /** Two-character code, e.g. "44" */
  code: string;
  /** Upper-case name as the enrollment datasets spell it */
  name: string;
}

export interface BBox {
  minLat: number;
  maxLat: number;
  minLon: number;
  maxLon: number;
}

export interface RegionConfig {
  slug: string;
  name: string;
  nameUpper: string;
  code: string;
  departments: DepartmentConfig[];
  bbox: BBox;
}

export interface RateLimit {
  /** Externally imposed ceiling, requests per second */
  quotaPerSecond: number;
  /** Fraction of the quota actually used */
  safetyFactor: number;
}

export interface ElectionSourceUrls {
  mayors: string;
  municipalRound1: string;
  municipalRound2: string;
  presidentialRound1: string;
  presidentialRound2: string;
  legislativeRound1: string;
  legislativeRound2: string;
}

export interface PipelineConfig {
  region: RegionConfig;
  dataDir: string;
  cacheDir: string;
  politicalCacheDir: string;
  recordsApiBase: string;
  geoApiBase: string;
  recordsApiRate: RateLimit;
  geoApiRate: RateLimit;
  elections: ElectionSourceUrls;
}

export const PAYS_DE_LA_LOIRE: RegionConfig = {
  slug: 'pays-de-la-loire',
  name: 'Pays de la Loire',
  nameUpper: 'PAYS DE LA LOIRE',
  code: '52',
  departments: [
    { code: '44', name: 'LOIRE-ATLANTIQUE' },
    { code: '49', name: 'MAINE-ET-LOIRE' },
    { code: '53', name: 'MAYENNE' },
    { code: '72', name: 'SARTHE' },
    { code: '85', name: 'VENDEE' },
  ],
  // Sarthe reaches ~0.9°E around Le Mans
  bbox: { minLat: 46.2, maxLat: 48.6, minLon: -2.6, maxLon: 1.0 },
};

export const NOUVELLE_AQUITAINE: RegionConfig = {
  slug: 'nouvelle-aquitaine',
  name: 'Nouvelle-Aquitaine',
  nameUpper: 'NOUVELLE-AQUITAINE',
  code: '75',
  departments: [
    { code: '16', name: 'CHARENTE' },
    { code: '17', name: 'CHARENTE-MARITIME' },
    { code: '19', name: 'CORREZE' },
    { code: '23', name: 'CREUSE' },
    { code: '24', name: 'DORDOGNE' },
    { code: '33', name: 'GIRONDE' },
    { code: '40', name: 'LANDES' },
    { code: '47', name: 'LOT-ET-GARONNE' },
    { code: '64', name: 'PYRENEES-ATLANTIQUES' },
    { code: '79', name: 'DEUX-SEVRES' },
    { code: '86', name: 'VIENNE' },
    { code: '87', name: 'HAUTE-VIENNE' },
  ],
  bbox: { minLat: 42.7, maxLat: 47.2, minLon: -1.9, maxLon: 2.7 },
};

export const REGIONS: Record<string, RegionConfig> = {
  [PAYS_DE_LA_LOIRE.slug]: PAYS_DE_LA_LOIRE,
  [NOUVELLE_AQUITAINE.slug]: NOUVELLE_AQUITAINE,
};

export const ELECTION_URLS: ElectionSourceUrls = {
  mayors:
    'https://public.opendatasoft.com/api/explore/v2.1/catalog/datasets/donnees-du-repertoire-national-des-elus/exports/csv/?delimiters=%3B&lang=en&timezone=UTC&use_labels=true',
  municipalRound1: 'https://www.data.gouv.fr/api/1/datasets/r/7a5faf5f-7e3b-4de6-9f1d-a8e3ad176476',
  municipalRound2: 'https://www.data.gouv.fr/api/1/datasets/r/e7cae0aa-5e36-4370-b724-6f233014d0d6',
  presidentialRound1: 'https://www.data.gouv.fr/api/1/datasets/r/68b19a8d-5921-4d49-a0c7-b9241ddce9e6',
  presidentialRound2: 'https://www.data.gouv.fr/api/1/datasets/r/c700bcf1-5d88-4da6-b998-094587a90444',
  legislativeRound1: 'https://www.data.gouv.fr/api/1/datasets/r/bd32fcd3-53df-47ac-bf1d-8d8003fe23a1',
  legislativeRound2: 'https://www.data.gouv.fr/api/1/datasets/r/5a8088fd-8168-402a-9f40-c48daab88cd1',
};

/** "44" -> "044", the form the exam datasets filter on. */
export function threeDigitDepartment(code: string): string {
  return code.padStart(3, '0');
}

export function departmentCodes(region: RegionConfig): string[] {
  return region.departments.map((d) => d.code);
}

export function stageBanner(region: RegionConfig, stage: string): string {
  return `${region.name} School Map - ${stage}`;
}

export function isRegionDepartment(region: RegionConfig, code: string): boolean {
  return region.departments.some((d) => d.code === code);
}

const envSchema = z.object({
  REGION: z.string().default(PAYS_DE_LA_LOIRE.slug),
  DATA_DIR: z.string().optional(),
  RECORDS_API_RPS: z.coerce.number().positive().default(10),
  GEO_API_RPS: z.coerce.number().positive().default(50),
});

export function loadConfig(env: NodeJS.ProcessEnv = process.env): PipelineConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    throw new Error(`Invalid environment: ${parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ')}`);
  }
  const { REGION, DATA_DIR, RECORDS_API_RPS, GEO_API_RPS } = parsed.data;
  const region = REGIONS[REGION];
  if (!region) {
    throw new Error(`Unknown REGION "${REGION}". Known: ${Object.keys(REGIONS).join(', ')}`);
  }
  const dataDir = DATA_DIR ?? path.join(process.cwd(), 'data');
  return {
    region,
    dataDir,
    cacheDir: path.join(dataDir, 'cache'),
    politicalCacheDir: path.join(dataDir, 'political_cache'),
    recordsApiBase: 'https://data.education.gouv.fr/api/v2/catalog/datasets',
    geoApiBase: 'https://geo.api.gouv.fr',
    recordsApiRate: { quotaPerSecond: RECORDS_API_RPS, safetyFactor: 0.5 },
    geoApiRate: { quotaPerSecond: GEO_API_RPS, safetyFactor: 0.9 },
    elections: ELECTION_URLS,
  };
}
