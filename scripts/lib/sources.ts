/**
 * One RecordSource per education dataset family. Each knows its dataset id, how
 * to filter it down to the configured region, and how to turn raw API fields
 * into the intermediate record stored in its cache artifact.
 */

import * as path from 'path';
import type { z } from 'zod';
import { departmentCodes, threeDigitDepartment, type RegionConfig } from './config';
import { writeJsonAtomic } from './cache';
import { countReason, MalformedRowError } from './errors';
import { parseCount, parseFrenchNumber } from './normalize';
import { fetchAllRecords, type Fields, type RecordsClientOptions } from './records-api';
import {
  bacRecordSchema,
  brevetRecordSchema,
  directoryRecordSchema,
  enrollmentRecordSchema,
  ipsRecordSchema,
  languageRecordSchema,
  type BacRecord,
  type BrevetRecord,
  type DirectoryRecord,
  type EnrollmentRecord,
  type IpsRecord,
  type IpsValue,
  type LanguageRecord,
} from './types';

export function str(fields: Fields, ...names: string[]): string | undefined {
  for (const n of names) {
    const v = fields[n];
    if (typeof v === 'string' && v.trim()) return v.trim();
    if (typeof v === 'number' && Number.isFinite(v)) return String(v);
  }
  return undefined;
}

export function num(fields: Fields, ...names: string[]): number | null {
  for (const n of names) {
    const v = parseFrenchNumber(fields[n]);
    if (v != null) return v;
  }
  return null;
}

export function count(fields: Fields, ...names: string[]): number | null {
  for (const n of names) {
    const v = parseCount(fields[n]);
    if (v != null) return v;
  }
  return null;
}

/** 1/0, "1"/"0", "OUI"/"NON", true/false; null when absent. */
export function flag(fields: Fields, name: string): boolean | null {
  const v = fields[name];
  if (v == null || v === '') return null;
  if (typeof v === 'boolean') return v;
  if (typeof v === 'number') return v !== 0;
  if (typeof v === 'string') {
    const t = v.trim().toUpperCase();
    if (t === '1' || t === 'OUI' || t === 'TRUE') return true;
    if (t === '0' || t === 'NON' || t === 'FALSE') return false;
  }
  return null;
}

function requireUai(fields: Fields, ...names: string[]): string {
  const uai = str(fields, ...names);
  if (!uai) throw new MalformedRowError('missing_uai');
  return uai;
}

/** Numeric IPS, or the "NS" (not significant) sentinel as a tagged variant. */
export function parseIpsValue(raw: unknown): IpsValue | null {
  if (typeof raw === 'string' && raw.trim().toUpperCase() === 'NS') return { kind: 'not_significant' };
  const n = parseFrenchNumber(raw);
  return n == null ? null : { kind: 'numeric', value: n };
}

export interface RecordSource<Row, Out> {
  name: string;
  datasetId: string;
  cacheFile: string;
  schema: z.ZodType<Out>;
  where(region: RegionConfig): string;
  /** Throws MalformedRowError for unusable rows */
  normalize(fields: Fields): Row;
  collect(rows: Row[]): Out[];
}

export interface SourceRun<Out> {
  records: Out[];
  count: number;
  fetched: number;
  skipped: number;
  skipReasons: Record<string, number>;
}

/**
 * Keeps the most recent row per key (string comparison of the year), first seen
 * on ties, and returns them sorted by key.
 */
export function latestPerKey<T>(rows: T[], key: (r: T) => string, year: (r: T) => string): T[] {
  const best = new Map<string, T>();
  for (const r of rows) {
    const k = key(r);
    const cur = best.get(k);
    if (!cur || year(r) > year(cur)) best.set(k, r);
  }
  return [...best.keys()].sort().map((k) => best.get(k)).filter((r): r is T => r !== undefined);
}

function orFilter(field: string, values: string[]): string {
  return values.map((v) => `${field}='${v}'`).join(' OR ');
}

export function normalizeRows<Row, Out>(source: RecordSource<Row, Out>, raw: Fields[]): SourceRun<Out> {
  const rows: Row[] = [];
  const skipReasons: Record<string, number> = {};
  let skipped = 0;
  for (const fields of raw) {
    try {
      rows.push(source.normalize(fields));
    } catch (e) {
      if (!(e instanceof MalformedRowError)) throw e;
      skipped++;
      countReason(skipReasons, e.reason);
    }
  }
  const records = source.collect(rows);
  return { records, count: records.length, fetched: raw.length, skipped, skipReasons };
}

/**
 * Fetches, normalizes and persists one source. The cache artifact is replaced
 * only once everything succeeded.
 */
export async function runRecordSource<Row, Out>(
  source: RecordSource<Row, Out>,
  region: RegionConfig,
  cacheDir: string,
  client: RecordsClientOptions
): Promise<SourceRun<Out>> {
  const raw = await fetchAllRecords(source.datasetId, { where: source.where(region) }, client);
  const run = normalizeRows(source, raw);
  writeJsonAtomic(path.join(cacheDir, source.cacheFile), run.records);
  return run;
}

export const directorySource: RecordSource<DirectoryRecord, DirectoryRecord> = {
  name: 'directory',
  datasetId: 'fr-en-annuaire-education',
  cacheFile: 'directory.json',
  schema: directoryRecordSchema,
  where: (region) => `libelle_region='${region.name}'`,
  normalize: (f) => ({
    uai: requireUai(f, 'identifiant_de_l_etablissement'),
    name: str(f, 'nom_etablissement') ?? '',
    type_etablissement: str(f, 'type_etablissement') ?? '',
    libelle_nature: str(f, 'libelle_nature') ?? '',
    statut_public_prive: str(f, 'statut_public_prive') ?? '',
    street: str(f, 'adresse_1') ?? '',
    postal_code: str(f, 'code_postal') ?? '',
    city: str(f, 'nom_commune') ?? '',
    code_commune: str(f, 'code_commune') ?? null,
    department: str(f, 'libelle_departement') ?? '',
    latitude: num(f, 'latitude'),
    longitude: num(f, 'longitude'),
    phone: str(f, 'telephone') ?? null,
    email: str(f, 'mail') ?? null,
    website: str(f, 'web') ?? null,
    students: count(f, 'nombre_d_eleves'),
    ecole_elementaire: flag(f, 'ecole_elementaire'),
    voie_generale: flag(f, 'voie_generale'),
    voie_professionnelle: flag(f, 'voie_professionnelle'),
  }),
  // Multi-campus duplicates are kept here; the merger owns that tie-break.
  collect: (rows) => [...rows].sort((a, b) => (a.uai < b.uai ? -1 : a.uai > b.uai ? 1 : 0)),
};

function ipsSource(
  name: string,
  datasetId: string,
  where: (region: RegionConfig) => string,
  valueFields: string[],
  stdDevFields: string[]
): RecordSource<IpsRecord, IpsRecord> {
  return {
    name,
    datasetId,
    cacheFile: `${name}.json`,
    schema: ipsRecordSchema,
    where,
    normalize: (f) => {
      const uai = requireUai(f, 'uai');
      let value: IpsValue | null = null;
      for (const field of valueFields) {
        value = parseIpsValue(f[field]);
        if (value) break;
      }
      if (!value) throw new MalformedRowError('unparseable_ips');
      return {
        uai,
        school_year: str(f, 'rentree_scolaire') ?? '',
        value,
        std_dev: num(f, ...stdDevFields),
        regional_average: num(f, 'ips_academique', 'ips_regional'),
        departmental_average: num(f, 'ips_departemental'),
        national_average: num(f, 'ips_national', 'ips_france'),
      };
    },
    collect: (rows) => latestPerKey(rows, (r) => r.uai, (r) => r.school_year),
  };
}

export const ipsEcolesSource = ipsSource(
  'ips_ecoles',
  'fr-en-ips-ecoles-ap2022',
  (region) => `region='${region.nameUpper}'`,
  ['ips'],
  ['ecart_type_de_l_ips', 'ecart_type_ips']
);

export const ipsCollegesSource = ipsSource(
  'ips_colleges',
  'fr-en-ips-colleges-ap2023',
  // the region filter does not work on this dataset
  (region) => orFilter('code_du_departement', departmentCodes(region)),
  ['ips'],
  ['ecart_type_de_l_ips', 'ecart_type_ips']
);

export const ipsLyceesSource = ipsSource(
  'ips_lycees',
  'fr-en-ips-lycees-ap2023',
  (region) => orFilter('code_du_departement', departmentCodes(region)),
  ['ips_ensemble_gt_pro', 'ips_voie_gt', 'ips'],
  ['ecart_type_etablissement', 'ecart_type_de_l_ips_voie_gt']
);

function enrollmentSource(
  name: string,
  datasetId: string,
  where: (region: RegionConfig) => string,
  uaiFields: string[],
  studentFields: string[],
  classFields: string[]
): RecordSource<EnrollmentRecord, EnrollmentRecord> {
  return {
    name,
    datasetId,
    cacheFile: `${name}.json`,
    schema: enrollmentRecordSchema,
    where,
    normalize: (f) => {
      const uai = requireUai(f, ...uaiFields);
      const students = count(f, ...studentFields);
      if (students == null) throw new MalformedRowError('unparseable_student_count');
      return {
        uai,
        school_year: str(f, 'rentree_scolaire') ?? '',
        students,
        classes: classFields.length ? count(f, ...classFields) : null,
      };
    },
    collect: (rows) => latestPerKey(rows, (r) => r.uai, (r) => r.school_year),
  };
}

export const enrollmentEcolesSource = enrollmentSource(
  'enrollment_ecoles',
  'fr-en-ecoles-effectifs-nb_classes',
  (region) => orFilter('departement', region.departments.map((d) => d.name)),
  ['numero_ecole'],
  ['nombre_total_eleves', 'nombre_d_eleves'],
  ['nombre_total_classes', 'nombre_de_classes']
);

export const enrollmentCollegesSource = enrollmentSource(
  'enrollment_colleges',
  'fr-en-college-effectifs-niveau-sexe-lv',
  (region) => orFilter('code_dept', departmentCodes(region)),
  ['numero_college'],
  ['nombre_eleves_total', 'nombre_d_eleves'],
  []
);

export const enrollmentLyceesSource = enrollmentSource(
  'enrollment_lycees',
  'fr-en-lycee_gt-effectifs-niveau-sexe-lv',
  (region) => orFilter('code_departement_pays', departmentCodes(region)),
  ['numero_lycee'],
  ['nombre_d_eleves', 'nombre_eleves_total'],
  []
);

interface LanguageRow {
  uai: string;
  language: string;
  teaching: 'LV1' | 'LV2';
}

export const languagesSource: RecordSource<LanguageRow, LanguageRecord> = {
  name: 'languages',
  datasetId: 'fr-en-offre-langues-2d',
  cacheFile: 'languages.json',
  schema: languageRecordSchema,
  where: (region) => `region='${region.name}'`,
  normalize: (f) => {
    const uai = requireUai(f, 'uai');
    const language = str(f, 'langues');
    if (!language) throw new MalformedRowError('missing_language');
    const teaching = (str(f, 'enseignements') ?? '').toUpperCase();
    if (teaching !== 'LV1' && teaching !== 'LV2') throw new MalformedRowError('unknown_teaching');
    return { uai, language, teaching };
  },
  collect: (rows) => {
    const byUai = new Map<string, LanguageRecord>();
    for (const r of rows) {
      let rec = byUai.get(r.uai);
      if (!rec) {
        rec = { uai: r.uai, lv1: [], lv2: [] };
        byUai.set(r.uai, rec);
      }
      const list = r.teaching === 'LV1' ? rec.lv1 : rec.lv2;
      if (!list.includes(r.language)) list.push(r.language);
    }
    return [...byUai.keys()].sort().map((k) => {
      const rec = byUai.get(k);
      return { uai: k, lv1: [...(rec?.lv1 ?? [])].sort(), lv2: [...(rec?.lv2 ?? [])].sort() };
    });
  },
};

export const brevetSource: RecordSource<BrevetRecord, BrevetRecord> = {
  name: 'brevet',
  datasetId: 'fr-en-dnb-par-etablissement',
  cacheFile: 'brevet.json',
  schema: brevetRecordSchema,
  where: (region) => orFilter('code_departement', departmentCodes(region).map(threeDigitDepartment)),
  normalize: (f) => ({
    uai: requireUai(f, 'numero_d_etablissement'),
    session: str(f, 'session') ?? '',
    success_rate: num(f, 'taux_de_reussite'),
    registered: count(f, 'inscrits'),
    present: count(f, 'presents'),
    admitted: count(f, 'admis'),
    honors_none: count(f, 'admis_sans_mention'),
    honors_fairly_good: count(f, 'nombre_d_admis_mention_ab', 'admis_mention_assez_bien'),
    honors_good: count(f, 'admis_mention_bien'),
    honors_very_good: count(f, 'admis_mention_tres_bien'),
  }),
  collect: (rows) => latestPerKey(rows, (r) => r.uai, (r) => r.session),
};

export const bacSource: RecordSource<BacRecord, BacRecord> = {
  name: 'bac',
  datasetId: 'fr-en-indicateurs-de-resultat-des-lycees-gt_v2',
  cacheFile: 'bac.json',
  schema: bacRecordSchema,
  where: (region) => orFilter('code_departement', departmentCodes(region)),
  normalize: (f) => ({
    uai: requireUai(f, 'uai'),
    year: str(f, 'annee') ?? '',
    success_rate: num(f, 'taux_reu_total'),
    access_rate_2nde: num(f, 'taux_acces_2nde'),
    access_rate_1ere: num(f, 'taux_acces_1ere'),
    access_rate_term: num(f, 'taux_acces_term'),
    value_added_success: num(f, 'va_reu_total'),
    value_added_access_2nde: num(f, 'va_acces_2nde'),
    students_present: count(f, 'presents_total'),
  }),
  collect: (rows) => latestPerKey(rows, (r) => r.uai, (r) => r.year),
};

export const IPS_SOURCES = [ipsEcolesSource, ipsCollegesSource, ipsLyceesSource];
export const ENROLLMENT_SOURCES = [enrollmentEcolesSource, enrollmentCollegesSource, enrollmentLyceesSource];
