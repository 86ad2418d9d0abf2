/**
 * Joins the directory with the enrichment artifacts into the final school list.
 * Everything here is synchronous and in memory; counts of every drop and
 * tie-break come back in the report.
 */

import { countReason } from './errors';
import { normalizeInseeCode } from './normalize';
import { latestPerKey } from './sources';
import type {
  BacRecord,
  BrevetRecord,
  DirectoryRecord,
  EnrollmentRecord,
  ExamResults,
  IpsRecord,
  LanguageRecord,
  SchoolCategory,
  SchoolRecord,
  Sector,
} from './types';

export interface MergeInputs {
  directory: DirectoryRecord[];
  ips: IpsRecord[];
  enrollment: EnrollmentRecord[];
  languages: LanguageRecord[];
  brevet: BrevetRecord[];
  bac: BacRecord[];
}

export interface MergeOptions {
  /** INSEE code for a postal code + city, or null when it cannot be resolved */
  resolveCommune?: (postalCode: string, city: string) => string | null;
}

export interface MergeReport {
  input: number;
  filtered: Record<string, number>;
  duplicatesCollapsed: number;
  output: number;
  byCategory: Record<SchoolCategory, number>;
  withCoordinates: number;
  joined: { ips: number; enrollment: number; languages: number; exams: number };
  insee: { directory: number; mapped: number; missing: number };
}

export type Classification = { category: SchoolCategory } | { excluded: string };

const fold = (s: string) => s.normalize('NFD').replace(/[\u0300-\u036f]/g, '').toUpperCase();
const has = (haystack: string, needle: string) => fold(haystack).includes(needle);

/**
 * Category of a directory row, or why it is left out. Écoles without an
 * elementary level are preschool-only; lycées must offer the general track.
 */
export function classify(rec: DirectoryRecord): Classification {
  const type = rec.type_etablissement;
  const nature = rec.libelle_nature;
  if (has(type, 'ECOLE') || has(nature, 'ECOLE')) {
    return rec.ecole_elementaire === true ? { category: 'primary' } : { excluded: 'preschool_only' };
  }
  if (has(type, 'COLLEGE') || has(nature, 'COLLEGE')) return { category: 'middle' };
  if (has(type, 'LYCEE') || has(nature, 'LYCEE')) {
    if (has(nature, 'PROFESSIONNEL') || has(rec.name, 'PROFESSIONNEL')) return { excluded: 'vocational_only' };
    if (rec.voie_generale === true) return { category: 'high' };
    if (rec.voie_generale === null && rec.voie_professionnelle === null) return { category: 'high' };
    return { excluded: 'vocational_only' };
  }
  return { excluded: 'unclassified' };
}

export function sectorOf(statut: string): Sector {
  return statut.trim().toLowerCase().startsWith('priv') ? 'private' : 'public';
}

const hasCoords = (r: DirectoryRecord) => r.latitude != null && r.longitude != null;

/**
 * Rows sharing a UAI collapse to the first one with coordinates, else the first
 * seen. `recOf` reaches the directory row inside whatever the caller carries.
 */
export function dedupeByUai<T>(rows: T[], recOf: (row: T) => DirectoryRecord): { rows: T[]; collapsed: number } {
  const byUai = new Map<string, T>();
  let collapsed = 0;
  for (const row of rows) {
    const uai = recOf(row).uai;
    const cur = byUai.get(uai);
    if (cur === undefined) {
      byUai.set(uai, row);
      continue;
    }
    collapsed++;
    if (!hasCoords(recOf(cur)) && hasCoords(recOf(row))) byUai.set(uai, row);
  }
  return { rows: [...byUai.values()], collapsed };
}

function indexLatest<T extends { uai: string }>(rows: T[], year: (r: T) => string): Map<string, T> {
  return new Map(latestPerKey(rows, (r) => r.uai, year).map((r) => [r.uai, r]));
}

function brevetResults(b: BrevetRecord): ExamResults {
  return {
    type: 'brevet',
    year: b.session,
    success_rate: b.success_rate,
    students_registered: b.registered,
    students_present: b.present,
    students_admitted: b.admitted,
    honors: {
      none: b.honors_none,
      fairly_good: b.honors_fairly_good,
      good: b.honors_good,
      very_good: b.honors_very_good,
    },
  };
}

function bacResults(b: BacRecord): ExamResults {
  return {
    type: 'bac',
    year: b.year,
    success_rate: b.success_rate,
    access_rate_2nde: b.access_rate_2nde,
    access_rate_1ere: b.access_rate_1ere,
    access_rate_term: b.access_rate_term,
    value_added_success: b.value_added_success,
    value_added_access_2nde: b.value_added_access_2nde,
    students_present: b.students_present,
  };
}

export function mergeSchools(inputs: MergeInputs, opts: MergeOptions = {}): { schools: SchoolRecord[]; report: MergeReport } {
  const report: MergeReport = {
    input: inputs.directory.length,
    filtered: {},
    duplicatesCollapsed: 0,
    output: 0,
    byCategory: { primary: 0, middle: 0, high: 0 },
    withCoordinates: 0,
    joined: { ips: 0, enrollment: 0, languages: 0, exams: 0 },
    insee: { directory: 0, mapped: 0, missing: 0 },
  };

  // Filter before joining, so enrichment never resurrects an excluded row.
  const kept: { rec: DirectoryRecord; category: SchoolCategory }[] = [];
  for (const rec of inputs.directory) {
    if (!rec.uai.trim()) {
      countReason(report.filtered, 'missing_identifier');
      continue;
    }
    const c = classify(rec);
    if ('excluded' in c) {
      countReason(report.filtered, c.excluded);
      continue;
    }
    kept.push({ rec, category: c.category });
  }

  const deduped = dedupeByUai(kept, (k) => k.rec);
  report.duplicatesCollapsed = deduped.collapsed;

  const ips = indexLatest(inputs.ips, (r) => r.school_year);
  const enrollment = indexLatest(inputs.enrollment, (r) => r.school_year);
  const languages = new Map(inputs.languages.map((r) => [r.uai, r] as const));
  const brevet = indexLatest(inputs.brevet, (r) => r.session);
  const bac = indexLatest(inputs.bac, (r) => r.year);

  const schools: SchoolRecord[] = [];
  for (const { rec, category } of deduped.rows) {

    const directCode = rec.code_commune?.trim() ?? '';
    let inseeCode = directCode.length === 5 ? normalizeInseeCode(directCode) : null;
    if (inseeCode) {
      report.insee.directory++;
    } else {
      inseeCode = opts.resolveCommune?.(rec.postal_code, rec.city) ?? null;
      if (inseeCode) report.insee.mapped++;
      else report.insee.missing++;
    }

    const coordinates =
      rec.latitude != null && rec.longitude != null ? { latitude: rec.latitude, longitude: rec.longitude } : null;
    if (coordinates) report.withCoordinates++;

    const school: SchoolRecord = {
      uai: rec.uai,
      name: rec.name,
      category,
      sector: sectorOf(rec.statut_public_prive),
      address: {
        street: rec.street,
        postal_code: rec.postal_code,
        city: rec.city,
        insee_code: inseeCode,
        department: rec.department,
      },
      coordinates,
      contact: { phone: rec.phone, email: rec.email, website: rec.website },
    };

    const enr = enrollment.get(rec.uai);
    if (enr) {
      school.enrollment = { students: enr.students, classes: enr.classes, school_year: enr.school_year };
      report.joined.enrollment++;
      if (category === 'primary' && enr.classes != null && enr.classes > 0) {
        school.class_size = Math.round((enr.students / enr.classes) * 10) / 10;
      }
    }
    // The directory headcount covers schools the enrollment datasets miss.
    const studentCount = enr?.students ?? rec.students;
    if (studentCount != null) school.student_count = studentCount;

    const ipsRec = ips.get(rec.uai);
    if (ipsRec) {
      school.ips = {
        value: ipsRec.value,
        year: ipsRec.school_year,
        std_dev: ipsRec.std_dev,
        regional_average: ipsRec.regional_average,
        departmental_average: ipsRec.departmental_average,
        national_average: ipsRec.national_average,
      };
      report.joined.ips++;
    }

    if (category !== 'primary') {
      const lang = languages.get(rec.uai);
      if (lang) {
        school.languages = { lv1: lang.lv1, lv2: lang.lv2 };
        report.joined.languages++;
      }
    }

    const brevetRec = category === 'middle' ? brevet.get(rec.uai) : undefined;
    const bacRec = category === 'high' ? bac.get(rec.uai) : undefined;
    if (brevetRec) school.exam_results = brevetResults(brevetRec);
    else if (bacRec) school.exam_results = bacResults(bacRec);
    if (school.exam_results) report.joined.exams++;

    report.byCategory[category]++;
    schools.push(school);
  }

  schools.sort((a, b) => (a.uai < b.uai ? -1 : a.uai > b.uai ? 1 : 0));
  report.output = schools.length;
  return { schools, report };
}
