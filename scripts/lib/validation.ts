/**
 * Offline checks over the two final artifacts. Violations are returned as data;
 * the CLI decides the exit code.
 */

import type { RegionConfig } from './config';
import { normalizeInseeCode } from './normalize';
import { CONTEST_KEYS, type CandidateResult, type PoliticalArtifact } from './political/types';
import { CATEGORY_ORDER, type SchoolRecord } from './types';

export interface Violation {
  check: string;
  subject: string;
  message: string;
}

export const IPS_RANGE = { min: 40, max: 200 };
export const PERCENT_EPSILON = 0.5;
export const CLASS_SIZE_TOLERANCE = 0.1;

const UAI_PATTERN = /^\d{7}[A-Z]$/;

const inRange = (v: number, min: number, max: number) => v >= min && v <= max;

export function checkSchools(schools: SchoolRecord[], region: RegionConfig): Violation[] {
  const out: Violation[] = [];
  const seen = new Set<string>();
  const { bbox } = region;

  for (const s of schools) {
    const v = (check: string, message: string) => out.push({ check, subject: s.uai, message });

    if (seen.has(s.uai)) v('unique_uai', 'duplicate UAI');
    seen.add(s.uai);
    if (!UAI_PATTERN.test(s.uai)) v('uai_format', `"${s.uai}" is not 7 digits and a letter`);
    if (!(s.category in CATEGORY_ORDER)) v('category', `unknown category ${s.category}`);

    if (s.coordinates) {
      const { latitude, longitude } = s.coordinates;
      if (!inRange(latitude, bbox.minLat, bbox.maxLat) || !inRange(longitude, bbox.minLon, bbox.maxLon)) {
        v('coordinates', `(${latitude}, ${longitude}) outside ${region.name}`);
      }
    }

    if (s.ips?.value.kind === 'numeric' && !inRange(s.ips.value.value, IPS_RANGE.min, IPS_RANGE.max)) {
      v('ips_range', `IPS ${s.ips.value.value} outside [${IPS_RANGE.min}, ${IPS_RANGE.max}]`);
    }

    const exam = s.exam_results;
    if (exam) {
      const rates: [string, number | null][] =
        exam.type === 'brevet'
          ? [['success_rate', exam.success_rate]]
          : [
              ['success_rate', exam.success_rate],
              ['access_rate_2nde', exam.access_rate_2nde],
              ['access_rate_1ere', exam.access_rate_1ere],
              ['access_rate_term', exam.access_rate_term],
            ];
      for (const [name, rate] of rates) {
        if (rate != null && !inRange(rate, 0, 100)) v('exam_rate', `${name} ${rate} outside [0, 100]`);
      }
      if ((exam.type === 'brevet' && s.category !== 'middle') || (exam.type === 'bac' && s.category !== 'high')) {
        v('exam_category', `${exam.type} results on a ${s.category} school`);
      }
    }

    if (s.class_size !== undefined) {
      const classes = s.enrollment?.classes;
      if (s.category !== 'primary') {
        v('class_size', `class size on a ${s.category} school`);
      } else if (!s.enrollment || classes == null || classes <= 0) {
        v('class_size', 'class size without students and classes');
      } else if (Math.abs(s.class_size - s.enrollment.students / classes) > CLASS_SIZE_TOLERANCE) {
        v('class_size', `${s.class_size} != ${s.enrollment.students}/${classes}`);
      }
    }

    if (s.languages && s.category === 'primary') v('languages', 'language offering on a primary school');
  }
  return out;
}

function roundSum(round: CandidateResult[]): number {
  return round.reduce((sum, c) => sum + c.percentage, 0);
}

export function checkPolitical(artifact: PoliticalArtifact): Violation[] {
  const out: Violation[] = [];
  const codes = new Set<string>();

  for (const [key, profile] of Object.entries(artifact)) {
    const v = (check: string, message: string) => out.push({ check, subject: key, message });

    if (profile.insee_code !== key) v('key_matches_code', `key ${key} holds ${profile.insee_code}`);
    if (normalizeInseeCode(key) !== key) v('insee_format', `"${key}" is not a 5-character commune code`);
    if (codes.has(profile.insee_code)) v('unique_insee', 'duplicate commune code');
    codes.add(profile.insee_code);

    for (const contestKey of CONTEST_KEYS) {
      const contest = profile[contestKey];
      if (!contest) continue;
      const rounds: [string, CandidateResult[] | undefined][] = [
        ['round_1', contest.round_1],
        ['round_2', contest.round_2],
      ];
      if (!contest.round_1 && !contest.round_2) {
        v('empty_contest', `${contestKey} has no rounds`);
        continue;
      }
      for (const [roundKey, round] of rounds) {
        if (!round) continue;
        const where = `${contestKey}.${roundKey}`;
        if (round.length === 0) v('empty_round', `${where} is empty`);
        for (const c of round) {
          if (!inRange(c.percentage, 0, 100)) v('percentage_range', `${where} ${c.candidate} at ${c.percentage}%`);
        }
        const sum = roundSum(round);
        if (sum > 100 + PERCENT_EPSILON) v('round_sum', `${where} sums to ${sum.toFixed(1)}%`);
      }
    }

    const legislative2 = profile.legislative_2024?.round_2;
    if (legislative2 && legislative2.length > 2) {
      v('legislative_round_2', `${legislative2.length} candidates in legislative round 2`);
    }
    const presidential2 = profile.presidential_2022?.round_2;
    if (presidential2) {
      const sum = roundSum(presidential2);
      if (presidential2.length !== 2) v('presidential_round_2', `${presidential2.length} runoff candidates`);
      else if (Math.abs(sum - 100) > PERCENT_EPSILON) v('presidential_round_2', `runoff sums to ${sum.toFixed(1)}%`);
    }
  }
  return out;
}

export interface CoverageReport {
  schools: number;
  byCategory: Record<string, number>;
  withCoordinates: number;
  withIps: number;
  withEnrollment: number;
  withExamResults: number;
  withInsee: number;
  communes: number;
  withMayor: number;
  contests: Record<string, number>;
  /** Communes decided in the first round have no round 2; this is informational */
  municipalRound2: number;
  schoolCommunesWithProfile: number;
}

export function coverageReport(schools: SchoolRecord[], political: PoliticalArtifact): CoverageReport {
  const profiles = Object.values(political);
  const byCategory: Record<string, number> = {};
  for (const s of schools) byCategory[s.category] = (byCategory[s.category] ?? 0) + 1;
  const contests: Record<string, number> = {};
  for (const k of CONTEST_KEYS) contests[k] = profiles.filter((p) => p[k]).length;

  return {
    schools: schools.length,
    byCategory,
    withCoordinates: schools.filter((s) => s.coordinates).length,
    withIps: schools.filter((s) => s.ips).length,
    withEnrollment: schools.filter((s) => s.enrollment).length,
    withExamResults: schools.filter((s) => s.exam_results).length,
    withInsee: schools.filter((s) => s.address.insee_code).length,
    communes: profiles.length,
    withMayor: profiles.filter((p) => p.mayor).length,
    contests,
    municipalRound2: profiles.filter((p) => p.municipal_2020?.round_2).length,
    schoolCommunesWithProfile: schools.filter((s) => s.address.insee_code && political[s.address.insee_code]).length,
  };
}
