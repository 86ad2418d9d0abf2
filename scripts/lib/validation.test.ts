import { describe, it, expect } from 'vitest';
import { PAYS_DE_LA_LOIRE } from './config';
import type { PoliticalArtifact } from './political/types';
import type { SchoolRecord } from './types';
import { checkPolitical, checkSchools, coverageReport } from './validation';

function school(partial: Partial<SchoolRecord> & Pick<SchoolRecord, 'uai'>): SchoolRecord {
  return {
    name: 'Ecole des Tilleuls',
    category: 'primary',
    sector: 'public',
    address: { street: '', postal_code: '49000', city: 'Angers', insee_code: '49007', department: 'Maine-et-Loire' },
    coordinates: { latitude: 47.47, longitude: -0.55 },
    contact: { phone: null, email: null, website: null },
    ...partial,
  };
}

const checks = (v: { check: string }[]) => v.map((x) => x.check);

describe('checkSchools', () => {
  it('accepts a clean record', () => {
    expect(checkSchools([school({ uai: '0490001A' })], PAYS_DE_LA_LOIRE)).toEqual([]);
  });

  it('flags duplicates, bad identifiers and coordinates outside the region', () => {
    const out = checkSchools(
      [
        school({ uai: '0490001A' }),
        school({ uai: '0490001A' }),
        school({ uai: '490001A' }),
        school({ uai: '0490002B', coordinates: { latitude: 43.6, longitude: 1.44 } }),
      ],
      PAYS_DE_LA_LOIRE
    );
    expect(checks(out)).toEqual(['unique_uai', 'uai_format', 'coordinates']);
  });

  it('flags out-of-range IPS and rates', () => {
    const out = checkSchools(
      [
        school({
          uai: '0490003C',
          ips: {
            value: { kind: 'numeric', value: 250 },
            year: '2022',
            std_dev: null,
            regional_average: null,
            departmental_average: null,
            national_average: null,
          },
        }),
        school({
          uai: '0490004D',
          category: 'high',
          exam_results: {
            type: 'bac',
            year: '2023',
            success_rate: 101,
            access_rate_2nde: 80,
            access_rate_1ere: null,
            access_rate_term: null,
            value_added_success: null,
            value_added_access_2nde: null,
            students_present: null,
          },
        }),
      ],
      PAYS_DE_LA_LOIRE
    );
    expect(checks(out)).toEqual(['ips_range', 'exam_rate']);
  });

  it('does not range-check a not-significant IPS', () => {
    const ns = school({
      uai: '0490005E',
      ips: {
        value: { kind: 'not_significant' },
        year: '2022',
        std_dev: null,
        regional_average: null,
        departmental_average: null,
        national_average: null,
      },
    });
    expect(checkSchools([ns], PAYS_DE_LA_LOIRE)).toEqual([]);
  });

  it('checks class size against enrollment and category', () => {
    const out = checkSchools(
      [
        school({ uai: '0490006F', enrollment: { students: 87, classes: 3, school_year: '2023' }, class_size: 29 }),
        school({ uai: '0490007G', enrollment: { students: 87, classes: 3, school_year: '2023' }, class_size: 25 }),
        school({ uai: '0490008H', category: 'middle', class_size: 25 }),
        school({ uai: '0490009J', languages: { lv1: ['Anglais'], lv2: [] } }),
      ],
      PAYS_DE_LA_LOIRE
    );
    expect(out.map((v) => [v.check, v.subject])).toEqual([
      ['class_size', '0490007G'],
      ['class_size', '0490008H'],
      ['languages', '0490009J'],
    ]);
  });
});

describe('checkPolitical', () => {
  const clean: PoliticalArtifact = {
    '44109': {
      insee_code: '44109',
      commune_name: 'Nantes',
      presidential_2022: {
        round_2: [
          { candidate: 'A', party: null, percentage: 60 },
          { candidate: 'B', party: null, percentage: 40 },
        ],
      },
      legislative_2024: {
        round_2: [
          { candidate: 'C', party: 'Ensemble', party_code: 'ENS', percentage: 52.4 },
          { candidate: 'D', party: 'Rassemblement national', party_code: 'RN', percentage: 47.6 },
        ],
      },
    },
  };

  it('accepts a clean artifact', () => {
    expect(checkPolitical(clean)).toEqual([]);
  });

  it('flags key mismatches, bad sums and over-long runoffs', () => {
    const out = checkPolitical({
      '4410': { insee_code: '44109', commune_name: null },
      '49007': {
        insee_code: '49007',
        commune_name: 'Angers',
        municipal_2020: {
          round_1: [
            { candidate: 'L1', party: null, percentage: 70 },
            { candidate: 'L2', party: null, percentage: 40 },
          ],
        },
        legislative_2024: {
          round_2: [
            { candidate: 'A', party: null, percentage: 40 },
            { candidate: 'B', party: null, percentage: 30 },
            { candidate: 'C', party: null, percentage: 30 },
          ],
        },
        presidential_2022: { round_2: [{ candidate: 'A', party: null, percentage: 55 }] },
      },
      '72181': { insee_code: '72181', commune_name: 'Le Mans', presidential_2022: {} },
    });
    expect(checks(out)).toEqual([
      'key_matches_code',
      'insee_format',
      'round_sum',
      'legislative_round_2',
      'presidential_round_2',
      'empty_contest',
    ]);
  });
});

describe('coverageReport', () => {
  it('counts enrichment and contest coverage', () => {
    const report = coverageReport(
      [school({ uai: '0490001A' }), school({ uai: '0440001B', address: { street: '', postal_code: '', city: '', insee_code: '44109', department: '' } })],
      {
        '44109': {
          insee_code: '44109',
          commune_name: 'Nantes',
          mayor: { first_name: 'C', last_name: 'D', party: null, party_code: null },
          municipal_2020: { round_1: [{ candidate: 'L', party: null, percentage: 100 }] },
        },
      }
    );
    expect(report.schools).toBe(2);
    expect(report.withMayor).toBe(1);
    expect(report.contests).toEqual({ municipal_2020: 1, presidential_2022: 0, legislative_2024: 0 });
    expect(report.municipalRound2).toBe(0);
    expect(report.schoolCommunesWithProfile).toBe(1);
  });
});
