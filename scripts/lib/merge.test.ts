import { describe, it, expect, vi } from 'vitest';
import { classify, dedupeByUai, mergeSchools, type MergeInputs } from './merge';
import type { DirectoryRecord } from './types';

function dir(partial: Partial<DirectoryRecord> & Pick<DirectoryRecord, 'uai'>): DirectoryRecord {
  return {
    name: 'Ecole élémentaire publique Jules Verne',
    type_etablissement: 'Ecole',
    libelle_nature: 'ECOLE ELEMENTAIRE',
    statut_public_prive: 'Public',
    street: '1 rue des Écoles',
    postal_code: '44000',
    city: 'Nantes',
    code_commune: '44109',
    department: 'Loire-Atlantique',
    latitude: 47.21,
    longitude: -1.55,
    phone: null,
    email: null,
    website: null,
    students: null,
    ecole_elementaire: true,
    voie_generale: null,
    voie_professionnelle: null,
    ...partial,
  };
}

function inputs(partial: Partial<MergeInputs>): MergeInputs {
  return { directory: [], ips: [], enrollment: [], languages: [], brevet: [], bac: [], ...partial };
}

const college = (uai: string) =>
  dir({ uai, name: 'Collège Anne de Bretagne', type_etablissement: 'Collège', libelle_nature: 'COLLEGE', ecole_elementaire: null });
const lycee = (uai: string, extra: Partial<DirectoryRecord> = {}) =>
  dir({
    uai,
    name: 'Lycée général Clemenceau',
    type_etablissement: 'Lycée',
    libelle_nature: 'LYCEE GENERAL ET TECHNOLOGIQUE',
    ecole_elementaire: null,
    voie_generale: true,
    ...extra,
  });

describe('classify', () => {
  it('keeps elementary écoles and drops preschool-only ones', () => {
    expect(classify(dir({ uai: '0440001A' }))).toEqual({ category: 'primary' });
    expect(classify(dir({ uai: '0440002B', libelle_nature: 'ECOLE MATERNELLE', ecole_elementaire: false }))).toEqual({
      excluded: 'preschool_only',
    });
  });

  it('recognises collèges with or without accents', () => {
    expect(classify(college('0440003C'))).toEqual({ category: 'middle' });
    expect(classify(dir({ uai: '0440004D', type_etablissement: 'College', libelle_nature: '' }))).toEqual({ category: 'middle' });
  });

  it('keeps general lycées and drops vocational-only ones', () => {
    expect(classify(lycee('0440005E'))).toEqual({ category: 'high' });
    expect(classify(lycee('0440006F', { voie_generale: null, voie_professionnelle: null }))).toEqual({ category: 'high' });
    expect(classify(lycee('0440007G', { libelle_nature: 'LYCEE PROFESSIONNEL' }))).toEqual({ excluded: 'vocational_only' });
    expect(classify(lycee('0440008H', { voie_generale: false, voie_professionnelle: true }))).toEqual({
      excluded: 'vocational_only',
    });
  });

  it('leaves other establishments unclassified', () => {
    expect(classify(dir({ uai: '0440009J', type_etablissement: 'Service Administratif', libelle_nature: 'RECTORAT' }))).toEqual({
      excluded: 'unclassified',
    });
  });
});

describe('dedupeByUai', () => {
  it('prefers the first row that has coordinates', () => {
    const a = dir({ uai: '0440010K', latitude: null, longitude: null, street: 'site A' });
    const b = dir({ uai: '0440010K', street: 'site B' });
    const c = dir({ uai: '0440010K', street: 'site C' });
    const { rows, collapsed } = dedupeByUai([a, b, c], (r) => r);
    expect(rows.map((r) => r.street)).toEqual(['site B']);
    expect(collapsed).toBe(2);
  });

  it('keeps the first seen when none has coordinates', () => {
    const a = dir({ uai: '0440011L', latitude: null, longitude: null, street: 'site A' });
    const b = dir({ uai: '0440011L', latitude: null, longitude: null, street: 'site B' });
    expect(dedupeByUai([a, b], (r) => r).rows[0]?.street).toBe('site A');
  });
});

describe('mergeSchools', () => {
  it('joins two directory rows with one IPS and one enrollment record', () => {
    const { schools, report } = mergeSchools(
      inputs({
        directory: [dir({ uai: '0440022X' }), dir({ uai: '0440011A', name: 'Ecole Jean Moulin' })],
        ips: [
          {
            uai: '0440011A',
            school_year: '2021-2022',
            value: { kind: 'numeric', value: 104.3 },
            std_dev: 28.1,
            regional_average: 103.5,
            departmental_average: 105.2,
            national_average: 103.2,
          },
        ],
        enrollment: [{ uai: '0440022X', school_year: '2023', students: 87, classes: 3 }],
      })
    );

    expect(schools.map((s) => s.uai)).toEqual(['0440011A', '0440022X']);
    expect(schools[0]?.ips?.value).toEqual({ kind: 'numeric', value: 104.3 });
    expect(schools[0]?.enrollment).toBeUndefined();
    expect(schools[1]?.ips).toBeUndefined();
    expect(schools[1]?.enrollment).toEqual({ students: 87, classes: 3, school_year: '2023' });
    expect(schools[1]?.class_size).toBe(29);
    expect(report.joined).toEqual({ ips: 1, enrollment: 1, languages: 0, exams: 0 });
  });

  it('emits one record per duplicated UAI', () => {
    const { schools, report } = mergeSchools(
      inputs({
        directory: [
          dir({ uai: '0440033B', latitude: null, longitude: null }),
          dir({ uai: '0440033B', latitude: 47.3, longitude: -1.5 }),
        ],
      })
    );
    expect(schools).toHaveLength(1);
    expect(schools[0]?.coordinates).toEqual({ latitude: 47.3, longitude: -1.5 });
    expect(report.duplicatesCollapsed).toBe(1);
  });

  it('takes the category from the duplicate row it keeps', () => {
    const { schools } = mergeSchools(
      inputs({
        directory: [
          dir({ uai: '0440099Z', name: 'Ecole X', latitude: null, longitude: null }),
          dir({ uai: '0440099Z', name: 'College X', type_etablissement: 'Collège', libelle_nature: 'COLLEGE', ecole_elementaire: null }),
        ],
      })
    );
    expect(schools).toHaveLength(1);
    expect(schools[0]?.name).toBe('College X');
    expect(schools[0]?.category).toBe('middle');
  });

  it('falls back to the directory headcount without enrollment data', () => {
    const { schools } = mergeSchools(
      inputs({
        directory: [dir({ uai: '0440055D', students: 140 }), dir({ uai: '0440066E', students: 140 }), dir({ uai: '0440077F' })],
        enrollment: [{ uai: '0440066E', school_year: '2023', students: 150, classes: 6 }],
      })
    );
    expect(schools.map((s) => s.student_count)).toEqual([140, 150, undefined]);
  });

  it('attaches exams and languages by category only', () => {
    const { schools } = mergeSchools(
      inputs({
        directory: [dir({ uai: '0440001P' }), college('0440002M'), lycee('0440003H')],
        languages: [
          { uai: '0440001P', lv1: ['Anglais'], lv2: [] },
          { uai: '0440002M', lv1: ['Anglais'], lv2: ['Espagnol'] },
        ],
        brevet: [
          {
            uai: '0440002M',
            session: '2023',
            success_rate: 92.5,
            registered: 120,
            present: 119,
            admitted: 110,
            honors_none: 30,
            honors_fairly_good: 30,
            honors_good: 25,
            honors_very_good: 25,
          },
          {
            uai: '0440003H',
            session: '2023',
            success_rate: 50,
            registered: 1,
            present: 1,
            admitted: 1,
            honors_none: 1,
            honors_fairly_good: 0,
            honors_good: 0,
            honors_very_good: 0,
          },
        ],
        bac: [
          {
            uai: '0440003H',
            year: '2023',
            success_rate: 97,
            access_rate_2nde: 88,
            access_rate_1ere: 93,
            access_rate_term: 98,
            value_added_success: 2,
            value_added_access_2nde: -1,
            students_present: 310,
          },
        ],
      })
    );
    const [primary, middle, high] = schools;
    expect(primary?.languages).toBeUndefined();
    expect(primary?.exam_results).toBeUndefined();
    expect(middle?.languages).toEqual({ lv1: ['Anglais'], lv2: ['Espagnol'] });
    expect(middle?.exam_results?.type).toBe('brevet');
    expect(high?.exam_results?.type).toBe('bac');
    expect(high?.exam_results?.success_rate).toBe(97);
  });

  it('uses the latest year when an enrichment set repeats a UAI', () => {
    const { schools } = mergeSchools(
      inputs({
        directory: [dir({ uai: '0440044C' })],
        enrollment: [
          { uai: '0440044C', school_year: '2022', students: 100, classes: 4 },
          { uai: '0440044C', school_year: '2023', students: 90, classes: 4 },
        ],
      })
    );
    expect(schools[0]?.enrollment?.students).toBe(90);
    expect(schools[0]?.class_size).toBe(22.5);
  });

  it('falls back to the commune resolver when the directory lacks a full code', () => {
    const resolveCommune = vi.fn((postal: string) => (postal === '49000' ? '49007' : null));
    const { schools, report } = mergeSchools(
      inputs({
        directory: [
          dir({ uai: '0490001A', code_commune: null, postal_code: '49000', city: 'Angers' }),
          dir({ uai: '0490002B', code_commune: '', postal_code: '49999', city: 'Nulle Part' }),
          dir({ uai: '0440001C' }),
        ],
      }),
      { resolveCommune }
    );
    expect(schools.map((s) => s.address.insee_code)).toEqual(['44109', '49007', null]);
    expect(report.insee).toEqual({ directory: 1, mapped: 1, missing: 1 });
    expect(resolveCommune).toHaveBeenCalledWith('49000', 'Angers');
  });

  it('counts filtered rows by reason and accepts empty enrichment', () => {
    const { schools, report } = mergeSchools(
      inputs({
        directory: [
          dir({ uai: '' }),
          dir({ uai: '0440002B', ecole_elementaire: false }),
          lycee('0440003C', { libelle_nature: 'LYCEE PROFESSIONNEL' }),
          dir({ uai: '0440004D', statut_public_prive: 'Privé' }),
        ],
      })
    );
    expect(report.filtered).toEqual({ missing_identifier: 1, preschool_only: 1, vocational_only: 1 });
    expect(schools).toHaveLength(1);
    expect(schools[0]?.sector).toBe('private');
    expect(report.byCategory).toEqual({ primary: 1, middle: 0, high: 0 });
  });
});
