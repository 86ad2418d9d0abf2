import { isRegionDepartment, type RegionConfig } from '../config';
import { getCol, readTable, type RawRow, type TableFormat } from '../csv';
import { MalformedRowError } from '../errors';
import { inseeFromParts, normalizeDepartmentCode, normalizeInseeCode } from '../normalize';
import { runRows, type RowReport } from './ballots';
import type { MayorCache, MayorEntry } from './types';

/** Répertoire national des élus export */
export const MAYORS_FORMAT: TableFormat = { encoding: 'utf-8', delimiter: ';' };

export interface MayorRow {
  inseeCode: string;
  entry: MayorEntry;
}

function mayorInsee(dep: string, code: string): string | null {
  if (code.length <= 3) return inseeFromParts(dep, code);
  return normalizeInseeCode(code);
}

export function parseMayorRow(row: RawRow, region: RegionConfig): MayorRow[] {
  // Deputy mayors carry other function names ("1er adjoint au maire", ...)
  if (getCol(row, 'Nom de la fonction') !== 'Maire') return [];

  const dep = getCol(row, 'Code du département');
  if (!dep) throw new MalformedRowError('missing_department');
  if (!isRegionDepartment(region, normalizeDepartmentCode(dep))) return [];

  const code = getCol(row, 'Code de la commune');
  const inseeCode = code ? mayorInsee(dep, code) : null;
  if (!inseeCode) throw new MalformedRowError('bad_commune_code', code ?? '');

  const lastName = getCol(row, "Nom de l'élu·e", "Nom de l'élu");
  if (!lastName) throw new MalformedRowError('missing_name');

  return [
    {
      inseeCode,
      entry: {
        first_name: getCol(row, "Prénom de l'élu·e", "Prénom de l'élu") ?? '',
        last_name: lastName,
        party_code: getCol(row, 'Code nuance politique', 'Code de la nuance politique', 'Nuance politique') ?? null,
        commune_name: getCol(row, 'Libellé de la commune') ?? null,
      },
    },
  ];
}

export interface MayorBuild {
  mayors: MayorCache;
  report: RowReport<MayorRow>;
  duplicates: number;
}

/** One mayor per commune; a second "Maire" row for the same commune is counted and ignored. */
export function buildMayors(buf: Buffer, region: RegionConfig): MayorBuild {
  const report = runRows(readTable(buf, MAYORS_FORMAT), (row) => parseMayorRow(row, region));
  const byCommune = new Map<string, MayorEntry>();
  let duplicates = 0;
  for (const { inseeCode, entry } of report.rows) {
    if (byCommune.has(inseeCode)) duplicates++;
    else byCommune.set(inseeCode, entry);
  }
  const mayors: MayorCache = {};
  for (const id of [...byCommune.keys()].sort()) {
    const entry = byCommune.get(id);
    if (entry) mayors[id] = entry;
  }
  return { mayors, report, duplicates };
}
