import { isRegionDepartment } from '../config';
import { getCol, type RawRow, type TableFormat } from '../csv';
import { MalformedRowError } from '../errors';
import { inseeFromParts, normalizeDepartmentCode } from '../normalize';
import {
  assembleContest,
  mergeCounts,
  requireCount,
  roundsFromTally,
  tallyByCommune,
  type BallotParser,
  type BallotRow,
  type ContestBuild,
  type RowContext,
} from './ballots';
import type { PartyLabels } from './party-labels';

/**
 * Municipal 2020 list results, one row per (commune, list). Both rounds share
 * the column layout and differ only in delimiter.
 */
export class MunicipalParser implements BallotParser {
  readonly name: string;
  readonly format: TableFormat;

  constructor(name: string, format: TableFormat) {
    this.name = name;
    this.format = format;
  }

  parseRow(row: RawRow, { region }: RowContext): BallotRow[] {
    const dep = getCol(row, 'Code du département');
    const local = getCol(row, 'Code de la commune');
    if (!dep || !local) throw new MalformedRowError('missing_commune_code');
    if (!isRegionDepartment(region, normalizeDepartmentCode(dep))) return [];

    const inseeCode = inseeFromParts(dep, local);
    if (!inseeCode) throw new MalformedRowError('bad_commune_code', `${dep}/${local}`);

    const list = getCol(row, 'Liste', 'Libellé de liste', 'Libellé Abrégé Liste', 'Nom');
    if (!list) throw new MalformedRowError('missing_list');

    return [
      {
        inseeCode,
        communeName: getCol(row, 'Libellé de la commune') ?? null,
        section: '',
        candidate: list,
        party: getCol(row, 'Code Nuance', 'Nuance Liste', 'Code nuance') ?? null,
        votes: requireCount(row, 'bad_vote_count', 'Voix'),
        expressed: requireCount(row, 'bad_expressed_count', 'Exprimés'),
      },
    ];
  }
}

export const MUNICIPAL_ROUND_1 = new MunicipalParser('municipal_round_1', { encoding: 'latin1', delimiter: '\t' });
export const MUNICIPAL_ROUND_2 = new MunicipalParser('municipal_round_2', { encoding: 'latin1', delimiter: ';' });

/**
 * Per-commune municipal contest. The elected list is the round 2 winner, or the
 * round 1 winner for communes decided in the first round.
 */
export function buildMunicipalContest(round1: BallotRow[], round2: BallotRow[], labels: PartyLabels): ContestBuild {
  const r1 = roundsFromTally(tallyByCommune(round1), labels);
  const r2 = roundsFromTally(tallyByCommune(round2), labels);
  const entries = assembleContest(r1.rounds, r2.rounds);
  for (const entry of Object.values(entries)) {
    const winner = entry.round_2?.[0] ?? entry.round_1?.[0];
    if (winner) entry.elected = winner;
  }
  return { entries, counts: mergeCounts(r1.counts, r2.counts) };
}
