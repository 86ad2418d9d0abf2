import { isRegionDepartment } from '../config';
import { getCol, type RawRow, type TableFormat } from '../csv';
import { MalformedRowError } from '../errors';
import { fullName, normalizeDepartmentCode, parseCount } from '../normalize';
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

export const LEGISLATIVE_ROUND_2_LIMIT = 2;

/**
 * Legislative 2024 wide format: one row per commune section, candidates in
 * numbered column groups until the first empty name. "Code commune" already
 * holds the full INSEE code.
 */
export class LegislativeParser implements BallotParser {
  readonly name: string;
  readonly format: TableFormat = { encoding: 'utf-8', delimiter: ';' };

  constructor(name: string) {
    this.name = name;
  }

  parseRow(row: RawRow, { region, line }: RowContext): BallotRow[] {
    const inseeCode = getCol(row, 'Code commune');
    if (!inseeCode || inseeCode.length !== 5) throw new MalformedRowError('bad_commune_code', inseeCode ?? '');

    const dep = getCol(row, 'Code département');
    const department = dep ? normalizeDepartmentCode(dep) : inseeCode.slice(0, 2);
    if (!isRegionDepartment(region, department)) return [];

    const expressed = requireCount(row, 'bad_expressed_count', 'Exprimés');
    const section =
      getCol(row, 'Code BV', 'Code circonscription législative', 'Code circonscription') ?? `row-${line}`;
    const communeName = getCol(row, 'Libellé commune', 'Libellé de la commune') ?? null;

    const out: BallotRow[] = [];
    for (let n = 1; ; n++) {
      const last = getCol(row, `Nom candidat ${n}`);
      if (!last) break;
      const votes = parseCount(getCol(row, `Voix ${n}`));
      if (votes == null) throw new MalformedRowError('bad_vote_count', `Voix ${n}`);
      out.push({
        inseeCode,
        communeName,
        section,
        candidate: fullName(getCol(row, `Prénom candidat ${n}`) ?? '', last),
        party: getCol(row, `Nuance candidat ${n}`) ?? null,
        votes,
        expressed,
      });
    }
    if (!out.length) throw new MalformedRowError('no_candidates');
    return out;
  }
}

export const LEGISLATIVE_ROUND_1 = new LegislativeParser('legislative_round_1');
export const LEGISLATIVE_ROUND_2 = new LegislativeParser('legislative_round_2');

/** Round 1 keeps every candidate; round 2 keeps the top two by votes. */
export function buildLegislativeContest(round1: BallotRow[], round2: BallotRow[], labels: PartyLabels): ContestBuild {
  const r1 = roundsFromTally(tallyByCommune(round1), labels);
  const r2 = roundsFromTally(tallyByCommune(round2), labels, LEGISLATIVE_ROUND_2_LIMIT);
  return { entries: assembleContest(r1.rounds, r2.rounds), counts: mergeCounts(r1.counts, r2.counts) };
}
