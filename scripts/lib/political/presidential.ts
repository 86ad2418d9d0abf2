import { isRegionDepartment } from '../config';
import { getCol, type RawRow, type TableFormat } from '../csv';
import { countReason, MalformedRowError } from '../errors';
import { fullName, inseeFromParts, normalizeDepartmentCode, roundPct } from '../normalize';
import {
  assembleContest,
  byPercentageDesc,
  candidateResult,
  mergeCounts,
  requireCount,
  roundsFromTally,
  tallyByCommune,
  type BallotParser,
  type BallotRow,
  type ContestBuild,
  type RoundOutcome,
  type RowContext,
} from './ballots';
import type { PartyLabels } from './party-labels';

export interface RunoffCandidates {
  /** Candidate whose votes the round 2 file carries */
  known: string;
  /** Candidate whose share is derived from the total */
  opposing: string;
}

export const RUNOFF_2022: RunoffCandidates = { known: 'Emmanuel MACRON', opposing: 'Marine LE PEN' };

interface PresidentialColumns {
  department: string;
  commune: string;
  communeName: string;
  lastName: string;
  firstName: string;
  votes: string;
  expressed: string;
}

class PresidentialParser implements BallotParser {
  readonly name: string;
  readonly format: TableFormat;
  private readonly cols: PresidentialColumns;

  constructor(name: string, format: TableFormat, cols: PresidentialColumns) {
    this.name = name;
    this.format = format;
    this.cols = cols;
  }

  parseRow(row: RawRow, { region }: RowContext): BallotRow[] {
    const c = this.cols;
    const dep = getCol(row, c.department);
    const local = getCol(row, c.commune);
    if (!dep || !local) throw new MalformedRowError('missing_commune_code');
    if (!isRegionDepartment(region, normalizeDepartmentCode(dep))) return [];

    const inseeCode = inseeFromParts(dep, local);
    if (!inseeCode) throw new MalformedRowError('bad_commune_code', `${dep}/${local}`);

    const candidate = fullName(getCol(row, c.firstName) ?? '', getCol(row, c.lastName) ?? '');
    if (!candidate) throw new MalformedRowError('missing_candidate');

    return [
      {
        inseeCode,
        communeName: getCol(row, c.communeName) ?? null,
        section: '',
        candidate,
        party: null,
        votes: requireCount(row, 'bad_vote_count', c.votes),
        expressed: requireCount(row, 'bad_expressed_count', c.expressed),
      },
    ];
  }
}

export const PRESIDENTIAL_ROUND_1: BallotParser = new PresidentialParser(
  'presidential_round_1',
  { encoding: 'utf-8', delimiter: ',' },
  {
    department: 'dep_code',
    commune: 'commune_code',
    communeName: 'commune_name',
    lastName: 'cand_nom',
    firstName: 'cand_prenom',
    votes: 'cand_nb_voix',
    expressed: 'exprimes_nb',
  }
);

export const PRESIDENTIAL_ROUND_2: BallotParser = new PresidentialParser(
  'presidential_round_2',
  { encoding: 'latin1', delimiter: ';' },
  {
    department: 'Code du département',
    commune: 'Code de la commune',
    communeName: 'Libellé de la commune',
    lastName: 'Nom',
    firstName: 'Prénom',
    votes: 'Voix',
    expressed: 'Exprimés',
  }
);

/**
 * Shares of a two-candidate runoff from the known candidate's votes and the
 * valid-ballot total. Null when the pair cannot be a runoff result.
 */
export function deriveRunoff(knownVotes: number, expressed: number): { known: number; opposing: number } | null {
  if (expressed <= 0 || knownVotes > expressed) return null;
  return {
    known: roundPct((knownVotes / expressed) * 100),
    opposing: roundPct(((expressed - knownVotes) / expressed) * 100),
  };
}

function sameCandidate(a: string, b: string): boolean {
  const canon = (s: string) => s.trim().replace(/\s+/g, ' ').toUpperCase();
  return canon(a) === canon(b);
}

export function buildRunoffRound(rows: BallotRow[], runoff: RunoffCandidates, labels: PartyLabels): { rounds: Map<string, RoundOutcome>; counts: Record<string, number> } {
  const tally = tallyByCommune(rows);
  const rounds = new Map<string, RoundOutcome>();
  const counts: Record<string, number> = {};
  if (tally.inconsistentTotals) countReason(counts, 'inconsistent_total', tally.inconsistentTotals);

  for (const [insee, t] of tally.communes) {
    const known = t.candidates.find((c) => sameCandidate(c.candidate, runoff.known));
    if (!known) {
      countReason(counts, 'missing_known_candidate');
      continue;
    }
    const shares = deriveRunoff(known.votes, t.expressed);
    if (!shares) {
      countReason(counts, t.expressed <= 0 ? 'zero_total' : 'known_exceeds_total');
      continue;
    }
    rounds.set(insee, {
      communeName: t.communeName,
      results: [
        candidateResult(runoff.known, null, shares.known, labels),
        candidateResult(runoff.opposing, null, shares.opposing, labels),
      ].sort(byPercentageDesc),
    });
  }
  return { rounds, counts };
}

export function buildPresidentialContest(
  round1: BallotRow[],
  round2: BallotRow[],
  labels: PartyLabels,
  runoff: RunoffCandidates = RUNOFF_2022
): ContestBuild {
  const r1 = roundsFromTally(tallyByCommune(round1), labels);
  const r2 = buildRunoffRound(round2, runoff, labels);
  return { entries: assembleContest(r1.rounds, r2.rounds), counts: mergeCounts(r1.counts, r2.counts) };
}
