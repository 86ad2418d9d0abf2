/**
 * Common ground for the election feeds: a parser turns one raw row into zero or
 * more BallotRows, the row runner counts what was kept, filtered and skipped,
 * and the tally folds rows into per-commune round results.
 */

import type { RegionConfig } from '../config';
import { getCol, readTable, type RawRow, type RawTable, type TableFormat } from '../csv';
import { countReason, MalformedRowError } from '../errors';
import { parseCount, roundPct } from '../normalize';
import { partyLabel, type PartyLabels } from './party-labels';
import type { CandidateResult, ContestCache, ContestEntry } from './types';

export interface BallotRow {
  inseeCode: string;
  communeName: string | null;
  /** Sub-commune unit (polling station, constituency part); '' for commune-level files */
  section: string;
  candidate: string;
  /** Party or nuance code as found in the source */
  party: string | null;
  votes: number;
  /** Valid ballots cast in this section, repeated on every candidate row */
  expressed: number;
}

export interface RowContext {
  region: RegionConfig;
  /** Index of the row among the well-formed data rows */
  line: number;
}

export interface BallotParser {
  readonly name: string;
  readonly format: TableFormat;
  /** [] means the row is out of scope; throws MalformedRowError when unusable */
  parseRow(row: RawRow, ctx: RowContext): BallotRow[];
}

export interface RowReport<T> {
  rows: T[];
  read: number;
  kept: number;
  filtered: number;
  skipped: number;
  skipReasons: Record<string, number>;
}

export function runRows<T>(table: RawTable, parse: (row: RawRow, line: number) => T[]): RowReport<T> {
  const report: RowReport<T> = {
    rows: [],
    read: table.rows.length + table.badColumnCount,
    kept: 0,
    filtered: 0,
    skipped: table.badColumnCount,
    skipReasons: {},
  };
  if (table.badColumnCount) countReason(report.skipReasons, 'column_count', table.badColumnCount);

  table.rows.forEach((row, i) => {
    try {
      const out = parse(row, i);
      if (out.length === 0) {
        report.filtered++;
      } else {
        report.kept++;
        report.rows.push(...out);
      }
    } catch (e) {
      if (!(e instanceof MalformedRowError)) throw e;
      report.skipped++;
      countReason(report.skipReasons, e.reason);
    }
  });
  return report;
}

export function readBallotTable(buf: Buffer, parser: BallotParser, region: RegionConfig): RowReport<BallotRow> {
  return runRows(readTable(buf, parser.format), (row, line) => parser.parseRow(row, { region, line }));
}

export function requireCount(row: RawRow, reason: string, ...names: string[]): number {
  const raw = getCol(row, ...names);
  const n = parseCount(raw);
  if (n == null) throw new MalformedRowError(reason, `${names[0]}=${raw ?? ''}`);
  return n;
}

export interface CandidateTally {
  candidate: string;
  party: string | null;
  votes: number;
}

export interface CommuneTally {
  inseeCode: string;
  communeName: string | null;
  /** Sum of the per-section totals */
  expressed: number;
  candidates: CandidateTally[];
}

export interface TallyResult {
  communes: Map<string, CommuneTally>;
  inconsistentTotals: number;
  duplicateCandidates: number;
}

interface CommuneAcc {
  communeName: string | null;
  sections: Map<string, number>;
  candidates: Map<string, CandidateTally>;
  seen: Set<string>;
}

/**
 * Folds ballot rows into one tally per commune. The valid-ballot total is taken
 * once per (commune, section); sections of the same commune are summed.
 */
export function tallyByCommune(rows: BallotRow[]): TallyResult {
  const accs = new Map<string, CommuneAcc>();
  let inconsistentTotals = 0;
  let duplicateCandidates = 0;

  for (const row of rows) {
    let acc = accs.get(row.inseeCode);
    if (!acc) {
      acc = { communeName: null, sections: new Map(), candidates: new Map(), seen: new Set() };
      accs.set(row.inseeCode, acc);
    }
    if (!acc.communeName && row.communeName) acc.communeName = row.communeName;

    const total = acc.sections.get(row.section);
    if (total === undefined) acc.sections.set(row.section, row.expressed);
    else if (total !== row.expressed) inconsistentTotals++;

    const seenKey = `${row.section}|${row.candidate}`;
    if (acc.seen.has(seenKey)) {
      duplicateCandidates++;
      continue;
    }
    acc.seen.add(seenKey);

    const cand = acc.candidates.get(row.candidate);
    if (cand) {
      cand.votes += row.votes;
      if (!cand.party && row.party) cand.party = row.party;
    } else {
      acc.candidates.set(row.candidate, { candidate: row.candidate, party: row.party, votes: row.votes });
    }
  }

  const communes = new Map<string, CommuneTally>();
  for (const [inseeCode, acc] of accs) {
    let expressed = 0;
    for (const t of acc.sections.values()) expressed += t;
    communes.set(inseeCode, {
      inseeCode,
      communeName: acc.communeName,
      expressed,
      candidates: [...acc.candidates.values()],
    });
  }
  return { communes, inconsistentTotals, duplicateCandidates };
}

export function byPercentageDesc(a: CandidateResult, b: CandidateResult): number {
  return b.percentage - a.percentage || a.candidate.localeCompare(b.candidate);
}

export function candidateResult(candidate: string, partyCode: string | null, percentage: number, labels: PartyLabels): CandidateResult {
  const result: CandidateResult = { candidate, party: partyLabel(partyCode, labels), percentage };
  if (partyCode) result.party_code = partyCode;
  return result;
}

export interface RoundOutcome {
  communeName: string | null;
  results: CandidateResult[];
}

export interface RoundBuild {
  rounds: Map<string, RoundOutcome>;
  counts: Record<string, number>;
}

/**
 * Turns a tally into percentage results, most votes first, keeping at most
 * `limit` candidates. Communes whose votes cannot be expressed as shares of
 * their total are dropped and counted.
 */
export function roundsFromTally(tally: TallyResult, labels: PartyLabels, limit?: number): RoundBuild {
  const rounds = new Map<string, RoundOutcome>();
  const counts: Record<string, number> = {};
  if (tally.inconsistentTotals) countReason(counts, 'inconsistent_total', tally.inconsistentTotals);
  if (tally.duplicateCandidates) countReason(counts, 'duplicate_candidate', tally.duplicateCandidates);

  for (const [insee, t] of tally.communes) {
    if (t.expressed <= 0) {
      countReason(counts, 'zero_total');
      continue;
    }
    const votes = t.candidates.reduce((s, c) => s + c.votes, 0);
    if (votes > t.expressed) {
      countReason(counts, 'votes_exceed_total');
      continue;
    }
    const sorted = [...t.candidates].sort((a, b) => b.votes - a.votes || a.candidate.localeCompare(b.candidate));
    const kept = limit === undefined ? sorted : sorted.slice(0, limit);
    rounds.set(insee, {
      communeName: t.communeName,
      results: kept.map((c) => candidateResult(c.candidate, c.party, roundPct((c.votes / t.expressed) * 100), labels)),
    });
  }
  return { rounds, counts };
}

/** Union of the communes present in either round; a round is set only where it has data. */
export function assembleContest(round1: Map<string, RoundOutcome>, round2: Map<string, RoundOutcome>): ContestCache {
  const ids = [...new Set([...round1.keys(), ...round2.keys()])].sort();
  const out: ContestCache = {};
  for (const id of ids) {
    const r1 = round1.get(id);
    const r2 = round2.get(id);
    const entry: ContestEntry = { commune_name: r1?.communeName ?? r2?.communeName ?? null };
    if (r1 && r1.results.length) entry.round_1 = r1.results;
    if (r2 && r2.results.length) entry.round_2 = r2.results;
    if (entry.round_1 || entry.round_2) out[id] = entry;
  }
  return out;
}

export interface ContestBuild {
  entries: ContestCache;
  counts: Record<string, number>;
}

export function mergeCounts(...all: Record<string, number>[]): Record<string, number> {
  const out: Record<string, number> = {};
  for (const c of all) for (const [k, v] of Object.entries(c)) countReason(out, k, v);
  return out;
}
