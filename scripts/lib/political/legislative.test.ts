import { describe, it, expect } from 'vitest';
import { PAYS_DE_LA_LOIRE } from '../config';
import { readBallotTable } from './ballots';
import { buildLegislativeContest, LEGISLATIVE_ROUND_1, LEGISLATIVE_ROUND_2 } from './legislative';
import { loadPartyLabels } from './party-labels';

const labels = loadPartyLabels();

function header(candidates: number): string {
  const cols = ['Code département', 'Code commune', 'Libellé commune', 'Exprimés'];
  for (let n = 1; n <= candidates; n++) {
    cols.push(`Nom candidat ${n}`, `Prénom candidat ${n}`, `Voix ${n}`, `Nuance candidat ${n}`);
  }
  return cols.join(';');
}

const FOUR_WAY = '44;44109;Nantes;1000;MARTIN;Paul;400;RN;DUBOIS;Anne;300;UG;LEROY;Luc;200;ENS;PETIT;Eve;100;LR';

describe('legislative parser', () => {
  it('uses the commune code verbatim', () => {
    const report = readBallotTable(Buffer.from([header(4), FOUR_WAY].join('\n')), LEGISLATIVE_ROUND_1, PAYS_DE_LA_LOIRE);
    expect(report.rows).toHaveLength(4);
    expect(new Set(report.rows.map((r) => r.inseeCode))).toEqual(new Set(['44109']));
  });

  it('stops at the first empty candidate group', () => {
    const text = [header(3), '49;49007;Angers;500;A;Un;300;DVD;B;Deux;200;DVG;;;;'].join('\n');
    const report = readBallotTable(Buffer.from(text), LEGISLATIVE_ROUND_1, PAYS_DE_LA_LOIRE);
    expect(report.rows.map((r) => r.candidate)).toEqual(['Un A', 'Deux B']);
  });

  it('rejects commune codes that are not five characters', () => {
    const text = [header(1), '44;4410;X;10;A;B;10;RN', '75;75056;Paris;10;A;B;10;RN'].join('\n');
    const report = readBallotTable(Buffer.from(text), LEGISLATIVE_ROUND_1, PAYS_DE_LA_LOIRE);
    expect(report.skipReasons).toEqual({ bad_commune_code: 1 });
    expect(report.filtered).toBe(1);
  });
});

describe('buildLegislativeContest', () => {
  it('keeps every round 1 candidate and the top two in round 2', () => {
    const buf = Buffer.from([header(4), FOUR_WAY].join('\n'));
    const r1 = readBallotTable(buf, LEGISLATIVE_ROUND_1, PAYS_DE_LA_LOIRE).rows;
    const r2 = readBallotTable(buf, LEGISLATIVE_ROUND_2, PAYS_DE_LA_LOIRE).rows;
    const { entries } = buildLegislativeContest(r1, r2, labels);

    expect(Object.keys(entries)).toEqual(['44109']);
    expect(entries['44109']?.round_1).toHaveLength(4);
    expect(entries['44109']?.round_2).toEqual([
      { candidate: 'Paul MARTIN', party: 'Rassemblement national', party_code: 'RN', percentage: 40 },
      { candidate: 'Anne DUBOIS', party: 'Union de la gauche', party_code: 'UG', percentage: 30 },
    ]);
  });

  it('sums the sections of a commune', () => {
    const text = [
      header(2),
      '44;44001;Abbaretz;100;A;Jean;60;RN;B;Lou;40;UG',
      '44;44001;Abbaretz;300;A;Jean;100;RN;B;Lou;200;UG',
    ].join('\n');
    const rows = readBallotTable(Buffer.from(text), LEGISLATIVE_ROUND_1, PAYS_DE_LA_LOIRE).rows;
    const { entries } = buildLegislativeContest(rows, [], labels);
    expect(entries['44001']?.round_1?.map((r) => [r.candidate, r.percentage])).toEqual([
      ['Lou B', 60],
      ['Jean A', 40],
    ]);
  });
});
