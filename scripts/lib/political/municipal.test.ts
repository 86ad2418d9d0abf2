import { describe, it, expect } from 'vitest';
import { PAYS_DE_LA_LOIRE } from '../config';
import { readBallotTable } from './ballots';
import { buildMunicipalContest, MUNICIPAL_ROUND_1, MUNICIPAL_ROUND_2 } from './municipal';
import { loadPartyLabels } from './party-labels';

const labels = loadPartyLabels();

const HEADER = ['Code du département', 'Code de la commune', 'Libellé de la commune', 'Liste', 'Code Nuance', 'Voix', 'Exprimés'];

function fixture(delimiter: string, lines: string[][]): Buffer {
  return Buffer.from([HEADER, ...lines].map((l) => l.join(delimiter)).join('\n') + '\n', 'latin1');
}

const ABBARETZ = [
  ['44', '001', 'Abbaretz', 'ABBARETZ CAP AVENIR', 'LNC', '300', '500'],
  ['44', '001', 'Abbaretz', 'AGIR ENSEMBLE', 'LDVD', '200', '500'],
];

describe('municipal parsers', () => {
  it('parse tab and semicolon files to the same rows', () => {
    const tab = readBallotTable(fixture('\t', ABBARETZ), MUNICIPAL_ROUND_1, PAYS_DE_LA_LOIRE);
    const semi = readBallotTable(fixture(';', ABBARETZ), MUNICIPAL_ROUND_2, PAYS_DE_LA_LOIRE);
    expect(tab.rows).toHaveLength(2);
    expect(semi.rows).toEqual(tab.rows);
    expect(tab.rows[0]).toEqual({
      inseeCode: '44001',
      communeName: 'Abbaretz',
      section: '',
      candidate: 'ABBARETZ CAP AVENIR',
      party: 'LNC',
      votes: 300,
      expressed: 500,
    });
  });

  it('decodes Latin-1 headers and values', () => {
    const report = readBallotTable(
      fixture(';', [['85', '191', "Les Sables-d'Olonne", 'ÉLAN COMMUN', 'LDVC', '10', '10']]),
      MUNICIPAL_ROUND_2,
      PAYS_DE_LA_LOIRE
    );
    expect(report.rows[0]?.candidate).toBe('ÉLAN COMMUN');
    expect(report.rows[0]?.inseeCode).toBe('85191');
  });

  it('filters other departments and counts malformed rows', () => {
    const report = readBallotTable(
      fixture('\t', [
        ['75', '056', 'Paris', 'LISTE', 'LDVG', '1', '2'],
        ['44', 'ABC', 'X', 'LISTE', 'LDVG', '1', '2'],
        ['44', '002', 'Y', 'LISTE', 'LDVG', 'n/a', '2'],
      ]),
      MUNICIPAL_ROUND_1,
      PAYS_DE_LA_LOIRE
    );
    expect(report.filtered).toBe(1);
    expect(report.skipReasons).toEqual({ bad_commune_code: 1, bad_vote_count: 1 });
  });
});

describe('buildMunicipalContest', () => {
  it('elects the round 1 winner when there is no second round', () => {
    const r1 = readBallotTable(fixture('\t', ABBARETZ), MUNICIPAL_ROUND_1, PAYS_DE_LA_LOIRE).rows;
    const { entries } = buildMunicipalContest(r1, [], labels);
    expect(entries['44001']).toEqual({
      commune_name: 'Abbaretz',
      round_1: [
        { candidate: 'ABBARETZ CAP AVENIR', party: 'Non classé', party_code: 'LNC', percentage: 60 },
        { candidate: 'AGIR ENSEMBLE', party: 'Divers droite', party_code: 'LDVD', percentage: 40 },
      ],
      elected: { candidate: 'ABBARETZ CAP AVENIR', party: 'Non classé', party_code: 'LNC', percentage: 60 },
    });
  });

  it('elects the round 2 winner when there is one', () => {
    const r1 = readBallotTable(
      fixture('\t', [
        ['44', '109', 'Nantes', 'LISTE A', 'LUG', '450', '1000'],
        ['44', '109', 'Nantes', 'LISTE B', 'LLR', '350', '1000'],
        ['44', '109', 'Nantes', 'LISTE C', 'LVEC', '200', '1000'],
      ]),
      MUNICIPAL_ROUND_1,
      PAYS_DE_LA_LOIRE
    ).rows;
    const r2 = readBallotTable(
      fixture(';', [
        ['44', '109', 'Nantes', 'LISTE A', 'LUG', '400', '1000'],
        ['44', '109', 'Nantes', 'LISTE B', 'LLR', '600', '1000'],
      ]),
      MUNICIPAL_ROUND_2,
      PAYS_DE_LA_LOIRE
    ).rows;
    const { entries, counts } = buildMunicipalContest(r1, r2, labels);
    expect(counts).toEqual({});
    expect(entries['44109']?.elected).toEqual({
      candidate: 'LISTE B',
      party: 'Les Républicains',
      party_code: 'LLR',
      percentage: 60,
    });
    expect(entries['44109']?.round_1).toHaveLength(3);
  });
});
