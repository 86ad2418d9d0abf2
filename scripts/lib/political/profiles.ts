import { partyLabel, type PartyLabels } from './party-labels';
import type { CommuneProfile, ContestCache, ContestEntry, MayorCache, PoliticalArtifact } from './types';

export interface PoliticalInputs {
  mayors: MayorCache;
  municipal: ContestCache;
  presidential: ContestCache;
  legislative: ContestCache;
  /** INSEE code -> commune name from the identifier mapping */
  communeNames: Record<string, string>;
}

function rounds(entry: ContestEntry | undefined): { round_1?: ContestEntry['round_1']; round_2?: ContestEntry['round_2'] } | undefined {
  if (!entry || (!entry.round_1 && !entry.round_2)) return undefined;
  const out: { round_1?: ContestEntry['round_1']; round_2?: ContestEntry['round_2'] } = {};
  if (entry.round_1) out.round_1 = entry.round_1;
  if (entry.round_2) out.round_2 = entry.round_2;
  return out;
}

/**
 * One profile per commune seen in any input. Contests and rounds are present
 * only where their source had data; the mayor's party falls back to the
 * elected municipal list when the export carries none.
 */
export function mergePoliticalProfiles(inputs: PoliticalInputs, labels: PartyLabels): PoliticalArtifact {
  const { mayors, municipal, presidential, legislative, communeNames } = inputs;
  const ids = new Set<string>([
    ...Object.keys(mayors),
    ...Object.keys(municipal),
    ...Object.keys(presidential),
    ...Object.keys(legislative),
    ...Object.keys(communeNames),
  ]);

  const out: PoliticalArtifact = {};
  for (const id of [...ids].sort()) {
    const mun = municipal[id];
    const profile: CommuneProfile = {
      insee_code: id,
      commune_name:
        communeNames[id] ??
        mun?.commune_name ??
        presidential[id]?.commune_name ??
        legislative[id]?.commune_name ??
        mayors[id]?.commune_name ??
        null,
    };

    const mayor = mayors[id];
    if (mayor) {
      const code = mayor.party_code ?? mun?.elected?.party_code ?? null;
      profile.mayor = {
        first_name: mayor.first_name,
        last_name: mayor.last_name,
        party: partyLabel(code, labels),
        party_code: code,
      };
    }

    const municipalRounds = rounds(mun);
    if (municipalRounds) {
      profile.municipal_2020 = mun?.elected ? { ...municipalRounds, elected: mun.elected } : municipalRounds;
    }
    const presidentialRounds = rounds(presidential[id]);
    if (presidentialRounds) profile.presidential_2022 = presidentialRounds;
    const legislativeRounds = rounds(legislative[id]);
    if (legislativeRounds) profile.legislative_2024 = legislativeRounds;

    out[id] = profile;
  }
  return out;
}
