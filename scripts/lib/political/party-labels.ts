import * as fs from 'fs';
import { z } from 'zod';

const labelTableSchema = z.record(z.string());

export type PartyLabels = Record<string, string>;

let loaded: PartyLabels | null = null;

/** The static code -> label table shipped next to this module. */
export function loadPartyLabels(): PartyLabels {
  if (!loaded) {
    const raw: unknown = JSON.parse(fs.readFileSync(new URL('./party-labels.json', import.meta.url), 'utf-8'));
    loaded = labelTableSchema.parse(raw);
  }
  return loaded;
}

/**
 * Readable label for a municipal list code or a legislative nuance code.
 * Unknown codes are returned as-is; empty codes give null.
 */
export function partyLabel(code: string | null | undefined, labels: PartyLabels = loadPartyLabels()): string | null {
  const c = code?.trim().toUpperCase();
  if (!c) return null;
  return labels[c] ?? c;
}
