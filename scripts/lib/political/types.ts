import { z } from 'zod';

export const candidateResultSchema = z.object({
  candidate: z.string(),
  /** Readable party or nuance label */
  party: z.string().nullable(),
  party_code: z.string().optional(),
  percentage: z.number(),
});
export type CandidateResult = z.infer<typeof candidateResultSchema>;

const roundSchema = z.array(candidateResultSchema);

/** Per-commune output of one contest, as stored in its cache artifact. */
export const contestEntrySchema = z.object({
  commune_name: z.string().nullable(),
  round_1: roundSchema.optional(),
  round_2: roundSchema.optional(),
  elected: candidateResultSchema.optional(),
});
export type ContestEntry = z.infer<typeof contestEntrySchema>;

export const contestCacheSchema = z.record(contestEntrySchema);
export type ContestCache = z.infer<typeof contestCacheSchema>;

export const mayorEntrySchema = z.object({
  first_name: z.string(),
  last_name: z.string(),
  party_code: z.string().nullable(),
  commune_name: z.string().nullable(),
});
export type MayorEntry = z.infer<typeof mayorEntrySchema>;

export const mayorCacheSchema = z.record(mayorEntrySchema);
export type MayorCache = z.infer<typeof mayorCacheSchema>;

const municipalContestSchema = z.object({
  round_1: roundSchema.optional(),
  round_2: roundSchema.optional(),
  elected: candidateResultSchema.optional(),
});

const twoRoundContestSchema = z.object({
  round_1: roundSchema.optional(),
  round_2: roundSchema.optional(),
});

export const communeProfileSchema = z.object({
  insee_code: z.string(),
  commune_name: z.string().nullable(),
  mayor: z
    .object({
      first_name: z.string(),
      last_name: z.string(),
      party: z.string().nullable(),
      party_code: z.string().nullable(),
    })
    .optional(),
  municipal_2020: municipalContestSchema.optional(),
  presidential_2022: twoRoundContestSchema.optional(),
  legislative_2024: twoRoundContestSchema.optional(),
});
export type CommuneProfile = z.infer<typeof communeProfileSchema>;

export const politicalArtifactSchema = z.record(communeProfileSchema);
export type PoliticalArtifact = z.infer<typeof politicalArtifactSchema>;

export type ContestKey = 'municipal_2020' | 'presidential_2022' | 'legislative_2024';
export const CONTEST_KEYS: ContestKey[] = ['municipal_2020', 'presidential_2022', 'legislative_2024'];
