/**
 * Record shapes shared by the fetchers, the merger and the validation suite.
 * Cache artifacts are validated against these schemas when read back.
 */

import { z } from 'zod';

export const schoolCategorySchema = z.enum(['primary', 'middle', 'high']);
export type SchoolCategory = z.infer<typeof schoolCategorySchema>;

export const CATEGORY_ORDER: Record<SchoolCategory, number> = { primary: 0, middle: 1, high: 2 };

export const sectorSchema = z.enum(['public', 'private']);
export type Sector = z.infer<typeof sectorSchema>;

export const ipsValueSchema = z.discriminatedUnion('kind', [
  z.object({ kind: z.literal('numeric'), value: z.number() }),
  z.object({ kind: z.literal('not_significant') }),
]);
export type IpsValue = z.infer<typeof ipsValueSchema>;

const nullableNumber = z.number().nullable();
const nullableString = z.string().nullable();

export const directoryRecordSchema = z.object({
  uai: z.string(),
  name: z.string(),
  type_etablissement: z.string(),
  libelle_nature: z.string(),
  statut_public_prive: z.string(),
  street: z.string(),
  postal_code: z.string(),
  city: z.string(),
  code_commune: nullableString,
  department: z.string(),
  latitude: nullableNumber,
  longitude: nullableNumber,
  phone: nullableString,
  email: nullableString,
  website: nullableString,
  students: nullableNumber,
  ecole_elementaire: z.boolean().nullable(),
  voie_generale: z.boolean().nullable(),
  voie_professionnelle: z.boolean().nullable(),
});
export type DirectoryRecord = z.infer<typeof directoryRecordSchema>;

export const ipsRecordSchema = z.object({
  uai: z.string(),
  school_year: z.string(),
  value: ipsValueSchema,
  std_dev: nullableNumber,
  regional_average: nullableNumber,
  departmental_average: nullableNumber,
  national_average: nullableNumber,
});
export type IpsRecord = z.infer<typeof ipsRecordSchema>;

export const enrollmentRecordSchema = z.object({
  uai: z.string(),
  school_year: z.string(),
  students: z.number(),
  classes: nullableNumber,
});
export type EnrollmentRecord = z.infer<typeof enrollmentRecordSchema>;

export const languageRecordSchema = z.object({
  uai: z.string(),
  lv1: z.array(z.string()),
  lv2: z.array(z.string()),
});
export type LanguageRecord = z.infer<typeof languageRecordSchema>;

export const brevetRecordSchema = z.object({
  uai: z.string(),
  session: z.string(),
  success_rate: nullableNumber,
  registered: nullableNumber,
  present: nullableNumber,
  admitted: nullableNumber,
  honors_none: nullableNumber,
  honors_fairly_good: nullableNumber,
  honors_good: nullableNumber,
  honors_very_good: nullableNumber,
});
export type BrevetRecord = z.infer<typeof brevetRecordSchema>;

export const bacRecordSchema = z.object({
  uai: z.string(),
  year: z.string(),
  success_rate: nullableNumber,
  access_rate_2nde: nullableNumber,
  access_rate_1ere: nullableNumber,
  access_rate_term: nullableNumber,
  value_added_success: nullableNumber,
  value_added_access_2nde: nullableNumber,
  students_present: nullableNumber,
});
export type BacRecord = z.infer<typeof bacRecordSchema>;

export const brevetResultsSchema = z.object({
  type: z.literal('brevet'),
  year: z.string(),
  success_rate: nullableNumber,
  students_registered: nullableNumber,
  students_present: nullableNumber,
  students_admitted: nullableNumber,
  honors: z.object({
    none: nullableNumber,
    fairly_good: nullableNumber,
    good: nullableNumber,
    very_good: nullableNumber,
  }),
});

export const bacResultsSchema = z.object({
  type: z.literal('bac'),
  year: z.string(),
  success_rate: nullableNumber,
  access_rate_2nde: nullableNumber,
  access_rate_1ere: nullableNumber,
  access_rate_term: nullableNumber,
  value_added_success: nullableNumber,
  value_added_access_2nde: nullableNumber,
  students_present: nullableNumber,
});

export const examResultsSchema = z.discriminatedUnion('type', [brevetResultsSchema, bacResultsSchema]);
export type ExamResults = z.infer<typeof examResultsSchema>;

export const schoolRecordSchema = z.object({
  uai: z.string(),
  name: z.string(),
  category: schoolCategorySchema,
  sector: sectorSchema,
  address: z.object({
    street: z.string(),
    postal_code: z.string(),
    city: z.string(),
    insee_code: nullableString,
    department: z.string(),
  }),
  coordinates: z.object({ latitude: z.number(), longitude: z.number() }).nullable(),
  contact: z.object({
    phone: nullableString,
    email: nullableString,
    website: nullableString,
  }),
  enrollment: z
    .object({
      students: z.number(),
      classes: nullableNumber,
      school_year: z.string(),
    })
    .optional(),
  /** Enrollment headcount, else the directory's */
  student_count: z.number().optional(),
  class_size: z.number().optional(),
  ips: z
    .object({
      value: ipsValueSchema,
      year: z.string(),
      std_dev: nullableNumber,
      regional_average: nullableNumber,
      departmental_average: nullableNumber,
      national_average: nullableNumber,
    })
    .optional(),
  exam_results: examResultsSchema.optional(),
  languages: z.object({ lv1: z.array(z.string()), lv2: z.array(z.string()) }).optional(),
});
export type SchoolRecord = z.infer<typeof schoolRecordSchema>;

export const schoolsArtifactSchema = z.array(schoolRecordSchema);
