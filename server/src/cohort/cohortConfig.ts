/**
 * Cohort configuration: code sets, lab variables, exposure classes and the
 * display-label tables. Loaded from JSON and validated with zod so a
 * malformed file fails before any query runs.
 */

import fs from "fs";
import path from "path";
import { z } from "zod";

export const DEFAULT_CONFIG_PATH = path.join("config", "ecmo-vv.json");

// ═══════════════════════════════════════════════════════════════════════════════
// SCHEMA
// ═══════════════════════════════════════════════════════════════════════════════

const conceptSchema = z.object({
  conceptId: z.number().int(),
  name: z.string().min(1),
});

const measurementVariableSchema = z.object({
  name: z.string().min(1),
  primaryConceptId: z.number().int(),
  fallbackConceptId: z.number().int().optional(),
  precision: z.number().int().min(0).max(6),
});

const exposureClassSchema = z.object({
  name: z.string().min(1),
  group: z.string().min(1).optional(),
  conceptIds: z.array(z.number().int()).min(1),
});

const labelTableSchema = z.object({
  map: z.record(z.string(), z.string()),
  fallback: z.string(),
});

const bucketSchema = z.union([
  z.object({ below: z.number(), label: z.string() }).strict(),
  z.object({ atMost: z.number(), label: z.string() }).strict(),
  z.object({ label: z.string() }).strict(),
]);

const bucketTableSchema = z.object({
  buckets: z.array(bucketSchema).min(1),
  fallback: z.string(),
});

const derivedInputsSchema = z.object({
  pao2: z.string(),
  fio2: z.string(),
  platelets: z.string(),
  bilirubin: z.string(),
  systolic: z.string(),
  diastolic: z.string(),
  neutrophils: z.string(),
  lymphocytes: z.string(),
});

export const cohortConfigSchema = z
  .object({
    name: z.string().min(1),
    qualifyingDiagnoses: z.array(conceptSchema).min(1),
    ecmoProcedures: z.array(conceptSchema).min(1),
    crrtProcedures: z.array(conceptSchema).min(1),
    measurements: z.array(measurementVariableSchema).min(1),
    derivedInputs: derivedInputsSchema,
    exposures: z.array(exposureClassSchema),
    vasopressorGroup: z.string().min(1),
    labels: z.object({
      site: labelTableSchema,
      gender: labelTableSchema,
      race: labelTableSchema,
      ethnicity: labelTableSchema,
      ageBuckets: bucketTableSchema,
      durationBuckets: bucketTableSchema,
      severityBuckets: bucketTableSchema,
    }),
  })
  .superRefine((config, ctx) => {
    const measurementNames = new Set<string>();
    for (const m of config.measurements) {
      if (measurementNames.has(m.name)) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, path: ["measurements"], message: `Duplicate measurement variable "${m.name}"` });
      }
      measurementNames.add(m.name);
    }

    for (const [input, name] of Object.entries(config.derivedInputs)) {
      if (!measurementNames.has(name)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ["derivedInputs", input],
          message: `References unknown measurement variable "${name}"`,
        });
      }
    }

    const exposureNames = new Set<string>();
    for (const e of config.exposures) {
      if (exposureNames.has(e.name)) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, path: ["exposures"], message: `Duplicate exposure class "${e.name}"` });
      }
      exposureNames.add(e.name);
    }

    if (!config.exposures.some(e => e.group === config.vasopressorGroup)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["vasopressorGroup"],
        message: `No exposure class belongs to group "${config.vasopressorGroup}"`,
      });
    }
  });

export type CohortConfig = z.infer<typeof cohortConfigSchema>;
export type MeasurementVariable = z.infer<typeof measurementVariableSchema>;
export type ExposureClass = z.infer<typeof exposureClassSchema>;
export type LabelTable = z.infer<typeof labelTableSchema>;
export type Bucket = z.infer<typeof bucketSchema>;
export type BucketTable = z.infer<typeof bucketTableSchema>;
export type DerivedInputs = z.infer<typeof derivedInputsSchema>;

// ═══════════════════════════════════════════════════════════════════════════════
// LOADING
// ═══════════════════════════════════════════════════════════════════════════════

export function parseCohortConfig(raw: unknown): CohortConfig {
  const result = cohortConfigSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues
      .map(issue => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
      .join("; ");
    throw new Error(`Invalid cohort configuration: ${issues}`);
  }
  return result.data;
}

export function loadCohortConfig(configPath: string = DEFAULT_CONFIG_PATH): CohortConfig {
  const resolved = path.isAbsolute(configPath) ? configPath : path.join(process.cwd(), configPath);
  const raw: unknown = JSON.parse(fs.readFileSync(resolved, "utf8"));
  return parseCohortConfig(raw);
}

export function conceptIds(concepts: ReadonlyArray<{ conceptId: number }>): number[] {
  return concepts.map(c => c.conceptId);
}

/** Every concept id the measurement aggregator reads, primaries and fallbacks. */
export function measurementConceptIds(config: CohortConfig): number[] {
  const ids = new Set<number>();
  for (const m of config.measurements) {
    ids.add(m.primaryConceptId);
    if (m.fallbackConceptId !== undefined) ids.add(m.fallbackConceptId);
  }
  return [...ids];
}

export function exposureConceptIds(config: CohortConfig): number[] {
  return [...new Set(config.exposures.flatMap(e => e.conceptIds))];
}
