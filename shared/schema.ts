import { pgTable, bigint, integer, date, timestamp, doublePrecision, varchar } from "drizzle-orm/pg-core";
import { createSelectSchema } from "drizzle-zod";
import { z } from "zod";

// Read-only OMOP CDM source tables. Only the columns the cohort extract reads
// are declared; the pipeline never inserts or updates.

// ============== COLUMN REFINEMENTS ==============
// Snapshot rows arrive as JSON, so dates and ids are checked here rather than
// trusted the way PostgreSQL-typed columns are.

const CALENDAR_DATE = /^\d{4}-\d{2}-\d{2}$/;
const TIMESTAMP = /^(\d{4}-\d{2}-\d{2})[ T](\d{2}):(\d{2})(?::(\d{2})(?:\.\d+)?)?(Z|[+-]\d{2}(?::?\d{2})?)?$/;

export function isCalendarDate(value: string): boolean {
  if (!CALENDAR_DATE.test(value)) return false;
  const parsed = Date.parse(`${value}T00:00:00Z`);
  // Date.parse rolls some impossible days over (2023-02-30 -> 2023-03-02)
  return !Number.isNaN(parsed) && new Date(parsed).toISOString().startsWith(value);
}

/** "2024-03-01 10:15:00" as PostgreSQL prints it, or ISO 8601 with an optional zone. */
export function isTimestamp(value: string): boolean {
  const match = TIMESTAMP.exec(value);
  if (!match) return false;
  const [, day, hours, minutes, seconds = "00"] = match;
  return isCalendarDate(day) && Number(hours) < 24 && Number(minutes) < 60 && Number(seconds) < 60;
}

const calendarDate = (schema: z.ZodString) =>
  schema.refine(isCalendarDate, { message: "Expected a YYYY-MM-DD calendar date" });

const timestampString = (schema: z.ZodString) =>
  schema.refine(isTimestamp, { message: "Expected a parseable timestamp" });

// bigint columns read in number mode; ids past 2^53 would collide as JS numbers
const safeId = (schema: z.ZodNumber) => schema.int().safe();

// ============== CONDITION_OCCURRENCE ==============
export const conditionOccurrence = pgTable("condition_occurrence", {
  conditionOccurrenceId: bigint("condition_occurrence_id", { mode: "number" }).primaryKey(),
  personId: bigint("person_id", { mode: "number" }).notNull(),
  visitOccurrenceId: bigint("visit_occurrence_id", { mode: "number" }),
  conditionConceptId: integer("condition_concept_id").notNull(),
  conditionStartDate: date("condition_start_date", { mode: "string" }).notNull(),
});

export const conditionEventSchema = createSelectSchema(conditionOccurrence, {
  conditionOccurrenceId: safeId,
  personId: safeId,
  visitOccurrenceId: safeId,
  conditionStartDate: calendarDate,
});
export type ConditionEvent = typeof conditionOccurrence.$inferSelect;

// ============== PROCEDURE_OCCURRENCE ==============
export const procedureOccurrence = pgTable("procedure_occurrence", {
  procedureOccurrenceId: bigint("procedure_occurrence_id", { mode: "number" }).primaryKey(),
  personId: bigint("person_id", { mode: "number" }).notNull(),
  visitOccurrenceId: bigint("visit_occurrence_id", { mode: "number" }),
  procedureConceptId: integer("procedure_concept_id").notNull(),
  procedureDate: date("procedure_date", { mode: "string" }).notNull(),
  procedureDatetime: timestamp("procedure_datetime", { mode: "string" }),
});

export const procedureEventSchema = createSelectSchema(procedureOccurrence, {
  procedureOccurrenceId: safeId,
  personId: safeId,
  visitOccurrenceId: safeId,
  procedureDate: calendarDate,
  procedureDatetime: timestampString,
});
export type ProcedureEvent = typeof procedureOccurrence.$inferSelect;

// ============== PERSON ==============
export const person = pgTable("person", {
  personId: bigint("person_id", { mode: "number" }).primaryKey(),
  genderConceptId: integer("gender_concept_id"),
  raceConceptId: integer("race_concept_id"),
  ethnicityConceptId: integer("ethnicity_concept_id"),
  yearOfBirth: integer("year_of_birth"),
  srcName: varchar("src_name"), // contributing site, e.g. SITE-7
});

export const personSchema = createSelectSchema(person, {
  personId: safeId,
});
export type Person = typeof person.$inferSelect;

// ============== VISIT_OCCURRENCE ==============
export const visitOccurrence = pgTable("visit_occurrence", {
  visitOccurrenceId: bigint("visit_occurrence_id", { mode: "number" }).primaryKey(),
  personId: bigint("person_id", { mode: "number" }).notNull(),
  visitStartDate: date("visit_start_date", { mode: "string" }).notNull(),
});

export const visitSchema = createSelectSchema(visitOccurrence, {
  visitOccurrenceId: safeId,
  personId: safeId,
  visitStartDate: calendarDate,
});
export type Visit = typeof visitOccurrence.$inferSelect;

// ============== MEASUREMENT ==============
export const measurement = pgTable("measurement", {
  measurementId: bigint("measurement_id", { mode: "number" }).primaryKey(),
  personId: bigint("person_id", { mode: "number" }).notNull(),
  visitOccurrenceId: bigint("visit_occurrence_id", { mode: "number" }),
  measurementConceptId: integer("measurement_concept_id").notNull(),
  valueAsNumber: doublePrecision("value_as_number"),
  measurementDate: date("measurement_date", { mode: "string" }).notNull(),
});

export const measurementEventSchema = createSelectSchema(measurement, {
  measurementId: safeId,
  personId: safeId,
  visitOccurrenceId: safeId,
  measurementDate: calendarDate,
});
export type MeasurementEvent = typeof measurement.$inferSelect;

// ============== DRUG_EXPOSURE ==============
export const drugExposure = pgTable("drug_exposure", {
  drugExposureId: bigint("drug_exposure_id", { mode: "number" }).primaryKey(),
  personId: bigint("person_id", { mode: "number" }).notNull(),
  visitOccurrenceId: bigint("visit_occurrence_id", { mode: "number" }),
  drugConceptId: integer("drug_concept_id").notNull(),
  drugExposureStartDate: date("drug_exposure_start_date", { mode: "string" }).notNull(),
});

export const drugEventSchema = createSelectSchema(drugExposure, {
  drugExposureId: safeId,
  personId: safeId,
  visitOccurrenceId: safeId,
  drugExposureStartDate: calendarDate,
});
export type DrugEvent = typeof drugExposure.$inferSelect;

// ============== DEATH ==============
export const death = pgTable("death", {
  personId: bigint("person_id", { mode: "number" }).primaryKey(),
  deathDate: date("death_date", { mode: "string" }),
});

export const deathRecordSchema = createSelectSchema(death, {
  personId: safeId,
  deathDate: calendarDate,
});
export type DeathRecord = typeof death.$inferSelect;

// ============== SNAPSHOT ==============
// A JSON extract of the source tables, keyed by table name.
export const sourceSnapshotSchema = z.object({
  conditionOccurrence: z.array(conditionEventSchema).default([]),
  procedureOccurrence: z.array(procedureEventSchema).default([]),
  person: z.array(personSchema).default([]),
  visitOccurrence: z.array(visitSchema).default([]),
  measurement: z.array(measurementEventSchema).default([]),
  drugExposure: z.array(drugEventSchema).default([]),
  death: z.array(deathRecordSchema).default([]),
});

export type SourceSnapshot = z.infer<typeof sourceSnapshotSchema>;
