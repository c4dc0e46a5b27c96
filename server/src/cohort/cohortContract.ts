/**
 * COHORT CONTRACT
 *
 * Shared types and pure helpers for the cohort extract. Every per-visit table
 * produced by an engine is keyed by (personId, visitId); engines exchange
 * ReadonlyMaps keyed by `visitKey()` and never mutate each other's output.
 */

// ============================================================================
// KEYS
// ============================================================================

export interface VisitRef {
  personId: number;
  visitId: number;
}

export type VisitKey = string;

export type Flag = 0 | 1;

export function visitKey(ref: VisitRef): VisitKey {
  return `${ref.personId}:${ref.visitId}`;
}

export function compareVisitRefs(a: VisitRef, b: VisitRef): number {
  return a.personId - b.personId || a.visitId - b.visitId;
}

export function toFlag(value: boolean): Flag {
  return value ? 1 : 0;
}

// ============================================================================
// NUMERIC HELPERS
// ============================================================================

/**
 * Rounds half away from zero, matching PostgreSQL numeric ROUND. Uses exponent shifting so
 * that values such as 1.005 round to 1.01 rather than 1.
 */
export function roundTo(value: number, digits: number): number {
  const sign = value < 0 ? -1 : 1;
  const magnitude = Math.abs(value);
  if (String(magnitude).includes("e")) {
    const factor = 10 ** digits;
    return (sign * Math.round(magnitude * factor)) / factor;
  }
  const shifted = Math.round(Number(`${magnitude}e${digits}`));
  return sign * Number(`${shifted}e-${digits}`);
}

export function mean(values: readonly number[]): number | null {
  if (values.length === 0) return null;
  let sum = 0;
  for (const v of values) sum += v;
  return sum / values.length;
}

/** Division that yields null instead of Infinity/NaN. */
export function safeDivide(numerator: number | null, denominator: number | null): number | null {
  if (numerator === null || denominator === null || denominator === 0) return null;
  return numerator / denominator;
}

// ============================================================================
// DATE HELPERS
// ============================================================================

const MS_PER_DAY = 24 * 60 * 60 * 1000;
const MS_PER_HOUR = 60 * 60 * 1000;

/** Parses a YYYY-MM-DD calendar date as midnight UTC. */
export function parseCalendarDate(value: string): number {
  return Date.parse(`${value.slice(0, 10)}T00:00:00Z`);
}

/**
 * Parses a timestamp as stored by PostgreSQL ("2024-03-01 10:15:00") or ISO.
 * Values without a zone designator are read as UTC.
 */
export function parseInstant(value: string): number {
  const iso = value.includes("T") ? value : value.replace(" ", "T");
  const hasZone = /(Z|[+-]\d{2}(:?\d{2})?)$/.test(iso);
  return Date.parse(hasZone ? iso : `${iso}Z`);
}

export function formatCalendarDate(epochMs: number): string {
  return new Date(epochMs).toISOString().slice(0, 10);
}

export function formatInstant(epochMs: number): string {
  return new Date(epochMs).toISOString();
}

export function addDays(date: string, days: number): string {
  return formatCalendarDate(parseCalendarDate(date) + days * MS_PER_DAY);
}

export function daysBetween(from: string, to: string): number {
  return Math.round((parseCalendarDate(to) - parseCalendarDate(from)) / MS_PER_DAY);
}

export function hoursBetween(fromMs: number, toMs: number): number {
  return (toMs - fromMs) / MS_PER_HOUR;
}

export function calendarYear(date: string): number {
  return Number(date.slice(0, 4));
}

// ============================================================================
// CALCULATION FORMULAS
// ============================================================================

export const CALCULATION_FORMULAS = {
  AGE_AT_ADMISSION: "year(visit_start_date) - year_of_birth",
  ECMO_DURATION_DAYS: "visit_ecmo_end_date - visit_ecmo_start_date",
  ECMO_DURATION_HOURS: "visit_ecmo_end_datetime - visit_ecmo_start_datetime",
  LAB_AVERAGE: "ROUND(AVG(value_as_number WHERE value_as_number > 0), precision)",
  FIO2_FALLBACK: "COALESCE(AVG(primary), AVG(fallback))",
  MAP: "ROUND((2 * diastolic_bp_avg + systolic_bp_avg) / 3, 1)",
  PF_RATIO: "ROUND(pao2_avg / (fio2_avg / 100), 1) WHEN fio2_avg > 0",
  NLR: "ROUND(AVG(neutrophils) / NULLIF(AVG(lymphocytes), 0), 2)",
  SOFA_TOTAL: "COALESCE(resp, 0) + COALESCE(coag, 0) + COALESCE(liver, 0) + COALESCE(cardio, 0)",
  MORTALITY_30D: "death_date BETWEEN ecmo_start_date AND ecmo_end_date + 30 days",
} as const;
