/**
 * MEASUREMENT AGGREGATOR
 *
 * Per-visit arithmetic means of lab-style measurements, rounded to each
 * variable's precision, plus the derived vitals computed from them.
 *
 * Data-quality filter: events with a null or non-positive value are dropped
 * without being reported. Events anywhere in the visit count; there is no
 * window around the ECMO episode.
 *
 * Fallback: a variable with a fallback concept uses the primary mean whenever
 * the primary has any qualifying sample, however few. The fallback is read
 * only when the primary mean is null.
 */

import type { MeasurementEvent } from "@shared/schema";
import type { DerivedInputs, MeasurementVariable } from "../cohortConfig";
import {
  type VisitKey,
  type VisitRef,
  mean,
  roundTo,
  safeDivide,
  visitKey,
} from "../cohortContract";

// ============================================================================
// TYPES
// ============================================================================

export interface LabAggregate extends VisitRef {
  /** Rounded means keyed by variable name; null when no qualifying sample */
  labs: Record<string, number | null>;
  mapAvg: number | null;
  pfRatio: number | null;
  neutrophilLymphocyteRatio: number | null;
  /** Unrounded MAP from the rounded BP means; the cardiovascular score uses this */
  mapUnrounded: number | null;
  /** Unrounded P/F from the rounded PaO2/FiO2 means; the respiratory score uses this */
  pfRatioUnrounded: number | null;
  sampleCount: number;
}

type ValuesByConcept = Map<number, number[]>;

// ============================================================================
// PURE AGGREGATES
// ============================================================================

export function isQualifyingValue(value: number | null): value is number {
  return value !== null && Number.isFinite(value) && value > 0;
}

function conceptMean(values: ValuesByConcept, conceptId: number): number | null {
  return mean(values.get(conceptId) ?? []);
}

/**
 * Two-step coalesce: primary mean, and only when that is null, the fallback
 * mean. Never blends the two.
 */
export function meanWithFallback(values: ValuesByConcept, variable: MeasurementVariable): number | null {
  const primary = conceptMean(values, variable.primaryConceptId);
  if (primary !== null) return primary;
  if (variable.fallbackConceptId === undefined) return null;
  return conceptMean(values, variable.fallbackConceptId);
}

export function meanArterialPressure(diastolicAvg: number | null, systolicAvg: number | null): number | null {
  if (diastolicAvg === null || systolicAvg === null) return null;
  return (2 * diastolicAvg + systolicAvg) / 3;
}

export function pfRatio(pao2Avg: number | null, fio2Avg: number | null): number | null {
  if (pao2Avg === null || fio2Avg === null || !(fio2Avg > 0)) return null;
  return pao2Avg / (fio2Avg / 100);
}

function roundOrNull(value: number | null, digits: number): number | null {
  return value === null ? null : roundTo(value, digits);
}

// ============================================================================
// ENGINE
// ============================================================================

export function aggregateMeasurements(
  visits: readonly VisitRef[],
  events: readonly MeasurementEvent[],
  variables: readonly MeasurementVariable[],
  derived: DerivedInputs
): Map<VisitKey, LabAggregate> {
  const targetCodes = new Set<number>();
  for (const v of variables) {
    targetCodes.add(v.primaryConceptId);
    if (v.fallbackConceptId !== undefined) targetCodes.add(v.fallbackConceptId);
  }

  const cohortVisits = new Map(visits.map(v => [visitKey(v), v]));
  const grouped = new Map<VisitKey, ValuesByConcept>();
  const counts = new Map<VisitKey, number>();

  for (const e of events) {
    if (e.visitOccurrenceId === null || !targetCodes.has(e.measurementConceptId)) continue;
    const value = e.valueAsNumber;
    if (!isQualifyingValue(value)) continue;
    const key = visitKey({ personId: e.personId, visitId: e.visitOccurrenceId });
    if (!cohortVisits.has(key)) continue;

    let byConcept = grouped.get(key);
    if (!byConcept) {
      byConcept = new Map();
      grouped.set(key, byConcept);
    }
    const bucket = byConcept.get(e.measurementConceptId);
    if (bucket) bucket.push(value);
    else byConcept.set(e.measurementConceptId, [value]);
    counts.set(key, (counts.get(key) ?? 0) + 1);
  }

  const variableByName = new Map(variables.map(v => [v.name, v]));
  const result = new Map<VisitKey, LabAggregate>();

  for (const [key, values] of grouped) {
    const ref = cohortVisits.get(key);
    if (!ref) continue;

    const labs: Record<string, number | null> = {};
    for (const variable of variables) {
      labs[variable.name] = roundOrNull(meanWithFallback(values, variable), variable.precision);
    }

    const lab = (name: string): number | null => labs[name] ?? null;
    const rawMean = (name: string): number | null => {
      const variable = variableByName.get(name);
      return variable ? meanWithFallback(values, variable) : null;
    };

    const mapUnrounded = meanArterialPressure(lab(derived.diastolic), lab(derived.systolic));
    const pfUnrounded = pfRatio(lab(derived.pao2), lab(derived.fio2));

    result.set(key, {
      personId: ref.personId,
      visitId: ref.visitId,
      labs,
      mapAvg: roundOrNull(mapUnrounded, 1),
      pfRatio: roundOrNull(pfUnrounded, 1),
      neutrophilLymphocyteRatio: roundOrNull(safeDivide(rawMean(derived.neutrophils), rawMean(derived.lymphocytes)), 2),
      mapUnrounded,
      pfRatioUnrounded: pfUnrounded,
      sampleCount: counts.get(key) ?? 0,
    });
  }

  return result;
}
