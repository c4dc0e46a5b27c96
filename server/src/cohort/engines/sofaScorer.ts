/**
 * MODIFIED SOFA SCORER
 *
 * Four independently scored components (respiratory, coagulation, liver,
 * cardiovascular). The neurological field is carried for schema stability
 * and is always null: the source has no usable GCS data.
 *
 * The total treats a null component as 0 and is NOT scaled by
 * `componentsAvailable`. Totals from visits with different missing-data
 * patterns are therefore not comparable; downstream analyses should read the
 * two fields together.
 */

import type { Flag, VisitKey, VisitRef } from "../cohortContract";
import { visitKey } from "../cohortContract";
import type { LabAggregate } from "./measurementAggregator";
import type { VisitExposures } from "./exposureSummarizer";

// ============================================================================
// LADDERS
// ============================================================================

/** Ordered (lower bound, score) steps; the first step whose bound is met wins. */
export type ScoreLadder = ReadonlyArray<readonly [lowerBound: number, score: number]>;

export const RESPIRATORY_LADDER: ScoreLadder = [
  [400, 0],
  [300, 1],
  [200, 2],
  [100, 3],
  [-Infinity, 4],
];

export const COAGULATION_LADDER: ScoreLadder = [
  [150, 0],
  [100, 1],
  [50, 2],
  [20, 3],
  [-Infinity, 4],
];

export const LIVER_LADDER: ScoreLadder = [
  [12.0, 4],
  [6.0, 3],
  [2.0, 2],
  [1.2, 1],
  [-Infinity, 0],
];

export const MAP_THRESHOLD = 70;

export function scoreByLadder(value: number | null, ladder: ScoreLadder): number | null {
  if (value === null || Number.isNaN(value)) return null;
  for (const [lowerBound, score] of ladder) {
    if (value >= lowerBound) return score;
  }
  return null;
}

// ============================================================================
// COMPONENTS
// ============================================================================

export function respiratoryScore(pfRatio: number | null): number | null {
  return scoreByLadder(pfRatio, RESPIRATORY_LADDER);
}

export function coagulationScore(plateletsAvg: number | null): number | null {
  return scoreByLadder(plateletsAvg, COAGULATION_LADDER);
}

export function liverScore(bilirubinAvg: number | null): number | null {
  return scoreByLadder(bilirubinAvg, LIVER_LADDER);
}

export function cardiovascularScore(map: number | null, anyVasopressor: Flag): number | null {
  if (map !== null) {
    if (map >= MAP_THRESHOLD) return anyVasopressor === 1 ? 2 : 0;
    return anyVasopressor === 1 ? 3 : 1;
  }
  return anyVasopressor === 1 ? 2 : null;
}

export interface SofaComponents {
  respiratory: number | null;
  coagulation: number | null;
  liver: number | null;
  cardiovascular: number | null;
}

export interface SofaScore extends SofaComponents {
  neurological: null;
  total: number;
  componentsAvailable: number;
}

export function totalSofa(components: SofaComponents): SofaScore {
  const values = [components.respiratory, components.coagulation, components.liver, components.cardiovascular];
  return {
    ...components,
    neurological: null,
    total: values.reduce<number>((sum, v) => sum + (v ?? 0), 0),
    componentsAvailable: values.filter(v => v !== null).length,
  };
}

// ============================================================================
// ENGINE
// ============================================================================

export interface VisitSofa extends VisitRef, SofaScore {}

export interface SofaInputNames {
  platelets: string;
  bilirubin: string;
}

/**
 * Scores every visit that has a lab aggregate. A visit without one gets no
 * row, and the output carries its SOFA block as null.
 */
export function scoreVisits(
  labs: ReadonlyMap<VisitKey, LabAggregate>,
  exposures: ReadonlyMap<VisitKey, VisitExposures>,
  inputs: SofaInputNames
): Map<VisitKey, VisitSofa> {
  const result = new Map<VisitKey, VisitSofa>();

  for (const aggregate of labs.values()) {
    const key = visitKey(aggregate);
    const anyVasopressor = exposures.get(key)?.anyVasopressor ?? 0;

    const score = totalSofa({
      respiratory: respiratoryScore(aggregate.pfRatioUnrounded),
      coagulation: coagulationScore(aggregate.labs[inputs.platelets] ?? null),
      liver: liverScore(aggregate.labs[inputs.bilirubin] ?? null),
      cardiovascular: cardiovascularScore(aggregate.mapUnrounded, anyVasopressor),
    });

    result.set(key, { personId: aggregate.personId, visitId: aggregate.visitId, ...score });
  }

  return result;
}
