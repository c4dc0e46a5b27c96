/**
 * OUTPUT ASSEMBLER
 *
 * Left-joins every per-visit table onto the demographics table by
 * (person_id, visit_id), attaches display labels and emits the rows sorted by
 * (person_id, visit_id). Missing tables degrade to nulls (labs, SOFA) or 0
 * (exposure and CRRT flags).
 */

import type { BucketTable, CohortConfig, LabelTable } from "../cohortConfig";
import { type Flag, type VisitKey, type VisitRef, compareVisitRefs, visitKey } from "../cohortContract";
import type { VisitDemographics } from "./demographicsJoiner";
import type { LabAggregate } from "./measurementAggregator";
import type { VisitExposures } from "./exposureSummarizer";
import type { VisitSofa } from "./sofaScorer";
import type { VisitMortality } from "./mortalityLinker";

// ============================================================================
// OUTPUT TYPES
// ============================================================================

export interface SofaBlock {
  respiratory: number | null;
  coagulation: number | null;
  liver: number | null;
  neurological: null;
  cardiovascular: number | null;
  total: number | null;
  componentsAvailable: number | null;
}

export interface VisitRecord extends VisitRef {
  site: string | null;
  siteDescription: string;
  genderConceptId: number | null;
  gender: string;
  raceConceptId: number | null;
  race: string;
  ethnicityConceptId: number | null;
  ethnicity: string;
  ageAtAdmission: number | null;
  ageCategory: string;

  visitStartDate: string;
  ecmoStartDate: string;
  ecmoEndDate: string;
  ecmoStartDatetime: string;
  ecmoEndDatetime: string;
  ecmoDurationDays: number;
  ecmoDurationHours: number;
  ecmoDurationCategory: string;

  labs: Record<string, number | null>;
  neutrophilLymphocyteRatio: number | null;
  pfRatio: number | null;
  mapAvg: number | null;

  sofa: SofaBlock;
  sofaSeverityCategory: string;

  exposures: Record<string, Flag>;
  anyVasopressor: Flag;
  crrt: Flag;

  died: Flag;
  deathDate: string | null;
  diedWithin30DaysOfEcmo: Flag | null;
}

export interface AssemblyInput {
  demographics: readonly VisitDemographics[];
  labs: ReadonlyMap<VisitKey, LabAggregate>;
  exposures: ReadonlyMap<VisitKey, VisitExposures>;
  crrt: ReadonlyMap<VisitKey, Flag>;
  sofa: ReadonlyMap<VisitKey, VisitSofa>;
  mortality: ReadonlyMap<VisitKey, VisitMortality>;
}

// ============================================================================
// LABELS
// ============================================================================

export function lookupLabel(table: LabelTable, code: string | number | null): string {
  if (code === null) return table.fallback;
  return table.map[String(code)] ?? table.fallback;
}

export function bucketLabel(table: BucketTable, value: number | null): string {
  if (value === null || Number.isNaN(value)) return table.fallback;
  for (const bucket of table.buckets) {
    if ("below" in bucket) {
      if (value < bucket.below) return bucket.label;
    } else if ("atMost" in bucket) {
      if (value <= bucket.atMost) return bucket.label;
    } else {
      return bucket.label;
    }
  }
  return table.fallback;
}

const EMPTY_SOFA: SofaBlock = {
  respiratory: null,
  coagulation: null,
  liver: null,
  neurological: null,
  cardiovascular: null,
  total: null,
  componentsAvailable: null,
};

// ============================================================================
// ASSEMBLY
// ============================================================================

export function assembleVisitRecords(input: AssemblyInput, config: CohortConfig): VisitRecord[] {
  const { labels } = config;
  const seen = new Set<VisitKey>();
  const records: VisitRecord[] = [];

  for (const d of input.demographics) {
    const key = visitKey(d);
    if (seen.has(key)) {
      console.warn(`[OutputAssembler] Duplicate visit key ${key} skipped`);
      continue;
    }
    seen.add(key);

    const lab = input.labs.get(key);
    const exposure = input.exposures.get(key);
    const sofa = input.sofa.get(key);
    const mortality = input.mortality.get(key);

    const labValues: Record<string, number | null> = {};
    for (const m of config.measurements) {
      labValues[m.name] = lab?.labs[m.name] ?? null;
    }

    const exposureFlags: Record<string, Flag> = {};
    for (const e of config.exposures) {
      exposureFlags[e.name] = exposure?.flags[e.name] ?? 0;
    }

    const sofaBlock: SofaBlock = sofa
      ? {
          respiratory: sofa.respiratory,
          coagulation: sofa.coagulation,
          liver: sofa.liver,
          neurological: null,
          cardiovascular: sofa.cardiovascular,
          total: sofa.total,
          componentsAvailable: sofa.componentsAvailable,
        }
      : EMPTY_SOFA;

    records.push({
      personId: d.personId,
      visitId: d.visitId,
      site: d.site,
      siteDescription: lookupLabel(labels.site, d.site),
      genderConceptId: d.genderConceptId,
      gender: lookupLabel(labels.gender, d.genderConceptId),
      raceConceptId: d.raceConceptId,
      race: lookupLabel(labels.race, d.raceConceptId),
      ethnicityConceptId: d.ethnicityConceptId,
      ethnicity: lookupLabel(labels.ethnicity, d.ethnicityConceptId),
      ageAtAdmission: d.ageAtAdmission,
      ageCategory: bucketLabel(labels.ageBuckets, d.ageAtAdmission),

      visitStartDate: d.visitStartDate,
      ecmoStartDate: d.episode.startDate,
      ecmoEndDate: d.episode.endDate,
      ecmoStartDatetime: d.episode.startDatetime,
      ecmoEndDatetime: d.episode.endDatetime,
      ecmoDurationDays: d.episode.durationDays,
      ecmoDurationHours: d.episode.durationHours,
      ecmoDurationCategory: bucketLabel(labels.durationBuckets, d.episode.durationDays),

      labs: labValues,
      neutrophilLymphocyteRatio: lab?.neutrophilLymphocyteRatio ?? null,
      pfRatio: lab?.pfRatio ?? null,
      mapAvg: lab?.mapAvg ?? null,

      sofa: sofaBlock,
      sofaSeverityCategory: bucketLabel(labels.severityBuckets, sofaBlock.total),

      exposures: exposureFlags,
      anyVasopressor: exposure?.anyVasopressor ?? 0,
      crrt: input.crrt.get(key) ?? 0,

      died: mortality?.died ?? 0,
      deathDate: mortality?.deathDate ?? null,
      diedWithin30DaysOfEcmo: mortality?.diedWithin30DaysOfEcmo ?? null,
    });
  }

  return records.sort(compareVisitRefs);
}
