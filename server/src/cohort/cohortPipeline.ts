/**
 * COHORT PIPELINE
 *
 * Runs the extract end to end against an event source:
 *
 *   1. cohort selection (person level)
 *   2. visit resolution (ECMO episodes per visit)
 *   3. fan-out reads for demographics, labs, drugs, CRRT and deaths
 *   4. pure per-visit engines
 *   5. fan-in assembly into one sorted table
 *
 * Nothing here reads the wall clock into the result; `asOf` is the only date
 * the run records, so the same source facts always give the same table.
 */

import type { CohortConfig } from "./cohortConfig";
import { conceptIds, exposureConceptIds, measurementConceptIds } from "./cohortConfig";
import type { IEventSource } from "./eventSource";
import { selectCohort } from "./engines/cohortSelector";
import { resolveEcmoVisits } from "./engines/visitResolver";
import { joinDemographics } from "./engines/demographicsJoiner";
import { aggregateMeasurements } from "./engines/measurementAggregator";
import {
  fromDrugEvent,
  fromProcedureEvent,
  summarizeExposures,
  summarizeProcedureFlag,
} from "./engines/exposureSummarizer";
import { scoreVisits } from "./engines/sofaScorer";
import { linkMortality } from "./engines/mortalityLinker";
import { assembleVisitRecords, type VisitRecord } from "./engines/outputAssembler";

// ============================================================================
// TYPES
// ============================================================================

export interface CohortRunOptions {
  /** Fixed reference date recorded with the run (YYYY-MM-DD) */
  asOf: string;
}

export interface CohortRunSummary {
  cohortName: string;
  asOf: string;
  personsWithDiagnosis: number;
  personsWithProcedure: number;
  cohortPersons: number;
  resolvedVisits: number;
  personsWithoutVisit: number[];
  droppedUnlinkedProcedureEvents: number;
  visitsMissingPerson: number;
  visitsMissingVisitRecord: number;
  visitsWithLabs: number;
  outputRows: number;
  outputPersons: number;
}

export interface CohortRunResult {
  rows: VisitRecord[];
  summary: CohortRunSummary;
}

// ============================================================================
// PIPELINE
// ============================================================================

export async function runCohortPipeline(
  source: IEventSource,
  config: CohortConfig,
  options: CohortRunOptions
): Promise<CohortRunResult> {
  const startTime = Date.now();
  const diagnosisCodes = conceptIds(config.qualifyingDiagnoses);
  const ecmoCodes = conceptIds(config.ecmoProcedures);
  const crrtCodes = conceptIds(config.crrtProcedures);

  // ── Stage 1: cohort ──
  const [conditionEvents, ecmoEvents] = await Promise.all([
    source.getConditionEvents(diagnosisCodes),
    source.getProcedureEvents(ecmoCodes),
  ]);
  const cohort = selectCohort(conditionEvents, ecmoEvents, diagnosisCodes, ecmoCodes);
  console.log(
    `[CohortPipeline] Cohort: ${cohort.personIds.length} persons ` +
    `(diagnosis=${cohort.personsWithDiagnosis}, ecmo=${cohort.personsWithProcedure})`
  );

  // ── Stage 2: visits ──
  const resolution = resolveEcmoVisits(cohort.personIds, ecmoEvents, ecmoCodes);
  if (resolution.personsWithoutVisit.length > 0) {
    console.log(
      `[CohortPipeline] ${resolution.personsWithoutVisit.length} cohort persons have no visit-linked ECMO procedure ` +
      `(${resolution.droppedUnlinkedEvents} unlinked events dropped)`
    );
  }

  const visitPersonIds = [...new Set(resolution.episodes.map(e => e.personId))];

  // ── Stage 3: fan-out reads ──
  const [persons, visits, measurements, drugs, crrtEvents, deaths] = await Promise.all([
    source.getPersons(visitPersonIds),
    source.getVisits(visitPersonIds),
    source.getMeasurements(visitPersonIds, measurementConceptIds(config)),
    source.getDrugExposures(visitPersonIds, exposureConceptIds(config)),
    source.getProcedureEvents(crrtCodes, visitPersonIds),
    source.getDeaths(visitPersonIds),
  ]);

  // ── Stage 4: per-visit engines ──
  const demographics = joinDemographics(resolution.episodes, persons, visits);
  const labs = aggregateMeasurements(resolution.episodes, measurements, config.measurements, config.derivedInputs);
  const exposures = summarizeExposures(
    resolution.episodes,
    drugs.map(fromDrugEvent),
    config.exposures,
    config.vasopressorGroup
  );
  const crrt = summarizeProcedureFlag(resolution.episodes, crrtEvents.map(fromProcedureEvent), crrtCodes);
  const sofa = scoreVisits(labs, exposures, config.derivedInputs);
  const mortality = linkMortality(resolution.episodes, deaths);

  // ── Stage 5: fan-in ──
  const rows = assembleVisitRecords({ demographics: demographics.visits, labs, exposures, crrt, sofa, mortality }, config);

  const summary: CohortRunSummary = {
    cohortName: config.name,
    asOf: options.asOf,
    personsWithDiagnosis: cohort.personsWithDiagnosis,
    personsWithProcedure: cohort.personsWithProcedure,
    cohortPersons: cohort.personIds.length,
    resolvedVisits: resolution.episodes.length,
    personsWithoutVisit: resolution.personsWithoutVisit,
    droppedUnlinkedProcedureEvents: resolution.droppedUnlinkedEvents,
    visitsMissingPerson: demographics.missingPerson,
    visitsMissingVisitRecord: demographics.missingVisit,
    visitsWithLabs: labs.size,
    outputRows: rows.length,
    outputPersons: new Set(rows.map(r => r.personId)).size,
  };

  console.log(
    `[CohortPipeline] Built in ${Date.now() - startTime}ms: ` +
    `persons=${summary.cohortPersons}, visits=${summary.resolvedVisits}, ` +
    `rows=${summary.outputRows}, withLabs=${summary.visitsWithLabs}`
  );

  return { rows, summary };
}
