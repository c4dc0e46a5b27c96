/**
 * COHORT SELECTOR
 *
 * Person-level cohort: at least one qualifying diagnosis AND at least one
 * qualifying ECMO procedure, each evaluated independently. No temporal or
 * visit correlation between the two events is required, so a diagnosis
 * recorded years before an unrelated ECMO run still qualifies (known
 * over-inclusion).
 */

import type { ConditionEvent, ProcedureEvent } from "@shared/schema";

export interface CohortSelection {
  personIds: number[];
  personsWithDiagnosis: number;
  personsWithProcedure: number;
}

export function selectCohort(
  conditionEvents: readonly ConditionEvent[],
  procedureEvents: readonly ProcedureEvent[],
  diagnosisConceptIds: readonly number[],
  procedureConceptIds: readonly number[]
): CohortSelection {
  const diagnosisCodes = new Set(diagnosisConceptIds);
  const procedureCodes = new Set(procedureConceptIds);

  const withDiagnosis = new Set<number>();
  for (const e of conditionEvents) {
    if (diagnosisCodes.has(e.conditionConceptId)) withDiagnosis.add(e.personId);
  }

  const withProcedure = new Set<number>();
  for (const e of procedureEvents) {
    if (procedureCodes.has(e.procedureConceptId)) withProcedure.add(e.personId);
  }

  const personIds = [...withDiagnosis].filter(id => withProcedure.has(id)).sort((a, b) => a - b);

  return {
    personIds,
    personsWithDiagnosis: withDiagnosis.size,
    personsWithProcedure: withProcedure.size,
  };
}
