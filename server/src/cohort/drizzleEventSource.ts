import { and, asc, inArray } from "drizzle-orm";
import {
  conditionOccurrence,
  procedureOccurrence,
  person,
  visitOccurrence,
  measurement,
  drugExposure,
  death,
  type ConditionEvent,
  type ProcedureEvent,
  type Person,
  type Visit,
  type MeasurementEvent,
  type DrugEvent,
  type DeathRecord,
} from "@shared/schema";
import { db, withDbRetry } from "../../db";
import { assertSafeIds, type IEventSource } from "./eventSource";

// Keeps bind-parameter counts well under the PostgreSQL limit of 65535
const ID_CHUNK_SIZE = 5000;

function chunk<T>(values: readonly T[], size: number): T[][] {
  const chunks: T[][] = [];
  for (let i = 0; i < values.length; i += size) {
    chunks.push(values.slice(i, i + size));
  }
  return chunks;
}

async function selectByPersonChunks<T>(
  personIds: number[],
  operationName: string,
  query: (ids: number[]) => Promise<T[]>
): Promise<T[]> {
  const rows: T[] = [];
  for (const ids of chunk(personIds, ID_CHUNK_SIZE)) {
    rows.push(...await withDbRetry(() => query(ids), { operationName }));
  }
  return rows;
}

/**
 * Reads the OMOP source tables from PostgreSQL. Results are ordered by
 * primary key so repeated runs aggregate in the same order.
 */
export class DrizzleEventSource implements IEventSource {
  async getConditionEvents(conceptIds: number[]): Promise<ConditionEvent[]> {
    const rows = await withDbRetry(
      () => db.select().from(conditionOccurrence)
        .where(inArray(conditionOccurrence.conditionConceptId, conceptIds))
        .orderBy(asc(conditionOccurrence.conditionOccurrenceId)),
      { operationName: "getConditionEvents" }
    );
    return assertSafeIds("condition_occurrence", rows, ["personId", "visitOccurrenceId"]);
  }

  async getProcedureEvents(conceptIds: number[], personIds?: number[]): Promise<ProcedureEvent[]> {
    const rows = personIds
      ? await this.selectProceduresForPersons(conceptIds, personIds)
      : await withDbRetry(
          () => db.select().from(procedureOccurrence)
            .where(inArray(procedureOccurrence.procedureConceptId, conceptIds))
            .orderBy(asc(procedureOccurrence.procedureOccurrenceId)),
          { operationName: "getProcedureEvents" }
        );
    return assertSafeIds("procedure_occurrence", rows, ["personId", "visitOccurrenceId"]);
  }

  private async selectProceduresForPersons(conceptIds: number[], personIds: number[]): Promise<ProcedureEvent[]> {
    return selectByPersonChunks(personIds, "getProcedureEvents", ids =>
      db.select().from(procedureOccurrence)
        .where(and(
          inArray(procedureOccurrence.personId, ids),
          inArray(procedureOccurrence.procedureConceptId, conceptIds),
        ))
        .orderBy(asc(procedureOccurrence.procedureOccurrenceId))
    );
  }

  async getPersons(personIds: number[]): Promise<Person[]> {
    const rows = await selectByPersonChunks(personIds, "getPersons", ids =>
      db.select().from(person).where(inArray(person.personId, ids)).orderBy(asc(person.personId))
    );
    return assertSafeIds("person", rows, ["personId"]);
  }

  async getVisits(personIds: number[]): Promise<Visit[]> {
    const rows = await selectByPersonChunks(personIds, "getVisits", ids =>
      db.select().from(visitOccurrence)
        .where(inArray(visitOccurrence.personId, ids))
        .orderBy(asc(visitOccurrence.visitOccurrenceId))
    );
    return assertSafeIds("visit_occurrence", rows, ["personId", "visitOccurrenceId"]);
  }

  async getMeasurements(personIds: number[], conceptIds: number[]): Promise<MeasurementEvent[]> {
    const rows = await selectByPersonChunks(personIds, "getMeasurements", ids =>
      db.select().from(measurement)
        .where(and(
          inArray(measurement.personId, ids),
          inArray(measurement.measurementConceptId, conceptIds),
        ))
        .orderBy(asc(measurement.measurementId))
    );
    return assertSafeIds("measurement", rows, ["personId", "visitOccurrenceId"]);
  }

  async getDrugExposures(personIds: number[], conceptIds: number[]): Promise<DrugEvent[]> {
    const rows = await selectByPersonChunks(personIds, "getDrugExposures", ids =>
      db.select().from(drugExposure)
        .where(and(
          inArray(drugExposure.personId, ids),
          inArray(drugExposure.drugConceptId, conceptIds),
        ))
        .orderBy(asc(drugExposure.drugExposureId))
    );
    return assertSafeIds("drug_exposure", rows, ["personId", "visitOccurrenceId"]);
  }

  async getDeaths(personIds: number[]): Promise<DeathRecord[]> {
    const rows = await selectByPersonChunks(personIds, "getDeaths", ids =>
      db.select().from(death).where(inArray(death.personId, ids)).orderBy(asc(death.personId))
    );
    return assertSafeIds("death", rows, ["personId"]);
  }
}
