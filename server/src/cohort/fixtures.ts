/**
 * Row factories for tests. Ids are generated so each helper call yields a
 * distinct primary key; callers only spell out the columns under test.
 */

import type {
  ConditionEvent,
  ProcedureEvent,
  Person,
  Visit,
  MeasurementEvent,
  DrugEvent,
  DeathRecord,
  SourceSnapshot,
} from "@shared/schema";

let nextId = 1;

function id(): number {
  return nextId++;
}

export function condition(personId: number, conceptId: number, date = "2024-01-01"): ConditionEvent {
  return {
    conditionOccurrenceId: id(),
    personId,
    visitOccurrenceId: null,
    conditionConceptId: conceptId,
    conditionStartDate: date,
  };
}

export function procedure(
  personId: number,
  visitId: number | null,
  conceptId: number,
  date: string,
  datetime: string | null = null
): ProcedureEvent {
  return {
    procedureOccurrenceId: id(),
    personId,
    visitOccurrenceId: visitId,
    procedureConceptId: conceptId,
    procedureDate: date,
    procedureDatetime: datetime,
  };
}

export function personRow(personId: number, overrides: Partial<Person> = {}): Person {
  return {
    personId,
    genderConceptId: 8507,
    raceConceptId: 8527,
    ethnicityConceptId: 38003564,
    yearOfBirth: 1970,
    srcName: "SITE-7",
    ...overrides,
  };
}

export function visitRow(personId: number, visitId: number, startDate: string): Visit {
  return { visitOccurrenceId: visitId, personId, visitStartDate: startDate };
}

export function lab(
  personId: number,
  visitId: number | null,
  conceptId: number,
  value: number | null,
  date = "2024-01-02"
): MeasurementEvent {
  return {
    measurementId: id(),
    personId,
    visitOccurrenceId: visitId,
    measurementConceptId: conceptId,
    valueAsNumber: value,
    measurementDate: date,
  };
}

export function drug(personId: number, visitId: number | null, conceptId: number, date = "2024-01-02"): DrugEvent {
  return {
    drugExposureId: id(),
    personId,
    visitOccurrenceId: visitId,
    drugConceptId: conceptId,
    drugExposureStartDate: date,
  };
}

export function deathRow(personId: number, deathDate: string | null): DeathRecord {
  return { personId, deathDate };
}

export function emptySnapshot(): SourceSnapshot {
  return {
    conditionOccurrence: [],
    procedureOccurrence: [],
    person: [],
    visitOccurrence: [],
    measurement: [],
    drugExposure: [],
    death: [],
  };
}
