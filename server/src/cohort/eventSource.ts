import fs from "fs";
import path from "path";
import {
  sourceSnapshotSchema,
  type ConditionEvent,
  type ProcedureEvent,
  type Person,
  type Visit,
  type MeasurementEvent,
  type DrugEvent,
  type DeathRecord,
  type SourceSnapshot,
} from "@shared/schema";

/**
 * Read-only access to the source event tables. Implementations may push the
 * filters down to the store, but callers must not rely on it: every engine
 * re-applies its own code-set filter.
 */
export interface IEventSource {
  getConditionEvents(conceptIds: number[]): Promise<ConditionEvent[]>;
  getProcedureEvents(conceptIds: number[], personIds?: number[]): Promise<ProcedureEvent[]>;
  getPersons(personIds: number[]): Promise<Person[]>;
  getVisits(personIds: number[]): Promise<Visit[]>;
  getMeasurements(personIds: number[], conceptIds: number[]): Promise<MeasurementEvent[]>;
  getDrugExposures(personIds: number[], conceptIds: number[]): Promise<DrugEvent[]>;
  getDeaths(personIds: number[]): Promise<DeathRecord[]>;
}

function inSet<T>(values: readonly T[]): (value: T) => boolean {
  const set = new Set(values);
  return value => set.has(value);
}

export class InMemoryEventSource implements IEventSource {
  constructor(private readonly snapshot: SourceSnapshot) {}

  async getConditionEvents(conceptIds: number[]): Promise<ConditionEvent[]> {
    const wanted = inSet(conceptIds);
    return this.snapshot.conditionOccurrence.filter(e => wanted(e.conditionConceptId));
  }

  async getProcedureEvents(conceptIds: number[], personIds?: number[]): Promise<ProcedureEvent[]> {
    const wanted = inSet(conceptIds);
    const persons = personIds ? inSet(personIds) : () => true;
    return this.snapshot.procedureOccurrence.filter(e => wanted(e.procedureConceptId) && persons(e.personId));
  }

  async getPersons(personIds: number[]): Promise<Person[]> {
    const persons = inSet(personIds);
    return this.snapshot.person.filter(p => persons(p.personId));
  }

  async getVisits(personIds: number[]): Promise<Visit[]> {
    const persons = inSet(personIds);
    return this.snapshot.visitOccurrence.filter(v => persons(v.personId));
  }

  async getMeasurements(personIds: number[], conceptIds: number[]): Promise<MeasurementEvent[]> {
    const persons = inSet(personIds);
    const wanted = inSet(conceptIds);
    return this.snapshot.measurement.filter(m => persons(m.personId) && wanted(m.measurementConceptId));
  }

  async getDrugExposures(personIds: number[], conceptIds: number[]): Promise<DrugEvent[]> {
    const persons = inSet(personIds);
    const wanted = inSet(conceptIds);
    return this.snapshot.drugExposure.filter(d => persons(d.personId) && wanted(d.drugConceptId));
  }

  async getDeaths(personIds: number[]): Promise<DeathRecord[]> {
    const persons = inSet(personIds);
    return this.snapshot.death.filter(d => persons(d.personId));
  }
}

/**
 * Fails the read when an id column holds a value outside the 53-bit integer
 * range. Such ids lose precision as JS numbers, and two visits could then
 * share one key.
 */
export function assertSafeIds<T, K extends keyof T>(table: string, rows: T[], columns: readonly K[]): T[] {
  for (const row of rows) {
    for (const column of columns) {
      const value: unknown = row[column];
      if (typeof value === "number" && !Number.isSafeInteger(value)) {
        throw new Error(`${table}.${String(column)} value ${value} is outside the safe integer range`);
      }
    }
  }
  return rows;
}

export function parseSourceSnapshot(raw: unknown): SourceSnapshot {
  const result = sourceSnapshotSchema.safeParse(raw);
  if (!result.success) {
    const first = result.error.issues.slice(0, 5)
      .map(issue => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new Error(`Invalid source snapshot (${result.error.issues.length} issues): ${first}`);
  }
  return result.data;
}

/** Loads a JSON extract of the source tables, e.g. for an offline re-run. */
export function loadSnapshotSource(snapshotPath: string): InMemoryEventSource {
  const resolved = path.isAbsolute(snapshotPath) ? snapshotPath : path.join(process.cwd(), snapshotPath);
  const raw: unknown = JSON.parse(fs.readFileSync(resolved, "utf8"));
  const snapshot = parseSourceSnapshot(raw);
  console.log(
    `[EventSource] Loaded snapshot ${path.basename(resolved)}: ` +
    `${snapshot.person.length} persons, ${snapshot.procedureOccurrence.length} procedures, ` +
    `${snapshot.measurement.length} measurements, ${snapshot.drugExposure.length} drug exposures`
  );
  return new InMemoryEventSource(snapshot);
}
