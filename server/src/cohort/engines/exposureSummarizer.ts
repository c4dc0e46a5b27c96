/**
 * EXPOSURE SUMMARIZER
 *
 * Binary exposure flags per visit. One generic existence check over
 * (visit, code set) serves every drug class and the CRRT procedure flag; the
 * check spans the whole visit, not the ECMO episode. A visit with no matching
 * event gets 0, never null.
 */

import type { DrugEvent, ProcedureEvent } from "@shared/schema";
import type { ExposureClass } from "../cohortConfig";
import { type Flag, type VisitKey, type VisitRef, toFlag, visitKey } from "../cohortContract";

export interface CodedVisitEvent {
  personId: number;
  visitOccurrenceId: number | null;
  conceptId: number;
}

export interface VisitExposures extends VisitRef {
  flags: Record<string, Flag>;
  anyVasopressor: Flag;
}

export function fromDrugEvent(e: DrugEvent): CodedVisitEvent {
  return { personId: e.personId, visitOccurrenceId: e.visitOccurrenceId, conceptId: e.drugConceptId };
}

export function fromProcedureEvent(e: ProcedureEvent): CodedVisitEvent {
  return { personId: e.personId, visitOccurrenceId: e.visitOccurrenceId, conceptId: e.procedureConceptId };
}

/** Concept ids seen per visit, restricted to the given visits. */
export function indexConceptsByVisit(
  visits: readonly VisitRef[],
  events: readonly CodedVisitEvent[]
): Map<VisitKey, Set<number>> {
  const index = new Map<VisitKey, Set<number>>(visits.map(v => [visitKey(v), new Set<number>()]));
  for (const e of events) {
    if (e.visitOccurrenceId === null) continue;
    index.get(visitKey({ personId: e.personId, visitId: e.visitOccurrenceId }))?.add(e.conceptId);
  }
  return index;
}

export function hasAnyConcept(seen: ReadonlySet<number> | undefined, codeSet: readonly number[]): boolean {
  if (!seen || seen.size === 0) return false;
  return codeSet.some(code => seen.has(code));
}

export function summarizeExposures(
  visits: readonly VisitRef[],
  events: readonly CodedVisitEvent[],
  classes: readonly ExposureClass[],
  vasopressorGroup: string
): Map<VisitKey, VisitExposures> {
  const index = indexConceptsByVisit(visits, events);
  const vasopressors = classes.filter(c => c.group === vasopressorGroup);
  const result = new Map<VisitKey, VisitExposures>();

  for (const visit of visits) {
    const key = visitKey(visit);
    const seen = index.get(key);
    const flags: Record<string, Flag> = {};
    for (const exposure of classes) {
      flags[exposure.name] = toFlag(hasAnyConcept(seen, exposure.conceptIds));
    }
    result.set(key, {
      personId: visit.personId,
      visitId: visit.visitId,
      flags,
      anyVasopressor: toFlag(vasopressors.some(c => flags[c.name] === 1)),
    });
  }

  return result;
}

/** Single-code-set flag per visit, e.g. CRRT. */
export function summarizeProcedureFlag(
  visits: readonly VisitRef[],
  events: readonly CodedVisitEvent[],
  codeSet: readonly number[]
): Map<VisitKey, Flag> {
  const index = indexConceptsByVisit(visits, events);
  return new Map(visits.map((v): [VisitKey, Flag] => {
    const key = visitKey(v);
    return [key, toFlag(hasAnyConcept(index.get(key), codeSet))];
  }));
}
