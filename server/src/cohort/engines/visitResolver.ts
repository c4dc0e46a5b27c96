/**
 * VISIT RESOLVER
 *
 * Maps cohort persons to the visits that carry their qualifying ECMO
 * procedures and computes the per-visit episode bounds. Procedure events
 * without a visit id are dropped, so a person whose only ECMO events are
 * unlinked leaves the output even though they are in the cohort.
 */

import type { ProcedureEvent } from "@shared/schema";
import {
  type VisitRef,
  compareVisitRefs,
  daysBetween,
  formatCalendarDate,
  formatInstant,
  hoursBetween,
  parseCalendarDate,
  parseInstant,
  roundTo,
  visitKey,
} from "../cohortContract";

export interface EcmoEpisode extends VisitRef {
  startDate: string;
  endDate: string;
  startDatetime: string;
  endDatetime: string;
  durationDays: number;
  durationHours: number;
  procedureCount: number;
}

export interface VisitResolution {
  episodes: EcmoEpisode[];
  /** Cohort persons left with no visit-linked ECMO procedure */
  personsWithoutVisit: number[];
  droppedUnlinkedEvents: number;
}

interface EpisodeAccumulator {
  ref: VisitRef;
  minDate: number;
  maxDate: number;
  minInstant: number;
  maxInstant: number;
  count: number;
}

function eventInstant(e: ProcedureEvent): number {
  return e.procedureDatetime ? parseInstant(e.procedureDatetime) : parseCalendarDate(e.procedureDate);
}

export function resolveEcmoVisits(
  cohortPersonIds: readonly number[],
  procedureEvents: readonly ProcedureEvent[],
  procedureConceptIds: readonly number[]
): VisitResolution {
  const cohort = new Set(cohortPersonIds);
  const codes = new Set(procedureConceptIds);
  const byVisit = new Map<string, EpisodeAccumulator>();
  let droppedUnlinkedEvents = 0;

  for (const e of procedureEvents) {
    if (!cohort.has(e.personId) || !codes.has(e.procedureConceptId)) continue;
    if (e.visitOccurrenceId === null) {
      droppedUnlinkedEvents++;
      continue;
    }

    const ref = { personId: e.personId, visitId: e.visitOccurrenceId };
    const date = parseCalendarDate(e.procedureDate);
    const instant = eventInstant(e);
    const key = visitKey(ref);
    const acc = byVisit.get(key);

    if (!acc) {
      byVisit.set(key, { ref, minDate: date, maxDate: date, minInstant: instant, maxInstant: instant, count: 1 });
      continue;
    }
    acc.minDate = Math.min(acc.minDate, date);
    acc.maxDate = Math.max(acc.maxDate, date);
    acc.minInstant = Math.min(acc.minInstant, instant);
    acc.maxInstant = Math.max(acc.maxInstant, instant);
    acc.count++;
  }

  const episodes = [...byVisit.values()]
    .map((acc): EcmoEpisode => {
      const startDate = formatCalendarDate(acc.minDate);
      const endDate = formatCalendarDate(acc.maxDate);
      return {
        ...acc.ref,
        startDate,
        endDate,
        startDatetime: formatInstant(acc.minInstant),
        endDatetime: formatInstant(acc.maxInstant),
        durationDays: daysBetween(startDate, endDate),
        durationHours: roundTo(hoursBetween(acc.minInstant, acc.maxInstant), 1),
        procedureCount: acc.count,
      };
    })
    .sort(compareVisitRefs);

  const resolvedPersons = new Set(episodes.map(e => e.personId));
  const personsWithoutVisit = cohortPersonIds.filter(id => !resolvedPersons.has(id));

  return { episodes, personsWithoutVisit, droppedUnlinkedEvents };
}
