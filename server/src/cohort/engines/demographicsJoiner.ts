import type { Person, Visit } from "@shared/schema";
import { type VisitRef, calendarYear, visitKey } from "../cohortContract";
import type { EcmoEpisode } from "./visitResolver";

export interface VisitDemographics extends VisitRef {
  genderConceptId: number | null;
  raceConceptId: number | null;
  ethnicityConceptId: number | null;
  site: string | null;
  visitStartDate: string;
  /** Calendar-year difference at this admission, not exact age */
  ageAtAdmission: number | null;
  episode: EcmoEpisode;
}

export interface DemographicsJoinResult {
  visits: VisitDemographics[];
  missingPerson: number;
  missingVisit: number;
}

export function ageAtAdmission(visitStartDate: string, yearOfBirth: number | null): number | null {
  if (yearOfBirth === null) return null;
  return calendarYear(visitStartDate) - yearOfBirth;
}

/**
 * Inner join of resolved ECMO visits with the person and visit reference
 * tables. Episodes lacking either reference row are dropped and counted.
 */
export function joinDemographics(
  episodes: readonly EcmoEpisode[],
  persons: readonly Person[],
  visits: readonly Visit[]
): DemographicsJoinResult {
  const personById = new Map(persons.map(p => [p.personId, p]));
  const visitByKey = new Map(
    visits.map(v => [visitKey({ personId: v.personId, visitId: v.visitOccurrenceId }), v])
  );

  const joined: VisitDemographics[] = [];
  let missingPerson = 0;
  let missingVisit = 0;

  for (const episode of episodes) {
    const p = personById.get(episode.personId);
    if (!p) {
      missingPerson++;
      continue;
    }
    const v = visitByKey.get(visitKey(episode));
    if (!v) {
      missingVisit++;
      continue;
    }

    joined.push({
      personId: episode.personId,
      visitId: episode.visitId,
      genderConceptId: p.genderConceptId,
      raceConceptId: p.raceConceptId,
      ethnicityConceptId: p.ethnicityConceptId,
      site: p.srcName,
      visitStartDate: v.visitStartDate,
      ageAtAdmission: ageAtAdmission(v.visitStartDate, p.yearOfBirth),
      episode,
    });
  }

  return { visits: joined, missingPerson, missingVisit };
}
