import type { DeathRecord } from "@shared/schema";
import { type Flag, type VisitKey, type VisitRef, addDays, parseCalendarDate, visitKey } from "../cohortContract";
import type { EcmoEpisode } from "./visitResolver";

export const MORTALITY_WINDOW_DAYS = 30;

export interface VisitMortality extends VisitRef {
  died: Flag;
  deathDate: string | null;
  diedWithin30DaysOfEcmo: Flag | null;
}

/** Earliest dated record per person; a dateless record only when nothing else exists. */
export function indexDeaths(records: readonly DeathRecord[]): Map<number, DeathRecord> {
  const byPerson = new Map<number, DeathRecord>();
  for (const record of records) {
    const current = byPerson.get(record.personId);
    if (
      !current ||
      (current.deathDate === null && record.deathDate !== null) ||
      (current.deathDate !== null && record.deathDate !== null && record.deathDate < current.deathDate)
    ) {
      byPerson.set(record.personId, record);
    }
  }
  return byPerson;
}

/**
 * 1 when the death date lies in [start_date, end_date + 30 days] inclusive,
 * 0 when it lies outside, null with no record or no date to compare.
 */
export function diedWithinWindow(
  deathDate: string | null,
  episode: Pick<EcmoEpisode, "startDate" | "endDate">,
  windowDays: number = MORTALITY_WINDOW_DAYS
): Flag | null {
  if (deathDate === null) return null;
  const death = parseCalendarDate(deathDate);
  const windowStart = parseCalendarDate(episode.startDate);
  const windowEnd = parseCalendarDate(addDays(episode.endDate, windowDays));
  return death >= windowStart && death <= windowEnd ? 1 : 0;
}

/** Death is person-level: every visit of the person gets the same record. */
export function linkMortality(
  episodes: readonly EcmoEpisode[],
  deaths: readonly DeathRecord[]
): Map<VisitKey, VisitMortality> {
  const byPerson = indexDeaths(deaths);
  const result = new Map<VisitKey, VisitMortality>();

  for (const episode of episodes) {
    const record = byPerson.get(episode.personId);
    result.set(visitKey(episode), {
      personId: episode.personId,
      visitId: episode.visitId,
      died: record ? 1 : 0,
      deathDate: record?.deathDate ?? null,
      diedWithin30DaysOfEcmo: record ? diedWithinWindow(record.deathDate, episode) : null,
    });
  }

  return result;
}
