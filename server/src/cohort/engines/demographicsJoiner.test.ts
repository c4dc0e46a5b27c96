import { describe, it, expect } from "vitest";
import { ageAtAdmission, joinDemographics } from "./demographicsJoiner";
import { resolveEcmoVisits } from "./visitResolver";
import { personRow, procedure, visitRow } from "../fixtures";

const ECMO = 46257510;

describe("DemographicsJoiner", () => {
  it("computes age from the admission's calendar year", () => {
    expect(ageAtAdmission("2024-01-01", 1970)).toBe(54);
    expect(ageAtAdmission("2024-12-31", 1970)).toBe(54);
    expect(ageAtAdmission("2024-06-01", null)).toBeNull();
  });

  it("ages each admission separately", () => {
    const { episodes } = resolveEcmoVisits(
      [1],
      [procedure(1, 10, ECMO, "2019-05-02"), procedure(1, 11, ECMO, "2023-08-02")],
      [ECMO]
    );
    const { visits } = joinDemographics(
      episodes,
      [personRow(1, { yearOfBirth: 1960 })],
      [visitRow(1, 10, "2019-05-01"), visitRow(1, 11, "2023-08-01")]
    );
    expect(visits.map(v => v.ageAtAdmission)).toEqual([59, 63]);
  });

  it("drops and counts visits without a person or visit row", () => {
    const { episodes } = resolveEcmoVisits(
      [1, 2],
      [procedure(1, 10, ECMO, "2024-01-02"), procedure(1, 12, ECMO, "2024-03-02"), procedure(2, 20, ECMO, "2024-01-02")],
      [ECMO]
    );
    const result = joinDemographics(episodes, [personRow(1)], [visitRow(1, 10, "2024-01-01"), visitRow(2, 20, "2024-01-01")]);

    expect(result.visits.map(v => v.visitId)).toEqual([10]);
    expect(result.missingVisit).toBe(1);
    expect(result.missingPerson).toBe(1);
    expect(result.visits[0]).toMatchObject({ site: "SITE-7", genderConceptId: 8507, visitStartDate: "2024-01-01" });
  });
});
