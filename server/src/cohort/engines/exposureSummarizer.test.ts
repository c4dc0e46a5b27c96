import { describe, it, expect } from "vitest";
import type { ExposureClass } from "../cohortConfig";
import { visitKey } from "../cohortContract";
import {
  fromDrugEvent,
  fromProcedureEvent,
  hasAnyConcept,
  summarizeExposures,
  summarizeProcedureFlag,
} from "./exposureSummarizer";
import { drug, procedure } from "../fixtures";

const CLASSES: ExposureClass[] = [
  { name: "received_norepinephrine", group: "vasopressor", conceptIds: [1321341, 740244] },
  { name: "received_vasopressin", group: "vasopressor", conceptIds: [35202042] },
  { name: "received_propofol", conceptIds: [753626] },
];

const A = { personId: 1, visitId: 10 };
const B = { personId: 1, visitId: 11 };

describe("ExposureSummarizer", () => {
  it("flags a class when any code of its set appears in the visit", () => {
    const result = summarizeExposures([A], [fromDrugEvent(drug(1, 10, 740244))], CLASSES, "vasopressor");
    expect(result.get(visitKey(A))?.flags).toEqual({
      received_norepinephrine: 1,
      received_vasopressin: 0,
      received_propofol: 0,
    });
    expect(result.get(visitKey(A))?.anyVasopressor).toBe(1);
  });

  it("yields zeros, not missing entries, for visits with no drug events", () => {
    const result = summarizeExposures([A, B], [fromDrugEvent(drug(1, 10, 753626))], CLASSES, "vasopressor");
    expect(result.get(visitKey(B))).toEqual({
      personId: 1,
      visitId: 11,
      flags: { received_norepinephrine: 0, received_vasopressin: 0, received_propofol: 0 },
      anyVasopressor: 0,
    });
    expect(result.get(visitKey(A))?.anyVasopressor).toBe(0);
  });

  it("ORs only the vasopressor group into anyVasopressor", () => {
    const result = summarizeExposures([A], [fromDrugEvent(drug(1, 10, 35202042))], CLASSES, "vasopressor");
    expect(result.get(visitKey(A))?.anyVasopressor).toBe(1);
  });

  it("ignores events of other visits and without a visit id", () => {
    const result = summarizeExposures(
      [A],
      [fromDrugEvent(drug(1, 11, 1321341)), fromDrugEvent(drug(1, null, 1321341))],
      CLASSES,
      "vasopressor"
    );
    expect(result.get(visitKey(A))?.flags.received_norepinephrine).toBe(0);
  });

  it("reuses the same check for procedure flags", () => {
    const crrt = summarizeProcedureFlag([A, B], [fromProcedureEvent(procedure(1, 11, 37018292, "2024-01-04"))], [37018292]);
    expect(crrt.get(visitKey(A))).toBe(0);
    expect(crrt.get(visitKey(B))).toBe(1);
  });

  it("hasAnyConcept is false for an unseen visit", () => {
    expect(hasAnyConcept(undefined, [1])).toBe(false);
    expect(hasAnyConcept(new Set([2, 3]), [3])).toBe(true);
  });
});
