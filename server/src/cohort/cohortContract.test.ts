import { describe, it, expect } from "vitest";
import {
  addDays,
  calendarYear,
  compareVisitRefs,
  daysBetween,
  hoursBetween,
  mean,
  parseInstant,
  roundTo,
  safeDivide,
  visitKey,
} from "./cohortContract";

describe("cohortContract", () => {
  describe("roundTo", () => {
    it("rounds half away from zero", () => {
      expect(roundTo(2.5, 0)).toBe(3);
      expect(roundTo(-2.5, 0)).toBe(-3);
      expect(roundTo(80.25, 1)).toBe(80.3);
    });

    it("is not thrown off by binary representation", () => {
      expect(roundTo(1.005, 2)).toBe(1.01);
      expect(roundTo(333.3333333, 1)).toBe(333.3);
    });

    it("handles values printed in exponent form", () => {
      expect(roundTo(1e-7, 2)).toBe(0);
    });
  });

  it("mean returns null for no samples", () => {
    expect(mean([])).toBeNull();
    expect(mean([1, 2, 6])).toBe(3);
  });

  it("safeDivide guards zero and null", () => {
    expect(safeDivide(10, 0)).toBeNull();
    expect(safeDivide(null, 2)).toBeNull();
    expect(safeDivide(10, 4)).toBe(2.5);
  });

  it("does calendar arithmetic in UTC days", () => {
    expect(addDays("2024-01-10", 30)).toBe("2024-02-09");
    expect(addDays("2024-02-28", 1)).toBe("2024-02-29");
    expect(daysBetween("2024-01-10", "2024-02-09")).toBe(30);
    expect(calendarYear("2023-12-31")).toBe(2023);
  });

  it("reads database timestamps without a zone as UTC", () => {
    const a = parseInstant("2024-03-01 06:00:00");
    const b = parseInstant("2024-03-01T18:30:00Z");
    expect(hoursBetween(a, b)).toBe(12.5);
  });

  it("orders visit refs by person then visit", () => {
    const refs = [
      { personId: 2, visitId: 1 },
      { personId: 1, visitId: 9 },
      { personId: 1, visitId: 3 },
    ];
    expect(refs.sort(compareVisitRefs).map(visitKey)).toEqual(["1:3", "1:9", "2:1"]);
  });
});
