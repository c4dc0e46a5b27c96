import { describe, it, expect } from "vitest";
import { visitKey } from "../cohortContract";
import type { LabAggregate } from "./measurementAggregator";
import type { VisitExposures } from "./exposureSummarizer";
import {
  cardiovascularScore,
  coagulationScore,
  liverScore,
  respiratoryScore,
  scoreByLadder,
  scoreVisits,
  totalSofa,
} from "./sofaScorer";

describe("SOFAScorer", () => {
  describe("respiratory", () => {
    it.each([
      [400, 0],
      [399.9, 1],
      [300, 1],
      [299.9, 2],
      [200, 2],
      [199.9, 3],
      [100, 3],
      [99.9, 4],
      [0, 4],
    ])("P/F %s scores %s", (ratio, score) => {
      expect(respiratoryScore(ratio)).toBe(score);
    });

    it("is null without a ratio", () => {
      expect(respiratoryScore(null)).toBeNull();
    });
  });

  describe("coagulation", () => {
    it.each([
      [150, 0],
      [149, 1],
      [100, 1],
      [99.9, 2],
      [50, 2],
      [49, 3],
      [20, 3],
      [19, 4],
    ])("platelets %s scores %s", (platelets, score) => {
      expect(coagulationScore(platelets)).toBe(score);
    });
  });

  describe("liver", () => {
    it.each([
      [0.5, 0],
      [1.19, 0],
      [1.2, 1],
      [1.99, 1],
      [2.0, 2],
      [5.99, 2],
      [6.0, 3],
      [11.99, 3],
      [12.0, 4],
      [25, 4],
    ])("bilirubin %s scores %s", (bilirubin, score) => {
      expect(liverScore(bilirubin)).toBe(score);
    });
  });

  describe("cardiovascular", () => {
    it("scores every MAP / vasopressor combination", () => {
      expect(cardiovascularScore(70, 0)).toBe(0);
      expect(cardiovascularScore(70, 1)).toBe(2);
      expect(cardiovascularScore(69.9, 0)).toBe(1);
      expect(cardiovascularScore(69.9, 1)).toBe(3);
      expect(cardiovascularScore(null, 1)).toBe(2);
      expect(cardiovascularScore(null, 0)).toBeNull();
    });
  });

  it("scoreByLadder ignores NaN", () => {
    expect(scoreByLadder(Number.NaN, [[0, 1]])).toBeNull();
  });

  describe("total", () => {
    it("sums null components as zero without scaling by availability", () => {
      const score = totalSofa({ respiratory: null, coagulation: 2, liver: 1, cardiovascular: null });
      expect(score.total).toBe(3);
      expect(score.componentsAvailable).toBe(2);
      expect(score.neurological).toBeNull();
    });

    it("is zero with nothing available", () => {
      const score = totalSofa({ respiratory: null, coagulation: null, liver: null, cardiovascular: null });
      expect(score.total).toBe(0);
      expect(score.componentsAvailable).toBe(0);
    });
  });

  it("scores visits from aggregates and exposures", () => {
    const ref = { personId: 1, visitId: 10 };
    const key = visitKey(ref);
    const aggregate: LabAggregate = {
      ...ref,
      labs: { platelets_avg: 100, bilirubin_avg: 2.5 },
      mapAvg: 80,
      pfRatio: 400,
      neutrophilLymphocyteRatio: null,
      mapUnrounded: 80,
      pfRatioUnrounded: 400,
      sampleCount: 6,
    };
    const exposures: VisitExposures = { ...ref, flags: {}, anyVasopressor: 1 };

    const result = scoreVisits(new Map([[key, aggregate]]), new Map([[key, exposures]]), {
      platelets: "platelets_avg",
      bilirubin: "bilirubin_avg",
    });

    expect(result.get(key)).toEqual({
      personId: 1,
      visitId: 10,
      respiratory: 0,
      coagulation: 1,
      liver: 2,
      cardiovascular: 2,
      neurological: null,
      total: 5,
      componentsAvailable: 4,
    });
  });
});
