import { describe, it, expect } from "vitest";
import type { DerivedInputs, MeasurementVariable } from "../cohortConfig";
import { visitKey } from "../cohortContract";
import { aggregateMeasurements, meanArterialPressure, pfRatio } from "./measurementAggregator";
import { lab } from "../fixtures";

const PAO2 = 3027801;
const FIO2 = 3026238;
const FIO2_FALLBACK = 4353936;
const PLATELETS = 3007461;
const SBP = 3004249;
const DBP = 3012888;
const NEUT = 3017732;
const LYMPH = 3019198;
const CREATININE = 3016723;

const VARIABLES: MeasurementVariable[] = [
  { name: "creatinine_avg", primaryConceptId: CREATININE, precision: 2 },
  { name: "neutrophil_count_avg", primaryConceptId: NEUT, precision: 1 },
  { name: "lymphocyte_count_avg", primaryConceptId: LYMPH, precision: 1 },
  { name: "pao2_avg", primaryConceptId: PAO2, precision: 1 },
  { name: "fio2_avg", primaryConceptId: FIO2, fallbackConceptId: FIO2_FALLBACK, precision: 1 },
  { name: "platelets_avg", primaryConceptId: PLATELETS, precision: 0 },
  { name: "bilirubin_avg", primaryConceptId: 3024128, precision: 2 },
  { name: "systolic_bp_avg", primaryConceptId: SBP, precision: 1 },
  { name: "diastolic_bp_avg", primaryConceptId: DBP, precision: 1 },
];

const DERIVED: DerivedInputs = {
  pao2: "pao2_avg",
  fio2: "fio2_avg",
  platelets: "platelets_avg",
  bilirubin: "bilirubin_avg",
  systolic: "systolic_bp_avg",
  diastolic: "diastolic_bp_avg",
  neutrophils: "neutrophil_count_avg",
  lymphocytes: "lymphocyte_count_avg",
};

const VISIT = { personId: 1, visitId: 10 };
const KEY = visitKey(VISIT);

function aggregate(events: Parameters<typeof aggregateMeasurements>[1]) {
  return aggregateMeasurements([VISIT], events, VARIABLES, DERIVED);
}

describe("MeasurementAggregator", () => {
  it("averages only non-null, strictly positive values", () => {
    const result = aggregate([
      lab(1, 10, CREATININE, 1.2),
      lab(1, 10, CREATININE, 1.5),
      lab(1, 10, CREATININE, 0),
      lab(1, 10, CREATININE, -3),
      lab(1, 10, CREATININE, null),
    ]);
    expect(result.get(KEY)?.labs.creatinine_avg).toBe(1.35);
    expect(result.get(KEY)?.sampleCount).toBe(2);
  });

  it("rounds to each variable's precision", () => {
    const result = aggregate([
      lab(1, 10, PLATELETS, 99),
      lab(1, 10, PLATELETS, 100),
      lab(1, 10, CREATININE, 1.111),
      lab(1, 10, CREATININE, 1.112),
    ]);
    expect(result.get(KEY)?.labs.platelets_avg).toBe(100);
    expect(result.get(KEY)?.labs.creatinine_avg).toBe(1.11);
  });

  it("leaves variables without samples null", () => {
    const result = aggregate([lab(1, 10, CREATININE, 1)]);
    expect(result.get(KEY)?.labs.pao2_avg).toBeNull();
    expect(result.get(KEY)?.pfRatio).toBeNull();
    expect(result.get(KEY)?.mapAvg).toBeNull();
  });

  it("produces no row for a visit without any qualifying sample", () => {
    const result = aggregate([lab(1, 10, CREATININE, 0), lab(1, 10, 12345, 5)]);
    expect(result.has(KEY)).toBe(false);
  });

  it("ignores events from other visits and unlinked events", () => {
    const result = aggregate([lab(1, 11, CREATININE, 9), lab(1, null, CREATININE, 9), lab(1, 10, CREATININE, 1)]);
    expect(result.get(KEY)?.labs.creatinine_avg).toBe(1);
    expect(result.size).toBe(1);
  });

  describe("FiO2 fallback", () => {
    it("keeps the primary mean whenever the primary has any sample", () => {
      const result = aggregate([
        lab(1, 10, FIO2, 60),
        lab(1, 10, FIO2_FALLBACK, 80),
        lab(1, 10, FIO2_FALLBACK, 80),
        lab(1, 10, FIO2_FALLBACK, 80),
        lab(1, 10, FIO2_FALLBACK, 80),
      ]);
      expect(result.get(KEY)?.labs.fio2_avg).toBe(60);
    });

    it("uses the fallback mean when the primary has no qualifying sample", () => {
      const result = aggregate([
        lab(1, 10, FIO2, 0),
        lab(1, 10, FIO2_FALLBACK, 70),
        lab(1, 10, FIO2_FALLBACK, 90),
      ]);
      expect(result.get(KEY)?.labs.fio2_avg).toBe(80);
    });
  });

  describe("derived vitals", () => {
    it("computes MAP from the rounded pressure means", () => {
      expect(meanArterialPressure(60, 120)).toBe(80);
      const result = aggregate([lab(1, 10, DBP, 60), lab(1, 10, SBP, 120)]);
      expect(result.get(KEY)?.mapAvg).toBe(80);
    });

    it("computes the P/F ratio only with FiO2 above zero", () => {
      expect(pfRatio(300, 75)).toBe(400);
      expect(pfRatio(300, 0)).toBeNull();
      expect(pfRatio(null, 50)).toBeNull();
      const result = aggregate([lab(1, 10, PAO2, 300), lab(1, 10, FIO2, 75)]);
      expect(result.get(KEY)?.pfRatio).toBe(400);
      expect(result.get(KEY)?.pfRatioUnrounded).toBe(400);
    });

    it("keeps the unrounded MAP for scoring", () => {
      const result = aggregate([lab(1, 10, DBP, 65), lab(1, 10, SBP, 79.9)]);
      // (130 + 79.9) / 3 = 69.9666...
      expect(result.get(KEY)?.mapAvg).toBe(70);
      expect(result.get(KEY)?.mapUnrounded).toBeLessThan(70);
    });

    it("computes the neutrophil/lymphocyte ratio from unrounded means", () => {
      const result = aggregate([
        lab(1, 10, NEUT, 10),
        lab(1, 10, NEUT, 10.05),
        lab(1, 10, LYMPH, 2),
      ]);
      // 10.025 / 2 = 5.0125 -> 5.01
      expect(result.get(KEY)?.neutrophilLymphocyteRatio).toBe(5.01);
      expect(result.get(KEY)?.labs.neutrophil_count_avg).toBe(10);
    });
  });
});
