import { DEFAULT_BUCKET_LIMITS, DEFAULT_ENGINE_CONFIG } from "@src/engine/config";
import {
  aggregateBucket,
  aggregateBuckets,
  phaseFromScore,
} from "@src/portfolio/bucket_aggregator";
import { ConfigurationError } from "@src/util/errors";
import { analysis, analysisMap, position } from "./fixtures";

const thresholds = DEFAULT_ENGINE_CONFIG.bucket.phaseThresholds;

describe("aggregateBuckets", () => {
  it("rolls up a memory bucket", () => {
    const positions = [
      position("MEMA", 0.12, "Memory"),
      position("MEMB", 0.08, "Memory"),
      position("MEMC", 0.08, "Memory"),
    ];
    const analyses = analysisMap([
      analysis("MEMA", 53, "PEAKING", ["RSI_DIVERGENCE"]),
      analysis("MEMB", 50, "PEAKING", ["DISTRIBUTION_BREADTH"]),
      analysis("MEMC", 43, "LATE", ["FIRST_50DMA_FAILURE"]),
    ]);

    const [memory] = aggregateBuckets(positions, analyses, DEFAULT_BUCKET_LIMITS);
    expect(memory.bucket).toBe("Memory");
    expect(memory.weight).toBeCloseTo(0.28, 10);
    expect(memory.limit).toBe(0.18);
    expect(memory.overage).toBeCloseTo(0.1, 10);
    expect(memory.pressure).toBeCloseTo(13.8, 10);
    expect(memory.phaseScore).toBeCloseTo(7.2, 10);
    // 7.2 sits below the 7.5 LATE threshold
    expect(memory.phase).toBe("MID");
    expect(memory.criticalBreadth).toBeCloseTo(1, 10);
    expect(memory.baseRisk).toBeCloseTo(27.6, 10);
    expect(memory.riskMultiplier).toBeCloseTo(1.8, 10);
    expect(memory.transitionRisk).toBeCloseTo(49.68, 6);
    expect(memory.topContributors.map(c => c.ticker)).toEqual(["MEMA", "MEMB", "MEMC"]);
    expect(memory.topContributors[0].contribution).toBeCloseTo(6.36, 10);
  });

  it("groups buckets in order of first appearance", () => {
    const positions = [
      position("EQPA", 0.1, "Equipment"),
      position("MEMA", 0.1, "Memory"),
      position("EQPB", 0.1, "Equipment"),
      position("CASH", 0.7, "Cash"),
    ];
    const analyses = analysisMap([
      analysis("EQPA", 10, "MID"),
      analysis("MEMA", 10, "MID"),
      analysis("EQPB", 10, "MID"),
    ]);
    const buckets = aggregateBuckets(positions, analyses, DEFAULT_BUCKET_LIMITS);
    expect(buckets.map(b => [b.bucket, b.contributors.length])).toEqual([
      ["Equipment", 2],
      ["Memory", 1],
      ["Cash", 0],
    ]);
    const cash = buckets[2];
    expect(cash.weight).toBeCloseTo(0.7, 10);
    expect(cash.pressure).toBe(0);
    expect(cash.transitionRisk).toBe(0);
  });

  it("returns neutral values for a zero-weight bucket", () => {
    const bucket = aggregateBucket(
      "Power",
      [position("PWRA", 0, "Power")],
      analysisMap([analysis("PWRA", 80, "DOWNTURN", ["RSI_DIVERGENCE"])]),
      0.1
    );
    expect(bucket.weight).toBe(0);
    expect(bucket.pressure).toBe(0);
    expect(bucket.phase).toBe("MID");
    expect(bucket.criticalBreadth).toBe(0);
    expect(bucket.transitionRisk).toBe(0);
  });

  it("keeps a position without analysis in the bucket weight", () => {
    const bucket = aggregateBucket(
      "Foundry",
      [position("FNDA", 0.1, "Foundry"), position("FNDB", 0.1, "Foundry")],
      analysisMap([analysis("FNDA", 20, "MID")]),
      0.15
    );
    expect(bucket.weight).toBeCloseTo(0.2, 10);
    expect(bucket.pressure).toBeCloseTo(2, 10);
    expect(bucket.contributors.map(c => c.ticker)).toEqual(["FNDA"]);
  });

  it("clips transition risk at 100", () => {
    const bucket = aggregateBucket(
      "Memory",
      [position("MEMA", 0.5, "Memory")],
      analysisMap([analysis("MEMA", 90, "LATE", ["RSI_DIVERGENCE"])]),
      0.18
    );
    expect(bucket.baseRisk).toBe(90);
    expect(bucket.transitionRisk).toBe(100);
  });

  it("rejects unknown buckets", () => {
    expect(() =>
      aggregateBuckets([position("XYZ", 0.1, "Quantum")], new Map(), DEFAULT_BUCKET_LIMITS)
    ).toThrow(ConfigurationError);
    expect(() =>
      aggregateBuckets([position("XYZ", 0.1, "Quantum")], new Map(), DEFAULT_BUCKET_LIMITS)
    ).toThrow("Unknown bucket: no weight limit configured for bucket Quantum");
  });

  it("does not resolve limits through the prototype chain", () => {
    const positions = [position("XYZ", 0.1, "constructor"), position("ABC", 0.1, "toString")];
    expect(() => aggregateBuckets(positions, new Map(), DEFAULT_BUCKET_LIMITS)).toThrow(
      "Unknown bucket: no weight limit configured for bucket constructor; no weight limit configured for bucket toString"
    );
  });
});

describe("phaseFromScore", () => {
  it.each<[number, string]>([
    [-5.01, "EARLY"],
    [-5, "MID"],
    [7.49, "MID"],
    [7.5, "LATE"],
    [22.5, "PEAKING"],
    [37.49, "PEAKING"],
    [37.5, "DOWNTURN"],
    [Number.NaN, "MID"],
  ])("score %p -> %s", (score, phase) => {
    expect(phaseFromScore(score, thresholds)).toBe(phase);
  });
});
