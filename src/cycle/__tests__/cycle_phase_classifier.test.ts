import {
  bandFor,
  classifyComponents,
  classifyCyclePhase,
  computeCycleComponents,
  type CycleComponents,
} from "@src/cycle/cycle_phase_classifier";
import { DEFAULT_ENGINE_CONFIG } from "@src/engine/config";

const cycle = DEFAULT_ENGINE_CONFIG.cycle;

const ZERO: CycleComponents = {
  rsi_overheat: 0,
  price_extension: 0,
  negative_news_shift: 0,
  vol_expansion: 0,
  capex_mentions: 0,
  momentum_vol_divergence: 0,
};

describe("computeCycleComponents", () => {
  it("scales each component to 0-100", () => {
    const components = computeCycleComponents(
      { rsi_14: 85, ret_63d: 0.6, volatility_20d: 0.52, volatility_50d: 0.35, ret_21d: 0.2 },
      { newsRiskScore: 0, effectivenessScore: 50, capexMentions: 0 }
    );
    expect(components.rsi_overheat).toBe(60);
    expect(components.price_extension).toBe(60);
    expect(components.vol_expansion).toBe(100);
    expect(components.negative_news_shift).toBe(0);
    expect(components.capex_mentions).toBe(0);
    expect(components.momentum_vol_divergence).toBe(0);
  });

  it("counts effectiveness only below neutral", () => {
    const weak = computeCycleComponents({}, { newsRiskScore: 50, effectivenessScore: 20, capexMentions: 0 });
    const strong = computeCycleComponents({}, { newsRiskScore: 50, effectivenessScore: 80, capexMentions: 0 });
    expect(weak.negative_news_shift).toBeCloseTo(54, 10);
    expect(strong.negative_news_shift).toBeCloseTo(30, 10);
  });

  it("flags high volatility without momentum", () => {
    const components = computeCycleComponents(
      { ret_21d: 0.01, volatility_20d: 0.4 },
      { newsRiskScore: 0, effectivenessScore: 50, capexMentions: 4 }
    );
    expect(components.momentum_vol_divergence).toBeCloseTo(79, 10);
    expect(components.capex_mentions).toBe(80);
  });

  it("zeroes components whose indicators are missing", () => {
    const components = computeCycleComponents(
      { rsi_14: Number.NaN, ret_63d: null },
      { newsRiskScore: Number.NaN, effectivenessScore: Number.NaN, capexMentions: 0 }
    );
    expect(components).toEqual(ZERO);
  });
});

describe("classifyCyclePhase", () => {
  it("classifies a quiet stock as EARLY", () => {
    const result = classifyCyclePhase({}, 0, 50);
    expect(result.composite).toBe(0);
    expect(result.band).toBe("early");
    expect(result.phase).toBe("EARLY");
    expect(result.transitionRisk).toBe(0);
    expect(result.confidence).toBe(30);
    expect(result.triggeredComponents).toEqual([]);
  });

  it("classifies an overheated stock as LATE", () => {
    const result = classifyCyclePhase(
      { rsi_14: 85, ret_63d: 0.6, volatility_20d: 0.52, volatility_50d: 0.35, ret_21d: 0.2 },
      0,
      50
    );
    // (0.2 * 60 + 0.2 * 60 + 0.15 * 100 + 0.15 * 0) / 0.7
    expect(result.composite).toBeCloseTo(55.714, 3);
    expect(result.band).toBe("late_mid");
    expect(result.phase).toBe("LATE");
    expect(result.transitionRisk).toBeCloseTo(17.143, 3);
    expect(result.triggeredComponents).toEqual([
      "vol_expansion",
      "rsi_overheat",
      "price_extension",
    ]);
    expect(result.confidence).toBe(82);
  });

  it("dilutes a single fired component with the news shift", () => {
    const overbought = classifyCyclePhase({ rsi_14: 95 }, 0, 50);
    expect(overbought.components.rsi_overheat).toBe(100);
    // 0.2 * 100 / (0.2 + 0.15)
    expect(overbought.composite).toBeCloseTo(57.143, 3);
    expect(overbought.band).toBe("late_mid");
    expect(overbought.phase).toBe("LATE");
    expect(overbought.transitionRisk).toBeCloseTo(21.429, 3);

    const capexOnly = classifyCyclePhase({}, 0, 50, { capexMentions: 4 });
    // 0.1 * 80 / (0.1 + 0.15)
    expect(capexOnly.composite).toBeCloseTo(32, 10);
    expect(capexOnly.phase).toBe("MID");
  });
});

describe("classifyComponents", () => {
  it("maps the late-mid sub-band through configuration", () => {
    const components = { ...ZERO, rsi_overheat: 100 };
    const byDefault = classifyComponents(components, cycle);
    expect(byDefault.band).toBe("late_mid");
    expect(byDefault.phase).toBe("LATE");
    expect(byDefault.transitionRisk).toBeCloseTo(21.429, 3);

    const asMid = classifyComponents(components, { ...cycle, lateMidPhase: "MID" });
    expect(asMid.phase).toBe("MID");
  });

  it("maps the rollover band through configuration", () => {
    const components: CycleComponents = {
      rsi_overheat: 90,
      price_extension: 90,
      negative_news_shift: 90,
      vol_expansion: 90,
      capex_mentions: 90,
      momentum_vol_divergence: 90,
    };
    expect(classifyComponents(components, cycle).phase).toBe("DOWNTURN");
    expect(classifyComponents(components, { ...cycle, rolloverPhase: "PEAKING" }).phase).toBe(
      "PEAKING"
    );
    expect(classifyComponents(components, cycle).transitionRisk).toBe(100);
  });
});

describe("bandFor", () => {
  it.each<[number, string]>([
    [19.99, "early"],
    [20, "mid"],
    [39.99, "mid"],
    [40, "late_mid"],
    [60, "late"],
    [79.99, "late"],
    [80, "rollover"],
  ])("composite %p -> %s", (composite, band) => {
    expect(bandFor(composite, cycle.bands)).toBe(band);
  });
});
