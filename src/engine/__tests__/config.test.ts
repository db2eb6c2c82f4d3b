import {
  DEFAULT_BUCKET_LIMITS,
  DEFAULT_ENGINE_CONFIG,
  loadEngineConfig,
  readEnvOverrides,
} from "@src/engine/config";
import { ConfigurationError } from "@src/util/errors";

describe("loadEngineConfig", () => {
  const originalEnv = process.env;
  beforeEach(() => {
    process.env = { ...originalEnv };
    delete process.env.STAGE;
    delete process.env.BUCKET_LIMITS;
    delete process.env.CYCLE_LATE_MID_PHASE;
    delete process.env.ACTION_TRIM_CONTRIBUTION;
  });
  afterAll(() => {
    process.env = originalEnv;
  });

  it("returns the defaults without overrides", () => {
    expect(loadEngineConfig({}, { useEnv: false })).toEqual(DEFAULT_ENGINE_CONFIG);
  });

  it("merges explicit overrides per key", () => {
    const config = loadEngineConfig(
      { cycle: { lateMidPhase: "MID" }, actions: { trimContribution: 4 } },
      { useEnv: false }
    );
    expect(config.cycle.lateMidPhase).toBe("MID");
    expect(config.cycle.bands).toEqual(DEFAULT_ENGINE_CONFIG.cycle.bands);
    expect(config.actions.trimContribution).toBe(4);
    expect(config.actions.holdContribution).toBe(1.5);
  });

  it("replaces bucket limits wholesale", () => {
    const config = loadEngineConfig(
      { bucketLimits: { Memory: 0.3, Cash: 1 } },
      { useEnv: false }
    );
    expect(config.bucketLimits).toEqual({ Memory: 0.3, Cash: 1 });
  });

  it("reads overrides from the environment", () => {
    process.env.BUCKET_LIMITS = '{"Memory":0.4,"Cash":1}';
    process.env.CYCLE_LATE_MID_PHASE = "MID";
    process.env.ACTION_TRIM_CONTRIBUTION = "2.5";

    const config = loadEngineConfig();
    expect(config.bucketLimits).toEqual({ Memory: 0.4, Cash: 1 });
    expect(config.cycle.lateMidPhase).toBe("MID");
    expect(config.actions.trimContribution).toBe(2.5);
  });

  it("lets explicit overrides win over the environment", () => {
    process.env.ACTION_TRIM_CONTRIBUTION = "2.5";
    const config = loadEngineConfig({ actions: { trimContribution: 5 } });
    expect(config.actions.trimContribution).toBe(5);
    expect(config.bucketLimits).toEqual(DEFAULT_BUCKET_LIMITS);
  });

  it("rejects an unknown late-mid phase", () => {
    process.env.CYCLE_LATE_MID_PHASE = "PEAKING";
    expect(() => readEnvOverrides()).toThrow(ConfigurationError);
    expect(() => readEnvOverrides()).toThrow(
      "Invalid CYCLE_LATE_MID_PHASE: expected MID or LATE, got PEAKING"
    );
  });

  it("wraps malformed env values as configuration errors", () => {
    process.env.ACTION_TRIM_CONTRIBUTION = "lots";
    expect(() => readEnvOverrides()).toThrow(ConfigurationError);
    expect(() => readEnvOverrides()).toThrow(
      "Invalid ACTION_TRIM_CONTRIBUTION: Env var ACTION_TRIM_CONTRIBUTION is not a number: lots"
    );

    delete process.env.ACTION_TRIM_CONTRIBUTION;
    process.env.BUCKET_LIMITS = "{nope";
    expect(() => readEnvOverrides()).toThrow(ConfigurationError);
    expect(() => readEnvOverrides()).toThrow(/^Invalid BUCKET_LIMITS: Env var BUCKET_LIMITS is not valid JSON/);
  });

  it("rejects bucket limits above 1", () => {
    process.env.BUCKET_LIMITS = '{"Memory":1.5}';
    expect(() => readEnvOverrides()).toThrow(/^Invalid BUCKET_LIMITS: Memory: /);
  });

  it("rejects unordered bias thresholds", () => {
    let caught: unknown;
    try {
      loadEngineConfig(
        { scoring: { bias: { strongBuy: 10, buy: 15, sell: -15, strongSell: -40 } } },
        { useEnv: false }
      );
    } catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(ConfigurationError);
    if (caught instanceof ConfigurationError) {
      expect(caught.details).toEqual([
        "scoring.bias: bias thresholds must be ordered strongBuy >= buy > sell >= strongSell",
      ]);
    }
  });
});
