import { z } from "zod";
import { CYCLE_PHASES, INDICATOR_KEYS } from "../domain/types";
import { ConfigurationError, configurationErrorFromZod } from "../util/errors";
import { getJson, getNumber, getString } from "../util/env";
import { getLogger } from "../util/logger";

export const CYCLE_COMPONENTS = [
  "rsi_overheat",
  "price_extension",
  "negative_news_shift",
  "vol_expansion",
  "capex_mentions",
  "momentum_vol_divergence",
] as const;

export type CycleComponent = (typeof CYCLE_COMPONENTS)[number];

const nonNegative = z.number().finite().min(0);
const fraction = z.number().finite().min(0).max(1);
const phaseSchema = z.enum(CYCLE_PHASES);

const scoringSchema = z.object({
  minMatchedRules: z.number().int().min(1),
  epsilon: z.number().positive(),
  bias: z
    .object({
      strongBuy: z.number(),
      buy: z.number(),
      sell: z.number(),
      strongSell: z.number(),
    })
    .refine(b => b.strongBuy >= b.buy && b.buy > b.sell && b.sell >= b.strongSell, {
      message: "bias thresholds must be ordered strongBuy >= buy > sell >= strongSell",
    }),
  confidenceWeights: z.object({
    strength: nonNegative,
    count: nonNegative,
    differential: nonNegative,
  }),
  keyFactorMinStrength: fraction,
  maxKeyFactors: z.number().int().min(0),
  signalsPerKeyFactorCluster: z.number().int().min(1),
});

const qualitySchema = z.object({
  sma50MinLookback: z.number().int().min(0),
  sma200MinLookback: z.number().int().min(0),
  confidenceCapNanFraction: fraction,
  confidenceCap: z.number().min(0).max(100),
  strongBiasNanFraction: fraction,
  minPositiveHeadlines: z.number().int().min(0),
  minHeadlinesForNews: z.number().int().min(0),
  fullNewsConfidenceHeadlines: z.number().int().min(0),
  reducedNewsStrength: fraction,
  keyIndicators: z.array(z.enum(INDICATOR_KEYS)).min(1),
});

const cycleSchema = z.object({
  bands: z
    .object({
      earlyBelow: z.number(),
      midBelow: z.number(),
      lateMidBelow: z.number(),
      lateBelow: z.number(),
    })
    .refine(
      b => b.earlyBelow <= b.midBelow && b.midBelow <= b.lateMidBelow && b.lateMidBelow <= b.lateBelow,
      { message: "cycle bands must be ascending" }
    ),
  lateMidPhase: z.enum(["MID", "LATE"]),
  rolloverPhase: z.enum(["PEAKING", "DOWNTURN"]),
  componentWeights: z.object({
    rsi_overheat: nonNegative,
    price_extension: nonNegative,
    negative_news_shift: nonNegative,
    vol_expansion: nonNegative,
    capex_mentions: nonNegative,
    momentum_vol_divergence: nonNegative,
  }),
  componentTriggerThreshold: z.number().min(0).max(100),
});

const bucketSchema = z.object({
  phaseScores: z.object({
    EARLY: z.number(),
    MID: z.number(),
    LATE: z.number(),
    PEAKING: z.number(),
    DOWNTURN: z.number(),
  }),
  phaseThresholds: z
    .object({
      earlyBelow: z.number(),
      midBelow: z.number(),
      lateBelow: z.number(),
      peakingBelow: z.number(),
    })
    .refine(
      t => t.earlyBelow <= t.midBelow && t.midBelow <= t.lateBelow && t.lateBelow <= t.peakingBelow,
      { message: "phase thresholds must be ascending" }
    ),
  pressureRiskScale: nonNegative,
  criticalBreadthMultiplier: nonNegative,
  topContributors: z.number().int().min(1),
  cashBucket: z.string().min(1),
});

const portfolioSchema = z.object({
  concentrationScale: nonNegative,
  phaseConcentrationScale: nonNegative,
  storyConcentrationScale: nonNegative,
  blend: z.object({
    pressure: nonNegative,
    phase: nonNegative,
    concentration: nonNegative,
    story: nonNegative,
  }),
  offenseMaxRisk: z.number().min(0).max(100),
  offenseMaxPhase: phaseSchema,
  defenseMinRisk: z.number().min(0).max(100),
});

const actionsSchema = z.object({
  reduceRiskThreshold: z.number().min(0).max(100),
  highUrgencyRisk: z.number().min(0).max(100),
  overageTolerance: fraction,
  trimContribution: nonNegative,
  holdContribution: nonNegative,
  trimCriticalSignals: z.number().int().min(1),
  trimFraction: fraction,
  addFraction: nonNegative,
  addMinOpportunity: z.number().min(0).max(100),
  addMaxRisk: z.number().min(0).max(100),
  bucketAddWeightShare: fraction,
  bucketAddMaxRisk: z.number().min(0).max(100),
  bucketAddTargetShare: fraction,
  /** Cash share that ADD actions may not draw below. */
  minCashBuffer: fraction,
});

export const BucketLimitsSchema = z.record(z.string().min(1), fraction);

export const EngineConfigSchema = z.object({
  scoring: scoringSchema,
  quality: qualitySchema,
  cycle: cycleSchema,
  bucket: bucketSchema,
  portfolio: portfolioSchema,
  actions: actionsSchema,
  bucketLimits: BucketLimitsSchema,
});

export type EngineConfig = z.infer<typeof EngineConfigSchema>;
export type BucketLimits = z.infer<typeof BucketLimitsSchema>;

export type EngineConfigOverrides = {
  [K in keyof EngineConfig]?: Partial<EngineConfig[K]>;
};

export const DEFAULT_BUCKET_LIMITS: BucketLimits = {
  Memory: 0.18,
  Equipment: 0.25,
  EDA: 0.15,
  Analog: 0.2,
  Foundry: 0.15,
  Power: 0.1,
  Speculative: 0.05,
  Cash: 1.0,
};

export const DEFAULT_ENGINE_CONFIG: EngineConfig = {
  scoring: {
    minMatchedRules: 2,
    epsilon: 1e-9,
    bias: { strongBuy: 40, buy: 15, sell: -15, strongSell: -40 },
    confidenceWeights: { strength: 0.4, count: 0.3, differential: 0.3 },
    keyFactorMinStrength: 0.3,
    maxKeyFactors: 3,
    signalsPerKeyFactorCluster: 2,
  },
  quality: {
    sma50MinLookback: 60,
    sma200MinLookback: 210,
    confidenceCapNanFraction: 0.3,
    confidenceCap: 50,
    strongBiasNanFraction: 0.5,
    minPositiveHeadlines: 3,
    minHeadlinesForNews: 5,
    fullNewsConfidenceHeadlines: 10,
    reducedNewsStrength: 0.5,
    keyIndicators: [
      "rsi_14",
      "ret_21d",
      "ret_63d",
      "volatility_20d",
      "volatility_50d",
      "volume_z_score",
      "atr_pct",
      "current_drawdown",
      "price_vs_sma_50",
      "price_vs_sma_200",
    ],
  },
  cycle: {
    bands: { earlyBelow: 20, midBelow: 40, lateMidBelow: 60, lateBelow: 80 },
    lateMidPhase: "LATE",
    rolloverPhase: "DOWNTURN",
    componentWeights: {
      rsi_overheat: 0.2,
      price_extension: 0.2,
      negative_news_shift: 0.15,
      vol_expansion: 0.15,
      capex_mentions: 0.1,
      momentum_vol_divergence: 0.2,
    },
    componentTriggerThreshold: 50,
  },
  bucket: {
    phaseScores: { EARLY: -10, MID: 0, LATE: 15, PEAKING: 30, DOWNTURN: 45 },
    phaseThresholds: {
      earlyBelow: -5,
      midBelow: 7.5,
      lateBelow: 22.5,
      peakingBelow: 37.5,
    },
    pressureRiskScale: 2,
    criticalBreadthMultiplier: 0.8,
    topContributors: 5,
    cashBucket: "Cash",
  },
  portfolio: {
    concentrationScale: 200,
    phaseConcentrationScale: 250,
    storyConcentrationScale: 200,
    blend: { pressure: 0.35, phase: 0.25, concentration: 0.2, story: 0.2 },
    offenseMaxRisk: 30,
    offenseMaxPhase: "MID",
    defenseMinRisk: 60,
  },
  actions: {
    reduceRiskThreshold: 70,
    highUrgencyRisk: 80,
    overageTolerance: 0.05,
    trimContribution: 3.0,
    holdContribution: 1.5,
    trimCriticalSignals: 2,
    trimFraction: 0.5,
    addFraction: 0.5,
    addMinOpportunity: 60,
    addMaxRisk: 40,
    bucketAddWeightShare: 0.5,
    bucketAddMaxRisk: 40,
    bucketAddTargetShare: 0.75,
    minCashBuffer: 0.1,
  },
  bucketLimits: DEFAULT_BUCKET_LIMITS,
};

/**
 * Reads engine overrides from the environment:
 * - BUCKET_LIMITS: JSON object of bucket -> max weight
 * - CYCLE_LATE_MID_PHASE: MID | LATE
 * - ACTION_TRIM_CONTRIBUTION: number
 */
export function readEnvOverrides(): EngineConfigOverrides {
  const overrides: EngineConfigOverrides = {};

  const limits = readEnv("BUCKET_LIMITS", name => getJson(name));
  if (limits !== undefined) {
    const parsed = BucketLimitsSchema.safeParse(limits);
    if (!parsed.success) {
      throw configurationErrorFromZod("BUCKET_LIMITS", parsed.error);
    }
    overrides.bucketLimits = parsed.data;
  }

  const lateMid = getString("CYCLE_LATE_MID_PHASE");
  if (lateMid !== undefined) {
    if (lateMid !== "MID" && lateMid !== "LATE") {
      throw new ConfigurationError("Invalid CYCLE_LATE_MID_PHASE", [
        `expected MID or LATE, got ${lateMid}`,
      ]);
    }
    overrides.cycle = { lateMidPhase: lateMid };
  }

  const trimContribution = readEnv("ACTION_TRIM_CONTRIBUTION", name => getNumber(name));
  if (trimContribution !== undefined) {
    overrides.actions = { trimContribution };
  }

  return overrides;
}

/** Re-raises env parse failures as configuration errors. */
function readEnv<T>(name: string, read: (name: string) => T): T {
  try {
    return read(name);
  } catch (err) {
    throw new ConfigurationError(`Invalid ${name}`, [
      err instanceof Error ? err.message : String(err),
    ]);
  }
}

/**
 * Builds a validated engine configuration from defaults, environment and explicit overrides
 * (explicit wins). Bucket limits are replaced wholesale, every other section is merged per key.
 */
export function loadEngineConfig(
  overrides: EngineConfigOverrides = {},
  options: { useEnv?: boolean } = {}
): EngineConfig {
  const logger = getLogger("engine/config");
  const fromEnv = options.useEnv === false ? {} : readEnvOverrides();

  const merged = {
    scoring: { ...DEFAULT_ENGINE_CONFIG.scoring, ...fromEnv.scoring, ...overrides.scoring },
    quality: { ...DEFAULT_ENGINE_CONFIG.quality, ...fromEnv.quality, ...overrides.quality },
    cycle: { ...DEFAULT_ENGINE_CONFIG.cycle, ...fromEnv.cycle, ...overrides.cycle },
    bucket: { ...DEFAULT_ENGINE_CONFIG.bucket, ...fromEnv.bucket, ...overrides.bucket },
    portfolio: { ...DEFAULT_ENGINE_CONFIG.portfolio, ...fromEnv.portfolio, ...overrides.portfolio },
    actions: { ...DEFAULT_ENGINE_CONFIG.actions, ...fromEnv.actions, ...overrides.actions },
    bucketLimits: {
      ...(overrides.bucketLimits ?? fromEnv.bucketLimits ?? DEFAULT_ENGINE_CONFIG.bucketLimits),
    },
  };

  const parsed = EngineConfigSchema.safeParse(merged);
  if (!parsed.success) {
    throw configurationErrorFromZod("engine configuration", parsed.error);
  }

  logger.debug(
    {
      buckets: Object.keys(parsed.data.bucketLimits),
      lateMidPhase: parsed.data.cycle.lateMidPhase,
    },
    "engine config loaded"
  );
  return parsed.data;
}
