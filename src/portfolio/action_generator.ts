import { isPhaseAtMost, normalizeTicker } from "../domain/types";
import { DEFAULT_ENGINE_CONFIG, type EngineConfig } from "../engine/config";
import type { StockCycleAnalysis } from "../analysis/stock_cycle_analyzer";
import { assertNever } from "../util/errors";
import { getLogger } from "../util/logger";
import type {
  Action,
  BucketAggregate,
  PortfolioRiskResult,
  PositionInput,
  Timeframe,
  Urgency,
} from "./types";

export type ActionConfig = EngineConfig["actions"];

const CASH_TOLERANCE = 1e-9;

/**
 * Bucket-level actions first (by urgency, then transition risk), followed by
 * position-level actions (by priority, then contribution).
 */
export function generateActions(
  buckets: readonly BucketAggregate[],
  portfolio: PortfolioRiskResult,
  positions: readonly PositionInput[],
  analyses: ReadonlyMap<string, StockCycleAnalysis>,
  options: { config?: EngineConfig } = {}
): Action[] {
  const logger = getLogger("portfolio/action_generator");
  const config = options.config ?? DEFAULT_ENGINE_CONFIG;
  const cashBucket = config.bucket.cashBucket;

  const forBuckets = buildBucketActions(buckets, portfolio, config.actions, cashBucket);
  const flagged = buckets.filter(
    b => b.bucket !== cashBucket && isBucketFlagged(b, config.actions)
  );
  const trimsAndHolds = buildPositionActions(flagged, config.actions);
  const adds = buildAddActions(
    portfolio,
    positions,
    analyses,
    new Set(trimsAndHolds.map(targetTicker)),
    config.actions,
    cashBucket
  );

  const forPositions = [...trimsAndHolds, ...adds].sort(
    (a, b) => a.priority - b.priority || b.contribution - a.contribution
  );

  const cashWeight = positions
    .filter(p => p.bucket === cashBucket)
    .reduce((acc, p) => acc + p.weight, 0);
  const { kept, deferred } = applyCashBuffer(
    [...forBuckets, ...forPositions],
    cashWeight,
    config.actions.minCashBuffer
  );
  if (deferred.length > 0) {
    logger.info(
      {
        cashWeight,
        minCashBuffer: config.actions.minCashBuffer,
        deferred: deferred.map(targetName),
      },
      "adds deferred by cash buffer"
    );
  }

  logger.debug(
    {
      mode: portfolio.mode,
      bucketActions: forBuckets.length,
      positionActions: forPositions.length,
      deferredAdds: deferred.length,
    },
    "actions generated"
  );
  return kept;
}

/**
 * Walks actions in order and drops any ADD whose weight increase would take cash below
 * the buffer, counting the ADDs already kept. Sells are not credited.
 */
export function applyCashBuffer(
  actions: readonly Action[],
  cashWeight: number,
  minCashBuffer: number
): { kept: Action[]; deferred: Action[] } {
  const budget = cashWeight - minCashBuffer;
  const kept: Action[] = [];
  const deferred: Action[] = [];
  let spent = 0;
  for (const action of actions) {
    if (action.kind !== "ADD") {
      kept.push(action);
      continue;
    }
    const delta = Math.max(0, action.toWeight - action.fromWeight);
    if (spent + delta > budget + CASH_TOLERANCE) {
      deferred.push(action);
      continue;
    }
    spent += delta;
    kept.push(action);
  }
  return { kept, deferred };
}

/** A bucket whose positions get trimmed: transition risk above the reduce threshold, or PEAKING. */
export function isBucketFlagged(bucket: BucketAggregate, config: ActionConfig): boolean {
  return bucket.transitionRisk > config.reduceRiskThreshold || bucket.phase === "PEAKING";
}

export function urgencyFor(bucket: BucketAggregate, config: ActionConfig): Urgency {
  if (bucket.transitionRisk > config.highUrgencyRisk) return "HIGH";
  if (bucket.transitionRisk > config.reduceRiskThreshold) return "MEDIUM";
  if (bucket.phase === "PEAKING") return "MEDIUM";
  return "LOW";
}

export function timeframeFor(urgency: Urgency): Timeframe {
  switch (urgency) {
    case "HIGH":
      return "1-2 weeks";
    case "MEDIUM":
      return "2-4 weeks";
    case "LOW":
      return "4-8 weeks";
    default:
      return assertNever(urgency, "urgency");
  }
}

function urgencyPriority(urgency: Urgency): number {
  switch (urgency) {
    case "HIGH":
      return 1;
    case "MEDIUM":
      return 2;
    case "LOW":
      return 3;
    default:
      return assertNever(urgency, "urgency");
  }
}

function buildBucketActions(
  buckets: readonly BucketAggregate[],
  portfolio: PortfolioRiskResult,
  config: ActionConfig,
  cashBucket: string
): Action[] {
  const actions: Action[] = [];

  for (const bucket of buckets) {
    if (bucket.bucket === cashBucket) continue;

    const overLimit = bucket.overage > config.overageTolerance;
    if (isBucketFlagged(bucket, config) || overLimit) {
      const urgency = urgencyFor(bucket, config);
      actions.push({
        target: { kind: "bucket", bucket: bucket.bucket },
        kind: "REDUCE",
        fromWeight: bucket.weight,
        toWeight: Math.min(bucket.weight, bucket.limit),
        urgency,
        timeframe: timeframeFor(urgency),
        priority: urgencyPriority(urgency),
        reasons: reduceReasons(bucket, config),
        contribution: bucket.transitionRisk,
      });
      continue;
    }

    const underWeighted = bucket.weight < bucket.limit * config.bucketAddWeightShare;
    if (
      portfolio.mode !== "DEFENSE" &&
      underWeighted &&
      bucket.transitionRisk < config.bucketAddMaxRisk
    ) {
      actions.push({
        target: { kind: "bucket", bucket: bucket.bucket },
        kind: "ADD",
        fromWeight: bucket.weight,
        toWeight: bucket.limit * config.bucketAddTargetShare,
        urgency: "LOW",
        timeframe: "4-8 weeks",
        priority: 4,
        reasons: [
          `Under-weighted (${pct(bucket.weight)} of ${pct(bucket.limit)} limit) with low transition risk (${bucket.transitionRisk.toFixed(0)})`,
        ],
        contribution: bucket.transitionRisk,
      });
    }
  }

  return actions.sort(
    (a, b) => a.priority - b.priority || b.contribution - a.contribution
  );
}

function reduceReasons(bucket: BucketAggregate, config: ActionConfig): string[] {
  const reasons: string[] = [];
  if (bucket.transitionRisk > config.reduceRiskThreshold) {
    reasons.push(`High transition risk (${bucket.transitionRisk.toFixed(0)})`);
  }
  if (bucket.phase === "PEAKING") {
    reasons.push("Bucket phase is PEAKING");
  }
  if (bucket.overage > 0) {
    reasons.push(`Over limit by ${pct(bucket.overage)}`);
  }
  if (bucket.criticalBreadth > 0.5) {
    reasons.push(`Critical signal breadth ${Math.round(bucket.criticalBreadth * 100)}%`);
  }
  return reasons;
}

function buildPositionActions(
  flagged: readonly BucketAggregate[],
  config: ActionConfig
): Action[] {
  const actions: Action[] = [];

  for (const bucket of flagged) {
    const timeframe = timeframeFor(urgencyFor(bucket, config));
    for (const c of bucket.contributors) {
      const target = { kind: "position" as const, ticker: c.ticker, bucket: bucket.bucket };
      const manyCritical = c.criticalSignals.length >= config.trimCriticalSignals;

      if (c.contribution > config.trimContribution || manyCritical) {
        const reasons = [`Top risk contributor in ${bucket.bucket} (${c.contribution.toFixed(1)})`];
        if (c.criticalSignals.length > 0) {
          reasons.push(`Critical signals: ${c.criticalSignals.slice(0, 2).join(", ")}`);
        }
        actions.push({
          target,
          kind: "TRIM",
          fromWeight: c.weight,
          toWeight: c.weight * (1 - config.trimFraction),
          urgency: urgencyFor(bucket, config),
          timeframe,
          priority: 1,
          reasons,
          contribution: c.contribution,
        });
      } else if (c.contribution >= config.holdContribution) {
        actions.push({
          target,
          kind: "HOLD",
          fromWeight: c.weight,
          toWeight: c.weight,
          urgency: "LOW",
          timeframe,
          priority: 3,
          reasons: [
            `Monitor; ${bucket.bucket} risk elevated but contribution moderate (${c.contribution.toFixed(1)})`,
          ],
          contribution: c.contribution,
        });
      }
    }
  }

  return actions;
}

function buildAddActions(
  portfolio: PortfolioRiskResult,
  positions: readonly PositionInput[],
  analyses: ReadonlyMap<string, StockCycleAnalysis>,
  alreadyActioned: ReadonlySet<string>,
  config: ActionConfig,
  cashBucket: string
): Action[] {
  if (portfolio.mode !== "OFFENSE") return [];

  const actions: Action[] = [];
  for (const position of positions) {
    if (position.bucket === cashBucket) continue;
    const ticker = normalizeTicker(position.ticker);
    if (alreadyActioned.has(ticker)) continue;
    const analysis = analyses.get(ticker);
    if (!analysis) continue;

    if (
      analysis.opportunityTotal > config.addMinOpportunity &&
      analysis.riskTotal < config.addMaxRisk &&
      isPhaseAtMost(analysis.phase, "MID")
    ) {
      actions.push({
        target: { kind: "position", ticker, bucket: position.bucket },
        kind: "ADD",
        fromWeight: position.weight,
        toWeight: position.weight * (1 + config.addFraction),
        urgency: "LOW",
        timeframe: "4-8 weeks",
        priority: 4,
        reasons: [
          `Strong opportunity (${analysis.opportunityTotal.toFixed(0)}) in ${analysis.phase} phase`,
        ],
        contribution: position.weight * analysis.cyclePressure,
      });
    }
  }
  return actions;
}

function targetName(action: Action): string {
  return action.target.kind === "bucket" ? action.target.bucket : action.target.ticker;
}

function targetTicker(action: Action): string {
  return action.target.kind === "position" ? action.target.ticker : "";
}

function pct(value: number): string {
  return `${(value * 100).toFixed(1)}%`;
}
