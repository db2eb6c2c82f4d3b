import type { HeadlineAggregate } from "../domain/types";
import { clipScore } from "../util/math";

/**
 * "Good news not working" summary over the positive headlines of one ticker.
 * A positive headline fails when its forward return did not confirm it.
 */
export interface NewsEffectiveness {
  sampleSize: number;
  failures: number;
  failureRate: number;
  /** Trailing run of failures ending at the most recent positive headline. */
  consecutiveFailures: number;
  /** 100 when every positive headline worked, 0 when none did, 50 without data. */
  effectivenessScore: number;
  alertTriggered: boolean;
}

const NEUTRAL_EFFECTIVENESS = 50;

export function summarizeNewsEffectiveness(
  headlines: HeadlineAggregate
): NewsEffectiveness {
  const outcomes = headlines.positiveOutcomes;
  if (outcomes.length === 0) {
    return {
      sampleSize: 0,
      failures: 0,
      failureRate: 0,
      consecutiveFailures: 0,
      effectivenessScore: NEUTRAL_EFFECTIVENESS,
      alertTriggered: false,
    };
  }

  let failures = 0;
  let consecutiveFailures = 0;
  for (const worked of outcomes) {
    if (worked) {
      consecutiveFailures = 0;
    } else {
      failures += 1;
      consecutiveFailures += 1;
    }
  }

  const failureRate = failures / outcomes.length;
  return {
    sampleSize: outcomes.length,
    failures,
    failureRate,
    consecutiveFailures,
    effectivenessScore: clipScore(100 - failureRate * 100),
    alertTriggered: consecutiveFailures >= 2 || failureRate >= 0.6,
  };
}
