import { summarizeNewsEffectiveness } from "@src/analysis/news_effectiveness";
import { EMPTY_HEADLINES, type HeadlineAggregate } from "@src/domain/types";

function headlines(outcomes: boolean[]): HeadlineAggregate {
  return {
    ...EMPTY_HEADLINES,
    totalHeadlines: outcomes.length + 2,
    positiveHeadlines: outcomes.length,
    positiveOutcomes: outcomes,
  };
}

describe("summarizeNewsEffectiveness", () => {
  it("is neutral without positive headlines", () => {
    expect(summarizeNewsEffectiveness(EMPTY_HEADLINES)).toEqual({
      sampleSize: 0,
      failures: 0,
      failureRate: 0,
      consecutiveFailures: 0,
      effectivenessScore: 50,
      alertTriggered: false,
    });
  });

  it("counts the trailing run of failures", () => {
    const result = summarizeNewsEffectiveness(headlines([true, false, false]));
    expect(result.sampleSize).toBe(3);
    expect(result.failures).toBe(2);
    expect(result.failureRate).toBeCloseTo(2 / 3, 10);
    expect(result.consecutiveFailures).toBe(2);
    expect(result.effectivenessScore).toBeCloseTo(33.333, 2);
    expect(result.alertTriggered).toBe(true);
  });

  it("resets the run when a headline works", () => {
    const result = summarizeNewsEffectiveness(headlines([false, true]));
    expect(result.failureRate).toBe(0.5);
    expect(result.consecutiveFailures).toBe(0);
    expect(result.effectivenessScore).toBe(50);
    expect(result.alertTriggered).toBe(false);
  });

  it("alerts on a high failure rate alone", () => {
    const result = summarizeNewsEffectiveness(
      headlines([false, false, true, false, true, false, false, true, false, true])
    );
    expect(result.failureRate).toBe(0.6);
    expect(result.consecutiveFailures).toBe(0);
    expect(result.alertTriggered).toBe(true);
  });
});
