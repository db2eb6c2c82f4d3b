/**
 * Portfolio-level value objects.
 */
import type { CyclePhase, PortfolioMode } from "../domain/types";

export interface PositionInput {
  ticker: string;
  marketValue: number;
  /** Share of total portfolio value, cash included. */
  weight: number;
  bucket: string;
  profile: string;
  storyTags: readonly string[];
}

export interface BucketContributor {
  ticker: string;
  weight: number;
  pressure: number;
  /** weight * pressure */
  contribution: number;
  phase: CyclePhase;
  criticalSignals: readonly string[];
}

export interface BucketAggregate {
  bucket: string;
  weight: number;
  limit: number;
  /** max(0, weight - limit) */
  overage: number;
  pressure: number;
  phaseScore: number;
  phase: CyclePhase;
  criticalBreadth: number;
  baseRisk: number;
  riskMultiplier: number;
  transitionRisk: number;
  /** All contributors, largest contribution first. */
  contributors: BucketContributor[];
  topContributors: BucketContributor[];
}

export interface PortfolioRiskResult {
  pressure: number;
  phaseScore: number;
  phase: CyclePhase;
  pressureRisk: number;
  concentrationRisk: number;
  phaseConcentrationRisk: number;
  storyConcentrationRisk: number;
  transitionRisk: number;
  mode: PortfolioMode;
  totalOverage: number;
  peakingWeight: number;
  peakingTickers: string[];
  storyWeights: Record<string, number>;
  maxStoryWeight: number;
  dominantStory: string | null;
}

export type ActionKind = "REDUCE" | "TRIM" | "HOLD" | "ADD";

export type Urgency = "HIGH" | "MEDIUM" | "LOW";

export type Timeframe = "1-2 weeks" | "2-4 weeks" | "4-8 weeks";

export type ActionTarget =
  | { kind: "bucket"; bucket: string }
  | { kind: "position"; ticker: string; bucket: string };

export interface Action {
  target: ActionTarget;
  kind: ActionKind;
  fromWeight: number;
  toWeight: number;
  urgency: Urgency;
  timeframe: Timeframe;
  /** 1 is most pressing. */
  priority: number;
  reasons: string[];
  /** weight * pressure for positions, transition risk for buckets */
  contribution: number;
}
