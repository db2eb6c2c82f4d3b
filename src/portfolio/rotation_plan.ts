import { assertNever } from "../util/errors";
import { sum } from "../util/math";
import type { Action, Timeframe } from "./types";

export interface RotationStep {
  stepId: string;
  action: Action;
  /** 1-based week from the start of the rotation. */
  week: number;
  month: number;
  weekInMonth: number;
  dependsOn: string[];
}

export interface RotationTotals {
  reduces: number;
  trims: number;
  holds: number;
  adds: number;
  /** Sum of |toWeight - fromWeight| across all steps. */
  turnover: number;
}

export interface RotationPlan {
  steps: RotationStep[];
  totals: RotationTotals;
  horizonWeeks: number;
  horizonMonths: number;
}

export interface PlanRotationOptions {
  /** Position steps of one bucket that may start in the same week. */
  stepsPerWeek?: number;
}

export function startWeekFor(timeframe: Timeframe): number {
  switch (timeframe) {
    case "1-2 weeks":
      return 1;
    case "2-4 weeks":
      return 2;
    case "4-8 weeks":
      return 4;
    default:
      return assertNever(timeframe, "timeframe");
  }
}

export function monthOfWeek(week: number): { month: number; weekInMonth: number } {
  return { month: Math.ceil(week / 4), weekInMonth: ((week - 1) % 4) + 1 };
}

/**
 * Lays ranked actions out week by week. Sells (REDUCE, TRIM) come before the
 * ADDs they fund; position steps within a bucket are staggered so no more than
 * `stepsPerWeek` start in the same week.
 */
export function planRotation(
  actions: readonly Action[],
  options: PlanRotationOptions = {}
): RotationPlan {
  const stepsPerWeek = Math.max(1, Math.floor(options.stepsPerWeek ?? 2));

  const slotCounts = new Map<string, number>();
  const scheduled = actions.map((action, order) => {
    let week = startWeekFor(action.timeframe);
    if (action.target.kind === "position") {
      const slot = `${action.target.bucket}|${week}`;
      const taken = slotCounts.get(slot) ?? 0;
      slotCounts.set(slot, taken + 1);
      week += Math.floor(taken / stepsPerWeek);
    }
    return { action, order, week };
  });

  const lastSellWeek = Math.max(
    0,
    ...scheduled.filter(s => isSell(s.action)).map(s => s.week)
  );
  for (const s of scheduled) {
    if (s.action.kind === "ADD") s.week = Math.max(s.week, lastSellWeek);
  }

  scheduled.sort((a, b) => a.week - b.week || a.order - b.order);

  const ids = scheduled.map((_, i) => `step-${i + 1}`);
  const reduceIdByBucket = new Map<string, string>();
  scheduled.forEach((s, i) => {
    if (s.action.kind === "REDUCE" && s.action.target.kind === "bucket") {
      reduceIdByBucket.set(s.action.target.bucket, ids[i]);
    }
  });
  const sellIds = ids.filter((_, i) => isSell(scheduled[i].action));

  const steps: RotationStep[] = scheduled.map((s, i) => {
    const { month, weekInMonth } = monthOfWeek(s.week);
    return {
      stepId: ids[i],
      action: s.action,
      week: s.week,
      month,
      weekInMonth,
      dependsOn: dependenciesOf(s.action, reduceIdByBucket, sellIds),
    };
  });

  const horizonWeeks = Math.max(0, ...steps.map(s => s.week));
  return {
    steps,
    totals: {
      reduces: countKind(actions, "REDUCE"),
      trims: countKind(actions, "TRIM"),
      holds: countKind(actions, "HOLD"),
      adds: countKind(actions, "ADD"),
      turnover: sum(actions.map(a => Math.abs(a.toWeight - a.fromWeight))),
    },
    horizonWeeks,
    horizonMonths: Math.ceil(horizonWeeks / 4),
  };
}

function dependenciesOf(
  action: Action,
  reduceIdByBucket: ReadonlyMap<string, string>,
  sellIds: readonly string[]
): string[] {
  switch (action.kind) {
    case "REDUCE":
      return [];
    case "TRIM":
    case "HOLD": {
      if (action.target.kind !== "position") return [];
      const reduceId = reduceIdByBucket.get(action.target.bucket);
      return reduceId ? [reduceId] : [];
    }
    case "ADD":
      return [...sellIds];
    default:
      return assertNever(action.kind, "action kind");
  }
}

function isSell(action: Action): boolean {
  return action.kind === "REDUCE" || action.kind === "TRIM";
}

function countKind(actions: readonly Action[], kind: Action["kind"]): number {
  return actions.filter(a => a.kind === kind).length;
}
