import type {
  CriticalSignal,
  HeadlineAggregate,
  IndicatorKey,
  IndicatorSnapshot,
  SignalCategory,
} from "../domain/types";
import { summarizeNewsEffectiveness } from "../analysis/news_effectiveness";
import { getLogger } from "../util/logger";
import { isPresent } from "../util/math";
import type {
  ClusterCatalog,
  IndicatorReader,
  MovingAverageWindow,
  NewsContext,
  RuleFeature,
  SignalCluster,
  SignalRule,
} from "./catalog";

export interface RuleMatch {
  ruleId: string;
  label: string;
  delta: number;
  dependsOn: readonly MovingAverageWindow[];
  newsDerived: boolean;
  feature?: RuleFeature;
}

export interface ClusterDescriptor {
  clusterId: string;
  name: string;
  category: SignalCategory;
  weight: number;
  newsDerived: boolean;
  critical?: CriticalSignal;
}

export interface ClusterResult extends ClusterDescriptor {
  triggered: boolean;
  /** Sum of matched contributions, capped at 1.0 (or a lower gate cap). */
  strength: number;
  signals: string[];
  matches: RuleMatch[];
}

export interface EvaluateOptions {
  minMatchedRules?: number;
}

const DEFAULT_MIN_MATCHED_RULES = 2;

/**
 * Matches every catalog cluster against one snapshot. Missing indicators make the
 * rules that need them non-matching; nothing here throws on bad data.
 */
export function evaluateClusters(
  snapshot: IndicatorSnapshot,
  headlines: HeadlineAggregate,
  catalog: ClusterCatalog,
  options: EvaluateOptions = {}
): ClusterResult[] {
  const logger = getLogger("scoring/cluster_evaluator");
  const minMatchedRules = options.minMatchedRules ?? DEFAULT_MIN_MATCHED_RULES;
  const news: NewsContext = {
    headlines,
    effectiveness: summarizeNewsEffectiveness(headlines),
  };

  const results = catalog.map(cluster => {
    const matches: RuleMatch[] = [];
    for (const rule of cluster.rules) {
      const match = evaluateRule(rule, snapshot, news);
      if (match) matches.push(match);
    }
    return buildClusterResult(describeCluster(cluster), matches, {
      minMatchedRules,
    });
  });

  logger.debug(
    {
      ticker: snapshot.ticker,
      triggered: results.filter(r => r.triggered).map(r => r.clusterId),
    },
    "clusters evaluated"
  );
  return results;
}

export function evaluateRule(
  rule: SignalRule,
  snapshot: IndicatorSnapshot,
  news: NewsContext
): RuleMatch | null {
  for (const key of rule.requires) {
    if (!isPresent(snapshot.indicators[key])) return null;
  }

  const read: IndicatorReader = (key: IndicatorKey) => {
    const value = snapshot.indicators[key];
    return isPresent(value) ? value : Number.NaN;
  };

  const tier = rule.tiers.find(t => t.when(read, news));
  if (!tier) return null;

  return {
    ruleId: rule.id,
    label: tier.label,
    delta: tier.delta,
    dependsOn: rule.dependsOn ?? [],
    newsDerived: rule.newsDerived === true,
    feature: rule.feature,
  };
}

export function describeCluster(cluster: SignalCluster): ClusterDescriptor {
  return {
    clusterId: cluster.id,
    name: cluster.name,
    category: cluster.category,
    weight: cluster.weight,
    newsDerived: cluster.newsDerived === true,
    critical: cluster.critical,
  };
}

/**
 * Derives trigger state and strength from a set of matches. Shared by the evaluator and
 * the data-quality gate so both apply the same trigger rule.
 */
export function buildClusterResult(
  descriptor: ClusterDescriptor,
  matches: readonly RuleMatch[],
  options: { minMatchedRules: number; strengthCap?: number }
): ClusterResult {
  const cap = Math.min(options.strengthCap ?? 1, 1);
  const total = matches.reduce((acc, m) => acc + m.delta, 0);
  return {
    clusterId: descriptor.clusterId,
    name: descriptor.name,
    category: descriptor.category,
    weight: descriptor.weight,
    newsDerived: descriptor.newsDerived,
    critical: descriptor.critical,
    triggered: matches.length >= options.minMatchedRules,
    strength: Math.max(0, Math.min(total, cap)),
    signals: matches.map(m => m.label),
    matches: [...matches],
  };
}
