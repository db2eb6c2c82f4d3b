export * from "./domain/types";
export * from "./engine/config";
export * from "./engine/analyze_portfolio";
export * from "./scoring/catalog";
export * from "./scoring/cluster_evaluator";
export * from "./scoring/dual_score";
export * from "./cycle/cycle_phase_classifier";
export * from "./quality/data_quality_gate";
export * from "./analysis/news_effectiveness";
export * from "./analysis/stock_cycle_analyzer";
export * from "./analysis/schema";
export * from "./portfolio/types";
export * from "./portfolio/schema";
export * from "./portfolio/bucket_aggregator";
export * from "./portfolio/portfolio_risk";
export * from "./portfolio/action_generator";
export * from "./portfolio/rotation_plan";
export { ConfigurationError, configurationErrorFromZod } from "./util/errors";
export { getLogger } from "./util/logger";
