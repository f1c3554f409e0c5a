export * from "./engine/types.js";
export { normalizeSnapshot } from "./engine/state.js";
export { EngineBus } from "./engine/bus.js";
export { ActiveConstraints } from "./engine/constraints/active.js";
export {
  evaluateConstraints,
  summarizeConstraints,
  countBurnoutFactors,
  DEFAULT_THRESHOLDS,
} from "./engine/constraints/evaluator.js";
export { computePriorities, rankCategories, formatTrace, BASE_PRIORITIES } from "./engine/priority/matrix.js";
export {
  TradeOffEngine,
  decide,
  appendToHistory,
  formatDecision,
  type TradeOffEngineOptions,
} from "./engine/tradeoff/engine.js";
export { HealthCouncil, deliberate, deliberateAsync, type CouncilStrategy, type DeliberationInput } from "./engine/council/council.js";
export { buildConsensus } from "./engine/council/consensus.js";
export { classifyActivity } from "./engine/council/activity.js";
export { predictBurnout } from "./engine/burnout/predictor.js";
export { PatternDetector, type PatternAnalysis } from "./engine/patterns/detector.js";
export { adjustFuturePlan, type PlanAdjustment } from "./engine/patterns/adjuster.js";
export { buildWeeklyReport, type WeeklyReport } from "./engine/patterns/report.js";
export { encodeDecision, decodeDecision, encodeConsensus, decodeConsensus } from "./engine/codec.js";
export { TemplateNarrator, type Narrator, type Explanation } from "./strategy/narrator.js";
export { withFallback, withTimeout, StrategyTimeoutError } from "./strategy/fallback.js";
export type { HistoryRepository } from "./store/history-repository.js";
export { InMemoryHistoryRepository } from "./store/memory.js";
export { SqliteHistoryRepository } from "./store/sqlite.js";
export { TradeoffDB } from "./store/db.js";
export { exportHistory } from "./store/export.js";
export { DecisionPipeline, type PipelineOptions, type ReviewResult } from "./pipeline/pipeline.js";
export { simulateWeek, SCENARIOS, type ScenarioId } from "./simulation/simulator.js";
export { loadConfig } from "./config/loader.js";
export { parseConfig } from "./config/schema.js";
export type { TradeoffConfig } from "./config/types.js";
export { createLogger, type Logger } from "./logging/logger.js";
