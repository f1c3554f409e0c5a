import type {
  BurnoutForecast,
  ConsensusDecision,
  PlannedTask,
  StateSnapshotInput,
  TradeOffDecision,
} from "../engine/types.js";
import type { TradeoffConfig } from "../config/types.js";
import type { Logger } from "../logging/logger.js";
import type { HistoryRepository } from "../store/history-repository.js";
import { parseConfig } from "../config/schema.js";
import { createSilentLogger } from "../logging/logger.js";
import { EngineBus } from "../engine/bus.js";
import { normalizeSnapshot } from "../engine/state.js";
import { evaluateConstraints } from "../engine/constraints/evaluator.js";
import { TradeOffEngine } from "../engine/tradeoff/engine.js";
import { HealthCouncil, type CouncilStrategy } from "../engine/council/council.js";
import { predictBurnout } from "../engine/burnout/predictor.js";
import { adjustFuturePlan, type PlanAdjustment } from "../engine/patterns/adjuster.js";
import { buildWeeklyReport, type WeeklyReport } from "../engine/patterns/report.js";
import { TemplateNarrator, type Explanation, type Narrator } from "../strategy/narrator.js";
import { withFallback } from "../strategy/fallback.js";
import { KeyedLock } from "../utils/keyed-lock.js";

export interface PipelineOptions {
  readonly config?: TradeoffConfig;
  readonly logger?: Logger;
  readonly bus?: EngineBus;
  /** Service-backed council; the heuristic council answers when it fails. */
  readonly council?: CouncilStrategy;
  /** Service-backed narrator; the template narrator answers when it fails. */
  readonly narrator?: Narrator;
  readonly now?: () => number;
  readonly idFactory?: () => string;
}

export interface ReviewResult {
  readonly forecast: BurnoutForecast;
  /** Null when the user has no decision to adjust from. */
  readonly plan: PlanAdjustment | null;
}

/**
 * Runs the daily cycle against an injected repository: evaluate, decide,
 * persist, announce. Cycles for one user never interleave.
 */
export class DecisionPipeline {
  readonly bus: EngineBus;
  private readonly config: TradeoffConfig;
  private readonly logger: Logger;
  private readonly engine: TradeOffEngine;
  private readonly heuristicCouncil = new HealthCouncil();
  private readonly templateNarrator = new TemplateNarrator();
  private readonly council: CouncilStrategy | undefined;
  private readonly narrator: Narrator | undefined;
  private readonly now: () => number;
  private readonly locks = new KeyedLock();

  constructor(
    private readonly repository: HistoryRepository,
    options: PipelineOptions = {},
  ) {
    this.config = options.config ?? parseConfig({});
    this.logger = options.logger ?? createSilentLogger();
    this.bus = options.bus ?? new EngineBus();
    this.council = options.council;
    this.narrator = options.narrator;
    this.now = options.now ?? Date.now;
    this.engine = new TradeOffEngine({
      ...(options.idFactory ? { idFactory: options.idFactory } : {}),
      now: this.now,
    });
  }

  runCycle(userId: string, input: StateSnapshotInput, tasks: readonly PlannedTask[]): Promise<TradeOffDecision> {
    return this.locks.run(userId, () => {
      const state = normalizeSnapshot(input);
      const constraints = evaluateConstraints(state, this.config.thresholds);
      const profile = this.repository.getProfile(userId);
      const preferences = { ...this.config.engine.preferences, ...profile.preferences };

      const decision = this.engine.decide(
        state,
        constraints,
        tasks,
        Object.keys(preferences).length > 0 ? preferences : undefined,
      );

      this.repository.appendDecision(userId, decision);
      this.bus.emit({ type: "decision_made", userId, decision });
      this.logger.info(
        {
          userId,
          decisionId: decision.id,
          constraints: decision.constraintsActive,
          confidence: decision.confidenceScore,
        },
        "Decision made",
      );
      return decision;
    });
  }

  /** Burnout forecast over stored history. Reads only; nothing is persisted. */
  forecast(userId: string): Promise<BurnoutForecast> {
    return this.locks.run(userId, () => this.forecastFrom(userId, this.repository.getHistory(userId), this.now()));
  }

  review(userId: string, upcomingTasks: readonly PlannedTask[]): Promise<ReviewResult> {
    return this.locks.run(userId, () => {
      const now = this.now();
      const history = this.repository.getHistory(userId);
      const forecast = this.forecastFrom(userId, history, now);

      const current = history.at(-1);
      if (!current) return { forecast, plan: null };

      const plan = adjustFuturePlan(current, upcomingTasks, history, { ...this.config.patterns, now });
      this.repository.appendAdaptations(userId, plan.adaptations);
      for (const record of plan.adaptations) {
        this.bus.emit({ type: "adaptation_recorded", userId, record });
      }
      this.logger.info({ userId, adaptations: plan.adaptations.length }, "Plan reviewed");

      return { forecast, plan };
    });
  }

  private forecastFrom(userId: string, history: readonly TradeOffDecision[], now: number): BurnoutForecast {
    const forecast = predictBurnout(history, { now, windowDays: this.config.burnout.windowDays });
    this.bus.emit({ type: "burnout_forecast", userId, forecast });
    if (forecast.interventionNeeded) {
      this.logger.warn({ userId, riskScore: forecast.riskScore }, "Burnout intervention needed");
    }
    return forecast;
  }

  weeklyReport(userId: string): WeeklyReport {
    return buildWeeklyReport(this.repository.getHistory(userId), {
      ...this.config.patterns,
      now: this.now(),
      adaptationsMade: this.repository.getAdaptations(userId).length,
    });
  }

  async consult(userId: string, input: StateSnapshotInput, activity: string | PlannedTask): Promise<ConsensusDecision> {
    const deliberation = {
      state: normalizeSnapshot(input),
      activity,
      goal: this.repository.getProfile(userId).goal,
      history: this.repository.getHistory(userId),
    };

    const council = this.council;
    const consensus = council
      ? await withFallback(
          () => council.deliberate(deliberation),
          () => this.heuristicCouncil.deliberateSync(deliberation),
          { label: "council", timeoutMs: this.config.narrative.timeoutMs, logger: this.logger },
        )
      : this.heuristicCouncil.deliberateSync(deliberation);

    this.bus.emit({ type: "consensus_reached", userId, consensus });
    this.logger.debug({ userId, action: consensus.finalAction, level: consensus.consensusLevel }, "Council consulted");
    return consensus;
  }

  explain(decision: TradeOffDecision): Promise<Explanation> {
    const narrator = this.narrator;
    if (!narrator) return this.templateNarrator.explain(decision);
    return withFallback(
      () => narrator.explain(decision),
      () => this.templateNarrator.explain(decision),
      { label: "narrator", timeoutMs: this.config.narrative.timeoutMs, logger: this.logger },
    );
  }

  async weeklyInsight(userId: string): Promise<string> {
    const report = this.weeklyReport(userId);
    const narrator = this.narrator;
    if (!narrator) return this.templateNarrator.weeklyInsight(report);
    return withFallback(
      () => narrator.weeklyInsight(report),
      () => this.templateNarrator.weeklyInsight(report),
      { label: "narrator", timeoutMs: this.config.narrative.timeoutMs, logger: this.logger },
    );
  }
}
