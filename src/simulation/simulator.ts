import type {
  Category,
  CategoryMap,
  ConstraintName,
  DecisionAction,
  PlannedTask,
  TradeOffDecision,
} from "../engine/types.js";
import { mapCategories } from "../engine/types.js";
import { DAY_MS } from "../engine/math.js";
import type { TradeoffConfig } from "../config/types.js";
import type { Logger } from "../logging/logger.js";
import { DecisionPipeline } from "../pipeline/pipeline.js";
import { InMemoryHistoryRepository } from "../store/memory.js";
import { SAMPLE_TASKS } from "./sample-tasks.js";
import { StateAnalyzer } from "./state-analyzer.js";
import { WearableGenerator, sleepQualityScore } from "./wearable.js";

export interface Scenario {
  readonly name: string;
  readonly description: string;
  readonly fatigueCurve: readonly number[];
  readonly stressCurve: readonly number[];
}

export const SCENARIOS = {
  burnout_recovery: {
    name: "Burnout to Recovery",
    description: "Start stressed, watch the engine enforce recovery",
    fatigueCurve: [0.9, 0.85, 0.7, 0.5, 0.4, 0.25, 0.15],
    stressCurve: [0.9, 0.8, 0.65, 0.5, 0.35, 0.25, 0.2],
  },
  gradual_burnout: {
    name: "Gradual Burnout",
    description: "Watch the engine detect and prevent burnout",
    fatigueCurve: [0.2, 0.3, 0.45, 0.6, 0.75, 0.85, 0.9],
    stressCurve: [0.2, 0.3, 0.4, 0.55, 0.7, 0.8, 0.85],
  },
  weekend_warrior: {
    name: "Weekend Warrior",
    description: "Low effort weekdays, high weekends",
    fatigueCurve: [0.6, 0.65, 0.7, 0.75, 0.5, 0.2, 0.3],
    stressCurve: [0.6, 0.65, 0.6, 0.65, 0.4, 0.15, 0.2],
  },
  high_performer: {
    name: "High Performer",
    description: "Consistently good state",
    fatigueCurve: [0.15, 0.2, 0.15, 0.25, 0.2, 0.1, 0.15],
    stressCurve: [0.2, 0.25, 0.2, 0.3, 0.2, 0.15, 0.2],
  },
} as const satisfies Record<string, Scenario>;

export type ScenarioId = keyof typeof SCENARIOS;

export function isScenarioId(value: string): value is ScenarioId {
  return Object.prototype.hasOwnProperty.call(SCENARIOS, value);
}

export interface SimulatedDay {
  readonly day: number;
  readonly timestamp: number;
  readonly metrics: {
    readonly sleepHours: number;
    readonly hrvMs: number;
    readonly restingHeartRate: number;
    readonly steps: number;
    readonly sleepQuality: number;
    readonly sleepDebtHours: number;
  };
  readonly decision: TradeOffDecision;
}

export interface SimulationSummary {
  readonly scenario: string;
  readonly daysSimulated: number;
  readonly totalDecisions: number;
  readonly actionBreakdown: Partial<Record<DecisionAction, number>>;
  readonly categoryBreakdown: CategoryMap<Partial<Record<DecisionAction, number>>>;
  /** Five most frequent constraints. */
  readonly constraintFrequency: Partial<Record<ConstraintName, number>>;
  readonly averageSleep: number;
  readonly burnoutDays: number;
  readonly adaptationEvents: number;
}

export interface SimulationResult {
  readonly days: SimulatedDay[];
  readonly summary: SimulationSummary;
}

export interface SimulationOptions {
  readonly scenario?: ScenarioId;
  readonly days?: number;
  readonly seed?: number;
  readonly timeAvailableHours?: number;
  readonly startAt?: number;
  readonly tasks?: readonly PlannedTask[];
  readonly config?: TradeoffConfig;
  readonly logger?: Logger;
}

const SIMULATED_USER = "simulated-user";

/** Runs the decision pipeline day by day over synthetic wearable data. */
export async function simulateWeek(options: SimulationOptions = {}): Promise<SimulationResult> {
  const scenario: Scenario = SCENARIOS[options.scenario ?? "burnout_recovery"];
  const dayCount = options.days ?? 7;
  const tasks = options.tasks ?? SAMPLE_TASKS;
  const startAt = options.startAt ?? Date.now();

  let clock = startAt;
  let sequence = 0;
  const repository = new InMemoryHistoryRepository();
  const pipeline = new DecisionPipeline(repository, {
    ...(options.config ? { config: options.config } : {}),
    ...(options.logger ? { logger: options.logger } : {}),
    now: () => clock,
    idFactory: () => `sim-${++sequence}`,
  });

  const generator = new WearableGenerator(options.seed ?? 42);
  const analyzer = new StateAnalyzer(repository.getProfile(SIMULATED_USER).targetSleepHours);
  const days: SimulatedDay[] = [];

  for (let day = 0; day < dayCount; day++) {
    clock = startAt + day * DAY_MS;
    const curveIndex = day % 7;
    const reading = generator.reading(clock, {
      fatigue: scenario.fatigueCurve[curveIndex] ?? 0,
      stress: scenario.stressCurve[curveIndex] ?? 0,
      weekend: curveIndex >= 5,
    });
    const state = analyzer.analyze(reading, options.timeAvailableHours ?? 2);

    const decision = await pipeline.runCycle(SIMULATED_USER, state, tasks);
    await pipeline.review(SIMULATED_USER, tasks);

    days.push({
      day: day + 1,
      timestamp: clock,
      metrics: {
        sleepHours: reading.sleepHours,
        hrvMs: reading.hrvMs,
        restingHeartRate: reading.restingHeartRate,
        steps: reading.steps,
        sleepQuality: sleepQualityScore(reading),
        sleepDebtHours: state.sleepDebtHours,
      },
      decision,
    });
  }

  return {
    days,
    summary: summarize(scenario, days, repository.getAdaptations(SIMULATED_USER).length),
  };
}

export function summarize(scenario: Scenario, days: readonly SimulatedDay[], adaptationEvents: number): SimulationSummary {
  const actionBreakdown: Partial<Record<DecisionAction, number>> = {};
  const categoryBreakdown = mapCategories((): Partial<Record<DecisionAction, number>> => ({}));
  const constraintCounts = new Map<ConstraintName, number>();
  let totalDecisions = 0;
  let totalSleep = 0;
  let burnoutDays = 0;

  for (const { decision, metrics } of days) {
    for (const d of decision.decisions) {
      totalDecisions++;
      actionBreakdown[d.action] = (actionBreakdown[d.action] ?? 0) + 1;
      const perCategory = categoryBreakdown[d.category];
      perCategory[d.action] = (perCategory[d.action] ?? 0) + 1;
    }
    for (const name of decision.constraintsActive) {
      constraintCounts.set(name, (constraintCounts.get(name) ?? 0) + 1);
    }
    totalSleep += metrics.sleepHours;
    if (decision.constraintsActive.includes("burnout_warning")) burnoutDays++;
  }

  const constraintFrequency: Partial<Record<ConstraintName, number>> = {};
  for (const [name, count] of [...constraintCounts].sort((a, b) => b[1] - a[1]).slice(0, 5)) {
    constraintFrequency[name] = count;
  }

  return {
    scenario: scenario.name,
    daysSimulated: days.length,
    totalDecisions,
    actionBreakdown,
    categoryBreakdown,
    constraintFrequency,
    averageSleep: days.length > 0 ? Math.round((totalSleep / days.length) * 10) / 10 : 0,
    burnoutDays,
    adaptationEvents,
  };
}

export function categoriesWithAction(day: SimulatedDay, action: DecisionAction): Category[] {
  return day.decision.decisions.filter((d) => d.action === action).map((d) => d.category);
}
