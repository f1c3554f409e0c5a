import { randomUUID } from "node:crypto";
import type {
  Category,
  CategoryMap,
  CategoryWeights,
  DomainDecision,
  FutureImpact,
  PlannedTask,
  StateSnapshot,
  TradeOffDecision,
} from "../types.js";
import type { ActiveConstraints } from "../constraints/active.js";
import { computePriorities, rankCategories } from "../priority/matrix.js";
import { categoryRules, type RuleOutcome } from "./rules/index.js";
import { downgradeTo, keep } from "./rules/types.js";

export const MINIMAL_DURATIONS: CategoryMap<number> = {
  fitness: 10,
  nutrition: 5,
  recovery: 10,
  mindfulness: 5,
};

const STARVATION_RATIO = 0.5;
const STARVATION_PRIORITY = 0.3;
const BOOST_PRIORITY = 0.35;
const SLEEP_DEBT_IMPACT_HOURS = 4;

export interface TradeOffEngineOptions {
  /** Declared per-category preference blended into the priority matrix. */
  readonly preferences?: CategoryWeights;
  readonly now?: () => number;
  readonly idFactory?: () => string;
}

/**
 * Ranks categories by adjusted priority, walks them against an
 * energy-scaled time budget and emits one bounded action per category.
 */
export class TradeOffEngine {
  private readonly preferences: CategoryWeights | undefined;
  private readonly now: () => number;
  private readonly idFactory: () => string;

  constructor(options: TradeOffEngineOptions = {}) {
    this.preferences = options.preferences;
    this.now = options.now ?? Date.now;
    this.idFactory = options.idFactory ?? randomUUID;
  }

  decide(
    state: StateSnapshot,
    constraints: ActiveConstraints,
    plannedTasks: readonly PlannedTask[],
    preferences: CategoryWeights | undefined = this.preferences,
  ): TradeOffDecision {
    const { priorities, trace } = computePriorities(constraints, preferences);
    const ranked = rankCategories(priorities);

    // Energy scales usable time.
    const effectiveCapacity = state.timeAvailableHours * 60 * (state.energyLevel / 10);

    const decisions: DomainDecision[] = [];
    let timeAllocated = 0;

    for (const category of ranked) {
      const task = plannedTasks.find((t) => t.category === category);
      if (!task) continue;

      const decision = decideTask(task, priorities[category], constraints, effectiveCapacity - timeAllocated, state);

      if (decision.action === "PRIORITIZE" || decision.action === "MAINTAIN") {
        timeAllocated += task.durationMinutes;
      } else if (decision.action === "DOWNGRADE") {
        timeAllocated += decision.adjustedTask.durationMinutes;
      }

      decisions.push(decision);
    }

    const futureImpacts = calculateFutureImpacts(decisions, state, constraints);

    return freezeDecision({
      id: this.idFactory(),
      timestamp: this.now(),
      stateSnapshot: { ...state },
      constraintsActive: constraints.names(),
      priorities,
      priorityTrace: trace,
      decisions,
      futureImpacts,
      confidenceScore: calculateConfidence(constraints),
      reasoningSummary: summarizeDecisions(decisions, constraints),
    });
  }
}

export function decideTask(
  task: PlannedTask,
  priority: number,
  constraints: ActiveConstraints,
  timeRemaining: number,
  state: StateSnapshot,
): DomainDecision {
  let outcome: RuleOutcome;

  if (timeRemaining < task.durationMinutes * STARVATION_RATIO) {
    outcome =
      priority >= STARVATION_PRIORITY
        ? downgradeTo(
            createMinimalVersion(task),
            `Time critically limited but ${task.category} is high priority - minimal version`,
          )
        : keep("SKIP", `Insufficient time and ${task.category} not highest priority today`);
  } else {
    outcome = categoryRules[task.category]({ task, priority, constraints, state });
  }

  if (outcome.action === "MAINTAIN" && priority >= BOOST_PRIORITY) {
    outcome = keep("PRIORITIZE", `High adjusted priority (${priority.toFixed(2)}) - prioritizing ${task.category}`);
  }

  return {
    ...outcome,
    category: task.category,
    originalTask: { ...task },
    priorityScore: priority,
  };
}

export function createMinimalVersion(task: PlannedTask): PlannedTask {
  return {
    category: task.category,
    name: `Minimal ${task.name}`,
    durationMinutes: MINIMAL_DURATIONS[task.category],
    intensity: 0.2,
    description: `Abbreviated version of: ${task.description}`,
  };
}

export function calculateFutureImpacts(
  decisions: readonly DomainDecision[],
  state: StateSnapshot,
  constraints: ActiveConstraints,
): FutureImpact[] {
  const impacts: FutureImpact[] = [];

  const fitness = decisions.find((d) => d.category === "fitness");
  if (fitness && (fitness.action === "SKIP" || fitness.action === "DOWNGRADE")) {
    if (constraints.hasAny(["burnout_warning", "overtraining_risk"])) {
      impacts.push({
        daysAffected: 3,
        adjustmentType: "intensity_reduction",
        description: "Reducing workout intensity to 60% for the next 3 days",
      });
    } else {
      impacts.push({
        daysAffected: 1,
        adjustmentType: "workout_reschedule",
        description: "Consider adding light activity tomorrow if energy improves",
      });
    }
  }

  if (state.sleepDebtHours > SLEEP_DEBT_IMPACT_HOURS) {
    impacts.push({
      daysAffected: 2,
      adjustmentType: "sleep_extension",
      description: `Recommend adding 30 min to sleep for 2 nights to address ${state.sleepDebtHours.toFixed(1)}h debt`,
    });
  }

  if (constraints.has("burnout_warning")) {
    impacts.push({
      daysAffected: 7,
      adjustmentType: "deload_week",
      description: "Consider a deload week: reduce all fitness intensity by 50%",
    });
  }

  return impacts;
}

export function calculateConfidence(constraints: ActiveConstraints): number {
  if (constraints.size === 0) return 0.95;
  return Math.max(0.5, 0.9 - constraints.meanSeverity() * 0.3);
}

export function summarizeDecisions(decisions: readonly DomainDecision[], constraints: ActiveConstraints): string {
  const clauses: string[] = [];

  const named = (action: DomainDecision["action"]): Category[] =>
    decisions.filter((d) => d.action === action).map((d) => d.category);

  const prioritized = named("PRIORITIZE");
  if (prioritized.length > 0) clauses.push(`prioritized ${prioritized.join(", ")}`);

  const downgraded = named("DOWNGRADE");
  if (downgraded.length > 0) clauses.push(`downgraded ${downgraded.join(", ")}`);

  const skipped = named("SKIP");
  if (skipped.length > 0) clauses.push(`skipped ${skipped.join(", ")}`);

  if (clauses.length === 0) return "All tasks maintained as planned.";

  if (constraints.size > 0) {
    clauses.unshift(`Given ${constraints.size} active constraints`);
  }
  return `${clauses.join("; ")}.`;
}

function freezeDecision(decision: TradeOffDecision): TradeOffDecision {
  Object.freeze(decision.stateSnapshot);
  Object.freeze(decision.constraintsActive);
  Object.freeze(decision.priorities);
  for (const entry of decision.priorityTrace) Object.freeze(entry);
  Object.freeze(decision.priorityTrace);
  for (const d of decision.decisions) {
    Object.freeze(d.originalTask);
    if (d.adjustedTask) Object.freeze(d.adjustedTask);
    Object.freeze(d);
  }
  Object.freeze(decision.decisions);
  for (const impact of decision.futureImpacts) Object.freeze(impact);
  Object.freeze(decision.futureImpacts);
  return Object.freeze(decision);
}

export const DEFAULT_HISTORY_LIMIT = 50;

/** Stateless form of {@link TradeOffEngine.decide}. */
export function decide(
  state: StateSnapshot,
  constraints: ActiveConstraints,
  plannedTasks: readonly PlannedTask[],
  preferences?: CategoryWeights,
): TradeOffDecision {
  return new TradeOffEngine().decide(state, constraints, plannedTasks, preferences);
}

/** Returns a new log with the decision appended, keeping only the newest `limit` entries. */
export function appendToHistory(
  history: readonly TradeOffDecision[],
  decision: TradeOffDecision,
  limit = DEFAULT_HISTORY_LIMIT,
): TradeOffDecision[] {
  const next = [...history, decision];
  return next.length > limit ? next.slice(next.length - limit) : next;
}

export function formatDecision(decision: TradeOffDecision): string {
  const state = decision.stateSnapshot;
  const lines = [
    `Decision ${decision.id}`,
    `State: sleep ${state.sleepHours.toFixed(1)}h, energy ${state.energyLevel}/10, stress ${state.stressLevel}, ${state.timeAvailableHours.toFixed(1)}h available`,
    `Constraints: ${decision.constraintsActive.length > 0 ? decision.constraintsActive.join(", ") : "none"}`,
    "Priorities:",
  ];

  for (const category of rankCategories(decision.priorities)) {
    lines.push(`  ${category}: ${decision.priorities[category].toFixed(2)}`);
  }

  lines.push("Decisions:");
  for (const d of decision.decisions) {
    const adjusted = d.adjustedTask
      ? ` -> ${d.adjustedTask.name} (${d.adjustedTask.durationMinutes} min)`
      : "";
    lines.push(`  [${d.action}] ${d.originalTask.name}${adjusted}: ${d.reasoning}`);
  }

  if (decision.futureImpacts.length > 0) {
    lines.push("Future impacts:");
    for (const impact of decision.futureImpacts) {
      lines.push(`  ${impact.adjustmentType} (${impact.daysAffected}d): ${impact.description}`);
    }
  }

  lines.push(`Confidence: ${(decision.confidenceScore * 100).toFixed(0)}%`);
  lines.push(`Summary: ${decision.reasoningSummary}`);
  return lines.join("\n");
}
