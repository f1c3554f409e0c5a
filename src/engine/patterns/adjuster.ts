import type { AdaptationRecord, Category, PlannedTask, TradeOffDecision } from "../types.js";
import { CATEGORIES } from "../types.js";
import { PatternDetector, type PatternDetectorOptions } from "./detector.js";

export interface PlanAdjustment {
  readonly tasks: PlannedTask[];
  readonly adaptations: AdaptationRecord[];
}

const INTENSITY_FACTORS = {
  intensity_reduction: 0.6,
  deload_week: 0.5,
} as const;

const SKIP_PATTERN_THRESHOLD = 0.5;
const FLEXIBLE_DURATION_FACTOR = 0.7;
const FLEXIBLE_INTENSITY_FACTOR = 0.8;
const CHRONIC_STRESS_DAYS = 4;
const CHRONIC_LOW_SLEEP_DAYS = 5;

/**
 * Rebalance upcoming tasks from today's decision, then from patterns in the
 * stored history. The inputs are never mutated.
 */
export function adjustFuturePlan(
  currentDecision: TradeOffDecision,
  upcomingTasks: readonly PlannedTask[],
  history: readonly TradeOffDecision[],
  options: PatternDetectorOptions = {},
): PlanAdjustment {
  const now = options.now ?? Date.now();

  const immediate = applyImmediateAdjustments(currentDecision, upcomingTasks, now);
  const detector = new PatternDetector(history, { ...options, now });
  if (!detector.hasEnoughHistory) return immediate;

  const patterned = applyPatternAdjustments(detector, immediate.tasks, now);
  return {
    tasks: patterned.tasks,
    adaptations: [...immediate.adaptations, ...patterned.adaptations],
  };
}

function applyImmediateAdjustments(
  decision: TradeOffDecision,
  tasks: readonly PlannedTask[],
  now: number,
): PlanAdjustment {
  let factor = 1;
  for (const impact of decision.futureImpacts) {
    if (impact.adjustmentType === "intensity_reduction" || impact.adjustmentType === "deload_week") {
      factor = INTENSITY_FACTORS[impact.adjustmentType];
      break;
    }
  }

  const fitnessSkipped = decision.decisions.some((d) => d.category === "fitness" && d.action === "SKIP");

  const adjusted = tasks.map((task): PlannedTask => {
    if (task.category !== "fitness") return { ...task };
    if (fitnessSkipped) {
      return {
        category: "fitness",
        name: "Recovery workout",
        durationMinutes: Math.min(30, task.durationMinutes),
        intensity: 0.4,
        description: "Lighter workout following rest day",
      };
    }
    return { ...task, intensity: task.intensity * factor };
  });

  const adaptations: AdaptationRecord[] = [];
  if (factor < 1) {
    adaptations.push({
      timestamp: now,
      pattern: "high_fatigue_signals",
      adaptation: `Reduced all workout intensities to ${Math.round(factor * 100)}%`,
      categories: ["fitness"],
      reasoning: "Based on current fatigue indicators, reducing intensity to support recovery",
    });
  }

  return { tasks: adjusted, adaptations };
}

function applyPatternAdjustments(
  detector: PatternDetector,
  tasks: readonly PlannedTask[],
  now: number,
): PlanAdjustment {
  const adjusted = [...tasks];
  const adaptations: AdaptationRecord[] = [];

  for (const category of CATEGORIES) {
    const skipRate = detector.skipFrequency(category);
    if (skipRate <= SKIP_PATTERN_THRESHOLD) continue;

    const index = adjusted.findIndex((t) => t.category === category);
    const next = adjusted[index];
    if (next) adjusted[index] = flexibleVersion(next);

    adaptations.push({
      timestamp: now,
      pattern: `consistent_skip_${category}`,
      adaptation: `Reduced ${category} expectations by 30%`,
      categories: [category],
      reasoning: `${category} is skipped ${Math.round(skipRate * 100)}% of the time - adjusting to more realistic targets`,
    });
  }

  const counts = detector.constraintCounts();

  if ((counts.high_stress ?? 0) >= CHRONIC_STRESS_DAYS) {
    adaptations.push(
      chronicRecord(now, "chronic_high_stress", ["mindfulness", "fitness"], {
        adaptation: "Increased mindfulness allocation, reduced fitness intensity",
        reasoning: "Persistent high stress pattern - rebalancing priorities for stress management",
      }),
    );
  }

  if ((counts.low_sleep ?? 0) >= CHRONIC_LOW_SLEEP_DAYS) {
    adaptations.push(
      chronicRecord(now, "chronic_sleep_deficit", ["recovery"], {
        adaptation: "Recommend sleep hygiene review and reduced evening activities",
        reasoning: "Consistent sleep issues detected - systemic adjustment recommended",
      }),
    );
  }

  return { tasks: adjusted, adaptations };
}

export function flexibleVersion(task: PlannedTask): PlannedTask {
  return {
    category: task.category,
    name: `Flexible ${task.name}`,
    durationMinutes: Math.max(1, Math.floor(task.durationMinutes * FLEXIBLE_DURATION_FACTOR)),
    intensity: task.intensity * FLEXIBLE_INTENSITY_FACTOR,
    description: `Adjusted based on adherence patterns: ${task.description}`,
  };
}

function chronicRecord(
  timestamp: number,
  pattern: string,
  categories: Category[],
  text: { adaptation: string; reasoning: string },
): AdaptationRecord {
  return { timestamp, pattern, categories, ...text };
}
