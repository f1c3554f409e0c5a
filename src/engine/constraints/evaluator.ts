import type { ConstraintName, ConstraintThresholds, StateSnapshot } from "../types.js";
import { ActiveConstraints } from "./active.js";

export const DEFAULT_THRESHOLDS: ConstraintThresholds = {
  minSleepHours: 6.0,
  criticalSleepHours: 5.0,
  lowEnergyThreshold: 4,
  criticalEnergyThreshold: 2,
  minTimeHours: 0.5,
  limitedTimeHours: 1.5,
  maxConsecutiveHighEffort: 3,
  sleepDebtWarningHours: 3.0,
  sleepDebtCriticalHours: 6.0,
};

export const CONSTRAINT_DESCRIPTIONS: Record<ConstraintName, string> = {
  low_sleep: "Sleep below minimum threshold - recovery impaired",
  critical_sleep: "Severely sleep deprived - high priority for rest",
  low_energy: "Energy levels depleted - reduced capacity for effort",
  critical_energy: "Energy critically low - only essential activities",
  high_stress: "Elevated stress - cognitive load impaired",
  time_limited: "Limited time available - must prioritize",
  time_critical: "Minimal time available - only most critical tasks",
  overtraining_risk: "Too many consecutive high-effort days",
  sleep_debt_accumulated: "Accumulated sleep debt needs addressing",
  burnout_warning: "Multiple risk factors indicate burnout risk",
};

/** Groups counted toward the compound burnout warning. */
const BURNOUT_FACTOR_GROUPS: readonly (readonly ConstraintName[])[] = [
  ["low_sleep", "critical_sleep"],
  ["low_energy", "critical_energy"],
  ["high_stress"],
  ["overtraining_risk"],
];

export const BURNOUT_FACTOR_THRESHOLD = 3;

/**
 * Map a state snapshot to the set of constraints limiting full adherence.
 * Pure and deterministic; the compound burnout warning is derived last.
 */
export function evaluateConstraints(
  state: StateSnapshot,
  thresholds: ConstraintThresholds = DEFAULT_THRESHOLDS,
): ActiveConstraints {
  const constraints = new ActiveConstraints();

  evaluateSleep(state, thresholds, constraints);
  evaluateEnergy(state, thresholds, constraints);
  evaluateStress(state, constraints);
  evaluateTime(state, thresholds, constraints);
  evaluateEffort(state, thresholds, constraints);
  evaluateCompound(constraints);

  return constraints;
}

function evaluateSleep(state: StateSnapshot, t: ConstraintThresholds, out: ActiveConstraints): void {
  if (state.sleepHours < t.criticalSleepHours) {
    out.add("critical_sleep", 0.9, CONSTRAINT_DESCRIPTIONS.critical_sleep, "wearable");
  } else if (state.sleepHours < t.minSleepHours) {
    const severity = 1 - state.sleepHours / t.minSleepHours;
    out.add("low_sleep", Math.min(0.7, severity), CONSTRAINT_DESCRIPTIONS.low_sleep, "wearable");
  }

  const debt = state.sleepDebtHours;
  if (debt >= t.sleepDebtCriticalHours) {
    out.add("sleep_debt_accumulated", 0.8, `Accumulated sleep debt of ${debt.toFixed(1)} hours`, "derived");
  } else if (debt >= t.sleepDebtWarningHours) {
    out.add("sleep_debt_accumulated", 0.5, `Building sleep debt of ${debt.toFixed(1)} hours`, "derived");
  }
}

function evaluateEnergy(state: StateSnapshot, t: ConstraintThresholds, out: ActiveConstraints): void {
  if (state.energyLevel <= t.criticalEnergyThreshold) {
    out.add("critical_energy", 0.9, CONSTRAINT_DESCRIPTIONS.critical_energy, "derived");
  } else if (state.energyLevel <= t.lowEnergyThreshold) {
    const severity = 1 - state.energyLevel / (t.lowEnergyThreshold + 2);
    out.add("low_energy", Math.min(0.7, severity), CONSTRAINT_DESCRIPTIONS.low_energy, "derived");
  }
}

function evaluateStress(state: StateSnapshot, out: ActiveConstraints): void {
  if (state.stressLevel === "HIGH") {
    out.add("high_stress", 0.7, CONSTRAINT_DESCRIPTIONS.high_stress, "wearable");
  }
}

function evaluateTime(state: StateSnapshot, t: ConstraintThresholds, out: ActiveConstraints): void {
  if (state.timeAvailableHours < t.minTimeHours) {
    out.add("time_critical", 0.9, CONSTRAINT_DESCRIPTIONS.time_critical, "user_input");
  } else if (state.timeAvailableHours < t.limitedTimeHours) {
    const severity = 1 - state.timeAvailableHours / t.limitedTimeHours;
    out.add("time_limited", Math.min(0.7, severity), CONSTRAINT_DESCRIPTIONS.time_limited, "user_input");
  }
}

function evaluateEffort(state: StateSnapshot, t: ConstraintThresholds, out: ActiveConstraints): void {
  if (state.consecutiveHighEffortDays >= t.maxConsecutiveHighEffort) {
    out.add(
      "overtraining_risk",
      0.6,
      `${state.consecutiveHighEffortDays} consecutive high-effort days`,
      "derived",
    );
  }
}

function evaluateCompound(out: ActiveConstraints): void {
  const riskFactors = countBurnoutFactors(out);
  if (riskFactors >= BURNOUT_FACTOR_THRESHOLD) {
    out.add("burnout_warning", 0.85, CONSTRAINT_DESCRIPTIONS.burnout_warning, "derived");
  }
}

export function countBurnoutFactors(constraints: ActiveConstraints): number {
  return BURNOUT_FACTOR_GROUPS.filter((group) => constraints.hasAny(group)).length;
}

export function summarizeConstraints(constraints: ActiveConstraints): string {
  if (constraints.size === 0) {
    return "No active constraints - full adherence possible";
  }

  const lines = ["Active Constraints:"];
  const sorted = [...constraints.list()].sort((a, b) => b.severity - a.severity);
  for (const c of sorted) {
    const label = c.severity >= 0.8 ? "CRITICAL" : c.severity >= 0.6 ? "HIGH" : "MODERATE";
    lines.push(`  [${label}] ${c.name}: ${c.description}`);
  }
  return lines.join("\n");
}
