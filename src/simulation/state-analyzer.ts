import type { StateSnapshot, StressLevel } from "../engine/types.js";
import { normalizeSnapshot } from "../engine/state.js";
import { clamp } from "../engine/math.js";
import { sleepQualityScore, type WearableReading } from "./wearable.js";

export function deriveStressLevel(hrvMs: number, restingHeartRate: number, sleepHours: number): StressLevel {
  let score = 0;

  if (hrvMs < 30) score += 2;
  else if (hrvMs < 40) score += 1;

  if (restingHeartRate > 75) score += 2;
  else if (restingHeartRate > 70) score += 1;

  if (sleepHours < 5) score += 2;
  else if (sleepHours < 6) score += 1;

  if (score >= 4) return "HIGH";
  if (score >= 2) return "MEDIUM";
  return "LOW";
}

export function deriveEnergyLevel(sleepHours: number, sleepQuality: number, hrvMs: number): number {
  let energy = (sleepHours / 8) * 5 + (sleepQuality / 100) * 3;

  if (hrvMs > 50) energy += 1.5;
  else if (hrvMs > 40) energy += 1;
  else if (hrvMs < 25) energy -= 1;

  return clamp(Math.round(energy), 1, 10);
}

const DEBT_WINDOW = 7;
const HIGH_EFFORT_STEPS = 10_000;
const HIGH_EFFORT_ACTIVE_MINUTES = 45;

export interface StateOverrides {
  readonly stressLevel?: StressLevel;
  readonly energyLevel?: number;
}

/** Turns a stream of wearable readings into engine snapshots. */
export class StateAnalyzer {
  private readonly readings: WearableReading[] = [];

  constructor(private readonly targetSleepHours = 7.5) {}

  analyze(reading: WearableReading, timeAvailableHours: number, overrides: StateOverrides = {}): StateSnapshot {
    this.readings.push(reading);

    return normalizeSnapshot({
      sleepHours: reading.sleepHours,
      energyLevel:
        overrides.energyLevel ?? deriveEnergyLevel(reading.sleepHours, sleepQualityScore(reading), reading.hrvMs),
      stressLevel:
        overrides.stressLevel ?? deriveStressLevel(reading.hrvMs, reading.restingHeartRate, reading.sleepHours),
      timeAvailableHours,
      sleepDebtHours: this.sleepDebt(),
      consecutiveHighEffortDays: this.consecutiveHighEffortDays(),
    });
  }

  /** Sum of nightly shortfall against the target over the last week of readings. */
  sleepDebt(): number {
    return this.readings
      .slice(-DEBT_WINDOW)
      .reduce((debt, r) => debt + Math.max(0, this.targetSleepHours - r.sleepHours), 0);
  }

  consecutiveHighEffortDays(): number {
    let count = 0;
    for (let i = this.readings.length - 1; i >= 0; i--) {
      const r = this.readings[i];
      if (!r || (r.steps < HIGH_EFFORT_STEPS && r.activeMinutes < HIGH_EFFORT_ACTIVE_MINUTES)) break;
      count++;
    }
    return count;
  }
}
