import type { StateSnapshot, StateSnapshotInput } from "./types.js";
import { clamp } from "./math.js";

function nonNegative(value: number | undefined): number {
  if (value === undefined || !Number.isFinite(value)) return 0;
  return Math.max(0, value);
}

/**
 * Build an immutable snapshot from collaborator input. Out-of-range values
 * are clamped; missing history fields default to zero.
 */
export function normalizeSnapshot(input: StateSnapshotInput): StateSnapshot {
  return Object.freeze({
    sleepHours: nonNegative(input.sleepHours),
    energyLevel: Math.round(clamp(input.energyLevel, 1, 10)),
    stressLevel: input.stressLevel,
    timeAvailableHours: nonNegative(input.timeAvailableHours),
    sleepDebtHours: nonNegative(input.sleepDebtHours),
    consecutiveHighEffortDays: Math.floor(nonNegative(input.consecutiveHighEffortDays)),
  });
}
