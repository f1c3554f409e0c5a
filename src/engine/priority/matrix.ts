import type {
  Category,
  CategoryMap,
  CategoryWeights,
  ConstraintName,
  PriorityContribution,
} from "../types.js";
import type { ActiveConstraints } from "../constraints/active.js";

/** Declaration order doubles as the ranking tie-break. */
export const BASE_PRIORITIES: CategoryMap<number> = {
  recovery: 0.3,
  nutrition: 0.25,
  fitness: 0.25,
  mindfulness: 0.2,
};

export const PRIORITY_ORDER: readonly Category[] = ["recovery", "nutrition", "fitness", "mindfulness"];

export const PRIORITY_FLOOR = 0.05;
export const PREFERENCE_WEIGHT = 0.3;

export const CONSTRAINT_MODIFIERS: Record<ConstraintName, Partial<CategoryMap<number>>> = {
  critical_sleep: { recovery: 0.25, fitness: -0.2, mindfulness: 0.05 },
  low_sleep: { recovery: 0.15, fitness: -0.1 },
  high_stress: { mindfulness: 0.2, fitness: -0.1, recovery: 0.1 },
  low_energy: { recovery: 0.1, fitness: -0.15 },
  critical_energy: { recovery: 0.2, fitness: -0.25, mindfulness: 0.1 },
  overtraining_risk: { recovery: 0.2, fitness: -0.2 },
  burnout_warning: { recovery: 0.25, fitness: -0.25, mindfulness: 0.15, nutrition: -0.1 },
  time_limited: { fitness: 0.05 },
  time_critical: { nutrition: 0.1, fitness: -0.15 },
  sleep_debt_accumulated: {},
};

export interface PriorityResult {
  readonly priorities: CategoryMap<number>;
  readonly trace: PriorityContribution[];
}

/**
 * Dynamic priority matrix: base weights shifted by severity-scaled constraint
 * modifiers, optionally blended with user preference, then floored and
 * renormalized.
 */
export function computePriorities(
  constraints: ActiveConstraints,
  preferences?: CategoryWeights,
): PriorityResult {
  const raw: CategoryMap<number> = { ...BASE_PRIORITIES };
  const trace: PriorityContribution[] = [];

  for (const constraint of constraints.list()) {
    const modifiers = CONSTRAINT_MODIFIERS[constraint.name];
    for (const category of PRIORITY_ORDER) {
      const modifier = modifiers[category];
      if (modifier === undefined) continue;
      const delta = modifier * constraint.severity;
      raw[category] += delta;
      trace.push({ category, constraint: constraint.name, delta });
    }
  }

  if (preferences) {
    for (const category of PRIORITY_ORDER) {
      const preference = preferences[category];
      if (preference === undefined) continue;
      raw[category] = raw[category] * (1 - PREFERENCE_WEIGHT) + preference * PREFERENCE_WEIGHT;
    }
  }

  return { priorities: normalizeWithFloor(raw, PRIORITY_FLOOR), trace };
}

/**
 * Normalize to a sum of 1.0 while keeping every value at or above `floor`.
 * Categories that fall under the floor are pinned to it and the remaining
 * mass is redistributed proportionally among the rest.
 */
export function normalizeWithFloor(raw: CategoryMap<number>, floor: number): CategoryMap<number> {
  const values: CategoryMap<number> = { ...raw };
  for (const category of PRIORITY_ORDER) {
    values[category] = Math.max(floor, values[category]);
  }

  const pinned = new Set<Category>();
  for (;;) {
    const free = PRIORITY_ORDER.filter((c) => !pinned.has(c));
    const budget = 1 - floor * pinned.size;
    const freeTotal = free.reduce((sum, c) => sum + values[c], 0);

    let changed = false;
    for (const category of free) {
      values[category] = (values[category] / freeTotal) * budget;
    }
    for (const category of free) {
      if (values[category] < floor) {
        values[category] = floor;
        pinned.add(category);
        changed = true;
      }
    }
    if (!changed) break;
  }

  return values;
}

export function formatTrace(trace: readonly PriorityContribution[]): string[] {
  return trace.map((entry) => {
    const sign = entry.delta > 0 ? "+" : "";
    return `${entry.category}_${entry.constraint}: ${sign}${entry.delta.toFixed(2)} (${entry.constraint})`;
  });
}

/** Categories by descending priority; ties keep base declaration order. */
export function rankCategories(priorities: CategoryMap<number>): Category[] {
  return [...PRIORITY_ORDER].sort((a, b) => priorities[b] - priorities[a]);
}
