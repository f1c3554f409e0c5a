import type { Category, CategoryMap, ConstraintName, DecisionAction, TradeOffDecision } from "../types.js";
import { mapCategories } from "../types.js";
import { DAY_MS } from "../math.js";

export interface DayOfWeekStats {
  readonly decisions: number;
  readonly constraints: number;
  readonly skips: number;
  readonly avgConstraints: number;
  readonly skipRate: number;
}

export interface CategoryFrequencies {
  readonly skipFrequency: number;
  readonly downgradeFrequency: number;
}

export type PatternAnalysis =
  | { readonly status: "insufficient_data" }
  | {
      readonly status: "ok";
      readonly decisionsInWindow: number;
      readonly categories: CategoryMap<CategoryFrequencies>;
      readonly constraintCounts: Partial<Record<ConstraintName, number>>;
      readonly dayOfWeek: DayOfWeekStats[];
    };

export interface PatternDetectorOptions {
  readonly windowDays?: number;
  readonly minHistory?: number;
  readonly now?: number;
}

export const DEFAULT_WINDOW_DAYS = 7;
export const DEFAULT_MIN_HISTORY = 3;

/** Rolling statistics over a decision log. Read-only over the supplied history. */
export class PatternDetector {
  readonly windowDays: number;
  readonly minHistory: number;
  private readonly now: number;

  constructor(
    private readonly history: readonly TradeOffDecision[],
    options: PatternDetectorOptions = {},
  ) {
    this.windowDays = options.windowDays ?? DEFAULT_WINDOW_DAYS;
    this.minHistory = options.minHistory ?? DEFAULT_MIN_HISTORY;
    this.now = options.now ?? Date.now();
  }

  get hasEnoughHistory(): boolean {
    return this.history.length >= this.minHistory;
  }

  recent(): TradeOffDecision[] {
    const cutoff = this.now - this.windowDays * DAY_MS;
    return this.history.filter((d) => d.timestamp >= cutoff);
  }

  skipFrequency(category: Category): number {
    return this.actionFrequency(category, "SKIP");
  }

  downgradeFrequency(category: Category): number {
    return this.actionFrequency(category, "DOWNGRADE");
  }

  constraintCounts(): Partial<Record<ConstraintName, number>> {
    const counts: Partial<Record<ConstraintName, number>> = {};
    for (const decision of this.recent()) {
      for (const name of decision.constraintsActive) {
        counts[name] = (counts[name] ?? 0) + 1;
      }
    }
    return counts;
  }

  /** Index 0 is Monday, computed in UTC. */
  dayOfWeekBreakdown(): DayOfWeekStats[] {
    const buckets = Array.from({ length: 7 }, () => ({ decisions: 0, constraints: 0, skips: 0 }));

    for (const decision of this.history) {
      const bucket = buckets[mondayIndex(decision.timestamp)];
      if (!bucket) continue;
      bucket.decisions++;
      bucket.constraints += decision.constraintsActive.length;
      bucket.skips += decision.decisions.filter((d) => d.action === "SKIP").length;
    }

    return buckets.map((b) => ({
      ...b,
      avgConstraints: b.decisions > 0 ? b.constraints / b.decisions : 0,
      skipRate: b.decisions > 0 ? b.skips / b.decisions : 0,
    }));
  }

  analyze(): PatternAnalysis {
    if (!this.hasEnoughHistory) return { status: "insufficient_data" };

    const categories = mapCategories((category) => ({
      skipFrequency: this.skipFrequency(category),
      downgradeFrequency: this.downgradeFrequency(category),
    }));

    return {
      status: "ok",
      decisionsInWindow: this.recent().length,
      categories,
      constraintCounts: this.constraintCounts(),
      dayOfWeek: this.dayOfWeekBreakdown(),
    };
  }

  private actionFrequency(category: Category, action: DecisionAction): number {
    const recent = this.recent();
    if (recent.length === 0) return 0;

    let matches = 0;
    for (const decision of recent) {
      for (const d of decision.decisions) {
        if (d.category === category && d.action === action) matches++;
      }
    }
    return matches / recent.length;
  }
}

export function mondayIndex(timestamp: number): number {
  return (new Date(timestamp).getUTCDay() + 6) % 7;
}
