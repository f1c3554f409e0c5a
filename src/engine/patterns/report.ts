import type { CategoryMap, ConstraintName, TradeOffDecision } from "../types.js";
import { CATEGORIES, mapCategories } from "../types.js";
import { PatternDetector, type DayOfWeekStats, type PatternDetectorOptions } from "./detector.js";

export interface CategoryRates {
  /** Percent, one decimal. */
  readonly skipRate: number;
  readonly downgradeRate: number;
}

export type WeeklyReport =
  | { readonly status: "insufficient_data" }
  | {
      readonly status: "ok";
      readonly periodDays: number;
      readonly totalDecisions: number;
      readonly categories: CategoryMap<CategoryRates>;
      readonly constraintFrequency: Partial<Record<ConstraintName, number>>;
      readonly dayPatterns: DayOfWeekStats[];
      readonly adaptationsMade: number;
      readonly recommendations: string[];
    };

function percentOneDecimal(ratio: number): number {
  return Math.round(ratio * 1000) / 10;
}

export function buildWeeklyReport(
  history: readonly TradeOffDecision[],
  options: PatternDetectorOptions & { adaptationsMade?: number } = {},
): WeeklyReport {
  const detector = new PatternDetector(history, options);
  if (!detector.hasEnoughHistory) return { status: "insufficient_data" };

  const categories = mapCategories((category) => ({
    skipRate: percentOneDecimal(detector.skipFrequency(category)),
    downgradeRate: percentOneDecimal(detector.downgradeFrequency(category)),
  }));
  const constraintFrequency = detector.constraintCounts();

  const recommendations: string[] = [];
  for (const category of CATEGORIES) {
    const rates = categories[category];
    if (rates.skipRate > 40) {
      recommendations.push(`Consider reducing ${category} targets - current plan may be too ambitious`);
    } else if (rates.downgradeRate > 60) {
      recommendations.push(`${category} frequently downgraded - consider adjusting default intensity`);
    }
  }
  if ((constraintFrequency.high_stress ?? 0) >= 4) {
    recommendations.push("High stress is frequent - consider adding more recovery buffers");
  }

  return {
    status: "ok",
    periodDays: detector.windowDays,
    totalDecisions: history.length,
    categories,
    constraintFrequency,
    dayPatterns: detector.dayOfWeekBreakdown(),
    adaptationsMade: options.adaptationsMade ?? 0,
    recommendations,
  };
}
