import { describe, it, expect } from "vitest";
import { PatternDetector, mondayIndex } from "../../src/engine/patterns/detector.js";
import { adjustFuturePlan, flexibleVersion } from "../../src/engine/patterns/adjuster.js";
import { buildWeeklyReport } from "../../src/engine/patterns/report.js";
import { DAY, MONDAY_NOON, makeHistory, makeHistoryEntry, sampleTasks, taskFor } from "../helpers/fixtures.js";

const now = MONDAY_NOON;

describe("PatternDetector", () => {
  it("reports insufficient data below the minimum history", () => {
    expect(new PatternDetector(makeHistory(2), { now }).analyze()).toEqual({ status: "insufficient_data" });
  });

  it("computes frequencies over the trailing window", () => {
    const history = makeHistory(10, (i) => (i < 3 ? { actions: { fitness: "SKIP" } } : {}));
    const detector = new PatternDetector(history, { now });
    expect(detector.recent()).toHaveLength(8);
    expect(detector.skipFrequency("fitness")).toBe(1 / 8);
    expect(detector.downgradeFrequency("fitness")).toBe(0);
  });

  it("counts constraints in the window", () => {
    const history = makeHistory(4, (i) => ({
      constraints: i % 2 === 0 ? ["high_stress", "low_sleep"] : ["high_stress"],
    }));
    expect(new PatternDetector(history, { now }).constraintCounts()).toEqual({ high_stress: 4, low_sleep: 2 });
  });

  it("buckets decisions by UTC weekday starting Monday", () => {
    const history = makeHistory(7, (i) =>
      i === 6 ? { actions: { fitness: "SKIP" }, constraints: ["high_stress"] } : {},
    );
    const days = new PatternDetector(history, { now }).dayOfWeekBreakdown();
    expect(days).toHaveLength(7);
    expect(days[0]).toEqual({ decisions: 1, constraints: 1, skips: 1, avgConstraints: 1, skipRate: 1 });
    expect(days[1]).toEqual({ decisions: 1, constraints: 0, skips: 0, avgConstraints: 0, skipRate: 0 });
  });

  it("maps timestamps to a Monday-based index", () => {
    expect(mondayIndex(MONDAY_NOON)).toBe(0);
    expect(mondayIndex(MONDAY_NOON - DAY)).toBe(6);
    expect(mondayIndex(MONDAY_NOON + 4 * DAY)).toBe(4);
  });

  it("analyzes a healthy history", () => {
    const analysis = new PatternDetector(makeHistory(3), { now }).analyze();
    expect(analysis.status).toBe("ok");
    if (analysis.status !== "ok") return;
    expect(analysis.decisionsInWindow).toBe(3);
    expect(analysis.categories.recovery).toEqual({ skipFrequency: 0, downgradeFrequency: 0 });
  });
});

describe("adjustFuturePlan", () => {
  it("softens a consistently skipped category", () => {
    const history = makeHistory(7, (i) => (i < 5 ? { actions: { mindfulness: "SKIP" } } : {}));
    const result = adjustFuturePlan(makeHistoryEntry(), sampleTasks(), history, { now });

    expect(result.adaptations).toEqual([
      {
        timestamp: now,
        pattern: "consistent_skip_mindfulness",
        adaptation: "Reduced mindfulness expectations by 30%",
        categories: ["mindfulness"],
        reasoning: "mindfulness is skipped 71% of the time - adjusting to more realistic targets",
      },
    ]);
    const meditation = result.tasks.find((t) => t.category === "mindfulness");
    expect(meditation?.name).toBe("Flexible Meditation Session");
    expect(meditation?.durationMinutes).toBe(14);
    expect(meditation?.intensity).toBeCloseTo(0.16, 10);
    expect(result.tasks.find((t) => t.category === "fitness")).toEqual(taskFor("fitness"));
  });

  it("reduces workout intensity after a fatigue impact", () => {
    const decision = makeHistoryEntry({
      actions: { fitness: "DOWNGRADE" },
      futureImpacts: [
        { daysAffected: 3, adjustmentType: "intensity_reduction", description: "reduce" },
        { daysAffected: 7, adjustmentType: "deload_week", description: "deload" },
      ],
    });
    const upcoming = sampleTasks();
    const result = adjustFuturePlan(decision, upcoming, [], { now });

    expect(result.tasks.find((t) => t.category === "fitness")?.intensity).toBeCloseTo(0.48, 10);
    expect(result.adaptations).toEqual([
      {
        timestamp: now,
        pattern: "high_fatigue_signals",
        adaptation: "Reduced all workout intensities to 60%",
        categories: ["fitness"],
        reasoning: "Based on current fatigue indicators, reducing intensity to support recovery",
      },
    ]);
    expect(upcoming).toEqual(sampleTasks());
  });

  it("uses the deload factor when it is the only intensity impact", () => {
    const decision = makeHistoryEntry({
      futureImpacts: [{ daysAffected: 7, adjustmentType: "deload_week", description: "deload" }],
    });
    const result = adjustFuturePlan(decision, sampleTasks(), [], { now });
    expect(result.tasks.find((t) => t.category === "fitness")?.intensity).toBeCloseTo(0.4, 10);
    expect(result.adaptations[0]?.adaptation).toBe("Reduced all workout intensities to 50%");
  });

  it("replaces upcoming workouts after a skipped one", () => {
    const decision = makeHistoryEntry({ actions: { fitness: "SKIP" } });
    const upcoming = [taskFor("fitness"), { ...taskFor("fitness"), durationMinutes: 20 }];
    const result = adjustFuturePlan(decision, upcoming, [], { now });

    expect(result.tasks).toEqual([
      {
        category: "fitness",
        name: "Recovery workout",
        durationMinutes: 30,
        intensity: 0.4,
        description: "Lighter workout following rest day",
      },
      {
        category: "fitness",
        name: "Recovery workout",
        durationMinutes: 20,
        intensity: 0.4,
        description: "Lighter workout following rest day",
      },
    ]);
    expect(result.adaptations).toEqual([]);
  });

  it("records chronic stress and sleep patterns", () => {
    const history = makeHistory(5, () => ({ constraints: ["high_stress", "low_sleep"] }));
    const result = adjustFuturePlan(makeHistoryEntry(), sampleTasks(), history, { now });
    expect(result.adaptations.map((a) => a.pattern)).toEqual(["chronic_high_stress", "chronic_sleep_deficit"]);
    expect(result.adaptations[0]?.categories).toEqual(["mindfulness", "fitness"]);
    expect(result.tasks).toEqual(sampleTasks());
  });

  it("skips pattern adjustments on a short history", () => {
    const history = makeHistory(2, () => ({ actions: { mindfulness: "SKIP" } }));
    const result = adjustFuturePlan(makeHistoryEntry(), sampleTasks(), history, { now });
    expect(result.adaptations).toEqual([]);
  });
});

describe("flexibleVersion", () => {
  it("never drops below one minute", () => {
    expect(flexibleVersion({ ...taskFor("mindfulness"), durationMinutes: 1 }).durationMinutes).toBe(1);
  });
});

describe("buildWeeklyReport", () => {
  it("needs a minimum history", () => {
    expect(buildWeeklyReport(makeHistory(2), { now })).toEqual({ status: "insufficient_data" });
  });

  it("summarizes rates and recommends changes", () => {
    const history = makeHistory(7, (i) => ({
      actions: { ...(i < 3 ? { fitness: "SKIP" as const } : {}), ...(i < 5 ? { nutrition: "DOWNGRADE" as const } : {}) },
      constraints: i < 4 ? ["high_stress"] : [],
    }));
    const report = buildWeeklyReport(history, { now, adaptationsMade: 2 });

    expect(report.status).toBe("ok");
    if (report.status !== "ok") return;
    expect(report.periodDays).toBe(7);
    expect(report.totalDecisions).toBe(7);
    expect(report.adaptationsMade).toBe(2);
    expect(report.categories.fitness).toEqual({ skipRate: 42.9, downgradeRate: 0 });
    expect(report.categories.nutrition).toEqual({ skipRate: 0, downgradeRate: 71.4 });
    expect(report.constraintFrequency).toEqual({ high_stress: 4 });
    expect(report.recommendations).toEqual([
      "Consider reducing fitness targets - current plan may be too ambitious",
      "nutrition frequently downgraded - consider adjusting default intensity",
      "High stress is frequent - consider adding more recovery buffers",
    ]);
  });
});
