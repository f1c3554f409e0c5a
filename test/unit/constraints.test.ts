import { describe, it, expect } from "vitest";
import {
  DEFAULT_THRESHOLDS,
  countBurnoutFactors,
  evaluateConstraints,
  summarizeConstraints,
} from "../../src/engine/constraints/evaluator.js";
import { ActiveConstraints } from "../../src/engine/constraints/active.js";
import { normalizeSnapshot } from "../../src/engine/state.js";
import { makeState } from "../helpers/fixtures.js";

describe("evaluateConstraints", () => {
  it("returns no constraints for a rested, unhurried state", () => {
    const constraints = evaluateConstraints(makeState());
    expect(constraints.size).toBe(0);
    expect(summarizeConstraints(constraints)).toBe("No active constraints - full adherence possible");
  });

  it("flags critical sleep below 5 hours", () => {
    const constraints = evaluateConstraints(makeState({ sleepHours: 4.5 }));
    expect(constraints.names()).toEqual(["critical_sleep"]);
    expect(constraints.severity("critical_sleep")).toBe(0.9);
    expect(constraints.get("critical_sleep")?.source).toBe("wearable");
  });

  it("scales low sleep severity by the shortfall", () => {
    const constraints = evaluateConstraints(makeState({ sleepHours: 5 }));
    expect(constraints.names()).toEqual(["low_sleep"]);
    expect(constraints.severity("low_sleep")).toBeCloseTo(1 / 6, 10);
  });

  it("distinguishes critical and low energy", () => {
    expect(evaluateConstraints(makeState({ energyLevel: 2 })).names()).toEqual(["critical_energy"]);

    const low = evaluateConstraints(makeState({ energyLevel: 3 }));
    expect(low.names()).toEqual(["low_energy"]);
    expect(low.severity("low_energy")).toBeCloseTo(0.5, 10);
  });

  it("flags high stress only at HIGH", () => {
    expect(evaluateConstraints(makeState({ stressLevel: "MEDIUM" })).size).toBe(0);
    const high = evaluateConstraints(makeState({ stressLevel: "HIGH" }));
    expect(high.severity("high_stress")).toBe(0.7);
  });

  it("classifies available time", () => {
    expect(evaluateConstraints(makeState({ timeAvailableHours: 0.25 })).severity("time_critical")).toBe(0.9);
    expect(evaluateConstraints(makeState({ timeAvailableHours: 1 })).severity("time_limited")).toBeCloseTo(1 / 3, 10);
    expect(evaluateConstraints(makeState({ timeAvailableHours: 1.5 })).size).toBe(0);
  });

  it("flags overtraining after the consecutive effort limit", () => {
    const constraints = evaluateConstraints(makeState({ consecutiveHighEffortDays: 3 }));
    expect(constraints.get("overtraining_risk")).toEqual({
      name: "overtraining_risk",
      severity: 0.6,
      description: "3 consecutive high-effort days",
      source: "derived",
    });
  });

  it("grades accumulated sleep debt", () => {
    const building = evaluateConstraints(makeState({ sleepDebtHours: 3 }));
    expect(building.get("sleep_debt_accumulated")?.severity).toBe(0.5);
    expect(building.get("sleep_debt_accumulated")?.description).toBe("Building sleep debt of 3.0 hours");

    const heavy = evaluateConstraints(makeState({ sleepDebtHours: 6.5 }));
    expect(heavy.get("sleep_debt_accumulated")?.severity).toBe(0.8);
    expect(heavy.get("sleep_debt_accumulated")?.description).toBe("Accumulated sleep debt of 6.5 hours");
  });

  it("adds burnout_warning when three risk groups are active", () => {
    const constraints = evaluateConstraints(makeState({ sleepHours: 5.5, energyLevel: 4, stressLevel: "HIGH" }));
    expect(constraints.names()).toEqual(["low_sleep", "low_energy", "high_stress", "burnout_warning"]);
    expect(constraints.severity("burnout_warning")).toBe(0.85);
  });

  it("does not warn with two risk groups, and sleep debt is not a group", () => {
    const constraints = evaluateConstraints(
      makeState({ sleepHours: 5.5, stressLevel: "HIGH", sleepDebtHours: 7 }),
    );
    expect(countBurnoutFactors(constraints)).toBe(2);
    expect(constraints.has("burnout_warning")).toBe(false);
  });

  it("has burnout_warning exactly when at least three groups are active", () => {
    const sleeps = [7.5, 5.5, 4];
    const energies = [7, 4, 2];
    const stresses = ["LOW", "HIGH"] as const;
    const efforts = [0, 3];

    for (const sleepHours of sleeps) {
      for (const energyLevel of energies) {
        for (const stressLevel of stresses) {
          for (const consecutiveHighEffortDays of efforts) {
            const c = evaluateConstraints(
              makeState({ sleepHours, energyLevel, stressLevel, consecutiveHighEffortDays }),
            );
            const groups =
              Number(sleepHours < 6) +
              Number(energyLevel <= 4) +
              Number(stressLevel === "HIGH") +
              Number(consecutiveHighEffortDays >= 3);
            expect(c.has("burnout_warning")).toBe(groups >= 3);
          }
        }
      }
    }
  });

  it("honors custom thresholds", () => {
    const constraints = evaluateConstraints(makeState({ sleepHours: 7.5 }), {
      ...DEFAULT_THRESHOLDS,
      minSleepHours: 8,
    });
    expect(constraints.severity("low_sleep")).toBeCloseTo(0.0625, 10);
  });
});

describe("summarizeConstraints", () => {
  it("lists constraints by descending severity with labels", () => {
    const constraints = evaluateConstraints(makeState({ sleepHours: 4.5, stressLevel: "HIGH" }));
    expect(summarizeConstraints(constraints)).toBe(
      [
        "Active Constraints:",
        "  [CRITICAL] critical_sleep: Severely sleep deprived - high priority for rest",
        "  [HIGH] high_stress: Elevated stress - cognitive load impaired",
      ].join("\n"),
    );
  });
});

describe("ActiveConstraints", () => {
  it("clamps severity and keeps the first write", () => {
    const active = new ActiveConstraints();
    active.add("high_stress", 1.5, "first", "user_input");
    active.add("high_stress", 0.2, "second", "user_input");
    expect(active.size).toBe(1);
    expect(active.get("high_stress")).toEqual({
      name: "high_stress",
      severity: 1,
      description: "first",
      source: "user_input",
    });
  });

  it("reports zero mean severity when empty", () => {
    expect(new ActiveConstraints().meanSeverity()).toBe(0);
  });
});

describe("normalizeSnapshot", () => {
  it("clamps energy, rounds it and defaults history fields", () => {
    const state = normalizeSnapshot({
      sleepHours: -1,
      energyLevel: 12.4,
      stressLevel: "LOW",
      timeAvailableHours: 2,
    });
    expect(state).toEqual({
      sleepHours: 0,
      energyLevel: 10,
      stressLevel: "LOW",
      timeAvailableHours: 2,
      sleepDebtHours: 0,
      consecutiveHighEffortDays: 0,
    });
    expect(Object.isFrozen(state)).toBe(true);
  });
});
