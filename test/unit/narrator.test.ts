import { describe, it, expect } from "vitest";
import { TemplateNarrator, explainWithTemplate, weeklyInsightWithTemplate } from "../../src/strategy/narrator.js";
import { TradeOffEngine } from "../../src/engine/tradeoff/engine.js";
import { evaluateConstraints } from "../../src/engine/constraints/evaluator.js";
import { buildWeeklyReport } from "../../src/engine/patterns/report.js";
import type { StateSnapshotInput } from "../../src/engine/types.js";
import { MONDAY_NOON, makeHistory, makeState, sampleTasks } from "../helpers/fixtures.js";

function decisionFor(overrides: Partial<StateSnapshotInput>) {
  const state = makeState(overrides);
  return new TradeOffEngine({ idFactory: () => "n-1", now: () => 0 }).decide(
    state,
    evaluateConstraints(state),
    sampleTasks(),
  );
}

describe("explainWithTemplate", () => {
  it("acknowledges low reserves and urgent burnout risk", () => {
    const result = explainWithTemplate(
      decisionFor({
        sleepHours: 4,
        energyLevel: 2,
        stressLevel: "HIGH",
        timeAvailableHours: 1,
        consecutiveHighEffortDays: 4,
      }),
    );
    expect(result).toEqual({
      explanation:
        "I can see you're running on low reserves today. It's okay to skip nutrition, fitness today - rest is productive too. You're making a smart choice by listening to your body!",
      temporalAnalysis: "Urgency: High. Recommendation: Schedule recovery before adding load.",
      contextAssessment: "Risk Level: Moderate. Adjusted plan keeps load manageable.",
    });
  });

  it("names prioritized and skipped categories under stress", () => {
    const result = explainWithTemplate(decisionFor({ stressLevel: "HIGH" }));
    expect(result.explanation).toBe(
      "It looks like stress is weighing on you today. I've prioritized mindfulness to give you the biggest benefit. It's okay to skip fitness today - rest is productive too. You're making a smart choice by listening to your body!",
    );
    expect(result.temporalAnalysis).toBe("Urgency: Moderate. Recommendation: Follow the adjusted plan today.");
  });

  it("stays brief on an unconstrained day", () => {
    const result = explainWithTemplate(decisionFor({ sleepHours: 8, energyLevel: 9, timeAvailableHours: 4 }));
    expect(result).toEqual({
      explanation: "Based on your current state, You're making a smart choice by listening to your body!",
      temporalAnalysis: "Urgency: Low. Recommendation: Consistent routine detected.",
      contextAssessment: "Risk Level: Low. Conditions favorable for planned activities.",
    });
  });
});

describe("weeklyInsightWithTemplate", () => {
  it("asks for more data first", () => {
    expect(weeklyInsightWithTemplate({ status: "insufficient_data" })).toBe(
      "Weekly Insight: Not enough decisions yet. Keep logging your days and patterns will appear.",
    );
  });

  it("praises the steadiest category and flags the most skipped", () => {
    const history = makeHistory(7, (i) => (i < 3 ? { actions: { fitness: "SKIP" } } : {}));
    const report = buildWeeklyReport(history, { now: MONDAY_NOON });
    expect(weeklyInsightWithTemplate(report)).toBe(
      "Weekly Insight: Great job staying consistent with nutrition! Consider adjusting your fitness goals to be more achievable. Consider reducing fitness targets - current plan may be too ambitious. Remember: consistency over perfection!",
    );
  });
});

describe("TemplateNarrator", () => {
  it("resolves to the template output", async () => {
    const decision = decisionFor({});
    await expect(new TemplateNarrator().explain(decision)).resolves.toEqual(explainWithTemplate(decision));
  });
});
