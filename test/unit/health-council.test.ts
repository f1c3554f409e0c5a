import { describe, it, expect } from "vitest";
import { classifyActivity } from "../../src/engine/council/activity.js";
import { HealthCouncil, deliberate, deliberateAsync } from "../../src/engine/council/council.js";
import { recentSkipRate } from "../../src/engine/council/agents/index.js";
import type { AgentRecommendation } from "../../src/engine/types.js";
import { makeHistory, makeState, taskFor } from "../helpers/fixtures.js";

function vote(role: AgentRecommendation["role"], action: AgentRecommendation["action"], confidence: number) {
  return { role, action, confidence, reasoning: `${role} says ${action}`, weightHints: {} };
}

describe("classifyActivity", () => {
  it("reads free text", () => {
    expect(classifyActivity("HIIT workout")).toEqual({
      name: "HIIT workout",
      highIntensity: true,
      physical: true,
      cognitive: false,
    });
    expect(classifyActivity("Deadline work")).toMatchObject({ physical: false, cognitive: true });
    expect(classifyActivity("Yoga")).toMatchObject({ highIntensity: false, physical: false, cognitive: false });
  });

  it("uses category and intensity for planned tasks", () => {
    expect(classifyActivity(taskFor("fitness"))).toMatchObject({ highIntensity: true, physical: true });
    expect(classifyActivity(taskFor("recovery"))).toMatchObject({ highIntensity: false, physical: false });
  });
});

describe("HealthCouncil", () => {
  it("leans to MODIFY when sleep-deprived before a HIIT session", () => {
    const state = makeState({ sleepHours: 5, energyLevel: 3, stressLevel: "HIGH" });
    const result = deliberate(state, "HIIT workout", "general_fitness", []);

    expect(result.votes.map((v) => [v.role, v.action, v.confidence])).toEqual([
      ["sleep", "SKIP", 0.95],
      ["performance", "MODIFY", 0.7],
      ["wellness", "MODIFY", 0.8],
      ["future", "PROCEED", 0.8],
    ]);
    expect(result.finalAction).toBe("MODIFY");
    expect(result.consensusLevel).toBeCloseTo(1.5 / 3.25, 10);
    expect(result.reasoningSummary.split("\n")[0]).toBe("Council Decision (46% consensus): MODIFY");
    expect(result.dissentingOpinions).toEqual([
      "sleep: Sleep debt detected (5.0h). High-intensity exercise increases cortisol and impairs recovery.",
      "future: Good consistency (0% skip rate). Your future self will thank you.",
    ]);
  });

  it("reaches full agreement on a rested day", () => {
    const state = makeState({ sleepHours: 8, energyLevel: 8, stressLevel: "LOW" });
    const result = deliberate(state, "Morning run", "marathon", []);

    expect(result.finalAction).toBe("PROCEED");
    expect(result.consensusLevel).toBe(1);
    expect(result.dissentingOpinions).toEqual([]);
    expect(result.reasoningSummary).toContain(
      "• performance: High energy (8/10). Optimal window for high-value activities aligned with goal: marathon",
    );
  });

  it("lets the wellness guardian dissent on cognitive load under stress", () => {
    const state = makeState({ energyLevel: 5, stressLevel: "HIGH" });
    const result = deliberate(state, "Finish project report", "promotion", []);

    expect(result.finalAction).toBe("PROCEED");
    expect(result.consensusLevel).toBeCloseTo(2.2 / 3.05, 10);
    expect(result.dissentingOpinions).toEqual([
      "wellness: High stress detected. Additional cognitive load risks burnout. Recommend stress-reduction activities.",
    ]);
  });

  it("modifies non-cognitive activities under high stress", () => {
    const state = makeState({ stressLevel: "HIGH" });
    const wellness = deliberate(state, "Yoga", "calm", []).votes.find((v) => v.role === "wellness");
    expect(wellness?.action).toBe("MODIFY");
    expect(wellness?.confidence).toBe(0.8);
  });

  it("pushes for consistency after frequent skips", () => {
    const history = makeHistory(7, (i) => (i < 4 ? { actions: { fitness: "SKIP" } } : {}));
    const result = deliberate(makeState(), "Yoga", "calm", history);
    const future = result.votes.find((v) => v.role === "future");
    expect(future?.action).toBe("PROCEED");
    expect(future?.reasoning).toBe(
      "Skip rate is 57% this week. Skipping again risks habit collapse. Your future self needs consistency.",
    );
  });

  it("suggests a lighter version at a moderate skip rate", () => {
    const history = makeHistory(7, (i) => (i < 3 ? { actions: { mindfulness: "SKIP" } } : {}));
    const future = deliberate(makeState(), "Yoga", "calm", history).votes.find((v) => v.role === "future");
    expect(future?.action).toBe("MODIFY");
    expect(future?.reasoning).toBe("Skip rate is 43%. Consider a lighter version to maintain habit momentum.");
  });

  it("gives the same result asynchronously", async () => {
    const state = makeState({ sleepHours: 6.5, stressLevel: "MEDIUM" });
    const sync = deliberate(state, "Gym session", "strength", []);
    const concurrent = await deliberateAsync(state, "Gym session", "strength", []);
    expect(concurrent).toEqual(sync);
  });

  it("accepts a custom agent set", async () => {
    const council = new HealthCouncil([
      { role: "wellness", recommend: () => vote("wellness", "SKIP", 0.6) },
    ]);
    const result = await council.deliberate({ state: makeState(), activity: "Yoga", goal: "calm", history: [] });
    expect(result.finalAction).toBe("SKIP");
    expect(result.consensusLevel).toBe(1);
  });
});

describe("recentSkipRate", () => {
  it("is zero for an empty history", () => {
    expect(recentSkipRate([])).toBe(0);
  });

  it("looks only at the last seven entries", () => {
    const history = makeHistory(10, (i) => (i < 3 ? { actions: { fitness: "SKIP" } } : {}));
    expect(recentSkipRate(history)).toBe(0);
  });
});
