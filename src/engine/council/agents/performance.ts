import type { AgentRecommendation } from "../../types.js";
import type { CouncilAgent, CouncilContext } from "./types.js";

export const performanceCoach: CouncilAgent = {
  role: "performance",
  recommend({ state, activity, goal }: CouncilContext): AgentRecommendation {
    const energy = state.energyLevel;

    if (energy >= 7 && (activity.physical || activity.cognitive)) {
      return {
        role: "performance",
        action: "PROCEED",
        reasoning: `High energy (${energy}/10). Optimal window for high-value activities aligned with goal: ${goal}`,
        confidence: 0.9,
        weightHints: { fitness: 0.7 },
      };
    }

    if (energy <= 3) {
      return {
        role: "performance",
        action: "MODIFY",
        reasoning: `Low energy (${energy}/10). Recommend strategic rest to prevent diminishing returns.`,
        confidence: 0.7,
        weightHints: { recovery: 0.65 },
      };
    }

    return {
      role: "performance",
      action: "PROCEED",
      reasoning: `Moderate energy (${energy}/10). Maintain planned activities.`,
      confidence: 0.6,
      weightHints: {},
    };
  },
};
