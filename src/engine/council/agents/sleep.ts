import type { AgentRecommendation } from "../../types.js";
import type { CouncilAgent, CouncilContext } from "./types.js";

/** Guards recovery and circadian health. */
export const sleepSpecialist: CouncilAgent = {
  role: "sleep",
  recommend({ state, activity }: CouncilContext): AgentRecommendation {
    const hours = state.sleepHours.toFixed(1);

    if (state.sleepHours < 6 && activity.highIntensity) {
      return {
        role: "sleep",
        action: "SKIP",
        reasoning: `Sleep debt detected (${hours}h). High-intensity exercise increases cortisol and impairs recovery.`,
        confidence: 0.95,
        weightHints: { recovery: 1, fitness: 0.3 },
      };
    }

    if (state.sleepHours < 7) {
      return {
        role: "sleep",
        action: "MODIFY",
        reasoning: `Suboptimal sleep (${hours}h). Recommend lower intensity to preserve recovery capacity.`,
        confidence: 0.75,
        weightHints: { recovery: 0.75, fitness: 0.35 },
      };
    }

    return {
      role: "sleep",
      action: "PROCEED",
      reasoning: `Adequate sleep (${hours}h). Recovery capacity is good.`,
      confidence: 0.8,
      weightHints: {},
    };
  },
};
