import type { AgentRecommendation } from "../../types.js";
import type { CouncilAgent, CouncilContext } from "./types.js";

/** Balances stress against load. */
export const wellnessGuardian: CouncilAgent = {
  role: "wellness",
  recommend({ state, activity }: CouncilContext): AgentRecommendation {
    switch (state.stressLevel) {
      case "HIGH":
        if (activity.cognitive) {
          return {
            role: "wellness",
            action: "SKIP",
            reasoning:
              "High stress detected. Additional cognitive load risks burnout. Recommend stress-reduction activities.",
            confidence: 0.85,
            weightHints: { mindfulness: 1 },
          };
        }
        return {
          role: "wellness",
          action: "MODIFY",
          reasoning: "High stress detected. Keep the activity gentle and pair it with stress-reduction time.",
          confidence: 0.8,
          weightHints: { mindfulness: 0.8 },
        };
      case "MEDIUM":
        return {
          role: "wellness",
          action: "MODIFY",
          reasoning: "Moderate stress. Balance productivity with recovery activities.",
          confidence: 0.7,
          weightHints: { mindfulness: 0.65 },
        };
      case "LOW":
        return {
          role: "wellness",
          action: "PROCEED",
          reasoning: "Stress levels manageable. Maintain current balance.",
          confidence: 0.75,
          weightHints: {},
        };
    }
  },
};
