import type { CategoryRule } from "./types.js";
import { downgradeTo, keep } from "./types.js";

const LOW_ENERGY_LEVEL = 3;

export const mindfulnessRule: CategoryRule = ({ constraints, state }) => {
  if (constraints.has("high_stress")) {
    return keep("PRIORITIZE", "High stress detected - prioritizing mindfulness for stress reduction");
  }

  if (constraints.has("time_critical")) {
    return downgradeTo(
      {
        category: "mindfulness",
        name: "Breathing exercise",
        durationMinutes: 5,
        intensity: 0.2,
        description: "Quick box breathing",
      },
      "Time critical - condensed to 5-minute breathing exercise",
    );
  }

  if (state.energyLevel <= LOW_ENERGY_LEVEL) {
    return keep("PRIORITIZE", "Low energy state - meditation supports recovery without physical demand");
  }

  return keep("MAINTAIN", "Mindfulness as planned");
};
