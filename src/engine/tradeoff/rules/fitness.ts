import type { CategoryRule } from "./types.js";
import { downgradeTo, keep } from "./types.js";

export const fitnessRule: CategoryRule = ({ task, constraints }) => {
  if (constraints.has("burnout_warning")) {
    return keep("SKIP", "Burnout risk detected - skipping workout to prioritize recovery");
  }

  if (constraints.has("critical_sleep") || constraints.has("critical_energy")) {
    return downgradeTo(
      {
        category: "fitness",
        name: "Light stretching",
        durationMinutes: 10,
        intensity: 0.2,
        description: "Gentle movement only",
      },
      "Critical fatigue - replacing with light stretching to maintain movement habit",
    );
  }

  if (constraints.has("high_stress") && constraints.has("low_sleep")) {
    return downgradeTo(
      {
        category: "fitness",
        name: "Recovery walk",
        durationMinutes: 20,
        intensity: 0.3,
        description: "Low-intensity outdoor walk",
      },
      "High stress + poor sleep - replacing the planned session with a recovery walk",
    );
  }

  if (constraints.has("overtraining_risk")) {
    return downgradeTo(
      {
        category: "fitness",
        name: "Mobility work",
        durationMinutes: 15,
        intensity: 0.25,
        description: "Active recovery mobility",
      },
      "Overtraining risk - substituting with mobility work for active recovery",
    );
  }

  if (constraints.has("low_energy")) {
    // Same duration, lower load.
    return downgradeTo(
      {
        category: "fitness",
        name: `${task.name} (reduced intensity)`,
        durationMinutes: task.durationMinutes,
        intensity: task.intensity * 0.6,
        description: `Lower intensity version: ${task.description}`,
      },
      "Low energy - reducing workout intensity by 40%",
    );
  }

  return keep("MAINTAIN", "Conditions favorable for planned workout");
};
