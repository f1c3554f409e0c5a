import type { CategoryRule } from "./types.js";
import { downgradeTo, keep } from "./types.js";

export const recoveryRule: CategoryRule = ({ constraints }) => {
  if (constraints.hasAny(["critical_sleep", "burnout_warning", "overtraining_risk"])) {
    return keep("PRIORITIZE", "Recovery critical due to active fatigue/burnout signals");
  }

  if (constraints.has("time_critical")) {
    return downgradeTo(
      {
        category: "recovery",
        name: "Power nap",
        durationMinutes: 20,
        intensity: 0.1,
        description: "Quick restorative rest",
      },
      "Time critical - condensed recovery with power nap",
    );
  }

  return keep("MAINTAIN", "Recovery as planned");
};
