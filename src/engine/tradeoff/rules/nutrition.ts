import type { CategoryRule } from "./types.js";
import { downgradeTo, keep } from "./types.js";

export const nutritionRule: CategoryRule = ({ constraints }) => {
  if (constraints.has("time_critical")) {
    return downgradeTo(
      {
        category: "nutrition",
        name: "Simple healthy meal",
        durationMinutes: 10,
        intensity: 0.1,
        description: "Pre-prepared or quick healthy option",
      },
      "Time critical - simplify to pre-prepared healthy option rather than cooking",
    );
  }

  if (constraints.has("low_energy")) {
    return keep(
      "MAINTAIN",
      "Low energy - keep the meal but focus on complex carbs and lean protein for energy",
    );
  }

  return keep("MAINTAIN", "Nutrition plan as scheduled");
};
