import type { PlannedTask } from "../engine/types.js";

export const SAMPLE_TASKS: readonly PlannedTask[] = [
  {
    category: "fitness",
    name: "HIIT Workout",
    durationMinutes: 45,
    intensity: 0.8,
    description: "High-intensity interval training",
  },
  {
    category: "nutrition",
    name: "Meal Prep",
    durationMinutes: 60,
    intensity: 0.3,
    description: "Prepare healthy meals for the week",
  },
  {
    category: "recovery",
    name: "Sleep Optimization",
    durationMinutes: 30,
    intensity: 0.1,
    description: "Wind-down routine before bed",
  },
  {
    category: "mindfulness",
    name: "Meditation Session",
    durationMinutes: 20,
    intensity: 0.2,
    description: "Guided mindfulness meditation",
  },
];
