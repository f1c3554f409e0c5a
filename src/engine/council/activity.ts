import type { PlannedTask } from "../types.js";

export interface ClassifiedActivity {
  readonly name: string;
  readonly highIntensity: boolean;
  readonly physical: boolean;
  readonly cognitive: boolean;
}

const HIGH_INTENSITY_PATTERN = /\b(hiit|intense|intensity|sprints?|intervals?)\b/i;
const PHYSICAL_PATTERN = /\b(exercise|workout|run|running|gym|training|lift|lifting|cycling|swim|swimming|cardio|hiit)\b/i;
const COGNITIVE_PATTERN = /\b(work|deadline|meeting|study|project|report)\b/i;

export const HIGH_INTENSITY_THRESHOLD = 0.7;

/** Accepts a free-text activity name or a planned task. */
export function classifyActivity(activity: string | PlannedTask): ClassifiedActivity {
  if (typeof activity === "string") {
    return {
      name: activity,
      highIntensity: HIGH_INTENSITY_PATTERN.test(activity),
      physical: PHYSICAL_PATTERN.test(activity),
      cognitive: COGNITIVE_PATTERN.test(activity),
    };
  }

  const text = `${activity.name} ${activity.description}`;
  return {
    name: activity.name,
    highIntensity: activity.intensity >= HIGH_INTENSITY_THRESHOLD || HIGH_INTENSITY_PATTERN.test(text),
    physical: activity.category === "fitness" || PHYSICAL_PATTERN.test(text),
    cognitive: COGNITIVE_PATTERN.test(text),
  };
}
