import type { CouncilAgent } from "./types.js";
import { sleepSpecialist } from "./sleep.js";
import { performanceCoach } from "./performance.js";
import { wellnessGuardian } from "./wellness.js";
import { futureSelf } from "./future.js";

export type { CouncilAgent, CouncilContext } from "./types.js";
export { recentSkipRate } from "./future.js";

/** Declared role order; consensus relies on it for tie-breaks. */
export const DEFAULT_AGENTS: readonly CouncilAgent[] = [
  sleepSpecialist,
  performanceCoach,
  wellnessGuardian,
  futureSelf,
];
