import type { Category } from "../../types.js";
import type { CategoryRule } from "./types.js";
import { fitnessRule } from "./fitness.js";
import { nutritionRule } from "./nutrition.js";
import { recoveryRule } from "./recovery.js";
import { mindfulnessRule } from "./mindfulness.js";

export type { CategoryRule, RuleContext, RuleOutcome } from "./types.js";

export const categoryRules: Record<Category, CategoryRule> = {
  fitness: fitnessRule,
  nutrition: nutritionRule,
  recovery: recoveryRule,
  mindfulness: mindfulnessRule,
};
