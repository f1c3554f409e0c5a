import type { AgentRecommendation, TradeOffDecision } from "../../types.js";
import type { CouncilAgent, CouncilContext } from "./types.js";
import { percent } from "./types.js";

export const SKIP_RATE_WINDOW = 7;

/** Share of the most recent decisions that skipped at least one category. */
export function recentSkipRate(history: readonly TradeOffDecision[], window = SKIP_RATE_WINDOW): number {
  const recent = history.slice(-window);
  const withSkip = recent.filter((entry) => entry.decisions.some((d) => d.action === "SKIP")).length;
  return withSkip / Math.max(1, recent.length);
}

/** Argues for long-term habit consistency. */
export const futureSelf: CouncilAgent = {
  role: "future",
  recommend({ history }: CouncilContext): AgentRecommendation {
    const skipRate = recentSkipRate(history);

    if (skipRate > 0.5) {
      return {
        role: "future",
        action: "PROCEED",
        reasoning: `Skip rate is ${percent(skipRate)} this week. Skipping again risks habit collapse. Your future self needs consistency.`,
        confidence: 0.9,
        weightHints: {},
      };
    }

    if (skipRate > 0.3) {
      return {
        role: "future",
        action: "MODIFY",
        reasoning: `Skip rate is ${percent(skipRate)}. Consider a lighter version to maintain habit momentum.`,
        confidence: 0.7,
        weightHints: {},
      };
    }

    return {
      role: "future",
      action: "PROCEED",
      reasoning: `Good consistency (${percent(skipRate)} skip rate). Your future self will thank you.`,
      confidence: 0.8,
      weightHints: {},
    };
  },
};
