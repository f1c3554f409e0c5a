import type { Category, TradeOffDecision } from "../engine/types.js";
import { CATEGORIES } from "../engine/types.js";
import type { WeeklyReport } from "../engine/patterns/report.js";

export interface Explanation {
  readonly explanation: string;
  readonly temporalAnalysis: string;
  readonly contextAssessment: string;
}

/**
 * Turns engine output into prose. Implementations only read the decision;
 * a service-backed narrator is wrapped with `withFallback` around the template one.
 */
export interface Narrator {
  explain(decision: TradeOffDecision): Promise<Explanation>;
  weeklyInsight(report: WeeklyReport): Promise<string>;
}

export class TemplateNarrator implements Narrator {
  async explain(decision: TradeOffDecision): Promise<Explanation> {
    return explainWithTemplate(decision);
  }

  async weeklyInsight(report: WeeklyReport): Promise<string> {
    return weeklyInsightWithTemplate(report);
  }
}

export function explainWithTemplate(decision: TradeOffDecision): Explanation {
  const { sleepHours, energyLevel, stressLevel } = decision.stateSnapshot;
  const parts: string[] = [];

  if (sleepHours < 6 || energyLevel < 4) {
    parts.push("I can see you're running on low reserves today.");
  } else if (stressLevel === "HIGH") {
    parts.push("It looks like stress is weighing on you today.");
  } else {
    parts.push("Based on your current state,");
  }

  const withAction = (action: string): Category[] =>
    decision.decisions.filter((d) => d.action === action).map((d) => d.category);

  const prioritized = withAction("PRIORITIZE");
  if (prioritized.length > 0) {
    parts.push(`I've prioritized ${prioritized.join(", ")} to give you the biggest benefit.`);
  }

  const skipped = withAction("SKIP");
  if (skipped.length > 0) {
    parts.push(`It's okay to skip ${skipped.join(", ")} today - rest is productive too.`);
  }

  parts.push("You're making a smart choice by listening to your body!");

  return {
    explanation: parts.join(" "),
    temporalAnalysis: temporalAnalysis(decision),
    contextAssessment: contextAssessment(decision.confidenceScore),
  };
}

function temporalAnalysis(decision: TradeOffDecision): string {
  if (decision.constraintsActive.includes("burnout_warning")) {
    return "Urgency: High. Recommendation: Schedule recovery before adding load.";
  }
  if (decision.constraintsActive.length > 0) {
    return "Urgency: Moderate. Recommendation: Follow the adjusted plan today.";
  }
  return "Urgency: Low. Recommendation: Consistent routine detected.";
}

function contextAssessment(confidence: number): string {
  if (confidence >= 0.8) return "Risk Level: Low. Conditions favorable for planned activities.";
  if (confidence >= 0.65) return "Risk Level: Moderate. Adjusted plan keeps load manageable.";
  return "Risk Level: High. Prioritize rest and essentials.";
}

export function weeklyInsightWithTemplate(report: WeeklyReport): string {
  if (report.status === "insufficient_data") {
    return "Weekly Insight: Not enough decisions yet. Keep logging your days and patterns will appear.";
  }

  const parts = ["Weekly Insight:"];

  let best: Category = CATEGORIES[0];
  let worst: Category = CATEGORIES[0];
  for (const category of CATEGORIES) {
    const rate = report.categories[category].skipRate;
    if (rate < report.categories[best].skipRate) best = category;
    if (rate > report.categories[worst].skipRate) worst = category;
  }

  parts.push(`Great job staying consistent with ${best}!`);
  if (report.categories[worst].skipRate > 30) {
    parts.push(`Consider adjusting your ${worst} goals to be more achievable.`);
  }

  const [firstRecommendation] = report.recommendations;
  if (firstRecommendation) parts.push(`${firstRecommendation}.`);

  parts.push("Remember: consistency over perfection!");
  return parts.join(" ");
}
