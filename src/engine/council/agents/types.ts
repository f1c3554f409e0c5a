import type { AgentRecommendation, AgentRole, StateSnapshot, TradeOffDecision } from "../../types.js";
import type { ClassifiedActivity } from "../activity.js";

export interface CouncilContext {
  readonly state: StateSnapshot;
  readonly activity: ClassifiedActivity;
  readonly goal: string;
  readonly history: readonly TradeOffDecision[];
}

/** One specialist vote. Agents see only the context and never each other. */
export interface CouncilAgent {
  readonly role: AgentRole;
  recommend(ctx: CouncilContext): AgentRecommendation;
}

export function percent(ratio: number): string {
  return `${Math.round(ratio * 100)}%`;
}
