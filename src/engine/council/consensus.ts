import type { AgentRecommendation, ConsensusDecision, CouncilAction } from "../types.js";
import { AGENT_ROLES } from "../types.js";
import { clamp01 } from "../math.js";
import { percent } from "./agents/types.js";

function roleIndex(vote: AgentRecommendation): number {
  return AGENT_ROLES.indexOf(vote.role);
}

/**
 * Confidence-weighted majority over agent votes. Votes are first placed in
 * declared role order so the result does not depend on arrival order.
 * Confidences outside [0,1] are clamped before they are counted.
 */
export function buildConsensus(votes: readonly AgentRecommendation[]): ConsensusDecision {
  const ordered = votes
    .map((vote) => ({ ...vote, confidence: clamp01(vote.confidence) }))
    .sort((a, b) => roleIndex(a) - roleIndex(b));

  const totals = new Map<CouncilAction, number>();
  for (const vote of ordered) {
    totals.set(vote.action, (totals.get(vote.action) ?? 0) + vote.confidence);
  }

  let finalAction: CouncilAction = "PROCEED";
  let best = Number.NEGATIVE_INFINITY;
  let total = 0;
  // Map iteration follows first appearance, so strict > keeps the earliest on ties.
  for (const [action, weight] of totals) {
    total += weight;
    if (weight > best) {
      best = weight;
      finalAction = action;
    }
  }

  const consensusLevel = total > 0 ? best / total : 0;

  const majority = ordered.filter((v) => v.action === finalAction);
  const dissentingOpinions = ordered
    .filter((v) => v.action !== finalAction)
    .map((v) => `${v.role}: ${v.reasoning}`);

  const reasoningSummary = [
    `Council Decision (${percent(consensusLevel)} consensus): ${finalAction}`,
    ...majority.map((v) => `• ${v.role}: ${v.reasoning}`),
  ].join("\n");

  return {
    finalAction,
    consensusLevel,
    votes: ordered,
    reasoningSummary,
    dissentingOpinions,
  };
}
