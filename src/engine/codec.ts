import { z } from "zod";
import type { ConsensusDecision, TradeOffDecision } from "./types.js";
import { AGENT_ROLES, CATEGORIES } from "./types.js";
import { categoryWeightsSchema } from "../config/schema.js";

const categorySchema = z.enum(CATEGORIES);

const constraintNameSchema = z.enum([
  "critical_sleep",
  "low_sleep",
  "sleep_debt_accumulated",
  "critical_energy",
  "low_energy",
  "high_stress",
  "time_critical",
  "time_limited",
  "overtraining_risk",
  "burnout_warning",
]);

export const stateSnapshotSchema = z.object({
  sleepHours: z.number().nonnegative(),
  energyLevel: z.number().int().min(1).max(10),
  stressLevel: z.enum(["LOW", "MEDIUM", "HIGH"]),
  timeAvailableHours: z.number().nonnegative(),
  sleepDebtHours: z.number().nonnegative(),
  consecutiveHighEffortDays: z.number().int().nonnegative(),
});

export const plannedTaskSchema = z.object({
  category: categorySchema,
  name: z.string(),
  durationMinutes: z.number().int().positive(),
  intensity: z.number().min(0).max(1),
  description: z.string(),
});

const decisionBase = {
  category: categorySchema,
  originalTask: plannedTaskSchema,
  reasoning: z.string(),
  priorityScore: z.number(),
};

const domainDecisionSchema = z.discriminatedUnion("action", [
  z.object({ ...decisionBase, action: z.literal("DOWNGRADE"), adjustedTask: plannedTaskSchema }),
  z.object({ ...decisionBase, action: z.literal("PRIORITIZE"), adjustedTask: z.null() }),
  z.object({ ...decisionBase, action: z.literal("MAINTAIN"), adjustedTask: z.null() }),
  z.object({ ...decisionBase, action: z.literal("DEFER"), adjustedTask: z.null() }),
  z.object({ ...decisionBase, action: z.literal("SKIP"), adjustedTask: z.null() }),
]);

export const tradeOffDecisionSchema = z.object({
  id: z.string(),
  timestamp: z.number(),
  stateSnapshot: stateSnapshotSchema,
  constraintsActive: z.array(constraintNameSchema),
  priorities: z.object({
    fitness: z.number(),
    nutrition: z.number(),
    recovery: z.number(),
    mindfulness: z.number(),
  }),
  priorityTrace: z.array(
    z.object({ category: categorySchema, constraint: constraintNameSchema, delta: z.number() }),
  ),
  decisions: z.array(domainDecisionSchema),
  futureImpacts: z.array(
    z.object({
      daysAffected: z.number().int(),
      adjustmentType: z.enum(["intensity_reduction", "workout_reschedule", "sleep_extension", "deload_week"]),
      description: z.string(),
    }),
  ),
  confidenceScore: z.number().min(0).max(1),
  reasoningSummary: z.string(),
});

const agentRecommendationSchema = z.object({
  role: z.enum(["sleep", "performance", "wellness", "future"]),
  action: z.enum(["PROCEED", "MODIFY", "SKIP"]),
  reasoning: z.string(),
  confidence: z.number().min(0).max(1),
  weightHints: categoryWeightsSchema,
});

export const consensusDecisionSchema = z.object({
  finalAction: z.enum(["PROCEED", "MODIFY", "SKIP"]),
  consensusLevel: z.number().min(0).max(1),
  votes: z.array(agentRecommendationSchema).max(AGENT_ROLES.length),
  reasoningSummary: z.string(),
  dissentingOpinions: z.array(z.string()),
});

export function encodeDecision(decision: TradeOffDecision): string {
  return JSON.stringify(decision);
}

/** Throws a ZodError when the payload does not describe a decision. */
export function decodeDecision(json: string): TradeOffDecision {
  return parseDecision(JSON.parse(json));
}

export function parseDecision(raw: unknown): TradeOffDecision {
  return tradeOffDecisionSchema.parse(raw);
}

export function encodeConsensus(consensus: ConsensusDecision): string {
  return JSON.stringify(consensus);
}

export function decodeConsensus(json: string): ConsensusDecision {
  return consensusDecisionSchema.parse(JSON.parse(json));
}
