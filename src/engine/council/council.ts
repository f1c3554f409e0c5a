import type { ConsensusDecision, PlannedTask, StateSnapshot, TradeOffDecision } from "../types.js";
import { classifyActivity } from "./activity.js";
import { DEFAULT_AGENTS, type CouncilAgent, type CouncilContext } from "./agents/index.js";
import { buildConsensus } from "./consensus.js";

export interface DeliberationInput {
  readonly state: StateSnapshot;
  readonly activity: string | PlannedTask;
  readonly goal: string;
  readonly history: readonly TradeOffDecision[];
}

/** Strategy seam for council deliberation; the heuristic council is the default. */
export interface CouncilStrategy {
  deliberate(input: DeliberationInput): Promise<ConsensusDecision>;
}

export class HealthCouncil implements CouncilStrategy {
  constructor(private readonly agents: readonly CouncilAgent[] = DEFAULT_AGENTS) {}

  deliberateSync(input: DeliberationInput): ConsensusDecision {
    const ctx = toContext(input);
    return buildConsensus(this.agents.map((agent) => agent.recommend(ctx)));
  }

  /** Agents are independent, so they are evaluated concurrently. */
  async deliberate(input: DeliberationInput): Promise<ConsensusDecision> {
    const ctx = toContext(input);
    const votes = await Promise.all(this.agents.map(async (agent) => agent.recommend(ctx)));
    return buildConsensus(votes);
  }
}

function toContext(input: DeliberationInput): CouncilContext {
  return {
    state: input.state,
    activity: classifyActivity(input.activity),
    goal: input.goal,
    history: input.history,
  };
}

const defaultCouncil = new HealthCouncil();

export function deliberate(
  state: StateSnapshot,
  activity: string | PlannedTask,
  goal: string,
  history: readonly TradeOffDecision[],
): ConsensusDecision {
  return defaultCouncil.deliberateSync({ state, activity, goal, history });
}

export function deliberateAsync(
  state: StateSnapshot,
  activity: string | PlannedTask,
  goal: string,
  history: readonly TradeOffDecision[],
): Promise<ConsensusDecision> {
  return defaultCouncil.deliberate({ state, activity, goal, history });
}
