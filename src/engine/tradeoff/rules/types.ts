import type { DecisionAction, PlannedTask, StateSnapshot } from "../../types.js";
import type { ActiveConstraints } from "../../constraints/active.js";

export interface RuleContext {
  readonly task: PlannedTask;
  readonly priority: number;
  readonly constraints: ActiveConstraints;
  readonly state: StateSnapshot;
}

export type RuleOutcome =
  | { readonly action: "DOWNGRADE"; readonly adjustedTask: PlannedTask; readonly reasoning: string }
  | {
      readonly action: Exclude<DecisionAction, "DOWNGRADE">;
      readonly adjustedTask: null;
      readonly reasoning: string;
    };

export type CategoryRule = (ctx: RuleContext) => RuleOutcome;

export function downgradeTo(adjustedTask: PlannedTask, reasoning: string): RuleOutcome {
  return { action: "DOWNGRADE", adjustedTask, reasoning };
}

export function keep(action: Exclude<DecisionAction, "DOWNGRADE">, reasoning: string): RuleOutcome {
  return { action, adjustedTask: null, reasoning };
}
