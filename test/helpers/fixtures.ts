import type {
  Category,
  DecisionAction,
  DomainDecision,
  PlannedTask,
  StateSnapshot,
  StateSnapshotInput,
  TradeOffDecision,
} from "../../src/engine/types.js";
import { normalizeSnapshot } from "../../src/engine/state.js";
import { SAMPLE_TASKS } from "../../src/simulation/sample-tasks.js";

/** 2024-01-15T12:00:00Z, a Monday. */
export const MONDAY_NOON = Date.UTC(2024, 0, 15, 12);
export const DAY = 86_400_000;

export function makeState(overrides: Partial<StateSnapshotInput> = {}): StateSnapshot {
  return normalizeSnapshot({
    sleepHours: 7.5,
    energyLevel: 7,
    stressLevel: "LOW",
    timeAvailableHours: 3,
    ...overrides,
  });
}

export function sampleTasks(): PlannedTask[] {
  return SAMPLE_TASKS.map((t) => ({ ...t }));
}

export function taskFor(category: Category): PlannedTask {
  const task = SAMPLE_TASKS.find((t) => t.category === category);
  if (!task) throw new Error(`no sample task for ${category}`);
  return { ...task };
}

export function makeDomainDecision(category: Category, action: DecisionAction): DomainDecision {
  const task = taskFor(category);
  if (action === "DOWNGRADE") {
    return {
      category,
      action,
      originalTask: task,
      adjustedTask: { ...task, durationMinutes: 10 },
      reasoning: "test",
      priorityScore: 0.25,
    };
  }
  return { category, action, originalTask: task, adjustedTask: null, reasoning: "test", priorityScore: 0.25 };
}

export interface HistoryEntryInput {
  readonly timestamp?: number;
  readonly state?: Partial<StateSnapshotInput>;
  readonly actions?: Partial<Record<Category, DecisionAction>>;
  readonly constraints?: TradeOffDecision["constraintsActive"];
  readonly futureImpacts?: TradeOffDecision["futureImpacts"];
}

let counter = 0;

export function makeHistoryEntry(input: HistoryEntryInput = {}): TradeOffDecision {
  const actions = input.actions ?? {};
  const decisions = (["recovery", "nutrition", "fitness", "mindfulness"] as const).map((category) =>
    makeDomainDecision(category, actions[category] ?? "MAINTAIN"),
  );
  return {
    id: `entry-${++counter}`,
    timestamp: input.timestamp ?? MONDAY_NOON,
    stateSnapshot: makeState(input.state),
    constraintsActive: input.constraints ?? [],
    priorities: { recovery: 0.3, nutrition: 0.25, fitness: 0.25, mindfulness: 0.2 },
    priorityTrace: [],
    decisions,
    futureImpacts: input.futureImpacts ?? [],
    confidenceScore: 0.95,
    reasoningSummary: "All tasks maintained as planned.",
  };
}

/** `count` entries one day apart, the last one at `end`. */
export function makeHistory(
  count: number,
  build: (index: number) => HistoryEntryInput = () => ({}),
  end = MONDAY_NOON,
): TradeOffDecision[] {
  return Array.from({ length: count }, (_, i) => {
    const entry = build(i);
    return makeHistoryEntry({ ...entry, timestamp: entry.timestamp ?? end - (count - 1 - i) * DAY });
  });
}
