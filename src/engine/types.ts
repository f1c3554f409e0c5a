// ── Categories ──

export const CATEGORIES = ["fitness", "nutrition", "recovery", "mindfulness"] as const;

export type Category = (typeof CATEGORIES)[number];

export type CategoryMap<T> = Record<Category, T>;

/** Per-category weight in [0,1]; missing categories are left untouched. */
export type CategoryWeights = Partial<CategoryMap<number>>;

export function mapCategories<T>(fn: (category: Category) => T): CategoryMap<T> {
  return {
    fitness: fn("fitness"),
    nutrition: fn("nutrition"),
    recovery: fn("recovery"),
    mindfulness: fn("mindfulness"),
  };
}

// ── State ──

export type StressLevel = "LOW" | "MEDIUM" | "HIGH";

export const STRESS_CODES: Record<StressLevel, number> = {
  LOW: 1,
  MEDIUM: 2,
  HIGH: 3,
};

export interface StateSnapshot {
  readonly sleepHours: number;
  readonly energyLevel: number;
  readonly stressLevel: StressLevel;
  readonly timeAvailableHours: number;
  readonly sleepDebtHours: number;
  readonly consecutiveHighEffortDays: number;
}

export type StateSnapshotInput = Omit<StateSnapshot, "sleepDebtHours" | "consecutiveHighEffortDays"> & {
  readonly sleepDebtHours?: number;
  readonly consecutiveHighEffortDays?: number;
};

// ── Constraints ──

export type ConstraintName =
  | "critical_sleep"
  | "low_sleep"
  | "sleep_debt_accumulated"
  | "critical_energy"
  | "low_energy"
  | "high_stress"
  | "time_critical"
  | "time_limited"
  | "overtraining_risk"
  | "burnout_warning";

export type ConstraintSource = "wearable" | "derived" | "user_input";

export interface Constraint {
  readonly name: ConstraintName;
  readonly severity: number;
  readonly description: string;
  readonly source: ConstraintSource;
}

export interface ConstraintThresholds {
  readonly minSleepHours: number;
  readonly criticalSleepHours: number;
  readonly lowEnergyThreshold: number;
  readonly criticalEnergyThreshold: number;
  readonly minTimeHours: number;
  readonly limitedTimeHours: number;
  readonly maxConsecutiveHighEffort: number;
  readonly sleepDebtWarningHours: number;
  readonly sleepDebtCriticalHours: number;
}

// ── Tasks & Decisions ──

export interface PlannedTask {
  readonly category: Category;
  readonly name: string;
  readonly durationMinutes: number;
  readonly intensity: number;
  readonly description: string;
}

export type DecisionAction = "PRIORITIZE" | "MAINTAIN" | "DOWNGRADE" | "DEFER" | "SKIP";

interface DomainDecisionBase {
  readonly category: Category;
  readonly originalTask: PlannedTask;
  readonly reasoning: string;
  readonly priorityScore: number;
}

/** A DOWNGRADE always carries the reduced task; every other action carries none. */
export type DomainDecision =
  | (DomainDecisionBase & { readonly action: "DOWNGRADE"; readonly adjustedTask: PlannedTask })
  | (DomainDecisionBase & {
      readonly action: Exclude<DecisionAction, "DOWNGRADE">;
      readonly adjustedTask: null;
    });

export type ImpactType = "intensity_reduction" | "workout_reschedule" | "sleep_extension" | "deload_week";

export interface FutureImpact {
  readonly daysAffected: number;
  readonly adjustmentType: ImpactType;
  readonly description: string;
}

export interface PriorityContribution {
  readonly category: Category;
  readonly constraint: ConstraintName;
  readonly delta: number;
}

export interface TradeOffDecision {
  readonly id: string;
  readonly timestamp: number;
  readonly stateSnapshot: StateSnapshot;
  readonly constraintsActive: ConstraintName[];
  readonly priorities: CategoryMap<number>;
  readonly priorityTrace: PriorityContribution[];
  readonly decisions: DomainDecision[];
  readonly futureImpacts: FutureImpact[];
  readonly confidenceScore: number;
  readonly reasoningSummary: string;
}

// ── Council ──

export type AgentRole = "sleep" | "performance" | "wellness" | "future";

export const AGENT_ROLES: readonly AgentRole[] = ["sleep", "performance", "wellness", "future"];

export type CouncilAction = "PROCEED" | "MODIFY" | "SKIP";

export interface AgentRecommendation {
  readonly role: AgentRole;
  readonly action: CouncilAction;
  readonly reasoning: string;
  readonly confidence: number;
  readonly weightHints: CategoryWeights;
}

export interface ConsensusDecision {
  readonly finalAction: CouncilAction;
  readonly consensusLevel: number;
  readonly votes: AgentRecommendation[];
  readonly reasoningSummary: string;
  readonly dissentingOpinions: string[];
}

// ── Forecasts & Adaptations ──

export type BurnoutSeverity = "low" | "moderate" | "high" | "critical";

export interface BurnoutFactorScores {
  readonly sleep: number;
  readonly stress: number;
  readonly recovery: number;
  readonly energy: number;
}

export interface BurnoutForecast {
  readonly riskScore: number;
  readonly daysToCrisis: number | null;
  readonly primaryFactors: string[];
  readonly interventionNeeded: boolean;
  readonly severity: BurnoutSeverity;
  readonly factorScores: BurnoutFactorScores;
}

export interface AdaptationRecord {
  readonly timestamp: number;
  readonly pattern: string;
  readonly adaptation: string;
  readonly categories: Category[];
  readonly reasoning: string;
}

// ── Profile ──

export interface UserProfile {
  readonly goal: string;
  readonly preferences: CategoryWeights;
  readonly targetSleepHours: number;
}

export const DEFAULT_PROFILE: UserProfile = {
  goal: "general_fitness",
  preferences: {},
  targetSleepHours: 7.5,
};

// ── Engine Bus Events ──

export type EngineEvent =
  | { type: "decision_made"; userId: string; decision: TradeOffDecision }
  | { type: "adaptation_recorded"; userId: string; record: AdaptationRecord }
  | { type: "burnout_forecast"; userId: string; forecast: BurnoutForecast }
  | { type: "consensus_reached"; userId: string; consensus: ConsensusDecision };
