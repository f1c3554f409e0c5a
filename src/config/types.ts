import type { CategoryWeights } from "../engine/types.js";

export interface TradeoffConfig {
  readonly logging: LoggingConfig;
  readonly thresholds: ThresholdsConfig;
  readonly engine: EngineConfig;
  readonly patterns: PatternsConfig;
  readonly burnout: BurnoutConfig;
  readonly narrative: NarrativeConfig;
}

export interface LoggingConfig {
  readonly level: "debug" | "info" | "warn" | "error";
  readonly file?: string;
  readonly json?: boolean;
}

export interface ThresholdsConfig {
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

export interface EngineConfig {
  readonly historyLimit: number;
  readonly preferences?: CategoryWeights;
}

export interface PatternsConfig {
  readonly windowDays: number;
  readonly minHistory: number;
}

export interface BurnoutConfig {
  readonly windowDays: number;
}

export interface NarrativeConfig {
  readonly timeoutMs: number;
}
