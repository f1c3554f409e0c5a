import type {
  BurnoutFactorScores,
  BurnoutForecast,
  BurnoutSeverity,
  Category,
  TradeOffDecision,
} from "../types.js";
import { STRESS_CODES } from "../types.js";
import { DAY_MS, longestRun, mean } from "../math.js";

export const CRITICAL_RISK = 70;
export const HIGH_RISK = 50;
export const MODERATE_RISK = 30;

export const INSUFFICIENT_DATA_FACTOR = "Insufficient data for analysis";

const FACTOR_WEIGHTS: BurnoutFactorScores = { sleep: 0.35, stress: 0.3, recovery: 0.2, energy: 0.15 };

const FACTOR_LABELS: Record<keyof BurnoutFactorScores, string> = {
  sleep: "Sleep debt accumulation",
  stress: "Chronic stress pattern",
  recovery: "Insufficient recovery",
  energy: "Rapid energy decline",
};

const FACTOR_KEYS: readonly (keyof BurnoutFactorScores)[] = ["sleep", "stress", "recovery", "energy"];

const RECOVERY_CATEGORIES: readonly Category[] = ["recovery", "mindfulness"];

export interface BurnoutOptions {
  readonly now?: number;
  readonly windowDays?: number;
}

/**
 * Forecast burnout risk from the trailing window of decisions. Entries are
 * taken in stored order; the window is selected by timestamp.
 */
export function predictBurnout(
  history: readonly TradeOffDecision[],
  options: BurnoutOptions = {},
): BurnoutForecast {
  const now = options.now ?? Date.now();
  const cutoff = now - (options.windowDays ?? 7) * DAY_MS;
  const recent = history.filter((d) => d.timestamp >= cutoff);

  if (recent.length < 2) return lowRiskForecast();

  const factorScores: BurnoutFactorScores = {
    sleep: sleepRisk(recent),
    stress: stressRisk(recent),
    recovery: recoveryRisk(recent),
    energy: energyDeclineRisk(recent),
  };

  const riskScore = Math.trunc(
    factorScores.sleep * FACTOR_WEIGHTS.sleep +
      factorScores.stress * FACTOR_WEIGHTS.stress +
      factorScores.recovery * FACTOR_WEIGHTS.recovery +
      factorScores.energy * FACTOR_WEIGHTS.energy,
  );

  const factors = FACTOR_KEYS.filter((key) => factorScores[key] > 60)
    .map((key) => FACTOR_LABELS[key]);

  return {
    riskScore,
    daysToCrisis: estimateDaysToCrisis(riskScore),
    primaryFactors: factors.length > 0 ? factors : ["No significant risk factors"],
    interventionNeeded: riskScore >= CRITICAL_RISK,
    severity: severityFor(riskScore),
    factorScores,
  };
}

export function severityFor(riskScore: number): BurnoutSeverity {
  if (riskScore >= CRITICAL_RISK) return "critical";
  if (riskScore >= HIGH_RISK) return "high";
  if (riskScore >= MODERATE_RISK) return "moderate";
  return "low";
}

export function estimateDaysToCrisis(riskScore: number): number | null {
  if (riskScore < MODERATE_RISK) return null;
  if (riskScore >= 90) return 1;
  if (riskScore >= 80) return 2;
  if (riskScore >= 70) return 3;
  if (riskScore >= 60) return 5;
  return 7;
}

function sleepRisk(decisions: readonly TradeOffDecision[]): number {
  const hours = decisions.map((d) => d.stateSnapshot.sleepHours);
  const avg = mean(hours);
  const lowRun = longestRun(hours, (h) => h < 6);

  let risk = 0;
  if (avg < 6.5) risk += 40;
  else if (avg < 7) risk += 20;

  if (lowRun >= 3) risk += 50;
  else if (lowRun >= 2) risk += 30;

  return Math.min(100, risk);
}

function stressRisk(decisions: readonly TradeOffDecision[]): number {
  const codes = decisions.map((d) => STRESS_CODES[d.stateSnapshot.stressLevel]);
  const highRun = longestRun(codes, (c) => c >= STRESS_CODES.HIGH);

  let risk = 0;
  if (mean(codes) >= 2.5) risk += 40;

  if (highRun >= 3) risk += 60;
  else if (highRun >= 2) risk += 30;

  return Math.min(100, risk);
}

function recoveryRisk(decisions: readonly TradeOffDecision[]): number {
  let opportunities = 0;
  let skipped = 0;
  for (const decision of decisions) {
    for (const d of decision.decisions) {
      if (!RECOVERY_CATEGORIES.includes(d.category)) continue;
      opportunities++;
      if (d.action === "SKIP") skipped++;
    }
  }

  if (opportunities === 0) return 0;
  const skipRate = skipped / opportunities;
  if (skipRate >= 0.6) return 80;
  if (skipRate >= 0.4) return 50;
  if (skipRate >= 0.2) return 25;
  return 0;
}

function energyDeclineRisk(decisions: readonly TradeOffDecision[]): number {
  const levels = decisions.map((d) => d.stateSnapshot.energyLevel);
  if (levels.length < 3) return 0;

  const changes: number[] = [];
  for (let i = 1; i < levels.length; i++) {
    changes.push(levels[i] - levels[i - 1]);
  }
  const avgChange = mean(changes);

  if (avgChange <= -2) return 70;
  if (avgChange <= -1) return 40;
  if (avgChange < 0) return 20;
  return 0;
}

function lowRiskForecast(): BurnoutForecast {
  return {
    riskScore: 10,
    daysToCrisis: null,
    primaryFactors: [INSUFFICIENT_DATA_FACTOR],
    interventionNeeded: false,
    severity: "low",
    factorScores: { sleep: 0, stress: 0, recovery: 0, energy: 0 },
  };
}
