import { SeededRandom } from "./random.js";

export interface WearableReading {
  readonly timestamp: number;
  readonly sleepHours: number;
  readonly deepSleepPercent: number;
  readonly wakeEvents: number;
  readonly restingHeartRate: number;
  readonly hrvMs: number;
  readonly steps: number;
  readonly activeMinutes: number;
  readonly caloriesBurned: number;
}

export interface ReadingFactors {
  /** 0..1, higher is more tired. */
  readonly fatigue: number;
  /** 0..1, higher is more stressed. */
  readonly stress: number;
  readonly weekend: boolean;
}

const BASELINE = {
  sleepHours: 7.0,
  deepSleepPercent: 20.0,
  restingHeartRate: 65,
  hrvMs: 45.0,
  steps: 8000,
} as const;

function round1(value: number): number {
  return Math.round(value * 10) / 10;
}

/** Synthetic wearable data shaped by fatigue and stress factors. */
export class WearableGenerator {
  private readonly random: SeededRandom;

  constructor(seed = 42) {
    this.random = new SeededRandom(seed);
  }

  reading(timestamp: number, factors: ReadingFactors): WearableReading {
    const { fatigue, stress, weekend } = factors;
    const r = this.random;

    const sleepBase = BASELINE.sleepHours + (weekend ? 0.5 : 0);
    const sleepHours = Math.max(3, sleepBase - fatigue * 2 + r.gauss(0, 0.5));
    const deepSleep = Math.max(5, BASELINE.deepSleepPercent - stress * 10 + r.gauss(0, 3));
    const wakeEvents = Math.trunc(Math.max(0, stress * 5 + r.gauss(0, 1)));
    const restingHeartRate = Math.trunc(BASELINE.restingHeartRate + stress * 10 + fatigue * 5 + r.gauss(0, 3));
    const hrv = Math.max(15, BASELINE.hrvMs - stress * 15 - fatigue * 10 + r.gauss(0, 5));
    const steps = Math.trunc(Math.max(1000, BASELINE.steps * (1 - fatigue * 0.4) + r.gauss(0, 1000)));
    const activeMinutes = Math.trunc(steps / 150 + r.gauss(0, 10));
    const caloriesBurned = Math.trunc(1800 + activeMinutes * 5 + r.gauss(0, 100));

    return {
      timestamp,
      sleepHours: round1(sleepHours),
      deepSleepPercent: round1(deepSleep),
      wakeEvents,
      restingHeartRate,
      hrvMs: round1(hrv),
      steps,
      activeMinutes: Math.max(0, activeMinutes),
      caloriesBurned,
    };
  }
}

/** 0..100 from duration, deep sleep share and wake events. */
export function sleepQualityScore(reading: WearableReading): number {
  const duration = Math.min(reading.sleepHours / 8, 1) * 50;
  const deep = Math.min(reading.deepSleepPercent / 25, 1) * 30;
  const wakePenalty = Math.max(0, (5 - reading.wakeEvents) / 5) * 20;
  return duration + deep + wakePenalty;
}
