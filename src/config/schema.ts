import { z } from "zod";
import type { TradeoffConfig } from "./types.js";

const weightSchema = z.number().min(0).max(1);

export const categoryWeightsSchema = z.object({
  fitness: weightSchema.optional(),
  nutrition: weightSchema.optional(),
  recovery: weightSchema.optional(),
  mindfulness: weightSchema.optional(),
});

const loggingSchema = z.object({
  level: z.enum(["debug", "info", "warn", "error"]).default("info"),
  file: z.string().optional(),
  json: z.boolean().optional(),
});

const thresholdsSchema = z.object({
  minSleepHours: z.number().nonnegative().default(6.0),
  criticalSleepHours: z.number().nonnegative().default(5.0),
  lowEnergyThreshold: z.number().int().min(1).max(10).default(4),
  criticalEnergyThreshold: z.number().int().min(1).max(10).default(2),
  minTimeHours: z.number().nonnegative().default(0.5),
  limitedTimeHours: z.number().positive().default(1.5),
  maxConsecutiveHighEffort: z.number().int().positive().default(3),
  sleepDebtWarningHours: z.number().nonnegative().default(3.0),
  sleepDebtCriticalHours: z.number().nonnegative().default(6.0),
});

const engineSchema = z.object({
  historyLimit: z.number().int().positive().default(50),
  preferences: categoryWeightsSchema.optional(),
});

const patternsSchema = z.object({
  windowDays: z.number().int().positive().default(7),
  minHistory: z.number().int().min(1).default(3),
});

const burnoutSchema = z.object({
  windowDays: z.number().int().positive().default(7),
});

const narrativeSchema = z.object({
  timeoutMs: z.number().int().positive().default(5_000),
});

export const tradeoffConfigSchema = z.object({
  logging: loggingSchema.default({}),
  thresholds: thresholdsSchema.default({}),
  engine: engineSchema.default({}),
  patterns: patternsSchema.default({}),
  burnout: burnoutSchema.default({}),
  narrative: narrativeSchema.default({}),
});

export function parseConfig(raw: unknown): TradeoffConfig {
  return tradeoffConfigSchema.parse(raw);
}
