import { mkdirSync, readFileSync } from "node:fs";
import { z } from "zod";
import type { PlannedTask, StateSnapshotInput } from "../engine/types.js";
import type { TradeoffConfig } from "../config/types.js";
import { loadConfig } from "../config/loader.js";
import { resolvePaths } from "../config/paths.js";
import { plannedTaskSchema } from "../engine/codec.js";
import { createLogger } from "../logging/logger.js";
import { DecisionPipeline } from "../pipeline/pipeline.js";
import { TradeoffDB } from "../store/db.js";
import { SqliteHistoryRepository } from "../store/sqlite.js";
import { SAMPLE_TASKS } from "../simulation/sample-tasks.js";

export const DEFAULT_USER = "default";

export interface Session {
  readonly config: TradeoffConfig;
  readonly repository: SqliteHistoryRepository;
  readonly pipeline: DecisionPipeline;
  close(): void;
}

/** Loads config, opens the state database and wires a pipeline over it. */
export function openSession(): Session {
  const config = loadConfig();
  const { stateDir } = resolvePaths();
  mkdirSync(stateDir, { recursive: true });
  const db = new TradeoffDB(stateDir);
  const repository = new SqliteHistoryRepository(db, config.engine.historyLimit);
  // stdout carries command output.
  const logger = createLogger(config.logging, 2);
  const pipeline = new DecisionPipeline(repository, { config, logger });
  return {
    config,
    repository,
    pipeline,
    close: () => db.close(),
  };
}

export const stateOptionsSchema = z.object({
  sleep: z.coerce.number().nonnegative(),
  energy: z.coerce.number().min(1).max(10),
  stress: z
    .string()
    .transform((s) => s.toUpperCase())
    .pipe(z.enum(["LOW", "MEDIUM", "HIGH"])),
  time: z.coerce.number().nonnegative(),
  sleepDebt: z.coerce.number().nonnegative().optional(),
  effortDays: z.coerce.number().int().nonnegative().optional(),
});

export type StateOptions = z.input<typeof stateOptionsSchema>;

export function parseStateOptions(options: StateOptions): StateSnapshotInput {
  const parsed = stateOptionsSchema.parse(options);
  return {
    sleepHours: parsed.sleep,
    energyLevel: parsed.energy,
    stressLevel: parsed.stress,
    timeAvailableHours: parsed.time,
    ...(parsed.sleepDebt !== undefined ? { sleepDebtHours: parsed.sleepDebt } : {}),
    ...(parsed.effortDays !== undefined ? { consecutiveHighEffortDays: parsed.effortDays } : {}),
  };
}

/** Tasks from a JSON array file, or the sample plan when no file is given. */
export function loadTasks(path: string | undefined): readonly PlannedTask[] {
  if (!path) return SAMPLE_TASKS;
  const raw: unknown = JSON.parse(readFileSync(path, "utf-8"));
  return z.array(plannedTaskSchema).parse(raw);
}

export function errorMessage(err: unknown): string {
  if (err instanceof z.ZodError) {
    return err.issues.map((i) => `${i.path.join(".") || "input"}: ${i.message}`).join("; ");
  }
  return err instanceof Error ? err.message : String(err);
}
