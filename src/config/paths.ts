import { homedir } from "node:os";
import { join, resolve } from "node:path";

export interface EnginePaths {
  /** JSON config file; absent means defaults. */
  readonly configPath: string;
  /** Holds the history database. */
  readonly stateDir: string;
}

export function resolvePaths(env: NodeJS.ProcessEnv = process.env): EnginePaths {
  return {
    configPath: resolve(env["TRADEOFF_CONFIG_PATH"] ?? "tradeoff.config.json"),
    stateDir: env["TRADEOFF_STATE_DIR"] ?? join(homedir(), ".tradeoff"),
  };
}
