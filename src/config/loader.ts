import { readFileSync } from "node:fs";
import { resolve } from "node:path";
import type { TradeoffConfig } from "./types.js";
import { resolvePaths } from "./paths.js";
import { parseConfig } from "./schema.js";

const ENV_REF = /\$\{env:([A-Z_][A-Z0-9_]*)\}/g;

export function substituteEnv(raw: string, env: NodeJS.ProcessEnv = process.env): string {
  return raw.replace(ENV_REF, (ref, name: string) => {
    const value = env[name];
    if (value === undefined) {
      throw new Error(`Missing environment variable: ${name} (referenced as ${ref})`);
    }
    return value;
  });
}

function readIfPresent(path: string): string | undefined {
  try {
    return readFileSync(path, "utf-8");
  } catch (err) {
    if (err instanceof Error && "code" in err && err.code === "ENOENT") return undefined;
    throw err;
  }
}

/**
 * Reads and validates the config file at `path`. Returns undefined when no
 * file exists there; malformed JSON and schema violations throw.
 */
export function readConfig(path: string): TradeoffConfig | undefined {
  const content = readIfPresent(path);
  if (content === undefined) return undefined;
  const raw: unknown = JSON.parse(substituteEnv(content));
  return parseConfig(raw);
}

export function loadConfig(path?: string): TradeoffConfig {
  const configPath = path ? resolve(path) : resolvePaths().configPath;
  return readConfig(configPath) ?? parseConfig({});
}
