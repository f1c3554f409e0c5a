import type { Logger } from "../logging/logger.js";

export class StrategyTimeoutError extends Error {
  constructor(
    readonly label: string,
    readonly timeoutMs: number,
  ) {
    super(`${label} timed out after ${timeoutMs}ms`);
    this.name = "StrategyTimeoutError";
  }
}

export interface FallbackOptions {
  readonly label: string;
  readonly timeoutMs: number;
  readonly logger: Logger;
}

export function withTimeout<T>(promise: Promise<T>, label: string, timeoutMs: number): Promise<T> {
  let timer: ReturnType<typeof setTimeout> | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new StrategyTimeoutError(label, timeoutMs)), timeoutMs);
  });
  return Promise.race([promise, timeout]).finally(() => clearTimeout(timer));
}

/**
 * Runs `primary` under a timeout. A rejection or timeout is logged at warn
 * level and answered by `fallback`, which is expected not to fail.
 */
export async function withFallback<T>(
  primary: () => Promise<T>,
  fallback: () => T | Promise<T>,
  opts: FallbackOptions,
): Promise<T> {
  try {
    return await withTimeout(primary(), opts.label, opts.timeoutMs);
  } catch (err) {
    opts.logger.warn(
      { err: err instanceof Error ? err.message : String(err), strategy: opts.label },
      "Strategy failed, using fallback",
    );
    return fallback();
  }
}
