import * as lockfile from "proper-lockfile";

export interface FileLockOptions {
  readonly retries?: number;
  readonly minTimeoutMs?: number;
}

/** Runs `fn` while holding an advisory lock on `filePath`; the file itself need not exist. */
export async function withFileLock<T>(
  filePath: string,
  fn: () => T | Promise<T>,
  options: FileLockOptions = {},
): Promise<T> {
  let release: (() => Promise<void>) | undefined;
  try {
    release = await lockfile.lock(filePath, {
      retries: { retries: options.retries ?? 3, minTimeout: options.minTimeoutMs ?? 100 },
      realpath: false,
    });
    return await fn();
  } finally {
    await release?.();
  }
}

export function isFileLocked(filePath: string): Promise<boolean> {
  return lockfile.check(filePath, { realpath: false });
}
