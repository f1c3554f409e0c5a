import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtempSync, readFileSync, rmSync, writeFileSync } from "node:fs";
import { join } from "node:path";
import { tmpdir } from "node:os";
import { isFileLocked, withFileLock } from "../../src/utils/file-lock.js";
import { exportHistory } from "../../src/store/export.js";
import { InMemoryHistoryRepository } from "../../src/store/memory.js";
import { makeHistoryEntry } from "../helpers/fixtures.js";

describe("withFileLock", () => {
  let tempDir: string;
  let filePath: string;

  beforeEach(() => {
    tempDir = mkdtempSync(join(tmpdir(), "tradeoff-lock-"));
    filePath = join(tempDir, "export.json");
    writeFileSync(filePath, "{}");
  });

  afterEach(() => {
    rmSync(tempDir, { recursive: true, force: true });
  });

  it("returns the function result", async () => {
    await expect(withFileLock(filePath, () => 42)).resolves.toBe(42);
  });

  it("holds the lock only while the function runs", async () => {
    const during = await withFileLock(filePath, () => isFileLocked(filePath));
    expect(during).toBe(true);
    await expect(isFileLocked(filePath)).resolves.toBe(false);
  });

  it("releases the lock on error", async () => {
    await expect(
      withFileLock(filePath, () => {
        throw new Error("boom");
      }),
    ).rejects.toThrow("boom");
    await expect(withFileLock(filePath, () => "after-error")).resolves.toBe("after-error");
  });

  it("locks a path that does not exist yet", async () => {
    await expect(withFileLock(join(tempDir, "missing.json"), () => "ok")).resolves.toBe("ok");
  });

  it("serializes concurrent writers", async () => {
    const order: number[] = [];
    await Promise.all(
      [1, 2, 3].map((n) =>
        withFileLock(
          filePath,
          async () => {
            order.push(n);
            await new Promise((r) => setTimeout(r, 10));
            order.push(n);
          },
          { retries: 20, minTimeoutMs: 5 },
        ),
      ),
    );
    for (let i = 0; i < order.length; i += 2) {
      expect(order[i]).toBe(order[i + 1]);
    }
  });
});

describe("exportHistory", () => {
  let tempDir: string;

  beforeEach(() => {
    tempDir = mkdtempSync(join(tmpdir(), "tradeoff-export-"));
  });

  afterEach(() => {
    rmSync(tempDir, { recursive: true, force: true });
  });

  it("writes the user's decisions, profile and adaptations", async () => {
    const repo = new InMemoryHistoryRepository();
    const entry = makeHistoryEntry();
    repo.appendDecision("alice", entry);
    repo.appendAdaptations("alice", [
      { timestamp: 5, pattern: "p", adaptation: "a", categories: ["recovery"], reasoning: "r" },
    ]);

    const target = join(tempDir, "nested", "alice.json");
    const payload = await exportHistory(target, repo, "alice", 123);

    expect(payload.version).toBe(1);
    expect(payload.exportedAt).toBe(123);
    const written: unknown = JSON.parse(readFileSync(target, "utf-8"));
    expect(written).toEqual({
      version: 1,
      exportedAt: 123,
      userId: "alice",
      profile: { goal: "general_fitness", preferences: {}, targetSleepHours: 7.5 },
      decisions: [entry],
      adaptations: [{ timestamp: 5, pattern: "p", adaptation: "a", categories: ["recovery"], reasoning: "r" }],
    });
  });
});
