import { describe, it, expect, afterEach } from "vitest";
import { mkdtempSync, readFileSync, rmSync } from "node:fs";
import { join } from "node:path";
import { tmpdir } from "node:os";
import { createLogger, createSilentLogger } from "../../src/logging/logger.js";

describe("createLogger", () => {
  let tempDir: string | undefined;

  afterEach(() => {
    if (tempDir) rmSync(tempDir, { recursive: true, force: true });
    tempDir = undefined;
  });

  it("defaults to info", () => {
    expect(createLogger({ json: true }).level).toBe("info");
  });

  it("honors a custom level", () => {
    expect(createLogger({ level: "debug", json: true }).level).toBe("debug");
  });

  it("creates child loggers at the parent level", () => {
    const child = createLogger({ level: "warn", json: true }, 2).child({ component: "pipeline" });
    expect(child.level).toBe("warn");
  });

  it("writes JSON lines to a file", () => {
    tempDir = mkdtempSync(join(tmpdir(), "tradeoff-log-"));
    const file = join(tempDir, "engine.log");
    const logger = createLogger({ level: "info", file });
    logger.info({ userId: "alice" }, "Decision made");
    logger.flush();

    const line = readFileSync(file, "utf-8").trim().split("\n").at(-1) ?? "";
    const entry: unknown = JSON.parse(line);
    expect(entry).toMatchObject({ level: 30, userId: "alice", msg: "Decision made" });
  });
});

describe("createSilentLogger", () => {
  it("discards everything", () => {
    expect(createSilentLogger().level).toBe("silent");
  });
});
