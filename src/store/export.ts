import { mkdirSync, writeFileSync } from "node:fs";
import { dirname } from "node:path";
import type { AdaptationRecord, TradeOffDecision, UserProfile } from "../engine/types.js";
import { withFileLock } from "../utils/file-lock.js";
import type { HistoryRepository } from "./history-repository.js";

export interface HistoryExport {
  readonly version: 1;
  readonly exportedAt: number;
  readonly userId: string;
  readonly profile: UserProfile;
  readonly decisions: TradeOffDecision[];
  readonly adaptations: AdaptationRecord[];
}

/** Writes one user's history as JSON under an exclusive lock on the target path. */
export async function exportHistory(
  filePath: string,
  repository: HistoryRepository,
  userId: string,
  now: number = Date.now(),
): Promise<HistoryExport> {
  const payload: HistoryExport = {
    version: 1,
    exportedAt: now,
    userId,
    profile: repository.getProfile(userId),
    decisions: repository.getHistory(userId),
    adaptations: repository.getAdaptations(userId),
  };

  mkdirSync(dirname(filePath), { recursive: true });
  await withFileLock(filePath, () => {
    writeFileSync(filePath, JSON.stringify(payload, null, 2) + "\n", "utf-8");
  });
  return payload;
}
