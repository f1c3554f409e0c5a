import type { AdaptationRecord, TradeOffDecision, UserProfile } from "../engine/types.js";

/** Persistence seam for decision history, profiles and adaptation records. */
export interface HistoryRepository {
  getHistory(userId: string): TradeOffDecision[];
  /** Appends, then trims the stored log to the configured limit. */
  appendDecision(userId: string, decision: TradeOffDecision): void;
  clearHistory(userId: string): void;
  getProfile(userId: string): UserProfile;
  setProfile(userId: string, profile: UserProfile): void;
  appendAdaptations(userId: string, records: readonly AdaptationRecord[]): void;
  getAdaptations(userId: string): AdaptationRecord[];
  listUsers(): string[];
}
