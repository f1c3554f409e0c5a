import type { AdaptationRecord, TradeOffDecision, UserProfile } from "../engine/types.js";
import { DEFAULT_PROFILE } from "../engine/types.js";
import { appendToHistory, DEFAULT_HISTORY_LIMIT } from "../engine/tradeoff/engine.js";
import type { HistoryRepository } from "./history-repository.js";

export class InMemoryHistoryRepository implements HistoryRepository {
  private readonly histories = new Map<string, TradeOffDecision[]>();
  private readonly profiles = new Map<string, UserProfile>();
  private readonly adaptations = new Map<string, AdaptationRecord[]>();

  constructor(private readonly historyLimit = DEFAULT_HISTORY_LIMIT) {}

  getHistory(userId: string): TradeOffDecision[] {
    return [...(this.histories.get(userId) ?? [])];
  }

  appendDecision(userId: string, decision: TradeOffDecision): void {
    this.histories.set(userId, appendToHistory(this.histories.get(userId) ?? [], decision, this.historyLimit));
  }

  clearHistory(userId: string): void {
    this.histories.delete(userId);
    this.adaptations.delete(userId);
  }

  getProfile(userId: string): UserProfile {
    return this.profiles.get(userId) ?? DEFAULT_PROFILE;
  }

  setProfile(userId: string, profile: UserProfile): void {
    this.profiles.set(userId, profile);
  }

  appendAdaptations(userId: string, records: readonly AdaptationRecord[]): void {
    if (records.length === 0) return;
    this.adaptations.set(userId, [...(this.adaptations.get(userId) ?? []), ...records]);
  }

  getAdaptations(userId: string): AdaptationRecord[] {
    return [...(this.adaptations.get(userId) ?? [])];
  }

  listUsers(): string[] {
    return [...new Set([...this.histories.keys(), ...this.profiles.keys()])].sort();
  }
}
