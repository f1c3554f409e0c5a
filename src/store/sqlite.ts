import type Database from "better-sqlite3";
import { z } from "zod";
import type { AdaptationRecord, TradeOffDecision, UserProfile } from "../engine/types.js";
import { CATEGORIES, DEFAULT_PROFILE } from "../engine/types.js";
import { encodeDecision, decodeDecision } from "../engine/codec.js";
import { DEFAULT_HISTORY_LIMIT } from "../engine/tradeoff/engine.js";
import { categoryWeightsSchema } from "../config/schema.js";
import type { TradeoffDB } from "./db.js";
import type { HistoryRepository } from "./history-repository.js";

const payloadRow = z.object({ payload: z.string() });

const profileRow = z.object({
  goal: z.string(),
  preferences: z.string(),
  target_sleep_hours: z.number(),
});

const adaptationRow = z.object({
  timestamp: z.number(),
  pattern: z.string(),
  adaptation: z.string(),
  categories: z.string(),
  reasoning: z.string(),
});

const categoryListSchema = z.array(z.enum(CATEGORIES));

const userRow = z.object({ user_id: z.string() });

export class SqliteHistoryRepository implements HistoryRepository {
  private readonly db: Database.Database;

  constructor(
    tradeoffDb: TradeoffDB,
    private readonly historyLimit = DEFAULT_HISTORY_LIMIT,
  ) {
    this.db = tradeoffDb.raw();
  }

  getHistory(userId: string): TradeOffDecision[] {
    const rows = this.db
      .prepare("SELECT payload FROM decisions WHERE user_id = ? ORDER BY seq ASC")
      .all(userId);
    return rows.map((row) => decodeDecision(payloadRow.parse(row).payload));
  }

  appendDecision(userId: string, decision: TradeOffDecision): void {
    const insert = this.db.prepare(
      "INSERT INTO decisions (id, user_id, timestamp, payload) VALUES (?, ?, ?, ?)",
    );
    const trim = this.db.prepare(
      `DELETE FROM decisions WHERE user_id = ? AND seq NOT IN (
         SELECT seq FROM decisions WHERE user_id = ? ORDER BY seq DESC LIMIT ?
       )`,
    );

    this.db.transaction(() => {
      insert.run(decision.id, userId, decision.timestamp, encodeDecision(decision));
      trim.run(userId, userId, this.historyLimit);
    })();
  }

  clearHistory(userId: string): void {
    this.db.transaction(() => {
      this.db.prepare("DELETE FROM decisions WHERE user_id = ?").run(userId);
      this.db.prepare("DELETE FROM adaptations WHERE user_id = ?").run(userId);
    })();
  }

  getProfile(userId: string): UserProfile {
    const row = this.db
      .prepare("SELECT goal, preferences, target_sleep_hours FROM profiles WHERE user_id = ?")
      .get(userId);
    if (row === undefined) return DEFAULT_PROFILE;

    const parsed = profileRow.parse(row);
    return {
      goal: parsed.goal,
      preferences: categoryWeightsSchema.parse(JSON.parse(parsed.preferences)),
      targetSleepHours: parsed.target_sleep_hours,
    };
  }

  setProfile(userId: string, profile: UserProfile): void {
    this.db
      .prepare(
        `INSERT INTO profiles (user_id, goal, preferences, target_sleep_hours, updated_at)
         VALUES (?, ?, ?, ?, ?)
         ON CONFLICT(user_id) DO UPDATE SET
           goal = excluded.goal,
           preferences = excluded.preferences,
           target_sleep_hours = excluded.target_sleep_hours,
           updated_at = excluded.updated_at`,
      )
      .run(userId, profile.goal, JSON.stringify(profile.preferences), profile.targetSleepHours, Date.now());
  }

  appendAdaptations(userId: string, records: readonly AdaptationRecord[]): void {
    const insert = this.db.prepare(
      `INSERT INTO adaptations (user_id, timestamp, pattern, adaptation, categories, reasoning)
       VALUES (?, ?, ?, ?, ?, ?)`,
    );
    this.db.transaction(() => {
      for (const r of records) {
        insert.run(userId, r.timestamp, r.pattern, r.adaptation, JSON.stringify(r.categories), r.reasoning);
      }
    })();
  }

  getAdaptations(userId: string): AdaptationRecord[] {
    const rows = this.db
      .prepare(
        "SELECT timestamp, pattern, adaptation, categories, reasoning FROM adaptations WHERE user_id = ? ORDER BY id ASC",
      )
      .all(userId);
    return rows.map((raw) => {
      const row = adaptationRow.parse(raw);
      return {
        timestamp: row.timestamp,
        pattern: row.pattern,
        adaptation: row.adaptation,
        categories: categoryListSchema.parse(JSON.parse(row.categories)),
        reasoning: row.reasoning,
      };
    });
  }

  listUsers(): string[] {
    const rows = this.db
      .prepare("SELECT user_id FROM decisions UNION SELECT user_id FROM profiles ORDER BY user_id")
      .all();
    return rows.map((row) => userRow.parse(row).user_id);
  }
}
