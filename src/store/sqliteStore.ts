import fs from "node:fs";
import path from "node:path";
import Database from "better-sqlite3";
import type { MonitoredUser } from "../types";
import type { CredentialStore, StoreStats, UserRegistration } from "./types";

type UserRow = {
  userId: number;
  username: string;
  secret: string;
  active: number;
  createdAt: string;
  lastCheckAt: string | null;
  lastStatus: string | null;
};

const USER_COLUMNS = "userId, username, secret, active, createdAt, lastCheckAt, lastStatus";

function toUser(row: UserRow): MonitoredUser {
  return {
    userId: row.userId,
    username: row.username,
    secret: row.secret,
    active: row.active === 1,
    createdAt: row.createdAt,
    lastCheckAt: row.lastCheckAt ?? undefined,
    lastStatus: row.lastStatus ?? undefined,
  };
}

export class SqliteCredentialStore implements CredentialStore {
  private readonly db: Database.Database;

  constructor(dbPath: string) {
    if (dbPath === ":memory:") {
      this.db = new Database(dbPath);
    } else {
      const absolutePath = path.resolve(dbPath);
      fs.mkdirSync(path.dirname(absolutePath), { recursive: true });
      this.db = new Database(absolutePath);
      this.db.pragma("journal_mode = WAL");
    }
    this.initializeSchema();
  }

  async listActiveUsers(): Promise<MonitoredUser[]> {
    const rows = this.db
      .prepare<[], UserRow>(`SELECT ${USER_COLUMNS} FROM users WHERE active = 1 ORDER BY createdAt ASC, userId ASC`)
      .all();
    return rows.map(toUser);
  }

  async get(userId: number): Promise<MonitoredUser | undefined> {
    const row = this.db.prepare<[number], UserRow>(`SELECT ${USER_COLUMNS} FROM users WHERE userId = ?`).get(userId);
    return row ? toUser(row) : undefined;
  }

  async upsert(registration: UserRegistration): Promise<MonitoredUser> {
    const now = new Date().toISOString();
    this.db
      .prepare<{ userId: number; username: string; secret: string; now: string }>(
        `
        INSERT INTO users (userId, username, secret, active, createdAt, updatedAt)
        VALUES (@userId, @username, @secret, 1, @now, @now)
        ON CONFLICT(userId) DO UPDATE SET
          username = excluded.username,
          secret = excluded.secret,
          active = 1,
          updatedAt = excluded.updatedAt
      `,
      )
      .run({
        userId: registration.userId,
        username: registration.username,
        secret: registration.secret,
        now,
      });

    const stored = await this.get(registration.userId);
    if (!stored) {
      throw new Error(`user ${registration.userId} missing after upsert`);
    }
    return stored;
  }

  async deactivate(userId: number): Promise<boolean> {
    const result = this.db
      .prepare<[string, number]>("UPDATE users SET active = 0, updatedAt = ? WHERE userId = ? AND active = 1")
      .run(new Date().toISOString(), userId);
    return result.changes > 0;
  }

  async recordCheck(userId: number, status: string, checkedAt: string): Promise<void> {
    this.db
      .prepare<{ userId: number; status: string; checkedAt: string }>(
        `
        UPDATE users
        SET
          lastCheckAt = @checkedAt,
          lastStatus = @status,
          updatedAt = @checkedAt
        WHERE userId = @userId
      `,
      )
      .run({ userId, status, checkedAt });
  }

  async remove(userId: number): Promise<boolean> {
    const result = this.db.prepare<[number]>("DELETE FROM users WHERE userId = ?").run(userId);
    return result.changes > 0;
  }

  async getStats(): Promise<StoreStats> {
    const totalUsers = this.countWhere("1 = 1");
    const activeUsers = this.countWhere("active = 1");
    return {
      totalUsers,
      activeUsers,
      inactiveUsers: totalUsers - activeUsers,
    };
  }

  async close(): Promise<void> {
    this.db.close();
  }

  private countWhere(whereClause: string): number {
    const row = this.db.prepare<[], { count: number }>(`SELECT COUNT(*) as count FROM users WHERE ${whereClause}`).get();
    return row?.count ?? 0;
  }

  private initializeSchema(): void {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS users (
        userId INTEGER PRIMARY KEY,
        username TEXT NOT NULL,
        secret TEXT NOT NULL,
        active INTEGER NOT NULL DEFAULT 1,
        createdAt TEXT NOT NULL,
        updatedAt TEXT NOT NULL,
        lastCheckAt TEXT NULL,
        lastStatus TEXT NULL
      );

      CREATE INDEX IF NOT EXISTS idx_users_active ON users(active);
    `);
  }
}
