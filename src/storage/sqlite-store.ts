import { mkdirSync } from "node:fs";
import { dirname } from "node:path";
import Database from "better-sqlite3";
import type { CacheEntry, EntitlementKind, EntitlementRecord } from "../types";
import {
  decodeResult,
  encodeResult,
  type ImportCounts,
  type MetricRecord,
  type RecordDump,
  type StorageBackend,
  type StorageStats,
} from "./backend";

interface CacheRow {
  key: string;
  result_json: string;
  stored_at: number;
  ttl_seconds: number;
}

interface SubscriptionRow {
  subject: string;
  expires_at: number;
  granted_at: number;
}

interface GroupRow {
  group_id: string;
  granted_at: number;
}

interface MetricRow {
  name: string;
  value: number;
  updated_at: number;
}

interface CountRow {
  count: number;
}

/**
 * File-backed store: one SQLite file, one table per collection kind. The
 * schema is the on-disk format the networked store migrates from.
 */
export class SqliteStore implements StorageBackend {
  readonly kind = "sqlite" as const;
  private readonly db: Database.Database;

  constructor(path: string) {
    if (path !== ":memory:") {
      mkdirSync(dirname(path), { recursive: true });
    }
    this.db = new Database(path);
    this.db.pragma("journal_mode = WAL");
    this.db.pragma("busy_timeout = 5000");
    this.migrate();
  }

  private migrate(): void {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS cache_entries (
        key TEXT PRIMARY KEY,
        result_json TEXT NOT NULL,
        stored_at INTEGER NOT NULL,
        ttl_seconds INTEGER NOT NULL,
        expires_at INTEGER NOT NULL
      );

      CREATE INDEX IF NOT EXISTS idx_cache_entries_expiry ON cache_entries(expires_at);

      CREATE TABLE IF NOT EXISTS entitlements (
        subject TEXT PRIMARY KEY,
        expires_at INTEGER NOT NULL,
        granted_at INTEGER NOT NULL
      );

      CREATE TABLE IF NOT EXISTS approved_groups (
        group_id TEXT PRIMARY KEY,
        granted_at INTEGER NOT NULL
      );

      CREATE TABLE IF NOT EXISTS metrics (
        name TEXT PRIMARY KEY,
        value INTEGER NOT NULL,
        updated_at INTEGER NOT NULL
      );
    `);
  }

  async readCache(key: string): Promise<CacheEntry | null> {
    const row = this.db
      .prepare<[string], CacheRow>(
        `SELECT key, result_json, stored_at, ttl_seconds FROM cache_entries WHERE key = ?`,
      )
      .get(key);

    if (!row) {
      return null;
    }

    return {
      key: row.key,
      result: decodeResult(row.result_json),
      storedAt: row.stored_at,
      ttlSeconds: row.ttl_seconds,
    };
  }

  async writeCache(entry: CacheEntry): Promise<void> {
    this.db
      .prepare(
        `
          INSERT INTO cache_entries (key, result_json, stored_at, ttl_seconds, expires_at)
          VALUES (?, ?, ?, ?, ?)
          ON CONFLICT(key) DO UPDATE SET
            result_json = excluded.result_json,
            stored_at = excluded.stored_at,
            ttl_seconds = excluded.ttl_seconds,
            expires_at = excluded.expires_at
        `,
      )
      .run(
        entry.key,
        encodeResult(entry.result),
        entry.storedAt,
        entry.ttlSeconds,
        entry.storedAt + entry.ttlSeconds * 1000,
      );
  }

  async deleteCache(key: string): Promise<void> {
    this.db.prepare(`DELETE FROM cache_entries WHERE key = ?`).run(key);
  }

  async readEntitlement(subject: string, kind: EntitlementKind): Promise<EntitlementRecord | null> {
    if (kind === "group-approval") {
      const row = this.db
        .prepare<[string], GroupRow>(`SELECT group_id, granted_at FROM approved_groups WHERE group_id = ?`)
        .get(subject);

      return row ? { subject: row.group_id, kind, expiresAt: null, grantedAt: row.granted_at } : null;
    }

    const row = this.db
      .prepare<[string], SubscriptionRow>(
        `SELECT subject, expires_at, granted_at FROM entitlements WHERE subject = ?`,
      )
      .get(subject);

    return row ? { subject: row.subject, kind, expiresAt: row.expires_at, grantedAt: row.granted_at } : null;
  }

  async writeEntitlement(record: EntitlementRecord): Promise<void> {
    if (record.kind === "group-approval") {
      this.db
        .prepare(
          `
            INSERT INTO approved_groups (group_id, granted_at) VALUES (?, ?)
            ON CONFLICT(group_id) DO UPDATE SET granted_at = excluded.granted_at
          `,
        )
        .run(record.subject, record.grantedAt);
      return;
    }

    if (record.expiresAt === null) {
      throw new Error(`Subscription for ${record.subject} needs an expiry`);
    }

    this.db
      .prepare(
        `
          INSERT INTO entitlements (subject, expires_at, granted_at) VALUES (?, ?, ?)
          ON CONFLICT(subject) DO UPDATE SET
            expires_at = excluded.expires_at,
            granted_at = excluded.granted_at
        `,
      )
      .run(record.subject, record.expiresAt, record.grantedAt);
  }

  async deleteEntitlement(subject: string, kind: EntitlementKind): Promise<void> {
    const table = kind === "group-approval" ? "approved_groups" : "entitlements";
    const column = kind === "group-approval" ? "group_id" : "subject";
    this.db.prepare(`DELETE FROM ${table} WHERE ${column} = ?`).run(subject);
  }

  async incrementMetric(name: string, by: number, now: number): Promise<void> {
    this.db
      .prepare(
        `
          INSERT INTO metrics (name, value, updated_at) VALUES (?, ?, ?)
          ON CONFLICT(name) DO UPDATE SET
            value = metrics.value + excluded.value,
            updated_at = excluded.updated_at
        `,
      )
      .run(name, by, now);
  }

  async readMetrics(): Promise<MetricRecord[]> {
    return this.db
      .prepare<[], MetricRow>(`SELECT name, value, updated_at FROM metrics ORDER BY name`)
      .all()
      .map((row) => ({ name: row.name, value: row.value, updatedAt: row.updated_at }));
  }

  async stats(): Promise<StorageStats> {
    return {
      backend: this.kind,
      cacheEntries: this.count("cache_entries"),
      subscriptions: this.count("entitlements"),
      approvedGroups: this.count("approved_groups"),
      metrics: this.count("metrics"),
    };
  }

  async vacuum(now: number): Promise<number> {
    const cache = this.db.prepare(`DELETE FROM cache_entries WHERE expires_at <= ?`).run(now);
    const subscriptions = this.db.prepare(`DELETE FROM entitlements WHERE expires_at <= ?`).run(now);
    this.db.exec(`VACUUM`);
    return cache.changes + subscriptions.changes;
  }

  async exportRecords(): Promise<RecordDump> {
    const cache = this.db
      .prepare<[], CacheRow>(`SELECT key, result_json, stored_at, ttl_seconds FROM cache_entries ORDER BY key`)
      .all()
      .map((row) => ({
        key: row.key,
        result: decodeResult(row.result_json),
        storedAt: row.stored_at,
        ttlSeconds: row.ttl_seconds,
      }));

    const subscriptions = this.db
      .prepare<[], SubscriptionRow>(`SELECT subject, expires_at, granted_at FROM entitlements ORDER BY subject`)
      .all()
      .map(
        (row): EntitlementRecord => ({
          subject: row.subject,
          kind: "individual-subscription",
          expiresAt: row.expires_at,
          grantedAt: row.granted_at,
        }),
      );

    const groups = this.db
      .prepare<[], GroupRow>(`SELECT group_id, granted_at FROM approved_groups ORDER BY group_id`)
      .all()
      .map(
        (row): EntitlementRecord => ({
          subject: row.group_id,
          kind: "group-approval",
          expiresAt: null,
          grantedAt: row.granted_at,
        }),
      );

    return {
      cache,
      entitlements: [...subscriptions, ...groups],
      metrics: await this.readMetrics(),
    };
  }

  async importMissing(dump: RecordDump): Promise<ImportCounts> {
    const insertCache = this.db.prepare(
      `INSERT OR IGNORE INTO cache_entries (key, result_json, stored_at, ttl_seconds, expires_at) VALUES (?, ?, ?, ?, ?)`,
    );
    const insertSubscription = this.db.prepare(
      `INSERT OR IGNORE INTO entitlements (subject, expires_at, granted_at) VALUES (?, ?, ?)`,
    );
    const insertGroup = this.db.prepare(`INSERT OR IGNORE INTO approved_groups (group_id, granted_at) VALUES (?, ?)`);
    const insertMetric = this.db.prepare(`INSERT OR IGNORE INTO metrics (name, value, updated_at) VALUES (?, ?, ?)`);

    const importAll = this.db.transaction((records: RecordDump): ImportCounts => {
      const counts: ImportCounts = { cache: 0, entitlements: 0, metrics: 0 };

      for (const entry of records.cache) {
        counts.cache += insertCache.run(
          entry.key,
          encodeResult(entry.result),
          entry.storedAt,
          entry.ttlSeconds,
          entry.storedAt + entry.ttlSeconds * 1000,
        ).changes;
      }

      for (const record of records.entitlements) {
        if (record.kind === "group-approval") {
          counts.entitlements += insertGroup.run(record.subject, record.grantedAt).changes;
        } else if (record.expiresAt !== null) {
          counts.entitlements += insertSubscription.run(record.subject, record.expiresAt, record.grantedAt).changes;
        }
      }

      for (const metric of records.metrics) {
        counts.metrics += insertMetric.run(metric.name, metric.value, metric.updatedAt).changes;
      }

      return counts;
    });

    return importAll(dump);
  }

  async close(): Promise<void> {
    this.db.close();
  }

  private count(table: string): number {
    const row = this.db.prepare<[], CountRow>(`SELECT COUNT(*) AS count FROM ${table}`).get();
    return row?.count ?? 0;
  }
}
