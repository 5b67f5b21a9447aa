import type {
  BackendKind,
  ImportCounts,
  MetricRecord,
  RecordDump,
  StorageBackend,
  StorageStats,
} from "../../src/storage/backend"
import type { CacheEntry, EntitlementKind, EntitlementRecord } from "../../src/types"

type Operation = Exclude<keyof StorageBackend, "kind">

/**
 * In-process stand-in for the networked store. Operations named in `failing`
 * reject; operations named in `hanging` never settle.
 */
export class MemoryStore implements StorageBackend {
  readonly cache = new Map<string, CacheEntry>()
  readonly subscriptions = new Map<string, EntitlementRecord>()
  readonly groups = new Map<string, EntitlementRecord>()
  readonly metrics = new Map<string, MetricRecord>()
  readonly failing = new Set<Operation>()
  readonly hanging = new Set<Operation>()
  closed = false

  constructor(readonly kind: BackendKind = "mongo") {}

  async readCache(key: string): Promise<CacheEntry | null> {
    await this.gate("readCache")
    return this.cache.get(key) ?? null
  }

  async writeCache(entry: CacheEntry): Promise<void> {
    await this.gate("writeCache")
    this.cache.set(entry.key, entry)
  }

  async deleteCache(key: string): Promise<void> {
    await this.gate("deleteCache")
    this.cache.delete(key)
  }

  async readEntitlement(subject: string, kind: EntitlementKind): Promise<EntitlementRecord | null> {
    await this.gate("readEntitlement")
    return this.table(kind).get(subject) ?? null
  }

  async writeEntitlement(record: EntitlementRecord): Promise<void> {
    await this.gate("writeEntitlement")
    this.table(record.kind).set(record.subject, record)
  }

  async deleteEntitlement(subject: string, kind: EntitlementKind): Promise<void> {
    await this.gate("deleteEntitlement")
    this.table(kind).delete(subject)
  }

  async incrementMetric(name: string, by: number, now: number): Promise<void> {
    await this.gate("incrementMetric")
    const current = this.metrics.get(name)?.value ?? 0
    this.metrics.set(name, { name, value: current + by, updatedAt: now })
  }

  async readMetrics(): Promise<MetricRecord[]> {
    await this.gate("readMetrics")
    return [...this.metrics.values()].sort((left, right) => left.name.localeCompare(right.name))
  }

  async stats(): Promise<StorageStats> {
    await this.gate("stats")
    return {
      backend: this.kind,
      cacheEntries: this.cache.size,
      subscriptions: this.subscriptions.size,
      approvedGroups: this.groups.size,
      metrics: this.metrics.size,
    }
  }

  async vacuum(now: number): Promise<number> {
    await this.gate("vacuum")
    let removed = 0
    for (const [key, entry] of this.cache) {
      if (entry.storedAt + entry.ttlSeconds * 1000 <= now) {
        this.cache.delete(key)
        removed += 1
      }
    }
    for (const [subject, record] of this.subscriptions) {
      if (record.expiresAt !== null && record.expiresAt <= now) {
        this.subscriptions.delete(subject)
        removed += 1
      }
    }
    return removed
  }

  async exportRecords(): Promise<RecordDump> {
    await this.gate("exportRecords")
    return {
      cache: [...this.cache.values()],
      entitlements: [...this.subscriptions.values(), ...this.groups.values()],
      metrics: [...this.metrics.values()],
    }
  }

  async importMissing(dump: RecordDump): Promise<ImportCounts> {
    await this.gate("importMissing")
    const counts: ImportCounts = { cache: 0, entitlements: 0, metrics: 0 }

    for (const entry of dump.cache) {
      if (!this.cache.has(entry.key)) {
        this.cache.set(entry.key, entry)
        counts.cache += 1
      }
    }

    for (const record of dump.entitlements) {
      const table = this.table(record.kind)
      if (!table.has(record.subject)) {
        table.set(record.subject, record)
        counts.entitlements += 1
      }
    }

    for (const metric of dump.metrics) {
      if (!this.metrics.has(metric.name)) {
        this.metrics.set(metric.name, metric)
        counts.metrics += 1
      }
    }

    return counts
  }

  async close(): Promise<void> {
    await this.gate("close")
    this.closed = true
  }

  private table(kind: EntitlementKind): Map<string, EntitlementRecord> {
    return kind === "group-approval" ? this.groups : this.subscriptions
  }

  private async gate(operation: Operation): Promise<void> {
    if (this.hanging.has(operation)) {
      await new Promise<never>(() => {})
    }

    if (this.failing.has(operation)) {
      throw new Error(`${operation} unavailable`)
    }
  }
}
