import mongoose, { Schema, type Connection, type Model } from "mongoose"
import type { CacheEntry, EntitlementKind, EntitlementRecord } from "../types"
import {
  decodeResult,
  encodeResult,
  type ImportCounts,
  type MetricRecord,
  type RecordDump,
  type StorageBackend,
  type StorageStats,
} from "./backend"

interface CacheDoc {
  key: string
  resultJson: string
  storedAt: number
  ttlSeconds: number
  expiresAt: Date
}

interface SubscriptionDoc {
  subject: string
  expiresAt: number
  grantedAt: number
}

interface GroupDoc {
  groupId: string
  grantedAt: number
}

interface MetricDoc {
  name: string
  value: number
  updatedAt: number
}

const cacheSchema = new Schema<CacheDoc>(
  {
    key: { type: String, required: true, unique: true },
    resultJson: { type: String, required: true },
    storedAt: { type: Number, required: true },
    ttlSeconds: { type: Number, required: true },
    // server-side TTL index
    expiresAt: { type: Date, required: true, expires: 0 },
  },
  { versionKey: false },
)

const subscriptionSchema = new Schema<SubscriptionDoc>(
  {
    subject: { type: String, required: true, unique: true },
    expiresAt: { type: Number, required: true },
    grantedAt: { type: Number, required: true },
  },
  { versionKey: false },
)

const groupSchema = new Schema<GroupDoc>(
  {
    groupId: { type: String, required: true, unique: true },
    grantedAt: { type: Number, required: true },
  },
  { versionKey: false },
)

const metricSchema = new Schema<MetricDoc>(
  {
    name: { type: String, required: true, unique: true },
    value: { type: Number, required: true },
    updatedAt: { type: Number, required: true },
  },
  { versionKey: false },
)

export interface MongoConnectOptions {
  url: string
  connectTimeoutMs: number
}

/** Networked document store: one collection per record kind. */
export class MongoStore implements StorageBackend {
  readonly kind = "mongo" as const
  private readonly cache: Model<CacheDoc>
  private readonly subscriptions: Model<SubscriptionDoc>
  private readonly groups: Model<GroupDoc>
  private readonly metrics: Model<MetricDoc>

  private constructor(private readonly connection: Connection) {
    this.cache = connection.model<CacheDoc>("CacheEntry", cacheSchema, "cache")
    this.subscriptions = connection.model<SubscriptionDoc>("Subscription", subscriptionSchema, "entitlements")
    this.groups = connection.model<GroupDoc>("ApprovedGroup", groupSchema, "approved_groups")
    this.metrics = connection.model<MetricDoc>("Metric", metricSchema, "metrics")
  }

  static async connect(options: MongoConnectOptions): Promise<MongoStore> {
    const connection = mongoose.createConnection(options.url, {
      serverSelectionTimeoutMS: options.connectTimeoutMs,
      connectTimeoutMS: options.connectTimeoutMs,
    })

    try {
      await connection.asPromise()
    } catch (error) {
      try {
        await connection.close(true)
      } catch (closeError) {
        throw new AggregateError([error, closeError], "MongoDB connection failed and could not be closed")
      }
      throw error
    }

    return new MongoStore(connection)
  }

  async readCache(key: string): Promise<CacheEntry | null> {
    const doc = await this.cache.findOne({ key }).lean().exec()
    if (!doc) {
      return null
    }

    return {
      key: doc.key,
      result: decodeResult(doc.resultJson),
      storedAt: doc.storedAt,
      ttlSeconds: doc.ttlSeconds,
    }
  }

  async writeCache(entry: CacheEntry): Promise<void> {
    await this.cache
      .updateOne({ key: entry.key }, { $set: toCacheDoc(entry) }, { upsert: true })
      .exec()
  }

  async deleteCache(key: string): Promise<void> {
    await this.cache.deleteOne({ key }).exec()
  }

  async readEntitlement(subject: string, kind: EntitlementKind): Promise<EntitlementRecord | null> {
    if (kind === "group-approval") {
      const doc = await this.groups.findOne({ groupId: subject }).lean().exec()
      return doc ? { subject: doc.groupId, kind, expiresAt: null, grantedAt: doc.grantedAt } : null
    }

    const doc = await this.subscriptions.findOne({ subject }).lean().exec()
    return doc ? { subject: doc.subject, kind, expiresAt: doc.expiresAt, grantedAt: doc.grantedAt } : null
  }

  async writeEntitlement(record: EntitlementRecord): Promise<void> {
    if (record.kind === "group-approval") {
      await this.groups
        .updateOne({ groupId: record.subject }, { $set: { grantedAt: record.grantedAt } }, { upsert: true })
        .exec()
      return
    }

    if (record.expiresAt === null) {
      throw new Error(`Subscription for ${record.subject} needs an expiry`)
    }

    await this.subscriptions
      .updateOne(
        { subject: record.subject },
        { $set: { expiresAt: record.expiresAt, grantedAt: record.grantedAt } },
        { upsert: true },
      )
      .exec()
  }

  async deleteEntitlement(subject: string, kind: EntitlementKind): Promise<void> {
    if (kind === "group-approval") {
      await this.groups.deleteOne({ groupId: subject }).exec()
      return
    }

    await this.subscriptions.deleteOne({ subject }).exec()
  }

  async incrementMetric(name: string, by: number, now: number): Promise<void> {
    await this.metrics
      .updateOne({ name }, { $inc: { value: by }, $set: { updatedAt: now } }, { upsert: true })
      .exec()
  }

  async readMetrics(): Promise<MetricRecord[]> {
    const docs = await this.metrics.find().sort({ name: 1 }).lean().exec()
    return docs.map((doc) => ({ name: doc.name, value: doc.value, updatedAt: doc.updatedAt }))
  }

  async stats(): Promise<StorageStats> {
    const [cacheEntries, subscriptions, approvedGroups, metrics] = await Promise.all([
      this.cache.countDocuments().exec(),
      this.subscriptions.countDocuments().exec(),
      this.groups.countDocuments().exec(),
      this.metrics.countDocuments().exec(),
    ])

    return { backend: this.kind, cacheEntries, subscriptions, approvedGroups, metrics }
  }

  async vacuum(now: number): Promise<number> {
    const cache = await this.cache.deleteMany({ expiresAt: { $lte: new Date(now) } }).exec()
    const subscriptions = await this.subscriptions.deleteMany({ expiresAt: { $lte: now } }).exec()
    return cache.deletedCount + subscriptions.deletedCount
  }

  async exportRecords(): Promise<RecordDump> {
    const [cacheDocs, subscriptionDocs, groupDocs, metrics] = await Promise.all([
      this.cache.find().sort({ key: 1 }).lean().exec(),
      this.subscriptions.find().sort({ subject: 1 }).lean().exec(),
      this.groups.find().sort({ groupId: 1 }).lean().exec(),
      this.readMetrics(),
    ])

    return {
      cache: cacheDocs.map((doc) => ({
        key: doc.key,
        result: decodeResult(doc.resultJson),
        storedAt: doc.storedAt,
        ttlSeconds: doc.ttlSeconds,
      })),
      entitlements: [
        ...subscriptionDocs.map(
          (doc): EntitlementRecord => ({
            subject: doc.subject,
            kind: "individual-subscription",
            expiresAt: doc.expiresAt,
            grantedAt: doc.grantedAt,
          }),
        ),
        ...groupDocs.map(
          (doc): EntitlementRecord => ({
            subject: doc.groupId,
            kind: "group-approval",
            expiresAt: null,
            grantedAt: doc.grantedAt,
          }),
        ),
      ],
      metrics,
    }
  }

  async importMissing(dump: RecordDump): Promise<ImportCounts> {
    const counts: ImportCounts = { cache: 0, entitlements: 0, metrics: 0 }

    if (dump.cache.length > 0) {
      const result = await this.cache.bulkWrite(
        dump.cache.map((entry) => ({
          updateOne: {
            filter: { key: entry.key },
            update: { $setOnInsert: toCacheDoc(entry) },
            upsert: true,
          },
        })),
      )
      counts.cache = result.upsertedCount
    }

    const subscriptions = dump.entitlements.flatMap((record) =>
      record.kind === "individual-subscription" && record.expiresAt !== null
        ? [{ subject: record.subject, expiresAt: record.expiresAt, grantedAt: record.grantedAt }]
        : [],
    )
    if (subscriptions.length > 0) {
      const result = await this.subscriptions.bulkWrite(
        subscriptions.map((record) => ({
          updateOne: {
            filter: { subject: record.subject },
            update: { $setOnInsert: { expiresAt: record.expiresAt, grantedAt: record.grantedAt } },
            upsert: true,
          },
        })),
      )
      counts.entitlements += result.upsertedCount
    }

    const groups = dump.entitlements.filter((record) => record.kind === "group-approval")
    if (groups.length > 0) {
      const result = await this.groups.bulkWrite(
        groups.map((record) => ({
          updateOne: {
            filter: { groupId: record.subject },
            update: { $setOnInsert: { grantedAt: record.grantedAt } },
            upsert: true,
          },
        })),
      )
      counts.entitlements += result.upsertedCount
    }

    if (dump.metrics.length > 0) {
      const result = await this.metrics.bulkWrite(
        dump.metrics.map((metric) => ({
          updateOne: {
            filter: { name: metric.name },
            update: { $setOnInsert: { value: metric.value, updatedAt: metric.updatedAt } },
            upsert: true,
          },
        })),
      )
      counts.metrics = result.upsertedCount
    }

    return counts
  }

  async close(): Promise<void> {
    await this.connection.close()
  }
}

function toCacheDoc(entry: CacheEntry): Omit<CacheDoc, "key"> {
  return {
    resultJson: encodeResult(entry.result),
    storedAt: entry.storedAt,
    ttlSeconds: entry.ttlSeconds,
    expiresAt: new Date(entry.storedAt + entry.ttlSeconds * 1000),
  }
}
