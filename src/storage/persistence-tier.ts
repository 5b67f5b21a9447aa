import { existsSync } from "node:fs"
import type pino from "pino"
import type { StorageSettings } from "../config"
import { describeCause, PersistenceError } from "../errors"
import type { CacheEntry, EntitlementKind, EntitlementRecord } from "../types"
import type { ImportCounts, MetricRecord, StorageBackend, StorageStats } from "./backend"
import { MongoStore } from "./mongo-store"
import { SqliteStore } from "./sqlite-store"

interface PersistenceTierDeps {
  connectRemote?: (settings: StorageSettings) => Promise<StorageBackend>
  openLocal?: (path: string) => StorageBackend
  localExists?: (path: string) => boolean
}

/**
 * Copies every local record into the remote store unless its key is already
 * there. Running it again inserts nothing.
 */
export async function migrateRecords(source: StorageBackend, target: StorageBackend): Promise<ImportCounts> {
  const dump = await source.exportRecords()
  return target.importMissing(dump)
}

/**
 * Storage façade over the backend chosen once at startup. Every call is
 * bounded by the operation timeout and failures surface as PersistenceError.
 */
export class PersistenceTier {
  constructor(
    readonly backend: StorageBackend,
    private readonly operationTimeoutMs: number,
    readonly fallbackUsed = false,
  ) {}

  static async open(
    settings: StorageSettings,
    logger: pino.Logger,
    deps: PersistenceTierDeps = {},
  ): Promise<PersistenceTier> {
    const connectRemote =
      deps.connectRemote ??
      ((value: StorageSettings) =>
        MongoStore.connect({ url: value.mongoUrl, connectTimeoutMs: value.connectTimeoutMs }))
    const openLocal = deps.openLocal ?? ((path: string) => new SqliteStore(path))
    const localExists = deps.localExists ?? existsSync

    if (settings.preferLocal || !settings.mongoUrl) {
      logger.info(
        { backend: "sqlite", dbPath: settings.dbPath, preferLocal: settings.preferLocal },
        "using local storage backend",
      )
      return new PersistenceTier(openLocal(settings.dbPath), settings.operationTimeoutMs)
    }

    let remote: StorageBackend
    try {
      remote = await connectRemote(settings)
    } catch (error) {
      logger.warn(
        { backend: "sqlite", dbPath: settings.dbPath, cause: describeCause(error) },
        "networked storage unreachable, falling back to local storage",
      )
      return new PersistenceTier(openLocal(settings.dbPath), settings.operationTimeoutMs, true)
    }

    logger.info({ backend: remote.kind }, "using networked storage backend")

    if (settings.migrateOnStartup && localExists(settings.dbPath)) {
      const local = openLocal(settings.dbPath)
      try {
        const imported = await migrateRecords(local, remote)
        logger.info({ imported }, "migrated local records to networked storage")
      } catch (error) {
        logger.error({ cause: describeCause(error) }, "local record migration failed")
      } finally {
        await local.close()
      }
    }

    return new PersistenceTier(remote, settings.operationTimeoutMs)
  }

  get backendKind(): StorageBackend["kind"] {
    return this.backend.kind
  }

  readCache(key: string): Promise<CacheEntry | null> {
    return this.run("readCache", () => this.backend.readCache(key))
  }

  writeCache(entry: CacheEntry): Promise<void> {
    return this.run("writeCache", () => this.backend.writeCache(entry))
  }

  deleteCache(key: string): Promise<void> {
    return this.run("deleteCache", () => this.backend.deleteCache(key))
  }

  readEntitlement(subject: string, kind: EntitlementKind): Promise<EntitlementRecord | null> {
    return this.run("readEntitlement", () => this.backend.readEntitlement(subject, kind))
  }

  writeEntitlement(record: EntitlementRecord): Promise<void> {
    return this.run("writeEntitlement", () => this.backend.writeEntitlement(record))
  }

  deleteEntitlement(subject: string, kind: EntitlementKind): Promise<void> {
    return this.run("deleteEntitlement", () => this.backend.deleteEntitlement(subject, kind))
  }

  incrementMetric(name: string, by = 1, now = Date.now()): Promise<void> {
    return this.run("incrementMetric", () => this.backend.incrementMetric(name, by, now))
  }

  readMetrics(): Promise<MetricRecord[]> {
    return this.run("readMetrics", () => this.backend.readMetrics())
  }

  stats(): Promise<StorageStats> {
    return this.run("stats", () => this.backend.stats())
  }

  vacuum(now = Date.now()): Promise<number> {
    return this.run("vacuum", () => this.backend.vacuum(now))
  }

  async migrateFrom(source: StorageBackend): Promise<ImportCounts> {
    return this.run("migrate", () => migrateRecords(source, this.backend))
  }

  close(): Promise<void> {
    return this.run("close", () => this.backend.close())
  }

  private async run<T>(operation: string, task: () => Promise<T>): Promise<T> {
    let timer: NodeJS.Timeout | undefined
    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(
        () => reject(new Error(`timed out after ${this.operationTimeoutMs}ms`)),
        this.operationTimeoutMs,
      )
    })

    try {
      return await Promise.race([task(), timeout])
    } catch (error) {
      if (error instanceof PersistenceError) {
        throw error
      }
      throw new PersistenceError(operation, this.backend.kind, { cause: error })
    } finally {
      clearTimeout(timer)
    }
  }
}
