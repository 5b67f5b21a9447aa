import type { AppConfig } from "./config"
import { AnalysisEngine, type ClosableFetcher } from "./engine"
import { describeCause } from "./errors"
import { createLoggers, type Loggers } from "./logger"
import { AnalysisCache } from "./services/analysis-cache"
import { AnalysisPipeline } from "./services/analysis-pipeline"
import { BatchCoordinator } from "./services/batch-coordinator"
import { EntitlementGate } from "./services/entitlement-gate"
import { PageFetcher } from "./services/page-fetcher"
import { BUNDLED_CATALOG_URL, CatalogProvider } from "./services/signature-catalog"
import { UsageMetrics } from "./services/usage-metrics"
import type { StorageBackend } from "./storage/backend"
import { PersistenceTier } from "./storage/persistence-tier"

export interface Runtime {
  config: AppConfig
  loggers: Loggers
  storage: PersistenceTier
  gate: EntitlementGate
  engine: AnalysisEngine
  close(): Promise<void>
}

export interface RuntimeDeps {
  loggers?: Loggers
  fetcher?: ClosableFetcher
  connectRemote?: () => Promise<StorageBackend>
  now?: () => number
  /** Set false to skip the periodic retention sweep. */
  retentionSweep?: boolean
}

/**
 * Wires the engine: storage first, then cache and entitlement gate, then the
 * batch coordinator. Nothing is shared through module state.
 */
export async function createRuntime(config: AppConfig, deps: RuntimeDeps = {}): Promise<Runtime> {
  const loggers = deps.loggers ?? createLoggers(config)
  const now = deps.now ?? Date.now
  const catalogs = new CatalogProvider(config.catalogPath ?? BUNDLED_CATALOG_URL)

  const connectRemote = deps.connectRemote
  const storage = await PersistenceTier.open(
    config.storage,
    loggers.app,
    connectRemote ? { connectRemote: () => connectRemote() } : {},
  )

  const cache = new AnalysisCache(storage, loggers.app, { defaultTtlSeconds: config.cacheTtlSeconds, now })
  const gate = new EntitlementGate(storage, loggers.audit, now)
  const usage = new UsageMetrics(storage, loggers.app)
  const fetcher = deps.fetcher ?? new PageFetcher(config.fetch, { now })
  const pipeline = new AnalysisPipeline({ fetcher, cache, catalogs, usage, loggers, now })
  const coordinator = new BatchCoordinator(config.batch, { pipeline, usage, logger: loggers.app, now })
  const engine = new AnalysisEngine({ storage, gate, coordinator, catalogs, fetcher, loggers })

  let sweep: NodeJS.Timeout | null = null
  if (deps.retentionSweep !== false) {
    sweep = setInterval(() => {
      engine.vacuum().catch((error: unknown) => {
        loggers.app.error({ cause: describeCause(error) }, "failed to purge expired records")
      })
    }, config.retentionSweepMs)
    sweep.unref()
  }

  loggers.app.info(
    {
      backend: storage.backendKind,
      fallbackUsed: storage.fallbackUsed,
      catalogVersion: catalogs.current.version,
      workerPoolWidth: config.batch.concurrency,
      cacheTtlSeconds: config.cacheTtlSeconds,
    },
    "paylens engine started",
  )

  return {
    config,
    loggers,
    storage,
    gate,
    engine,
    async close() {
      if (sweep) {
        clearInterval(sweep)
        sweep = null
      }
      await engine.close()
    },
  }
}
