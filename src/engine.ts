import type { Loggers } from "./logger"
import type { MetricRecord, StorageStats } from "./storage/backend"
import type { PersistenceTier } from "./storage/persistence-tier"
import { type PageFetcherLike, createAnalysisRequest } from "./services/analysis-pipeline"
import type { BatchCoordinator, BatchJob, SubmitOptions } from "./services/batch-coordinator"
import type { EntitlementGate } from "./services/entitlement-gate"
import type { CatalogProvider } from "./services/signature-catalog"
import type { AnalysisResult, EntitlementDecision, RequesterContext } from "./types"

type Denied = { kind: "denied"; decision: Extract<EntitlementDecision, { allowed: false }> }

export type AnalyzeOutcome = Denied | { kind: "analyzed"; result: AnalysisResult; cached: boolean }

export type BatchOutcome = Denied | { kind: "accepted"; job: BatchJob }

export interface EngineStats {
  storage: StorageStats
  metrics: MetricRecord[]
  catalogVersion: string
  fallbackUsed: boolean
}

export interface ClosableFetcher extends PageFetcherLike {
  close(): Promise<void>
}

export interface AnalysisEngineDeps {
  storage: PersistenceTier
  gate: EntitlementGate
  coordinator: BatchCoordinator
  catalogs: CatalogProvider
  fetcher: ClosableFetcher
  loggers: Loggers
}

/**
 * Entry point for the surrounding application. Every analysis is gated on the
 * requester's entitlement before any URL is touched, and single and batch
 * analyses share one worker pool.
 */
export class AnalysisEngine {
  private closed = false

  constructor(private readonly deps: AnalysisEngineDeps) {}

  checkEntitlement(requester: RequesterContext): Promise<EntitlementDecision> {
    return this.deps.gate.authorize(requester.requesterId, requester.groupId)
  }

  async analyze(url: string, requester: RequesterContext, signal?: AbortSignal): Promise<AnalyzeOutcome> {
    const decision = await this.checkEntitlement(requester)
    if (!decision.allowed) {
      return { kind: "denied", decision }
    }

    const request = createAnalysisRequest(url, requester)
    const outcome = await this.deps.coordinator.analyze(request, signal)
    return { kind: "analyzed", result: outcome.result, cached: outcome.cached }
  }

  async analyzeBatch(
    urls: readonly string[],
    requester: RequesterContext,
    options?: SubmitOptions,
  ): Promise<BatchOutcome> {
    const decision = await this.checkEntitlement(requester)
    if (!decision.allowed) {
      return { kind: "denied", decision }
    }

    return { kind: "accepted", job: this.deps.coordinator.submit(urls, requester, options) }
  }

  reloadCatalog(): string {
    const previous = this.deps.catalogs.current.version
    const catalog = this.deps.catalogs.reload()
    this.deps.loggers.app.info(
      { previous, version: catalog.version, rules: catalog.rules.length },
      "signature catalog reloaded",
    )
    return catalog.version
  }

  async stats(): Promise<EngineStats> {
    const [storage, metrics] = await Promise.all([this.deps.storage.stats(), this.deps.storage.readMetrics()])
    return {
      storage,
      metrics,
      catalogVersion: this.deps.catalogs.current.version,
      fallbackUsed: this.deps.storage.fallbackUsed,
    }
  }

  async vacuum(): Promise<number> {
    const removed = await this.deps.storage.vacuum()
    this.deps.loggers.app.info({ removed, backend: this.deps.storage.backendKind }, "storage vacuumed")
    return removed
  }

  async close(): Promise<void> {
    if (this.closed) {
      return
    }
    this.closed = true

    const results = await Promise.allSettled([this.deps.fetcher.close(), this.deps.storage.close()])
    const failures = results.flatMap((result) => (result.status === "rejected" ? [result.reason] : []))
    if (failures.length > 0) {
      throw new AggregateError(failures, "Engine shutdown failed")
    }

    this.deps.loggers.app.info("engine closed")
  }
}
