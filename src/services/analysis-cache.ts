import type pino from "pino"
import { describeCause } from "../errors"
import type { PersistenceTier } from "../storage/persistence-tier"
import type { AnalysisResult, CacheEntry } from "../types"

interface AnalysisCacheOptions {
  defaultTtlSeconds: number
  now?: () => number
}

/**
 * Read-through view of cached analysis results keyed by normalized URL.
 * Storage failures never reach the caller: a failed read is a miss and a
 * failed write means the result is simply not cached this round.
 */
export class AnalysisCache {
  private readonly defaultTtlSeconds: number
  private readonly now: () => number

  constructor(
    private readonly storage: PersistenceTier,
    private readonly logger: pino.Logger,
    options: AnalysisCacheOptions,
  ) {
    this.defaultTtlSeconds = options.defaultTtlSeconds
    this.now = options.now ?? Date.now
  }

  async get(key: string, catalogVersion?: string): Promise<AnalysisResult | null> {
    let entry: CacheEntry | null
    try {
      entry = await this.storage.readCache(key)
    } catch (error) {
      this.logger.warn({ key, cause: describeCause(error) }, "cache read failed, treating as miss")
      return null
    }

    if (!entry) {
      return null
    }

    const expired = entry.storedAt + entry.ttlSeconds * 1000 <= this.now()
    const outdated = catalogVersion !== undefined && entry.result.catalogVersion !== catalogVersion
    if (expired || outdated) {
      await this.evict(key, expired ? "expired" : "catalog-changed")
      return null
    }

    return entry.result
  }

  /** Stores `result` and returns the copy stamped with its TTL. */
  async put(key: string, result: AnalysisResult, ttlSeconds = this.defaultTtlSeconds): Promise<AnalysisResult> {
    const stored: AnalysisResult = Object.freeze({ ...result, ttlSeconds })

    try {
      await this.storage.writeCache({
        key,
        result: stored,
        storedAt: this.now(),
        ttlSeconds,
      })
    } catch (error) {
      this.logger.warn({ key, cause: describeCause(error) }, "cache write failed, result not cached")
    }

    return stored
  }

  private async evict(key: string, reason: string): Promise<void> {
    try {
      await this.storage.deleteCache(key)
    } catch (error) {
      this.logger.warn({ key, reason, cause: describeCause(error) }, "lazy cache eviction failed")
    }
  }
}
