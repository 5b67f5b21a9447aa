import type pino from "pino"
import { describeCause } from "../errors"
import type { PersistenceTier } from "../storage/persistence-tier"

export const METRIC_ANALYSES_TOTAL = "analyses.total"
export const METRIC_CACHE_HITS = "analyses.cache_hits"
export const METRIC_BATCHES_TOTAL = "batches.total"

export function requesterMetric(requesterId: string): string {
  return `analyses.requester.${requesterId}`
}

/** Usage counters are best-effort: a failed increment is logged, not raised. */
export class UsageMetrics {
  constructor(
    private readonly storage: PersistenceTier,
    private readonly logger: pino.Logger,
  ) {}

  async recordAnalysis(requesterId: string, cached: boolean): Promise<void> {
    const names = [METRIC_ANALYSES_TOTAL, requesterMetric(requesterId)]
    if (cached) {
      names.push(METRIC_CACHE_HITS)
    }

    await this.increment(names)
  }

  async recordBatch(): Promise<void> {
    await this.increment([METRIC_BATCHES_TOTAL])
  }

  private async increment(names: string[]): Promise<void> {
    const now = Date.now()
    const results = await Promise.allSettled(names.map((name) => this.storage.incrementMetric(name, 1, now)))

    results.forEach((result, index) => {
      if (result.status === "rejected") {
        this.logger.warn(
          { metric: names[index], cause: describeCause(result.reason) },
          "failed to record usage metric",
        )
      }
    })
  }
}
