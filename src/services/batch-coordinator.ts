import { randomUUID } from "node:crypto"
import type pino from "pino"
import type { BatchSettings } from "../config"
import { AnalysisError, BatchTooLargeError, describeCause } from "../errors"
import type { AnalysisRequest, AnalysisResult, RequesterContext } from "../types"
import {
  type AnalysisPipeline,
  type PipelineOutcome,
  createAnalysisRequest,
  isRetriableFailure,
} from "./analysis-pipeline"
import type { UsageMetrics } from "./usage-metrics"
import { TaskCancelledError, WorkerPool } from "./worker-pool"

export type BatchState = "pending" | "running" | "completed" | "partially-failed" | "cancelled"

export interface BatchProgress {
  submitted: number
  completed: number
  succeeded: number
  failed: number
}

export interface UnitError {
  code: string
  message: string
}

interface BatchEventBase {
  jobId: string
  index: number
  url: string
  cached: boolean
  progress: BatchProgress
}

export type BatchEvent =
  | (BatchEventBase & { outcome: "succeeded"; result: AnalysisResult })
  | (BatchEventBase & { outcome: "failed"; error: UnitError; result: AnalysisResult | null })

export interface BatchSummary {
  jobId: string
  state: BatchState
  progress: BatchProgress
  createdAt: number
  finishedAt: number
  events: BatchEvent[]
}

type UnitOutcome =
  | { kind: "analyzed"; outcome: PipelineOutcome }
  | { kind: "rejected"; error: UnitError }

interface BatchUnit {
  index: number
  input: string
  request: AnalysisRequest | null
  error: UnitError | null
}

export interface SubmitOptions {
  onEvent?: (event: BatchEvent) => void
}

class EventChannel<T> implements AsyncIterable<T> {
  private readonly buffer: T[] = []
  private readonly waiters: Array<(result: IteratorResult<T>) => void> = []
  private closed = false

  push(value: T): void {
    const waiter = this.waiters.shift()
    if (waiter) {
      waiter({ value, done: false })
      return
    }
    this.buffer.push(value)
  }

  close(): void {
    this.closed = true
    for (const waiter of this.waiters.splice(0)) {
      waiter({ value: undefined, done: true })
    }
  }

  async *[Symbol.asyncIterator](): AsyncIterator<T> {
    while (true) {
      const buffered = this.buffer.splice(0)
      if (buffered.length > 0) {
        yield* buffered
        continue
      }

      if (this.closed) {
        return
      }

      const next = await new Promise<IteratorResult<T>>((resolve) => this.waiters.push(resolve))
      if (next.done) {
        return
      }
      yield next.value
    }
  }
}

/**
 * A submitted batch. Iterate it for progress events as units finish; `done`
 * resolves with the summary once every unit has finished or the job was
 * cancelled.
 */
export class BatchJob implements AsyncIterable<BatchEvent> {
  readonly id = randomUUID()
  readonly createdAt: number
  readonly requests: readonly AnalysisRequest[]
  readonly done: Promise<BatchSummary>

  private currentState: BatchState = "pending"
  private readonly counters: BatchProgress
  private readonly controller = new AbortController()
  private readonly channel = new EventChannel<BatchEvent>()
  private readonly events: BatchEvent[] = []
  private resolveDone: (summary: BatchSummary) => void = () => {}

  constructor(
    units: readonly BatchUnit[],
    readonly requester: RequesterContext,
    private readonly onEvent: ((event: BatchEvent) => void) | undefined,
    private readonly logger: pino.Logger,
    createdAt: number,
  ) {
    this.createdAt = createdAt
    this.requests = units.flatMap((unit) => (unit.request ? [unit.request] : []))
    this.counters = { submitted: units.length, completed: 0, succeeded: 0, failed: 0 }
    this.done = new Promise<BatchSummary>((resolve) => {
      this.resolveDone = resolve
    })
  }

  get state(): BatchState {
    return this.currentState
  }

  get progress(): BatchProgress {
    return { ...this.counters }
  }

  get signal(): AbortSignal {
    return this.controller.signal
  }

  get cancelled(): boolean {
    return this.controller.signal.aborted
  }

  /** Stops dispatching queued units; in-flight results are discarded. */
  cancel(): void {
    if (this.currentState === "pending" || this.currentState === "running") {
      this.controller.abort()
    }
  }

  [Symbol.asyncIterator](): AsyncIterator<BatchEvent> {
    return this.channel[Symbol.asyncIterator]()
  }

  /** @internal */
  start(): void {
    this.currentState = "running"
  }

  /** @internal */
  record(unit: BatchUnit, outcome: UnitOutcome): void {
    if (this.cancelled || this.currentState !== "running") {
      return
    }

    const base = { jobId: this.id, index: unit.index, url: unit.request?.url ?? unit.input }
    let event: BatchEvent

    if (outcome.kind === "rejected") {
      this.counters.failed += 1
      this.counters.completed += 1
      event = { ...base, cached: false, outcome: "failed", error: outcome.error, result: null, progress: this.progress }
    } else if (outcome.outcome.result.status === "errored") {
      const failure = outcome.outcome.result.error
      this.counters.failed += 1
      this.counters.completed += 1
      event = {
        ...base,
        cached: false,
        outcome: "failed",
        error: { code: failure?.code ?? "FetchError", message: failure?.message ?? "Fetch failed" },
        result: outcome.outcome.result,
        progress: this.progress,
      }
    } else {
      this.counters.succeeded += 1
      this.counters.completed += 1
      event = {
        ...base,
        cached: outcome.outcome.cached,
        outcome: "succeeded",
        result: outcome.outcome.result,
        progress: this.progress,
      }
    }

    this.events.push(event)
    this.channel.push(event)
    try {
      this.onEvent?.(event)
    } catch (error) {
      this.logger.warn({ jobId: this.id, index: unit.index, cause: describeCause(error) }, "batch event listener failed")
    }
  }

  /** @internal */
  finish(now: number): BatchSummary {
    if (this.cancelled) {
      this.currentState = "cancelled"
    } else {
      this.currentState = this.counters.failed > 0 ? "partially-failed" : "completed"
    }

    const summary: BatchSummary = {
      jobId: this.id,
      state: this.currentState,
      progress: this.progress,
      createdAt: this.createdAt,
      finishedAt: now,
      events: [...this.events],
    }

    this.channel.close()
    this.resolveDone(summary)
    return summary
  }
}

interface BatchCoordinatorDeps {
  pipeline: AnalysisPipeline
  usage: UsageMetrics
  logger: pino.Logger
  now?: () => number
}

/**
 * Fans batches out over one shared worker pool, so the pool width caps
 * concurrent fetches across all jobs. A unit's failure never stops its
 * siblings.
 */
export class BatchCoordinator {
  private readonly pool: WorkerPool
  private readonly now: () => number

  constructor(
    private readonly settings: BatchSettings,
    private readonly deps: BatchCoordinatorDeps,
  ) {
    this.pool = new WorkerPool({ concurrency: settings.concurrency })
    this.now = deps.now ?? Date.now
  }

  submit(urls: readonly string[], requester: RequesterContext, options: SubmitOptions = {}): BatchJob {
    if (urls.length > this.settings.maxUrls) {
      throw new BatchTooLargeError(urls.length, this.settings.maxUrls)
    }

    const createdAt = this.now()
    const units = urls.map((input, index): BatchUnit => {
      try {
        return { index, input, request: createAnalysisRequest(input, requester, createdAt), error: null }
      } catch (error) {
        return { index, input, request: null, error: toUnitError(error) }
      }
    })

    const job = new BatchJob(units, requester, options.onEvent, this.deps.logger, createdAt)
    this.run(job, units).catch((error: unknown) => {
      this.deps.logger.error({ jobId: job.id, cause: describeCause(error) }, "batch aborted unexpectedly")
      job.finish(this.now())
    })
    return job
  }

  /**
   * Analyzes one request on the shared pool. A request whose signal aborts
   * while queued still runs the pipeline, which reports the abort in-band.
   */
  async analyze(request: AnalysisRequest, signal?: AbortSignal): Promise<PipelineOutcome> {
    try {
      return await this.pool.schedule(() => this.deps.pipeline.run(request, signal), signal)
    } catch (error) {
      if (error instanceof TaskCancelledError) {
        return this.deps.pipeline.run(request, signal)
      }
      throw error
    }
  }

  private async run(job: BatchJob, units: readonly BatchUnit[]): Promise<void> {
    await this.deps.usage.recordBatch()
    job.start()
    this.deps.logger.info(
      { jobId: job.id, requesterId: job.requester.requesterId, submitted: units.length },
      "batch started",
    )

    await Promise.all(
      units.map(async (unit) => {
        if (!unit.request) {
          job.record(unit, { kind: "rejected", error: unit.error ?? { code: "MalformedURL", message: unit.input } })
          return
        }

        const request = unit.request
        let outcome: UnitOutcome
        try {
          const analyzed = await this.pool.schedule(() => this.process(request, job.signal), job.signal)
          outcome = { kind: "analyzed", outcome: analyzed }
        } catch (error) {
          if (error instanceof TaskCancelledError) {
            return
          }
          this.deps.logger.error({ jobId: job.id, url: request.url, cause: describeCause(error) }, "batch unit failed")
          outcome = { kind: "rejected", error: toUnitError(error) }
        }
        job.record(unit, outcome)
      }),
    )

    const summary = job.finish(this.now())
    this.deps.logger.info(
      { jobId: job.id, state: summary.state, progress: summary.progress, durationMs: summary.finishedAt - job.createdAt },
      "batch finished",
    )
  }

  private async process(request: AnalysisRequest, signal: AbortSignal): Promise<PipelineOutcome> {
    for (let attempt = 0; ; attempt += 1) {
      const outcome = await this.deps.pipeline.run(request, signal)
      const retry =
        outcome.result.status === "errored" &&
        isRetriableFailure(outcome.result.error) &&
        attempt < this.settings.retryMax &&
        !signal.aborted

      if (!retry) {
        return outcome
      }

      this.deps.logger.debug({ url: request.url, attempt: attempt + 1 }, "retrying failed fetch")
    }
  }
}

function toUnitError(error: unknown): UnitError {
  if (error instanceof AnalysisError) {
    return { code: error.code, message: error.message }
  }

  return { code: "InternalError", message: describeCause(error) }
}
