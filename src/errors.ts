import type { FetchFailure, FetchFailureCode } from "./types"

export abstract class AnalysisError extends Error {
  abstract readonly code: string
}

export class MalformedUrlError extends AnalysisError {
  readonly code = "MalformedURL"

  constructor(readonly input: string, reason: string) {
    super(`Malformed URL '${input}': ${reason}`)
    this.name = "MalformedUrlError"
  }
}

export class FetchTimeoutError extends AnalysisError {
  readonly code = "FetchTimeout"

  constructor(readonly url: string, readonly timeoutMs: number) {
    super(`Fetching ${url} exceeded ${timeoutMs}ms`)
    this.name = "FetchTimeoutError"
  }
}

export class TooManyRedirectsError extends AnalysisError {
  readonly code = "TooManyRedirects"

  constructor(readonly url: string, readonly maxRedirects: number) {
    super(`Fetching ${url} followed more than ${maxRedirects} redirects`)
    this.name = "TooManyRedirectsError"
  }
}

export class FetchError extends AnalysisError {
  readonly code = "FetchError"

  constructor(readonly url: string, message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = "FetchError"
  }
}

export class ClassificationError extends AnalysisError {
  readonly code = "ClassificationError"

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = "ClassificationError"
  }
}

export class PersistenceError extends AnalysisError {
  readonly code = "PersistenceError"

  constructor(
    readonly operation: string,
    readonly backend: string,
    options?: { cause?: unknown },
  ) {
    super(`Storage operation '${operation}' failed on ${backend} backend: ${describeCause(options?.cause)}`, options)
    this.name = "PersistenceError"
  }
}

export class BatchTooLargeError extends AnalysisError {
  readonly code = "BatchTooLarge"

  constructor(readonly size: number, readonly maxUrls: number) {
    super(`Batch of ${size} URLs exceeds the limit of ${maxUrls}`)
    this.name = "BatchTooLargeError"
  }
}

export function describeCause(cause: unknown): string {
  if (cause instanceof Error) {
    return cause.message
  }

  if (cause === undefined) {
    return "unknown error"
  }

  return String(cause)
}

export function toFetchFailure(error: unknown): FetchFailure {
  if (
    error instanceof FetchTimeoutError ||
    error instanceof TooManyRedirectsError ||
    error instanceof FetchError
  ) {
    const code: FetchFailureCode = error.code
    return error.cause === undefined
      ? { code, message: error.message }
      : { code, message: error.message, cause: describeCause(error.cause) }
  }

  return {
    code: "FetchError",
    message: "Unexpected fetch failure",
    cause: describeCause(error),
  }
}
