/** Machine-readable error code, snake_case by convention (e.g. `load_failed`). */
export type ErrorCode = Lowercase<string>

/** Structured data carried by an error (aliases, locations, issues, ...). */
export type ErrorContext = Readonly<Record<string, unknown>>

export interface AppError extends Error {
  readonly code: ErrorCode

  readonly context: ErrorContext

  /** `true` when repeating the failed operation later may succeed. */
  readonly isRetryable: boolean

  /**
   * `true` for expected runtime failures (unreachable storage, malformed payload,
   * conflicting context providers); `false` for programmer errors and broken
   * invariants.
   */
  readonly isOperational: boolean

  readonly timestamp: Date

  readonly cause?: unknown
}

/** JSON-safe shape of an error, used by log serializers. */
export type SerializedError = Readonly<{
  name: string
  code: string
  message: string
  context: Record<string, unknown>
  timestamp: string
  isOperational: boolean
  isRetryable: boolean
  cause?: SerializedError
  stack?: string
}>
