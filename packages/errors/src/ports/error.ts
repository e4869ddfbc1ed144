export type ErrorCode = Lowercase<string>

/**
 * Structured metadata attached to an error (bucket, key, line number, ...).
 */
export type ErrorContext = Readonly<Record<string, unknown>>

export interface AppError extends Error {
  /** Stable, lowercase code callers branch on */
  readonly code: ErrorCode

  readonly context: ErrorContext

  /** `true` when repeating the same call may succeed */
  readonly isRetryable: boolean

  /**
   * `true` for expected runtime failures (bad input, missing object, denied
   * access), `false` for programmer errors and broken invariants.
   *
   * @default true
   */
  readonly isOperational: boolean

  readonly timestamp: Date

  readonly cause?: unknown
}

/**
 * JSON-safe error shape for logs and transport.
 */
export type SerializedError = Readonly<{
  name: string
  code: string
  message: string
  context: Record<string, unknown>
  timestamp: string
  isRetryable: boolean
  isOperational: boolean
  cause?: SerializedError
  stack?: string
}>
