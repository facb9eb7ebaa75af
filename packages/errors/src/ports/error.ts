export type ErrorCode = Lowercase<string>

/**
 * Structured metadata attached to errors (keys, operation names, offending input).
 */
export type ErrorContext = Readonly<Record<string, unknown>>

export interface AppError extends Error {
  /** Error code for programmatic handling */
  readonly code: ErrorCode

  /** Structured metadata for debugging */
  readonly context: ErrorContext

  /** `true` if the same call could succeed later (e.g. the store comes back) */
  readonly isRetryable: boolean

  /**
   * Whether this is an expected runtime failure (true) or a programmer error
   * (false).
   *
   * @remarks
   * - Operational: store unreachable, command rejected, unparseable value.
   * - Non-operational: anything thrown that was never classified.
   *
   * @default true
   */
  readonly isOperational: boolean

  readonly timestamp: Date

  readonly cause?: unknown
}

/**
 * JSON-safe error shape for logs.
 */
export type SerializedError = Readonly<{
  name: string
  code: string
  message: string
  context: Record<string, unknown>
  timestamp: string
  isOperational: boolean
  cause?: SerializedError
  stack?: string
}>
