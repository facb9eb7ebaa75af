import { BaseError } from "@recall/errors"

export type ConnectionErrorCode = "connection_error"

/**
 * The store could not be reached, at connect time or while running a command.
 */
export class ConnectionError extends BaseError<ConnectionErrorCode> {
  static unreachable(input: { command: string; key?: string; cause?: unknown }): ConnectionError {
    return new ConnectionError(`Store unreachable while running ${input.command}`, {
      code: "connection_error",
      context: {
        command: input.command,
        ...(input.key !== undefined && { key: input.key }),
      },
      cause: input.cause,
      isRetryable: true,
    })
  }

  static notConnected(command: string): ConnectionError {
    return new ConnectionError(`Store is not connected; cannot run ${command}`, {
      code: "connection_error",
      context: { command },
      isRetryable: true,
    })
  }
}

export type StoreErrorCode = "store_error"

/**
 * The store received a command and rejected it.
 */
export class StoreError extends BaseError<StoreErrorCode> {
  static rejected(input: { command: string; key?: string; cause: unknown }): StoreError {
    const reason = input.cause instanceof Error ? input.cause.message : String(input.cause)

    return new StoreError(`Store rejected ${input.command}: ${reason}`, {
      code: "store_error",
      context: {
        command: input.command,
        ...(input.key !== undefined && { key: input.key }),
      },
      cause: input.cause,
    })
  }

  static wrongType(command: string, key: string): StoreError {
    return new StoreError(
      `${command} failed: WRONGTYPE Operation against a key holding the wrong kind of value`,
      { code: "store_error", context: { command, key } },
    )
  }

  static notAnInteger(key: string): StoreError {
    return new StoreError("INCR failed: value is not an integer or out of range", {
      code: "store_error",
      context: { command: "INCR", key },
    })
  }

  static capacityExceeded(maxEntries: number): StoreError {
    return new StoreError(`SET failed: max entries (${maxEntries}) exceeded`, {
      code: "store_error",
      context: { command: "SET", maxEntries },
    })
  }
}
