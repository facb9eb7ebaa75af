import { type AppError, isAppError } from "@recall/errors"
import { ErrorReply } from "redis"
import { ConnectionError, StoreError } from "../../core/store-errors"

export type RedisCommandContext = {
  command: string
  key?: string
}

/**
 * Maps a node-redis failure onto the store's error types.
 *
 * - Already classified errors pass through.
 * - A server error reply means the command reached Redis and was rejected.
 * - Anything else (refused socket, closed or offline client, timeout) means
 *   the store could not be reached.
 */
export function translateRedisError(err: unknown, ctx: RedisCommandContext): AppError {
  if (isAppError(err)) return err

  if (err instanceof ErrorReply) {
    return StoreError.rejected({ ...ctx, cause: err })
  }

  return ConnectionError.unreachable({ ...ctx, cause: err })
}
