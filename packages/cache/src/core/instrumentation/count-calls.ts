import { toAppError } from "@recall/errors"
import type { Operation, StageContext } from "../../ports/instrumented-operation"
import type { Scalar } from "../../ports/scalar"
import { callKeys } from "./call-keys"

/**
 * Increments the operation's call counter before every call, including
 * calls that go on to fail.
 */
export function countCalls<A extends readonly Scalar[], R extends Scalar>(
  next: Operation<A, R>,
  ctx: StageContext,
): Operation<A, R> {
  const { counter } = callKeys(ctx.qualifiedName)

  return async (...args: A): Promise<R> => {
    await ctx.handle.incr(counter)

    try {
      return await next(...args)
    } catch (err) {
      ctx.logger.warn("Call counted but did not complete", {
        operation: ctx.qualifiedName,
        code: toAppError(err).code,
      })
      throw err
    }
  }
}
