import type { Operation, StageContext } from "../../ports/instrumented-operation"
import type { Scalar } from "../../ports/scalar"
import { formatCallArgs } from "../codec/format-call-args"
import { encodeScalar } from "../codec/scalar-codec"
import { callKeys } from "./call-keys"

const encoder = new TextEncoder()

/**
 * Appends the call's input display form and its output to the history
 * lists once the call has succeeded, so the i-th input pairs with the i-th
 * output.
 */
export function recordCallHistory<A extends readonly Scalar[], R extends Scalar>(
  next: Operation<A, R>,
  ctx: StageContext,
): Operation<A, R> {
  const { inputs, outputs } = callKeys(ctx.qualifiedName)

  return async (...args: A): Promise<R> => {
    const output = await next(...args)

    await ctx.handle.rPush(inputs, encoder.encode(formatCallArgs(args)))
    await ctx.handle.rPush(outputs, encodeScalar(output))

    return output
  }
}
