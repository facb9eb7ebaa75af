import type { Logger } from "@recall/logger"
import type { StoreHandle } from "@recall/store"
import type { Scalar } from "./scalar"

export type Operation<A extends readonly Scalar[], R extends Scalar> = (
  ...args: A
) => Promise<R>

/**
 * What a stage needs to record calls of one operation.
 */
export type StageContext = {
  qualifiedName: string
  handle: StoreHandle
  logger: Logger
}

/**
 * Wraps an operation with one concern (counting, history, ...) and returns
 * an operation with the same signature.
 */
export type OperationStage = <A extends readonly Scalar[], R extends Scalar>(
  next: Operation<A, R>,
  ctx: StageContext,
) => Operation<A, R>

/**
 * An operation whose calls are recorded in the store.
 *
 * Carries the name its records are keyed by and the handle they are written
 * to, so the history can be read back from the operation alone.
 */
export type InstrumentedOperation<
  A extends readonly Scalar[] = readonly Scalar[],
  R extends Scalar = Scalar,
> = Operation<A, R> & {
  readonly qualifiedName: string
  readonly handle: StoreHandle
}
