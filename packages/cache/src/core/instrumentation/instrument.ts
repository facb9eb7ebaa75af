import type { Logger } from "@recall/logger"
import type { StoreHandle } from "@recall/store"
import type {
  InstrumentedOperation,
  Operation,
  OperationStage,
  StageContext,
} from "../../ports/instrumented-operation"
import type { Scalar } from "../../ports/scalar"
import { countCalls } from "./count-calls"
import { recordCallHistory } from "./record-call-history"

/**
 * Stages applied when none are given, outermost first.
 */
export const defaultStages: readonly OperationStage[] = [countCalls, recordCallHistory]

const instrumented = new WeakSet<object>()

export type InstrumentOptions = {
  /** Name the call records are keyed by, e.g. `"Cache.store"`. */
  qualifiedName: string
  handle: StoreHandle
  logger: Logger

  /** @default defaultStages */
  stages?: readonly OperationStage[]
}

/**
 * Wraps `operation` in the given stages; the first stage runs outermost.
 *
 * @example
 * ```ts
 * const store = instrument((value: Scalar) => write(value), {
 *   qualifiedName: "Cache.store",
 *   handle,
 *   logger,
 * })
 *
 * await store("foo")
 * await replay(store)
 * ```
 */
export function instrument<A extends readonly Scalar[], R extends Scalar>(
  operation: Operation<A, R>,
  opts: InstrumentOptions,
): InstrumentedOperation<A, R> {
  const ctx: StageContext = {
    qualifiedName: opts.qualifiedName,
    handle: opts.handle,
    logger: opts.logger,
  }

  const stages = opts.stages ?? defaultStages
  const wrapped = stages.reduceRight<Operation<A, R>>(
    (next, stage) => stage(next, ctx),
    operation,
  )

  const call: Operation<A, R> = (...args) => wrapped(...args)
  const op = Object.assign(call, {
    qualifiedName: opts.qualifiedName,
    handle: opts.handle,
  })

  instrumented.add(op)

  return op
}

/**
 * True only for operations produced by `instrument`.
 */
export function isInstrumentedOperation(value: unknown): value is InstrumentedOperation {
  return typeof value === "function" && instrumented.has(value)
}
