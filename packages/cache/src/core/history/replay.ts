import { isConnected } from "@recall/store"
import { formatScalar } from "../codec/format-call-args"
import { isInstrumentedOperation } from "../instrumentation/instrument"
import { readCallHistory } from "./read-call-history"

export type ReplayOutput = {
  write(chunk: string): unknown
}

export type ReplayDeps = {
  /** @default process.stdout */
  out?: ReplayOutput
}

/**
 * Prints the recorded calls of an instrumented operation:
 *
 * ```text
 * Cache.store was called 2 times:
 * Cache.store(*('foo',)) -> b'6f1c...'
 * Cache.store(*(123,)) -> b'0b7e...'
 * ```
 *
 * Does nothing when `target` is not an instrumented operation or its handle
 * is not connected.
 */
export async function replay(target: unknown, deps: ReplayDeps = {}): Promise<void> {
  if (!isInstrumentedOperation(target)) return
  if (!isConnected(target.handle)) return

  const history = await readCallHistory(target.handle, target.qualifiedName)
  const out = deps.out ?? process.stdout

  out.write(`${history.operation} was called ${history.count} times:\n`)

  for (const call of history.calls) {
    out.write(`${history.operation}(*${call.input}) -> ${formatScalar(call.output)}\n`)
  }
}
