import type { StoreHandle } from "@recall/store"
import type { CallHistory, CallRecord } from "../../ports/call-history"
import { base10Integer } from "../converters"
import { callKeys } from "../instrumentation/call-keys"

const decoder = new TextDecoder()

/**
 * Reads the call counter and pairs the inputs and outputs lists by position.
 * Inputs are decoded as UTF-8 text; outputs keep their recorded bytes.
 *
 * @remarks
 * Pairing stops at the shorter list. A missing counter reads as 0.
 */
export async function readCallHistory(
  handle: StoreHandle,
  operation: string,
): Promise<CallHistory> {
  const keys = callKeys(operation)

  const counter = await handle.get(keys.counter)
  const count = counter.kind === "found" ? base10Integer(counter.value) : 0

  const inputs = await handle.lRange(keys.inputs, 0, -1)
  const outputs = await handle.lRange(keys.outputs, 0, -1)

  const calls: CallRecord[] = []

  for (const [i, input] of inputs.entries()) {
    const output = outputs[i]
    if (output === undefined) break

    calls.push({ input: decoder.decode(input), output })
  }

  return { operation, count, calls }
}
