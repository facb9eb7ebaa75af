import { randomUUID } from "node:crypto"
import type { IdGenerator } from "../ports/id-generator"

export const uuidV4: IdGenerator<string> = { generate: () => randomUUID() }
