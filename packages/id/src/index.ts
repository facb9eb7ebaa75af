export { uuidV4 } from "./adapters/uuid"
export type { IdGenerator } from "./ports/id-generator"
