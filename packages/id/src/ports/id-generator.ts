/**
 * Produces fresh identifiers. Implementations must not repeat a value within
 * the lifetime of the data they name.
 */
export interface IdGenerator<T> {
  generate(): T
}
