/**
 * A source of raw configuration values.
 *
 * Sources only load. Validation and coercion happen in `loadConfig`, and
 * sources are applied in order, so later sources override earlier ones.
 */
export interface ConfigSource {
  /** Name used for provenance, e.g. "env" or "dotenv:.env" */
  readonly name: string

  /**
   * Load configuration values. An `undefined` value means "not provided".
   */
  load(): Promise<Record<string, unknown>>
}
