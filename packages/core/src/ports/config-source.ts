/**
 * A source of raw configuration values.
 *
 * Sources only load; validation and coercion happen downstream. Later sources
 * override earlier ones.
 */
export interface ConfigSource {
  /** Provenance label, e.g. "env" or "object:overrides". */
  readonly name: string

  load(): Promise<Record<string, unknown>>
}
