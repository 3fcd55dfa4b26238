/**
 * Loads raw configuration values. No validation, coercion or merging happens here.
 *
 * Sources are applied in order; later sources override earlier ones.
 */
export interface ConfigSource {
  /** Provenance label, e.g. "env" or "dotenv:.env". */
  readonly name: string

  /** Keys mapped to `undefined` count as "not provided". */
  load(): Promise<Record<string, unknown>>
}
