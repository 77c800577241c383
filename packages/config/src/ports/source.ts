/**
 * Something that yields raw configuration values: the process environment,
 * a dotenv file.
 *
 * Sources only load. Validation and coercion happen once, against the zod
 * schema handed to `loadConfig`. Later sources override earlier ones.
 */
export interface ConfigSource {
  /** e.g. "env" or "dotenv:.env" */
  readonly name: string

  /** A key mapped to `undefined` counts as not provided. */
  load(): Promise<Record<string, unknown>>
}
