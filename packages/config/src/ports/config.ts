/**
 * Validated, frozen configuration.
 *
 * @example
 * ```typescript
 * const config = await loadConfig({
 *   schema: z.object({ AWS_DEFAULT_REGION: z.string().default("us-east-1") }),
 *   sources: [new DotenvSource({ file: ".env", required: false }), new EnvSource()],
 * })
 *
 * config.get("AWS_DEFAULT_REGION") // "eu-west-1"
 * ```
 */
export interface IConfig<T extends Record<string, unknown>> {
  readonly value: T

  get<K extends keyof T & string>(key: K): T[K]
}
