import type { ConfigSource } from "../../ports/source"

export type EnvSourceOptions = {
  /** Default: process.env */
  env?: Record<string, string | undefined>
}

export class EnvSource implements ConfigSource {
  readonly name = "env"
  private readonly env: Record<string, string | undefined>

  constructor(options: EnvSourceOptions = {}) {
    this.env = options.env ?? process.env
  }

  async load(): Promise<Record<string, unknown>> {
    const loaded: Record<string, string> = {}

    for (const [key, value] of Object.entries(this.env)) {
      if (value !== undefined) loaded[key] = value
    }

    return loaded
  }
}
