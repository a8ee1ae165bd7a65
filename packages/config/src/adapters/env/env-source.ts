import type { ConfigSource } from "../../ports/source"

export type EnvSourceOptions = {
  /** Only keys starting with this prefix are loaded; the prefix is stripped. */
  prefix?: string
  env?: Record<string, string | undefined>
}

export class EnvSource implements ConfigSource {
  readonly name: string
  private readonly prefix: string | undefined
  private readonly env: Record<string, string | undefined>

  constructor(options: EnvSourceOptions = {}) {
    this.prefix = options.prefix
    this.env = options.env ?? process.env
    this.name = this.prefix ? `env:${this.prefix}` : "env"
  }

  async load(): Promise<Record<string, unknown>> {
    const prefix = this.prefix
    if (!prefix) return { ...this.env }

    const filtered: Record<string, string | undefined> = {}

    for (const [key, value] of Object.entries(this.env)) {
      if (key.startsWith(prefix)) {
        filtered[key.slice(prefix.length)] = value
      }
    }

    return filtered
  }
}
