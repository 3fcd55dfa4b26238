import type { ConfigSource } from "../../ports/source"

export type EnvSourceOptions = {
  /** Variables to read. When omitted every variable is read. */
  keys?: readonly string[]
  /**
   * `${prefix}${key}` takes precedence over `key`, so several deployments
   * can share one environment. Returned keys never carry the prefix.
   */
  prefix?: string
  env?: Record<string, string | undefined>
}

export class EnvSource implements ConfigSource {
  readonly name = "env"

  constructor(private readonly opts: EnvSourceOptions = {}) {}

  async load(): Promise<Record<string, unknown>> {
    const env = this.opts.env ?? process.env
    const prefix = this.opts.prefix ?? ""
    const keys = this.opts.keys ?? unprefixedKeys(env, prefix)
    const out: Record<string, string> = {}

    for (const key of keys) {
      const value = (prefix !== "" ? env[`${prefix}${key}`] : undefined) ?? env[key]
      if (value !== undefined) out[key] = value
    }

    return out
  }
}

function unprefixedKeys(env: Record<string, string | undefined>, prefix: string): string[] {
  if (prefix === "") return Object.keys(env)

  const keys = new Set<string>()
  for (const key of Object.keys(env)) {
    keys.add(key.startsWith(prefix) ? key.slice(prefix.length) : key)
  }
  return [...keys]
}
