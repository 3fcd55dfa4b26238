import type { ConfigSource } from "../../ports/source"

export type ObjectSourceValue = string | number | boolean | undefined

/**
 * Programmatic overrides. Numbers and booleans are stringified so they parse
 * through the same schema as environment variables.
 */
export class ObjectSource implements ConfigSource {
  readonly name: string

  constructor(
    private readonly values: Readonly<Record<string, ObjectSourceValue>>,
    label = "overrides",
  ) {
    this.name = `object:${label}`
  }

  async load(): Promise<Record<string, unknown>> {
    const out: Record<string, string> = {}

    for (const [key, value] of Object.entries(this.values)) {
      if (value !== undefined) out[key] = String(value)
    }

    return out
  }
}
