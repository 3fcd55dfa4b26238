import type { IConfig } from "../ports/config"

export const DEFAULT_PROVENANCE = "default"

export class Config<T extends Record<string, unknown>> implements IConfig<T> {
  private readonly data: Readonly<T>

  constructor(
    data: T,
    private readonly provenance: ReadonlyMap<string, string>,
    private readonly suppliedKeys: ReadonlySet<string>,
  ) {
    this.data = Object.freeze({ ...data })
  }

  get value(): Readonly<T> {
    return this.data
  }

  get<K extends keyof T & string>(key: K): T[K] {
    return this.data[key]
  }

  explain<K extends keyof T & string>(key: K): string {
    return this.provenance.get(key) ?? DEFAULT_PROVENANCE
  }

  sourcesUsed(): string[] {
    const used = new Set(this.provenance.values())
    used.delete(DEFAULT_PROVENANCE)
    return [...used]
  }

  unknownKeys(): string[] {
    return [...this.suppliedKeys].filter((key) => !Object.hasOwn(this.data, key)).sort()
  }
}
