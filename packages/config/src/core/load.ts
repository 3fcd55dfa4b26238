import { BaseError } from "@layerconf/errors"
import { type ZodType, z } from "zod"
import { EnvSource } from "../adapters/env/env-source"
import type { IConfig } from "../ports/config"
import type { ConfigSource } from "../ports/source"
import { Config, DEFAULT_PROVENANCE } from "./config"

export type LoadConfigOptions<T extends Record<string, unknown>> = {
  schema: ZodType<T>
  sources?: ConfigSource[]
}

export class ConfigValidationError extends BaseError<"config_invalid"> {
  constructor(details: string) {
    super(`Configuration validation failed:\n${details}`, {
      code: "config_invalid",
      context: { details },
    })
  }
}

export async function loadConfig<T extends Record<string, unknown>>({
  schema,
  sources,
}: LoadConfigOptions<T>): Promise<IConfig<T>> {
  const merged: Record<string, unknown> = {}
  const provenance = new Map<string, string>()

  for (const source of sources ?? [new EnvSource()]) {
    const values = await source.load()

    for (const [key, value] of Object.entries(values)) {
      if (value === undefined) continue

      merged[key] = value
      provenance.set(key, source.name)
    }
  }

  const result = schema.safeParse(merged)

  if (!result.success) {
    throw new ConfigValidationError(z.prettifyError(result.error))
  }

  for (const key of Object.keys(result.data)) {
    if (!provenance.has(key)) provenance.set(key, DEFAULT_PROVENANCE)
  }

  return new Config<T>(result.data, provenance, new Set(Object.keys(merged)))
}
