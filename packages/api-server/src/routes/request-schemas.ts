import {
  getPrimaryKeyInfo,
  IdentifierData,
  isJsonValue,
  type JsonValue,
} from "@layerconf/drivers"
import { z } from "zod"

const jsonValue = z.custom<JsonValue>((value) => isJsonValue(value), "Expected a JSON value")

/** `[cogName, uuid, category, ...primaryKey, ...identifiers]` */
const identifierPath = z
  .array(z.string())
  .min(3, "identifier needs at least cog name, uuid and category")

export const identifierBody = z.object({ identifier: identifierPath })

export const setBody = z.object({
  identifier: identifierPath,
  config_data: jsonValue,
})

export const incrementBody = z.object({
  identifier: identifierPath,
  config_data: z.number(),
  default: z.number().optional(),
})

export const toggleBody = z.object({
  identifier: identifierPath,
  config_data: z.boolean().nullable().optional(),
  default: z.boolean().nullable().optional(),
})

/**
 * Rebuilds an identifier from its wire path. Built-in categories take their
 * primary key from the registry; for custom groups the split is unknown here,
 * so everything after the category is treated as identifiers. Storage only
 * depends on the joined path, so both splits address the same value.
 */
export function identifierFromPath(path: readonly string[]): IdentifierData {
  const [cogName = "", uuid = "", category = "", ...rest] = path
  const info = getPrimaryKeyInfo(category)
  const primaryKeyLength = info.isCustom ? 0 : Math.min(info.primaryKeyLength, rest.length)

  return new IdentifierData({
    cogName,
    uuid,
    category,
    primaryKey: rest.slice(0, primaryKeyLength),
    identifiers: rest.slice(primaryKeyLength),
    primaryKeyLength: info.isCustom ? 0 : info.primaryKeyLength,
    isCustom: info.isCustom,
  })
}
