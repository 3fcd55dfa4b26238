import { type CustomGroupData, getPrimaryKeyInfo } from "./categories"
import { IdentifierData } from "./identifier-data"

export type IdentifierFor = {
  cogName: string
  uuid: string
  category: string
  primaryKey?: readonly string[]
  identifiers?: readonly string[]
  customGroups?: CustomGroupData
}

/**
 * Builds an identifier, taking arity and custom-ness from the category registry.
 */
export function identifierFor(input: IdentifierFor): IdentifierData {
  const info = getPrimaryKeyInfo(input.category, input.customGroups)

  return new IdentifierData({
    cogName: input.cogName,
    uuid: input.uuid,
    category: input.category,
    ...(input.primaryKey !== undefined && { primaryKey: input.primaryKey }),
    ...(input.identifiers !== undefined && { identifiers: input.identifiers }),
    primaryKeyLength: info.primaryKeyLength,
    isCustom: info.isCustom,
  })
}
