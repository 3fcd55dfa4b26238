export const ConfigCategory = {
  GLOBAL: "GLOBAL",
  GUILD: "GUILD",
  CHANNEL: "TEXTCHANNEL",
  ROLE: "ROLE",
  USER: "USER",
  MEMBER: "MEMBER",
} as const

export type ConfigCategory = (typeof ConfigCategory)[keyof typeof ConfigCategory]

/** Custom group name to primary-key arity. */
export type CustomGroupData = Readonly<Record<string, number>>

export type PrimaryKeyInfo = {
  isCustom: boolean
  primaryKeyLength: number
}

const builtinArity: Readonly<Record<ConfigCategory, number>> = {
  GLOBAL: 0,
  GUILD: 1,
  TEXTCHANNEL: 1,
  ROLE: 1,
  USER: 1,
  MEMBER: 2,
}

export function isConfigCategory(category: string): category is ConfigCategory {
  return Object.hasOwn(builtinArity, category)
}

/**
 * Built-in categories win over a custom group of the same name. Unknown
 * groups are treated as custom with no primary key.
 */
export function getPrimaryKeyInfo(
  category: string,
  customGroups: CustomGroupData = {},
): PrimaryKeyInfo {
  if (isConfigCategory(category)) {
    return { isCustom: false, primaryKeyLength: builtinArity[category] }
  }

  return { isCustom: true, primaryKeyLength: customGroups[category] ?? 0 }
}
