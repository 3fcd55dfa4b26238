import {
  ConfigCategory,
  type ConfigDriver,
  getPrimaryKeyInfo,
  IdentifierData,
  isConfigCategory,
  isJsonObject,
  type JsonObject,
  type StorageBackend,
} from "@layerconf/drivers"
import { BaseError } from "@layerconf/errors"
import { lookupDefault, mergeDefaults } from "./merge-defaults"
import { ValueRef } from "./value-ref"

export class SettingsRegistrationError extends BaseError<"settings_registration"> {
  constructor(message: string, context: Record<string, unknown> = {}) {
    super(message, { code: "settings_registration", context, isOperational: false })
  }
}

/**
 * Per-cog settings: declared defaults plus value handles bound to one
 * driver. Build with `SettingsConfig.getConf` once the backend is ready.
 */
export class SettingsConfig {
  private readonly registered: Record<string, JsonObject> = {}
  private readonly customGroups: Record<string, number> = {}

  constructor(readonly driver: ConfigDriver) {}

  static getConf(backend: StorageBackend, cogName: string, identifier: string | number): SettingsConfig {
    return new SettingsConfig(backend.getDriver(cogName, String(identifier)))
  }

  get cogName(): string {
    return this.driver.cogName
  }

  get uuid(): string {
    return this.driver.uuid
  }

  /** Snapshot of every registered default, by category. */
  get defaults(): Readonly<Record<string, JsonObject>> {
    return structuredClone(this.registered)
  }

  get customGroupData(): Readonly<Record<string, number>> {
    return { ...this.customGroups }
  }

  registerGlobal(defaults: JsonObject): void {
    this.register(ConfigCategory.GLOBAL, defaults)
  }

  registerGuild(defaults: JsonObject): void {
    this.register(ConfigCategory.GUILD, defaults)
  }

  registerChannel(defaults: JsonObject): void {
    this.register(ConfigCategory.CHANNEL, defaults)
  }

  registerRole(defaults: JsonObject): void {
    this.register(ConfigCategory.ROLE, defaults)
  }

  registerUser(defaults: JsonObject): void {
    this.register(ConfigCategory.USER, defaults)
  }

  registerMember(defaults: JsonObject): void {
    this.register(ConfigCategory.MEMBER, defaults)
  }

  initCustom(group: string, primaryKeyLength: number): void {
    if (isConfigCategory(group)) {
      throw new SettingsRegistrationError(`${group} is a built-in category`, { group })
    }
    if (!Number.isInteger(primaryKeyLength) || primaryKeyLength < 0) {
      throw new SettingsRegistrationError(`Invalid primary key length for ${group}`, {
        group,
        primaryKeyLength,
      })
    }

    const existing = this.customGroups[group]
    if (existing !== undefined && existing !== primaryKeyLength) {
      throw new SettingsRegistrationError(
        `${group} was already initialised with ${existing} primary key part(s)`,
        { group, existing, primaryKeyLength },
      )
    }

    this.customGroups[group] = primaryKeyLength
  }

  registerCustom(group: string, defaults: JsonObject): void {
    if (this.customGroups[group] === undefined) {
      throw new SettingsRegistrationError(`Call initCustom("${group}", ...) first`, { group })
    }

    this.register(group, defaults)
  }

  value(category: string, primaryKey: readonly string[] = [], path: readonly string[] = []): ValueRef {
    const info = getPrimaryKeyInfo(category, this.customGroups)

    if (info.isCustom && this.customGroups[category] === undefined) {
      throw new SettingsRegistrationError(`Unknown group ${category}`, { group: category })
    }

    const identifier = new IdentifierData({
      cogName: this.cogName,
      uuid: this.uuid,
      category,
      primaryKey,
      identifiers: path,
      primaryKeyLength: info.primaryKeyLength,
      isCustom: info.isCustom,
    })

    return new ValueRef(
      {
        driver: this.driver,
        defaultValue: () =>
          identifier.hasFullPrimaryKey ? lookupDefault(this.registered[category], path) : undefined,
      },
      identifier,
    )
  }

  global(...path: string[]): ValueRef {
    return this.value(ConfigCategory.GLOBAL, [], path)
  }

  guild(guildId: string | number, ...path: string[]): ValueRef {
    return this.value(ConfigCategory.GUILD, [String(guildId)], path)
  }

  channel(channelId: string | number, ...path: string[]): ValueRef {
    return this.value(ConfigCategory.CHANNEL, [String(channelId)], path)
  }

  role(roleId: string | number, ...path: string[]): ValueRef {
    return this.value(ConfigCategory.ROLE, [String(roleId)], path)
  }

  user(userId: string | number, ...path: string[]): ValueRef {
    return this.value(ConfigCategory.USER, [String(userId)], path)
  }

  member(guildId: string | number, userId: string | number, ...path: string[]): ValueRef {
    return this.value(ConfigCategory.MEMBER, [String(guildId), String(userId)], path)
  }

  custom(group: string, primaryKey: readonly (string | number)[], ...path: string[]): ValueRef {
    return this.value(group, primaryKey.map(String), path)
  }

  private register(category: string, defaults: JsonObject): void {
    const merged = mergeDefaults(this.registered[category], structuredClone(defaults))

    if (!isJsonObject(merged)) {
      throw new SettingsRegistrationError(`Defaults for ${category} must be an object`, { category })
    }

    this.registered[category] = merged
  }
}
