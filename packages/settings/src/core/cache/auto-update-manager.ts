import { z } from "zod"
import type { SettingsConfig } from "../settings-config"
import { GlobalSettingManager } from "./global-setting-manager"
import type { SettingCacheManagerDeps, SettingCacheManagerOptions } from "./setting-cache-manager"

export const AUTO_UPDATE_DEFAULTS = { managed_node: { auto_update: true } }

/**
 * Whether the managed node updates itself. Global, defaults to `true`.
 */
export class AutoUpdateManager extends GlobalSettingManager<boolean> {
  constructor(
    settings: SettingsConfig,
    deps: SettingCacheManagerDeps = {},
    opts: SettingCacheManagerOptions = {},
  ) {
    settings.registerGlobal(AUTO_UPDATE_DEFAULTS)

    super({ ...deps, ref: settings.global("managed_node", "auto_update"), schema: z.boolean() }, opts)
  }
}
