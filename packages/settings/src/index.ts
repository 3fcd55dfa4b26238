export { AUTO_UPDATE_DEFAULTS, AutoUpdateManager } from "./core/cache/auto-update-manager"
export {
  GlobalSettingManager,
  type GlobalSettingManagerDeps,
} from "./core/cache/global-setting-manager"
export {
  type ContextEntity,
  ScopedSettingManager,
  type ScopedSettingManagerDeps,
} from "./core/cache/scoped-setting-manager"
export {
  SettingCacheManager,
  type SettingCacheManagerDeps,
  type SettingCacheManagerOptions,
} from "./core/cache/setting-cache-manager"
export { lookupDefault, mergeDefaults } from "./core/merge-defaults"
export { SettingsConfig, SettingsRegistrationError } from "./core/settings-config"
export { ValueRef, type ValueRefDeps } from "./core/value-ref"
export {
  type CacheKey,
  cacheKeyString,
  GLOBAL_KEY,
  RESET_TO_DEFAULT,
  type ResetToDefault,
  scopedKey,
} from "./ports/cache-key"
