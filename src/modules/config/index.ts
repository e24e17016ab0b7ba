/**
 * Barrel exports for the config module.
 */

export { createConfigSystem, ConfigSystemImpl } from './config-system-impl.js'
export type { ConfigSystem, ConfigSystemOptions } from './config-system.js'
export {
  MutantGateConfigSchema,
  PartialMutantGateConfigSchema,
  GateSettingsSchema,
  HistorySettingsSchema,
  GlobalSettingsSchema,
  LogLevelSchema,
  CURRENT_CONFIG_FORMAT_VERSION,
  SUPPORTED_CONFIG_FORMAT_VERSIONS,
} from './config-schema.js'
export type {
  MutantGateConfig,
  PartialMutantGateConfig,
  GateSettings,
  HistorySettings,
  GlobalSettings,
  LogLevelValue,
} from './config-schema.js'
export {
  DEFAULT_CONFIG,
  DEFAULT_GATE_SETTINGS,
  DEFAULT_GLOBAL_SETTINGS,
  DEFAULT_HISTORY_SETTINGS,
} from './defaults.js'
