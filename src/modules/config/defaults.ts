/**
 * Built-in default values for the mutant-gate configuration system.
 *
 * These are the lowest-priority defaults; they are overridden by:
 *   global config → project config → environment variables → CLI flags
 */

import { CURRENT_CONFIG_FORMAT_VERSION } from './config-schema.js'
import type {
  MutantGateConfig,
  GateSettings,
  GlobalSettings,
  HistorySettings,
} from './config-schema.js'

/** Diagnostics on stderr stay quiet unless something goes wrong */
export const DEFAULT_GLOBAL_SETTINGS: GlobalSettings = {
  log_level: 'warn',
}

/** A 0% threshold passes every build; the improvement check is opt-in */
export const DEFAULT_GATE_SETTINGS: GateSettings = {
  minimum_kill_ratio: 0,
  kill_ratio_must_improve: false,
}

export const DEFAULT_HISTORY_SETTINGS: HistorySettings = {
  database_path: '.mutant-gate/history.db',
}

export const DEFAULT_CONFIG: MutantGateConfig = {
  config_format_version: CURRENT_CONFIG_FORMAT_VERSION,
  global: DEFAULT_GLOBAL_SETTINGS,
  gate: DEFAULT_GATE_SETTINGS,
  history: DEFAULT_HISTORY_SETTINGS,
}
