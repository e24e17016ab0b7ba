/**
 * ConfigSystem interface — how commands obtain their merged configuration.
 *
 * Depend on this interface; `createConfigSystem()` in config-system-impl.ts
 * builds the YAML-backed implementation.
 */

import type { MutantGateConfig, PartialMutantGateConfig } from './config-schema.js'

export interface ConfigSystemOptions {
  /** Directory holding the project's config.yaml (default: <cwd>/.mutant-gate) */
  projectConfigDir?: string
  /** Directory holding the user's config.yaml (default: ~/.mutant-gate) */
  globalConfigDir?: string
  /** Highest-priority values, usually from command-line flags */
  cliOverrides?: PartialMutantGateConfig
}

/**
 * Merged, validated configuration. Sources from lowest to highest priority:
 * defaults, global config.yaml, project config.yaml, MUTANT_GATE_* env vars,
 * CLI overrides.
 */
export interface ConfigSystem {
  /**
   * Read every source and validate the result.
   * @throws {ConfigurationError} for unreadable YAML, an unsupported
   *   `config_format_version` or values outside their ranges
   */
  load(): Promise<void>

  /**
   * @throws {ConfigurationError} if `load()` has not completed
   */
  getConfig(): MutantGateConfig

  /** Value at a dot path such as `gate.minimum_kill_ratio`; undefined when absent */
  get(key: string): unknown

  readonly isLoaded: boolean

  /** config.yaml files that contributed to the last successful load, lowest priority first */
  readonly loadedFiles: readonly string[]
}
