/**
 * ConfigSystem implementation — loads configuration in hierarchy order and
 * exposes get operations.
 *
 * Hierarchy (lowest → highest priority):
 *   built-in defaults
 *     → global user config  (~/.mutant-gate/config.yaml)
 *     → project config      (./.mutant-gate/config.yaml)
 *     → environment vars    (MUTANT_GATE_* prefixed)
 *     → CLI flag overrides  (passed via ConfigSystemOptions.cliOverrides)
 */

import { readFile, access } from 'fs/promises'
import { join, resolve } from 'path'
import { homedir } from 'os'
import yaml from 'js-yaml'
import { createLogger } from '../../utils/logger.js'
import { ConfigurationError } from '../../core/errors.js'
import {
  MutantGateConfigSchema,
  PartialMutantGateConfigSchema,
  SUPPORTED_CONFIG_FORMAT_VERSIONS,
  type MutantGateConfig,
  type PartialMutantGateConfig,
} from './config-schema.js'
import { DEFAULT_CONFIG } from './defaults.js'
import type { ConfigSystem, ConfigSystemOptions } from './config-system.js'

const logger = createLogger('config')

// ---------------------------------------------------------------------------
// Merge
// ---------------------------------------------------------------------------

/**
 * Overlay a partial config onto a full one, section by section.
 * The result is validated by the caller.
 */
function mergeConfig(base: MutantGateConfig, override: PartialMutantGateConfig): MutantGateConfig {
  return {
    config_format_version: base.config_format_version,
    global: { ...base.global, ...override.global },
    gate: { ...base.gate, ...override.gate },
    history: { ...base.history, ...override.history },
  }
}

function formatIssues(issues: { path: (string | number)[]; message: string }[]): string {
  return issues.map((i) => `  • ${i.path.join('.')}: ${i.message}`).join('\n')
}

// ---------------------------------------------------------------------------
// Environment variable resolution
// ---------------------------------------------------------------------------

/** Config key set by each MUTANT_GATE_* variable */
const ENV_VARIABLES: Record<string, string> = {
  'global.log_level': 'MUTANT_GATE_LOG_LEVEL',
  'gate.minimum_kill_ratio': 'MUTANT_GATE_MIN_KILL_RATIO',
  'gate.kill_ratio_must_improve': 'MUTANT_GATE_KILL_RATIO_MUST_IMPROVE',
  'history.database_path': 'MUTANT_GATE_DATABASE_PATH',
}

/** Numeric text as a number; anything else is passed through for the schema to reject */
function envNumber(raw: string): number | string {
  if (raw.trim() === '') return raw
  const value = Number(raw)
  return Number.isNaN(value) ? raw : value
}

function envBoolean(raw: string): boolean | string {
  if (raw === 'true') return true
  if (raw === 'false') return false
  return raw
}

/**
 * Read MUTANT_GATE_* environment variables into a partial config overlay.
 *
 * @throws {ConfigurationError} if any variable holds an invalid value
 */
function readEnvOverrides(): PartialMutantGateConfig {
  const env = process.env
  const overrides: { global?: Record<string, unknown>; gate?: Record<string, unknown>; history?: Record<string, unknown> } = {}

  if (env.MUTANT_GATE_LOG_LEVEL !== undefined) {
    overrides.global = { log_level: env.MUTANT_GATE_LOG_LEVEL }
  }
  if (env.MUTANT_GATE_MIN_KILL_RATIO !== undefined) {
    overrides.gate = { ...overrides.gate, minimum_kill_ratio: envNumber(env.MUTANT_GATE_MIN_KILL_RATIO) }
  }
  if (env.MUTANT_GATE_KILL_RATIO_MUST_IMPROVE !== undefined) {
    overrides.gate = {
      ...overrides.gate,
      kill_ratio_must_improve: envBoolean(env.MUTANT_GATE_KILL_RATIO_MUST_IMPROVE),
    }
  }
  if (env.MUTANT_GATE_DATABASE_PATH !== undefined) {
    overrides.history = { database_path: env.MUTANT_GATE_DATABASE_PATH }
  }

  const parsed = PartialMutantGateConfigSchema.safeParse(overrides)
  if (!parsed.success) {
    const lines = parsed.error.issues.map((i) => {
      const key = i.path.join('.')
      return `  • ${ENV_VARIABLES[key] ?? key}: ${i.message}`
    })
    throw new ConfigurationError(
      `Invalid environment configuration:\n${lines.join('\n')}`,
      { issues: parsed.error.issues }
    )
  }
  return parsed.data
}

// ---------------------------------------------------------------------------
// Dot-notation key accessor
// ---------------------------------------------------------------------------

/**
 * Get a value from a nested object using dot-notation key.
 */
function getByPath(obj: unknown, path: string): unknown {
  const parts = path.split('.')
  let cursor: unknown = obj
  for (const part of parts) {
    if (cursor === null || cursor === undefined || typeof cursor !== 'object') return undefined
    cursor = Reflect.get(cursor, part)
  }
  return cursor
}

// ---------------------------------------------------------------------------
// ConfigSystemImpl
// ---------------------------------------------------------------------------

export class ConfigSystemImpl implements ConfigSystem {
  private _config: MutantGateConfig | null = null
  private _loadedFiles: string[] = []
  private readonly _projectConfigDir: string
  private readonly _globalConfigDir: string
  private readonly _cliOverrides: PartialMutantGateConfig

  constructor(options: ConfigSystemOptions = {}) {
    this._projectConfigDir = options.projectConfigDir
      ? resolve(options.projectConfigDir)
      : resolve(process.cwd(), '.mutant-gate')
    this._globalConfigDir = options.globalConfigDir
      ? resolve(options.globalConfigDir)
      : resolve(homedir(), '.mutant-gate')
    this._cliOverrides = options.cliOverrides ?? {}
  }

  get isLoaded(): boolean {
    return this._config !== null
  }

  get loadedFiles(): readonly string[] {
    return this._loadedFiles
  }

  async load(): Promise<void> {
    // 1. Start with built-in defaults
    let merged: MutantGateConfig = structuredClone(DEFAULT_CONFIG)

    // 2-3. Global user config, then project config, where present
    const loadedFiles: string[] = []
    for (const dir of [this._globalConfigDir, this._projectConfigDir]) {
      const filePath = join(dir, 'config.yaml')
      const fileConfig = await this._loadYamlFile(filePath)
      if (fileConfig !== null) {
        merged = mergeConfig(merged, fileConfig)
        loadedFiles.push(filePath)
      }
    }

    // 4. Apply environment variable overrides
    merged = mergeConfig(merged, readEnvOverrides())

    // 5. Apply CLI flag overrides
    merged = mergeConfig(merged, this._cliOverrides)

    // 6. Validate the merged config
    const result = MutantGateConfigSchema.safeParse(merged)
    if (!result.success) {
      throw new ConfigurationError(
        `Configuration validation failed:\n${formatIssues(result.error.issues)}`,
        { issues: result.error.issues }
      )
    }

    this._config = result.data
    this._loadedFiles = loadedFiles
    logger.debug({ gate: result.data.gate, files: loadedFiles }, 'Configuration loaded')
  }

  getConfig(): MutantGateConfig {
    if (this._config === null) {
      throw new ConfigurationError(
        'Configuration has not been loaded. Call load() before getConfig().',
        {}
      )
    }
    return this._config
  }

  get(key: string): unknown {
    return getByPath(this.getConfig(), key)
  }

  // ---------------------------------------------------------------------------
  // Private helpers
  // ---------------------------------------------------------------------------

  private async _fileExists(filePath: string): Promise<boolean> {
    try {
      await access(filePath)
      return true
    } catch {
      return false
    }
  }

  private async _loadYamlFile(filePath: string): Promise<PartialMutantGateConfig | null> {
    if (!(await this._fileExists(filePath))) return null

    let parsed: unknown
    try {
      const raw = await readFile(filePath, 'utf-8')
      parsed = yaml.load(raw)
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err)
      throw new ConfigurationError(
        `Failed to read config file at ${filePath}: ${message}`,
        { filePath }
      )
    }

    // An empty file loads as undefined
    if (parsed === undefined || parsed === null) return {}

    if (typeof parsed === 'object' && !Array.isArray(parsed)) {
      const version: unknown = Reflect.get(parsed, 'config_format_version')
      if (version !== undefined && !SUPPORTED_CONFIG_FORMAT_VERSIONS.includes(String(version))) {
        throw new ConfigurationError(
          `Configuration format version "${String(version)}" is not supported. ` +
            `This tool supports: ${SUPPORTED_CONFIG_FORMAT_VERSIONS.join(', ')}.`,
          { filePath, version }
        )
      }
    }

    const result = PartialMutantGateConfigSchema.safeParse(parsed)
    if (!result.success) {
      throw new ConfigurationError(
        `Invalid config file at ${filePath}:\n${formatIssues(result.error.issues)}`,
        { filePath, issues: result.error.issues }
      )
    }

    return result.data
  }
}

// ---------------------------------------------------------------------------
// Factory function
// ---------------------------------------------------------------------------

/**
 * Create a new ConfigSystem instance.
 *
 * @example
 * const config = createConfigSystem()
 * await config.load()
 * const { gate } = config.getConfig()
 */
export function createConfigSystem(options: ConfigSystemOptions = {}): ConfigSystem {
  return new ConfigSystemImpl(options)
}
