/**
 * Unit tests for config-system-impl.ts
 *
 * Tests:
 *  - Hierarchy loading (defaults < global < project < env < CLI)
 *  - Config validation errors
 *  - get() dot-notation access
 *  - Error handling for missing/invalid configs
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest'
import { mkdir, writeFile, rm } from 'fs/promises'
import { join } from 'path'
import { tmpdir } from 'os'
import { createConfigSystem } from '../config-system-impl.js'
import type { ConfigSystemOptions } from '../config-system.js'
import { DEFAULT_CONFIG } from '../defaults.js'
import { ConfigurationError } from '../../../core/errors.js'

// ---------------------------------------------------------------------------
// Test setup — temporary directories
// ---------------------------------------------------------------------------

let testDir: string
let projectConfigDir: string
let globalConfigDir: string

beforeEach(async () => {
  testDir = join(tmpdir(), `mutant-gate-config-test-${String(Date.now())}-${Math.random().toString(36).slice(2)}`)
  projectConfigDir = join(testDir, 'project', '.mutant-gate')
  globalConfigDir = join(testDir, 'global', '.mutant-gate')
  await mkdir(projectConfigDir, { recursive: true })
  await mkdir(globalConfigDir, { recursive: true })
})

afterEach(async () => {
  await rm(testDir, { recursive: true, force: true })
  // Restore env vars
  for (const key of Object.keys(process.env).filter((k) => k.startsWith('MUTANT_GATE_'))) {
    // eslint-disable-next-line @typescript-eslint/no-dynamic-delete
    delete process.env[key]
  }
  vi.restoreAllMocks()
})

// ---------------------------------------------------------------------------
// Helper
// ---------------------------------------------------------------------------

function createSystem(overrides: Partial<ConfigSystemOptions> = {}): ReturnType<typeof createConfigSystem> {
  return createConfigSystem({
    projectConfigDir,
    globalConfigDir,
    ...overrides,
  })
}

async function writeYaml(dir: string, filename: string, content: string): Promise<void> {
  await writeFile(join(dir, filename), content, 'utf-8')
}

// ---------------------------------------------------------------------------
// Default config loading
// ---------------------------------------------------------------------------

describe('ConfigSystem - default config', () => {
  it('loads successfully with no config files', async () => {
    const system = createSystem()
    await expect(system.load()).resolves.toBeUndefined()
    expect(system.isLoaded).toBe(true)
  })

  it('returns default config when no config files exist', async () => {
    const system = createSystem()
    await system.load()
    expect(system.getConfig()).toEqual(DEFAULT_CONFIG)
  })

  it('throws when getConfig() is called before load()', () => {
    const system = createSystem()
    expect(system.isLoaded).toBe(false)
    expect(() => system.getConfig()).toThrow(ConfigurationError)
  })

  it('treats an empty config file as no overrides', async () => {
    await writeYaml(projectConfigDir, 'config.yaml', '')
    const system = createSystem()
    await system.load()
    expect(system.getConfig()).toEqual(DEFAULT_CONFIG)
  })
})

// ---------------------------------------------------------------------------
// Hierarchy
// ---------------------------------------------------------------------------

describe('ConfigSystem - hierarchy', () => {
  it('applies the global config over defaults', async () => {
    await writeYaml(globalConfigDir, 'config.yaml', 'gate:\n  minimum_kill_ratio: 40\n')
    const system = createSystem()
    await system.load()
    expect(system.getConfig().gate).toEqual({ minimum_kill_ratio: 40, kill_ratio_must_improve: false })
  })

  it('applies the project config over the global config', async () => {
    await writeYaml(
      globalConfigDir,
      'config.yaml',
      'gate:\n  minimum_kill_ratio: 40\n  kill_ratio_must_improve: true\n',
    )
    await writeYaml(projectConfigDir, 'config.yaml', "config_format_version: '1'\ngate:\n  minimum_kill_ratio: 65\n")
    const system = createSystem()
    await system.load()
    expect(system.getConfig().gate).toEqual({ minimum_kill_ratio: 65, kill_ratio_must_improve: true })
  })

  it('applies environment variables over the project config', async () => {
    await writeYaml(projectConfigDir, 'config.yaml', 'gate:\n  minimum_kill_ratio: 65\n')
    process.env.MUTANT_GATE_MIN_KILL_RATIO = '75'
    process.env.MUTANT_GATE_KILL_RATIO_MUST_IMPROVE = 'true'
    process.env.MUTANT_GATE_DATABASE_PATH = '/var/lib/mutant-gate/history.db'
    process.env.MUTANT_GATE_LOG_LEVEL = 'debug'
    const system = createSystem()
    await system.load()
    const config = system.getConfig()
    expect(config.gate).toEqual({ minimum_kill_ratio: 75, kill_ratio_must_improve: true })
    expect(config.history.database_path).toBe('/var/lib/mutant-gate/history.db')
    expect(config.global.log_level).toBe('debug')
  })

  it('keeps a valid threshold from the environment alongside a valid flag', async () => {
    process.env.MUTANT_GATE_MIN_KILL_RATIO = ' 42.5 '
    process.env.MUTANT_GATE_KILL_RATIO_MUST_IMPROVE = 'false'
    const system = createSystem()
    await system.load()
    expect(system.getConfig().gate).toEqual({ minimum_kill_ratio: 42.5, kill_ratio_must_improve: false })
  })

  it('applies CLI overrides over everything else', async () => {
    await writeYaml(projectConfigDir, 'config.yaml', 'gate:\n  minimum_kill_ratio: 65\n')
    process.env.MUTANT_GATE_MIN_KILL_RATIO = '75'
    const system = createSystem({ cliOverrides: { gate: { minimum_kill_ratio: 90 } } })
    await system.load()
    expect(system.getConfig().gate.minimum_kill_ratio).toBe(90)
  })
})

// ---------------------------------------------------------------------------
// get()
// ---------------------------------------------------------------------------

describe('ConfigSystem - loadedFiles', () => {
  it('is empty when no config files exist', async () => {
    const system = createSystem()
    await system.load()
    expect(system.loadedFiles).toEqual([])
  })

  it('lists the files that were merged, global first', async () => {
    await writeYaml(globalConfigDir, 'config.yaml', 'gate:\n  minimum_kill_ratio: 40\n')
    await writeYaml(projectConfigDir, 'config.yaml', 'gate:\n  minimum_kill_ratio: 50\n')
    const system = createSystem()
    await system.load()
    expect(system.loadedFiles).toEqual([
      join(globalConfigDir, 'config.yaml'),
      join(projectConfigDir, 'config.yaml'),
    ])
    expect(system.getConfig().gate.minimum_kill_ratio).toBe(50)
  })
})

describe('ConfigSystem - get()', () => {
  it('reads values by dot-notation key', async () => {
    const system = createSystem()
    await system.load()
    expect(system.get('gate.minimum_kill_ratio')).toBe(0)
    expect(system.get('history.database_path')).toBe('.mutant-gate/history.db')
    expect(system.get('gate')).toEqual({ minimum_kill_ratio: 0, kill_ratio_must_improve: false })
  })

  it('returns undefined for unknown keys', async () => {
    const system = createSystem()
    await system.load()
    expect(system.get('gate.nope')).toBeUndefined()
    expect(system.get('gate.minimum_kill_ratio.deeper')).toBeUndefined()
  })
})

// ---------------------------------------------------------------------------
// Errors
// ---------------------------------------------------------------------------

describe('ConfigSystem - errors', () => {
  it('rejects an out-of-range kill ratio in a config file', async () => {
    await writeYaml(projectConfigDir, 'config.yaml', 'gate:\n  minimum_kill_ratio: 120\n')
    const system = createSystem()
    await expect(system.load()).rejects.toThrow(ConfigurationError)
    await expect(system.load()).rejects.toThrow(/^Invalid config file at /)
  })

  it('rejects an unsupported config format version', async () => {
    await writeYaml(projectConfigDir, 'config.yaml', "config_format_version: '2'\n")
    const system = createSystem()
    await expect(system.load()).rejects.toThrow('Configuration format version "2" is not supported')
  })

  it('rejects malformed YAML', async () => {
    await writeYaml(projectConfigDir, 'config.yaml', 'gate: [unclosed\n')
    const system = createSystem()
    await expect(system.load()).rejects.toThrow(/^Failed to read config file at /)
  })

  it('rejects an out-of-range kill ratio from the environment', async () => {
    process.env.MUTANT_GATE_MIN_KILL_RATIO = '150'
    const system = createSystem()
    await expect(system.load()).rejects.toThrow(ConfigurationError)
    await expect(system.load()).rejects.toThrow(
      'Invalid environment configuration:\n  • MUTANT_GATE_MIN_KILL_RATIO: Number must be less than or equal to 100',
    )
    expect(system.isLoaded).toBe(false)
  })

  it.each(['', '   ', 'lots'])('rejects a non-numeric kill ratio %j from the environment', async (raw) => {
    process.env.MUTANT_GATE_MIN_KILL_RATIO = raw
    const system = createSystem()
    await expect(system.load()).rejects.toThrow(
      '  • MUTANT_GATE_MIN_KILL_RATIO: Expected number, received string',
    )
  })

  it('rejects a must-improve flag other than true or false', async () => {
    process.env.MUTANT_GATE_MIN_KILL_RATIO = '90'
    process.env.MUTANT_GATE_KILL_RATIO_MUST_IMPROVE = 'yes'
    const system = createSystem()
    await expect(system.load()).rejects.toThrow(
      'Invalid environment configuration:\n  • MUTANT_GATE_KILL_RATIO_MUST_IMPROVE: Expected boolean, received string',
    )
  })

  it('rejects an unknown log level from the environment', async () => {
    process.env.MUTANT_GATE_LOG_LEVEL = 'loud'
    const system = createSystem()
    await expect(system.load()).rejects.toThrow(/^Invalid environment configuration:\n {2}• MUTANT_GATE_LOG_LEVEL: /)
  })

  it('rejects an invalid CLI override', async () => {
    const system = createSystem({ cliOverrides: { gate: { minimum_kill_ratio: -5 } } })
    await expect(system.load()).rejects.toThrow(/^Configuration validation failed:/)
  })
})
