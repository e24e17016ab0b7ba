/**
 * Tests for the logger utility
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest'
import pino from 'pino'
import { createLogger, childLogger, setLogLevel } from '../src/utils/logger.js'
import type { LogLevel } from '../src/core/types.js'

const LEVELS: LogLevel[] = ['trace', 'debug', 'info', 'warn', 'error', 'fatal']

beforeEach(() => {
  // No developer overrides leak in from the shell running the tests
  vi.stubEnv('LOG_LEVEL', '')
  vi.stubEnv('LOG_PRETTY', 'false')
})

afterEach(() => {
  vi.unstubAllEnvs()
  setLogLevel(undefined)
  vi.restoreAllMocks()
})

describe('createLogger', () => {
  it('writes to stderr, leaving stdout to command output', () => {
    const destination = vi.spyOn(pino, 'destination')
    createLogger('stderr-check')
    expect(destination).toHaveBeenCalledWith(2)
  })

  it.each(LEVELS)('accepts the %s level', (level) => {
    expect(createLogger('levels', { level }).level).toBe(level)
  })

  it('names the logger after its module unless a name is given', () => {
    expect(createLogger('cli:gate').bindings()).toMatchObject({ name: 'cli:gate' })
    expect(createLogger('cli:gate', { name: 'gate' }).bindings()).toMatchObject({ name: 'gate' })
  })
})

describe('default level', () => {
  it.each([
    ['production', 'info'],
    ['test', 'debug'],
    ['development', 'debug'],
    ['', 'warn'],
    ['staging', 'warn'],
  ])('NODE_ENV=%j gives %s', (nodeEnv, expected) => {
    vi.stubEnv('NODE_ENV', nodeEnv)
    expect(createLogger('defaults', { pretty: false }).level).toBe(expected)
  })

  it('takes LOG_LEVEL over NODE_ENV', () => {
    vi.stubEnv('NODE_ENV', 'production')
    vi.stubEnv('LOG_LEVEL', 'error')
    expect(createLogger('env-level').level).toBe('error')
  })
})

describe('setLogLevel', () => {
  it('moves existing loggers to the configured level', () => {
    vi.stubEnv('NODE_ENV', 'production')
    const log = createLogger('follower')
    expect(log.level).toBe('info')

    setLogLevel('error')
    expect(log.level).toBe('error')
  })

  it('applies to loggers created afterwards', () => {
    setLogLevel('fatal')
    expect(createLogger('late').level).toBe('fatal')
  })

  it('leaves loggers with an explicit level alone', () => {
    const log = createLogger('pinned', { level: 'trace' })
    setLogLevel('error')
    expect(log.level).toBe('trace')
  })

  it('yields to LOG_LEVEL', () => {
    vi.stubEnv('LOG_LEVEL', 'debug')
    const log = createLogger('env-wins')
    setLogLevel('error')
    expect(log.level).toBe('debug')
  })

  it('returns to the environment default when cleared', () => {
    vi.stubEnv('NODE_ENV', 'production')
    const log = createLogger('cleared')
    setLogLevel('fatal')
    setLogLevel(undefined)
    expect(log.level).toBe('info')
  })
})

describe('childLogger', () => {
  it('adds bindings and inherits the parent level', () => {
    const parent = createLogger('parent', { level: 'warn' })
    const child = childLogger(parent, { buildRef: '7' })
    expect(child.level).toBe('warn')
    expect(child.bindings()).toMatchObject({ name: 'parent', buildRef: '7' })
  })
})
