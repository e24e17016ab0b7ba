/**
 * Unit tests for `src/cli/commands/diff.ts`
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest'
import { mkdir, rm } from 'fs/promises'
import { join } from 'path'
import { tmpdir } from 'os'

// Mock logger
vi.mock('../../../utils/logger.js', () => ({
  createLogger: () => ({
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    debug: vi.fn(),
  }),
  setLogLevel: vi.fn(),
}))

import {
  formatMutationTable,
  formatRegressionTable,
  runDiffAction,
  DIFF_EXIT_ERROR,
  DIFF_EXIT_SUCCESS,
} from '../diff.js'
import type { DiffActionOptions } from '../diff.js'
import { openHistory } from '../../utils/history.js'
import { createReport } from '../../../modules/mutation-report/report.js'
import type { Mutation } from '../../../modules/mutation-report/types.js'

// ---------------------------------------------------------------------------
// Setup
// ---------------------------------------------------------------------------

let projectRoot: string

beforeEach(async () => {
  projectRoot = join(tmpdir(), `mutant-gate-diff-test-${String(Date.now())}-${Math.random().toString(36).slice(2)}`)
  await mkdir(projectRoot, { recursive: true })
  vi.spyOn(process.stdout, 'write').mockImplementation(() => true)
  vi.spyOn(process.stderr, 'write').mockImplementation(() => true)
})

afterEach(async () => {
  vi.restoreAllMocks()
  await rm(projectRoot, { recursive: true, force: true })
})

function captured(stream: NodeJS.WriteStream): string {
  return vi.mocked(stream.write).mock.calls.map((call) => String(call[0])).join('')
}

function options(overrides: Partial<DiffActionOptions> = {}): DiffActionOptions {
  return {
    buildId: '2',
    outputFormat: 'table',
    projectRoot,
    globalConfigDir: join(projectRoot, 'global'),
    version: '1.2.3',
    ...overrides,
  }
}

function mutation(className: string, lineNumber: number, detected: boolean): Mutation {
  return { className, mutatedMethod: 'run', lineNumber, index: 0, mutator: 'MathMutator', detected }
}

/**
 * Build 1: Foo lines 1-3 all killed.
 * Build 2: Foo line 3 now survives, and a new class Bar with one survivor.
 */
function seed(): void {
  const history = openHistory(join(projectRoot, '.mutant-gate', 'history.db'), true)
  if (history === null) throw new Error('could not open history')
  try {
    history.store.recordBuild(
      '1',
      createReport([mutation('Foo', 1, true), mutation('Foo', 2, true), mutation('Foo', 3, true)]),
    )
    history.store.recordBuild(
      '2',
      createReport([
        mutation('Foo', 1, true),
        mutation('Foo', 2, true),
        mutation('Foo', 3, false),
        mutation('Bar', 1, false),
      ]),
      '1',
    )
  } finally {
    history.wrapper.close()
  }
}

// ---------------------------------------------------------------------------
// runDiffAction
// ---------------------------------------------------------------------------

describe('runDiffAction', () => {
  it('summarizes the changes since the previous build', async () => {
    seed()
    const exitCode = await runDiffAction(options())

    expect(exitCode).toBe(DIFF_EXIT_SUCCESS)
    const lines = captured(process.stdout).split('\n')
    expect(lines[0]).toBe('Build: 2 (previous: 1)')
    expect(lines[1]).toBe('')
    expect(lines[2]).toBe('New classes: 1')
    expect(lines[3]).toBe('  Bar')
    expect(lines).toContain('Class | Changed | New survivors')
    expect(lines).toContain('Foo   |       1 |             1')
    expect(lines).toContain('Bar   |       1 |             1')
    expect(lines).toContain('New surviving mutations: 2')
    expect(captured(process.stderr)).toBe('2 new surviving mutation(s) across 2 changed class(es)\n')
  })

  it('reports a build without a predecessor and still succeeds', async () => {
    seed()
    expect(await runDiffAction(options({ buildId: '1' }))).toBe(DIFF_EXIT_SUCCESS)
    expect(captured(process.stdout)).toBe(
      'Build: 1 (previous: none)\n\nNo previous build to compare against\n',
    )
  })

  it('restricts the output to one class', async () => {
    seed()
    await runDiffAction(options({ className: 'Foo' }))

    expect(captured(process.stdout).split('\n')).toEqual([
      'Build: 2 (previous: 1)',
      '',
      'Class: Foo',
      'Changed mutations: 1',
      'Class | Method | Line | Mutator     | Detected',
      '------+--------+------+-------------+---------',
      'Foo   | run    |    3 | MathMutator | no',
      '',
      'New surviving mutations: 1',
      'Class | Method | Line | Mutator     | Detected',
      '------+--------+------+-------------+---------',
      'Foo   | run    |    3 | MathMutator | no',
      '',
    ])
  })

  it('notes empty lists for a class without changes', async () => {
    seed()
    await runDiffAction(options({ className: 'Baz' }))

    expect(captured(process.stdout)).toBe(
      'Build: 2 (previous: 1)\n\n' +
        'Class: Baz\nChanged mutations: 0\nNo mutations\n\n' +
        'New surviving mutations: 0\nNo mutations\n',
    )
  })

  it('outputs JSON for one class', async () => {
    seed()
    await runDiffAction(options({ className: 'Foo', outputFormat: 'json' }))

    const parsed: unknown = JSON.parse(captured(process.stdout))
    expect(parsed).toMatchObject({
      command: 'mutant-gate diff',
      data: {
        build_id: '2',
        previous_build_id: '1',
        regressions: {
          class_name: 'Foo',
          different_mutations: [{ className: 'Foo', lineNumber: 3, detected: false }],
          new_survivors: [{ className: 'Foo', lineNumber: 3, detected: false }],
        },
      },
    })
  })

  it('outputs the JSON summary', async () => {
    seed()
    await runDiffAction(options({ outputFormat: 'json' }))

    const parsed: unknown = JSON.parse(captured(process.stdout))
    expect(parsed).toMatchObject({
      data: {
        regressions: {
          applicable: true,
          newTargets: ['Bar'],
          differentMutationCount: 2,
          newSurvivorCount: 2,
        },
      },
    })
  })

  it('outputs missing-predecessor JSON for a first build', async () => {
    seed()
    await runDiffAction(options({ buildId: '1', className: 'Foo', outputFormat: 'json' }))

    const parsed: unknown = JSON.parse(captured(process.stdout))
    expect(parsed).toMatchObject({
      data: {
        build_id: '1',
        previous_build_id: null,
        regressions: { applicable: false, reason: 'missing-predecessor' },
      },
    })
  })

  it('exits 1 for an unknown build', async () => {
    seed()
    expect(await runDiffAction(options({ buildId: '7' }))).toBe(DIFF_EXIT_ERROR)
    expect(captured(process.stderr)).toBe('Error: No report found for build: 7\n')
  })

  it('exits 1 when there is no history database', async () => {
    const databasePath = join(projectRoot, 'nowhere.db')
    expect(await runDiffAction(options({ databasePath }))).toBe(DIFF_EXIT_ERROR)
    expect(captured(process.stderr)).toBe(
      `Error: No build history found at ${databasePath}. Run 'mutant-gate record' first.\n`,
    )
  })
})

// ---------------------------------------------------------------------------
// Formatters
// ---------------------------------------------------------------------------

describe('formatMutationTable', () => {
  it('notes an empty list', () => {
    expect(formatMutationTable([])).toBe('No mutations')
  })

  it('renders one row per mutation', () => {
    expect(formatMutationTable([mutation('Foo', 12, true)]).split('\n')).toEqual([
      'Class | Method | Line | Mutator     | Detected',
      '------+--------+------+-------------+---------',
      'Foo   | run    |   12 | MathMutator | yes',
    ])
  })
})

describe('formatRegressionTable', () => {
  it('notes when nothing changed', () => {
    expect(
      formatRegressionTable({
        applicable: true,
        newTargets: [],
        classes: [],
        differentMutationCount: 0,
        newSurvivorCount: 0,
      }),
    ).toBe('New classes: 0\n\nNo changed mutations')
  })

  it('notes a missing predecessor', () => {
    expect(formatRegressionTable({ applicable: false, reason: 'missing-predecessor' })).toBe(
      'No previous build to compare against',
    )
  })
})
