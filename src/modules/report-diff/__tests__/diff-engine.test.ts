/**
 * Unit tests for the DiffEngine implementation.
 */

import { describe, it, expect, vi } from 'vitest'
import { DiffEngineImpl, createDiffEngine, requireApplicable } from '../diff-engine-impl.js'
import type { DiffOutcome } from '../types.js'
import { createReport } from '../../mutation-report/report.js'
import type { Mutation } from '../../mutation-report/types.js'
import { MissingPredecessorError } from '../../../core/errors.js'

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function mutation(overrides: Partial<Mutation> = {}): Mutation {
  return {
    className: 'Foo',
    mutatedMethod: 'run',
    lineNumber: 1,
    index: 0,
    mutator: 'MathMutator',
    detected: true,
    ...overrides,
  }
}

/** Foo with lines 1..total, the first `killed` detected */
function fooMutations(killed: number, total: number): Mutation[] {
  const list: Mutation[] = []
  for (let i = 0; i < total; i++) {
    list.push(mutation({ lineNumber: i + 1, detected: i < killed }))
  }
  return list
}

function items<T>(outcome: DiffOutcome<T>): T[] {
  if (!outcome.applicable) throw new Error('expected an applicable outcome')
  return [...outcome.items]
}

const engine = createDiffEngine()

// ---------------------------------------------------------------------------
// findNewTargets
// ---------------------------------------------------------------------------

describe('findNewTargets', () => {
  it('returns classes present only in the current report', () => {
    const previous = createReport([mutation({ className: 'A' }), mutation({ className: 'B' })])
    const current = createReport([
      mutation({ className: 'B' }),
      mutation({ className: 'C' }),
      mutation({ className: 'D' }),
    ])
    expect(items(engine.findNewTargets(current, previous))).toEqual(['C', 'D'])
  })

  it('is empty when comparing a report with itself', () => {
    const report = createReport([mutation({ className: 'A' })])
    expect(items(engine.findNewTargets(report, report))).toEqual([])
  })

  it('gives disjoint sets in the two directions', () => {
    const r1 = createReport([mutation({ className: 'A' }), mutation({ className: 'B' })])
    const r2 = createReport([mutation({ className: 'B' }), mutation({ className: 'C' })])
    const forward = new Set(items(engine.findNewTargets(r1, r2)))
    const backward = items(engine.findNewTargets(r2, r1))
    expect([...forward]).toEqual(['A'])
    expect(backward).toEqual(['C'])
    expect(backward.filter((c) => forward.has(c))).toEqual([])
  })

  it('is not applicable without a previous report', () => {
    expect(engine.findNewTargets(createReport([mutation()]), undefined)).toEqual({
      applicable: false,
      reason: 'missing-predecessor',
    })
  })
})

// ---------------------------------------------------------------------------
// findDifferentMutations / findNewSurvivors
// ---------------------------------------------------------------------------

describe('findDifferentMutations', () => {
  it('is empty when comparing a report with itself', () => {
    const report = createReport(fooMutations(8, 10))
    expect(items(engine.findDifferentMutations(report, report, 'Foo'))).toEqual([])
  })

  it('finds a mutation whose detection flipped', () => {
    const previous = createReport(fooMutations(8, 10))
    const flipped = fooMutations(8, 10).map((m) => (m.lineNumber === 1 ? { ...m, detected: false } : m))
    const current = createReport(flipped)

    const different = items(engine.findDifferentMutations(current, previous, 'Foo'))
    expect(different).toHaveLength(1)
    expect(different[0]).toEqual(mutation({ lineNumber: 1, detected: false }))
  })

  it('finds added mutations and new survivors (10/8 -> 11/8)', () => {
    const previous = createReport(fooMutations(8, 10))
    const added = mutation({ lineNumber: 11, detected: false })
    const current = createReport([...fooMutations(8, 10), added])

    expect(items(engine.findDifferentMutations(current, previous, 'Foo'))).toEqual([added])
    expect(items(engine.findNewSurvivors(current, previous, 'Foo'))).toEqual([added])
  })

  it('ignores removed mutations', () => {
    const previous = createReport(fooMutations(8, 10))
    const current = createReport(fooMutations(8, 9))
    expect(items(engine.findDifferentMutations(current, previous, 'Foo'))).toEqual([])
  })

  it('treats every mutation of a new class as different', () => {
    const previous = createReport(fooMutations(1, 1))
    const bar = [mutation({ className: 'Bar', detected: false }), mutation({ className: 'Bar', lineNumber: 2 })]
    const current = createReport([...fooMutations(1, 1), ...bar])
    expect(items(engine.findDifferentMutations(current, previous, 'Bar'))).toEqual(bar)
  })

  it('is empty for a class in neither report', () => {
    const report = createReport(fooMutations(1, 2))
    expect(items(engine.findDifferentMutations(report, report, 'Missing'))).toEqual([])
  })

  it('collapses duplicate mutations in the current report', () => {
    const previous = createReport([])
    const current = createReport([mutation({ detected: false }), mutation({ detected: false })])
    expect(items(engine.findDifferentMutations(current, previous, 'Foo'))).toHaveLength(1)
  })

  it('is not applicable without a previous report', () => {
    const current = createReport(fooMutations(1, 1))
    expect(engine.findDifferentMutations(current, undefined, 'Foo').applicable).toBe(false)
    expect(engine.findNewSurvivors(current, undefined, 'Foo').applicable).toBe(false)
  })
})

describe('findNewSurvivors', () => {
  it('is the undetected subset of the different mutations', () => {
    const previous = createReport(fooMutations(5, 5))
    const current = createReport([
      ...fooMutations(3, 5),
      mutation({ lineNumber: 6, detected: true }),
      mutation({ lineNumber: 7, detected: false }),
    ])
    const different = items(engine.findDifferentMutations(current, previous, 'Foo'))
    const survivors = items(engine.findNewSurvivors(current, previous, 'Foo'))

    expect(different.map((m) => m.lineNumber)).toEqual([4, 5, 6, 7])
    expect(survivors.map((m) => m.lineNumber)).toEqual([4, 5, 7])
    expect(survivors.every((s) => different.includes(s))).toBe(true)
    expect(survivors.every((s) => !s.detected)).toBe(true)
  })
})

// ---------------------------------------------------------------------------
// summarizeRegressions
// ---------------------------------------------------------------------------

describe('summarizeRegressions', () => {
  it('summarizes new targets and changed classes', () => {
    const previous = createReport([...fooMutations(2, 2), mutation({ className: 'Bar' })])
    const newSurvivor = mutation({ lineNumber: 3, detected: false })
    const baz = mutation({ className: 'Baz' })
    const current = createReport([
      ...fooMutations(2, 2),
      newSurvivor,
      mutation({ className: 'Bar' }),
      baz,
    ])

    const summary = engine.summarizeRegressions(current, previous)
    expect(summary).toEqual({
      applicable: true,
      newTargets: ['Baz'],
      classes: [
        { className: 'Foo', differentMutations: [newSurvivor], newSurvivors: [newSurvivor] },
        { className: 'Baz', differentMutations: [baz], newSurvivors: [] },
      ],
      differentMutationCount: 2,
      newSurvivorCount: 1,
    })
  })

  it('writes one summary line to the given logger', () => {
    const sink = { info: vi.fn() }
    const previous = createReport(fooMutations(1, 1))
    const current = createReport([...fooMutations(1, 1), mutation({ lineNumber: 2, detected: false })])
    new DiffEngineImpl().summarizeRegressions(current, previous, { logger: sink })
    expect(sink.info).toHaveBeenCalledTimes(1)
    expect(sink.info).toHaveBeenCalledWith(
      { newTargets: 0, changedClasses: 1, differentMutationCount: 1, newSurvivorCount: 1 },
      '1 new surviving mutation(s) across 1 changed class(es)',
    )
  })

  it('is not applicable without a previous report', () => {
    expect(engine.summarizeRegressions(createReport([]), undefined)).toEqual({
      applicable: false,
      reason: 'missing-predecessor',
    })
  })
})

// ---------------------------------------------------------------------------
// requireApplicable
// ---------------------------------------------------------------------------

describe('requireApplicable', () => {
  it('unwraps an applicable outcome', () => {
    const report = createReport([mutation({ className: 'A' })])
    expect([...requireApplicable(engine.findNewTargets(report, createReport([])))]).toEqual(['A'])
  })

  it('throws MissingPredecessorError otherwise', () => {
    const outcome = engine.findNewTargets(createReport([]), undefined)
    expect(() => requireApplicable(outcome, 'build-7')).toThrow(MissingPredecessorError)
    expect(() => requireApplicable(outcome, 'build-7')).toThrow(
      'No previous report available for build: build-7',
    )
  })
})
