import { describe, expect, it, jest } from '@jest/globals'
import * as core from '../__fixtures__/core'

jest.mock('@actions/core', () => require('../__fixtures__/core'))

import { BenchmarkState } from '../src/state'

describe('benchmark state', () => {
  it('starts with every slot missing', () => {
    const state = new BenchmarkState()
    expect(state.snapshot()).toEqual({})
    expect(state.missingSlots()).toEqual(['assigner-memory', 'assigner-time', 'proof-memory', 'proof-time'])
  })

  it('records slots in any order', () => {
    const state = new BenchmarkState()
    state.record('proof-time', { value: 4.2, unit: 's' })
    state.record('assigner-memory', { value: 0.5, unit: 'GB' })
    expect(state.missingSlots()).toEqual(['assigner-time', 'proof-memory'])
    expect(state.snapshot()).toEqual({
      'assigner-memory': { value: 0.5, unit: 'GB' },
      'proof-time': { value: 4.2, unit: 's' }
    })
  })

  it('overwrites a slot that is recorded again and keeps the others', () => {
    const state = new BenchmarkState()
    state.record('assigner-memory', { value: 0.5, unit: 'GB' })
    state.record('assigner-time', { value: 1.25, unit: 's' })
    state.record('proof-memory', { value: 2, unit: 'GB' })
    state.record('assigner-time', { value: 1.75, unit: 's' })
    expect(state.snapshot()).toEqual({
      'assigner-memory': { value: 0.5, unit: 'GB' },
      'assigner-time': { value: 1.75, unit: 's' },
      'proof-memory': { value: 2, unit: 'GB' }
    })
    expect(core.debug).toHaveBeenCalledWith('Replacing assigner-time value 1.25s with 1.75s')
  })

  it('returns snapshots that are detached from the state', () => {
    const state = new BenchmarkState()
    state.record('proof-memory', { value: 2, unit: 'GB' })
    const before = state.snapshot()
    state.record('proof-memory', { value: 3, unit: 'GB' })
    expect(before['proof-memory']).toEqual({ value: 2, unit: 'GB' })
    expect(Object.isFrozen(before)).toBe(true)
  })
})
