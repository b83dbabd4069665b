import { describe, it, expect, vi } from 'vitest'
import { createPassCell } from '../passCell.js'
import { pass, result } from '../../../tests/helpers/diagnostics.js'

describe('createPassCell', () => {
  it('starts empty', () => {
    const cell = createPassCell()
    expect(cell.current()).toBeNull()
    expect(cell.version()).toBe(0)
  })

  it('publishes and notifies subscribers synchronously', () => {
    const cell = createPassCell()
    const listener = vi.fn()
    cell.subscribe(listener)

    const first = pass(1, [result({ checkId: 'a' })])
    cell.publish(first)

    expect(listener).toHaveBeenCalledWith(first)
    expect(cell.current()).toBe(first)
    expect(cell.version()).toBe(1)
  })

  it('rejects a pass that is not newer than the current one', () => {
    const cell = createPassCell()
    cell.publish(pass(2, []))

    expect(() => cell.publish(pass(2, []))).toThrow('Pass 2 published after pass 2')
    expect(() => cell.publish(pass(1, []))).toThrow('Pass 1 published after pass 2')
    expect(cell.version()).toBe(1)
  })

  it('rejects an unsealed pass', () => {
    const cell = createPassCell()
    const open = { passId: 1, startedAt: '', finishedAt: '', results: [], overallStatus: 'unknown' as const }
    expect(() => cell.publish(open)).toThrow('Pass 1 published before it was sealed')
  })

  it('stops notifying after unsubscribe', () => {
    const cell = createPassCell()
    const listener = vi.fn()
    const unsubscribe = cell.subscribe(listener)
    unsubscribe()
    cell.publish(pass(1, []))
    expect(listener).not.toHaveBeenCalled()
  })
})
