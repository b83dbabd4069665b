import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest'
import { createScheduler, isRefreshInterval, REFRESH_INTERVAL_PRESETS } from '../scheduler.js'
import { createEventBus } from '../../shared/eventBus.js'
import type { DiagnosticEvents, RunOutcome } from '../types.js'
import { pass } from '../../../tests/helpers/diagnostics.js'

function fakeOrchestrator() {
  let passId = 0
  let running = false
  return {
    run: vi.fn(async (): Promise<RunOutcome> => {
      passId++
      return { kind: 'published', pass: pass(passId, []) }
    }),
    isRunning: vi.fn(() => running),
    setRunning(value: boolean) {
      running = value
    },
  }
}

describe('refresh interval presets', () => {
  it('lists the presets in order', () => {
    expect(REFRESH_INTERVAL_PRESETS).toEqual(['off', '30s', '1m', '2m', '5m'])
  })

  it('recognizes only presets', () => {
    expect(isRefreshInterval('2m')).toBe(true)
    expect(isRefreshInterval('10m')).toBe(false)
    expect(isRefreshInterval('toString')).toBe(false)
  })
})

describe('createScheduler', () => {
  beforeEach(() => {
    vi.useFakeTimers()
    vi.setSystemTime(new Date('2026-03-01T10:00:00.000Z'))
  })

  afterEach(() => {
    vi.useRealTimers()
  })

  it('runs on start and then on every interval', async () => {
    const orchestrator = fakeOrchestrator()
    const scheduler = createScheduler({ orchestrator, interval: '30s' })

    scheduler.start()
    expect(orchestrator.run).toHaveBeenCalledTimes(1)
    expect(scheduler.nextRunAt()).toBe('2026-03-01T10:00:30.000Z')

    await vi.advanceTimersByTimeAsync(30_000)
    expect(orchestrator.run).toHaveBeenCalledTimes(2)

    await vi.advanceTimersByTimeAsync(60_000)
    expect(orchestrator.run).toHaveBeenCalledTimes(4)
    scheduler.stop()
  })

  it('waits a full interval when runOnStart is false', async () => {
    const orchestrator = fakeOrchestrator()
    const scheduler = createScheduler({ orchestrator, interval: '1m', runOnStart: false })

    scheduler.start()
    expect(orchestrator.run).not.toHaveBeenCalled()

    await vi.advanceTimersByTimeAsync(60_000)
    expect(orchestrator.run).toHaveBeenCalledTimes(1)
    scheduler.stop()
  })

  it('defaults to off', async () => {
    const orchestrator = fakeOrchestrator()
    const scheduler = createScheduler({ orchestrator, runOnStart: false })

    scheduler.start()
    await vi.advanceTimersByTimeAsync(10 * 60_000)

    expect(scheduler.getRefreshInterval()).toBe('off')
    expect(orchestrator.run).not.toHaveBeenCalled()
    scheduler.stop()
  })

  it('never fires on its own when off', async () => {
    const orchestrator = fakeOrchestrator()
    const scheduler = createScheduler({ orchestrator, interval: 'off' })

    scheduler.start()
    await vi.advanceTimersByTimeAsync(10 * 60_000)

    expect(orchestrator.run).toHaveBeenCalledTimes(1)
    expect(scheduler.nextRunAt()).toBeNull()
    scheduler.stop()
  })

  it('a manual run restarts the countdown', async () => {
    const orchestrator = fakeOrchestrator()
    const scheduler = createScheduler({ orchestrator, interval: '1m', runOnStart: false })
    scheduler.start()

    await vi.advanceTimersByTimeAsync(45_000)
    await scheduler.runNow()
    expect(scheduler.nextRunAt()).toBe('2026-03-01T10:01:45.000Z')

    await vi.advanceTimersByTimeAsync(30_000)
    expect(orchestrator.run).toHaveBeenCalledTimes(1)

    await vi.advanceTimersByTimeAsync(30_000)
    expect(orchestrator.run).toHaveBeenCalledTimes(2)
    scheduler.stop()
  })

  it('hands a manual run to the orchestrator even while a pass is running', async () => {
    const orchestrator = fakeOrchestrator()
    orchestrator.setRunning(true)
    const scheduler = createScheduler({ orchestrator, interval: 'off' })

    expect(scheduler.state()).toBe('running')
    await scheduler.runNow()
    expect(orchestrator.run).toHaveBeenCalledTimes(1)
  })

  it('re-arms with the new interval', async () => {
    const orchestrator = fakeOrchestrator()
    const scheduler = createScheduler({ orchestrator, interval: '5m', runOnStart: false })
    scheduler.start()

    scheduler.setRefreshInterval('30s')
    expect(scheduler.getRefreshInterval()).toBe('30s')
    await vi.advanceTimersByTimeAsync(30_000)
    expect(orchestrator.run).toHaveBeenCalledTimes(1)

    scheduler.setRefreshInterval('off')
    await vi.advanceTimersByTimeAsync(10 * 60_000)
    expect(orchestrator.run).toHaveBeenCalledTimes(1)
    scheduler.stop()
  })

  it('stop cancels the pending timer', async () => {
    const orchestrator = fakeOrchestrator()
    const scheduler = createScheduler({ orchestrator, interval: '30s', runOnStart: false })
    scheduler.start()
    scheduler.stop()

    await vi.advanceTimersByTimeAsync(60_000)
    expect(orchestrator.run).not.toHaveBeenCalled()
    expect(scheduler.isStarted()).toBe(false)
  })

  it('emits a tick after each timer-driven pass', async () => {
    const orchestrator = fakeOrchestrator()
    const events = createEventBus<DiagnosticEvents>()
    const tick = vi.fn()
    events.on('scheduler:tick', tick)
    const scheduler = createScheduler({ orchestrator, interval: '30s', runOnStart: false, events })
    scheduler.start()

    await vi.advanceTimersByTimeAsync(30_000)
    await vi.waitFor(() => expect(tick).toHaveBeenCalled())
    expect(tick).toHaveBeenCalledWith({ at: '2026-03-01T10:00:30.000Z' })
    scheduler.stop()
  })
})
