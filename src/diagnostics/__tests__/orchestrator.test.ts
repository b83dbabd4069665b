import { describe, it, expect, vi } from 'vitest'
import { createOrchestrator, RUN_DEADLINE_FACTOR } from '../orchestrator.js'
import { createCheckRegistry } from '../registry.js'
import { createEventBus } from '../../shared/eventBus.js'
import type { DiagnosticEvents, RunOutcome } from '../types.js'
import type { Probe } from '../probe.js'
import { fakeProbe, hangingProbe, registration } from '../../../tests/helpers/diagnostics.js'

function published(outcome: RunOutcome) {
  if (outcome.kind !== 'published') {
    throw new Error(`expected a published pass, got ${outcome.kind}`)
  }
  return outcome.pass
}

describe('createOrchestrator', () => {
  it('runs every enabled check and keeps registry order', async () => {
    const regs = [registration('local_resources'), registration('internet', 'network'), registration('opencode', 'process')]
    const registry = createCheckRegistry(regs)
    const orchestrator = createOrchestrator({
      registry,
      probes: [
        fakeProbe(regs[0], { status: 'ok', headline: 'NORMAL' }, { delayMs: 30 }),
        fakeProbe(regs[1], { status: 'warning', headline: 'SLOW' }, { delayMs: 5 }),
        fakeProbe(regs[2], { status: 'ok', headline: 'RUNNING' }, { delayMs: 15 }),
      ],
    })

    const pass = published(await orchestrator.run())

    expect(pass.passId).toBe(1)
    expect(pass.results.map(r => r.checkId)).toEqual(['local_resources', 'internet', 'opencode'])
    expect(pass.overallStatus).toBe('warning')
    expect(Object.isFrozen(pass)).toBe(true)
    expect(orchestrator.currentPass()).toBe(pass)
    expect(orchestrator.isRunning()).toBe(false)
  })

  it('publishes an empty pass as unknown when nothing is enabled', async () => {
    const registry = createCheckRegistry([registration('gpu', 'system', false)])
    const orchestrator = createOrchestrator({ registry, probes: [] })

    const pass = published(await orchestrator.run())
    expect(pass.results).toEqual([])
    expect(pass.overallStatus).toBe('unknown')
  })

  it('reports a check without a probe as unavailable', async () => {
    const registry = createCheckRegistry([registration('vpn', 'network')])
    const orchestrator = createOrchestrator({ registry, probes: [] })

    const [result] = published(await orchestrator.run()).results
    expect(result.status).toBe('unknown')
    expect(result.headline).toBe('UNAVAILABLE')
    expect(result.error).toBe('no probe registered for vpn')
  })

  it('never runs more probes at once than maxConcurrency', async () => {
    const regs = ['a', 'b', 'c', 'd', 'e'].map(id => registration(id))
    let active = 0
    let peak = 0
    const probes: Probe[] = regs.map(reg =>
      fakeProbe(
        reg,
        async () => {
          active--
          return { status: 'ok', headline: 'NORMAL' }
        },
        {
          delayMs: 20,
          onRun: () => {
            active++
            peak = Math.max(peak, active)
          },
        }
      )
    )
    const orchestrator = createOrchestrator({ registry: createCheckRegistry(regs), probes, maxConcurrency: 2 })

    const pass = published(await orchestrator.run())
    expect(pass.results).toHaveLength(5)
    expect(peak).toBe(2)
  })

  it('abandons a probe that ignores cancellation after the grace period', async () => {
    const regs = [registration('claude_api', 'api-provider'), registration('local_resources')]
    const orchestrator = createOrchestrator({
      registry: createCheckRegistry(regs),
      probes: [hangingProbe(regs[0]), fakeProbe(regs[1], { status: 'ok', headline: 'NORMAL' })],
      probeTimeoutMs: 40,
      graceMs: 20,
    })

    const pass = published(await orchestrator.run())
    const [api, local] = pass.results
    expect(api.status).toBe('critical')
    expect(api.headline).toBe('TIMEOUT')
    expect(api.error).toBe('timed out after 40ms')
    expect(local.status).toBe('ok')
    expect(pass.overallStatus).toBe('critical')
  })

  it('fills outstanding checks when the run deadline passes', async () => {
    const regs = [registration('gpu'), registration('local_resources')]
    const orchestrator = createOrchestrator({
      registry: createCheckRegistry(regs),
      probes: [
        fakeProbe(regs[0], { status: 'ok', headline: 'NORMAL' }, { delayMs: 500 }),
        fakeProbe(regs[1], { status: 'ok', headline: 'NORMAL' }),
      ],
      probeTimeoutMs: 1000,
      runDeadlineMs: 40,
    })

    const pass = published(await orchestrator.run())
    const [gpu, local] = pass.results
    expect(gpu.status).toBe('unknown')
    expect(gpu.headline).toBe('TIMEOUT')
    expect(gpu.error).toBe('timed out')
    expect(gpu.latencyMs).toBe(40)
    expect(local.headline).toBe('NORMAL')
  })

  it('discards a pass preempted by a newer run', async () => {
    const regs = [registration('internet', 'network')]
    const events = createEventBus<DiagnosticEvents>()
    const discarded = vi.fn()
    events.on('pass:discarded', discarded)
    const orchestrator = createOrchestrator({
      registry: createCheckRegistry(regs),
      probes: [fakeProbe(regs[0], { status: 'ok', headline: 'ONLINE' }, { delayMs: 30 })],
      events,
    })
    const publishSpy = vi.spyOn(orchestrator.cell, 'publish')

    const first = orchestrator.run()
    const second = orchestrator.run()
    const [firstOutcome, secondOutcome] = await Promise.all([first, second])

    expect(firstOutcome).toEqual({ kind: 'discarded', passId: 1, reason: 'preempted' })
    expect(published(secondOutcome).passId).toBe(2)
    expect(publishSpy).toHaveBeenCalledTimes(1)
    expect(discarded).toHaveBeenCalledWith({ passId: 1, reason: 'preempted' })
    expect(orchestrator.currentPass()?.passId).toBe(2)
  })

  it('cancel discards the in-flight pass without publishing', async () => {
    const regs = [registration('local_resources')]
    const orchestrator = createOrchestrator({
      registry: createCheckRegistry(regs),
      probes: [fakeProbe(regs[0], { status: 'ok', headline: 'NORMAL' }, { delayMs: 50 })],
    })

    const running = orchestrator.run()
    expect(orchestrator.isRunning()).toBe(true)
    expect(orchestrator.cancel()).toBe(true)

    expect(await running).toEqual({ kind: 'discarded', passId: 1, reason: 'cancelled' })
    expect(orchestrator.currentPass()).toBeNull()
    expect(orchestrator.cancel()).toBe(false)
  })

  it('uses the enabled set captured at start', async () => {
    const regs = [registration('local_resources'), registration('gpu')]
    const registry = createCheckRegistry(regs)
    const orchestrator = createOrchestrator({
      registry,
      probes: [
        fakeProbe(regs[0], { status: 'ok', headline: 'NORMAL' }, { delayMs: 20 }),
        fakeProbe(regs[1], { status: 'ok', headline: 'NORMAL' }),
      ],
    })

    const running = orchestrator.run()
    registry.setEnabled('gpu', false)
    const pass = published(await running)

    expect(pass.results.map(r => r.checkId)).toEqual(['local_resources', 'gpu'])
    expect(published(await orchestrator.run()).results.map(r => r.checkId)).toEqual(['local_resources'])
  })

  it('emits lifecycle events', async () => {
    const regs = [registration('local_resources')]
    const events = createEventBus<DiagnosticEvents>()
    const started = vi.fn()
    const onPublished = vi.fn()
    events.on('pass:started', started)
    events.on('pass:published', onPublished)
    const orchestrator = createOrchestrator({
      registry: createCheckRegistry(regs),
      probes: [fakeProbe(regs[0], { status: 'ok', headline: 'NORMAL' })],
      events,
    })

    const pass = published(await orchestrator.run())
    expect(started).toHaveBeenCalledWith({ passId: 1, checkIds: ['local_resources'] })
    expect(onPublished).toHaveBeenCalledWith({ pass })
  })

  it('stamps the pass with the injected clock', async () => {
    const times = ['2026-03-01T10:00:00.000Z', '2026-03-01T10:00:02.000Z']
    const now = vi.fn(() => new Date(times.shift() ?? '2026-03-01T10:00:09.000Z'))
    const orchestrator = createOrchestrator({ registry: createCheckRegistry(), probes: [], now })

    const pass = published(await orchestrator.run())
    expect(pass.startedAt).toBe('2026-03-01T10:00:00.000Z')
    expect(pass.finishedAt).toBe('2026-03-01T10:00:02.000Z')
  })

  it('derives the run deadline from the probe timeout unless set', () => {
    const orchestrator = createOrchestrator({ registry: createCheckRegistry(), probes: [] })
    expect(orchestrator.timings()).toEqual({
      probeTimeoutMs: 5000,
      runDeadlineMs: 5000 * RUN_DEADLINE_FACTOR,
      graceMs: 250,
      maxConcurrency: 8,
    })

    orchestrator.configure({ probeTimeoutMs: 2000 })
    expect(orchestrator.timings().runDeadlineMs).toBe(6000)

    orchestrator.configure({ runDeadlineMs: 9000 })
    expect(orchestrator.timings()).toMatchObject({ probeTimeoutMs: 2000, runDeadlineMs: 9000 })
  })
})
