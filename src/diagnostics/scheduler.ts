/**
 * Diagnostic scheduler
 *
 * setTimeout-based: one pending timer at most, re-armed by every trigger.
 * Timer fires and manual runs both go straight to the orchestrator, which
 * preempts a pass already in flight instead of queuing behind it.
 */

import { createLogger, logError } from '../shared/logger.js'
import { ensureError } from '../shared/assertError.js'
import type { EventBus } from '../shared/eventBus.js'
import type { Orchestrator } from './orchestrator.js'
import type { DiagnosticEvents, RunOutcome } from './types.js'

const logger = createLogger('scheduler')

export const REFRESH_INTERVALS = {
  off: null,
  '30s': 30 * 1000,
  '1m': 60 * 1000,
  '2m': 2 * 60 * 1000,
  '5m': 5 * 60 * 1000,
} as const satisfies Record<string, number | null>

export type RefreshInterval = keyof typeof REFRESH_INTERVALS

export const REFRESH_INTERVAL_PRESETS = Object.keys(REFRESH_INTERVALS).filter(isRefreshInterval)

export function isRefreshInterval(value: string): value is RefreshInterval {
  return Object.prototype.hasOwnProperty.call(REFRESH_INTERVALS, value)
}

export type SchedulerState = 'idle' | 'running'

export interface SchedulerOptions {
  orchestrator: Pick<Orchestrator, 'run' | 'isRunning'>
  interval?: RefreshInterval
  /** Run a pass as soon as start() is called */
  runOnStart?: boolean
  events?: EventBus<DiagnosticEvents>
}

export interface Scheduler {
  start(): void
  stop(): void
  runNow(): Promise<RunOutcome>
  setRefreshInterval(interval: RefreshInterval): void
  getRefreshInterval(): RefreshInterval
  state(): SchedulerState
  isStarted(): boolean
  /** ISO time of the next timer fire, null when idle or off */
  nextRunAt(): string | null
}

export function createScheduler(options: SchedulerOptions): Scheduler {
  const { orchestrator, events } = options
  const runOnStart = options.runOnStart ?? true

  let interval: RefreshInterval = options.interval ?? 'off'
  let started = false
  let timer: ReturnType<typeof setTimeout> | null = null
  let nextRunAt: number | null = null

  function disarm(): void {
    if (timer) clearTimeout(timer)
    timer = null
    nextRunAt = null
  }

  function arm(): void {
    disarm()
    const delay = REFRESH_INTERVALS[interval]
    if (!started || delay === null) return

    nextRunAt = Date.now() + delay
    timer = setTimeout(onTimer, delay)
  }

  function onTimer(): void {
    timer = null
    nextRunAt = null
    const at = new Date().toISOString()
    logger.debug(`Timer fired (${interval})`)
    trigger()
      .then(() => events?.emit('scheduler:tick', { at }))
      .catch(error => logError(logger, 'Scheduled pass failed', ensureError(error)))
  }

  function trigger(): Promise<RunOutcome> {
    if (orchestrator.isRunning()) {
      logger.debug('Pass in flight, preempting it')
    }
    arm()
    return orchestrator.run()
  }

  return {
    start() {
      if (started) return
      started = true
      logger.info(`Scheduler started (interval: ${interval})`)
      if (runOnStart) {
        trigger().catch(error => logError(logger, 'Initial pass failed', ensureError(error)))
      } else {
        arm()
      }
    },

    stop() {
      if (!started) return
      started = false
      disarm()
      logger.info('Scheduler stopped')
    },

    runNow() {
      return trigger()
    },

    setRefreshInterval(next) {
      if (next === interval) return
      logger.info(`Refresh interval: ${interval} → ${next}`)
      interval = next
      arm()
    },

    getRefreshInterval() {
      return interval
    },

    state() {
      return orchestrator.isRunning() ? 'running' : 'idle'
    },

    isStarted() {
      return started
    },

    nextRunAt() {
      return nextRunAt === null ? null : new Date(nextRunAt).toISOString()
    },
  }
}
