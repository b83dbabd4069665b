/**
 * Vitest global setup
 * Clears settings env vars so a developer's shell never leaks into a test,
 * and restores real timers after each test.
 */

import { afterEach, beforeEach, vi } from 'vitest'

const SETTINGS_ENV = [
  'CHAIN_DOCTOR_CONFIG',
  'CHAIN_DOCTOR_REFRESH_INTERVAL',
  'CHAIN_DOCTOR_PROBE_TIMEOUT',
  'CHAIN_DOCTOR_BACKGROUND',
]

beforeEach(() => {
  for (const key of SETTINGS_ENV) {
    delete process.env[key]
  }
})

afterEach(() => {
  vi.useRealTimers()
})
