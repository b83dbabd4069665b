/**
 * Last sealed pass, as an owned, versioned cell
 *
 * Single writer (the orchestrator), many readers. Readers only ever see a
 * frozen pass; publishing a pass that is not newer than the current one is
 * a programming error.
 */

import { AppError } from '../shared/error.js'
import type { DiagnosticPass } from './types.js'

export type PassListener = (pass: DiagnosticPass) => void

export interface PassCell {
  publish(pass: DiagnosticPass): void
  current(): DiagnosticPass | null
  /** Number of publications so far */
  version(): number
  subscribe(listener: PassListener): () => void
}

export function createPassCell(): PassCell {
  let current: DiagnosticPass | null = null
  let version = 0
  const listeners = new Set<PassListener>()

  return {
    publish(pass) {
      if (current && pass.passId <= current.passId) {
        throw AppError.invariant(
          `Pass ${pass.passId} published after pass ${current.passId}`
        )
      }
      if (!Object.isFrozen(pass)) {
        throw AppError.invariant(`Pass ${pass.passId} published before it was sealed`)
      }

      current = pass
      version++
      for (const listener of listeners) {
        listener(pass)
      }
    },

    current() {
      return current
    },

    version() {
      return version
    },

    subscribe(listener) {
      listeners.add(listener)
      return () => {
        listeners.delete(listener)
      }
    },
  }
}
