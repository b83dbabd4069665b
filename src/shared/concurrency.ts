/**
 * Concurrency primitives
 *
 * - createLimiter: counting semaphore with a FIFO wait queue
 * - createExclusiveSlot: size-1 slot where a new claim preempts the holder
 */

// ============ Limiter ============

export interface Limiter {
  /** Resolve once a slot is free; the slot must be released exactly once */
  acquire(): Promise<void>
  release(): void
  /** acquire → fn → release */
  run<T>(fn: () => Promise<T>): Promise<T>
  info(): { active: number; waiting: number; max: number }
}

export function createLimiter(max: number): Limiter {
  if (!Number.isInteger(max) || max < 1) {
    throw new RangeError(`Limiter size must be a positive integer, got ${max}`)
  }

  let active = 0
  const waitQueue: Array<() => void> = []

  function acquire(): Promise<void> {
    if (active < max) {
      active++
      return Promise.resolve()
    }
    return new Promise(resolve => {
      waitQueue.push(() => {
        active++
        resolve()
      })
    })
  }

  function release(): void {
    active--
    const next = waitQueue.shift()
    if (next) next()
  }

  return {
    acquire,
    release,
    async run<T>(fn: () => Promise<T>): Promise<T> {
      await acquire()
      try {
        return await fn()
      } finally {
        release()
      }
    },
    info() {
      return { active, waiting: waitQueue.length, max }
    },
  }
}

// ============ Exclusive slot ============

export interface SlotClaim {
  readonly id: number
  /** Aborted when a newer claim preempts this one or the slot is cancelled */
  readonly signal: AbortSignal
}

export interface ExclusiveSlot {
  /** Take the slot, aborting whoever held it */
  claim(): SlotClaim
  /** True while `claim` is the current, non-aborted holder */
  holds(claim: SlotClaim): boolean
  release(claim: SlotClaim): void
  /** Abort the current holder, if any */
  cancel(reason?: string): boolean
  isHeld(): boolean
}

export function createExclusiveSlot(): ExclusiveSlot {
  let counter = 0
  let holder: { claim: SlotClaim; controller: AbortController } | null = null

  return {
    claim(): SlotClaim {
      if (holder) {
        holder.controller.abort(new Error('preempted'))
      }
      const controller = new AbortController()
      const claim: SlotClaim = { id: ++counter, signal: controller.signal }
      holder = { claim, controller }
      return claim
    },

    holds(claim: SlotClaim): boolean {
      return holder !== null && holder.claim.id === claim.id && !claim.signal.aborted
    },

    release(claim: SlotClaim): void {
      if (holder && holder.claim.id === claim.id) {
        holder = null
      }
    },

    cancel(reason = 'cancelled'): boolean {
      if (!holder) return false
      holder.controller.abort(new Error(reason))
      holder = null
      return true
    },

    isHeld(): boolean {
      return holder !== null
    },
  }
}
