/**
 * Event bus
 * Minimal typed publish/subscribe between the engine and its presentation layer
 */

import { createLogger } from './logger.js'
import { getErrorMessage } from './assertError.js'

const logger = createLogger('events')

export type EventHandler<T> = (payload: T) => void | Promise<void>

export interface EventBus<Events extends object> {
  on<K extends keyof Events>(event: K, handler: EventHandler<Events[K]>): () => void
  off<K extends keyof Events>(event: K, handler: EventHandler<Events[K]>): void
  emit<K extends keyof Events>(event: K, payload: Events[K]): Promise<void>
  once<K extends keyof Events>(event: K, handler: EventHandler<Events[K]>): () => void
  clear(event?: keyof Events): void
}

type HandlerTable<Events extends object> = {
  [K in keyof Events]?: Set<EventHandler<Events[K]>>
}

export function createEventBus<Events extends object>(): EventBus<Events> {
  let handlers: HandlerTable<Events> = {}

  function handlersFor<K extends keyof Events>(event: K): Set<EventHandler<Events[K]>> {
    const existing = handlers[event]
    if (existing) return existing
    const created = new Set<EventHandler<Events[K]>>()
    handlers[event] = created
    return created
  }

  const bus: EventBus<Events> = {
    on<K extends keyof Events>(event: K, handler: EventHandler<Events[K]>): () => void {
      handlersFor(event).add(handler)
      return () => bus.off(event, handler)
    },

    off<K extends keyof Events>(event: K, handler: EventHandler<Events[K]>): void {
      handlers[event]?.delete(handler)
    },

    async emit<K extends keyof Events>(event: K, payload: Events[K]): Promise<void> {
      const eventHandlers = handlers[event]
      if (!eventHandlers || eventHandlers.size === 0) return

      const promises = Array.from(eventHandlers).map(async handler => {
        try {
          await handler(payload)
        } catch (e) {
          logger.error(`Event handler error for ${String(event)}: ${getErrorMessage(e)}`)
        }
      })

      await Promise.all(promises)
    },

    once<K extends keyof Events>(event: K, handler: EventHandler<Events[K]>): () => void {
      const wrapper: EventHandler<Events[K]> = async payload => {
        bus.off(event, wrapper)
        await handler(payload)
      }
      return bus.on(event, wrapper)
    },

    clear(event?: keyof Events): void {
      if (event !== undefined) {
        delete handlers[event]
      } else {
        handlers = {}
      }
    },
  }

  return bus
}
