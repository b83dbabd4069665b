/**
 * Check registry
 *
 * Registration order is the canonical order of results and reports.
 * Definitions are frozen; toggling replaces the stored record, so a
 * snapshot taken by a running pass never changes under it.
 */

import { AppError } from '../shared/error.js'
import { type Result, ok, err } from '../shared/result.js'
import type { CheckCategory, CheckDefinition, CheckId } from './types.js'

export interface CheckRegistration {
  id: CheckId
  category: CheckCategory
  displayName: string
  enabled?: boolean
}

export interface CheckRegistry {
  register(registration: CheckRegistration): CheckDefinition
  list(): readonly CheckDefinition[]
  listEnabled(): readonly CheckDefinition[]
  get(id: CheckId): CheckDefinition | undefined
  has(id: CheckId): boolean
  setEnabled(id: CheckId, enabled: boolean): Result<CheckDefinition, AppError>
  /** Enable exactly `ids`; any unknown id rejects the whole set */
  applyEnabledSet(ids: Iterable<CheckId>): Result<readonly CheckDefinition[], AppError>
}

export function createCheckRegistry(registrations: readonly CheckRegistration[] = []): CheckRegistry {
  const order: CheckId[] = []
  const definitions = new Map<CheckId, CheckDefinition>()

  function snapshot(filter?: (def: CheckDefinition) => boolean): readonly CheckDefinition[] {
    const defs: CheckDefinition[] = []
    for (const id of order) {
      const def = definitions.get(id)
      if (def && (!filter || filter(def))) defs.push(def)
    }
    return Object.freeze(defs)
  }

  const registry: CheckRegistry = {
    register(registration) {
      if (definitions.has(registration.id)) {
        throw AppError.invariant(`Check registered twice: ${registration.id}`)
      }
      const def: CheckDefinition = Object.freeze({
        id: registration.id,
        category: registration.category,
        displayName: registration.displayName,
        enabled: registration.enabled ?? true,
      })
      order.push(def.id)
      definitions.set(def.id, def)
      return def
    },

    list() {
      return snapshot()
    },

    listEnabled() {
      return snapshot(def => def.enabled)
    },

    get(id) {
      return definitions.get(id)
    },

    has(id) {
      return definitions.has(id)
    },

    setEnabled(id, enabled) {
      const current = definitions.get(id)
      if (!current) return err(AppError.unknownCheck(id))
      if (current.enabled === enabled) return ok(current)

      const next: CheckDefinition = Object.freeze({ ...current, enabled })
      definitions.set(id, next)
      return ok(next)
    },

    applyEnabledSet(ids) {
      const wanted = new Set(ids)
      const unknown = [...wanted].filter(id => !definitions.has(id))
      if (unknown.length > 0) {
        return err(
          AppError.configInvalid(`unknown check id(s) in enabled_checks: ${unknown.join(', ')}`)
        )
      }

      for (const id of order) {
        registry.setEnabled(id, wanted.has(id))
      }
      return ok(registry.listEnabled())
    },
  }

  for (const registration of registrations) {
    registry.register(registration)
  }

  return registry
}
