/**
 * Result: a failure the caller is expected to handle, returned instead of thrown.
 * Registry toggles and probe executions hand these back.
 */

export type Result<T, E = Error> = { ok: true; value: T } | { ok: false; error: E }

export const ok = <T>(value: T): { ok: true; value: T } => ({ ok: true, value })

export const err = <E>(error: E): { ok: false; error: E } => ({ ok: false, error })

/** Settle a promise into a Result; non-Error rejections are wrapped */
export function fromPromise<T>(promise: Promise<T>): Promise<Result<T, Error>> {
  return promise.then(
    value => ok(value),
    (reason: unknown) => err(reason instanceof Error ? reason : new Error(String(reason)))
  )
}
