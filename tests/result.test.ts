/**
 * Result type
 */

import { describe, it, expect } from 'vitest'
import { ok, err, fromPromise, type Result } from '../src/shared/result.js'

describe('Result constructors', () => {
  it('ok wraps a value', () => {
    const result = ok(42)
    expect(result.ok).toBe(true)
    expect(result.value).toBe(42)
  })

  it('err wraps an error', () => {
    const error = new Error('failed')
    const result = err(error)
    expect(result.ok).toBe(false)
    expect(result.error).toBe(error)
  })
})

describe('Result narrowing', () => {
  it('exposes the value or the error by the ok flag', () => {
    const results: Result<number, string>[] = [ok(1), err('nope')]
    const seen = results.map(result => (result.ok ? `value:${result.value}` : `error:${result.error}`))
    expect(seen).toEqual(['value:1', 'error:nope'])
  })
})

describe('fromPromise', () => {
  it('captures resolution', async () => {
    expect(await fromPromise(Promise.resolve('done'))).toEqual({ ok: true, value: 'done' })
  })

  it('captures rejection as an Error', async () => {
    const result = await fromPromise(Promise.reject('plain string'))
    expect(result.ok).toBe(false)
    if (!result.ok) {
      expect(result.error).toBeInstanceOf(Error)
      expect(result.error.message).toBe('plain string')
    }
  })
})
