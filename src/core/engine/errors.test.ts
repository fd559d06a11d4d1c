import { describe, expect, it } from 'vitest'

import { OutOfBoundsError, RetryLimitExceededError, isEngineError, serializeError } from './errors'

describe('engine/errors', () => {
  it('serializes engine errors with their code', () => {
    const err = new RetryLimitExceededError({
      entityId: 2,
      position: { x: 1, y: 3 },
      attempts: 8,
      pendingToggles: [{ x: 0, y: 0 }],
    })

    const ser = serializeError(err)
    expect(ser).toEqual(
      expect.objectContaining({
        name: 'RetryLimitExceededError',
        code: 'RETRY_LIMIT_EXCEEDED',
        message: 'Entity 2 at (1, 3) did not resolve a move after 8 retries',
      })
    )
    if (ser.stack !== undefined) {
      expect(ser.stack.split('\n').length).toBeLessThanOrEqual(30)
    }
  })

  it('leaves the code off plain errors', () => {
    const ser = serializeError(new TypeError('nope'))
    expect(ser.name).toBe('TypeError')
    expect(ser.code).toBeUndefined()
  })

  it('serializes non-Error values as message strings', () => {
    expect(serializeError('x')).toEqual({ name: 'Error', message: 'x' })
    expect(serializeError(123).message).toBe('123')
    expect(serializeError(null).message).toBe('null')
  })

  it('recognizes engine errors', () => {
    const err = new OutOfBoundsError(5, 0, 5, 5)
    expect(isEngineError(err)).toBe(true)
    expect(err.code).toBe('OUT_OF_BOUNDS')
    expect(isEngineError(new Error('plain'))).toBe(false)
  })
})
