import type { Coord } from './types'

export type EngineErrorCode =
  | 'OUT_OF_BOUNDS'
  | 'RETRY_LIMIT_EXCEEDED'
  | 'INVALID_DIRECTION'
  | 'INVALID_CONFIG'

export class EngineError extends Error {
  readonly code: EngineErrorCode

  constructor(code: EngineErrorCode, message: string) {
    super(message)
    this.name = 'EngineError'
    this.code = code
  }
}

export class OutOfBoundsError extends EngineError {
  readonly x: number
  readonly y: number

  constructor(x: number, y: number, width: number, height: number) {
    super('OUT_OF_BOUNDS', `Cell (${x}, ${y}) is outside the ${width}x${height} grid`)
    this.name = 'OutOfBoundsError'
    this.x = x
    this.y = y
  }
}

export class RetryLimitExceededError extends EngineError {
  readonly entityId: number
  readonly attempts: number
  // Toggles produced before the move gave up; never applied
  readonly pendingToggles: Coord[]

  constructor(args: { entityId: number; position: Coord; attempts: number; pendingToggles: Coord[] }) {
    const { entityId, position, attempts, pendingToggles } = args
    super(
      'RETRY_LIMIT_EXCEEDED',
      `Entity ${entityId} at (${position.x}, ${position.y}) did not resolve a move after ${attempts} retries`
    )
    this.name = 'RetryLimitExceededError'
    this.entityId = entityId
    this.attempts = attempts
    this.pendingToggles = pendingToggles
  }
}

export class InvalidDirectionError extends EngineError {
  constructor(direction: number) {
    super('INVALID_DIRECTION', `Direction ${direction} is not a diagonal heading`)
    this.name = 'InvalidDirectionError'
  }
}

export class InvalidConfigError extends EngineError {
  constructor(message: string) {
    super('INVALID_CONFIG', message)
    this.name = 'InvalidConfigError'
  }
}

export type SerializedError = {
  name: string
  message: string
  code?: EngineErrorCode
  stack?: string
}

const STACK_MAX_LINES = 30
const STACK_MAX_CHARS = 2000

function sanitizeStack(stack: string): string {
  const lines = stack.split('\n').slice(0, STACK_MAX_LINES)
  const joined = lines.join('\n')
  return joined.length > STACK_MAX_CHARS ? joined.slice(0, STACK_MAX_CHARS) : joined
}

export function isEngineError(error: unknown): error is EngineError {
  return error instanceof EngineError
}

export function serializeError(err: unknown): SerializedError {
  if (err instanceof Error) {
    const stack = typeof err.stack === 'string' && err.stack.length > 0 ? sanitizeStack(err.stack) : undefined
    const serialized: SerializedError = {
      name: err.name.length > 0 ? err.name : 'Error',
      message: err.message,
      stack,
    }
    if (isEngineError(err)) serialized.code = err.code
    return serialized
  }

  if (typeof err === 'string') {
    return { name: 'Error', message: err }
  }

  return { name: 'Error', message: String(err) }
}
