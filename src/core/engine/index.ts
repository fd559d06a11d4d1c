/**
 * Main engine export
 */

export { Grid } from './core/Grid'
export type { IGrid } from './core/Grid'
export { Entity } from './core/Entity'
export { Simulation } from './core/Simulation'
export type { SimulationOptions } from './core/Simulation'
export { RuleEngine } from './rules/RuleEngine'
export type { IRuleEngine, RuleEngineOptions, RuleMetrics } from './rules/RuleEngine'
export { createDeterministicRng, randomSeed } from './rng'
export type { DeterministicRng } from './rng'
export {
  DIAGONALS,
  DIRECTION_SYMBOLS,
  DIRECTION_VECTORS,
  crossedBoundary,
  isDiagonal,
  reflect,
} from './directions'
export {
  EngineError,
  InvalidConfigError,
  InvalidDirectionError,
  OutOfBoundsError,
  RetryLimitExceededError,
  isEngineError,
  serializeError,
} from './errors'
export type { EngineErrorCode, SerializedError } from './errors'
export * from './types'
