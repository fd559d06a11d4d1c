import { InvalidConfigError } from '@/core/engine/errors'
import {
  DEFAULT_DEBUG_EVERY,
  DEFAULT_GRID_HEIGHT,
  DEFAULT_GRID_WIDTH,
  DEFAULT_MAX_RETRIES,
  MAX_DEBUG_EVERY,
  MAX_GRID_SIZE,
  MAX_RETRIES_LIMIT,
} from '@/core/engine/limits'
import type { StepMode } from '@/core/engine/types'

export type SimulationConfig = {
  width: number
  height: number
  seed?: number
  maxRetries: number
  stepMode: StepMode
  defaultEntities: boolean
  // Debug dump cadence, in steps
  debugEvery: number
}

export const DEFAULT_CONFIG: SimulationConfig = {
  width: DEFAULT_GRID_WIDTH,
  height: DEFAULT_GRID_HEIGHT,
  maxRetries: DEFAULT_MAX_RETRIES,
  stepMode: 'batched',
  defaultEntities: true,
  debugEvery: DEFAULT_DEBUG_EVERY,
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null
}

function toFiniteNumber(value: unknown): number | null {
  if (typeof value === 'number' && Number.isFinite(value)) return value
  if (typeof value === 'string' && value.trim().length > 0) {
    const n = Number(value)
    if (Number.isFinite(n)) return n
  }
  return null
}

function clamp(n: number, min: number, max: number): number {
  return Math.max(min, Math.min(max, n))
}

function toClampedInt(value: unknown, min: number, max: number): number | null {
  const n = toFiniteNumber(value)
  if (n === null) return null
  return clamp(Math.floor(n), min, max)
}

function toBoolean(value: unknown): boolean | null {
  if (typeof value === 'boolean') return value
  if (value === 'true' || value === '1') return true
  if (value === 'false' || value === '0') return false
  return null
}

export type ParseConfigResult =
  | { ok: true; config: SimulationConfig }
  | { ok: false; error: string }

/**
 * Missing fields fall back to DEFAULT_CONFIG; present fields must parse.
 * Numbers are floored and clamped into range rather than rejected.
 */
export function parseSimulationConfig(data: unknown): ParseConfigResult {
  if (data === undefined || data === null) return { ok: true, config: { ...DEFAULT_CONFIG } }
  if (!isRecord(data)) return { ok: false, error: 'Config must be an object' }

  const config: SimulationConfig = { ...DEFAULT_CONFIG }

  if (data.width !== undefined) {
    const width = toClampedInt(data.width, 1, MAX_GRID_SIZE)
    if (width === null) return { ok: false, error: 'width invalid' }
    config.width = width
  }

  if (data.height !== undefined) {
    const height = toClampedInt(data.height, 1, MAX_GRID_SIZE)
    if (height === null) return { ok: false, error: 'height invalid' }
    config.height = height
  }

  if (data.seed !== undefined) {
    const seed = toFiniteNumber(data.seed)
    if (seed === null) return { ok: false, error: 'seed invalid' }
    config.seed = Math.floor(seed) >>> 0
  }

  if (data.maxRetries !== undefined) {
    const maxRetries = toClampedInt(data.maxRetries, 1, MAX_RETRIES_LIMIT)
    if (maxRetries === null) return { ok: false, error: 'maxRetries invalid' }
    config.maxRetries = maxRetries
  }

  if (data.stepMode !== undefined) {
    const stepMode = data.stepMode
    if (stepMode !== 'batched' && stepMode !== 'sequential') return { ok: false, error: 'stepMode invalid' }
    config.stepMode = stepMode
  }

  if (data.defaultEntities !== undefined) {
    const defaultEntities = toBoolean(data.defaultEntities)
    if (defaultEntities === null) return { ok: false, error: 'defaultEntities invalid' }
    config.defaultEntities = defaultEntities
  }

  if (data.debugEvery !== undefined) {
    const debugEvery = toClampedInt(data.debugEvery, 1, MAX_DEBUG_EVERY)
    if (debugEvery === null) return { ok: false, error: 'debugEvery invalid' }
    config.debugEvery = debugEvery
  }

  return { ok: true, config }
}

export function loadSimulationConfig(data: unknown): SimulationConfig {
  const parsed = parseSimulationConfig(data)
  if (!parsed.ok) throw new InvalidConfigError(parsed.error)
  return parsed.config
}

const ENV_KEYS = {
  width: 'DAYNIGHT_WIDTH',
  height: 'DAYNIGHT_HEIGHT',
  seed: 'DAYNIGHT_SEED',
  maxRetries: 'DAYNIGHT_MAX_RETRIES',
  stepMode: 'DAYNIGHT_STEP_MODE',
  defaultEntities: 'DAYNIGHT_DEFAULT_ENTITIES',
  debugEvery: 'DAYNIGHT_DEBUG_EVERY',
} as const

/** Config from DAYNIGHT_* environment variables; unset ones keep their defaults. */
export function configFromEnv(env: Record<string, string | undefined> = process.env): SimulationConfig {
  const raw: Record<string, unknown> = {}
  for (const [field, key] of Object.entries(ENV_KEYS)) {
    const value = env[key]
    if (value !== undefined && value !== '') raw[field] = value
  }
  return loadSimulationConfig(raw)
}
