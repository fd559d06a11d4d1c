import { describe, expect, it } from 'vitest'
import { InvalidConfigError } from '@/core/engine/errors'
import { DEFAULT_CONFIG, configFromEnv, loadSimulationConfig, parseSimulationConfig } from './config'

describe('parseSimulationConfig', () => {
  it('returns defaults for a missing config', () => {
    expect(parseSimulationConfig(undefined)).toEqual({ ok: true, config: DEFAULT_CONFIG })
    expect(DEFAULT_CONFIG).toEqual({
      width: 20,
      height: 20,
      maxRetries: 8,
      stepMode: 'batched',
      defaultEntities: true,
      debugEvery: 30,
    })
  })

  it('floors and clamps numeric fields', () => {
    const result = parseSimulationConfig({ width: '30.7', height: 5000, maxRetries: 0, debugEvery: 2.5 })
    expect(result).toEqual({
      ok: true,
      config: { ...DEFAULT_CONFIG, width: 30, height: 4096, maxRetries: 1, debugEvery: 2 },
    })
  })

  it('wraps seeds into uint32', () => {
    const result = parseSimulationConfig({ seed: -1 })
    expect(result.ok && result.config.seed).toBe(4294967295)
  })

  it('rejects fields that do not parse', () => {
    expect(parseSimulationConfig({ width: 'abc' })).toEqual({ ok: false, error: 'width invalid' })
    expect(parseSimulationConfig({ stepMode: 'parallel' })).toEqual({ ok: false, error: 'stepMode invalid' })
    expect(parseSimulationConfig({ defaultEntities: 'maybe' })).toEqual({ ok: false, error: 'defaultEntities invalid' })
    expect(parseSimulationConfig(42)).toEqual({ ok: false, error: 'Config must be an object' })
  })
})

describe('loadSimulationConfig', () => {
  it('throws InvalidConfigError on bad input', () => {
    expect(() => loadSimulationConfig({ height: '' })).toThrow(InvalidConfigError)
    expect(() => loadSimulationConfig({ height: '' })).toThrow('height invalid')
  })
})

describe('configFromEnv', () => {
  it('reads DAYNIGHT_* variables and keeps defaults for the rest', () => {
    const config = configFromEnv({
      DAYNIGHT_WIDTH: '8',
      DAYNIGHT_STEP_MODE: 'sequential',
      DAYNIGHT_DEFAULT_ENTITIES: 'false',
      DAYNIGHT_SEED: '',
      UNRELATED: 'x',
    })

    expect(config).toEqual({
      ...DEFAULT_CONFIG,
      width: 8,
      stepMode: 'sequential',
      defaultEntities: false,
    })
  })
})
