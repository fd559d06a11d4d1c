// Shared engine limits (rule engine, simulation, config parsing).
// Keep these in one place so the validators and the engine agree.

export const DEFAULT_GRID_WIDTH = 20
export const DEFAULT_GRID_HEIGHT = 20
export const MAX_GRID_SIZE = 4096

export const DEFAULT_MAX_RETRIES = 8
export const MAX_RETRIES_LIMIT = 64

export const DEFAULT_DEBUG_EVERY = 30
export const MAX_DEBUG_EVERY = 10_000

export const MAX_RANDOM_ENTITIES = 10_000
