import { createStore } from 'zustand/vanilla'
import { Simulation, serializeError, type CellState, type EntityView, type SerializedError } from '@/core/engine'
import { debugLog, isDebugLogging, setDebugLogging } from '@/core/logging/log'
import { DEFAULT_CONFIG, type SimulationConfig } from './config'

export interface SimulationState {
  // Read-only view for renderers
  width: number
  height: number
  entities: readonly EntityView[]
  dayCount: number
  nightCount: number
  stepCount: number
  debug: boolean
  // Set when a step fails; stepping stays halted until reset()
  lastError: SerializedError | null

  // Actions
  step: () => void
  reset: () => void
  toggleDebug: () => void
  getCell: (x: number, y: number) => CellState
}

function snapshot(simulation: Simulation) {
  const { day, night } = simulation.counts
  return {
    entities: simulation.entities,
    dayCount: day,
    nightCount: night,
    stepCount: simulation.stepCount,
  }
}

/**
 * Store that drives one Simulation. Drivers call step()/reset() and subscribe
 * for redraws; the simulation itself stays private to the store.
 */
export function createSimulationStore(config: SimulationConfig = DEFAULT_CONFIG) {
  const simulation = new Simulation({
    width: config.width,
    height: config.height,
    seed: config.seed,
    maxRetries: config.maxRetries,
    stepMode: config.stepMode,
    defaultEntities: config.defaultEntities,
  })

  return createStore<SimulationState>((set, get) => ({
    width: simulation.width,
    height: simulation.height,
    ...snapshot(simulation),
    debug: isDebugLogging(),
    lastError: null,

    step: () => {
      if (get().lastError) return
      try {
        simulation.step()
      } catch (error) {
        // Simulation already logged and rolled the step back
        set({ lastError: serializeError(error) })
        return
      }
      const next = snapshot(simulation)
      set(next)

      if (get().debug && next.stepCount % config.debugEvery === 0) {
        debugLog(`\nStep ${next.stepCount}:`)
        debugLog(`Entity positions: ${JSON.stringify(next.entities.map((e) => [e.x, e.y, e.type]))}`)
        debugLog(`Counts - Day: ${next.dayCount}, Night: ${next.nightCount}`)
      }
    },

    reset: () => {
      simulation.reset()
      set({ ...snapshot(simulation), lastError: null })
      debugLog('Simulation reset')
    },

    toggleDebug: () => {
      const debug = !get().debug
      setDebugLogging(debug)
      set({ debug })
      debugLog(`Debug mode: ${debug ? 'ON' : 'OFF'}`)
    },

    getCell: (x: number, y: number) => simulation.getCell(x, y),
  }))
}

export type SimulationStore = ReturnType<typeof createSimulationStore>
