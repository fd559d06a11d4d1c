/**
 * Simulation - Orchestrates the day/night walkers
 * Owns the grid, the entity list and running counts; delegates every movement
 * decision to the rule engine.
 *
 * A step is strictly: move all entities (fixed order) -> apply toggles ->
 * recount. If a move cannot resolve, the whole step is rolled back.
 */

import { logError } from '@/core/logging/log'
import { IRuleEngine, RuleEngine } from '../rules/RuleEngine'
import { InvalidConfigError, OutOfBoundsError } from '../errors'
import { MAX_RANDOM_ENTITIES } from '../limits'
import { DeterministicRng, createDeterministicRng, randomSeed } from '../rng'
import {
  CellCounts,
  CellState,
  Coord,
  DAY,
  DiagonalDirection,
  EntityView,
  ISimulation,
  MoveTrace,
  NIGHT,
  SimulationStats,
  StepMode,
} from '../types'
import { Entity } from './Entity'
import { Grid } from './Grid'

export interface SimulationOptions {
  width: number
  height: number
  seed?: number
  maxRetries?: number
  stepMode?: StepMode
  // Place the two starting walkers (one night, one day)
  defaultEntities?: boolean
  // Injected engine; reset() then only rewinds its headings
  rules?: IRuleEngine
}

// Placement draws from its own stream so adding entities never shifts collision fallbacks
const PLACEMENT_SEED_SALT = 0x9e3779b9

function emptyStats(): SimulationStats {
  return {
    steps: 0,
    totalMoves: 0,
    successfulMoves: 0,
    collisions: 0,
    fallbacks: 0,
    boundaryHits: 0,
    togglesApplied: 0,
    elapsedMs: 0,
  }
}

type EntitySnapshot = { x: number; y: number; px: number; py: number }

export class Simulation implements ISimulation {
  private readonly grid: Grid
  private readonly seed: number
  private readonly maxRetries: number | undefined
  private readonly ownsRules: boolean
  private readonly defaultEntities: boolean
  private rules: IRuleEngine
  private placementRng: DeterministicRng
  private _entities: Entity[] = []
  private nextEntityId = 0
  private _counts: CellCounts = { day: 0, night: 0 }
  private _stats: SimulationStats = emptyStats()
  stepMode: StepMode

  constructor(options: SimulationOptions) {
    this.grid = new Grid(options.width, options.height)
    this.seed = options.seed ?? randomSeed()
    this.maxRetries = options.maxRetries
    this.stepMode = options.stepMode ?? 'batched'
    this.defaultEntities = options.defaultEntities ?? true
    this.ownsRules = options.rules === undefined
    this.rules = options.rules ?? this.createRules()
    this.placementRng = createDeterministicRng(this.seed ^ PLACEMENT_SEED_SALT)

    if (this.defaultEntities) this.addDefaultEntities()
    this.recount()
  }

  // Public API
  get width(): number { return this.grid.width }
  get height(): number { return this.grid.height }
  get counts(): CellCounts { return { ...this._counts } }
  get stats(): SimulationStats { return { ...this._stats } }
  get stepCount(): number { return this._stats.steps }

  get entities(): readonly EntityView[] {
    return this._entities.map((e) => e.toView())
  }

  getCell(x: number, y: number): CellState {
    return this.grid.get(x, y)
  }

  // Direct TypedArray access for renderers
  getCellsArray(): Readonly<Uint8Array> {
    return this.grid.cells
  }

  getDirection(type: CellState): DiagonalDirection {
    return this.rules.getDirection(type)
  }

  // Entity management
  addEntity(x: number, y: number, type: CellState): EntityView {
    if (!this.grid.inBounds(x, y)) throw new OutOfBoundsError(x, y, this.grid.width, this.grid.height)
    const entity = new Entity(this.nextEntityId++, x, y, type)
    this._entities.push(entity)
    return entity.toView()
  }

  addRandomEntities(count: number, type?: CellState): EntityView[] {
    if (!Number.isInteger(count) || count < 0 || count > MAX_RANDOM_ENTITIES) {
      throw new InvalidConfigError(`count must be an integer in [0, ${MAX_RANDOM_ENTITIES}]`)
    }
    const added: EntityView[] = []
    for (let i = 0; i < count; i++) {
      const x = this.placementRng.nextInt(this.grid.width)
      const y = this.placementRng.nextInt(this.grid.height)
      const t = type ?? (this.placementRng.nextInt(2) === 0 ? DAY : NIGHT)
      added.push(this.addEntity(x, y, t))
    }
    return added
  }

  clearEntities(): void {
    this._entities = []
    this.nextEntityId = 0
  }

  // Everything to day, walkers stay where they are
  clearGrid(): void {
    this.grid.reset()
    this.recount()
  }

  reset(): void {
    this.grid.split()
    if (this.ownsRules) {
      this.rules = this.createRules()
    } else {
      this.rules.resetDirections()
    }
    this.placementRng = createDeterministicRng(this.seed ^ PLACEMENT_SEED_SALT)
    this.clearEntities()
    if (this.defaultEntities) this.addDefaultEntities()
    this._stats = emptyStats()
    this.recount()
  }

  // Main simulation step
  step(): void {
    this.runStep((applied) => {
      if (this.stepMode === 'sequential') {
        this.moveSequential(applied, null)
        return
      }
      const toggles = this.rules.batchMove(this._entities, this.grid)
      this.applyAndRecord(toggles, applied)
    })
  }

  /** Sequential step that also returns a trace per entity, in entity order. */
  stepTraced(): MoveTrace[] {
    const traces: MoveTrace[] = []
    this.runStep((applied) => this.moveSequential(applied, traces))
    return traces
  }

  private moveSequential(applied: Coord[], traces: MoveTrace[] | null): void {
    for (const entity of this._entities) {
      if (traces) {
        const { result, trace } = this.rules.moveTraced(entity, this.grid)
        traces.push(trace)
        this.applyAndRecord(result.toggles, applied)
      } else {
        this.applyAndRecord(this.rules.move(entity, this.grid).toggles, applied)
      }
    }
  }

  private applyAndRecord(toggles: readonly Coord[], applied: Coord[]): void {
    this.rules.applyToggles(this.grid, toggles)
    for (const t of toggles) applied.push(t)
  }

  private runStep(moveAll: (applied: Coord[]) => void): void {
    const started = performance.now()
    const positions: EntitySnapshot[] = this._entities.map((e) => ({ x: e.x, y: e.y, px: e.px, py: e.py }))
    const headings = { day: this.rules.getDirection(DAY), night: this.rules.getDirection(NIGHT) }
    const applied: Coord[] = []
    this.rules.resetMetrics()

    try {
      moveAll(applied)
    } catch (error) {
      // Toggles are their own inverse
      this.rules.applyToggles(this.grid, applied)
      this._entities.forEach((e, i) => {
        const p = positions[i]
        e.x = p.x
        e.y = p.y
        e.px = p.px
        e.py = p.py
      })
      this.rules.setDirection(DAY, headings.day)
      this.rules.setDirection(NIGHT, headings.night)
      logError(`[simulation] step ${this._stats.steps + 1} aborted`, error)
      throw error
    }

    this.recount()

    const metrics = this.rules.metrics
    this._stats.steps++
    this._stats.totalMoves += this._entities.length
    this._stats.successfulMoves += metrics.moves
    this._stats.collisions += metrics.collisions
    this._stats.fallbacks += metrics.fallbacks
    this._stats.boundaryHits += metrics.boundaryHits
    this._stats.togglesApplied += applied.length
    this._stats.elapsedMs += performance.now() - started
  }

  private recount(): void {
    this._counts = this.rules.countStates(this.grid)
  }

  private createRules(): RuleEngine {
    return new RuleEngine({ seed: this.seed, maxRetries: this.maxRetries })
  }

  private addDefaultEntities(): void {
    const w = this.grid.width
    const h = this.grid.height
    this.addEntity(Math.floor((2 * w) / 4), Math.floor(h / 4), NIGHT)
    this.addEntity(Math.floor((3 * w) / 4), Math.floor((3 * h) / 4), DAY)
  }
}
