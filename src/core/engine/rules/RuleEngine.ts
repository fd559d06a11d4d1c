/**
 * RuleEngine - movement, reflection and collision rules
 *
 * Headings are shared per cell type, not per entity: every night walker steers
 * with the same direction slot, so entities must be processed in a fixed order
 * for a run to be reproducible.
 *
 * A move is a bounded loop. Each pass either commits the step, reflects off an
 * edge, or resolves a collision (schedule toggles, pick a new heading) and
 * tries again from the same cell. Cell reads go through the pending toggles,
 * so a collision cell that is about to flip is already seen flipped.
 */

import { debugLog } from '@/core/logging/log'
import { Entity } from '../core/Entity'
import { IGrid } from '../core/Grid'
import {
  ALTERNATIVE_OFFSETS,
  COLLISION_ALTERNATIVES,
  DIAGONALS,
  DIRECTION_SYMBOLS,
  DIRECTION_VECTORS,
  FALLBACK_OFFSETS,
  crossedBoundary,
  isDiagonal,
  reflect,
} from '../directions'
import { InvalidDirectionError, RetryLimitExceededError } from '../errors'
import { DEFAULT_MAX_RETRIES } from '../limits'
import { DeterministicRng, createDeterministicRng, randomSeed } from '../rng'
import {
  CellCounts,
  CellState,
  Coord,
  DAY,
  DiagonalDirection,
  LEFT_UP,
  MoveResult,
  MoveTrace,
  NIGHT,
  OrthogonalDirection,
  cellStateName,
} from '../types'
import { PendingToggles } from './PendingToggles'

export interface RuleEngineOptions {
  rng?: DeterministicRng
  seed?: number
  maxRetries?: number
}

// Counters since the last resetMetrics(); Simulation folds them into its stats
export interface RuleMetrics {
  moves: number
  collisions: number
  fallbacks: number
  boundaryHits: number
}

export interface IRuleEngine {
  readonly maxRetries: number
  readonly metrics: Readonly<RuleMetrics>

  getDirection(type: CellState): DiagonalDirection
  setDirection(type: CellState, direction: number): void
  resetDirections(): void
  resetMetrics(): void

  move(entity: Entity, grid: IGrid): MoveResult
  moveTraced(entity: Entity, grid: IGrid): { result: MoveResult; trace: MoveTrace }
  batchMove(entities: readonly Entity[], grid: IGrid): Coord[]
  applyToggles(grid: IGrid, toggles: readonly Coord[]): void
  countStates(grid: IGrid): CellCounts
}

export class RuleEngine implements IRuleEngine {
  readonly maxRetries: number
  private readonly rng: DeterministicRng
  private readonly directions: Record<CellState, DiagonalDirection> = {
    [DAY]: LEFT_UP,
    [NIGHT]: LEFT_UP,
  }
  private readonly _metrics: RuleMetrics = { moves: 0, collisions: 0, fallbacks: 0, boundaryHits: 0 }

  constructor(options: RuleEngineOptions = {}) {
    const maxRetries = options.maxRetries ?? DEFAULT_MAX_RETRIES
    if (!Number.isInteger(maxRetries) || maxRetries < 1) {
      throw new RangeError(`maxRetries must be a positive integer, got ${maxRetries}`)
    }
    this.maxRetries = maxRetries
    this.rng = options.rng ?? createDeterministicRng(options.seed ?? randomSeed())
  }

  get metrics(): Readonly<RuleMetrics> {
    return this._metrics
  }

  // === Direction state ===
  getDirection(type: CellState): DiagonalDirection {
    return this.directions[type]
  }

  setDirection(type: CellState, direction: number): void {
    if (!isDiagonal(direction)) throw new InvalidDirectionError(direction)
    this.directions[type] = direction
  }

  resetDirections(): void {
    this.directions[DAY] = LEFT_UP
    this.directions[NIGHT] = LEFT_UP
  }

  resetMetrics(): void {
    this._metrics.moves = 0
    this._metrics.collisions = 0
    this._metrics.fallbacks = 0
    this._metrics.boundaryHits = 0
  }

  // === Movement ===
  move(entity: Entity, grid: IGrid): MoveResult {
    return this.resolve(entity, grid, new PendingToggles(grid), null)
  }

  moveTraced(entity: Entity, grid: IGrid): { result: MoveResult; trace: MoveTrace } {
    const trace: MoveTrace = {
      initial: { x: entity.x, y: entity.y },
      type: entity.type,
      direction: this.directions[entity.type],
      stateUnderEntity: grid.get(entity.x, entity.y),
      boundaryHits: [],
      collisions: [],
      final: { x: entity.x, y: entity.y },
    }
    const result = this.resolve(entity, grid, new PendingToggles(grid), trace)
    trace.final = { x: entity.x, y: entity.y }
    return { result, trace }
  }

  /**
   * Move every entity once, in list order. Later entities see the toggles
   * scheduled by earlier ones. Nothing is written to the grid.
   */
  batchMove(entities: readonly Entity[], grid: IGrid): Coord[] {
    const pending = new PendingToggles(grid)
    for (const entity of entities) {
      this.resolve(entity, grid, pending, null)
    }
    return pending.slice()
  }

  // Duplicates flip twice and cancel out
  applyToggles(grid: IGrid, toggles: readonly Coord[]): void {
    for (const { x, y } of toggles) {
      grid.toggle(x, y)
    }
  }

  countStates(grid: IGrid): CellCounts {
    const cells = grid.cells
    let night = 0
    for (let i = 0; i < cells.length; i++) {
      night += cells[i]
    }
    return { day: cells.length - night, night }
  }

  private resolve(entity: Entity, grid: IGrid, pending: PendingToggles, trace: MoveTrace | null): MoveResult {
    const start = pending.length
    let retries = 0

    for (;;) {
      const direction = this.directions[entity.type]
      const { dx, dy } = DIRECTION_VECTORS[direction]
      const nx = entity.x + dx
      const ny = entity.y + dy

      const boundary = crossedBoundary(nx, ny, grid.width, grid.height)
      const collides = boundary === null && pending.stateAt(nx, ny) === entity.type

      if (boundary === null && !collides) {
        entity.moveTo(nx, ny)
        this._metrics.moves++
        return { success: true, x: nx, y: ny, toggles: pending.slice(start) }
      }

      if (retries === this.maxRetries) {
        const toggles = pending.slice(start)
        pending.truncate(start)
        throw new RetryLimitExceededError({
          entityId: entity.id,
          position: { x: entity.x, y: entity.y },
          attempts: retries,
          pendingToggles: toggles,
        })
      }
      retries++

      if (boundary !== null) {
        const reflected = reflect(direction, boundary)
        this.directions[entity.type] = reflected
        this._metrics.boundaryHits++
        trace?.boundaryHits.push({ boundary, from: direction, to: reflected })
      } else {
        this.resolveCollision(entity, nx, ny, direction, grid, pending, trace)
      }
    }
  }

  private resolveCollision(
    entity: Entity,
    cx: number,
    cy: number,
    direction: DiagonalDirection,
    grid: IGrid,
    pending: PendingToggles,
    trace: MoveTrace | null
  ): void {
    let next: DiagonalDirection | null = null
    let offsets: readonly OrthogonalDirection[] = []

    for (const alternative of COLLISION_ALTERNATIVES[direction]) {
      const { dx, dy } = DIRECTION_VECTORS[alternative]
      const ax = entity.x + dx
      const ay = entity.y + dy
      if (grid.inBounds(ax, ay) && pending.stateAt(ax, ay) !== entity.type) {
        next = alternative
        offsets = ALTERNATIVE_OFFSETS[alternative]
        break
      }
    }

    const usedFallback = next === null
    if (next === null) {
      next = DIAGONALS[this.rng.nextInt(DIAGONALS.length)]
      offsets = FALLBACK_OFFSETS[direction]
      this._metrics.fallbacks++
      debugLog(
        `[rules] ${cellStateName(entity.type)} #${entity.id} boxed in at (${entity.x}, ${entity.y}),`,
        `${DIRECTION_SYMBOLS[direction]} -> ${DIRECTION_SYMBOLS[next]}`
      )
    }

    pending.add(cx, cy)
    for (const offset of offsets) {
      const { dx, dy } = DIRECTION_VECTORS[offset]
      const sx = cx + dx
      const sy = cy + dy
      // Secondary cells off the edge are dropped
      if (grid.inBounds(sx, sy)) pending.add(sx, sy)
    }

    this.directions[entity.type] = next
    this._metrics.collisions++
    trace?.collisions.push({ cell: { x: cx, y: cy }, from: direction, to: next, usedFallback })
  }
}
