/**
 * Core types for the day/night grid engine
 *
 * Cell states and direction indices are plain numbers so the grid can live in
 * a Uint8Array and the lookup tables can be indexed directly.
 */

// =============================================================================
// CELL STATES
// =============================================================================

export const DAY = 0
export const NIGHT = 1

export type CellState = typeof DAY | typeof NIGHT

export function cellStateName(state: CellState): 'day' | 'night' {
  return state === DAY ? 'day' : 'night'
}

export function oppositeState(state: CellState): CellState {
  return state === DAY ? NIGHT : DAY
}

// =============================================================================
// DIRECTIONS
// =============================================================================

export const LEFT_UP = 0     // ↖
export const UP = 1          // ↑
export const RIGHT_UP = 2    // ↗
export const LEFT = 3        // ←
export const RIGHT = 4       // →
export const LEFT_DOWN = 5   // ↙
export const DOWN = 6        // ↓
export const RIGHT_DOWN = 7  // ↘

export type DiagonalDirection =
  | typeof LEFT_UP
  | typeof RIGHT_UP
  | typeof LEFT_DOWN
  | typeof RIGHT_DOWN

export type OrthogonalDirection = typeof UP | typeof LEFT | typeof RIGHT | typeof DOWN

export type Direction = DiagonalDirection | OrthogonalDirection

export type Boundary = 'top' | 'bottom' | 'left' | 'right'

// =============================================================================
// GEOMETRY
// =============================================================================

export interface Coord {
  x: number
  y: number
}

export interface Vector {
  dx: number
  dy: number
}

export interface CellCounts {
  day: number
  night: number
}

// =============================================================================
// MOVEMENT
// =============================================================================

export interface MoveResult {
  success: boolean
  x: number
  y: number
  // Cells to flip as a side effect of this move, in the order they were produced
  toggles: Coord[]
}

export interface BoundaryHit {
  boundary: Boundary
  from: DiagonalDirection
  to: DiagonalDirection
}

export interface CollisionRecord {
  cell: Coord
  from: DiagonalDirection
  to: DiagonalDirection
  usedFallback: boolean
}

export interface MoveTrace {
  initial: Coord
  type: CellState
  direction: DiagonalDirection
  stateUnderEntity: CellState
  boundaryHits: BoundaryHit[]
  collisions: CollisionRecord[]
  final: Coord
}

export interface SimulationStats {
  steps: number
  totalMoves: number
  successfulMoves: number
  collisions: number
  // Collisions where both alternatives were blocked
  fallbacks: number
  boundaryHits: number
  togglesApplied: number
  elapsedMs: number
}

export type StepMode = 'batched' | 'sequential'

export interface EntityView {
  readonly id: number
  readonly x: number
  readonly y: number
  readonly px: number
  readonly py: number
  readonly type: CellState
}

export interface ISimulation {
  readonly width: number
  readonly height: number
  readonly entities: readonly EntityView[]
  readonly counts: CellCounts
  readonly stepCount: number
  getCell(x: number, y: number): CellState
  step(): void
  reset(): void
}
