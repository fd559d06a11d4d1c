/**
 * Direction tables
 *
 * Everything the rule engine decides about headings is a lookup here:
 * unit vectors, boundary reflections, collision alternatives and the
 * orthogonal offsets used for secondary toggles.
 */

import {
  Boundary,
  DiagonalDirection,
  Direction,
  OrthogonalDirection,
  Vector,
  LEFT_UP,
  UP,
  RIGHT_UP,
  LEFT,
  RIGHT,
  LEFT_DOWN,
  DOWN,
  RIGHT_DOWN,
} from './types'

export const DIRECTION_VECTORS: Record<Direction, Vector> = {
  [LEFT_UP]: { dx: -1, dy: -1 },
  [UP]: { dx: 0, dy: -1 },
  [RIGHT_UP]: { dx: 1, dy: -1 },
  [LEFT]: { dx: -1, dy: 0 },
  [RIGHT]: { dx: 1, dy: 0 },
  [LEFT_DOWN]: { dx: -1, dy: 1 },
  [DOWN]: { dx: 0, dy: 1 },
  [RIGHT_DOWN]: { dx: 1, dy: 1 },
}

export const DIAGONALS: readonly DiagonalDirection[] = [LEFT_UP, RIGHT_UP, LEFT_DOWN, RIGHT_DOWN]

export const DIRECTION_SYMBOLS: Record<Direction, string> = {
  [LEFT_UP]: '↖',
  [UP]: '↑',
  [RIGHT_UP]: '↗',
  [LEFT]: '←',
  [RIGHT]: '→',
  [LEFT_DOWN]: '↙',
  [DOWN]: '↓',
  [RIGHT_DOWN]: '↘',
}

export function isDiagonal(value: number): value is DiagonalDirection {
  return value === LEFT_UP || value === RIGHT_UP || value === LEFT_DOWN || value === RIGHT_DOWN
}

// Unlisted (direction, boundary) pairs keep their heading
const BOUNDARY_REFLECTIONS: Record<Boundary, Partial<Record<DiagonalDirection, DiagonalDirection>>> = {
  top: { [LEFT_UP]: LEFT_DOWN, [RIGHT_UP]: RIGHT_DOWN },
  bottom: { [LEFT_DOWN]: LEFT_UP, [RIGHT_DOWN]: RIGHT_UP },
  left: { [LEFT_UP]: RIGHT_UP, [LEFT_DOWN]: RIGHT_DOWN },
  right: { [RIGHT_UP]: LEFT_UP, [RIGHT_DOWN]: LEFT_DOWN },
}

export function reflect(direction: DiagonalDirection, boundary: Boundary): DiagonalDirection {
  return BOUNDARY_REFLECTIONS[boundary][direction] ?? direction
}

/**
 * Which edge a candidate position crosses, checked top, bottom, left, right.
 * A corner step reports the vertical edge first; the horizontal one shows up
 * on the retry.
 */
export function crossedBoundary(x: number, y: number, width: number, height: number): Boundary | null {
  if (y < 0) return 'top'
  if (y >= height) return 'bottom'
  if (x < 0) return 'left'
  if (x >= width) return 'right'
  return null
}

// Tried in order when the heading lands on a same-type cell
export const COLLISION_ALTERNATIVES: Record<DiagonalDirection, readonly [DiagonalDirection, DiagonalDirection]> = {
  [LEFT_UP]: [RIGHT_UP, LEFT_DOWN],
  [RIGHT_UP]: [LEFT_UP, RIGHT_DOWN],
  [LEFT_DOWN]: [LEFT_UP, RIGHT_DOWN],
  [RIGHT_DOWN]: [RIGHT_UP, LEFT_DOWN],
}

// Secondary toggle when an alternative is adopted, keyed by the adopted heading
export const ALTERNATIVE_OFFSETS: Record<DiagonalDirection, readonly OrthogonalDirection[]> = {
  [RIGHT_UP]: [LEFT],
  [LEFT_DOWN]: [RIGHT],
  [LEFT_UP]: [RIGHT],
  [RIGHT_DOWN]: [UP],
}

// Secondary toggles when both alternatives are blocked, keyed by the original heading
export const FALLBACK_OFFSETS: Record<DiagonalDirection, readonly OrthogonalDirection[]> = {
  [LEFT_UP]: [RIGHT, LEFT],
  [RIGHT_UP]: [LEFT, DOWN],
  [LEFT_DOWN]: [RIGHT, DOWN],
  [RIGHT_DOWN]: [UP, LEFT],
}
