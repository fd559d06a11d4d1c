import type { IGrid } from '../core/Grid'
import { CellState, Coord, oppositeState } from '../types'

/**
 * Toggles scheduled but not yet written to the grid.
 *
 * Stored as a parity set of cell indices, so reading a cell through it gives
 * the state the grid will have once the list is applied.
 */
export class PendingToggles {
  private readonly flipped = new Set<number>()
  private readonly list: Coord[] = []

  constructor(private readonly grid: IGrid) {}

  add(x: number, y: number): void {
    const idx = this.grid.index(x, y)
    if (this.flipped.has(idx)) this.flipped.delete(idx)
    else this.flipped.add(idx)
    this.list.push({ x, y })
  }

  stateAt(x: number, y: number): CellState {
    const state = this.grid.get(x, y)
    if (!this.flipped.has(this.grid.index(x, y))) return state
    return oppositeState(state)
  }

  get length(): number {
    return this.list.length
  }

  /** Copy of the toggles recorded since `from`, in order. */
  slice(from = 0): Coord[] {
    return this.list.slice(from)
  }

  /** Drop everything recorded after `length`, restoring parity. */
  truncate(length: number): void {
    while (this.list.length > length) {
      const last = this.list.pop()
      if (!last) break
      const idx = this.grid.index(last.x, last.y)
      if (this.flipped.has(idx)) this.flipped.delete(idx)
      else this.flipped.add(idx)
    }
  }
}
