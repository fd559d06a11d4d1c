/**
 * Grid - dense day/night cell matrix
 *
 * One byte per cell, row-major: cells[y * width + x].
 * Renderers read `cells` directly; everything else goes through get/toggle,
 * which refuse coordinates outside the grid instead of clamping.
 */

import { CellState, DAY, NIGHT } from '../types'
import { OutOfBoundsError } from '../errors'

export interface IGrid {
  readonly width: number
  readonly height: number

  get(x: number, y: number): CellState
  getIdx(idx: number): CellState
  toggle(x: number, y: number): void
  toggleIdx(idx: number): void
  reset(): void

  // === Utilities ===
  index(x: number, y: number): number
  coords(idx: number): { x: number; y: number }
  inBounds(x: number, y: number): boolean

  // Raw array for renderer
  readonly cells: Readonly<Uint8Array>
}

export class Grid implements IGrid {
  private readonly _width: number
  private readonly _height: number
  private readonly _cells: Uint8Array

  constructor(width: number, height: number) {
    if (!Number.isInteger(width) || !Number.isInteger(height) || width < 1 || height < 1) {
      throw new RangeError(`Grid dimensions must be positive integers, got ${width}x${height}`)
    }
    this._width = width
    this._height = height
    this._cells = new Uint8Array(width * height)
    this.split()
  }

  get width(): number { return this._width }
  get height(): number { return this._height }
  get cells(): Readonly<Uint8Array> { return this._cells }

  // === Index conversion ===
  index(x: number, y: number): number {
    return y * this._width + x
  }

  coords(idx: number): { x: number; y: number } {
    return {
      x: idx % this._width,
      y: Math.floor(idx / this._width)
    }
  }

  // === Bounds checking ===
  inBounds(x: number, y: number): boolean {
    return Number.isInteger(x) && Number.isInteger(y) &&
      x >= 0 && x < this._width && y >= 0 && y < this._height
  }

  private checked(x: number, y: number): number {
    if (!this.inBounds(x, y)) throw new OutOfBoundsError(x, y, this._width, this._height)
    return this.index(x, y)
  }

  // === State access ===
  get(x: number, y: number): CellState {
    return this.getIdx(this.checked(x, y))
  }

  getIdx(idx: number): CellState {
    return this._cells[idx] === NIGHT ? NIGHT : DAY
  }

  toggle(x: number, y: number): void {
    this.toggleIdx(this.checked(x, y))
  }

  toggleIdx(idx: number): void {
    this._cells[idx] ^= 1
  }

  // === Lifecycle ===
  reset(): void {
    this._cells.fill(DAY)
  }

  /** Left half day, right half night; the middle column of an odd width is night. */
  split(): void {
    const mid = Math.floor(this._width / 2)
    for (let y = 0; y < this._height; y++) {
      const row = y * this._width
      this._cells.fill(DAY, row, row + mid)
      this._cells.fill(NIGHT, row + mid, row + this._width)
    }
  }

  clone(): Grid {
    const copy = new Grid(this._width, this._height)
    copy._cells.set(this._cells)
    return copy
  }

  // Debug dump, one row per line: '.' day, '#' night
  toString(): string {
    const rows: string[] = []
    for (let y = 0; y < this._height; y++) {
      let row = ''
      for (let x = 0; x < this._width; x++) {
        row += this._cells[this.index(x, y)] === NIGHT ? '#' : '.'
      }
      rows.push(row)
    }
    return rows.join('\n')
  }
}
