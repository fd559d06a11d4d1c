import { CellState, EntityView } from '../types'

/**
 * A walker on the grid. Its type never changes; the rule engine moves it in
 * place. (px, py) is only kept for trails and debug output.
 */
export class Entity implements EntityView {
  readonly id: number
  readonly type: CellState
  x: number
  y: number
  px: number
  py: number

  constructor(id: number, x: number, y: number, type: CellState) {
    this.id = id
    this.type = type
    this.x = x
    this.y = y
    this.px = x
    this.py = y
  }

  moveTo(x: number, y: number): void {
    this.px = this.x
    this.py = this.y
    this.x = x
    this.y = y
  }

  toView(): EntityView {
    return { id: this.id, x: this.x, y: this.y, px: this.px, py: this.py, type: this.type }
  }
}
