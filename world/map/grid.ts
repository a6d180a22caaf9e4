// ============================================================================
// GRID - Rectangular array of cells with 4-directional adjacency
// ============================================================================

import type { GridObject } from '../entities/gridObject';
import type { Result } from '../actions/types';
import { err } from '../actions/types';
import { Cell } from './cell';
import { coordKey, Direction } from './direction';
import type { MapDef } from './mapDef';
import { capacityAt, isInBounds } from './mapDef';

/**
 * Cells are addressed as (x, y) with y growing southwards. Adjacency is
 * derived once here: a cell only links to neighbours whose capacity is
 * above zero, so walls have no incoming edges.
 */
export class Grid {
  readonly map: MapDef;
  private readonly rows: Cell[][];

  constructor(map: MapDef) {
    this.map = map;
    this.rows = [];
    for (let y = 0; y < map.height; y++) {
      const row: Cell[] = [];
      for (let x = 0; x < map.width; x++) {
        row.push(new Cell(this, x, y, capacityAt(map, coordKey(x, y))));
      }
      this.rows.push(row);
    }
    this.link();
  }

  get width(): number {
    return this.map.width;
  }

  get height(): number {
    return this.map.height;
  }

  isInBounds(x: number, y: number): boolean {
    return isInBounds(this.map, x, y);
  }

  getCell(x: number, y: number): Cell | undefined {
    if (!this.isInBounds(x, y)) {
      return undefined;
    }
    return this.rows[y][x];
  }

  /** All cells, row by row */
  *cells(): IterableIterator<Cell> {
    for (const row of this.rows) {
      yield* row;
    }
  }

  place(occupant: GridObject, x: number, y: number): Result<void> {
    const cell = this.getCell(x, y);
    if (!cell) {
      return err('OUT_OF_BOUNDS', `(${x},${y}) is outside the ${this.width}x${this.height} grid`);
    }
    return cell.placeOccupant(this, occupant);
  }

  remove(occupant: GridObject, x: number, y: number): Result<GridObject> {
    const cell = this.getCell(x, y);
    if (!cell) {
      return err('OUT_OF_BOUNDS', `(${x},${y}) is outside the ${this.width}x${this.height} grid`);
    }
    return cell.removeOccupant(this, occupant);
  }

  private link(): void {
    for (let y = 0; y < this.height; y++) {
      for (let x = 0; x < this.width; x++) {
        const cell = this.rows[y][x];
        cell.addNeighbour(Direction.North, this.passable(x, y - 1));
        cell.addNeighbour(Direction.East, this.passable(x + 1, y));
        cell.addNeighbour(Direction.South, this.passable(x, y + 1));
        cell.addNeighbour(Direction.West, this.passable(x - 1, y));
      }
    }
  }

  private passable(x: number, y: number): Cell | undefined {
    const cell = this.getCell(x, y);
    return cell && cell.capacity > 0 ? cell : undefined;
  }
}
