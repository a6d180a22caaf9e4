// ============================================================================
// CELL - One addressable grid location with capacity and occupants
// ============================================================================

import type { GridObject } from '../entities/gridObject';
import type { Result } from '../actions/types';
import { ok, err } from '../actions/types';
import { WorldError } from '../errors';
import type { Direction, Point } from './direction';
import { isDirection } from './direction';

/** One slot per direction, indexed North, East, South, West */
export type Neighbours = [Cell | undefined, Cell | undefined, Cell | undefined, Cell | undefined];

export class Cell {
  readonly x: number;
  readonly y: number;
  private readonly owner: object;
  private readonly maxOccupants: number;
  private readonly present: GridObject[] = [];
  private readonly neighbours: Neighbours = [undefined, undefined, undefined, undefined];
  private currentLabel: string | undefined;

  /**
   * @param owner - The grid that built this cell. Only it may place or
   *   remove occupants directly.
   * @param capacity - Zero makes the cell a wall.
   */
  constructor(owner: object, x: number, y: number, capacity = 1, label?: string) {
    this.owner = owner;
    this.x = x;
    this.y = y;
    this.maxOccupants = Math.max(0, Math.floor(capacity));
    this.currentLabel = label;
  }

  get capacity(): number {
    return this.maxOccupants;
  }

  get occupants(): readonly GridObject[] {
    return [...this.present];
  }

  get isFull(): boolean {
    return this.present.length >= this.maxOccupants;
  }

  get label(): string | undefined {
    return this.currentLabel;
  }

  get position(): Point {
    return { x: this.x, y: this.y };
  }

  setLabel(label: string): void {
    this.currentLabel = label;
  }

  clearLabel(): void {
    this.currentLabel = undefined;
  }

  neighbour(direction: Direction): Cell | undefined {
    return this.neighbours[direction];
  }

  /** Link a neighbour. Only called while the grid is being built. */
  addNeighbour(direction: number, cell: Cell | undefined): void {
    if (!isDirection(direction)) {
      throw new WorldError(
        'INVALID_DIRECTION',
        `Neighbour index ${direction} is out of range`
      );
    }
    if (this.neighbours.length !== 4) {
      throw new WorldError(
        'CORRUPT_TOPOLOGY',
        `Cell (${this.x},${this.y}) has an invalid or corrupted neighbour list`
      );
    }
    this.neighbours[direction] = cell;
  }

  placeOccupant(requester: object, occupant: GridObject): Result<void> {
    if (requester !== this.owner) {
      return err('NOT_OWNER', `Only the owning grid may place occupants in (${this.x},${this.y})`);
    }
    if (this.isFull) {
      return err('OCCUPANCY_REJECTED', `Cell (${this.x},${this.y}) is at capacity ${this.maxOccupants}`);
    }
    this.present.push(occupant);
    return ok(undefined);
  }

  removeOccupant(requester: object, occupant: GridObject): Result<GridObject> {
    if (requester !== this.owner) {
      return err('NOT_OWNER', `Only the owning grid may remove occupants from (${this.x},${this.y})`);
    }
    const index = this.present.indexOf(occupant);
    if (index === -1) {
      return err('OCCUPANT_NOT_FOUND', `${occupant.name} (${occupant.id}) is not in (${this.x},${this.y})`);
    }
    this.present.splice(index, 1);
    return ok(occupant);
  }

  /**
   * Can an occupant of this cell step in the given direction right now?
   * Capacity-0 cells are never linked, so a wall reads as a missing neighbour.
   */
  canGo(direction: Direction): boolean {
    const next = this.neighbours[direction];
    return next !== undefined && !next.isFull;
  }

  /** Accept an occupant arriving from an adjacent cell */
  occupy(occupant: GridObject, origin: Point): Result<Cell> {
    if (Math.abs(origin.x - this.x) > 1 || Math.abs(origin.y - this.y) > 1) {
      return err('OCCUPANCY_REJECTED', `(${origin.x},${origin.y}) is not adjacent to (${this.x},${this.y})`);
    }
    if (this.isFull) {
      return err('OCCUPANCY_REJECTED', `Cell (${this.x},${this.y}) is at capacity ${this.maxOccupants}`);
    }
    this.present.push(occupant);
    return ok(this);
  }

  /**
   * Leave this cell. Without a direction the occupant leaves the grid and
   * nothing is returned. With a direction the result is the cell the
   * occupant ends up in: the neighbour on success, this cell otherwise.
   * The occupant is only removed here after the neighbour has taken it.
   */
  vacate(occupant: GridObject, direction?: Direction): Cell | undefined {
    const index = this.present.indexOf(occupant);
    if (index === -1) {
      return undefined;
    }
    if (direction === undefined) {
      this.present.splice(index, 1);
      return undefined;
    }
    const next = this.neighbours[direction];
    if (next === undefined || next.isFull) {
      return this;
    }
    const entered = next.occupy(occupant, this.position);
    if (!entered.ok) {
      return this;
    }
    this.present.splice(index, 1);
    return entered.value;
  }
}
