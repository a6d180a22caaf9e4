import { describe, it, expect } from 'vitest';
import { Grid } from './grid';
import { createMapDef } from './mapDef';
import { DIRECTIONS, Direction, opposite } from './direction';
import { GridObject } from '../entities/gridObject';
import { WorldError } from '../errors';
import { cellAt } from '../test/helpers';

describe('Grid', () => {
  it('builds width x height cells addressed by (x, y)', () => {
    const grid = new Grid(createMapDef(4, 2));
    expect([...grid.cells()]).toHaveLength(8);
    expect(cellAt(grid, 3, 1).position).toEqual({ x: 3, y: 1 });
    expect(grid.getCell(4, 0)).toBeUndefined();
    expect(grid.getCell(0, 2)).toBeUndefined();
    expect(grid.getCell(-1, 0)).toBeUndefined();
  });

  it('links interior cells in all four directions with North as y - 1', () => {
    const grid = new Grid(createMapDef(3, 3));
    const centre = cellAt(grid, 1, 1);
    expect(centre.neighbour(Direction.North)).toBe(cellAt(grid, 1, 0));
    expect(centre.neighbour(Direction.East)).toBe(cellAt(grid, 2, 1));
    expect(centre.neighbour(Direction.South)).toBe(cellAt(grid, 1, 2));
    expect(centre.neighbour(Direction.West)).toBe(cellAt(grid, 0, 1));
  });

  it('never links into a capacity-0 cell', () => {
    const grid = new Grid(createMapDef(3, 3, { '1,1': 0, '2,0': 0 }));
    for (const cell of grid.cells()) {
      for (const direction of DIRECTIONS) {
        const next = cell.neighbour(direction);
        if (next) {
          expect(next.capacity).toBeGreaterThan(0);
        }
      }
    }
    expect(cellAt(grid, 1, 0).neighbour(Direction.South)).toBeUndefined();
    expect(cellAt(grid, 1, 0).neighbour(Direction.East)).toBeUndefined();
  });

  it('keeps adjacency symmetric between passable cells', () => {
    const grid = new Grid(createMapDef(4, 3, { '1,1': 0 }));
    for (const cell of grid.cells()) {
      if (cell.capacity === 0) continue;
      for (const direction of DIRECTIONS) {
        const next = cell.neighbour(direction);
        if (next) {
          expect(next.neighbour(opposite(direction))).toBe(cell);
        }
      }
    }
  });

  it('places and removes occupants on behalf of the world', () => {
    const grid = new Grid(createMapDef(2, 2));
    const box = new GridObject({ name: 'box' });

    expect(grid.place(box, 1, 1).ok).toBe(true);
    expect(cellAt(grid, 1, 1).occupants).toEqual([box]);

    const outside = grid.place(box, 5, 5);
    expect(outside.ok).toBe(false);
    if (!outside.ok) {
      expect(outside.error.code).toBe('OUT_OF_BOUNDS');
    }

    expect(grid.remove(box, 1, 1).ok).toBe(true);
    expect(cellAt(grid, 1, 1).occupants).toEqual([]);
  });

  it('applies capacity overrides and defaults the rest to 1', () => {
    const grid = new Grid(createMapDef(2, 1, { '0,0': 3 }));
    expect(cellAt(grid, 0, 0).capacity).toBe(3);
    expect(cellAt(grid, 1, 0).capacity).toBe(1);
  });

  it('refuses empty dimensions', () => {
    expect(() => createMapDef(0, 3)).toThrow(WorldError);
    expect(() => createMapDef(3, Number.NaN)).toThrow(WorldError);
  });
});
