import type { Cell } from '../map/cell';
import type { Grid } from '../map/grid';
import type { World } from '../engine/world';
import type { ReadonlyExplorationMap } from '../agents/pruning';

export function cellAt(source: Grid | World, x: number, y: number): Cell {
  const cell = 'getCell' in source ? source.getCell(x, y) : source.getLocation(x, y);
  if (!cell) {
    throw new Error(`No cell at (${x},${y})`);
  }
  return cell;
}

/** Plain-object view of an exploration map, for order-independent comparison */
export function toPlain(map: ReadonlyExplorationMap): Record<string, Record<string, number>> {
  const plain: Record<string, Record<string, number>> = {};
  for (const [key, edges] of map) {
    plain[key] = Object.fromEntries(edges);
  }
  return plain;
}

/** Deterministic stand-in for Math.random */
export function seededRandom(seed: number): () => number {
  let state = seed >>> 0;
  return () => {
    state = (state * 1664525 + 1013904223) >>> 0;
    return state / 0x100000000;
  };
}
