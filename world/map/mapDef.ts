// ============================================================================
// MAP DEFINITION - Dimensions and per-cell capacities of a grid
// ============================================================================

import { WorldError } from '../errors';

export interface MapDef {
  /** Number of columns (x) */
  readonly width: number;
  /** Number of rows (y) */
  readonly height: number;
  /** Capacity overrides keyed by "x,y"; unlisted cells hold one occupant */
  readonly capacities?: Readonly<Record<string, number>>;
  /** Placeholder occupants to seed per "x,y" */
  readonly occupants?: Readonly<Record<string, number>>;
}

export const DEFAULT_CAPACITY = 1;

/** Create a new map definition */
export function createMapDef(
  width: number,
  height: number,
  capacities?: Record<string, number>,
  occupants?: Record<string, number>
): MapDef {
  const w = Math.floor(width);
  const h = Math.floor(height);
  if (!Number.isFinite(w) || !Number.isFinite(h) || w < 1 || h < 1) {
    throw new WorldError('INVALID_DIMENSIONS', `Grid must be at least 1x1, got ${width}x${height}`);
  }
  return { width: w, height: h, capacities, occupants };
}

/** Check if coordinates are within map bounds */
export function isInBounds(map: MapDef, x: number, y: number): boolean {
  return x >= 0 && x < map.width && y >= 0 && y < map.height;
}

export function capacityAt(map: MapDef, key: string): number {
  return map.capacities?.[key] ?? DEFAULT_CAPACITY;
}
