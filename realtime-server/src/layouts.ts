import { readFileSync } from 'node:fs';
import { coordKey } from '../../world/index.ts';
import type { Point } from '../../world/index.ts';

export const LAYOUTS_FILE = new URL('../layouts.json', import.meta.url);

/** A named layout as stored in layouts.json */
export interface LayoutDef {
  readonly blocked: ReadonlyArray<readonly [number, number]>;
  readonly start?: readonly [number, number];
}

/** A layout resolved against concrete grid dimensions */
export interface Layout {
  readonly capacities: Record<string, number>;
  readonly start: Point;
}

function isPair(value: unknown): value is [number, number] {
  return (
    Array.isArray(value) &&
    value.length === 2 &&
    Number.isInteger(value[0]) &&
    Number.isInteger(value[1])
  );
}

function isLayoutDef(value: unknown): value is LayoutDef {
  if (typeof value !== 'object' || value === null) return false;
  const blocked: unknown = Reflect.get(value, 'blocked');
  const start: unknown = Reflect.get(value, 'start');
  return Array.isArray(blocked) && blocked.every(isPair) && (start === undefined || isPair(start));
}

export function parseLayouts(json: string): Record<string, LayoutDef> {
  const parsed: unknown = JSON.parse(json);
  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
    throw new Error('Layouts file must contain an object of named layouts');
  }
  const layouts: Record<string, LayoutDef> = {};
  for (const [name, def] of Object.entries(parsed)) {
    if (!isLayoutDef(def)) {
      throw new Error(`Layout "${name}" is malformed`);
    }
    layouts[name] = def;
  }
  return layouts;
}

export function loadLayouts(file: URL = LAYOUTS_FILE): Record<string, LayoutDef> {
  return parseLayouts(readFileSync(file, 'utf8'));
}

/**
 * Turn a layout into a capacity table. Blocked cells get capacity 0,
 * everything else is left at the default of 1. Blocked coordinates outside
 * the grid are ignored.
 */
export function buildLayout(def: LayoutDef, width: number, height: number): Layout {
  const capacities: Record<string, number> = {};
  for (const [x, y] of def.blocked) {
    if (x >= 0 && x < width && y >= 0 && y < height) {
      capacities[coordKey(x, y)] = 0;
    }
  }

  const start = def.start
    ? { x: def.start[0], y: def.start[1] }
    : { x: Math.round(width / 2), y: Math.round(height / 2) };
  if (start.x < 0 || start.x >= width || start.y < 0 || start.y >= height) {
    throw new Error(`Start (${start.x},${start.y}) is outside the ${width}x${height} grid`);
  }
  if (capacities[coordKey(start.x, start.y)] === 0) {
    throw new Error(`Start (${start.x},${start.y}) is a blocked cell`);
  }

  return { capacities, start };
}

/**
 * Pick `count` distinct open cells: the layout start first, then the
 * remaining open cells row by row.
 */
export function startPositions(layout: Layout, width: number, height: number, count: number): Point[] {
  const positions: Point[] = [layout.start];
  for (let y = 0; y < height && positions.length < count; y++) {
    for (let x = 0; x < width && positions.length < count; x++) {
      const key = coordKey(x, y);
      if (layout.capacities[key] === 0) continue;
      if (x === layout.start.x && y === layout.start.y) continue;
      positions.push({ x, y });
    }
  }
  return positions.slice(0, count);
}
