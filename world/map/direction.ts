// ============================================================================
// DIRECTIONS - The four compass directions used for adjacency and movement
// ============================================================================

export const Direction = {
  North: 0,
  East: 1,
  South: 2,
  West: 3,
} as const;

export type Direction = (typeof Direction)[keyof typeof Direction];

/** Returned when two coordinates are not orthogonally adjacent */
export const Nowhere = -1;

/** Fixed exploration priority: North, East, South, West */
export const DIRECTIONS: readonly Direction[] = [
  Direction.North,
  Direction.East,
  Direction.South,
  Direction.West,
];

export interface Point {
  readonly x: number;
  readonly y: number;
}

export function isDirection(value: number): value is Direction {
  return Number.isInteger(value) && value >= 0 && value <= 3;
}

/** North decreases y, South increases y */
export function offset(direction: Direction): { dx: -1 | 0 | 1; dy: -1 | 0 | 1 } {
  switch (direction) {
    case Direction.North:
      return { dx: 0, dy: -1 };
    case Direction.East:
      return { dx: 1, dy: 0 };
    case Direction.South:
      return { dx: 0, dy: 1 };
    case Direction.West:
      return { dx: -1, dy: 0 };
  }
}

export function opposite(direction: Direction): Direction {
  switch (direction) {
    case Direction.North:
      return Direction.South;
    case Direction.East:
      return Direction.West;
    case Direction.South:
      return Direction.North;
    case Direction.West:
      return Direction.East;
  }
}

export function step(from: Point, direction: Direction): Point {
  const { dx, dy } = offset(direction);
  return { x: from.x + dx, y: from.y + dy };
}

/** Direction of an orthogonally adjacent target, or Nowhere */
export function directionTowards(from: Point, to: Point): Direction | typeof Nowhere {
  for (const direction of DIRECTIONS) {
    const next = step(from, direction);
    if (next.x === to.x && next.y === to.y) {
      return direction;
    }
  }
  return Nowhere;
}

/** Encoded "x,y" key for use in Maps and Sets */
export function coordKey(x: number, y: number): string {
  return `${x},${y}`;
}

export function pointKey(point: Point): string {
  return coordKey(point.x, point.y);
}

export function parseCoordKey(key: string): Point | undefined {
  const parts = key.split(',');
  if (parts.length !== 2) return undefined;
  const x = Number(parts[0]);
  const y = Number(parts[1]);
  if (!Number.isInteger(x) || !Number.isInteger(y)) return undefined;
  return { x, y };
}
