import type { ReadonlyExplorationMap } from '../agents/pruning';

/**
 * Shortest travel distance between two mapped cells (encoded "x,y"),
 * following recorded edges. Returns undefined when no route is known.
 */
export function shortestDistance(
  map: ReadonlyExplorationMap,
  from: string,
  to: string
): number | undefined {
  if (!map.has(from) || !map.has(to)) {
    return undefined;
  }

  const best = new Map<string, number>([[from, 0]]);
  const settled = new Set<string>();

  while (settled.size < best.size) {
    // Closest unsettled cell
    let current: string | undefined;
    let currentDistance = Infinity;
    for (const [key, distance] of best) {
      if (!settled.has(key) && distance < currentDistance) {
        current = key;
        currentDistance = distance;
      }
    }
    if (current === undefined) break;

    if (current === to) {
      return currentDistance;
    }
    settled.add(current);

    for (const [neighbour, distance] of map.get(current) ?? []) {
      const candidate = currentDistance + distance;
      const known = best.get(neighbour);
      if (known === undefined || candidate < known) {
        best.set(neighbour, candidate);
      }
    }
  }

  return undefined;
}
