// ============================================================================
// MAP PRUNING - Collapse corridor cells into direct edges
// ============================================================================

/** Visited cell key -> (reachable neighbour key -> distance) */
export type ExplorationMap = Map<string, Map<string, number>>;
export type ReadonlyExplorationMap = ReadonlyMap<string, ReadonlyMap<string, number>>;

export function cloneMap(map: ReadonlyExplorationMap): ExplorationMap {
  const copy: ExplorationMap = new Map();
  for (const [key, edges] of map) {
    copy.set(key, new Map(edges));
  }
  return copy;
}

/**
 * A corridor has exactly two edges and nothing of interest in it.
 * Landmarks are cells where something other than the explorer was seen.
 */
export function isCorridor(
  map: ReadonlyExplorationMap,
  key: string,
  landmarks: ReadonlySet<string> = new Set()
): boolean {
  const edges = map.get(key);
  return edges !== undefined && edges.size === 2 && !landmarks.has(key);
}

/**
 * Remove corridor cells until none are left. Each removal joins the two
 * neighbours with an edge whose distance is the sum of the two it replaces.
 * When the neighbours were already joined the shorter distance wins.
 * Returns a new map; the input is untouched.
 */
export function pruneMap(
  map: ReadonlyExplorationMap,
  landmarks: ReadonlySet<string> = new Set()
): ExplorationMap {
  const pruned = cloneMap(map);

  let collapsed = true;
  while (collapsed) {
    collapsed = false;
    for (const key of pruned.keys()) {
      if (isCorridor(pruned, key, landmarks) && collapse(pruned, key)) {
        collapsed = true;
        break;
      }
    }
  }

  return pruned;
}

function collapse(map: ExplorationMap, key: string): boolean {
  const edges = map.get(key);
  if (!edges) return false;
  const [[a, toA], [b, toB]] = [...edges];
  const edgesA = map.get(a);
  const edgesB = map.get(b);
  // Only symmetric edges can be re-pointed
  if (!edgesA?.has(key) || !edgesB?.has(key)) {
    return false;
  }

  map.delete(key);
  edgesA.delete(key);
  edgesB.delete(key);

  const through = toA + toB;
  const existing = edgesA.get(b);
  const distance = existing === undefined ? through : Math.min(existing, through);
  edgesA.set(b, distance);
  edgesB.set(a, distance);
  return true;
}

/** Cells with three or more edges */
export function branchPoints(map: ReadonlyExplorationMap): string[] {
  return [...map].filter(([, edges]) => edges.size >= 3).map(([key]) => key);
}
