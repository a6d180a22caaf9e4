// ============================================================================
// EXPLORER - Frontier-driven depth-first mapping of unknown terrain
// ============================================================================

import type { Direction, Point } from '../map/direction';
import { DIRECTIONS, Nowhere, directionTowards, pointKey, step } from '../map/direction';
import type { ExplorationMap, ReadonlyExplorationMap } from './pruning';
import { pruneMap } from './pruning';

export type ExplorationState = 'EXPLORING' | 'BACKTRACKING' | 'DONE';

/**
 * What the explorer can see of its cell. `neighbour` describes the terrain,
 * `canGo` whether the way is free right now.
 */
export interface Surroundings {
  neighbour(direction: Direction): object | undefined;
  canGo(direction: Direction): boolean;
}

// Refusals before a direction, or a backtrack target, is given up on
const GIVE_UP_AFTER = 3;

type PendingStep =
  | { readonly kind: 'EXPLORE'; readonly from: Point; readonly to: Point; readonly direction: Direction }
  | { readonly kind: 'BACKTRACK'; readonly from: Point; readonly to: Point };

/**
 * State persists between ticks: every call to next() proposes one step,
 * every call to observe() reports where that step actually ended up.
 *
 * Edges are recorded in both directions with distance 1 whenever two
 * mapped cells are seen to be adjacent. A way that is only occupied is not
 * a wall: the explorer waits, and gives up on it after repeated refusals.
 * Once the backtrack stack is empty and the current cell has nothing left
 * to try, the map is pruned and the explorer is DONE.
 */
export class Explorer {
  private phase: ExplorationState = 'EXPLORING';
  private readonly edges: ExplorationMap = new Map();
  private readonly open = new Set<string>();
  private readonly trail: Point[] = [];
  private readonly refusals = new Map<string, number>();
  private readonly seen = new Set<string>();
  private pending: PendingStep | undefined;

  get state(): ExplorationState {
    return this.phase;
  }

  get map(): ReadonlyExplorationMap {
    return this.edges;
  }

  /** Visited cells that still have something to try */
  get frontier(): ReadonlySet<string> {
    return this.open;
  }

  get backtrackStack(): readonly Point[] {
    return this.trail;
  }

  /** Cells where other occupants were observed; never pruned */
  get landmarks(): ReadonlySet<string> {
    return this.seen;
  }

  /**
   * Decide the next step from the current position. Returns undefined when
   * there is nothing to do this tick: either the way on is occupied, or
   * exploration is complete (state is DONE).
   */
  next(position: Point, surroundings: Surroundings, othersPresent = false): Direction | undefined {
    if (this.phase === 'DONE') {
      return undefined;
    }
    const here = pointKey(position);
    this.visit(position, surroundings);
    if (othersPresent) {
      this.seen.add(here);
    }

    const options = this.unexplored(position, surroundings);
    const direction = options.find((d) => surroundings.canGo(d));
    if (direction !== undefined) {
      this.phase = 'EXPLORING';
      this.trail.push(position);
      this.pending = { kind: 'EXPLORE', from: position, to: step(position, direction), direction };
      return direction;
    }

    // Unexplored but occupied: wait here
    for (const option of options) {
      this.refuse(position, option);
    }
    if (this.unexplored(position, surroundings).length > 0) {
      this.phase = 'EXPLORING';
      return undefined;
    }

    this.open.delete(here);
    let target = this.trail.pop();
    while (target !== undefined) {
      const back = directionTowards(position, target);
      if (back !== Nowhere) {
        this.phase = 'BACKTRACKING';
        this.pending = { kind: 'BACKTRACK', from: position, to: target };
        return back;
      }
      target = this.trail.pop();
    }

    this.finish();
    return undefined;
  }

  /** Report the position observed after the last proposed step */
  observe(position: Point): void {
    const pending = this.pending;
    this.pending = undefined;
    if (!pending) {
      return;
    }

    const arrived = position.x === pending.to.x && position.y === pending.to.y;
    if (pending.kind === 'EXPLORE') {
      if (arrived) {
        this.link(pending.from, pending.to);
      } else {
        // Never left, so the cell pushed for this step is still on top
        this.trail.pop();
        this.refuse(pending.from, pending.direction);
      }
    } else if (!arrived) {
      const back = directionTowards(pending.from, pending.to);
      if (back !== Nowhere && this.refuse(pending.from, back) < GIVE_UP_AFTER) {
        this.trail.push(pending.to);
      }
    }
  }

  private visit(position: Point, surroundings: Surroundings): void {
    this.addNode(pointKey(position));
    for (const direction of DIRECTIONS) {
      const neighbour = step(position, direction);
      if (surroundings.neighbour(direction) !== undefined && this.edges.has(pointKey(neighbour))) {
        this.link(position, neighbour);
      }
    }
  }

  /** Existing, unmapped neighbours not yet given up on, in priority order */
  private unexplored(position: Point, surroundings: Surroundings): Direction[] {
    return DIRECTIONS.filter(
      (direction) =>
        surroundings.neighbour(direction) !== undefined &&
        (this.refusals.get(refusalKey(position, direction)) ?? 0) < GIVE_UP_AFTER &&
        !this.edges.has(pointKey(step(position, direction)))
    );
  }

  private addNode(key: string): Map<string, number> {
    let node = this.edges.get(key);
    if (!node) {
      node = new Map();
      this.edges.set(key, node);
      this.open.add(key);
    }
    return node;
  }

  private link(a: Point, b: Point, distance = 1): void {
    const keyA = pointKey(a);
    const keyB = pointKey(b);
    const fromA = this.addNode(keyA);
    const fromB = this.addNode(keyB);
    if (!fromA.has(keyB)) fromA.set(keyB, distance);
    if (!fromB.has(keyA)) fromB.set(keyA, distance);
  }

  private refuse(position: Point, direction: Direction): number {
    const key = refusalKey(position, direction);
    const count = (this.refusals.get(key) ?? 0) + 1;
    this.refusals.set(key, count);
    return count;
  }

  private finish(): void {
    const pruned = pruneMap(this.edges, this.seen);
    this.edges.clear();
    for (const [key, edges] of pruned) {
      this.edges.set(key, edges);
    }
    this.open.clear();
    this.pending = undefined;
    this.phase = 'DONE';
  }
}

function refusalKey(position: Point, direction: Direction): string {
  return `${pointKey(position)}:${direction}`;
}
