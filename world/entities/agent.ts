// ============================================================================
// GRID AGENT - An autonomous occupant that picks one action per tick
// ============================================================================

import type { World } from '../engine/world';
import type { Observation, WorldAction } from '../actions/types';
import { moveAction, noAction } from '../actions/types';
import type { ExplorationState } from '../agents/explorer';
import { Explorer } from '../agents/explorer';
import { ObservationError } from '../errors';
import { Cell } from '../map/cell';
import type { Direction } from '../map/direction';
import { DIRECTIONS } from '../map/direction';
import type { GridObjectOptions } from './gridObject';
import { GridObject } from './gridObject';

export interface GridAgentOptions extends GridObjectOptions {
  /** Map the world depth-first before wandering. Defaults to true. */
  readonly explore?: boolean;
  /** Source of randomness for the wandering policy, in [0, 1) */
  readonly random?: () => number;
}

/**
 * The agent only ever learns where it is from observations. A proposed
 * move may be refused, so the action it issued says nothing about where
 * it ended up.
 */
export class GridAgent extends GridObject {
  private readonly owned: GridObject[] = [];
  private readonly explorer: Explorer | undefined;
  private readonly random: () => number;
  private currentAction: WorldAction;

  constructor(options: GridAgentOptions) {
    super(options);
    this.explorer = options.explore === false ? undefined : new Explorer();
    this.random = options.random ?? Math.random;
    this.currentAction = noAction(this);
  }

  get lastAction(): WorldAction {
    return this.currentAction;
  }

  get exploration(): Explorer | undefined {
    return this.explorer;
  }

  get explorationState(): ExplorationState | undefined {
    return this.explorer?.state;
  }

  get possessions(): readonly GridObject[] {
    return [...this.owned];
  }

  acquire(item: GridObject): void {
    if (!this.owned.includes(item)) {
      this.owned.push(item);
    }
  }

  /**
   * Policy: state (world, position, visible occupants) -> action.
   * Explores while there is frontier left, waiting when the way on is
   * occupied, otherwise wanders at random.
   */
  chooseAction(world: World, x: number, y: number, occupants: readonly GridObject[]): WorldAction {
    // Never act in a world we are not part of
    if (world !== this.world) {
      this.currentAction = noAction(this);
      return this.currentAction;
    }

    const explored = this.exploreFrom(world, x, y, occupants);
    if (explored === undefined && this.explorer && this.explorer.state !== 'DONE') {
      // Waiting for an occupied way to clear
      this.currentAction = noAction(this);
      return this.currentAction;
    }
    this.currentAction = moveAction(this, explored ?? this.randomDirection());
    return this.currentAction;
  }

  /** Observation model: what happened to the last action */
  actionResult(observation: Observation): void {
    const action = this.currentAction;
    if (action.type === 'NO_ACTION') {
      return;
    }
    if (!(observation instanceof Cell)) {
      throw new ObservationError(
        this.id,
        `Expected a Cell for a MOVE action by ${this.name}, got ${observation === undefined ? 'nothing' : typeof observation}`
      );
    }
    this.moveTo(observation.x, observation.y);
    this.explorer?.observe(observation.position);
  }

  private exploreFrom(
    world: World,
    x: number,
    y: number,
    occupants: readonly GridObject[]
  ): Direction | undefined {
    const cell = world.getLocation(x, y);
    if (!this.explorer || !cell) {
      return undefined;
    }
    const othersPresent = occupants.some((occupant) => occupant !== this);
    return this.explorer.next({ x, y }, cell, othersPresent);
  }

  private randomDirection(): Direction {
    const index = Math.min(DIRECTIONS.length - 1, Math.floor(this.random() * DIRECTIONS.length));
    return DIRECTIONS[index];
  }
}
