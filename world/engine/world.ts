// ============================================================================
// WORLD ENGINE - The main API for interacting with the simulation
// ============================================================================

import type { GridAgent } from '../entities/agent';
import type { Cell } from '../map/cell';
import type { MapDef } from '../map/mapDef';
import type { Point } from '../map/direction';
import type { WorldState } from '../state/worldState';
import type { Result, WorldEvent } from '../actions/types';
import { ok, err, noAction } from '../actions/types';
import { processAction } from '../actions/pipeline';
import { createWorldState, getAgentEntry, getAllAgents, hasAgent } from '../state/worldState';
import { GridObject } from '../entities/gridObject';
import { ObservationError } from '../errors';
import { parseCoordKey } from '../map/direction';

// ============================================================================
// SNAPSHOT TYPE
// ============================================================================

export interface AgentSnapshot {
  readonly id: string;
  readonly name: string;
  readonly x: number;
  readonly y: number;
}

/** Published at the end of every tick for renderers and spectators */
export interface WorldSnapshot {
  readonly tick: number;
  readonly agents: readonly AgentSnapshot[];
}

export interface WorldOptions {
  /** Refuse ticks once this many have run. 0 runs forever. */
  readonly maxTicks?: number;
  /** Real-time pause between ticks in run() */
  readonly intervalMs?: number;
}

export interface RunOptions {
  /** Checked once per tick; the current tick always completes */
  readonly signal?: AbortSignal;
  readonly intervalMs?: number;
  readonly onTick?: (snapshot: WorldSnapshot, events: readonly WorldEvent[]) => void;
}

// ============================================================================
// WORLD CLASS
// ============================================================================

/**
 * World owns the grid, the roster and the clock.
 *
 * Invariants:
 * - Agents act in registration order, one action each per tick
 * - An action is fully applied before the next agent is asked
 * - Only the world changes who occupies a cell
 * - Refused moves are returned as observations, never thrown
 */
export class World {
  readonly maxTicks: number;
  readonly intervalMs: number;
  private state: WorldState;
  private clock = 0;
  private snapshot: WorldSnapshot;

  constructor(mapDef: MapDef, options: WorldOptions = {}) {
    this.state = createWorldState(mapDef);
    this.maxTicks = Math.max(0, Math.floor(options.maxTicks ?? 0));
    this.intervalMs = Math.max(0, options.intervalMs ?? 0);
    this.seedOccupants(mapDef.occupants ?? {});
    this.snapshot = this.buildSnapshot();
  }

  get time(): number {
    return this.clock;
  }

  get boundary(): { width: number; height: number } {
    return { width: this.state.grid.width, height: this.state.grid.height };
  }

  /** Grid location lookup for observations */
  getLocation(x: number, y: number): Cell | undefined {
    return this.state.grid.getCell(x, y);
  }

  getAgentPosition(agentId: string): Point | undefined {
    const entry = getAgentEntry(this.state, agentId);
    return entry ? { x: entry.x, y: entry.y } : undefined;
  }

  isFaulted(agentId: string): boolean {
    return getAgentEntry(this.state, agentId)?.faulted ?? false;
  }

  /** Place a passive object. Agents go through addAgent. */
  placeOccupant(occupant: GridObject, x: number, y: number): Result<void> {
    // Embed only once the grid has taken it
    if (occupant.world !== undefined && occupant.world !== this) {
      return err('FOREIGN_WORLD', `${occupant.name} (${occupant.id}) already belongs to another world`);
    }
    const placed = this.state.grid.place(occupant, x, y);
    if (!placed.ok) {
      return placed;
    }
    return occupant.place(this, x, y);
  }

  /**
   * Register an agent and put it on the grid. Defaults to the position the
   * agent believes it starts at.
   */
  addAgent(agent: GridAgent, x = agent.x, y = agent.y): Result<WorldEvent[]> {
    if (hasAgent(this.state, agent.id)) {
      return err('AGENT_EXISTS', `Agent ${agent.id} already exists in the world`);
    }
    if (!this.state.grid.isInBounds(x, y)) {
      return err('OUT_OF_BOUNDS', `(${x},${y}) is outside the world`);
    }

    const placed = this.placeOccupant(agent, x, y);
    if (!placed.ok) {
      return placed;
    }

    this.state.agents.set(agent.id, { agent, x, y, faulted: false });
    this.snapshot = this.buildSnapshot();

    return ok([{ type: 'AGENT_JOINED', agentId: agent.id, x, y }]);
  }

  /** Deregister an agent and take it off the grid */
  removeAgent(agentId: string): Result<WorldEvent[]> {
    const entry = getAgentEntry(this.state, agentId);
    if (!entry) {
      return err('AGENT_NOT_FOUND', `Agent ${agentId} does not exist in the world`);
    }

    const removed = this.state.grid.remove(entry.agent, entry.x, entry.y);
    if (!removed.ok) {
      return removed;
    }

    this.state.agents.delete(agentId);
    this.snapshot = this.buildSnapshot();

    return ok([{ type: 'AGENT_LEFT', agentId }]);
  }

  /**
   * Advance the world by one tick: every agent proposes, the world resolves
   * and reports back, then the clock moves on.
   */
  tick(): Result<WorldEvent[]> {
    if (this.maxTicks > 0 && this.clock >= this.maxTicks) {
      return err('SIMULATION_HALTED', `World reached its limit of ${this.maxTicks} ticks`);
    }

    const events: WorldEvent[] = [];

    for (const entry of getAllAgents(this.state)) {
      if (entry.faulted) continue;
      const origin = this.state.grid.getCell(entry.x, entry.y);
      if (!origin) continue;

      const proposed = entry.agent.chooseAction(this, entry.x, entry.y, origin.occupants);
      // An agent can only act for itself
      const action = proposed.agent === entry.agent ? proposed : noAction(entry.agent);

      const resolution = processAction(this.state.grid, origin, action);
      events.push(...resolution.events);
      if (resolution.observation) {
        entry.x = resolution.observation.x;
        entry.y = resolution.observation.y;
      }

      try {
        entry.agent.actionResult(resolution.observation);
      } catch (e) {
        if (!(e instanceof ObservationError)) {
          throw e;
        }
        entry.faulted = true;
        events.push({ type: 'AGENT_FAULTED', agentId: entry.agent.id, message: e.message });
      }
    }

    this.clock += 1;
    this.snapshot = this.buildSnapshot();
    return ok(events);
  }

  /**
   * Run `ticks` ticks (0 = until halted or aborted), pausing between them.
   * Resolves with the number of ticks that ran.
   */
  async run(ticks = 0, options: RunOptions = {}): Promise<number> {
    const intervalMs = options.intervalMs ?? this.intervalMs;
    let count = 0;

    while ((ticks === 0 || count < ticks) && !options.signal?.aborted) {
      const result = this.tick();
      if (!result.ok) break;
      count++;
      options.onTick?.(this.snapshot, result.value);
      await pause(intervalMs, options.signal);
    }

    return count;
  }

  /** Rewind the clock; positions are left as they are */
  reset(): void {
    this.clock = 0;
    this.snapshot = this.buildSnapshot();
  }

  getSnapshot(): WorldSnapshot {
    return this.snapshot;
  }

  private buildSnapshot(): WorldSnapshot {
    return Object.freeze({
      tick: this.clock,
      agents: getAllAgents(this.state).map(({ agent, x, y }) =>
        Object.freeze({ id: agent.id, name: agent.name, x, y })
      ),
    });
  }

  /** Fill cells with placeholder occupants, up to each cell's capacity */
  private seedOccupants(occupants: Readonly<Record<string, number>>): void {
    for (const [key, count] of Object.entries(occupants)) {
      const point = parseCoordKey(key);
      if (!point) continue;
      for (let i = 0; i < count; i++) {
        const placed = this.placeOccupant(new GridObject({ name: 'occupant' }), point.x, point.y);
        if (!placed.ok) break;
      }
    }
  }
}

/** Resolves after `ms`, or as soon as the signal aborts */
function pause(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    if (signal?.aborted) {
      resolve();
      return;
    }
    const done = () => {
      clearTimeout(timer);
      signal?.removeEventListener('abort', done);
      resolve();
    };
    const timer = setTimeout(done, ms);
    signal?.addEventListener('abort', done, { once: true });
  });
}
