// ============================================================================
// WORLD STATE - The single source of truth for the simulation
// ============================================================================

import type { GridAgent } from '../entities/agent';
import { Grid } from '../map/grid';
import type { MapDef } from '../map/mapDef';

/** Where the world knows an agent really is, which may differ from its belief */
export interface RosterEntry {
  readonly agent: GridAgent;
  x: number;
  y: number;
  /** Set once the agent broke the observation contract; it no longer acts */
  faulted: boolean;
}

export interface WorldState {
  readonly grid: Grid;
  /** Insertion order is registration order, which is turn order */
  readonly agents: Map<string, RosterEntry>;
}

/** Create initial world state. Throws if the grid topology cannot be built. */
export function createWorldState(map: MapDef): WorldState {
  return {
    grid: new Grid(map),
    agents: new Map(),
  };
}

/** Get roster entry by agent ID (returns undefined if not found) */
export function getAgentEntry(state: WorldState, agentId: string): RosterEntry | undefined {
  return state.agents.get(agentId);
}

/** Check if agent is registered */
export function hasAgent(state: WorldState, agentId: string): boolean {
  return state.agents.has(agentId);
}

/** Get all roster entries in turn order */
export function getAllAgents(state: WorldState): RosterEntry[] {
  return Array.from(state.agents.values());
}
