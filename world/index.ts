// ============================================================================
// WORLD MODULE - Turn-based grid simulation with autonomous agents
// ============================================================================

// Core engine
export { World } from './engine';
export type { WorldSnapshot, AgentSnapshot, WorldOptions, RunOptions } from './engine';

// Map
export {
  Cell,
  Grid,
  createMapDef,
  isInBounds,
  Direction,
  DIRECTIONS,
  Nowhere,
  directionTowards,
  opposite,
  step,
  coordKey,
  pointKey,
  parseCoordKey,
} from './map';
export type { MapDef, Neighbours, Point } from './map';

// Entities
export { GridObject } from './entities/gridObject';
export { GridAgent } from './entities/agent';
export type { GridObjectOptions } from './entities/gridObject';
export type { GridAgentOptions } from './entities/agent';

// Exploration
export { Explorer } from './agents/explorer';
export { pruneMap, isCorridor, branchPoints, cloneMap } from './agents/pruning';
export type { ExplorationState, Surroundings } from './agents/explorer';
export type { ExplorationMap, ReadonlyExplorationMap } from './agents/pruning';
export { shortestDistance } from './utils/pathfinding';

// Actions & Events
export type {
  WorldAction,
  NoAction,
  MoveAction,
  Observation,
  WorldEvent,
  AgentJoinedEvent,
  AgentLeftEvent,
  AgentMovedEvent,
  MoveRejectedEvent,
  AgentFaultedEvent,
  Result,
  ResultOk,
  ResultErr,
} from './actions';
export { ok, err, noAction, moveAction } from './actions';

// Pipeline (exposed for testing/advanced use)
export { validateAction, applyAction, processAction } from './actions';

// State (exposed for testing/advanced use)
export type { WorldState, RosterEntry } from './state';
export { createWorldState, getAgentEntry, hasAgent, getAllAgents } from './state';

// Errors
export { WorldError, ObservationError } from './errors';
export type { WorldErrorCode } from './errors';
