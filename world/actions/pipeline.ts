// ============================================================================
// ACTION PIPELINE - Every proposed action goes through validate -> apply
// ============================================================================

import type { Cell } from '../map/cell';
import type { Grid } from '../map/grid';
import { step } from '../map/direction';
import type {
  MoveAction,
  MoveRejection,
  Observation,
  Result,
  WorldAction,
  WorldEvent,
} from './types';
import { ok, err } from './types';

/** What resolving one action produced */
export interface Resolution {
  /** Fed back to the acting agent */
  readonly observation: Observation;
  readonly events: WorldEvent[];
}

// ============================================================================
// VALIDATION
// ============================================================================

export function validateAction(grid: Grid, origin: Cell, action: WorldAction): Result<void> {
  switch (action.type) {
    case 'NO_ACTION':
      return ok(undefined);
    case 'MOVE':
      return validateMoveAction(grid, origin, action);
  }
}

function validateMoveAction(grid: Grid, origin: Cell, action: MoveAction): Result<void> {
  const destination = step(origin.position, action.direction);
  if (!grid.isInBounds(destination.x, destination.y)) {
    return err(
      'OUT_OF_BOUNDS',
      `(${destination.x},${destination.y}) is outside the ${grid.width}x${grid.height} grid`
    );
  }
  return ok(undefined);
}

// ============================================================================
// APPLICATION
// ============================================================================

export function applyAction(origin: Cell, action: WorldAction): Resolution {
  switch (action.type) {
    case 'NO_ACTION':
      return { observation: undefined, events: [] };
    case 'MOVE':
      return applyMoveAction(origin, action);
  }
}

function applyMoveAction(origin: Cell, action: MoveAction): Resolution {
  const landed = origin.vacate(action.agent, action.direction);

  if (landed === undefined) {
    return { observation: undefined, events: [rejection(origin, action, 'NOT_PRESENT')] };
  }
  if (landed === origin) {
    return { observation: origin, events: [rejection(origin, action, 'BLOCKED')] };
  }

  return {
    observation: landed,
    events: [
      {
        type: 'AGENT_MOVED',
        agentId: action.agent.id,
        from: origin.position,
        to: landed.position,
        direction: action.direction,
      },
    ],
  };
}

function rejection(origin: Cell, action: MoveAction, reason: MoveRejection): WorldEvent {
  return {
    type: 'MOVE_REJECTED',
    agentId: action.agent.id,
    x: origin.x,
    y: origin.y,
    direction: action.direction,
    reason,
  };
}

// ============================================================================
// UNIFIED PIPELINE ENTRY POINT
// ============================================================================

/**
 * Resolve an action taken from `origin`. Refusals are ordinary outcomes:
 * a move off the grid or into a full or walled cell leaves the agent where
 * it was and observes that same cell.
 */
export function processAction(grid: Grid, origin: Cell, action: WorldAction): Resolution {
  const validation = validateAction(grid, origin, action);
  if (!validation.ok) {
    return action.type === 'MOVE'
      ? { observation: origin, events: [rejection(origin, action, 'OUT_OF_BOUNDS')] }
      : { observation: undefined, events: [] };
  }
  return applyAction(origin, action);
}
