import type { GridObject } from '../entities/gridObject';
import type { Cell } from '../map/cell';
import type { Direction, Point } from '../map/direction';

// ============================================================================
// WORLD ACTIONS - The ONLY way an agent asks the world to change
// ============================================================================

/** Agent declines to act this tick */
export interface NoAction {
  readonly type: 'NO_ACTION';
  readonly agent: GridObject;
  readonly target?: GridObject;
  /** Agent position when the action was proposed */
  readonly x: number;
  readonly y: number;
}

/** Step one cell in a compass direction */
export interface MoveAction {
  readonly type: 'MOVE';
  readonly agent: GridObject;
  /** Reserved for actions directed at an object */
  readonly target?: GridObject;
  readonly direction: Direction;
  readonly x: number;
  readonly y: number;
}

/** Discriminated union of all possible actions */
export type WorldAction = NoAction | MoveAction;

export function noAction(agent: GridObject): NoAction {
  return Object.freeze({ type: 'NO_ACTION', agent, x: agent.x, y: agent.y });
}

export function moveAction(
  agent: GridObject,
  direction: Direction,
  target?: GridObject
): MoveAction {
  return Object.freeze({ type: 'MOVE', agent, target, direction, x: agent.x, y: agent.y });
}

/**
 * What the world hands back after resolving an action. A MOVE always
 * resolves to the cell the agent ends up in; NO_ACTION resolves to nothing.
 */
export type Observation = Cell | undefined;

// ============================================================================
// WORLD EVENTS - Outputs returned by the world (never mutate external systems)
// ============================================================================

export interface AgentJoinedEvent {
  readonly type: 'AGENT_JOINED';
  readonly agentId: string;
  readonly x: number;
  readonly y: number;
}

export interface AgentLeftEvent {
  readonly type: 'AGENT_LEFT';
  readonly agentId: string;
}

export interface AgentMovedEvent {
  readonly type: 'AGENT_MOVED';
  readonly agentId: string;
  readonly from: Point;
  readonly to: Point;
  readonly direction: Direction;
}

export type MoveRejection = 'OUT_OF_BOUNDS' | 'BLOCKED' | 'NOT_PRESENT';

/** A refused move is a normal outcome, not a fault */
export interface MoveRejectedEvent {
  readonly type: 'MOVE_REJECTED';
  readonly agentId: string;
  readonly x: number;
  readonly y: number;
  readonly direction: Direction;
  readonly reason: MoveRejection;
}

export interface AgentFaultedEvent {
  readonly type: 'AGENT_FAULTED';
  readonly agentId: string;
  readonly message: string;
}

/** Discriminated union of all world events */
export type WorldEvent =
  | AgentJoinedEvent
  | AgentLeftEvent
  | AgentMovedEvent
  | MoveRejectedEvent
  | AgentFaultedEvent;

// ============================================================================
// RESULT TYPE - The world never throws for ordinary refusals
// ============================================================================

export interface ResultOk<T> {
  readonly ok: true;
  readonly value: T;
}

export interface ResultErr {
  readonly ok: false;
  readonly error: {
    readonly code: string;
    readonly message: string;
  };
}

export type Result<T> = ResultOk<T> | ResultErr;

/** Helper to create success result */
export function ok<T>(value: T): ResultOk<T> {
  return { ok: true, value };
}

/** Helper to create error result */
export function err(code: string, message: string): ResultErr {
  return { ok: false, error: { code, message } };
}
