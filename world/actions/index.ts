export { ok, err, noAction, moveAction } from './types';
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
  MoveRejection,
  AgentFaultedEvent,
  Result,
  ResultOk,
  ResultErr,
} from './types';
export { validateAction, applyAction, processAction } from './pipeline';
export type { Resolution } from './pipeline';
