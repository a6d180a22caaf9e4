// ============================================================================
// ERRORS - Faults that cannot be expressed as a Result
// ============================================================================

/**
 * Raised while a grid is being built. Topology faults abort construction,
 * so these never surface from a running tick.
 */
export type WorldErrorCode =
  | 'INVALID_DIRECTION'
  | 'CORRUPT_TOPOLOGY'
  | 'INVALID_DIMENSIONS';

export class WorldError extends Error {
  readonly code: WorldErrorCode;

  constructor(code: WorldErrorCode, message: string) {
    super(message);
    this.name = 'WorldError';
    this.code = code;
  }
}

/**
 * Raised by an agent when the world hands back an observation whose shape
 * does not match the action it issued. The world stops asking that agent
 * for actions once this is thrown.
 */
export class ObservationError extends Error {
  readonly code = 'UNEXPECTED_OBSERVATION_TYPE';
  readonly agentId: string;

  constructor(agentId: string, message: string) {
    super(message);
    this.name = 'ObservationError';
    this.agentId = agentId;
  }
}
