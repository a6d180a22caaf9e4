export { createWorldState, getAgentEntry, hasAgent, getAllAgents } from './worldState';
export type { WorldState, RosterEntry } from './worldState';
