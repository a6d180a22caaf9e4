export { World } from './world';
export type { WorldSnapshot, AgentSnapshot, WorldOptions, RunOptions } from './world';
