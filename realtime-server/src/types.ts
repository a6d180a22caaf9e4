import type { WorldSnapshot } from '../../world/index.ts';

export interface SnapshotMessage {
  type: 'SNAPSHOT';
  snapshot: WorldSnapshot;
}

export interface HaltedMessage {
  type: 'HALTED';
  tick: number;
  reason: string;
}

export type ServerMessage = SnapshotMessage | HaltedMessage;
