import { describe, it, expect, vi } from 'vitest';
import { WebSocket } from 'ws';
import { broadcast, send } from './network';
import type { Spectator } from './network';
import type { ServerMessage } from './types';

const message: ServerMessage = { type: 'SNAPSHOT', snapshot: { tick: 3, agents: [{ id: 'a', name: 'agent1', x: 1, y: 2 }] } };
const encoded = '{"type":"SNAPSHOT","snapshot":{"tick":3,"agents":[{"id":"a","name":"agent1","x":1,"y":2}]}}';

describe('network', () => {
  it('broadcasts to open spectators only', () => {
    const open: Spectator = { readyState: WebSocket.OPEN, send: vi.fn() };
    const closed: Spectator = { readyState: WebSocket.CLOSED, send: vi.fn() };

    expect(broadcast([open, closed], message)).toBe(1);
    expect(open.send).toHaveBeenCalledWith(encoded);
    expect(closed.send).not.toHaveBeenCalled();
  });

  it('skips a direct send to a closing socket', () => {
    const closing: Spectator = { readyState: WebSocket.CLOSING, send: vi.fn() };
    send(closing, { type: 'HALTED', tick: 7, reason: 'stopped' });
    expect(closing.send).not.toHaveBeenCalled();
  });
});
