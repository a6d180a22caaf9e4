import { WebSocket } from 'ws';
import type { ServerMessage } from './types';

/** The part of a socket the watch server writes to */
export type Spectator = Pick<WebSocket, 'readyState' | 'send'>;

export function broadcast(spectators: Iterable<Spectator>, message: ServerMessage): number {
  const data = JSON.stringify(message);
  let delivered = 0;
  for (const ws of spectators) {
    if (ws.readyState === WebSocket.OPEN) {
      ws.send(data);
      delivered++;
    }
  }
  return delivered;
}

export function send(ws: Spectator, message: ServerMessage): void {
  if (ws.readyState === WebSocket.OPEN) {
    ws.send(JSON.stringify(message));
  }
}
