import { WebSocketServer, WebSocket } from 'ws';
import { AGENT_COUNT, GRID_HEIGHT, GRID_WIDTH, LAYOUT, MAX_TICKS, TICK_RATE, WATCH_PORT } from './config';
import { createGame, startGameLoop } from './game';
import { loadLayouts } from './layouts';
import { broadcast, send } from './network';

// ============================================================================
// WORLD INSTANCE
// ============================================================================

const layouts = loadLayouts();
const layout = layouts[LAYOUT];
if (!layout) {
  console.error(`ERROR: Unknown layout "${LAYOUT}". Choose one of: ${Object.keys(layouts).join(', ')}`);
  process.exit(1);
}

const game = createGame({
  width: GRID_WIDTH,
  height: GRID_HEIGHT,
  maxTicks: MAX_TICKS,
  tickRate: TICK_RATE,
  agentCount: AGENT_COUNT,
  layout,
});

// ============================================================================
// WATCH WEBSOCKET SERVER
// ============================================================================

// Spectators (watch-only connections)
const spectators = new Set<WebSocket>();
let nextWatcherId = 1;

const watchWss = new WebSocketServer({ port: WATCH_PORT });

console.log(`[Watch] Server running on ws://localhost:${WATCH_PORT} (layout "${LAYOUT}", ${GRID_WIDTH}x${GRID_HEIGHT})`);

watchWss.on('connection', (ws) => {
  const watcherId = `watcher-${nextWatcherId++}`;
  spectators.add(ws);
  console.log(`[Watch] Spectator connected: ${watcherId}`);

  // Send current world state
  send(ws, { type: 'SNAPSHOT', snapshot: game.world.getSnapshot() });

  ws.on('close', () => {
    spectators.delete(ws);
    console.log(`[Watch] Spectator disconnected: ${watcherId}`);
  });
});

// ============================================================================
// GAME LOOP
// ============================================================================

const stop = new AbortController();
for (const sig of ['SIGINT', 'SIGTERM'] as const) {
  process.once(sig, () => {
    console.log(`[Game] ${sig} received, stopping after the current tick`);
    stop.abort();
  });
}

startGameLoop(game, stop.signal, (snapshot) => {
  broadcast(spectators, { type: 'SNAPSHOT', snapshot });
})
  .then((ticks) => {
    broadcast(spectators, {
      type: 'HALTED',
      tick: game.world.time,
      reason: stop.signal.aborted ? 'stopped' : `finished ${ticks} ticks`,
    });
    for (const ws of spectators) {
      ws.close();
    }
    watchWss.close();
  })
  .catch((e: unknown) => {
    console.error('[Game] Simulation failed:', e);
    watchWss.close();
    process.exitCode = 1;
  });
