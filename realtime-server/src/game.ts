import { World, GridAgent, createMapDef } from '../../world/index.ts';
import type { WorldEvent, WorldSnapshot } from '../../world/index.ts';
import { buildLayout, startPositions } from './layouts';
import type { LayoutDef } from './layouts';

export interface GameOptions {
  readonly width: number;
  readonly height: number;
  readonly maxTicks: number;
  readonly tickRate: number;
  readonly agentCount: number;
  readonly layout: LayoutDef;
}

export interface Game {
  readonly world: World;
  readonly agents: readonly GridAgent[];
}

export function createGame(options: GameOptions): Game {
  const { width, height } = options;
  const layout = buildLayout(options.layout, width, height);
  const world = new World(createMapDef(width, height, layout.capacities), {
    maxTicks: options.maxTicks,
    intervalMs: options.tickRate,
  });

  const agents: GridAgent[] = [];
  for (const [i, pos] of startPositions(layout, width, height, options.agentCount).entries()) {
    const agent = new GridAgent({ name: `agent${i + 1}`, world, x: pos.x, y: pos.y });
    const result = world.addAgent(agent);
    if (!result.ok) {
      console.error(`[Game] Could not place ${agent.name} at (${pos.x}, ${pos.y}): ${result.error.message}`);
      continue;
    }
    console.log(`[Game] ${agent.name} placed at (${pos.x}, ${pos.y})`);
    agents.push(agent);
  }

  return { world, agents };
}

/**
 * Log what is worth knowing about a tick: faults, and agents that just
 * finished mapping the world.
 */
export function reportTick(game: Game, events: readonly WorldEvent[], finished: Set<string>): void {
  for (const event of events) {
    if (event.type === 'AGENT_FAULTED') {
      console.error(`[Game] Agent ${event.agentId} halted: ${event.message}`);
    }
  }
  for (const agent of game.agents) {
    if (agent.explorationState === 'DONE' && !finished.has(agent.id)) {
      finished.add(agent.id);
      const cells = agent.exploration?.map.size ?? 0;
      console.log(`[Game] ${agent.name} finished exploring at tick ${game.world.time}: ${cells} decision points mapped`);
    }
  }
}

/**
 * Drive the world until it halts or the signal aborts. The snapshot is
 * handed to `publish` after every tick.
 */
export async function startGameLoop(
  game: Game,
  signal: AbortSignal,
  publish: (snapshot: WorldSnapshot) => void
): Promise<number> {
  const finished = new Set<string>();
  const ticks = await game.world.run(0, {
    signal,
    onTick: (snapshot, events) => {
      reportTick(game, events, finished);
      publish(snapshot);
    },
  });
  console.log(`[Game] Stopped after ${ticks} ticks (world time ${game.world.time})`);
  return ticks;
}
