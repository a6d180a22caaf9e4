import 'dotenv/config';

type Env = Record<string, string | undefined>;

/** Read a whole number from the environment, falling back on anything unusable */
export function readIntEnv(env: Env, name: string, fallback: number, min = 0): number {
  const raw = env[name];
  if (raw === undefined || raw.trim() === '') {
    return fallback;
  }
  const value = Number(raw);
  if (!Number.isInteger(value) || value < min) {
    console.warn(`[Config] Ignoring ${name}=${raw}, using ${fallback}`);
    return fallback;
  }
  return value;
}

export const WATCH_PORT = readIntEnv(process.env, 'WATCH_PORT', 3002, 1);

// Grid size in cells. The bundled layouts are drawn for 10x10.
export const GRID_WIDTH = readIntEnv(process.env, 'GRID_WIDTH', 10, 1);
export const GRID_HEIGHT = readIntEnv(process.env, 'GRID_HEIGHT', 10, 1);

export const MAX_TICKS = readIntEnv(process.env, 'MAX_TICKS', 700); // 0 = run until stopped
export const TICK_RATE = readIntEnv(process.env, 'TICK_RATE', 250); // ms
export const AGENT_COUNT = readIntEnv(process.env, 'AGENT_COUNT', 1, 1);

export const LAYOUT = process.env.LAYOUT || 'maze';
