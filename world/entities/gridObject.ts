// ============================================================================
// GRID OBJECT - Anything that can occupy a cell
// ============================================================================

import { randomUUID } from 'node:crypto';
import type { World } from '../engine/world';
import type { Result } from '../actions/types';
import { ok, err } from '../actions/types';

export interface GridObjectOptions {
  readonly name: string;
  /** Generated when omitted. Uniqueness of supplied ids is up to the caller. */
  readonly id?: string;
  readonly world?: World;
  readonly x?: number;
  readonly y?: number;
}

/**
 * Name, id and world are fixed once set. The position is what the object
 * believes about itself; only the world knows where it really is.
 */
export class GridObject {
  readonly id: string;
  readonly name: string;
  private embeddedWorld: World | undefined;
  private believedX: number;
  private believedY: number;

  constructor(options: GridObjectOptions) {
    this.name = options.name;
    this.id = options.id ?? randomUUID();
    this.embeddedWorld = options.world;
    this.believedX = Math.floor(options.x ?? 0);
    this.believedY = Math.floor(options.y ?? 0);
  }

  get world(): World | undefined {
    return this.embeddedWorld;
  }

  get x(): number {
    return this.believedX;
  }

  get y(): number {
    return this.believedY;
  }

  /** Embedding happens once. Embedding again into the same world is a no-op. */
  embed(world: World): Result<void> {
    if (this.embeddedWorld === undefined) {
      this.embeddedWorld = world;
      return ok(undefined);
    }
    if (this.embeddedWorld !== world) {
      return err('FOREIGN_WORLD', `${this.name} (${this.id}) already belongs to another world`);
    }
    return ok(undefined);
  }

  place(world: World, x: number, y: number): Result<void> {
    const embedded = this.embed(world);
    if (!embedded.ok) {
      return embedded;
    }
    this.moveTo(x, y);
    return ok(undefined);
  }

  protected moveTo(x: number, y: number): void {
    this.believedX = x;
    this.believedY = y;
  }
}
