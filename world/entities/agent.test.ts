import { describe, it, expect } from 'vitest';
import { GridAgent } from './agent';
import { GridObject } from './gridObject';
import { World } from '../engine/world';
import { createMapDef } from '../map/mapDef';
import { Direction } from '../map/direction';
import { ObservationError } from '../errors';
import { cellAt } from '../test/helpers';

describe('GridObject', () => {
  it('generates an id when none is supplied', () => {
    const a = new GridObject({ name: 'rock' });
    const b = new GridObject({ name: 'rock' });
    expect(a.id).not.toBe('');
    expect(a.id).not.toBe(b.id);
    expect(new GridObject({ name: 'rock', id: 'rock-7' }).id).toBe('rock-7');
  });

  it('embeds into one world only', () => {
    const home = new World(createMapDef(2, 2));
    const other = new World(createMapDef(2, 2));
    const rock = new GridObject({ name: 'rock' });

    expect(rock.embed(home).ok).toBe(true);
    expect(rock.embed(home).ok).toBe(true);
    const moved = rock.embed(other);
    expect(moved.ok).toBe(false);
    if (!moved.ok) expect(moved.error.code).toBe('FOREIGN_WORLD');
    expect(rock.world).toBe(home);
  });

  it('only updates its position when placed in its own world', () => {
    const home = new World(createMapDef(2, 2));
    const other = new World(createMapDef(2, 2));
    const rock = new GridObject({ name: 'rock', world: home, x: 1, y: 1 });

    expect(rock.place(other, 0, 0).ok).toBe(false);
    expect({ x: rock.x, y: rock.y }).toEqual({ x: 1, y: 1 });
    expect(rock.place(home, 0, 1).ok).toBe(true);
    expect({ x: rock.x, y: rock.y }).toEqual({ x: 0, y: 1 });
  });
});

describe('GridAgent', () => {
  it('does nothing in a world it does not belong to', () => {
    const home = new World(createMapDef(3, 3));
    const other = new World(createMapDef(3, 3));
    const agent = new GridAgent({ name: 'scout', world: home });

    const action = agent.chooseAction(other, 0, 0, []);
    expect(action.type).toBe('NO_ACTION');
    expect(action.agent).toBe(agent);
  });

  it('wanders in the direction picked by its random source', () => {
    const world = new World(createMapDef(3, 3));
    const picks: Array<[number, Direction]> = [
      [0, Direction.North],
      [0.25, Direction.East],
      [0.5, Direction.South],
      [0.999, Direction.West],
    ];
    for (const [value, direction] of picks) {
      const agent = new GridAgent({ name: 'w', world, explore: false, random: () => value });
      const action = agent.chooseAction(world, 1, 1, []);
      expect(action.type === 'MOVE' && action.direction).toBe(direction);
    }
  });

  it('records its proposal position and freezes the action', () => {
    const world = new World(createMapDef(3, 3));
    const agent = new GridAgent({ name: 'w', world, x: 2, y: 1, explore: false, random: () => 0 });
    const action = agent.chooseAction(world, 2, 1, []);
    expect(action).toMatchObject({ type: 'MOVE', x: 2, y: 1, direction: Direction.North });
    expect(Object.isFrozen(action)).toBe(true);
    expect(agent.lastAction).toBe(action);
  });

  it('treats a missing cell after a move as a contract violation', () => {
    const world = new World(createMapDef(3, 3));
    const agent = new GridAgent({ name: 'w', world, explore: false, random: () => 0 });
    agent.chooseAction(world, 1, 1, []);
    expect(() => agent.actionResult(undefined)).toThrow(ObservationError);
  });

  it('ignores observations after doing nothing', () => {
    const home = new World(createMapDef(3, 3));
    const agent = new GridAgent({ name: 'w', world: home, x: 1, y: 1 });
    agent.chooseAction(new World(createMapDef(3, 3)), 1, 1, []);
    expect(() => agent.actionResult(undefined)).not.toThrow();
    expect({ x: agent.x, y: agent.y }).toEqual({ x: 1, y: 1 });
  });

  it('takes its position from the observed cell', () => {
    const world = new World(createMapDef(3, 3));
    const agent = new GridAgent({ name: 'w', world, explore: false, random: () => 0 });
    agent.chooseAction(world, 1, 1, []);
    agent.actionResult(cellAt(world, 2, 0));
    expect({ x: agent.x, y: agent.y }).toEqual({ x: 2, y: 0 });
  });

  it('keeps track of what it owns', () => {
    const agent = new GridAgent({ name: 'w' });
    const key = new GridObject({ name: 'key' });
    agent.acquire(key);
    agent.acquire(key);
    expect(agent.possessions).toEqual([key]);
  });
});
