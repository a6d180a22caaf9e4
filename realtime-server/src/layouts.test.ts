import { describe, it, expect } from 'vitest';
import { buildLayout, loadLayouts, parseLayouts, startPositions } from './layouts';

describe('layouts', () => {
  it('loads the bundled layouts', () => {
    const layouts = loadLayouts();
    expect(Object.keys(layouts).sort()).toEqual(['maze', 'open', 'rooms', 'walls']);
    expect(layouts.maze.blocked).toHaveLength(30);
    expect(layouts.walls.start).toEqual([5, 7]);
  });

  it('turns blocked cells into zero capacities and centres the start', () => {
    const layout = buildLayout(loadLayouts().maze, 10, 10);
    expect(Object.keys(layout.capacities)).toHaveLength(30);
    expect(layout.capacities['2,0']).toBe(0);
    expect(layout.capacities['0,0']).toBeUndefined();
    expect(layout.start).toEqual({ x: 5, y: 5 });
  });

  it('drops blocked cells that fall outside a smaller grid', () => {
    const layout = buildLayout({ blocked: [[1, 1], [8, 8]] }, 4, 4);
    expect(layout.capacities).toEqual({ '1,1': 0 });
    expect(layout.start).toEqual({ x: 2, y: 2 });
  });

  it('refuses a start on a blocked cell or off the grid', () => {
    expect(() => buildLayout({ blocked: [[2, 2]] }, 4, 4)).toThrow('Start (2,2) is a blocked cell');
    expect(() => buildLayout({ blocked: [], start: [9, 0] }, 4, 4)).toThrow('outside the 4x4 grid');
  });

  it('rejects malformed layout files', () => {
    expect(() => parseLayouts('[]')).toThrow('Layouts file must contain an object of named layouts');
    expect(() => parseLayouts('{"bad": {"blocked": [[1]]}}')).toThrow('Layout "bad" is malformed');
    expect(parseLayouts('{"tiny": {"blocked": [[0, 1]], "start": [0, 0]}}')).toEqual({
      tiny: { blocked: [[0, 1]], start: [0, 0] },
    });
  });

  it('spreads extra agents over open cells row by row', () => {
    const layout = buildLayout({ blocked: [[0, 0]] }, 3, 3);
    expect(startPositions(layout, 3, 3, 3)).toEqual([
      { x: 2, y: 2 },
      { x: 1, y: 0 },
      { x: 2, y: 0 },
    ]);
    expect(startPositions(layout, 3, 3, 1)).toEqual([{ x: 2, y: 2 }]);
  });
});
