export { Cell } from './cell';
export type { Neighbours } from './cell';
export { Grid } from './grid';
export { createMapDef, isInBounds, capacityAt, DEFAULT_CAPACITY } from './mapDef';
export type { MapDef } from './mapDef';
export {
  Direction,
  DIRECTIONS,
  Nowhere,
  isDirection,
  offset,
  opposite,
  step,
  directionTowards,
  coordKey,
  pointKey,
  parseCoordKey,
} from './direction';
export type { Point } from './direction';
