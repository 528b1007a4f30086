/**
 * loopgrid - plan canonicalization and grid simulation for cyclic-instruction puzzles.
 */

export {
  Direction,
  DIRECTIONS,
  rotateDirection,
  reflectDirection,
  flipDirection,
  parseDirection,
} from './core/direction.js';
export { Position } from './core/position.js';
export type { Board, Tile, TileType, Rotation } from './core/types.js';
export {
  Empty,
  Wall,
  Ice,
  Rotator,
  Finish,
  isEmpty,
  isWall,
  isIce,
  isRotator,
  isFinish,
  isTile,
  createBoard,
  validateBoard,
  getTile,
  isBlocked,
} from './core/types.js';
export {
  LoopgridError,
  LoopgridErrorCode,
  InvalidArgumentError,
  InvalidBoardError,
  isLoopgridError,
} from './core/errors.js';
export { parseBoard, exportBoard } from './parser/parser.js';
export * from './plan/index.js';
export * from './simulator/index.js';
export * from './levels/index.js';
