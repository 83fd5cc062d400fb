// =============================================================================
// RULES ENGINE - PUBLIC API
// =============================================================================
// Drivers (the GTP front end, move generators, tests) should only import
// from this file.
//
// - The Board is the single mutable entry point: play / pass / undo /
//   clear / resize.
// - Everything else is exposed read-only: snapshots of grid, groups,
//   counters, ko and history.
// =============================================================================

// =============================================================================
// CORE TYPES (from src/shared/types/game.ts)
// =============================================================================

export type {
  Colour,
  Coordinate,
  GroupId,
  Intersection,
  MoveAction,
  MoveRecord,
  CapturedGroup,
  GroupSnapshot,
  DeadCounts,
  StoneListing,
} from '../types/game';

export {
  MAX_BOARD_SIZE,
  DEFAULT_BOARD_SIZE,
  EMPTY,
  coordinateToString,
  stringToCoordinate,
  coordinatesEqual,
  opponentOf,
  isPass,
} from '../types/game';

// =============================================================================
// BOARD
// =============================================================================

export { Board } from './Board';
export type { BoardOptions } from './Board';

// =============================================================================
// GEOMETRY
// =============================================================================

export { getNeighbours, isOnBoard, allCoordinates, ORTHOGONAL_DIRECTIONS } from './core';
export type { Direction } from './core';

// =============================================================================
// ERRORS
// =============================================================================

export {
  EngineError,
  EngineErrorCode,
  InvalidState,
  BoardConstraintViolation,
  isEngineError,
  isInvalidState,
  isBoardConstraintViolation,
} from './errors';
export type { EngineErrorJSON } from './errors';
