import type { Coordinate } from '../types/game';

/**
 * Shared, side-effect free geometry helpers for the rules engine.
 *
 * Adjacency on a Go board is orthogonal only (von Neumann neighbourhood):
 * diagonal points never share liberties or chains.
 */

/**
 * A simple direction vector in board-local coordinates.
 */
export interface Direction {
  x: number;
  y: number;
}

/**
 * Orthogonal neighbourhood in enumeration order: W, N, E, S.
 */
export const ORTHOGONAL_DIRECTIONS: ReadonlyArray<Direction> = [
  { x: -1, y: 0 },
  { x: 0, y: -1 },
  { x: 1, y: 0 },
  { x: 0, y: 1 },
];

export function isOnBoard(c: Coordinate, size: number): boolean {
  return (
    Number.isInteger(c.x) && Number.isInteger(c.y) && c.x >= 1 && c.y >= 1 && c.x <= size && c.y <= size
  );
}

/**
 * Return the (at most four) in-bounds orthogonal neighbours of `c`.
 *
 * The result is a fresh array, so callers can collect candidates first and
 * mutate the grid afterwards without aliasing concerns.
 */
export function getNeighbours(c: Coordinate, size: number): Coordinate[] {
  const result: Coordinate[] = [];
  for (const dir of ORTHOGONAL_DIRECTIONS) {
    const next = { x: c.x + dir.x, y: c.y + dir.y };
    if (isOnBoard(next, size)) {
      result.push(next);
    }
  }
  return result;
}

/**
 * Enumerate every point of a `size`×`size` board, column by column.
 */
export function* allCoordinates(size: number): Generator<Coordinate> {
  for (let x = 1; x <= size; x++) {
    for (let y = 1; y <= size; y++) {
      yield { x, y };
    }
  }
}
