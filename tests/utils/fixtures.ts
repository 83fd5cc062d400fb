/**
 * Test Fixtures and Utilities
 * Common board helpers for rules-engine tests
 */

import { Board, coordinateToString } from '../../src/shared/engine';
import type { Colour, Coordinate } from '../../src/shared/types/game';

export type ScriptedMove = [Colour, number, number] | [Colour, 'pass'];

/**
 * Coordinate helper - creates a coordinate object
 */
export function pt(x: number, y: number): Coordinate {
  return { x, y };
}

/**
 * Creates a cleared board of the given size
 */
export function createTestBoard(size: number = 5): Board {
  const board = new Board();
  if (!board.resize(size)) {
    throw new Error(`invalid test board size ${size}`);
  }
  return board;
}

/**
 * Apply moves in order, failing loudly if any play is rejected.
 */
export function playAll(board: Board, moves: ScriptedMove[]): void {
  for (const move of moves) {
    if (move.length === 2) {
      board.pass(move[0]);
      continue;
    }
    const [colour, x, y] = move;
    if (!board.play(colour, x, y)) {
      throw new Error(`scripted move ${colour} (${x}, ${y}) was rejected`);
    }
  }
}

/**
 * Grid rendered column by column: one string per x, one char per y.
 */
export function renderColumns(board: Board): string[] {
  return board
    .getGrid()
    .map((column) =>
      column.map((cell) => (cell.kind === 'empty' ? '.' : cell.colour === 'black' ? 'X' : 'O')).join('')
    );
}

export interface PartitionEntry {
  colour: Colour;
  stones: string[];
  liberties: string[];
}

/**
 * Group table without ids: each group as its sorted stones and liberties.
 */
export function groupPartition(board: Board): PartitionEntry[] {
  return board
    .getGroups()
    .map((g) => ({
      colour: g.colour,
      stones: g.stones.map(coordinateToString).sort(),
      liberties: g.liberties.map(coordinateToString).sort(),
    }))
    .sort((a, b) => a.stones[0].localeCompare(b.stones[0]));
}

/**
 * Everything observable about a board except group ids.
 */
export function observableState(board: Board) {
  return {
    size: board.getSize(),
    grid: renderColumns(board),
    groups: groupPartition(board),
    ko: board.getKo(),
    dead: board.getDeadCounts(),
    historyLength: board.getHistoryLength(),
  };
}

export function sortedKeys(coords: ReadonlyArray<Coordinate>): string[] {
  return coords.map(coordinateToString).sort();
}
