import { coordinateToString, type Coordinate, type Intersection } from '../types/game';
import { allCoordinates, getNeighbours } from './core';
import { EngineErrorCode, InvalidState } from './errors';
import type { Group } from './Group';

/**
 * The parts of a board the invariant checker reads.
 */
export interface BoardInvariantView {
  readonly size: number;
  cellAt(c: Coordinate): Intersection;
  groups(): Iterable<Group>;
  ko(): Coordinate | null;
}

/**
 * Collect every violation of the grid/group invariants. Each point must be
 * empty or a stone of exactly one group of the same colour; each group must
 * be a maximal orthogonally connected chain, must have at least one
 * liberty, and its liberty set must equal the empty neighbours of its
 * stones. An active ko point must be empty.
 */
export function collectBoardInvariantViolations(view: BoardInvariantView): string[] {
  const errors: string[] = [];
  const size = view.size;
  let stonesOnGrid = 0;

  for (const c of allCoordinates(size)) {
    const cell = view.cellAt(c);
    if (cell.kind === 'empty') continue;
    stonesOnGrid++;

    for (const n of getNeighbours(c, size)) {
      const other = view.cellAt(n);
      if (other.kind === 'stone' && other.colour === cell.colour && other.groupId !== cell.groupId) {
        errors.push(
          `adjacent ${cell.colour} stones at ${coordinateToString(c)} and ${coordinateToString(n)} ` +
            `are in different groups (${cell.groupId}, ${other.groupId})`
        );
      }
    }
  }

  let stonesInGroups = 0;
  for (const group of view.groups()) {
    stonesInGroups += group.stoneCount;
    if (group.stoneCount === 0) {
      errors.push(`group ${group.id} has no stones`);
    }
    if (group.isDead()) {
      errors.push(`group ${group.id} has no liberties`);
    }

    const expected = new Set<string>();
    for (const stone of group.getStones()) {
      const cell = view.cellAt(stone);
      if (cell.kind !== 'stone' || cell.groupId !== group.id || cell.colour !== group.colour) {
        errors.push(
          `group ${group.id} (${group.colour}) owns ${coordinateToString(stone)} ` +
            `but the grid holds ${describe(cell)}`
        );
      }
      for (const n of getNeighbours(stone, size)) {
        if (view.cellAt(n).kind === 'empty') {
          expected.add(coordinateToString(n));
        }
      }
    }

    const actual = new Set<string>();
    for (const liberty of group.getLiberties()) {
      actual.add(coordinateToString(liberty));
    }
    for (const key of expected) {
      if (!actual.has(key)) errors.push(`group ${group.id} is missing liberty ${key}`);
    }
    for (const key of actual) {
      if (!expected.has(key)) errors.push(`group ${group.id} has stale liberty ${key}`);
    }
  }

  if (stonesInGroups !== stonesOnGrid) {
    errors.push(`grid holds ${stonesOnGrid} stones but groups own ${stonesInGroups}`);
  }

  const ko = view.ko();
  if (ko && view.cellAt(ko).kind !== 'empty') {
    errors.push(`ko point ${coordinateToString(ko)} is occupied`);
  }

  return errors;
}

export function assertBoardInvariants(view: BoardInvariantView, context: string): void {
  const errors = collectBoardInvariantViolations(view);
  if (errors.length > 0) {
    throw new InvalidState(
      EngineErrorCode.STATE_INVARIANT_VIOLATION,
      `Board invariants violated after ${context}: ${errors.join('; ')}`,
      { context, errors },
      'Invariants'
    );
  }
}

function describe(cell: Intersection): string {
  return cell.kind === 'empty' ? 'an empty point' : `a ${cell.colour} stone of group ${cell.groupId}`;
}
