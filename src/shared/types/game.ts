/**
 * Stone colours. Black moves first by convention, but the engine itself
 * does not enforce turn order: the driver decides who plays.
 */
export type Colour = 'black' | 'white';

/**
 * A board point. Both axes are 1-indexed and lie in `[1, size]`; `x` is
 * the column and `y` the row.
 */
export interface Coordinate {
  x: number;
  y: number;
}

/**
 * Opaque group identifier: a small non-negative integer key into the
 * board's group table. Ids are reused after a group is removed and carry
 * no meaning outside a single board's lifetime.
 */
export type GroupId = number;

export type Intersection =
  | { readonly kind: 'empty' }
  | { readonly kind: 'stone'; readonly colour: Colour; readonly groupId: GroupId };

export type MoveAction = { type: 'put'; at: Coordinate } | { type: 'pass' };

/**
 * Full copy of a group removed by a capture, kept on the move record so
 * that undo can put it back verbatim.
 */
export interface CapturedGroup {
  readonly stones: ReadonlyArray<Coordinate>;
  readonly liberties: ReadonlyArray<Coordinate>;
}

export interface MoveRecord {
  readonly colour: Colour;
  readonly action: MoveAction;
  /** Groups removed by this move, in capture order. Always empty for passes. */
  readonly captured: ReadonlyArray<CapturedGroup>;
}

/**
 * Read-only view of one group for display and debugging.
 */
export interface GroupSnapshot {
  readonly id: GroupId;
  readonly colour: Colour;
  readonly stones: ReadonlyArray<Coordinate>;
  readonly liberties: ReadonlyArray<Coordinate>;
}

/**
 * Cumulative number of stones of each colour that have been captured.
 * `whiteDead` grows when black captures white stones and vice versa.
 */
export interface DeadCounts {
  readonly blackDead: number;
  readonly whiteDead: number;
}

export interface StoneListing extends DeadCounts {
  readonly size: number;
  readonly black: ReadonlyArray<Coordinate>;
  readonly white: ReadonlyArray<Coordinate>;
}

export const MAX_BOARD_SIZE = 25;
export const DEFAULT_BOARD_SIZE = 19;

export const EMPTY: Intersection = Object.freeze({ kind: 'empty' });

// Utility functions for coordinate handling
export const coordinateToString = (c: Coordinate): string => `${c.x},${c.y}`;

export const stringToCoordinate = (str: string): Coordinate => {
  const [x, y] = str.split(',');
  return { x: Number(x), y: Number(y) };
};

export const coordinatesEqual = (a: Coordinate, b: Coordinate): boolean =>
  a.x === b.x && a.y === b.y;

export const opponentOf = (colour: Colour): Colour => (colour === 'black' ? 'white' : 'black');

export const isPass = (action: MoveAction): action is { type: 'pass' } => action.type === 'pass';
