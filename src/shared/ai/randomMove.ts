import type { Board } from '../engine';
import type { Colour, MoveAction } from '../types/game';

/**
 * Uniform random source in `[0, 1)`.
 */
export type MoveRng = () => number;

export const DEFAULT_RANDOM_ATTEMPTS = 10;

/**
 * Create a deterministic RNG from a seed (mulberry32), so that a given seed
 * reproduces the same sequence of generated moves.
 */
export function createMoveRng(seed: number): MoveRng {
  let state = seed;

  return (): number => {
    state |= 0;
    state = (state + 0x6d2b79f5) | 0;
    let t = Math.imul(state ^ (state >>> 15), 1 | state);
    t = (t + Math.imul(t ^ (t >>> 7), 61 | t)) ^ t;
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

/**
 * Play a random legal move for `colour` on `board` and return what was
 * played.
 *
 * Tries up to `attempts` uniformly random points first. If none of them is
 * legal, falls back to scanning the board column by column and playing the
 * first point the Board accepts. When nothing is legal the player passes.
 *
 * The generator has no access to groups or liberties: legality is decided
 * entirely by `board.play`.
 */
export function generateRandomMove(
  board: Board,
  colour: Colour,
  rng: MoveRng,
  attempts: number = DEFAULT_RANDOM_ATTEMPTS
): MoveAction {
  const size = board.getSize();

  for (let i = 0; i < attempts; i++) {
    const x = 1 + Math.floor(rng() * size);
    const y = 1 + Math.floor(rng() * size);
    if (board.play(colour, x, y)) {
      return { type: 'put', at: { x, y } };
    }
  }

  for (let x = 1; x <= size; x++) {
    for (let y = 1; y <= size; y++) {
      if (board.play(colour, x, y)) {
        return { type: 'put', at: { x, y } };
      }
    }
  }

  board.pass(colour);
  return { type: 'pass' };
}
