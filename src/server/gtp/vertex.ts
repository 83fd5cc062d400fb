import type { Colour, Coordinate, MoveAction } from '../../shared/types/game';
import { GtpError, GtpErrorCode } from '../errors';

/**
 * Column letters in GTP order. `I` is skipped because it reads like `1`,
 * which leaves exactly 25 letters: one per column of the largest board.
 */
export const COLUMN_LETTERS = 'ABCDEFGHJKLMNOPQRSTUVWXYZ';

export type ParsedVertex =
  | { type: 'coordinate'; coordinate: Coordinate }
  | { type: 'pass' }
  | { type: 'resign' };

const VERTEX_PATTERN = /^([a-hj-z])([1-9]\d?)$/i;

/**
 * Parse a GTP vertex such as `D4`, `pass` or `resign` on a board of `size`.
 * Letters are case-insensitive. Throws `invalid vertex` for malformed or
 * off-board input.
 */
export function parseVertex(text: string, size: number): ParsedVertex {
  const lower = text.toLowerCase();
  if (lower === 'pass') return { type: 'pass' };
  if (lower === 'resign') return { type: 'resign' };

  const match = VERTEX_PATTERN.exec(text);
  if (!match) {
    throw new GtpError(GtpErrorCode.INVALID_VERTEX, { vertex: text });
  }
  const x = COLUMN_LETTERS.indexOf(match[1].toUpperCase()) + 1;
  const y = Number(match[2]);
  if (x < 1 || x > size || y < 1 || y > size) {
    throw new GtpError(GtpErrorCode.INVALID_VERTEX, { vertex: text, size });
  }
  return { type: 'coordinate', coordinate: { x, y } };
}

export function formatVertex(c: Coordinate): string {
  return `${COLUMN_LETTERS.charAt(c.x - 1)}${c.y}`;
}

export function formatMove(action: MoveAction): string {
  return action.type === 'pass' ? 'pass' : formatVertex(action.at);
}

export function parseColour(text: string): Colour {
  switch (text.toLowerCase()) {
    case 'b':
    case 'black':
      return 'black';
    case 'w':
    case 'white':
      return 'white';
    default:
      throw new GtpError(GtpErrorCode.INVALID_COLOR, { colour: text });
  }
}
