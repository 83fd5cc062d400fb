import { GtpError, GtpErrorCode } from '../../src/server/errors';
import { formatMove, formatVertex, parseColour, parseVertex } from '../../src/server/gtp/vertex';

describe('GTP vertices', () => {
  it('parses letters case-insensitively and skips I', () => {
    expect(parseVertex('A1', 19)).toEqual({ type: 'coordinate', coordinate: { x: 1, y: 1 } });
    expect(parseVertex('d4', 19)).toEqual({ type: 'coordinate', coordinate: { x: 4, y: 4 } });
    expect(parseVertex('J10', 19)).toEqual({ type: 'coordinate', coordinate: { x: 9, y: 10 } });
    expect(parseVertex('Z25', 25)).toEqual({ type: 'coordinate', coordinate: { x: 25, y: 25 } });
  });

  it('recognises pass and resign', () => {
    expect(parseVertex('PASS', 9)).toEqual({ type: 'pass' });
    expect(parseVertex('resign', 9)).toEqual({ type: 'resign' });
  });

  it.each(['I5', 'A0', 'K1', 'A10', '5A', 'AA1', 'A07', 'A00', ''])('rejects %j on a 9x9 board', (text) => {
    expect(() => parseVertex(text, 9)).toThrow(GtpError);
    expect(() => parseVertex(text, 9)).toThrow('invalid vertex');
  });

  it('formats coordinates and moves', () => {
    expect(formatVertex({ x: 8, y: 3 })).toBe('H3');
    expect(formatVertex({ x: 9, y: 3 })).toBe('J3');
    expect(formatMove({ type: 'put', at: { x: 19, y: 19 } })).toBe('T19');
    expect(formatMove({ type: 'pass' })).toBe('pass');
  });

  it('parses colours', () => {
    expect(parseColour('B')).toBe('black');
    expect(parseColour('black')).toBe('black');
    expect(parseColour('w')).toBe('white');
    expect(parseColour('WHITE')).toBe('white');
  });

  it('rejects unknown colours with INVALID_COLOR', () => {
    try {
      parseColour('red');
      throw new Error('expected parseColour to throw');
    } catch (error) {
      if (!(error instanceof GtpError)) throw error;
      expect(error.code).toBe(GtpErrorCode.INVALID_COLOR);
      expect(error.message).toBe('invalid color');
    }
  });
});
