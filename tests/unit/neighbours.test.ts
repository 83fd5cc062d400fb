import { allCoordinates, getNeighbours, isOnBoard } from '../../src/shared/engine/core';
import { pt } from '../utils/fixtures';

describe('getNeighbours', () => {
  it('returns four orthogonal neighbours in W, N, E, S order for an interior point', () => {
    expect(getNeighbours(pt(3, 3), 5)).toEqual([pt(2, 3), pt(3, 2), pt(4, 3), pt(3, 4)]);
  });

  it('returns two neighbours for a corner', () => {
    expect(getNeighbours(pt(1, 1), 5)).toEqual([pt(2, 1), pt(1, 2)]);
    expect(getNeighbours(pt(5, 5), 5)).toEqual([pt(4, 5), pt(5, 4)]);
  });

  it('returns three neighbours on an edge, including the last row and column', () => {
    expect(getNeighbours(pt(5, 3), 5)).toEqual([pt(4, 3), pt(5, 2), pt(5, 4)]);
    expect(getNeighbours(pt(3, 5), 5)).toEqual([pt(2, 5), pt(3, 4), pt(4, 5)]);
  });

  it('never returns diagonal points', () => {
    const keys = getNeighbours(pt(2, 2), 3).map((c) => `${c.x},${c.y}`);
    expect(keys).not.toContain('1,1');
    expect(keys).not.toContain('3,3');
    expect(keys).toHaveLength(4);
  });

  it('returns nothing on a 1x1 board', () => {
    expect(getNeighbours(pt(1, 1), 1)).toEqual([]);
  });
});

describe('isOnBoard', () => {
  it('accepts 1-indexed points within the size', () => {
    expect(isOnBoard(pt(1, 1), 9)).toBe(true);
    expect(isOnBoard(pt(9, 9), 9)).toBe(true);
  });

  it('rejects zero, overflow and fractional coordinates', () => {
    expect(isOnBoard(pt(0, 1), 9)).toBe(false);
    expect(isOnBoard(pt(1, 10), 9)).toBe(false);
    expect(isOnBoard(pt(1.5, 1), 9)).toBe(false);
  });
});

describe('allCoordinates', () => {
  it('enumerates column by column', () => {
    expect(Array.from(allCoordinates(2))).toEqual([pt(1, 1), pt(1, 2), pt(2, 1), pt(2, 2)]);
  });
});
