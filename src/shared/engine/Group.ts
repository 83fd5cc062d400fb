import {
  coordinateToString,
  type CapturedGroup,
  type Colour,
  type Coordinate,
  type GroupId,
  type GroupSnapshot,
} from '../types/game';

/**
 * One connected chain of same-coloured stones together with its liberties.
 *
 * Stones and liberties are both keyed by `coordinateToString`, so a point
 * is never counted twice. A Group only tracks sets; writing stones into the
 * grid is the Board's job.
 */
export class Group {
  readonly id: GroupId;
  readonly colour: Colour;
  private readonly stones = new Map<string, Coordinate>();
  private readonly liberties = new Map<string, Coordinate>();

  constructor(id: GroupId, colour: Colour) {
    this.id = id;
    this.colour = colour;
  }

  get stoneCount(): number {
    return this.stones.size;
  }

  get libertyCount(): number {
    return this.liberties.size;
  }

  isDead(): boolean {
    return this.liberties.size === 0;
  }

  hasStone(c: Coordinate): boolean {
    return this.stones.has(coordinateToString(c));
  }

  hasLiberty(c: Coordinate): boolean {
    return this.liberties.has(coordinateToString(c));
  }

  addStone(c: Coordinate): void {
    const key = coordinateToString(c);
    this.liberties.delete(key);
    this.stones.set(key, { x: c.x, y: c.y });
  }

  addLiberty(c: Coordinate): void {
    const key = coordinateToString(c);
    if (!this.stones.has(key)) {
      this.liberties.set(key, { x: c.x, y: c.y });
    }
  }

  removeLiberty(c: Coordinate): void {
    this.liberties.delete(coordinateToString(c));
  }

  /**
   * Merge `other` into this group. Afterwards `other` must be discarded:
   * its stones now belong here, and any liberty that became a stone of the
   * merged chain is dropped.
   *
   * Cost is proportional to the size of `other`, which is why the Board
   * always absorbs the smaller group into the larger.
   */
  absorb(other: Group): void {
    for (const [key, c] of other.stones) {
      this.stones.set(key, c);
      this.liberties.delete(key);
    }
    for (const [key, c] of other.liberties) {
      if (!this.stones.has(key)) {
        this.liberties.set(key, c);
      }
    }
  }

  getStones(): IterableIterator<Coordinate> {
    return this.stones.values();
  }

  getLiberties(): IterableIterator<Coordinate> {
    return this.liberties.values();
  }

  snapshot(): GroupSnapshot {
    return {
      id: this.id,
      colour: this.colour,
      stones: copyAll(this.stones.values()),
      liberties: copyAll(this.liberties.values()),
    };
  }

  toCaptured(): CapturedGroup {
    return {
      stones: copyAll(this.stones.values()),
      liberties: copyAll(this.liberties.values()),
    };
  }
}

function copyAll(coords: Iterable<Coordinate>): Coordinate[] {
  return Array.from(coords, (c) => ({ x: c.x, y: c.y }));
}
