import type { MoveRecord } from '../types/game';

/**
 * Ordered stack of the moves played on a board. The last entry is the move
 * that `undo` reverts next.
 */
export class MoveHistory {
  private readonly moves: MoveRecord[] = [];

  get length(): number {
    return this.moves.length;
  }

  push(move: MoveRecord): void {
    this.moves.push(move);
  }

  pop(): MoveRecord | undefined {
    return this.moves.pop();
  }

  peek(): MoveRecord | undefined {
    return this.moves[this.moves.length - 1];
  }

  clear(): void {
    this.moves.length = 0;
  }

  toArray(): ReadonlyArray<MoveRecord> {
    return this.moves.slice();
  }
}
