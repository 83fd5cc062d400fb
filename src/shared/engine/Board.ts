import {
  DEFAULT_BOARD_SIZE,
  EMPTY,
  MAX_BOARD_SIZE,
  coordinatesEqual,
  coordinateToString,
  opponentOf,
  type CapturedGroup,
  type Colour,
  type Coordinate,
  type DeadCounts,
  type GroupSnapshot,
  type Intersection,
  type MoveAction,
  type MoveRecord,
  type StoneListing,
} from '../types/game';
import { debugLog, flagEnabled, isTestEnvironment } from '../utils/envFlags';
import { allCoordinates, getNeighbours, isOnBoard } from './core';
import { BoardConstraintViolation, EngineErrorCode, InvalidState } from './errors';
import { Group } from './Group';
import { GroupTable } from './GroupTable';
import { assertBoardInvariants, collectBoardInvariantViolations, type BoardInvariantView } from './invariants';
import { MoveHistory } from './MoveHistory';

const DEBUG = flagEnabled('GOBAN_DEBUG');

// In strict mode every successful mutation re-checks the full grid/group
// invariants and throws on the first inconsistency. On by default under
// test; `BoardOptions.strictInvariants` overrides the environment.
function isBoardInvariantsStrict(): boolean {
  return isTestEnvironment() || flagEnabled('GOBAN_STRICT_INVARIANTS');
}

export interface BoardOptions {
  size?: number;
  /** Overrides the environment-derived strict invariant mode. */
  strictInvariants?: boolean;
}

/**
 * Rules engine for a single Go board.
 *
 * The Board owns the stone grid, the group table, the move history, the
 * dead-stone counters and the ko point. `play`, `pass`, `undo`, `clear`
 * and `resize` are the only mutators; each either commits completely or
 * returns `false` without touching any state.
 *
 * Grid cells are stored for the full {@link MAX_BOARD_SIZE} extent and
 * indexed as `grid[x - 1][y - 1]`; only the first `size` rows and columns
 * are ever occupied.
 */
export class Board {
  private readonly grid: Intersection[][];
  private readonly groups = new GroupTable();
  private readonly history = new MoveHistory();
  private size: number = DEFAULT_BOARD_SIZE;
  private blackDead = 0;
  private whiteDead = 0;
  private ko: Coordinate | null = null;
  private readonly strictInvariants: boolean | undefined;

  constructor(options: BoardOptions = {}) {
    this.grid = Array.from({ length: MAX_BOARD_SIZE }, () =>
      Array.from({ length: MAX_BOARD_SIZE }, (): Intersection => EMPTY)
    );
    this.strictInvariants = options.strictInvariants;
    if (options.size !== undefined && !this.resize(options.size)) {
      throw new BoardConstraintViolation(
        EngineErrorCode.BOARD_INVALID_SIZE,
        `Board size must be between 1 and ${MAX_BOARD_SIZE}, got ${options.size}`,
        { size: options.size }
      );
    }
  }

  // ═══════════════════════════════════════════════════════════════════════
  // Lifecycle
  // ═══════════════════════════════════════════════════════════════════════

  /**
   * Remove all stones, groups, history, dead counters and the ko point.
   * The board size is kept.
   */
  clear(): void {
    for (const column of this.grid) {
      column.fill(EMPTY);
    }
    this.groups.clear();
    this.history.clear();
    this.blackDead = 0;
    this.whiteDead = 0;
    this.ko = null;
  }

  /**
   * Clear the board and change its size. Sizes outside `[1, MAX_BOARD_SIZE]`
   * are rejected and leave the board as it was.
   */
  resize(size: number): boolean {
    if (!Number.isInteger(size) || size < 1 || size > MAX_BOARD_SIZE) {
      return false;
    }
    this.clear();
    this.size = size;
    return true;
  }

  // ═══════════════════════════════════════════════════════════════════════
  // Mutators
  // ═══════════════════════════════════════════════════════════════════════

  /**
   * Place a stone of `colour` at `(x, y)`, capture any opposing groups left
   * without liberties and merge with adjacent friendly groups.
   *
   * Returns `false` without changing anything when the point is off the
   * board, occupied, the current ko point, or when the move would be
   * suicide.
   */
  play(colour: Colour, x: number, y: number): boolean {
    const at: Coordinate = { x, y };
    if (!isOnBoard(at, this.size) || this.cellAt(at).kind !== 'empty') {
      return false;
    }
    if (this.ko && coordinatesEqual(this.ko, at)) {
      debugLog(DEBUG, '[Board] ko violation', coordinateToString(at));
      return false;
    }

    // Classify neighbours before touching anything.
    const neighbours = getNeighbours(at, this.size);
    const emptyNeighbours: Coordinate[] = [];
    const friendly: Group[] = [];
    const enemies: Group[] = [];
    for (const n of neighbours) {
      const cell = this.cellAt(n);
      if (cell.kind === 'empty') {
        emptyNeighbours.push(n);
        continue;
      }
      const group = this.groups.require(cell.groupId, { x: n.x, y: n.y });
      const bucket = cell.colour === colour ? friendly : enemies;
      if (!bucket.includes(group)) {
        bucket.push(group);
      }
    }

    // Every adjacent group has `at` as a liberty, so one whose only liberty
    // is `at` is exactly a group this stone takes off the board.
    const doomed = enemies.filter((g) => g.libertyCount === 1);
    if (
      doomed.length === 0 &&
      emptyNeighbours.length === 0 &&
      friendly.every((g) => g.libertyCount === 1)
    ) {
      debugLog(DEBUG, '[Board] suicide rejected', colour, coordinateToString(at));
      return false;
    }

    const placed = new Group(this.groups.allocateId(), colour);
    placed.addStone(at);
    this.groups.insert(placed);
    this.setCell(at, { kind: 'stone', colour, groupId: placed.id });

    for (const enemy of enemies) {
      enemy.removeLiberty(at);
    }

    const captured: CapturedGroup[] = [];
    let capturedStones = 0;
    for (const victim of doomed) {
      captured.push(this.captureGroup(victim, at));
      capturedStones += victim.stoneCount;
    }

    for (const n of neighbours) {
      if (this.cellAt(n).kind === 'empty') {
        placed.addLiberty(n);
      }
    }

    let merged = placed;
    for (const neighbour of friendly) {
      merged = this.mergeGroups(merged, neighbour);
    }

    const firstCaptured = captured[0];
    this.ko =
      capturedStones === 1 && firstCaptured && merged.stoneCount === 1 && merged.libertyCount === 1
        ? { ...firstCaptured.stones[0] }
        : null;

    this.history.push({ colour, action: { type: 'put', at }, captured });
    this.verify(`play ${colour} ${coordinateToString(at)}`);
    return true;
  }

  /**
   * Record a pass for `colour`. The grid is untouched; any ko restriction
   * is lifted.
   */
  pass(colour: Colour): void {
    this.history.push({ colour, action: { type: 'pass' }, captured: [] });
    this.ko = null;
    this.verify(`pass ${colour}`);
  }

  /**
   * Revert the most recent move, restoring every stone it captured.
   * Returns `false` when there is nothing to undo.
   */
  undo(): boolean {
    const move = this.history.pop();
    if (!move) {
      return false;
    }

    if (move.action.type === 'put') {
      this.undoPut(move.colour, move.action.at, move.captured);
    }

    this.ko = this.koAfter(this.history.peek());
    this.verify('undo');
    return true;
  }

  // ═══════════════════════════════════════════════════════════════════════
  // Queries
  // ═══════════════════════════════════════════════════════════════════════

  getSize(): number {
    return this.size;
  }

  getIntersection(x: number, y: number): Intersection {
    const c = { x, y };
    if (!isOnBoard(c, this.size)) {
      throw new BoardConstraintViolation(
        EngineErrorCode.BOARD_INVALID_POSITION,
        `Point (${x}, ${y}) is outside the ${this.size}x${this.size} board`,
        { x, y, size: this.size }
      );
    }
    return this.cellAt(c);
  }

  /**
   * Copy of the active grid, indexed `[x - 1][y - 1]`.
   */
  getGrid(): Intersection[][] {
    return this.grid.slice(0, this.size).map((column) => column.slice(0, this.size));
  }

  /**
   * Snapshot of every live group, ordered by id.
   */
  getGroups(): GroupSnapshot[] {
    return Array.from(this.groups.values(), (g) => g.snapshot()).sort((a, b) => a.id - b.id);
  }

  getGroupAt(x: number, y: number): GroupSnapshot | null {
    const cell = this.getIntersection(x, y);
    if (cell.kind === 'empty') {
      return null;
    }
    return this.groups.require(cell.groupId, { x, y }).snapshot();
  }

  /**
   * Liberties of the group holding `(x, y)`, or an empty list for an empty
   * point.
   */
  libertiesAt(x: number, y: number): Coordinate[] {
    const group = this.getGroupAt(x, y);
    return group ? group.liberties.slice() : [];
  }

  getDeadCounts(): DeadCounts {
    return { blackDead: this.blackDead, whiteDead: this.whiteDead };
  }

  getKo(): Coordinate | null {
    return this.ko ? { ...this.ko } : null;
  }

  getHistory(): ReadonlyArray<MoveRecord> {
    return this.history.toArray();
  }

  getHistoryLength(): number {
    return this.history.length;
  }

  getLastMove(): MoveAction | null {
    return this.history.peek()?.action ?? null;
  }

  listStones(): StoneListing {
    const black: Coordinate[] = [];
    const white: Coordinate[] = [];
    for (const c of allCoordinates(this.size)) {
      const cell = this.cellAt(c);
      if (cell.kind === 'stone') {
        (cell.colour === 'black' ? black : white).push(c);
      }
    }
    return { size: this.size, black, white, blackDead: this.blackDead, whiteDead: this.whiteDead };
  }

  /**
   * Run the full invariant check and return the violations found. An empty
   * list means grid and group table agree.
   */
  checkInvariants(): string[] {
    return collectBoardInvariantViolations(this.invariantView());
  }

  // ═══════════════════════════════════════════════════════════════════════
  // Internals
  // ═══════════════════════════════════════════════════════════════════════

  private cellAt(c: Coordinate): Intersection {
    return this.grid[c.x - 1][c.y - 1];
  }

  private setCell(c: Coordinate, value: Intersection): void {
    this.grid[c.x - 1][c.y - 1] = value;
  }

  /**
   * Take `victim` off the board and return a copy of it for the move
   * record. Each vacated point becomes a liberty of every group that
   * touches it; the captured stones are credited to their own colour's
   * dead counter.
   */
  private captureGroup(victim: Group, capturedBy: Coordinate): CapturedGroup {
    const record = victim.toCaptured();
    const stones = Array.from(victim.getStones());

    for (const stone of stones) {
      this.setCell(stone, EMPTY);
    }
    this.groups.remove(victim.id);

    for (const stone of stones) {
      for (const n of getNeighbours(stone, this.size)) {
        const cell = this.cellAt(n);
        if (cell.kind === 'stone') {
          this.groups.require(cell.groupId, { x: n.x, y: n.y }).addLiberty(stone);
        }
      }
    }

    if (victim.colour === 'black') {
      this.blackDead += stones.length;
    } else {
      this.whiteDead += stones.length;
    }
    debugLog(DEBUG, '[Board] captured', victim.colour, stones.length, 'by', coordinateToString(capturedBy));
    return record;
  }

  /**
   * Union-by-size merge. The group with more stones absorbs the other; on a
   * tie `b` survives. The absorbed group's stones are relabelled in the grid
   * and its id is freed. Returns the surviving group.
   */
  private mergeGroups(a: Group, b: Group): Group {
    if (a === b) {
      return a;
    }
    const [survivor, absorbed] = a.stoneCount > b.stoneCount ? [a, b] : [b, a];
    for (const stone of absorbed.getStones()) {
      this.setCell(stone, { kind: 'stone', colour: survivor.colour, groupId: survivor.id });
    }
    survivor.absorb(absorbed);
    this.groups.remove(absorbed.id);
    return survivor;
  }

  private undoPut(colour: Colour, at: Coordinate, captured: ReadonlyArray<CapturedGroup>): void {
    const cell = this.cellAt(at);
    if (cell.kind !== 'stone' || cell.colour !== colour) {
      throw new InvalidState(
        EngineErrorCode.STATE_STONE_NOT_FOUND,
        `Expected a ${colour} stone at ${coordinateToString(at)} while undoing`,
        { x: at.x, y: at.y, colour, found: cell.kind },
        'Board'
      );
    }
    const owner = this.groups.require(cell.groupId, { x: at.x, y: at.y });
    const remaining = new Map<string, Coordinate>();
    for (const stone of owner.getStones()) {
      if (!coordinatesEqual(stone, at)) {
        remaining.set(coordinateToString(stone), stone);
      }
    }

    this.setCell(at, EMPTY);
    this.groups.remove(owner.id);

    this.splitIntoComponents(colour, remaining);

    const capturedColour = opponentOf(colour);
    for (const record of captured) {
      this.restoreCaptured(capturedColour, record, at);
    }

    for (const n of getNeighbours(at, this.size)) {
      const neighbour = this.cellAt(n);
      if (neighbour.kind === 'stone') {
        this.groups.require(neighbour.groupId, { x: n.x, y: n.y }).addLiberty(at);
      }
    }
  }

  /**
   * Rebuild groups for `stones`, which used to form one chain but may have
   * fallen apart once the stone joining them was lifted. Uses an explicit
   * worklist; each component gets a fresh id and liberties computed from
   * scratch.
   */
  private splitIntoComponents(colour: Colour, stones: Map<string, Coordinate>): void {
    const unvisited = new Map(stones);
    for (const [startKey, start] of stones) {
      if (!unvisited.has(startKey)) continue;
      unvisited.delete(startKey);

      const component = new Group(this.groups.allocateId(), colour);
      this.groups.insert(component);
      const stack: Coordinate[] = [start];
      while (stack.length > 0) {
        const current = stack.pop();
        if (!current) break;
        component.addStone(current);
        this.setCell(current, { kind: 'stone', colour, groupId: component.id });
        for (const n of getNeighbours(current, this.size)) {
          const key = coordinateToString(n);
          const next = unvisited.get(key);
          if (next) {
            unvisited.delete(key);
            stack.push(next);
          }
        }
      }

      for (const stone of component.getStones()) {
        for (const n of getNeighbours(stone, this.size)) {
          if (this.cellAt(n).kind === 'empty') {
            component.addLiberty(n);
          }
        }
      }
    }
  }

  private restoreCaptured(colour: Colour, record: CapturedGroup, vacated: Coordinate): void {
    const group = new Group(this.groups.allocateId(), colour);
    for (const stone of record.stones) {
      group.addStone(stone);
      this.setCell(stone, { kind: 'stone', colour, groupId: group.id });
    }
    for (const liberty of record.liberties) {
      group.addLiberty(liberty);
    }
    group.addLiberty(vacated);
    this.groups.insert(group);

    for (const stone of record.stones) {
      for (const n of getNeighbours(stone, this.size)) {
        const cell = this.cellAt(n);
        if (cell.kind === 'stone' && cell.groupId !== group.id) {
          this.groups.require(cell.groupId, { x: n.x, y: n.y }).removeLiberty(stone);
        }
      }
    }

    if (colour === 'black') {
      this.blackDead -= record.stones.length;
    } else {
      this.whiteDead -= record.stones.length;
    }
  }

  /**
   * The ko point that holds right after `move`, given that the grid is in
   * the position `move` produced.
   */
  private koAfter(move: MoveRecord | undefined): Coordinate | null {
    if (!move || move.action.type !== 'put' || move.captured.length !== 1) {
      return null;
    }
    const [victim] = move.captured;
    if (victim.stones.length !== 1) {
      return null;
    }
    const cell = this.cellAt(move.action.at);
    if (cell.kind !== 'stone') {
      return null;
    }
    const group = this.groups.require(cell.groupId, { x: move.action.at.x, y: move.action.at.y });
    return group.stoneCount === 1 && group.libertyCount === 1 ? { ...victim.stones[0] } : null;
  }

  private verify(context: string): void {
    const strict = this.strictInvariants ?? isBoardInvariantsStrict();
    if (strict) {
      assertBoardInvariants(this.invariantView(), context);
    }
  }

  private invariantView(): BoardInvariantView {
    return {
      size: this.size,
      cellAt: (c) => this.cellAt(c),
      groups: () => this.groups.values(),
      ko: () => this.ko,
    };
  }
}
