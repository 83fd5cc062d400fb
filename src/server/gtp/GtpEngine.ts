import { Board, type GroupSnapshot } from '../../shared/engine';
import { createMoveRng, generateRandomMove, type MoveRng, DEFAULT_RANDOM_ATTEMPTS } from '../../shared/ai';
import { GTP_ERROR_MESSAGES, GtpError, GtpErrorCode, isGtpError } from '../errors';
import { componentLogger } from '../utils/logger';
import { formatFailure, formatSuccess, parseCommandLine, type GtpCommand } from './protocol';
import { COLUMN_LETTERS, formatMove, formatVertex, parseColour, parseVertex } from './vertex';

const log = componentLogger('gtp');

export const PROTOCOL_VERSION = '2';

export interface GtpEngineOptions {
  name: string;
  version: string;
  boardSize?: number;
  komi?: number;
  rng?: MoveRng;
  genmoveAttempts?: number;
  strictInvariants?: boolean;
}

export interface GtpReply {
  /** Complete response text, including the terminating blank line. Empty for blank input. */
  output: string;
  /** True once the controller has sent `quit`. */
  quit: boolean;
}

type CommandHandler = (args: string[]) => string;

/**
 * GTP front end for a single Board.
 *
 * Translates protocol commands into Board calls and Board results into
 * protocol responses. User errors (bad syntax, illegal moves, impossible
 * undo) become `?` responses; anything else is an engine fault and is
 * rethrown to the caller.
 */
export class GtpEngine {
  private readonly board: Board;
  private readonly rng: MoveRng;
  private readonly genmoveAttempts: number;
  private readonly name: string;
  private readonly version: string;
  private komi: number;
  private readonly commands: Map<string, CommandHandler>;

  constructor(options: GtpEngineOptions) {
    this.name = options.name;
    this.version = options.version;
    this.board = new Board({ size: options.boardSize, strictInvariants: options.strictInvariants });
    this.komi = options.komi ?? 5.5;
    this.rng = options.rng ?? createMoveRng(Date.now());
    this.genmoveAttempts = options.genmoveAttempts ?? DEFAULT_RANDOM_ATTEMPTS;

    this.commands = new Map<string, CommandHandler>([
      ['protocol_version', () => PROTOCOL_VERSION],
      ['name', () => this.name],
      ['version', () => this.version],
      ['known_command', (args) => String(this.commands.has(requireArg(args, 0)))],
      ['list_commands', () => Array.from(this.commands.keys()).join('\n')],
      ['quit', () => ''],
      ['boardsize', (args) => this.boardsize(args)],
      ['clear_board', () => this.clearBoard()],
      ['komi', (args) => this.setKomi(args)],
      ['play', (args) => this.play(args)],
      ['genmove', (args) => this.genmove(args)],
      ['undo', () => this.undo()],
      ['showboard', () => this.showboard()],
      ['cg_list_groups', () => this.listGroups()],
    ]);
  }

  getBoard(): Board {
    return this.board;
  }

  getKomi(): number {
    return this.komi;
  }

  /**
   * Process one line of controller input.
   */
  handleLine(line: string): GtpReply {
    const command = parseCommandLine(line);
    if (!command) {
      return { output: '', quit: false };
    }
    return this.execute(command);
  }

  execute(command: GtpCommand): GtpReply {
    const handler = this.commands.get(command.name);
    if (!handler) {
      log.debug('Unknown command', { command: command.name });
      return { output: formatFailure(command.id, GTP_ERROR_MESSAGES[GtpErrorCode.UNKNOWN_COMMAND]), quit: false };
    }

    try {
      const text = handler(command.args);
      return { output: formatSuccess(command.id, text), quit: command.name === 'quit' };
    } catch (error) {
      if (isGtpError(error)) {
        log.debug('Command failed', { command: command.name, args: command.args, code: error.code });
        return { output: formatFailure(command.id, error.message), quit: false };
      }
      throw error;
    }
  }

  // ═══════════════════════════════════════════════════════════════════════
  // Command handlers
  // ═══════════════════════════════════════════════════════════════════════

  private boardsize(args: string[]): string {
    const size = parseInteger(requireArg(args, 0));
    if (!this.board.resize(size)) {
      throw new GtpError(GtpErrorCode.UNACCEPTABLE_SIZE, { size });
    }
    log.info('Board resized', { size });
    return '';
  }

  private clearBoard(): string {
    this.board.clear();
    return '';
  }

  private setKomi(args: string[]): string {
    const raw = requireArg(args, 0);
    const komi = Number(raw);
    if (raw.length === 0 || !Number.isFinite(komi)) {
      throw new GtpError(GtpErrorCode.SYNTAX_ERROR, { komi: raw });
    }
    this.komi = komi;
    return '';
  }

  private play(args: string[]): string {
    const colour = parseColour(requireArg(args, 0));
    const vertex = parseVertex(requireArg(args, 1), this.board.getSize());
    switch (vertex.type) {
      case 'pass':
        this.board.pass(colour);
        return '';
      case 'resign':
        return '';
      case 'coordinate': {
        const { x, y } = vertex.coordinate;
        if (!this.board.play(colour, x, y)) {
          throw new GtpError(GtpErrorCode.ILLEGAL_MOVE, { colour, vertex: args[1] });
        }
        return '';
      }
    }
  }

  private genmove(args: string[]): string {
    const colour = parseColour(requireArg(args, 0));
    const move = generateRandomMove(this.board, colour, this.rng, this.genmoveAttempts);
    log.debug('Generated move', { colour, move: formatMove(move) });
    return formatMove(move);
  }

  private undo(): string {
    if (!this.board.undo()) {
      throw new GtpError(GtpErrorCode.CANNOT_UNDO);
    }
    return '';
  }

  /**
   * ASCII diagram: column letters above and below, row numbers on both
   * sides with the highest row on top, `X` black, `O` white, `.` empty.
   */
  private showboard(): string {
    const size = this.board.getSize();
    const grid = this.board.getGrid();
    const letters = COLUMN_LETTERS.slice(0, size).split('').join(' ');
    const lines = [`   ${letters}`];
    for (let y = size; y >= 1; y--) {
      const cells: string[] = [];
      for (let x = 1; x <= size; x++) {
        const cell = grid[x - 1][y - 1];
        cells.push(cell.kind === 'empty' ? '.' : cell.colour === 'black' ? 'X' : 'O');
      }
      lines.push(`${String(y).padStart(2)} ${cells.join(' ')} ${y}`);
    }
    lines.push(`   ${letters}`);

    const { blackDead, whiteDead } = this.board.getDeadCounts();
    lines.push(`Dead black stones: ${blackDead}`);
    lines.push(`Dead white stones: ${whiteDead}`);
    const ko = this.board.getKo();
    if (ko) {
      lines.push(`Ko: ${formatVertex(ko)}`);
    }
    return `\n${lines.join('\n')}`;
  }

  private listGroups(): string {
    const lines = ['Groups:'];
    for (const group of this.board.getGroups()) {
      lines.push(describeGroup(group));
    }
    return lines.join('\n');
  }
}

function describeGroup(group: GroupSnapshot): string {
  const stones = group.stones.map(formatVertex).join(' ');
  const liberties = group.liberties.map(formatVertex).join(' ');
  return `${group.id} ${group.colour} :: stones : ${stones} liberties : ${liberties}`;
}

function requireArg(args: string[], index: number): string {
  const value = args[index];
  if (value === undefined) {
    throw new GtpError(GtpErrorCode.SYNTAX_ERROR, { missingArgument: index });
  }
  return value;
}

function parseInteger(raw: string): number {
  if (!/^\d+$/.test(raw)) {
    throw new GtpError(GtpErrorCode.SYNTAX_ERROR, { value: raw });
  }
  return Number(raw);
}
