/**
 * Engine Domain Errors - Structured error types for the rules engine layer
 *
 * Illegal user actions (occupied point, ko, suicide, bad board size, undo on
 * an empty history) are never errors: the Board reports them with a `false`
 * result. The types here cover the other case, where the engine finds its own
 * grid and group bookkeeping out of step. Such a state is reachable only
 * through a bug in the engine, so these errors are thrown and never caught
 * inside the engine.
 *
 * Error Categories:
 * - **InvalidState**: grid/group table disagree, missing groups, broken invariants
 * - **BoardConstraintViolation**: coordinates or sizes outside the board geometry
 *
 * Usage:
 * ```typescript
 * import { InvalidState, EngineErrorCode } from './errors';
 *
 * throw new InvalidState(
 *   EngineErrorCode.STATE_GROUP_NOT_FOUND,
 *   'Stone refers to a group that is not in the table',
 *   { x: 3, y: 4, groupId: 7 }
 * );
 * ```
 *
 * @module EngineErrors
 */

// =============================================================================
// ERROR CODES
// =============================================================================

/**
 * Enumeration of all engine domain error codes.
 *
 * Error codes are prefixed by category:
 * - STATE_*: grid/group state corruption or inconsistency
 * - BOARD_*: board geometry issues
 */
export enum EngineErrorCode {
  /** A point expected to hold a stone is empty */
  STATE_STONE_NOT_FOUND = 'STATE_STONE_NOT_FOUND',
  /** A stone refers to a group id that is not in the group table */
  STATE_GROUP_NOT_FOUND = 'STATE_GROUP_NOT_FOUND',
  /** A group id was inserted twice */
  STATE_DUPLICATE_GROUP = 'STATE_DUPLICATE_GROUP',
  /** Strict-mode invariant check failed after a mutation */
  STATE_INVARIANT_VIOLATION = 'STATE_INVARIANT_VIOLATION',

  /** Coordinate outside the active board extent */
  BOARD_INVALID_POSITION = 'BOARD_INVALID_POSITION',
  /** Board size outside [1, MAX_BOARD_SIZE] */
  BOARD_INVALID_SIZE = 'BOARD_INVALID_SIZE',
}

/**
 * Maps error code prefixes to human-readable category descriptions.
 */
export const ERROR_CATEGORY_DESCRIPTIONS: Record<string, string> = {
  STATE_: 'Corrupted or unexpected board state',
  BOARD_: 'Board geometry constraint violation',
};

// =============================================================================
// BASE ERROR CLASS
// =============================================================================

/**
 * Base class for all engine domain errors.
 *
 * Provides:
 * - Structured error code for programmatic handling
 * - Context for debugging
 * - Domain indicator for error routing
 */
export class EngineError extends Error {
  /** Error code for programmatic handling */
  readonly code: EngineErrorCode;

  /** Additional context for debugging */
  readonly context: Record<string, unknown>;

  /** Domain that generated the error (e.g., 'Board', 'GroupTable') */
  readonly domain: string;

  /** Timestamp when error occurred */
  readonly timestamp: Date;

  constructor(
    code: EngineErrorCode,
    message: string,
    context: Record<string, unknown> = {},
    domain: string = 'Engine'
  ) {
    super(message);
    this.name = 'EngineError';
    this.code = code;
    this.context = context;
    this.domain = domain;
    this.timestamp = new Date();

    // Maintain proper prototype chain
    Object.setPrototypeOf(this, EngineError.prototype);
  }

  /** Get error category from code prefix */
  get category(): string {
    const prefix = this.code.split('_')[0] + '_';
    return ERROR_CATEGORY_DESCRIPTIONS[prefix] ?? 'Unknown error category';
  }

  /** Serialize to a JSON-safe object for logging/debugging */
  toJSON(): EngineErrorJSON {
    return {
      error: true,
      type: this.name,
      code: this.code,
      message: this.message,
      domain: this.domain,
      context: this.context,
      category: this.category,
      timestamp: this.timestamp.toISOString(),
    };
  }
}

/**
 * JSON representation of an EngineError.
 */
export interface EngineErrorJSON {
  error: true;
  type: string;
  code: string;
  message: string;
  domain: string;
  context: Record<string, unknown>;
  category: string;
  timestamp: string;
}

// =============================================================================
// SPECIFIC ERROR CLASSES
// =============================================================================

/**
 * Error for corrupted or unexpected board state.
 *
 * Examples:
 * - Undo finds the point of the move it is reverting empty
 * - A stone's group id has no entry in the group table
 * - Strict-mode invariant check reports a liberty-less group
 */
export class InvalidState extends EngineError {
  constructor(
    code: EngineErrorCode,
    message: string,
    context: Record<string, unknown> = {},
    domain: string = 'State'
  ) {
    super(code, message, context, domain);
    this.name = 'InvalidState';
    Object.setPrototypeOf(this, InvalidState.prototype);
  }
}

/**
 * Error for board geometry violations, such as reading a point outside
 * the active extent.
 */
export class BoardConstraintViolation extends EngineError {
  constructor(
    code: EngineErrorCode,
    message: string,
    context: Record<string, unknown> = {},
    domain: string = 'Board'
  ) {
    super(code, message, context, domain);
    this.name = 'BoardConstraintViolation';
    Object.setPrototypeOf(this, BoardConstraintViolation.prototype);
  }
}

// =============================================================================
// TYPE GUARDS
// =============================================================================

/**
 * Check if an error is an EngineError.
 */
export function isEngineError(error: unknown): error is EngineError {
  return error instanceof EngineError;
}

/**
 * Check if an error is an InvalidState error.
 */
export function isInvalidState(error: unknown): error is InvalidState {
  return error instanceof InvalidState;
}

/**
 * Check if an error is a BoardConstraintViolation.
 */
export function isBoardConstraintViolation(error: unknown): error is BoardConstraintViolation {
  return error instanceof BoardConstraintViolation;
}
