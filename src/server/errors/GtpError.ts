/**
 * GTP failure responses.
 *
 * Every failure the protocol adapter reports to the controller is a
 * `GtpError`. Its message is the exact text sent after `?`, so the
 * standard GTP failure strings live in {@link GTP_ERROR_MESSAGES}.
 */

export enum GtpErrorCode {
  UNKNOWN_COMMAND = 'UNKNOWN_COMMAND',
  SYNTAX_ERROR = 'SYNTAX_ERROR',
  INVALID_COLOR = 'INVALID_COLOR',
  INVALID_VERTEX = 'INVALID_VERTEX',
  ILLEGAL_MOVE = 'ILLEGAL_MOVE',
  UNACCEPTABLE_SIZE = 'UNACCEPTABLE_SIZE',
  CANNOT_UNDO = 'CANNOT_UNDO',
}

/**
 * Failure text sent to the controller for each code.
 */
export const GTP_ERROR_MESSAGES: Record<GtpErrorCode, string> = {
  [GtpErrorCode.UNKNOWN_COMMAND]: 'unknown command',
  [GtpErrorCode.SYNTAX_ERROR]: 'syntax error',
  [GtpErrorCode.INVALID_COLOR]: 'invalid color',
  [GtpErrorCode.INVALID_VERTEX]: 'invalid vertex',
  [GtpErrorCode.ILLEGAL_MOVE]: 'illegal move',
  [GtpErrorCode.UNACCEPTABLE_SIZE]: 'unacceptable size',
  [GtpErrorCode.CANNOT_UNDO]: 'cannot undo',
};

export class GtpError extends Error {
  /** Error code for programmatic handling */
  readonly code: GtpErrorCode;

  /** Additional context for debugging */
  readonly context: Record<string, unknown>;

  constructor(code: GtpErrorCode, context: Record<string, unknown> = {}, message?: string) {
    super(message ?? GTP_ERROR_MESSAGES[code]);
    this.name = 'GtpError';
    this.code = code;
    this.context = context;

    // Maintain proper prototype chain
    Object.setPrototypeOf(this, GtpError.prototype);
  }
}

export function isGtpError(error: unknown): error is GtpError {
  return error instanceof GtpError;
}
