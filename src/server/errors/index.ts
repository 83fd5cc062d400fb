/**
 * Protocol-level error handling.
 *
 * @module errors
 *
 * @example
 * ```ts
 * import { GtpError, GtpErrorCode } from '../errors';
 *
 * throw new GtpError(GtpErrorCode.ILLEGAL_MOVE, { vertex: 'D4' });
 * ```
 */

export { GtpError, GtpErrorCode, GTP_ERROR_MESSAGES, isGtpError } from './GtpError';
