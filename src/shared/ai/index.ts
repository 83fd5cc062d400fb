/**
 * Shared AI Module
 *
 * Move generators that drive a Board only through its public mutators.
 *
 * @module ai
 */

export {
  type MoveRng,
  DEFAULT_RANDOM_ATTEMPTS,
  createMoveRng,
  generateRandomMove,
} from './randomMove';
