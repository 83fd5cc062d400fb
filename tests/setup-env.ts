/**
 * Jest Environment Setup
 * Runs BEFORE the test framework is installed
 */

// Set test environment variables
process.env.NODE_ENV = 'test';
process.env.LOG_LEVEL = 'error';

// Keep a developer's engine overrides out of the test runs.
delete process.env.GOBAN_BOARD_SIZE;
delete process.env.GOBAN_RANDOM_SEED;
delete process.env.LOG_FILE;
