#!/usr/bin/env node
import readline from 'readline';
import { config } from './config';
import { createMoveRng } from '../shared/ai';
import { GtpEngine } from './gtp/GtpEngine';
import { logger } from './utils/logger';

/**
 * Run a GTP session over the given streams until `quit` or end of input.
 * Resolves once the input is closed.
 */
export function runGtpSession(
  input: NodeJS.ReadableStream,
  output: NodeJS.WritableStream,
  engine: GtpEngine
): Promise<void> {
  const rl = readline.createInterface({ input, terminal: false });

  rl.on('line', (line) => {
    const reply = engine.handleLine(line);
    if (reply.output.length > 0) {
      output.write(reply.output);
    }
    if (reply.quit) {
      rl.close();
    }
  });

  return new Promise((resolve) => {
    rl.once('close', () => resolve());
  });
}

export function createEngineFromConfig(): GtpEngine {
  const seed = config.engine.randomSeed ?? Date.now();
  return new GtpEngine({
    name: config.app.name,
    version: config.app.version,
    boardSize: config.engine.boardSize,
    komi: config.engine.komi,
    rng: createMoveRng(seed),
    genmoveAttempts: config.engine.genmoveAttempts,
    strictInvariants: config.engine.strictInvariants || undefined,
  });
}

async function main(): Promise<void> {
  const engine = createEngineFromConfig();
  logger.info('GTP engine ready', {
    boardSize: config.engine.boardSize,
    komi: config.engine.komi,
    seeded: config.engine.randomSeed !== undefined,
  });
  await runGtpSession(process.stdin, process.stdout, engine);
  logger.info('GTP session closed');
}

if (require.main === module) {
  // Handle uncaught exceptions
  process.on('uncaughtException', (error) => {
    logger.error('Uncaught Exception:', error);
    process.exit(1);
  });

  process.on('unhandledRejection', (reason) => {
    logger.error('Unhandled Rejection', { reason });
    process.exit(1);
  });

  main().catch((error: unknown) => {
    logger.error('GTP session failed', { error });
    process.exit(1);
  });
}
