#!/usr/bin/env node
// Relay agents - command line entry
//   host <gmail|keynote>  serve a tool host on HOST:PORT
//   run <gmail|keynote>   run the orchestrator once

// Load environment variables from .env file
import 'dotenv/config';

import { env, describeConfiguration } from './env.js';
import { runAgent } from './agents/index.js';
import { buildToolHost, startToolHost } from './server.js';
import { HOST_KINDS, initializeTools, isHostKind } from './services/tools/index.js';
import type { HostKind } from './services/tools/index.js';
import { AppError, errorMessage } from './utils/errors.js';
import { logger } from './utils/logger.js';

const USAGE = `Usage: relay-agents <host|run> <${HOST_KINDS.join('|')}>`;

async function serve(kind: HostKind): Promise<void> {
  const registry = await initializeTools(kind);
  const server = await buildToolHost({ name: kind, registry });
  const url = await startToolHost(server, env.HOST, env.PORT);

  logger.info({ ...describeConfiguration(), url }, `🛠  ${kind} tool host listening on ${url}`);

  const shutdown = () => {
    logger.info('Shutting down tool host');
    server.close().then(
      () => { process.exitCode = 0; },
      (error: unknown) => {
        logger.error({ err: error }, 'Error while closing tool host');
        process.exitCode = 1;
      },
    );
  };
  process.once('SIGINT', shutdown);
  process.once('SIGTERM', shutdown);
}

async function run(kind: HostKind): Promise<void> {
  const outcome = await runAgent(kind);
  if (outcome.status === 'completed') {
    logger.info({ calls: outcome.results.length }, `✓ ${kind} agent completed`);
    process.exitCode = 0;
  } else {
    logger.error({ error: outcome.error }, `✗ ${kind} agent failed`);
    process.exitCode = 1;
  }
}

const [command, kind] = process.argv.slice(2);

if ((command !== 'host' && command !== 'run') || kind === undefined || !isHostKind(kind)) {
  console.error(USAGE);
  process.exitCode = 1;
} else {
  try {
    if (command === 'host') {
      await serve(kind);
    } else {
      await run(kind);
    }
  } catch (error) {
    if (error instanceof AppError) {
      logger.fatal({ code: error.code }, error.message);
    } else {
      logger.fatal({ err: error }, `Unexpected failure: ${errorMessage(error)}`);
    }
    process.exitCode = 1;
  }
}
