#!/usr/bin/env node
/**
 * decision-relay CLI entry.
 */

import { relayLog as log } from '@decision-relay/utils/logger';
import type { RelayServer } from '@decision-relay/daemon/server';
import { createProgram } from './program.js';

function installShutdown(server: RelayServer): void {
  const shutdown = (signal: NodeJS.Signals): void => {
    log.info(`Received ${signal}, shutting down`);
    server.stop().then(
      () => process.exit(0),
      (err: unknown) => {
        log.error('Shutdown failed', { error: String(err) });
        process.exit(1);
      },
    );
  };
  process.once('SIGINT', shutdown);
  process.once('SIGTERM', shutdown);
}

createProgram({ onStarted: installShutdown })
  .parseAsync(process.argv)
  .catch((err: unknown) => {
    const message = err instanceof Error ? err.message : String(err);
    console.error(`decision-relay: ${message}`);
    process.exitCode = 1;
  });
