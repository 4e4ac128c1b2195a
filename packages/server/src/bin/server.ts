#!/usr/bin/env -S npx tsx

import { loadConfig, logger } from '@launchpad/core';
import { applyOverrides, parseArgs } from '../cli-options.js';
import { LaunchpadServer } from '../server.js';

/**
 * Launchpad Server CLI
 *
 * Usage:
 *   launchpad-server [options]
 *
 * Options:
 *   --config <path>        Config file (default: $LAUNCHPAD_CONFIG or ./launchpad.yaml)
 *   --port <port>          Server port (default: $LAUNCHPAD_PORT or server.port)
 *   --host <host>          Server host (default: $LAUNCHPAD_HOST or server.host)
 *   --log-level <level>    Log level (default: $LOG_LEVEL or server.log_level)
 */

async function main(): Promise<void> {
  const args = parseArgs(process.argv.slice(2));
  const configPath = args.configPath ?? process.env.LAUNCHPAD_CONFIG ?? 'launchpad.yaml';

  const config = applyOverrides(await loadConfig(configPath), args, process.env);
  const server = new LaunchpadServer({ config });

  const shutdown = async (signal: string): Promise<void> => {
    logger.info(`[Server] Received ${signal}, shutting down...`);
    try {
      await server.stop();
      process.exit(0);
    } catch (err) {
      logger.error({ err }, '[Server] Shutdown failed');
      process.exit(1);
    }
  };

  process.on('SIGINT', () => void shutdown('SIGINT'));
  process.on('SIGTERM', () => void shutdown('SIGTERM'));

  await server.initialize();
  await server.start();
}

main().catch((err: unknown) => {
  logger.fatal({ err }, '[Server] Fatal error');
  process.exit(1);
});
