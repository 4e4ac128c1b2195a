/**
 * Command-line and environment overrides for the loaded configuration
 */

import type { LaunchpadConfig } from '@launchpad/core';

type LogLevel = LaunchpadConfig['server']['log_level'];

const LOG_LEVELS: readonly LogLevel[] = ['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'];

export interface CliArgs {
  configPath?: string;
  port?: number;
  host?: string;
  logLevel?: LogLevel;
}

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some(level => level === value);
}

function parsePort(value: string | undefined): number | undefined {
  if (!value) return undefined;
  const port = parseInt(value, 10);
  return Number.isInteger(port) && port >= 0 && port <= 65535 ? port : undefined;
}

function printHelp(): void {
  process.stdout.write(`
Launchpad Server v0.1.0

Usage:
  launchpad-server [options]

Options:
  --config <path>        Config file (default: ./launchpad.yaml)
  --port <port>          Server port (default: 8080)
  --host <host>          Server host (default: 0.0.0.0)
  --log-level <level>    Log level: ${LOG_LEVELS.join('|')} (default: info)
  --help, -h             Show this help message

Environment:
  LAUNCHPAD_CONFIG, LAUNCHPAD_PORT, LAUNCHPAD_HOST, LOG_LEVEL

Examples:
  # Start with ./launchpad.yaml
  launchpad-server

  # Start on a custom port with debug logging
  launchpad-server --port 3000 --log-level debug
`);
}

export function parseArgs(argv: string[]): CliArgs {
  const args: CliArgs = {};

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    const next = argv[i + 1];

    switch (arg) {
      case '--config':
        if (next) {
          args.configPath = next;
          i++;
        }
        break;
      case '--port':
        args.port = parsePort(next);
        i++;
        break;
      case '--host':
        if (next) {
          args.host = next;
          i++;
        }
        break;
      case '--log-level':
        if (next && isLogLevel(next)) {
          args.logLevel = next;
          i++;
        }
        break;
      case '--help':
      case '-h':
        printHelp();
        process.exit(0);
    }
  }

  return args;
}

/**
 * CLI flags win over environment variables, which win over the file
 */
export function applyOverrides(config: LaunchpadConfig, args: CliArgs, env: NodeJS.ProcessEnv): LaunchpadConfig {
  const envLevel = env.LOG_LEVEL && isLogLevel(env.LOG_LEVEL) ? env.LOG_LEVEL : undefined;
  return {
    ...config,
    server: {
      ...config.server,
      port: args.port ?? parsePort(env.LAUNCHPAD_PORT) ?? config.server.port,
      host: args.host ?? env.LAUNCHPAD_HOST ?? config.server.host,
      log_level: args.logLevel ?? envLevel ?? config.server.log_level,
    },
  };
}
