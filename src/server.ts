#!/usr/bin/env node
/**
 * mqtt2influx entry point
 * Loads the YAML configuration, starts the bridge and, when configured, the status API
 */

import type { FastifyInstance } from 'fastify';
import { createServer, startServer } from './api/server.js';
import { type Bridge, createBridge } from './bridge.js';
import { type LogLevel, createLogger, defaultLogLevel } from './common/logger.js';
import { checkConfig, parseArgs, printUsage } from './cli.js';
import type { AppConfig } from './config/loader.js';
import { ConfigError } from './errors/bridge-error.js';

async function main(): Promise<void> {
  const options = parseArgs(process.argv.slice(2));

  if (options.help) {
    printUsage();
    return;
  }

  const level: LogLevel = options.debug ? 'debug' : defaultLogLevel();
  const logger = createLogger('mqtt2influx', { level });

  let config: AppConfig;
  try {
    config = checkConfig(options.configPath);
  } catch (err) {
    if (err instanceof ConfigError) {
      logger.fatal({ file: options.configPath, issues: err.issues }, err.message);
      process.exitCode = 1;
      return;
    }
    throw err;
  }

  if (options.test) {
    logger.info({ file: options.configPath, points: config.points.length }, 'configuration is valid');
    return;
  }

  const bridge: Bridge = createBridge(config, logger);
  await bridge.start();
  logger.info({ topics: bridge.mappingEngine.getTopicPatterns() }, 'bridge running');

  let server: FastifyInstance | null = null;
  if (config.http) {
    server = await createServer(config.http, { bridge }, { logLevel: level });
    await startServer(server, config.http);
  }

  const shutdown = async (signal: string): Promise<void> => {
    logger.info({ signal }, 'shutting down');
    await bridge.stop();
    await server?.close();
    const stats = bridge.handler.getStats();
    logger.info(stats, 'final statistics');
  };

  for (const signal of ['SIGINT', 'SIGTERM'] as const) {
    process.once(signal, () => {
      shutdown(signal).then(
        () => process.exit(0),
        (err: unknown) => {
          logger.error({ err }, 'shutdown failed');
          process.exit(1);
        }
      );
    });
  }
}

main().catch((err: unknown) => {
  console.error('Fatal error:', err);
  process.exit(1);
});
