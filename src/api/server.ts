import Fastify, { type FastifyInstance } from 'fastify';
import cors from '@fastify/cors';
import type { Bridge } from '../bridge.js';
import type { LogLevel } from '../common/logger.js';
import type { HttpConfig } from '../config/loader.js';
import { createAuthHook } from './middleware/auth.js';
import { registerPointsRoutes } from './routes/points.js';
import { registerStatusRoutes } from './routes/status.js';

export interface ApiContext {
  bridge: Bridge;
}

export interface CreateServerOptions {
  logLevel?: LogLevel;
}

/** Read-only status API over a running bridge. */
export async function createServer(
  config: HttpConfig,
  context: ApiContext,
  options: CreateServerOptions = {}
): Promise<FastifyInstance> {
  const fastify = Fastify({
    logger: { name: 'http', level: options.logLevel ?? 'info' },
  });

  await fastify.register(cors, {
    origin: true,
  });

  if (config.apiKeys.length > 0) {
    fastify.addHook('onRequest', createAuthHook(config.apiKeys));
  }

  await fastify.register(registerStatusRoutes, { context });
  await fastify.register(registerPointsRoutes, { context });

  return fastify;
}

export async function startServer(
  fastify: FastifyInstance,
  config: HttpConfig
): Promise<void> {
  await fastify.listen({ port: config.port, host: config.host });
}
