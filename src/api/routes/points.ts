import type { FastifyInstance } from 'fastify';
import type { ApiContext } from '../server.js';

export async function registerPointsRoutes(
  fastify: FastifyInstance,
  opts: { context: ApiContext }
): Promise<void> {
  const { bridge } = opts.context;
  const defaultDatabase = bridge.config.influxdb.database;

  fastify.get('/points', async () => ({
    points: bridge.mappingEngine.listPoints().map(({ config }) => ({
      topic: config.topic,
      measurement: config.measurement,
      fields: config.fields,
      tags: config.tags,
      database: config.database ?? defaultDatabase,
    })),
  }));
}
