import type { FastifyInstance } from 'fastify';
import type { ApiContext } from '../server.js';

export async function registerStatusRoutes(
  fastify: FastifyInstance,
  opts: { context: ApiContext }
): Promise<void> {
  const { bridge } = opts.context;

  fastify.get('/status', async () => ({
    mqtt: {
      brokerUrl: bridge.mqttClient.getBrokerUrl(),
      state: bridge.mqttClient.getState(),
      subscriptions: bridge.mqttClient.getSubscriptions(),
    },
    influxdb: {
      url: bridge.sink.describe(),
      database: bridge.config.influxdb.database,
    },
  }));

  fastify.get('/stats', async () => bridge.handler.getStats());
}
