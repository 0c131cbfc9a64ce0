import { type Logger, silentLogger } from './common/logger.js';
import type { AppConfig } from './config/loader.js';
import { MappingEngine } from './mapping/engine.js';
import { RecordMapper } from './mapping/record-mapper.js';
import { type BrokerClient, createMqttClient } from './mqtt/client.js';
import { MessageHandler, attachHandler } from './mqtt/handler.js';
import { createInfluxSink } from './sink/influx.js';
import type { RecordSink } from './sink/types.js';

export interface BridgeDeps {
  config: AppConfig;
  mqttClient: BrokerClient;
  sink: RecordSink;
  logger?: Logger;
  clock?: () => Date;
}

/**
 * Owns the broker client, the sink and the compiled points. Construction
 * compiles every point, so a malformed pattern or path throws ConfigError
 * before any connection is opened.
 */
export class Bridge {
  readonly config: AppConfig;
  readonly mappingEngine: MappingEngine;
  readonly handler: MessageHandler;
  readonly mqttClient: BrokerClient;
  readonly sink: RecordSink;
  private readonly logger: Logger;
  private started = false;

  constructor(deps: BridgeDeps) {
    this.config = deps.config;
    this.mqttClient = deps.mqttClient;
    this.sink = deps.sink;
    this.logger = deps.logger ?? silentLogger;

    this.mappingEngine = new MappingEngine();
    this.mappingEngine.addPoints(deps.config.points);

    const recordMapper = new RecordMapper({
      defaultDatabase: deps.config.influxdb.database,
      logger: this.logger.child({ component: 'mapper' }),
      clock: deps.clock,
    });
    this.handler = new MessageHandler({
      mappingEngine: this.mappingEngine,
      recordMapper,
      sink: this.sink,
      logger: this.logger.child({ component: 'handler' }),
    });
  }

  async start(): Promise<void> {
    if (this.started) {
      return;
    }
    this.started = true;

    const databases = this.mappingEngine.getDatabases(this.config.influxdb.database);
    this.logger.info({ sink: this.sink.describe(), databases }, 'preparing databases');
    await this.sink.ensureDatabases(databases);

    attachHandler(this.mqttClient, this.handler);
    // registered before connecting; the client subscribes on every connect
    this.mqttClient.subscribeMany(this.mappingEngine.getTopicPatterns());
    await this.mqttClient.connect();
  }

  async stop(): Promise<void> {
    if (!this.started) {
      return;
    }
    this.started = false;
    await this.mqttClient.disconnect();
    await this.handler.drain();
    await this.sink.close();
  }
}

export function createBridge(config: AppConfig, logger: Logger = silentLogger): Bridge {
  return new Bridge({
    config,
    mqttClient: createMqttClient(config.mqtt, logger.child({ component: 'mqtt' })),
    sink: createInfluxSink(config.influxdb, logger.child({ component: 'influxdb' })),
    logger,
  });
}
