import { readFileSync } from 'fs';
import mqtt, { type IClientOptions, type MqttClient } from 'mqtt';
import { type Logger, silentLogger } from '../common/logger.js';
import type { MqttConfig } from '../config/loader.js';

export type ConnectionState = 'disconnected' | 'connecting' | 'connected' | 'reconnecting';

export interface MqttClientEvents {
  connect: () => void;
  disconnect: () => void;
  reconnect: () => void;
  error: (err: Error) => void;
  /** The broker client reads no further packet until the returned promise settles. */
  message: (topic: string, payload: Buffer, qos: number) => Promise<void> | void;
}

/** The parts of a PUBLISH packet the bridge reads. */
export interface IncomingPublish {
  topic: string;
  payload: Buffer | string;
  qos: number;
}

export type Connector = (url: string, options: IClientOptions) => MqttClient;


/** MQTT 3.1.1 CONNACK return codes. */
const CONNACK_REASONS: Record<number, string> = {
  1: 'incorrect protocol version',
  2: 'invalid client identifier',
  3: 'server unavailable',
  4: 'bad username or password',
  5: 'not authorised',
};

export function connackReason(code: number): string {
  return CONNACK_REASONS[code] ?? 'unknown code';
}

function errorCode(err: Error): number | undefined {
  return 'code' in err && typeof err.code === 'number' ? err.code : undefined;
}

/** Log line for a client error; numeric codes come from a refused CONNACK. */
export function describeClientError(err: Error): string {
  const code = errorCode(err);
  return code === undefined ? 'MQTT client error' : `connection refused: ${connackReason(code)}`;
}

export function brokerUrl(config: MqttConfig): string {
  const scheme = config.cafile ? 'mqtts' : 'mqtt';
  return `${scheme}://${config.host}:${config.port}`;
}

/** What the bridge needs from a broker connection. */
export interface BrokerClient {
  connect(): Promise<void>;
  disconnect(): Promise<void>;
  subscribeMany(topics: string[]): void;
  on<K extends keyof MqttClientEvents>(event: K, handler: MqttClientEvents[K]): void;
  getState(): ConnectionState;
  getBrokerUrl(): string;
  getSubscriptions(): string[];
}

export class MqttClientWrapper implements BrokerClient {
  private client: MqttClient | null = null;
  private config: MqttConfig;
  private logger: Logger;
  private subscriptions = new Set<string>();
  private state: ConnectionState = 'disconnected';
  private eventHandlers: Partial<MqttClientEvents> = {};
  private connector: Connector;

  constructor(
    config: MqttConfig,
    logger: Logger = silentLogger,
    connector: Connector = (url, options) => mqtt.connect(url, options)
  ) {
    this.config = config;
    this.logger = logger;
    this.connector = connector;
  }

  /**
   * Starts the connection and returns without waiting for the broker. A
   * refused or failed attempt is logged and retried every `reconnectPeriod`.
   */
  async connect(): Promise<void> {
    if (this.client) {
      return;
    }

    this.state = 'connecting';
    const options = this.buildOptions();
    this.logger.info(
      { host: this.config.host, port: this.config.port, tls: Boolean(this.config.cafile) },
      'connecting to MQTT broker'
    );

    const client = this.connector(this.getBrokerUrl(), options);
    this.client = client;

    client.on('connect', () => {
      this.state = 'connected';
      this.logger.info('connected to MQTT broker');
      this.resubscribe();
      this.eventHandlers.connect?.();
    });

    client.on('reconnect', () => {
      this.state = 'reconnecting';
      this.eventHandlers.reconnect?.();
    });

    client.on('close', () => {
      if (this.state === 'connected') {
        this.logger.info('disconnected from MQTT broker');
      }
      if (this.state !== 'reconnecting') {
        this.state = 'disconnected';
      }
      this.eventHandlers.disconnect?.();
    });

    client.on('error', (err) => {
      const code = errorCode(err);
      this.logger.error(code === undefined ? { err } : { code }, describeClientError(err));
      this.eventHandlers.error?.(err);
    });

    client.handleMessage = (packet, callback) => {
      this.handleMessage(packet, () => callback());
    };
  }

  /**
   * Hands one PUBLISH to the message handler and calls `done` once it has
   * been processed; mqtt.js acknowledges and reads the next packet only then.
   */
  handleMessage(packet: IncomingPublish, done: () => void): void {
    const handler = this.eventHandlers.message;
    if (!handler) {
      done();
      return;
    }
    const payload = typeof packet.payload === 'string' ? Buffer.from(packet.payload, 'utf8') : packet.payload;
    void Promise.resolve()
      .then(() => handler(packet.topic, payload, packet.qos))
      .then(done, (err: unknown) => {
        this.logger.error({ err, topic: packet.topic }, 'message handler failed');
        done();
      });
  }

  disconnect(): Promise<void> {
    return new Promise((resolve) => {
      if (!this.client) {
        resolve();
        return;
      }

      this.client.end(false, {}, () => {
        this.client = null;
        this.state = 'disconnected';
        resolve();
      });
    });
  }

  subscribe(topic: string): void {
    this.subscriptions.add(topic);
    if (this.client && this.state === 'connected') {
      this.logger.info({ topic }, 'subscribe');
      this.client.subscribe(topic);
    }
  }

  subscribeMany(topics: string[]): void {
    for (const topic of topics) {
      this.subscribe(topic);
    }
  }

  on<K extends keyof MqttClientEvents>(event: K, handler: MqttClientEvents[K]): void {
    this.eventHandlers[event] = handler;
  }

  getState(): ConnectionState {
    return this.state;
  }

  getBrokerUrl(): string {
    return brokerUrl(this.config);
  }

  getSubscriptions(): string[] {
    return Array.from(this.subscriptions);
  }

  private buildOptions(): IClientOptions {
    const options: IClientOptions = {
      clientId: this.config.clientId ?? `mqtt2influx-${Date.now()}`,
      clean: true,
      keepalive: this.config.keepalive,
      reconnectPeriod: this.config.reconnectPeriod,
      protocolVersion: 4,
      // subscriptions are replayed by resubscribe() on every connect
      resubscribe: false,
    };

    if (this.config.username) {
      options.username = this.config.username;
      if (this.config.password) {
        options.password = this.config.password;
      }
    }
    if (this.config.cafile) {
      options.ca = readFileSync(this.config.cafile);
      if (this.config.certfile) {
        options.cert = readFileSync(this.config.certfile);
      }
      if (this.config.keyfile) {
        options.key = readFileSync(this.config.keyfile);
      }
    }

    return options;
  }

  private resubscribe(): void {
    if (!this.client) {
      return;
    }
    for (const topic of this.subscriptions) {
      this.logger.info({ topic }, 'subscribe');
      this.client.subscribe(topic);
    }
  }
}

export function createMqttClient(config: MqttConfig, logger?: Logger): MqttClientWrapper {
  return new MqttClientWrapper(config, logger);
}
