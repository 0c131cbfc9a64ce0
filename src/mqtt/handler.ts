import { type Logger, silentLogger } from '../common/logger.js';
import { BridgeError, SinkWriteError } from '../errors/bridge-error.js';
import type { MappingEngine } from '../mapping/engine.js';
import { type Envelope, buildEnvelope } from '../mapping/envelope.js';
import type { MappedRecord, RecordMapper } from '../mapping/record-mapper.js';
import type { RecordSink } from '../sink/types.js';
import type { BrokerClient } from './client.js';

export interface MessageHandlerDeps {
  mappingEngine: MappingEngine;
  recordMapper: RecordMapper;
  sink: RecordSink;
  logger?: Logger;
}

export interface InboundMessage {
  topic: string;
  payload: Buffer;
  qos: number;
  /** Receive time, seconds since the epoch. */
  timestamp: number;
}

export interface ProcessedMessage {
  topic: string;
  envelope: Envelope | null;
  records: MappedRecord[];
  written: number;
}

export interface MessageStats {
  received: number;
  matched: number;
  dropped: number;
  records: number;
  written: number;
  writeErrors: number;
  warnings: number;
}

function emptyStats(): MessageStats {
  return {
    received: 0,
    matched: 0,
    dropped: 0,
    records: 0,
    written: 0,
    writeErrors: 0,
    warnings: 0,
  };
}

export class MessageHandler {
  private mappingEngine: MappingEngine;
  private recordMapper: RecordMapper;
  private sink: RecordSink;
  private logger: Logger;
  private stats: MessageStats = emptyStats();
  private queue: Promise<void> = Promise.resolve();

  constructor(deps: MessageHandlerDeps) {
    this.mappingEngine = deps.mappingEngine;
    this.recordMapper = deps.recordMapper;
    this.sink = deps.sink;
    this.logger = deps.logger ?? silentLogger;
  }

  /**
   * Queues a message behind the ones already accepted, so every message is
   * parsed, mapped and written before the next one starts.
   */
  enqueue(message: InboundMessage): Promise<void> {
    this.queue = this.queue
      .then(async () => {
        await this.handle(message);
      })
      .catch((err: unknown) => {
        this.logger.error({ err, topic: message.topic }, 'message processing failed');
      });
    return this.queue;
  }

  /** Resolves once every queued message has been handled. */
  drain(): Promise<void> {
    return this.queue;
  }

  async handle(message: InboundMessage): Promise<ProcessedMessage> {
    const { topic, payload } = message;
    this.stats.received++;
    if (this.logger.isLevelEnabled('debug')) {
      this.logger.debug({ topic, payload: payload.toString('utf8'), qos: message.qos }, 'message');
    }

    const points = this.mappingEngine.matchAll(topic);
    if (points.length === 0) {
      return { topic, envelope: null, records: [], written: 0 };
    }
    this.stats.matched++;

    // one parse serves every matching point
    let envelope: Envelope;
    try {
      envelope = buildEnvelope(topic, payload, message.timestamp, message.qos);
    } catch (err) {
      if (!(err instanceof BridgeError)) {
        throw err;
      }
      this.stats.dropped++;
      this.logger.error({ topic, payload: payload.toString('utf8') }, err.message);
      return { topic, envelope: null, records: [], written: 0 };
    }

    const { records, warnings } = this.recordMapper.map(points, envelope, topic);
    this.stats.warnings += warnings.length;
    this.stats.records += records.length;

    let written = 0;
    for (const { record, database } of records) {
      try {
        await this.sink.write(record, database);
        written++;
      } catch (err) {
        this.stats.writeErrors++;
        const failure = err instanceof SinkWriteError
          ? err
          : new SinkWriteError(record.measurement, database, err);
        this.logger.error({ err: failure, database, measurement: record.measurement }, failure.message);
      }
    }
    this.stats.written += written;

    return { topic, envelope, records, written };
  }

  getStats(): MessageStats {
    return { ...this.stats };
  }

  resetStats(): void {
    this.stats = emptyStats();
  }
}

/**
 * Routes broker messages into the handler. The returned promise settles when
 * the message is written, which is what holds the broker client back from
 * reading the next packet.
 */
export function attachHandler(
  client: BrokerClient,
  handler: MessageHandler
): void {
  client.on('message', (topic, payload, qos) =>
    handler.enqueue({ topic, payload, qos, timestamp: Date.now() / 1000 })
  );
}
