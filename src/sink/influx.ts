import { InfluxDB as LineClient, Point, type WriteApi, setLogger } from '@influxdata/influxdb-client';
import { InfluxDB } from 'influx';
import { type Logger, silentLogger } from '../common/logger.js';
import type { InfluxConfig } from '../config/loader.js';
import { SinkWriteError } from '../errors/bridge-error.js';
import type { MetricRecord } from '../mapping/record-mapper.js';
import type { RecordSink } from './types.js';

/** Database administration over the 1.x query API. */
export type InfluxAdmin = Pick<InfluxDB, 'getDatabaseNames' | 'createDatabase'>;

/** Line-protocol writer bound to one database; `flush` rejects when the server refuses the batch. */
export type LineWriter = Pick<WriteApi, 'writeRecord' | 'flush' | 'close'>;

export type LineWriterFactory = (database: string) => LineWriter;

/**
 * Builds the point for a record. Whole numbers are written as integers
 * (`5i`), other numbers as floats.
 */
export function toPoint(record: MetricRecord): Point {
  const point = new Point(record.measurement);
  for (const [key, value] of Object.entries(record.tags)) {
    point.tag(key, value);
  }
  for (const [key, value] of Object.entries(record.fields)) {
    if (typeof value === 'boolean') {
      point.booleanField(key, value);
    } else if (typeof value === 'string') {
      point.stringField(key, value);
    } else if (Number.isSafeInteger(value)) {
      point.intField(key, value);
    } else {
      point.floatField(key, value);
    }
  }
  // epoch seconds, matching the `s` write precision
  point.timestamp(String(Date.parse(record.time) / 1000));
  return point;
}

export function toLine(record: MetricRecord): string {
  const line = toPoint(record).toLineProtocol();
  if (line === undefined) {
    throw new Error(`record for ${record.measurement} has no fields`);
  }
  return line;
}

export class InfluxSink implements RecordSink {
  private readonly writers = new Map<string, LineWriter>();

  constructor(
    private readonly admin: InfluxAdmin,
    private readonly writerFor: LineWriterFactory,
    private readonly endpoint: string,
    private readonly logger: Logger = silentLogger
  ) {}

  async ensureDatabases(names: string[]): Promise<void> {
    const existing = new Set(await this.admin.getDatabaseNames());
    for (const name of names) {
      if (existing.has(name)) {
        continue;
      }
      this.logger.info({ database: name }, 'creating database');
      await this.admin.createDatabase(name);
      existing.add(name);
    }
  }

  async write(record: MetricRecord, database: string): Promise<void> {
    try {
      const line = toLine(record);
      this.logger.debug({ database, line }, 'influxdb write');
      const writer = this.writer(database);
      writer.writeRecord(line);
      await writer.flush();
    } catch (err) {
      throw new SinkWriteError(record.measurement, database, err);
    }
  }

  async close(): Promise<void> {
    const writers = Array.from(this.writers.values());
    this.writers.clear();
    await Promise.all(writers.map((writer) => writer.close()));
  }

  describe(): string {
    return this.endpoint;
  }

  private writer(database: string): LineWriter {
    let writer = this.writers.get(database);
    if (!writer) {
      writer = this.writerFor(database);
      this.writers.set(database, writer);
    }
    return writer;
  }
}

export function createInfluxSink(config: InfluxConfig, logger: Logger = silentLogger): InfluxSink {
  const protocol = config.ssl ? 'https' : 'http';
  const url = `${protocol}://${config.host}:${config.port}`;

  const admin = new InfluxDB({
    host: config.host,
    port: config.port,
    protocol,
    username: config.username,
    password: config.password,
    database: config.database,
  });

  // failed writes surface as SinkWriteError; the client's own reports stay at debug
  setLogger({
    error: (message: string, err?: unknown) => logger.debug({ err }, message),
    warn: (message: string, err?: unknown) => logger.debug({ err }, message),
  });
  // 1.8+ compatibility endpoint: the token is `user:password`, the bucket is the database
  const lines = new LineClient({ url, token: `${config.username}:${config.password}` });
  const writerFor = (database: string): LineWriter =>
    lines.getWriteApi('', database, 's', { maxRetries: 0, flushInterval: 0 });

  return new InfluxSink(admin, writerFor, url, logger);
}
