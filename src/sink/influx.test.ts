import { describe, test, expect, beforeEach } from 'vitest';
import { SinkWriteError } from '../errors/bridge-error.js';
import { compilePoint } from '../mapping/engine.js';
import { buildEnvelope } from '../mapping/envelope.js';
import { type MetricRecord, RecordMapper } from '../mapping/record-mapper.js';
import { fixedClock, point } from '../testing/fakes.js';
import { type InfluxAdmin, type LineWriter, InfluxSink, createInfluxSink, toLine } from './influx.js';

class FakeAdmin implements InfluxAdmin {
  databases = ['telemetry'];
  created: string[] = [];

  async getDatabaseNames(): Promise<string[]> {
    return [...this.databases];
  }

  async createDatabase(name: string): Promise<void> {
    this.created.push(name);
  }
}

class FakeWriter implements LineWriter {
  pending: string[] = [];
  flushed: string[] = [];
  failure: Error | null = null;
  closed = false;

  writeRecord(line: string): void {
    this.pending.push(line);
  }

  async flush(): Promise<void> {
    const lines = this.pending;
    this.pending = [];
    if (this.failure) {
      throw this.failure;
    }
    this.flushed.push(...lines);
  }

  async close(): Promise<void> {
    this.closed = true;
  }
}

const record: MetricRecord = {
  measurement: 'temperature',
  time: '2024-05-01T12:34:56Z',
  tags: { sensor: 'kitchen' },
  fields: { value: 21.5 },
};

describe('InfluxSink', () => {
  let admin: FakeAdmin;
  let writers: Map<string, FakeWriter>;
  let sink: InfluxSink;

  beforeEach(() => {
    admin = new FakeAdmin();
    writers = new Map();
    sink = new InfluxSink(
      admin,
      (database) => {
        const writer = new FakeWriter();
        writers.set(database, writer);
        return writer;
      },
      'http://influx.test:8086'
    );
  });

  test('creates only the databases that are missing', async () => {
    await sink.ensureDatabases(['telemetry', 'archive', 'archive']);

    expect(admin.created).toEqual(['archive']);
  });

  test('flushes one line per record to the record database', async () => {
    await sink.write(record, 'archive');
    await sink.write({ ...record, fields: { value: 22 } }, 'archive');

    expect(Array.from(writers.keys())).toEqual(['archive']);
    expect(writers.get('archive')?.flushed).toEqual([
      'temperature,sensor=kitchen value=21.5 1714566896',
      'temperature,sensor=kitchen value=22i 1714566896',
    ]);
  });

  test('wraps refused writes in SinkWriteError', async () => {
    await sink.write(record, 'telemetry');
    const writer = writers.get('telemetry');
    if (!writer) {
      throw new Error('no writer for telemetry');
    }
    writer.failure = new Error('timeout');

    await expect(sink.write(record, 'telemetry')).rejects.toMatchObject({
      name: 'SinkWriteError',
      measurement: 'temperature',
      database: 'telemetry',
      message: 'write of temperature to telemetry failed: timeout',
    });
    await expect(sink.write(record, 'telemetry')).rejects.toBeInstanceOf(SinkWriteError);
  });

  test('close closes every writer it opened', async () => {
    await sink.write(record, 'telemetry');
    await sink.write(record, 'archive');

    await sink.close();

    expect(Array.from(writers.values()).map((writer) => writer.closed)).toEqual([true, true]);
  });
});

describe('toLine', () => {
  test('types fields by value and escapes tags', () => {
    const line = toLine({
      measurement: 'meter',
      time: '2024-05-01T12:34:56Z',
      tags: { site: 'north lab' },
      fields: { count: 5, on: true, power: 21.5, state: 'ok' },
    });

    expect(line).toBe('meter,site=north\\ lab count=5i,on=T,power=21.5,state="ok" 1714566896');
  });

  test('integers past the exact float range are written as floats', () => {
    const envelope = buildEnvelope('big', Buffer.from('{"value": 9007199254740993}'), 0, 0);
    const big = compilePoint(point({ topic: 'big', measurement: 'big', fields: { value: '$.payload.value' } }));
    const mapper = new RecordMapper({ defaultDatabase: 'telemetry', clock: fixedClock });

    const { records } = mapper.map([big], envelope, 'big');

    expect(records.map(({ record }) => toLine(record))).toEqual(['big value=9007199254740992 1714566896']);
  });

  test('a mapped whole number goes out as an integer and an empty tag is left out', () => {
    const meter = compilePoint(
      point({
        topic: 'meters/+',
        measurement: 'meter',
        fields: { count: '$.payload.count' },
        tags: { id: '$.payload.id' },
      })
    );
    const envelope = buildEnvelope('meters/1', Buffer.from('{"count":5,"id":""}'), 1714566896, 0);
    const mapper = new RecordMapper({ defaultDatabase: 'telemetry', clock: fixedClock });

    const { records } = mapper.map([meter], envelope, 'meters/1');

    expect(records.map(({ record }) => toLine(record))).toEqual(['meter count=5i 1714566896']);
  });
});

describe('createInfluxSink', () => {
  test('describes the endpoint it writes to', () => {
    const sink = createInfluxSink({
      host: 'influx.test',
      port: 8086,
      username: 'root',
      password: 'root',
      database: 'telemetry',
      ssl: true,
    });

    expect(sink.describe()).toBe('https://influx.test:8086');
  });
});
