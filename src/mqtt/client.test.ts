import { mkdtempSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { PassThrough } from 'stream';
import { describe, test, expect } from 'vitest';
import { type IClientOptions, MqttClient } from 'mqtt';
import { silentLogger } from '../common/logger.js';
import { type MqttConfig, mqttConfigSchema } from '../config/loader.js';
import { MappingEngine } from '../mapping/engine.js';
import { RecordMapper } from '../mapping/record-mapper.js';
import { MemorySink, fixedClock, point } from '../testing/fakes.js';
import { MqttClientWrapper, brokerUrl, connackReason, describeClientError } from './client.js';
import { MessageHandler, attachHandler } from './handler.js';

interface Connection {
  url: string;
  options: IClientOptions;
  client: MqttClient;
}

// clients are built with manualConnect, so nothing ever opens a socket
function createTestWrapper(config: MqttConfig = mqttConfigSchema.parse({ host: 'broker.test' })) {
  const connections: Connection[] = [];
  const wrapper = new MqttClientWrapper(config, silentLogger, (url, options) => {
    const client = new MqttClient(() => new PassThrough(), { ...options, manualConnect: true });
    connections.push({ url, options, client });
    return client;
  });
  return { wrapper, connections };
}

function publish(topic: string, payload: string) {
  return { cmd: 'publish' as const, topic, payload: Buffer.from(payload), qos: 0 as const, dup: false, retain: false };
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

describe('connackReason', () => {
  test('names the MQTT 3.1.1 return codes', () => {
    expect(connackReason(1)).toBe('incorrect protocol version');
    expect(connackReason(4)).toBe('bad username or password');
    expect(connackReason(5)).toBe('not authorised');
    expect(connackReason(9)).toBe('unknown code');
  });
});

describe('describeClientError', () => {
  test('explains a refused CONNACK by its code', () => {
    const refused = Object.assign(new Error('Connection refused: Not authorized'), { code: 5 });

    expect(describeClientError(refused)).toBe('connection refused: not authorised');
  });

  test('treats socket errors as generic client errors', () => {
    const socket = Object.assign(new Error('connect ECONNREFUSED'), { code: 'ECONNREFUSED' });

    expect(describeClientError(socket)).toBe('MQTT client error');
  });
});

describe('brokerUrl', () => {
  test('uses mqtt:// without a CA file and mqtts:// with one', () => {
    expect(brokerUrl(mqttConfigSchema.parse({ host: 'broker.test' }))).toBe('mqtt://broker.test:1883');
    expect(brokerUrl(mqttConfigSchema.parse({ host: 'broker.test', port: 8883, cafile: '/etc/ca.pem' }))).toBe(
      'mqtts://broker.test:8883'
    );
  });
});

describe('MqttClientWrapper', () => {
  test('connects with MQTT 3.1.1, credentials and its own resubscription', async () => {
    const { wrapper, connections } = createTestWrapper(
      mqttConfigSchema.parse({
        host: 'broker.test',
        clientId: 'bridge-1',
        username: 'bridge',
        password: 'test-secret',
      })
    );

    await wrapper.connect();

    expect(connections).toHaveLength(1);
    expect(connections[0].url).toBe('mqtt://broker.test:1883');
    expect(connections[0].options).toEqual({
      clientId: 'bridge-1',
      clean: true,
      keepalive: 10,
      reconnectPeriod: 5000,
      protocolVersion: 4,
      resubscribe: false,
      username: 'bridge',
      password: 'test-secret',
    });
  });

  test('reads the TLS files named in the configuration', async () => {
    const dir = mkdtempSync(join(tmpdir(), 'mqtt2influx-tls-'));
    writeFileSync(join(dir, 'ca.pem'), 'test-ca');
    writeFileSync(join(dir, 'client.crt'), 'test-cert');
    writeFileSync(join(dir, 'client.key'), 'test-key');
    const { wrapper, connections } = createTestWrapper(
      mqttConfigSchema.parse({
        host: 'broker.test',
        port: 8883,
        cafile: join(dir, 'ca.pem'),
        certfile: join(dir, 'client.crt'),
        keyfile: join(dir, 'client.key'),
      })
    );

    await wrapper.connect();

    expect(connections[0].url).toBe('mqtts://broker.test:8883');
    expect(connections[0].options).toMatchObject({
      ca: Buffer.from('test-ca'),
      cert: Buffer.from('test-cert'),
      key: Buffer.from('test-key'),
    });
  });

  test('a refused first connection is reported and left to the client to retry', async () => {
    const { wrapper, connections } = createTestWrapper();
    const errors: Error[] = [];
    wrapper.on('error', (err) => errors.push(err));

    await wrapper.connect();
    const refused = Object.assign(new Error('Connection refused: Bad username or password'), { code: 4 });
    connections[0].client.emit('error', refused);
    await wrapper.connect();

    expect(errors).toEqual([refused]);
    expect(wrapper.getState()).toBe('connecting');
    expect(connections).toHaveLength(1);
  });

  test('passes string payloads on as buffers', async () => {
    const { wrapper } = createTestWrapper();
    const seen: Array<[string, string, number]> = [];
    wrapper.on('message', (topic, payload, qos) => {
      seen.push([topic, payload.toString('utf8'), qos]);
    });

    await new Promise<void>((resolve) => {
      wrapper.handleMessage({ topic: 'a/b', payload: '{"v": 1}', qos: 1 }, resolve);
    });

    expect(seen).toEqual([['a/b', '{"v": 1}', 1]]);
  });

  test('does not release a packet until its record is written', async () => {
    const mappingEngine = new MappingEngine();
    mappingEngine.addPoints([
      point({ topic: 'sensors/+/temp', measurement: 'temperature', fields: { value: '$.payload.value' } }),
    ]);
    const sink = new MemorySink();
    let release: () => void = () => {};
    const stalled = new Promise<void>((resolve) => {
      release = resolve;
    });
    sink.delay = () => stalled;
    const handler = new MessageHandler({
      mappingEngine,
      recordMapper: new RecordMapper({ defaultDatabase: 'telemetry', clock: fixedClock }),
      sink,
    });
    const { wrapper, connections } = createTestWrapper();
    attachHandler(wrapper, handler);
    await wrapper.connect();

    let released = false;
    const done = new Promise<void>((resolve) => {
      connections[0].client.handleMessage(publish('sensors/kitchen/temp', '{"value": 21}'), () => {
        released = true;
        resolve();
      });
    });
    await sleep(20);

    expect(released).toBe(false);
    expect(sink.writes).toEqual([]);

    release();
    await done;

    expect(released).toBe(true);
    expect(sink.writes.map((w) => w.record.fields)).toEqual([{ value: 21 }]);
  });
});
