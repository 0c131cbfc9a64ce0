export { loadConfig, parseConfig } from './config/index.js';
export type { AppConfig, HttpConfig, InfluxConfig, MqttConfig, PointConfig } from './config/index.js';
export {
  MappingEngine,
  RecordMapper,
  buildEnvelope,
  compileExpression,
  compilePoint,
  evaluate,
  formatRecordTime,
  matchTopic,
  validateTopicPattern,
} from './mapping/index.js';
export type {
  CompiledPoint,
  Envelope,
  Expression,
  ExtractionWarning,
  MapResult,
  MappedRecord,
  MetricRecord,
} from './mapping/index.js';
export { MessageHandler, MqttClientWrapper, createMqttClient } from './mqtt/index.js';
export type { BrokerClient, InboundMessage, MessageStats } from './mqtt/index.js';
export { InfluxSink, createInfluxSink } from './sink/index.js';
export type { RecordSink } from './sink/index.js';
export { Bridge, createBridge } from './bridge.js';
export type { BridgeDeps } from './bridge.js';
export { createServer, startServer } from './api/server.js';
export type { ApiContext } from './api/server.js';
export {
  BridgeError,
  ConfigError,
  DecodeError,
  ParseError,
  SinkWriteError,
} from './errors/index.js';
