export { MqttClientWrapper, brokerUrl, connackReason, createMqttClient, describeClientError } from './client.js';
export type { BrokerClient, ConnectionState, Connector, IncomingPublish, MqttClientEvents } from './client.js';
export { MessageHandler, attachHandler } from './handler.js';
export type {
  InboundMessage,
  MessageHandlerDeps,
  MessageStats,
  ProcessedMessage,
} from './handler.js';
