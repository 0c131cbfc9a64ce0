export { appConfigSchema, loadConfig, parseConfig } from './loader.js';
export type { AppConfig, HttpConfig, InfluxConfig, MqttConfig, PointConfig } from './loader.js';
