export type { RecordSink } from './types.js';
export { InfluxSink, createInfluxSink, toLine, toPoint } from './influx.js';
export type { InfluxAdmin, LineWriter, LineWriterFactory } from './influx.js';
