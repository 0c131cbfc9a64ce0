export { matchTopic, splitTopic, validateTopicPattern } from './topic.js';

export { compileExpression, compilePath, describeExpression, evaluate } from './path.js';
export type { Expression, PathStep } from './path.js';

export { buildEnvelope } from './envelope.js';
export type { Envelope } from './envelope.js';

export { MappingEngine, compilePoint } from './engine.js';
export type { CompiledPoint } from './engine.js';

export { RecordMapper, formatRecordTime } from './record-mapper.js';
export type {
  ExtractionWarning,
  ExtractionWarningCode,
  FieldValue,
  MapResult,
  MappedRecord,
  MetricRecord,
  RecordMapperOptions,
} from './record-mapper.js';
