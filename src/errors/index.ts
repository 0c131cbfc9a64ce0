export {
  BridgeError,
  ConfigError,
  DecodeError,
  ParseError,
  SinkWriteError,
} from './bridge-error.js';
export type { BridgeErrorOptions, ErrorCategory } from './bridge-error.js';
