export type ErrorCategory = 'CONFIG' | 'PAYLOAD' | 'SINK' | 'BROKER' | 'UNKNOWN';

export interface BridgeErrorOptions {
  category?: ErrorCategory;
  /** Fatal errors stop the process; everything else drops one message or one record. */
  fatal?: boolean;
  cause?: unknown;
}

export class BridgeError extends Error {
  public readonly category: ErrorCategory;
  public readonly fatal: boolean;

  constructor(message: string, options: BridgeErrorOptions = {}) {
    super(message, { cause: options.cause });
    this.name = this.constructor.name;
    this.category = options.category ?? 'UNKNOWN';
    this.fatal = options.fatal ?? false;

    Error.captureStackTrace?.(this, this.constructor);
  }
}

/**
 * Invalid configuration: unreadable file, schema violation, malformed topic
 * pattern or path expression. Only raised before the bridge starts.
 */
export class ConfigError extends BridgeError {
  public readonly issues: string[];

  constructor(message: string, issues: string[] = [], cause?: unknown) {
    super(message, { category: 'CONFIG', fatal: true, cause });
    this.issues = issues;
  }
}

export class DecodeError extends BridgeError {
  constructor(
    public readonly topic: string,
    public readonly payload: Buffer,
    cause?: unknown
  ) {
    super(`payload on ${topic} is not valid UTF-8`, { category: 'PAYLOAD', cause });
  }
}

export class ParseError extends BridgeError {
  constructor(
    public readonly topic: string,
    public readonly payload: Buffer,
    cause?: unknown
  ) {
    const reason = cause instanceof Error ? `: ${cause.message}` : '';
    super(`payload on ${topic} is not valid JSON${reason}`, { category: 'PAYLOAD', cause });
  }
}

export class SinkWriteError extends BridgeError {
  constructor(
    public readonly measurement: string,
    public readonly database: string,
    cause?: unknown
  ) {
    const reason = cause instanceof Error ? `: ${cause.message}` : '';
    super(`write of ${measurement} to ${database} failed${reason}`, { category: 'SINK', cause });
  }
}
