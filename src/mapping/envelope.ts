import { DecodeError, ParseError } from '../errors/bridge-error.js';
import { splitTopic } from './topic.js';

/**
 * Normalized view of one inbound message. Path expressions are evaluated
 * against this object, so `$.topic[1]`, `$.payload.value`, `$.timestamp`
 * and `$.qos` are all addressable.
 */
export interface Envelope {
  readonly topic: readonly string[];
  readonly payload: unknown;
  /** Receive time in seconds since the epoch. */
  readonly timestamp: number;
  readonly qos: number;
}

const utf8 = new TextDecoder('utf-8', { fatal: true });

export function buildEnvelope(
  topic: string,
  payload: Buffer,
  timestamp: number,
  qos: number
): Envelope {
  let text: string;
  try {
    text = utf8.decode(payload);
  } catch (err) {
    throw new DecodeError(topic, payload, err);
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(text === '' ? 'null' : text);
  } catch (err) {
    throw new ParseError(topic, payload, err);
  }

  return Object.freeze({
    topic: Object.freeze(splitTopic(topic)),
    payload: parsed,
    timestamp,
    qos,
  });
}
