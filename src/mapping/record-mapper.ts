import { type Logger, silentLogger } from '../common/logger.js';
import type { CompiledPoint } from './engine.js';
import type { Envelope } from './envelope.js';
import { type Expression, describeExpression, evaluate } from './path.js';
import { matchTopic } from './topic.js';

export type FieldValue = number | string | boolean;

/** One time-series point as handed to the sink. */
export interface MetricRecord {
  measurement: string;
  /** UTC, whole seconds: `2024-01-31T12:00:05Z`. */
  time: string;
  tags: Record<string, string>;
  fields: Record<string, FieldValue>;
}

export interface MappedRecord {
  record: MetricRecord;
  database: string;
  point: CompiledPoint;
}

export type ExtractionWarningCode =
  | 'measurement-unresolved'
  | 'empty-fields'
  | 'partial-fields'
  | 'partial-tags';

export interface ExtractionWarning {
  code: ExtractionWarningCode;
  message: string;
  topic: string;
  /** Subscription pattern of the point that produced the warning. */
  point: string;
  extracted?: number;
  configured?: number;
}

export interface MapResult {
  records: MappedRecord[];
  warnings: ExtractionWarning[];
}

export interface RecordMapperOptions {
  defaultDatabase: string;
  logger?: Logger;
  clock?: () => Date;
}

export function formatRecordTime(date: Date): string {
  return `${date.toISOString().slice(0, 19)}Z`;
}

function isFieldValue(value: unknown): value is FieldValue {
  return (
    typeof value === 'string' ||
    typeof value === 'boolean' ||
    (typeof value === 'number' && Number.isFinite(value))
  );
}

function extractAll(
  specs: ReadonlyMap<string, Expression>,
  envelope: Envelope
): Map<string, FieldValue> {
  const values = new Map<string, FieldValue>();
  for (const [key, expr] of specs) {
    const value = evaluate(expr, envelope);
    if (isFieldValue(value)) {
      values.set(key, value);
    }
  }
  return values;
}

export class RecordMapper {
  private readonly defaultDatabase: string;
  private readonly logger: Logger;
  private readonly clock: () => Date;

  constructor(options: RecordMapperOptions) {
    this.defaultDatabase = options.defaultDatabase;
    this.logger = options.logger ?? silentLogger;
    this.clock = options.clock ?? (() => new Date());
  }

  /**
   * Runs every point whose pattern matches `topic` against the envelope.
   * Each matching point yields at most one record; a skipped point never
   * stops the ones after it.
   */
  map(points: readonly CompiledPoint[], envelope: Envelope, topic: string): MapResult {
    const result: MapResult = { records: [], warnings: [] };
    for (const point of points) {
      if (!matchTopic(point.topic, topic)) {
        continue;
      }
      const mapped = this.mapPoint(point, envelope, topic, result.warnings);
      if (mapped) {
        result.records.push(mapped);
      }
    }
    return result;
  }

  mapPoint(
    point: CompiledPoint,
    envelope: Envelope,
    topic: string,
    warnings: ExtractionWarning[] = []
  ): MappedRecord | null {
    const warn = (warning: Omit<ExtractionWarning, 'topic' | 'point'>): void => {
      const full: ExtractionWarning = { ...warning, topic, point: point.topic };
      warnings.push(full);
      this.logger.warn(
        { code: full.code, topic, point: point.topic, extracted: full.extracted, configured: full.configured },
        full.message
      );
    };

    const measurement = evaluate(point.measurement, envelope);
    if (!isFieldValue(measurement) || measurement === '') {
      warn({
        code: 'measurement-unresolved',
        message: `unknown measurement for ${describeExpression(point.measurement)}`,
      });
      return null;
    }

    const fields = extractAll(point.fields, envelope);
    if (fields.size === 0) {
      warn({ code: 'empty-fields', message: 'empty fields', extracted: 0, configured: point.fields.size });
      return null;
    }
    if (fields.size !== point.fields.size) {
      warn({
        code: 'partial-fields',
        message: `extracted ${fields.size} of ${point.fields.size} fields`,
        extracted: fields.size,
        configured: point.fields.size,
      });
    }

    const tags = new Map<string, string>();
    for (const [key, value] of extractAll(point.tags, envelope)) {
      // line protocol has no empty tag value
      if (value !== '') {
        tags.set(key, String(value));
      }
    }
    if (tags.size !== point.tags.size) {
      warn({
        code: 'partial-tags',
        message: `extracted ${tags.size} of ${point.tags.size} tags`,
        extracted: tags.size,
        configured: point.tags.size,
      });
    }

    return {
      record: {
        measurement: String(measurement),
        time: formatRecordTime(this.clock()),
        tags: Object.fromEntries(tags),
        fields: Object.fromEntries(fields),
      },
      database: point.database ?? this.defaultDatabase,
      point,
    };
  }
}
