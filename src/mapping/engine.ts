import type { PointConfig } from '../config/loader.js';
import { ConfigError } from '../errors/bridge-error.js';
import { type Expression, compileExpression } from './path.js';
import { matchTopic, validateTopicPattern } from './topic.js';

export interface CompiledPoint {
  topic: string;
  measurement: Expression;
  fields: ReadonlyMap<string, Expression>;
  tags: ReadonlyMap<string, Expression>;
  database?: string;
  config: PointConfig;
}

function compileSpec(spec: string, where: string): Expression {
  try {
    return compileExpression(spec);
  } catch (err) {
    if (err instanceof ConfigError) {
      throw new ConfigError(`${where}: ${err.message}`, err.issues, err);
    }
    throw err;
  }
}

function compileSpecs(specs: Record<string, string>, where: string): Map<string, Expression> {
  const compiled = new Map<string, Expression>();
  for (const [key, spec] of Object.entries(specs)) {
    compiled.set(key, compileSpec(spec, `${where}.${key}`));
  }
  return compiled;
}

/** Compiles every expression of a point up front so bad syntax fails at startup. */
export function compilePoint(config: PointConfig, index = 0): CompiledPoint {
  const where = `points.${index}`;
  try {
    validateTopicPattern(config.topic);
  } catch (err) {
    if (err instanceof ConfigError) {
      throw new ConfigError(`${where}.topic: ${err.message}`, err.issues, err);
    }
    throw err;
  }

  return {
    topic: config.topic,
    measurement: compileSpec(config.measurement, `${where}.measurement`),
    fields: compileSpecs(config.fields, `${where}.fields`),
    tags: compileSpecs(config.tags, `${where}.tags`),
    database: config.database,
    config,
  };
}

export class MappingEngine {
  private points: CompiledPoint[] = [];

  addPoint(config: PointConfig): CompiledPoint {
    const point = compilePoint(config, this.points.length);
    this.points.push(point);
    return point;
  }

  addPoints(configs: PointConfig[]): void {
    for (const config of configs) {
      this.addPoint(config);
    }
  }

  /** Points whose pattern matches `topic`, in declaration order. */
  matchAll(topic: string): CompiledPoint[] {
    return this.points.filter((point) => matchTopic(point.topic, topic));
  }

  listPoints(): readonly CompiledPoint[] {
    return this.points;
  }

  /** Distinct subscription patterns, first occurrence order. */
  getTopicPatterns(): string[] {
    return Array.from(new Set(this.points.map((point) => point.topic)));
  }

  /** Default database plus every per-point override. */
  getDatabases(defaultDatabase: string): string[] {
    const names = new Set([defaultDatabase]);
    for (const point of this.points) {
      if (point.database) {
        names.add(point.database);
      }
    }
    return Array.from(names);
  }
}
