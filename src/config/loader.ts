import { readFileSync } from 'fs';
import { parse } from 'yaml';
import { z } from 'zod';
import { ConfigError } from '../errors/bridge-error.js';

// YAML keys left blank (`username:`) load as null
const optionalString = z.string().nullish().transform((value) => value ?? undefined);

export const mqttConfigSchema = z.object({
  host: z.string().min(1),
  port: z.number().int().positive().default(1883),
  username: optionalString,
  password: optionalString,
  /** CA certificate path; when set the connection uses TLS. */
  cafile: optionalString,
  certfile: optionalString,
  keyfile: optionalString,
  clientId: optionalString,
  keepalive: z.number().int().nonnegative().default(10),
  reconnectPeriod: z.number().int().nonnegative().default(5000),
});

export const influxConfigSchema = z.object({
  host: z.string().min(1),
  port: z.number().int().positive().default(8086),
  username: z.string().default('root'),
  password: z.string().default('root'),
  database: z.string().min(1),
  ssl: z.boolean().default(false),
});

export const httpConfigSchema = z.object({
  host: z.string().default('0.0.0.0'),
  port: z.number().int().positive().default(8080),
  apiKeys: z.array(z.string().min(1)).default([]),
});

export const pointConfigSchema = z.object({
  topic: z.string().min(1),
  measurement: z.string().min(1),
  fields: z
    .record(z.string().min(1))
    .refine((fields) => Object.keys(fields).length > 0, 'at least one field is required'),
  tags: z.record(z.string().min(1)).nullish().transform((tags) => tags ?? {}),
  database: optionalString,
});

export const appConfigSchema = z.object({
  mqtt: mqttConfigSchema,
  influxdb: influxConfigSchema,
  http: httpConfigSchema.optional(),
  points: z.array(pointConfigSchema).min(1),
});

export type MqttConfig = z.infer<typeof mqttConfigSchema>;
export type InfluxConfig = z.infer<typeof influxConfigSchema>;
export type HttpConfig = z.infer<typeof httpConfigSchema>;
export type PointConfig = z.infer<typeof pointConfigSchema>;
export type AppConfig = z.infer<typeof appConfigSchema>;

function formatIssue(issue: z.ZodIssue): string {
  const where = issue.path.length > 0 ? issue.path.join('.') : '(root)';
  return `${where}: ${issue.message}`;
}

export function parseConfig(content: string): AppConfig {
  let document: unknown;
  try {
    document = parse(content);
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new ConfigError(`configuration is not valid YAML: ${reason}`, [], err);
  }

  const result = appConfigSchema.safeParse(document);
  if (!result.success) {
    const issues = result.error.issues.map(formatIssue);
    throw new ConfigError(`invalid configuration: ${issues.join('; ')}`, issues);
  }
  return result.data;
}

export function loadConfig(path: string): AppConfig {
  let content: string;
  try {
    content = readFileSync(path, 'utf8');
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new ConfigError(`cannot read configuration file ${path}: ${reason}`, [], err);
  }
  return parseConfig(content);
}
