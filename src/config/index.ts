import fs from 'node:fs';
import path from 'node:path';
import { z } from 'zod';
import { ConfigError, issuesFromZod } from '../utils/errors.js';

const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;

export const rowPolicySchema = z.enum(['skip', 'fail']);
export type RowPolicy = z.infer<typeof rowPolicySchema>;

const configSchema = z.object({
  server: z.object({
    host: z.string().min(1),
    port: z.number().int().min(0).max(65535),
  }).strict(),
  database: z.object({
    path: z.string().min(1),
  }).strict(),
  ingest: z.object({
    onStart: z.boolean(),
    customersFile: z.string().min(1),
    loansFile: z.string().min(1),
    onInvalidRow: rowPolicySchema,
  }).strict(),
  log: z.object({
    level: z.enum(LOG_LEVELS),
    pretty: z.boolean(),
  }).strict(),
}).strict();

export type AppConfig = z.infer<typeof configSchema>;

type Env = Record<string, string | undefined>;

type PartialConfig = { [K in keyof AppConfig]?: Partial<AppConfig[K]> };

export function defaultConfig(env: Env = process.env): AppConfig {
  return {
    server: { host: '0.0.0.0', port: 8000 },
    database: { path: './data/credit.db' },
    ingest: {
      onStart: false,
      customersFile: './data/customer_data.xlsx',
      loansFile: './data/loan_data.xlsx',
      onInvalidRow: 'skip',
    },
    log: { level: 'info', pretty: env.NODE_ENV !== 'production' },
  };
}

function parseBool(v: string): boolean | string {
  const s = v.trim().toLowerCase();
  if (['1', 'true', 'yes', 'on'].includes(s)) return true;
  if (['0', 'false', 'no', 'off'].includes(s)) return false;
  return v; // left for the schema to reject
}

function parseIntLoose(v: string): number | string {
  const s = v.trim();
  return /^\d+$/.test(s) ? parseInt(s, 10) : v;
}

/** Environment overrides; unset variables leave the value alone. */
function envOverrides(env: Env): Record<string, Record<string, unknown>> {
  const out: Record<string, Record<string, unknown>> = { server: {}, database: {}, ingest: {}, log: {} };
  if (env.HOST) out.server.host = env.HOST;
  if (env.PORT) out.server.port = parseIntLoose(env.PORT);
  if (env.DB_PATH) out.database.path = env.DB_PATH;
  if (env.INGEST_ON_START) out.ingest.onStart = parseBool(env.INGEST_ON_START);
  if (env.CUSTOMERS_FILE) out.ingest.customersFile = env.CUSTOMERS_FILE;
  if (env.LOANS_FILE) out.ingest.loansFile = env.LOANS_FILE;
  if (env.INGEST_ON_INVALID_ROW) out.ingest.onInvalidRow = env.INGEST_ON_INVALID_ROW;
  if (env.LOG_LEVEL) out.log.level = env.LOG_LEVEL;
  if (env.LOG_PRETTY) out.log.pretty = parseBool(env.LOG_PRETTY);
  return out;
}

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === 'object' && v !== null && !Array.isArray(v);
}

function merge(base: Record<string, unknown>, ...layers: unknown[]): Record<string, unknown> {
  const out: Record<string, unknown> = { ...base };
  for (const layer of layers) {
    if (!isRecord(layer)) continue;
    for (const [key, value] of Object.entries(layer)) {
      if (value === undefined) continue;
      const current = out[key];
      out[key] = isRecord(current) && isRecord(value) ? merge(current, value) : value;
    }
  }
  return out;
}

function readFileLayer(file: string): unknown {
  if (!fs.existsSync(file)) return {};
  const raw = fs.readFileSync(file, 'utf8');
  try {
    return JSON.parse(raw);
  } catch (e) {
    throw new ConfigError(`Config file ${file} is not valid JSON: ${e instanceof Error ? e.message : String(e)}`);
  }
}

export type LoadConfigOptions = {
  env?: Env;
  file?: string;
  overrides?: PartialConfig;
};

/**
 * Defaults, then the JSON file (config/config.json or CREDIT_DESK_CONFIG),
 * then environment variables, then explicit overrides.
 */
export function loadConfig(opts: LoadConfigOptions = {}): AppConfig {
  const env = opts.env ?? process.env;
  const file = opts.file ?? env.CREDIT_DESK_CONFIG ?? path.resolve(process.cwd(), 'config', 'config.json');
  const merged = merge(defaultConfig(env), readFileLayer(file), envOverrides(env), opts.overrides);
  const parsed = configSchema.safeParse(merged);
  if (!parsed.success) {
    const issues = issuesFromZod(parsed.error);
    throw new ConfigError(`Invalid configuration: ${issues.map((i) => `${i.field}: ${i.message}`).join('; ')}`, issues);
  }
  return parsed.data;
}
