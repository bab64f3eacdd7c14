import { z } from 'zod';
import type { Env } from './types';
import type { LogLevel } from './utils/log-sanitizer';

/**
 * Environment schema. Durations are given in seconds, as operators write them.
 */
const EnvSchema = z.object({
  CHART_SERVICE_URL: z.string().url().default('http://localhost:8080'),
  DIAGRAM_SERVICE_URL: z.string().url().default('http://localhost:8080'),
  TEXT_TABLE_SERVICE_URL: z.string().url().default('http://localhost:8000'),
  IMAGE_SERVICE_URL: z.string().url().default('http://localhost:8000'),
  INFOGRAPHIC_SERVICE_URL: z.string().url().default('http://localhost:8000'),
  LAYOUT_SERVICE_URL: z.string().url().default('http://localhost:8504'),
  SERVICE_TIMEOUT: z.coerce.number().positive().default(30),
  IMAGE_TIMEOUT: z.coerce.number().positive().default(60),
  DIAGRAM_POLL_TIMEOUT: z.coerce.number().positive().default(60),
  DIAGRAM_POLL_INTERVAL: z.coerce.number().positive().default(2),
  DIAGRAM_POLL_MAX_INTERVAL: z.coerce.number().positive().default(10),
  DIAGRAM_PX_PER_COL: z.coerce.number().int().min(1).default(80),
  DIAGRAM_PX_PER_ROW: z.coerce.number().int().min(1).default(77),
  HOST: z.string().min(1).default('0.0.0.0'),
  PORT: z.coerce.number().int().min(1).max(65535).default(8090),
  CORS_ORIGINS: z.string().default('*'),
  LOG_LEVEL: z
    .string()
    .default('info')
    .transform((value) => value.toLowerCase())
    .pipe(z.enum(['debug', 'info', 'warn', 'error'])),
  ENVIRONMENT: z.string().default('development'),
});

export interface ServiceUrls {
  readonly chart: string;
  readonly diagram: string;
  readonly textTable: string;
  readonly image: string;
  readonly infographic: string;
  readonly layout: string;
}

export interface OrchestratorConfig {
  readonly services: ServiceUrls;
  readonly serviceTimeoutMs: number;
  readonly imageTimeoutMs: number;
  readonly diagramPoll: {
    readonly timeoutMs: number;
    readonly intervalMs: number;
    readonly maxIntervalMs: number;
  };
  readonly diagramPxPerCol: number;
  readonly diagramPxPerRow: number;
  readonly host: string;
  readonly port: number;
  readonly corsOrigins: readonly string[];
  readonly logLevel: LogLevel;
  readonly environment: string;
}

export class ConfigError extends Error {
  constructor(public readonly issues: string[]) {
    super(`Invalid configuration: ${issues.join('; ')}`);
    this.name = 'ConfigError';
  }
}

function stripTrailingSlash(url: string): string {
  return url.replace(/\/+$/, '');
}

/**
 * CORS_ORIGINS accepts a comma list ("https://a.example,https://b.example")
 * or a JSON array ('["https://a.example"]').
 */
export function parseCorsOrigins(raw: string): string[] {
  const trimmed = raw.trim();
  if (trimmed.startsWith('[')) {
    const parsed = z.array(z.string()).safeParse(safeJsonParse(trimmed));
    if (!parsed.success) {
      throw new ConfigError(['CORS_ORIGINS: expected a JSON array of strings']);
    }
    return parsed.data.map((origin) => origin.trim()).filter((origin) => origin.length > 0);
  }
  return trimmed
    .split(',')
    .map((origin) => origin.trim())
    .filter((origin) => origin.length > 0);
}

function safeJsonParse(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}

/**
 * Build the immutable orchestrator configuration from environment variables.
 * Empty strings count as unset.
 */
export function loadConfig(env: Env = process.env): OrchestratorConfig {
  const present: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (typeof value === 'string' && value.trim() !== '') {
      present[key] = value.trim();
    }
  }

  const result = EnvSchema.safeParse(present);
  if (!result.success) {
    throw new ConfigError(
      result.error.errors.map((err) => `${err.path.join('.')}: ${err.message}`)
    );
  }

  const values = result.data;
  const config: OrchestratorConfig = {
    services: Object.freeze({
      chart: stripTrailingSlash(values.CHART_SERVICE_URL),
      diagram: stripTrailingSlash(values.DIAGRAM_SERVICE_URL),
      textTable: stripTrailingSlash(values.TEXT_TABLE_SERVICE_URL),
      image: stripTrailingSlash(values.IMAGE_SERVICE_URL),
      infographic: stripTrailingSlash(values.INFOGRAPHIC_SERVICE_URL),
      layout: stripTrailingSlash(values.LAYOUT_SERVICE_URL),
    }),
    serviceTimeoutMs: values.SERVICE_TIMEOUT * 1000,
    imageTimeoutMs: values.IMAGE_TIMEOUT * 1000,
    diagramPoll: Object.freeze({
      timeoutMs: values.DIAGRAM_POLL_TIMEOUT * 1000,
      intervalMs: values.DIAGRAM_POLL_INTERVAL * 1000,
      maxIntervalMs: Math.max(values.DIAGRAM_POLL_MAX_INTERVAL, values.DIAGRAM_POLL_INTERVAL) * 1000,
    }),
    diagramPxPerCol: values.DIAGRAM_PX_PER_COL,
    diagramPxPerRow: values.DIAGRAM_PX_PER_ROW,
    host: values.HOST,
    port: values.PORT,
    corsOrigins: Object.freeze(parseCorsOrigins(values.CORS_ORIGINS)),
    logLevel: values.LOG_LEVEL,
    environment: values.ENVIRONMENT,
  };

  return Object.freeze(config);
}
