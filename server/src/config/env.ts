import { z } from 'zod';
import { LOG_LEVELS, type LogLevel } from '../utils/logger.js';
import { fromServerRoot } from './paths.js';

const flag = z
  .string()
  .default('false')
  .transform(v => ['1', 'true', 'yes', 'on'].includes(v.trim().toLowerCase()));

const EnvSchema = z.object({
  PORT: z.coerce.number().int().min(1).max(65535).default(4010),
  MARKET_CACHE_TTL_MS: z.coerce.number().int().min(0).default(120_000),
  IR_CSV_DIR: z.string().min(1).default('data/ir'),
  INSTITUTIONAL_CSV_DIR: z.string().min(1).default('data/institutional'),
  INSTITUTIONAL_REMOTE_FETCH: flag,
  ECON_CALENDAR_SOURCE: z.enum(['bls', 'estimate']).default('bls'),
  FRED_API_KEY: z.string().optional(),
  LOG_LEVEL: z.enum(LOG_LEVELS).default('info'),
});

export interface ServerConfig {
  port: number;
  cacheTtlMs: number;
  irCsvDir: string;
  institutionalCsvDir: string;
  institutionalRemoteFetch: boolean;
  /** `bls` reads the published release schedule; `estimate` uses the release rules. */
  econCalendarSource: 'bls' | 'estimate';
  fredApiKey?: string;
  logLevel: LogLevel;
}

export class ConfigError extends Error {
  constructor(readonly issues: string[]) {
    super(`Invalid configuration: ${issues.join('; ')}`);
    this.name = 'ConfigError';
  }
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): ServerConfig {
  const r = EnvSchema.safeParse(env);
  if (!r.success) {
    throw new ConfigError(r.error.issues.map(i => `${i.path.join('.')}: ${i.message}`));
  }
  const e = r.data;
  return Object.freeze({
    port: e.PORT,
    cacheTtlMs: e.MARKET_CACHE_TTL_MS,
    irCsvDir: fromServerRoot(e.IR_CSV_DIR),
    institutionalCsvDir: fromServerRoot(e.INSTITUTIONAL_CSV_DIR),
    institutionalRemoteFetch: e.INSTITUTIONAL_REMOTE_FETCH,
    econCalendarSource: e.ECON_CALENDAR_SOURCE,
    fredApiKey: e.FRED_API_KEY?.trim() || undefined,
    logLevel: e.LOG_LEVEL,
  });
}
