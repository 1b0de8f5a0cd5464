import 'dotenv/config';
import path from 'path';
import { z } from 'zod';
import { ConfigError } from './errors';

export const LOG_LEVELS = ['debug', 'info', 'warn', 'error', 'silent'] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

// Empty strings in .env count as unset
const blankToUndefined = (value: unknown) =>
  typeof value === 'string' && value.trim() === '' ? undefined : value;

const EnvSchema = z.object({
  CATALOG_PATH: z.preprocess(blankToUndefined, z.string().optional()),
  LOG_LEVEL: z.preprocess(
    v => (typeof v === 'string' && v.trim() !== '' ? v.trim().toLowerCase() : undefined),
    z.enum(LOG_LEVELS).default('info')
  ),
  MAX_SUGGESTIONS_PER_POLARITY: z.preprocess(
    blankToUndefined,
    z.coerce.number().int().min(0).default(0)
  )
});

export interface Config {
  CATALOG_PATH: string;
  LOG_LEVEL: LogLevel;
  MAX_SUGGESTIONS_PER_POLARITY: number; // 0 = no cap
}

export const DEFAULT_CATALOG_PATH = path.resolve(__dirname, '..', 'data', 'catalog.json');

export function loadConfig(env: Record<string, string | undefined> = process.env): Config {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(i => `${i.path.join('.')}: ${i.message}`);
    throw new ConfigError(`Invalid configuration: ${issues.join('; ')}`, issues);
  }

  const { CATALOG_PATH, LOG_LEVEL, MAX_SUGGESTIONS_PER_POLARITY } = parsed.data;
  return {
    CATALOG_PATH: CATALOG_PATH ? path.resolve(CATALOG_PATH) : DEFAULT_CATALOG_PATH,
    LOG_LEVEL,
    MAX_SUGGESTIONS_PER_POLARITY
  };
}

export const CFG: Config = loadConfig();
