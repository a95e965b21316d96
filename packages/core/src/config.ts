// packages/core/src/config.ts
// Env-driven defaults. Precedence: call arguments -> env -> defaults.
import { z } from 'zod';
import { ConfigError } from './errors';
import { issueDetails } from './schemas';

export type ModelLayer = 'table' | 'live';

const BoolFromEnv = z
  .string()
  .trim()
  .toLowerCase()
  .refine(s => ['1','true','yes','on','0','false','no','off'].includes(s), 'expected a boolean flag')
  .transform(s => ['1','true','yes','on'].includes(s));

// unset or empty vars fall back to defaults
const unsetToUndefined = (v: unknown) => (typeof v === 'string' && v.trim() === '' ? undefined : v);

export const EnvSchema = z.object({
  GRAPHFLOW_MODEL_LAYER: z.preprocess(unsetToUndefined, z.enum(['table','live']).default('table')),
  GRAPHFLOW_INCLUDE_META: z.preprocess(unsetToUndefined, BoolFromEnv.optional()),
  GRAPHFLOW_CHECK_BOUNDS: z.preprocess(unsetToUndefined, BoolFromEnv.optional()),
  GRAPHFLOW_SERVER_URL: z.preprocess(unsetToUndefined, z.string().url().optional()),
  GRAPHFLOW_TIMEOUT_S: z.preprocess(unsetToUndefined, z.coerce.number().int().positive().default(30)),
  LOG_LEVEL: z.preprocess(
    unsetToUndefined,
    z.enum(['fatal','error','warn','info','debug','trace','silent']).default('info')
  )
});

export interface GraphflowConfig {
  modelLayer: ModelLayer;
  includeMeta: boolean;
  checkBounds: boolean;
  serverUrl?: string;
  timeout: number;   // seconds
  logLevel: 'fatal' | 'error' | 'warn' | 'info' | 'debug' | 'trace' | 'silent';
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): GraphflowConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError('Invalid graphflow configuration', issueDetails(parsed.error));
  }
  const e = parsed.data;
  return {
    modelLayer: e.GRAPHFLOW_MODEL_LAYER,
    includeMeta: e.GRAPHFLOW_INCLUDE_META ?? false,
    checkBounds: e.GRAPHFLOW_CHECK_BOUNDS ?? false,
    ...(e.GRAPHFLOW_SERVER_URL !== undefined ? { serverUrl: e.GRAPHFLOW_SERVER_URL } : {}),
    timeout: e.GRAPHFLOW_TIMEOUT_S,
    logLevel: e.LOG_LEVEL
  };
}
