// apps/http/src/config.ts
import path from 'node:path';
import { fileURLToPath } from 'node:url';
import { z } from 'zod';

// repo-level examples/traces (three levels up from apps/http/src)
const DEFAULT_EXAMPLES_DIR = path.resolve(path.dirname(fileURLToPath(import.meta.url)), '../../..', 'examples/traces');

const EnvSchema = z.object({
  PORT: z.coerce.number().int().min(0).max(65535).default(4000),
  HOST: z.string().min(1).default('0.0.0.0'),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
  CORS_ORIGIN: z.string().default(''),
  RATE_LIMIT_MAX: z.coerce.number().int().positive().default(600),
  BODY_LIMIT: z.coerce.number().int().positive().default(1_000_000),
  DEBUG_ERRORS: z.enum(['0', '1']).default('0'),
  EXAMPLES_DIR: z.string().min(1).optional()
});

export interface ServiceConfig {
  port: number;
  host: string;
  logLevel: z.infer<typeof EnvSchema>['LOG_LEVEL'];
  corsOrigins: string[];   // empty = any origin
  rateLimitMax: number;    // requests per minute
  bodyLimit: number;       // bytes
  debugErrors: boolean;
  examplesDir: string;
}

export function loadConfig(env: Record<string, string | undefined> = process.env): ServiceConfig {
  const e = EnvSchema.parse(env);
  return {
    port: e.PORT,
    host: e.HOST,
    logLevel: e.LOG_LEVEL,
    corsOrigins: e.CORS_ORIGIN.split(',').map((s) => s.trim()).filter(Boolean),
    rateLimitMax: e.RATE_LIMIT_MAX,
    bodyLimit: e.BODY_LIMIT,
    debugErrors: e.DEBUG_ERRORS === '1',
    examplesDir: path.resolve(e.EXAMPLES_DIR ?? DEFAULT_EXAMPLES_DIR)
  };
}
