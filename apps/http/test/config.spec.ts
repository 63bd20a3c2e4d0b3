import { describe, it, expect } from 'vitest';
import path from 'node:path';
import { ZodError } from 'zod';
import { loadConfig } from '../src/config';
import { EXAMPLES_DIR } from './helpers';

describe('loadConfig', () => {
  it('applies defaults', () => {
    expect(loadConfig({})).toEqual({
      port: 4000,
      host: '0.0.0.0',
      logLevel: 'info',
      corsOrigins: [],
      rateLimitMax: 600,
      bodyLimit: 1_000_000,
      debugErrors: false,
      examplesDir: EXAMPLES_DIR
    });
  });

  it('reads overrides from the environment', () => {
    const config = loadConfig({
      PORT: '8080',
      LOG_LEVEL: 'debug',
      CORS_ORIGIN: 'https://a.example, https://b.example',
      RATE_LIMIT_MAX: '10',
      DEBUG_ERRORS: '1',
      EXAMPLES_DIR: '/tmp/traces'
    });
    expect(config).toMatchObject({
      port: 8080,
      logLevel: 'debug',
      corsOrigins: ['https://a.example', 'https://b.example'],
      rateLimitMax: 10,
      debugErrors: true,
      examplesDir: path.resolve('/tmp/traces')
    });
  });

  it('rejects invalid values', () => {
    expect(() => loadConfig({ LOG_LEVEL: 'loud' })).toThrow(ZodError);
    expect(() => loadConfig({ PORT: 'eighty' })).toThrow(ZodError);
  });
});
