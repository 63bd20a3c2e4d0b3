/* apps/http/test/helpers.ts */
import path from 'node:path';
import { fileURLToPath } from 'node:url';
import type { FastifyInstance } from 'fastify';
import { buildApp } from '../src/app';
import type { ServiceConfig } from '../src/config';

export const EXAMPLES_DIR = path.resolve(path.dirname(fileURLToPath(import.meta.url)), '../../..', 'examples/traces');

export function testConfig(overrides: Partial<ServiceConfig> = {}): ServiceConfig {
  return {
    port: 0,
    host: '127.0.0.1',
    logLevel: 'silent',
    corsOrigins: [],
    rateLimitMax: 1000,
    bodyLimit: 1_000_000,
    debugErrors: false,
    examplesDir: EXAMPLES_DIR,
    ...overrides
  };
}

export async function withApp(overrides: Partial<ServiceConfig> = {}): Promise<FastifyInstance> {
  const app = await buildApp(testConfig(overrides));
  await app.ready();
  return app;
}
