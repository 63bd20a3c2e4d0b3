// apps/http/src/app.ts
import Fastify from 'fastify';
import type { FastifyInstance } from 'fastify';
import cors from '@fastify/cors';
import rateLimit from '@fastify/rate-limit';
import { ZodError } from 'zod';
import fs from 'node:fs';
import path from 'node:path';
import { CollectionError, NetworkStructureError, TraceContractError, parseContactInput } from '@epitrace/core';
import type { ContactInput, TraceUnit } from '@epitrace/core';
import { networkStructure, toRecords } from '@epitrace/network';
import type { ServiceConfig } from './config';

interface ClassifiedError {
  code: string;
  status: number;
  message: string;
  details?: unknown;
}

function hasStatusCode(e: unknown): e is { statusCode: number } {
  return typeof e === 'object' && e !== null && 'statusCode' in e && typeof e.statusCode === 'number';
}

export function classifyError(e: unknown): ClassifiedError {
  const message = e instanceof Error ? e.message : String(e);
  if (e instanceof ZodError) {
    const details = e.issues.map((i) => ({ path: i.path.join('.'), msg: i.message }));
    return { code: 'VALIDATION', status: 400, message, details };
  }
  // malformed aggregation input, distinct from tracer-side bugs
  if (e instanceof CollectionError) return { code: e.code, status: 422, message, details: e.details };
  if (e instanceof TraceContractError) return { code: e.code, status: 500, message, details: e.details };
  if (e instanceof NetworkStructureError) return { code: e.code, status: 500, message };
  // client errors carrying a status (bad JSON, body too large, rate limit, CORS)
  if (hasStatusCode(e) && e.statusCode >= 400 && e.statusCode < 500) {
    return { code: 'REQUEST', status: e.statusCode, message };
  }
  return { code: 'INTERNAL', status: 500, message };
}

function debugRequested(query: unknown, headers: Record<string, unknown>, config: ServiceConfig): boolean {
  const q = typeof query === 'object' && query !== null && 'debug' in query ? String(query.debug) : '';
  const h = String(headers['x-debug'] ?? '');
  return q === '1' || h === '1' || config.debugErrors;
}

function unitEdges(unit: TraceUnit): number {
  return unit.kind === 'directional'
    ? unit.edges.length
    : unit.ingoing.edges.length + unit.outgoing.edges.length;
}

export function countEdges(input: ContactInput): number {
  if (input.kind !== 'collection') return unitEdges(input);
  let total = 0;
  for (const entry of input.items.values()) {
    total += 'kind' in entry ? unitEdges(entry) : entry.reduce((n, u) => n + unitEdges(u), 0);
  }
  return total;
}

const EXAMPLE_NAME = /^[a-z0-9._-]+\.json$/i;

export async function buildApp(config: ServiceConfig): Promise<FastifyInstance> {
  const app = Fastify({
    logger: { level: config.logLevel },
    bodyLimit: config.bodyLimit
  });

  await app.register(cors, {
    origin: (origin, cb) => {
      const allow = config.corsOrigins;
      if (!origin || allow.length === 0 || allow.includes(origin)) return cb(null, true);
      cb(Object.assign(new Error('CORS not allowed'), { statusCode: 403 }), false);
    },
    credentials: true
  });

  await app.register(rateLimit, {
    max: config.rateLimitMax,
    timeWindow: '1 minute'
  });

  app.addHook('onSend', async (req, reply, payload) => {
    reply.header('x-request-id', req.id);
    return payload;
  });

  app.setErrorHandler((err, req, reply) => {
    const { code, status, message, details } = classifyError(err);
    if (status >= 500) req.log.error({ err, requestId: req.id }, 'request-error');
    else req.log.warn({ code, requestId: req.id, error: message }, 'request-rejected');
    const debug = debugRequested(req.query, req.headers, config);
    reply.status(status).send({
      code,
      message: 'Request failed',
      error: message,
      requestId: req.id,
      ...(details !== undefined ? { details } : {}),
      ...(debug ? { trace: { errorCode: code } } : {})
    });
  });

  app.log.info(
    {
      examples_dir: config.examplesDir,
      cors: config.corsOrigins.length ? config.corsOrigins : 'any',
      rate_limit_max: config.rateLimitMax,
      debug_errors: config.debugErrors
    },
    'service-config'
  );

  // ------------------------------------
  // POST /network-structure  (traced contacts -> rows)
  // ------------------------------------
  app.post('/network-structure', async (req, reply) => {
    const input = parseContactInput(req.body);
    const t0 = Date.now();
    const table = networkStructure(input);
    const flattenMs = Date.now() - t0;
    const rowCount = table.rows.length;

    req.log.debug({ kind: input.kind, rowCount, flattenMs }, 'network-structure');

    return reply.send({
      rows: toRecords(table),
      meta: { kind: input.kind, rowCount, flattenMs },
      ...(debugRequested(req.query, req.headers, config)
        ? { trace: { edgeCount: countEdges(input), rowCount } }
        : {})
    });
  });

  // Examples caching
  const examplesCache = new Map<string, unknown>();

  function readExample(name: string): unknown {
    if (!examplesCache.has(name)) {
      examplesCache.set(name, JSON.parse(fs.readFileSync(path.join(config.examplesDir, name), 'utf8')));
    }
    return examplesCache.get(name);
  }

  // ------------------------------------
  // GET /examples  (serve examples/traces/*.json)
  // ------------------------------------
  app.get('/examples', async (_req, reply) => {
    if (!fs.existsSync(config.examplesDir)) return reply.send({ files: [], note: 'examples dir not found' });
    const files = fs.readdirSync(config.examplesDir).filter((f) => f.endsWith('.json')).sort();
    const items = files.map((name) => {
      try {
        return { name, json: readExample(name) };
      } catch (e) {
        return { name, error: e instanceof Error ? e.message : String(e) };
      }
    });
    return reply.send({ files: items });
  });

  // ------------------------------------
  // GET /examples/:name  (fetch single example)
  // ------------------------------------
  app.get<{ Params: { name: string }; Querystring: { refresh?: string } }>('/examples/:name', async (req, reply) => {
    const name = req.params.name;
    if (!EXAMPLE_NAME.test(name)) {
      return reply.code(400).send({ code: 'EXAMPLES_ERROR', message: 'invalid filename' });
    }
    const abs = path.resolve(config.examplesDir, name);
    if (path.dirname(abs) !== config.examplesDir) {
      return reply.code(400).send({ code: 'EXAMPLES_ERROR', message: 'invalid path' });
    }
    if (!fs.existsSync(abs)) return reply.code(404).send({ code: 'NOT_FOUND' });

    try {
      if (req.query.refresh === '1') examplesCache.delete(name);
      return reply.send(readExample(name));
    } catch (e) {
      return reply.code(500).send({ code: 'EXAMPLES_ERROR', message: e instanceof Error ? e.message : String(e) });
    }
  });

  app.get('/healthz', async () => ({ ok: true }));

  return app;
}
