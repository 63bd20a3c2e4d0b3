import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import type { FastifyInstance } from 'fastify';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { withApp } from './helpers';

describe('Examples endpoints', () => {
  let app: FastifyInstance;

  beforeAll(async () => {
    app = await withApp();
  });

  afterAll(async () => {
    await app.close();
  });

  it('GET /examples lists the sample traces', async () => {
    const res = await app.inject({ method: 'GET', url: '/examples' });
    expect(res.statusCode).toBe(200);
    const names = res.json().files.map((f: { name: string }) => f.name);
    expect(names).toEqual(['collection.json', 'contact-trace-2645.json', 'outgoing-2645.json']);
  });

  it('GET /examples/:name rejects bad names', async () => {
    const res = await app.inject({ method: 'GET', url: '/examples/..%2Fpackage.json' });
    expect(res.statusCode).toBe(400);
    expect(res.json().code).toBe('EXAMPLES_ERROR');
  });

  it('GET /examples/:name returns 404 for a missing file', async () => {
    const res = await app.inject({ method: 'GET', url: '/examples/missing.json' });
    expect(res.statusCode).toBe(404);
  });

  async function flattenExample(name: string) {
    const example = await app.inject({ method: 'GET', url: `/examples/${name}?refresh=1` });
    expect(example.statusCode).toBe(200);
    const res = await app.inject({ method: 'POST', url: '/network-structure?debug=1', payload: example.json() });
    expect(res.statusCode).toBe(200);
    return res.json();
  }

  it('outgoing example keeps the non-adjacent repeat', async () => {
    const body = await flattenExample('outgoing-2645.json');
    expect(body.rows.map((r: { source: string; destination: string; distance: number }) => [r.source, r.destination, r.distance]))
      .toEqual([['2645', '11', 1], ['11', '207', 2], ['2645', '11', 1]]);
    expect(body.trace).toEqual({ edgeCount: 4, rowCount: 3 });
  });

  it('contact trace example expands pooled ingoing edges', async () => {
    const body = await flattenExample('contact-trace-2645.json');
    expect(body.rows.map((r: { direction: string; source: string; destination: string }) => `${r.direction}:${r.source}>${r.destination}`))
      .toEqual(['in:301>2645', 'in:88>301', 'in:302>2645', 'out:2645>11']);
    expect(body.rows[3]).toMatchObject({ inBegin: null, outBegin: '2005-09-01', outEnd: '2005-11-30' });
    expect(body.trace).toEqual({ edgeCount: 5, rowCount: 4 });
  });

  it('collection example yields one row per entry', async () => {
    const body = await flattenExample('collection.json');
    expect(body.rows.map((r: { root: string }) => r.root)).toEqual(['A-100', 'B-200']);
    expect(body.meta.kind).toBe('collection');
  });
});

describe('Examples endpoints with a malformed file', () => {
  let app: FastifyInstance;
  let dir: string;

  beforeAll(async () => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'epitrace-examples-'));
    fs.writeFileSync(path.join(dir, 'broken.json'), '{"kind":');
    app = await withApp({ examplesDir: dir });
  });

  afterAll(async () => {
    await app.close();
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('GET /examples/:name answers EXAMPLES_ERROR', async () => {
    const res = await app.inject({ method: 'GET', url: '/examples/broken.json' });
    expect(res.statusCode).toBe(500);
    expect(res.json().code).toBe('EXAMPLES_ERROR');
  });

  it('GET /examples reports the file with an error', async () => {
    const res = await app.inject({ method: 'GET', url: '/examples' });
    const [file] = res.json().files;
    expect(file.name).toBe('broken.json');
    expect(typeof file.error).toBe('string');
    expect(file).not.toHaveProperty('json');
  });
});
