import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import Fastify from 'fastify';
import type { FastifyInstance } from 'fastify';
import evidenceRoutes from '../../src/interfaces/http/evidence-routes.js';

describe('evidence routes', () => {
  let app: FastifyInstance;

  beforeAll(async () => {
    app = Fastify({ logger: false });
    await app.register(evidenceRoutes);
    await app.ready();
  });

  afterAll(async () => {
    await app.close();
  });

  // ── /logs ──────────────────────────────────────────────────

  it('POST /api/v1/evidence/logs returns log evidence', async () => {
    const res = await app.inject({
      method: 'POST',
      url: '/api/v1/evidence/logs',
      payload: { logs: 'INFO: ok\nERROR: boom\n', exit_code: 137 },
    });

    expect(res.statusCode).toBe(200);
    expect(res.json()).toEqual({
      errorLines: [{ line: 2, text: 'ERROR: boom', captured: 'boom' }],
      stackTraces: [],
      repeatedMessages: [],
      knownPatterns: [],
      exitCode: {
        code: 137,
        description: 'Killed (SIGKILL), likely OOM',
        category: 'oom_killed',
        recommendation: 'Increase memory limit or investigate leak',
      },
    });
  });

  it('POST /api/v1/evidence/logs rejects a non-string body', async () => {
    const res = await app.inject({
      method: 'POST',
      url: '/api/v1/evidence/logs',
      payload: { logs: 42 },
    });

    expect(res.statusCode).toBe(400);
    expect(res.json().error).toBe('Validation failed');
  });

  // ── /diff ──────────────────────────────────────────────────

  it('POST /api/v1/evidence/diff returns ordered changes', async () => {
    const res = await app.inject({
      method: 'POST',
      url: '/api/v1/evidence/diff',
      payload: {
        old: { replicas: 2, resources: { limits: { memory: '128Mi' } } },
        new: { replicas: 3, resources: { limits: { memory: '256Mi' } }, image: 'v2' },
      },
    });

    expect(res.statusCode).toBe(200);
    expect(res.json()).toEqual({
      changes: [
        { path: 'image', kind: 'added', newValue: 'v2' },
        { path: 'replicas', kind: 'changed', oldValue: 2, newValue: 3 },
        { path: 'resources.limits.memory', kind: 'changed', oldValue: '128Mi', newValue: '256Mi' },
      ],
    });
  });

  it('POST /api/v1/evidence/diff answers 400 when a side is not a tree', async () => {
    const res = await app.inject({
      method: 'POST',
      url: '/api/v1/evidence/diff',
      payload: { old: [1, 2], new: {} },
    });

    expect(res.statusCode).toBe(400);
    expect(res.json()).toEqual({
      error: 'old revision is not a configuration tree',
      code: 'DIFF_INPUT_ERROR',
    });
  });

  // ── /tools ─────────────────────────────────────────────────

  it('POST /api/v1/evidence/tools dispatches on action', async () => {
    const res = await app.inject({
      method: 'POST',
      url: '/api/v1/evidence/tools',
      payload: { action: 'analyze_exit_code', exit_code: 143 },
    });

    expect(res.statusCode).toBe(200);
    expect(res.json()).toMatchObject({
      action: 'analyze_exit_code',
      result: { code: 143, description: 'Terminated (SIGTERM)', category: 'terminated' },
    });
  });

  it('POST /api/v1/evidence/tools rejects an unknown action', async () => {
    const res = await app.inject({
      method: 'POST',
      url: '/api/v1/evidence/tools',
      payload: { action: 'delete_cluster' },
    });

    expect(res.statusCode).toBe(400);
  });

  it('POST /api/v1/evidence/tools maps a diff input error to 400', async () => {
    const res = await app.inject({
      method: 'POST',
      url: '/api/v1/evidence/tools',
      payload: { action: 'diff_revisions', old: {}, new: 'values' },
    });

    expect(res.statusCode).toBe(400);
    expect(res.json().code).toBe('DIFF_INPUT_ERROR');
  });
});
