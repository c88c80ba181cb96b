import { describe, it, expect } from 'vitest';
import { diffRevisions, valuesEqual } from '../../src/application/revision-diff.js';
import { DiffInputError } from '../../src/domain/index.js';
import type { ChangeRecord, ConfigTree } from '../../src/domain/index.js';

// ── Helpers ──────────────────────────────────────────────────

function mirror(record: ChangeRecord): ChangeRecord {
  switch (record.kind) {
    case 'added':
      return { path: record.path, kind: 'removed', oldValue: record.newValue };
    case 'removed':
      return { path: record.path, kind: 'added', newValue: record.oldValue };
    case 'changed':
      return { path: record.path, kind: 'changed', oldValue: record.newValue, newValue: record.oldValue };
  }
}

function byPath(a: ChangeRecord, b: ChangeRecord): number {
  return a.path.localeCompare(b.path);
}

const NESTED: ConfigTree = {
  image: { repository: 'registry.local/api', tag: 'v1' },
  replicas: 2,
  env: ['A=1', 'B=2'],
  ingress: { enabled: true, hosts: [{ host: 'api.local', paths: ['/'] }] },
  affinity: null,
  empty: {},
};

// ── Tests ────────────────────────────────────────────────────

describe('diffRevisions', () => {
  it('produces added and changed records in key order', () => {
    const prev = { replicas: 2, resources: { limits: { memory: '128Mi' } } };
    const next = { replicas: 3, resources: { limits: { memory: '256Mi' } }, image: 'v2' };

    expect(diffRevisions(prev, next)).toEqual([
      { path: 'image', kind: 'added', newValue: 'v2' },
      { path: 'replicas', kind: 'changed', oldValue: 2, newValue: 3 },
      { path: 'resources.limits.memory', kind: 'changed', oldValue: '128Mi', newValue: '256Mi' },
    ]);
  });

  it('is empty for identical trees', () => {
    expect(diffRevisions(NESTED, NESTED)).toEqual([]);
    expect(diffRevisions({}, {})).toEqual([]);
    expect(diffRevisions(NESTED, structuredClone(NESTED))).toEqual([]);
  });

  it('does not depend on key insertion order', () => {
    const a = { b: 1, a: { y: 1, x: 2 } };
    const b = { a: { x: 2, y: 1 }, b: 1 };
    expect(diffRevisions(a, b)).toEqual([]);
  });

  it('lists every removal after every addition and change', () => {
    const prev = { a: 1, z: { gone: true, kept: 1 } };
    const next = { b: 2, z: { kept: 2 } };

    expect(diffRevisions(prev, next)).toEqual([
      { path: 'b', kind: 'added', newValue: 2 },
      { path: 'z.kept', kind: 'changed', oldValue: 1, newValue: 2 },
      { path: 'a', kind: 'removed', oldValue: 1 },
      { path: 'z.gone', kind: 'removed', oldValue: true },
    ]);
  });

  it('mirrors when the sides swap', () => {
    const prev = { a: 1, nested: { x: 'old', y: [1, 2] }, only_old: { deep: 1 } };
    const next = { a: 2, nested: { x: 'new', z: false }, only_new: 'v' };

    const forward = diffRevisions(prev, next);
    const backward = diffRevisions(next, prev);

    expect(backward.map(mirror).sort(byPath)).toEqual([...forward].sort(byPath));
  });

  it('reports a tree replaced by a scalar as one change', () => {
    const prev = { resources: { limits: { cpu: '1' } } };
    const next = { resources: 'default' };

    expect(diffRevisions(prev, next)).toEqual([
      { path: 'resources', kind: 'changed', oldValue: { limits: { cpu: '1' } }, newValue: 'default' },
    ]);
  });

  it('compares lists as whole values', () => {
    const prev = { args: ['--port', '8080'], hosts: [{ host: 'a' }] };
    const next = { args: ['--port', '9090'], hosts: [{ host: 'a' }] };

    expect(diffRevisions(prev, next)).toEqual([
      { path: 'args', kind: 'changed', oldValue: ['--port', '8080'], newValue: ['--port', '9090'] },
    ]);
  });

  it('treats null as a value', () => {
    expect(diffRevisions({ affinity: null }, { affinity: {} })).toEqual([
      { path: 'affinity', kind: 'changed', oldValue: null, newValue: {} },
    ]);
  });

  it('reports a new nested tree as one added record', () => {
    expect(diffRevisions({}, { probes: { liveness: { path: '/healthz' } } })).toEqual([
      { path: 'probes', kind: 'added', newValue: { liveness: { path: '/healthz' } } },
    ]);
  });

  it('throws DiffInputError naming the side that is not a tree', () => {
    expect(() => diffRevisions(['a'], {})).toThrow(DiffInputError);
    expect(() => diffRevisions({}, 'values')).toThrow('new revision is not a configuration tree');
    expect(() => diffRevisions(null, {})).toThrow('old revision is not a configuration tree');
  });

  it('rejects trees holding non-configuration values', () => {
    expect(() => diffRevisions({ a: Number.NaN }, {})).toThrow(DiffInputError);
    expect(() => diffRevisions({}, { handler: () => 1 })).toThrow(DiffInputError);
  });
});

describe('valuesEqual', () => {
  it('compares scalars strictly', () => {
    expect(valuesEqual(1, 1)).toBe(true);
    expect(valuesEqual(1, '1')).toBe(false);
    expect(valuesEqual(null, false)).toBe(false);
  });

  it('compares lists element by element in order', () => {
    expect(valuesEqual([1, [2, 3]], [1, [2, 3]])).toBe(true);
    expect(valuesEqual([1, 2], [2, 1])).toBe(false);
    expect(valuesEqual([1], [1, 1])).toBe(false);
  });

  it('never equates a list with a tree', () => {
    expect(valuesEqual([], {})).toBe(false);
  });
});
