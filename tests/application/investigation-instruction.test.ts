import { describe, it, expect } from 'vitest';
import { buildInvestigationInstruction } from '../../src/application/investigation-instruction.js';
import type { AlertEvent } from '../../src/domain/index.js';

const ALERT: AlertEvent = {
  fingerprint: 'a1b2c3d4e5f60718',
  labels: { alertname: 'PodCrashLooping', severity: 'critical', namespace: 'payments', pod: 'api-0' },
  annotations: { summary: 'api-0 is restarting' },
  status: 'firing',
  startedAt: '2026-03-02T08:59:30Z',
  generatorURL: 'http://prometheus.local/graph',
  groupKey: '{}:{alertname="PodCrashLooping"}',
};

describe('buildInvestigationInstruction', () => {
  it('renders the alert context before the steps', () => {
    const lines = buildInvestigationInstruction(ALERT).split('\n');

    expect(lines.slice(0, 17)).toEqual([
      'ALERT RECEIVED - INVESTIGATE AND DETERMINE ROOT CAUSE',
      '',
      'Alert Name: PodCrashLooping',
      'Severity: critical',
      'Status: firing',
      'Started At: 2026-03-02T08:59:30Z',
      'Fingerprint: a1b2c3d4e5f60718',
      '',
      'ALERT LABELS:',
      '  alertname: PodCrashLooping',
      '  severity: critical',
      '  namespace: payments',
      '  pod: api-0',
      '',
      'ALERT ANNOTATIONS:',
      '  summary: api-0 is restarting',
      '',
    ]);
    expect(lines).toContain('- Namespace: payments');
    expect(lines).toContain('- Pod: api-0');
    expect(lines).toContain('- Group Key: {}:{alertname="PodCrashLooping"}');
    expect(lines).toContain('INSTRUCTIONS:');
  });

  it('fills placeholders for missing context', () => {
    const text = buildInvestigationInstruction({
      fingerprint: 'ffff',
      labels: {},
      annotations: {},
      status: 'firing',
      startedAt: '2026-03-02T08:59:30Z',
    });
    const lines = text.split('\n');

    expect(lines).toContain('Alert Name: Unknown');
    expect(lines).toContain('Severity: unknown');
    expect(lines).toContain('- Namespace: unknown');
    expect(lines).toContain('- Group Key: (none)');
    expect(lines.filter((line) => line === '  (none)')).toHaveLength(2);
    expect(lines[lines.indexOf('GENERATOR URL:') + 1]).toBe('(none)');
  });
});
