import type { AlertEvent, AlertLabels } from '../domain/index.js';

function formatMap(map: AlertLabels): string {
  const entries = Object.entries(map);
  if (entries.length === 0) return '  (none)';
  return entries.map(([key, value]) => `  ${key}: ${value}`).join('\n');
}

/**
 * Renders the textual instruction handed to the Investigator with an
 * accepted alert.
 *
 * The alert context comes first, then the investigation steps. The steps
 * point at the evidence endpoints this service exposes.
 */
export function buildInvestigationInstruction(alert: AlertEvent): string {
  const alertName = alert.labels['alertname'] ?? 'Unknown';
  const severity = alert.labels['severity'] ?? 'unknown';
  const namespace = alert.labels['namespace'] ?? 'unknown';
  const pod = alert.labels['pod'] ?? 'unknown';

  return [
    'ALERT RECEIVED - INVESTIGATE AND DETERMINE ROOT CAUSE',
    '',
    `Alert Name: ${alertName}`,
    `Severity: ${severity}`,
    `Status: ${alert.status}`,
    `Started At: ${alert.startedAt}`,
    `Fingerprint: ${alert.fingerprint}`,
    '',
    'ALERT LABELS:',
    formatMap(alert.labels),
    '',
    'ALERT ANNOTATIONS:',
    formatMap(alert.annotations),
    '',
    'GENERATOR URL:',
    alert.generatorURL ?? '(none)',
    '',
    'CONTEXT:',
    `- Namespace: ${namespace}`,
    `- Pod: ${pod}`,
    `- Group Key: ${alert.groupKey ?? '(none)'}`,
    '',
    'INSTRUCTIONS:',
    '1. Consult the knowledge store for known issues and the namespace map.',
    '2. Compare the two most recent revisions of the affected release',
    '   (GET /api/v1/releases/{namespace}/{release}/diff) for configuration drift.',
    '3. Fetch container logs and extract evidence (POST /api/v1/evidence/logs),',
    '   including the exit code of the last terminated container if any.',
    '4. Correlate drift and log evidence with the alert start time.',
    '5. Report the most likely root cause, the supporting evidence and an',
    '   immediate mitigation.',
  ].join('\n');
}
