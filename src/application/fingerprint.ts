import { createHash } from 'node:crypto';
import type { AlertLabels } from '../domain/index.js';

const FINGERPRINT_LENGTH = 16;

/**
 * Derives a stable fingerprint from an alert's label set.
 *
 * Keys are sorted before hashing, so two deliveries carrying the same labels
 * in a different key order map to the same fingerprint. Each pair is JSON
 * encoded to keep `a=b,c` and `a=b`,`c=` from colliding.
 */
export function deriveFingerprint(labels: AlertLabels): string {
  const canonical = Object.keys(labels)
    .sort()
    .map((key) => JSON.stringify([key, labels[key] ?? '']))
    .join('\n');

  return createHash('sha256').update(canonical).digest('hex').slice(0, FINGERPRINT_LENGTH);
}
