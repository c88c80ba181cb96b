import type { BaseLogger } from 'pino';
import type {
  AlertEvent,
  DispatchResult,
  Investigator,
  SubmitOutcome,
} from '../domain/index.js';
import { DispatchFailure, ValidationError } from '../domain/index.js';
import type { DedupCache } from './dedup-cache.js';
import type { AlertInput } from './alert-schema.js';
import { deriveFingerprint } from './fingerprint.js';
import { buildInvestigationInstruction } from './investigation-instruction.js';

/** Default dedup window: 5 minutes. */
export const DEFAULT_DEDUP_TTL_MS = 5 * 60_000;

export interface AlertIntakeDeps {
  cache: DedupCache;
  investigator: Investigator;
  log: BaseLogger;
}

function isStringMap(value: unknown): value is Record<string, string> {
  if (value === null || typeof value !== 'object' || Array.isArray(value)) return false;
  return Object.values(value).every((v) => typeof v === 'string');
}

/**
 * Checks the structural shape of an event and fills in its fingerprint.
 *
 * Callers may reach `submit()` without going through the webhook schema,
 * so the shape is re-checked here rather than trusted from the type.
 */
export function normalizeAlert(event: AlertEvent): AlertEvent {
  if (event.status !== 'firing' && event.status !== 'resolved') {
    throw new ValidationError(`Unknown alert status "${String(event.status)}"`, 'status');
  }
  if (!isStringMap(event.labels)) {
    throw new ValidationError('labels must be a string map', 'labels');
  }
  if (!isStringMap(event.annotations)) {
    throw new ValidationError('annotations must be a string map', 'annotations');
  }
  if (typeof event.startedAt !== 'string' || Number.isNaN(Date.parse(event.startedAt))) {
    throw new ValidationError('startedAt must be a valid timestamp', 'startedAt');
  }

  const supplied = typeof event.fingerprint === 'string' ? event.fingerprint.trim() : '';
  if (supplied !== '') {
    return supplied === event.fingerprint ? event : { ...event, fingerprint: supplied };
  }

  if (Object.keys(event.labels).length === 0) {
    throw new ValidationError('fingerprint is empty and there are no labels to derive one from', 'fingerprint');
  }

  return { ...event, fingerprint: deriveFingerprint(event.labels) };
}

/** Maps a validated webhook alert onto the domain event. */
export function toAlertEvent(input: AlertInput, groupKey?: string): AlertEvent {
  return {
    fingerprint: input.fingerprint ?? '',
    labels: input.labels,
    annotations: input.annotations,
    status: input.status,
    startedAt: input.startsAt,
    endsAt: input.endsAt,
    generatorURL: input.generatorURL,
    groupKey,
  };
}

/**
 * Gates duplicate alert deliveries and dispatches each unique
 * firing alert to the Investigator once per dedup window.
 *
 * Per fingerprint: Unseen → Live(expiresAt) → Expired, where expiry is
 * checked lazily by the cache. A failed dispatch releases the claim so the
 * upstream redelivery can retry it (at-least-once investigation). While a
 * dispatch is in flight the claim stays live, so concurrent duplicates are
 * still suppressed. The release is tied to the claim's token, so a dispatch
 * that outlives its window cannot drop a newer claim on the same fingerprint.
 */
export class AlertIntake {
  private readonly cache: DedupCache;
  private readonly investigator: Investigator;
  private readonly log: BaseLogger;
  private readonly ttlMs: number;

  constructor(deps: AlertIntakeDeps, ttlMs: number = DEFAULT_DEDUP_TTL_MS) {
    this.cache = deps.cache;
    this.investigator = deps.investigator;
    this.log = deps.log;
    this.ttlMs = ttlMs;
  }

  get dedupBackend(): DedupCache['backend'] {
    return this.cache.backend;
  }

  /**
   * Submit one alert.
   *
   * @throws ValidationError when the event is malformed.
   * @throws DispatchFailure when the Investigator could not be reached.
   */
  async submit(event: AlertEvent): Promise<SubmitOutcome> {
    const alert = normalizeAlert(event);
    const { fingerprint } = alert;

    if (alert.status === 'resolved') {
      this.log.debug({ fingerprint }, 'Skipping resolved alert');
      return { outcome: 'deduplicated', fingerprint, reason: 'resolved' };
    }

    const token = await this.cache.claim(fingerprint, this.ttlMs);
    if (token === null) {
      this.log.info({ fingerprint }, 'Skipping duplicate alert');
      return { outcome: 'deduplicated', fingerprint, reason: 'duplicate' };
    }

    this.log.info(
      {
        fingerprint,
        alertname: alert.labels['alertname'] ?? 'Unknown',
        severity: alert.labels['severity'] ?? 'unknown',
        namespace: alert.labels['namespace'] ?? 'unknown',
      },
      'Alert accepted, dispatching investigation',
    );

    const result = await this.dispatch(alert);
    if (!result.ok) {
      await this.releaseClaim(fingerprint, token);
      this.log.error({ fingerprint, reason: result.reason }, 'Investigation dispatch failed');
      throw new DispatchFailure(fingerprint, result.reason);
    }

    this.log.info({ fingerprint }, 'Investigation dispatched');
    return { outcome: 'accepted', fingerprint };
  }

  private async dispatch(alert: AlertEvent): Promise<DispatchResult> {
    try {
      return await this.investigator.dispatch(alert, buildInvestigationInstruction(alert));
    } catch (err: unknown) {
      return { ok: false, reason: err instanceof Error ? err.message : String(err) };
    }
  }

  private async releaseClaim(fingerprint: string, token: string): Promise<void> {
    try {
      await this.cache.release(fingerprint, token);
    } catch (err: unknown) {
      // The claim then lives out its TTL and redeliveries are suppressed until it expires.
      this.log.error({ err, fingerprint }, 'Failed to release dedup claim');
    }
  }
}
