/**
 * Core domain types for inbound alerts.
 *
 * An alert is ephemeral: it is built on receipt, gated by the dedup cache,
 * forwarded to the Investigator and then dropped. Nothing here carries a
 * framework dependency.
 */

export type AlertStatus = 'firing' | 'resolved';

/** Label and annotation maps. Insertion order is preserved for display. */
export type AlertLabels = Record<string, string>;

export interface AlertEvent {
  /** Stable identity of the alert; derived from `labels` when empty. */
  readonly fingerprint: string;
  readonly labels: AlertLabels;
  readonly annotations: AlertLabels;
  readonly status: AlertStatus;
  readonly startedAt: string; // ISO-8601
  readonly endsAt?: string | undefined;
  readonly generatorURL?: string | undefined;
  /** Alertmanager group key of the delivery that carried this alert. */
  readonly groupKey?: string | undefined;
}

export type DedupReason = 'resolved' | 'duplicate';

/**
 * Result of submitting an alert to the intake gate.
 *
 * A deduplicated alert is a defined no-op, not a failure.
 */
export type SubmitOutcome =
  | { readonly outcome: 'accepted'; readonly fingerprint: string }
  | { readonly outcome: 'deduplicated'; readonly fingerprint: string; readonly reason: DedupReason };

/** What the Investigator answered for a single dispatch. */
export type DispatchResult =
  | { readonly ok: true }
  | { readonly ok: false; readonly reason: string };

/**
 * Contract of the external Investigator.
 *
 * Implementations must resolve with a failure result rather than reject.
 */
export interface Investigator {
  dispatch(alert: AlertEvent, instruction: string): Promise<DispatchResult>;
}
