import type { BaseLogger } from 'pino';
import type { AlertEvent, DispatchResult, Investigator } from '../../domain/index.js';

export interface HttpInvestigatorConfig {
  url: string;
  timeout_ms: number;
  max_retries: number;
}

type AttemptResult =
  | { ok: true }
  | { ok: false; reason: string; transient: boolean };

/**
 * Investigator reached over HTTP.
 *
 * POSTs `{ prompt, alert }` to the configured URL. Each attempt is bounded
 * by `timeout_ms`. Network errors, timeouts and 5xx answers are retried up
 * to `max_retries` times; 4xx answers are not. Never rejects: failures
 * resolve with a reason string for the caller to log and surface.
 */
export class HttpInvestigator implements Investigator {
  private readonly config: HttpInvestigatorConfig;
  private readonly log: BaseLogger;

  constructor(config: HttpInvestigatorConfig, log: BaseLogger) {
    this.config = config;
    this.log = log;
  }

  async dispatch(alert: AlertEvent, instruction: string): Promise<DispatchResult> {
    const attempts = 1 + Math.max(0, this.config.max_retries);
    let last: AttemptResult = { ok: false, reason: 'not attempted', transient: false };

    for (let attempt = 1; attempt <= attempts; attempt++) {
      last = await this.attempt(alert, instruction);
      if (last.ok) return { ok: true };

      this.log.warn(
        { fingerprint: alert.fingerprint, attempt, reason: last.reason, transient: last.transient },
        'Investigator dispatch attempt failed',
      );
      if (!last.transient) break;
    }

    return last.ok ? { ok: true } : { ok: false, reason: last.reason };
  }

  private async attempt(alert: AlertEvent, instruction: string): Promise<AttemptResult> {
    try {
      const response = await fetch(this.config.url, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify({ prompt: instruction, alert }),
        signal: AbortSignal.timeout(this.config.timeout_ms),
      });

      if (response.ok) {
        this.log.debug({ fingerprint: alert.fingerprint, status: response.status }, 'Investigator accepted dispatch');
        return { ok: true };
      }

      return {
        ok: false,
        reason: `Investigator returned HTTP ${response.status}`,
        transient: response.status >= 500,
      };
    } catch (err: unknown) {
      if (err instanceof Error && (err.name === 'TimeoutError' || err.name === 'AbortError')) {
        return { ok: false, reason: `Investigator timed out after ${this.config.timeout_ms}ms`, transient: true };
      }
      return {
        ok: false,
        reason: err instanceof Error ? err.message : String(err),
        transient: true,
      };
    }
  }
}
