/**
 * Escalation Gateway
 *
 * Wraps a text simplifier for cues that stay too short after time borrowing.
 * - Results memoized by (original text, required duration)
 * - Bounded number of concurrent simplifier calls
 * - Retry with exponential backoff + jitter, per-call timeout
 * - Exhausted retries fall back to the original text
 */

import { TimingEscalationError, isCancelled, toError } from '../errors';
import { createLogger } from '../logger';
import { ConcurrencyLimiter } from '../parallelExecutionEngine';
import {
  throwIfCancelled,
  withRetryBackoff,
  withTimeout,
  type RetryPolicy,
} from '../shared/robustUtils';
import { withText, type Cue } from '../../types/dubbing';
import {
  buildContextWindow,
  DEFAULT_CONTEXT_RADIUS,
  type ContextWindow,
  type Simplifier,
} from './simplifierPrompt';

const escalationLog = createLogger('Escalation');

export type SimplifyOutcome =
  | { ok: true; text: string; reason: string }
  | { ok: false; text: string; error: TimingEscalationError };

export interface EscalationTarget {
  /** Position in the cue list handed to `escalateAll` */
  position: number;
  minRequiredMs: number;
}

export interface EscalationRecord {
  cueIndex: number;
  position: number;
  originalText: string;
  outcome: SimplifyOutcome;
}

export interface EscalationResult {
  cues: Cue[];
  records: EscalationRecord[];
}

export interface EscalationGatewayOptions {
  simplifier: Simplifier;
  maxConcurrency: number;
  retry: RetryPolicy;
  timeoutMs: number;
  contextRadius?: number;
  language?: string;
}

export class EscalationGateway {
  private readonly cache = new Map<string, Promise<SimplifyOutcome>>();
  private readonly limiter: ConcurrencyLimiter;
  private calls = 0;
  private cacheHits = 0;

  constructor(private readonly options: EscalationGatewayOptions) {
    this.limiter = new ConcurrencyLimiter(options.maxConcurrency);
  }

  get stats(): { calls: number; cacheHits: number; cached: number } {
    return { calls: this.calls, cacheHits: this.cacheHits, cached: this.cache.size };
  }

  clearCache(): void {
    this.cache.clear();
  }

  /**
   * Ask the simplifier for a shorter rewrite of `cue`.
   * Never rejects for simplifier failures; only cancellation propagates.
   */
  simplify(cue: Cue, context: ContextWindow, minRequiredMs: number, signal?: AbortSignal): Promise<SimplifyOutcome> {
    const key = `${minRequiredMs}\u0000${cue.text}`;
    const existing = this.cache.get(key);
    if (existing) {
      this.cacheHits++;
      return existing;
    }

    const pending = this.limiter.run(() => this.callWithRetry(cue, context, minRequiredMs, signal));
    this.cache.set(key, pending);

    // Only successes stay memoized
    void pending.then(
      outcome => {
        if (!outcome.ok) this.cache.delete(key);
      },
      () => this.cache.delete(key)
    );
    return pending;
  }

  /**
   * Simplify every target cue, dispatched in cue index order.
   * Timing is never touched; only text is replaced on success.
   */
  async escalateAll(cues: readonly Cue[], targets: readonly EscalationTarget[], signal?: AbortSignal): Promise<EscalationResult> {
    const radius = this.options.contextRadius ?? DEFAULT_CONTEXT_RADIUS;
    const ordered = [...targets].sort((a, b) => cues[a.position].index - cues[b.position].index);

    const records = await Promise.all(
      ordered.map(async ({ position, minRequiredMs }): Promise<EscalationRecord> => {
        const cue = cues[position];
        const context = buildContextWindow(cues, position, radius);
        const outcome = await this.simplify(cue, context, minRequiredMs, signal);
        return { cueIndex: cue.index, position, originalText: cue.text, outcome };
      })
    );

    const updated = [...cues];
    for (const record of records) {
      if (record.outcome.ok) {
        updated[record.position] = withText(updated[record.position], record.outcome.text);
      }
    }

    const succeeded = records.filter(r => r.outcome.ok).length;
    escalationLog.info(`Simplified ${succeeded}/${records.length} cues`);
    return { cues: updated, records };
  }

  private async callWithRetry(
    cue: Cue,
    context: ContextWindow,
    minRequiredMs: number,
    signal?: AbortSignal
  ): Promise<SimplifyOutcome> {
    try {
      const response = await withRetryBackoff(
        async () => {
          throwIfCancelled(signal);
          this.calls++;
          const result = await withTimeout(
            this.options.simplifier.simplify({ cue, context, minRequiredMs, language: this.options.language }),
            this.options.timeoutMs,
            `Simplifier call for cue ${cue.index} timed out`
          );
          const text = result.text.trim();
          if (text === '' || text.length >= cue.text.trim().length) {
            throw new Error(`Simplifier returned text that is not shorter for cue ${cue.index}`);
          }
          return { text, reason: result.reason };
        },
        this.options.retry,
        { signal, label: `simplify cue ${cue.index}` }
      );
      return { ok: true, text: response.text, reason: response.reason };
    } catch (thrown) {
      if (isCancelled(thrown)) throw thrown;
      const cause = toError(thrown);
      escalationLog.warn(`Keeping original text for cue ${cue.index}: ${cause.message}`);
      return {
        ok: false,
        text: cue.text,
        error: new TimingEscalationError(`Simplification failed for cue ${cue.index}: ${cause.message}`, cue.index, cause),
      };
    }
  }
}
