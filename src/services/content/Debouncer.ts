import { ADAPTIVE_THRESHOLDS, DEBOUNCE_DELAYS } from '../../shared/constants';
import { describeError } from '../../shared/security';
import type { DebouncePriority } from '../../shared/types';
import type { OverallDebounceMetrics } from './types';

export type DebounceOutcome<T> =
  | { status: 'fired'; value: T }
  | { status: 'cancelled' }
  | { status: 'failed'; error: unknown };

export interface DebounceOptions {
  delayMs?: number;
}

export interface AdaptiveDebounceOptions {
  minDelayMs?: number;
  maxDelayMs?: number;
  // Links detected by the caller; counted from raw URLs when omitted
  referenceCount?: number;
}

export interface DebounceKeyMetrics {
  attempts: number;
  successes: number;
  errors: number;
  cancellations: number;
  successRate: number; // percent, one decimal
  averageExecutionTimeMs: number;
  lastAttempt?: number;
  lastSuccess?: number;
}

interface KeyCounters {
  attempts: number;
  successes: number;
  errors: number;
  cancellations: number;
  totalExecutionTimeMs: number;
  lastAttempt?: number;
  lastSuccess?: number;
}

interface PendingOperation {
  timer: ReturnType<typeof setTimeout>;
  delayMs: number;
  firesAt: number;
  cancel: () => void;
}

const PRIORITY_DELAYS: Record<DebouncePriority, number> = {
  high: DEBOUNCE_DELAYS.FAST,
  normal: DEBOUNCE_DELAYS.DEFAULT,
  low: DEBOUNCE_DELAYS.SLOW,
};

const round1 = (n: number) => Math.round(n * 10) / 10;

export function countPotentialLinks(text: string): number {
  return text.match(/https?:\/\/\S+/g)?.length ?? 0;
}

/**
 * Delay for a text of `length` characters with `referenceCount` links:
 * floor below SHORT_TEXT, ceiling above LONG_TEXT, linear in between,
 * scaled by REFERENCE_MULTIPLIER past REFERENCE_COUNT links, clamped to [min, max].
 * Non-decreasing in both inputs.
 */
export function computeAdaptiveDelay(
  length: number,
  referenceCount = 0,
  minDelayMs: number = DEBOUNCE_DELAYS.FAST,
  maxDelayMs: number = DEBOUNCE_DELAYS.SLOW
): number {
  const { SHORT_TEXT, LONG_TEXT, REFERENCE_COUNT, REFERENCE_MULTIPLIER } = ADAPTIVE_THRESHOLDS;

  let delay: number;
  if (length < SHORT_TEXT) {
    delay = minDelayMs;
  } else if (length > LONG_TEXT) {
    delay = maxDelayMs;
  } else {
    const ratio = (length - SHORT_TEXT) / (LONG_TEXT - SHORT_TEXT);
    delay = Math.round(minDelayMs + ratio * (maxDelayMs - minDelayMs));
  }

  if (referenceCount > REFERENCE_COUNT) {
    delay = Math.round(delay * REFERENCE_MULTIPLIER);
  }

  return Math.min(maxDelayMs, Math.max(minDelayMs, delay));
}

/**
 * Keyed trailing-edge debouncer. Re-arming a key supersedes its pending timer, and the
 * superseded call resolves as cancelled. Every call resolves; none rejects.
 */
export class Debouncer {
  private readonly pending: Map<string, PendingOperation> = new Map();
  private readonly metrics: Map<string, KeyCounters> = new Map();
  private disposed = false;

  public debounce<T>(key: string, operation: () => Promise<T> | T, options: DebounceOptions = {}): Promise<DebounceOutcome<T>> {
    if (this.disposed) {
      return Promise.resolve<DebounceOutcome<T>>({ status: 'cancelled' });
    }

    this.cancelPending(key);

    const counters = this.countersFor(key);
    counters.attempts++;
    counters.lastAttempt = Date.now();

    const delayMs = Math.max(0, options.delayMs ?? DEBOUNCE_DELAYS.DEFAULT);

    return new Promise<DebounceOutcome<T>>((resolve) => {
      const timer = setTimeout(() => {
        if (this.pending.get(key)?.timer === timer) {
          this.pending.delete(key);
        }
        this.execute(key, counters, operation).then(resolve, (error: unknown) => resolve({ status: 'failed', error }));
      }, delayMs);

      this.pending.set(key, {
        timer,
        delayMs,
        firesAt: Date.now() + delayMs,
        cancel: () => resolve({ status: 'cancelled' }),
      });
    });
  }

  /**
   * Debounce with a delay derived from the size of `text` and how many links it holds.
   */
  public adaptiveDebounce<T>(
    key: string,
    text: string,
    operation: () => Promise<T> | T,
    options: AdaptiveDebounceOptions = {}
  ): Promise<DebounceOutcome<T>> {
    const delayMs = computeAdaptiveDelay(
      text.length,
      options.referenceCount ?? countPotentialLinks(text),
      options.minDelayMs,
      options.maxDelayMs
    );
    return this.debounce(key, operation, { delayMs });
  }

  public priorityDebounce<T>(
    key: string,
    operation: () => Promise<T> | T,
    priority: DebouncePriority
  ): Promise<DebounceOutcome<T>> {
    return this.debounce(key, operation, { delayMs: PRIORITY_DELAYS[priority] });
  }

  public computeAdaptiveDelay(text: string, referenceCount?: number): number {
    return computeAdaptiveDelay(text.length, referenceCount ?? countPotentialLinks(text));
  }

  /**
   * Cancel the pending operation for `key`. Returns false when nothing was pending.
   */
  public cancel(key: string): boolean {
    return this.cancelPending(key);
  }

  public cancelAll(): void {
    for (const key of Array.from(this.pending.keys())) {
      this.cancelPending(key);
    }
  }

  public isPending(key: string): boolean {
    return this.pending.has(key);
  }

  // Milliseconds until the pending operation fires, or null when idle
  public getRemainingTime(key: string): number | null {
    const op = this.pending.get(key);
    if (!op) return null;
    return Math.max(0, op.firesAt - Date.now());
  }

  public getMetrics(key: string): DebounceKeyMetrics | undefined {
    const c = this.metrics.get(key);
    if (!c) return undefined;
    return {
      attempts: c.attempts,
      successes: c.successes,
      errors: c.errors,
      cancellations: c.cancellations,
      successRate: c.attempts === 0 ? 0 : round1((c.successes / c.attempts) * 100),
      averageExecutionTimeMs: c.successes === 0 ? 0 : round1(c.totalExecutionTimeMs / c.successes),
      lastAttempt: c.lastAttempt,
      lastSuccess: c.lastSuccess,
    };
  }

  public getOverallMetrics(): OverallDebounceMetrics {
    let totalAttempts = 0;
    let totalSuccesses = 0;
    let totalErrors = 0;
    let totalCancellations = 0;
    let totalExecutionTime = 0;

    for (const c of this.metrics.values()) {
      totalAttempts += c.attempts;
      totalSuccesses += c.successes;
      totalErrors += c.errors;
      totalCancellations += c.cancellations;
      totalExecutionTime += c.totalExecutionTimeMs;
    }

    return {
      activeOperations: this.pending.size,
      totalOperations: this.metrics.size,
      totalAttempts,
      totalSuccesses,
      totalErrors,
      totalCancellations,
      successRate: totalAttempts === 0 ? 0 : round1((totalSuccesses / totalAttempts) * 100),
      averageExecutionTimeMs: totalSuccesses === 0 ? 0 : round1(totalExecutionTime / totalSuccesses),
    };
  }

  /**
   * Cancel everything pending and forget all metrics. Later calls resolve as cancelled.
   */
  public dispose(): void {
    this.cancelAll();
    this.metrics.clear();
    this.disposed = true;
  }

  // Internal

  private cancelPending(key: string): boolean {
    const op = this.pending.get(key);
    if (!op) return false;
    clearTimeout(op.timer);
    this.pending.delete(key);
    this.countersFor(key).cancellations++;
    op.cancel();
    return true;
  }

  private async execute<T>(key: string, counters: KeyCounters, operation: () => Promise<T> | T): Promise<DebounceOutcome<T>> {
    const startedAt = Date.now();
    try {
      const value = await operation();
      counters.successes++;
      counters.totalExecutionTimeMs += Date.now() - startedAt;
      counters.lastSuccess = Date.now();
      return { status: 'fired', value };
    } catch (error) {
      counters.errors++;
      console.warn(`[Debouncer] Operation failed for key ${key}: ${describeError(error)}`);
      return { status: 'failed', error };
    }
  }

  private countersFor(key: string): KeyCounters {
    let c = this.metrics.get(key);
    if (!c) {
      c = { attempts: 0, successes: 0, errors: 0, cancellations: 0, totalExecutionTimeMs: 0 };
      this.metrics.set(key, c);
    }
    return c;
  }
}

export default Debouncer;
