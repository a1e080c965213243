import { CircuitOpenError } from '../errors/ContentErrors';

export type CircuitState = 'CLOSED' | 'OPEN' | 'HALF_OPEN';

export interface BreakerOptions {
  failureThresholdMs?: number;
  maxFailures?: number;
  recoveryTimeoutMs?: number;
}

interface IdentifierState {
  state: CircuitState;
  failures: number[];
  lastOpenedAt?: number;
}

/**
 * Per-identifier circuit breaker for content fetches.
 * - Failure threshold: maxFailures within failureThresholdMs window
 * - States: CLOSED - normal, OPEN - short-circuit, HALF_OPEN - one trial after recoveryTimeoutMs
 */
export class CircuitBreaker {
  private readonly failureThresholdMs: number;
  private readonly maxFailures: number;
  private readonly recoveryTimeoutMs: number;

  private readonly states: Map<string, IdentifierState> = new Map();

  constructor(opts: BreakerOptions = {}) {
    this.failureThresholdMs = opts.failureThresholdMs ?? 60_000;
    this.maxFailures = opts.maxFailures ?? 5;
    this.recoveryTimeoutMs = opts.recoveryTimeoutMs ?? 30_000;
  }

  /**
   * Throws CircuitOpenError if the identifier is OPEN and not yet eligible for a HALF_OPEN trial.
   */
  public beforeCall(identifier: string): void {
    const st = this.states.get(identifier);
    if (!st || st.state !== 'OPEN') return;

    if (st.lastOpenedAt !== undefined && Date.now() - st.lastOpenedAt >= this.recoveryTimeoutMs) {
      st.state = 'HALF_OPEN';
      return;
    }
    throw new CircuitOpenError(identifier);
  }

  public onSuccess(identifier: string): void {
    // Healthy identifiers carry no state
    this.states.delete(identifier);
  }

  /**
   * Track a rolling failure and open the circuit when the threshold is reached.
   */
  public onFailure(identifier: string): void {
    const st = this.ensure(identifier);
    const now = Date.now();
    st.failures.push(now);
    st.failures = st.failures.filter((ts) => now - ts <= this.failureThresholdMs);

    if (st.failures.length >= this.maxFailures || st.state === 'HALF_OPEN') {
      st.state = 'OPEN';
      st.lastOpenedAt = now;
    }
  }

  public getState(identifier: string): CircuitState {
    return this.states.get(identifier)?.state ?? 'CLOSED';
  }

  public reset(): void {
    this.states.clear();
  }

  private ensure(identifier: string): IdentifierState {
    let st = this.states.get(identifier);
    if (!st) {
      st = { state: 'CLOSED', failures: [] };
      this.states.set(identifier, st);
    }
    return st;
  }
}

export default CircuitBreaker;
