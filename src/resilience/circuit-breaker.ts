/**
 * Per-provider circuit breaker.
 *
 *   CLOSED ──(threshold consecutive failures)──▶ OPEN
 *   OPEN ──(cooldown elapsed, next allow)──▶ HALF_OPEN (one probe)
 *   HALF_OPEN ──success──▶ CLOSED   HALF_OPEN ──failure──▶ OPEN (cooldown restarts)
 *
 * State is shared by every job in the process. Each provider's state is only
 * read-modify-written inside its own mutex slot.
 */
import { KeyedMutex } from '../utils/keyed-mutex.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('circuit');

export type CircuitStatus = 'CLOSED' | 'OPEN' | 'HALF_OPEN';

export interface CircuitState {
  status: CircuitStatus;
  consecutiveFailures: number;
  openedAt: Date | null;
  /** HALF_OPEN only: the single trial call has been handed out. */
  probeInFlight: boolean;
}

export interface CircuitBreakerOptions {
  failureThreshold: number;
  cooldownMs: number;
  now?: () => Date;
}

const closed = (): CircuitState => ({ status: 'CLOSED', consecutiveFailures: 0, openedAt: null, probeInFlight: false });

export class CircuitBreaker {
  private readonly states = new Map<string, CircuitState>();
  private readonly mutex = new KeyedMutex();
  private readonly now: () => Date;

  constructor(private readonly opts: CircuitBreakerOptions) {
    this.now = opts.now ?? (() => new Date());
  }

  /** False means: do not touch the network for this provider right now. */
  allow(provider: string): Promise<boolean> {
    return this.mutex.runExclusive(provider, () => {
      const s = this.slot(provider);
      switch (s.status) {
        case 'CLOSED':
          return true;
        case 'OPEN':
          if (!this.cooledDown(s)) return false;
          s.status = 'HALF_OPEN';
          s.probeInFlight = true;
          log.info('Circuit half-open — sending probe', { provider });
          return true;
        case 'HALF_OPEN':
          if (s.probeInFlight) return false;
          s.probeInFlight = true;
          return true;
      }
    });
  }

  report(provider: string, succeeded: boolean): Promise<CircuitStatus> {
    return this.mutex.runExclusive(provider, () => {
      const s = this.slot(provider);
      if (succeeded) {
        // A late success from a call dispatched before the circuit opened; only the probe may close it.
        if (s.status === 'OPEN') return s.status;
        if (s.status !== 'CLOSED') log.info('Circuit closed', { provider });
        Object.assign(s, closed());
        return s.status;
      }

      s.consecutiveFailures += 1;
      if (s.status === 'HALF_OPEN') {
        this.open(s, provider, 'probe failed');
      } else if (s.status === 'OPEN') {
        s.openedAt = this.now();
      } else if (s.consecutiveFailures >= this.opts.failureThreshold) {
        this.open(s, provider, `${s.consecutiveFailures} consecutive failures`);
      }
      return s.status;
    });
  }

  /** Read-only view. An OPEN circuit whose cooldown has passed reads as HALF_OPEN. */
  state(provider: string): CircuitState {
    const s = this.states.get(provider) ?? closed();
    if (s.status === 'OPEN' && this.cooledDown(s)) return { ...s, status: 'HALF_OPEN', probeInFlight: false };
    return { ...s };
  }

  isOpen(provider: string): boolean {
    return this.state(provider).status === 'OPEN';
  }

  snapshot(providers: readonly string[]): Record<string, CircuitStatus> {
    return Object.fromEntries(providers.map((p) => [p, this.state(p).status]));
  }

  private open(s: CircuitState, provider: string, reason: string): void {
    s.status = 'OPEN';
    s.openedAt = this.now();
    s.probeInFlight = false;
    log.warn('Circuit opened', { provider, reason, cooldownMs: this.opts.cooldownMs });
  }

  private cooledDown(s: CircuitState): boolean {
    return s.openedAt !== null && this.now().getTime() - s.openedAt.getTime() >= this.opts.cooldownMs;
  }

  private slot(provider: string): CircuitState {
    let s = this.states.get(provider);
    if (!s) {
      s = closed();
      this.states.set(provider, s);
    }
    return s;
  }
}
