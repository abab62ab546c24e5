/**
 * Fallback routing across interchangeable providers.
 *
 * The order is static per request type. Open circuits (and, when configured,
 * providers below the minimum health score) are skipped; nothing is ever
 * re-ranked. First success wins.
 */
import type { ProviderName } from '../config.js';
import type { ArtifactProvider } from '../providers/types.js';
import { RetryPolicy } from '../utils/retry.js';
import { createLogger } from '../utils/logger.js';
import { AllProvidersExhaustedError, errorKind, errorMessage, isTransient, type ProviderAttempt } from '../errors.js';
import type { CircuitBreaker, CircuitStatus } from './circuit-breaker.js';
import type { ProviderHealthTracker } from './health.js';

const log = createLogger('router');

export type SkipReason = 'circuit_open' | 'unhealthy';

export interface RoutePlan {
  candidates: string[];
  skipped: { provider: string; reason: SkipReason }[];
}

/** Pure routing decision: same snapshots in, same plan out. */
export function planRoute(
  priority: readonly string[],
  circuits: Readonly<Record<string, CircuitStatus>>,
  health: Readonly<Record<string, number>>,
  minHealthScore: number,
): RoutePlan {
  const plan: RoutePlan = { candidates: [], skipped: [] };
  for (const provider of priority) {
    if (circuits[provider] === 'OPEN') {
      plan.skipped.push({ provider, reason: 'circuit_open' });
    } else if ((health[provider] ?? 1) < minHealthScore) {
      plan.skipped.push({ provider, reason: 'unhealthy' });
    } else {
      plan.candidates.push(provider);
    }
  }
  return plan;
}

export interface RouteResult<Art> {
  artifact: Art;
  provider: ProviderName;
  attempts: ProviderAttempt[];
}

export interface FetchOptions {
  requestType: string;
  /** Identifies the request in call records, e.g. "media_image:aurora". */
  signature: string;
  /** Awaited before the next provider is tried. */
  onAttempt?: (attempt: ProviderAttempt) => void | Promise<void>;
}

export interface FallbackRouterDeps {
  breaker: CircuitBreaker;
  health: ProviderHealthTracker;
  minHealthScore: number;
  maxDelayMs: number;
  sleep?: (ms: number) => Promise<void>;
}

export class FallbackRouter {
  private readonly policies = new Map<ProviderName, RetryPolicy>();

  constructor(private readonly deps: FallbackRouterDeps) {}

  async fetch<Req, Art>(
    providers: readonly ArtifactProvider<Req, Art>[],
    request: Req,
    opts: FetchOptions,
  ): Promise<RouteResult<Art>> {
    const { breaker, health, minHealthScore } = this.deps;
    const names = providers.map((p) => p.name);
    const plan = planRoute(names, breaker.snapshot(names), health.snapshot(names), minHealthScore);
    const attempts: ProviderAttempt[] = [];
    const note = async (a: ProviderAttempt) => {
      attempts.push(a);
      await opts.onAttempt?.(a);
    };

    for (const { provider, reason } of plan.skipped) await note({ provider, outcome: 'skipped', reason, calls: 0 });

    for (const provider of providers) {
      if (!plan.candidates.includes(provider.name)) continue;
      // The snapshot may be stale by now; allow() is the authoritative check.
      if (!(await breaker.allow(provider.name))) {
        await note({ provider: provider.name, outcome: 'skipped', reason: 'circuit_open', calls: 0 });
        continue;
      }

      let calls = 0;
      try {
        const artifact = await this.policyFor(provider).execute(
          (signal) => provider.searchOrGenerate(request, signal),
          {
            isRetryable: (err) => isTransient(err) && !breaker.isOpen(provider.name),
            onAttempt: async ({ succeeded, latencyMs, error }) => {
              calls++;
              health.record(provider.name, { succeeded, latencyMs, requestSignature: opts.signature, error });
              await breaker.report(provider.name, succeeded);
            },
          },
        );

        if (artifact === null) {
          await note({ provider: provider.name, outcome: 'empty', reason: 'no result', calls });
          continue;
        }
        await note({ provider: provider.name, outcome: 'succeeded', calls });
        log.debug('Provider succeeded', { requestType: opts.requestType, provider: provider.name, calls });
        return { artifact, provider: provider.name, attempts };
      } catch (err) {
        log.warn('Provider failed — falling back', {
          requestType: opts.requestType,
          provider: provider.name,
          kind: errorKind(err),
          error: errorMessage(err),
        });
        await note({ provider: provider.name, outcome: 'failed', reason: errorKind(err), calls, error: err });
      }
    }

    throw new AllProvidersExhaustedError(opts.requestType, attempts);
  }

  private policyFor(provider: Pick<ArtifactProvider<unknown, unknown>, 'name' | 'settings'>): RetryPolicy {
    let policy = this.policies.get(provider.name);
    if (!policy) {
      const { maxAttempts, baseDelayMs, timeoutMs } = provider.settings;
      policy = new RetryPolicy({
        maxAttempts,
        baseDelayMs,
        maxDelayMs: this.deps.maxDelayMs,
        attemptTimeoutMs: timeoutMs,
        jitter: true,
        sleep: this.deps.sleep,
        label: provider.name,
      });
      this.policies.set(provider.name, policy);
    }
    return policy;
  }
}
