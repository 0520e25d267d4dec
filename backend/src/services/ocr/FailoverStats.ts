import type { OcrErrorKind } from './errors';

export interface FailoverCounters {
  totalRequests: number;
  providerSuccess: Record<string, number>;
  confidenceTriggeredFallback: number;
  errorTriggeredFallback: number;
  acceptedWithWarning: number;
  /** Calls where no provider produced an accepted result. */
  bothFailed: number;
  errorsByKind: Partial<Record<OcrErrorKind, number>>;
}

export interface FailoverStatsSnapshot extends FailoverCounters {
  successRate: number;
  fallbackRate: number;
  confidenceThreshold: number;
}

function emptyCounters(): FailoverCounters {
  return {
    totalRequests: 0,
    providerSuccess: {},
    confidenceTriggeredFallback: 0,
    errorTriggeredFallback: 0,
    acceptedWithWarning: 0,
    bothFailed: 0,
    errorsByKind: {},
  };
}

function ratio(part: number, whole: number): number {
  return whole > 0 ? part / whole : 0;
}

/**
 * Counters for one orchestrator instance. Mutations are synchronous;
 * `snapshot()` hands out a frozen copy.
 */
export class FailoverStats {
  private counters: FailoverCounters = emptyCounters();

  recordRequest(): void {
    this.counters.totalRequests++;
  }

  recordSuccess(provider: string): void {
    this.counters.providerSuccess[provider] = (this.counters.providerSuccess[provider] ?? 0) + 1;
  }

  recordConfidenceFallback(): void {
    this.counters.confidenceTriggeredFallback++;
  }

  recordErrorFallback(): void {
    this.counters.errorTriggeredFallback++;
  }

  recordAcceptedWithWarning(): void {
    this.counters.acceptedWithWarning++;
  }

  recordBothFailed(): void {
    this.counters.bothFailed++;
  }

  recordError(kind: OcrErrorKind): void {
    this.counters.errorsByKind[kind] = (this.counters.errorsByKind[kind] ?? 0) + 1;
  }

  snapshot(confidenceThreshold: number): Readonly<FailoverStatsSnapshot> {
    const { totalRequests, providerSuccess, confidenceTriggeredFallback, errorTriggeredFallback } = this.counters;
    const successes = Object.values(providerSuccess).reduce((sum, count) => sum + count, 0);

    return Object.freeze({
      ...this.counters,
      providerSuccess: Object.freeze({ ...providerSuccess }),
      errorsByKind: Object.freeze({ ...this.counters.errorsByKind }),
      successRate: ratio(successes, totalRequests),
      fallbackRate: ratio(confidenceTriggeredFallback + errorTriggeredFallback, totalRequests),
      confidenceThreshold,
    });
  }

  reset(): void {
    this.counters = emptyCounters();
  }
}
