import type {
  JobHandle,
  OcrFile,
  ProviderClient,
  RecognitionResult,
  SubmitOptions,
} from '../../models/Recognition';
import { logger } from '../../utils/logger';
import { TimeoutError, TransportError } from './errors';

const DEFAULT_MAX_POLLS = 300;
const DEFAULT_POLL_INTERVAL_MS = 2000;
const DEFAULT_BACKOFF_MULTIPLIER = 1.5;
const DEFAULT_MAX_INTERVAL_MS = 10000;

export type Sleep = (ms: number, signal?: AbortSignal) => Promise<void>;

export interface PollerConfig {
  maxPolls: number;
  pollIntervalMs: number;
  backoffMultiplier: number;
  maxIntervalMs: number;
}

export const DEFAULT_POLLER_CONFIG: Readonly<PollerConfig> = Object.freeze({
  maxPolls: DEFAULT_MAX_POLLS,
  pollIntervalMs: DEFAULT_POLL_INTERVAL_MS,
  backoffMultiplier: DEFAULT_BACKOFF_MULTIPLIER,
  maxIntervalMs: DEFAULT_MAX_INTERVAL_MS,
});

/** Resolves after `ms`, or early when `signal` aborts. Never rejects. */
export const timerSleep: Sleep = (ms, signal) =>
  new Promise((resolve) => {
    if (signal?.aborted) {
      resolve();
      return;
    }
    const onAbort = () => {
      clearTimeout(timeoutId);
      resolve();
    };
    const timeoutId = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });

export function nextInterval(current: number, config: PollerConfig): number {
  return Math.min(current * config.backoffMultiplier, config.maxIntervalMs);
}

function deadlineError(provider: string): TimeoutError {
  return new TimeoutError('OCR processing cancelled: deadline exceeded', provider);
}

/**
 * Drives a provider job to completion: repeated polls with geometric backoff,
 * bounded by an attempt ceiling and an optional abort signal.
 */
export class JobPoller {
  private config: PollerConfig;
  private sleep: Sleep;

  constructor(config: Partial<PollerConfig> = {}, sleep: Sleep = timerSleep) {
    this.config = { ...DEFAULT_POLLER_CONFIG, ...config };
    this.sleep = sleep;
  }

  async run(client: ProviderClient, file: OcrFile, options: SubmitOptions = {}): Promise<RecognitionResult> {
    const handle = await client.submit(file, options);
    logger.debug(`[${client.name}] submitted job ${handle.requestId}`);
    return this.waitForResult(client, handle, options.signal);
  }

  async waitForResult(client: ProviderClient, handle: JobHandle, signal?: AbortSignal): Promise<RecognitionResult> {
    let interval = this.config.pollIntervalMs;

    for (let attempt = 1; attempt <= this.config.maxPolls; attempt++) {
      if (signal?.aborted) {
        throw deadlineError(client.name);
      }

      try {
        const outcome = await client.poll(handle, { signal });
        if (outcome.status === 'complete') {
          logger.debug(`[${client.name}] job ${handle.requestId} complete after ${attempt} poll(s)`);
          return outcome.result;
        }
      } catch (error) {
        if (signal?.aborted) {
          throw deadlineError(client.name);
        }
        // Only connection-level failures are retried within the poll budget.
        if (!(error instanceof TransportError) || attempt === this.config.maxPolls) {
          throw error;
        }
        logger.warn(`[${client.name}] poll ${attempt} failed, retrying: ${error.message}`);
      }

      if (attempt < this.config.maxPolls) {
        await this.sleep(interval, signal);
        interval = nextInterval(interval, this.config);
      }
    }

    throw new TimeoutError(
      `OCR processing timed out after ${this.config.maxPolls} polling attempts`,
      client.name
    );
  }
}
