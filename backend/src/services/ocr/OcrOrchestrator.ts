import type {
  OcrFile,
  ProviderClient,
  RecognitionResult,
  SubmitOptions,
} from '../../models/Recognition';
import { logger } from '../../utils/logger';
import {
  AuthenticationError,
  UnifiedRecognitionError,
  ValidationError,
  toProviderFailure,
  type ProviderFailure,
} from './errors';
import { FailoverStats, type FailoverStatsSnapshot } from './FailoverStats';
import { JobPoller } from './JobPoller';
import { clampConfidence, withWarnings } from './recognitionResult';

const DEFAULT_CONFIDENCE_THRESHOLD = 0.5;

export const DOCUMENT_MIME_TYPES: ReadonlySet<string> = new Set([
  'application/pdf',
  'application/msword',
  'application/vnd.openxmlformats-officedocument.wordprocessingml.document',
  'application/vnd.ms-powerpoint',
  'application/vnd.openxmlformats-officedocument.presentationml.presentation',
]);

/** Returns the name of the provider that should go first for a MIME type. */
export type MimePreference = (mimeType: string) => string | null;

export function preferProviderForDocuments(providerName: string): MimePreference {
  return (mimeType) => (DOCUMENT_MIME_TYPES.has(mimeType.toLowerCase()) ? providerName : null);
}

export interface OrchestratorConfig {
  confidenceThreshold?: number;
  failoverEnabled?: boolean;
  /** Providers share one credential, so an auth failure is final. */
  sharedCredentials?: boolean;
  mimePreference?: MimePreference | null;
  deadlineMs?: number | null;
}

export interface RecognizeOptions {
  languages?: string[];
  maxPages?: number;
  /** Skip the primary provider and go straight to the fallback tier. */
  forceFallback?: boolean;
  deadlineMs?: number;
  signal?: AbortSignal;
}

function createDeadline(
  deadlineMs: number | null | undefined,
  parent?: AbortSignal
): { signal: AbortSignal | undefined; dispose: () => void } {
  if (!deadlineMs) {
    return { signal: parent, dispose: () => undefined };
  }

  const controller = new AbortController();
  const timeoutId = setTimeout(() => controller.abort(), deadlineMs);
  const onParentAbort = () => controller.abort();

  if (parent?.aborted) {
    controller.abort();
  }
  parent?.addEventListener('abort', onParentAbort, { once: true });

  return {
    signal: controller.signal,
    dispose: () => {
      clearTimeout(timeoutId);
      parent?.removeEventListener('abort', onParentAbort);
    },
  };
}

function lowConfidenceWarning(result: RecognitionResult, threshold: number): string {
  return `Accepted below threshold: confidence ${result.averageConfidence.toFixed(3)} < ${threshold}`;
}

/**
 * Tries the preferred OCR provider and fails over to the next one on a hard
 * error or a result below the confidence threshold. At most two providers
 * are attempted per call, strictly one after the other.
 */
export class OcrOrchestrator {
  private providers: ProviderClient[];
  private poller: JobPoller;
  private stats = new FailoverStats();
  private confidenceThreshold: number;
  private failoverEnabled: boolean;
  private sharedCredentials: boolean;
  private mimePreference: MimePreference | null;
  private deadlineMs: number | null;

  constructor(providers: ProviderClient[], config: OrchestratorConfig = {}, poller: JobPoller = new JobPoller()) {
    if (providers.length === 0) {
      throw new Error('OcrOrchestrator requires at least one provider');
    }

    this.providers = [...providers];
    this.poller = poller;
    this.confidenceThreshold = clampConfidence(config.confidenceThreshold ?? DEFAULT_CONFIDENCE_THRESHOLD);
    this.failoverEnabled = config.failoverEnabled ?? true;
    this.sharedCredentials = config.sharedCredentials ?? false;
    this.mimePreference = config.mimePreference ?? null;
    this.deadlineMs = config.deadlineMs ?? null;
  }

  getConfidenceThreshold(): number {
    return this.confidenceThreshold;
  }

  getStats(): Readonly<FailoverStatsSnapshot> {
    return this.stats.snapshot(this.confidenceThreshold);
  }

  resetStats(): void {
    this.stats.reset();
  }

  async recognize(
    content: Uint8Array,
    filename: string,
    mimeType: string,
    options: RecognizeOptions = {}
  ): Promise<RecognitionResult> {
    const file: OcrFile = { content, filename, mimeType };
    const submitOptions: SubmitOptions = { languages: options.languages, maxPages: options.maxPages };
    const candidates = this.selectProviders(file, submitOptions);

    this.stats.recordRequest();

    const deadline = createDeadline(options.deadlineMs ?? this.deadlineMs, options.signal);
    try {
      if (options.forceFallback && candidates.length > 1) {
        logger.info(`[OCR] Forced fallback to ${candidates[1].name} for ${filename}`);
        return await this.attemptFinal(candidates[1], file, submitOptions, deadline.signal, null, []);
      }
      return await this.attemptWithFailover(candidates, file, submitOptions, deadline.signal);
    } finally {
      deadline.dispose();
    }
  }

  private selectProviders(file: OcrFile, options: SubmitOptions): ProviderClient[] {
    const preferred = this.mimePreference?.(file.mimeType) ?? null;
    const ordered = preferred
      ? [
          ...this.providers.filter((provider) => provider.name === preferred),
          ...this.providers.filter((provider) => provider.name !== preferred),
        ]
      : this.providers;

    const accepted: ProviderClient[] = [];
    const rejections: string[] = [];

    for (const provider of ordered) {
      try {
        provider.validate(file, options);
        accepted.push(provider);
      } catch (error) {
        if (!(error instanceof ValidationError)) {
          throw error;
        }
        rejections.push(`${provider.name}: ${error.message}`);
      }
    }

    if (accepted.length === 0) {
      throw new ValidationError(`No OCR provider accepts ${file.filename} (${rejections.join('; ')})`);
    }

    return accepted;
  }

  private canFailover(error: unknown): boolean {
    if (!this.failoverEnabled) {
      return false;
    }
    return !(error instanceof AuthenticationError && this.sharedCredentials);
  }

  private async attemptWithFailover(
    candidates: ProviderClient[],
    file: OcrFile,
    options: SubmitOptions,
    signal: AbortSignal | undefined
  ): Promise<RecognitionResult> {
    const primary = candidates[0];
    const secondary: ProviderClient | undefined = candidates[1];
    const failures: ProviderFailure[] = [];
    let primaryResult: RecognitionResult;

    try {
      primaryResult = await this.poller.run(primary, file, { ...options, signal });
    } catch (error) {
      const failure = this.recordFailure(error, primary.name);
      failures.push(failure);

      // Deadline: surface the timeout as-is.
      if (signal?.aborted) {
        throw error;
      }

      if (!secondary || !this.canFailover(error)) {
        this.stats.recordBothFailed();
        const reason = !secondary
          ? 'no fallback provider is configured'
          : this.failoverEnabled
            ? 'credentials are shared with the fallback provider'
            : 'fallback is disabled';
        throw new UnifiedRecognitionError(`${primary.name} failed and ${reason}: ${failure.message}`, failures);
      }

      logger.warn(`[OCR] ${primary.name} failed (${failure.kind}), falling back to ${secondary.name}`);
      this.stats.recordErrorFallback();
      return this.attemptFinal(secondary, file, options, signal, null, failures);
    }

    if (primaryResult.averageConfidence >= this.confidenceThreshold) {
      this.stats.recordSuccess(primary.name);
      return primaryResult;
    }

    if (!secondary || !this.failoverEnabled) {
      logger.warn(
        `[OCR] ${primary.name} confidence ${primaryResult.averageConfidence.toFixed(3)} below ${this.confidenceThreshold}, accepting with warning`
      );
      this.stats.recordSuccess(primary.name);
      this.stats.recordAcceptedWithWarning();
      return withWarnings(primaryResult, [lowConfidenceWarning(primaryResult, this.confidenceThreshold)]);
    }

    logger.info(
      `[OCR] ${primary.name} confidence ${primaryResult.averageConfidence.toFixed(3)} below ${this.confidenceThreshold}, trying ${secondary.name}`
    );
    this.stats.recordConfidenceFallback();
    return this.attemptFinal(secondary, file, options, signal, primaryResult, failures);
  }

  /**
   * Last tier: any successful result is returned as-is. On failure the
   * primary's low-confidence result wins over an error when one exists.
   */
  private async attemptFinal(
    provider: ProviderClient,
    file: OcrFile,
    options: SubmitOptions,
    signal: AbortSignal | undefined,
    primaryResult: RecognitionResult | null,
    failures: ProviderFailure[]
  ): Promise<RecognitionResult> {
    try {
      const result = await this.poller.run(provider, file, { ...options, forceOcr: true, signal });
      this.stats.recordSuccess(provider.name);
      return result;
    } catch (error) {
      const failure = this.recordFailure(error, provider.name);
      this.stats.recordBothFailed();

      if (primaryResult) {
        logger.warn(`[OCR] ${provider.name} failed (${failure.kind}), returning low-confidence ${primaryResult.providerName} result`);
        return withWarnings(primaryResult, [
          lowConfidenceWarning(primaryResult, this.confidenceThreshold),
          `Fallback provider ${provider.name} failed: ${failure.message}`,
        ]);
      }

      const allFailures = [...failures, failure];
      throw new UnifiedRecognitionError(
        `All OCR providers failed: ${allFailures.map((f) => `${f.provider}: ${f.message}`).join('; ')}`,
        allFailures
      );
    }
  }

  private recordFailure(error: unknown, provider: string): ProviderFailure {
    const failure = toProviderFailure(error, provider);
    this.stats.recordError(failure.kind);
    logger.error(`[OCR] ${provider} error:`, failure.message);
    return failure;
  }
}
