import type {
  ConfidenceSource,
  RecognitionPage,
} from '@freight/shared/schemas/documentTypes.zod';

export interface OcrFile {
  content: Uint8Array;
  filename: string;
  mimeType: string;
}

export interface SubmitOptions {
  languages?: string[];
  maxPages?: number;
  /** Ask the provider for its most thorough pass (used on the fallback tier). */
  forceOcr?: boolean;
  signal?: AbortSignal;
}

export interface PollOptions {
  signal?: AbortSignal;
}

export interface JobHandle {
  provider: string;
  requestId: string;
  checkUrl: string;
  submittedAt: number;
}

export interface RecognitionResult {
  readonly pages: ReadonlyArray<Readonly<RecognitionPage>>;
  readonly fullText: string;
  readonly averageConfidence: number;
  readonly providerName: string;
  readonly pageCount: number;
  readonly confidenceSource: ConfidenceSource;
  readonly processingTimeMs: number;
  readonly warnings: ReadonlyArray<string>;
}

export type PollOutcome =
  | { status: 'processing' }
  | { status: 'complete'; result: RecognitionResult };

/**
 * Adapter around one OCR provider's asynchronous submit/poll protocol.
 * Implementations hold no per-job state and can be shared across calls.
 */
export interface ProviderClient {
  readonly name: string;

  /**
   * Local precondition check (size, MIME type, options).
   * @throws ValidationError before any network traffic
   */
  validate(file: OcrFile, options?: SubmitOptions): void;

  submit(file: OcrFile, options?: SubmitOptions): Promise<JobHandle>;

  /**
   * One status request. Backoff between calls belongs to the poller.
   */
  poll(handle: JobHandle, options?: PollOptions): Promise<PollOutcome>;
}
