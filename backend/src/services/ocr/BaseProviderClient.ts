import { SubmitResponseSchema } from '@freight/shared/schemas/ocrWire.zod';
import type {
  JobHandle,
  OcrFile,
  PollOptions,
  PollOutcome,
  ProviderClient,
  SubmitOptions,
} from '../../models/Recognition';
import { AuthenticationError, ProcessingError, ValidationError } from './errors';
import { requestJson, type FetchLike } from './httpClient';

const DEFAULT_REQUEST_TIMEOUT_MS = 30000;
const DEFAULT_MAX_FILE_SIZE_BYTES = 200 * 1024 * 1024;
const UNKNOWN_ERROR = 'Unknown error';

export interface ProviderClientConfig {
  apiKey: string;
  baseUrl: string;
  name?: string;
  requestTimeoutMs?: number;
  maxFileSizeBytes?: number;
  fetchImpl?: FetchLike;
}

function trimTrailingSlash(url: string): string {
  return url.replace(/\/+$/, '');
}

/**
 * Shared submit/poll plumbing for providers speaking the
 * `request_id` + `request_check_url` job protocol. Subclasses supply the
 * endpoint, extra form fields and the completion parser.
 */
export abstract class BaseProviderClient implements ProviderClient {
  readonly name: string;
  protected apiKey: string;
  protected baseUrl: string;
  protected requestTimeoutMs: number;
  protected maxFileSizeBytes: number;
  protected fetchImpl: FetchLike;

  protected abstract readonly endpoint: string;
  protected abstract readonly supportedMimeTypes: ReadonlySet<string>;

  constructor(config: ProviderClientConfig, defaultName: string) {
    this.name = config.name ?? defaultName;

    if (!config.apiKey) {
      throw new AuthenticationError(`API key is required for provider '${this.name}'`, this.name);
    }

    this.apiKey = config.apiKey;
    this.baseUrl = trimTrailingSlash(config.baseUrl);
    this.requestTimeoutMs = config.requestTimeoutMs ?? DEFAULT_REQUEST_TIMEOUT_MS;
    this.maxFileSizeBytes = config.maxFileSizeBytes ?? DEFAULT_MAX_FILE_SIZE_BYTES;
    this.fetchImpl = config.fetchImpl ?? ((input, init) => fetch(input, init));
  }

  supportsMimeType(mimeType: string): boolean {
    return this.supportedMimeTypes.has(mimeType.toLowerCase());
  }

  validate(file: OcrFile, _options: SubmitOptions = {}): void {
    const size = file.content.byteLength;

    if (size === 0) {
      throw new ValidationError('File size must be greater than 0', this.name);
    }

    if (size > this.maxFileSizeBytes) {
      throw new ValidationError(`File size ${size} exceeds maximum ${this.maxFileSizeBytes}`, this.name);
    }

    if (!this.supportsMimeType(file.mimeType)) {
      throw new ValidationError(`Unsupported MIME type: ${file.mimeType}`, this.name);
    }
  }

  protected abstract appendFormFields(form: FormData, options: SubmitOptions): void;

  protected abstract parseCompletion(body: unknown, handle: JobHandle): PollOutcome;

  async submit(file: OcrFile, options: SubmitOptions = {}): Promise<JobHandle> {
    this.validate(file, options);

    const form = new FormData();
    form.append('file', new Blob([file.content], { type: file.mimeType }), file.filename);
    this.appendFormFields(form, options);
    if (options.maxPages !== undefined) {
      form.append('max_pages', String(options.maxPages));
    }

    const submittedAt = Date.now();
    const { body } = await requestJson(`${this.baseUrl}${this.endpoint}`, {
      method: 'POST',
      apiKey: this.apiKey,
      provider: this.name,
      timeoutMs: this.requestTimeoutMs,
      fetchImpl: this.fetchImpl,
      body: form,
      signal: options.signal,
    });

    const parsed = SubmitResponseSchema.safeParse(body);
    if (!parsed.success) {
      throw new ProcessingError('Malformed submit response', this.name);
    }

    const { success, request_id: requestId, request_check_url: checkUrl, error } = parsed.data;

    if (success === false) {
      throw new ProcessingError(`OCR submission failed: ${error ?? UNKNOWN_ERROR}`, this.name);
    }

    if (!requestId || !checkUrl) {
      throw new ProcessingError('No check URL received from API', this.name);
    }

    return { provider: this.name, requestId, checkUrl, submittedAt };
  }

  async poll(handle: JobHandle, options: PollOptions = {}): Promise<PollOutcome> {
    const { body } = await requestJson(handle.checkUrl, {
      method: 'GET',
      apiKey: this.apiKey,
      provider: this.name,
      timeoutMs: this.requestTimeoutMs,
      fetchImpl: this.fetchImpl,
      signal: options.signal,
    });

    return this.parseCompletion(body, handle);
  }

  /**
   * Shared status handling; returns null when the job completed successfully
   * and the subclass should normalize the payload.
   */
  protected interpretStatus(
    status: string,
    success: boolean | null | undefined,
    error: string | null | undefined
  ): PollOutcome | null {
    if (status === 'processing') {
      return { status: 'processing' };
    }

    if (status === 'complete') {
      if (!success) {
        throw new ProcessingError(`OCR processing failed: ${error ?? UNKNOWN_ERROR}`, this.name);
      }
      return null;
    }

    throw new ProcessingError(error ?? `Unexpected status: ${status}`, this.name);
  }
}
