import type { RecognitionLine } from '@freight/shared/schemas/documentTypes.zod';
import { LinePollResponseSchema, type WirePage } from '@freight/shared/schemas/ocrWire.zod';
import type { JobHandle, OcrFile, PollOutcome, SubmitOptions } from '../../models/Recognition';
import { BaseProviderClient, type ProviderClientConfig } from './BaseProviderClient';
import { ProcessingError, ValidationError } from './errors';
import {
  buildRecognitionResult,
  clampConfidence,
  toBoundingBox,
  toPolygon,
} from './recognitionResult';

const PROVIDER_NAME = 'line-ocr';
const OCR_ENDPOINT = '/ocr';
const MAX_LANGUAGES = 4;
const EMPTY_BBOX: [number, number, number, number] = [0, 0, 0, 0];

const SUPPORTED_MIME_TYPES: ReadonlySet<string> = new Set([
  'application/pdf',
  'image/png',
  'image/jpeg',
  'image/jpg',
  'image/webp',
  'image/gif',
  'image/tiff',
]);

function toLines(page: WirePage): RecognitionLine[] {
  const lines: RecognitionLine[] = [];

  for (const wireLine of page.text_lines ?? []) {
    const text = (wireLine.text ?? '').trim();
    if (!text) continue;

    const bbox = toBoundingBox(wireLine.bbox) ?? EMPTY_BBOX;
    lines.push({
      text,
      confidence: clampConfidence(wireLine.confidence ?? 0),
      bbox,
      polygon: toPolygon(wireLine.polygon, bbox),
    });
  }

  return lines;
}

/**
 * Client for the line-level OCR endpoint. Every recognized line carries a
 * provider-reported confidence.
 */
export class LineOcrClient extends BaseProviderClient {
  protected readonly endpoint = OCR_ENDPOINT;
  protected readonly supportedMimeTypes = SUPPORTED_MIME_TYPES;

  constructor(config: ProviderClientConfig) {
    super(config, PROVIDER_NAME);
  }

  validate(file: OcrFile, options: SubmitOptions = {}): void {
    super.validate(file, options);

    if (options.languages && options.languages.length > MAX_LANGUAGES) {
      throw new ValidationError(`Maximum ${MAX_LANGUAGES} languages allowed`, this.name);
    }
  }

  protected appendFormFields(form: FormData, options: SubmitOptions): void {
    if (options.languages && options.languages.length > 0) {
      form.append('langs', options.languages.join(','));
    }
  }

  protected parseCompletion(body: unknown, handle: JobHandle): PollOutcome {
    const parsed = LinePollResponseSchema.safeParse(body);
    if (!parsed.success) {
      throw new ProcessingError('Malformed poll response', this.name);
    }

    const { status, success, error, pages } = parsed.data;
    const interim = this.interpretStatus(status, success, error);
    if (interim) {
      return interim;
    }

    const result = buildRecognitionResult({
      providerName: this.name,
      pages: (pages ?? []).map((page, index) => ({
        pageNumber: page.page && page.page > 0 ? page.page : index + 1,
        lines: toLines(page),
      })),
      confidenceSource: 'reported',
      processingTimeMs: Date.now() - handle.submittedAt,
    });

    return { status: 'complete', result };
  }
}
