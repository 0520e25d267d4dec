import type { RecognitionLine } from '@freight/shared/schemas/documentTypes.zod';
import {
  StructurePollResponseSchema,
  type StructureBlock,
} from '@freight/shared/schemas/ocrWire.zod';
import { DEFAULT_STRUCTURE_CONFIDENCE, type StructureConfidenceSettings } from '../../config/settings';
import type { JobHandle, PollOutcome, SubmitOptions } from '../../models/Recognition';
import { BaseProviderClient, type ProviderClientConfig } from './BaseProviderClient';
import { ProcessingError } from './errors';
import { buildRecognitionResult, clampConfidence, toBoundingBox, toPolygon } from './recognitionResult';

const PROVIDER_NAME = 'structure-ocr';
const MARKER_ENDPOINT = '/marker';
const OUTPUT_FORMAT = 'json';
const PAGE_BLOCK_TYPE = 'Page';

const SUPPORTED_MIME_TYPES: ReadonlySet<string> = new Set([
  'application/pdf',
  'image/png',
  'image/jpeg',
  'image/jpg',
  'image/webp',
  'image/gif',
  'image/tiff',
  'application/vnd.ms-excel',
  'application/vnd.openxmlformats-officedocument.spreadsheetml.sheet',
  'application/vnd.oasis.opendocument.spreadsheet',
  'application/msword',
  'application/vnd.openxmlformats-officedocument.wordprocessingml.document',
  'application/vnd.oasis.opendocument.text',
  'application/vnd.ms-powerpoint',
  'application/vnd.openxmlformats-officedocument.presentationml.presentation',
  'application/vnd.oasis.opendocument.presentation',
  'text/html',
  'application/epub+zip',
]);

export interface StructureOcrClientConfig extends ProviderClientConfig {
  confidence?: Partial<StructureConfidenceSettings>;
}

export function stripHtml(html: string): string {
  return html
    .replace(/<[^>]+>/g, ' ')
    .replace(/&nbsp;/g, ' ')
    .replace(/&amp;/g, '&')
    .replace(/\s+/g, ' ')
    .trim();
}

function pageBlocks(root: StructureBlock | null | undefined): StructureBlock[] {
  return (root?.children ?? []).filter((child) => child.block_type === PAGE_BLOCK_TYPE);
}

/**
 * Quality estimate for output that carries no confidences: the share of
 * blocks with usable text and geometry, mapped onto a fixed range.
 */
export function estimateStructureConfidence(
  root: StructureBlock | null | undefined,
  settings: StructureConfidenceSettings = DEFAULT_STRUCTURE_CONFIDENCE
): number {
  let totalBlocks = 0;
  let validBlocks = 0;

  for (const page of pageBlocks(root)) {
    for (const block of page.children ?? []) {
      totalBlocks++;
      const text = block.html ? stripHtml(block.html) : '';
      if (toBoundingBox(block.bbox) && text.length > settings.minBlockTextLength) {
        validBlocks++;
      }
    }
  }

  const estimate =
    totalBlocks > 0 ? settings.rangeLow + (validBlocks / totalBlocks) * settings.rangeSpan : settings.base;

  return clampConfidence(Math.min(settings.ceiling, Math.max(settings.floor, estimate)));
}

function toLines(page: StructureBlock, confidence: number): RecognitionLine[] {
  const lines: RecognitionLine[] = [];

  for (const block of page.children ?? []) {
    const text = block.html ? stripHtml(block.html) : '';
    const bbox = toBoundingBox(block.bbox);
    if (!text || !bbox) continue;

    lines.push({ text, confidence, bbox, polygon: toPolygon(block.polygon, bbox) });
  }

  return lines;
}

/**
 * Client for the structure (markup) endpoint. The provider returns a block
 * tree without confidences, so each line receives the document-level
 * estimate and the result is marked `estimated`.
 */
export class StructureOcrClient extends BaseProviderClient {
  protected readonly endpoint = MARKER_ENDPOINT;
  protected readonly supportedMimeTypes = SUPPORTED_MIME_TYPES;
  private confidenceSettings: StructureConfidenceSettings;

  constructor(config: StructureOcrClientConfig) {
    super(config, PROVIDER_NAME);
    this.confidenceSettings = { ...DEFAULT_STRUCTURE_CONFIDENCE, ...config.confidence };
  }

  protected appendFormFields(form: FormData, options: SubmitOptions): void {
    form.append('output_format', OUTPUT_FORMAT);
    if (options.languages && options.languages.length > 0) {
      form.append('langs', options.languages.join(','));
    }
    if (options.forceOcr) {
      form.append('force_ocr', 'true');
    }
  }

  protected parseCompletion(body: unknown, handle: JobHandle): PollOutcome {
    const parsed = StructurePollResponseSchema.safeParse(body);
    if (!parsed.success) {
      throw new ProcessingError('Malformed poll response', this.name);
    }

    const { status, success, error, json } = parsed.data;
    const interim = this.interpretStatus(status, success, error);
    if (interim) {
      return interim;
    }

    const confidence = estimateStructureConfidence(json, this.confidenceSettings);

    const result = buildRecognitionResult({
      providerName: this.name,
      pages: pageBlocks(json).map((page, index) => ({
        pageNumber: index + 1,
        lines: toLines(page, confidence),
      })),
      confidenceSource: 'estimated',
      processingTimeMs: Date.now() - handle.submittedAt,
    });

    return { status: 'complete', result };
  }
}
