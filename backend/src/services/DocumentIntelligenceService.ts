import type { DocumentType } from '@freight/shared/schemas/documentTypes.zod';
import { getSettings, type Settings } from '../config/settings';
import type { ExtractionResult, ImagePreprocessor, SemanticExtractor } from '../models/Extraction';
import type { OcrFile, ProviderClient, RecognitionResult } from '../models/Recognition';
import { logger } from '../utils/logger';
import { DocumentParser, getDocumentParser } from './extraction/DocumentParser';
import type { FailoverStatsSnapshot } from './ocr/FailoverStats';
import type { FetchLike } from './ocr/httpClient';
import { JobPoller } from './ocr/JobPoller';
import { LineOcrClient } from './ocr/LineOcrClient';
import { OcrOrchestrator, preferProviderForDocuments, type RecognizeOptions } from './ocr/OcrOrchestrator';
import { StructureOcrClient } from './ocr/StructureOcrClient';

export interface ProcessDocumentOptions extends RecognizeOptions {
  useSemanticExtraction?: boolean;
  /** Reference time for expiry checks. */
  now?: Date;
}

export interface ProcessedDocument {
  recognition: RecognitionResult;
  extraction: ExtractionResult;
  semantic?: Record<string, unknown>;
  semanticError?: string;
}

export interface DocumentIntelligenceDependencies {
  orchestrator: OcrOrchestrator;
  parser?: DocumentParser;
  preprocessor?: ImagePreprocessor | null;
  semanticExtractor?: SemanticExtractor | null;
}

export class DocumentIntelligenceService {
  private orchestrator: OcrOrchestrator;
  private parser: DocumentParser;
  private preprocessor: ImagePreprocessor | null;
  private semanticExtractor: SemanticExtractor | null;

  constructor(dependencies: DocumentIntelligenceDependencies) {
    this.orchestrator = dependencies.orchestrator;
    this.parser = dependencies.parser ?? getDocumentParser();
    this.preprocessor = dependencies.preprocessor ?? null;
    this.semanticExtractor = dependencies.semanticExtractor ?? null;
  }

  async processDocument(
    content: Uint8Array,
    filename: string,
    mimeType: string,
    documentType: DocumentType,
    options: ProcessDocumentOptions = {}
  ): Promise<ProcessedDocument> {
    const { useSemanticExtraction = false, now, ...recognizeOptions } = options;
    const file = await this.preprocess({ content, filename, mimeType });

    const recognition = await this.orchestrator.recognize(file.content, file.filename, file.mimeType, recognizeOptions);
    const extraction = this.parser.parseRecognition(recognition, documentType, { now });

    logger.info(
      `[Documents] ${filename} as ${documentType}: ${extraction.status} ` +
        `(confidence ${extraction.confidence.toFixed(4)}, provider ${recognition.providerName})`
    );

    if (!useSemanticExtraction || !this.semanticExtractor) {
      return { recognition, extraction };
    }

    try {
      const semantic = await this.semanticExtractor.extract(recognition.fullText, documentType);
      return { recognition, extraction, semantic };
    } catch (error) {
      const semanticError = error instanceof Error ? error.message : String(error);
      logger.warn(`[Documents] Semantic extraction failed for ${filename}:`, semanticError);
      return { recognition, extraction, semanticError };
    }
  }

  /** Falls back to the original file when preprocessing fails. */
  private async preprocess(file: OcrFile): Promise<OcrFile> {
    if (!this.preprocessor) {
      return file;
    }

    try {
      return await this.preprocessor.preprocess(file);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      logger.warn(`[Documents] Preprocessing failed for ${file.filename}, using the original file:`, message);
      return file;
    }
  }

  getStats(): Readonly<FailoverStatsSnapshot> {
    return this.orchestrator.getStats();
  }

  resetStats(): void {
    this.orchestrator.resetStats();
  }
}

export interface ServiceFactoryOptions {
  fetchImpl?: FetchLike;
  poller?: JobPoller;
  preprocessor?: ImagePreprocessor | null;
  semanticExtractor?: SemanticExtractor | null;
}

/** Line provider first, structure provider as the fallback tier. */
export function createProviders(settings: Settings, fetchImpl?: FetchLike): ProviderClient[] {
  const common = {
    baseUrl: settings.ocrBaseUrl,
    requestTimeoutMs: settings.requestTimeoutMs,
    maxFileSizeBytes: settings.maxFileSizeBytes,
    fetchImpl,
  };

  return [
    new LineOcrClient({ ...common, apiKey: settings.ocrApiKey }),
    new StructureOcrClient({
      ...common,
      apiKey: settings.ocrStructureApiKey,
      confidence: settings.structureConfidence,
    }),
  ];
}

export function createDocumentIntelligenceService(
  settings: Settings,
  options: ServiceFactoryOptions = {}
): DocumentIntelligenceService {
  const providers = createProviders(settings, options.fetchImpl);
  const structureProvider = providers[1];

  const poller =
    options.poller ??
    new JobPoller({
      maxPolls: settings.maxPolls,
      pollIntervalMs: settings.pollIntervalMs,
      backoffMultiplier: settings.pollBackoffMultiplier,
      maxIntervalMs: settings.pollMaxIntervalMs,
    });

  const orchestrator = new OcrOrchestrator(
    providers,
    {
      confidenceThreshold: settings.confidenceThreshold,
      failoverEnabled: settings.failoverEnabled,
      sharedCredentials: settings.sharedCredentials,
      mimePreference: settings.preferStructureForDocuments
        ? preferProviderForDocuments(structureProvider.name)
        : null,
      deadlineMs: settings.deadlineMs,
    },
    poller
  );

  return new DocumentIntelligenceService({
    orchestrator,
    preprocessor: options.preprocessor,
    semanticExtractor: options.semanticExtractor,
  });
}

let documentIntelligenceService: DocumentIntelligenceService | null = null;

export function getDocumentIntelligenceService(): DocumentIntelligenceService {
  if (!documentIntelligenceService) {
    documentIntelligenceService = createDocumentIntelligenceService(getSettings());
  }
  return documentIntelligenceService;
}
