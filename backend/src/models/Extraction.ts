import type {
  DocumentType,
  ParseStatus,
  VerificationFlag,
} from '@freight/shared/schemas/documentTypes.zod';
import type { ExtractedValue, FieldDetail } from '../services/extraction/FieldSpec';
import type { OcrFile } from './Recognition';

export type ParseState = 'Received' | 'TextNormalized' | 'FieldsExtracted' | 'Scored' | 'Verified' | 'Rejected';

export interface OcrMetadata {
  provider: string;
  averageConfidence: number;
  pageCount: number;
  confidenceSource: 'reported' | 'estimated';
  warnings: string[];
}

export interface ExtractionResult {
  documentType: DocumentType;
  fields: Record<string, ExtractedValue>;
  extractionDetails: Record<string, FieldDetail>;
  confidence: number;
  /** Exactly one key: the flag this document type gates. */
  flags: Partial<Record<VerificationFlag, boolean>>;
  status: ParseStatus;
  reasons: string[];
  /** States visited, ending in `Verified` or `Rejected`. */
  states: ParseState[];
  ocr?: OcrMetadata;
}

/**
 * External semantic extractor (for example an LLM tool call). Receives the
 * recognized text verbatim.
 */
export interface SemanticExtractor {
  extract(fullText: string, documentType: DocumentType): Promise<Record<string, unknown>>;
}

/** External pixel-level cleanup run before recognition. */
export interface ImagePreprocessor {
  preprocess(file: OcrFile): Promise<OcrFile>;
}
