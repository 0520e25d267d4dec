import { validateExtraction, type DocumentType, type VerificationFlag } from '@freight/shared/schemas/documentTypes.zod';
import type { ExtractionResult, ParseState } from '../../models/Extraction';
import type { RecognitionResult } from '../../models/Recognition';
import { logger } from '../../utils/logger';
import { ConfidenceScorer, getConfidenceScorer } from './ConfidenceScorer';
import type { ExtractedValue, FieldDetail } from './FieldSpec';
import { FieldSpecStore, getFieldSpecStore } from './FieldSpecStore';
import { PatternFieldExtractor, getPatternFieldExtractor } from './PatternFieldExtractor';
import { TextNormalizer } from './textNormalizer';
import { VerificationGate, getVerificationGate } from './VerificationGate';

export interface ParseOptions {
  /** Reference time for expiry checks. */
  now?: Date;
}

function emptyFields(fieldNames: string[]): Record<string, ExtractedValue> {
  return Object.fromEntries(fieldNames.map((name) => [name, null]));
}

function flagOf(flag: VerificationFlag, value: boolean): ExtractionResult['flags'] {
  const flags: ExtractionResult['flags'] = {};
  flags[flag] = value;
  return flags;
}

/** Field values that do not fit the document's data shape. */
function shapeViolations(documentType: DocumentType, fields: Record<string, ExtractedValue>): string[] {
  const { errors } = validateExtraction(documentType, fields);
  return errors ? errors.errors.map((issue) => `Invalid ${issue.path.join('.')}: ${issue.message}`) : [];
}

/**
 * Runs one document through
 * Received → TextNormalized → FieldsExtracted → Scored → Verified | Rejected.
 * Always returns a result; malformed or empty text ends in `Rejected`.
 */
export class DocumentParser {
  private store: FieldSpecStore;
  private extractor: PatternFieldExtractor;
  private scorer: ConfidenceScorer;
  private gate: VerificationGate;
  private normalizer: TextNormalizer;

  constructor(
    store: FieldSpecStore = getFieldSpecStore(),
    extractor: PatternFieldExtractor = getPatternFieldExtractor(),
    scorer: ConfidenceScorer = getConfidenceScorer(),
    gate: VerificationGate = getVerificationGate()
  ) {
    this.store = store;
    this.extractor = extractor;
    this.scorer = scorer;
    this.gate = gate;
    this.normalizer = new TextNormalizer(store.getCorrections());
  }

  parse(text: string, documentType: DocumentType, options: ParseOptions = {}): ExtractionResult {
    const states: ParseState[] = ['Received'];

    try {
      const definition = this.store.getDefinition(documentType);
      const raw = typeof text === 'string' ? text : '';

      const normalized = this.normalizer.normalize(raw, definition.ocrCorrections);
      states.push('TextNormalized');

      const { fields, extractionDetails } = this.extractor.extract(normalized, definition.fields);
      states.push('FieldsExtracted');

      const confidence =
        normalized.trim() === '' ? 0 : this.scorer.score(definition.scoring, fields, extractionDetails).confidence;
      states.push('Scored');

      const decision = this.gate.evaluate(definition.gate, confidence, fields, options.now);
      const reasons = [...shapeViolations(documentType, fields), ...decision.reasons];
      const passed = reasons.length === 0;
      states.push(passed ? 'Verified' : 'Rejected');

      logger.debug(
        `[Parser] ${documentType}: confidence=${confidence.toFixed(4)} ${decision.flag}=${passed}`,
        reasons
      );

      return {
        documentType,
        fields,
        extractionDetails,
        confidence,
        flags: flagOf(decision.flag, passed),
        status: passed ? 'verified' : 'rejected',
        reasons,
        states,
      };
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      logger.error(`[Parser] ${documentType} extraction failed:`, message);
      return this.failedResult(documentType, states, message);
    }
  }

  /** Parses recognized text and attaches the OCR metadata. */
  parseRecognition(
    recognition: RecognitionResult,
    documentType: DocumentType,
    options: ParseOptions = {}
  ): ExtractionResult {
    const text =
      recognition.fullText ||
      recognition.pages
        .map((page) => page.text)
        .filter((pageText) => pageText !== '')
        .join('\n\n');

    return {
      ...this.parse(text, documentType, options),
      ocr: {
        provider: recognition.providerName,
        averageConfidence: recognition.averageConfidence,
        pageCount: recognition.pageCount,
        confidenceSource: recognition.confidenceSource,
        warnings: [...recognition.warnings],
      },
    };
  }

  private failedResult(documentType: DocumentType, states: ParseState[], message: string): ExtractionResult {
    let fieldNames: string[] = [];
    let flag: ExtractionResult['flags'] = {};

    if (this.store.getSupportedTypes().includes(documentType)) {
      const definition = this.store.getDefinition(documentType);
      fieldNames = definition.fields.map((field) => field.fieldName);
      flag = flagOf(definition.gate.flag, false);
    }

    const extractionDetails: Record<string, FieldDetail> = Object.fromEntries(
      fieldNames.map((name) => [name, { found: false, patternIndex: null, patternLabel: null, raw: null }])
    );

    return {
      documentType,
      fields: emptyFields(fieldNames),
      extractionDetails,
      confidence: 0,
      flags: flag,
      status: 'rejected',
      reasons: [`Extraction failed: ${message}`],
      states: [...states, 'Rejected'],
    };
  }
}

let documentParser: DocumentParser | null = null;

export function getDocumentParser(): DocumentParser {
  if (!documentParser) {
    documentParser = new DocumentParser();
  }
  return documentParser;
}
