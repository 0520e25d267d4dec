export { loadSettings, getSettings, type Settings } from './config/settings';

export type { OcrFile, ProviderClient, RecognitionResult, SubmitOptions } from './models/Recognition';
export type {
  ExtractionResult,
  ImagePreprocessor,
  OcrMetadata,
  ParseState,
  SemanticExtractor,
} from './models/Extraction';

export {
  OcrError,
  AuthenticationError,
  RateLimitError,
  ProcessingError,
  TimeoutError,
  TransportError,
  ValidationError,
  UnifiedRecognitionError,
  type ProviderFailure,
} from './services/ocr/errors';
export { LineOcrClient } from './services/ocr/LineOcrClient';
export { StructureOcrClient, estimateStructureConfidence } from './services/ocr/StructureOcrClient';
export { JobPoller, type PollerConfig } from './services/ocr/JobPoller';
export { FailoverStats, type FailoverStatsSnapshot } from './services/ocr/FailoverStats';
export {
  OcrOrchestrator,
  preferProviderForDocuments,
  type OrchestratorConfig,
  type RecognizeOptions,
} from './services/ocr/OcrOrchestrator';

export { PatternFieldExtractor } from './services/extraction/PatternFieldExtractor';
export { ConfidenceScorer } from './services/extraction/ConfidenceScorer';
export { VerificationGate, type GateDecision } from './services/extraction/VerificationGate';
export { FieldSpecStore, validateDefinition } from './services/extraction/FieldSpecStore';
export { DocumentParser, getDocumentParser, type ParseOptions } from './services/extraction/DocumentParser';
export type { DocumentDefinition, FieldSpec, ExtractedValue } from './services/extraction/FieldSpec';

export {
  DocumentIntelligenceService,
  createDocumentIntelligenceService,
  getDocumentIntelligenceService,
  type ProcessDocumentOptions,
  type ProcessedDocument,
} from './services/DocumentIntelligenceService';
