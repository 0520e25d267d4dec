import type { DocumentType, VerificationFlag } from '@freight/shared/schemas/documentTypes.zod';

export type ScalarValue = string | number | boolean;
export type ExtractedValue = ScalarValue | string[] | null;

export type SelectionMode = 'first-match' | 'multi-signal' | 'signals' | 'collect';

export interface FieldPattern {
  label: string;
  /** Must carry the `g` flag; every occurrence is scanned. */
  regex: RegExp;
  /** A single hit is enough to set a `signals` field. */
  strong?: boolean;
  /** Overrides the field's post-processor for this pattern. */
  postProcess?: PostProcess;
}

export interface PatternMatch {
  /** First non-empty capture group, or the whole match when there is none. */
  text: string;
  groups: ReadonlyArray<string | undefined>;
  raw: string;
  index: number;
  patternIndex: number;
}

/** Maps a match to a typed value, or `null` to reject it. */
export type PostProcess = (match: PatternMatch) => ScalarValue | null;

export interface Candidate {
  value: ScalarValue;
  patternIndex: number;
  patternCount: number;
  index: number;
}

/** Returns the candidate's score, or `null` to discard it. */
export type CandidateScorer = (candidate: Candidate) => number | null;

interface BaseFieldSpec {
  fieldName: string;
  patterns: readonly FieldPattern[];
  postProcess?: PostProcess;
}

export interface FirstMatchFieldSpec extends BaseFieldSpec {
  mode: 'first-match';
}

export interface MultiSignalFieldSpec extends BaseFieldSpec {
  mode: 'multi-signal';
  scorer?: CandidateScorer;
  /** Lower-case tokens; a candidate containing any of them is discarded. */
  denylist?: readonly string[];
}

export interface SignalsFieldSpec extends BaseFieldSpec {
  mode: 'signals';
  minSignals: number;
}

export interface CollectFieldSpec extends BaseFieldSpec {
  mode: 'collect';
  maxValues: number;
  maxPerPattern?: number;
  /** Join collected values into one string instead of returning a list. */
  joinWith?: string;
  maxLength?: number;
}

export type FieldSpec = FirstMatchFieldSpec | MultiSignalFieldSpec | SignalsFieldSpec | CollectFieldSpec;

export interface FieldDetail {
  found: boolean;
  patternIndex: number | null;
  patternLabel: string | null;
  raw: string | null;
  score?: number;
  signalCount?: number;
  candidates?: Array<{ value: ScalarValue; score: number }>;
}

export interface ScoringTier {
  label: string;
  /** Every group must have at least one present field. */
  requires: ReadonlyArray<readonly string[]>;
  minFields?: number;
  score: number;
  combine: 'max' | 'replace';
}

export interface SignalBonus {
  field: string;
  tiers: ReadonlyArray<{ minSignals: number; bonus: number }>;
}

export interface QualityBonus {
  field: string;
  bonus: number;
  when: (value: ExtractedValue, detail: FieldDetail) => boolean;
}

export interface ScoringTable {
  weights: Readonly<Record<string, number>>;
  tiers: readonly ScoringTier[];
  signalBonuses: readonly SignalBonus[];
  qualityBonuses: readonly QualityBonus[];
}

export interface ExpiryRule {
  field: string;
  minDaysAhead: number;
}

export interface GateRule {
  flag: VerificationFlag;
  threshold: number;
  /** Each group is satisfied by any one of its fields. */
  required: ReadonlyArray<readonly string[]>;
  expiry?: ExpiryRule;
}

export interface DocumentDefinition {
  documentType: DocumentType;
  fields: readonly FieldSpec[];
  scoring: ScoringTable;
  gate: GateRule;
  /** Apply the shared OCR artifact corrections before extraction. */
  ocrCorrections: boolean;
}

export function isPresent(value: ExtractedValue | undefined): boolean {
  if (value === null || value === undefined || value === false) {
    return false;
  }
  if (typeof value === 'string' || Array.isArray(value)) {
    return value.length > 0;
  }
  return true;
}
