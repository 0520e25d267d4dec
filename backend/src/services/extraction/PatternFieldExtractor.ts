import type {
  Candidate,
  CollectFieldSpec,
  ExtractedValue,
  FieldDetail,
  FieldSpec,
  MultiSignalFieldSpec,
  PatternMatch,
  PostProcess,
  ScalarValue,
  SignalsFieldSpec,
} from './FieldSpec';
import { asText } from './postProcessors';

export interface FieldExtraction {
  fields: Record<string, ExtractedValue>;
  extractionDetails: Record<string, FieldDetail>;
}

interface AcceptedMatch {
  match: PatternMatch;
  value: ScalarValue;
}

interface ScoredCandidate extends AcceptedMatch {
  score: number;
}

const NOT_FOUND: FieldDetail = Object.freeze({ found: false, patternIndex: null, patternLabel: null, raw: null });

function toPatternMatch(match: RegExpMatchArray, patternIndex: number): PatternMatch {
  const groups = match.slice(1);
  const text = groups.find((group) => group !== undefined && group.trim() !== '') ?? match[0];
  return { text, groups, raw: match[0], index: match.index ?? 0, patternIndex };
}

/** Every accepted occurrence of one pattern, in text order. */
function* acceptedMatches(text: string, spec: FieldSpec, patternIndex: number): Generator<AcceptedMatch> {
  const pattern = spec.patterns[patternIndex];
  const process: PostProcess = pattern.postProcess ?? spec.postProcess ?? asText;

  for (const raw of text.matchAll(pattern.regex)) {
    if (raw[0] === '') {
      continue;
    }
    const match = toPatternMatch(raw, patternIndex);
    const value = process(match);
    if (value !== null) {
      yield { match, value };
    }
  }
}

/**
 * Precedence, then length, name shape and punctuation. Higher is better.
 */
export function scoreNameCandidate(candidate: Candidate): number {
  const value = String(candidate.value);
  let score = candidate.patternCount - candidate.patternIndex;

  if (value.length <= 20) {
    score += 3;
  } else if (value.length <= 30) {
    score += 1;
  }

  if (/^[A-Z][a-z]+ [A-Z][a-z]+$/.test(value)) {
    score += 5;
  } else if (/^[A-Z][a-z]+$/.test(value)) {
    score += 2;
  }

  const periods = (value.match(/\./g) ?? []).length;
  const commas = (value.match(/,/g) ?? []).length;
  if (periods <= 1 && commas <= 1) {
    score += 1;
  }

  return score;
}

function compareCandidates(a: ScoredCandidate, b: ScoredCandidate): number {
  return (
    b.score - a.score ||
    a.match.patternIndex - b.match.patternIndex ||
    a.match.index - b.match.index ||
    String(a.value).length - String(b.value).length
  );
}

function detailFor(spec: FieldSpec, match: PatternMatch): FieldDetail {
  return {
    found: true,
    patternIndex: match.patternIndex,
    patternLabel: spec.patterns[match.patternIndex].label,
    raw: match.raw,
  };
}

/**
 * Applies ordered pattern lists to normalized text. Pure: the same text
 * and specs always give the same fields, and nothing here throws on
 * unexpected input.
 */
export class PatternFieldExtractor {
  extract(text: string, specs: readonly FieldSpec[]): FieldExtraction {
    const fields: Record<string, ExtractedValue> = {};
    const extractionDetails: Record<string, FieldDetail> = {};

    for (const spec of specs) {
      const [value, detail] = this.extractField(text, spec);
      fields[spec.fieldName] = value;
      extractionDetails[spec.fieldName] = detail;
    }

    return { fields, extractionDetails };
  }

  extractField(text: string, spec: FieldSpec): [ExtractedValue, FieldDetail] {
    if (text.trim() === '') {
      return [null, { ...NOT_FOUND }];
    }

    switch (spec.mode) {
      case 'first-match':
        return this.firstMatch(text, spec);
      case 'multi-signal':
        return this.multiSignal(text, spec);
      case 'signals':
        return this.signals(text, spec);
      case 'collect':
        return this.collect(text, spec);
    }
  }

  private firstMatch(text: string, spec: FieldSpec): [ExtractedValue, FieldDetail] {
    for (let i = 0; i < spec.patterns.length; i++) {
      for (const accepted of acceptedMatches(text, spec, i)) {
        return [accepted.value, detailFor(spec, accepted.match)];
      }
    }
    return [null, { ...NOT_FOUND }];
  }

  private multiSignal(text: string, spec: MultiSignalFieldSpec): [ExtractedValue, FieldDetail] {
    const scorer = spec.scorer ?? scoreNameCandidate;
    const denylist = spec.denylist ?? [];
    const candidates: ScoredCandidate[] = [];

    for (let i = 0; i < spec.patterns.length; i++) {
      for (const accepted of acceptedMatches(text, spec, i)) {
        const lowered = String(accepted.value).toLowerCase();
        if (denylist.some((token) => lowered.includes(token))) {
          continue;
        }

        const score = scorer({
          value: accepted.value,
          patternIndex: i,
          patternCount: spec.patterns.length,
          index: accepted.match.index,
        });
        if (score !== null) {
          candidates.push({ ...accepted, score });
        }
      }
    }

    if (candidates.length === 0) {
      return [null, { ...NOT_FOUND }];
    }

    candidates.sort(compareCandidates);
    const best = candidates[0];

    return [
      best.value,
      {
        ...detailFor(spec, best.match),
        score: best.score,
        candidates: candidates.map(({ value, score }) => ({ value, score })),
      },
    ];
  }

  private signals(text: string, spec: SignalsFieldSpec): [ExtractedValue, FieldDetail] {
    let signalCount = 0;
    let strongHit = false;
    let first: PatternMatch | null = null;

    for (let i = 0; i < spec.patterns.length; i++) {
      const hit = acceptedMatches(text, spec, i).next();
      if (hit.done) {
        continue;
      }

      signalCount++;
      strongHit = strongHit || spec.patterns[i].strong === true;
      first = first ?? hit.value.match;
    }

    if (!first) {
      return [null, { ...NOT_FOUND, signalCount: 0 }];
    }

    const detected = strongHit || signalCount >= spec.minSignals;
    return [detected, { ...detailFor(spec, first), found: detected, signalCount }];
  }

  private collect(text: string, spec: CollectFieldSpec): [ExtractedValue, FieldDetail] {
    const values: string[] = [];
    let first: PatternMatch | null = null;

    for (let i = 0; i < spec.patterns.length && values.length < spec.maxValues; i++) {
      let taken = 0;
      for (const accepted of acceptedMatches(text, spec, i)) {
        if (spec.maxPerPattern !== undefined && taken >= spec.maxPerPattern) {
          break;
        }
        taken++;

        const value = String(accepted.value);
        if (values.includes(value)) {
          continue;
        }

        values.push(value);
        first = first ?? accepted.match;
        if (values.length >= spec.maxValues) {
          break;
        }
      }
    }

    if (!first) {
      return [null, { ...NOT_FOUND }];
    }

    const detail = detailFor(spec, first);
    if (spec.joinWith === undefined) {
      return [values, detail];
    }

    const joined = values.join(spec.joinWith);
    return [spec.maxLength !== undefined ? joined.slice(0, spec.maxLength) : joined, detail];
  }
}

let patternFieldExtractor: PatternFieldExtractor | null = null;

export function getPatternFieldExtractor(): PatternFieldExtractor {
  if (!patternFieldExtractor) {
    patternFieldExtractor = new PatternFieldExtractor();
  }
  return patternFieldExtractor;
}
