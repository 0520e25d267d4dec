import { isPresent, type ExtractedValue, type FieldDetail, type ScoringTable, type ScoringTier } from './FieldSpec';

const SCORE_PRECISION = 10_000;

export interface ScoreBreakdown {
  confidence: number;
  weighted: number;
  tier: string | null;
  bonuses: number;
}

function roundScore(value: number): number {
  return Math.round(Math.min(1, Math.max(0, value)) * SCORE_PRECISION) / SCORE_PRECISION;
}

function tierSatisfied(tier: ScoringTier, present: ReadonlySet<string>): boolean {
  const groupsMet = tier.requires.every((group) => group.some((field) => present.has(field)));
  return groupsMet && present.size >= (tier.minFields ?? 0);
}

/**
 * Weighted field presence, the first satisfied tier, then bonuses. The
 * result is clamped to [0, 1] and rounded to four decimals.
 */
export class ConfidenceScorer {
  score(
    table: ScoringTable,
    fields: Readonly<Record<string, ExtractedValue>>,
    details: Readonly<Record<string, FieldDetail>>
  ): ScoreBreakdown {
    const present = new Set(Object.keys(fields).filter((name) => isPresent(fields[name])));

    let weighted = 0;
    for (const [field, weight] of Object.entries(table.weights)) {
      if (present.has(field)) {
        weighted += weight;
      }
    }

    let score = weighted;
    const tier = table.tiers.find((candidate) => tierSatisfied(candidate, present)) ?? null;
    if (tier) {
      score = tier.combine === 'max' ? Math.max(score, tier.score) : tier.score;
    }

    let bonuses = 0;

    for (const signalBonus of table.signalBonuses) {
      const signalCount = details[signalBonus.field]?.signalCount ?? 0;
      if (!present.has(signalBonus.field)) {
        continue;
      }
      const best = signalBonus.tiers
        .filter((step) => signalCount >= step.minSignals)
        .reduce((max, step) => Math.max(max, step.bonus), 0);
      bonuses += best;
    }

    for (const qualityBonus of table.qualityBonuses) {
      const detail = details[qualityBonus.field];
      const value = fields[qualityBonus.field] ?? null;
      if (detail && present.has(qualityBonus.field) && qualityBonus.when(value, detail)) {
        bonuses += qualityBonus.bonus;
      }
    }

    return {
      confidence: roundScore(score + bonuses),
      weighted: roundScore(weighted),
      tier: tier?.label ?? null,
      bonuses: roundScore(bonuses),
    };
  }
}

let confidenceScorer: ConfidenceScorer | null = null;

export function getConfidenceScorer(): ConfidenceScorer {
  if (!confidenceScorer) {
    confidenceScorer = new ConfidenceScorer();
  }
  return confidenceScorer;
}
