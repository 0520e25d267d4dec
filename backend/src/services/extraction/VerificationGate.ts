import type { VerificationFlag } from '@freight/shared/schemas/documentTypes.zod';
import { isPresent, type ExtractedValue, type GateRule } from './FieldSpec';
import { daysUntil } from './postProcessors';

export interface GateDecision {
  flag: VerificationFlag;
  passed: boolean;
  reasons: string[];
}

/**
 * Decides the business flag. Confidence, required fields and expiry are
 * checked independently and every failed condition is reported.
 */
export class VerificationGate {
  evaluate(
    rule: GateRule,
    confidence: number,
    fields: Readonly<Record<string, ExtractedValue>>,
    now: Date = new Date()
  ): GateDecision {
    const reasons: string[] = [];

    if (confidence < rule.threshold) {
      reasons.push(`Confidence ${confidence.toFixed(4)} below threshold ${rule.threshold}`);
    }

    for (const group of rule.required) {
      if (!group.some((field) => isPresent(fields[field]))) {
        reasons.push(
          group.length === 1 ? `Missing required field: ${group[0]}` : `Missing one of: ${group.join(', ')}`
        );
      }
    }

    if (rule.expiry) {
      const { field, minDaysAhead } = rule.expiry;
      const value = fields[field];

      if (typeof value !== 'string') {
        if (!rule.required.some((group) => group.length === 1 && group[0] === field)) {
          reasons.push(`Missing required field: ${field}`);
        }
      } else if (!(daysUntil(value, now) > minDaysAhead)) {
        reasons.push(`${field} ${value} is not more than ${minDaysAhead} days after ${now.toISOString().slice(0, 10)}`);
      }
    }

    return { flag: rule.flag, passed: reasons.length === 0, reasons };
  }
}

let verificationGate: VerificationGate | null = null;

export function getVerificationGate(): VerificationGate {
  if (!verificationGate) {
    verificationGate = new VerificationGate();
  }
  return verificationGate;
}
