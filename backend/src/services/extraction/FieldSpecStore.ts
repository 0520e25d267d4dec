import { z } from 'zod';
import { DocumentTypeEnum, type DocumentType } from '@freight/shared/schemas/documentTypes.zod';
import { deepFreeze } from '../../utils/freeze';
import type { DocumentDefinition, PostProcess, QualityBonus, CandidateScorer } from './FieldSpec';
import type { OcrCorrections } from './textNormalizer';
import { CDL_DEFINITION } from './documents/cdl';
import { COI_DEFINITION } from './documents/coi';
import { AGREEMENT_DEFINITION } from './documents/agreement';
import { POD_DEFINITION } from './documents/pod';
import { RATE_CONFIRMATION_DEFINITION } from './documents/rateConfirmation';
import { INVOICE_DEFINITION } from './documents/invoice';
import ocrCorrectionsJson from './data/ocrCorrections.json';

const unitInterval = z.number().min(0).max(1);
const fieldNames = z.array(z.string().min(1));

const FieldPatternSchema = z.object({
  label: z.string().min(1),
  regex: z.instanceof(RegExp).refine((regex) => regex.global, { message: 'regex must use the g flag' }),
  strong: z.boolean().optional(),
  postProcess: z.custom<PostProcess>((value) => typeof value === 'function').optional(),
});

const BaseFieldSchema = z.object({
  fieldName: z.string().min(1),
  patterns: z.array(FieldPatternSchema).min(1),
  postProcess: z.custom<PostProcess>((value) => typeof value === 'function').optional(),
});

const FieldSpecSchema = z.discriminatedUnion('mode', [
  BaseFieldSchema.extend({ mode: z.literal('first-match') }),
  BaseFieldSchema.extend({
    mode: z.literal('multi-signal'),
    scorer: z.custom<CandidateScorer>((value) => typeof value === 'function').optional(),
    denylist: z.array(z.string().min(1)).optional(),
  }),
  BaseFieldSchema.extend({ mode: z.literal('signals'), minSignals: z.number().int().positive() }),
  BaseFieldSchema.extend({
    mode: z.literal('collect'),
    maxValues: z.number().int().positive(),
    maxPerPattern: z.number().int().positive().optional(),
    joinWith: z.string().optional(),
    maxLength: z.number().int().positive().optional(),
  }),
]);

const DocumentDefinitionSchema = z
  .object({
    documentType: DocumentTypeEnum,
    ocrCorrections: z.boolean(),
    fields: z.array(FieldSpecSchema).min(1),
    scoring: z.object({
      weights: z.record(unitInterval),
      tiers: z.array(
        z.object({
          label: z.string().min(1),
          requires: z.array(fieldNames.min(1)),
          minFields: z.number().int().nonnegative().optional(),
          score: unitInterval,
          combine: z.enum(['max', 'replace']),
        })
      ),
      signalBonuses: z.array(
        z.object({
          field: z.string(),
          tiers: z.array(z.object({ minSignals: z.number().int().positive(), bonus: unitInterval })).min(1),
        })
      ),
      qualityBonuses: z.array(
        z.object({
          field: z.string(),
          bonus: unitInterval,
          when: z.custom<QualityBonus['when']>((value) => typeof value === 'function'),
        })
      ),
    }),
    gate: z.object({
      flag: z.enum(['verified', 'completed', 'signed']),
      threshold: unitInterval,
      required: z.array(fieldNames.min(1)),
      expiry: z.object({ field: z.string(), minDaysAhead: z.number().nonnegative() }).optional(),
    }),
  })
  .superRefine((definition, ctx) => {
    const names = definition.fields.map((field) => field.fieldName);
    const known = new Set(names);

    if (known.size !== names.length) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'field names must be unique' });
    }

    const referenced = [
      ...Object.keys(definition.scoring.weights),
      ...definition.scoring.tiers.flatMap((tier) => tier.requires.flat()),
      ...definition.scoring.signalBonuses.map((bonus) => bonus.field),
      ...definition.scoring.qualityBonuses.map((bonus) => bonus.field),
      ...definition.gate.required.flat(),
      ...(definition.gate.expiry ? [definition.gate.expiry.field] : []),
    ];

    for (const name of referenced) {
      if (!known.has(name)) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: `unknown field referenced: ${name}` });
      }
    }
  });

const OcrCorrectionsSchema = z.record(z.string().min(1), z.string().min(1));

const BUILT_IN_DEFINITIONS: readonly DocumentDefinition[] = [
  CDL_DEFINITION,
  COI_DEFINITION,
  AGREEMENT_DEFINITION,
  POD_DEFINITION,
  RATE_CONFIRMATION_DEFINITION,
  INVOICE_DEFINITION,
];

function formatIssues(error: z.ZodError): string {
  return error.errors.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`).join('; ');
}

export function validateDefinition(definition: DocumentDefinition): void {
  const result = DocumentDefinitionSchema.safeParse(definition);
  if (!result.success) {
    throw new Error(`Invalid field spec for ${definition.documentType}: ${formatIssues(result.error)}`);
  }
}

/**
 * Holds the per-document field, scoring and gate tables. Tables are
 * validated and frozen once at construction and shared afterwards.
 */
export class FieldSpecStore {
  private definitions: Map<DocumentType, DocumentDefinition>;
  private corrections: OcrCorrections;

  constructor(
    definitions: readonly DocumentDefinition[] = BUILT_IN_DEFINITIONS,
    corrections: Record<string, string> = ocrCorrectionsJson
  ) {
    this.definitions = new Map();

    for (const definition of definitions) {
      validateDefinition(definition);
      if (this.definitions.has(definition.documentType)) {
        throw new Error(`Duplicate field spec for ${definition.documentType}`);
      }
      this.definitions.set(definition.documentType, deepFreeze(definition));
    }

    const parsed = OcrCorrectionsSchema.safeParse(corrections);
    if (!parsed.success) {
      throw new Error(`Invalid OCR corrections: ${formatIssues(parsed.error)}`);
    }
    this.corrections = deepFreeze({ ...parsed.data });
  }

  getDefinition(documentType: DocumentType): DocumentDefinition {
    const definition = this.definitions.get(documentType);
    if (!definition) {
      throw new Error(`Unknown document type: ${documentType}`);
    }
    return definition;
  }

  getCorrections(): OcrCorrections {
    return this.corrections;
  }

  getFieldNames(documentType: DocumentType): string[] {
    return this.getDefinition(documentType).fields.map((field) => field.fieldName);
  }

  getSupportedTypes(): DocumentType[] {
    return Array.from(this.definitions.keys());
  }
}

let fieldSpecStore: FieldSpecStore | null = null;

export function getFieldSpecStore(): FieldSpecStore {
  if (!fieldSpecStore) {
    fieldSpecStore = new FieldSpecStore();
  }
  return fieldSpecStore;
}
