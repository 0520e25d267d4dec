import { z } from 'zod';

// ============================================================
// Enums
// ============================================================

export const DocumentTypeEnum = z.enum([
  'CDL',
  'COI',
  'Agreement',
  'POD',
  'Rate Confirmation',
  'Invoice',
]);

export const VerificationFlagEnum = z.enum(['verified', 'completed', 'signed']);

export const ParseStatusEnum = z.enum(['verified', 'rejected']);

export const ConfidenceSourceEnum = z.enum(['reported', 'estimated']);

// ============================================================
// Supporting Types
// ============================================================

const IsoDateSchema = z.string().regex(/^\d{4}-\d{2}-\d{2}$/);
const CentsSchema = z.number().int().nonnegative();

export const BoundingBoxSchema = z.tuple([z.number(), z.number(), z.number(), z.number()]);

export const PolygonSchema = z.array(z.tuple([z.number(), z.number()]));

export const RecognitionLineSchema = z.object({
  text: z.string().min(1),
  confidence: z.number().min(0).max(1),
  bbox: BoundingBoxSchema,
  polygon: PolygonSchema,
});

export const RecognitionPageSchema = z.object({
  pageNumber: z.number().int().positive(),
  text: z.string(),
  lines: z.array(RecognitionLineSchema),
  averageConfidence: z.number().min(0).max(1),
});

// ============================================================
// Document Type-Specific Extraction Schemas
// ============================================================

export const CdlSchema = z.object({
  driverName: z.string().nullable(),
  licenseNumber: z.string().regex(/^[A-Z0-9-]{5,20}$/).nullable(),
  expirationDate: IsoDateSchema.nullable(),
  licenseClass: z.enum(['A', 'B', 'C']).nullable(),
  address: z.string().nullable(),
  state: z.string().regex(/^[A-Z]{2}$/).nullable(),
});

export const CertificateOfInsuranceSchema = z.object({
  policyNumber: z.string().nullable(),
  insuranceCompany: z.string().nullable(),
  generalLiabilityAmount: CentsSchema.nullable(),
  autoLiabilityAmount: CentsSchema.nullable(),
  effectiveDate: IsoDateSchema.nullable(),
  expirationDate: IsoDateSchema.nullable(),
});

export const AgreementSchema = z.object({
  signatureDetected: z.boolean().nullable(),
  signingDate: IsoDateSchema.nullable(),
  agreementType: z.string().nullable(),
  keyTerms: z.array(z.string()).nullable(),
});

export const ProofOfDeliverySchema = z.object({
  deliveryConfirmed: z.boolean().nullable(),
  signaturePresent: z.boolean().nullable(),
  receiverName: z.string().nullable(),
  deliveryDate: IsoDateSchema.nullable(),
  deliveryNotes: z.string().max(500).nullable(),
});

export const RateConfirmationSchema = z.object({
  rateAmount: CentsSchema.nullable(),
  origin: z.string().nullable(),
  destination: z.string().nullable(),
  pickupDate: IsoDateSchema.nullable(),
  deliveryDate: IsoDateSchema.nullable(),
  weight: z.number().int().positive().nullable(),
  commodity: z.string().nullable(),
});

export const InvoiceSchema = z.object({
  invoiceNumber: z.string().regex(/^[A-Z0-9_-]{3,20}$/).nullable(),
  invoiceDate: IsoDateSchema.nullable(),
  dueDate: IsoDateSchema.nullable(),
  vendorName: z.string().nullable(),
  customerName: z.string().nullable(),
  subtotal: CentsSchema.nullable(),
  taxAmount: CentsSchema.nullable(),
  totalAmount: CentsSchema.positive().nullable(),
  paymentTerms: z.string().nullable(),
  lineItems: z.array(z.string()).max(20).nullable(),
});

// ============================================================
// Type Guards and Utilities
// ============================================================

export type DocumentType = z.infer<typeof DocumentTypeEnum>;
export type VerificationFlag = z.infer<typeof VerificationFlagEnum>;
export type ParseStatus = z.infer<typeof ParseStatusEnum>;
export type ConfidenceSource = z.infer<typeof ConfidenceSourceEnum>;

export type BoundingBox = z.infer<typeof BoundingBoxSchema>;
export type Polygon = z.infer<typeof PolygonSchema>;
export type RecognitionLine = z.infer<typeof RecognitionLineSchema>;
export type RecognitionPage = z.infer<typeof RecognitionPageSchema>;

export type Cdl = z.infer<typeof CdlSchema>;
export type CertificateOfInsurance = z.infer<typeof CertificateOfInsuranceSchema>;
export type Agreement = z.infer<typeof AgreementSchema>;
export type ProofOfDelivery = z.infer<typeof ProofOfDeliverySchema>;
export type RateConfirmation = z.infer<typeof RateConfirmationSchema>;
export type Invoice = z.infer<typeof InvoiceSchema>;

/**
 * Get the extraction schema for a specific document type
 */
export function getSchemaForType(type: DocumentType): z.ZodTypeAny {
  switch (type) {
    case 'CDL':
      return CdlSchema;
    case 'COI':
      return CertificateOfInsuranceSchema;
    case 'Agreement':
      return AgreementSchema;
    case 'POD':
      return ProofOfDeliverySchema;
    case 'Rate Confirmation':
      return RateConfirmationSchema;
    case 'Invoice':
      return InvoiceSchema;
    default:
      throw new Error(`Unknown document type: ${type}`);
  }
}

/**
 * Validate extracted data against document type schema
 */
export function validateExtraction(
  type: DocumentType,
  data: unknown
): { success: boolean; errors?: z.ZodError } {
  const schema = getSchemaForType(type);
  const result = schema.safeParse(data);

  if (result.success) {
    return { success: true };
  } else {
    return { success: false, errors: result.error };
  }
}
