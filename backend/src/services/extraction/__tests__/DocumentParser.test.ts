import { describe, it, expect, beforeEach } from 'vitest';
import { DocumentParser } from '../DocumentParser';
import { FieldSpecStore } from '../FieldSpecStore';
import { buildRecognitionResult } from '../../ocr/recognitionResult';
import type { RecognitionResult } from '../../../models/Recognition';

const NOW = new Date('2025-01-01T00:00:00Z');

function recognitionOf(lines: string[]): RecognitionResult {
  return buildRecognitionResult({
    providerName: 'line-ocr',
    pages: [
      {
        pageNumber: 1,
        lines: lines.map((text, index) => ({
          text,
          confidence: 0.5,
          bbox: [0, index * 10, 100, index * 10 + 8],
          polygon: [
            [0, index * 10],
            [100, index * 10],
            [100, index * 10 + 8],
            [0, index * 10 + 8],
          ],
        })),
      },
    ],
    confidenceSource: 'reported',
    processingTimeMs: 12,
  });
}

describe('DocumentParser', () => {
  let parser: DocumentParser;

  beforeEach(() => {
    parser = new DocumentParser();
  });

  describe('CDL', () => {
    it('should verify a license with a name and a future expiry', () => {
      const result = parser.parse('NAME: JOHN SMITH\nEXP: 12/25/2030\nCLASS: A', 'CDL', { now: NOW });

      expect(result.fields).toEqual({
        driverName: 'John Smith',
        licenseNumber: null,
        expirationDate: '2030-12-25',
        licenseClass: 'A',
        address: null,
        state: null,
      });
      expect(result.confidence).toBe(0.95);
      expect(result.flags).toEqual({ verified: true });
      expect(result.status).toBe('verified');
      expect(result.reasons).toEqual([]);
      expect(result.states).toEqual(['Received', 'TextNormalized', 'FieldsExtracted', 'Scored', 'Verified']);
      expect(result.extractionDetails.driverName.patternLabel).toBe('name-label');
    });

    it('should reject an expired license without lowering its confidence', () => {
      const result = parser.parse('NAME: JOHN SMITH\nEXP: 01/15/2024\nCLASS: A', 'CDL', { now: NOW });

      expect(result.fields.expirationDate).toBe('2024-01-15');
      expect(result.confidence).toBe(0.95);
      expect(result.flags).toEqual({ verified: false });
      expect(result.status).toBe('rejected');
      expect(result.reasons).toEqual(['expirationDate 2024-01-15 is not more than 30 days after 2025-01-01']);
      expect(result.states[result.states.length - 1]).toBe('Rejected');
    });

    it('should reorder a LAST, FIRST name', () => {
      const result = parser.parse('SMITH, JOHN\nEXP: 12/25/2030', 'CDL', { now: NOW });

      expect(result.fields.driverName).toBe('John Smith');
      expect(result.extractionDetails.driverName.patternLabel).toBe('last-comma-first');
    });

    it('should end the name at the next card label', () => {
      const result = parser.parse('NAME: John Smith DOB 01/02/1980\nEXP: 12/25/2030', 'CDL', { now: NOW });

      expect(result.fields.driverName).toBe('John Smith');
      expect(result.extractionDetails.driverName.patternLabel).toBe('name-label');
    });

    it('should ignore birth dates when looking for a bare expiry date', () => {
      const result = parser.parse('DOB: 04/12/1985\nValid through 06/30/2029', 'CDL', { now: NOW });

      expect(result.fields.expirationDate).toBe('2029-06-30');
    });
  });

  describe('malformed input', () => {
    it('should reject empty text with zero confidence', () => {
      const result = parser.parse('', 'CDL', { now: NOW });

      expect(result.confidence).toBe(0);
      expect(result.flags).toEqual({ verified: false });
      expect(result.status).toBe('rejected');
      expect(result.reasons).toEqual([
        'Confidence 0.0000 below threshold 0.9',
        'Missing required field: driverName',
        'Missing required field: expirationDate',
      ]);
      expect(result.states).toEqual(['Received', 'TextNormalized', 'FieldsExtracted', 'Scored', 'Rejected']);
      expect(Object.values(result.fields).every((value) => value === null)).toBe(true);
    });

    it('should return a rejected result for text with no recognizable content', () => {
      const result = parser.parse('%%%% ???? 1234\n\n;;;', 'Agreement', { now: NOW });

      expect(result.confidence).toBe(0);
      expect(result.flags).toEqual({ signed: false });
      expect(result.fields.signatureDetected).toBeNull();
    });
  });

  describe('data shape', () => {
    it('should reject values that do not fit the document schema', () => {
      const custom = new DocumentParser(
        new FieldSpecStore([
          {
            documentType: 'CDL',
            ocrCorrections: false,
            fields: [{ fieldName: 'state', mode: 'first-match', patterns: [{ label: 'state', regex: /State: (\w+)/g }] }],
            scoring: { weights: { state: 1 }, tiers: [], signalBonuses: [], qualityBonuses: [] },
            gate: { flag: 'verified', threshold: 0.5, required: [['state']] },
          },
        ])
      );

      const result = custom.parse('State: Texas', 'CDL', { now: NOW });

      expect(result.confidence).toBe(1);
      expect(result.status).toBe('rejected');
      expect(result.reasons).toContain('Invalid state: Invalid');
    });
  });

  describe('properties', () => {
    it('should give the same result for the same text and clock', () => {
      const text = 'NAME: JOHN SMITH\nEXP: 12/25/2030\nCLASS: A';

      expect(parser.parse(text, 'CDL', { now: NOW })).toEqual(parser.parse(text, 'CDL', { now: NOW }));
    });

    it('should not lower confidence when signature evidence is added', () => {
      const base = 'CARRIER AGREEMENT\nSigned by: John Carter';
      const richer = `${base}\nDate Signed: 03/15/2025\nSignature: ________`;

      const weak = parser.parse(base, 'Agreement', { now: NOW });
      const strong = parser.parse(richer, 'Agreement', { now: NOW });

      expect(weak.confidence).toBe(0.85);
      expect(weak.extractionDetails.signatureDetected.signalCount).toBe(1);
      expect(weak.flags).toEqual({ signed: false });

      expect(strong.extractionDetails.signatureDetected.signalCount).toBe(4);
      expect(strong.confidence).toBe(1);
      expect(strong.confidence).toBeGreaterThanOrEqual(weak.confidence);
      expect(strong.flags).toEqual({ signed: true });
    });
  });

  describe('COI', () => {
    it('should verify a certificate with policy, insurer, limits and dates', () => {
      const text = [
        'CERTIFICATE OF LIABILITY INSURANCE',
        'Insurer A: Progressive Casualty',
        'Policy Number: PGR-88123456',
        'General Liability: $1,000,000',
        'Auto Liability: $2 Million',
        'Effective Date: 01/01/2025',
        'Expiration Date: 01/01/2026',
      ].join('\n');

      const result = parser.parse(text, 'COI', { now: NOW });

      expect(result.fields).toEqual({
        policyNumber: 'PGR-88123456',
        insuranceCompany: 'Progressive Casualty',
        generalLiabilityAmount: 100000000,
        autoLiabilityAmount: 200000000,
        effectiveDate: '2025-01-01',
        expirationDate: '2026-01-01',
      });
      expect(result.confidence).toBe(0.95);
      expect(result.flags).toEqual({ verified: true });
    });
  });

  describe('Agreement', () => {
    it('should read the agreement type in headline case and the signing date', () => {
      const result = parser.parse(
        'CARRIER AGREEMENT\nSigned by: John Carter\nDate Signed: 03/15/2025\nSignature: ________',
        'Agreement',
        { now: NOW }
      );

      expect(result.fields.agreementType).toBe('Carrier Agreement');
      expect(result.fields.signingDate).toBe('2025-03-15');
      expect(result.fields.keyTerms).toBeNull();
    });

    it('should not read separator lines as signature marks', () => {
      const result = parser.parse('CARRIER AGREEMENT\n------------------\nSection 1\n________________', 'Agreement', {
        now: NOW,
      });

      expect(result.fields.signatureDetected).toBeNull();
      expect(result.extractionDetails.signatureDetected.signalCount).toBe(0);
    });

    it('should count a mark drawn on a signing line', () => {
      const result = parser.parse('CARRIER AGREEMENT\nX________\nSigned by: John Carter', 'Agreement', { now: NOW });

      expect(result.fields.signatureDetected).toBe(true);
      expect(result.extractionDetails.signatureDetected.signalCount).toBe(2);
    });
  });

  describe('POD', () => {
    it('should apply OCR corrections and complete a signed delivery', () => {
      const text = [
        'PROOF OF DELIVERY',
        'Del1very confirmed at dock 4',
        'Received by: Maria Lopez',
        'Delivery Date: 03/10/2025',
        'Notes: left at rear loading dock',
        'Signature: M Lopez',
      ].join('\n');

      const result = parser.parse(text, 'POD', { now: NOW });

      expect(result.fields).toEqual({
        deliveryConfirmed: true,
        signaturePresent: true,
        receiverName: 'Maria Lopez',
        deliveryDate: '2025-03-10',
        deliveryNotes: 'left at rear loading dock',
      });
      expect(result.extractionDetails.deliveryConfirmed.patternLabel).toBe('delivery-confirmed');
      expect(result.extractionDetails.signaturePresent.signalCount).toBe(3);
      expect(result.confidence).toBe(1);
      expect(result.flags).toEqual({ completed: true });
    });
  });

  describe('Rate Confirmation', () => {
    it('should pick the line haul rate and the route', () => {
      const text = [
        'RATE CONFIRMATION',
        'Load #44120',
        'From Dallas, TX to Atlanta, GA',
        'Pickup Date: 04/02/2025',
        'Delivery Date: 04/04/2025',
        'Line Haul: $2,450.00',
        'Fuel surcharge $310.00',
        'Weight: 42,000 lbs',
        'Commodity: Frozen poultry',
      ].join('\n');

      const result = parser.parse(text, 'Rate Confirmation', { now: NOW });

      expect(result.fields).toEqual({
        rateAmount: 245000,
        origin: 'Dallas, TX',
        destination: 'Atlanta, GA',
        pickupDate: '2025-04-02',
        deliveryDate: '2025-04-04',
        weight: 42000,
        commodity: 'Frozen poultry',
      });
      expect(result.extractionDetails.rateAmount.patternLabel).toBe('rate-label');
      expect(result.confidence).toBe(0.95);
      expect(result.flags).toEqual({ verified: true });
    });

    it('should reject a confirmation without a route', () => {
      const result = parser.parse('Total: $1,200.00', 'Rate Confirmation', { now: NOW });

      expect(result.fields.rateAmount).toBe(120000);
      expect(result.confidence).toBe(0.6);
      expect(result.reasons).toEqual([
        'Confidence 0.6000 below threshold 0.8',
        'Missing required field: origin',
        'Missing required field: destination',
      ]);
    });
  });

  describe('Invoice', () => {
    it('should read the header, totals and charge lines of a freight invoice', () => {
      const text = [
        'INVOICE',
        'Blue Ridge Freight LLC',
        'Invoice #: INV-2025-0042',
        'Invoice Date: 01/15/2025',
        'Due Date: 02/14/2025',
        'Bill To: Harbor Foods Inc.',
        'Line Haul: $2,450.00',
        'Fuel Surcharge: $310.00',
        'Detention Fee: $150.00',
        'Subtotal: $2,910.00',
        'Tax: $12.50',
        'Total Due: $2,922.50',
        'Payment Terms: Net 30',
      ].join('\n');

      const result = parser.parse(text, 'Invoice', { now: NOW });

      expect(result.fields).toEqual({
        invoiceNumber: 'INV-2025-0042',
        invoiceDate: '2025-01-15',
        dueDate: '2025-02-14',
        vendorName: 'Blue Ridge Freight LLC',
        customerName: 'Harbor Foods Inc.',
        subtotal: 291000,
        taxAmount: 1250,
        totalAmount: 292250,
        paymentTerms: 'Net 30',
        lineItems: ['Line Haul: 2450.00', 'Fuel Surcharge: 310.00', 'Detention Fee: 150.00'],
      });
      expect(result.extractionDetails.vendorName.patternLabel).toBe('company-suffix');
      expect(result.extractionDetails.totalAmount.patternLabel).toBe('grand-total');
      expect(result.confidence).toBe(1);
      expect(result.flags).toEqual({ verified: true });
    });

    it('should not take a date label for the invoice number', () => {
      const result = parser.parse('Invoice Date: 01/15/2025\nInvoice 77812', 'Invoice', { now: NOW });

      expect(result.fields.invoiceNumber).toBe('77812');
      expect(result.extractionDetails.invoiceNumber.patternLabel).toBe('invoice-word');
    });

    it('should reject an invoice with only a number and a total', () => {
      const result = parser.parse('Invoice #: 88123\nTotal: $640.00', 'Invoice', { now: NOW });

      expect(result.fields.invoiceNumber).toBe('88123');
      expect(result.fields.totalAmount).toBe(64000);
      expect(result.fields.lineItems).toBeNull();
      expect(result.extractionDetails.totalAmount.patternLabel).toBe('total-label');
      expect(result.confidence).toBe(0.65);
      expect(result.status).toBe('rejected');
      expect(result.reasons).toEqual(['Confidence 0.6500 below threshold 0.8']);
    });
  });

  describe('parseRecognition', () => {
    it('should parse the recognized text and attach OCR metadata', () => {
      const recognition = recognitionOf(['NAME: JOHN SMITH', 'EXP: 12/25/2030', 'CLASS: A']);

      const result = parser.parseRecognition(recognition, 'CDL', { now: NOW });

      expect(result.fields.driverName).toBe('John Smith');
      expect(result.ocr).toEqual({
        provider: 'line-ocr',
        averageConfidence: 0.5,
        pageCount: 1,
        confidenceSource: 'reported',
        warnings: [],
      });
    });

    it('should fall back to page text when the full text is empty', () => {
      const recognition: RecognitionResult = {
        pages: [
          { pageNumber: 1, text: 'NAME: JOHN SMITH', lines: [], averageConfidence: 0 },
          { pageNumber: 2, text: 'EXP: 12/25/2030', lines: [], averageConfidence: 0 },
        ],
        fullText: '',
        averageConfidence: 0,
        providerName: 'structure-ocr',
        pageCount: 2,
        confidenceSource: 'estimated',
        processingTimeMs: 3,
        warnings: ['Accepted below threshold: confidence 0.000 < 0.5'],
      };

      const result = parser.parseRecognition(recognition, 'CDL', { now: NOW });

      expect(result.fields.expirationDate).toBe('2030-12-25');
      expect(result.status).toBe('verified');
      expect(result.ocr?.warnings).toEqual(['Accepted below threshold: confidence 0.000 < 0.5']);
    });
  });
});
