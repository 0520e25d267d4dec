import { describe, it, expect } from 'vitest';
import { PIIMasker } from '../PIIMasker';

describe('PIIMasker', () => {
  const masker = new PIIMasker();

  describe('maskText', () => {
    it('should mask social security numbers', () => {
      expect(masker.maskText('SSN 123-45-6789')).toBe('SSN ***-**-****');
      expect(masker.maskText('SSN 123456789')).toBe('SSN *********');
    });

    it('should mask email addresses', () => {
      expect(masker.maskText('Contact jane@example.com')).toBe('Contact ***@***.***');
    });

    it('should keep only the last four characters of a license number', () => {
      expect(masker.maskText('CDL: D1234567')).toBe('CDL: ****4567');
    });

    it('should redact API key headers', () => {
      expect(masker.maskText('x-api-key: test-secret')).toBe('x-api-key: [REDACTED]');
    });
  });

  describe('maskField', () => {
    it('should redact secrets by field name', () => {
      expect(masker.maskField('apiKey', 'test-secret')).toBe('[REDACTED]');
    });

    it('should mask identifiers to their last four characters', () => {
      expect(masker.maskField('licenseNumber', 'D123-4567')).toBe('****4567');
      expect(masker.maskField('policyNumber', 'AB1')).toBe('****');
    });

    it('should mask SSN fields', () => {
      expect(masker.maskField('ssn', '123 45 6789')).toBe('***-**-6789');
    });

    it('should pass through null and non-string values', () => {
      expect(masker.maskField('licenseNumber', null)).toBeNull();
      expect(masker.maskField('weight', 42000)).toBe(42000);
    });
  });

  describe('maskObject', () => {
    it('should mask nested objects and arrays', () => {
      const masked = masker.maskObject({
        driver: { licenseNumber: 'D1234567', name: 'John' },
        contacts: ['a@b.co'],
      });

      expect(masked).toEqual({
        driver: { licenseNumber: '****4567', name: 'John' },
        contacts: ['***@***.***'],
      });
    });
  });

  it('should report which fields are masked', () => {
    expect(masker.shouldMask('Policy Number')).toBe(true);
    expect(masker.shouldMask('driverName')).toBe(false);
  });
});
