const SSN_LENGTH = 9;
const VISIBLE_LAST_CHARS = 4;
const MIN_IDENTIFIER_LENGTH = 6;
const MAX_MASK_DEPTH = 8;

const SSN_MASK_PREFIX = '***-**-';
const SSN_MASK_FALLBACK = '***-**-****';
const IDENTIFIER_MASK_PREFIX = '****';
const IDENTIFIER_MASK_FALLBACK = '****';
const SECRET_MASK = '[REDACTED]';

const SECRET_FIELDS = ['apikey', 'api_key', 'x-api-key', 'authorization', 'password', 'secret', 'token'];
const IDENTIFIER_FIELDS = ['licensenumber', 'license_number', 'policynumber', 'policy_number'];
const SSN_FIELDS = ['ssn'];

const SSN_PATTERN_WITH_DASHES = /\b\d{3}-\d{2}-\d{4}\b/g;
const SSN_PATTERN_NO_DASHES = /\b\d{9}\b/g;
const EMAIL_PATTERN = /\b[A-Za-z0-9._%+-]+@[A-Za-z0-9.-]+\.[A-Za-z]{2,}\b/g;
const API_KEY_HEADER_PATTERN = /(x-api-key["']?\s*[:=]\s*["']?)[^\s"',}]+/gi;
const LICENSE_NUMBER_PATTERN = /\b(DL|LIC(?:ENSE)?|CDL)(\s*(?:NO\.?|NUMBER|#)?\s*[:#]?\s*)((?=[A-Z]*\d)[A-Z0-9]{6,15})\b/gi;

const SSN_MASK_REPLACEMENT = '***-**-****';
const SSN_NUMERIC_MASK_REPLACEMENT = '*********';
const EMAIL_MASK_REPLACEMENT = '***@***.***';

function normalizeFieldName(fieldName: string): string {
  return fieldName.toLowerCase().replace(/\s+/g, '_');
}

function cleanValue(value: string): string {
  return value.replace(/[\s-]/g, '');
}

function extractLastN(value: string, n: number): string {
  return value.slice(-n);
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export class PIIMasker {
  maskField(fieldName: string, value: unknown): unknown {
    if (value === null || value === undefined) {
      return value;
    }

    const name = normalizeFieldName(fieldName);

    if (SECRET_FIELDS.some((field) => name.includes(field))) {
      return SECRET_MASK;
    }

    if (SSN_FIELDS.some((field) => name.includes(field))) {
      return this.maskSsn(String(value));
    }

    if (IDENTIFIER_FIELDS.some((field) => name.includes(field))) {
      return this.maskIdentifier(String(value));
    }

    if (typeof value === 'string') {
      return this.maskText(value);
    }

    return value;
  }

  maskObject(obj: Record<string, unknown>, depth = 0): Record<string, unknown> {
    const masked: Record<string, unknown> = {};

    for (const [key, value] of Object.entries(obj)) {
      if (depth >= MAX_MASK_DEPTH) {
        masked[key] = value;
      } else if (isPlainObject(value)) {
        masked[key] = this.maskObject(value, depth + 1);
      } else if (Array.isArray(value)) {
        masked[key] = value.map((item) =>
          isPlainObject(item) ? this.maskObject(item, depth + 1) : this.maskField(key, item)
        );
      } else {
        masked[key] = this.maskField(key, value);
      }
    }

    return masked;
  }

  private maskSsn(value: string): string {
    const cleaned = cleanValue(value);

    if (cleaned.length === SSN_LENGTH) {
      return `${SSN_MASK_PREFIX}${extractLastN(cleaned, VISIBLE_LAST_CHARS)}`;
    }

    return SSN_MASK_FALLBACK;
  }

  private maskIdentifier(value: string): string {
    const cleaned = cleanValue(value);

    if (cleaned.length < MIN_IDENTIFIER_LENGTH) {
      return IDENTIFIER_MASK_FALLBACK;
    }

    return `${IDENTIFIER_MASK_PREFIX}${extractLastN(cleaned, VISIBLE_LAST_CHARS)}`;
  }

  maskText(text: string): string {
    let masked = text;

    masked = masked.replace(API_KEY_HEADER_PATTERN, `$1${SECRET_MASK}`);
    masked = masked.replace(SSN_PATTERN_WITH_DASHES, SSN_MASK_REPLACEMENT);
    masked = masked.replace(SSN_PATTERN_NO_DASHES, SSN_NUMERIC_MASK_REPLACEMENT);
    masked = masked.replace(
      LICENSE_NUMBER_PATTERN,
      (_match: string, prefix: string, separator: string, id: string) =>
        `${prefix}${separator}${IDENTIFIER_MASK_PREFIX}${extractLastN(id, VISIBLE_LAST_CHARS)}`
    );
    masked = masked.replace(EMAIL_PATTERN, EMAIL_MASK_REPLACEMENT);

    return masked;
  }

  shouldMask(fieldName: string): boolean {
    const name = normalizeFieldName(fieldName);
    return [...SECRET_FIELDS, ...SSN_FIELDS, ...IDENTIFIER_FIELDS].some((field) => name.includes(field));
  }
}

let piiMasker: PIIMasker | null = null;

export function getPIIMasker(): PIIMasker {
  if (!piiMasker) {
    piiMasker = new PIIMasker();
  }
  return piiMasker;
}
