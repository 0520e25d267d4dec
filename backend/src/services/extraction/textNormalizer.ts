export type OcrCorrections = Readonly<Record<string, string>>;

interface CompiledCorrection {
  pattern: RegExp;
  replacement: string;
}

function escapeRegex(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

function matchCase(original: string, replacement: string): string {
  if (original === original.toUpperCase() && original !== original.toLowerCase()) {
    return replacement.toUpperCase();
  }
  if (/^[A-Z]/.test(original)) {
    return replacement.charAt(0).toUpperCase() + replacement.slice(1);
  }
  return replacement;
}

/**
 * Line-ending and whitespace cleanup plus optional whole-token OCR
 * corrections. Replacements keep the casing of the text they replace.
 */
export class TextNormalizer {
  private corrections: CompiledCorrection[];

  constructor(corrections: OcrCorrections = {}) {
    this.corrections = Object.entries(corrections).map(([error, replacement]) => ({
      pattern: new RegExp(`(?<![A-Za-z0-9])${escapeRegex(error)}(?![A-Za-z0-9])`, 'gi'),
      replacement,
    }));
  }

  normalize(text: string, applyCorrections: boolean): string {
    let normalized = text
      .replace(/\r\n?/g, '\n')
      .replace(/\u00a0/g, ' ')
      .split('\n')
      .map((line) => line.trimEnd())
      .join('\n');

    if (applyCorrections) {
      for (const { pattern, replacement } of this.corrections) {
        normalized = normalized.replace(pattern, (original) => matchCase(original, replacement));
      }
    }

    return normalized;
  }
}
