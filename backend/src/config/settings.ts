import * as dotenv from 'dotenv';
import { z } from 'zod';

const DEFAULT_BASE_URL = 'https://ocr.example.com/api/v1';
const DEFAULT_CONFIDENCE_THRESHOLD = 0.5;
const DEFAULT_MAX_POLLS = 300;
const DEFAULT_POLL_INTERVAL_MS = 2000;
const DEFAULT_POLL_BACKOFF_MULTIPLIER = 1.5;
const DEFAULT_POLL_MAX_INTERVAL_MS = 10000;
const DEFAULT_REQUEST_TIMEOUT_MS = 30000;
const DEFAULT_MAX_FILE_SIZE_BYTES = 200 * 1024 * 1024;

// Structure provider reports no confidences; these shape the estimate.
const DEFAULT_STRUCTURE_BASE = 0.8;
const DEFAULT_STRUCTURE_RANGE_LOW = 0.7;
const DEFAULT_STRUCTURE_RANGE_SPAN = 0.25;
const DEFAULT_STRUCTURE_FLOOR = 0.5;
const DEFAULT_STRUCTURE_CEILING = 0.95;
const DEFAULT_STRUCTURE_MIN_BLOCK_TEXT_LENGTH = 2;

export interface StructureConfidenceSettings {
  base: number;
  rangeLow: number;
  rangeSpan: number;
  floor: number;
  ceiling: number;
  minBlockTextLength: number;
}

export interface Settings {
  ocrApiKey: string;
  ocrStructureApiKey: string;
  ocrBaseUrl: string;
  confidenceThreshold: number;
  failoverEnabled: boolean;
  preferStructureForDocuments: boolean;
  sharedCredentials: boolean;
  maxPolls: number;
  pollIntervalMs: number;
  pollBackoffMultiplier: number;
  pollMaxIntervalMs: number;
  requestTimeoutMs: number;
  deadlineMs: number | null;
  maxFileSizeBytes: number;
  structureConfidence: StructureConfidenceSettings;
}

export const DEFAULT_STRUCTURE_CONFIDENCE: Readonly<StructureConfidenceSettings> = Object.freeze({
  base: DEFAULT_STRUCTURE_BASE,
  rangeLow: DEFAULT_STRUCTURE_RANGE_LOW,
  rangeSpan: DEFAULT_STRUCTURE_RANGE_SPAN,
  floor: DEFAULT_STRUCTURE_FLOOR,
  ceiling: DEFAULT_STRUCTURE_CEILING,
  minBlockTextLength: DEFAULT_STRUCTURE_MIN_BLOCK_TEXT_LENGTH,
});

const booleanFlag = (defaultValue: boolean) =>
  z
    .enum(['true', 'false', '1', '0'])
    .default(defaultValue ? 'true' : 'false')
    .transform((value) => value === 'true' || value === '1');

const unitInterval = (defaultValue: number) => z.coerce.number().min(0).max(1).default(defaultValue);

const EnvSchema = z.object({
  OCR_API_KEY: z.string().default(''),
  OCR_STRUCTURE_API_KEY: z.string().optional(),
  OCR_BASE_URL: z.string().url().default(DEFAULT_BASE_URL),
  // Out-of-range thresholds are clamped rather than rejected.
  OCR_CONFIDENCE_THRESHOLD: z.coerce
    .number()
    .default(DEFAULT_CONFIDENCE_THRESHOLD)
    .transform((value) => Math.max(0, Math.min(1, value))),
  OCR_FAILOVER_ENABLED: booleanFlag(true),
  OCR_PREFER_STRUCTURE_FOR_DOCUMENTS: booleanFlag(false),
  OCR_SHARED_CREDENTIALS: booleanFlag(false),
  OCR_MAX_POLLS: z.coerce.number().int().positive().default(DEFAULT_MAX_POLLS),
  OCR_POLL_INTERVAL_MS: z.coerce.number().int().nonnegative().default(DEFAULT_POLL_INTERVAL_MS),
  OCR_POLL_BACKOFF_MULTIPLIER: z.coerce.number().min(1).default(DEFAULT_POLL_BACKOFF_MULTIPLIER),
  OCR_POLL_MAX_INTERVAL_MS: z.coerce.number().int().nonnegative().default(DEFAULT_POLL_MAX_INTERVAL_MS),
  OCR_REQUEST_TIMEOUT_MS: z.coerce.number().int().positive().default(DEFAULT_REQUEST_TIMEOUT_MS),
  OCR_DEADLINE_MS: z.coerce.number().int().positive().optional(),
  OCR_MAX_FILE_SIZE_BYTES: z.coerce.number().int().positive().default(DEFAULT_MAX_FILE_SIZE_BYTES),
  STRUCTURE_CONFIDENCE_BASE: unitInterval(DEFAULT_STRUCTURE_BASE),
  STRUCTURE_CONFIDENCE_RANGE_LOW: unitInterval(DEFAULT_STRUCTURE_RANGE_LOW),
  STRUCTURE_CONFIDENCE_RANGE_SPAN: unitInterval(DEFAULT_STRUCTURE_RANGE_SPAN),
  STRUCTURE_CONFIDENCE_FLOOR: unitInterval(DEFAULT_STRUCTURE_FLOOR),
  STRUCTURE_CONFIDENCE_CEILING: unitInterval(DEFAULT_STRUCTURE_CEILING),
  STRUCTURE_CONFIDENCE_MIN_BLOCK_TEXT_LENGTH: z.coerce
    .number()
    .int()
    .nonnegative()
    .default(DEFAULT_STRUCTURE_MIN_BLOCK_TEXT_LENGTH),
});

function formatIssues(error: z.ZodError): string {
  return error.errors.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; ');
}

function emptyToUndefined(env: NodeJS.ProcessEnv): Record<string, string | undefined> {
  const cleaned: Record<string, string | undefined> = {};
  for (const [key, value] of Object.entries(env)) {
    cleaned[key] = value === undefined || value.trim() === '' ? undefined : value.trim();
  }
  return cleaned;
}

/**
 * Builds settings from an environment map. Blank variables fall back to
 * their defaults; malformed ones throw with every offending key listed.
 */
export function loadSettings(env: NodeJS.ProcessEnv = process.env): Settings {
  const parsed = EnvSchema.safeParse(emptyToUndefined(env));

  if (!parsed.success) {
    throw new Error(`Invalid configuration: ${formatIssues(parsed.error)}`);
  }

  const vars = parsed.data;

  return {
    ocrApiKey: vars.OCR_API_KEY,
    ocrStructureApiKey: vars.OCR_STRUCTURE_API_KEY ?? vars.OCR_API_KEY,
    ocrBaseUrl: vars.OCR_BASE_URL.replace(/\/+$/, ''),
    confidenceThreshold: vars.OCR_CONFIDENCE_THRESHOLD,
    failoverEnabled: vars.OCR_FAILOVER_ENABLED,
    preferStructureForDocuments: vars.OCR_PREFER_STRUCTURE_FOR_DOCUMENTS,
    sharedCredentials: vars.OCR_SHARED_CREDENTIALS,
    maxPolls: vars.OCR_MAX_POLLS,
    pollIntervalMs: vars.OCR_POLL_INTERVAL_MS,
    pollBackoffMultiplier: vars.OCR_POLL_BACKOFF_MULTIPLIER,
    pollMaxIntervalMs: vars.OCR_POLL_MAX_INTERVAL_MS,
    requestTimeoutMs: vars.OCR_REQUEST_TIMEOUT_MS,
    deadlineMs: vars.OCR_DEADLINE_MS ?? null,
    maxFileSizeBytes: vars.OCR_MAX_FILE_SIZE_BYTES,
    structureConfidence: {
      base: vars.STRUCTURE_CONFIDENCE_BASE,
      rangeLow: vars.STRUCTURE_CONFIDENCE_RANGE_LOW,
      rangeSpan: vars.STRUCTURE_CONFIDENCE_RANGE_SPAN,
      floor: vars.STRUCTURE_CONFIDENCE_FLOOR,
      ceiling: vars.STRUCTURE_CONFIDENCE_CEILING,
      minBlockTextLength: vars.STRUCTURE_CONFIDENCE_MIN_BLOCK_TEXT_LENGTH,
    },
  };
}

let settings: Settings | null = null;

export function getSettings(): Settings {
  if (!settings) {
    dotenv.config();
    settings = loadSettings(process.env);
  }
  return settings;
}
