import { getPIIMasker } from '../services/masking/PIIMasker';

const MASK_PII_DISABLE_VALUE = 'false';
const UNSAFE_LOG_PREFIX = '[UNSAFE]';
const DEFAULT_LOG_LEVEL: LogLevel = 'info';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

const LOG_LEVEL_RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

const masker = getPIIMasker();

function isLogLevel(value: string): value is LogLevel {
  return value in LOG_LEVEL_RANK;
}

function currentLevel(): LogLevel {
  const configured = (process.env.LOG_LEVEL ?? '').trim().toLowerCase();
  return isLogLevel(configured) ? configured : DEFAULT_LOG_LEVEL;
}

function isEnabled(level: LogLevel): boolean {
  return LOG_LEVEL_RANK[level] >= LOG_LEVEL_RANK[currentLevel()];
}

function isMaskingEnabled(): boolean {
  return process.env.MASK_PII !== MASK_PII_DISABLE_VALUE;
}

function maskError(error: Error): { name: string; message: string; stack?: string } {
  return {
    name: error.name,
    message: masker.maskText(error.message),
    stack: error.stack ? masker.maskText(error.stack) : undefined,
  };
}

function maskArg(arg: unknown): unknown {
  if (!isMaskingEnabled()) {
    return arg;
  }

  if (typeof arg === 'string') {
    return masker.maskText(arg);
  }

  if (arg instanceof Error) {
    return maskError(arg);
  }

  if (Array.isArray(arg)) {
    return arg.map(maskArg);
  }

  if (typeof arg === 'object' && arg !== null) {
    return masker.maskObject(Object.fromEntries(Object.entries(arg)));
  }

  return arg;
}

export const logger = {
  log: (...args: unknown[]) => {
    if (!isEnabled('info')) return;
    console.log(...args.map(maskArg));
  },

  info: (...args: unknown[]) => {
    if (!isEnabled('info')) return;
    console.info(...args.map(maskArg));
  },

  error: (...args: unknown[]) => {
    if (!isEnabled('error')) return;
    console.error(...args.map(maskArg));
  },

  warn: (...args: unknown[]) => {
    if (!isEnabled('warn')) return;
    console.warn(...args.map(maskArg));
  },

  debug: (...args: unknown[]) => {
    if (!isEnabled('debug')) return;
    console.debug(...args.map(maskArg));
  },

  unsafe: (...args: unknown[]) => {
    console.log(UNSAFE_LOG_PREFIX, ...args);
  },
};

export { getPIIMasker };
