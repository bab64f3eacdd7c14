/**
 * Log Sanitizer
 *
 * Masks credentials before anything reaches the log stream and
 * neutralises log-injection sequences. Every line is one JSON object.
 */

const SENSITIVE_PATTERNS: Array<{
  pattern: RegExp;
  replacement: string;
  description: string;
}> = [
  {
    pattern: /\b(sk-[a-zA-Z0-9]{20,})\b/g,
    replacement: 'sk-***REDACTED***',
    description: 'Provider API Key',
  },
  {
    pattern: /\beyJ[a-zA-Z0-9_-]*\.eyJ[a-zA-Z0-9_-]*\.[a-zA-Z0-9_-]*\b/g,
    replacement: '***JWT_TOKEN***',
    description: 'JWT Token',
  },
  // Must run after the JWT pattern so signed tokens are not half-masked
  {
    pattern: /(password|passwd|secret|token|api_key|apikey)["']?\s*[:=]\s*["']?(?!\*\*\*|eyJ)([^"'\s,}]{8,})["']?/gi,
    replacement: '$1=***REDACTED***',
    description: 'Secret Assignment',
  },
  {
    pattern: /(Bearer|Basic)\s+[a-zA-Z0-9+/=_-]{20,}/gi,
    replacement: '$1 ***REDACTED***',
    description: 'Authorization Header',
  },
  {
    pattern: /data:image\/[a-z+]+;base64,[A-Za-z0-9+/=]{64,}/g,
    replacement: 'data:image/***BASE64***',
    description: 'Inline image payload',
  },
];

const INJECTION_PATTERNS: Array<{
  pattern: RegExp;
  replacement: string;
}> = [
  { pattern: /\r\n/g, replacement: '\\r\\n' },
  { pattern: /\r/g, replacement: '\\r' },
  { pattern: /\n/g, replacement: '\\n' },
  { pattern: /[\x00-\x08\x0B\x0C\x0E-\x1F\x7F]/g, replacement: '' },
  { pattern: /\x1B\[[0-9;]*[A-Za-z]/g, replacement: '' },
];

const SENSITIVE_KEY_FRAGMENTS = ['password', 'secret', 'token', 'apikey', 'api_key', 'authorization', 'credential'];

/**
 * Mask credentials and strip control sequences from a string
 */
export function sanitize(input: string): string {
  let result = input;

  for (const { pattern, replacement } of SENSITIVE_PATTERNS) {
    result = result.replace(pattern, replacement);
  }

  for (const { pattern, replacement } of INJECTION_PATTERNS) {
    result = result.replace(pattern, replacement);
  }

  return result;
}

/**
 * Recursively sanitize a JSON-like value
 */
export function sanitizeValue(value: unknown, depth = 0): unknown {
  if (depth > 10) {
    return '[MAX_DEPTH_EXCEEDED]';
  }

  if (typeof value === 'string') {
    return sanitize(value);
  }

  if (value instanceof Error) {
    return { name: value.name, message: sanitize(value.message) };
  }

  if (value === null || typeof value !== 'object') {
    return value;
  }

  if (Array.isArray(value)) {
    return value.map((item) => sanitizeValue(item, depth + 1));
  }

  const result: Record<string, unknown> = {};
  for (const [key, entry] of Object.entries(value)) {
    const lowerKey = key.toLowerCase();
    const isSensitiveKey = SENSITIVE_KEY_FRAGMENTS.some((fragment) => lowerKey.includes(fragment));

    if (isSensitiveKey && (typeof entry === 'string' || typeof entry === 'number')) {
      result[key] = '***REDACTED***';
    } else {
      result[key] = sanitizeValue(entry, depth + 1);
    }
  }

  return result;
}

// ============================================================================
// Structured logging
// ============================================================================

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

let minimumLevel: LogLevel = 'info';

/**
 * Set the lowest level that is written. Lines below it are dropped.
 */
export function setLogLevel(level: LogLevel): void {
  minimumLevel = level;
}

function emitLog(level: LogLevel, message: string, context?: Record<string, unknown>): void {
  if (LEVEL_ORDER[level] < LEVEL_ORDER[minimumLevel]) {
    return;
  }

  const sanitizedContext = context ? sanitizeValue(context) : {};
  const structured = {
    timestamp: new Date().toISOString(),
    level,
    message: sanitize(message),
    ...(typeof sanitizedContext === 'object' && sanitizedContext !== null ? sanitizedContext : {}),
  };
  const payload = JSON.stringify(structured);
  if (level === 'error') {
    console.error(payload);
  } else if (level === 'warn') {
    console.warn(payload);
  } else if (level === 'debug') {
    console.debug(payload);
  } else {
    console.log(payload);
  }
}

export const safeLog = {
  debug: (message: string, context?: Record<string, unknown>): void => emitLog('debug', message, context),
  info: (message: string, context?: Record<string, unknown>): void => emitLog('info', message, context),
  warn: (message: string, context?: Record<string, unknown>): void => emitLog('warn', message, context),
  error: (message: string, context?: Record<string, unknown>): void => emitLog('error', message, context),
};

/**
 * Method and path of a request, without the query string
 */
export function getSafeRequestIdentifier(request: Request): string {
  const url = new URL(request.url);
  return `${request.method} ${url.pathname}`;
}
