const TRANSIENT_STATUSES = new Set([408, 425, 429, 500, 502, 503, 504, 529]);
const TRANSIENT_ERROR_CODES = new Set([
  'ECONNRESET',
  'ECONNREFUSED',
  'EHOSTUNREACH',
  'ENETUNREACH',
  'ETIMEDOUT',
  'ECONNABORTED',
  'EAI_AGAIN',
  'UND_ERR_CONNECT_TIMEOUT',
  'UND_ERR_HEADERS_TIMEOUT',
  'UND_ERR_BODY_TIMEOUT',
]);
const TRANSIENT_PATTERNS = [
  'rate limit',
  'rate_limit',
  'too many requests',
  'overloaded',
  'temporarily unavailable',
  'socket hang up',
  'fetch failed',
  'network error',
  'service unavailable',
  'gateway timeout',
  'bad gateway',
];

function field(value: unknown, key: string): unknown {
  if (value === null || typeof value !== 'object') return undefined;
  const found: unknown = Reflect.get(value, key);
  return found;
}

function readHeader(headers: unknown, name: string): string | null {
  if (headers instanceof Headers) {
    return headers.get(name);
  }
  if (headers === null || typeof headers !== 'object') return null;
  const entry = Object.entries(headers).find(([k]) => k.toLowerCase() === name.toLowerCase());
  const value: unknown = entry?.[1];
  return typeof value === 'string' ? value : null;
}

function getStatusCode(error: unknown): number | null {
  const status = field(error, 'status') ?? field(error, 'statusCode');
  if (typeof status === 'number') return status;
  const responseStatus = field(field(error, 'response'), 'status');
  return typeof responseStatus === 'number' ? responseStatus : null;
}

function getErrorCode(error: unknown): string | null {
  const code = field(error, 'code');
  return typeof code === 'string' ? code.toUpperCase() : null;
}

/**
 * Whether a completion-service failure is worth another attempt inside the same
 * activation. Aborts (activation deadline or agent removal) are never retried here:
 * they end the activation and the scheduler's own retry policy takes over.
 */
export function isTransient(error: Error, rawError?: unknown): boolean {
  if (error.name === 'AbortError' || error.name === 'TimeoutError') return false;

  const candidate = rawError ?? error;
  const status = getStatusCode(candidate);
  if (status != null) return TRANSIENT_STATUSES.has(status);

  const code = getErrorCode(candidate);
  if (code && TRANSIENT_ERROR_CODES.has(code)) return true;

  const msg = error.message.toLowerCase();
  if (TRANSIENT_PATTERNS.some((p) => msg.includes(p))) return true;

  // Status text embedded in message ("Request failed with status 429")
  return /\b(408|425|429|500|502|503|504|529)\b/.test(msg);
}

/**
 * Retry-After header from an SDK error, in milliseconds (0 when absent).
 */
function getRetryAfterMs(error: unknown): number {
  const retryAfter = readHeader(field(error, 'headers'), 'retry-after')
    ?? readHeader(field(field(error, 'response'), 'headers'), 'retry-after');
  if (!retryAfter) return 0;

  const seconds = parseFloat(retryAfter);
  if (!isNaN(seconds) && seconds > 0) {
    // Cap at 60s to prevent absurd waits
    return Math.min(seconds, 60) * 1000;
  }
  return 0;
}

function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    const timer = setTimeout(done, ms);
    function done() {
      clearTimeout(timer);
      signal?.removeEventListener('abort', done);
      resolve();
    }
    signal?.addEventListener('abort', done, { once: true });
  });
}

export async function withRetry<T>(
  fn: () => Promise<T>,
  options?: {
    maxAttempts?: number;
    baseDelay?: number;
    signal?: AbortSignal;
    onRetry?: (attempt: number, error: Error) => void;
  },
): Promise<T> {
  const maxAttempts = options?.maxAttempts ?? 3;
  const baseDelay = options?.baseDelay ?? 1000;

  let lastError: Error | undefined;

  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    try {
      return await fn();
    } catch (err) {
      lastError = err instanceof Error ? err : new Error(String(err));

      if (attempt >= maxAttempts || options?.signal?.aborted || !isTransient(lastError, err)) {
        throw lastError;
      }

      options?.onRetry?.(attempt, lastError);

      // Prefer server-specified Retry-After delay; fall back to exponential backoff
      const retryAfterMs = getRetryAfterMs(err);
      const delay = retryAfterMs > 0
        ? retryAfterMs
        : baseDelay * Math.pow(2, attempt - 1) * (0.5 + Math.random());
      await sleep(delay, options?.signal);
    }
  }

  throw lastError ?? new Error('withRetry: no attempts made');
}
