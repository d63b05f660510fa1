import type { Context } from 'hono';
import logger from './logger.js';

export function rejectOversizedJsonBody(c: Context, maxBytes: number): Response | null {
  const contentLength = c.req.header('content-length');
  if (!contentLength) return null;
  const parsed = Number.parseInt(contentLength, 10);
  if (!Number.isFinite(parsed) || parsed < 0) return null;
  if (parsed <= maxBytes) return null;
  return c.json({ error: `Request too large (max ${maxBytes} bytes)` }, 413);
}

export type JsonBodyParseResult =
  | { ok: true; data: unknown }
  | { ok: false; response: Response };

type BodyReadResult =
  | { ok: true; raw: string }
  | { ok: false; response: Response };

/** Stops reading, and cancels the stream, as soon as the limit is passed. */
async function readUtf8BodyWithLimit(c: Context, maxBytes: number): Promise<BodyReadResult> {
  const req = c.req.raw;
  if (req.bodyUsed) {
    return { ok: false, response: c.json({ error: 'Request body is not readable' }, 400) };
  }

  const stream = req.body;
  if (!stream) return { ok: true, raw: '' };

  const reader = stream.getReader();
  const chunks: Uint8Array[] = [];
  let totalBytes = 0;

  try {
    while (true) {
      const { done, value } = await reader.read();
      if (done) break;
      if (!value) continue;

      totalBytes += value.byteLength;
      if (totalBytes > maxBytes) {
        try {
          await reader.cancel();
        } catch (err) {
          logger.debug({ err: err instanceof Error ? err.message : String(err) }, 'Body guard: cancel failed');
        }
        return {
          ok: false,
          response: c.json({ error: `Request too large (max ${maxBytes} bytes)` }, 413),
        };
      }
      chunks.push(value);
    }
  } catch (err) {
    logger.warn({ err: err instanceof Error ? err.message : String(err) }, 'Body guard: read failed');
    return { ok: false, response: c.json({ error: 'Failed to read request body' }, 400) };
  }

  const merged = new Uint8Array(totalBytes);
  let offset = 0;
  for (const chunk of chunks) {
    merged.set(chunk, offset);
    offset += chunk.byteLength;
  }

  return { ok: true, raw: new TextDecoder().decode(merged) };
}

/**
 * Parse a JSON body with a byte-size guard. Enforced on the bytes actually
 * read, so it holds even when Content-Length is absent or wrong.
 */
export async function parseJsonBodyWithLimit(c: Context, maxBytes: number): Promise<JsonBodyParseResult> {
  const upfront = rejectOversizedJsonBody(c, maxBytes);
  if (upfront) return { ok: false, response: upfront };

  const contentType = c.req.header('content-type')?.toLowerCase() ?? '';
  if (contentType && !contentType.includes('application/json')) {
    return {
      ok: false,
      response: c.json({ error: 'Unsupported content type. Use application/json.' }, 415),
    };
  }

  const read = await readUtf8BodyWithLimit(c, maxBytes);
  if (!read.ok) return read;
  const raw = read.raw;

  if (!raw.trim()) return { ok: true, data: {} };
  try {
    const data: unknown = JSON.parse(raw);
    return { ok: true, data };
  } catch (err) {
    return {
      ok: false,
      response: c.json({ error: 'Invalid JSON body', detail: err instanceof Error ? err.message : String(err) }, 400),
    };
  }
}
