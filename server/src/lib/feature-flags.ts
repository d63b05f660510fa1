export function envBool(key: string, fallback: boolean): boolean {
  const val = process.env[key];
  if (val === undefined) return fallback;
  return val === '1' || val.toLowerCase() === 'true';
}

/**
 * FF_REDIS_STATE — Persist agent snapshots in Redis instead of JSON files.
 *
 * Requires REDIS_URL to be set. Default: false (file store under MESH_STATE_DIR).
 * Falls back to the file store when the Redis client cannot be created.
 */
export const FF_REDIS_STATE = envBool('FF_REDIS_STATE', false);

/**
 * FF_HTTP_GATEWAY_INJECT — Allow POST /agents/:id/messages on the HTTP gateway.
 *
 * When disabled the gateway is read-only (topology, agent descriptions, failures)
 * and injection requests are rejected with 403.
 */
export const FF_HTTP_GATEWAY_INJECT = envBool('FF_HTTP_GATEWAY_INJECT', true);
