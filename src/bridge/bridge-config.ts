/**
 * Bridge Configuration — transport limits and defaults.
 *
 * Everything the WebSocket bridge needs that is not game tuning.
 */

export interface BridgeConfig {
  port: number;
  host: string;
  maxPayload: number;
  /** Upper bound for a single `tick` request */
  maxTicksPerRequest: number;
}

export const DEFAULT_BRIDGE_CONFIG = {
  port: 9876,
  // Localhost only, no LAN exposure
  host: '127.0.0.1',
  maxPayload: 1_048_576,
  maxTicksPerRequest: 600,
} as const satisfies BridgeConfig;

/**
 * Parse a port from an environment value. Missing → default.
 * Throws on anything that is not an integer in 1-65535.
 */
export function parsePort(raw: string | undefined, fallback: number = DEFAULT_BRIDGE_CONFIG.port): number {
  if (raw === undefined || raw.trim() === '') return fallback;
  const port = Number(raw);
  if (!Number.isInteger(port) || port < 1 || port > 65535) {
    throw new Error(`Invalid port: ${raw}. Must be 1-65535.`);
  }
  return port;
}
