export const DEFAULT_BASE_URL = 'https://api.stability.ai';
export const DEFAULT_GENERATION_TIMEOUT_MS = 120000; // generation is synchronous and takes several seconds
export const DEFAULT_BALANCE_TIMEOUT_MS = 30000;

export interface Fast3dConfig {
  readonly apiKey?: string;
  readonly baseUrl: string;
  readonly generationTimeoutMs: number;
  readonly balanceTimeoutMs: number;
}

type Environment = Record<string, string | undefined>;

function readTimeout(env: Environment, name: string, fallback: number): number {
  const raw = env[name]?.trim();
  if (!raw) {
    return fallback;
  }

  const parsed = Number(raw);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    console.warn(`[Fast3D] Ignoring invalid ${name}="${raw}"; using ${fallback}ms.`);
    return fallback;
  }
  return parsed;
}

/**
 * Read the server configuration from the environment.
 *
 * Called once at startup; the result is handed to the API client and never
 * re-read. A missing API key is not an error here.
 */
export function loadConfig(env: Environment = process.env): Fast3dConfig {
  const apiKey = (env.STABILITY_API_KEY ?? '').trim();
  const baseUrl = (env.STABILITY_API_BASE_URL ?? '').trim().replace(/\/+$/, '');

  return Object.freeze({
    ...(apiKey.length > 0 ? { apiKey } : {}),
    baseUrl: baseUrl.length > 0 ? baseUrl : DEFAULT_BASE_URL,
    generationTimeoutMs: readTimeout(env, 'FAST3D_GENERATION_TIMEOUT_MS', DEFAULT_GENERATION_TIMEOUT_MS),
    balanceTimeoutMs: readTimeout(env, 'FAST3D_BALANCE_TIMEOUT_MS', DEFAULT_BALANCE_TIMEOUT_MS),
  });
}
