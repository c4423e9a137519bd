import { apiError, errorMessage, failure, success, type ApiError, type ServiceResult } from './errors.js';
import { writeModelFile } from './storage.js';
import {
  GENERATION_CREDIT_COST,
  RATE_LIMIT_REQUESTS,
  RATE_LIMIT_WINDOW_SECONDS,
  type BalanceResult,
  type GenerationResult,
  type RawApiResponse,
  type StabilityBalanceBody,
  type StabilityErrorBody,
} from './types.js';

type HttpResponse = Extract<RawApiResponse, { kind: 'http' }>;

function isJson(response: HttpResponse): boolean {
  return (response.contentType ?? '').toLowerCase().includes('json');
}

function parseJson(body: Buffer): unknown {
  try {
    return JSON.parse(body.toString('utf-8'));
  } catch {
    return undefined;
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Pull the human-readable detail out of an error body. The service sends
 * `{ id, name, errors: [...] }`; anything else is passed through as text.
 */
export function extractErrorDetail(body: Buffer): string {
  const parsed = parseJson(body);
  if (isRecord(parsed)) {
    const errorBody: StabilityErrorBody = {
      name: typeof parsed.name === 'string' ? parsed.name : undefined,
      message: typeof parsed.message === 'string' ? parsed.message : undefined,
      errors: Array.isArray(parsed.errors)
        ? parsed.errors.filter((entry): entry is string => typeof entry === 'string')
        : undefined,
    };
    if (errorBody.errors && errorBody.errors.length > 0) {
      return errorBody.errors.join(', ');
    }
    if (errorBody.message) {
      return errorBody.message;
    }
    if (errorBody.name) {
      return errorBody.name;
    }
    return JSON.stringify(parsed);
  }

  const text = body.toString('utf-8').trim();
  return text.length > 0 ? text : 'no details provided';
}

/**
 * Map any response that is not a success onto the error taxonomy.
 */
export function toApiError(raw: RawApiResponse): ApiError {
  if (raw.kind === 'transport') {
    if (raw.cancelled) {
      return apiError('NetworkTimeout', 'Request was cancelled before the service responded.');
    }
    if (raw.timedOut) {
      return apiError(
        'NetworkTimeout',
        'Request timed out. The API may be experiencing high load. Please try again.'
      );
    }
    const code = raw.code ? ` (${raw.code})` : '';
    return apiError('NetworkTimeout', `Unable to reach the Stability AI service${code}: ${raw.message}`);
  }

  const { status } = raw;
  const detail = extractErrorDetail(raw.body);

  if (status === 400) {
    return apiError('InvalidInput', `Bad request (400): ${detail}`, { status });
  }
  if (status === 401 || status === 403) {
    return apiError(
      'MissingCredentials',
      `The API key was rejected (${status}): ${detail}. Check STABILITY_API_KEY.`,
      { status }
    );
  }
  if (status === 404) {
    return apiError('NotFound', `Endpoint not found (404): ${detail}`, { status });
  }
  if (status === 429) {
    const retryAfter = raw.retryAfter ? ` Retry after ${raw.retryAfter} seconds.` : '';
    return apiError(
      'RateLimited',
      `Rate limit exceeded: the service allows ${RATE_LIMIT_REQUESTS} requests every ${RATE_LIMIT_WINDOW_SECONDS} seconds. Wait before retrying.${retryAfter}`,
      { status }
    );
  }
  if (status >= 500 && status <= 599) {
    return apiError('ServerError', `Server error (${status}): ${detail}`, { status });
  }

  return apiError('Unknown', `Unexpected response from the service (${status}): ${detail}`, { status });
}

export async function translateGenerationResponse(
  raw: RawApiResponse,
  outputPath: string,
  signal?: AbortSignal
): Promise<ServiceResult<GenerationResult>> {
  if (raw.kind !== 'http' || raw.status !== 200) {
    return { ok: false, error: toApiError(raw) };
  }

  if (raw.body.length === 0) {
    return failure('Unknown', 'The service returned an empty model payload.', { status: raw.status });
  }
  if (isJson(raw)) {
    return failure(
      'Unknown',
      `Expected a GLB model but the service returned JSON: ${extractErrorDetail(raw.body)}`,
      { status: raw.status }
    );
  }

  if (signal?.aborted) {
    return failure('NetworkTimeout', 'Request was cancelled before the model was saved.');
  }

  let bytesWritten: number;
  try {
    bytesWritten = await writeModelFile(outputPath, raw.body);
  } catch (error) {
    return failure(
      'Unknown',
      `The model was generated (and billed) but could not be written to ${outputPath}: ${errorMessage(error)}`
    );
  }

  return success<GenerationResult>({
    success: true,
    outputPath,
    bytesWritten,
    creditsCharged: GENERATION_CREDIT_COST,
  });
}

export function translateBalanceResponse(raw: RawApiResponse): ServiceResult<BalanceResult> {
  if (raw.kind !== 'http' || raw.status !== 200) {
    return { ok: false, error: toApiError(raw) };
  }

  const parsed = parseJson(raw.body);
  const balance: StabilityBalanceBody | undefined = isRecord(parsed) ? parsed : undefined;
  const credits = balance?.credits;
  if (typeof credits !== 'number' || !Number.isFinite(credits)) {
    return failure('Unknown', `Unexpected balance response: ${raw.body.toString('utf-8').slice(0, 200)}`, {
      status: raw.status,
    });
  }

  return success({ credits });
}
