export type ApiErrorKind =
  | 'InvalidInput'
  | 'MissingCredentials'
  | 'RateLimited'
  | 'NotFound'
  | 'NetworkTimeout'
  | 'ServerError'
  | 'Unknown';

export interface ApiError {
  readonly kind: ApiErrorKind;
  readonly message: string;
  readonly retriable: boolean;
  /** HTTP status of the remote response, when there was one */
  readonly status?: number;
  /** One entry per offending field for aggregated validation failures */
  readonly details?: readonly string[];
}

export type ServiceResult<T> =
  | { ok: true; data: T }
  | { ok: false; error: ApiError };

const RETRIABLE_KINDS: ReadonlySet<ApiErrorKind> = new Set<ApiErrorKind>([
  'RateLimited',
  'NetworkTimeout',
  'ServerError',
]);

export function isRetriable(kind: ApiErrorKind): boolean {
  return RETRIABLE_KINDS.has(kind);
}

export function apiError(
  kind: ApiErrorKind,
  message: string,
  extra?: { status?: number; details?: readonly string[] }
): ApiError {
  const error: ApiError = {
    kind,
    message,
    retriable: isRetriable(kind),
    ...(extra?.status !== undefined ? { status: extra.status } : {}),
    ...(extra?.details !== undefined ? { details: Object.freeze([...extra.details]) } : {}),
  };
  return Object.freeze(error);
}

export function failure(
  kind: ApiErrorKind,
  message: string,
  extra?: { status?: number; details?: readonly string[] }
): { ok: false; error: ApiError } {
  return { ok: false, error: apiError(kind, message, extra) };
}

export function success<T>(data: T): { ok: true; data: T } {
  return { ok: true, data };
}

export function errorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return typeof error === 'string' ? error : 'Unknown error';
}
