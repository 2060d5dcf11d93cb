import type { ApiErrorKind } from './types';

const TRANSIENT_CODES = new Set([
  'ECONNRESET',
  'ECONNREFUSED',
  'ECONNABORTED',
  'EPIPE',
  'ETIMEDOUT',
  'ENOTFOUND',
  'EAI_AGAIN',
  'ENETUNREACH',
  'EHOSTUNREACH',
  'UND_ERR_CONNECT_TIMEOUT',
  'UND_ERR_HEADERS_TIMEOUT',
  'UND_ERR_BODY_TIMEOUT',
  'UND_ERR_SOCKET',
  'UND_ERR_CLOSED'
]);

/**
 * Error raised at the judge boundary. The client never retries; callers
 * decide what to do from `kind`.
 */
export class ApiError extends Error {
  readonly kind: ApiErrorKind;
  readonly statusCode?: number;

  constructor(
    kind: ApiErrorKind,
    message: string,
    options: { statusCode?: number; cause?: unknown } = {}
  ) {
    super(message, { cause: options.cause });
    this.name = 'ApiError';
    this.kind = kind;
    this.statusCode = options.statusCode;
  }

  get isRetryable(): boolean {
    return this.kind === 'Transient' || this.kind === 'Malformed';
  }

  static fromStatus(statusCode: number, detail: string): ApiError {
    const kind = kindForStatus(statusCode);
    const message = detail
      ? `HTTP ${statusCode}: ${detail}`
      : `HTTP ${statusCode}`;
    return new ApiError(kind, message, { statusCode });
  }
}

export function kindForStatus(statusCode: number): ApiErrorKind {
  if (statusCode === 401 || statusCode === 403) {
    return 'Unauthorized';
  }
  if (statusCode === 404) {
    return 'NotFound';
  }
  if (statusCode === 408 || statusCode === 429 || statusCode >= 500) {
    return 'Transient';
  }
  return 'Rejected';
}

function errorCode(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'code' in error) {
    const { code } = error;
    return typeof code === 'string' ? code : undefined;
  }
  return undefined;
}

/**
 * Classify anything thrown below the client into an ApiError. Network
 * failures (including ones wrapped in `cause`) are Transient; everything else
 * is Malformed.
 */
export function classifyError(error: unknown): ApiError {
  if (error instanceof ApiError) {
    return error;
  }

  let current: unknown = error;
  for (let depth = 0; depth < 4 && current !== undefined; depth++) {
    const code = errorCode(current);
    if (code && TRANSIENT_CODES.has(code)) {
      return new ApiError('Transient', describe(error), { cause: error });
    }
    current = current instanceof Error ? current.cause : undefined;
  }

  return new ApiError('Malformed', describe(error), { cause: error });
}

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function describeKind(kind: ApiErrorKind): string {
  switch (kind) {
    case 'Transient':
      return 'network error';
    case 'Malformed':
      return 'unreadable response from judge';
    case 'Unauthorized':
      return 'not authorized';
    case 'NotFound':
      return 'submission not found';
    case 'Rejected':
      return 'request rejected by judge';
  }
}
