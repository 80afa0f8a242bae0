export type ValidationCode =
  | 'TooShort'
  | 'TooLong'
  | 'ProhibitedPattern'
  | 'FileTooLarge'
  | 'UnsupportedFileType'
  | 'UnreadableDocument'
  | 'InvalidConversation';

export type StateCode =
  | 'NoSummaryToRefine'
  | 'RefinementLimitReached'
  | 'RequestInFlight'
  | 'NothingToCancel'
  | 'NoVersions'
  | 'VersionGap'
  | 'MalformedExchange'
  | 'SessionNotFound';

export type NavigationCode = 'AtBoundary' | 'OutOfRange';

export type RemoteErrorKind =
  | 'overloaded'
  | 'rateLimited'
  | 'timeout'
  | 'network'
  | 'auth'
  | 'invalidRequest'
  | 'notFound'
  | 'emptyResponse'
  | 'unknown';

export abstract class SummaryError extends Error {
  abstract readonly kind: 'validation' | 'state' | 'navigation' | 'remote';
  abstract readonly code: string;
}

export class ValidationError extends SummaryError {
  readonly kind = 'validation';

  constructor(readonly code: ValidationCode, message: string) {
    super(message);
    this.name = 'ValidationError';
  }
}

export class StateError extends SummaryError {
  readonly kind = 'state';

  constructor(readonly code: StateCode, message: string) {
    super(message);
    this.name = 'StateError';
  }
}

export class NavigationError extends SummaryError {
  readonly kind = 'navigation';

  constructor(readonly code: NavigationCode, message: string) {
    super(message);
    this.name = 'NavigationError';
  }
}

export interface RemoteErrorInit {
  errorKind: RemoteErrorKind;
  message: string;
  retryable: boolean;
  status?: number;
  attempts?: number;
  cause?: unknown;
}

export class RemoteError extends SummaryError {
  readonly kind = 'remote';
  readonly errorKind: RemoteErrorKind;
  readonly retryable: boolean;
  readonly status?: number;
  readonly attempts: number;

  constructor(init: RemoteErrorInit) {
    super(init.message, { cause: init.cause });
    this.name = 'RemoteError';
    this.errorKind = init.errorKind;
    this.retryable = init.retryable;
    this.status = init.status;
    this.attempts = init.attempts ?? 1;
  }

  get code(): RemoteErrorKind {
    return this.errorKind;
  }

  withAttempts(attempts: number): RemoteError {
    return new RemoteError({
      errorKind: this.errorKind,
      message: `${this.message} (failed after ${attempts} attempts)`,
      retryable: this.retryable,
      status: this.status,
      attempts,
      cause: this.cause,
    });
  }
}

/** Raised when an AbortSignal fires; orchestrators turn it into a cancelled outcome. */
export class OperationCancelledError extends Error {
  constructor(message = 'Operation cancelled') {
    super(message);
    this.name = 'OperationCancelledError';
  }
}

const STATUS_KINDS: Record<number, { errorKind: RemoteErrorKind; retryable: boolean }> = {
  400: { errorKind: 'invalidRequest', retryable: false },
  401: { errorKind: 'auth', retryable: false },
  403: { errorKind: 'auth', retryable: false },
  404: { errorKind: 'notFound', retryable: false },
  429: { errorKind: 'rateLimited', retryable: true },
  500: { errorKind: 'network', retryable: true },
  502: { errorKind: 'network', retryable: true },
  503: { errorKind: 'overloaded', retryable: true },
  504: { errorKind: 'timeout', retryable: true },
};

const RETRYABLE_MARKERS: ReadonlyArray<[string, RemoteErrorKind]> = [
  ['service overloaded', 'overloaded'],
  ['overloaded', 'overloaded'],
  ['rate limit', 'rateLimited'],
  ['resource exhausted', 'rateLimited'],
  ['timeout', 'timeout'],
  ['timed out', 'timeout'],
  ['etimedout', 'timeout'],
  ['connection reset', 'network'],
  ['econnreset', 'network'],
  ['socket hang up', 'network'],
  ['unavailable', 'overloaded'],
];

const USER_MESSAGES: Record<RemoteErrorKind, string> = {
  overloaded: 'The AI service is overloaded. Please try again shortly.',
  rateLimited: 'The AI service rate limit was reached. Please try again shortly.',
  timeout: 'The AI service did not respond in time.',
  network: 'The connection to the AI service failed.',
  auth: 'The AI service rejected the configured credentials.',
  invalidRequest: 'The AI service rejected the request.',
  notFound: 'The configured AI model was not found.',
  emptyResponse: 'No content generated. Please try again.',
  unknown: 'The AI service returned an unexpected error.',
};

/**
 * Maps a raw failure from the AI provider to a RemoteError. The HTTP status
 * wins when present; otherwise the message is matched against known
 * transient-failure markers.
 */
export function classifyRemoteFailure(error: unknown, status?: number): RemoteError {
  if (error instanceof RemoteError) {
    return error;
  }
  const detail = error instanceof Error ? error.message : String(error);
  const byStatus = status !== undefined ? STATUS_KINDS[status] : undefined;
  if (byStatus) {
    return new RemoteError({
      ...byStatus,
      message: `${USER_MESSAGES[byStatus.errorKind]} ${detail}`.trim(),
      status,
      cause: error,
    });
  }

  const lowered = detail.toLowerCase();
  const marker = RETRYABLE_MARKERS.find(([needle]) => lowered.includes(needle));
  const errorKind = marker ? marker[1] : 'unknown';
  return new RemoteError({
    errorKind,
    message: `${USER_MESSAGES[errorKind]} ${detail}`.trim(),
    retryable: marker !== undefined,
    status,
    cause: error,
  });
}

export function emptyResponseError(): RemoteError {
  return new RemoteError({
    errorKind: 'emptyResponse',
    message: USER_MESSAGES.emptyResponse,
    retryable: false,
  });
}
