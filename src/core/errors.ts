/**
 * Knowledge Point Error Taxonomy
 *
 * Every failure the sync core reports is a KnowledgePointError carrying a
 * machine-readable code. The HTTP layer maps codes to status codes and the
 * reconciliation service uses them to decide what is retried.
 *
 * - IDENTITY_UNRESOLVABLE: a point has no numeric ID and a blank phrase
 * - LOCAL_PERSISTENCE_FAILURE: the on-device store could not be read/written
 * - REMOTE_REJECTED: the server refused the request (4xx, malformed body)
 * - REMOTE_UNREACHABLE: network failure, timeout or 5xx
 * - NOT_FOUND: no store holds a point with the given effective ID
 * - GUEST_QUOTA_EXCEEDED: the guest point limit has been reached
 */

export const KnowledgePointErrorCodes = {
  IDENTITY_UNRESOLVABLE: 'IDENTITY_UNRESOLVABLE',
  LOCAL_PERSISTENCE_FAILURE: 'LOCAL_PERSISTENCE_FAILURE',
  REMOTE_REJECTED: 'REMOTE_REJECTED',
  REMOTE_UNREACHABLE: 'REMOTE_UNREACHABLE',
  NOT_FOUND: 'NOT_FOUND',
  GUEST_QUOTA_EXCEEDED: 'GUEST_QUOTA_EXCEEDED',
} as const;

export type KnowledgePointErrorCode =
  (typeof KnowledgePointErrorCodes)[keyof typeof KnowledgePointErrorCodes];

/**
 * Base class for all errors raised by the sync core.
 */
export class KnowledgePointError extends Error {
  /** Machine-readable error code */
  public readonly code: KnowledgePointErrorCode;
  /** Additional error context (optional) */
  public readonly details?: unknown;

  constructor(
    code: KnowledgePointErrorCode,
    message: string,
    options: { cause?: unknown; details?: unknown } = {}
  ) {
    super(message, { cause: options.cause });
    this.name = 'KnowledgePointError';
    this.code = code;
    this.details = options.details;

    Error.captureStackTrace?.(this, new.target);
  }
}

/**
 * A point reached a code path that needs an identity but has neither a
 * numeric identifier nor a usable phrase.
 */
export class IdentityUnresolvableError extends KnowledgePointError {
  constructor(message = 'Knowledge point has no identifier and an empty correct phrase') {
    super(KnowledgePointErrorCodes.IDENTITY_UNRESOLVABLE, message);
    this.name = 'IdentityUnresolvableError';
  }
}

export class LocalPersistenceError extends KnowledgePointError {
  constructor(operation: string, cause: unknown) {
    super(
      KnowledgePointErrorCodes.LOCAL_PERSISTENCE_FAILURE,
      `Local store ${operation} failed: ${describeCause(cause)}`,
      { cause, details: { operation } }
    );
    this.name = 'LocalPersistenceError';
  }
}

/**
 * The remote store answered but refused the request.
 * Not retried automatically.
 */
export class RemoteRejectedError extends KnowledgePointError {
  /** HTTP status returned by the server (0 when the body was unusable) */
  public readonly status: number;

  constructor(status: number, message: string, details?: unknown) {
    super(KnowledgePointErrorCodes.REMOTE_REJECTED, message, { details });
    this.name = 'RemoteRejectedError';
    this.status = status;
  }
}

/**
 * The remote store could not be reached. Promotion queues the point for the
 * next sync trigger; direct user actions surface the error to the caller.
 */
export class RemoteUnreachableError extends KnowledgePointError {
  constructor(message: string, cause?: unknown) {
    super(KnowledgePointErrorCodes.REMOTE_UNREACHABLE, message, { cause });
    this.name = 'RemoteUnreachableError';
  }
}

export class KnowledgePointNotFoundError extends KnowledgePointError {
  public readonly effectiveId: string;

  constructor(effectiveId: string) {
    super(
      KnowledgePointErrorCodes.NOT_FOUND,
      `KnowledgePoint with ID '${effectiveId}' not found`,
      { details: { effectiveId } }
    );
    this.name = 'KnowledgePointNotFoundError';
    this.effectiveId = effectiveId;
  }
}

export class GuestQuotaExceededError extends KnowledgePointError {
  constructor(limit: number) {
    super(
      KnowledgePointErrorCodes.GUEST_QUOTA_EXCEEDED,
      `Guest mode can store at most ${limit} knowledge points; sign in to save more`,
      { details: { limit } }
    );
    this.name = 'GuestQuotaExceededError';
  }
}

/**
 * Whether a failed remote operation is worth retrying on a later trigger.
 */
export function isRetryable(error: unknown): boolean {
  return (
    error instanceof RemoteUnreachableError ||
    error instanceof LocalPersistenceError
  );
}

function describeCause(cause: unknown): string {
  return cause instanceof Error ? cause.message : String(cause);
}
