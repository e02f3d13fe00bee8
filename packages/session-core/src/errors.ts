/**
 * Every failure leaving this package is a `SessionError`.  Callers branch on `kind`; `code` keeps
 * the server's own error code (or HTTP status) for diagnostics.
 */
export type SessionErrorKind =
  | "network"
  | "auth_challenge"
  | "invalid_credentials"
  | "second_factor_required"
  | "reauth_required"
  | "service_not_activated"
  | "rate_limited"
  | "terms_acceptance_required"
  | "consent_timeout"
  | "protocol"
  | "resource_unavailable"
  | "unknown";

export type SessionErrorCode = string | number | null;

export interface ClassifiedError {
  readonly kind: SessionErrorKind;
  readonly code: SessionErrorCode;
  readonly message: string;
  readonly retryable: boolean;
}

export interface SessionErrorOptions {
  readonly code?: SessionErrorCode;
  readonly retryable?: boolean;
  readonly status?: number;
  readonly payload?: unknown;
  readonly cause?: unknown;
}

const RETRYABLE_KINDS: ReadonlySet<SessionErrorKind> = new Set(["network", "rate_limited", "auth_challenge"]);

export const isRetryableKind = (kind: SessionErrorKind): boolean => RETRYABLE_KINDS.has(kind);

export class SessionError extends Error implements ClassifiedError {
  readonly kind: SessionErrorKind;
  readonly code: SessionErrorCode;
  readonly retryable: boolean;
  readonly status?: number;
  readonly payload?: unknown;

  constructor(kind: SessionErrorKind, message: string, options: SessionErrorOptions = {}) {
    super(message);
    this.name = "SessionError";
    this.kind = kind;
    this.code = options.code ?? null;
    this.retryable = options.retryable ?? isRetryableKind(kind);
    this.status = options.status;
    this.payload = options.payload;
    if (options.cause !== undefined) {
      this.cause = options.cause;
    }
  }

  static fromClassified(
    classified: ClassifiedError,
    options: Omit<SessionErrorOptions, "code" | "retryable"> = {}
  ): SessionError {
    return new SessionError(classified.kind, classified.message, {
      ...options,
      code: classified.code,
      retryable: classified.retryable
    });
  }
}

export const isSessionError = (value: unknown, kind?: SessionErrorKind): value is SessionError => {
  if (!(value instanceof SessionError)) {
    return false;
  }
  return kind === undefined || value.kind === kind;
};
