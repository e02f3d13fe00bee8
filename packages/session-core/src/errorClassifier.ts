/**
 * Maps a raw request outcome onto the error taxonomy.  This is the only place that inspects
 * status codes and server error payloads; everything above the request layer branches on
 * `ClassifiedError.kind`.
 */
import { AUTH_STATUS_CODES, AuthStatusCode, WEB_AUTH_TOKEN_COOKIE, WRONG_VERIFICATION_CODE } from "./constants";
import { isRetryableKind, type ClassifiedError, type SessionErrorCode } from "./errors";
import { isRecord } from "./json";

export type TransportOutcome =
  | {
      readonly type: "transport_failure";
      readonly error: unknown;
    }
  | {
      readonly type: "response";
      readonly status: number;
      readonly statusText: string;
      readonly isJson: boolean;
      readonly body: unknown;
    };

export interface ClassificationContext {
  /** True while a device-based second step is still outstanding for this session. */
  readonly secondStepPending?: boolean;
}

export interface ClassifierPolicy {
  readonly accessDeniedIsRateLimit: boolean;
}

export const DEFAULT_CLASSIFIER_POLICY: ClassifierPolicy = {
  accessDeniedIsRateLimit: true
};

export const MISSING_WEB_AUTH_TOKEN = `Missing ${WEB_AUTH_TOKEN_COOKIE} cookie`;
export const SERVICE_NOT_ACTIVATED_REASON =
  "Please log into https://icloud.com/ to manually finish setting up your iCloud service";
export const RATE_LIMIT_GUIDANCE =
  " Please wait a few minutes then try again. The remote servers might be trying to throttle requests.";
export const AUTH_REQUIRED_REASON = "Authentication required for Account.";

const SERVICE_NOT_ACTIVATED_CODES: ReadonlySet<string> = new Set(["ZONE_NOT_FOUND", "AUTHENTICATION_FAILED"]);

const describeFailure = (error: unknown): string => {
  if (error instanceof Error) {
    return error.message;
  }
  return typeof error === "string" ? error : "unknown transport failure";
};

const build = (kind: ClassifiedError["kind"], message: string, code: SessionErrorCode): ClassifiedError => ({
  kind,
  code,
  message,
  retryable: isRetryableKind(kind)
});

/** Zero, empty strings, empty arrays and empty objects carry no error signal. */
const isPresent = (value: unknown): boolean => {
  if (value === undefined || value === null || value === false || value === 0 || value === "") {
    return false;
  }
  if (Array.isArray(value)) {
    return value.length > 0;
  }
  if (isRecord(value)) {
    return Object.keys(value).length > 0;
  }
  return true;
};

/** Reads the reason text out of a server error payload, if it carries one. */
export const extractReason = (body: Record<string, unknown>): string | null => {
  for (const key of ["errorMessage", "reason", "errorReason"]) {
    const value = body[key];
    if (typeof value === "string" && value.length > 0) {
      return value;
    }
  }
  const error = body.error;
  if (typeof error === "string" && error.length > 0) {
    return error;
  }
  return isPresent(error) ? "Unknown reason" : null;
};

export const extractCode = (body: Record<string, unknown>): SessionErrorCode => {
  for (const key of ["errorCode", "serverErrorCode"]) {
    const value = body[key];
    if ((typeof value === "string" || typeof value === "number") && isPresent(value)) {
      return value;
    }
  }
  return null;
};

const isWrongCode = (code: unknown): boolean =>
  code === WRONG_VERIFICATION_CODE || code === String(WRONG_VERIFICATION_CODE);

/** True when a code or payload reports a rejected verification code. */
export const reportsWrongVerificationCode = (code: unknown, payload: unknown): boolean => {
  if (isWrongCode(code)) {
    return true;
  }
  if (!isRecord(payload)) {
    return false;
  }
  if (isWrongCode(payload.errorCode)) {
    return true;
  }
  const serviceErrors = payload.serviceErrors ?? payload.service_errors;
  return Array.isArray(serviceErrors) && serviceErrors.some((entry: unknown) => isRecord(entry) && isWrongCode(entry.code));
};

export const classifyTransportFailure = (error: unknown): ClassifiedError =>
  build("network", `Request failed: ${describeFailure(error)}`, null);

/**
 * Classifies a reason/code pair reported by the server (or detected locally before a request).
 */
export const classifyReason = (
  reason: string,
  code: SessionErrorCode,
  status: number | null,
  context: ClassificationContext = {},
  policy: ClassifierPolicy = DEFAULT_CLASSIFIER_POLICY
): ClassifiedError => {
  if (reason === MISSING_WEB_AUTH_TOKEN && context.secondStepPending) {
    return build("second_factor_required", reason, code);
  }
  if (typeof code === "string" && SERVICE_NOT_ACTIVATED_CODES.has(code)) {
    return build("service_not_activated", SERVICE_NOT_ACTIVATED_REASON, code);
  }
  if (code === "ACCESS_DENIED" && policy.accessDeniedIsRateLimit) {
    return build("rate_limited", `${reason}.${RATE_LIMIT_GUIDANCE}`, code);
  }
  if (status !== null && AUTH_STATUS_CODES.includes(status)) {
    return build(status === AuthStatusCode.reauthRequired ? "reauth_required" : "auth_challenge", AUTH_REQUIRED_REASON, code ?? status);
  }
  return build("unknown", reason, code ?? status);
};

/**
 * Returns null when the outcome is a success.
 */
export const classify = (
  outcome: TransportOutcome,
  context: ClassificationContext = {},
  policy: ClassifierPolicy = DEFAULT_CLASSIFIER_POLICY
): ClassifiedError | null => {
  if (outcome.type === "transport_failure") {
    return classifyTransportFailure(outcome.error);
  }

  const { status, body } = outcome;
  const ok = status >= 200 && status < 300;
  const jsonBody = outcome.isJson && isRecord(body) ? body : null;

  if (status === AuthStatusCode.secondFactorRequired && jsonBody?.authType === "hsa2") {
    return build("second_factor_required", "Two-factor authentication required.", status);
  }

  if (jsonBody) {
    const reason = extractReason(jsonBody);
    if (reason !== null) {
      return classifyReason(reason, extractCode(jsonBody), ok ? null : status, context, policy);
    }
  }

  if (AUTH_STATUS_CODES.includes(status)) {
    return build(status === AuthStatusCode.reauthRequired ? "reauth_required" : "auth_challenge", AUTH_REQUIRED_REASON, status);
  }

  if (!ok) {
    return build("unknown", outcome.statusText || `Request failed with status ${status}`, status);
  }
  return null;
};
