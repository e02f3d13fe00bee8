export type { ClassifiedError, SessionErrorCode, SessionErrorKind, SessionErrorOptions } from "./errors";
export { isRetryableKind, isSessionError, SessionError } from "./errors";

export type { ClassificationContext, ClassifierPolicy, TransportOutcome } from "./errorClassifier";
export {
  AUTH_REQUIRED_REASON,
  classify,
  classifyReason,
  classifyTransportFailure,
  DEFAULT_CLASSIFIER_POLICY,
  extractCode,
  extractReason,
  MISSING_WEB_AUTH_TOKEN,
  RATE_LIMIT_GUIDANCE,
  reportsWrongVerificationCode,
  SERVICE_NOT_ACTIVATED_REASON
} from "./errorClassifier";

export type { ConsoleLoggerOptions, Logger } from "./logger";
export { createConsoleLogger, createNoopLogger, createRedactingLogger } from "./logger";

export type { ConsentPolicy, SessionConfig } from "./config";
export { loadSessionConfig } from "./config";

export type { ServiceEndpoints, SessionFieldKey } from "./constants";
export {
  AuthStatusCode,
  buildEndpoints,
  DEVICE_TRACKING_COOKIE,
  RETRY_ONCE_STATUSES,
  WEB_AUTH_TOKEN_COOKIE,
  WRONG_VERIFICATION_CODE
} from "./constants";

export type { HeaderReader, SessionFields, SessionSnapshot } from "./store/sessionState";
export { createEmptySnapshot, SessionState } from "./store/sessionState";

export type { FileSessionStoreOptions, FileSystemLike, SessionStore } from "./store/sessionStore";
export { createFileSessionStore, createInMemorySessionStore, sanitizeAccountName } from "./store/sessionStore";

export type {
  AccountSessionOptions,
  FetchLike,
  HttpMethod,
  HttpRequestInit,
  HttpResponseLike,
  QueryParams,
  SessionRequest,
  SessionResponse
} from "./http/accountSession";
export { AccountSession, isJsonContentType } from "./http/accountSession";

export type { SrpProof, SrpProofInput, SrpProtocol } from "./auth/srp";
export { derivePasswordKey, SRP_GROUP, SRP_PROTOCOLS, SrpClient } from "./auth/srp";

export type {
  AuthChallenge,
  AuthResult,
  ConsentRequest,
  Credentials,
  FidoChallenge,
  MfaChallenge,
  MfaChallengeKind,
  MfaTier,
  SrpChallenge,
  TrustedDevice,
  TrustedPhoneNumber
} from "./auth/types";
export { createCredentials } from "./auth/types";

export type { AccountData, AccountInfo, AppEntitlement, WebService } from "./auth/parsers";
export {
  canLaunchWithOneFactor,
  isTrustedSession,
  parseAccountData,
  requiresSecondStep,
  requiresTwoFactor
} from "./auth/parsers";

export type {
  SecurityKeyAssertion,
  SecurityKeyAssertionRequest,
  SecurityKeyBridge,
  SecurityKeyDevice
} from "./auth/securityKey";

export type { AccountLoginOptions } from "./auth/accountLogin";
export { authenticateForService, authenticateWithToken, validateToken } from "./auth/accountLogin";

export type { CredentialAuthenticatorOptions } from "./auth/credentialAuthenticator";
export { CredentialAuthenticator } from "./auth/credentialAuthenticator";

export type { MfaState, MfaStateMachineOptions } from "./auth/mfaStateMachine";
export { isWrongCodeError, MfaStateMachine } from "./auth/mfaStateMachine";

export type { ConsentPollerOptions } from "./consent/consentPoller";
export { ConsentPoller, PENDING_CONSENT_MESSAGES } from "./consent/consentPoller";

export type {
  AccountSummary,
  CoordinatorState,
  LoginOptions,
  ReauthenticationOptions,
  LoginOutcome,
  SessionCoordinator,
  SessionCoordinatorOptions
} from "./coordinator/sessionCoordinator";
export { createSessionCoordinator } from "./coordinator/sessionCoordinator";
