/**
 * Top-level sign-in orchestration for one account.  The coordinator owns the session state, tries
 * the persisted token first, falls back to the password handshake, hands second-factor
 * challenges to the caller and finishes them, and re-signs in once when a downstream service asks
 * for it.  Observers see the lifecycle through `getState`/`subscribe`; tokens never appear there.
 */
import { ulid } from "ulidx";

import { authenticateForService, authenticateWithToken, validateToken } from "../auth/accountLogin";
import { CredentialAuthenticator } from "../auth/credentialAuthenticator";
import { MfaStateMachine, type MfaState } from "../auth/mfaStateMachine";
import {
  canLaunchWithOneFactor,
  isTrustedSession,
  requiresSecondStep,
  requiresTwoFactor,
  type AccountData
} from "../auth/parsers";
import type { SecurityKeyBridge, SecurityKeyDevice } from "../auth/securityKey";
import type { SrpClient } from "../auth/srp";
import type { AuthResult, Credentials, MfaChallenge, TrustedDevice } from "../auth/types";
import type { SessionConfig } from "../config";
import { ConsentPoller } from "../consent/consentPoller";
import { isSessionError, SessionError, type SessionErrorCode, type SessionErrorKind } from "../errors";
import { AccountSession, type FetchLike } from "../http/accountSession";
import { createConsoleLogger, createRedactingLogger, type Logger } from "../logger";
import { SessionState } from "../store/sessionState";
import { createFileSessionStore, type SessionStore } from "../store/sessionStore";

export interface AccountSummary {
  readonly dsid?: string;
  readonly fullName?: string;
  readonly trustedSession: boolean;
}

export type CoordinatorState =
  | { readonly status: "start" }
  | { readonly status: "validating_token" }
  | { readonly status: "credential_authenticating"; readonly attempt: number }
  | { readonly status: "mfa_challenge_pending"; readonly challenge: MfaChallenge; readonly mfa: MfaState }
  | { readonly status: "authenticated"; readonly account: AccountSummary }
  | {
      readonly status: "failed";
      readonly error: { readonly kind: SessionErrorKind; readonly message: string; readonly code: SessionErrorCode };
    };

export type LoginOutcome =
  | { readonly status: "authenticated"; readonly session: AccountSession; readonly account: AccountData }
  | { readonly status: "mfa_required"; readonly challenge: MfaChallenge };

export interface LoginOptions {
  /** Skip the stored-token check and run the full handshake. */
  readonly force?: boolean;
  /** Try a password-only sign-in scoped to this app before the full handshake, when the account allows it. */
  readonly service?: string;
}

export interface ReauthenticationOptions {
  readonly service?: string;
}

export interface SessionCoordinatorOptions {
  readonly credentials: Credentials;
  readonly config: SessionConfig;
  readonly store?: SessionStore;
  readonly logger?: Logger;
  readonly fetchImplementation?: FetchLike;
  readonly securityKeyBridge?: SecurityKeyBridge;
  readonly sleep?: (ms: number) => Promise<void>;
  readonly createSrpClient?: (identifier: string) => SrpClient;
  readonly generateClientId?: () => string;
}

export interface SessionCoordinator {
  getState(): CoordinatorState;
  subscribe(listener: () => void): () => void;
  getSession(): Promise<AccountSession>;
  getAccount(): AccountData | null;
  login(options?: LoginOptions): Promise<LoginOutcome>;
  reauthenticate(force?: boolean, service?: string): Promise<AccountData>;
  listTrustedDevices(): Promise<ReadonlyArray<TrustedDevice>>;
  sendVerificationCode(device: TrustedDevice): Promise<boolean>;
  submitVerificationCode(device: TrustedDevice, code: string): Promise<boolean>;
  submitSecurityCode(code: string): Promise<boolean>;
  confirmSecurityKey(device?: SecurityKeyDevice): Promise<boolean>;
  ensureConsent(serviceName: string): Promise<void>;
  runWithReauthentication<T>(
    operation: (session: AccountSession) => Promise<T>,
    options?: ReauthenticationOptions
  ): Promise<T>;
  getWebserviceUrl(key: string): string;
  logout(): Promise<void>;
}

const defaultClientId = (): string => `auth-${ulid().toLowerCase()}`;

const summarize = (account: AccountData): AccountSummary => ({
  dsid: account.dsInfo.dsid,
  fullName: account.dsInfo.fullName,
  trustedSession: isTrustedSession(account)
});

export const createSessionCoordinator = (options: SessionCoordinatorOptions): SessionCoordinator => {
  const { config, credentials } = options;
  const logger = createRedactingLogger(options.logger ?? createConsoleLogger({ debug: config.debug }), [
    credentials.secret
  ]);
  const store =
    options.store ??
    createFileSessionStore({ directory: config.sessionDirectory, accountName: credentials.identifier, logger });
  const authenticator = new CredentialAuthenticator({ logger, createClient: options.createSrpClient });
  const mfa = new MfaStateMachine({
    logger,
    acceptTerms: config.acceptTerms,
    securityKeyBridge: options.securityKeyBridge
  });
  const consent = new ConsentPoller({
    logger,
    maxAttempts: config.consent.maxAttempts,
    intervalMs: config.consent.intervalMs,
    sleep: options.sleep
  });

  let state: CoordinatorState = { status: "start" };
  let account: AccountData | null = null;
  let clientId: string | null = null;
  let hydrating: Promise<AccountSession> | null = null;
  let signingIn: Promise<LoginOutcome> | null = null;
  const listeners = new Set<() => void>();

  const notify = () => {
    for (const listener of listeners) {
      listener();
    }
  };

  const setState = (next: CoordinatorState) => {
    state = next;
    notify();
  };

  const secondStepPending = (): boolean =>
    state.status === "mfa_challenge_pending" && state.challenge.tier === "hsa1";

  const hydrate = (): Promise<AccountSession> => {
    if (!hydrating) {
      hydrating = store.load().then((snapshot) => {
        const sessionState = new SessionState(snapshot);
        clientId = config.clientId ?? sessionState.get("client_id") ?? (options.generateClientId ?? defaultClientId)();
        sessionState.bindClientId(clientId);
        return new AccountSession({
          state: sessionState,
          store,
          endpoints: config.endpoints,
          logger,
          fetchImplementation: options.fetchImplementation,
          timeoutMs: config.requestTimeoutMs,
          classifierPolicy: { accessDeniedIsRateLimit: config.accessDeniedIsRateLimit },
          secondStepPending
        });
      });
    }
    return hydrating;
  };

  const fail = (error: unknown): void => {
    if (isSessionError(error)) {
      setState({ status: "failed", error: { kind: error.kind, message: error.message, code: error.code } });
    }
  };

  const markAuthenticated = (session: AccountSession, data: AccountData): LoginOutcome => {
    account = data;
    mfa.reset();
    setState({ status: "authenticated", account: summarize(data) });
    return { status: "authenticated", session, account: data };
  };

  const enterChallenge = (challenge: MfaChallenge): LoginOutcome => {
    const mfaState = mfa.begin(challenge);
    setState({ status: "mfa_challenge_pending", challenge, mfa: mfaState });
    logger.info("Second factor required", { kind: challenge.kind, tier: challenge.tier });
    return { status: "mfa_required", challenge };
  };

  const refreshChallengeState = () => {
    if (state.status === "mfa_challenge_pending") {
      setState({ ...state, mfa: mfa.getState() });
    }
  };

  const runHandshake = async (session: AccountSession): Promise<AuthResult> => {
    for (let attempt = 1; ; attempt += 1) {
      setState({ status: "credential_authenticating", attempt });
      try {
        return await authenticator.authenticate(credentials, session);
      } catch (error) {
        if (isSessionError(error, "network") && attempt < config.handshakeAttempts) {
          logger.warn("Sign-in attempt failed on the network, retrying", { attempt });
          continue;
        }
        throw error;
      }
    }
  };

  const signInWithCredentials = async (session: AccountSession): Promise<LoginOutcome> => {
    const result = await runHandshake(session);
    if (result.status === "mfa_required") {
      return enterChallenge(result.challenge);
    }

    const data = await authenticateWithToken(session, { acceptTerms: config.acceptTerms, logger });
    account = data;
    if (requiresTwoFactor(data)) {
      return enterChallenge(await authenticator.fetchTwoFactorChallenge(session));
    }
    if (requiresSecondStep(data)) {
      return enterChallenge({ type: "mfa", kind: "sms", tier: "hsa1" });
    }
    return markAuthenticated(session, data);
  };

  const signInToService = async (session: AccountSession, service: string): Promise<LoginOutcome | null> => {
    setState({ status: "credential_authenticating", attempt: 1 });
    try {
      const data = await authenticateForService(session, credentials, service, logger);
      if (!requiresSecondStep(data)) {
        return markAuthenticated(session, data);
      }
      logger.debug("Service sign-in still needs a second factor", { service });
    } catch (error) {
      if (!isSessionError(error)) {
        throw error;
      }
      logger.debug("Could not sign in to the service, starting a full sign-in", { service, kind: error.kind });
    }
    return null;
  };

  const runLogin = async (loginOptions: LoginOptions): Promise<LoginOutcome> => {
    const session = await hydrate();
    try {
      if (!loginOptions.force && session.state.has("session_token")) {
        setState({ status: "validating_token" });
        try {
          const data = await validateToken(session, logger);
          if (!requiresSecondStep(data)) {
            return markAuthenticated(session, data);
          }
          logger.debug("Stored session still needs a second factor, signing in again");
        } catch (error) {
          if (!isSessionError(error) || error.kind === "network") {
            throw error;
          }
          logger.debug("Stored session token was rejected", { kind: error.kind });
        }
      }
      if (loginOptions.service && canLaunchWithOneFactor(account, loginOptions.service)) {
        const outcome = await signInToService(session, loginOptions.service);
        if (outcome) {
          return outcome;
        }
      }
      return await signInWithCredentials(session);
    } catch (error) {
      fail(error);
      throw error;
    }
  };

  /** One sign-in per session at a time; concurrent callers share the one under way. */
  const login = (loginOptions: LoginOptions = {}): Promise<LoginOutcome> => {
    if (!signingIn) {
      signingIn = runLogin(loginOptions).finally(() => {
        signingIn = null;
      });
    }
    return signingIn;
  };

  const requirePendingChallenge = (): MfaChallenge => {
    if (state.status !== "mfa_challenge_pending") {
      throw new Error(`No second-factor challenge is pending (state: ${state.status})`);
    }
    return state.challenge;
  };

  const completeSecondFactor = async (session: AccountSession, challenge: MfaChallenge): Promise<boolean> => {
    const trusted = await mfa.trustSession(session);
    if (!trusted) {
      logger.warn("Session was not trusted; the next sign-in will ask for a second factor again");
      await authenticateWithToken(session, { acceptTerms: config.acceptTerms, logger });
    }
    const data = await validateToken(session, logger);
    if (requiresSecondStep(data)) {
      account = data;
      logger.warn("Account still requires a second factor after verification");
      mfa.begin(challenge);
      return false;
    }
    markAuthenticated(session, data);
    return true;
  };

  const withChallenge = async <T>(action: (session: AccountSession, challenge: MfaChallenge) => Promise<T>): Promise<T> => {
    const challenge = requirePendingChallenge();
    const session = await hydrate();
    try {
      return await action(session, challenge);
    } catch (error) {
      fail(error);
      throw error;
    } finally {
      refreshChallengeState();
    }
  };

  const reauthenticate = async (force = true, service?: string): Promise<AccountData> => {
    const outcome = await login({ force, service });
    if (outcome.status === "mfa_required") {
      throw new SessionError("second_factor_required", "Signing in again requires a second factor");
    }
    return outcome.account;
  };

  const runWithReauthentication = async <T>(
    operation: (session: AccountSession) => Promise<T>,
    options: ReauthenticationOptions = {}
  ): Promise<T> => {
    const session = await hydrate();
    try {
      return await operation(session);
    } catch (error) {
      if (!isSessionError(error, "reauth_required")) {
        throw error;
      }
      logger.info("Service requested reauthentication, signing in again");
      await reauthenticate(true, options.service);
      return operation(session);
    }
  };

  return {
    getState() {
      return state;
    },
    subscribe(listener) {
      listeners.add(listener);
      return () => {
        listeners.delete(listener);
      };
    },
    getSession: hydrate,
    getAccount() {
      return account;
    },
    login,
    reauthenticate,
    listTrustedDevices() {
      return withChallenge((session) => mfa.listTrustedDevices(session));
    },
    sendVerificationCode(device) {
      return withChallenge((session) => mfa.sendCode(session, device));
    },
    submitVerificationCode(device, code) {
      return withChallenge(async (session, challenge) =>
        (await mfa.submitCode(session, device, code)) ? completeSecondFactor(session, challenge) : false
      );
    },
    submitSecurityCode(code) {
      return withChallenge(async (session, challenge) =>
        (await mfa.submitPushOrSmsCode(session, code)) ? completeSecondFactor(session, challenge) : false
      );
    },
    confirmSecurityKey(device) {
      return withChallenge(async (session, challenge) => {
        await mfa.confirmSecurityKey(session, challenge, device);
        return completeSecondFactor(session, challenge);
      });
    },
    async ensureConsent(serviceName) {
      await consent.ensureConsent(await hydrate(), serviceName);
    },
    runWithReauthentication,
    getWebserviceUrl(key) {
      const service = account?.webservices[key];
      if (!service) {
        throw new SessionError("service_not_activated", `Web service "${key}" is not available for this account`);
      }
      return service.url;
    },
    async logout() {
      const session = await hydrate();
      session.state.reset();
      if (clientId) {
        session.state.bindClientId(clientId);
      }
      await store.clear();
      account = null;
      mfa.reset();
      setState({ status: "start" });
    }
  } satisfies SessionCoordinator;
};
