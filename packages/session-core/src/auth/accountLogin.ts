import { MISSING_WEB_AUTH_TOKEN } from "../errorClassifier";
import { isSessionError, SessionError } from "../errors";
import type { AccountSession } from "../http/accountSession";
import { isRecord } from "../json";
import type { Logger } from "../logger";
import { parseAccountData, type AccountData } from "./parsers";
import type { Credentials } from "./types";

export interface AccountLoginOptions {
  readonly acceptTerms: boolean;
  readonly logger: Logger;
}

const passThroughKinds = new Set(["network", "rate_limited"]);

const rememberAccount = (session: AccountSession, data: AccountData): void => {
  session.state.merge({ dsid: data.dsInfo.dsid });
};

/**
 * Checks the stored session token against the setup service.  Fails without a request when the
 * web-auth cookie is missing.
 */
export const validateToken = async (session: AccountSession, logger: Logger): Promise<AccountData> => {
  if (!session.hasWebAuthToken()) {
    throw session.failure(MISSING_WEB_AUTH_TOKEN);
  }
  logger.debug("Checking session token validity");
  const response = await session.request(`${session.endpoints.setup}/validate`, {
    method: "POST",
    body: "null",
    params: session.params()
  });
  logger.debug("Session token is still valid");
  const data = parseAccountData(response.data);
  rememberAccount(session, data);
  return data;
};

const buildLoginPayload = (session: AccountSession): Record<string, unknown> => ({
  accountCountryCode: session.state.get("account_country"),
  dsWebAuthToken: session.state.get("session_token"),
  extended_login: true,
  trustToken: session.state.get("trust_token") ?? ""
});

const postAccountLogin = async (session: AccountSession, payload: Record<string, unknown>): Promise<AccountData> => {
  try {
    const response = await session.request(`${session.endpoints.setup}/accountLogin`, {
      method: "POST",
      json: payload,
      params: session.params()
    });
    return parseAccountData(response.data);
  } catch (error) {
    if (isSessionError(error) && !passThroughKinds.has(error.kind)) {
      throw new SessionError("invalid_credentials", "Invalid authentication token.", {
        code: error.code,
        status: error.status,
        payload: error.payload,
        cause: error
      });
    }
    throw error;
  }
};

const acceptTerms = async (
  session: AccountSession,
  data: AccountData,
  payload: Record<string, unknown>,
  logger: Logger
): Promise<AccountData> => {
  const termsResponse = await session.request(`${session.endpoints.setup}/getTerms`, {
    params: { ...session.params(), locale: data.dsInfo.languageCode ?? "en_US" }
  });
  const body = termsResponse.data;
  const terms = isRecord(body) && isRecord(body.iCloudTerms) ? body.iCloudTerms : null;
  const version = terms?.version;
  if (typeof version !== "string" && typeof version !== "number") {
    throw new SessionError("protocol", "Terms of service response did not include a version", { payload: body });
  }
  logger.info("Accepting updated terms of service", { version });
  await session.request(`${session.endpoints.setup}/repairDone`, {
    params: { ...session.params(), acceptedICloudTerms: version }
  });
  return postAccountLogin(session, payload);
};

/**
 * Exchanges the session token for account data, accepting pending terms of service when the
 * caller allowed it up front.
 */
export const authenticateWithToken = async (
  session: AccountSession,
  options: AccountLoginOptions
): Promise<AccountData> => {
  const payload = buildLoginPayload(session);
  let data = await postAccountLogin(session, payload);
  if (data.termsUpdateNeeded) {
    if (!options.acceptTerms) {
      throw new SessionError(
        "terms_acceptance_required",
        "You must accept the updated terms of service before signing in."
      );
    }
    data = await acceptTerms(session, data, payload, options.logger);
  }
  rememberAccount(session, data);
  return data;
};

/**
 * Password-only sign-in scoped to one app, for apps the account data marks as launchable with a
 * single factor.  The session is validated afterwards so the caller gets fresh account data.
 */
export const authenticateForService = async (
  session: AccountSession,
  credentials: Credentials,
  service: string,
  logger: Logger
): Promise<AccountData> => {
  logger.debug("Signing in to a single service", { identifier: credentials.identifier, service });
  try {
    await session.request(`${session.endpoints.setup}/accountLogin`, {
      method: "POST",
      json: { appName: service, apple_id: credentials.identifier, password: credentials.secret }
    });
    return await validateToken(session, logger);
  } catch (error) {
    if (isSessionError(error) && !passThroughKinds.has(error.kind)) {
      throw new SessionError("invalid_credentials", "Invalid email/password combination.", {
        code: error.code,
        status: error.status,
        payload: error.payload,
        cause: error
      });
    }
    throw error;
  }
};
