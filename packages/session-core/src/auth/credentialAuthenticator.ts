/**
 * Password sign-in: a fresh SRP exchange per attempt, finished either with a signed-in session or
 * a second-factor challenge read from the auth endpoint's options document.
 */
import { WIDGET_KEY } from "../constants";
import { isSessionError, SessionError } from "../errors";
import type { AccountSession } from "../http/accountSession";
import { isRecord, readNumber, readString } from "../json";
import type { Logger } from "../logger";
import { parseTwoFactorOptions } from "./parsers";
import { derivePasswordKey, SRP_PROTOCOLS, SrpClient, type SrpProtocol } from "./srp";
import type { AuthResult, Credentials, MfaChallenge, SrpChallenge } from "./types";

const PASSWORD_KEY_LENGTH = 32;

export interface CredentialAuthenticatorOptions {
  readonly logger: Logger;
  /** Supplies the ephemeral private key; tests pin it, production draws a random one. */
  readonly createClient?: (identifier: string) => SrpClient;
}

const isSrpProtocol = (value: unknown): value is SrpProtocol =>
  typeof value === "string" && SRP_PROTOCOLS.some((protocol) => protocol === value);

const decodeBase64 = (value: string | undefined, field: string): Buffer => {
  if (!value) {
    throw new SessionError("protocol", `Sign-in challenge is missing ${field}`);
  }
  const decoded = Buffer.from(value, "base64");
  if (decoded.length === 0) {
    throw new SessionError("protocol", `Sign-in challenge has a malformed ${field}`);
  }
  return decoded;
};

export const parseSrpChallenge = (payload: unknown): SrpChallenge => {
  if (!isRecord(payload)) {
    throw new SessionError("protocol", "Sign-in challenge is not an object", { payload });
  }
  const iterations = readNumber(payload, "iteration");
  if (iterations === undefined || !Number.isInteger(iterations) || iterations <= 0) {
    throw new SessionError("protocol", "Sign-in challenge has an invalid iteration count", { payload });
  }
  const protocol = payload.protocol;
  if (!isSrpProtocol(protocol)) {
    throw new SessionError("protocol", "Sign-in challenge uses an unsupported protocol", { payload });
  }
  const stateToken = readString(payload, "c");
  if (!stateToken) {
    throw new SessionError("protocol", "Sign-in challenge is missing its state token", { payload });
  }
  return {
    type: "srp",
    salt: decodeBase64(readString(payload, "salt"), "salt"),
    serverPublic: decodeBase64(readString(payload, "b"), "server public value"),
    iterations,
    keyLength: PASSWORD_KEY_LENGTH,
    protocol,
    stateToken
  };
};

const describeServiceError = (payload: unknown): { message: string; code: string | number | null } | null => {
  if (!isRecord(payload)) {
    return null;
  }
  const serviceErrors = payload.serviceErrors;
  if (!Array.isArray(serviceErrors)) {
    return null;
  }
  const first: unknown = serviceErrors[0];
  if (!isRecord(first)) {
    return null;
  }
  const message = readString(first, "message");
  if (!message) {
    return null;
  }
  const code = first.code;
  return { message, code: typeof code === "string" || typeof code === "number" ? code : null };
};

const passesThrough = (error: SessionError): boolean =>
  error.kind === "network" || error.kind === "rate_limited" || error.kind === "protocol";

export class CredentialAuthenticator {
  private readonly logger: Logger;
  private readonly createClient: (identifier: string) => SrpClient;

  constructor(options: CredentialAuthenticatorOptions) {
    this.logger = options.logger;
    this.createClient = options.createClient ?? ((identifier) => new SrpClient(identifier));
  }

  async authenticate(credentials: Credentials, session: AccountSession): Promise<AuthResult> {
    const authUrl = session.endpoints.auth;
    const clientId = session.state.get("client_id");

    this.logger.debug("Requesting sign-in context", { identifier: credentials.identifier });
    await session.request(`${authUrl}/authorize/signin`, {
      headers: session.authHeaders(),
      params: {
        frame_id: clientId,
        skVersion: "7",
        iframeId: clientId,
        client_id: WIDGET_KEY,
        redirect_uri: session.endpoints.home,
        response_mode: "web_message",
        response_type: "code",
        state: clientId
      }
    });

    const client = this.createClient(credentials.identifier);
    let challenge: SrpChallenge;
    try {
      const init = await session.request(`${authUrl}/signin/init`, {
        method: "POST",
        headers: session.authHeaders(),
        json: {
          a: client.publicKey.toString("base64"),
          accountName: credentials.identifier,
          protocols: SRP_PROTOCOLS
        }
      });
      challenge = parseSrpChallenge(init.data);
    } catch (error) {
      if (isSessionError(error) && !passesThrough(error)) {
        throw new SessionError("invalid_credentials", "Failed to initiate SRP authentication.", {
          code: error.code,
          status: error.status,
          payload: error.payload,
          cause: error
        });
      }
      throw error;
    }

    const passwordKey = derivePasswordKey(
      credentials.secret,
      challenge.salt,
      challenge.iterations,
      challenge.protocol,
      challenge.keyLength
    );
    const proof = client.computeProof({
      salt: challenge.salt,
      serverPublic: challenge.serverPublic,
      passwordKey
    });

    const trustToken = session.state.get("trust_token");
    try {
      await session.request(`${authUrl}/signin/complete`, {
        method: "POST",
        headers: session.authHeaders(),
        params: { isRememberMeEnabled: "true" },
        json: {
          accountName: credentials.identifier,
          c: challenge.stateToken,
          m1: proof.m1.toString("base64"),
          m2: proof.m2.toString("base64"),
          rememberMe: true,
          trustTokens: trustToken ? [trustToken] : []
        }
      });
    } catch (error) {
      if (isSessionError(error, "second_factor_required")) {
        this.logger.debug("Second factor required to complete sign-in");
        return { status: "mfa_required", challenge: await this.fetchTwoFactorChallenge(session) };
      }
      if (isSessionError(error) && !passesThrough(error)) {
        const serviceError = describeServiceError(error.payload);
        throw new SessionError("invalid_credentials", serviceError?.message ?? "Invalid email/password combination.", {
          code: serviceError?.code ?? error.code,
          status: error.status,
          payload: error.payload,
          cause: error
        });
      }
      throw error;
    }

    this.logger.debug("Password proof accepted");
    return { status: "authenticated" };
  }

  /** Reads the two-factor options offered for the current sign-in. */
  async fetchTwoFactorChallenge(session: AccountSession): Promise<MfaChallenge> {
    const response = await session.request(session.endpoints.auth, {
      headers: session.authHeaders({ Accept: "application/json" })
    });
    return parseTwoFactorOptions(response.data);
  }
}
