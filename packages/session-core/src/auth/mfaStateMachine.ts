import { reportsWrongVerificationCode } from "../errorClassifier";
import { isSessionError, SessionError } from "../errors";
import type { AccountSession } from "../http/accountSession";
import { isRecord } from "../json";
import type { Logger } from "../logger";
import { authenticateWithToken } from "./accountLogin";
import { parseTrustedDevice } from "./parsers";
import { encodeAssertion, type SecurityKeyBridge, type SecurityKeyDevice } from "./securityKey";
import type { MfaChallenge, TrustedDevice } from "./types";

export type MfaState =
  | { readonly status: "no_challenge" }
  | { readonly status: "awaiting_device_selection"; readonly challenge: MfaChallenge }
  | {
      readonly status: "awaiting_sms_code";
      readonly challenge: MfaChallenge;
      readonly device: TrustedDevice | null;
      readonly attempts: number;
    }
  | { readonly status: "awaiting_push_code"; readonly challenge: MfaChallenge; readonly attempts: number }
  | { readonly status: "awaiting_security_key"; readonly challenge: MfaChallenge }
  | { readonly status: "session_trust_requested"; readonly challenge: MfaChallenge }
  | { readonly status: "trusted" }
  | { readonly status: "failed"; readonly error: SessionError };

export interface MfaStateMachineOptions {
  readonly logger: Logger;
  readonly acceptTerms?: boolean;
  readonly securityKeyBridge?: SecurityKeyBridge;
}

/** True when the server rejected a verification code as wrong, as opposed to any other failure. */
export const isWrongCodeError = (error: unknown): boolean =>
  isSessionError(error) && reportsWrongVerificationCode(error.code, error.payload);

const initialState = (challenge: MfaChallenge): MfaState => {
  if (challenge.kind === "security_key") {
    return { status: "awaiting_security_key", challenge };
  }
  if (challenge.tier === "hsa1") {
    return { status: "awaiting_device_selection", challenge };
  }
  if (challenge.kind === "sms") {
    return { status: "awaiting_sms_code", challenge, device: null, attempts: 0 };
  }
  return { status: "awaiting_push_code", challenge, attempts: 0 };
};

/**
 * Drives one second-factor exchange.  Wrong codes leave the machine waiting for another attempt;
 * any other server failure moves it to `failed` and is rethrown.
 */
export class MfaStateMachine {
  private readonly logger: Logger;
  private readonly acceptTerms: boolean;
  private readonly securityKeyBridge?: SecurityKeyBridge;
  private state: MfaState = { status: "no_challenge" };

  constructor(options: MfaStateMachineOptions) {
    this.logger = options.logger;
    this.acceptTerms = options.acceptTerms ?? false;
    this.securityKeyBridge = options.securityKeyBridge;
  }

  getState(): MfaState {
    return this.state;
  }

  begin(challenge: MfaChallenge): MfaState {
    this.state = initialState(challenge);
    return this.state;
  }

  reset(): void {
    this.state = { status: "no_challenge" };
  }

  async listTrustedDevices(session: AccountSession): Promise<ReadonlyArray<TrustedDevice>> {
    const response = await session.request(`${session.endpoints.setup}/listDevices`, {
      params: session.params()
    });
    const body = response.data;
    const devices = isRecord(body) ? body.devices : undefined;
    if (!Array.isArray(devices)) {
      return [];
    }
    return devices.filter(isRecord).map((device, index) => parseTrustedDevice(device, index));
  }

  async sendCode(session: AccountSession, device: TrustedDevice): Promise<boolean> {
    const challenge = this.requireChallenge();
    const response = await session.request(`${session.endpoints.setup}/sendVerificationCode`, {
      method: "POST",
      json: device.raw,
      params: session.params()
    });
    const sent = isRecord(response.data) && response.data.success === true;
    if (sent) {
      this.state = { status: "awaiting_sms_code", challenge, device, attempts: 0 };
    }
    return sent;
  }

  async submitCode(session: AccountSession, device: TrustedDevice, code: string): Promise<boolean> {
    const challenge = this.requireChallenge();
    return this.verify(challenge, async () => {
      await session.request(`${session.endpoints.setup}/validateVerificationCode`, {
        method: "POST",
        json: { ...device.raw, verificationCode: code, trustBrowser: true },
        params: session.params()
      });
    });
  }

  async submitPushOrSmsCode(session: AccountSession, code: string): Promise<boolean> {
    const challenge = this.requireChallenge();
    const phoneNumber = challenge.kind === "sms" ? challenge.trustedPhoneNumber : undefined;
    return this.verify(challenge, async () => {
      if (phoneNumber) {
        await session.request(`${session.endpoints.auth}/verify/phone/securitycode`, {
          method: "POST",
          headers: session.authHeaders({ Accept: "application/json" }),
          json: {
            securityCode: { code },
            phoneNumber: { id: phoneNumber.id },
            mode: "sms"
          }
        });
        return;
      }
      await session.request(`${session.endpoints.auth}/verify/trusteddevice/securitycode`, {
        method: "POST",
        headers: session.authHeaders({ Accept: "application/json" }),
        json: { securityCode: { code } }
      });
    });
  }

  async confirmSecurityKey(
    session: AccountSession,
    challenge: MfaChallenge = this.requireChallenge(),
    device?: SecurityKeyDevice
  ): Promise<void> {
    const fido = challenge.fido;
    if (!fido?.challenge || !fido.rpId || !fido.keyHandles || fido.keyHandles.length === 0) {
      throw new SessionError("protocol", "Security key challenge is missing challenge, keyHandles or rpId");
    }
    if (!this.securityKeyBridge) {
      throw new SessionError("resource_unavailable", "No security key bridge is configured");
    }
    const target = device ?? (await this.securityKeyBridge.listDevices())[0];
    if (!target) {
      throw new SessionError("resource_unavailable", "No FIDO2 devices found");
    }

    const request = {
      challenge: fido.challenge,
      rpId: fido.rpId,
      allowCredentials: fido.keyHandles,
      origin: session.endpoints.home
    };
    this.logger.debug("Requesting security key assertion", { device: target.label });
    const assertion = await this.securityKeyBridge.getAssertion(target, request);
    try {
      await session.request(`${session.endpoints.auth}/verify/security/key`, {
        method: "POST",
        headers: session.authHeaders({ Accept: "application/json" }),
        json: encodeAssertion(assertion, request)
      });
    } catch (error) {
      if (isSessionError(error)) {
        this.state = { status: "failed", error };
      }
      throw error;
    }
    this.state = { status: "session_trust_requested", challenge };
  }

  /**
   * Asks the server to remember this client, then re-runs the token login so the session picks up
   * the trust token.  A rejection is reported as `false`; the session stays usable but the next
   * sign-in is challenged again.
   */
  async trustSession(session: AccountSession): Promise<boolean> {
    try {
      await session.request(`${session.endpoints.auth}/2sv/trust`, {
        headers: session.authHeaders()
      });
      await authenticateWithToken(session, { acceptTerms: this.acceptTerms, logger: this.logger });
    } catch (error) {
      if (isSessionError(error) && error.kind !== "network") {
        this.logger.error("Session trust failed", { kind: error.kind, message: error.message });
        return false;
      }
      throw error;
    }
    this.state = { status: "trusted" };
    return true;
  }

  private requireChallenge(): MfaChallenge {
    const state = this.state;
    if (state.status === "no_challenge" || state.status === "trusted" || state.status === "failed") {
      throw new Error(`No second-factor challenge is pending (state: ${state.status})`);
    }
    return state.challenge;
  }

  private async verify(challenge: MfaChallenge, send: () => Promise<void>): Promise<boolean> {
    try {
      await send();
    } catch (error) {
      if (isWrongCodeError(error)) {
        this.logger.warn("Verification code was rejected");
        this.recordWrongCode();
        return false;
      }
      if (isSessionError(error)) {
        this.state = { status: "failed", error };
      }
      throw error;
    }
    this.state = { status: "session_trust_requested", challenge };
    return true;
  }

  private recordWrongCode(): void {
    const state = this.state;
    if (state.status === "awaiting_sms_code" || state.status === "awaiting_push_code") {
      this.state = { ...state, attempts: state.attempts + 1 };
    }
  }
}
