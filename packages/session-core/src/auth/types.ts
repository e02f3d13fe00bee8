import type { SrpProtocol } from "./srp";

export interface Credentials {
  readonly identifier: string;
  readonly secret: string;
}

export const createCredentials = (identifier: string, secret: string): Credentials =>
  Object.freeze({ identifier, secret });

export interface SrpChallenge {
  readonly type: "srp";
  readonly salt: Buffer;
  readonly serverPublic: Buffer;
  readonly iterations: number;
  readonly keyLength: number;
  readonly protocol: SrpProtocol;
  /** Opaque server state echoed back with the proof. */
  readonly stateToken: string;
}

export interface TrustedDevice {
  readonly id: string;
  readonly displayName: string;
  /** The device record exactly as listed; the server expects it echoed back. */
  readonly raw: Readonly<Record<string, unknown>>;
}

export interface TrustedPhoneNumber {
  readonly id: number | string;
  readonly numberWithDialCode?: string;
  readonly pushMode?: string;
}

export interface FidoChallenge {
  readonly challenge?: string;
  readonly keyHandles?: ReadonlyArray<string>;
  readonly rpId?: string;
}

export type MfaChallengeKind = "sms" | "push" | "security_key";

/** `hsa1` is the device-based two-step flow, `hsa2` the code/security-key two-factor flow. */
export type MfaTier = "hsa1" | "hsa2";

export interface MfaChallenge {
  readonly type: "mfa";
  readonly kind: MfaChallengeKind;
  readonly tier: MfaTier;
  readonly trustedDevices?: ReadonlyArray<TrustedDevice>;
  readonly trustedPhoneNumber?: TrustedPhoneNumber;
  readonly fido?: FidoChallenge;
  readonly securityKeyNames?: ReadonlyArray<string>;
  readonly codeLength?: number;
}

export type AuthChallenge = { readonly type: "none" } | SrpChallenge | MfaChallenge;

export type AuthResult =
  | { readonly status: "authenticated" }
  | { readonly status: "mfa_required"; readonly challenge: MfaChallenge };

export interface ConsentRequest {
  readonly serviceName: string;
  readonly derivedFromUserAction: boolean;
  readonly attempt: number;
}
