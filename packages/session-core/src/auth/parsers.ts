/**
 * Narrowing helpers for server payloads.  Each parser accepts `unknown` and returns a typed value
 * or null; callers decide whether a missing field is fatal.
 */
import { isRecord, readNumber, readString } from "../json";
import type { FidoChallenge, MfaChallenge, TrustedDevice, TrustedPhoneNumber } from "./types";

const readStringArray = (record: Record<string, unknown>, key: string): string[] | undefined => {
  const value = record[key];
  if (!Array.isArray(value)) {
    return undefined;
  }
  return value.filter((entry): entry is string => typeof entry === "string");
};

export interface WebService {
  readonly url: string;
  readonly status?: string;
}

export interface AccountInfo {
  readonly dsid?: string;
  readonly hsaVersion: number;
  readonly languageCode?: string;
  readonly fullName?: string;
}

export interface AppEntitlement {
  /** The app accepts a password-only sign-in scoped to it. */
  readonly canLaunchWithOneFactor: boolean;
}

export interface AccountData {
  readonly dsInfo: AccountInfo;
  readonly apps: Readonly<Record<string, AppEntitlement>>;
  readonly hsaChallengeRequired: boolean;
  readonly hsaTrustedBrowser: boolean;
  readonly termsUpdateNeeded: boolean;
  readonly webservices: Readonly<Record<string, WebService>>;
}

export const parseAccountData = (payload: unknown): AccountData => {
  const body: Record<string, unknown> = isRecord(payload) ? payload : {};
  const rawInfo: Record<string, unknown> = isRecord(body.dsInfo) ? body.dsInfo : {};
  const dsidValue = rawInfo.dsid;
  const webservices: Record<string, WebService> = {};
  const rawServices = body.webservices;
  if (isRecord(rawServices)) {
    for (const [key, entry] of Object.entries(rawServices)) {
      if (isRecord(entry)) {
        const url = readString(entry, "url");
        if (url) {
          webservices[key] = { url, status: readString(entry, "status") };
        }
      }
    }
  }
  const apps: Record<string, AppEntitlement> = {};
  const rawApps = body.apps;
  if (isRecord(rawApps)) {
    for (const [key, entry] of Object.entries(rawApps)) {
      if (isRecord(entry)) {
        apps[key] = { canLaunchWithOneFactor: entry.canLaunchWithOneFactor === true };
      }
    }
  }
  return {
    dsInfo: {
      dsid: typeof dsidValue === "string" || typeof dsidValue === "number" ? String(dsidValue) : undefined,
      hsaVersion: readNumber(rawInfo, "hsaVersion") ?? 0,
      languageCode: readString(rawInfo, "languageCode"),
      fullName: readString(rawInfo, "fullName")
    },
    hsaChallengeRequired: body.hsaChallengeRequired === true,
    hsaTrustedBrowser: body.hsaTrustedBrowser === true,
    termsUpdateNeeded: body.termsUpdateNeeded === true,
    apps,
    webservices
  };
};

const challengeOutstanding = (data: AccountData): boolean => data.hsaChallengeRequired || !data.hsaTrustedBrowser;

/** Any second step (device code or two-factor) is still required. */
export const requiresSecondStep = (data: AccountData): boolean =>
  data.dsInfo.hsaVersion >= 1 && challengeOutstanding(data);

export const requiresTwoFactor = (data: AccountData): boolean =>
  data.dsInfo.hsaVersion === 2 && challengeOutstanding(data);

export const canLaunchWithOneFactor = (data: AccountData | null, service: string): boolean =>
  data?.apps[service]?.canLaunchWithOneFactor === true;

export const isTrustedSession = (data: AccountData): boolean => data.hsaTrustedBrowser;

export const parseTrustedDevice = (raw: Record<string, unknown>, index: number): TrustedDevice => {
  const deviceName = readString(raw, "deviceName");
  const phoneNumber = readString(raw, "phoneNumber");
  const idValue = raw.deviceId ?? raw.id;
  return {
    id: typeof idValue === "string" || typeof idValue === "number" ? String(idValue) : String(index),
    displayName: deviceName ?? (phoneNumber ? `SMS to ${phoneNumber}` : `Device ${index + 1}`),
    raw
  };
};

const parsePhoneNumber = (value: unknown): TrustedPhoneNumber | undefined => {
  if (!isRecord(value)) {
    return undefined;
  }
  const id = value.id;
  if (typeof id !== "string" && typeof id !== "number") {
    return undefined;
  }
  return {
    id,
    numberWithDialCode: readString(value, "numberWithDialCode"),
    pushMode: readString(value, "pushMode")
  };
};

/**
 * Builds the two-factor challenge from the options document served at the auth endpoint root.
 * A FIDO challenge wins; without trusted devices the code goes out by SMS; otherwise it is pushed
 * to a trusted device.
 */
export const parseTwoFactorOptions = (payload: unknown): MfaChallenge => {
  const body: Record<string, unknown> = isRecord(payload) ? payload : {};
  const securityCode: Record<string, unknown> = isRecord(body.securityCode) ? body.securityCode : {};
  const phoneNumbers = body.trustedPhoneNumbers;
  const trustedPhoneNumber =
    parsePhoneNumber(body.trustedPhoneNumber) ??
    (Array.isArray(phoneNumbers) ? parsePhoneNumber(phoneNumbers[0]) : undefined);
  const codeLength = readNumber(securityCode, "length");
  const securityKeyNames = readStringArray(body, "keyNames");

  const fsaChallenge = body.fsaChallenge;
  if (isRecord(fsaChallenge)) {
    const fido: FidoChallenge = {
      challenge: readString(fsaChallenge, "challenge"),
      keyHandles: readStringArray(fsaChallenge, "keyHandles"),
      rpId: readString(fsaChallenge, "rpId")
    };
    return { type: "mfa", kind: "security_key", tier: "hsa2", fido, securityKeyNames, trustedPhoneNumber };
  }

  const kind = body.noTrustedDevices === true && trustedPhoneNumber ? "sms" : "push";
  return { type: "mfa", kind, tier: "hsa2", trustedPhoneNumber, codeLength };
};
