import os from "node:os";
import path from "node:path";

import { buildEndpoints, type ServiceEndpoints } from "./constants";

interface RawEnv {
  readonly [key: string]: string | undefined;
}

export interface ConsentPolicy {
  readonly maxAttempts: number;
  readonly intervalMs: number;
}

export interface SessionConfig {
  readonly sessionDirectory: string;
  readonly chinaMainland: boolean;
  readonly endpoints: ServiceEndpoints;
  readonly clientId: string | null;
  readonly requestTimeoutMs: number;
  readonly handshakeAttempts: number;
  readonly consent: ConsentPolicy;
  readonly acceptTerms: boolean;
  readonly accessDeniedIsRateLimit: boolean;
  readonly debug: boolean;
}

const toInt = (value: string | undefined, fallback: number): number => {
  if (!value) {
    return fallback;
  }
  const parsed = Number.parseInt(value, 10);
  return Number.isFinite(parsed) ? parsed : fallback;
};

const boolFromEnv = (value: string | undefined, fallback: boolean): boolean => {
  if (value === undefined) {
    return fallback;
  }
  const normalized = value.trim().toLowerCase();
  if (["1", "true", "yes", "on"].includes(normalized)) {
    return true;
  }
  if (["0", "false", "no", "off"].includes(normalized)) {
    return false;
  }
  return fallback;
};

const defaultSessionDirectory = (): string => {
  let user = "default";
  try {
    user = os.userInfo().username;
  } catch {
    // userInfo throws when the uid has no passwd entry (containers)
  }
  return path.join(os.tmpdir(), "idms-session", user);
};

export const loadSessionConfig = (env: RawEnv = process.env): SessionConfig => {
  const chinaMainland = boolFromEnv(env.IDMS_CHINA_MAINLAND, false);
  const clientId = env.IDMS_CLIENT_ID?.trim();
  return {
    sessionDirectory: env.IDMS_SESSION_DIRECTORY ?? defaultSessionDirectory(),
    chinaMainland,
    endpoints: buildEndpoints(chinaMainland),
    clientId: clientId ? clientId : null,
    requestTimeoutMs: Math.max(1, toInt(env.IDMS_REQUEST_TIMEOUT_MS, 30_000)),
    handshakeAttempts: Math.max(1, toInt(env.IDMS_HANDSHAKE_ATTEMPTS, 2)),
    consent: {
      maxAttempts: Math.max(1, toInt(env.IDMS_CONSENT_MAX_ATTEMPTS, 10)),
      intervalMs: Math.max(0, toInt(env.IDMS_CONSENT_INTERVAL_MS, 5_000))
    },
    acceptTerms: boolFromEnv(env.IDMS_ACCEPT_TERMS, false),
    accessDeniedIsRateLimit: boolFromEnv(env.IDMS_ACCESS_DENIED_IS_RATE_LIMIT, true),
    debug: boolFromEnv(env.IDMS_DEBUG, false)
  };
};
