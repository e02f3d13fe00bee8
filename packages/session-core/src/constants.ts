export const WIDGET_KEY = "d39ba9916b7251055b22c7f910e2ea796ee65e98b2ddecea8f5dde8d9d1a815d";

export const WEB_AUTH_TOKEN_COOKIE = "X-APPLE-WEBAUTH-TOKEN";
export const DEVICE_TRACKING_COOKIE = "X-APPLE-WEBAUTH-FMIP";

export const CONTENT_TYPE_JSON = "application/json";
export const JSON_CONTENT_TYPES: ReadonlyArray<string> = [CONTENT_TYPE_JSON, "text/json"];

export const AuthStatusCode = {
  secondFactorRequired: 409,
  reauthRequired: 450,
  tokenExpired: 421,
  generalAuthError: 500
} as const;

export const AUTH_STATUS_CODES: ReadonlyArray<number> = Object.values(AuthStatusCode);

/** Statuses a request is sent again for, once, before the failure is raised. */
export const RETRY_ONCE_STATUSES: ReadonlyArray<number> = [
  AuthStatusCode.tokenExpired,
  AuthStatusCode.reauthRequired,
  AuthStatusCode.generalAuthError
];

/** Server error code for a rejected verification code. */
export const WRONG_VERIFICATION_CODE = -21669;

/** Response header → session field. */
export const SESSION_HEADER_FIELDS: Readonly<Record<string, SessionFieldKey>> = {
  "x-apple-id-account-country": "account_country",
  "x-apple-id-session-id": "session_id",
  "x-apple-session-token": "session_token",
  "x-apple-twosv-trust-token": "trust_token",
  "x-apple-auth-attributes": "auth_attributes",
  scnt: "scnt"
};

export type SessionFieldKey =
  | "account_country"
  | "auth_attributes"
  | "client_id"
  | "dsid"
  | "scnt"
  | "session_id"
  | "session_token"
  | "trust_token";

export interface ServiceEndpoints {
  readonly auth: string;
  readonly home: string;
  readonly setup: string;
}

export const buildEndpoints = (chinaMainland: boolean): ServiceEndpoints => {
  const suffix = chinaMainland ? ".cn" : "";
  return {
    auth: `https://idmsa.apple.com${suffix}/appleauth/auth`,
    home: `https://www.icloud.com${suffix}`,
    setup: `https://setup.icloud.com${suffix}/setup/ws/1`
  };
};
