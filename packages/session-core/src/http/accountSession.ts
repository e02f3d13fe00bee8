/**
 * The session handle shared by every component.  Each request carries the session cookies and
 * default headers, folds response cookies and session headers back into `SessionState`,
 * persists the result, and converts failures into classified `SessionError`s.  Requests on one
 * session run strictly one at a time.
 */
import {
  CONTENT_TYPE_JSON,
  JSON_CONTENT_TYPES,
  RETRY_ONCE_STATUSES,
  WEB_AUTH_TOKEN_COOKIE,
  WIDGET_KEY,
  type ServiceEndpoints
} from "../constants";
import {
  classify,
  classifyReason,
  classifyTransportFailure,
  DEFAULT_CLASSIFIER_POLICY,
  reportsWrongVerificationCode,
  type ClassifierPolicy
} from "../errorClassifier";
import { SessionError, type SessionErrorCode } from "../errors";
import type { Logger } from "../logger";
import type { HeaderReader, SessionState } from "../store/sessionState";
import type { SessionStore } from "../store/sessionStore";

export type HttpMethod = "GET" | "POST" | "PUT" | "DELETE";

export interface HttpRequestInit {
  readonly method: HttpMethod;
  readonly headers: Record<string, string>;
  readonly body?: string;
  readonly signal?: AbortSignal;
}

export interface HttpResponseLike {
  readonly status: number;
  readonly statusText: string;
  readonly headers: HeaderReader & { getSetCookie?(): string[] };
  text(): Promise<string>;
}

export type FetchLike = (url: string, init: HttpRequestInit) => Promise<HttpResponseLike>;

export type QueryParams = Readonly<Record<string, string | number | boolean | null | undefined>>;

export interface SessionRequest {
  readonly method?: HttpMethod;
  readonly params?: QueryParams;
  readonly json?: unknown;
  readonly body?: string;
  readonly headers?: Readonly<Record<string, string>>;
}

export interface SessionResponse {
  readonly status: number;
  readonly headers: HeaderReader;
  readonly data: unknown;
  readonly text: string;
}

export interface AccountSessionOptions {
  readonly state: SessionState;
  readonly store: SessionStore;
  readonly endpoints: ServiceEndpoints;
  readonly logger: Logger;
  readonly fetchImplementation?: FetchLike;
  readonly timeoutMs?: number;
  readonly classifierPolicy?: ClassifierPolicy;
  /** Consulted per response; lets the classifier tell an outstanding second step from a lost token. */
  readonly secondStepPending?: () => boolean;
}

const DEFAULT_TIMEOUT_MS = 30_000;

const ensureFetch = (impl: FetchLike | undefined): FetchLike => {
  if (impl) {
    return impl;
  }
  if (typeof globalThis.fetch === "function") {
    return globalThis.fetch.bind(globalThis);
  }
  throw new Error("fetch is not available; provide fetchImplementation to AccountSession");
};

const withParams = (url: string, params: QueryParams | undefined): string => {
  if (!params) {
    return url;
  }
  const target = new URL(url);
  for (const [key, value] of Object.entries(params)) {
    if (value !== undefined && value !== null) {
      target.searchParams.set(key, String(value));
    }
  }
  return target.toString();
};

const readSetCookies = (headers: HttpResponseLike["headers"]): string[] => {
  if (typeof headers.getSetCookie === "function") {
    return headers.getSetCookie();
  }
  const single = headers.get("set-cookie");
  return single ? [single] : [];
};

export const isJsonContentType = (contentType: string | null): boolean => {
  if (!contentType) {
    return false;
  }
  const mimeType = contentType.split(";")[0]?.trim().toLowerCase() ?? "";
  return JSON_CONTENT_TYPES.includes(mimeType);
};

export class AccountSession {
  readonly state: SessionState;
  readonly endpoints: ServiceEndpoints;
  private readonly store: SessionStore;
  private readonly logger: Logger;
  private readonly fetchImpl: FetchLike;
  private readonly timeoutMs: number;
  private readonly classifierPolicy: ClassifierPolicy;
  private readonly secondStepPending: () => boolean;
  private queue: Promise<unknown> = Promise.resolve();

  constructor(options: AccountSessionOptions) {
    this.state = options.state;
    this.store = options.store;
    this.endpoints = options.endpoints;
    this.logger = options.logger;
    this.fetchImpl = ensureFetch(options.fetchImplementation);
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.classifierPolicy = options.classifierPolicy ?? DEFAULT_CLASSIFIER_POLICY;
    this.secondStepPending = options.secondStepPending ?? (() => false);
  }

  request(url: string, request: SessionRequest = {}): Promise<SessionResponse> {
    const run = this.queue.then(() => this.execute(url, request));
    // the next request waits for this one, failed or not
    this.queue = run.catch(() => undefined);
    return run;
  }

  /** Headers the auth endpoint expects on every call, including the echoed session identifiers. */
  authHeaders(overrides: Readonly<Record<string, string>> = {}): Record<string, string> {
    const clientId = this.state.get("client_id") ?? "";
    const headers: Record<string, string> = {
      Accept: `${CONTENT_TYPE_JSON}, text/javascript`,
      "Content-Type": CONTENT_TYPE_JSON,
      "X-Apple-OAuth-Client-Id": WIDGET_KEY,
      "X-Apple-OAuth-Client-Type": "firstPartyAuth",
      "X-Apple-OAuth-Redirect-URI": this.endpoints.home,
      "X-Apple-OAuth-Require-Grant-Code": "true",
      "X-Apple-OAuth-Response-Mode": "web_message",
      "X-Apple-OAuth-Response-Type": "code",
      "X-Apple-OAuth-State": clientId,
      "X-Apple-Widget-Key": WIDGET_KEY,
      "X-Apple-Frame-Id": clientId
    };
    const scnt = this.state.get("scnt");
    if (scnt) {
      headers.scnt = scnt;
    }
    const sessionId = this.state.get("session_id");
    if (sessionId) {
      headers["X-Apple-ID-Session-Id"] = sessionId;
    }
    const authAttributes = this.state.get("auth_attributes");
    if (authAttributes) {
      headers["X-Apple-Auth-Attributes"] = authAttributes;
    }
    return { ...headers, ...overrides };
  }

  /** Query parameters the setup endpoint expects alongside every call. */
  params(): QueryParams {
    return {
      clientId: this.state.get("client_id"),
      dsid: this.state.get("dsid")
    };
  }

  /** Classifies a condition detected before any request was sent. */
  failure(reason: string, code: SessionErrorCode = null): SessionError {
    return SessionError.fromClassified(
      classifyReason(reason, code, null, { secondStepPending: this.secondStepPending() }, this.classifierPolicy)
    );
  }

  hasWebAuthToken(): boolean {
    return this.state.hasCookie(WEB_AUTH_TOKEN_COOKIE, `${this.endpoints.setup}/validate`);
  }

  async persist(): Promise<void> {
    await this.store.save(this.state.snapshot());
  }

  private async execute(url: string, request: SessionRequest): Promise<SessionResponse> {
    const method = request.method ?? "GET";
    const target = withParams(url, request.params);
    const body = request.json !== undefined ? JSON.stringify(request.json) : request.body;

    for (let attempt = 0; ; attempt += 1) {
      const headers: Record<string, string> = {
        Origin: this.endpoints.home,
        Referer: `${this.endpoints.home}/`,
        ...(body !== undefined ? { "Content-Type": CONTENT_TYPE_JSON } : {}),
        ...(request.headers ?? {})
      };
      const cookieHeader = this.state.cookieHeader(target);
      if (cookieHeader) {
        headers.Cookie = cookieHeader;
      }

      this.logger.debug("Sending request", { method, url: target, attempt });
      let response: HttpResponseLike;
      try {
        response = await this.fetchImpl(target, {
          method,
          headers,
          body,
          signal: AbortSignal.timeout(this.timeoutMs)
        });
      } catch (error) {
        throw this.transportFailure(method, target, error);
      }

      this.state.storeCookies(readSetCookies(response.headers), target);
      this.state.mergeFromHeaders(response.headers);
      await this.persist();

      let text: string;
      try {
        text = await response.text();
      } catch (error) {
        // a timeout or reset can land while the body is still streaming
        throw this.transportFailure(method, target, error);
      }
      const isJson = isJsonContentType(response.headers.get("content-type"));
      let data: unknown = null;
      if (isJson && text.length > 0) {
        try {
          data = JSON.parse(text);
        } catch {
          this.logger.warn("Failed to parse response with JSON content type", { url: target, status: response.status });
        }
      }

      const classified = classify(
        { type: "response", status: response.status, statusText: response.statusText, isJson, body: data },
        { secondStepPending: this.secondStepPending() },
        this.classifierPolicy
      );
      if (!classified) {
        return { status: response.status, headers: response.headers, data, text };
      }
      if (attempt === 0 && RETRY_ONCE_STATUSES.includes(response.status)) {
        this.logger.debug("Retrying request once after auth challenge", { url: target, status: response.status });
        continue;
      }
      if (classified.kind === "unknown" && reportsWrongVerificationCode(classified.code, data)) {
        this.logger.debug("Verification code rejected", { url: target, status: response.status });
      } else if (classified.kind === "unknown") {
        this.logger.error("Request failed", {
          method,
          url: target,
          status: response.status,
          code: classified.code,
          payload: data
        });
      }
      throw SessionError.fromClassified(classified, { status: response.status, payload: data });
    }
  }

  private transportFailure(method: HttpMethod, url: string, error: unknown): SessionError {
    const classified = classifyTransportFailure(error);
    this.logger.warn("Request failed before a response arrived", { method, url, error: classified.message });
    return SessionError.fromClassified(classified, { cause: error });
  }
}
