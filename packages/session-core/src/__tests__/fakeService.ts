import { buildEndpoints } from "../constants";
import { AccountSession, type FetchLike, type HttpRequestInit, type HttpResponseLike } from "../http/accountSession";
import { createNoopLogger, type Logger } from "../logger";
import { SessionState } from "../store/sessionState";
import { createInMemorySessionStore, type SessionStore } from "../store/sessionStore";

export const endpoints = buildEndpoints(false);

export interface FakeReply {
  readonly status?: number;
  readonly statusText?: string;
  readonly json?: unknown;
  readonly text?: string;
  readonly contentType?: string;
  readonly headers?: Readonly<Record<string, string>>;
  readonly setCookies?: ReadonlyArray<string>;
  /** Rejects the fetch as a transport failure. */
  readonly networkError?: boolean;
  /** Rejects while the body is being read, after the status and headers arrived. */
  readonly bodyError?: Error;
}

export interface RecordedCall {
  readonly method: string;
  readonly url: URL;
  readonly route: string;
  readonly headers: Readonly<Record<string, string>>;
  readonly body: unknown;
}

export type FakeHandler = (call: RecordedCall) => FakeReply;

const routeKey = (method: string, url: string): string => {
  const parsed = new URL(url);
  return `${method} ${parsed.origin}${parsed.pathname}`;
};

const parseBody = (body: string | undefined): unknown => {
  if (body === undefined) {
    return undefined;
  }
  try {
    return JSON.parse(body);
  } catch {
    return body;
  }
};

const toResponse = (reply: FakeReply): HttpResponseLike => {
  const status = reply.status ?? 200;
  const headers = new Map<string, string>();
  for (const [name, value] of Object.entries(reply.headers ?? {})) {
    headers.set(name.toLowerCase(), value);
  }
  let text = reply.text ?? "";
  if (reply.json !== undefined) {
    text = JSON.stringify(reply.json);
    headers.set("content-type", reply.contentType ?? "application/json;charset=UTF-8");
  } else if (reply.contentType) {
    headers.set("content-type", reply.contentType);
  }
  const setCookies = [...(reply.setCookies ?? [])];
  return {
    status,
    statusText: reply.statusText ?? (status >= 200 && status < 300 ? "OK" : "Error"),
    headers: {
      get: (name: string) => headers.get(name.toLowerCase()) ?? null,
      getSetCookie: () => setCookies
    },
    text: async () => {
      if (reply.bodyError) {
        throw reply.bodyError;
      }
      return text;
    }
  };
};

/**
 * In-process stand-in for the remote service.  Routes answer with a fixed reply, a handler, or a
 * queue of replies consumed in order; unknown routes answer 404.  Every call is recorded.
 */
export const createFakeService = () => {
  const handlers = new Map<string, FakeHandler>();
  const queues = new Map<string, FakeReply[]>();
  const calls: RecordedCall[] = [];

  const fetch: FetchLike = async (url: string, init: HttpRequestInit) => {
    const route = routeKey(init.method, url);
    const call: RecordedCall = {
      method: init.method,
      url: new URL(url),
      route,
      headers: { ...init.headers },
      body: parseBody(init.body)
    };
    calls.push(call);
    const queued = queues.get(route);
    const handler = handlers.get(route);
    const reply = queued && queued.length > 0 ? queued.shift() : handler ? handler(call) : undefined;
    if (!reply) {
      return toResponse({ status: 404, statusText: "Not Found", text: "not found", contentType: "text/html" });
    }
    if (reply.networkError) {
      throw new TypeError("fetch failed");
    }
    return toResponse(reply);
  };

  return {
    fetch,
    calls,
    on(method: string, url: string, handler: FakeHandler | FakeReply) {
      handlers.set(routeKey(method, url), typeof handler === "function" ? handler : () => handler);
    },
    enqueue(method: string, url: string, ...replies: FakeReply[]) {
      const key = routeKey(method, url);
      queues.set(key, [...(queues.get(key) ?? []), ...replies]);
    },
    callsTo(method: string, url: string): RecordedCall[] {
      const key = routeKey(method, url);
      return calls.filter((call) => call.route === key);
    }
  };
};

export type FakeService = ReturnType<typeof createFakeService>;

export const WEB_AUTH_COOKIE_HEADER = "X-APPLE-WEBAUTH-TOKEN=test-web-auth; Domain=icloud.com; Path=/; Secure";

export interface TestSessionOptions {
  readonly service: FakeService;
  readonly state?: SessionState;
  readonly store?: SessionStore;
  readonly logger?: Logger;
  readonly secondStepPending?: () => boolean;
}

export const createTestSession = (options: TestSessionOptions): AccountSession => {
  const state = options.state ?? new SessionState();
  if (!state.has("client_id")) {
    state.bindClientId("auth-test-client");
  }
  return new AccountSession({
    state,
    store: options.store ?? createInMemorySessionStore(),
    endpoints,
    logger: options.logger ?? createNoopLogger(),
    fetchImplementation: options.service.fetch,
    secondStepPending: options.secondStepPending
  });
};
