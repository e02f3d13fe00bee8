import { CookieJar } from "tough-cookie";

import { SESSION_HEADER_FIELDS, type SessionFieldKey } from "../constants";

export type SessionFields = Readonly<Record<string, string>>;

export interface SessionSnapshot {
  readonly fields: SessionFields;
  readonly cookies: CookieJar.Serialized | null;
}

export interface HeaderReader {
  get(name: string): string | null;
}

export const createEmptySnapshot = (): SessionSnapshot => ({ fields: {}, cookies: null });

/**
 * Mutable session state for one account: the flat token map plus the cookie jar.  Field writes go
 * through `merge` (additive) or `reset` (explicit removal); `snapshot` copies both halves
 * synchronously so a save never sees a half-applied response.
 */
export class SessionState {
  private fields: Record<string, string>;
  readonly cookies: CookieJar;

  constructor(snapshot: SessionSnapshot = createEmptySnapshot()) {
    this.fields = { ...snapshot.fields };
    this.cookies = snapshot.cookies ? CookieJar.deserializeSync(snapshot.cookies) : new CookieJar();
  }

  get(key: SessionFieldKey): string | undefined {
    return this.fields[key];
  }

  has(key: SessionFieldKey): boolean {
    return typeof this.fields[key] === "string" && this.fields[key].length > 0;
  }

  merge(update: Readonly<Partial<Record<SessionFieldKey, string | null | undefined>>>): void {
    const next = { ...this.fields };
    for (const [key, value] of Object.entries(update)) {
      if (typeof value === "string" && value.length > 0) {
        next[key] = value;
      }
    }
    this.fields = next;
  }

  mergeFromHeaders(headers: HeaderReader): void {
    const update: Partial<Record<SessionFieldKey, string>> = {};
    for (const [header, key] of Object.entries(SESSION_HEADER_FIELDS)) {
      const value = headers.get(header);
      if (value) {
        update[key] = value;
      }
    }
    this.merge(update);
  }

  /**
   * Adopts `clientId` for this session.  Tokens minted under a different client id are dropped.
   */
  bindClientId(clientId: string): void {
    const current = this.fields.client_id;
    if (current !== undefined && current !== clientId) {
      this.reset(["session_token", "trust_token"]);
    }
    this.merge({ client_id: clientId });
  }

  /** Removes the named fields, or every field and cookie when called without arguments. */
  reset(keys?: ReadonlyArray<SessionFieldKey>): void {
    if (!keys) {
      this.fields = {};
      this.cookies.removeAllCookiesSync();
      return;
    }
    const next = { ...this.fields };
    for (const key of keys) {
      delete next[key];
    }
    this.fields = next;
  }

  storeCookies(setCookieHeaders: ReadonlyArray<string>, url: string): void {
    for (const header of setCookieHeaders) {
      this.cookies.setCookieSync(header, url, { ignoreError: true });
    }
  }

  cookieHeader(url: string): string {
    return this.cookies.getCookieStringSync(url);
  }

  hasCookie(name: string, url: string): boolean {
    return this.cookies.getCookiesSync(url).some((cookie) => cookie.key === name);
  }

  snapshot(): SessionSnapshot {
    return {
      fields: { ...this.fields },
      cookies: this.cookies.serializeSync()
    };
  }
}
