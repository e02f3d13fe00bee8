import { describe, expect, it } from "vitest";

import { createFakeService, createTestSession, endpoints } from "../../__tests__/fakeService";
import { installSigninRoutes, TEST_IDENTIFIER, TEST_SECRET, TWO_FACTOR_OPTIONS } from "../../__tests__/signinFixture";
import { createNoopLogger } from "../../logger";
import { SessionState } from "../../store/sessionState";
import { CredentialAuthenticator, parseSrpChallenge } from "../credentialAuthenticator";
import { createCredentials } from "../types";

const credentials = createCredentials(TEST_IDENTIFIER, TEST_SECRET);

describe("CredentialAuthenticator", () => {
  it("signs in with a valid proof", async () => {
    const service = createFakeService();
    const fixture = installSigninRoutes(service);
    const session = createTestSession({ service });
    const authenticator = new CredentialAuthenticator({ logger: createNoopLogger() });

    const result = await authenticator.authenticate(credentials, session);

    expect(result).toEqual({ status: "authenticated" });
    expect(session.state.get("session_token")).toBe("session-token-1");
    const [complete] = service.callsTo("POST", `${endpoints.auth}/signin/complete`);
    expect(complete?.body).toMatchObject({
      accountName: TEST_IDENTIFIER,
      c: "server-state",
      m2: fixture.expectedServerProofs[0],
      rememberMe: true,
      trustTokens: []
    });
    expect(complete?.url.searchParams.get("isRememberMeEnabled")).toBe("true");
  });

  it("supports the hex pre-hash protocol", async () => {
    const service = createFakeService();
    installSigninRoutes(service, { protocol: "s2k_fo" });
    const session = createTestSession({ service });
    const authenticator = new CredentialAuthenticator({ logger: createNoopLogger() });

    await expect(authenticator.authenticate(credentials, session)).resolves.toEqual({ status: "authenticated" });
  });

  it("sends the init request with both protocols and the account name", async () => {
    const service = createFakeService();
    installSigninRoutes(service);
    const session = createTestSession({ service });

    await new CredentialAuthenticator({ logger: createNoopLogger() }).authenticate(credentials, session);

    const [init] = service.callsTo("POST", `${endpoints.auth}/signin/init`);
    expect(init?.body).toMatchObject({ accountName: TEST_IDENTIFIER, protocols: ["s2k", "s2k_fo"] });
    expect(init?.headers["X-Apple-Widget-Key"]).toBe("d39ba9916b7251055b22c7f910e2ea796ee65e98b2ddecea8f5dde8d9d1a815d");
  });

  it("echoes a stored trust token", async () => {
    const service = createFakeService();
    installSigninRoutes(service);
    const state = new SessionState({ fields: { client_id: "auth-test-client", trust_token: "trust-1" }, cookies: null });
    const session = createTestSession({ service, state });

    await new CredentialAuthenticator({ logger: createNoopLogger() }).authenticate(credentials, session);

    const [complete] = service.callsTo("POST", `${endpoints.auth}/signin/complete`);
    expect(complete?.body).toMatchObject({ trustTokens: ["trust-1"] });
  });

  it("reports a wrong secret as invalid credentials with the server message", async () => {
    const service = createFakeService();
    installSigninRoutes(service, { secret: "another-secret" });
    const session = createTestSession({ service });

    await expect(
      new CredentialAuthenticator({ logger: createNoopLogger() }).authenticate(credentials, session)
    ).rejects.toMatchObject({
      kind: "invalid_credentials",
      code: "-20101",
      message: "Your account name or password was incorrect."
    });
  });

  it("returns the two-factor challenge when the proof is accepted with a second-factor response", async () => {
    const service = createFakeService();
    installSigninRoutes(service, { onAccepted: { status: 409, json: { authType: "hsa2" } } });
    service.on("GET", endpoints.auth, { json: TWO_FACTOR_OPTIONS });
    const session = createTestSession({ service });

    const result = await new CredentialAuthenticator({ logger: createNoopLogger() }).authenticate(credentials, session);

    expect(result).toEqual({
      status: "mfa_required",
      challenge: {
        type: "mfa",
        kind: "push",
        tier: "hsa2",
        trustedPhoneNumber: { id: 1, numberWithDialCode: "+1 (•••) •••-••12", pushMode: "sms" },
        codeLength: 6
      }
    });
    expect(session.state.get("scnt")).toBe("scnt-1");
  });

  it("uses a fresh ephemeral key on every attempt", async () => {
    const service = createFakeService();
    const fixture = installSigninRoutes(service);
    const authenticator = new CredentialAuthenticator({ logger: createNoopLogger() });

    await authenticator.authenticate(credentials, createTestSession({ service }));
    await authenticator.authenticate(credentials, createTestSession({ service }));

    expect(fixture.clientPublics).toHaveLength(2);
    expect(fixture.clientPublics[0]).not.toBe(fixture.clientPublics[1]);
  });

  it("fails with a protocol error on a malformed challenge", async () => {
    const service = createFakeService();
    installSigninRoutes(service);
    service.on("POST", `${endpoints.auth}/signin/init`, {
      json: { salt: "c2FsdA==", b: "Yg==", c: "server-state", iteration: 0, protocol: "s2k" }
    });
    const session = createTestSession({ service });

    await expect(
      new CredentialAuthenticator({ logger: createNoopLogger() }).authenticate(credentials, session)
    ).rejects.toMatchObject({ kind: "protocol" });
    expect(service.callsTo("POST", `${endpoints.auth}/signin/complete`)).toHaveLength(0);
  });
});

describe("parseSrpChallenge", () => {
  it("decodes a well-formed challenge", () => {
    const challenge = parseSrpChallenge({ salt: "c2FsdA==", b: "Yg==", c: "state", iteration: 20000, protocol: "s2k_fo" });
    expect(challenge.salt.toString("utf8")).toBe("salt");
    expect(challenge.serverPublic.toString("utf8")).toBe("b");
    expect(challenge.iterations).toBe(20000);
    expect(challenge.keyLength).toBe(32);
    expect(challenge.protocol).toBe("s2k_fo");
  });

  it("rejects unsupported protocols", () => {
    expect(() => parseSrpChallenge({ salt: "c2FsdA==", b: "Yg==", c: "state", iteration: 1, protocol: "md5" })).toThrow(
      "Sign-in challenge uses an unsupported protocol"
    );
  });
});
