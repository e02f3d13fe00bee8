import { describe, expect, it, vi } from "vitest";

import { createFakeService, createTestSession, endpoints, type FakeReply } from "../../__tests__/fakeService";
import { SessionError } from "../../errors";
import { createNoopLogger } from "../../logger";
import { isWrongCodeError, MfaStateMachine } from "../mfaStateMachine";
import type { SecurityKeyBridge } from "../securityKey";
import type { MfaChallenge } from "../types";

const WRONG_CODE: FakeReply = {
  status: 400,
  json: { service_errors: [{ code: "-21669", message: "Incorrect verification code." }] }
};

const ACCOUNT_LOGIN_OK: FakeReply = {
  json: { dsInfo: { dsid: "1001", hsaVersion: 2 }, hsaTrustedBrowser: true, webservices: {} }
};

const pushChallenge: MfaChallenge = { type: "mfa", kind: "push", tier: "hsa2", codeLength: 6 };
const smsChallenge: MfaChallenge = {
  type: "mfa",
  kind: "sms",
  tier: "hsa2",
  trustedPhoneNumber: { id: 3, numberWithDialCode: "+1 (•••) •••-••34", pushMode: "sms" }
};
const deviceChallenge: MfaChallenge = { type: "mfa", kind: "sms", tier: "hsa1" };
const securityKeyChallenge: MfaChallenge = {
  type: "mfa",
  kind: "security_key",
  tier: "hsa2",
  fido: { challenge: "fido-challenge", keyHandles: ["handle-1"], rpId: "apple.com" }
};

const createMachine = (bridge?: SecurityKeyBridge) =>
  new MfaStateMachine({ logger: createNoopLogger(), securityKeyBridge: bridge });

describe("MfaStateMachine", () => {
  it("keeps waiting after wrong codes and accepts the right one", async () => {
    const service = createFakeService();
    const url = `${endpoints.auth}/verify/trusteddevice/securitycode`;
    service.enqueue("POST", url, WRONG_CODE, WRONG_CODE, WRONG_CODE, { status: 204 });
    const session = createTestSession({ service });
    const machine = createMachine();
    machine.begin(pushChallenge);

    const results: boolean[] = [];
    for (const code of ["111111", "222222", "333333", "123456"]) {
      results.push(await machine.submitPushOrSmsCode(session, code));
    }

    expect(results).toEqual([false, false, false, true]);
    expect(service.callsTo("POST", url)).toHaveLength(4);
    expect(service.callsTo("POST", url)[3]?.body).toEqual({ securityCode: { code: "123456" } });
    expect(machine.getState()).toEqual({ status: "session_trust_requested", challenge: pushChallenge });
  });

  it("counts wrong attempts while waiting", async () => {
    const service = createFakeService();
    service.enqueue("POST", `${endpoints.auth}/verify/trusteddevice/securitycode`, WRONG_CODE, WRONG_CODE);
    const session = createTestSession({ service });
    const machine = createMachine();
    machine.begin(pushChallenge);

    await machine.submitPushOrSmsCode(session, "000000");
    await machine.submitPushOrSmsCode(session, "000001");

    expect(machine.getState()).toEqual({ status: "awaiting_push_code", challenge: pushChallenge, attempts: 2 });
  });

  it("verifies SMS codes against the phone number", async () => {
    const service = createFakeService();
    service.on("POST", `${endpoints.auth}/verify/phone/securitycode`, { status: 200, json: {} });
    const session = createTestSession({ service });
    const machine = createMachine();
    expect(machine.begin(smsChallenge)).toEqual({
      status: "awaiting_sms_code",
      challenge: smsChallenge,
      device: null,
      attempts: 0
    });

    await expect(machine.submitPushOrSmsCode(session, "654321")).resolves.toBe(true);

    const [call] = service.callsTo("POST", `${endpoints.auth}/verify/phone/securitycode`);
    expect(call?.body).toEqual({ securityCode: { code: "654321" }, phoneNumber: { id: 3 }, mode: "sms" });
    expect(call?.headers.Accept).toBe("application/json");
  });

  it("moves to failed and rethrows on other server errors", async () => {
    const service = createFakeService();
    service.on("POST", `${endpoints.auth}/verify/trusteddevice/securitycode`, {
      status: 403,
      json: { errorMessage: "Too many attempts", errorCode: "ACCESS_DENIED" }
    });
    const session = createTestSession({ service });
    const machine = createMachine();
    machine.begin(pushChallenge);

    await expect(machine.submitPushOrSmsCode(session, "123456")).rejects.toMatchObject({ kind: "rate_limited" });
    expect(machine.getState().status).toBe("failed");
  });

  it("lists devices and verifies a code sent to one of them", async () => {
    const service = createFakeService();
    service.on("GET", `${endpoints.setup}/listDevices`, {
      json: {
        devices: [
          { deviceType: "SMS", phoneNumber: "********12", deviceId: "1" },
          { deviceName: "Work Laptop", deviceId: "2" }
        ]
      }
    });
    service.on("POST", `${endpoints.setup}/sendVerificationCode`, { json: { success: true } });
    service.on("POST", `${endpoints.setup}/validateVerificationCode`, { json: { success: true } });
    const session = createTestSession({ service });
    const machine = createMachine();
    expect(machine.begin(deviceChallenge).status).toBe("awaiting_device_selection");

    const devices = await machine.listTrustedDevices(session);
    expect(devices.map((device) => device.displayName)).toEqual(["SMS to ********12", "Work Laptop"]);
    const [first] = devices;
    if (!first) {
      throw new Error("expected a trusted device");
    }

    await expect(machine.sendCode(session, first)).resolves.toBe(true);
    expect(machine.getState()).toMatchObject({ status: "awaiting_sms_code", device: first, attempts: 0 });
    await expect(machine.submitCode(session, first, "987654")).resolves.toBe(true);

    const [validate] = service.callsTo("POST", `${endpoints.setup}/validateVerificationCode`);
    expect(validate?.body).toEqual({
      deviceType: "SMS",
      phoneNumber: "********12",
      deviceId: "1",
      verificationCode: "987654",
      trustBrowser: true
    });
    expect(validate?.url.searchParams.get("clientId")).toBe("auth-test-client");
  });

  it("treats a setup-service wrong code as a retry", async () => {
    const service = createFakeService();
    service.on("POST", `${endpoints.setup}/validateVerificationCode`, {
      status: 400,
      json: { errorCode: -21669, errorMessage: "Incorrect verification code" }
    });
    const session = createTestSession({ service });
    const machine = createMachine();
    machine.begin(deviceChallenge);

    await expect(
      machine.submitCode(session, { id: "1", displayName: "Phone", raw: { deviceId: "1" } }, "000000")
    ).resolves.toBe(false);
  });

  it("refuses to submit without a pending challenge", async () => {
    const session = createTestSession({ service: createFakeService() });
    await expect(createMachine().submitPushOrSmsCode(session, "123456")).rejects.toThrow(
      "No second-factor challenge is pending (state: no_challenge)"
    );
  });

  it("rejects a security key challenge without its FIDO fields", async () => {
    const session = createTestSession({ service: createFakeService() });
    const machine = createMachine();
    const incomplete: MfaChallenge = { ...securityKeyChallenge, fido: { challenge: "fido-challenge" } };

    await expect(machine.confirmSecurityKey(session, incomplete)).rejects.toMatchObject({ kind: "protocol" });
  });

  it("reports a missing security key as an unavailable resource", async () => {
    const session = createTestSession({ service: createFakeService() });
    const bridge: SecurityKeyBridge = {
      listDevices: vi.fn(async () => []),
      getAssertion: vi.fn()
    };

    await expect(createMachine().confirmSecurityKey(session, securityKeyChallenge)).rejects.toMatchObject({
      kind: "resource_unavailable"
    });
    await expect(createMachine(bridge).confirmSecurityKey(session, securityKeyChallenge)).rejects.toMatchObject({
      kind: "resource_unavailable",
      message: "No FIDO2 devices found"
    });
    expect(bridge.getAssertion).not.toHaveBeenCalled();
  });

  it("posts the encoded assertion from the security key", async () => {
    const service = createFakeService();
    service.on("POST", `${endpoints.auth}/verify/security/key`, { status: 200, json: {} });
    const session = createTestSession({ service });
    const device = { id: "key-1", label: "USB key" };
    const bridge: SecurityKeyBridge = {
      listDevices: vi.fn(async () => [device]),
      getAssertion: vi.fn(async () => ({
        clientData: Buffer.from("client"),
        signature: Buffer.from("sig"),
        authenticatorData: Buffer.from("auth"),
        userHandle: null,
        credentialId: Buffer.from("cred")
      }))
    };
    const machine = createMachine(bridge);
    machine.begin(securityKeyChallenge);

    await machine.confirmSecurityKey(session);

    expect(bridge.getAssertion).toHaveBeenCalledWith(device, {
      challenge: "fido-challenge",
      rpId: "apple.com",
      allowCredentials: ["handle-1"],
      origin: endpoints.home
    });
    const [call] = service.callsTo("POST", `${endpoints.auth}/verify/security/key`);
    expect(call?.body).toEqual({
      challenge: "fido-challenge",
      rpId: "apple.com",
      clientData: "Y2xpZW50",
      signatureData: "c2ln",
      authenticatorData: "YXV0aA==",
      userHandle: null,
      credentialID: "Y3JlZA=="
    });
    expect(machine.getState().status).toBe("session_trust_requested");
  });

  it("trusts the session and refreshes the account", async () => {
    const service = createFakeService();
    service.on("GET", `${endpoints.auth}/2sv/trust`, {
      status: 204,
      headers: { "X-Apple-TwoSV-Trust-Token": "trust-token-1" }
    });
    service.on("POST", `${endpoints.setup}/accountLogin`, ACCOUNT_LOGIN_OK);
    const session = createTestSession({ service });
    const machine = createMachine();
    machine.begin(pushChallenge);

    await expect(machine.trustSession(session)).resolves.toBe(true);
    expect(session.state.get("trust_token")).toBe("trust-token-1");
    expect(session.state.get("dsid")).toBe("1001");
    expect(machine.getState()).toEqual({ status: "trusted" });
  });

  it("reports a rejected trust request as false", async () => {
    const service = createFakeService();
    service.on("GET", `${endpoints.auth}/2sv/trust`, { status: 403, text: "Forbidden", contentType: "text/plain" });
    const session = createTestSession({ service });
    const machine = createMachine();
    machine.begin(pushChallenge);

    await expect(machine.trustSession(session)).resolves.toBe(false);
    expect(service.callsTo("POST", `${endpoints.setup}/accountLogin`)).toHaveLength(0);
  });
});

describe("isWrongCodeError", () => {
  it("recognises the wrong-code sentinel in the code or the payload", () => {
    expect(isWrongCodeError(new SessionError("unknown", "bad", { code: -21669 }))).toBe(true);
    expect(
      isWrongCodeError(new SessionError("unknown", "bad", { code: 400, payload: { serviceErrors: [{ code: "-21669" }] } }))
    ).toBe(true);
    expect(isWrongCodeError(new SessionError("unknown", "bad", { code: 400 }))).toBe(false);
    expect(isWrongCodeError(new Error("-21669"))).toBe(false);
  });
});
