/**
 * Boundary to whatever talks to the physical authenticator.  This package performs one assertion
 * ceremony through the bridge and never touches device discovery itself.
 */
export interface SecurityKeyDevice {
  readonly id: string;
  readonly label: string;
}

export interface SecurityKeyAssertionRequest {
  readonly challenge: string;
  readonly rpId: string;
  readonly allowCredentials: ReadonlyArray<string>;
  readonly origin: string;
}

export interface SecurityKeyAssertion {
  readonly clientData: Uint8Array;
  readonly signature: Uint8Array;
  readonly authenticatorData: Uint8Array;
  readonly userHandle: Uint8Array | null;
  readonly credentialId: Uint8Array;
}

export interface SecurityKeyBridge {
  listDevices(): Promise<ReadonlyArray<SecurityKeyDevice>>;
  getAssertion(device: SecurityKeyDevice, request: SecurityKeyAssertionRequest): Promise<SecurityKeyAssertion>;
}

const toBase64 = (bytes: Uint8Array): string => Buffer.from(bytes).toString("base64");

export const encodeAssertion = (
  assertion: SecurityKeyAssertion,
  request: SecurityKeyAssertionRequest
): Record<string, string | null> => ({
  challenge: request.challenge,
  rpId: request.rpId,
  clientData: toBase64(assertion.clientData),
  signatureData: toBase64(assertion.signature),
  authenticatorData: toBase64(assertion.authenticatorData),
  userHandle: assertion.userHandle ? toBase64(assertion.userHandle) : null,
  credentialID: toBase64(assertion.credentialId)
});
