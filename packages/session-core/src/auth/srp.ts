/**
 * Client half of the SRP-6a password proof used by the sign-in endpoint: RFC 5054 2048-bit group,
 * SHA-256, padded `k` and `u`, and an `x` that leaves the account name out.  The password itself
 * never enters the exchange; only the PBKDF2-derived password key does.
 */
import { createHash, pbkdf2Sync, randomBytes } from "node:crypto";

import { SessionError } from "../errors";

export type SrpProtocol = "s2k" | "s2k_fo";

export const SRP_PROTOCOLS: ReadonlyArray<SrpProtocol> = ["s2k", "s2k_fo"];

const N_HEX =
  "AC6BDB41324A9A9BF166DE5E1389582FAF72B6651987EE07FC3192943DB56050A37329CBB4A099ED8193E0757767A13D" +
  "D52312AB4B03310DCD7F48A9DA04FD50E8083969EDB767B0CF6095179A163AB3661A05FBD5FAAAE82918A9962F0B93B8" +
  "55F97993EC975EEAA80D740ADBF4FF747359D041D5C33EA71D281E446B14773BCA97B43A23FB801676BD207A436C6481" +
  "F1D2B9078717461A5B9D32E688F87748544523B524B0D57D5EA77A2775D2ECFA032CFBDBF52FB3786160279004E57AE6" +
  "AF874E7303CE53299CCC041C7BC308D82A5698F3A8D0C38271AE35F8E9DBFBB694B5C803D89F7AE435DE236D525F5475" +
  "9B65E372FCD68EF20FA7111F9E4AFF73";

export const SRP_GROUP = {
  N: BigInt(`0x${N_HEX}`),
  g: 2n,
  byteLength: N_HEX.length / 2
} as const;

const PRIVATE_KEY_BYTES = 32;

export const bytesToBigInt = (bytes: Uint8Array): bigint =>
  bytes.length === 0 ? 0n : BigInt(`0x${Buffer.from(bytes).toString("hex")}`);

/** Big-endian bytes of `value`, left-padded with zeros to `length` when given. */
export const bigIntToBytes = (value: bigint, length?: number): Buffer => {
  let hex = value.toString(16);
  if (hex.length % 2 === 1) {
    hex = `0${hex}`;
  }
  const raw = Buffer.from(hex, "hex");
  if (length === undefined || raw.length >= length) {
    return raw;
  }
  return Buffer.concat([Buffer.alloc(length - raw.length), raw]);
};

export const modPow = (base: bigint, exponent: bigint, modulus: bigint): bigint => {
  if (modulus === 1n) {
    return 0n;
  }
  let result = 1n;
  let factor = base % modulus;
  let remaining = exponent;
  while (remaining > 0n) {
    if (remaining % 2n === 1n) {
      result = (result * factor) % modulus;
    }
    remaining >>= 1n;
    factor = (factor * factor) % modulus;
  }
  return result;
};

const mod = (value: bigint, modulus: bigint): bigint => ((value % modulus) + modulus) % modulus;

export const sha256 = (...parts: ReadonlyArray<Uint8Array | string>): Buffer => {
  const hash = createHash("sha256");
  for (const part of parts) {
    hash.update(part);
  }
  return hash.digest();
};

const pad = (value: bigint): Buffer => bigIntToBytes(value, SRP_GROUP.byteLength);

/** Strips leading zero bytes, matching the integer form the server hashes. */
const minimal = (bytes: Uint8Array): Buffer => bigIntToBytes(bytesToBigInt(bytes));

export const computeMultiplier = (): bigint => bytesToBigInt(sha256(pad(SRP_GROUP.N), pad(SRP_GROUP.g)));

export const computeScrambler = (clientPublic: bigint, serverPublic: bigint): bigint =>
  bytesToBigInt(sha256(pad(clientPublic), pad(serverPublic)));

export const computePrivateExponent = (salt: Uint8Array, passwordKey: Uint8Array): bigint =>
  bytesToBigInt(sha256(salt, sha256(":", passwordKey)));

/**
 * PBKDF2-HMAC-SHA256 over a SHA-256 pre-hash of the password.  `s2k_fo` feeds the lowercase hex
 * form of the pre-hash instead of the raw digest.
 */
export const derivePasswordKey = (
  secret: string,
  salt: Uint8Array,
  iterations: number,
  protocol: SrpProtocol,
  keyLength = 32
): Buffer => {
  const digest = sha256(Buffer.from(secret, "utf8"));
  const input = protocol === "s2k_fo" ? Buffer.from(digest.toString("hex"), "utf8") : digest;
  return pbkdf2Sync(input, salt, iterations, keyLength, "sha256");
};

export interface SrpProofInput {
  readonly salt: Uint8Array;
  readonly serverPublic: Uint8Array;
  readonly passwordKey: Uint8Array;
}

export interface SrpProof {
  /** Client proof M1. */
  readonly m1: Buffer;
  /** Server proof the client expects back, M2. */
  readonly m2: Buffer;
  readonly sessionKey: Buffer;
}

export class SrpClient {
  readonly identifier: string;
  private readonly privateKey: bigint;
  private readonly publicValue: bigint;

  /** `privateKey` is only for reproducible derivations; omit it to draw a fresh ephemeral key. */
  constructor(identifier: string, privateKey?: bigint) {
    this.identifier = identifier;
    this.privateKey = privateKey ?? bytesToBigInt(randomBytes(PRIVATE_KEY_BYTES));
    this.publicValue = modPow(SRP_GROUP.g, this.privateKey, SRP_GROUP.N);
  }

  get publicKey(): Buffer {
    return bigIntToBytes(this.publicValue);
  }

  computeProof(input: SrpProofInput): SrpProof {
    const { N, g } = SRP_GROUP;
    const serverPublic = bytesToBigInt(input.serverPublic);
    if (serverPublic % N === 0n) {
      throw new SessionError("protocol", "Server public value is invalid");
    }
    const scrambler = computeScrambler(this.publicValue, serverPublic);
    if (scrambler === 0n) {
      throw new SessionError("protocol", "Scrambling parameter is zero");
    }

    const x = computePrivateExponent(input.salt, input.passwordKey);
    const base = mod(serverPublic - computeMultiplier() * modPow(g, x, N), N);
    const secret = modPow(base, this.privateKey + scrambler * x, N);
    const sessionKey = sha256(bigIntToBytes(secret));

    const hashN = sha256(bigIntToBytes(N));
    const hashG = sha256(pad(g));
    const groupHash = Buffer.alloc(hashN.length);
    for (let index = 0; index < hashN.length; index += 1) {
      groupHash[index] = hashN[index] ^ hashG[index];
    }

    const clientPublicBytes = bigIntToBytes(this.publicValue);
    const m1 = sha256(
      groupHash,
      sha256(this.identifier),
      minimal(input.salt),
      clientPublicBytes,
      bigIntToBytes(serverPublic),
      sessionKey
    );
    const m2 = sha256(clientPublicBytes, m1, sessionKey);
    return { m1, m2, sessionKey };
  }
}
