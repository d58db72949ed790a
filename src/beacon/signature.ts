import { hmac } from "@noble/hashes/hmac";
import { sha256 } from "@noble/hashes/sha2";
import { utf8ToBytes } from "@noble/hashes/utils";

/** Bytes of the HMAC-SHA256 that beacons transmit. */
export const MAC_TRUNCATION_LENGTH = 4;

/**
 * Truncated HMAC-SHA256 over beacon payloads.
 *
 * The secret is shared with the beacon firmware. Strings are taken as UTF-8.
 */
export class SignatureVerifier {
  private readonly key: Uint8Array;

  constructor(secret: string | Uint8Array) {
    this.key = typeof secret === "string" ? utf8ToBytes(secret) : Uint8Array.from(secret);
    if (this.key.length === 0) {
      throw new Error("SignatureVerifier requires a non-empty secret");
    }
  }

  sign(payload: Uint8Array, truncationLength = MAC_TRUNCATION_LENGTH): Uint8Array {
    return hmac(sha256, this.key, payload).slice(0, truncationLength);
  }

  /** Never throws; any mismatch, including a MAC of the wrong length, is `false`. */
  verify(
    payload: Uint8Array,
    mac: Uint8Array,
    truncationLength = MAC_TRUNCATION_LENGTH
  ): boolean {
    if (truncationLength <= 0 || mac.length !== truncationLength) return false;
    return constantTimeEqual(this.sign(payload, truncationLength), mac);
  }
}

export function constantTimeEqual(a: Uint8Array, b: Uint8Array): boolean {
  if (a.length !== b.length) return false;
  let diff = 0;
  for (let i = 0; i < a.length; i++) {
    diff |= a[i] ^ b[i];
  }
  return diff === 0;
}
