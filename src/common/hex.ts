import { bytesToHex, hexToBytes } from "@noble/hashes/utils";

/** Colon separated lowercase hex, e.g. `01:ab`. */
export function toHexString(bytes: Uint8Array): string {
  return bytesToHex(bytes).replace(/(..)(?!$)/g, "$1:");
}

/** Accepts `01ab`, `01:ab`, `01-ab` or `01 ab`. */
export function fromHex(hex: string): Uint8Array {
  return hexToBytes(hex.replace(/[\s:-]/g, ""));
}
