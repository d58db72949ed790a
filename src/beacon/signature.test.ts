import { createHmac } from "crypto";
import { constantTimeEqual, SignatureVerifier } from "./signature";

const payload = Uint8Array.from([
  0x20, 0x01, 0x0e, 0x74, 0x00, 0x32, 0x00, 0x00, 0x00, 0x07, 0x00, 0x00, 0x27, 0x10,
]);

function reference(key: string | Buffer, data: Uint8Array, n = 4): number[] {
  return Array.from(createHmac("sha256", key).update(data).digest().subarray(0, n));
}

describe("SignatureVerifier", () => {
  const verifier = new SignatureVerifier("test-secret");

  test("should produce the leading bytes of HMAC-SHA256", () => {
    expect(Array.from(verifier.sign(payload))).toEqual(reference("test-secret", payload));
    expect(Array.from(verifier.sign(payload, 8))).toEqual(reference("test-secret", payload, 8));
  });

  test("should accept raw key bytes", () => {
    const key = Buffer.from([1, 2, 3, 4, 5]);
    const v = new SignatureVerifier(Uint8Array.from(key));
    expect(Array.from(v.sign(payload))).toEqual(reference(key, payload));
  });

  test("should verify its own MAC", () => {
    expect(verifier.verify(payload, verifier.sign(payload))).toBe(true);
  });

  test("should reject a MAC with any bit flipped", () => {
    const mac = verifier.sign(payload);
    for (let byte = 0; byte < mac.length; byte++) {
      for (let bit = 0; bit < 8; bit++) {
        const bad = Uint8Array.from(mac);
        bad[byte] ^= 1 << bit;
        expect(verifier.verify(payload, bad)).toBe(false);
      }
    }
  });

  test("should reject a MAC over a modified payload", () => {
    const mac = verifier.sign(payload);
    const changed = Uint8Array.from(payload);
    changed[3] ^= 0x01;
    expect(verifier.verify(changed, mac)).toBe(false);
  });

  test("should reject a MAC of the wrong length without throwing", () => {
    const mac = verifier.sign(payload, 8);
    expect(verifier.verify(payload, mac)).toBe(false);
    expect(verifier.verify(payload, new Uint8Array(0))).toBe(false);
  });

  test("should reject a MAC made with another key", () => {
    const other = new SignatureVerifier("other-secret");
    expect(verifier.verify(payload, other.sign(payload))).toBe(false);
  });

  test("should refuse an empty secret", () => {
    expect(() => new SignatureVerifier("")).toThrow("non-empty secret");
  });
});

describe("constantTimeEqual", () => {
  test("should compare by content and length", () => {
    expect(constantTimeEqual(Uint8Array.of(1, 2), Uint8Array.of(1, 2))).toBe(true);
    expect(constantTimeEqual(Uint8Array.of(1, 2), Uint8Array.of(1, 3))).toBe(false);
    expect(constantTimeEqual(Uint8Array.of(1, 2), Uint8Array.of(1, 2, 3))).toBe(false);
  });
});
