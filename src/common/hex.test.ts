import { fromHex, toHexString } from "./hex";

describe("hex", () => {
  test("should format bytes as colon separated pairs", () => {
    expect(toHexString(Uint8Array.of(0x01, 0xab, 0x00))).toBe("01:ab:00");
    expect(toHexString(Uint8Array.of(0x7f))).toBe("7f");
    expect(toHexString(new Uint8Array(0))).toBe("");
  });

  test("should parse hex with or without separators", () => {
    expect(fromHex("01ab")).toEqual(Uint8Array.of(0x01, 0xab));
    expect(fromHex("01:AB")).toEqual(Uint8Array.of(0x01, 0xab));
    expect(fromHex("01-ab ff")).toEqual(Uint8Array.of(0x01, 0xab, 0xff));
  });

  test("should reject odd length and non-hex input", () => {
    expect(() => fromHex("abc")).toThrow();
    expect(() => fromHex("zz")).toThrow();
  });
});
