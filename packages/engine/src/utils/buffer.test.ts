import { describe, expect, it } from "vitest";
import { concat, decodeToString, fromString, indexOfByte } from "./buffer.js";

describe("buffer utils", () => {
  it("encodes and decodes UTF-8", () => {
    const bytes = fromString("héllo");
    expect(bytes.length).toBe(6);
    expect(decodeToString(bytes)).toBe("héllo");
  });

  it("concatenates chunks in order", () => {
    const joined = concat([new Uint8Array([1, 2]), new Uint8Array(0), new Uint8Array([3])]);
    expect(Array.from(joined)).toEqual([1, 2, 3]);
  });

  it("finds a byte from an offset", () => {
    const data = fromString("a\nb\n");
    expect(indexOfByte(data, 0x0a)).toBe(1);
    expect(indexOfByte(data, 0x0a, 2)).toBe(3);
    expect(indexOfByte(data, 0x0d)).toBe(-1);
  });
});
