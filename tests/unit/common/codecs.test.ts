// tests/unit/common/codecs.test.ts
import { describe, it } from "vitest";
import assert from "assert";
import {
  concatBytes,
  decodeBoolean,
  decodeInteger,
  decodeUtf8,
  encodeBoolean,
  encodeInteger,
  encodeUtf8,
  equalBytes,
  fromHex,
  toHex,
} from "../../../src/common/codecs.js";

describe("codecs: hex and byte helpers", () => {
  it("toHex renders lowercase pairs", () => {
    assert.strictEqual(toHex(new Uint8Array([0xde, 0xad, 0x0b, 0xef])), "dead0bef");
  });

  it("fromHex ignores whitespace and accepts either case", () => {
    assert.deepStrictEqual(Array.from(fromHex("de ad\nBE ef")), [0xde, 0xad, 0xbe, 0xef]);
  });

  it("fromHex rejects odd lengths and non-hex characters", () => {
    assert.throws(() => fromHex("abc"), /Invalid hex string/);
    assert.throws(() => fromHex("zz"), /Invalid hex string/);
  });

  it("concatBytes and equalBytes", () => {
    const joined = concatBytes(new Uint8Array([1, 2]), new Uint8Array([3]));
    assert.deepStrictEqual(Array.from(joined), [1, 2, 3]);
    assert.ok(equalBytes(joined, new Uint8Array([1, 2, 3])));
    assert.ok(!equalBytes(joined, new Uint8Array([1, 2, 4])));
    assert.ok(!equalBytes(joined, new Uint8Array([1, 2])));
  });

  it("encodeUtf8/decodeUtf8 handle non-ASCII text", () => {
    const bytes = encodeUtf8("é");
    assert.strictEqual(toHex(bytes), "c3a9");
    assert.strictEqual(decodeUtf8(bytes), "é");
  });
});

describe("codecs: INTEGER", () => {
  const vectors: [number, string][] = [
    [0, "00"],
    [127, "7f"],
    [128, "0080"],
    [256, "0100"],
    [-1, "ff"],
    [-128, "80"],
    [-129, "ff7f"],
    [0x7fffffff, "7fffffff"],
    [-0x80000000, "80000000"],
  ];

  for (const [value, expected] of vectors) {
    it(`encodes ${value} as ${expected}`, () => {
      assert.strictEqual(toHex(encodeInteger(value)), expected);
      assert.strictEqual(decodeInteger(fromHex(expected)), value);
    });
  }

  it("rejects values outside 32 bits and non-integers", () => {
    assert.throws(() => encodeInteger(0x80000000), /32-bit/);
    assert.throws(() => encodeInteger(1.5), /32-bit/);
  });

  it("decodes up to six content octets", () => {
    assert.strictEqual(decodeInteger(fromHex("7fffffffffff")), 140737488355327);
    assert.throws(() => decodeInteger(fromHex("00000000000001")), /exceeds/);
  });

  it("rejects an empty INTEGER", () => {
    assert.throws(() => decodeInteger(new Uint8Array(0)), /at least one content octet/);
  });
});

describe("codecs: BOOLEAN", () => {
  it("encodes TRUE as 0xff and FALSE as 0x00", () => {
    assert.strictEqual(toHex(encodeBoolean(true)), "ff");
    assert.strictEqual(toHex(encodeBoolean(false)), "00");
  });

  it("treats any non-zero octet as TRUE", () => {
    assert.strictEqual(decodeBoolean(fromHex("01")), true);
    assert.strictEqual(decodeBoolean(fromHex("00")), false);
  });

  it("requires exactly one octet", () => {
    assert.throws(() => decodeBoolean(new Uint8Array(0)), /exactly one octet; got 0/);
    assert.throws(() => decodeBoolean(fromHex("ffff")), /exactly one octet; got 2/);
  });
});
