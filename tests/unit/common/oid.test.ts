import { describe, expect, it } from "vitest";
import assert from "assert";
import { fromHex, toHex } from "../../../src/common/codecs.js";
import { OidSyntaxError } from "../../../src/common/errors.js";
import { Oid } from "../../../src/common/oid.js";

describe("Oid - text validation", () => {
  it.each(["0.0", "1.39", "2.40", "2.999.1", "1.3.6.1.4.1.1466", "1.2.840.113556.1.4.473"])(
    "accepts %s",
    (text) => {
      expect(Oid.isValid(text)).toBe(true);
    },
  );

  it.each(["", "1", "3.1", "1.40", "0.40", "1.", "1..2", ".1", "1.2a", "01.2", "1.2.-3"])(
    "rejects '%s'",
    (text) => {
      expect(Oid.isValid(text)).toBe(false);
    },
  );

  it("treats null and undefined as invalid", () => {
    expect(Oid.isValid(null)).toBe(false);
    expect(Oid.isValid(undefined)).toBe(false);
  });

  it("fromString reports why the text was rejected", () => {
    assert.throws(
      () => Oid.fromString("1.40"),
      (e: unknown) =>
        e instanceof OidSyntaxError &&
        e.input === "1.40" &&
        e.message === "Invalid OID '1.40': second arc must be <= 39",
    );
    assert.throws(() => Oid.fromString("1..2"), /empty arc at index 2/);
  });
});

describe("Oid - binary form", () => {
  it("encodes the first two arcs as one sub-identifier", () => {
    const oid = Oid.fromString("1.2.840.113549");
    expect(toHex(oid.toBytes())).toBe("2a864886f70d");
    expect(oid.encodedLength).toBe(6);
  });

  it("encodes a second arc above 39 under arc 2", () => {
    expect(toHex(Oid.fromString("2.999.3").toBytes())).toBe("883703");
  });

  it("encodes arcs wider than 32 bits", () => {
    const oid = Oid.fromString("1.2.4294967296");
    expect(oid.encodedLength).toBe(6);
    expect(toHex(oid.toBytes())).toBe("2a9080808000");
    expect(Oid.fromBytes(fromHex("2a9080808000")).toString()).toBe("1.2.4294967296");
  });

  it("splits the first sub-identifier at 40 and 80", () => {
    expect(Oid.fromBytes(fromHex("27")).toString()).toBe("0.39");
    expect(Oid.fromBytes(fromHex("4f")).toString()).toBe("1.39");
    expect(Oid.fromBytes(fromHex("50")).toString()).toBe("2.0");
    expect(Oid.fromBytes(fromHex("2a864886f70d")).toString()).toBe("1.2.840.113549");
  });

  it("rejects empty, truncated and padded content", () => {
    expect(() => Oid.fromBytes(new Uint8Array(0))).toThrow(OidSyntaxError);
    expect(() => Oid.fromBytes(fromHex("2a86"))).toThrow(/truncated/);
    expect(() => Oid.fromBytes(fromHex("2a8001"))).toThrow(/padded with 0x80/);
  });
});

describe("Oid - known encodings", () => {
  it.each([
    ["1.3.6.1.5.5.2", "2b0601050502"],
    ["1.2.840.48018.1.2.2", "2a864882f712010202"],
    ["0.39", "27"],
    ["1.0", "28"],
    ["1.39", "4f"],
    ["2.47", "7f"],
    ["2.48", "8100"],
    ["2.16303", "ff7f"],
    ["2.16304", "818000"],
    ["1.2.127", "2a7f"],
    ["1.2.128", "2a8100"],
    ["1.2.16383", "2aff7f"],
    ["1.2.16384", "2a818000"],
    ["1.2.268435455", "2affffff7f"],
    ["1.2.268435456", "2a8180808000"],
    ["1.2.9007199254740991", "2a8fffffffffffff7f"],
    ["2.9007199254740911", "8fffffffffffff7f"],
  ])("%s <-> %s", (text, bytes) => {
    const oid = Oid.fromString(text);
    expect(toHex(oid.toBytes())).toBe(bytes);
    expect(oid.encodedLength).toBe(bytes.length / 2);
    expect(Oid.fromBytes(fromHex(bytes)).toString()).toBe(text);
  });

  it.each([
    "0.0",
    "0.39.127",
    "1.39.128.16383",
    "2.40.16384",
    "2.999.268435456.1",
    "1.3.6.1.4.1.1466.20037",
    "1.2.9007199254740991",
    "2.9007199254740911",
  ])("round-trips %s through bytes and text", (text) => {
    const oid = Oid.fromString(text);
    assert.ok(Oid.fromBytes(oid.toBytes()).equals(oid));
    assert.ok(Oid.fromString(oid.toString()).equals(oid));
  });

  it("caps the second arc under 2 so the first sub-identifier stays exact", () => {
    expect(Oid.isValid("2.9007199254740911")).toBe(true);
    expect(Oid.isValid("2.9007199254740912")).toBe(false);
    expect(Oid.isValid("2.9007199254740991")).toBe(false);
    expect(Oid.isValid("2.5.9007199254740991")).toBe(true);
    assert.throws(
      () => Oid.fromString("2.9007199254740991"),
      (e: unknown) =>
        e instanceof OidSyntaxError &&
        e.message === "Invalid OID '2.9007199254740991': arc exceeds 9007199254740911",
    );
    expect(() => Oid.fromArcs([2, Number.MAX_SAFE_INTEGER])).toThrow(OidSyntaxError);
  });
});

describe("Oid - value semantics", () => {
  it("is immutable", () => {
    const oid = Oid.fromString("1.3.6.1");
    expect(Object.isFrozen(oid.arcs)).toBe(true);
  });

  it("fromArcs matches fromString", () => {
    const a = Oid.fromArcs([1, 2, 3]);
    const b = Oid.fromString("1.2.3");
    expect(a.equals(b)).toBe(true);
    expect(a.hashCode()).toBe(b.hashCode());
    expect(a.toString()).toBe("1.2.3");
  });

  it("fromArcs rejects negative arcs", () => {
    expect(() => Oid.fromArcs([1, -1])).toThrow(OidSyntaxError);
  });

  it("distinguishes different arcs", () => {
    expect(Oid.fromString("1.2.3").equals(Oid.fromString("1.2.4"))).toBe(false);
    expect(Oid.fromString("1.2.3").equals(Oid.fromString("1.2.3.0"))).toBe(false);
  });

  it("orders arc by arc with prefixes first", () => {
    expect(Oid.fromString("1.2").compareTo(Oid.fromString("1.2.3"))).toBeLessThan(0);
    expect(Oid.fromString("1.10").compareTo(Oid.fromString("1.9"))).toBeGreaterThan(0);
    expect(Oid.fromString("2.5.4.3").compareTo(Oid.fromString("2.5.4.3"))).toBe(0);
  });
});
