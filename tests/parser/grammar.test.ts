import { describe, expect, test } from "vitest";
import assert from "assert";
import { ActionError, GrammarError } from "../../src/common/errors.js";
import type { TLV } from "../../src/common/types.js";
import { DecodeContainer } from "../../src/parser/container.js";
import { Grammar } from "../../src/parser/grammar.js";
import { StatefulDecoder } from "../../src/parser/stateful-decoder.js";
import { pairDefinition } from "../helpers/pair-grammar.js";
import { hex, silentLogger } from "../helpers/utils.js";

function tlv(tag: number, value: number[], valueOffset: number): TLV {
  return {
    tag,
    constructed: (tag & 0x20) !== 0,
    length: value.length,
    valueOffset,
    valueEnd: valueOffset + value.length,
    value: new Uint8Array(value),
  };
}

describe("Grammar - construction", () => {
  test("should reject two transitions for the same state and tag", () => {
    const definition = pairDefinition();
    expect(
      () =>
        new Grammar({
          ...definition,
          transitions: [...definition.transitions, { from: "START", tag: 0x30, to: "TEXT" }],
        }),
    ).toThrow("Grammar Pair: duplicate transition from START on 0x30 (UNIVERSAL 16, constructed)");
  });

  test("should reject two closers for the same state", () => {
    expect(
      () =>
        new Grammar(
          pairDefinition({
            closers: [
              { opened: "PAIR", to: "TEXT" },
              { opened: "PAIR", to: "NUMBER" },
            ],
          }),
        ),
    ).toThrow("Grammar Pair: duplicate closer for PAIR");
  });

  test("should default endAllowed to false", () => {
    const grammar = new Grammar(pairDefinition());
    expect(grammar.getTransition("START", 0x30)?.endAllowed).toBe(false);
    expect(grammar.getTransition("PAIR", 0x02)?.endAllowed).toBe(true);
    expect(grammar.getTransition("PAIR", 0x04)).toBeUndefined();
  });
});

describe("Grammar - stepping", () => {
  test("should name the grammar, state and tag of an unexpected TLV", () => {
    const grammar = new Grammar(pairDefinition());
    const container = new DecodeContainer(grammar, silentLogger);

    assert.throws(
      () => grammar.step(container, tlv(0x04, [0x61], 2)),
      (e: unknown) =>
        e instanceof GrammarError &&
        e.grammar === "Pair" &&
        e.state === "START" &&
        e.tag === 0x04 &&
        e.position === 2 &&
        e.message ===
          "Unexpected tag [grammar Pair, state START, tag 0x04 (UNIVERSAL 4, primitive)] at byte 2",
    );
  });

  test("should move to the target state and record endAllowed", () => {
    const grammar = new Grammar(pairDefinition());
    const container = new DecodeContainer(grammar, silentLogger);

    grammar.step(container, tlv(0x30, [], 2));
    expect(container.state).toBe("PAIR");
    expect(container.grammarEndAllowed).toBe(false);

    grammar.step(container, tlv(0x02, [0x07], 4));
    expect(container.state).toBe("NUMBER");
    expect(container.grammarEndAllowed).toBe(true);
    expect(container.value.n).toBe(7);
  });

  test("should wrap a failing action in an ActionError", () => {
    const grammar = new Grammar(pairDefinition());
    const container = new DecodeContainer(grammar, silentLogger);
    grammar.step(container, tlv(0x30, [], 2));

    // An empty INTEGER makes the action throw a plain Error.
    assert.throws(
      () => grammar.step(container, tlv(0x02, [], 4)),
      (e: unknown) =>
        e instanceof ActionError &&
        e.state === "NUMBER" &&
        e.cause instanceof Error &&
        e.message ===
          "INTEGER value must have at least one content octet [grammar Pair, state NUMBER, tag 0x02 (UNIVERSAL 2, primitive)] at byte 4",
    );
  });

  test("should refuse to close a constructed value before its content is complete", () => {
    const grammar = new Grammar(pairDefinition());
    const container = new DecodeContainer(grammar, silentLogger);
    grammar.step(container, tlv(0x30, [], 2));

    expect(() => grammar.close(container, { state: "PAIR", tag: 0x30, end: 2 })).toThrow(
      "Constructed value 0x30 (UNIVERSAL 16, constructed) ended early [grammar Pair, state PAIR, tag 0x30 (UNIVERSAL 16, constructed)] at byte 2",
    );
  });

  test("should run the closer registered for the opening state", () => {
    const grammar = new Grammar(
      pairDefinition({ closers: [{ opened: "PAIR", to: "TEXT", endAllowed: true }] }),
    );
    const container = new DecodeContainer(grammar, silentLogger);
    grammar.step(container, tlv(0x30, [], 2));
    grammar.step(container, tlv(0x02, [0x01], 4));

    grammar.close(container, { state: "PAIR", tag: 0x30, end: 5 });
    expect(container.state).toBe("TEXT");
  });
});

describe("Grammar - driven by a decoder", () => {
  const grammar = new Grammar(pairDefinition());

  test("should decode with and without the optional field", () => {
    expect(StatefulDecoder.decodeOne(grammar, hex("3006020105040161"), { logger: silentLogger })).toEqual({
      n: 5,
      s: "a",
    });
    expect(StatefulDecoder.decodeOne(grammar, hex("3003020105"), { logger: silentLogger })).toEqual({ n: 5 });
  });

  test("should reject a PDU that ends before its mandatory field", () => {
    expect(() => StatefulDecoder.decodeOne(grammar, hex("3000"), { logger: silentLogger })).toThrow(GrammarError);
  });
});
