import { describe, expect, it } from "vitest";
import assert from "assert";
import { toHex } from "../../src/common/codecs.js";
import { DecoderError, EncoderError, GrammarError } from "../../src/common/errors.js";
import { Control, encodeControl } from "../../src/ldap/control.js";
import {
  SORT_REQUEST_OID,
  SortRequest,
  sortRequestGrammar,
} from "../../src/ldap/controls/sort-request.js";
import { StatefulDecoder } from "../../src/parser/stateful-decoder.js";
import { collect, feed, hex, silentLogger } from "../helpers/utils.js";

const options = { logger: silentLogger };

describe("SortRequest - encoding", () => {
  it("writes a single key with defaults omitted", () => {
    const request = new SortRequest([{ attributeType: "cn", reverseOrder: false }]);
    expect(toHex(request.toBytes())).toBe("300630040402636e");
  });

  it("writes the ordering rule and reverse flag with context tags", () => {
    const request = new SortRequest([
      { attributeType: "cn", orderingRule: "2.5.13.3", reverseOrder: true },
    ]);
    expect(request.computeLength()).toEqual({ keyLengths: [17], listLength: 19, frameLength: 21 });
    expect(toHex(request.toBytes())).toBe("301330110402636e8008322e352e31332e338101ff");
  });

  it("writes several keys in order", () => {
    const request = new SortRequest([
      { attributeType: "cn", reverseOrder: true },
      { attributeType: "sn", reverseOrder: false },
    ]);
    expect(toHex(request.toBytes())).toBe("300f30070402636e8101ff30040402736e");
  });

  it("wraps the value in a control", () => {
    const control = new SortRequest([
      { attributeType: "cn", reverseOrder: true },
      { attributeType: "sn", reverseOrder: false },
    ]).toControl(true);
    expect(control.oid).toBe(SORT_REQUEST_OID);
    expect(toHex(encodeControl(control))).toBe(
      "302e0416312e322e3834302e3131333535362e312e342e3437330101ff0411300f30070402636e8101ff30040402736e",
    );
  });

  it("needs at least one key", () => {
    expect(() => new SortRequest([])).toThrow(EncoderError);
  });

  it("refuses keys the decoder would reject", () => {
    expect(() => new SortRequest([{ attributeType: "", reverseOrder: false }])).toThrow(
      "A sort key needs an attribute type",
    );
    assert.throws(
      () => new SortRequest([{ attributeType: "cn", orderingRule: "", reverseOrder: true }]),
      (e: unknown) =>
        e instanceof EncoderError && e.message === "Sort key 'cn' has an empty ordering rule",
    );
  });
});

describe("SortRequest - decoding", () => {
  it("reads every field", () => {
    expect(SortRequest.decode(hex("301330110402636e8008322e352e31332e338101ff"), options).keys).toEqual([
      { attributeType: "cn", orderingRule: "2.5.13.3", reverseOrder: true },
    ]);
  });

  it("reads several keys", () => {
    expect(SortRequest.decode(hex("300f30070402636e8101ff30040402736e"), options).keys).toEqual([
      { attributeType: "cn", reverseOrder: true },
      { attributeType: "sn", reverseOrder: false },
    ]);
  });

  it("drops an explicit FALSE when re-encoding", () => {
    const request = SortRequest.decode(hex("300930070402636e810100"), options);
    expect(request.keys).toEqual([{ attributeType: "cn", reverseOrder: false }]);
    expect(toHex(request.toBytes())).toBe("300630040402636e");
  });

  it("decodes from a control", () => {
    const control = new SortRequest([{ attributeType: "sn", reverseOrder: true }]).toControl();
    expect(SortRequest.fromControl(control, options).keys).toEqual([
      { attributeType: "sn", reverseOrder: true },
    ]);
    expect(() => SortRequest.fromControl(new Control("1.2.3", false, hex("3000")), options)).toThrow(
      DecoderError,
    );
  });

  it("decodes in chunks like any other grammar", () => {
    const bytes = hex("301330110402636e8008322e352e31332e338101ff");
    const decoder = new StatefulDecoder(sortRequestGrammar, options);
    const results = collect(decoder);
    feed(decoder, bytes, 1, 7, 12);
    decoder.flush();
    expect(results).toEqual([[{ attributeType: "cn", orderingRule: "2.5.13.3", reverseOrder: true }]]);
  });

  it("rejects an empty key list", () => {
    expect(() => SortRequest.decode(hex("3000"), options)).toThrow(GrammarError);
  });

  it("rejects a key without an attribute type", () => {
    expect(() => SortRequest.decode(hex("30023000"), options)).toThrow(/ended early/);
  });

  it("rejects the ordering rule after the reverse flag", () => {
    assert.throws(
      () => SortRequest.decode(hex("300c300a0402636e8101ff800178"), options),
      (e: unknown) => e instanceof GrammarError && e.state === "REVERSE_ORDER" && e.tag === 0x80,
    );
  });
});
