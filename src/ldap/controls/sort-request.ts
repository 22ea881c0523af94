import { decodeBoolean, decodeUtf8, encodeUtf8 } from "../../common/codecs.js";
import { DecoderError, EncoderError } from "../../common/errors.js";
import { UniversalTag } from "../../common/types.js";
import { BasicTLVBuilder } from "../../builder/basic-builder.js";
import { ByteWriter } from "../../builder/byte-writer.js";
import type { DecodeContainer } from "../../parser/container.js";
import { Grammar } from "../../parser/grammar.js";
import { StatefulDecoder, type DecoderOptions } from "../../parser/stateful-decoder.js";
import { Control, type Encodable } from "../control.js";

export const SORT_REQUEST_OID = "1.2.840.113556.1.4.473";

/** Context tags inside a SortKey. */
export const SortKeyTag = {
  OrderingRule: 0x80,
  ReverseOrder: 0x81,
} as const;

export interface SortKey {
  attributeType: string;
  orderingRule?: string;
  reverseOrder: boolean;
}

export const SortState = {
  Start: "START",
  SortKeyList: "SORT_KEY_LIST",
  SortKey: "SORT_KEY",
  AttributeType: "ATTRIBUTE_TYPE",
  OrderingRule: "ORDERING_RULE",
  ReverseOrder: "REVERSE_ORDER",
} as const;
export type SortState = (typeof SortState)[keyof typeof SortState];

type Container = DecodeContainer<SortState, SortKey[]>;

function currentKey(c: Container): SortKey {
  const key = c.value[c.value.length - 1];
  if (key === undefined) c.fail("No sort key in progress");
  return key;
}

function readString(c: Container, what: string): string {
  const text = decodeUtf8(c.currentTlv.value);
  if (text.length === 0) c.fail(`Empty ${what}`);
  return text;
}

function setReverseOrder(c: Container): void {
  currentKey(c).reverseOrder = decodeBoolean(c.currentTlv.value);
}

/**
 * `SortKeyList ::= SEQUENCE OF SEQUENCE { attributeType, orderingRule [0] OPTIONAL,
 * reverseOrder [1] BOOLEAN DEFAULT FALSE }`
 */
export const sortRequestGrammar = new Grammar<SortState, SortKey[], SortKey[]>({
  name: "SortRequest",
  initialState: SortState.Start,
  transitions: [
    { from: SortState.Start, tag: UniversalTag.Sequence, to: SortState.SortKeyList },
    {
      from: SortState.SortKeyList,
      tag: UniversalTag.Sequence,
      to: SortState.SortKey,
      action: (c) => {
        c.value.push({ attributeType: "", reverseOrder: false });
      },
    },
    {
      from: SortState.SortKey,
      tag: UniversalTag.OctetString,
      to: SortState.AttributeType,
      endAllowed: true,
      action: (c) => {
        currentKey(c).attributeType = readString(c, "attribute type");
      },
    },
    {
      from: SortState.AttributeType,
      tag: SortKeyTag.OrderingRule,
      to: SortState.OrderingRule,
      endAllowed: true,
      action: (c) => {
        currentKey(c).orderingRule = readString(c, "ordering rule");
      },
    },
    {
      from: SortState.AttributeType,
      tag: SortKeyTag.ReverseOrder,
      to: SortState.ReverseOrder,
      endAllowed: true,
      action: setReverseOrder,
    },
    {
      from: SortState.OrderingRule,
      tag: SortKeyTag.ReverseOrder,
      to: SortState.ReverseOrder,
      endAllowed: true,
      action: setReverseOrder,
    },
  ],
  closers: [{ opened: SortState.SortKey, to: SortState.SortKeyList, endAllowed: true }],
  create: () => [],
  finish: (keys) => keys,
});

export interface SortRequestLayout {
  readonly keyLengths: readonly number[];
  readonly listLength: number;
  readonly frameLength: number;
}

function stringLength(text: string): number {
  return BasicTLVBuilder.tlvLength(encodeUtf8(text).length);
}

/**
 * Value of the server-side sort request control.
 */
export class SortRequest implements Encodable<SortRequestLayout> {
  public readonly keys: readonly SortKey[];

  public constructor(keys: readonly SortKey[]) {
    if (keys.length === 0) {
      throw new EncoderError("A sort request needs at least one sort key");
    }
    for (const key of keys) {
      if (key.attributeType.length === 0) {
        throw new EncoderError("A sort key needs an attribute type");
      }
      if (key.orderingRule === "") {
        throw new EncoderError(`Sort key '${key.attributeType}' has an empty ordering rule`);
      }
    }
    this.keys = Object.freeze(keys.map((key) => ({ ...key })));
  }

  public static decode(bytes: Uint8Array, options?: DecoderOptions): SortRequest {
    return new SortRequest(StatefulDecoder.decodeOne(sortRequestGrammar, bytes, options));
  }

  public static fromControl(control: Control, options?: DecoderOptions): SortRequest {
    const value = control.value;
    if (control.oid !== SORT_REQUEST_OID || value === undefined) {
      throw new DecoderError(`${control.toString()} is not a sort request`);
    }
    return SortRequest.decode(value, options);
  }

  public computeLength(): SortRequestLayout {
    const keyLengths = this.keys.map(
      (key) =>
        stringLength(key.attributeType) +
        (key.orderingRule === undefined ? 0 : stringLength(key.orderingRule)) +
        (key.reverseOrder ? 3 : 0),
    );
    const listLength = keyLengths.reduce((sum, len) => sum + BasicTLVBuilder.tlvLength(len), 0);
    return { keyLengths, listLength, frameLength: BasicTLVBuilder.tlvLength(listLength) };
  }

  public encode(writer: ByteWriter, layout: SortRequestLayout): ByteWriter {
    writer.putHeader(UniversalTag.Sequence, layout.listLength);
    this.keys.forEach((key, i) => {
      writer.putHeader(UniversalTag.Sequence, layout.keyLengths[i]);
      writer.putOctetString(key.attributeType);
      if (key.orderingRule !== undefined) {
        writer.putOctetString(key.orderingRule, SortKeyTag.OrderingRule);
      }
      if (key.reverseOrder) writer.putBoolean(true, SortKeyTag.ReverseOrder);
    });
    return writer;
  }

  public toBytes(): Uint8Array {
    const layout = this.computeLength();
    return this.encode(new ByteWriter(layout.frameLength), layout).finish();
  }

  public toControl(critical = false): Control {
    return new Control(SORT_REQUEST_OID, critical, this.toBytes());
  }
}
