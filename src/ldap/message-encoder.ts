import { encodeUtf8 } from "../common/codecs.js";
import { EncoderError } from "../common/errors.js";
import { UniversalTag } from "../common/types.js";
import { BasicTLVBuilder } from "../builder/basic-builder.js";
import { ByteWriter, integerLength } from "../builder/byte-writer.js";
import type { ControlLayout } from "./control.js";
import {
  LdapTag,
  MAX_MESSAGE_ID,
  MessageType,
  type LdapMessage,
  type LdapResultFields,
  type PartialAttribute,
  type ProtocolOp,
} from "./messages.js";

function tlvLength(valueLength: number): number {
  return BasicTLVBuilder.tlvLength(valueLength);
}

export interface AttributeLayout {
  /** Contents of the PartialAttribute SEQUENCE. */
  readonly length: number;
  /** Contents of the vals SET. */
  readonly valsLength: number;
}

/**
 * Every length the write pass needs, computed once up front.
 */
export interface MessageLayout {
  readonly frameLength: number;
  readonly messageLength: number;
  readonly opLength: number;
  /** Contents of the referral `[3]`; 0 when absent. */
  readonly referralLength: number;
  /** Contents of the attribute list of a SearchResultEntry. */
  readonly attributesLength: number;
  readonly attributes: readonly AttributeLayout[];
  /** Contents of the controls `[0]`; 0 when there are none. */
  readonly controlsLength: number;
  readonly controls: readonly ControlLayout[];
}

function stringLength(text: string): number {
  return tlvLength(encodeUtf8(text).length);
}

function checkMessageId(id: number, what: string): void {
  if (!Number.isInteger(id) || id < 0 || id > MAX_MESSAGE_ID) {
    throw new EncoderError(`${what} ${id} is outside 0..${MAX_MESSAGE_ID}`);
  }
}

function referralLength(result: LdapResultFields): number {
  if (result.referral === undefined) return 0;
  if (result.referral.length === 0) {
    throw new EncoderError("A referral needs at least one URL");
  }
  return result.referral.reduce((sum, url) => sum + stringLength(url), 0);
}

function attributeLayout(attribute: PartialAttribute): AttributeLayout {
  if (attribute.type.length === 0) {
    throw new EncoderError("A partial attribute needs an attribute type");
  }
  const valsLength = attribute.vals.reduce((sum, v) => sum + tlvLength(v.length), 0);
  return {
    valsLength,
    length: stringLength(attribute.type) + tlvLength(valsLength),
  };
}

interface OpLayout {
  readonly opLength: number;
  readonly referralLength: number;
  readonly attributesLength: number;
  readonly attributes: readonly AttributeLayout[];
}

function opLayout(op: ProtocolOp): OpLayout {
  const empty = { referralLength: 0, attributesLength: 0, attributes: [] };
  switch (op.type) {
    case MessageType.UnbindRequest:
      return { ...empty, opLength: 0 };
    case MessageType.DelRequest:
      return { ...empty, opLength: encodeUtf8(op.dn).length };
    case MessageType.AbandonRequest:
      checkMessageId(op.abandonId, "Abandoned message ID");
      return { ...empty, opLength: integerLength(op.abandonId) };
    case MessageType.SearchResultEntry: {
      const attributes = op.attributes.map(attributeLayout);
      const attributesLength = attributes.reduce((sum, a) => sum + tlvLength(a.length), 0);
      return {
        ...empty,
        attributes,
        attributesLength,
        opLength: stringLength(op.objectName) + tlvLength(attributesLength),
      };
    }
    case MessageType.SearchResultReference:
      if (op.uris.length === 0) {
        throw new EncoderError("A SearchResultReference needs at least one URI");
      }
      return { ...empty, opLength: op.uris.reduce((sum, uri) => sum + stringLength(uri), 0) };
    case MessageType.SearchResultDone:
    case MessageType.DelResponse:
    case MessageType.CompareResponse: {
      const referral = referralLength(op);
      return {
        ...empty,
        referralLength: referral,
        opLength:
          tlvLength(integerLength(op.resultCode)) +
          stringLength(op.matchedDN) +
          stringLength(op.diagnosticMessage) +
          (op.referral === undefined ? 0 : tlvLength(referral)),
      };
    }
  }
}

/**
 * Length pass: size every nested value of `message`.
 */
export function computeMessageLayout(message: LdapMessage): MessageLayout {
  checkMessageId(message.messageID, "Message ID");
  const op = opLayout(message.protocolOp);
  const controls = message.controls.map((control) => control.computeLength());
  const controlsLength = controls.reduce((sum, c) => sum + c.frameLength, 0);

  const messageLength =
    tlvLength(integerLength(message.messageID)) +
    tlvLength(op.opLength) +
    (controls.length > 0 ? tlvLength(controlsLength) : 0);

  return {
    ...op,
    messageLength,
    frameLength: tlvLength(messageLength),
    controlsLength,
    controls,
  };
}

function writeResult(writer: ByteWriter, result: LdapResultFields, layout: MessageLayout): void {
  writer.putInteger(result.resultCode, UniversalTag.Enumerated);
  writer.putOctetString(result.matchedDN);
  writer.putOctetString(result.diagnosticMessage);
  if (result.referral !== undefined) {
    writer.putHeader(LdapTag.Referral, layout.referralLength);
    for (const url of result.referral) writer.putOctetString(url);
  }
}

function writeOp(writer: ByteWriter, op: ProtocolOp, layout: MessageLayout): void {
  switch (op.type) {
    case MessageType.UnbindRequest:
      writer.putHeader(op.type, 0);
      return;
    case MessageType.DelRequest:
      writer.putOctetString(op.dn, op.type);
      return;
    case MessageType.AbandonRequest:
      writer.putInteger(op.abandonId, op.type);
      return;
    case MessageType.SearchResultEntry:
      writer.putHeader(op.type, layout.opLength);
      writer.putOctetString(op.objectName);
      writer.putHeader(UniversalTag.Sequence, layout.attributesLength);
      op.attributes.forEach((attribute, i) => {
        const sizes = layout.attributes[i];
        writer.putHeader(UniversalTag.Sequence, sizes.length);
        writer.putOctetString(attribute.type);
        writer.putHeader(UniversalTag.Set, sizes.valsLength);
        for (const value of attribute.vals) writer.putOctetString(value);
      });
      return;
    case MessageType.SearchResultReference:
      writer.putHeader(op.type, layout.opLength);
      for (const uri of op.uris) writer.putOctetString(uri);
      return;
    case MessageType.SearchResultDone:
    case MessageType.DelResponse:
    case MessageType.CompareResponse:
      writer.putHeader(op.type, layout.opLength);
      writeResult(writer, op, layout);
      return;
  }
}

/**
 * Write pass over a layout from {@link computeMessageLayout}.
 */
export function writeMessage(writer: ByteWriter, message: LdapMessage, layout: MessageLayout): ByteWriter {
  writer.putHeader(UniversalTag.Sequence, layout.messageLength);
  writer.putInteger(message.messageID);
  writeOp(writer, message.protocolOp, layout);
  if (message.controls.length > 0) {
    writer.putHeader(LdapTag.Controls, layout.controlsLength);
    message.controls.forEach((control, i) => {
      control.encode(writer, layout.controls[i]);
    });
  }
  return writer;
}

export function encodeMessage(message: LdapMessage): Uint8Array {
  const layout = computeMessageLayout(message);
  return writeMessage(new ByteWriter(layout.frameLength), message, layout).finish();
}
