import {
  decodeBoolean,
  decodeInteger,
  decodeUtf8,
} from "../common/codecs.js";
import { Oid } from "../common/oid.js";
import { UniversalTag } from "../common/types.js";
import type { DecodeContainer } from "../parser/container.js";
import {
  Grammar,
  type CloserSpec,
  type TransitionSpec,
} from "../parser/grammar.js";
import {
  StatefulDecoder,
  type DecodeOutcome,
  type DecoderOptions,
} from "../parser/stateful-decoder.js";
import { Control } from "./control.js";
import {
  LdapTag,
  MAX_MESSAGE_ID,
  MessageType,
  isLdapResponse,
  type LdapMessage,
  type LdapResponse,
  type PartialAttribute,
  type ProtocolOp,
  type SearchResultEntry,
  type SearchResultReference,
} from "./messages.js";

export const MessageState = {
  Start: "START",
  LdapMessage: "LDAP_MESSAGE",
  MessageId: "MESSAGE_ID",
  LdapResult: "LDAP_RESULT",
  ResultCode: "RESULT_CODE",
  MatchedDn: "MATCHED_DN",
  DiagnosticMessage: "DIAGNOSTIC_MESSAGE",
  Referral: "REFERRAL",
  ReferralUrl: "REFERRAL_URL",
  ReferralDone: "REFERRAL_DONE",
  SearchResultEntry: "SEARCH_RESULT_ENTRY",
  ObjectName: "OBJECT_NAME",
  Attributes: "ATTRIBUTES",
  PartialAttribute: "PARTIAL_ATTRIBUTE",
  AttributeType: "ATTRIBUTE_TYPE",
  AttributeVals: "ATTRIBUTE_VALS",
  AttributeValue: "ATTRIBUTE_VALUE",
  AttributeValsDone: "ATTRIBUTE_VALS_DONE",
  AttributesDone: "ATTRIBUTES_DONE",
  SearchResultReference: "SEARCH_RESULT_REFERENCE",
  ReferenceUrl: "REFERENCE_URL",
  OpDone: "OP_DONE",
  Controls: "CONTROLS",
  Control: "CONTROL",
  ControlType: "CONTROL_TYPE",
  Criticality: "CRITICALITY",
  ControlValue: "CONTROL_VALUE",
  ControlsDone: "CONTROLS_DONE",
} as const;
export type MessageState = (typeof MessageState)[keyof typeof MessageState];

interface ControlDraft {
  oid: string;
  critical: boolean;
  value?: Uint8Array;
}

/** The message as it is being assembled. */
export interface MessageDraft {
  messageID: number;
  protocolOp: ProtocolOp | undefined;
  controls: Control[];
  control: ControlDraft | undefined;
}

type Container = DecodeContainer<MessageState, MessageDraft>;
type Transition = TransitionSpec<MessageState, MessageDraft>;

function readMessageId(c: Container, what: string): number {
  const id = decodeInteger(c.currentTlv.value);
  if (id < 0 || id > MAX_MESSAGE_ID) {
    c.fail(`${what} ${id} is outside 0..${MAX_MESSAGE_ID}`);
  }
  return id;
}

function readString(c: Container): string {
  return decodeUtf8(c.currentTlv.value);
}

function currentResult(c: Container): LdapResponse {
  const op = c.value.protocolOp;
  if (op === undefined || !isLdapResponse(op)) {
    c.fail("No LDAPResult in progress");
  }
  return op;
}

function currentEntry(c: Container): SearchResultEntry {
  const op = c.value.protocolOp;
  if (op === undefined || op.type !== MessageType.SearchResultEntry) {
    c.fail("No SearchResultEntry in progress");
  }
  return op;
}

function currentReference(c: Container): SearchResultReference {
  const op = c.value.protocolOp;
  if (op === undefined || op.type !== MessageType.SearchResultReference) {
    c.fail("No SearchResultReference in progress");
  }
  return op;
}

function currentAttribute(c: Container): PartialAttribute {
  const attributes = currentEntry(c).attributes;
  const attribute = attributes[attributes.length - 1];
  if (attribute === undefined) c.fail("No attribute in progress");
  return attribute;
}

function currentControl(c: Container): ControlDraft {
  const control = c.value.control;
  if (control === undefined) c.fail("No control in progress");
  return control;
}

function startResult(type: LdapResponse["type"]) {
  return (c: Container): void => {
    c.value.protocolOp = { type, resultCode: 0, matchedDN: "", diagnosticMessage: "" };
  };
}

const resultTransitions: Transition[] = [
  MessageType.SearchResultDone,
  MessageType.DelResponse,
  MessageType.CompareResponse,
].map((type): Transition => ({
  from: MessageState.MessageId,
  tag: type,
  to: MessageState.LdapResult,
  action: startResult(type),
}));

const transitions: Transition[] = [
  { from: MessageState.Start, tag: UniversalTag.Sequence, to: MessageState.LdapMessage },
  {
    from: MessageState.LdapMessage,
    tag: UniversalTag.Integer,
    to: MessageState.MessageId,
    action: (c) => {
      c.value.messageID = readMessageId(c, "Message ID");
    },
  },

  // Primitive operations complete at once.
  {
    from: MessageState.MessageId,
    tag: MessageType.UnbindRequest,
    to: MessageState.OpDone,
    endAllowed: true,
    action: (c) => {
      if (c.currentTlv.length !== 0) c.fail("UnbindRequest must be empty");
      c.value.protocolOp = { type: MessageType.UnbindRequest };
    },
  },
  {
    from: MessageState.MessageId,
    tag: MessageType.DelRequest,
    to: MessageState.OpDone,
    endAllowed: true,
    action: (c) => {
      c.value.protocolOp = { type: MessageType.DelRequest, dn: readString(c) };
    },
  },
  {
    from: MessageState.MessageId,
    tag: MessageType.AbandonRequest,
    to: MessageState.OpDone,
    endAllowed: true,
    action: (c) => {
      c.value.protocolOp = {
        type: MessageType.AbandonRequest,
        abandonId: readMessageId(c, "Abandoned message ID"),
      };
    },
  },

  // LDAPResult
  ...resultTransitions,
  {
    from: MessageState.LdapResult,
    tag: UniversalTag.Enumerated,
    to: MessageState.ResultCode,
    action: (c) => {
      const code = decodeInteger(c.currentTlv.value);
      if (code < 0) c.fail(`Negative result code ${code}`);
      currentResult(c).resultCode = code;
    },
  },
  {
    from: MessageState.ResultCode,
    tag: UniversalTag.OctetString,
    to: MessageState.MatchedDn,
    action: (c) => {
      currentResult(c).matchedDN = readString(c);
    },
  },
  {
    from: MessageState.MatchedDn,
    tag: UniversalTag.OctetString,
    to: MessageState.DiagnosticMessage,
    endAllowed: true,
    action: (c) => {
      currentResult(c).diagnosticMessage = readString(c);
    },
  },
  {
    from: MessageState.DiagnosticMessage,
    tag: LdapTag.Referral,
    to: MessageState.Referral,
    action: (c) => {
      currentResult(c).referral = [];
    },
  },
  ...[MessageState.Referral, MessageState.ReferralUrl].map(
    (from): Transition => ({
      from,
      tag: UniversalTag.OctetString,
      to: MessageState.ReferralUrl,
      endAllowed: true,
      action: (c: Container) => {
        const referral = currentResult(c).referral;
        if (referral === undefined) c.fail("No referral in progress");
        referral.push(readString(c));
      },
    }),
  ),

  // SearchResultEntry
  {
    from: MessageState.MessageId,
    tag: MessageType.SearchResultEntry,
    to: MessageState.SearchResultEntry,
    action: (c) => {
      c.value.protocolOp = { type: MessageType.SearchResultEntry, objectName: "", attributes: [] };
    },
  },
  {
    from: MessageState.SearchResultEntry,
    tag: UniversalTag.OctetString,
    to: MessageState.ObjectName,
    action: (c) => {
      currentEntry(c).objectName = readString(c);
    },
  },
  { from: MessageState.ObjectName, tag: UniversalTag.Sequence, to: MessageState.Attributes, endAllowed: true },
  {
    from: MessageState.Attributes,
    tag: UniversalTag.Sequence,
    to: MessageState.PartialAttribute,
    action: (c) => {
      currentEntry(c).attributes.push({ type: "", vals: [] });
    },
  },
  {
    from: MessageState.PartialAttribute,
    tag: UniversalTag.OctetString,
    to: MessageState.AttributeType,
    action: (c) => {
      const type = readString(c);
      if (type.length === 0) c.fail("Empty attribute type");
      currentAttribute(c).type = type;
    },
  },
  { from: MessageState.AttributeType, tag: UniversalTag.Set, to: MessageState.AttributeVals, endAllowed: true },
  ...[MessageState.AttributeVals, MessageState.AttributeValue].map(
    (from): Transition => ({
      from,
      tag: UniversalTag.OctetString,
      to: MessageState.AttributeValue,
      endAllowed: true,
      action: (c) => {
        currentAttribute(c).vals.push(c.currentTlv.value.slice());
      },
    }),
  ),

  // SearchResultReference
  {
    from: MessageState.MessageId,
    tag: MessageType.SearchResultReference,
    to: MessageState.SearchResultReference,
    action: (c) => {
      c.value.protocolOp = { type: MessageType.SearchResultReference, uris: [] };
    },
  },
  ...[MessageState.SearchResultReference, MessageState.ReferenceUrl].map(
    (from): Transition => ({
      from,
      tag: UniversalTag.OctetString,
      to: MessageState.ReferenceUrl,
      endAllowed: true,
      action: (c) => {
        currentReference(c).uris.push(readString(c));
      },
    }),
  ),

  // Controls
  { from: MessageState.OpDone, tag: LdapTag.Controls, to: MessageState.Controls, endAllowed: true },
  {
    from: MessageState.Controls,
    tag: UniversalTag.Sequence,
    to: MessageState.Control,
    action: (c) => {
      c.value.control = { oid: "", critical: false };
    },
  },
  {
    from: MessageState.Control,
    tag: UniversalTag.OctetString,
    to: MessageState.ControlType,
    endAllowed: true,
    action: (c) => {
      const oid = readString(c);
      if (!Oid.isValid(oid)) c.fail(`Invalid control type '${oid}'`);
      currentControl(c).oid = oid;
    },
  },
  {
    from: MessageState.ControlType,
    tag: UniversalTag.Boolean,
    to: MessageState.Criticality,
    endAllowed: true,
    action: (c) => {
      currentControl(c).critical = decodeBoolean(c.currentTlv.value);
    },
  },
  ...[MessageState.ControlType, MessageState.Criticality].map(
    (from): Transition => ({
      from,
      tag: UniversalTag.OctetString,
      to: MessageState.ControlValue,
      endAllowed: true,
      action: (c) => {
        currentControl(c).value = c.currentTlv.value.slice();
      },
    }),
  ),
];

const closers: CloserSpec<MessageState, MessageDraft>[] = [
  { opened: MessageState.Referral, to: MessageState.ReferralDone, endAllowed: true },
  { opened: MessageState.LdapResult, to: MessageState.OpDone, endAllowed: true },
  { opened: MessageState.AttributeVals, to: MessageState.AttributeValsDone, endAllowed: true },
  { opened: MessageState.PartialAttribute, to: MessageState.Attributes, endAllowed: true },
  { opened: MessageState.Attributes, to: MessageState.AttributesDone, endAllowed: true },
  { opened: MessageState.SearchResultEntry, to: MessageState.OpDone, endAllowed: true },
  { opened: MessageState.SearchResultReference, to: MessageState.OpDone, endAllowed: true },
  {
    opened: MessageState.Control,
    to: MessageState.Controls,
    endAllowed: true,
    action: (c) => {
      const draft = currentControl(c);
      c.value.controls.push(new Control(draft.oid, draft.critical, draft.value));
      c.value.control = undefined;
    },
  },
  { opened: MessageState.Controls, to: MessageState.ControlsDone, endAllowed: true },
];

export const ldapMessageGrammar = new Grammar<MessageState, MessageDraft, LdapMessage>({
  name: "LdapMessage",
  initialState: MessageState.Start,
  transitions,
  closers,
  create: () => ({ messageID: 0, protocolOp: undefined, controls: [], control: undefined }),
  finish: (draft) => {
    if (draft.protocolOp === undefined) {
      throw new Error("LDAPMessage has no protocol operation");
    }
    return { messageID: draft.messageID, protocolOp: draft.protocolOp, controls: draft.controls };
  },
});

export function createLdapMessageDecoder(
  options?: DecoderOptions,
): StatefulDecoder<MessageState, MessageDraft, LdapMessage> {
  return new StatefulDecoder(ldapMessageGrammar, options);
}

export function decodeLdapMessage(bytes: Uint8Array, options?: DecoderOptions): LdapMessage {
  return StatefulDecoder.decodeOne(ldapMessageGrammar, bytes, options);
}

export function decodeLdapMessageFrom(
  bytes: Uint8Array,
  options?: DecoderOptions,
): DecodeOutcome<LdapMessage> {
  return StatefulDecoder.decodeFrom(ldapMessageGrammar, bytes, options);
}
