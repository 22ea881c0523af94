import resultCodeNames from "./result-codes.json" with { type: "json" };
import type { Control } from "./control.js";

/**
 * Identifier octets of the protocol operations this codec understands.
 */
export const MessageType = {
  UnbindRequest: 0x42,
  SearchResultEntry: 0x64,
  SearchResultDone: 0x65,
  DelRequest: 0x4a,
  DelResponse: 0x6b,
  CompareResponse: 0x6f,
  AbandonRequest: 0x50,
  SearchResultReference: 0x73,
} as const;
export type MessageType = (typeof MessageType)[keyof typeof MessageType];

/** Context tags inside an LDAPMessage and an LDAPResult. */
export const LdapTag = {
  Controls: 0xa0,
  Referral: 0xa3,
} as const;

export const MAX_MESSAGE_ID = 0x7fffffff;

const names: Readonly<Record<string, string>> = resultCodeNames;

/** Registered name of an LDAP result code, e.g. `32` gives `"noSuchObject"`. */
export function resultCodeName(code: number): string | undefined {
  return names[String(code)];
}

export interface LdapResultFields {
  resultCode: number;
  matchedDN: string;
  diagnosticMessage: string;
  referral?: string[];
}

export interface UnbindRequest {
  type: typeof MessageType.UnbindRequest;
}

export interface DelRequest {
  type: typeof MessageType.DelRequest;
  dn: string;
}

export interface AbandonRequest {
  type: typeof MessageType.AbandonRequest;
  abandonId: number;
}

export interface PartialAttribute {
  type: string;
  vals: Uint8Array[];
}

export interface SearchResultEntry {
  type: typeof MessageType.SearchResultEntry;
  objectName: string;
  attributes: PartialAttribute[];
}

export interface SearchResultReference {
  type: typeof MessageType.SearchResultReference;
  uris: string[];
}

export interface SearchResultDone extends LdapResultFields {
  type: typeof MessageType.SearchResultDone;
}

export interface DelResponse extends LdapResultFields {
  type: typeof MessageType.DelResponse;
}

export interface CompareResponse extends LdapResultFields {
  type: typeof MessageType.CompareResponse;
}

export type LdapResponse = SearchResultDone | DelResponse | CompareResponse;

export type ProtocolOp =
  | UnbindRequest
  | DelRequest
  | AbandonRequest
  | SearchResultEntry
  | SearchResultReference
  | LdapResponse;

export interface LdapMessage {
  messageID: number;
  protocolOp: ProtocolOp;
  controls: Control[];
}

export function isLdapResponse(op: ProtocolOp): op is LdapResponse {
  return (
    op.type === MessageType.SearchResultDone ||
    op.type === MessageType.DelResponse ||
    op.type === MessageType.CompareResponse
  );
}
