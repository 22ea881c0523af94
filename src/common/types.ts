export const TagClass = {
  Universal: 0,
  Application: 1,
  ContextSpecific: 2,
  Private: 3,
} as const;
export type TagClass = (typeof TagClass)[keyof typeof TagClass];

/**
 * Identifier octets of the universal types the protocol uses.
 */
export const UniversalTag = {
  Boolean: 0x01,
  Integer: 0x02,
  OctetString: 0x04,
  Null: 0x05,
  Enumerated: 0x0a,
  Sequence: 0x30,
  Set: 0x31,
} as const;
export type UniversalTag = (typeof UniversalTag)[keyof typeof UniversalTag];

export interface TagInfo {
  tagClass: TagClass;
  constructed: boolean;
  tagNumber: number;
}

/**
 * Header of a TLV as read from the wire.
 */
export interface TLVHeader {
  /** Raw identifier octet. */
  tag: number;
  tagInfo: TagInfo;
  length: number;
  /** Bytes taken by the identifier and length octets. */
  headerLength: number;
}

/**
 * A framed TLV. Offsets are absolute positions in the decoded stream.
 */
export interface TLV {
  readonly tag: number;
  readonly constructed: boolean;
  readonly length: number;
  readonly valueOffset: number;
  readonly valueEnd: number;
  /** Primitive content; empty for constructed values. */
  readonly value: Uint8Array;
}

export interface TLVResult {
  tag: TagInfo;
  length: number;
  value: Uint8Array;
  endOffset: number;
}

export function makeTag(
  tagClass: TagClass,
  constructed: boolean,
  tagNumber: number,
): number {
  if (!Number.isInteger(tagNumber) || tagNumber < 0 || tagNumber > 30) {
    throw new Error(
      `Tag number ${tagNumber} needs the high-tag-number form, which is not supported`,
    );
  }
  return (tagClass << 6) | (constructed ? 0x20 : 0x00) | tagNumber;
}

export function tagClassOf(tag: number): TagClass {
  switch ((tag & 0xc0) >> 6) {
    case 0:
      return TagClass.Universal;
    case 1:
      return TagClass.Application;
    case 2:
      return TagClass.ContextSpecific;
    default:
      return TagClass.Private;
  }
}

export function describeTag(tag: number): string {
  const names = ["UNIVERSAL", "APPLICATION", "CONTEXT", "PRIVATE"];
  const hex = tag.toString(16).padStart(2, "0");
  const kind = tag & 0x20 ? "constructed" : "primitive";
  return `0x${hex} (${names[(tag & 0xc0) >> 6]} ${tag & 0x1f}, ${kind})`;
}
