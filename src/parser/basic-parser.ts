import { FramingError } from "../common/errors.js";
import { tagClassOf, type TagInfo, type TLVHeader, type TLVResult } from "../common/types.js";

// Largest length accepted in a long-form length field.
const MAX_LENGTH = 0x7fffffff;

export class BasicTLVParser {
  /**
   * Parse a buffer containing a single, complete TLV structure.
   * @param bytes - The TLV data to parse.
   * @returns The parsed result including tag, length, and value.
   */
  public static parse(bytes: Uint8Array): TLVResult {
    const header = this.readHeader(bytes, 0);
    if (header === null) {
      throw new FramingError("Truncated TLV header", bytes.length);
    }
    const end = header.headerLength + header.length;
    if (end > bytes.length) {
      throw new FramingError(
        `Declared length ${header.length} exceeds the ${bytes.length - header.headerLength} available bytes`,
        header.headerLength,
      );
    }
    return {
      tag: header.tagInfo,
      length: header.length,
      value: bytes.subarray(header.headerLength, end),
      endOffset: end,
    };
  }

  /**
   * Read the identifier and length octets starting at `offset`.
   * @param position - Stream position of `bytes[offset]`, used in error reports.
   * @returns The header, or null when the bytes present cannot hold it yet.
   */
  public static readHeader(
    bytes: Uint8Array,
    offset: number,
    position: number = offset,
  ): TLVHeader | null {
    if (offset >= bytes.length) return null;
    const tag = bytes[offset];
    const tagInfo = this.readTagInfo(tag, position);

    if (offset + 1 >= bytes.length) return null;
    const lengthInfo = this.readLength(bytes, offset + 1, position + 1);
    if (lengthInfo === null) return null;

    return {
      tag,
      tagInfo,
      length: lengthInfo.length,
      headerLength: 1 + lengthInfo.size,
    };
  }

  /**
   * Split the identifier octet into class, form and number.
   */
  protected static readTagInfo(tag: number, position: number): TagInfo {
    const tagNumber = tag & 0x1f;
    if (tagNumber === 0x1f) {
      throw new FramingError(
        "High-tag-number form is not supported",
        position,
      );
    }
    return {
      tagClass: tagClassOf(tag),
      constructed: (tag & 0x20) !== 0,
      tagNumber,
    };
  }

  /**
   * Read the length octets at `offset`.
   * @returns The length and the number of octets it took, or null when truncated.
   */
  protected static readLength(
    bytes: Uint8Array,
    offset: number,
    position: number,
  ): { length: number; size: number } | null {
    const first = bytes[offset];
    if ((first & 0x80) === 0) {
      return { length: first, size: 1 };
    }

    const numBytes = first & 0x7f;
    if (numBytes === 0) {
      throw new FramingError("Indefinite length encoding is not supported", position);
    }
    if (numBytes > 4) {
      throw new FramingError(
        `Length overflow: ${numBytes} length octets`,
        position,
      );
    }
    if (offset + numBytes >= bytes.length) return null;

    let length = 0;
    for (let i = 1; i <= numBytes; i++) {
      length = length * 256 + bytes[offset + i];
    }
    if (length > MAX_LENGTH) {
      throw new FramingError(`Length overflow: ${length}`, position);
    }
    return { length, size: 1 + numBytes };
  }
}
