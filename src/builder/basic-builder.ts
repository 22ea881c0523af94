import { EncoderError } from "../common/errors.js";

/**
 * Definite-length TLV encoding helpers.
 */
export class BasicTLVBuilder {
  /**
   * Number of octets needed to encode a length field for `length`.
   */
  public static lengthOfLength(length: number): number {
    if (length < 0x80) return 1;
    if (length < 0x100) return 2;
    if (length < 0x10000) return 3;
    if (length < 0x1000000) return 4;
    return 5;
  }

  /**
   * Size of a TLV with a one-octet tag and a value of `valueLength` octets.
   */
  public static tlvLength(valueLength: number): number {
    return 1 + this.lengthOfLength(valueLength) + valueLength;
  }

  /**
   * Length octets in short or long form.
   */
  public static encodeLength(length: number): number[] {
    if (!Number.isInteger(length) || length < 0 || length > 0x7fffffff) {
      throw new EncoderError(`Cannot encode length ${length}`);
    }
    if (length < 0x80) return [length];

    const lenOfLenBytes: number[] = [];
    let tempLen = length;
    do {
      lenOfLenBytes.unshift(tempLen & 0xff);
      tempLen = Math.floor(tempLen / 256);
    } while (tempLen > 0);
    return [0x80 | lenOfLenBytes.length, ...lenOfLenBytes];
  }

  /**
   * Build a complete TLV from a one-octet tag and its value.
   */
  public static build(tag: number, value: Uint8Array): Uint8Array {
    if (!Number.isInteger(tag) || tag < 0 || tag > 0xff || (tag & 0x1f) === 0x1f) {
      throw new EncoderError(
        `Invalid tag ${tag}: expected a low-tag-number identifier octet`,
      );
    }
    const lengthBytes = this.encodeLength(value.length);
    const result = new Uint8Array(1 + lengthBytes.length + value.length);
    result[0] = tag;
    result.set(lengthBytes, 1);
    result.set(value, 1 + lengthBytes.length);
    return result;
  }
}
