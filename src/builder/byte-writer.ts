import {
  encodeBoolean,
  encodeInteger,
  encodeUtf8,
} from "../common/codecs.js";
import { EncoderError } from "../common/errors.js";
import { UniversalTag } from "../common/types.js";
import { BasicTLVBuilder } from "./basic-builder.js";

/**
 * Fixed-capacity output buffer for the write pass of a two-pass encoding.
 * The capacity comes from the length pass; writing past it is an error.
 */
export class ByteWriter {
  private readonly buffer: Uint8Array;
  private offset = 0;

  public constructor(capacity: number) {
    this.buffer = new Uint8Array(capacity);
  }

  public get position(): number {
    return this.offset;
  }

  public get capacity(): number {
    return this.buffer.length;
  }

  public put(byte: number): this {
    this.reserve(1);
    this.buffer[this.offset++] = byte;
    return this;
  }

  public putBytes(bytes: Uint8Array): this {
    this.reserve(bytes.length);
    this.buffer.set(bytes, this.offset);
    this.offset += bytes.length;
    return this;
  }

  /** Tag and length octets; the value follows separately. */
  public putHeader(tag: number, length: number): this {
    this.put(tag);
    for (const b of BasicTLVBuilder.encodeLength(length)) this.put(b);
    return this;
  }

  public putTlv(tag: number, value: Uint8Array): this {
    return this.putHeader(tag, value.length).putBytes(value);
  }

  public putOctetString(value: Uint8Array | string, tag: number = UniversalTag.OctetString): this {
    return this.putTlv(tag, typeof value === "string" ? encodeUtf8(value) : value);
  }

  public putInteger(value: number, tag: number = UniversalTag.Integer): this {
    return this.putTlv(tag, encodeInteger(value));
  }

  public putBoolean(value: boolean, tag: number = UniversalTag.Boolean): this {
    return this.putTlv(tag, encodeBoolean(value));
  }

  /**
   * The encoded bytes; fails unless the length pass predicted them exactly.
   */
  public finish(): Uint8Array {
    if (this.offset !== this.buffer.length) {
      throw new EncoderError(
        `Encoded ${this.offset} bytes but ${this.buffer.length} were computed`,
      );
    }
    return this.buffer;
  }

  private reserve(count: number): void {
    if (this.offset + count > this.buffer.length) {
      throw new EncoderError(
        `Buffer overflow: writing ${count} byte(s) at ${this.offset} exceeds capacity ${this.buffer.length}`,
      );
    }
  }
}

export function integerLength(value: number): number {
  return encodeInteger(value).length;
}
